/**
 * Converter Contract
 *
 * @module converter/types
 */

/**
 * Writable destination for encoded bytes. Strings are written as UTF-8.
 */
export interface ByteSink {
  write(chunk: Uint8Array | string): void;
}

/**
 * Converts values to and from bytes for the disk tier.
 *
 * Decoding an encoded value must yield a value equal to the original;
 * the cache relies on this when it promotes entries from disk.
 */
export interface Converter<T> {
  /** Decode bytes into a value. Throws on malformed input. */
  fromBytes(bytes: Buffer): T;
  /** Encode a value into the sink. Throws if the sink cannot be written. */
  toBytes(value: T, sink: ByteSink): void;
}

/**
 * Check that a value implements the converter contract
 */
export function isConverter(value: unknown): value is Converter<unknown> {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'fromBytes' in value &&
    typeof value.fromBytes === 'function' &&
    'toBytes' in value &&
    typeof value.toBytes === 'function'
  );
}
