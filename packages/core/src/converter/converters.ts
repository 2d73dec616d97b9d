/**
 * Built-in Converters
 *
 * @module converter/converters
 */

import type { z } from 'zod';

import { ConverterError, toError } from '../errors.js';

import type { ByteSink, Converter } from './types.js';

/**
 * UTF-8 text
 */
export class StringConverter implements Converter<string> {
  fromBytes(bytes: Buffer): string {
    return bytes.toString('utf8');
  }

  toBytes(value: string, sink: ByteSink): void {
    sink.write(value);
  }
}

/**
 * Raw bytes. Both directions copy, so neither tier aliases the caller's buffer.
 */
export class BufferConverter implements Converter<Buffer> {
  fromBytes(bytes: Buffer): Buffer {
    return Buffer.from(bytes);
  }

  toBytes(value: Buffer, sink: ByteSink): void {
    sink.write(Buffer.from(value));
  }
}

/**
 * JSON text, checked against a zod schema on decode
 */
export class JsonConverter<T> implements Converter<T> {
  private readonly schema: z.ZodType<T>;

  constructor(schema: z.ZodType<T>) {
    this.schema = schema;
  }

  fromBytes(bytes: Buffer): T {
    let parsed: unknown;
    try {
      parsed = JSON.parse(bytes.toString('utf8'));
    } catch (err) {
      throw new ConverterError('Malformed JSON payload', toError(err));
    }

    const result = this.schema.safeParse(parsed);
    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
      throw new ConverterError(`Payload does not match schema${where}: ${issue?.message ?? 'invalid'}`);
    }
    return result.data;
  }

  toBytes(value: T, sink: ByteSink): void {
    const text = JSON.stringify(value);
    if (text === undefined) {
      throw new ConverterError('Value is not JSON serializable');
    }
    sink.write(text);
  }
}
