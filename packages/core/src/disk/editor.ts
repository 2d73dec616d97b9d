/**
 * Disk Editor and Snapshot
 *
 * @module disk/editor
 */

import { DiskStoreError } from '../errors.js';
import type { ByteSink } from '../converter/types.js';

/**
 * Receives the written slots on commit, or null on abort
 */
export type EditCompletion = (editor: DiskEditor, values: Array<Buffer | undefined> | null) => void;

/**
 * Pending write of one entry. Nothing reaches disk until commit().
 */
export class DiskEditor {
  readonly key: string;
  private readonly pending: Array<Buffer[] | undefined>;
  private readonly complete: EditCompletion;
  private readonly directory: string;
  private done = false;
  private committed = false;

  constructor(key: string, valueCount: number, directory: string, complete: EditCompletion) {
    this.key = key;
    this.pending = new Array<Buffer[] | undefined>(valueCount).fill(undefined);
    this.directory = directory;
    this.complete = complete;
  }

  /**
   * Start a fresh value for the slot at index and return a sink for its bytes
   */
  newSink(index: number): ByteSink {
    this.checkIndex(index);
    this.checkNotDone();

    const chunks: Buffer[] = [];
    this.pending[index] = chunks;

    return {
      write: (chunk) => {
        this.checkNotDone();
        chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : Buffer.from(chunk));
      },
    };
  }

  /**
   * Replace the value of the slot at index
   */
  set(index: number, data: Uint8Array | string): void {
    this.newSink(index).write(data);
  }

  /**
   * Publish the written slots atomically
   */
  commit(): void {
    this.checkNotDone();
    this.done = true;
    const values = this.pending.map((chunks) => (chunks ? Buffer.concat(chunks) : undefined));
    this.complete(this, values);
    this.committed = true;
  }

  /**
   * Discard this edit
   */
  abort(): void {
    if (this.done) return;
    this.done = true;
    this.complete(this, null);
  }

  abortUnlessCommitted(): void {
    if (!this.committed) {
      this.abort();
    }
  }

  private checkIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.pending.length) {
      throw new RangeError(`Expected index in [0, ${this.pending.length}) but was ${index}`);
    }
  }

  private checkNotDone(): void {
    if (this.done) {
      throw new DiskStoreError(`Edit of "${this.key}" is already complete`, this.directory);
    }
  }
}

/**
 * Point-in-time copy of an entry's value slots
 */
export class DiskSnapshot {
  readonly key: string;
  private readonly values: Buffer[];

  constructor(key: string, values: Buffer[]) {
    this.key = key;
    this.values = values;
  }

  getBytes(index: number): Buffer {
    const value = this.values[index];
    if (value === undefined) {
      throw new RangeError(`No value slot at index ${index}`);
    }
    return value;
  }

  getString(index: number): string {
    return this.getBytes(index).toString('utf8');
  }

  getLength(index: number): number {
    return this.getBytes(index).length;
  }
}
