/**
 * Disk LRU Store
 *
 * Persistent key -> value-slots store bounded by total value bytes.
 * Backed by an SQLite database in WAL mode, so commits are atomic and an
 * interrupted write leaves the previous state intact on the next open.
 *
 * @module disk/disk-lru-store
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

import Database from 'better-sqlite3';
import type { Database as DatabaseType, Statement } from 'better-sqlite3';

import { DiskStoreError, toError } from '../errors.js';

import { DiskEditor, DiskSnapshot } from './editor.js';
import { DATABASE_FILE, SCHEMA, STORE_FORMAT, STORE_MAGIC } from './schema.js';

/**
 * What to do when the directory holds a store written with another
 * app version or value count
 */
export type VersionMismatchPolicy = 'fail' | 'reset';

export interface DiskLruStoreOptions {
  /** Directory owned by the store */
  directory: string;
  /** Stored in the header; a different version on disk is a mismatch */
  appVersion: number;
  /** Value slots per entry (default: 1) */
  valueCount?: number;
  /** Maximum bytes of stored values */
  maxSize: number;
  /** Default: 'fail' */
  onVersionMismatch?: VersionMismatchPolicy;
}

export interface DiskEntryInfo {
  key: string;
  /** Bytes across all value slots */
  size: number;
}

interface EntryRow {
  size: number;
}

interface ValueRow {
  slot: number;
  data: Buffer;
}

interface KeySizeRow {
  key: string;
  size: number;
}

interface MetaRow {
  name: string;
  value: string;
}

interface Statements {
  selectEntry: Statement<[string], EntryRow>;
  selectValues: Statement<[string], ValueRow>;
  touch: Statement<[number, string]>;
  upsertValue: Statement<[string, number, Buffer]>;
  sumValues: Statement<[string], { size: number }>;
  upsertEntry: Statement<[string, number, number]>;
  deleteEntry: Statement<[string]>;
  deleteValues: Statement<[string]>;
  listByRecency: Statement<[], KeySizeRow>;
}

/**
 * Disk-resident LRU store
 */
export class DiskLruStore {
  private readonly db: DatabaseType;
  private readonly statements: Statements;
  private readonly _directory: string;
  private readonly _maxSize: number;
  private readonly valueCount: number;
  private readonly activeEditors = new Map<string, DiskEditor>();
  private _size: number;
  private nextSequence: number;
  private closed = false;

  private constructor(db: DatabaseType, directory: string, maxSize: number, valueCount: number) {
    this.db = db;
    this._directory = directory;
    this._maxSize = maxSize;
    this.valueCount = valueCount;

    this.statements = {
      selectEntry: db.prepare<[string], EntryRow>('SELECT size FROM store_entries WHERE key = ?'),
      selectValues: db.prepare<[string], ValueRow>(
        'SELECT slot, data FROM store_values WHERE key = ? ORDER BY slot'
      ),
      touch: db.prepare<[number, string]>('UPDATE store_entries SET access_seq = ? WHERE key = ?'),
      upsertValue: db.prepare<[string, number, Buffer]>(`
        INSERT INTO store_values (key, slot, data) VALUES (?, ?, ?)
        ON CONFLICT(key, slot) DO UPDATE SET data = excluded.data
      `),
      sumValues: db.prepare<[string], { size: number }>(
        'SELECT COALESCE(SUM(LENGTH(data)), 0) AS size FROM store_values WHERE key = ?'
      ),
      upsertEntry: db.prepare<[string, number, number]>(`
        INSERT INTO store_entries (key, size, access_seq) VALUES (?, ?, ?)
        ON CONFLICT(key) DO UPDATE SET size = excluded.size, access_seq = excluded.access_seq
      `),
      deleteEntry: db.prepare<[string]>('DELETE FROM store_entries WHERE key = ?'),
      deleteValues: db.prepare<[string]>('DELETE FROM store_values WHERE key = ?'),
      listByRecency: db.prepare<[], KeySizeRow>(
        'SELECT key, size FROM store_entries ORDER BY access_seq ASC'
      ),
    };

    const totals = db
      .prepare<[], { size: number; seq: number }>(
        'SELECT COALESCE(SUM(size), 0) AS size, COALESCE(MAX(access_seq), 0) AS seq FROM store_entries'
      )
      .get();
    this._size = totals?.size ?? 0;
    this.nextSequence = (totals?.seq ?? 0) + 1;
  }

  /**
   * Open the store in directory, creating the directory and database if needed
   */
  static open(options: DiskLruStoreOptions): DiskLruStore {
    const valueCount = options.valueCount ?? 1;
    if (!Number.isInteger(options.maxSize) || options.maxSize <= 0) {
      throw new RangeError(`maxSize must be a positive integer, got ${options.maxSize}`);
    }
    if (!Number.isInteger(valueCount) || valueCount <= 0) {
      throw new RangeError(`valueCount must be a positive integer, got ${valueCount}`);
    }

    const directory = path.resolve(options.directory);
    try {
      fs.mkdirSync(directory, { recursive: true });
    } catch (err) {
      throw new DiskStoreError(`Unable to create cache directory: ${toError(err).message}`, directory, toError(err));
    }

    let db: DatabaseType | undefined;
    try {
      db = new Database(path.join(directory, DATABASE_FILE));
      db.pragma('journal_mode = WAL');
      db.exec(SCHEMA);
    } catch (err) {
      db?.close();
      throw new DiskStoreError(`Unable to open cache database: ${toError(err).message}`, directory, toError(err));
    }

    let mismatch: string | null;
    try {
      mismatch = checkHeader(db, options.appVersion, valueCount);
    } catch (err) {
      db.close();
      throw new DiskStoreError(`Unable to read store header: ${toError(err).message}`, directory, toError(err));
    }
    if (mismatch) {
      db.close();
      if (options.onVersionMismatch !== 'reset') {
        throw new DiskStoreError(mismatch, directory);
      }
      deleteContents(directory);
      return DiskLruStore.open({ ...options, onVersionMismatch: 'fail' });
    }

    return new DiskLruStore(db, directory, options.maxSize, valueCount);
  }

  /**
   * Read an entry, marking it most recently used. Returns null if absent.
   */
  get(key: string): DiskSnapshot | null {
    this.checkNotClosed();

    return this.guard(`read entry "${key}"`, () => {
      const entry = this.statements.selectEntry.get(key);
      if (!entry) return null;

      const values: Buffer[] = [];
      for (const row of this.statements.selectValues.all(key)) {
        values[row.slot] = row.data;
      }
      for (let i = 0; i < this.valueCount; i++) {
        if (values[i] === undefined) {
          throw new DiskStoreError(`Entry "${key}" is missing value slot ${i}`, this._directory);
        }
      }

      this.statements.touch.run(this.nextSequence++, key);
      return new DiskSnapshot(key, values);
    });
  }

  /**
   * Begin an edit of key. Returns null if another edit of key is in progress.
   */
  edit(key: string): DiskEditor | null {
    this.checkNotClosed();
    if (this.activeEditors.has(key)) return null;

    const editor = new DiskEditor(key, this.valueCount, this._directory, (done, values) =>
      this.completeEdit(done, values)
    );
    this.activeEditors.set(key, editor);
    return editor;
  }

  /**
   * Drop the entry for key. Entries being edited are left alone.
   */
  remove(key: string): boolean {
    this.checkNotClosed();
    if (this.activeEditors.has(key)) return false;

    return this.guard(`remove entry "${key}"`, () => this.removeEntry(key));
  }

  /**
   * Close the store and delete everything in its directory,
   * including files the store did not create
   */
  delete(): void {
    this.close();
    deleteContents(this._directory);
  }

  /** Bytes currently used by stored values */
  size(): number {
    return this._size;
  }

  maxSize(): number {
    return this._maxSize;
  }

  get directory(): string {
    return this._directory;
  }

  /**
   * Checkpoint the write-ahead log into the main database file
   */
  flush(): void {
    this.checkNotClosed();
    this.guard('flush', () => {
      this.db.pragma('wal_checkpoint(TRUNCATE)');
    });
  }

  /**
   * Close the database, aborting open edits. Stored entries stay on disk.
   */
  close(): void {
    if (this.closed) return;

    this.activeEditors.clear();
    this.closed = true;
    this.guard('close', () => {
      this.db.close();
    });
  }

  isClosed(): boolean {
    return this.closed;
  }

  /**
   * List stored entries, least recently used first
   */
  entries(): DiskEntryInfo[] {
    this.checkNotClosed();
    return this.guard('list entries', () =>
      this.statements.listByRecency.all().map((row) => ({ key: row.key, size: row.size }))
    );
  }

  // Private helpers

  private completeEdit(editor: DiskEditor, values: Array<Buffer | undefined> | null): void {
    if (this.activeEditors.get(editor.key) !== editor) {
      if (values === null) return;
      throw new DiskStoreError(
        this.closed ? 'cache is closed' : `Edit of "${editor.key}" is no longer active`,
        this._directory
      );
    }
    this.activeEditors.delete(editor.key);
    if (values === null) return;

    this.checkNotClosed();
    this.guard(`write entry "${editor.key}"`, () => {
      const key = editor.key;
      const existing = this.statements.selectEntry.get(key);
      if (!existing) {
        const missing = values.findIndex((value) => value === undefined);
        if (missing !== -1) {
          throw new DiskStoreError(`Newly created entry didn't create value for index ${missing}`, this._directory);
        }
      }

      const newSize = this.db.transaction(() => {
        values.forEach((value, slot) => {
          if (value !== undefined) {
            this.statements.upsertValue.run(key, slot, value);
          }
        });
        const size = this.statements.sumValues.get(key)?.size ?? 0;
        this.statements.upsertEntry.run(key, size, this.nextSequence++);
        return size;
      })();

      this._size += newSize - (existing?.size ?? 0);
      this.trimToSize();
    });
  }

  private trimToSize(): void {
    if (this._size <= this._maxSize) return;

    for (const row of this.statements.listByRecency.all()) {
      if (this._size <= this._maxSize) break;
      if (this.activeEditors.has(row.key)) continue;
      this.removeEntry(row.key);
    }
  }

  private removeEntry(key: string): boolean {
    const entry = this.statements.selectEntry.get(key);
    if (!entry) return false;

    this.db.transaction(() => {
      this.statements.deleteValues.run(key);
      this.statements.deleteEntry.run(key);
    })();
    this._size -= entry.size;
    return true;
  }

  private checkNotClosed(): void {
    if (this.closed) {
      throw new DiskStoreError('cache is closed', this._directory);
    }
  }

  private guard<T>(action: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (err instanceof DiskStoreError) throw err;
      const cause = toError(err);
      throw new DiskStoreError(`Unable to ${action}: ${cause.message}`, this._directory, cause);
    }
  }
}

/**
 * Validate or initialize the store header. Returns a mismatch description, or null.
 */
function checkHeader(db: DatabaseType, appVersion: number, valueCount: number): string | null {
  const rows = db.prepare<[], MetaRow>('SELECT name, value FROM store_meta').all();
  const expected: Record<string, string> = {
    magic: STORE_MAGIC,
    format: STORE_FORMAT,
    app_version: String(appVersion),
    value_count: String(valueCount),
  };

  if (rows.length === 0) {
    const insert = db.prepare<[string, string]>('INSERT INTO store_meta (name, value) VALUES (?, ?)');
    db.transaction(() => {
      for (const [name, value] of Object.entries(expected)) {
        insert.run(name, value);
      }
    })();
    return null;
  }

  const stored = new Map(rows.map((row) => [row.name, row.value]));
  for (const [name, value] of Object.entries(expected)) {
    const actual = stored.get(name);
    if (actual !== value) {
      return `Store header mismatch for ${name}: expected ${value}, found ${actual ?? 'nothing'}`;
    }
  }
  return null;
}

function deleteContents(directory: string): void {
  try {
    for (const name of fs.readdirSync(directory)) {
      fs.rmSync(path.join(directory, name), { recursive: true, force: true });
    }
  } catch (err) {
    throw new DiskStoreError(`Unable to delete cache contents: ${toError(err).message}`, directory, toError(err));
  }
}
