/**
 * Disk LRU Store Tests
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

import Database from 'better-sqlite3';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { DiskLruStore, type DiskLruStoreOptions } from '../../disk/index.js';
import { DiskStoreError } from '../../errors.js';

function writeEntry(store: DiskLruStore, key: string, value: string): void {
  const editor = store.edit(key);
  if (!editor) throw new Error(`entry ${key} is locked`);
  editor.set(0, value);
  editor.commit();
}

describe('DiskLruStore', () => {
  let directory: string;
  let options: DiskLruStoreOptions;
  let store: DiskLruStore;

  beforeEach(() => {
    directory = fs.mkdtempSync(path.join(os.tmpdir(), 'tierlru-disk-'));
    options = { directory, appVersion: 100, maxSize: 1024 };
    store = DiskLruStore.open(options);
  });

  afterEach(() => {
    store.close();
    fs.rmSync(directory, { recursive: true, force: true });
  });

  describe('edit/get', () => {
    it('should write and read an entry', () => {
      writeEntry(store, 'k1', 'hello');

      const snapshot = store.get('k1');
      expect(snapshot?.getString(0)).toBe('hello');
      expect(snapshot?.getLength(0)).toBe(5);
      expect(store.size()).toBe(5);
    });

    it('should return null for missing keys', () => {
      expect(store.get('missing')).toBeNull();
    });

    it('should join sink writes in order', () => {
      const editor = store.edit('k1');
      const sink = editor?.newSink(0);
      sink?.write('ab');
      sink?.write(Buffer.from('cd'));
      editor?.commit();

      expect(store.get('k1')?.getString(0)).toBe('abcd');
    });

    it('should replace an existing value', () => {
      writeEntry(store, 'k1', 'first');
      writeEntry(store, 'k1', 'second!');

      expect(store.get('k1')?.getString(0)).toBe('second!');
      expect(store.size()).toBe(7);
    });

    it('should refuse a second editor for the same key', () => {
      const editor = store.edit('k1');
      expect(store.edit('k1')).toBeNull();

      editor?.abort();
      expect(store.edit('k1')).not.toBeNull();
    });

    it('should discard aborted edits', () => {
      const editor = store.edit('k1');
      editor?.set(0, 'never');
      editor?.abortUnlessCommitted();

      expect(store.get('k1')).toBeNull();
      expect(store.size()).toBe(0);
    });

    it('should fail to commit a new entry without its value', () => {
      const editor = store.edit('k1');

      expect(() => editor?.commit()).toThrow(DiskStoreError);
      expect(store.get('k1')).toBeNull();
      expect(store.edit('k1')).not.toBeNull();
    });
  });

  describe('multiple value slots', () => {
    it('should keep unwritten slots of an existing entry', () => {
      const multi = DiskLruStore.open({
        directory: path.join(directory, 'multi'),
        appVersion: 1,
        valueCount: 2,
        maxSize: 1024,
      });

      const first = multi.edit('k');
      first?.set(0, 'zero');
      first?.set(1, 'one');
      first?.commit();

      const second = multi.edit('k');
      second?.set(1, 'uno');
      second?.commit();

      const snapshot = multi.get('k');
      expect(snapshot?.getString(0)).toBe('zero');
      expect(snapshot?.getString(1)).toBe('uno');
      expect(multi.size()).toBe(7);
      multi.close();
    });
  });

  describe('size bound', () => {
    it('should drop least recently used entries past maxSize', () => {
      const small = DiskLruStore.open({ directory: path.join(directory, 'small'), appVersion: 1, maxSize: 10 });
      writeEntry(small, 'a', 'aaaa');
      writeEntry(small, 'b', 'bbbb');
      small.get('a');
      writeEntry(small, 'c', 'cccc');

      expect(small.entries()).toEqual([
        { key: 'a', size: 4 },
        { key: 'c', size: 4 },
      ]);
      expect(small.size()).toBe(8);
      small.close();
    });
  });

  describe('remove', () => {
    it('should remove an entry and report whether it existed', () => {
      writeEntry(store, 'k1', 'value');

      expect(store.remove('k1')).toBe(true);
      expect(store.remove('k1')).toBe(false);
      expect(store.get('k1')).toBeNull();
      expect(store.size()).toBe(0);
    });

    it('should leave entries that are being edited', () => {
      writeEntry(store, 'k1', 'value');
      const editor = store.edit('k1');

      expect(store.remove('k1')).toBe(false);
      editor?.abort();
      expect(store.get('k1')?.getString(0)).toBe('value');
    });
  });

  describe('persistence', () => {
    it('should serve committed entries after reopening', () => {
      writeEntry(store, 'k1', 'durable');
      store.close();

      store = DiskLruStore.open(options);
      expect(store.get('k1')?.getString(0)).toBe('durable');
      expect(store.size()).toBe(7);
    });

    it('should reject a store written with another app version', () => {
      writeEntry(store, 'k1', 'old');
      store.close();

      expect(() => DiskLruStore.open({ ...options, appVersion: 101 })).toThrow(DiskStoreError);

      store = DiskLruStore.open({ ...options, appVersion: 101, onVersionMismatch: 'reset' });
      expect(store.get('k1')).toBeNull();
      expect(store.size()).toBe(0);
    });

    it('should fail to open when the directory is a file', () => {
      const file = path.join(directory, 'not-a-dir');
      fs.writeFileSync(file, 'x');

      expect(() => DiskLruStore.open({ directory: file, appVersion: 1, maxSize: 10 })).toThrow(DiskStoreError);
    });

    it('should release the database handle when the file is not a database', () => {
      const target = path.join(directory, 'garbage');
      fs.mkdirSync(target);
      fs.writeFileSync(path.join(target, 'tierlru.db'), 'x'.repeat(4096));
      const close = vi.spyOn(Database.prototype, 'close');

      try {
        expect(() => DiskLruStore.open({ directory: target, appVersion: 1, maxSize: 10 })).toThrow(
          'Unable to open cache database: file is not a database'
        );
        expect(close).toHaveBeenCalledTimes(1);
      } finally {
        close.mockRestore();
      }
    });
  });

  describe('close/delete', () => {
    it('should reject operations once closed', () => {
      store.close();

      expect(store.isClosed()).toBe(true);
      expect(() => store.get('k1')).toThrow('cache is closed');
      expect(() => store.edit('k1')).toThrow(DiskStoreError);
      expect(() => store.remove('k1')).toThrow(DiskStoreError);
      expect(() => store.flush()).toThrow(DiskStoreError);
    });

    it('should fail to commit an edit that outlived close', () => {
      const editor = store.edit('k1');
      editor?.set(0, 'late');
      store.close();

      expect(() => editor?.commit()).toThrow('cache is closed');
    });

    it('should delete every file in the directory', () => {
      writeEntry(store, 'k1', 'value');
      fs.writeFileSync(path.join(directory, 'foreign.txt'), 'not ours');

      store.delete();

      expect(store.isClosed()).toBe(true);
      expect(fs.readdirSync(directory)).toEqual([]);
    });

    it('should flush without error while open', () => {
      writeEntry(store, 'k1', 'value');
      expect(() => store.flush()).not.toThrow();
    });
  });
});
