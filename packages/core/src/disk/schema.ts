/**
 * Disk Store Schema
 *
 * One row per entry in store_entries (byte size and recency sequence),
 * one row per value slot in store_values. store_meta holds the header
 * checked on open.
 */

export const DATABASE_FILE = 'tierlru.db';

export const STORE_MAGIC = 'tierlru.store';

/** Layout version of the tables below */
export const STORE_FORMAT = '1';

export const SCHEMA = `
CREATE TABLE IF NOT EXISTS store_meta (
  name TEXT PRIMARY KEY,
  value TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS store_entries (
  key TEXT PRIMARY KEY,
  size INTEGER NOT NULL,
  access_seq INTEGER NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_store_entries_access_seq
ON store_entries(access_seq);

CREATE TABLE IF NOT EXISTS store_values (
  key TEXT NOT NULL,
  slot INTEGER NOT NULL,
  data BLOB NOT NULL,
  PRIMARY KEY (key, slot)
);
`;
