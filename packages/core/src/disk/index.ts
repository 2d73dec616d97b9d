/**
 * Disk Tier
 *
 * @module disk
 */

export {
  DiskLruStore,
  type DiskLruStoreOptions,
  type DiskEntryInfo,
  type VersionMismatchPolicy,
} from './disk-lru-store.js';

export { DiskEditor, DiskSnapshot } from './editor.js';
