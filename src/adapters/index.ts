/**
 * Storage Adapters - Barrel Export
 */

export { MemoryAdapter, type MemoryMigration, type MemoryStore } from './memory.js';
export {
  SqliteAdapter,
  DEFAULT_TABLE_NAME,
  isValidTableName,
  type SqliteMigration,
  type SqliteAdapterOptions,
  type AppliedMigrationRecord,
} from './sqlite.js';
