/**
 * SQLite Adapter
 *
 * Runs migrations against a better-sqlite3 database and tracks applied
 * migration IDs in a bookkeeping table. Each apply/revert runs the
 * migration's action and the bookkeeping change inside one transaction.
 *
 * @example
 * ```typescript
 * const db = new Database('app.db');
 * const adapter = new SqliteAdapter(db);
 * adapter.init();
 *
 * const migrator = new Migrator(adapter);
 * migrator.registerMultiple(migrations);
 * await migrator.up();
 * ```
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';
import type { Adapter } from '../migrator/adapter.js';
import type { MaybePromise, Migration, MigrationId } from '../types/index.js';

/**
 * Default name of the bookkeeping table
 */
export const DEFAULT_TABLE_NAME = '_migraph_migrations';

const TABLE_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Migration runnable by the SQLite adapter
 * Both actions default to no-ops.
 */
export interface SqliteMigration extends Migration {
  up?(db: Database.Database): MaybePromise<void>;
  down?(db: Database.Database): MaybePromise<void>;
}

/**
 * SQLite adapter options
 */
export interface SqliteAdapterOptions {
  /** Bookkeeping table name (default: _migraph_migrations) */
  tableName?: string;
}

/**
 * Applied migration record
 */
export interface AppliedMigrationRecord {
  id: MigrationId;
  appliedAt: string;
}

const AppliedRowSchema = z.object({
  id: z.string(),
  applied_at: z.string(),
});

/**
 * Check whether a string is usable as an unquoted SQLite table name
 */
export function isValidTableName(name: string): boolean {
  return TABLE_NAME_PATTERN.test(name);
}

/**
 * Adapter between the migrator and SQLite
 */
export class SqliteAdapter<M extends SqliteMigration = SqliteMigration> implements Adapter<M> {
  private readonly db: Database.Database;
  readonly tableName: string;

  constructor(db: Database.Database, options: SqliteAdapterOptions = {}) {
    const tableName = options.tableName ?? DEFAULT_TABLE_NAME;
    if (!isValidTableName(tableName)) {
      throw new Error(`Invalid migration table name: "${tableName}"`);
    }

    this.db = db;
    this.tableName = tableName;
  }

  /**
   * Create the bookkeeping table. Must be called before the adapter is used
   * with a migrator; safe to call multiple times.
   */
  init(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS ${this.tableName} (
        id TEXT PRIMARY KEY,
        applied_at TEXT NOT NULL
      )
    `);
  }

  appliedMigrations(): Set<MigrationId> {
    return new Set(this.appliedRecords().map(record => record.id));
  }

  /**
   * Applied migrations with the time they were applied, oldest first
   */
  appliedRecords(): AppliedMigrationRecord[] {
    const rows = this.db
      .prepare(`SELECT id, applied_at FROM ${this.tableName} ORDER BY applied_at ASC, rowid ASC`)
      .all();

    return z
      .array(AppliedRowSchema)
      .parse(rows)
      .map(row => ({ id: row.id, appliedAt: row.applied_at }));
  }

  async applyMigration(migration: M): Promise<void> {
    await this.transaction(async (db) => {
      await migration.up?.(db);
      db.prepare(`INSERT INTO ${this.tableName} (id, applied_at) VALUES (?, ?)`).run(
        migration.id,
        new Date().toISOString()
      );
    });
  }

  async revertMigration(migration: M): Promise<void> {
    await this.transaction(async (db) => {
      await migration.down?.(db);
      db.prepare(`DELETE FROM ${this.tableName} WHERE id = ?`).run(migration.id);
    });
  }

  /**
   * Run operations inside an IMMEDIATE transaction, rolling back on failure
   */
  private async transaction(operations: (db: Database.Database) => Promise<void>): Promise<void> {
    this.db.exec('BEGIN IMMEDIATE');

    try {
      await operations(this.db);
      this.db.exec('COMMIT');
    } catch (error) {
      if (this.db.inTransaction) {
        this.db.exec('ROLLBACK');
      }
      throw error;
    }
  }
}
