/**
 * Command Context
 *
 * Wires configuration, the SQLite database, the adapter and a migrator with
 * every migration from the configured module registered.
 */

import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import { loadConfig } from '../config/loader.js';
import type { AppConfig } from '../config/schema.js';
import { SqliteAdapter, type SqliteMigration } from '../adapters/sqlite.js';
import { Migrator } from '../migrator/migrator.js';
import { getLogger } from './logger.js';
import { loadMigrationsModule } from './migrations-loader.js';

/**
 * Everything a command handler needs
 */
export interface CommandContext {
  config: AppConfig;
  adapter: SqliteAdapter;
  migrator: Migrator<SqliteMigration>;
  /** Close the database connection */
  close(): void;
}

export interface ContextOptions {
  /** Explicit configuration file */
  configPath?: string;
  /** Working directory for relative paths (default: process.cwd()) */
  cwd?: string;
}

/**
 * Open the configured database file, creating its directory if needed
 */
export function openDatabase(config: AppConfig, cwd: string = process.cwd()): Database.Database {
  if (config.database.path === ':memory:') {
    return new Database(':memory:');
  }

  const filename = path.resolve(cwd, config.database.path);
  fs.mkdirSync(path.dirname(filename), { recursive: true });
  return new Database(filename);
}

/**
 * Build a migrator over a database with the given migrations registered
 *
 * Initialises the adapter's bookkeeping table. Closes the database if
 * registration fails.
 */
export function buildContext(
  config: AppConfig,
  db: Database.Database,
  migrations: SqliteMigration[]
): CommandContext {
  try {
    const adapter = new SqliteAdapter(db, { tableName: config.database.tableName });
    adapter.init();

    const migrator = new Migrator<SqliteMigration>(adapter, { logger: getLogger() });
    migrator.registerMultiple(migrations);

    return {
      config,
      adapter,
      migrator,
      close: () => db.close(),
    };
  } catch (error) {
    db.close();
    throw error;
  }
}

/**
 * Create the command context from configuration on disk
 */
export async function createCommandContext(options: ContextOptions = {}): Promise<CommandContext> {
  const cwd = options.cwd ?? process.cwd();
  const config = loadConfig({ configPath: options.configPath, cwd });
  const migrations = await loadMigrationsModule(config.migrations.module, cwd);
  const db = openDatabase(config, cwd);

  return buildContext(config, db, migrations);
}
