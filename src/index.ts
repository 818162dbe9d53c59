/**
 * migraph - Database schema migrations ordered by a dependency graph
 *
 * @example
 * ```typescript
 * import Database from 'better-sqlite3';
 * import { Migrator, SqliteAdapter, defineMigration } from 'migraph';
 *
 * const users = defineMigration({
 *   id: '3f1c2a9e-6b7d-4e21-9c4a-1d2e3f4a5b6c',
 *   description: 'Create users table',
 *   up: (db) => db.exec('CREATE TABLE users (id INTEGER PRIMARY KEY)'),
 *   down: (db) => db.exec('DROP TABLE users'),
 * });
 *
 * const adapter = new SqliteAdapter(new Database('app.db'));
 * adapter.init();
 *
 * const migrator = new Migrator(adapter);
 * migrator.register(users);
 * await migrator.up();
 * ```
 */

// Types
export type {
  MigrationId,
  MigrationDirection,
  Migration,
  MaybePromise,
  MigrationResult,
  MigrationStatus,
  MigratorStatus,
} from './types/index.js';

// Dependency graph
export {
  DependencyGraph,
  CycleError,
  GraphInvariantError,
  type NodeIndex,
} from './graph/dependency-graph.js';

// Migrator
export * from './migrator/index.js';

// Adapters
export * from './adapters/index.js';

// Configuration
export * from './config/index.js';

// Logging
export { createLogger, type LogLevel, type LoggerOptions } from './cli/logger.js';
