/**
 * Type Definitions - Barrel Export
 */

export type {
  MigrationId,
  MigrationDirection,
  Migration,
  MaybePromise,
  MigrationResult,
  MigrationStatus,
  MigratorStatus,
} from './migration.js';
