/**
 * Migrator Module - Barrel Export
 */

export { Migrator, type MigratorOptions } from './migrator.js';
export type { Adapter } from './adapter.js';
export {
  defineMigration,
  normalizeMigrationId,
  canonicalMigrationId,
  MigrationDefinitionSchema,
  type MigrationDefinition,
  type DefinedMigration,
} from './migration.js';
export {
  DependencyError,
  DependencyErrorType,
  MigratorError,
  MigratorErrorType,
  MigrationDefinitionError,
  isDependencyError,
  isMigratorError,
  errorMessage,
  type DependencyErrorDetail,
  type MigratorErrorDetail,
} from './errors.js';
