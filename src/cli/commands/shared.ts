/**
 * Shared helpers for command handlers
 */

import { DependencyError, MigrationDefinitionError, MigratorError, MigratorErrorType } from '../../migrator/errors.js';
import type { Migration } from '../../types/index.js';
import type { CommandContext } from '../context.js';
import { log } from '../logger.js';
import { ValidationError } from '../options.js';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

/**
 * Runs a handler against a freshly built context and records its exit code
 */
export type CommandRunner = (handler: (context: CommandContext) => Promise<number>) => Promise<void>;

export function describeMigration(migration: Migration): string {
  return `${migration.id} (${migration.description})`;
}

/**
 * Log a known error and map it to an exit code; rethrow anything else
 */
export function reportError(error: unknown): number {
  if (error instanceof ValidationError) {
    log.error(error.message);
    if (error.suggestion) {
      log.info(error.suggestion);
    }
    return EXIT_USAGE;
  }

  if (error instanceof DependencyError || error instanceof MigrationDefinitionError) {
    log.error(error.message);
    return EXIT_USAGE;
  }

  if (error instanceof MigratorError) {
    log.error(error.message);
    return error.type === MigratorErrorType.Dependency ? EXIT_USAGE : EXIT_FAILURE;
  }

  throw error;
}
