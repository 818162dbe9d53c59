/**
 * Migrations Module Loader
 *
 * Imports the user's migrations module and validates its exports. The module
 * must export `migrations` (or a default export) holding an array of
 * migration objects: `{ id, description, dependencies?, up?, down? }`.
 */

import { pathToFileURL } from 'url';
import { z } from 'zod';
import type Database from 'better-sqlite3';
import type { SqliteMigration } from '../adapters/sqlite.js';
import { defineMigration } from '../migrator/migration.js';
import { MigrationDefinitionError } from '../migrator/errors.js';
import { resolvePath } from './options.js';

const ExportedMigrationSchema = z.object({
  id: z.string(),
  description: z.string(),
  dependencies: z.union([z.array(z.string()), z.set(z.string())]).optional(),
  up: z.function().optional(),
  down: z.function().optional(),
});

const MigrationsModuleSchema = z.union([
  z.object({ migrations: z.array(z.unknown()) }),
  z.object({ default: z.array(z.unknown()) }),
]);

/**
 * Validate exported migration objects and turn them into SQLite migrations
 *
 * @throws {MigrationDefinitionError} If an entry is malformed
 */
export function toSqliteMigrations(entries: unknown[]): SqliteMigration[] {
  return entries.map((entry, position) => {
    const parsed = ExportedMigrationSchema.safeParse(entry);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(issue => `  • ${issue.path.join('.')}: ${issue.message}`);
      throw new MigrationDefinitionError(
        `Invalid migration at position ${position}:\n${issues.join('\n')}`,
        issues
      );
    }

    const { id, description, dependencies, up, down } = parsed.data;
    return defineMigration({
      id,
      description,
      dependencies,
      up: up ? async (db: Database.Database) => { await up(db); } : undefined,
      down: down ? async (db: Database.Database) => { await down(db); } : undefined,
    });
  });
}

/**
 * Import a migrations module from disk
 *
 * @param modulePath - Path to the module, relative to `cwd`
 * @throws {Error} If the module cannot be found, imported or validated
 */
export async function loadMigrationsModule(
  modulePath: string,
  cwd: string = process.cwd()
): Promise<SqliteMigration[]> {
  const resolved = resolvePath(modulePath, true, cwd);

  let exported: unknown;
  try {
    exported = await import(pathToFileURL(resolved).href);
  } catch (error) {
    throw new Error(
      `Failed to load migrations module ${resolved}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const parsed = MigrationsModuleSchema.safeParse(exported);
  if (!parsed.success) {
    throw new Error(
      `Migrations module ${resolved} must export "migrations" or a default export holding an array`
    );
  }

  const entries = 'migrations' in parsed.data ? parsed.data.migrations : parsed.data.default;
  return toSqliteMigrations(entries);
}
