/**
 * Migration Definitions
 *
 * Builder for migration descriptors. Validates identity and dependency IDs
 * up front so that malformed definitions fail where they are declared rather
 * than at registration time.
 *
 * @example
 * ```typescript
 * const createUsers = defineMigration({
 *   id: '3f1c2a9e-6b7d-4e21-9c4a-1d2e3f4a5b6c',
 *   description: 'Create users table',
 *   up: (db) => db.exec('CREATE TABLE users (id INTEGER PRIMARY KEY)'),
 *   down: (db) => db.exec('DROP TABLE users'),
 * });
 * ```
 */

import { z } from 'zod';
import { validate as isUuid } from 'uuid';
import type { Migration, MigrationId } from '../types/index.js';
import { MigrationDefinitionError } from './errors.js';

/**
 * Canonical text form of a migration ID: trimmed and lowercased
 * Performs no validation.
 */
export function canonicalMigrationId(value: string): MigrationId {
  return value.trim().toLowerCase();
}

const MigrationIdSchema = z
  .string()
  .refine(value => isUuid(value.trim()), { message: 'Must be a UUID' })
  .transform(canonicalMigrationId);

/**
 * Zod schema for the identity part of a migration definition
 */
export const MigrationDefinitionSchema = z.object({
  id: MigrationIdSchema,
  dependencies: z.array(MigrationIdSchema).default([]),
  description: z.string().trim().min(1, 'Description must not be empty'),
});

/**
 * Migration definition accepted by defineMigration()
 * Extra properties (such as adapter-specific up/down actions) are carried
 * over to the resulting migration unchanged.
 */
export interface MigrationDefinition {
  id: string;
  dependencies?: Iterable<string>;
  description: string;
}

/**
 * Migration built from a definition, keeping the definition's extra properties
 */
export type DefinedMigration<D extends MigrationDefinition> = Readonly<
  Omit<D, keyof MigrationDefinition> & Migration
>;

/**
 * Create a migration descriptor
 *
 * @throws {MigrationDefinitionError} If the ID, a dependency ID or the description is invalid
 */
export function defineMigration<D extends MigrationDefinition>(definition: D): DefinedMigration<D> {
  const { id, dependencies, description, ...actions } = definition;

  const result = MigrationDefinitionSchema.safeParse({
    id,
    dependencies: dependencies === undefined ? undefined : Array.from(dependencies),
    description,
  });

  if (!result.success) {
    const issues = result.error.issues.map(issue => {
      const path = issue.path.join('.');
      return `  • ${path}: ${issue.message}`;
    });
    throw new MigrationDefinitionError(
      `Invalid migration definition${typeof id === 'string' ? ` ${id}` : ''}:\n${issues.join('\n')}`,
      issues
    );
  }

  return Object.freeze({
    ...actions,
    id: result.data.id,
    dependencies: new Set(result.data.dependencies),
    description: result.data.description,
  });
}

/**
 * Validate and canonicalise a migration ID given as text (e.g. on the command line)
 *
 * @throws {MigrationDefinitionError} If the value is not a UUID
 */
export function normalizeMigrationId(value: string): MigrationId {
  const result = MigrationIdSchema.safeParse(value);
  if (!result.success) {
    throw new MigrationDefinitionError(`Invalid migration ID: "${value}"`);
  }
  return result.data;
}
