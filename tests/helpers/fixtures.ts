/**
 * Shared test fixtures
 */

import { defineMigration } from '../../src/migrator/migration.js';
import type { MigrationId } from '../../src/types/index.js';
import { createLogger } from '../../src/cli/logger.js';

/**
 * Deterministic version-4 UUID for test migration `n`
 */
export function testId(n: number): MigrationId {
  return `00000000-0000-4000-8000-${n.toString(16).padStart(12, '0')}`;
}

/**
 * Migration `n` depending on the given migrations
 */
export function testMigration(n: number, dependencies: number[] = []) {
  return defineMigration({
    id: testId(n),
    dependencies: dependencies.map(testId),
    description: `Migration ${n}`,
  });
}

/**
 * Logger that discards all output
 */
export const silentLogger = createLogger({ silent: true });
