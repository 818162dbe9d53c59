/**
 * Option Parsing and Validation
 *
 * Helpers for normalizing CLI options:
 * - Migration ID arguments
 * - Config path resolution
 * - Environment variable overrides
 */

import fs from 'fs';
import path from 'path';
import { normalizeMigrationId } from '../migrator/migration.js';
import type { MigrationId } from '../types/index.js';

/**
 * Validation error with helpful message
 */
export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly field: string,
    public readonly value: unknown,
    public readonly suggestion?: string,
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Parse an optional migration ID argument
 *
 * @returns Canonical ID, or undefined when no argument was given
 * @throws ValidationError if the argument is not a UUID
 */
export function parseTargetArgument(target: string | undefined): MigrationId | undefined {
  if (target === undefined) {
    return undefined;
  }

  try {
    return normalizeMigrationId(target);
  } catch {
    throw new ValidationError(
      `Invalid migration ID: "${target}"`,
      'target',
      target,
      'Pass the UUID of a registered migration, e.g. "migraph up 7d2b8e0a-3c4f-4a6b-9e1d-2f3a4b5c6d7e"',
    );
  }
}

/**
 * Resolve and validate a file path
 *
 * @throws ValidationError if the path doesn't exist when required
 */
export function resolvePath(filePath: string, mustExist = false, cwd: string = process.cwd()): string {
  const resolved = path.resolve(cwd, filePath.trim());

  if (mustExist && !fs.existsSync(resolved)) {
    throw new ValidationError(
      `Path does not exist: "${filePath}"`,
      'path',
      filePath,
      'Provide a valid file path',
    );
  }

  return resolved;
}

/**
 * Get the explicit configuration file path, if any
 *
 * Checks the --config option, then MIGRAPH_CONFIG_PATH.
 */
export function getConfigPath(configOption?: string): string | undefined {
  const configPath = configOption || process.env.MIGRAPH_CONFIG_PATH;
  return configPath ? resolvePath(configPath, true) : undefined;
}

/**
 * Check if verbose mode is enabled
 *
 * Checks both --verbose flag and MIGRAPH_VERBOSE environment variable
 */
export function isVerboseEnabled(verboseFlag?: boolean): boolean {
  if (verboseFlag !== undefined) {
    return verboseFlag;
  }

  const envVerbose = process.env.MIGRAPH_VERBOSE;
  return envVerbose === 'true' || envVerbose === '1';
}
