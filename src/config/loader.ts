/**
 * Configuration File Loader
 *
 * Loads configuration from multiple sources with precedence:
 * 1. Environment variables (highest priority)
 * 2. Explicit config file (--config)
 * 3. Project-local config (.migraph/config.yml)
 * 4. Global user config (~/.migraph/config.yml)
 * 5. Built-in defaults (lowest priority)
 */

import fs from 'fs';
import path from 'path';
import os from 'os';
import yaml from 'js-yaml';
import { ZodError } from 'zod';
import { AppConfigSchema, type AppConfig } from './schema.js';
import { DEFAULT_CONFIG } from './defaults.js';

/**
 * Untyped configuration fragment, validated after merging
 */
export type ConfigObject = Record<string, unknown>;

/**
 * Configuration source for tracking where settings came from
 */
export type ConfigSource = 'default' | 'global' | 'project' | 'file' | 'env';

/**
 * Options for loadConfig()
 */
export interface LoadConfigOptions {
  /** Explicit configuration file (must exist) */
  configPath?: string;
  /** Directory searched for .migraph/config.yml (default: process.cwd()) */
  cwd?: string;
  /** Directory searched for the global config (default: os.homedir()) */
  homeDir?: string;
}

/**
 * Cached configuration to avoid repeated file system access
 */
let cachedConfig: AppConfig | null = null;

/**
 * Load and merge configuration from all sources.
 *
 * @returns Complete configuration with all required fields
 * @throws {Error} If a file cannot be parsed or validation fails
 */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const cwd = options.cwd ?? process.cwd();
  const homeDir = options.homeDir ?? os.homedir();

  let config: ConfigObject = deepClone(DEFAULT_CONFIG);

  const globalConfig = loadConfigFile(path.join(homeDir, '.migraph', 'config.yml'));
  if (globalConfig) {
    config = deepMerge(config, globalConfig);
  }

  const projectConfig = loadConfigFile(path.join(cwd, '.migraph', 'config.yml'));
  if (projectConfig) {
    config = deepMerge(config, projectConfig);
  }

  if (options.configPath) {
    const resolved = path.resolve(cwd, options.configPath);
    const fileConfig = loadConfigFile(resolved);
    if (!fileConfig) {
      throw new Error(`Configuration file not found or empty: ${resolved}`);
    }
    config = deepMerge(config, fileConfig);
  }

  const envConfig = loadEnvironmentConfig();
  if (envConfig) {
    config = deepMerge(config, envConfig);
  }

  try {
    const validated = AppConfigSchema.parse(config);
    cachedConfig = validated;
    return validated;
  } catch (error) {
    if (error instanceof ZodError) {
      throw new Error(formatValidationErrors(error));
    }
    throw error;
  }
}

/**
 * Get cached configuration or load if not cached.
 */
export function getConfig(): AppConfig {
  if (cachedConfig) {
    return cachedConfig;
  }
  return loadConfig();
}

/**
 * Clear cached configuration. Useful for testing.
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}

/**
 * Load configuration from a YAML file.
 *
 * @param filePath - Path to YAML configuration file
 * @returns Parsed configuration object or null if file doesn't exist or is empty
 * @throws {Error} If YAML parsing fails or the document is not a mapping
 */
export function loadConfigFile(filePath: string): ConfigObject | null {
  if (!fs.existsSync(filePath)) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    if (error instanceof yaml.YAMLException) {
      throw new Error(
        `YAML parsing error in ${filePath}:\n` +
          `  Line ${error.mark.line + 1}: ${error.reason}`
      );
    }
    throw error;
  }

  // Empty file
  if (parsed === null || parsed === undefined) {
    return null;
  }

  if (!isPlainObject(parsed)) {
    throw new Error(`Invalid configuration file: ${filePath} - expected object`);
  }

  return parsed;
}

/**
 * Load configuration from environment variables.
 *
 * - MIGRAPH_DATABASE_PATH
 * - MIGRAPH_TABLE_NAME
 * - MIGRAPH_MIGRATIONS_MODULE
 * - MIGRAPH_LOG_LEVEL
 *
 * @returns Partial configuration from environment variables
 */
export function loadEnvironmentConfig(env: NodeJS.ProcessEnv = process.env): ConfigObject | null {
  const database: ConfigObject = {};
  const migrations: ConfigObject = {};
  const logging: ConfigObject = {};

  if (env.MIGRAPH_DATABASE_PATH) {
    database.path = env.MIGRAPH_DATABASE_PATH;
  }
  if (env.MIGRAPH_TABLE_NAME) {
    database.tableName = env.MIGRAPH_TABLE_NAME;
  }
  if (env.MIGRAPH_MIGRATIONS_MODULE) {
    migrations.module = env.MIGRAPH_MIGRATIONS_MODULE;
  }
  if (env.MIGRAPH_LOG_LEVEL) {
    logging.level = env.MIGRAPH_LOG_LEVEL;
  }

  const config: ConfigObject = {};
  if (Object.keys(database).length > 0) config.database = database;
  if (Object.keys(migrations).length > 0) config.migrations = migrations;
  if (Object.keys(logging).length > 0) config.logging = logging;

  return Object.keys(config).length > 0 ? config : null;
}

/**
 * Deep merge two objects, with source overriding target.
 *
 * - Nested objects are merged recursively
 * - Arrays are replaced entirely (not merged)
 * - Undefined values in source are skipped
 */
export function deepMerge(target: ConfigObject, source: ConfigObject): ConfigObject {
  const result: ConfigObject = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    if (sourceValue === undefined) {
      continue;
    }

    const targetValue = result[key];
    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else {
      result[key] = sourceValue;
    }
  }

  return result;
}

/**
 * Deep clone a configuration into a plain object.
 */
export function deepClone(config: AppConfig): ConfigObject {
  return {
    database: { ...config.database },
    migrations: { ...config.migrations },
    logging: { ...config.logging },
  };
}

/**
 * Format Zod validation errors into human-readable message.
 */
export function formatValidationErrors(error: ZodError): string {
  const errors = error.issues.map((issue) => {
    const path = issue.path.join('.');
    return `  • ${path}: ${issue.message}`;
  });

  return `Configuration validation failed:\n${errors.join('\n')}`;
}

function isPlainObject(value: unknown): value is ConfigObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
