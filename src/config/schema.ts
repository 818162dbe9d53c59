/**
 * Configuration Schema Definition
 *
 * Defines TypeScript interfaces and Zod schemas for runtime validation
 * of the migraph CLI configuration.
 */

import { z } from 'zod';

/**
 * Database Configuration
 */
export interface DatabaseConfig {
  /**
   * Path to the SQLite database file.
   *
   * @default ".migraph/state.db"
   */
  path: string;

  /**
   * Name of the table recording applied migrations.
   *
   * @default "_migraph_migrations"
   */
  tableName: string;
}

/**
 * Migrations Configuration
 */
export interface MigrationsConfig {
  /**
   * Module exporting the migrations to register, resolved against the
   * working directory. Must export `migrations` (or a default export)
   * holding an array of migrations.
   *
   * @default "./migrations/index.js"
   */
  module: string;
}

/**
 * Logging Configuration
 */
export interface LoggingConfig {
  /**
   * @default "info"
   */
  level: 'error' | 'warn' | 'info' | 'debug';
}

/**
 * Complete Application Configuration
 */
export interface AppConfig {
  database: DatabaseConfig;
  migrations: MigrationsConfig;
  logging: LoggingConfig;
}

export const DatabaseConfigSchema = z.object({
  path: z.string().min(1, 'Database path must not be empty'),
  tableName: z
    .string()
    .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'Table name must be a plain SQL identifier'),
});

export const MigrationsConfigSchema = z.object({
  module: z.string().min(1, 'Migrations module path must not be empty'),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(['error', 'warn', 'info', 'debug']),
});

export const AppConfigSchema = z.object({
  database: DatabaseConfigSchema,
  migrations: MigrationsConfigSchema,
  logging: LoggingConfigSchema,
});
