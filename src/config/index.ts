/**
 * Configuration Management Module
 *
 * @example
 * ```typescript
 * import { loadConfig } from './config/index.js';
 *
 * const config = loadConfig({ configPath: 'migraph.yml' });
 * console.log(config.database.path);
 * ```
 */

export {
  type DatabaseConfig,
  type MigrationsConfig,
  type LoggingConfig,
  type AppConfig,
  DatabaseConfigSchema,
  MigrationsConfigSchema,
  LoggingConfigSchema,
  AppConfigSchema,
} from './schema.js';

export { DEFAULT_CONFIG } from './defaults.js';

export {
  loadConfig,
  getConfig,
  clearConfigCache,
  loadConfigFile,
  loadEnvironmentConfig,
  deepMerge,
  deepClone,
  formatValidationErrors,
  type ConfigObject,
  type ConfigSource,
  type LoadConfigOptions,
} from './loader.js';
