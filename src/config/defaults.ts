/**
 * Default Configuration Values
 */

import type { AppConfig } from './schema.js';
import { DEFAULT_TABLE_NAME } from '../adapters/sqlite.js';

export const DEFAULT_CONFIG: AppConfig = {
  database: {
    path: '.migraph/state.db',
    tableName: DEFAULT_TABLE_NAME,
  },
  migrations: {
    module: './migrations/index.js',
  },
  logging: {
    level: 'info',
  },
};
