#!/usr/bin/env node

/**
 * migraph CLI Entry Point
 */

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import chalk from 'chalk';
import { z } from 'zod';
import { log } from './logger.js';
import { createProgram } from './program.js';

// Get package.json for version info (dist/cli/index.js -> package.json)
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJsonPath = join(__dirname, '../../package.json');
const packageJson = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(packageJsonPath, 'utf8')));

/**
 * Global error handler for unhandled errors
 */
function setupErrorHandlers(): void {
  process.on('unhandledRejection', (reason: unknown) => {
    console.error(chalk.red('Unhandled promise rejection:'));
    console.error(reason);
    process.exit(1);
  });

  process.on('uncaughtException', (error: Error) => {
    console.error(chalk.red('Uncaught exception:'));
    console.error(error);
    process.exit(1);
  });
}

/**
 * Main CLI execution
 */
async function main(): Promise<void> {
  try {
    setupErrorHandlers();

    const program = createProgram(packageJson.version);

    program.addHelpText(
      'after',
      `
Environment Variables:
  MIGRAPH_CONFIG_PATH        Config file path
  MIGRAPH_DATABASE_PATH      SQLite database file
  MIGRAPH_TABLE_NAME         Migration bookkeeping table
  MIGRAPH_MIGRATIONS_MODULE  Module exporting the migrations
  MIGRAPH_LOG_LEVEL          Log level (error, warn, info, debug)
  MIGRAPH_VERBOSE            Enable verbose mode (true/false)
`,
    );

    await program.parseAsync(process.argv);
  } catch (error) {
    if (error instanceof Error) {
      console.error(chalk.red('Error:'), error.message);
      if (error.stack) {
        log.debug(error.stack);
      }
    } else {
      console.error(chalk.red('Unknown error:'), error);
    }
    process.exit(1);
  }
}

void main();
