/**
 * Status Command - Show registered migrations and their applied state
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { CommandContext } from '../context.js';
import { log } from '../logger.js';
import { EXIT_SUCCESS, reportError, type CommandRunner } from './shared.js';

export interface StatusOptions {
  json?: boolean;
}

/**
 * Execute the status command
 *
 * @returns Process exit code
 */
export async function statusCommand(options: StatusOptions, context: CommandContext): Promise<number> {
  log.debug('Status command invoked');

  try {
    const status = await context.migrator.status();
    const appliedAt = new Map(
      context.adapter.appliedRecords().map(record => [record.id, record.appliedAt])
    );

    const migrations = status.migrations.map(migration => ({
      ...migration,
      appliedAt: appliedAt.get(migration.id) ?? null,
    }));

    if (options.json) {
      // Machine-readable JSON output
      console.log(JSON.stringify({ migrations, unknownApplied: status.unknownApplied }, null, 2));
      return EXIT_SUCCESS;
    }

    const appliedCount = migrations.filter(migration => migration.applied).length;

    console.log('\n' + chalk.bold('Migration Status'));
    console.log(chalk.gray('─'.repeat(50)));
    for (const migration of migrations) {
      const marker = migration.applied ? chalk.green('●') : chalk.gray('○');
      const when = migration.appliedAt ? chalk.gray(` applied ${migration.appliedAt}`) : chalk.yellow(' pending');
      console.log(`${marker} ${migration.id} ${migration.description}${when}`);
    }
    console.log(chalk.gray('─'.repeat(50)));
    console.log(`${appliedCount}/${migrations.length} applied\n`);

    for (const id of status.unknownApplied) {
      log.warn(`Applied migration ${id} is not registered`);
    }

    return EXIT_SUCCESS;
  } catch (error) {
    return reportError(error);
  }
}

/**
 * Register the status command with Commander
 */
export function registerStatusCommand(program: Command, run: CommandRunner): void {
  program
    .command('status')
    .description('Show registered migrations in execution order and whether they are applied')
    .option('--json', 'Output in JSON format')
    .action((options: StatusOptions) => run(context => statusCommand(options, context)))
    .addHelpText(
      'after',
      `
Examples:
  $ migraph status        # Human-readable status
  $ migraph status --json # Machine-readable JSON output
`,
    );
}
