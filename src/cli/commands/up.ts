/**
 * Up Command - Apply migrations
 */

import { Command } from 'commander';
import type { CommandContext } from '../context.js';
import { log } from '../logger.js';
import { parseTargetArgument } from '../options.js';
import { EXIT_SUCCESS, describeMigration, reportError, type CommandRunner } from './shared.js';

export interface UpOptions {
  dryRun?: boolean;
}

/**
 * Execute the up command
 *
 * @returns Process exit code
 */
export async function upCommand(
  target: string | undefined,
  options: UpOptions,
  context: CommandContext
): Promise<number> {
  log.debug(`Up command invoked (target: ${target ?? 'all'})`);

  try {
    const id = parseTargetArgument(target);

    if (options.dryRun) {
      const pending = await context.migrator.plan('up', id);
      if (pending.length === 0) {
        log.info('✓ No pending migrations');
        return EXIT_SUCCESS;
      }

      log.info(`[DRY RUN] Would apply ${pending.length} migration(s):`);
      pending.forEach((migration, i) => log.info(`  ${i + 1}. ${describeMigration(migration)}`));
      return EXIT_SUCCESS;
    }

    const results = await context.migrator.up(id);
    if (results.length === 0) {
      log.info('✓ No pending migrations');
    } else {
      log.info(`✓ Applied ${results.length} migration(s)`);
    }
    return EXIT_SUCCESS;
  } catch (error) {
    return reportError(error);
  }
}

/**
 * Register the up command with Commander
 */
export function registerUpCommand(program: Command, run: CommandRunner): void {
  program
    .command('up [target]')
    .description('Apply a migration and everything it depends on (all migrations if no target)')
    .option('--dry-run', 'Show which migrations would be applied without applying them')
    .action((target: string | undefined, options: UpOptions) =>
      run(context => upCommand(target, options, context))
    )
    .addHelpText(
      'after',
      `
Examples:
  $ migraph up                                        # Apply every migration
  $ migraph up 7d2b8e0a-3c4f-4a6b-9e1d-2f3a4b5c6d7e   # Apply one migration and its dependencies
  $ migraph up --dry-run                              # Preview
`,
    );
}
