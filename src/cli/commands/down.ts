/**
 * Down Command - Revert migrations
 */

import { Command } from 'commander';
import type { CommandContext } from '../context.js';
import { log } from '../logger.js';
import { parseTargetArgument } from '../options.js';
import { EXIT_SUCCESS, EXIT_USAGE, describeMigration, reportError, type CommandRunner } from './shared.js';

export interface DownOptions {
  dryRun?: boolean;
  /** Required to revert everything when no target is given */
  all?: boolean;
}

/**
 * Execute the down command
 *
 * @returns Process exit code
 */
export async function downCommand(
  target: string | undefined,
  options: DownOptions,
  context: CommandContext
): Promise<number> {
  log.debug(`Down command invoked (target: ${target ?? 'all'})`);

  if (target === undefined && !options.all && !options.dryRun) {
    log.error('Refusing to revert every migration without --all');
    return EXIT_USAGE;
  }

  try {
    const id = parseTargetArgument(target);

    if (options.dryRun) {
      const pending = await context.migrator.plan('down', id);
      if (pending.length === 0) {
        log.info('✓ No migrations to revert');
        return EXIT_SUCCESS;
      }

      log.info(`[DRY RUN] Would revert ${pending.length} migration(s):`);
      pending.forEach((migration, i) => log.info(`  ${i + 1}. ${describeMigration(migration)}`));
      return EXIT_SUCCESS;
    }

    const results = await context.migrator.down(id);
    if (results.length === 0) {
      log.info('✓ No migrations to revert');
    } else {
      log.info(`✓ Reverted ${results.length} migration(s)`);
    }
    return EXIT_SUCCESS;
  } catch (error) {
    return reportError(error);
  }
}

/**
 * Register the down command with Commander
 */
export function registerDownCommand(program: Command, run: CommandRunner): void {
  program
    .command('down [target]')
    .description('Revert everything depending on a migration (the target itself stays applied)')
    .option('--dry-run', 'Show which migrations would be reverted without reverting them')
    .option('--all', 'Revert every applied migration when no target is given')
    .action((target: string | undefined, options: DownOptions) =>
      run(context => downCommand(target, options, context))
    )
    .addHelpText(
      'after',
      `
Examples:
  $ migraph down 7d2b8e0a-3c4f-4a6b-9e1d-2f3a4b5c6d7e   # Revert its dependents, keep it applied
  $ migraph down --all                                  # Revert every migration
`,
    );
}
