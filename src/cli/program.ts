/**
 * CLI Program Definition
 *
 * Commands:
 * - up [target]    - Apply migrations
 * - down [target]  - Revert migrations
 * - status         - Show applied state
 *
 * Global Options:
 * - --verbose, -v    - Enable detailed output
 * - --config <path>  - Specify config file
 * - --no-color       - Disable colored output
 */

import { Command } from 'commander';
import { initLogger, log, setLogLevel } from './logger.js';
import { getConfigPath, isVerboseEnabled } from './options.js';
import { createCommandContext, type CommandContext } from './context.js';
import { registerUpCommand } from './commands/up.js';
import { registerDownCommand } from './commands/down.js';
import { registerStatusCommand } from './commands/status.js';
import { EXIT_USAGE, type CommandRunner } from './commands/shared.js';
import { errorMessage } from '../migrator/errors.js';

export interface GlobalOptions {
  verbose?: boolean;
  config?: string;
  color: boolean;
}

/**
 * Factory for the command context; replaced in tests
 */
export type ContextFactory = (options: { configPath?: string }) => Promise<CommandContext>;

/**
 * Create and configure the CLI program
 */
export function createProgram(
  version: string,
  contextFactory: ContextFactory = options => createCommandContext(options)
): Command {
  const program = new Command();

  program
    .name('migraph')
    .description('Apply and revert database migrations ordered by a dependency graph')
    .version(version, '-V, --version', 'Output the current version');

  program
    .option('-v, --verbose', 'Enable verbose output')
    .option('--config <path>', 'Path to configuration file')
    .option('--no-color', 'Disable colored output')
    .hook('preAction', (thisCommand) => {
      const opts = thisCommand.opts<GlobalOptions>();
      initLogger({
        verbose: isVerboseEnabled(opts.verbose),
        noColor: !opts.color, // Commander converts --no-color to color: false
      });
    });

  const run: CommandRunner = async (handler) => {
    const opts = program.opts<GlobalOptions>();

    let context: CommandContext;
    try {
      const configPath = getConfigPath(opts.config);
      if (configPath) {
        log.debug(`Using config file: ${configPath}`);
      }
      context = await contextFactory({ configPath });
    } catch (error) {
      // Configuration, module loading and registration failures
      log.error(errorMessage(error));
      process.exitCode = EXIT_USAGE;
      return;
    }

    // --verbose wins over the configured level
    if (!isVerboseEnabled(opts.verbose)) {
      setLogLevel(context.config.logging.level);
    }

    try {
      process.exitCode = await handler(context);
    } finally {
      context.close();
    }
  };

  registerUpCommand(program, run);
  registerDownCommand(program, run);
  registerStatusCommand(program, run);

  return program;
}
