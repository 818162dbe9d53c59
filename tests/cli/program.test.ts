import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';

vi.mock('../../src/cli/logger.js', () => {
  const mockLog = {
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
  };

  return {
    log: mockLog,
    initLogger: vi.fn(),
    setLogLevel: vi.fn(),
    createLogger: vi.fn(() => ({ ...mockLog, level: 'info' })),
    getLogger: vi.fn(() => ({ ...mockLog, level: 'info' })),
  };
});

import { createProgram, type ContextFactory } from '../../src/cli/program.js';
import { buildContext, openDatabase, type CommandContext } from '../../src/cli/context.js';
import { DEFAULT_CONFIG } from '../../src/config/defaults.js';
import type { AppConfig } from '../../src/config/schema.js';
import { defineMigration } from '../../src/migrator/migration.js';
import { initLogger, log, setLogLevel } from '../../src/cli/logger.js';
import { testId } from '../helpers/fixtures.js';

const config: AppConfig = {
  ...DEFAULT_CONFIG,
  database: { ...DEFAULT_CONFIG.database, path: ':memory:' },
};

describe('migraph program', () => {
  let contexts: CommandContext[];
  let consoleSpy: MockInstance<typeof console.log>;

  const factory: ContextFactory = async () => {
    const context = buildContext(config, openDatabase(config), [
      defineMigration({ id: testId(1), description: 'First' }),
      defineMigration({ id: testId(2), dependencies: [testId(1)], description: 'Second' }),
    ]);
    contexts.push(context);
    return context;
  };

  beforeEach(() => {
    vi.clearAllMocks();
    delete process.env.MIGRAPH_CONFIG_PATH;
    delete process.env.MIGRAPH_VERBOSE;
    contexts = [];
    consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    consoleSpy.mockRestore();
    process.exitCode = undefined;
  });

  it('runs a command and records its exit code', async () => {
    const program = createProgram('1.0.0', factory);

    await program.parseAsync(['up'], { from: 'user' });

    expect(process.exitCode).toBe(0);
    expect(log.info).toHaveBeenCalledWith('✓ Applied 2 migration(s)');
  });

  it('closes the context after the command', async () => {
    const program = createProgram('1.0.0', factory);

    await program.parseAsync(['status', '--json'], { from: 'user' });

    expect(contexts).toHaveLength(1);
    expect(() => contexts[0].adapter.appliedRecords()).toThrow('The database connection is not open');
  });

  it('passes global options to the logger', async () => {
    const program = createProgram('1.0.0', factory);

    await program.parseAsync(['--verbose', '--no-color', 'down', '--dry-run'], { from: 'user' });

    expect(initLogger).toHaveBeenCalledWith({ verbose: true, noColor: true });
    expect(process.exitCode).toBe(0);
  });

  it('maps command usage errors to exit code 2', async () => {
    const program = createProgram('1.0.0', factory);

    await program.parseAsync(['down'], { from: 'user' });

    expect(process.exitCode).toBe(2);
  });

  it('applies the configured log level once configuration is loaded', async () => {
    const quiet: AppConfig = { ...config, logging: { level: 'error' } };
    const program = createProgram('1.0.0', async () => {
      const context = buildContext(quiet, openDatabase(quiet), []);
      contexts.push(context);
      return context;
    });

    await program.parseAsync(['status'], { from: 'user' });

    expect(setLogLevel).toHaveBeenCalledWith('error');
    expect(process.exitCode).toBe(0);
  });

  it('keeps debug output when verbose overrides the configured level', async () => {
    const program = createProgram('1.0.0', factory);

    await program.parseAsync(['-v', 'status'], { from: 'user' });

    expect(initLogger).toHaveBeenCalledWith({ verbose: true, noColor: false });
    expect(setLogLevel).not.toHaveBeenCalled();
  });

  it('reports context failures as usage errors', async () => {
    const program = createProgram('1.0.0', async () => {
      throw new Error('Configuration validation failed:\n  • logging.level: Invalid');
    });

    await program.parseAsync(['status'], { from: 'user' });

    expect(process.exitCode).toBe(2);
    expect(log.error).toHaveBeenCalledWith('Configuration validation failed:\n  • logging.level: Invalid');
  });
});
