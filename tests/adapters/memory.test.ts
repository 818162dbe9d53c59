/**
 * In-Memory Adapter Tests
 */

import { describe, it, expect } from 'vitest';
import { MemoryAdapter, type MemoryMigration } from '../../src/adapters/memory.js';
import { Migrator } from '../../src/migrator/migrator.js';
import { defineMigration } from '../../src/migrator/migration.js';
import { describeAdapterSuite } from '../helpers/adapter-suite.js';
import { silentLogger, testId } from '../helpers/fixtures.js';

describeAdapterSuite<MemoryMigration>('memory', {
  create: () => new MemoryAdapter(),
  mock: (id, dependencies) => defineMigration({ id, dependencies, description: 'No-op' }),
});

describe('MemoryAdapter', () => {
  const setUser = defineMigration({
    id: testId(1),
    description: 'Seed user',
    up: (store: Map<string, unknown>) => {
      store.set('user', 'alice');
    },
    down: (store: Map<string, unknown>) => {
      store.delete('user');
    },
  });

  it('should start from the given applied IDs', () => {
    const adapter = new MemoryAdapter([testId(1), testId(2)]);
    expect(adapter.appliedMigrations()).toEqual(new Set([testId(1), testId(2)]));
  });

  it('should return a copy of the applied set', () => {
    const adapter = new MemoryAdapter([testId(1)]);
    adapter.appliedMigrations().clear();
    expect(adapter.appliedMigrations().size).toBe(1);
  });

  it('should run actions against the store', async () => {
    const adapter = new MemoryAdapter();

    await adapter.applyMigration(setUser);
    expect(adapter.store.get('user')).toBe('alice');

    await adapter.revertMigration(setUser);
    expect(adapter.store.has('user')).toBe(false);
    expect(adapter.appliedMigrations().size).toBe(0);
  });

  it('should refuse to apply a migration twice', async () => {
    const adapter = new MemoryAdapter([testId(1)]);
    await expect(adapter.applyMigration(setUser)).rejects.toThrow(
      `Migration ${testId(1)} is already applied`
    );
  });

  it('should restore the store when an action fails', async () => {
    const adapter = new MemoryAdapter();
    adapter.store.set('count', 1);
    const failing = defineMigration({
      id: testId(2),
      description: 'Half done',
      up: async (store: Map<string, unknown>) => {
        store.set('count', 2);
        store.set('partial', true);
        throw new Error('interrupted');
      },
    });

    await expect(adapter.applyMigration(failing)).rejects.toThrow('interrupted');

    expect(Array.from(adapter.store)).toEqual([['count', 1]]);
    expect(adapter.appliedMigrations().has(testId(2))).toBe(false);
  });

  it('should drive store changes through a migrator', async () => {
    const adapter = new MemoryAdapter();
    const migrator = new Migrator<MemoryMigration>(adapter, { logger: silentLogger });
    const addRole = defineMigration({
      id: testId(2),
      dependencies: [testId(1)],
      description: 'Add role',
      up: (store: Map<string, unknown>) => {
        store.set('role', `${String(store.get('user'))}:admin`);
      },
    });
    migrator.registerMultiple([addRole, setUser]);

    await migrator.up();
    expect(adapter.store.get('role')).toBe('alice:admin');

    await migrator.down();
    expect(Array.from(adapter.store.keys())).toEqual(['role']);
  });
});
