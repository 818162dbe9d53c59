/**
 * In-Memory Adapter
 *
 * Keeps applied migration IDs in a Set. Migrations may carry up/down actions
 * that operate on a shared key/value store. An action that throws leaves both
 * the store and the applied set as they were.
 */

import type { Adapter } from '../migrator/adapter.js';
import type { MaybePromise, Migration, MigrationId } from '../types/index.js';

/**
 * Key/value store handed to in-memory migration actions
 */
export type MemoryStore = Map<string, unknown>;

/**
 * Migration runnable by the in-memory adapter
 */
export interface MemoryMigration extends Migration {
  up?(store: MemoryStore): MaybePromise<void>;
  down?(store: MemoryStore): MaybePromise<void>;
}

export class MemoryAdapter<M extends MemoryMigration = MemoryMigration> implements Adapter<M> {
  private readonly applied: Set<MigrationId>;
  readonly store: MemoryStore = new Map();

  constructor(applied: Iterable<MigrationId> = []) {
    this.applied = new Set(applied);
  }

  appliedMigrations(): Set<MigrationId> {
    return new Set(this.applied);
  }

  async applyMigration(migration: M): Promise<void> {
    if (this.applied.has(migration.id)) {
      throw new Error(`Migration ${migration.id} is already applied`);
    }
    await this.atomically(() => migration.up?.(this.store));
    this.applied.add(migration.id);
  }

  async revertMigration(migration: M): Promise<void> {
    await this.atomically(() => migration.down?.(this.store));
    this.applied.delete(migration.id);
  }

  private async atomically(action: () => MaybePromise<void>): Promise<void> {
    const snapshot = new Map(this.store);
    try {
      await action();
    } catch (error) {
      this.store.clear();
      for (const [key, value] of snapshot) {
        this.store.set(key, value);
      }
      throw error;
    }
  }
}
