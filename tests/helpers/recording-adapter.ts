/**
 * Memory adapter that records every call and fails on demand
 */

import { MemoryAdapter, type MemoryMigration } from '../../src/adapters/memory.js';
import type { MigrationDirection, MigrationId } from '../../src/types/index.js';

export class RecordingAdapter extends MemoryAdapter {
  /** Calls in order, as "up:<id>" / "down:<id>" */
  readonly calls: string[] = [];
  /** Migrations that fail in the given direction */
  readonly failures = new Map<MigrationId, MigrationDirection>();
  /** Make appliedMigrations() throw */
  failFetch = false;
  fetchCount = 0;

  appliedMigrations(): Set<MigrationId> {
    this.fetchCount++;
    if (this.failFetch) {
      throw new Error('connection lost');
    }
    return super.appliedMigrations();
  }

  async applyMigration(migration: MemoryMigration): Promise<void> {
    this.calls.push(`up:${migration.id}`);
    if (this.failures.get(migration.id) === 'up') {
      throw new Error(`cannot apply ${migration.id}`);
    }
    await super.applyMigration(migration);
  }

  async revertMigration(migration: MemoryMigration): Promise<void> {
    this.calls.push(`down:${migration.id}`);
    if (this.failures.get(migration.id) === 'down') {
      throw new Error(`cannot revert ${migration.id}`);
    }
    await super.revertMigration(migration);
  }
}
