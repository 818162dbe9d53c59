/**
 * Storage Adapter Contract
 *
 * An adapter persists which migrations are applied and runs the
 * migration-specific apply/revert actions against its backing store.
 * Initialising the adapter's own bookkeeping (e.g. creating a metadata table)
 * is the caller's job; the migrator never does it.
 */

import type { MaybePromise, Migration, MigrationId } from '../types/index.js';

/**
 * Storage adapter driven by a Migrator
 *
 * Failures are reported by throwing (or rejecting). The migrator attributes
 * them to the migration being processed and stops.
 */
export interface Adapter<M extends Migration = Migration> {
  /**
   * IDs of migrations currently recorded as applied.
   * Called at the start of every migrator operation; must be safe to call
   * repeatedly.
   */
  appliedMigrations(): MaybePromise<ReadonlySet<MigrationId>>;

  /**
   * Run the migration's forward action and record it as applied,
   * atomically: either both happen or neither persists.
   */
  applyMigration(migration: M): MaybePromise<void>;

  /**
   * Run the migration's backward action and remove its applied record,
   * atomically.
   */
  revertMigration(migration: M): MaybePromise<void>;
}
