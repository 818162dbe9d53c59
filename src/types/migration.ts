/**
 * Migration Type Definitions
 *
 * Identity and dependency metadata shared by the dependency graph, the
 * migrator and every storage adapter. Adapter-specific migration shapes
 * extend {@link Migration} with their own apply/revert actions.
 */

/**
 * Migration identifier
 * Canonical lowercase UUID text; the join key between the in-memory graph
 * and the applied-state records kept by an adapter.
 */
export type MigrationId = string;

/**
 * Direction in which a migration is applied ('up') or reverted ('down')
 */
export type MigrationDirection = 'up' | 'down';

/**
 * Migration descriptor
 * Immutable once registered with a migrator.
 */
export interface Migration {
  /** Unique identifier for this migration */
  readonly id: MigrationId;
  /** IDs of all direct dependencies (must be applied first) */
  readonly dependencies: ReadonlySet<MigrationId>;
  /** Human-readable description, used in diagnostics only */
  readonly description: string;
}

/**
 * Value that may be returned directly or through a promise
 */
export type MaybePromise<T> = T | Promise<T>;

/**
 * Result of a single applied or reverted migration
 */
export interface MigrationResult {
  /** Migration ID */
  id: MigrationId;
  /** Migration description */
  description: string;
  /** Direction the migration was driven in */
  direction: MigrationDirection;
  /** Execution duration in milliseconds */
  durationMs: number;
}

/**
 * Registered migration with its current applied state
 */
export interface MigrationStatus {
  id: MigrationId;
  description: string;
  dependencies: MigrationId[];
  applied: boolean;
}

/**
 * Snapshot of registered migrations against the adapter's applied state
 */
export interface MigratorStatus {
  /** Registered migrations in execution order */
  migrations: MigrationStatus[];
  /** IDs recorded as applied by the adapter that are not registered */
  unknownApplied: MigrationId[];
}
