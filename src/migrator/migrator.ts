/**
 * Migrator
 *
 * Orchestrates application and reversion of migrations whose order is
 * constrained by a dependency graph rather than a linear sequence:
 * - Registration builds and validates the graph (duplicates, unknown
 *   dependencies, cycles)
 * - up()/down() compute the set of affected migrations by graph reachability
 *   and walk the global topological order, driving the adapter once per
 *   migration that needs to change state
 * - The first adapter failure stops the walk and is attributed to the
 *   migration being processed
 *
 * Applied state is re-read from the adapter at the start of every operation
 * and assumed stable for its duration. A Migrator instance must be the only
 * writer to its backing store while an operation runs.
 */

import type { Logger } from 'winston';
import { CycleError, DependencyGraph, type NodeIndex } from '../graph/dependency-graph.js';
import type {
  Migration,
  MigrationDirection,
  MigrationId,
  MigrationResult,
  MigratorStatus,
} from '../types/index.js';
import type { Adapter } from './adapter.js';
import { DependencyError, MigratorError, errorMessage } from './errors.js';
import { canonicalMigrationId } from './migration.js';
import { getLogger } from '../cli/logger.js';

/**
 * Migrator options
 */
export interface MigratorOptions {
  /** Logger for progress output (defaults to the global logger) */
  logger?: Logger;
}

/**
 * Migrator
 * Owns the dependency graph and drives a storage adapter
 */
export class Migrator<M extends Migration = Migration> {
  private readonly graph = new DependencyGraph<M>();
  // Keyed by canonical ID, so lookups ignore case and surrounding whitespace
  private readonly idMap = new Map<MigrationId, NodeIndex>();
  private readonly adapter: Adapter<M>;
  private readonly logger: Logger;

  constructor(adapter: Adapter<M>, options: MigratorOptions = {}) {
    this.adapter = adapter;
    this.logger = options.logger ?? getLogger();
  }

  /**
   * Register a migration into the dependency graph
   *
   * All of its dependencies must already be registered. A failed call leaves
   * the graph unchanged.
   *
   * @throws {DependencyError} On a duplicate ID, an unknown dependency or a cycle
   */
  register(migration: M): void {
    this.registerMultiple([migration]);
  }

  /**
   * Register several migrations at once, in any order
   *
   * All nodes are inserted before any dependency edge is resolved, so
   * migrations may depend on others later in the same batch. The batch is
   * all-or-nothing.
   *
   * @throws {DependencyError} On a duplicate ID (against the graph or within the batch),
   *   an unknown dependency or a cycle
   */
  registerMultiple(migrations: Iterable<M>): void {
    const batch = Array.from(migrations);
    const baseline = this.graph.nodeCount;
    const indices: NodeIndex[] = [];

    try {
      for (const migration of batch) {
        const key = canonicalMigrationId(migration.id);
        if (this.idMap.has(key)) {
          throw DependencyError.duplicateId(migration.id);
        }
        const index = this.graph.addNode(migration);
        this.idMap.set(key, index);
        indices.push(index);
      }

      batch.forEach((migration, position) => {
        for (const dependencyId of migration.dependencies) {
          const dependencyIndex = this.idMap.get(canonicalMigrationId(dependencyId));
          if (dependencyIndex === undefined) {
            throw DependencyError.unknownId(dependencyId);
          }

          try {
            this.graph.addEdge(dependencyIndex, indices[position]);
          } catch (error) {
            if (error instanceof CycleError) {
              throw DependencyError.cycle(dependencyId, migration.id);
            }
            throw error;
          }
        }
      });
    } catch (error) {
      // Roll back every node (and edge) added by this call
      for (const index of indices) {
        this.idMap.delete(canonicalMigrationId(this.graph.weight(index).id));
      }
      this.graph.truncate(baseline);
      throw error;
    }

    for (const migration of batch) {
      this.logger.debug(`Registered migration ${migration.id} (${migration.description})`);
    }
  }

  /**
   * Apply migrations as necessary so that the target migration is applied
   *
   * With a target, applies the target and everything it transitively depends
   * on. Without one, applies every registered migration. Already-applied
   * migrations are skipped.
   *
   * @returns Results for the migrations actually applied, in execution order
   * @throws {MigratorError} On an unknown target or an adapter failure
   */
  async up(target?: MigrationId): Promise<MigrationResult[]> {
    const pending = await this.plan('up', target);
    return this.execute(pending, 'up');
  }

  /**
   * Revert migrations as necessary so that nothing depending on the target
   * migration is applied
   *
   * The target itself stays applied if it was. Without a target, reverts
   * every applied migration. Migrations that are not applied are skipped.
   *
   * @returns Results for the migrations actually reverted, in execution order
   * @throws {MigratorError} On an unknown target or an adapter failure
   */
  async down(target?: MigrationId): Promise<MigrationResult[]> {
    const pending = await this.plan('down', target);
    return this.execute(pending, 'down');
  }

  /**
   * Compute the migrations up()/down() would act on, without running them
   *
   * @returns Migrations in the order they would be applied or reverted
   * @throws {MigratorError} On an unknown target or an adapter failure
   */
  async plan(direction: MigrationDirection, target?: MigrationId): Promise<M[]> {
    const targetSet = this.targetSet(direction, target);
    const applied = await this.fetchApplied();

    const order = this.graph.toposort();
    if (direction === 'down') {
      order.reverse();
    }

    const pending: M[] = [];
    for (const index of order) {
      const migration = this.graph.weight(index);
      const isApplied = applied.has(migration.id);
      const needsChange = direction === 'up' ? !isApplied : isApplied;

      if (targetSet.has(index) && needsChange) {
        pending.push(migration);
      }
    }

    return pending;
  }

  /**
   * Registered migrations in execution order with their applied state
   *
   * @throws {MigratorError} If the adapter cannot report applied migrations
   */
  async status(): Promise<MigratorStatus> {
    const applied = await this.fetchApplied();

    const migrations = this.graph.toposort().map(index => {
      const migration = this.graph.weight(index);
      return {
        id: migration.id,
        description: migration.description,
        dependencies: this.graph.dependencies(index).map(dep => this.graph.weight(dep).id),
        applied: applied.has(migration.id),
      };
    });

    const unknownApplied = Array.from(applied)
      .filter(id => !this.idMap.has(canonicalMigrationId(id)))
      .sort();

    return { migrations, unknownApplied };
  }

  /**
   * Registered migrations in execution order
   */
  migrations(): M[] {
    return this.graph.toposort().map(index => this.graph.weight(index));
  }

  has(id: MigrationId): boolean {
    return this.idMap.has(canonicalMigrationId(id));
  }

  get(id: MigrationId): M | undefined {
    const index = this.idMap.get(canonicalMigrationId(id));
    return index === undefined ? undefined : this.graph.weight(index);
  }

  /**
   * IDs of a migration and everything it transitively depends on, in execution order
   *
   * @throws {DependencyError} If the ID is not registered
   */
  ancestors(id: MigrationId): MigrationId[] {
    return this.ordered(this.graph.ancestors(this.indexOf(id)));
  }

  /**
   * IDs of a migration and everything transitively depending on it, in execution order
   *
   * @throws {DependencyError} If the ID is not registered
   */
  descendants(id: MigrationId): MigrationId[] {
    return this.ordered(this.graph.descendants(this.indexOf(id)));
  }

  /**
   * IDs of migrations without dependencies
   */
  sources(): MigrationId[] {
    return this.graph.sources().map(index => this.graph.weight(index).id);
  }

  /**
   * IDs of migrations nothing depends on
   */
  sinks(): MigrationId[] {
    return this.graph.sinks().map(index => this.graph.weight(index).id);
  }

  /**
   * Collect the nodes affected by an operation
   *
   * 'up': the target's ancestors, or the ancestors of every sink.
   * 'down': the target's descendants minus the target itself, or the
   * descendants of every source.
   */
  private targetSet(direction: MigrationDirection, target?: MigrationId): Set<NodeIndex> {
    if (target !== undefined) {
      const index = this.idMap.get(canonicalMigrationId(target));
      if (index === undefined) {
        throw MigratorError.dependency(DependencyError.unknownId(target));
      }

      if (direction === 'up') {
        return this.graph.ancestors(index);
      }

      const dependents = this.graph.descendants(index);
      dependents.delete(index);
      return dependents;
    }

    const result = new Set<NodeIndex>();
    const starts = direction === 'up' ? this.graph.sinks() : this.graph.sources();
    for (const start of starts) {
      const reached = direction === 'up' ? this.graph.ancestors(start) : this.graph.descendants(start);
      for (const index of reached) {
        result.add(index);
      }
    }
    return result;
  }

  private async fetchApplied(): Promise<ReadonlySet<MigrationId>> {
    try {
      return await this.adapter.appliedMigrations();
    } catch (error) {
      this.logger.error(`Failed to read applied migrations: ${errorMessage(error)}`);
      throw MigratorError.adapter(error);
    }
  }

  /**
   * Drive the adapter over the planned migrations, stopping on first failure
   */
  private async execute(pending: M[], direction: MigrationDirection): Promise<MigrationResult[]> {
    const verb = direction === 'up' ? 'Applying' : 'Reverting';
    const results: MigrationResult[] = [];

    if (pending.length === 0) {
      this.logger.debug(`No migrations to ${direction === 'up' ? 'apply' : 'revert'}`);
      return results;
    }

    for (let i = 0; i < pending.length; i++) {
      const migration = pending[i];
      const startTime = Date.now();

      this.logger.debug(`[${i + 1}/${pending.length}] ${verb} ${migration.id} (${migration.description})`);

      try {
        if (direction === 'up') {
          await this.adapter.applyMigration(migration);
        } else {
          await this.adapter.revertMigration(migration);
        }
      } catch (error) {
        this.logger.error(
          `✗ Migration ${migration.id} (${migration.description}) failed ${direction}: ${errorMessage(error)}`
        );
        throw MigratorError.migration(migration.id, migration.description, direction, error);
      }

      const durationMs = Date.now() - startTime;
      this.logger.info(
        `✓ ${direction === 'up' ? 'Applied' : 'Reverted'} ${migration.id} (${migration.description}) in ${durationMs}ms`
      );

      results.push({
        id: migration.id,
        description: migration.description,
        direction,
        durationMs,
      });
    }

    return results;
  }

  private indexOf(id: MigrationId): NodeIndex {
    const index = this.idMap.get(canonicalMigrationId(id));
    if (index === undefined) {
      throw DependencyError.unknownId(id);
    }
    return index;
  }

  private ordered(indices: Set<NodeIndex>): MigrationId[] {
    return this.graph
      .toposort()
      .filter(index => indices.has(index))
      .map(index => this.graph.weight(index).id);
  }
}
