/**
 * Migrator Error Types
 *
 * Two error families:
 * - DependencyError: migration definition errors (duplicate IDs, unknown
 *   dependencies, cycles), raised while registering, before any adapter call
 * - MigratorError: runtime errors raised by up()/down(), either from the
 *   adapter itself or attributed to one specific migration
 *
 * The original error thrown by an adapter is kept as the `cause`.
 */

import type { MigrationDirection, MigrationId } from '../types/index.js';

/**
 * Dependency error types
 */
export enum DependencyErrorType {
  DuplicateId = 'DUPLICATE_ID',
  UnknownId = 'UNKNOWN_ID',
  Cycle = 'CYCLE',
}

export type DependencyErrorDetail =
  | { type: DependencyErrorType.DuplicateId; id: MigrationId }
  | { type: DependencyErrorType.UnknownId; id: MigrationId }
  | { type: DependencyErrorType.Cycle; from: MigrationId; to: MigrationId };

/**
 * Error resulting from the definition of migration identity and dependency
 */
export class DependencyError extends Error {
  constructor(public readonly detail: DependencyErrorDetail) {
    super(formatDependencyError(detail));
    this.name = 'DependencyError';
  }

  get type(): DependencyErrorType {
    return this.detail.type;
  }

  static duplicateId(id: MigrationId): DependencyError {
    return new DependencyError({ type: DependencyErrorType.DuplicateId, id });
  }

  static unknownId(id: MigrationId): DependencyError {
    return new DependencyError({ type: DependencyErrorType.UnknownId, id });
  }

  static cycle(from: MigrationId, to: MigrationId): DependencyError {
    return new DependencyError({ type: DependencyErrorType.Cycle, from, to });
  }
}

function formatDependencyError(detail: DependencyErrorDetail): string {
  switch (detail.type) {
    case DependencyErrorType.DuplicateId:
      return `Duplicate migration ID ${detail.id}`;
    case DependencyErrorType.UnknownId:
      return `Unknown migration ID ${detail.id}`;
    case DependencyErrorType.Cycle:
      return `Cyclic dependency caused by edge from migration IDs ${detail.from} to ${detail.to}`;
  }
}

/**
 * Migrator error types
 */
export enum MigratorErrorType {
  /** Invalid target passed to up()/down() */
  Dependency = 'DEPENDENCY',
  /** Adapter failed outside of a specific migration (fetching applied state) */
  Adapter = 'ADAPTER',
  /** Adapter failed while applying or reverting one migration */
  Migration = 'MIGRATION',
}

export type MigratorErrorDetail =
  | { type: MigratorErrorType.Dependency; error: DependencyError }
  | { type: MigratorErrorType.Adapter; error: unknown }
  | {
      type: MigratorErrorType.Migration;
      id: MigrationId;
      description: string;
      direction: MigrationDirection;
      error: unknown;
    };

/**
 * Error resulting from migration application with an adapter
 */
export class MigratorError extends Error {
  constructor(public readonly detail: MigratorErrorDetail) {
    super(formatMigratorError(detail), { cause: detail.error });
    this.name = 'MigratorError';
  }

  get type(): MigratorErrorType {
    return this.detail.type;
  }

  /**
   * ID of the migration the failure is attributed to, if any
   */
  get migrationId(): MigrationId | undefined {
    return this.detail.type === MigratorErrorType.Migration ? this.detail.id : undefined;
  }

  static dependency(error: DependencyError): MigratorError {
    return new MigratorError({ type: MigratorErrorType.Dependency, error });
  }

  static adapter(error: unknown): MigratorError {
    return new MigratorError({ type: MigratorErrorType.Adapter, error });
  }

  static migration(
    id: MigrationId,
    description: string,
    direction: MigrationDirection,
    error: unknown
  ): MigratorError {
    return new MigratorError({ type: MigratorErrorType.Migration, id, description, direction, error });
  }
}

function formatMigratorError(detail: MigratorErrorDetail): string {
  const reason = errorMessage(detail.error);
  switch (detail.type) {
    case MigratorErrorType.Dependency:
      return `An error occurred due to migration dependencies: ${reason}`;
    case MigratorErrorType.Adapter:
      return `An error occurred while interacting with the adapter: ${reason}`;
    case MigratorErrorType.Migration: {
      const verb = detail.direction === 'up' ? 'applying' : 'reverting';
      return `An error occurred while ${verb} migration ${detail.id} (${detail.description}) ${detail.direction}: ${reason}`;
    }
  }
}

/**
 * Invalid migration definition (bad ID format, empty description)
 */
export class MigrationDefinitionError extends Error {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message);
    this.name = 'MigrationDefinitionError';
  }
}

export function isDependencyError(error: unknown): error is DependencyError {
  return error instanceof DependencyError;
}

export function isMigratorError(error: unknown): error is MigratorError {
  return error instanceof MigratorError;
}

/**
 * Extract a printable message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
