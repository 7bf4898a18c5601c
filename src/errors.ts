/**
 * @fileoverview Error types raised by the reconciliation engine.
 *
 * Only {@link StoreError} fails a whole reconciliation. {@link UnknownTagError}
 * is caught per key by the reconciler and reported in the result.
 */

import type { RecordKey, Role } from './types';

/** A record presents a tag outside its entity's vocabulary. */
export class UnknownTagError extends Error {
  name = 'UnknownTagError' as const;

  constructor(
    public readonly entityType: string,
    public readonly tag: string,
    public readonly key?: RecordKey
  ) {
    super(
      key === undefined
        ? `Unknown ${entityType} tag "${tag}"`
        : `Unknown ${entityType} tag "${tag}" on key ${String(key)}`
    );
  }
}

export type StoreOperation = 'load' | 'save' | 'rollback';

/** A replica could not be loaded or saved. */
export class StoreError extends Error {
  name = 'StoreError' as const;

  constructor(
    public readonly operation: StoreOperation,
    public readonly role: Role,
    public readonly ownerId: string,
    public readonly periodKey: string,
    public readonly cause?: unknown
  ) {
    super(
      `Failed to ${operation} ${role} replica for ${ownerId} (${periodKey})` +
        (cause instanceof Error ? `: ${cause.message}` : '')
    );
  }
}

export class EngineNotInitializedError extends Error {
  name = 'EngineNotInitializedError' as const;

  constructor() {
    super('Reconciliation engine not initialized. Call initEngine() first.');
  }
}

export class UnknownEntityError extends Error {
  name = 'UnknownEntityError' as const;

  constructor(public readonly entityType: string) {
    super(`Entity type ${entityType} not found in engine config`);
  }
}
