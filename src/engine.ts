/**
 * @fileoverview Reconciliation Engine
 *
 * Runs one producer/reviewer reconciliation for an (entity, owner, period)
 * under the owner's write lock:
 *
 *   1. Load both replicas.
 *   2. Reconcile them in memory ({@link reconcileReplicas}).
 *   3. Save every write target. If a later save fails, the replicas already
 *      saved in this call are restored to what was loaded, and the call fails
 *      with {@link StoreError}.
 *   4. Commit the ambiguity counts and warn about standing disagreements.
 *   5. Hand each counter delta to the configured hook, still under the lock.
 *
 * Nothing from steps 4 and 5 happens when step 1 or 3 fails, and the merge
 * status of the key is set to `not_merged` so the caller retries on next
 * access.
 *
 * Hooks and stores run while the owner's write lock is held. They must not
 * call back into the engine for that owner, nor for any other owner mapped to
 * the same lock slot (`OwnerLockRegistry.slotFor`): the slot lock is
 * shared and not re-entrant, so such a call waits forever.
 *
 * Every committed merge gets a fresh `mergeId`, folded into its counter delta
 * ids. Re-delivering an undelivered delta repeats its id; the same quota
 * transition happening again in a later merge does not.
 *
 * @see {@link ./reconciler.ts} for the set-level merge
 * @see {@link ./locks.ts} for the owner lock pool
 */

import {
  _clearEngineConfig,
  getEngineConfig,
  getEngineRuntime,
  getEntityRegistration
} from './config';
import type { EntityRegistration, ResolvedEngineConfig } from './config';
import { debugError, debugLog, debugWarn } from './debug';
import { StoreError } from './errors';
import type { CounterDeltaContext } from './quota';
import { reconcileReplicas } from './reconciler';
import { mergeStatusKey, mergeStatusStore } from './stores/mergeStatus';
import type {
  ConflictAmbiguity,
  CounterDelta,
  Period,
  RecordKey,
  Replica,
  ReconcileResult,
  Role,
  SyncRecord
} from './types';
import { formatPeriodKey, generateId, now } from './utils';

// =============================================================================
// Types
// =============================================================================

export interface UndeliveredDelta {
  delta: CounterDelta;
  error: string;
}

export interface ReconcileReport<K extends RecordKey = RecordKey, P = unknown>
  extends ReconcileResult<K, P> {
  entityType: string;
  ownerId: string;
  period: Period;
  periodKey: string;
  initiator: Role;
  /** Identifies this merge; part of every counter delta id it produced. */
  mergeId: string;
  /** Roles whose replica was saved, in save order. */
  written: Role[];
  ambiguities: ConflictAmbiguity[];
  /** Deltas the hook rejected. The merge itself stays committed. */
  undeliveredDeltas: UndeliveredDelta[];
}

export type FullMergeEntry =
  | { entityType: string; status: 'merged'; report: ReconcileReport }
  | { entityType: string; status: 'not_merged'; error: Error };

// =============================================================================
// Module State
// =============================================================================

export interface EngineStats {
  reconciliations: number;
  committed: number;
  failed: number;
  rollbacks: number;
  rollbackFailures: number;
  keyFailures: number;
  deltasDelivered: number;
  deltasUndelivered: number;
  ambiguityWarnings: number;
  lastReconcileAt: string | null;
}

function freshStats(): EngineStats {
  return {
    reconciliations: 0,
    committed: 0,
    failed: 0,
    rollbacks: 0,
    rollbackFailures: 0,
    keyFailures: 0,
    deltasDelivered: 0,
    deltasUndelivered: 0,
    ambiguityWarnings: 0,
    lastReconcileAt: null
  };
}

let stats = freshStats();

// =============================================================================
// Helpers
// =============================================================================

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

async function loadSide(
  registration: EntityRegistration,
  ownerId: string,
  period: Period,
  role: Role
): Promise<Replica> {
  try {
    return await registration.store.loadReplica(ownerId, period, role);
  } catch (error) {
    throw error instanceof StoreError
      ? error
      : new StoreError('load', role, ownerId, formatPeriodKey(period), error);
  }
}

/**
 * Save every write target. On failure, restore the replicas saved so far to
 * their loaded content and rethrow as {@link StoreError}.
 */
async function writeTargets(
  registration: EntityRegistration,
  ownerId: string,
  period: Period,
  result: ReconcileResult,
  loaded: Record<Role, readonly SyncRecord[]>
): Promise<Role[]> {
  const periodKey = formatPeriodKey(period);
  const written: Role[] = [];

  for (const role of result.writeTargets) {
    const records = role === 'producer' ? result.producerOut : result.reviewerOut;
    try {
      await registration.store.saveReplica(ownerId, period, role, records);
      written.push(role);
    } catch (error) {
      debugError(`[Reconcile] Save of ${role} replica failed for ${ownerId} (${periodKey}):`, error);
      for (const done of written) {
        stats.rollbacks++;
        try {
          await registration.store.saveReplica(ownerId, period, done, loaded[done]);
        } catch (rollbackError) {
          stats.rollbackFailures++;
          debugError(
            `[Reconcile] Rollback of ${done} replica failed for ${ownerId} (${periodKey}):`,
            rollbackError
          );
        }
      }
      throw error instanceof StoreError
        ? error
        : new StoreError('save', role, ownerId, periodKey, error);
    }
  }
  return written;
}

async function deliverDeltas(
  config: ResolvedEngineConfig,
  deltas: readonly CounterDelta[],
  context: CounterDeltaContext
): Promise<UndeliveredDelta[]> {
  const hook = config.onCounterDelta;
  if (!hook) return [];

  const undelivered: UndeliveredDelta[] = [];
  for (const delta of deltas) {
    try {
      await hook(delta, context);
      stats.deltasDelivered++;
    } catch (error) {
      stats.deltasUndelivered++;
      debugError(`[Reconcile] Counter hook failed for delta ${delta.id}:`, error);
      undelivered.push({ delta, error: toError(error).message });
    }
  }
  return undelivered;
}

/** One reconciliation. The caller holds the owner's write lock. */
async function reconcileLocked(
  registration: EntityRegistration,
  ownerId: string,
  period: Period,
  initiator: Role
): Promise<ReconcileReport> {
  const config = getEngineConfig();
  const runtime = getEngineRuntime();
  const entityType = registration.table.entityType;
  const periodKey = formatPeriodKey(period);
  const statusKey = mergeStatusKey(entityType, ownerId, period);
  const mergeId = generateId();

  stats.reconciliations++;
  mergeStatusStore.setMerging(statusKey);

  try {
    const producer = await loadSide(registration, ownerId, period, 'producer');
    const reviewer = await loadSide(registration, ownerId, period, 'reviewer');

    const result = reconcileReplicas(registration.table, producer.records, reviewer.records, {
      initiator,
      tombstonePolicy: config.tombstonePolicy,
      periodKey,
      mergeId
    });
    for (const failure of result.failures) {
      stats.keyFailures++;
      debugWarn(`[Reconcile] ${entityType} key ${String(failure.key)} skipped: ${failure.message}`);
    }

    const written = await writeTargets(registration, ownerId, period, result, {
      producer: producer.records,
      reviewer: reviewer.records
    });

    const ambiguities = runtime.ambiguity.record({ entityType, ownerId, periodKey }, result.decisions);
    for (const ambiguity of ambiguities) {
      stats.ambiguityWarnings++;
      debugWarn(
        `[Reconcile] ${entityType} key ${String(ambiguity.key)} for ${ownerId} (${periodKey}) ` +
          `kept the producer edit over a differing reviewer copy ${ambiguity.occurrences} times in a row`
      );
    }

    const undeliveredDeltas = await deliverDeltas(config, result.deltas, {
      entityType,
      ownerId,
      period,
      initiator
    });

    const mergedAt = now();
    stats.committed++;
    stats.lastReconcileAt = mergedAt;
    mergeStatusStore.setMerged(statusKey, mergedAt, ambiguities);
    debugLog(
      `[Reconcile] ${entityType} ${ownerId} (${periodKey}): ${result.merged.length} records, ` +
        `wrote ${written.join('+') || 'nothing'}, ${result.deltas.length} deltas`
    );

    return {
      ...result,
      entityType,
      ownerId,
      period,
      periodKey,
      initiator,
      mergeId,
      written,
      ambiguities,
      undeliveredDeltas
    };
  } catch (error) {
    stats.failed++;
    const failure = toError(error);
    mergeStatusStore.setNotMerged(statusKey, failure.message);
    debugError(`[Reconcile] ${entityType} ${ownerId} (${periodKey}) not merged:`, failure);
    throw failure;
  }
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Reconcile the producer and reviewer replicas of one entity type for an
 * owner and period, and write the outcome back.
 *
 * @param initiator - The role whose action triggered the merge. Its replica is
 *   always rewritten; the other one only when it was stale.
 * @throws {StoreError} When a replica cannot be loaded or saved. Both replicas
 *   are then left as they were.
 * @throws {UnknownEntityError} When the entity type was not registered.
 *
 * @example
 * const report = await reconcileOwner('worktime', 'jdoe', { year: 2024, month: 5 }, 'producer');
 * report.merged;  // the reconciled month
 */
export async function reconcileOwner(
  entityType: string,
  ownerId: string,
  period: Period,
  initiator: Role = 'producer'
): Promise<ReconcileReport> {
  const registration = getEntityRegistration(entityType);
  const { locks } = getEngineRuntime();
  return locks.withWriteLock(ownerId, () => reconcileLocked(registration, ownerId, period, initiator));
}

/**
 * Load one replica for display under the owner's shared lock.
 *
 * @throws {StoreError} When the replica cannot be loaded.
 */
export async function readReplica(
  entityType: string,
  ownerId: string,
  period: Period,
  role: Role
): Promise<Replica> {
  const registration = getEntityRegistration(entityType);
  const { locks } = getEngineRuntime();
  return locks.withReadLock(ownerId, () => loadSide(registration, ownerId, period, role));
}

/**
 * Reconcile every registered entity type for one owner and period, as done in
 * the background after login. Runs under a single write lock; one entity's
 * failure does not stop the others.
 */
export async function runFullMerge(
  ownerId: string,
  period: Period,
  initiator: Role = 'producer'
): Promise<FullMergeEntry[]> {
  const config = getEngineConfig();
  const { locks } = getEngineRuntime();

  return locks.withWriteLock(ownerId, async () => {
    const entries: FullMergeEntry[] = [];
    for (const [entityType, registration] of config.entities) {
      try {
        const report = await reconcileLocked(registration, ownerId, period, initiator);
        entries.push({ entityType, status: 'merged', report });
      } catch (error) {
        entries.push({ entityType, status: 'not_merged', error: toError(error) });
      }
    }
    const failed = entries.filter((entry) => entry.status === 'not_merged').length;
    debugLog(
      `[Reconcile] Full merge for ${ownerId} (${formatPeriodKey(period)}): ` +
        `${entries.length - failed} merged, ${failed} not merged`
    );
    return entries;
  });
}

/**
 * Forget the config, locks, ambiguity counts, merge statuses and counters.
 */
export function resetEngine(): void {
  _clearEngineConfig();
  mergeStatusStore.reset();
  stats = freshStats();
}

/** @internal Snapshot of the engine counters for diagnostics. */
export function _getEngineDiagnostics(): EngineStats {
  return { ...stats };
}
