/**
 * @fileoverview Set Reconciler
 *
 * Runs the merge rule table over the union of keys of a producer replica and
 * a reviewer replica, and works out what each replica must hold afterwards.
 *
 * The reviewer view differs from the merged set for keys where the producer
 * side won without the reviewer having agreed (open records, resurrections
 * and unresolved producer edits): there the reviewer keeps its own snapshot,
 * so the reviewer still sees what it last decided until it re-reviews.
 *
 * Keys whose merge fails with {@link UnknownTagError} are left out of the
 * merged set and reported; each replica keeps its own record for them.
 */

import { mergeRecords, type MergeOptions, type MergeResult, type MergeTable } from './conflicts';
import { UnknownTagError } from './errors';
import type {
  CounterDelta,
  KeyFailure,
  MergeDecision,
  MergeRuleName,
  RecordKey,
  ReconcileResult,
  Role,
  SyncRecord
} from './types';
import { valuesEqual } from './utils';

export interface ReconcileOptions extends MergeOptions {
  /**
   * The role whose action triggered the merge. Its replica is always
   * rewritten. Under `producer_in_progress`, `producer_resurrects` and
   * `producer_edit_wins` the reviewer replica keeps its own copy of the key,
   * even when the reviewer initiated.
   */
  initiator: Role;
}

/** Rules under which the reviewer keeps its own copy of the key. */
const REVIEWER_KEEPS_OWN: ReadonlySet<MergeRuleName> = new Set<MergeRuleName>([
  'producer_in_progress',
  'producer_resurrects',
  'producer_edit_wins'
]);

function indexByKey<K extends RecordKey, P>(
  records: readonly SyncRecord<K, P>[]
): Map<K, SyncRecord<K, P>> {
  // duplicate keys: last occurrence wins
  const index = new Map<K, SyncRecord<K, P>>();
  for (const record of records) index.set(record.key, record);
  return index;
}

export function sameRecord<K extends RecordKey, P>(a: SyncRecord<K, P>, b: SyncRecord<K, P>): boolean {
  return (
    a.key === b.key &&
    a.ownerId === b.ownerId &&
    a.tag === b.tag &&
    a.editedAt === b.editedAt &&
    valuesEqual(a.payload, b.payload)
  );
}

/** Whether writing `next` over `stored` would change anything a reader could see. */
export function replicaDiffers<K extends RecordKey, P>(
  stored: readonly SyncRecord<K, P>[],
  next: readonly SyncRecord<K, P>[]
): boolean {
  if (stored.length !== next.length) return true;
  const index = indexByKey(stored);
  if (index.size !== stored.length) return true;
  return next.some((record) => {
    const existing = index.get(record.key);
    return !existing || !sameRecord(existing, record);
  });
}

function failedSide<K extends RecordKey, P>(
  table: MergeTable<K, P>,
  error: UnknownTagError,
  producer: SyncRecord<K, P> | undefined
): Role {
  const tag = producer?.tag;
  return tag !== undefined && tag === error.tag && !table.vocabulary.isKnownTag(tag)
    ? 'producer'
    : 'reviewer';
}

/**
 * Reconcile a producer replica with a reviewer replica.
 *
 * @example
 * const result = reconcileReplicas(worktimeTable, producer.records, reviewer.records, {
 *   initiator: 'producer'
 * });
 * for (const role of result.writeTargets) {
 *   await store.saveReplica(ownerId, period, role, role === 'producer' ? result.producerOut : result.reviewerOut);
 * }
 */
export function reconcileReplicas<K extends RecordKey, P>(
  table: MergeTable<K, P>,
  producerRecords: readonly SyncRecord<K, P>[],
  reviewerRecords: readonly SyncRecord<K, P>[],
  options: ReconcileOptions
): ReconcileResult<K, P> {
  const producerIndex = indexByKey(producerRecords);
  const reviewerIndex = indexByKey(reviewerRecords);

  const keys: K[] = [...producerIndex.keys()];
  for (const key of reviewerIndex.keys()) {
    if (!producerIndex.has(key)) keys.push(key);
  }

  const merged: SyncRecord<K, P>[] = [];
  const producerView: SyncRecord<K, P>[] = [];
  const reviewerView: SyncRecord<K, P>[] = [];
  const deltas: CounterDelta[] = [];
  const failures: KeyFailure[] = [];
  const decisions: MergeDecision[] = [];

  for (const key of keys) {
    const producer = producerIndex.get(key);
    const reviewer = reviewerIndex.get(key);

    let result: MergeResult<K, P>;
    try {
      result = mergeRecords(table, key, producer, reviewer, options);
    } catch (error) {
      if (!(error instanceof UnknownTagError)) throw error;
      failures.push({
        key,
        role: failedSide(table, error, producer),
        tag: error.tag,
        message: error.message
      });
      if (producer) producerView.push(producer);
      if (reviewer) reviewerView.push(reviewer);
      continue;
    }

    const { outcome } = result;
    deltas.push(...result.deltas);
    decisions.push({ key, rule: outcome.rule, kind: outcome.kind });
    if (outcome.kind === 'drop') continue;

    merged.push(outcome.record);
    producerView.push(outcome.record);
    if (REVIEWER_KEEPS_OWN.has(outcome.rule)) {
      if (reviewer) reviewerView.push(reviewer);
    } else {
      reviewerView.push(outcome.record);
    }
  }

  const byNaturalOrder = (a: SyncRecord<K, P>, b: SyncRecord<K, P>) => table.compare(a, b);
  merged.sort(byNaturalOrder);
  producerView.sort(byNaturalOrder);
  reviewerView.sort(byNaturalOrder);

  const stored: Record<Role, readonly SyncRecord<K, P>[]> = {
    producer: producerRecords,
    reviewer: reviewerRecords
  };
  const views: Record<Role, readonly SyncRecord<K, P>[]> = {
    producer: producerView,
    reviewer: reviewerView
  };
  const other: Role = options.initiator === 'producer' ? 'reviewer' : 'producer';

  const writeTargets: Role[] = [];
  if (keys.length > 0) writeTargets.push(options.initiator);
  if (replicaDiffers(stored[other], views[other])) writeTargets.push(other);

  return {
    merged,
    deltas,
    producerOut: producerView,
    reviewerOut: reviewerView,
    writeTargets,
    failures,
    decisions
  };
}
