/**
 * Replica Reconciliation Types
 *
 * Shared shapes for the records, replicas and merge results that flow between
 * the vocabulary, merge table, reconciler and engine layers.
 *
 * Records are immutable values: every edit operation returns a new frozen
 * record, so a replica loaded for one role can never alias the other role's
 * copy.
 */

/** The two roles that keep a replica of the same record set. */
export type Role = 'producer' | 'reviewer';

/**
 * Identity of a record within one period: a `YYYY-MM-DD` date for work time,
 * an integer entry id for the register-style entities.
 */
export type RecordKey = string | number;

/**
 * One entity instance as stored in a replica.
 *
 * `tag` is the entity-specific vocabulary value. A record without one reads
 * as fresh input.
 */
export interface SyncRecord<K extends RecordKey = RecordKey, P = unknown> {
  readonly key: K;
  readonly ownerId: string;
  readonly payload: P;
  readonly tag?: string;
  /** Minutes since the epoch of the last explicit edit, when known. */
  readonly editedAt?: number;
}

/** Month omitted means a yearly record set. */
export interface Period {
  readonly year: number;
  readonly month?: number;
}

export interface Replica<K extends RecordKey = RecordKey, P = unknown> {
  readonly ownerId: string;
  readonly period: Period;
  readonly role: Role;
  readonly records: readonly SyncRecord<K, P>[];
}

// ============================================================
// MERGE OUTCOMES
// ============================================================

/** Name of the merge rule that decided a key (recorded for audit and tests). */
export type MergeRuleName =
  | 'producer_in_progress'
  | 'producer_resurrects'
  | 'producer_edit_acknowledged'
  | 'producer_edit_wins'
  | 'reviewer_edit_applied'
  | 'reviewer_tombstone'
  | 'producer_new_input'
  | 'reviewer_introduced'
  | 'already_converged'
  | 'fallback';

export type MergeOutcome<K extends RecordKey = RecordKey, P = unknown> =
  | { readonly kind: 'keep'; readonly record: SyncRecord<K, P>; readonly rule: MergeRuleName }
  | { readonly kind: 'drop'; readonly rule: MergeRuleName };

/**
 * A change in whether a record consumes a finite quota.
 *
 * `amount` is `+1` when a quota unit is restored and `-1` when one is
 * consumed. `id` is stable for the same transition of the same record, so a
 * balance tracker can ignore a re-delivered delta.
 */
export interface CounterDelta {
  readonly id: string;
  readonly amount: 1 | -1;
  readonly quotaKind: string;
  readonly entityType: string;
  readonly ownerId: string;
  readonly periodKey: string;
  readonly key: RecordKey;
}

/**
 * `resurrect` lets a producer edit revive a key the reviewer tombstoned;
 * `delete-wins` drops it regardless.
 */
export type TombstonePolicy = 'resurrect' | 'delete-wins';

export interface MergeDecision {
  readonly key: RecordKey;
  readonly rule: MergeRuleName;
  readonly kind: 'keep' | 'drop';
}

/** A key excluded from the merge because one side carried an unknown tag. */
export interface KeyFailure {
  readonly key: RecordKey;
  readonly role: Role;
  readonly tag: string;
  readonly message: string;
}

/**
 * Warning raised when the producer-edit-wins rule keeps firing for the same
 * key across successive committed merges.
 */
export interface ConflictAmbiguity {
  readonly entityType: string;
  readonly ownerId: string;
  readonly periodKey: string;
  readonly key: RecordKey;
  readonly occurrences: number;
}

export interface ReconcileResult<K extends RecordKey = RecordKey, P = unknown> {
  /** Every kept record, in the entity's natural order. */
  readonly merged: readonly SyncRecord<K, P>[];
  readonly deltas: readonly CounterDelta[];
  /** What the producer replica should hold after the merge. */
  readonly producerOut: readonly SyncRecord<K, P>[];
  /** What the reviewer replica should hold after the merge. */
  readonly reviewerOut: readonly SyncRecord<K, P>[];
  readonly writeTargets: readonly Role[];
  readonly failures: readonly KeyFailure[];
  readonly decisions: readonly MergeDecision[];
}
