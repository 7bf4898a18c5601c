/**
 * @fileoverview Producer/Reviewer Merge Rule Table
 *
 * Decides, for one key, what survives when the producer's and the reviewer's
 * replicas disagree. The decision walks an ordered rule list and the first
 * match wins:
 *
 *  1. `producer_in_progress`: an open producer record is kept untouched.
 *  2. `producer_resurrects`: a producer edit revives a reviewer tombstone
 *     (tombstone policy `resurrect` only).
 *  3. `producer_edit_acknowledged`: a producer edit the reviewer already holds
 *     is settled as acknowledged.
 *  4. `producer_edit_wins`: a producer edit beats a differing reviewer copy,
 *     unless the reviewer re-edited at the same minute or later.
 *  5. `reviewer_edit_applied`: the reviewer's content is taken and
 *     acknowledged.
 *  6. `reviewer_tombstone`: the key is dropped.
 *  7. `producer_new_input`: producer-only fresh input passes through.
 *  8. `reviewer_introduced`: a reviewer-only record is pushed to the producer.
 *  9. `already_converged`: both sides already agree on tag and content.
 * 10. `fallback`: producer copy (else reviewer copy) under the settled tag.
 *
 * Alongside the outcome, the merge reports quota transitions as
 * {@link CounterDelta}s: `+1` when the surviving record stops consuming a
 * quota the previous one consumed, `-1` for the reverse.
 *
 * The function is pure. It never throws on malformed payload fields and
 * throws {@link UnknownTagError} when either record carries a tag outside the
 * entity vocabulary.
 *
 * @see {@link ./reconciler.ts} for the set-level loop that calls it
 * @see {@link ./status.ts} for the canonical tags
 */

import type { CanonicalTag, TagVocabulary } from './status';
import type {
  CounterDelta,
  MergeOutcome,
  MergeRuleName,
  RecordKey,
  SyncRecord,
  TombstonePolicy
} from './types';
import { hashString, stableStringify, valuesEqual } from './utils';

// =============================================================================
// Interfaces
// =============================================================================

/**
 * Entity-specific knowledge the generic merge needs. One instance per entity
 * type (work time, register, check register).
 */
export interface MergeTable<K extends RecordKey = RecordKey, P = unknown> {
  readonly entityType: string;
  readonly vocabulary: TagVocabulary;
  /** Tag written by the fallback rule and by acknowledgements. */
  readonly settledTag: CanonicalTag;
  /** Natural order of the merged set. */
  compare(a: SyncRecord<K, P>, b: SyncRecord<K, P>): number;
  contentEquals(a: P, b: P): boolean;
  /** Quota kinds a record currently consumes. */
  quotaKinds(record: SyncRecord<K, P>): readonly string[];
}

export interface MergeTableDefinition<K extends RecordKey, P> {
  entityType: string;
  vocabulary: TagVocabulary;
  compare(a: SyncRecord<K, P>, b: SyncRecord<K, P>): number;
  /** Defaults to `ACK_DONE`. */
  settledTag?: CanonicalTag;
  /**
   * Payload fields that take part in the content comparison. All fields when
   * omitted.
   */
  comparedFields?: readonly (keyof P & string)[];
  quotaKinds?(payload: P): readonly string[];
}

export interface MergeOptions {
  tombstonePolicy?: TombstonePolicy;
  /** Folded into counter delta ids. */
  periodKey?: string;
  /**
   * Identifies one committed merge. Appended to counter delta ids so the same
   * transition happening again later is not mistaken for a re-delivery.
   */
  mergeId?: string;
}

export interface MergeResult<K extends RecordKey = RecordKey, P = unknown> {
  outcome: MergeOutcome<K, P>;
  deltas: CounterDelta[];
}

// =============================================================================
// Table Construction
// =============================================================================

export function defineMergeTable<K extends RecordKey, P>(
  definition: MergeTableDefinition<K, P>
): MergeTable<K, P> {
  const fields = definition.comparedFields;
  const kinds = definition.quotaKinds;

  return Object.freeze({
    entityType: definition.entityType,
    vocabulary: definition.vocabulary,
    settledTag: definition.settledTag ?? 'ACK_DONE',
    compare: definition.compare,
    contentEquals(a: P, b: P): boolean {
      if (!fields) return valuesEqual(a, b);
      return fields.every((field) => valuesEqual(a[field], b[field]));
    },
    quotaKinds(record: SyncRecord<K, P>): readonly string[] {
      return kinds ? kinds(record.payload) : [];
    }
  });
}

// =============================================================================
// Helpers
// =============================================================================

function retag<K extends RecordKey, P>(
  table: MergeTable<K, P>,
  record: SyncRecord<K, P>,
  tag: CanonicalTag
): SyncRecord<K, P> {
  return Object.freeze({ ...record, tag: table.vocabulary.fromCanonical(tag) });
}

function keep<K extends RecordKey, P>(
  record: SyncRecord<K, P>,
  rule: MergeRuleName
): MergeOutcome<K, P> {
  return { kind: 'keep', record, rule };
}

/**
 * A reviewer edit stamped at the same minute as the producer edit, or later,
 * takes precedence. A missing reviewer stamp never counts as later; a missing
 * producer stamp always loses to a present reviewer one.
 */
function reviewerEditIsNewer(
  producer: SyncRecord<RecordKey, unknown>,
  reviewer: SyncRecord<RecordKey, unknown>
): boolean {
  if (reviewer.editedAt === undefined) return false;
  if (producer.editedAt === undefined) return true;
  return reviewer.editedAt >= producer.editedAt;
}

function decide<K extends RecordKey, P>(
  table: MergeTable<K, P>,
  key: K,
  producer: SyncRecord<K, P> | undefined,
  reviewer: SyncRecord<K, P> | undefined,
  policy: TombstonePolicy
): MergeOutcome<K, P> {
  const vocab = table.vocabulary;
  const pTag = producer ? vocab.toCanonical(producer.tag, key) : undefined;
  const rTag = reviewer ? vocab.toCanonical(reviewer.tag, key) : undefined;

  if (producer && pTag === 'IN_PROGRESS') {
    return keep(producer, 'producer_in_progress');
  }

  if (producer && pTag === 'EDITED_BY_PRODUCER' && reviewer) {
    if (rTag === 'TOMBSTONE') {
      if (policy === 'resurrect') {
        return keep(retag(table, producer, 'EDITED_BY_PRODUCER'), 'producer_resurrects');
      }
    } else if (table.contentEquals(producer.payload, reviewer.payload)) {
      return keep(retag(table, producer, table.settledTag), 'producer_edit_acknowledged');
    } else if (rTag !== 'EDITED_BY_REVIEWER' || !reviewerEditIsNewer(producer, reviewer)) {
      return keep(retag(table, producer, 'EDITED_BY_PRODUCER'), 'producer_edit_wins');
    }
  }

  if (reviewer && rTag === 'EDITED_BY_REVIEWER') {
    return keep(retag(table, reviewer, table.settledTag), 'reviewer_edit_applied');
  }

  if (rTag === 'TOMBSTONE' || (!reviewer && pTag === 'TOMBSTONE')) {
    return { kind: 'drop', rule: 'reviewer_tombstone' };
  }

  if (producer && !reviewer && pTag === 'INPUT') {
    return keep(producer, 'producer_new_input');
  }

  if (reviewer && !producer && rTag === 'REVIEW_DONE') {
    return keep(retag(table, reviewer, table.settledTag), 'reviewer_introduced');
  }

  if (
    producer &&
    reviewer &&
    producer.tag === reviewer.tag &&
    table.contentEquals(producer.payload, reviewer.payload)
  ) {
    return keep(producer, 'already_converged');
  }

  const base = producer ?? reviewer;
  if (!base) {
    throw new Error(`mergeRecords called for ${String(key)} with no record on either side`);
  }
  return keep(retag(table, base, table.settledTag), 'fallback');
}

interface MergeInputs<K extends RecordKey, P> {
  producer: SyncRecord<K, P> | undefined;
  reviewer: SyncRecord<K, P> | undefined;
}

function sideOf(record: SyncRecord<RecordKey, unknown> | undefined) {
  if (!record) return null;
  return { tag: record.tag, payload: record.payload, editedAt: record.editedAt };
}

function quotaDeltas<K extends RecordKey, P>(
  table: MergeTable<K, P>,
  key: K,
  inputs: MergeInputs<K, P>,
  after: SyncRecord<K, P> | undefined,
  options: MergeOptions
): CounterDelta[] {
  const before = inputs.producer ?? inputs.reviewer;
  if (!before) return [];
  const beforeKinds = table.quotaKinds(before);
  const afterKinds = after ? table.quotaKinds(after) : [];
  const fingerprint = hashString(
    stableStringify({ producer: sideOf(inputs.producer), reviewer: sideOf(inputs.reviewer) })
  ).toString(36);
  const periodKey = options.periodKey ?? '';
  const suffix = options.mergeId === undefined ? fingerprint : `${fingerprint}:${options.mergeId}`;

  const delta = (amount: 1 | -1, quotaKind: string): CounterDelta => ({
    id: [
      table.entityType,
      before.ownerId,
      periodKey,
      String(key),
      quotaKind,
      amount > 0 ? 'restore' : 'consume',
      suffix
    ].join(':'),
    amount,
    quotaKind,
    entityType: table.entityType,
    ownerId: before.ownerId,
    periodKey,
    key
  });

  const deltas: CounterDelta[] = [];
  for (const kind of beforeKinds) {
    if (!afterKinds.includes(kind)) deltas.push(delta(1, kind));
  }
  for (const kind of afterKinds) {
    if (!beforeKinds.includes(kind)) deltas.push(delta(-1, kind));
  }
  return deltas;
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Merge the producer and reviewer copies of one key.
 *
 * At least one of `producer` and `reviewer` must be present.
 *
 * @throws {UnknownTagError} When either record's tag is outside the vocabulary.
 *
 * @example
 * const { outcome, deltas } = mergeRecords(worktimeTable, '2024-05-10', p, r);
 * if (outcome.kind === 'keep') save(outcome.record);
 */
export function mergeRecords<K extends RecordKey, P>(
  table: MergeTable<K, P>,
  key: K,
  producer: SyncRecord<K, P> | undefined,
  reviewer: SyncRecord<K, P> | undefined,
  options: MergeOptions = {}
): MergeResult<K, P> {
  const outcome = decide(table, key, producer, reviewer, options.tombstonePolicy ?? 'resurrect');
  const after = outcome.kind === 'keep' ? outcome.record : undefined;
  const deltas = quotaDeltas(table, key, { producer, reviewer }, after, options);
  return { outcome, deltas };
}
