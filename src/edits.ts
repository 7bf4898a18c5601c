/**
 * @fileoverview Record edit operations for the owning roles.
 *
 * These are the only places besides the merge table that set a tag. Each
 * returns a new frozen record; the input is never modified.
 */

import type { MergeTable } from './conflicts';
import type { CanonicalTag } from './status';
import type { RecordKey, SyncRecord } from './types';
import { nowMinutes } from './utils';

export interface NewRecord<K extends RecordKey, P> {
  key: K;
  ownerId: string;
  payload: P;
}

function withTag<K extends RecordKey, P>(
  table: MergeTable<K, P>,
  record: SyncRecord<K, P>,
  tag: CanonicalTag,
  changes: { payload?: P; editedAt?: number } = {}
): SyncRecord<K, P> {
  const next: SyncRecord<K, P> = {
    key: record.key,
    ownerId: record.ownerId,
    payload: changes.payload ?? record.payload,
    tag: table.vocabulary.fromCanonical(tag)
  };
  const editedAt = changes.editedAt ?? record.editedAt;
  return Object.freeze(editedAt === undefined ? next : { ...next, editedAt });
}

// =============================================================================
// Producer
// =============================================================================

/** A freshly created record, not yet seen by the reviewer. */
export function createInput<K extends RecordKey, P>(
  table: MergeTable<K, P>,
  init: NewRecord<K, P>
): SyncRecord<K, P> {
  return withTag(table, { ...init }, 'INPUT');
}

/** Open a record the producer is still filling in (e.g. a running work day). */
export function startInProgress<K extends RecordKey, P>(
  table: MergeTable<K, P>,
  init: NewRecord<K, P>
): SyncRecord<K, P> {
  return withTag(table, { ...init }, 'IN_PROGRESS');
}

/** Close an open record. It becomes fresh input for the reviewer. */
export function finishInProgress<K extends RecordKey, P>(
  table: MergeTable<K, P>,
  record: SyncRecord<K, P>,
  payload?: P
): SyncRecord<K, P> {
  return withTag(table, record, 'INPUT', { payload });
}

/**
 * Producer changes a record's content. Records the reviewer has not seen yet
 * (fresh input, open records) keep their tag; anything already reviewed
 * becomes an unresolved producer edit.
 */
export function producerEdit<K extends RecordKey, P>(
  table: MergeTable<K, P>,
  record: SyncRecord<K, P>,
  payload: P,
  at: number = nowMinutes()
): SyncRecord<K, P> {
  const current = table.vocabulary.toCanonical(record.tag, record.key);
  const tag: CanonicalTag =
    current === 'INPUT' || current === 'IN_PROGRESS' ? current : 'EDITED_BY_PRODUCER';
  return withTag(table, record, tag, { payload, editedAt: at });
}

// =============================================================================
// Reviewer
// =============================================================================

export function reviewerEdit<K extends RecordKey, P>(
  table: MergeTable<K, P>,
  record: SyncRecord<K, P>,
  payload: P,
  at: number = nowMinutes()
): SyncRecord<K, P> {
  return withTag(table, record, 'EDITED_BY_REVIEWER', { payload, editedAt: at });
}

/** Mark for deletion. The next reconciliation drops the key. */
export function reviewerDelete<K extends RecordKey, P>(
  table: MergeTable<K, P>,
  record: SyncRecord<K, P>
): SyncRecord<K, P> {
  return withTag(table, record, 'TOMBSTONE');
}

/** Reviewed without content changes. */
export function reviewerSignOff<K extends RecordKey, P>(
  table: MergeTable<K, P>,
  record: SyncRecord<K, P>
): SyncRecord<K, P> {
  return withTag(table, record, 'REVIEW_DONE');
}
