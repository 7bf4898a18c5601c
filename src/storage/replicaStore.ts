/**
 * @fileoverview Replica store contract and the stored-document codec shared by
 * the file and IndexedDB stores.
 */

import { z } from 'zod';
import { debugWarn } from '../debug';
import type { EntityDefinition } from '../entities/types';
import type { Period, RecordKey, Replica, Role, SyncRecord } from '../types';

/**
 * Persistence collaborator for one entity type.
 *
 * `loadReplica` resolves to an empty replica when nothing was stored yet.
 * `saveReplica` must replace the whole record set atomically: a concurrent
 * reader sees either the old set or the new one.
 */
export interface ReplicaStore<K extends RecordKey = RecordKey, P = unknown> {
  loadReplica(ownerId: string, period: Period, role: Role): Promise<Replica<K, P>>;
  saveReplica(
    ownerId: string,
    period: Period,
    role: Role,
    records: readonly SyncRecord<K, P>[]
  ): Promise<void>;
}

export function emptyReplica<K extends RecordKey, P>(
  ownerId: string,
  period: Period,
  role: Role
): Replica<K, P> {
  return { ownerId, period, role, records: [] };
}

// =============================================================================
// Stored Record Codec
// =============================================================================

export const periodSchema = z.object({
  year: z.number().int(),
  month: z.number().int().min(1).max(12).optional()
});

/**
 * One stored record. Fields other than `key` and `payload` fall back to absent
 * when malformed; `key` and `payload` go through the entity schemas.
 */
const storedRecordSchema = z.object({
  key: z.unknown(),
  ownerId: z.string().optional().catch(undefined),
  payload: z.unknown(),
  tag: z.string().optional().catch(undefined),
  editedAt: z.number().int().optional().catch(undefined)
});

export type StoredRecord = z.infer<typeof storedRecordSchema>;

/** Record list of a stored replica; items are validated one by one on load. */
export const storedRecordsSchema = z.array(z.unknown());

/** Plain-object form of a record, ready for JSON or structured clone. */
export function toStoredRecord<K extends RecordKey, P>(record: SyncRecord<K, P>): StoredRecord {
  const stored: StoredRecord = {
    key: record.key,
    ownerId: record.ownerId,
    payload: record.payload
  };
  if (record.tag !== undefined) stored.tag = record.tag;
  if (record.editedAt !== undefined) stored.editedAt = record.editedAt;
  return stored;
}

/**
 * Decode stored records through the entity schemas.
 *
 * Each record is checked on its own, so one damaged entry never hides the
 * rest of the replica. Items that are not objects or carry an invalid key are
 * skipped. A record without an owner belongs to `replicaOwner`; a payload that
 * is not an object reads as an empty one.
 *
 * @throws {z.ZodError} When `raw` is not an array.
 */
export function fromStoredRecords<K extends RecordKey, P>(
  entity: EntityDefinition<K, P>,
  raw: unknown,
  replicaOwner: string
): SyncRecord<K, P>[] {
  const entityType = entity.table.entityType;
  const records: SyncRecord<K, P>[] = [];

  for (const candidate of storedRecordsSchema.parse(raw)) {
    const stored = storedRecordSchema.safeParse(candidate);
    if (!stored.success) {
      debugWarn(`[Store] Skipping ${entityType} record that is not an object`, candidate);
      continue;
    }
    const item = stored.data;
    const key = entity.keySchema.safeParse(item.key);
    if (!key.success) {
      debugWarn(`[Store] Skipping ${entityType} record with invalid key`, item.key);
      continue;
    }
    const parsed = entity.payloadSchema.safeParse(item.payload);
    const payload = parsed.success ? parsed.data : entity.payloadSchema.parse({});
    const record: SyncRecord<K, P> = {
      key: key.data,
      ownerId: item.ownerId ?? replicaOwner,
      payload
    };
    records.push(
      Object.freeze({
        ...record,
        ...(item.tag !== undefined ? { tag: item.tag } : {}),
        ...(item.editedAt !== undefined ? { editedAt: item.editedAt } : {})
      })
    );
  }
  return records;
}
