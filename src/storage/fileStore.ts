/**
 * @fileoverview JSON file replica store.
 *
 * One document per (role, entity, owner, period):
 *
 *   <dataDir>/<role>/<entityType>/<ownerId>/<periodKey>.json
 *
 * Writes go to a temporary file in the same directory and are renamed over
 * the target, so readers never see a half-written document.
 */

import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { z } from 'zod';
import { debugLog } from '../debug';
import type { EntityDefinition } from '../entities/types';
import type { Period, RecordKey, Replica, Role, SyncRecord } from '../types';
import { formatPeriodKey, now } from '../utils';
import {
  emptyReplica,
  fromStoredRecords,
  periodSchema,
  storedRecordsSchema,
  toStoredRecord,
  type ReplicaStore
} from './replicaStore';

export interface FileReplicaStoreOptions<K extends RecordKey, P> {
  dataDir: string;
  entity: EntityDefinition<K, P>;
}

const documentSchema = z.object({
  ownerId: z.string(),
  period: periodSchema,
  role: z.enum(['producer', 'reviewer']),
  savedAt: z.string().optional(),
  records: storedRecordsSchema
});

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

let tempCounter = 0;

export function replicaFilePath(
  dataDir: string,
  entityType: string,
  ownerId: string,
  period: Period,
  role: Role
): string {
  return join(
    dataDir,
    role,
    entityType,
    encodeURIComponent(ownerId),
    `${formatPeriodKey(period)}.json`
  );
}

export function createFileReplicaStore<K extends RecordKey, P>(
  options: FileReplicaStoreOptions<K, P>
): ReplicaStore<K, P> {
  const { dataDir, entity } = options;
  const entityType = entity.table.entityType;

  return {
    async loadReplica(ownerId, period, role): Promise<Replica<K, P>> {
      const file = replicaFilePath(dataDir, entityType, ownerId, period, role);
      let text: string;
      try {
        text = await readFile(file, 'utf8');
      } catch (error) {
        if (isMissingFile(error)) return emptyReplica(ownerId, period, role);
        throw error;
      }
      const document = documentSchema.parse(JSON.parse(text));
      const records = fromStoredRecords(entity, document.records, ownerId);
      return { ownerId, period, role, records };
    },

    async saveReplica(ownerId, period, role, records: readonly SyncRecord<K, P>[]) {
      const file = replicaFilePath(dataDir, entityType, ownerId, period, role);
      const temp = `${file}.${process.pid}.${++tempCounter}.tmp`;
      const document = {
        ownerId,
        period,
        role,
        savedAt: now(),
        records: records.map(toStoredRecord)
      };
      await mkdir(dirname(file), { recursive: true });
      try {
        await writeFile(temp, JSON.stringify(document, null, 2), 'utf8');
        await rename(temp, file);
      } catch (error) {
        await rm(temp, { force: true });
        throw error;
      }
      debugLog(`[Store] Wrote ${records.length} ${entityType} records to ${file}`);
    }
  };
}
