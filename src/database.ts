/**
 * @fileoverview IndexedDB replica persistence (Dexie)
 *
 * Keeps every replica as one row of a single `replicas` table, keyed by
 * (entity type, role, owner, period). A save is one `put` inside a
 * read-write transaction, so a replica is replaced as a whole.
 *
 * Under Node the caller supplies the IndexedDB implementation, either through
 * globals (e.g. `fake-indexeddb/auto`) or through {@link ReplicaDatabaseOptions}.
 */

import Dexie, { type DexieOptions, type Table } from 'dexie';
import { debugLog } from './debug';
import type { EntityDefinition } from './entities/types';
import {
  emptyReplica,
  fromStoredRecords,
  toStoredRecord,
  type ReplicaStore,
  type StoredRecord
} from './storage/replicaStore';
import type { Period, RecordKey, Replica, Role } from './types';
import { formatPeriodKey, now } from './utils';

// =============================================================================
// Schema
// =============================================================================

export interface ReplicaRow {
  entityType: string;
  role: Role;
  ownerId: string;
  periodKey: string;
  period: Period;
  records: StoredRecord[];
  savedAt: string;
}

export type ReplicaRowKey = [string, Role, string, string];

/**
 * Ordered schema versions. Append a new entry to change indexes; never edit a
 * released one.
 */
const SCHEMA_VERSIONS: Record<string, string>[] = [
  { replicas: '[entityType+role+ownerId+periodKey], ownerId, entityType' }
];

export interface ReplicaDatabaseOptions {
  name: string;
  /** Passed to Dexie, e.g. `{ indexedDB, IDBKeyRange }` from fake-indexeddb. */
  dexie?: DexieOptions;
}

function buildDexie(options: ReplicaDatabaseOptions): Dexie {
  const db = new Dexie(options.name, options.dexie);
  SCHEMA_VERSIONS.forEach((stores, index) => {
    db.version(index + 1).stores(stores);
  });
  return db;
}

/**
 * Create and open the replica database.
 *
 * Opens eagerly so schema upgrade errors surface here rather than on the
 * first read.
 */
export async function createReplicaDatabase(options: ReplicaDatabaseOptions): Promise<Dexie> {
  const db = buildDexie(options);
  await db.open();
  debugLog(`[DB] Opened ${options.name} at version ${db.verno}`);
  return db;
}

export function replicaTable(db: Dexie): Table<ReplicaRow, ReplicaRowKey> {
  return db.table<ReplicaRow, ReplicaRowKey>('replicas');
}

// =============================================================================
// Store
// =============================================================================

export interface DexieReplicaStoreOptions<K extends RecordKey, P> {
  db: Dexie;
  entity: EntityDefinition<K, P>;
}

export function createDexieReplicaStore<K extends RecordKey, P>(
  options: DexieReplicaStoreOptions<K, P>
): ReplicaStore<K, P> {
  const { db, entity } = options;
  const entityType = entity.table.entityType;
  const table = replicaTable(db);

  return {
    async loadReplica(ownerId, period, role): Promise<Replica<K, P>> {
      const row = await table.get([entityType, role, ownerId, formatPeriodKey(period)]);
      if (!row) return emptyReplica(ownerId, period, role);
      const records = fromStoredRecords(entity, row.records, ownerId);
      return { ownerId, period, role, records };
    },

    async saveReplica(ownerId, period, role, records) {
      const row: ReplicaRow = {
        entityType,
        role,
        ownerId,
        periodKey: formatPeriodKey(period),
        period: { ...period },
        records: records.map(toStoredRecord),
        savedAt: now()
      };
      await db.transaction('rw', table, async () => {
        await table.put(row);
      });
    }
  };
}
