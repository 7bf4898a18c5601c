import type { Period, RecordKey, Replica, Role, SyncRecord } from '../types';
import { formatPeriodKey } from '../utils';
import { emptyReplica, type ReplicaStore } from './replicaStore';

export interface MemoryReplicaStore<K extends RecordKey, P> extends ReplicaStore<K, P> {
  /** Records currently held, or `undefined` when the replica was never saved. */
  peek(ownerId: string, period: Period, role: Role): readonly SyncRecord<K, P>[] | undefined;
  readonly saveCount: number;
}

/** Replica store held in process memory. Useful for tests and single-process tools. */
export function createMemoryReplicaStore<K extends RecordKey, P>(): MemoryReplicaStore<K, P> {
  const replicas = new Map<string, readonly SyncRecord<K, P>[]>();
  const slot = (ownerId: string, period: Period, role: Role) =>
    `${role}/${ownerId}/${formatPeriodKey(period)}`;
  let saveCount = 0;

  return {
    async loadReplica(ownerId, period, role): Promise<Replica<K, P>> {
      const records = replicas.get(slot(ownerId, period, role));
      if (!records) return emptyReplica(ownerId, period, role);
      return { ownerId, period, role, records };
    },
    async saveReplica(ownerId, period, role, records) {
      replicas.set(slot(ownerId, period, role), Object.freeze([...records]));
      saveCount++;
    },
    peek(ownerId, period, role) {
      return replicas.get(slot(ownerId, period, role));
    },
    get saveCount() {
      return saveCount;
    }
  };
}
