/**
 * Merge Status Store
 * Tracks, per (entity, owner, period), whether the replicas were last merged
 * successfully, so callers can tell a period that still needs a retry.
 */

import { derived, get, writable, type Readable } from 'svelte/store';
import type { ConflictAmbiguity, Period } from '../types';
import { formatPeriodKey } from '../utils';

export type MergeState = 'idle' | 'merging' | 'merged' | 'not_merged';

export interface MergeStatusEntry {
  status: MergeState;
  lastMergedAt: string | null; // ISO time of the last committed merge
  lastError: string | null; // Message of the last failure, cleared on success
  ambiguities: ConflictAmbiguity[];
}

export type MergeStatusMap = Record<string, MergeStatusEntry>;

export function mergeStatusKey(entityType: string, ownerId: string, period: Period): string {
  return `${entityType}:${ownerId}:${formatPeriodKey(period)}`;
}

const IDLE: MergeStatusEntry = {
  status: 'idle',
  lastMergedAt: null,
  lastError: null,
  ambiguities: []
};

function createMergeStatusStore() {
  const { subscribe, set, update } = writable<MergeStatusMap>({});

  const patch = (key: string, changes: Partial<MergeStatusEntry>) =>
    update((state) => ({ ...state, [key]: { ...(state[key] ?? IDLE), ...changes } }));

  return {
    subscribe,

    /**
     * A merge started for this key
     */
    setMerging(key: string): void {
      patch(key, { status: 'merging' });
    },

    /**
     * A merge committed
     */
    setMerged(key: string, mergedAt: string, ambiguities: ConflictAmbiguity[]): void {
      patch(key, { status: 'merged', lastMergedAt: mergedAt, lastError: null, ambiguities });
    },

    /**
     * A merge failed and nothing was committed
     */
    setNotMerged(key: string, error: string): void {
      patch(key, { status: 'not_merged', lastError: error });
    },

    reset(): void {
      set({});
    }
  };
}

export const mergeStatusStore = createMergeStatusStore();

/** Current entry for one key; `idle` when nothing ran yet. */
export function getMergeStatus(entityType: string, ownerId: string, period: Period): MergeStatusEntry {
  return get(mergeStatusStore)[mergeStatusKey(entityType, ownerId, period)] ?? IDLE;
}

/** Keys whose last merge failed. */
export const pendingMerges: Readable<string[]> = derived(mergeStatusStore, ($status) =>
  Object.keys($status).filter((key) => $status[key].status === 'not_merged')
);
