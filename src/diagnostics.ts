/**
 * @fileoverview Diagnostics
 *
 * A single point-in-time snapshot of the engine: configuration, counters,
 * lock pool usage and merge statuses. The data is not reactive; subscribe to
 * {@link mergeStatusStore} for live status.
 *
 * No module imports from diagnostics.
 */

import { get } from 'svelte/store';
import { getEngineConfig, getEngineRuntime, isEngineInitialized } from './config';
import { isDebugMode } from './debug';
import { _getEngineDiagnostics, type EngineStats } from './engine';
import type { LockMetrics } from './locks';
import { mergeStatusStore, type MergeStatusMap } from './stores/mergeStatus';
import type { TombstonePolicy } from './types';

export interface DiagnosticsSnapshot {
  timestamp: string;
  initialized: boolean;
  debugMode: boolean;
  config: {
    prefix: string;
    entityTypes: string[];
    tombstonePolicy: TombstonePolicy;
    ambiguityThreshold: number;
    hasCounterHook: boolean;
  } | null;
  engine: EngineStats;
  locks: (LockMetrics & { poolSize: number; busySlots: number; queuedRequests: number }) | null;
  ambiguity: { trackedKeys: number } | null;
  merges: MergeStatusMap;
}

export function getDiagnostics(): DiagnosticsSnapshot {
  const initialized = isEngineInitialized();
  const config = initialized ? getEngineConfig() : null;
  const runtime = initialized ? getEngineRuntime() : null;

  return {
    timestamp: new Date().toISOString(),
    initialized,
    debugMode: isDebugMode(),
    config: config && {
      prefix: config.prefix,
      entityTypes: [...config.entities.keys()],
      tombstonePolicy: config.tombstonePolicy,
      ambiguityThreshold: config.ambiguityThreshold,
      hasCounterHook: config.onCounterDelta !== undefined
    },
    engine: _getEngineDiagnostics(),
    locks: runtime && runtime.locks.getMetrics(),
    ambiguity: runtime && { trackedKeys: runtime.ambiguity.size },
    merges: get(mergeStatusStore)
  };
}
