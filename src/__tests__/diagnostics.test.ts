import { get } from 'svelte/store';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { initEngine, registerEntity } from '../config';
import { debugLog, debugWarn, isDebugMode, setDebugMode, _setDebugPrefix } from '../debug';
import { getDiagnostics } from '../diagnostics';
import { worktimeTable, type WorktimePayload } from '../entities';
import { reconcileOwner, resetEngine } from '../engine';
import { createMemoryReplicaStore } from '../storage/memoryStore';
import { getMergeStatus, mergeStatusStore, pendingMerges } from '../stores/mergeStatus';

const period = { year: 2024, month: 5 };

afterEach(() => {
  resetEngine();
  setDebugMode(false);
  vi.unstubAllEnvs();
  vi.restoreAllMocks();
});

describe('debug logging', () => {
  it('follows the prefixed environment flag', () => {
    vi.stubEnv('PAYROLL_DEBUG_MODE', 'true');
    _setDebugPrefix('payroll');

    expect(isDebugMode()).toBe(true);
  });

  it('stays quiet unless enabled', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    setDebugMode(false);
    debugLog('[Test] hidden');
    setDebugMode(true);
    debugWarn('[Test] shown');

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[Test] shown');
  });
});

describe('merge status store', () => {
  it('tracks failed periods until they merge', () => {
    mergeStatusStore.setMerging('worktime:jdoe:2024-05');
    mergeStatusStore.setNotMerged('worktime:jdoe:2024-05', 'disk full');

    expect(get(pendingMerges)).toEqual(['worktime:jdoe:2024-05']);

    mergeStatusStore.setMerged('worktime:jdoe:2024-05', '2024-06-01T00:00:00.000Z', []);

    expect(get(pendingMerges)).toEqual([]);
    expect(getMergeStatus('worktime', 'jdoe', period)).toEqual({
      status: 'merged',
      lastMergedAt: '2024-06-01T00:00:00.000Z',
      lastError: null,
      ambiguities: []
    });
  });

  it('reads as idle for a period never merged', () => {
    expect(getMergeStatus('worktime', 'nobody', period).status).toBe('idle');
  });
});

describe('getDiagnostics', () => {
  it('describes an engine that was never initialized', () => {
    const snapshot = getDiagnostics();

    expect(snapshot.initialized).toBe(false);
    expect(snapshot.config).toBeNull();
    expect(snapshot.locks).toBeNull();
    expect(snapshot.engine.reconciliations).toBe(0);
  });

  it('counts committed reconciliations', async () => {
    const store = createMemoryReplicaStore<string, WorktimePayload>();
    initEngine({ prefix: 'test', entities: [registerEntity(worktimeTable, store)], lockPoolSize: 4 });
    await store.saveReplica('jdoe', period, 'producer', [
      { key: '2024-05-10', ownerId: 'jdoe', payload: { totalWorkedMinutes: 480 }, tag: 'USER_INPUT' }
    ]);

    await reconcileOwner('worktime', 'jdoe', period);
    const snapshot = getDiagnostics();

    expect(snapshot.config).toEqual({
      prefix: 'test',
      entityTypes: ['worktime'],
      tombstonePolicy: 'resurrect',
      ambiguityThreshold: 2,
      hasCounterHook: false
    });
    expect(snapshot.engine).toMatchObject({ reconciliations: 1, committed: 1, failed: 0 });
    expect(snapshot.locks).toMatchObject({ poolSize: 4, writesAcquired: 1, busySlots: 0 });
    expect(snapshot.merges['worktime:jdoe:2024-05'].status).toBe('merged');
  });

  it('rejects out-of-range options', () => {
    expect(() => initEngine({ prefix: 'test', entities: [], ambiguityThreshold: 0 })).toThrow();
  });
});
