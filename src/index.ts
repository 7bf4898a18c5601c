/**
 * @fileoverview Main entry point of `tandem-reconcile`
 *
 * Re-exports the public API:
 *
 * - **Engine Configuration & Lifecycle**: initialize the engine and run
 *   reconciliations for an owner.
 * - **Merge Core**: status vocabularies, the merge rule table and the set
 *   reconciler, usable without the engine.
 * - **Record Edits**: the producer and reviewer edit operations.
 * - **Entities**: work time, register and check register definitions.
 * - **Stores**: replica persistence (JSON files, IndexedDB, memory) and the
 *   merge status store.
 * - **Debug & Diagnostics**
 */

// Engine Configuration & Lifecycle
export { initEngine, getEngineConfig, registerEntity, isEngineInitialized } from './config';
export type { ReconcileEngineConfig, EntityRegistration, ResolvedEngineConfig } from './config';
export { reconcileOwner, readReplica, runFullMerge, resetEngine } from './engine';
export type { ReconcileReport, FullMergeEntry, UndeliveredDelta, EngineStats } from './engine';

// Merge Core
export { CANONICAL_TAGS, defineVocabulary } from './status';
export type { CanonicalTag, TagVocabulary } from './status';
export { defineMergeTable, mergeRecords } from './conflicts';
export type { MergeTable, MergeTableDefinition, MergeOptions, MergeResult } from './conflicts';
export { reconcileReplicas, replicaDiffers, sameRecord } from './reconciler';
export type { ReconcileOptions } from './reconciler';
export { OwnerLockRegistry, ReadWriteLock } from './locks';
export type { LockMode, LockMetrics, OwnerLockRegistryOptions } from './locks';
export { AmbiguityTracker } from './ambiguity';
export { createQuotaLedger } from './quota';
export type { CounterAdjustmentHook, CounterDeltaContext, QuotaLedger } from './quota';

// Record Edits
export {
  createInput,
  startInProgress,
  finishInProgress,
  producerEdit,
  reviewerEdit,
  reviewerDelete,
  reviewerSignOff
} from './edits';
export type { NewRecord } from './edits';

// Entities
export * from './entities';

// Stores
export { createFileReplicaStore, replicaFilePath } from './storage/fileStore';
export type { FileReplicaStoreOptions } from './storage/fileStore';
export { createMemoryReplicaStore } from './storage/memoryStore';
export type { MemoryReplicaStore } from './storage/memoryStore';
export { emptyReplica } from './storage/replicaStore';
export type { ReplicaStore, StoredRecord } from './storage/replicaStore';
export { createReplicaDatabase, createDexieReplicaStore } from './database';
export type { ReplicaDatabaseOptions, DexieReplicaStoreOptions, ReplicaRow } from './database';
export { mergeStatusStore, getMergeStatus, mergeStatusKey, pendingMerges } from './stores/mergeStatus';
export type { MergeState, MergeStatusEntry, MergeStatusMap } from './stores/mergeStatus';

// Errors
export { UnknownTagError, StoreError, EngineNotInitializedError, UnknownEntityError } from './errors';

// Debug & Diagnostics
export { debug, debugLog, debugWarn, debugError, isDebugMode, setDebugMode } from './debug';
export { getDiagnostics } from './diagnostics';
export type { DiagnosticsSnapshot } from './diagnostics';

// Types
export type * from './types';
export { formatPeriodKey, valuesEqual, nowMinutes } from './utils';
