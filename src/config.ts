/**
 * @fileoverview Engine Configuration and Initialization
 *
 * {@link initEngine} is the first function consumers call. It receives a
 * {@link ReconcileEngineConfig} describing:
 *   - Which entity types are reconciled, and where their replicas live
 *   - The tombstone policy and the ambiguity warning threshold
 *   - The size of the owner lock pool
 *   - The optional counter adjustment hook
 *
 * The resolved config is a module-level singleton read by the engine through
 * {@link getEngineConfig}, next to the runtime objects built from it (lock
 * registry, ambiguity tracker).
 *
 * @see {@link engine.ts} for the reconciliation flow that consumes this config
 */

import { z } from 'zod';
import { AmbiguityTracker } from './ambiguity';
import type { MergeTable } from './conflicts';
import { _setDebugPrefix, debugLog } from './debug';
import { EngineNotInitializedError, UnknownEntityError } from './errors';
import { OwnerLockRegistry } from './locks';
import type { CounterAdjustmentHook } from './quota';
import type { ReplicaStore } from './storage/replicaStore';
import type { RecordKey, TombstonePolicy } from './types';

// =============================================================================
// Configuration Interfaces
// =============================================================================

/**
 * One reconciled entity type: its merge table and its replica store.
 *
 * Build it with {@link registerEntity} so the table and the store are checked
 * against the same key and payload types.
 */
export interface EntityRegistration<K extends RecordKey = RecordKey, P = unknown> {
  table: MergeTable<K, P>;
  store: ReplicaStore<K, P>;
}

/**
 * Top-level configuration for the reconciliation engine.
 *
 * @example
 * initEngine({
 *   prefix: 'timesheet',
 *   entities: [
 *     registerEntity(worktimeTable, createFileReplicaStore({ dataDir, entity: worktimeDefinition })),
 *     registerEntity(registerTable, createFileReplicaStore({ dataDir, entity: registerDefinition }))
 *   ],
 *   onCounterDelta: ledger.apply
 * });
 */
export interface ReconcileEngineConfig {
  /** Application prefix; selects the `<PREFIX>_DEBUG_MODE` environment flag. */
  prefix: string;
  entities: EntityRegistration[];
  /** Whether a producer edit revives a reviewer tombstone. Default: `'resurrect'`. */
  tombstonePolicy?: TombstonePolicy;
  /** Consecutive producer-edit wins on one key before a warning. Default: 2. */
  ambiguityThreshold?: number;
  /** Owner lock slots. Default: 64. */
  lockPoolSize?: number;
  /** Receives every counter delta after the merged replicas are saved. */
  onCounterDelta?: CounterAdjustmentHook;
}

const optionsSchema = z.object({
  prefix: z.string().min(1),
  tombstonePolicy: z.enum(['resurrect', 'delete-wins']).default('resurrect'),
  ambiguityThreshold: z.number().int().min(1).default(2),
  lockPoolSize: z.number().int().min(1).default(64)
});

export type ResolvedEngineConfig = z.infer<typeof optionsSchema> & {
  entities: ReadonlyMap<string, EntityRegistration>;
  onCounterDelta?: CounterAdjustmentHook;
};

export interface EngineRuntime {
  locks: OwnerLockRegistry;
  ambiguity: AmbiguityTracker;
}

// =============================================================================
// Module State
// =============================================================================

let engineConfig: ResolvedEngineConfig | null = null;
let engineRuntime: EngineRuntime | null = null;

// =============================================================================
// Public API
// =============================================================================

/** Pair a merge table with its store, checking that both handle the same records. */
export function registerEntity<K extends RecordKey, P>(
  table: MergeTable<K, P>,
  store: ReplicaStore<K, P>
): EntityRegistration<K, P> {
  return { table, store };
}

/**
 * Initialize the engine. Calling it again replaces the previous config and
 * starts with fresh locks and ambiguity counts.
 *
 * @throws {z.ZodError} When a scalar option is out of range.
 * @throws {Error} When two registrations share an entity type.
 */
export function initEngine(config: ReconcileEngineConfig): void {
  const options = optionsSchema.parse(config);

  const entities = new Map<string, EntityRegistration>();
  for (const registration of config.entities) {
    const entityType = registration.table.entityType;
    if (entities.has(entityType)) {
      throw new Error(`Entity type ${entityType} is registered twice`);
    }
    entities.set(entityType, registration);
  }

  _setDebugPrefix(options.prefix);
  engineConfig = { ...options, entities, onCounterDelta: config.onCounterDelta };
  engineRuntime = {
    locks: new OwnerLockRegistry({ poolSize: options.lockPoolSize }),
    ambiguity: new AmbiguityTracker(options.ambiguityThreshold)
  };
  debugLog(`[Config] Engine initialized with ${[...entities.keys()].join(', ')}`);
}

/**
 * @throws {EngineNotInitializedError} If {@link initEngine} has not been called.
 */
export function getEngineConfig(): ResolvedEngineConfig {
  if (!engineConfig) throw new EngineNotInitializedError();
  return engineConfig;
}

/** @internal */
export function getEngineRuntime(): EngineRuntime {
  if (!engineRuntime) throw new EngineNotInitializedError();
  return engineRuntime;
}

export function isEngineInitialized(): boolean {
  return engineConfig !== null;
}

/**
 * @throws {UnknownEntityError} If the entity type was not registered.
 */
export function getEntityRegistration(entityType: string): EntityRegistration {
  const registration = getEngineConfig().entities.get(entityType);
  if (!registration) throw new UnknownEntityError(entityType);
  return registration;
}

/** @internal Clears the singleton; used by `resetEngine`. */
export function _clearEngineConfig(): void {
  engineConfig = null;
  engineRuntime = null;
}
