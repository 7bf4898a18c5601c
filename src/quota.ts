/**
 * @fileoverview Counter Adjustment Hook and an in-memory quota ledger.
 *
 * The engine only reports quota transitions. Whoever keeps the balances is
 * handed each {@link CounterDelta} once the merged replicas are saved, and
 * may see a delta again when the caller re-delivers one the hook rejected.
 * The delta `id` names one transition of one committed merge, so a repeat
 * keeps its id while the same transition in a later merge gets a new one.
 */

import { debugLog } from './debug';
import type { CounterDelta, Period, Role } from './types';

export interface CounterDeltaContext {
  entityType: string;
  ownerId: string;
  period: Period;
  initiator: Role;
}

export type CounterAdjustmentHook = (
  delta: CounterDelta,
  context: CounterDeltaContext
) => void | Promise<void>;

export interface QuotaLedger {
  /** Hook to pass as `onCounterDelta`. Ignores deltas already applied. */
  readonly apply: CounterAdjustmentHook;
  balance(ownerId: string, year: number, quotaKind: string): number;
  setBalance(ownerId: string, year: number, quotaKind: string, value: number): void;
  hasApplied(deltaId: string): boolean;
}

/**
 * Balances per owner, year and quota kind, kept in memory.
 *
 * @example
 * const ledger = createQuotaLedger();
 * ledger.setBalance('jdoe', 2024, 'paid_leave_day', 21);
 * initEngine({ prefix: 'timesheet', entities, onCounterDelta: ledger.apply });
 */
export function createQuotaLedger(): QuotaLedger {
  const balances = new Map<string, number>();
  const applied = new Set<string>();
  const slot = (ownerId: string, year: number, quotaKind: string) =>
    `${ownerId}:${year}:${quotaKind}`;

  return {
    apply(delta, context) {
      if (applied.has(delta.id)) {
        debugLog(`[Quota] Ignoring repeated delta ${delta.id}`);
        return;
      }
      applied.add(delta.id);
      const key = slot(delta.ownerId, context.period.year, delta.quotaKind);
      balances.set(key, (balances.get(key) ?? 0) + delta.amount);
    },
    balance(ownerId, year, quotaKind) {
      return balances.get(slot(ownerId, year, quotaKind)) ?? 0;
    },
    setBalance(ownerId, year, quotaKind, value) {
      balances.set(slot(ownerId, year, quotaKind), value);
    },
    hasApplied(deltaId) {
      return applied.has(deltaId);
    }
  };
}
