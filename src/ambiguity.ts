/**
 * Tracks how many committed merges in a row kept an unresolved producer edit
 * over a differing reviewer copy, per key. Crossing the threshold means the
 * two sides keep disagreeing and a person has to look at it.
 */

import type { ConflictAmbiguity, MergeDecision, RecordKey } from './types';

export interface AmbiguityScope {
  entityType: string;
  ownerId: string;
  periodKey: string;
}

export class AmbiguityTracker {
  private streaks = new Map<string, number>();

  constructor(private readonly threshold: number) {}

  /**
   * Fold in the decisions of one committed merge and return the keys at or
   * past the threshold. Keys decided by any other rule start over.
   */
  record(scope: AmbiguityScope, decisions: readonly MergeDecision[]): ConflictAmbiguity[] {
    const ambiguities: ConflictAmbiguity[] = [];
    for (const decision of decisions) {
      const id = this.slot(scope, decision.key);
      if (decision.rule !== 'producer_edit_wins') {
        this.streaks.delete(id);
        continue;
      }
      const occurrences = (this.streaks.get(id) ?? 0) + 1;
      this.streaks.set(id, occurrences);
      if (occurrences >= this.threshold) {
        ambiguities.push({ ...scope, key: decision.key, occurrences });
      }
    }
    return ambiguities;
  }

  /** Streak the next commit would continue from. */
  streak(scope: AmbiguityScope, key: RecordKey): number {
    return this.streaks.get(this.slot(scope, key)) ?? 0;
  }

  get size(): number {
    return this.streaks.size;
  }

  clear(): void {
    this.streaks.clear();
  }

  private slot(scope: AmbiguityScope, key: RecordKey): string {
    return `${scope.entityType}:${scope.ownerId}:${scope.periodKey}:${typeof key}:${String(key)}`;
  }
}
