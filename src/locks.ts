/**
 * @fileoverview Owner Read/Write Locks
 *
 * Serializes every reconciliation and replica write for one owner, while
 * letting read-only loads for display run side by side.
 *
 * Locks live in a fixed pool and an owner maps onto a slot by hash, so the
 * registry never grows with the number of owners. Two owners that share a
 * slot are serialized against each other; that only costs throughput.
 *
 * Writers are preferred: once a writer is queued, newly arriving readers wait
 * behind it, so a background merge cannot be starved by a stream of reads.
 *
 * The locks are not re-entrant. Code running under an owner's write lock must
 * not ask for any lock of an owner in the same slot, the holder included;
 * check {@link OwnerLockRegistry.slotFor} before taking a second lock.
 */

import { debugLog } from './debug';
import { hashString } from './utils';

// =============================================================================
// Types
// =============================================================================

export type LockMode = 'read' | 'write';

export interface OwnerLockRegistryOptions {
  /** Number of lock slots. Default: 64 */
  poolSize?: number;
}

interface Waiter {
  mode: LockMode;
  grant: () => void;
  queuedAt: number;
}

export interface LockMetrics {
  readsAcquired: number;
  writesAcquired: number;
  totalWaitTimeMs: number;
  queueDepthMax: number;
}

// =============================================================================
// Single Lock
// =============================================================================

/**
 * An async read/write lock with writer preference.
 */
export class ReadWriteLock {
  private readers = 0;
  private writer = false;
  private queue: Waiter[] = [];

  constructor(private readonly metrics: LockMetrics) {}

  acquire(mode: LockMode): Promise<void> {
    if (this.queue.length === 0 && this.canGrant(mode)) {
      this.take(mode, Date.now());
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.queue.push({ mode, grant: resolve, queuedAt: Date.now() });
      this.metrics.queueDepthMax = Math.max(this.metrics.queueDepthMax, this.queue.length);
    });
  }

  release(mode: LockMode): void {
    if (mode === 'write') {
      this.writer = false;
    } else {
      this.readers = Math.max(0, this.readers - 1);
    }
    this.drain();
  }

  /** Whether anything holds or waits for this lock. */
  isIdle(): boolean {
    return !this.writer && this.readers === 0 && this.queue.length === 0;
  }

  get pending(): number {
    return this.queue.length;
  }

  private canGrant(mode: LockMode): boolean {
    if (this.writer) return false;
    return mode === 'read' || this.readers === 0;
  }

  private take(mode: LockMode, queuedAt: number): void {
    if (mode === 'write') {
      this.writer = true;
      this.metrics.writesAcquired++;
    } else {
      this.readers++;
      this.metrics.readsAcquired++;
    }
    this.metrics.totalWaitTimeMs += Date.now() - queuedAt;
  }

  private drain(): void {
    // grant the head; keep granting while it is a run of readers
    while (this.queue.length > 0) {
      const head = this.queue[0];
      if (!this.canGrant(head.mode)) return;
      this.queue.shift();
      this.take(head.mode, head.queuedAt);
      head.grant();
      if (head.mode === 'write') return;
    }
  }
}

// =============================================================================
// Registry
// =============================================================================

export class OwnerLockRegistry {
  private readonly slots: ReadWriteLock[];
  private readonly metrics: LockMetrics = {
    readsAcquired: 0,
    writesAcquired: 0,
    totalWaitTimeMs: 0,
    queueDepthMax: 0
  };

  constructor(options: OwnerLockRegistryOptions = {}) {
    const poolSize = options.poolSize ?? 64;
    if (!Number.isInteger(poolSize) || poolSize < 1) {
      throw new RangeError(`Lock pool size must be a positive integer, got ${poolSize}`);
    }
    this.slots = Array.from({ length: poolSize }, () => new ReadWriteLock(this.metrics));
  }

  get poolSize(): number {
    return this.slots.length;
  }

  /**
   * Slot index an owner maps to. Owners with the same slot share one lock, so
   * holding either one's write lock blocks every lock request for the other.
   */
  slotFor(ownerId: string): number {
    return hashString(ownerId) % this.slots.length;
  }

  /** Run `fn` holding the owner's shared lock. */
  withReadLock<T>(ownerId: string, fn: () => Promise<T> | T): Promise<T> {
    return this.run(ownerId, 'read', fn);
  }

  /** Run `fn` holding the owner's exclusive lock. */
  withWriteLock<T>(ownerId: string, fn: () => Promise<T> | T): Promise<T> {
    return this.run(ownerId, 'write', fn);
  }

  getMetrics(): LockMetrics & { poolSize: number; busySlots: number; queuedRequests: number } {
    let busySlots = 0;
    let queuedRequests = 0;
    for (const slot of this.slots) {
      if (!slot.isIdle()) busySlots++;
      queuedRequests += slot.pending;
    }
    return { ...this.metrics, poolSize: this.slots.length, busySlots, queuedRequests };
  }

  private async run<T>(ownerId: string, mode: LockMode, fn: () => Promise<T> | T): Promise<T> {
    const slot = this.slots[this.slotFor(ownerId)];
    await slot.acquire(mode);
    debugLog(`[Locks] ${mode} lock acquired for ${ownerId}`);
    try {
      return await fn();
    } finally {
      slot.release(mode);
    }
  }
}
