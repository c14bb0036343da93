/**
 * Pending set and backpressure enforcement.
 *
 * Tracks operations that were unresolved when they were registered. Entries
 * may settle at any time; they are only removed by the filter pass at the
 * start of each forced drain.
 *
 * When one record expands into many slow operations, the set grows faster
 * than it drains. forceDrain bounds it: the oldest entries beyond the
 * threshold are awaited, for at most `maxWaitMs`.
 */

import { OperationTimeoutError } from './errors';
import type { PendingOperation } from './operation';

export interface PendingSetOptions {
  maxWaiting: number;
  maxWaitMs: number;
  onError: (error: Error, context: string) => void;
  debug?: boolean;
}

export interface ForceDrainReport {
  /** Settled entries dropped by the filter pass */
  removed: number;
  /** Oldest entries that were awaited */
  forced: number;
  timedOut: boolean;
  /** Entries added while the pass was waiting, appended after it */
  arrived: number;
}

export class PendingSet {
  private entries: PendingOperation[] = [];
  /** Additions made during a forced wait; null when no pass is running */
  private arrivals: PendingOperation[] | null = null;
  private options: Required<PendingSetOptions>;

  constructor(options: PendingSetOptions) {
    this.options = { ...options, debug: options.debug ?? false };
  }

  add(operation: PendingOperation): void {
    if (this.arrivals) {
      this.arrivals.push(operation);
    } else {
      this.entries.push(operation);
    }
  }

  removeSettled(): number {
    const before = this.entries.length;
    this.entries = this.entries.filter((op) => !op.settled);
    return before - this.entries.length;
  }

  /** Remove and return the oldest entries so that at most `max` remain. */
  trimTo(max: number): PendingOperation[] {
    const excess = this.entries.length - max;
    if (excess <= 0) return [];
    return this.entries.splice(0, excess);
  }

  /** Put unsettled entries back at the head, keeping their order. */
  restoreFront(operations: PendingOperation[]): void {
    const unsettled = operations.filter((op) => !op.settled);
    if (unsettled.length > 0) {
      this.entries = [...unsettled, ...this.entries];
    }
  }

  /**
   * The entries present when the pass starts never grow: afterwards
   * `size() - arrived` is at most the size before the pass.
   */
  async forceDrain(): Promise<ForceDrainReport> {
    const { maxWaiting, maxWaitMs, onError, debug } = this.options;

    const removed = this.removeSettled();
    const toForce = this.trimTo(maxWaiting);
    if (toForce.length === 0) {
      return { removed, forced: 0, timedOut: false, arrived: 0 };
    }

    if (debug) {
      console.log(`[PendingSet] Forcing ${toForce.length} operations, ${this.entries.length} left pending`);
    }

    const arrivals: PendingOperation[] = [];
    this.arrivals = arrivals;
    let completed: boolean;
    try {
      completed = await waitAll(toForce, maxWaitMs);
    } finally {
      this.arrivals = null;
    }

    if (!completed) {
      onError(new OperationTimeoutError(toForce.length, maxWaitMs), 'forceDrain');
      // timed-out operations keep running; retry them on the next pass
      this.restoreFront(toForce);
    }
    this.entries.push(...arrivals);

    if (debug && arrivals.length > 0) {
      console.log(`[PendingSet] ${arrivals.length} operations arrived during the forced wait`);
    }

    return { removed, forced: toForce.length, timedOut: !completed, arrived: arrivals.length };
  }

  size(): number { return this.entries.length + (this.arrivals?.length ?? 0); }
  isEmpty(): boolean { return this.size() === 0; }
}

/** Resolves true once every operation settles, false if `timeoutMs` elapses first. */
function waitAll(operations: PendingOperation[], timeoutMs: number): Promise<boolean> {
  return new Promise((resolve) => {
    const timer = setTimeout(() => resolve(false), timeoutMs);
    void Promise.all(operations.map((op) => op.done)).then(() => {
      clearTimeout(timer);
      resolve(true);
    });
  });
}
