/**
 * Completion queue: results of finished operations, waiting to be emitted.
 *
 * Any continuation may push; only the stage's invocation drains. Draining
 * swaps the backing array, so entries pushed during emission wait for the
 * next drain instead of extending the current one.
 */

import type { OperationResult, Timestamped } from './operation';

export type CompletionGroup<H> = readonly H[];

export type CompletionResult<O> = OperationResult<readonly Timestamped<O>[]>;

export interface Completion<H, O> {
  /** Arrival order across the lifetime of the queue */
  sequence: number;
  group: CompletionGroup<H>;
  result: CompletionResult<O>;
  /** Date.now() at arrival */
  completedAt: number;
}

export class CompletionQueue<H, O> {
  private entries: Completion<H, O>[] = [];
  private sequence = 0;
  private debug: boolean;

  constructor(debug = false) {
    this.debug = debug;
  }

  push(group: CompletionGroup<H>, result: CompletionResult<O>): number {
    const seq = this.sequence++;
    this.entries.push({
      sequence: seq,
      group,
      result,
      completedAt: Date.now(),
    });

    if (this.debug) {
      console.log(`[CompletionQueue] Pushed seq=${seq} ok=${result.ok}, size=${this.entries.length}`);
    }

    return seq;
  }

  drainAll(): Completion<H, O>[] {
    const drained = this.entries;
    this.entries = [];

    if (this.debug && drained.length > 0) {
      console.log(`[CompletionQueue] Drained ${drained.length} completions`);
    }

    return drained;
  }

  size(): number { return this.entries.length; }
  getSequence(): number { return this.sequence; }
  clear(): void { this.entries = []; }
}
