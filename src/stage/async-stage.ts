/**
 * AsyncStage: asynchronous execution controller for one streaming node.
 *
 * The host calls `invoke` once per input record or tick and awaits it before
 * calling again. Each invocation:
 * - decodes the record (a failure rejects the invocation, nothing is dispatched)
 * - dispatches it to `apply` (or the tick hook)
 * - registers the returned operations; unresolved ones join the pending set
 * - drains: forces the oldest pending operations beyond the threshold, then
 *   emits every queued completion to the sink
 *
 * Operations resolve on their own schedule and only push onto the completion
 * queue. The sink is called from `drainAndEmit` alone, so downstream sees a
 * single writer no matter when operations settle.
 */

import { CompletionQueue, type CompletionGroup, type CompletionResult } from './completion-queue';
import { resolveStageConfig, type AsyncStageConfig, type ResolvedStageConfig } from './config';
import type { EmissionSink } from './emission';
import { DecodeError, DispatchError, OverlappingInvocationError, toError } from './errors';
import { isTick, type Decoder, type HostInput } from './host';
import { trackOperation, type MaybePromise, type OperationResult, type Timestamped } from './operation';
import { PendingSet } from './pending-set';

// ============ TYPES ============

export type OutputOperation<O> = MaybePromise<Iterable<Timestamped<O>>>;

/** One entry per completion group a dispatch fans out into. */
export type FanOut<H, O> = Iterable<readonly [CompletionGroup<H>, OutputOperation<O>]>;

export type ApplyFn<Raw, I, O> = (
  handle: HostInput<Raw>,
  record: Timestamped<I>
) => MaybePromise<FanOut<HostInput<Raw>, O>>;

export type TickFn<Raw, O> = () => MaybePromise<FanOut<HostInput<Raw>, O>>;

export interface AsyncStageOptions<Raw, I, O> {
  decoder: Decoder<Raw, I>;
  apply: ApplyFn<Raw, I, O>;
  /** Called on tick inputs; defaults to producing no operations */
  tick?: TickFn<Raw, O>;
  sink: EmissionSink<HostInput<Raw>, O>;
  config?: AsyncStageConfig;
}

export interface AsyncStageStats {
  /** Decoded records and ticks; a decode failure is not counted */
  invocations: number;
  pendingOperations: number;
  queuedCompletions: number;
  emittedSuccesses: number;
  emittedFailures: number;
  forcedDrains: number;
  drainTimeouts: number;
}

// ============ ASYNC STAGE ============

export class AsyncStage<Raw, I, O> {
  private decoder: Decoder<Raw, I>;
  private applyFn: ApplyFn<Raw, I, O>;
  private tickFn: TickFn<Raw, O>;
  private sink: EmissionSink<HostInput<Raw>, O>;
  private config: ResolvedStageConfig;

  private pending: PendingSet;
  private completions: CompletionQueue<HostInput<Raw>, O>;

  private invoking = false;
  /** First dispatch failure not yet surfaced to the host */
  private fatal: DispatchError | null = null;

  private invocations = 0;
  private emittedSuccesses = 0;
  private emittedFailures = 0;
  private forcedDrains = 0;
  private drainTimeouts = 0;

  constructor(options: AsyncStageOptions<Raw, I, O>) {
    this.decoder = options.decoder;
    this.applyFn = options.apply;
    this.tickFn = options.tick ?? (() => []);
    this.sink = options.sink;
    this.config = resolveStageConfig(options.config);

    this.pending = new PendingSet({
      maxWaiting: this.config.maxWaitingOperations,
      maxWaitMs: this.config.maxWaitTimeMs,
      onError: this.config.onError,
      debug: this.config.debug,
    });
    this.completions = new CompletionQueue(this.config.debug);
  }

  async invoke(input: HostInput<Raw>): Promise<void> {
    if (this.invoking) {
      throw new OverlappingInvocationError();
    }

    this.invoking = true;
    try {
      this.dispatch(input);

      // always drain, even on tick: earlier operations may have settled since
      await this.drain();

      const fatal = this.fatal;
      if (fatal) {
        this.fatal = null;
        throw fatal;
      }
    } finally {
      this.invoking = false;
    }
  }

  getStats(): AsyncStageStats {
    return {
      invocations: this.invocations,
      pendingOperations: this.pending.size(),
      queuedCompletions: this.completions.size(),
      emittedSuccesses: this.emittedSuccesses,
      emittedFailures: this.emittedFailures,
      forcedDrains: this.forcedDrains,
      drainTimeouts: this.drainTimeouts,
    };
  }

  // ============ DISPATCH ============

  private dispatch(input: HostInput<Raw>): void {
    const tick = isTick(input);

    let record: Timestamped<I> | null = null;
    if (!tick) {
      try {
        record = this.decoder(input.consume());
      } catch (error) {
        throw new DecodeError(input.streamId, error);
      }
    }
    this.invocations++;

    let result: MaybePromise<FanOut<HostInput<Raw>, O>>;
    try {
      result = record === null ? this.tickFn() : this.applyFn(input, record);
    } catch (error) {
      this.failDispatch(input, tick, error);
      return;
    }

    const outer = trackOperation(result, (outcome) => {
      if (!outcome.ok) {
        this.failDispatch(input, tick, outcome.error);
        return;
      }
      try {
        this.register(outcome.value);
      } catch (error) {
        this.failDispatch(input, tick, error);
      }
    });
    if (outer) {
      this.pending.add(outer);
    }
  }

  private register(fanOut: FanOut<HostInput<Raw>, O>): void {
    let added = 0;
    for (const [group, operation] of fanOut) {
      const op = trackOperation(operation, (outcome) => {
        this.completions.push(group, collectOutputs(outcome));
      });
      if (op) {
        this.pending.add(op);
        added++;
      }
    }

    const pendingCount = this.pending.size();
    if (pendingCount > this.config.maxWaitingOperations) {
      // large fan-out; maxWaitingOperations may be too low
      if (this.config.debug) {
        console.log(
          `[AsyncStage] Exceeded maxWaitingOperations(${this.config.maxWaitingOperations}), put ${added} operations`
        );
      }
      this.config.onBackpressure(pendingCount, added);
    }
  }

  /**
   * Records a failure completion for the triggering input, then marks the
   * failure fatal. The current or next drain emits it before `invoke` rejects.
   */
  private failDispatch(input: HostInput<Raw>, tick: boolean, cause: unknown): void {
    const group: CompletionGroup<HostInput<Raw>> = tick ? [] : [input];
    this.completions.push(group, { ok: false, error: toError(cause) });
    this.fatal = this.fatal ?? new DispatchError(tick ? 'tick' : 'record', cause);
  }

  // ============ DRAIN ============

  private async drain(): Promise<void> {
    const report = await this.pending.forceDrain();
    if (report.forced > 0) this.forcedDrains++;
    if (report.timedOut) this.drainTimeouts++;

    this.drainAndEmit();
  }

  /**
   * The only place the sink is called. A success path that throws partway
   * through a group is reported, then the group goes down the failure path
   * so its inputs are still failed.
   */
  private drainAndEmit(): void {
    for (const { group, result } of this.completions.drainAll()) {
      if (!result.ok) {
        this.emitFailure(group, result.error);
        continue;
      }
      try {
        this.sink.onSuccess(group, result.value);
        this.emittedSuccesses++;
      } catch (error) {
        const failure = toError(error);
        this.config.onError(failure, 'emit');
        this.emitFailure(group, failure);
      }
    }
  }

  private emitFailure(group: CompletionGroup<HostInput<Raw>>, error: Error): void {
    try {
      this.sink.onFailure(group, error);
      this.emittedFailures++;
    } catch (sinkError) {
      this.config.onError(toError(sinkError), 'emit');
    }
  }
}

function collectOutputs<O>(outcome: OperationResult<Iterable<Timestamped<O>>>): CompletionResult<O> {
  if (!outcome.ok) return outcome;
  try {
    return { ok: true, value: Array.from(outcome.value) };
  } catch (error) {
    return { ok: false, error: toError(error) };
  }
}
