/**
 * Emission sinks: where drained completions go.
 *
 * The stage calls a sink exactly once per completion group, and only from
 * inside `invoke`.
 */

import type { CompletionGroup } from './completion-queue';
import type { Timestamped } from './operation';

export interface EmissionSink<H, O> {
  onSuccess(group: CompletionGroup<H>, outputs: readonly Timestamped<O>[]): void;
  onFailure(group: CompletionGroup<H>, error: Error): void;
}

// ============ COLLECTOR SINK ============

/** Host-side output channel: downstream emission plus acknowledgment of inputs. */
export interface OutputCollector<H, Encoded> {
  emit(anchors: readonly H[] | null, values: Encoded): void;
  ack(handle: H): void;
  fail(handle: H): void;
  reportError(error: Error): void;
}

export type Encoder<O, Encoded> = (output: Timestamped<O>) => Encoded;

export interface CollectorSinkOptions<H, O, Encoded> {
  collector: OutputCollector<H, Encoded>;
  encoder: Encoder<O, Encoded>;
  /** Anchor every emitted output to the inputs of its group */
  anchorOutputs?: boolean;
  /** Without dependants nothing is emitted, inputs are only acked */
  hasDependants?: boolean;
  debug?: boolean;
}

export class CollectorSink<H, O, Encoded> implements EmissionSink<H, O> {
  private collector: OutputCollector<H, Encoded>;
  private encoder: Encoder<O, Encoded>;
  private anchorOutputs: boolean;
  private hasDependants: boolean;
  private debug: boolean;

  constructor(options: CollectorSinkOptions<H, O, Encoded>) {
    this.collector = options.collector;
    this.encoder = options.encoder;
    this.anchorOutputs = options.anchorOutputs ?? true;
    this.hasDependants = options.hasDependants ?? true;
    this.debug = options.debug ?? false;
  }

  onSuccess(group: CompletionGroup<H>, outputs: readonly Timestamped<O>[]): void {
    let emitCount = 0;
    if (this.hasDependants) {
      const anchors = this.anchorOutputs ? group : null;
      for (const output of outputs) {
        this.collector.emit(anchors, this.encoder(output));
        emitCount++;
      }
    }

    // inputs are acked on completion even when nothing was emitted
    for (const handle of group) {
      this.collector.ack(handle);
    }

    if (this.debug) {
      console.log(`[CollectorSink] Finished ${group.length} linked inputs, emitted ${emitCount}`);
    }
  }

  onFailure(group: CompletionGroup<H>, error: Error): void {
    for (const handle of group) {
      this.collector.fail(handle);
    }
    this.collector.reportError(error);

    if (this.debug) {
      console.log(`[CollectorSink] ${group.length} linked inputs failed: ${error.message}`);
    }
  }
}

// ============ RECORDING SINK ============

export type Emission<H, O> =
  | { kind: 'success'; group: CompletionGroup<H>; outputs: readonly Timestamped<O>[] }
  | { kind: 'failure'; group: CompletionGroup<H>; error: Error };

export interface RecordingSink<H, O> extends EmissionSink<H, O> {
  readonly emissions: Emission<H, O>[];
  clear(): void;
}

/** Keeps every emission in memory, in emission order. */
export function createRecordingSink<H, O>(): RecordingSink<H, O> {
  const emissions: Emission<H, O>[] = [];
  return {
    emissions,
    onSuccess: (group, outputs) => {
      emissions.push({ kind: 'success', group, outputs });
    },
    onFailure: (group, error) => {
      emissions.push({ kind: 'failure', group, error });
    },
    clear: () => {
      emissions.length = 0;
    },
  };
}
