/**
 * Flat-map stage: the common case of one record in, one completion group out.
 */

import { AsyncStage, type FanOut, type OutputOperation } from './async-stage';
import type { AsyncStageConfig } from './config';
import type { EmissionSink } from './emission';
import type { Decoder, HostInput } from './host';
import { isThenable, type MaybePromise, type Timestamped } from './operation';

export type FlatMapFn<I, O> = (value: I) => MaybePromise<Iterable<O>>;

export interface FlatMapStageOptions<Raw, I, O> {
  decoder: Decoder<Raw, I>;
  flatMap: FlatMapFn<I, O>;
  sink: EmissionSink<HostInput<Raw>, O>;
  config?: AsyncStageConfig;
}

/**
 * Every output inherits the timestamp of the record it came from. A throwing
 * or rejecting `flatMap` fails that record's group only.
 */
export function createFlatMapStage<Raw, I, O>(options: FlatMapStageOptions<Raw, I, O>): AsyncStage<Raw, I, O> {
  const { flatMap } = options;

  return new AsyncStage<Raw, I, O>({
    decoder: options.decoder,
    sink: options.sink,
    config: options.config,
    apply: (handle, { timestamp, value }) => {
      const fanOut: FanOut<HostInput<Raw>, O> = [[[handle], stampOutputs(() => flatMap(value), timestamp)]];
      return fanOut;
    },
  });
}

function stampOutputs<O>(run: () => MaybePromise<Iterable<O>>, timestamp: number): OutputOperation<O> {
  let produced: MaybePromise<Iterable<O>>;
  try {
    produced = run();
  } catch (error) {
    return Promise.reject(error);
  }

  const stamp = (values: Iterable<O>): Timestamped<O>[] =>
    Array.from(values, (value) => ({ timestamp, value }));

  return isThenable(produced) ? produced.then(stamp) : stamp(produced);
}
