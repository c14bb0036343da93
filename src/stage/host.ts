/**
 * Host boundary: what the host hands to `invoke`.
 *
 * A host input doubles as the source handle that completions are reported
 * against, so it must stay usable after its payload is released.
 */

import { ReleasedInputError } from './errors';
import type { Timestamped } from './operation';

/** Stream id the host reserves for periodic tick signals. */
export const TICK_STREAM_ID = '__tick';

export interface HostInput<Raw> {
  readonly streamId: string;
  /**
   * Returns the raw payload and drops the input's reference to it. The input
   * itself is kept alive as an acknowledgment handle, the payload is not.
   */
  consume(): Raw;
}

export type Decoder<Raw, I> = (raw: Raw) => Timestamped<I>;

export function isTick<Raw>(input: HostInput<Raw>): boolean {
  return input.streamId === TICK_STREAM_ID;
}

class ReleasableInput<Raw> implements HostInput<Raw> {
  private payload: { raw: Raw } | null;

  constructor(readonly streamId: string, raw: Raw) {
    this.payload = { raw };
  }

  consume(): Raw {
    if (this.payload === null) {
      throw new ReleasedInputError(this.streamId);
    }
    const { raw } = this.payload;
    this.payload = null;
    return raw;
  }

  get released(): boolean {
    return this.payload === null;
  }
}

export function createHostInput<Raw>(streamId: string, raw: Raw): HostInput<Raw> & { readonly released: boolean } {
  return new ReleasableInput(streamId, raw);
}

export function createTick<Raw = never>(): HostInput<Raw> {
  return {
    streamId: TICK_STREAM_ID,
    consume(): Raw {
      throw new ReleasedInputError(TICK_STREAM_ID);
    },
  };
}
