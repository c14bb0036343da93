/**
 * Asynchronous operations as seen by the stage.
 *
 * An operation is either a plain value (already resolved) or a thenable.
 * Promises cannot be inspected synchronously, so each thenable is wrapped in a
 * PendingOperation whose `settled` flag is flipped by its own continuation.
 */

import { toError } from './errors';

// ============ TYPES ============

export type MaybePromise<T> = T | PromiseLike<T>;

export interface Timestamped<T> {
  readonly timestamp: number;
  readonly value: T;
}

export type OperationResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: Error };

// ============ PENDING OPERATION ============

export class PendingOperation {
  readonly done: Promise<void>;
  private isSettled = false;

  constructor(settlement: PromiseLike<unknown>) {
    // `done` never rejects; failures are delivered through trackOperation's callback
    this.done = Promise.resolve(settlement).then(
      () => this.markSettled(),
      () => this.markSettled()
    );
  }

  get settled(): boolean {
    return this.isSettled;
  }

  private markSettled(): void {
    this.isSettled = true;
  }
}

// ============ TRACKING ============

export function isThenable<T>(value: MaybePromise<T>): value is PromiseLike<T> {
  if (value === null || (typeof value !== 'object' && typeof value !== 'function')) {
    return false;
  }
  return 'then' in value && typeof value.then === 'function';
}

/**
 * Attach `onResult` to an operation. Resolved values invoke it synchronously
 * and return null; thenables return a PendingOperation that settles after
 * `onResult` has run.
 */
export function trackOperation<T>(
  operation: MaybePromise<T>,
  onResult: (result: OperationResult<T>) => void
): PendingOperation | null {
  if (!isThenable(operation)) {
    onResult({ ok: true, value: operation });
    return null;
  }

  // adopt into a native promise: settles once even if a foreign `then`
  // calls back twice or throws
  const adopted = new Promise<T>((resolve, reject) => {
    operation.then(resolve, reject);
  });
  const settlement = adopted.then(
    (value) => onResult({ ok: true, value }),
    (error: unknown) => onResult({ ok: false, error: toError(error) })
  );
  return new PendingOperation(settlement);
}
