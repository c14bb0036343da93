/**
 * Error types raised by an async stage.
 *
 * Fatal conditions (decode and dispatch failures) reject `invoke`.
 * Everything else is reported through the stage's `onError` hook.
 */

export class StageError extends Error {
  readonly context: string;

  constructor(message: string, context: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StageError';
    this.context = context;
  }
}

/** The decoder rejected a record's raw payload. */
export class DecodeError extends StageError {
  constructor(streamId: string, cause: unknown) {
    super(`Failed to decode record from stream "${streamId}"`, 'decode', { cause });
    this.name = 'DecodeError';
  }
}

/** The processing function (or tick hook) failed before yielding any operations. */
export class DispatchError extends StageError {
  constructor(kind: 'record' | 'tick', cause: unknown) {
    super(`Dispatch of ${kind} failed: ${toError(cause).message}`, 'dispatch', { cause });
    this.name = 'DispatchError';
  }
}

export class OperationTimeoutError extends StageError {
  readonly waitedOn: number;
  readonly timeoutMs: number;

  constructor(waitedOn: number, timeoutMs: number) {
    super(`forceDrain failed on ${waitedOn} operations after ${timeoutMs}ms`, 'forceDrain');
    this.name = 'OperationTimeoutError';
    this.waitedOn = waitedOn;
    this.timeoutMs = timeoutMs;
  }
}

export class ReleasedInputError extends StageError {
  constructor(streamId: string) {
    super(`Input from stream "${streamId}" was already consumed`, 'host');
    this.name = 'ReleasedInputError';
  }
}

export class OverlappingInvocationError extends StageError {
  constructor() {
    super('invoke called while a previous invocation is still running', 'invoke');
    this.name = 'OverlappingInvocationError';
  }
}

export function toError(value: unknown): Error {
  if (value instanceof Error) return value;
  return new Error(typeof value === 'string' ? value : `Non-error value thrown: ${String(value)}`);
}
