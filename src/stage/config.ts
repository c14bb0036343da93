/**
 * Stage configuration and defaults.
 */

export interface AsyncStageConfig {
  /** Pending operations tolerated before a drain forces the oldest ones */
  maxWaitingOperations?: number;
  /** Upper bound (ms) on one forced drain */
  maxWaitTimeMs?: number;
  /** Enable debug logging */
  debug?: boolean;
  /** Callback for non-fatal errors: sink failures, drain timeouts */
  onError?: (error: Error, context: string) => void;
  /** Callback when a dispatch leaves more pending operations than the threshold */
  onBackpressure?: (pending: number, added: number) => void;
}

export type ResolvedStageConfig = Required<AsyncStageConfig>;

export const DEFAULT_MAX_WAITING_OPERATIONS = 10;
export const DEFAULT_MAX_WAIT_TIME_MS = 60_000;

export function resolveStageConfig(config: AsyncStageConfig = {}): ResolvedStageConfig {
  const maxWaitingOperations = config.maxWaitingOperations ?? DEFAULT_MAX_WAITING_OPERATIONS;
  const maxWaitTimeMs = config.maxWaitTimeMs ?? DEFAULT_MAX_WAIT_TIME_MS;

  if (!Number.isInteger(maxWaitingOperations) || maxWaitingOperations < 0) {
    throw new RangeError(
      `maxWaitingOperations must be a non-negative integer, received: ${maxWaitingOperations}`
    );
  }
  if (!Number.isFinite(maxWaitTimeMs) || maxWaitTimeMs <= 0) {
    throw new RangeError(`maxWaitTimeMs must be a positive number, received: ${maxWaitTimeMs}`);
  }

  return {
    maxWaitingOperations,
    maxWaitTimeMs,
    debug: config.debug ?? false,
    onError: config.onError ?? ((err, ctx) => console.error(`[AsyncStage] Error in ${ctx}:`, err)),
    onBackpressure: config.onBackpressure ?? (() => {}),
  };
}
