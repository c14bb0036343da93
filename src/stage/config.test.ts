/**
 * Stage configuration tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { DEFAULT_MAX_WAIT_TIME_MS, DEFAULT_MAX_WAITING_OPERATIONS, resolveStageConfig } from './config';

describe('resolveStageConfig', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should fill in defaults', () => {
    const config = resolveStageConfig();

    expect(config.maxWaitingOperations).toBe(DEFAULT_MAX_WAITING_OPERATIONS);
    expect(config.maxWaitTimeMs).toBe(DEFAULT_MAX_WAIT_TIME_MS);
    expect(config.debug).toBe(false);
  });

  it('should keep explicit values', () => {
    const onError = vi.fn();
    const config = resolveStageConfig({ maxWaitingOperations: 0, maxWaitTimeMs: 250, debug: true, onError });

    expect(config.maxWaitingOperations).toBe(0);
    expect(config.maxWaitTimeMs).toBe(250);
    expect(config.debug).toBe(true);
    expect(config.onError).toBe(onError);
  });

  it('should reject invalid thresholds', () => {
    expect(() => resolveStageConfig({ maxWaitingOperations: -1 })).toThrow(RangeError);
    expect(() => resolveStageConfig({ maxWaitingOperations: 1.5 })).toThrow(RangeError);
    expect(() => resolveStageConfig({ maxWaitingOperations: -7 })).toThrow('-7');
  });

  it('should reject invalid wait times', () => {
    expect(() => resolveStageConfig({ maxWaitTimeMs: 0 })).toThrow(RangeError);
    expect(() => resolveStageConfig({ maxWaitTimeMs: NaN })).toThrow(RangeError);
    expect(() => resolveStageConfig({ maxWaitTimeMs: Infinity })).toThrow('Infinity');
  });

  it('should log errors to the console by default', () => {
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {});
    const error = new Error('sink closed');

    resolveStageConfig().onError(error, 'emit');

    expect(consoleError).toHaveBeenCalledWith('[AsyncStage] Error in emit:', error);
  });
});
