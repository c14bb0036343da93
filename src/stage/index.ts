/**
 * async-stage: asynchronous execution controller for a streaming node.
 *
 * Core concepts:
 * - Operation: a value or a promise producing timestamped outputs
 * - Completion group: the inputs an operation's result is reported against
 * - Pending set: operations still in flight, bounded by forced drains
 * - Completion queue: settled results waiting for the next invocation to emit them
 */

export * from './operation';
export * from './completion-queue';
export * from './pending-set';
export * from './emission';
export * from './host';
export * from './config';
export * from './errors';
export * from './async-stage';
export * from './flat-map-stage';
