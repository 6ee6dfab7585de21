/**
 * Sync Module
 *
 * Re-exports the coordinator and its tasks.
 */

export * from './types.js';
export * from './errors.js';
export * from './retry.js';
export * from './context.js';
export * from './supervised-task.js';
export * from './push-listener.js';
export * from './poll-loop.js';
export * from './device-query.js';
export * from './command-path.js';
export * from './coordinator.js';
