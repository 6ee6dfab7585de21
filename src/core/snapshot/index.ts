/**
 * Snapshot Module
 *
 * Re-exports the snapshot store and device types.
 */

export * from './types.js';
export * from './store.js';
