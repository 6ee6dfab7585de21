/**
 * Core Module
 *
 * Re-exports all core components.
 */

export * from './snapshot/index.js';
export * from './sync/index.js';
