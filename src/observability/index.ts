/**
 * Observability Module
 *
 * Re-exports logging, metrics, and health components.
 */

export * from './logger.js';
export * from './metrics.js';
export * from './health.js';
