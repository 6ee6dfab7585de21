/**
 * Hub Client Module
 */

export * from './types.js';
export * from './ws-client.js';
export * from './simulator.js';
