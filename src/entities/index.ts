/**
 * Entities Module
 */

export * from './switch.js';
