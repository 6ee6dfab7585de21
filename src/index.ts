/**
 * LifeSmart Hub Sync
 *
 * Keeps a local snapshot of a LifeSmart hub's devices current by combining a
 * periodic full poll with the hub's push stream, and serialises direct
 * device queries and state writes over one connection.
 *
 * @packageDocumentation
 */

// Core components
export * from './core/index.js';

// Hub client and simulator
export * from './client/index.js';

// Consumer entities
export * from './entities/index.js';

// Observability
export * from './observability/index.js';

// Configuration
export * from './config/index.js';

// Service
export { HubSyncService, VERSION, toCoordinatorOptions } from './service.js';
