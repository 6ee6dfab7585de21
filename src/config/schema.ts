/**
 * Configuration Schema
 *
 * Zod schema definitions for configuration validation.
 */

import { z } from 'zod';

// -----------------------------------------------------------------------------
// Hub Connection Config Schema
// -----------------------------------------------------------------------------

export const HubConfigSchema = z.object({
  host: z.string().min(1).default('localhost'),
  port: z.number().int().min(1).max(65535).default(8888),
  path: z.string().startsWith('/').default('/'),
  connectTimeout: z.number().int().min(100).max(60000).default(5000),
  requestTimeout: z.number().int().min(100).max(60000).default(5000),
  maxQueuedUpdates: z.number().int().min(1).max(100000).default(1000),
});

// -----------------------------------------------------------------------------
// Sync Config Schema
// -----------------------------------------------------------------------------

export const RetryPolicySchema = z.object({
  attempts: z.number().int().min(1).max(10).default(3),
  timeout: z.number().int().min(100).max(60000).default(1000),
  retryDelay: z.number().int().min(0).max(60000).default(1000),
});

export const PushConfigSchema = z.object({
  enabled: z.boolean().default(true),
  mode: z.enum(['merge', 'refresh']).default('merge'),
  maxRetries: z.number().int().min(1).max(100).default(5),
  baseDelay: z.number().int().min(0).max(60000).default(1000),
  resetTimeout: z.number().int().min(100).max(60000).default(2000),
});

export const SyncConfigSchema = z.object({
  scanInterval: z.number().int().min(1000).max(3600000).default(30000),
  poll: RetryPolicySchema.default({}),
  query: RetryPolicySchema.default({}),
  commandTimeout: z.number().int().min(100).max(60000).default(2000),
  push: PushConfigSchema.default({}),
});

// -----------------------------------------------------------------------------
// Logging Config Schema
// -----------------------------------------------------------------------------

export const LoggingConfigSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  pretty: z.boolean().default(false),
});

// -----------------------------------------------------------------------------
// Metrics Config Schema
// -----------------------------------------------------------------------------

export const MetricsConfigSchema = z.object({
  enabled: z.boolean().default(true),
  port: z.number().int().min(1).max(65535).default(9090),
  path: z.string().default('/metrics'),
});

// -----------------------------------------------------------------------------
// Health Config Schema
// -----------------------------------------------------------------------------

export const HealthConfigSchema = z.object({
  enabled: z.boolean().default(true),
  port: z.number().int().min(1).max(65535).default(9091),
  checkInterval: z.number().int().min(5000).max(300000).default(30000),
});

// -----------------------------------------------------------------------------
// Full Configuration Schema
// -----------------------------------------------------------------------------

export const HubSyncConfigSchema = z.object({
  // General
  name: z.string().min(1).default('hub-sync'),
  environment: z.enum(['development', 'production', 'test']).default('development'),

  // Hub
  hub: HubConfigSchema.default({}),
  sync: SyncConfigSchema.default({}),

  // Observability
  logging: LoggingConfigSchema.default({}),
  metrics: MetricsConfigSchema.default({}),
  health: HealthConfigSchema.default({}),
});

// -----------------------------------------------------------------------------
// Type Exports
// -----------------------------------------------------------------------------

export type HubConfig = z.infer<typeof HubConfigSchema>;
export type RetryPolicyConfig = z.infer<typeof RetryPolicySchema>;
export type PushConfig = z.infer<typeof PushConfigSchema>;
export type SyncConfig = z.infer<typeof SyncConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type MetricsConfig = z.infer<typeof MetricsConfigSchema>;
export type HealthConfig = z.infer<typeof HealthConfigSchema>;
export type HubSyncConfig = z.infer<typeof HubSyncConfigSchema>;
