/**
 * Prometheus Metrics
 *
 * Counters and gauges for the poll loop, push listener, query and command
 * paths, served from the metrics endpoint.
 */

import {
  Registry,
  Counter,
  Gauge,
  Histogram,
  collectDefaultMetrics,
} from 'prom-client';

// -----------------------------------------------------------------------------
// Registry
// -----------------------------------------------------------------------------

const registry = new Registry();

collectDefaultMetrics({ register: registry });

// -----------------------------------------------------------------------------
// Poll Metrics
// -----------------------------------------------------------------------------

export const pollTicksTotal = new Counter({
  name: 'hub_sync_poll_ticks_total',
  help: 'Full-refresh ticks by result',
  labelNames: ['result'] as const,
  registers: [registry],
});

export const pollAttemptsTotal = new Counter({
  name: 'hub_sync_poll_attempts_total',
  help: 'Individual enumeration attempts, including retries',
  registers: [registry],
});

// -----------------------------------------------------------------------------
// Push Metrics
// -----------------------------------------------------------------------------

export const pushEventsTotal = new Counter({
  name: 'hub_sync_push_events_total',
  help: 'Push events by outcome',
  labelNames: ['outcome'] as const,
  registers: [registry],
});

export const listenerReconnectsTotal = new Counter({
  name: 'hub_sync_listener_reconnects_total',
  help: 'Push listener reconnect attempts',
  registers: [registry],
});

export const listenerGiveUpsTotal = new Counter({
  name: 'hub_sync_listener_give_ups_total',
  help: 'Times the push listener exhausted its retries',
  registers: [registry],
});

// -----------------------------------------------------------------------------
// Snapshot Metrics
// -----------------------------------------------------------------------------

export const availabilityGauge = new Gauge({
  name: 'hub_sync_available',
  help: 'Coordinator availability (1 = available, 0 = unavailable)',
  registers: [registry],
});

export const devicesGauge = new Gauge({
  name: 'hub_sync_devices_current',
  help: 'Devices currently held in the snapshot',
  registers: [registry],
});

// -----------------------------------------------------------------------------
// Command & Query Metrics
// -----------------------------------------------------------------------------

export const commandsTotal = new Counter({
  name: 'hub_sync_commands_total',
  help: 'Device state writes by status',
  labelNames: ['status'] as const,
  registers: [registry],
});

export const commandDuration = new Histogram({
  name: 'hub_sync_command_duration_seconds',
  help: 'Device state write duration in seconds',
  buckets: [0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5],
  registers: [registry],
});

export const queriesTotal = new Counter({
  name: 'hub_sync_device_queries_total',
  help: 'Single-device queries by result',
  labelNames: ['result'] as const,
  registers: [registry],
});

// -----------------------------------------------------------------------------
// Export Functions
// -----------------------------------------------------------------------------

/**
 * Get metrics in Prometheus format.
 */
export async function getMetrics(): Promise<string> {
  return registry.metrics();
}

/**
 * Get content type for Prometheus endpoint.
 */
export function getContentType(): string {
  return registry.contentType;
}

// -----------------------------------------------------------------------------
// Convenience Functions
// -----------------------------------------------------------------------------

export function recordPollTick(result: 'success' | 'failure'): void {
  pollTicksTotal.labels(result).inc();
}

export function recordPollAttempt(): void {
  pollAttemptsTotal.inc();
}

export function recordPushEvent(outcome: 'applied' | 'dropped' | 'malformed' | 'refresh'): void {
  pushEventsTotal.labels(outcome).inc();
}

export function recordListenerReconnect(): void {
  listenerReconnectsTotal.inc();
}

export function recordListenerGiveUp(): void {
  listenerGiveUpsTotal.inc();
}

export function updateAvailability(available: boolean): void {
  availabilityGauge.set(available ? 1 : 0);
}

export function updateDeviceCount(count: number): void {
  devicesGauge.set(count);
}

export function recordCommand(status: 'success' | 'skipped' | 'rejected' | 'timeout' | 'error'): void {
  commandsTotal.labels(status).inc();
}

/**
 * Start timing a command; call the returned function when it settles.
 */
export function timeCommand(): () => void {
  const end = commandDuration.startTimer();
  return () => {
    end();
  };
}

export function recordQuery(result: 'success' | 'failure'): void {
  queriesTotal.labels(result).inc();
}
