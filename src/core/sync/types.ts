/**
 * Sync Types
 *
 * The hub API surface consumed by the coordinator, coordinator configuration,
 * and the events the coordinator emits.
 */

import type { PushUpdateEvent } from '../snapshot/types.js';
import type { RetryPolicy } from './retry.js';

// -----------------------------------------------------------------------------
// Hub API
// -----------------------------------------------------------------------------

/**
 * A channel write, e.g. `{ idx: 'L1', type: '0x81', val: 1 }`.
 */
export interface ChannelCommand {
  idx: string;
  val: unknown;
  type?: string;
  [key: string]: unknown;
}

export interface CommandResponse {
  /** 0 on success */
  code: number;
  msg?: unknown;
}

/**
 * Capabilities the coordinator needs from a hub client. The client owns its
 * connection; the coordinator only asks for a fresh one via resetConnection().
 */
export interface HubApi {
  /** Full device enumeration; shape is normalised by the caller */
  discoverDevices(): Promise<unknown>;
  /** Single-device detail */
  discoverDevicesById(deviceId: string, timeoutMs: number): Promise<unknown>;
  /**
   * Wait for the next push event; rejects when the stream fails. Resolves to
   * null when there is nothing to report. Events are validated by the caller.
   */
  getStateUpdates(): Promise<unknown>;
  setDeviceState(deviceId: string, state: ChannelCommand, timeoutMs: number): Promise<CommandResponse>;
  /** Close and forget the current connection so the next call opens a new one */
  resetConnection(): Promise<void>;
}

// -----------------------------------------------------------------------------
// Configuration
// -----------------------------------------------------------------------------

export const PushMode = {
  /** Apply each delta to the cached device */
  MERGE: 'merge',
  /** Treat each delta as a trigger for a full refresh */
  REFRESH: 'refresh',
} as const;

export type PushMode = (typeof PushMode)[keyof typeof PushMode];

export interface PushListenerConfig {
  /** Consecutive failures before giving up */
  maxRetries: number;
  /** First backoff delay (ms); doubles per consecutive failure */
  baseDelayMs: number;
  /** Upper bound on the best-effort connection reset (ms) */
  resetTimeoutMs: number;
}

export const DEFAULT_PUSH_LISTENER_CONFIG: PushListenerConfig = {
  maxRetries: 5,
  baseDelayMs: 1000,
  resetTimeoutMs: 2000,
};

export interface SyncCoordinatorConfig {
  /** Poll period (ms) */
  scanIntervalMs: number;
  poll: RetryPolicy;
  query: RetryPolicy;
  /** Deadline for a command write (ms) */
  commandTimeoutMs: number;
  push: PushListenerConfig & {
    enabled: boolean;
    mode: PushMode;
  };
}

export const DEFAULT_SYNC_CONFIG: SyncCoordinatorConfig = {
  scanIntervalMs: 30000,
  poll: { attempts: 3, timeoutMs: 1000, retryDelayMs: 1000 },
  query: { attempts: 3, timeoutMs: 1000, retryDelayMs: 1000 },
  commandTimeoutMs: 2000,
  push: {
    ...DEFAULT_PUSH_LISTENER_CONFIG,
    enabled: true,
    mode: PushMode.MERGE,
  },
};

// -----------------------------------------------------------------------------
// Events
// -----------------------------------------------------------------------------

export const ListenerState = {
  STOPPED: 'stopped',
  CONNECTING: 'connecting',
  LISTENING: 'listening',
  BACKOFF: 'backoff',
  GIVEN_UP: 'given_up',
} as const;

export type ListenerState = (typeof ListenerState)[keyof typeof ListenerState];

export type SyncEvent =
  | { type: 'refreshed'; deviceCount: number }
  | { type: 'update_failed'; error: Error }
  | { type: 'availability_changed'; available: boolean }
  | { type: 'delta_applied'; update: PushUpdateEvent }
  | { type: 'delta_dropped'; update: PushUpdateEvent }
  | { type: 'listener_state'; state: ListenerState; retryCount: number }
  | { type: 'listener_given_up'; retryCount: number }
  | { type: 'command_sent'; deviceId: string; state: ChannelCommand };

export type SyncEventHandler = (event: SyncEvent) => void;
