/**
 * Push Listener
 *
 * Folds the hub's push stream into the snapshot. Runs as a finite state
 * machine:
 *
 *   STOPPED → CONNECTING → LISTENING ⟲ (event)
 *   LISTENING → BACKOFF → CONNECTING   (error, below the retry ceiling)
 *   LISTENING → GIVEN_UP → STOPPED     (error, at the retry ceiling)
 *
 * The backoff after the n-th consecutive failure is baseDelay * 2^(n-1).
 */

import type pino from 'pino';
import type { DeviceSnapshot, PushUpdateEvent } from '../snapshot/types.js';
import { parsePushUpdate } from '../snapshot/types.js';
import type { SyncContext } from './context.js';
import type { HubApi, PushListenerConfig } from './types.js';
import { DEFAULT_PUSH_LISTENER_CONFIG, ListenerState } from './types.js';
import { errorMessage } from './errors.js';
import { sleep as defaultSleep, withTimeout, type SleepFn } from './retry.js';
import {
  recordListenerGiveUp,
  recordListenerReconnect,
  recordPushEvent,
} from '../../observability/metrics.js';

// -----------------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------------

/**
 * Receives every well-formed push event, in arrival order.
 */
export type DeltaHandler = (update: PushUpdateEvent) => void;

export interface PushListenerDeps {
  api: HubApi;
  context: SyncContext;
  onDelta: DeltaHandler;
  logger: pino.Logger;
  sleep?: SleepFn;
}

// -----------------------------------------------------------------------------
// Push Listener
// -----------------------------------------------------------------------------

export class PushListener {
  private readonly config: PushListenerConfig;
  private readonly api: HubApi;
  private readonly context: SyncContext;
  private readonly onDelta: DeltaHandler;
  private readonly logger: pino.Logger;
  private readonly sleep: SleepFn;

  private state: ListenerState = ListenerState.STOPPED;
  private retryCount = 0;

  /** Diagnostic id → device table, rebuilt on every (re)connect */
  private lookup: Map<string, Readonly<DeviceSnapshot>> = new Map();

  constructor(deps: PushListenerDeps, config: Partial<PushListenerConfig> = {}) {
    this.config = { ...DEFAULT_PUSH_LISTENER_CONFIG, ...config };
    this.api = deps.api;
    this.context = deps.context;
    this.onDelta = deps.onDelta;
    this.logger = deps.logger;
    this.sleep = deps.sleep ?? defaultSleep;
  }

  // ---------------------------------------------------------------------------
  // Run Loop
  // ---------------------------------------------------------------------------

  /**
   * One listener lifetime. Resolves when the listener gives up or `signal`
   * aborts; never rejects.
   */
  async run(signal: AbortSignal): Promise<void> {
    this.retryCount = 0;
    this.transition(ListenerState.CONNECTING);

    while (!signal.aborted) {
      if (this.state === ListenerState.CONNECTING) {
        this.rebuildLookup();
        this.transition(ListenerState.LISTENING);
      }

      let update: unknown;

      try {
        update = await this.api.getStateUpdates();
      } catch (error) {
        if (signal.aborted) {
          break;
        }

        const gaveUp = await this.handleFailure(error, signal);
        if (gaveUp) {
          return;
        }
        continue;
      }

      if (signal.aborted) {
        break;
      }

      if (update !== null && update !== undefined) {
        this.retryCount = 0;
        this.handleUpdate(update);
      }
    }

    this.transition(ListenerState.STOPPED);
  }

  private handleUpdate(raw: unknown): void {
    const update = parsePushUpdate(raw);

    if (!update) {
      recordPushEvent('malformed');
      this.logger.debug({ update: raw }, 'Dropping malformed push update');
      return;
    }

    this.logger.debug(update, 'Received push update');
    this.onDelta(update);
  }

  /**
   * Returns true when the retry ceiling was reached and the listener stopped.
   */
  private async handleFailure(error: unknown, signal: AbortSignal): Promise<boolean> {
    this.retryCount++;

    this.logger.warn(
      { err: error, retryCount: this.retryCount, maxRetries: this.config.maxRetries },
      'Error in push update listener'
    );

    if (this.retryCount >= this.config.maxRetries) {
      this.giveUp();
      return true;
    }

    this.transition(ListenerState.BACKOFF);
    await this.resetConnection();

    const delay = this.config.baseDelayMs * Math.pow(2, this.retryCount - 1);
    this.logger.info({ delayMs: delay, attempt: this.retryCount }, 'Reconnecting push listener after backoff');
    recordListenerReconnect();

    await this.sleep(delay, signal);

    if (!signal.aborted) {
      this.transition(ListenerState.CONNECTING);
    }
    return false;
  }

  private giveUp(): void {
    this.transition(ListenerState.GIVEN_UP);
    recordListenerGiveUp();

    this.logger.error(
      { retryCount: this.retryCount },
      'Push listener exhausted its retries; clearing snapshot until the next poll'
    );

    this.context.invalidate();
    this.lookup.clear();
    this.context.emit({ type: 'listener_given_up', retryCount: this.retryCount });

    this.transition(ListenerState.STOPPED);
  }

  /**
   * Best effort: a failed or slow reset is logged and the reconnect proceeds.
   */
  private async resetConnection(): Promise<void> {
    try {
      await withTimeout(this.api.resetConnection(), this.config.resetTimeoutMs, 'resetConnection');
    } catch (error) {
      this.logger.warn({ err: errorMessage(error) }, 'Failed to reset hub connection');
    }
  }

  private rebuildLookup(): void {
    const lookup = new Map<string, Readonly<DeviceSnapshot>>();
    for (const device of this.context.store.read().msg) {
      lookup.set(device.me, device);
    }
    this.lookup = lookup;
    this.logger.debug({ devices: lookup.size }, 'Push listener connected');
  }

  private transition(state: ListenerState): void {
    if (this.state === state) {
      return;
    }
    this.state = state;
    this.context.emit({ type: 'listener_state', state, retryCount: this.retryCount });
  }

  // ---------------------------------------------------------------------------
  // Public API
  // ---------------------------------------------------------------------------

  getState(): ListenerState {
    return this.state;
  }

  getRetryCount(): number {
    return this.retryCount;
  }

  /**
   * Devices known when the listener last connected.
   */
  getLookup(): ReadonlyMap<string, Readonly<DeviceSnapshot>> {
    return this.lookup;
  }
}
