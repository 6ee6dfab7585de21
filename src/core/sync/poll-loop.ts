/**
 * Poll Loop
 *
 * Fixed-period full refresh. Each tick makes sure the push listener is
 * alive, then enumerates every device with bounded retries and installs the
 * result as the new snapshot. Ticks never overlap; a refresh requested while
 * one is running joins it.
 */

import { randomUUID } from 'crypto';
import type pino from 'pino';
import { normalizeSnapshot } from '../snapshot/types.js';
import type { SyncContext } from './context.js';
import { UpdateFailedError, errorMessage } from './errors.js';
import { retryOnTimeout, sleep as defaultSleep, type RetryPolicy, type SleepFn } from './retry.js';
import type { HubApi } from './types.js';
import { withLogContext } from '../../observability/logger.js';
import { recordPollAttempt, recordPollTick } from '../../observability/metrics.js';

// -----------------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------------

export interface PollLoopDeps {
  api: HubApi;
  context: SyncContext;
  logger: pino.Logger;
  /** Called at the start of each tick; starts the listener if it has exited */
  superviseListener: () => void;
  sleep?: SleepFn;
}

export interface PollLoopConfig {
  intervalMs: number;
  retry: RetryPolicy;
}

// -----------------------------------------------------------------------------
// Poll Loop
// -----------------------------------------------------------------------------

export class PollLoop {
  private readonly api: HubApi;
  private readonly context: SyncContext;
  private readonly logger: pino.Logger;
  private readonly superviseListener: () => void;
  private readonly sleep: SleepFn;

  private timer: ReturnType<typeof setTimeout> | null = null;
  private inFlight: Promise<boolean> | null = null;
  private running = false;

  private lastSuccess = false;
  private lastError: Error | null = null;

  constructor(deps: PollLoopDeps, private readonly config: PollLoopConfig) {
    this.api = deps.api;
    this.context = deps.context;
    this.logger = deps.logger;
    this.superviseListener = deps.superviseListener;
    this.sleep = deps.sleep ?? defaultSleep;
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /**
   * Run the first tick now and keep ticking every interval until stop().
   */
  async start(): Promise<boolean> {
    if (this.running) {
      return this.lastSuccess;
    }

    this.running = true;
    const success = await this.tick();
    this.scheduleNext();
    return success;
  }

  stop(): void {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private scheduleNext(): void {
    if (!this.running || this.timer) {
      return;
    }

    this.timer = setTimeout(() => {
      this.timer = null;
      this.tick()
        .catch((error: unknown) => {
          this.logger.error({ err: error }, 'Unexpected poll tick failure');
        })
        .finally(() => this.scheduleNext());
    }, this.config.intervalMs);
  }

  // ---------------------------------------------------------------------------
  // Tick
  // ---------------------------------------------------------------------------

  /**
   * Run one refresh, or join the one in progress. Resolves to whether it
   * succeeded; failures are recorded and emitted, never thrown.
   */
  tick(): Promise<boolean> {
    if (!this.inFlight) {
      this.inFlight = withLogContext({ correlationId: randomUUID(), source: 'poll' }, () => this.runTick())
        .finally(() => {
          this.inFlight = null;
        });
    }
    return this.inFlight;
  }

  private async runTick(): Promise<boolean> {
    this.superviseListener();

    try {
      const raw = await retryOnTimeout(
        (attempt) => {
          recordPollAttempt();
          this.logger.debug({ attempt }, 'Fetching all devices');
          return this.api.discoverDevices();
        },
        this.config.retry,
        'Full device enumeration',
        this.sleep
      );

      const snapshot = normalizeSnapshot(raw);
      this.context.applySnapshot(snapshot);
      this.context.setAvailable(true);

      this.lastSuccess = true;
      this.lastError = null;
      recordPollTick('success');

      this.logger.debug({ devices: snapshot.msg.length }, 'Snapshot refreshed');
      this.context.emit({ type: 'refreshed', deviceCount: snapshot.msg.length });
      return true;
    } catch (error) {
      const failure =
        error instanceof UpdateFailedError
          ? error
          : new UpdateFailedError(`Error communicating with API: ${errorMessage(error)}`, { cause: error });

      this.context.setAvailable(false);
      this.lastSuccess = false;
      this.lastError = failure;
      recordPollTick('failure');

      this.logger.warn({ err: failure.message }, 'Snapshot refresh failed');
      this.context.emit({ type: 'update_failed', error: failure });
      return false;
    }
  }

  // ---------------------------------------------------------------------------
  // Public API
  // ---------------------------------------------------------------------------

  isRunning(): boolean {
    return this.running;
  }

  get lastUpdateSuccess(): boolean {
    return this.lastSuccess;
  }

  getLastError(): Error | null {
    return this.lastError;
  }
}
