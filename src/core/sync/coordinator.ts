/**
 * Sync Coordinator
 *
 * Owns the device snapshot and the tasks that keep it current: the poll
 * loop, the supervised push listener, the single-flight query path and the
 * command path. Consumers read devices and issue commands through it.
 */

import type pino from 'pino';
import type { DeviceInfo, DeviceSnapshot, HubSnapshot, PushUpdateEvent, SnapshotView } from '../snapshot/types.js';
import { SyncContext } from './context.js';
import { CommandPath } from './command-path.js';
import { DeviceQuery } from './device-query.js';
import { PollLoop } from './poll-loop.js';
import { PushListener } from './push-listener.js';
import type { SleepFn } from './retry.js';
import { SupervisedTask } from './supervised-task.js';
import type {
  ChannelCommand,
  HubApi,
  ListenerState,
  SyncCoordinatorConfig,
  SyncEventHandler,
} from './types.js';
import { DEFAULT_SYNC_CONFIG, PushMode } from './types.js';
import { coordinatorLogger, commandLogger, pollLogger, pushLogger, queryLogger } from '../../observability/logger.js';
import { recordPushEvent } from '../../observability/metrics.js';

// -----------------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------------

export type SyncCoordinatorOptions = Partial<Omit<SyncCoordinatorConfig, 'push'>> & {
  push?: Partial<SyncCoordinatorConfig['push']>;
  /** Replaces every backoff and retry pause; meant for tests */
  sleep?: SleepFn;
  logger?: pino.Logger;
};

// -----------------------------------------------------------------------------
// Sync Coordinator
// -----------------------------------------------------------------------------

export class SyncCoordinator {
  private readonly config: SyncCoordinatorConfig;
  private readonly api: HubApi;
  private readonly logger: pino.Logger;
  private readonly context: SyncContext;

  private readonly pollLoop: PollLoop;
  private readonly pushListener: PushListener;
  private readonly listenerTask: SupervisedTask;
  private readonly deviceQuery: DeviceQuery;
  private readonly commandPath: CommandPath;

  private started = false;

  constructor(api: HubApi, options: SyncCoordinatorOptions = {}) {
    const { sleep, logger, push, ...rest } = options;

    this.config = {
      ...DEFAULT_SYNC_CONFIG,
      ...rest,
      push: { ...DEFAULT_SYNC_CONFIG.push, ...push },
    };

    this.api = api;
    this.logger = logger ?? coordinatorLogger();
    this.context = new SyncContext(this.logger);

    this.pushListener = new PushListener(
      {
        api,
        context: this.context,
        onDelta: (update) => this.handleDelta(update),
        logger: logger ?? pushLogger(),
        sleep,
      },
      {
        maxRetries: this.config.push.maxRetries,
        baseDelayMs: this.config.push.baseDelayMs,
        resetTimeoutMs: this.config.push.resetTimeoutMs,
      }
    );

    this.listenerTask = new SupervisedTask(
      'push-listener',
      (signal) => this.pushListener.run(signal),
      this.logger
    );

    this.pollLoop = new PollLoop(
      {
        api,
        context: this.context,
        logger: logger ?? pollLogger(),
        superviseListener: () => this.superviseListener(),
        sleep,
      },
      { intervalMs: this.config.scanIntervalMs, retry: this.config.poll }
    );

    this.deviceQuery = new DeviceQuery({ api, logger: logger ?? queryLogger(), sleep }, this.config.query);

    this.commandPath = new CommandPath(
      {
        api,
        context: this.context,
        logger: logger ?? commandLogger(),
        refresh: () => this.requestRefresh(),
      },
      this.config.commandTimeoutMs
    );
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /**
   * Run the first refresh and start the poll schedule. Resolves to whether
   * the first refresh succeeded; a failure is retried on the next tick.
   */
  async start(): Promise<boolean> {
    if (this.started) {
      return this.pollLoop.lastUpdateSuccess;
    }
    this.started = true;

    this.logger.info(
      { scanIntervalMs: this.config.scanIntervalMs, push: this.config.push.enabled },
      'Starting sync coordinator'
    );

    return this.pollLoop.start();
  }

  /**
   * Stop polling and the push listener. Until the next start() the
   * coordinator reports unavailable, refuses commands and runs no refresh.
   */
  async stop(): Promise<void> {
    this.started = false;
    this.pollLoop.stop();
    this.context.setAvailable(false);

    if (this.listenerTask.isRunning()) {
      const stopped = this.listenerTask.stop();
      // Wake a listener parked on getStateUpdates() so it sees the abort
      await this.api.resetConnection().catch((error: unknown) => {
        this.logger.warn({ err: error }, 'Failed to reset hub connection during stop');
      });
      await stopped;
    }

    this.logger.info('Sync coordinator stopped');
  }

  private superviseListener(): void {
    if (!this.started || !this.config.push.enabled) {
      return;
    }

    if (this.listenerTask.restart()) {
      this.logger.debug({ run: this.listenerTask.runCount }, 'Push listener started');
    }
  }

  private handleDelta(update: PushUpdateEvent): void {
    if (this.config.push.mode === PushMode.REFRESH) {
      recordPushEvent('refresh');
      this.requestRefresh().catch((error: unknown) => {
        this.logger.error({ err: error }, 'Refresh after push update failed');
      });
      return;
    }

    if (this.context.store.mergeDelta(update)) {
      recordPushEvent('applied');
      this.logger.debug(update, 'Updated device channel');
      this.context.emit({ type: 'delta_applied', update });
    } else {
      recordPushEvent('dropped');
      this.logger.debug({ deviceId: update.me }, 'Dropping push update for unknown device');
      this.context.emit({ type: 'delta_dropped', update });
    }
  }

  // ---------------------------------------------------------------------------
  // Read Surface
  // ---------------------------------------------------------------------------

  available(): boolean {
    return this.context.isAvailable();
  }

  /**
   * Whether the most recent full refresh succeeded.
   */
  get lastUpdateSuccess(): boolean {
    return this.pollLoop.lastUpdateSuccess;
  }

  getLastError(): Error | null {
    return this.pollLoop.getLastError();
  }

  getDevice(deviceId: string): Readonly<DeviceSnapshot> | undefined {
    return this.context.store.getDevice(deviceId);
  }

  getDevices(): SnapshotView {
    return this.context.store.read();
  }

  getDeviceInfo(deviceId: string): DeviceInfo | undefined {
    return this.context.getDeviceInfo(deviceId);
  }

  getListenerState(): ListenerState {
    return this.pushListener.getState();
  }

  isListenerRunning(): boolean {
    return this.listenerTask.isRunning();
  }

  // ---------------------------------------------------------------------------
  // Refresh & Query
  // ---------------------------------------------------------------------------

  /**
   * Run a full refresh now (or join the one in progress). Resolves false
   * without contacting the hub unless the coordinator is started.
   */
  requestRefresh(): Promise<boolean> {
    if (!this.started) {
      return Promise.resolve(false);
    }
    return this.pollLoop.tick();
  }

  /**
   * Direct single-device query, serialised with every other direct query.
   */
  getDeviceData(deviceId: string, timeoutMs?: number): Promise<HubSnapshot> {
    return this.deviceQuery.getDeviceData(deviceId, timeoutMs);
  }

  /**
   * Query one device out of band and fold the answer into the snapshot.
   * Returns the number of known devices updated.
   */
  async refreshDevice(deviceId: string, timeoutMs?: number): Promise<number> {
    const result = await this.deviceQuery.getDeviceData(deviceId, timeoutMs);
    let updated = 0;

    for (const device of result.msg) {
      if (this.context.store.mergeDevice(device)) {
        updated++;
      }
    }

    return updated;
  }

  // ---------------------------------------------------------------------------
  // Commands
  // ---------------------------------------------------------------------------

  /**
   * Write a channel state. Resolves to false without contacting the hub
   * while the coordinator is unavailable.
   */
  setDeviceState(deviceId: string, state: ChannelCommand, timeoutMs?: number): Promise<boolean> {
    return this.commandPath.setDeviceState(deviceId, state, timeoutMs);
  }

  // ---------------------------------------------------------------------------
  // Events
  // ---------------------------------------------------------------------------

  onEvent(handler: SyncEventHandler): void {
    this.context.onEvent(handler);
  }

  offEvent(handler: SyncEventHandler): void {
    this.context.offEvent(handler);
  }

  getConfig(): Readonly<SyncCoordinatorConfig> {
    return this.config;
  }

  /**
   * Device count, for health reporting.
   */
  get deviceCount(): number {
    return this.context.store.size;
  }
}
