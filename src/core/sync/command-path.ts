/**
 * Command Path
 *
 * Device state writes. Writes are refused while the coordinator is
 * unavailable; a successful write is followed by a refresh so the snapshot
 * catches up even when the push stream is slow or down. Failures always
 * reach the caller.
 */

import type pino from 'pino';
import type { SyncContext } from './context.js';
import { CommandRejectedError, CommandTimeoutError, TimeoutError } from './errors.js';
import { withTimeout } from './retry.js';
import type { ChannelCommand, CommandResponse, HubApi } from './types.js';
import { recordCommand, timeCommand } from '../../observability/metrics.js';

export interface CommandPathDeps {
  api: HubApi;
  context: SyncContext;
  logger: pino.Logger;
  /** Refresh to run after a successful write */
  refresh: () => Promise<boolean>;
}

export class CommandPath {
  private readonly api: HubApi;
  private readonly context: SyncContext;
  private readonly logger: pino.Logger;
  private readonly refresh: () => Promise<boolean>;

  constructor(deps: CommandPathDeps, private readonly defaultTimeoutMs: number) {
    this.api = deps.api;
    this.context = deps.context;
    this.logger = deps.logger;
    this.refresh = deps.refresh;
  }

  /**
   * Write `state` to a device. Resolves to false, without calling the hub,
   * when the coordinator is unavailable.
   */
  async setDeviceState(
    deviceId: string,
    state: ChannelCommand,
    timeoutMs = this.defaultTimeoutMs
  ): Promise<boolean> {
    if (!this.context.isAvailable()) {
      recordCommand('skipped');
      this.logger.debug({ deviceId, idx: state.idx }, 'Coordinator unavailable; command not sent');
      return false;
    }

    const endTimer = timeCommand();
    let response: CommandResponse;

    try {
      response = await withTimeout(
        this.api.setDeviceState(deviceId, state, timeoutMs),
        timeoutMs,
        `setDeviceState(${deviceId})`
      );
    } catch (error) {
      endTimer();

      if (error instanceof TimeoutError) {
        recordCommand('timeout');
        this.logger.error({ deviceId, timeoutMs }, 'Timeout occurred while setting device state');
        throw new CommandTimeoutError(deviceId, timeoutMs);
      }

      recordCommand('error');
      this.logger.error({ err: error, deviceId }, 'Error setting device state');
      throw error;
    }

    endTimer();

    if (response.code !== 0) {
      recordCommand('rejected');
      this.logger.error({ deviceId, code: response.code, msg: response.msg }, 'Hub rejected command');
      throw new CommandRejectedError(deviceId, response.code, response.msg);
    }

    recordCommand('success');
    this.logger.debug({ deviceId, state }, 'Device state set successfully');
    this.context.emit({ type: 'command_sent', deviceId, state });

    await this.refresh();
    return true;
  }
}
