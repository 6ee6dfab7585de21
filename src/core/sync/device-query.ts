/**
 * Single-Flight Device Query
 *
 * Direct per-device reads for callers that need fresher data than the poll
 * cadence gives. The hub connection is not safe for concurrent direct
 * queries, so callers queue on one mutex.
 */

import { Mutex } from 'async-mutex';
import type pino from 'pino';
import type { HubSnapshot } from '../snapshot/types.js';
import { normalizeSnapshot } from '../snapshot/types.js';
import { retryOnTimeout, sleep as defaultSleep, type RetryPolicy, type SleepFn } from './retry.js';
import type { HubApi } from './types.js';
import { recordQuery } from '../../observability/metrics.js';

export interface DeviceQueryDeps {
  api: HubApi;
  logger: pino.Logger;
  sleep?: SleepFn;
}

export class DeviceQuery {
  private readonly lock = new Mutex();
  private readonly api: HubApi;
  private readonly logger: pino.Logger;
  private readonly sleep: SleepFn;

  constructor(deps: DeviceQueryDeps, private readonly policy: RetryPolicy) {
    this.api = deps.api;
    this.logger = deps.logger;
    this.sleep = deps.sleep ?? defaultSleep;
  }

  /**
   * Fetch one device's detail. `timeoutMs` overrides the per-attempt
   * deadline. Malformed responses come back as `{ msg: [] }`.
   */
  getDeviceData(deviceId: string, timeoutMs = this.policy.timeoutMs): Promise<HubSnapshot> {
    return this.lock.runExclusive(async () => {
      const policy: RetryPolicy = { ...this.policy, timeoutMs };

      try {
        const raw = await retryOnTimeout(
          (attempt) => {
            this.logger.debug({ deviceId, attempt }, 'Querying device');
            return this.api.discoverDevicesById(deviceId, timeoutMs);
          },
          policy,
          `Device query for ${deviceId}`,
          this.sleep
        );

        recordQuery('success');
        return normalizeSnapshot(raw);
      } catch (error) {
        recordQuery('failure');
        throw error;
      }
    });
  }

  /**
   * Whether a query currently holds the lock.
   */
  isBusy(): boolean {
    return this.lock.isLocked();
  }
}
