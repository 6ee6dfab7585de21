/**
 * Sync Context
 *
 * The state shared by the poll loop, the push listener, the query path and
 * the command path: the snapshot store, the availability flag and the
 * device-info cache. Each task gets a reference to one context instead of
 * reaching into coordinator fields.
 */

import type pino from 'pino';
import { SnapshotStore } from '../snapshot/store.js';
import type { DeviceInfo, HubSnapshot } from '../snapshot/types.js';
import { toDeviceInfo } from '../snapshot/types.js';
import type { SyncEvent, SyncEventHandler } from './types.js';
import { updateAvailability, updateDeviceCount } from '../../observability/metrics.js';

export class SyncContext {
  readonly store: SnapshotStore;

  private available = true;
  private deviceInfo: Map<string, DeviceInfo> = new Map();
  private eventHandlers: Set<SyncEventHandler> = new Set();

  constructor(private readonly logger: pino.Logger, store = new SnapshotStore()) {
    this.store = store;
    updateAvailability(true);

    this.store.addListener((change) => {
      if (change.type === 'replaced' || change.type === 'cleared') {
        updateDeviceCount(this.store.size);
      }
    });
  }

  // ---------------------------------------------------------------------------
  // Availability
  // ---------------------------------------------------------------------------

  isAvailable(): boolean {
    return this.available;
  }

  setAvailable(available: boolean): void {
    if (this.available === available) {
      return;
    }

    this.available = available;
    updateAvailability(available);
    this.logger.info({ available }, 'Availability changed');
    this.emit({ type: 'availability_changed', available });
  }

  // ---------------------------------------------------------------------------
  // Snapshot
  // ---------------------------------------------------------------------------

  /**
   * Install a full poll result and remember first-seen device metadata.
   */
  applySnapshot(snapshot: HubSnapshot): void {
    this.store.mergeFull(snapshot);

    for (const device of snapshot.msg) {
      if (!this.deviceInfo.has(device.me)) {
        this.deviceInfo.set(device.me, toDeviceInfo(device));
      }
    }
  }

  getDeviceInfo(deviceId: string): DeviceInfo | undefined {
    return this.deviceInfo.get(deviceId);
  }

  /**
   * Forget everything cached. Availability is restored so commands are not
   * blocked by a push-only outage; the next poll repopulates the store.
   */
  invalidate(): void {
    this.store.clear();
    this.deviceInfo.clear();
    this.setAvailable(true);
  }

  // ---------------------------------------------------------------------------
  // Events
  // ---------------------------------------------------------------------------

  onEvent(handler: SyncEventHandler): void {
    this.eventHandlers.add(handler);
  }

  offEvent(handler: SyncEventHandler): void {
    this.eventHandlers.delete(handler);
  }

  emit(event: SyncEvent): void {
    for (const handler of this.eventHandlers) {
      try {
        handler(event);
      } catch (error) {
        this.logger.error({ err: error, event: event.type }, 'Event handler error');
      }
    }
  }
}
