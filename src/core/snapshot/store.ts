/**
 * Snapshot Store
 *
 * In-memory cache of every known device, kept as the hub's ordered device
 * list plus an id → position index. Writers replace whole objects
 * (copy-on-write), so a view obtained through read() is never observed
 * half-updated.
 */

import type {
  ChannelRecord,
  DeviceSnapshot,
  HubSnapshot,
  PushUpdateEvent,
  SnapshotView,
} from './types.js';
import { createLogger } from '../../observability/logger.js';

// -----------------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------------

export type SnapshotChange =
  | { type: 'replaced'; deviceCount: number; version: number }
  | { type: 'delta'; deviceId: string; idx: string; value: unknown; version: number }
  | { type: 'device'; deviceId: string; version: number }
  | { type: 'cleared'; version: number };

export type SnapshotChangeListener = (change: SnapshotChange) => void;

// -----------------------------------------------------------------------------
// Snapshot Store
// -----------------------------------------------------------------------------

export class SnapshotStore {
  private devices: ReadonlyArray<DeviceSnapshot> = [];
  private index: ReadonlyMap<string, number> = new Map();
  private listeners: Set<SnapshotChangeListener> = new Set();
  private globalVersion = 0;
  private readonly logger = createLogger({ component: 'snapshot' });

  // ---------------------------------------------------------------------------
  // Read Operations
  // ---------------------------------------------------------------------------

  /**
   * Current snapshot. Callers must treat it as immutable.
   */
  read(): SnapshotView {
    return { msg: this.devices };
  }

  getDevice(deviceId: string): Readonly<DeviceSnapshot> | undefined {
    const position = this.index.get(deviceId);
    return position === undefined ? undefined : this.devices[position];
  }

  has(deviceId: string): boolean {
    return this.index.has(deviceId);
  }

  deviceIds(): string[] {
    return this.devices.map((device) => device.me);
  }

  get size(): number {
    return this.devices.length;
  }

  get version(): number {
    return this.globalVersion;
  }

  // ---------------------------------------------------------------------------
  // Write Operations
  // ---------------------------------------------------------------------------

  /**
   * Replace the whole store with a freshly polled snapshot.
   *
   * A repeated id keeps the position of its first occurrence and the record
   * of its last one.
   */
  mergeFull(snapshot: HubSnapshot): void {
    const devices: DeviceSnapshot[] = [];
    const index = new Map<string, number>();

    for (const device of snapshot.msg) {
      const copy = cloneDevice(device);
      const existing = index.get(copy.me);

      if (existing === undefined) {
        index.set(copy.me, devices.length);
        devices.push(copy);
      } else {
        devices[existing] = copy;
      }
    }

    this.devices = devices;
    this.index = index;
    this.globalVersion++;

    this.notifyListeners({
      type: 'replaced',
      deviceCount: devices.length,
      version: this.globalVersion,
    });
  }

  /**
   * Apply one push delta. Returns false when the device is unknown.
   */
  mergeDelta(update: PushUpdateEvent): boolean {
    const position = this.index.get(update.me);
    const current = position === undefined ? undefined : this.devices[position];

    if (position === undefined || !current) {
      return false;
    }

    const channels = current.data ?? {};
    const channel: ChannelRecord = { ...(channels[update.idx] ?? {}), v: update.val };
    const updated: DeviceSnapshot = {
      ...current,
      data: { ...channels, [update.idx]: channel },
    };

    this.replaceAt(position, updated);

    this.notifyListeners({
      type: 'delta',
      deviceId: update.me,
      idx: update.idx,
      value: update.val,
      version: this.globalVersion,
    });

    return true;
  }

  /**
   * Replace a single known device record. Unknown ids are ignored.
   */
  mergeDevice(device: DeviceSnapshot): boolean {
    const position = this.index.get(device.me);

    if (position === undefined) {
      return false;
    }

    this.replaceAt(position, cloneDevice(device));

    this.notifyListeners({
      type: 'device',
      deviceId: device.me,
      version: this.globalVersion,
    });

    return true;
  }

  /**
   * Drop every device.
   */
  clear(): void {
    this.devices = [];
    this.index = new Map();
    this.globalVersion++;

    this.notifyListeners({ type: 'cleared', version: this.globalVersion });
  }

  private replaceAt(position: number, device: DeviceSnapshot): void {
    const next = this.devices.slice();
    next[position] = device;
    this.devices = next;
    this.globalVersion++;
  }

  // ---------------------------------------------------------------------------
  // Change Listeners
  // ---------------------------------------------------------------------------

  /**
   * Subscribe to changes. Returns the unsubscribe function.
   */
  addListener(listener: SnapshotChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private notifyListeners(change: SnapshotChange): void {
    for (const listener of this.listeners) {
      try {
        listener(change);
      } catch (error) {
        this.logger.error({ err: error, change: change.type }, 'Snapshot listener failed');
      }
    }
  }
}

function cloneDevice(device: DeviceSnapshot): DeviceSnapshot {
  const data: Record<string, ChannelRecord> = {};

  for (const [key, channel] of Object.entries(device.data ?? {})) {
    data[key] = { ...channel };
  }

  return { ...device, data };
}
