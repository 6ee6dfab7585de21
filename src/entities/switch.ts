/**
 * Switch Channels
 *
 * Consumer-side view of multi-gang wall switches. Each present channel of a
 * supported device becomes one SwitchChannel that reads its state from the
 * coordinator's snapshot and writes through the command path.
 */

import type { DeviceSnapshot } from '../core/snapshot/types.js';
import type { SyncCoordinator } from '../core/sync/coordinator.js';
import { createLogger } from '../observability/logger.js';

// -----------------------------------------------------------------------------
// Constants
// -----------------------------------------------------------------------------

export const DOMAIN = 'lifesmart';

export const MANUFACTURER = 'LifeSmart';

export const SUPPORTED_SWITCH_TYPES: readonly string[] = ['SL_SW_NS1', 'SL_SW_NS2', 'SL_SW_NS3', 'SL_NATURE'];

export const SWITCH_CHANNELS = ['L1', 'L2', 'L3'] as const;

export type SwitchChannelId = (typeof SWITCH_CHANNELS)[number];

export const SwitchValueType = {
  ON: '0x81',
  OFF: '0x80',
} as const;

export type SwitchValueType = (typeof SwitchValueType)[keyof typeof SwitchValueType];

const logger = createLogger({ component: 'switch' });

// -----------------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------------

export interface SwitchDeviceInfo {
  identifiers: Array<[string, string]>;
  name: string;
  manufacturer: string;
  model: string | null;
  swVersion: string | null;
}

// -----------------------------------------------------------------------------
// Switch Channel
// -----------------------------------------------------------------------------

export class SwitchChannel {
  readonly deviceId: string;
  readonly uniqueId: string;
  readonly entityId: string;

  /** Used while the device is missing from the snapshot */
  private optimisticState: boolean;

  constructor(
    private readonly coordinator: SyncCoordinator,
    private readonly device: Readonly<DeviceSnapshot>,
    readonly idx: SwitchChannelId,
    readonly name: string
  ) {
    this.deviceId = device.me;
    this.uniqueId = `${DOMAIN}_switch_${device.me}_${idx}`;
    this.entityId = `${DOMAIN}.${entitySlug([device.devtype ?? '', device.agt ?? '', device.me, idx])}`;
    this.optimisticState = Boolean(device.data?.[idx]?.v);
  }

  get isOn(): boolean {
    const current = this.coordinator.getDevice(this.deviceId);
    if (current) {
      return Boolean(current.data?.[this.idx]?.v);
    }
    return this.optimisticState;
  }

  get available(): boolean {
    return this.coordinator.lastUpdateSuccess;
  }

  get deviceInfo(): SwitchDeviceInfo {
    return {
      identifiers: [[DOMAIN, this.deviceId]],
      name: this.name,
      manufacturer: MANUFACTURER,
      model: this.device.devtype ?? null,
      swVersion: this.device.epver ?? null,
    };
  }

  /**
   * Resolves to false when the coordinator is unavailable and nothing was
   * sent; hub failures reject.
   */
  turnOn(): Promise<boolean> {
    return this.send(1);
  }

  turnOff(): Promise<boolean> {
    return this.send(0);
  }

  private async send(value: 0 | 1): Promise<boolean> {
    const sent = await this.coordinator.setDeviceState(this.deviceId, {
      tag: 'm',
      idx: this.idx,
      type: value === 1 ? SwitchValueType.ON : SwitchValueType.OFF,
      val: value,
    });

    if (sent) {
      this.optimisticState = value === 1;
    }
    return sent;
  }
}

// -----------------------------------------------------------------------------
// Discovery
// -----------------------------------------------------------------------------

/**
 * One SwitchChannel per present L1-L3 channel of every supported device in
 * the current snapshot.
 */
export function discoverSwitches(coordinator: SyncCoordinator): SwitchChannel[] {
  const switches: SwitchChannel[] = [];

  for (const device of coordinator.getDevices().msg) {
    if (!device.devtype || !SUPPORTED_SWITCH_TYPES.includes(device.devtype)) {
      continue;
    }

    for (const idx of SWITCH_CHANNELS) {
      const channel = device.data?.[idx];
      if (!channel) {
        continue;
      }

      const channelName = (channel.name ?? idx).replace('{$EPN}', '').trim();
      const name = `${device.name ?? 'Switch'} ${channelName}`.trim();
      const entity = new SwitchChannel(coordinator, device, idx, name);

      logger.debug({ entityId: entity.entityId }, 'Added switch');
      switches.push(entity);
    }
  }

  logger.info({ count: switches.length }, 'Discovered switches');
  return switches;
}

function entitySlug(parts: string[]): string {
  return parts
    .filter((part) => part.length > 0)
    .join('_')
    .toLowerCase()
    .replace(/[^a-z0-9_]/g, '_');
}
