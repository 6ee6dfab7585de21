/**
 * Snapshot Types
 *
 * Device, channel and push-update shapes as reported by the hub, plus the
 * zod schemas used to normalise raw hub payloads.
 */

import { z } from 'zod';

// -----------------------------------------------------------------------------
// Schemas
// -----------------------------------------------------------------------------

/** Metadata of the wrong type parses as undefined; only a device's `me` is required */
const optionalText = z.string().optional().catch(undefined);

/**
 * One controllable or observable point within a device.
 * `v` is opaque to the coordinator and only ever propagated.
 */
export const ChannelRecordSchema = z
  .object({
    v: z.unknown().optional(),
    name: optionalText,
  })
  .passthrough();

export const DeviceSnapshotSchema = z
  .object({
    me: z.string().min(1),
    devtype: optionalText,
    agt: optionalText,
    name: optionalText,
    epver: optionalText,
    data: z.record(z.unknown()).transform(keepChannels).optional().catch(undefined),
  })
  .passthrough();

function keepChannels(entries: Record<string, unknown>): Record<string, ChannelRecord> {
  const channels: Record<string, ChannelRecord> = {};
  for (const [key, entry] of Object.entries(entries)) {
    const result = ChannelRecordSchema.safeParse(entry);
    if (result.success) {
      channels[key] = result.data;
    }
  }
  return channels;
}

export const PushUpdateEventSchema = z.object({
  me: z.string().min(1),
  idx: z.string().min(1),
  val: z.unknown().refine((value) => value !== undefined && value !== null, 'val is required'),
});

// -----------------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------------

export type ChannelRecord = z.infer<typeof ChannelRecordSchema>;

export type DeviceSnapshot = z.infer<typeof DeviceSnapshotSchema>;

export interface PushUpdateEvent {
  /** Device id */
  me: string;
  /** Channel key, e.g. "L1" or "P2" */
  idx: string;
  /** New channel value */
  val: unknown;
}

/**
 * The hub's native ordered device list.
 */
export interface HubSnapshot {
  msg: DeviceSnapshot[];
}

/**
 * Read-only view handed to consumers.
 */
export interface SnapshotView {
  readonly msg: ReadonlyArray<Readonly<DeviceSnapshot>>;
}

/**
 * Immutable metadata captured when a device is first discovered.
 */
export interface DeviceInfo {
  me: string;
  name: string | null;
  devtype: string | null;
  agt: string | null;
  epver: string | null;
}

// -----------------------------------------------------------------------------
// Normalisation
// -----------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function parseDevices(entries: unknown[]): DeviceSnapshot[] {
  const devices: DeviceSnapshot[] = [];

  for (const entry of entries) {
    const result = DeviceSnapshotSchema.safeParse(entry);
    if (result.success) {
      devices.push(result.data);
    }
  }

  return devices;
}

/**
 * Normalise a raw enumeration payload into a HubSnapshot.
 *
 * Accepts `{ msg: [...] }` or a record keyed by device id. Entries without a
 * usable `me` are dropped; anything else yields an empty snapshot.
 */
export function normalizeSnapshot(raw: unknown): HubSnapshot {
  if (!isRecord(raw)) {
    return { msg: [] };
  }

  const list = raw['msg'];
  if (Array.isArray(list)) {
    return { msg: parseDevices(list) };
  }

  if (isRecord(list)) {
    return { msg: parseDevices(Object.values(list)) };
  }

  if (list === undefined && !('code' in raw)) {
    return { msg: parseDevices(Object.values(raw)) };
  }

  return { msg: [] };
}

/**
 * Validate a push event. Returns null for anything that cannot be applied.
 */
export function parsePushUpdate(raw: unknown): PushUpdateEvent | null {
  const result = PushUpdateEventSchema.safeParse(raw);
  if (!result.success) {
    return null;
  }
  return { me: result.data.me, idx: result.data.idx, val: result.data.val };
}

export function toDeviceInfo(device: DeviceSnapshot): DeviceInfo {
  return {
    me: device.me,
    name: device.name ?? null,
    devtype: device.devtype ?? null,
    agt: device.agt ?? null,
    epver: device.epver ?? null,
  };
}
