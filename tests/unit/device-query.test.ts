/**
 * Device Query Unit Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { DeviceQuery } from '../../src/core/sync/device-query.js';
import { UpdateFailedError } from '../../src/core/sync/errors.js';
import { createLogger } from '../../src/observability/logger.js';
import { FakeHub, deferred, fail, hang, makeDevice, recordingSleep, value, waitFor } from '../helpers/fake-hub.js';

describe('DeviceQuery', () => {
  let hub: FakeHub;
  let delays: number[];
  let query: DeviceQuery;

  beforeEach(() => {
    hub = new FakeHub([makeDevice('a'), makeDevice('b')]);
    const recorder = recordingSleep();
    delays = recorder.delays;
    query = new DeviceQuery(
      { api: hub, logger: createLogger({ component: 'test' }), sleep: recorder.sleep },
      { attempts: 3, timeoutMs: 1000, retryDelayMs: 1000 }
    );
  });

  it('should return the device detail', async () => {
    const result = await query.getDeviceData('a');

    expect(result.msg).toHaveLength(1);
    expect(result.msg[0]?.me).toBe('a');
    expect(hub.calls.discoverById).toEqual(['a']);
  });

  it('should normalise a malformed response to an empty list', async () => {
    hub.scriptDiscoverById(value('garbage'));

    await expect(query.getDeviceData('a')).resolves.toEqual({ msg: [] });
  });

  it('should run one query at a time', async () => {
    const gate = deferred<unknown>();
    hub.scriptDiscoverById(value(gate.promise));

    const first = query.getDeviceData('a');
    const second = query.getDeviceData('b');

    await waitFor(() => hub.calls.discoverById.length === 1);
    expect(query.isBusy()).toBe(true);
    expect(hub.calls.discoverById).toEqual(['a']);

    gate.resolve({ code: 0, msg: [makeDevice('a')] });
    await first;
    const result = await second;

    expect(hub.calls.discoverById).toEqual(['a', 'b']);
    expect(result.msg[0]?.me).toBe('b');
    expect(query.isBusy()).toBe(false);
  });

  it('should retry timeouts under the overriding deadline', async () => {
    hub.scriptDiscoverById(hang(), hang(), hang());

    const error = await query.getDeviceData('a', 5).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(UpdateFailedError);
    expect(error).toHaveProperty('message', 'Device query for a failed: timed out');
    expect(hub.calls.discoverById).toEqual(['a', 'a', 'a']);
    expect(delays).toEqual([1000, 1000]);
  });

  it('should fail at once on other errors and release the lock', async () => {
    hub.scriptDiscoverById(fail(new Error('socket closed')));

    await expect(query.getDeviceData('a')).rejects.toThrow('Device query for a failed: socket closed');
    expect(hub.calls.discoverById).toEqual(['a']);
    expect(query.isBusy()).toBe(false);

    const result = await query.getDeviceData('b');
    expect(result.msg[0]?.me).toBe('b');
  });
});
