/**
 * Sync Coordinator Unit Tests
 */

import { describe, it, expect, afterEach } from 'vitest';
import { SyncCoordinator, type SyncCoordinatorOptions } from '../../src/core/sync/coordinator.js';
import { CommandRejectedError, CommandTimeoutError } from '../../src/core/sync/errors.js';
import type { SyncEvent } from '../../src/core/sync/types.js';
import { devicesGauge } from '../../src/observability/metrics.js';
import { FakeHub, deferred, fail, hang, makeDevice, recordingSleep, value, waitFor } from '../helpers/fake-hub.js';

describe('SyncCoordinator', () => {
  let coordinator: SyncCoordinator | null = null;

  function setup(options: SyncCoordinatorOptions = {}): {
    hub: FakeHub;
    coordinator: SyncCoordinator;
    events: SyncEvent[];
    delays: number[];
  } {
    const hub = new FakeHub([makeDevice('a'), makeDevice('b')]);
    const recorder = recordingSleep();
    const instance = new SyncCoordinator(hub, {
      scanIntervalMs: 60000,
      commandTimeoutMs: 50,
      sleep: recorder.sleep,
      ...options,
    });
    const events: SyncEvent[] = [];
    instance.onEvent((event) => events.push(event));
    coordinator = instance;
    return { hub, coordinator: instance, events, delays: recorder.delays };
  }

  afterEach(async () => {
    await coordinator?.stop();
    coordinator = null;
  });

  describe('start', () => {
    it('should load the snapshot and start the push listener', async () => {
      const { hub, coordinator } = setup();

      await expect(coordinator.start()).resolves.toBe(true);

      expect(coordinator.getDevices().msg.map((device) => device.me)).toEqual(['a', 'b']);
      expect(coordinator.available()).toBe(true);
      expect(coordinator.lastUpdateSuccess).toBe(true);
      expect(coordinator.deviceCount).toBe(2);
      expect(coordinator.getDeviceInfo('a')?.name).toBe('Device a');

      await waitFor(() => hub.parkedListeners === 1);
      expect(coordinator.isListenerRunning()).toBe(true);
      expect(coordinator.getListenerState()).toBe('listening');
    });

    it('should stay up when the first refresh fails', async () => {
      const { hub, coordinator } = setup();
      hub.scriptDiscover(fail(new Error('connection refused')));

      await expect(coordinator.start()).resolves.toBe(false);

      expect(coordinator.available()).toBe(false);
      expect(coordinator.getLastError()?.message).toBe('Full device enumeration failed: connection refused');
      expect(coordinator.deviceCount).toBe(0);
    });

    it('should not start a listener when push is disabled', async () => {
      const { hub, coordinator } = setup({ push: { enabled: false } });

      await coordinator.start();

      expect(coordinator.isListenerRunning()).toBe(false);
      expect(coordinator.getListenerState()).toBe('stopped');
      expect(hub.calls.getStateUpdates).toBe(0);
    });
  });

  describe('push updates', () => {
    it('should merge a delta into the cached device', async () => {
      const { hub, coordinator } = setup();
      await coordinator.start();
      await waitFor(() => hub.parkedListeners === 1);

      hub.emitPush({ me: 'a', idx: 'L1', val: 1 });

      await waitFor(() => coordinator.getDevice('a')?.data?.['L1']?.v === 1);
      expect(coordinator.getDevice('a')?.data?.['L1']?.name).toBe('Left');
    });

    it('should drop a delta for an unknown device', async () => {
      const { hub, coordinator, events } = setup();
      await coordinator.start();
      await waitFor(() => hub.parkedListeners === 1);

      hub.emitPush({ me: 'zz', idx: 'L1', val: 1 });

      await waitFor(() => events.some((event) => event.type === 'delta_dropped'));
      expect(coordinator.getDevices().msg.map((device) => device.me)).toEqual(['a', 'b']);
      expect(coordinator.getDevice('zz')).toBeUndefined();
    });

    it('should refresh on each delta in refresh mode', async () => {
      const { hub, coordinator } = setup({ push: { mode: 'refresh' } });
      await coordinator.start();
      await waitFor(() => hub.parkedListeners === 1);

      hub.emitPush({ me: 'a', idx: 'L1', val: 1 });

      await waitFor(() => hub.calls.discover === 2);
      expect(coordinator.getDevice('a')?.data?.['L1']?.v).toBe(0);
    });

    it('should let a poll that started before a delta overwrite it', async () => {
      const { hub, coordinator } = setup();
      await coordinator.start();
      await waitFor(() => hub.parkedListeners === 1);
      const gate = deferred<unknown>();
      hub.scriptDiscover(value(gate.promise));

      const refresh = coordinator.requestRefresh();
      await waitFor(() => hub.calls.discover === 2);
      hub.emitPush({ me: 'a', idx: 'L1', val: 1 });
      await waitFor(() => coordinator.getDevice('a')?.data?.['L1']?.v === 1);

      gate.resolve({ code: 0, msg: [makeDevice('a'), makeDevice('b')] });
      await expect(refresh).resolves.toBe(true);

      expect(coordinator.getDevice('a')).toEqual(makeDevice('a'));
      expect(coordinator.getDevices().msg.map((device) => device.me)).toEqual(['a', 'b']);
      expect(coordinator.getDevice('b')?.me).toBe('b');
    });

    it('should apply a delta that arrives after the poll lands', async () => {
      const { hub, coordinator } = setup();
      await coordinator.start();
      await waitFor(() => hub.parkedListeners === 1);

      await expect(coordinator.requestRefresh()).resolves.toBe(true);
      hub.emitPush({ me: 'a', idx: 'L1', val: 1 });
      await waitFor(() => coordinator.getDevice('a')?.data?.['L1']?.v === 1);

      expect(coordinator.getDevice('a')).toEqual(
        makeDevice('a', { data: { L1: { v: 1, name: 'Left' }, L2: { v: 1, name: 'Right' } } })
      );
      expect(coordinator.getDevices().msg.map((device) => device.me)).toEqual(['a', 'b']);
      expect(coordinator.getDevice('b')?.me).toBe('b');
    });

    it('should restart the listener on the next refresh after it gives up', async () => {
      const { hub, coordinator, events, delays } = setup({ push: { maxRetries: 2 } });
      await coordinator.start();
      await waitFor(() => hub.parkedListeners === 1);

      hub.failPush(new Error('stream closed'));
      await waitFor(() => hub.parkedListeners === 1);
      hub.failPush(new Error('stream closed'));

      await waitFor(() => !coordinator.isListenerRunning());
      expect(delays).toEqual([1000]);
      expect(coordinator.deviceCount).toBe(0);
      expect((await devicesGauge.get()).values[0]?.value).toBe(0);
      expect(coordinator.available()).toBe(true);
      expect(events.filter((event) => event.type === 'listener_given_up')).toEqual([
        { type: 'listener_given_up', retryCount: 2 },
      ]);

      await coordinator.requestRefresh();

      expect(coordinator.isListenerRunning()).toBe(true);
      expect(coordinator.deviceCount).toBe(2);
      expect((await devicesGauge.get()).values[0]?.value).toBe(2);
      await waitFor(() => hub.parkedListeners === 1);
    });
  });

  describe('commands', () => {
    const turnOn = { tag: 'm', idx: 'L1', type: '0x81', val: 1 };

    it('should send the write and refresh afterwards', async () => {
      const { hub, coordinator, events } = setup();
      await coordinator.start();

      await expect(coordinator.setDeviceState('a', turnOn)).resolves.toBe(true);

      expect(hub.calls.setState).toEqual([{ deviceId: 'a', state: turnOn, timeoutMs: 50 }]);
      expect(hub.calls.discover).toBe(2);
      expect(coordinator.getDevice('a')?.data?.['L1']?.v).toBe(1);
      expect(events).toContainEqual({ type: 'command_sent', deviceId: 'a', state: turnOn });
    });

    it('should refuse writes while unavailable', async () => {
      const { hub, coordinator } = setup();
      hub.scriptDiscover(fail(new Error('connection refused')));
      await coordinator.start();

      await expect(coordinator.setDeviceState('a', turnOn)).resolves.toBe(false);
      expect(hub.calls.setState).toEqual([]);
    });

    it('should raise CommandRejectedError for a non-zero code', async () => {
      const { hub, coordinator } = setup();
      await coordinator.start();
      hub.scriptSetState(value({ code: -3, msg: 'bad channel' }));

      const error = await coordinator.setDeviceState('a', turnOn).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(CommandRejectedError);
      expect(error).toHaveProperty('message', 'Hub rejected command for device a: code -3 (bad channel)');
      expect(hub.calls.discover).toBe(1);
    });

    it('should raise CommandTimeoutError when the hub does not answer', async () => {
      const { hub, coordinator } = setup();
      await coordinator.start();
      hub.scriptSetState(hang());

      const error = await coordinator.setDeviceState('a', turnOn).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(CommandTimeoutError);
      expect(error).toHaveProperty('message', 'Timeout occurred while setting state of device a (50ms)');
    });

    it('should pass other errors through', async () => {
      const { hub, coordinator } = setup();
      await coordinator.start();
      hub.scriptSetState(fail(new Error('socket closed')));

      await expect(coordinator.setDeviceState('a', turnOn)).rejects.toThrow('socket closed');
    });
  });

  describe('queries', () => {
    it('should return one device from getDeviceData', async () => {
      const { coordinator } = setup();

      const result = await coordinator.getDeviceData('b');

      expect(result.msg.map((device) => device.me)).toEqual(['b']);
    });

    it('should fold a single-device refresh into the snapshot', async () => {
      const { hub, coordinator } = setup();
      await coordinator.start();
      hub.devices = [makeDevice('a', { data: { L1: { v: 1, name: 'Left' } } }), makeDevice('b')];

      await expect(coordinator.refreshDevice('a')).resolves.toBe(1);
      expect(coordinator.getDevice('a')?.data?.['L1']?.v).toBe(1);

      await expect(coordinator.refreshDevice('zz')).resolves.toBe(0);
    });
  });

  describe('stop', () => {
    it('should stop the listener promptly', async () => {
      const { hub, coordinator } = setup();
      await coordinator.start();
      await waitFor(() => hub.parkedListeners === 1);

      await coordinator.stop();

      expect(coordinator.isListenerRunning()).toBe(false);
      expect(coordinator.getListenerState()).toBe('stopped');
      expect(hub.calls.reset).toBe(1);
    });

    it('should not poll, command or restart the listener once stopped', async () => {
      const { hub, coordinator, events } = setup();
      await coordinator.start();
      await waitFor(() => hub.parkedListeners === 1);

      await coordinator.stop();

      expect(coordinator.available()).toBe(false);
      expect(events).toContainEqual({ type: 'availability_changed', available: false });
      await expect(coordinator.setDeviceState('a', { idx: 'L1', val: 1 })).resolves.toBe(false);
      await expect(coordinator.requestRefresh()).resolves.toBe(false);
      expect(hub.calls.setState).toEqual([]);
      expect(hub.calls.discover).toBe(1);
      expect(hub.calls.getStateUpdates).toBe(1);
      expect(coordinator.isListenerRunning()).toBe(false);
    });

    it('should come back after a restart', async () => {
      const { hub, coordinator } = setup();
      await coordinator.start();
      await coordinator.stop();

      await expect(coordinator.start()).resolves.toBe(true);

      expect(coordinator.available()).toBe(true);
      expect(hub.calls.discover).toBe(2);
      await waitFor(() => hub.parkedListeners === 1);
      expect(coordinator.isListenerRunning()).toBe(true);
    });
  });
});
