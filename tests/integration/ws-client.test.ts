/**
 * Hub Client Integration Tests
 *
 * Tests the WebSocket hub client, and the coordinator on top of it, against
 * the hub simulator.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { WsHubClient } from '../../src/client/ws-client.js';
import { HubSimulator } from '../../src/client/simulator.js';
import { HubCommand, HubConnectionError } from '../../src/client/types.js';
import { SyncCoordinator } from '../../src/core/sync/coordinator.js';
import { TimeoutError } from '../../src/core/sync/errors.js';
import { normalizeSnapshot } from '../../src/core/snapshot/types.js';
import { makeDevice, waitFor } from '../helpers/fake-hub.js';

const turnOn = { tag: 'm', idx: 'L1', type: '0x81', val: 1 };

function pause(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('WsHubClient Integration', () => {
  let simulator: HubSimulator;
  let client: WsHubClient;

  beforeEach(async () => {
    simulator = new HubSimulator({ devices: [makeDevice('a'), makeDevice('b')] });
    await simulator.start();

    client = new WsHubClient({
      host: '127.0.0.1',
      port: simulator.getPort(),
      connectTimeout: 1000,
      requestTimeout: 1000,
    });
  });

  afterEach(async () => {
    await client.close();
    await simulator.stop();
  });

  describe('requests', () => {
    it('should connect lazily and enumerate devices', async () => {
      expect(client.isConnected()).toBe(false);

      const response = await client.discoverDevices();

      expect(normalizeSnapshot(response).msg.map((device) => device.me)).toEqual(['a', 'b']);
      expect(client.isConnected()).toBe(true);
      expect(client.getStats().connections).toBe(1);
    });

    it('should query a single device', async () => {
      const found = await client.discoverDevicesById('b', 500);
      const missing = await client.discoverDevicesById('zz', 500);

      expect(normalizeSnapshot(found).msg.map((device) => device.me)).toEqual(['b']);
      expect(normalizeSnapshot(missing).msg).toEqual([]);
      expect(simulator.getRequests().map((request) => request.args?.['me'])).toEqual(['b', 'zz']);
    });

    it('should write a channel and receive the resulting push', async () => {
      const nextUpdate = client.getStateUpdates();

      const response = await client.setDeviceState('a', turnOn, 500);

      expect(response).toEqual({ code: 0 });
      await expect(nextUpdate).resolves.toEqual({ me: 'a', idx: 'L1', val: 1 });
      expect(simulator.getDevices()[0]?.data?.['L1']).toEqual({ v: 1, name: 'Left', type: '0x81' });
    });

    it('should return the code of a rejected write', async () => {
      const response = await client.setDeviceState('zz', turnOn, 500);

      expect(response).toEqual({ code: 404, msg: 'Unknown device zz' });
    });

    it('should time out a request the hub never answers', async () => {
      simulator.setSilent(HubCommand.DISCOVER_BY_ID);

      const error = await client.discoverDevicesById('a', 100).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TimeoutError);
      expect(error).toHaveProperty('message', 'discover_by_id timed out after 100ms');
      expect(client.getStats().pendingRequests).toBe(0);
    });

    it('should fail to connect when no hub is listening', async () => {
      await simulator.stop();

      await expect(client.discoverDevices()).rejects.toBeInstanceOf(HubConnectionError);
      expect(client.getStats().lastError).not.toBeNull();
    });
  });

  describe('push stream', () => {
    it('should deliver pushes to a waiting caller', async () => {
      await client.discoverDevices();

      const nextUpdate = client.getStateUpdates();
      simulator.pushUpdate({ me: 'a', idx: 'L2', val: 0 });

      await expect(nextUpdate).resolves.toEqual({ me: 'a', idx: 'L2', val: 0 });
    });

    it('should queue pushes that arrive between calls', async () => {
      await client.discoverDevices();

      simulator.pushUpdate({ me: 'a', idx: 'L1', val: 1 });
      simulator.pushUpdate({ me: 'b', idx: 'L2', val: 0 });
      await waitFor(() => client.getStats().queuedUpdates === 2);

      await expect(client.getStateUpdates()).resolves.toEqual({ me: 'a', idx: 'L1', val: 1 });
      await expect(client.getStateUpdates()).resolves.toEqual({ me: 'b', idx: 'L2', val: 0 });
    });

    it('should drop frames it cannot decode', async () => {
      await client.discoverDevices();

      const nextUpdate = client.getStateUpdates();
      simulator.broadcastRaw('not json');
      simulator.broadcastRaw(JSON.stringify({ type: 'push', me: '' }));
      simulator.pushUpdate({ me: 'b', idx: 'L1', val: 1 });

      await expect(nextUpdate).resolves.toEqual({ me: 'b', idx: 'L1', val: 1 });
    });

    it('should fail a waiting caller when the connection drops', async () => {
      await client.discoverDevices();

      const nextUpdate = client.getStateUpdates();
      await pause(20);
      simulator.dropClients();

      await expect(nextUpdate).rejects.toBeInstanceOf(HubConnectionError);
    });

    it('should report a drop that happened between calls', async () => {
      await client.discoverDevices();

      simulator.dropClients();
      await waitFor(() => !client.isConnected());

      await expect(client.getStateUpdates()).rejects.toBeInstanceOf(HubConnectionError);
    });

    it('should reconnect after a reset', async () => {
      await client.discoverDevices();

      const nextUpdate = client.getStateUpdates();
      await pause(20);
      await client.resetConnection();

      await expect(nextUpdate).rejects.toThrow('Connection reset');

      await client.discoverDevices();
      expect(client.getStats().connections).toBe(2);
      await waitFor(() => simulator.getClientCount() === 1);
    });

    it('should fail everything once closed', async () => {
      await client.discoverDevices();

      const nextUpdate = client.getStateUpdates();
      await pause(20);
      await client.close();

      await expect(nextUpdate).rejects.toThrow('Client closed');
      await expect(client.discoverDevices()).rejects.toThrow('Client closed');
    });
  });

  describe('with the coordinator', () => {
    let coordinator: SyncCoordinator;

    beforeEach(() => {
      coordinator = new SyncCoordinator(client, {
        scanIntervalMs: 60000,
        commandTimeoutMs: 1000,
        push: { baseDelayMs: 10 },
      });
    });

    afterEach(async () => {
      await coordinator.stop();
    });

    it('should sync, command and follow pushes end to end', async () => {
      await expect(coordinator.start()).resolves.toBe(true);
      expect(coordinator.getDevices().msg.map((device) => device.me)).toEqual(['a', 'b']);

      await expect(coordinator.setDeviceState('a', turnOn)).resolves.toBe(true);
      expect(coordinator.getDevice('a')?.data?.['L1']?.v).toBe(1);

      simulator.pushUpdate({ me: 'b', idx: 'L2', val: 0 });
      await waitFor(() => coordinator.getDevice('b')?.data?.['L2']?.v === 0);
    });

    it('should resume the push stream after the connection drops', async () => {
      await coordinator.start();
      await waitFor(() => coordinator.getListenerState() === 'listening');

      simulator.dropClients();
      await waitFor(() => client.getStats().connections === 2 && client.isConnected());
      expect(coordinator.getListenerState()).toBe('listening');

      simulator.pushUpdate({ me: 'a', idx: 'L2', val: 0 });
      await waitFor(() => coordinator.getDevice('a')?.data?.['L2']?.v === 0);
    });
  });
});
