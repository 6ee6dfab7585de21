/**
 * Snapshot Store Unit Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { SnapshotStore, type SnapshotChange } from '../../src/core/snapshot/store.js';
import { normalizeSnapshot, parsePushUpdate, toDeviceInfo } from '../../src/core/snapshot/types.js';
import { makeDevice } from '../helpers/fake-hub.js';

describe('SnapshotStore', () => {
  let store: SnapshotStore;

  beforeEach(() => {
    store = new SnapshotStore();
  });

  describe('mergeFull', () => {
    it('should replace the store and preserve hub order', () => {
      store.mergeFull({ msg: [makeDevice('b'), makeDevice('a')] });

      expect(store.deviceIds()).toEqual(['b', 'a']);
      expect(store.size).toBe(2);
      expect(store.has('a')).toBe(true);

      store.mergeFull({ msg: [makeDevice('c')] });

      expect(store.deviceIds()).toEqual(['c']);
      expect(store.has('a')).toBe(false);
      expect(store.getDevice('a')).toBeUndefined();
    });

    it('should keep the first position and the last record for a repeated id', () => {
      store.mergeFull({
        msg: [makeDevice('a', { name: 'first' }), makeDevice('b'), makeDevice('a', { name: 'second' })],
      });

      expect(store.deviceIds()).toEqual(['a', 'b']);
      expect(store.getDevice('a')?.name).toBe('second');
    });

    it('should give a device without data an empty channel map', () => {
      store.mergeFull({ msg: [{ me: 'bare' }] });

      expect(store.getDevice('bare')).toEqual({ me: 'bare', data: {} });
    });

    it('should not share channel records with the input', () => {
      const device = makeDevice('a');
      store.mergeFull({ msg: [device] });

      const channel = device.data?.['L1'];
      if (channel) {
        channel.v = 99;
      }

      expect(store.getDevice('a')?.data?.['L1']?.v).toBe(0);
    });

    it('should increment the version', () => {
      expect(store.version).toBe(0);
      store.mergeFull({ msg: [makeDevice('a')] });
      expect(store.version).toBe(1);
    });

    it('should leave the same store when applied twice', () => {
      const snapshot = { msg: [makeDevice('a'), makeDevice('b'), makeDevice('a', { name: 'again' })] };

      store.mergeFull(snapshot);
      const once = store.read();

      store.mergeFull(snapshot);

      expect(store.read()).toEqual(once);
      expect(store.deviceIds()).toEqual(['a', 'b']);
      expect(store.getDevice('a')?.name).toBe('again');
      expect(store.getDevice('b')).toEqual(makeDevice('b'));
    });
  });

  describe('mergeDelta', () => {
    beforeEach(() => {
      store.mergeFull({ msg: [makeDevice('a'), makeDevice('b')] });
    });

    it('should update one channel value and keep the channel name', () => {
      const applied = store.mergeDelta({ me: 'a', idx: 'L1', val: 1 });

      expect(applied).toBe(true);
      expect(store.getDevice('a')?.data?.['L1']).toEqual({ v: 1, name: 'Left' });
      expect(store.getDevice('a')?.data?.['L2']).toEqual({ v: 1, name: 'Right' });
    });

    it('should create a channel the device did not report', () => {
      store.mergeDelta({ me: 'b', idx: 'P4', val: 'x' });

      expect(store.getDevice('b')?.data?.['P4']).toEqual({ v: 'x' });
    });

    it('should ignore deltas for unknown devices', () => {
      const before = store.read();
      const version = store.version;

      expect(store.mergeDelta({ me: 'ghost', idx: 'L1', val: 1 })).toBe(false);
      expect(store.read().msg).toBe(before.msg);
      expect(store.version).toBe(version);
    });

    it('should leave views taken before the write unchanged', () => {
      const before = store.read();
      const deviceBefore = store.getDevice('a');

      store.mergeDelta({ me: 'a', idx: 'L1', val: 1 });

      expect(before.msg[0]?.data?.['L1']?.v).toBe(0);
      expect(deviceBefore?.data?.['L1']?.v).toBe(0);
      expect(store.read().msg).not.toBe(before.msg);
    });

    it('should not disturb other devices', () => {
      const other = store.getDevice('b');
      store.mergeDelta({ me: 'a', idx: 'L1', val: 1 });
      expect(store.getDevice('b')).toBe(other);
    });
  });

  describe('mergeDevice', () => {
    it('should replace a known device in place', () => {
      store.mergeFull({ msg: [makeDevice('a'), makeDevice('b')] });

      const replaced = store.mergeDevice(makeDevice('a', { name: 'Updated', data: { L1: { v: 1 } } }));

      expect(replaced).toBe(true);
      expect(store.deviceIds()).toEqual(['a', 'b']);
      expect(store.getDevice('a')?.name).toBe('Updated');
      expect(store.getDevice('a')?.data).toEqual({ L1: { v: 1 } });
    });

    it('should ignore unknown devices', () => {
      store.mergeFull({ msg: [makeDevice('a')] });
      expect(store.mergeDevice(makeDevice('z'))).toBe(false);
      expect(store.size).toBe(1);
    });
  });

  describe('clear', () => {
    it('should drop every device', () => {
      store.mergeFull({ msg: [makeDevice('a')] });
      store.clear();

      expect(store.size).toBe(0);
      expect(store.read().msg).toEqual([]);
      expect(store.has('a')).toBe(false);
    });
  });

  describe('listeners', () => {
    it('should report each change with its version', () => {
      const changes: SnapshotChange[] = [];
      store.addListener((change) => changes.push(change));

      store.mergeFull({ msg: [makeDevice('a')] });
      store.mergeDelta({ me: 'a', idx: 'L1', val: 1 });
      store.mergeDevice(makeDevice('a'));
      store.clear();

      expect(changes).toEqual([
        { type: 'replaced', deviceCount: 1, version: 1 },
        { type: 'delta', deviceId: 'a', idx: 'L1', value: 1, version: 2 },
        { type: 'device', deviceId: 'a', version: 3 },
        { type: 'cleared', version: 4 },
      ]);
    });

    it('should keep notifying after a listener throws', () => {
      const good = vi.fn();
      store.addListener(() => {
        throw new Error('listener failure');
      });
      store.addListener(good);

      store.mergeFull({ msg: [] });

      expect(good).toHaveBeenCalledTimes(1);
    });

    it('should stop notifying removed listeners', () => {
      const listener = vi.fn();
      const unsubscribe = store.addListener(listener);
      unsubscribe();

      store.clear();

      expect(listener).not.toHaveBeenCalled();
    });
  });
});

describe('normalizeSnapshot', () => {
  it('should accept the hub list shape', () => {
    const snapshot = normalizeSnapshot({ code: 0, msg: [{ me: 'a' }, { me: 'b' }] });
    expect(snapshot.msg.map((d) => d.me)).toEqual(['a', 'b']);
  });

  it('should accept a msg keyed by device id', () => {
    const snapshot = normalizeSnapshot({ msg: { a: { me: 'a' }, b: { me: 'b' } } });
    expect(snapshot.msg.map((d) => d.me)).toEqual(['a', 'b']);
  });

  it('should accept a bare record keyed by device id', () => {
    const snapshot = normalizeSnapshot({ a: { me: 'a', devtype: 'SL_NATURE' } });
    expect(snapshot.msg).toEqual([{ me: 'a', devtype: 'SL_NATURE' }]);
  });

  it('should drop entries without a usable id', () => {
    const snapshot = normalizeSnapshot({ msg: [{ me: '' }, { name: 'no id' }, 'junk', { me: 'ok' }] });
    expect(snapshot.msg).toEqual([{ me: 'ok' }]);
  });

  it('should keep unknown device fields', () => {
    const snapshot = normalizeSnapshot({ msg: [{ me: 'a', stat: 1 }] });
    expect(snapshot.msg[0]).toEqual({ me: 'a', stat: 1 });
  });

  it('should keep devices whose metadata has the wrong type', () => {
    const snapshot = normalizeSnapshot({
      msg: [{ me: 'a', name: null, epver: 12, data: { L1: { v: 0, name: 3 }, L2: 'junk' } }, { me: 'b' }],
    });

    expect(snapshot.msg.map((d) => d.me)).toEqual(['a', 'b']);
    expect(snapshot.msg[0]?.name).toBeUndefined();
    expect(snapshot.msg[0]?.epver).toBeUndefined();
    expect(snapshot.msg[0]?.data).toEqual({ L1: { v: 0 } });

    const device = snapshot.msg[0];
    if (device) {
      expect(toDeviceInfo(device)).toEqual({ me: 'a', name: null, devtype: null, agt: null, epver: null });
    }
  });

  it('should keep a device whose channel map is not an object', () => {
    const snapshot = normalizeSnapshot({ msg: [{ me: 'c', data: 'none' }] });
    expect(snapshot.msg).toEqual([{ me: 'c' }]);
  });

  it('should let deltas reach a device with partial metadata', () => {
    const store = new SnapshotStore();
    store.mergeFull(normalizeSnapshot({ msg: [{ me: 'a', name: null, data: { L1: { v: 0, name: 3 } } }] }));

    expect(store.mergeDelta({ me: 'a', idx: 'L1', val: 1 })).toBe(true);
    expect(store.getDevice('a')?.data?.['L1']?.v).toBe(1);
  });

  it('should return an empty snapshot for malformed payloads', () => {
    expect(normalizeSnapshot(null)).toEqual({ msg: [] });
    expect(normalizeSnapshot('text')).toEqual({ msg: [] });
    expect(normalizeSnapshot([{ me: 'a' }])).toEqual({ msg: [] });
    expect(normalizeSnapshot({ code: 0, msg: 'nope' })).toEqual({ msg: [] });
    expect(normalizeSnapshot({ code: 0 })).toEqual({ msg: [] });
  });
});

describe('parsePushUpdate', () => {
  it('should return the event fields', () => {
    expect(parsePushUpdate({ me: 'a', idx: 'L1', val: 0, extra: true })).toEqual({ me: 'a', idx: 'L1', val: 0 });
  });

  it('should reject events missing a field', () => {
    expect(parsePushUpdate({ me: 'a', idx: 'L1' })).toBeNull();
    expect(parsePushUpdate({ me: 'a', val: 1 })).toBeNull();
    expect(parsePushUpdate({ idx: 'L1', val: 1 })).toBeNull();
    expect(parsePushUpdate('L1=1')).toBeNull();
  });

  it('should reject an event without a value', () => {
    expect(parsePushUpdate({ me: 'a', idx: 'L1', val: null })).toBeNull();
  });
});
