import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { isHubControlError, isSwitchStatus, isTrainStatus } from '@hubcast/types';
import { DeviceRegistry } from '../index.js';
import { decodedSwitch, decodedTrain, quietLogger } from './fakes.js';

describe('@hubcast/control - DeviceRegistry', () => {
  let clock: number;
  let registry: DeviceRegistry;

  beforeEach(() => {
    vi.useFakeTimers();
    clock = 0;
    registry = new DeviceRegistry({ now: () => clock, logger: quietLogger });
  });

  afterEach(() => {
    registry.dispose();
    vi.useRealTimers();
  });

  // ─────────────────────────────────────────────────────────────────────
  // REGISTRATION
  // ─────────────────────────────────────────────────────────────────────

  describe('registration', () => {
    it('auto-registers a hub on its first status', () => {
      const registered = vi.fn();
      const updated = vi.fn();
      registry.on('hubRegistered', registered);
      registry.on('statusUpdated', updated);

      expect(registry.recordStatus(decodedTrain(21, 40), 1000)).toBe(true);

      expect(registered).toHaveBeenCalledTimes(1);
      expect(registered.mock.calls[0]?.[0]).toMatchObject({ channel: 21, kind: 'train', lastSeen: null });
      expect(updated).toHaveBeenCalledTimes(1);
      expect(registry.get(21)).toMatchObject({ channel: 21, kind: 'train', name: 'Train 21', lastSeen: 1000, rssi: -60 });
    });

    it('registers advertised hubs through getOrCreate', () => {
      const getOrCreate = vi.spyOn(registry, 'getOrCreate');

      registry.recordStatus(decodedSwitch(1, { A: 0, B: 0, C: 0, D: 0 }), 10);

      expect(getOrCreate).toHaveBeenCalledWith(1, 'switch', 'Technic Hub');
    });

    it('returns the existing hub from getOrCreate', () => {
      registry.getOrCreate(3, 'switch', 'Yard');
      const again = registry.getOrCreate(3, 'train', 'Other');
      expect(again.kind).toBe('switch');
      expect(again.name).toBe('Yard');
      expect(registry.list()).toHaveLength(1);
    });

    it('registers explicitly with a default name', () => {
      expect(registry.register(21, 'train').name).toBe('Train 21');
      expect(registry.register(1, 'switch').name).toBe('Switch 1');
      expect(registry.register(21, 'train', 'Cargo').name).toBe('Cargo');
    });

    it('rejects invalid channels and kind conflicts', () => {
      expect(() => registry.register(0, 'train')).toThrow('Invalid channel: 0');
      registry.register(5, 'train');
      expect(() => registry.register(5, 'switch')).toThrow('Channel 5 is already registered as a train hub');
    });

    it('names known channels when a hub is missing', () => {
      registry.register(21, 'train');
      registry.register(1, 'switch');
      registry.register(7, 'train');

      expect(() => registry.requireKind(9, 'train')).toThrow('Hub on channel 9 not registered. Known channels: [7, 21]');
      expect(() => registry.requireKind(1, 'train')).toThrow('Hub on channel 1 not registered');
      expect(registry.requireKind(1, 'switch').kind).toBe('switch');
    });

    it('lists hubs ordered by channel', () => {
      registry.register(21, 'train');
      registry.register(1, 'switch');
      registry.register(7, 'train');
      expect(registry.channels()).toEqual([1, 7, 21]);
      expect(registry.channels('train')).toEqual([7, 21]);
    });
  });

  // ─────────────────────────────────────────────────────────────────────
  // STATUS
  // ─────────────────────────────────────────────────────────────────────

  describe('status', () => {
    it('replaces the last status whole', () => {
      registry.recordStatus(decodedSwitch(1, { A: 1, B: 1, C: 1, D: 1 }), 10);
      registry.recordStatus(decodedSwitch(1, { A: 0, B: 1, C: 0, D: 1 }), 20);

      const status = registry.get(1)?.lastStatus ?? null;
      expect(isSwitchStatus(status)).toBe(true);
      if (isSwitchStatus(status)) {
        expect(status.positions).toEqual({ A: 0, B: 1, C: 0, D: 1 });
      }
      expect(registry.get(1)?.lastSeen).toBe(20);
    });

    it('drops status whose kind disagrees with the registration', () => {
      registry.register(1, 'switch');
      const updated = vi.fn();
      registry.on('statusUpdated', updated);

      expect(registry.recordStatus(decodedTrain(1, 30), 10)).toBe(false);
      expect(updated).not.toHaveBeenCalled();
      expect(registry.get(1)?.lastStatus).toBeNull();
    });

    it('does not hand out its internal hub objects', () => {
      registry.register(21, 'train');
      const copy = registry.get(21);
      if (copy) copy.name = 'changed';
      expect(registry.get(21)?.name).toBe('Train 21');
    });
  });

  // ─────────────────────────────────────────────────────────────────────
  // LIVENESS
  // ─────────────────────────────────────────────────────────────────────

  describe('liveness', () => {
    it('is false for hubs never seen', () => {
      registry.register(21, 'train');
      expect(registry.isLive(21)).toBe(false);
      expect(registry.isLive(22)).toBe(false);
    });

    it('uses an exclusive window boundary', () => {
      registry.recordStatus(decodedTrain(21, 40), 1000);

      clock = 5999;
      expect(registry.isLive(21)).toBe(true);
      clock = 6000;
      expect(registry.isLive(21)).toBe(false);
    });

    it('accepts an explicit window', () => {
      registry.recordStatus(decodedTrain(21, 40), 0);
      expect(registry.isLive(21, 1000, 999)).toBe(true);
      expect(registry.isLive(21, 1000, 1000)).toBe(false);
    });

    it('reports seconds since the last advertisement', () => {
      registry.recordStatus(decodedTrain(21, 40), 1000);
      clock = 2500;
      expect(registry.secondsSinceSeen(21)).toBe(1.5);
      expect(registry.secondsSinceSeen(3)).toBeNull();
    });
  });

  // ─────────────────────────────────────────────────────────────────────
  // ACTIVITY
  // ─────────────────────────────────────────────────────────────────────

  describe('activity', () => {
    it('clears the active flag after the hold from the latest mark', async () => {
      registry.register(21, 'train');
      const changed = vi.fn();
      registry.on('activeChanged', changed);

      registry.markActive(21);
      await vi.advanceTimersByTimeAsync(3000);
      registry.markActive(21);

      await vi.advanceTimersByTimeAsync(4999);
      expect(registry.isActive(21)).toBe(true);

      await vi.advanceTimersByTimeAsync(1);
      expect(registry.isActive(21)).toBe(false);
      expect(changed.mock.calls).toEqual([
        [21, true],
        [21, false],
      ]);
    });

    it('densifies the expected update interval while active', () => {
      registry.register(21, 'train');
      expect(registry.expectedUpdateIntervalMs(21)).toBe(500);
      registry.markActive(21, 1000);
      expect(registry.expectedUpdateIntervalMs(21)).toBe(100);
    });

    it('rejects marks for unknown hubs', () => {
      try {
        registry.markActive(4);
        expect.unreachable();
      } catch (error) {
        expect(isHubControlError(error, 'UNKNOWN_DEVICE')).toBe(true);
      }
    });

    it('cancels pending clears on dispose', () => {
      registry.register(21, 'train');
      registry.markActive(21);
      registry.dispose();
      expect(vi.getTimerCount()).toBe(0);
    });
  });

  describe('self-drive', () => {
    it('tracks self-drive locally and carries it into train status', () => {
      registry.recordStatus(decodedTrain(21, 40), 0);
      registry.setSelfDrive(21, true);

      let status = registry.get(21)?.lastStatus ?? null;
      expect(isTrainStatus(status) && status.selfDrive).toBe(true);

      registry.recordStatus(decodedTrain(21, 35), 100);
      status = registry.get(21)?.lastStatus ?? null;
      expect(isTrainStatus(status) && status.selfDrive).toBe(true);
      expect(registry.get(21)?.selfDrive).toBe(true);
    });
  });
});
