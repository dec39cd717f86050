import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { isHubControlError } from '@hubcast/types';
import { HubController, createHubController } from '../index.js';
import type { CommandStateChange } from '../index.js';
import {
  createFakeRadio,
  quietLogger,
  switchAdvertisement,
  trainAdvertisement,
} from './fakes.js';
import type { FakeHci, FakeScanner } from './fakes.js';

describe('@hubcast/control - HubController', () => {
  let hci: FakeHci;
  let scanner: FakeScanner;
  let controller: HubController;

  beforeEach(() => {
    vi.useFakeTimers();
    const fake = createFakeRadio();
    hci = fake.hci;
    scanner = fake.scanner;
    controller = createHubController({
      radio: fake.radio,
      config: { resetOnStartup: false },
      now: () => Date.now(),
      logger: quietLogger,
    });
  });

  afterEach(async () => {
    const stopping = controller.stop();
    await vi.advanceTimersByTimeAsync(5000);
    await stopping;
    vi.useRealTimers();
  });

  async function startController(): Promise<void> {
    await controller.start();
    await vi.advanceTimersByTimeAsync(0);
  }

  // ─────────────────────────────────────────────────────────────────────
  // LIFECYCLE
  // ─────────────────────────────────────────────────────────────────────

  describe('lifecycle', () => {
    it('rejects commands before start', async () => {
      controller.registerHub(21, 'train');
      const error = await controller.enqueuePower(21, 10).catch((err: unknown) => err);
      expect(isHubControlError(error, 'NOT_RUNNING')).toBe(true);
    });

    it('starts scanning and refuses a second start', async () => {
      await startController();
      expect(controller.isRunning()).toBe(true);
      expect(scanner.isScanning()).toBe(true);
      await expect(controller.start()).rejects.toThrow('HubController already running');
    });

    it('resets the adapter on startup when configured', async () => {
      const fake = createFakeRadio();
      const resetting = createHubController({
        radio: fake.radio,
        config: { resetOnStartup: true },
        logger: quietLogger,
      });

      const started = resetting.start();
      await vi.advanceTimersByTimeAsync(1000);
      await started;

      expect(fake.hci.calls.slice(0, 2)).toEqual(['power:false', 'power:true']);
      await resetting.stop();
    });

    it('starts nothing when stopped during the startup reset', async () => {
      const fake = createFakeRadio();
      const resetting = createHubController({
        radio: fake.radio,
        config: { resetOnStartup: true },
        logger: quietLogger,
      });
      const started = vi.fn();
      resetting.on('started', started);

      const starting = resetting.start();
      await vi.advanceTimersByTimeAsync(100);
      const stopping = resetting.stop();
      await vi.advanceTimersByTimeAsync(2000);
      await stopping;
      await starting;

      expect(resetting.isRunning()).toBe(false);
      expect(fake.scanner.starts).toBe(0);
      expect(fake.scanner.isScanning()).toBe(false);
      expect(fake.hci.calls).toEqual(['power:false', 'power:true']);
      expect(started).not.toHaveBeenCalled();

      const restarting = resetting.start();
      await vi.advanceTimersByTimeAsync(1000);
      await restarting;
      await vi.advanceTimersByTimeAsync(0);
      expect(fake.scanner.isScanning()).toBe(true);
      expect(started).toHaveBeenCalledTimes(1);
      await resetting.stop();
      expect(fake.scanner.isScanning()).toBe(false);
    });

    it('does not mark a hub active once stopped', async () => {
      await startController();
      controller.registerHub(21, 'train');

      const queued = controller.enqueuePower(21, 30);
      const stopping = controller.stop();
      await vi.advanceTimersByTimeAsync(1000);
      await stopping;
      await queued;

      expect(controller.getHub(21)?.active).toBe(false);
      expect(vi.getTimerCount()).toBe(0);
    });

    it('stops scanning and rejects commands after stop', async () => {
      await startController();
      controller.registerHub(21, 'train');

      await controller.stop();

      expect(scanner.isScanning()).toBe(false);
      const error = await controller.enqueuePower(21, 10).catch((err: unknown) => err);
      expect(isHubControlError(error, 'NOT_RUNNING')).toBe(true);
    });
  });

  // ─────────────────────────────────────────────────────────────────────
  // CONNECTED VIEWS
  // ─────────────────────────────────────────────────────────────────────

  describe('connected views', () => {
    it('lists live trains and drops them after the liveness window', async () => {
      await startController();
      scanner.deliver(trainAdvertisement(21, 40));

      const train = controller.listConnectedTrains().get(21);
      expect(train).toMatchObject({
        channel: 21,
        name: 'Train 21',
        rssi: -60,
        lastUpdateSecondsAgo: 0,
        active: false,
        selfDrive: false,
        expectedUpdateIntervalMs: 500,
      });
      expect(train?.status?.speedPercent).toBe(40);

      await vi.advanceTimersByTimeAsync(1234);
      expect(controller.listConnectedTrains().get(21)?.lastUpdateSecondsAgo).toBe(1.23);

      await vi.advanceTimersByTimeAsync(6000 - 1234);
      expect(controller.listConnectedTrains().has(21)).toBe(false);
      expect(controller.getHub(21)?.kind).toBe('train');
    });

    it('decodes switch positions and port connections', async () => {
      await startController();
      scanner.deliver(switchAdvertisement(1, 0x05, 0x03));

      const entry = controller.listConnectedSwitches().get(1);
      expect(entry?.status?.positions).toEqual({ A: 0, B: 1, C: 0, D: 1 });
      expect(entry?.status?.portConnected).toEqual({ A: false, B: false, C: true, D: true });
      expect(entry?.reliability).toEqual({});
      expect(controller.listConnectedTrains().size).toBe(0);
    });

    it('does not list registered hubs that were never seen', async () => {
      await startController();
      controller.registerHub(21, 'train');
      expect(controller.listConnectedTrains().size).toBe(0);
      expect(controller.listHubs('train')).toHaveLength(1);
    });
  });

  // ─────────────────────────────────────────────────────────────────────
  // TRAIN COMMANDS
  // ─────────────────────────────────────────────────────────────────────

  describe('train commands', () => {
    it('requires a registered train', async () => {
      await startController();
      controller.registerHub(1, 'switch');

      await expect(controller.enqueuePower(21, 10)).rejects.toThrow(
        'Hub on channel 21 not registered. Known channels: []',
      );
      const error = await controller.enqueueSelfDrive(1, true).catch((err: unknown) => err);
      expect(isHubControlError(error, 'UNKNOWN_DEVICE')).toBe(true);
    });

    it('clamps power to the configured range', async () => {
      await startController();
      controller.registerHub(21, 'train');
      const queued: CommandStateChange[] = [];
      controller.on('commandStateChanged', (change) => {
        if (change.state === 'queued') queued.push(change);
      });

      await controller.enqueuePower(21, 150);
      await controller.enqueuePower(21, -250);

      expect(queued.map((change) => change.command)).toEqual([
        { type: 'setPower', channel: 21, power: 100 },
        { type: 'setPower', channel: 21, power: -100 },
      ]);
    });

    it('rejects non-integer power', async () => {
      await startController();
      controller.registerHub(21, 'train');

      await expect(controller.enqueuePower(21, 12.5)).rejects.toThrow('Invalid power: 12.5. Must be an integer');
      const error = await controller.enqueuePower(21, Number.NaN).catch((err: unknown) => err);
      expect(isHubControlError(error, 'INVALID_COMMAND')).toBe(true);
    });

    it('marks the train active for five seconds', async () => {
      await startController();
      controller.registerHub(21, 'train');

      await controller.enqueuePower(21, 30);
      expect(controller.getHub(21)?.active).toBe(true);

      await vi.advanceTimersByTimeAsync(4999);
      expect(controller.getHub(21)?.active).toBe(true);
      await vi.advanceTimersByTimeAsync(1);
      expect(controller.getHub(21)?.active).toBe(false);
    });

    it('transmits the power frame', async () => {
      await startController();
      controller.registerHub(21, 'train');

      await controller.enqueuePower(21, 50);
      await vi.advanceTimersByTimeAsync(200);

      expect(hci.dataLoads()).toEqual(['07ff970315006132']);
    });

    it('tracks self-drive locally', async () => {
      await startController();
      scanner.deliver(trainAdvertisement(21, 20));

      await controller.enqueueSelfDrive(21, true);

      expect(controller.getHub(21)?.selfDrive).toBe(true);
      const train = controller.listConnectedTrains().get(21);
      expect(train?.selfDrive).toBe(true);
      expect(train?.status?.selfDrive).toBe(true);
      expect(train?.active).toBe(true);
      expect(train?.expectedUpdateIntervalMs).toBe(100);
    });
  });

  // ─────────────────────────────────────────────────────────────────────
  // SWITCH COMMANDS
  // ─────────────────────────────────────────────────────────────────────

  describe('switch commands', () => {
    it('validates port, position and device', async () => {
      await startController();
      controller.registerHub(1, 'switch');
      controller.registerHub(21, 'train');

      await expect(controller.enqueueSwitch(1, 'E', 1)).rejects.toThrow(
        'Invalid switch port: E. Must be one of A, B, C, D',
      );
      await expect(controller.enqueueSwitch(1, 'A', 2)).rejects.toThrow('Invalid position: 2. Must be 0 or 1');
      await expect(controller.enqueueSwitch(21, 'A', 1)).rejects.toThrow(
        'Hub on channel 21 not registered. Known channels: [1]',
      );
    });

    it('resolves true once the switch reports the position', async () => {
      await startController();
      scanner.deliver(switchAdvertisement(1, 0x00));

      const result = controller.enqueueSwitch(1, 'A', 1);
      await vi.advanceTimersByTimeAsync(1000);
      scanner.deliver(switchAdvertisement(1, 0x08));

      await expect(result).resolves.toBe(true);
      expect(controller.listConnectedSwitches().get(1)?.reliability).toEqual({
        SWITCH_A: { attempts: 1, successes: 1, successRate: 100 },
      });
    });

    it('resolves false after three unconfirmed attempts', async () => {
      await startController();
      controller.registerHub(1, 'switch');

      const result = controller.enqueueSwitch(1, 'A', 1);
      await vi.advanceTimersByTimeAsync(11_000);

      await expect(result).resolves.toBe(false);
      expect(controller.getReliability(1)).toEqual({
        SWITCH_A: { attempts: 3, successes: 0, successRate: 0 },
      });
    });
  });

  it('resets the adapter on request', async () => {
    await startController();

    const reset = controller.resetAdapter();
    await vi.advanceTimersByTimeAsync(1000);
    await reset;

    expect(hci.calls).toEqual(['power:false', 'power:true']);
  });

  it('validates its configuration', () => {
    expect(() => new HubController({ config: { maxRetries: 0 }, logger: quietLogger })).toThrow();
    expect(() => new HubController({ config: { powerMin: 20, powerMax: 10 }, logger: quietLogger })).toThrow(
      'powerMin (20) exceeds powerMax (10)',
    );
  });
});
