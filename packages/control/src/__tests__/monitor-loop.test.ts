import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { isTrainStatus } from '@hubcast/types';
import { AdvertisementCodec } from '@hubcast/protocol';
import { DeviceRegistry, MonitorLoop } from '../index.js';
import { createFakeRadio, quietLogger, trainAdvertisement } from './fakes.js';
import type { FakeScanner } from './fakes.js';

describe('@hubcast/control - MonitorLoop', () => {
  let scanner: FakeScanner;
  let registry: DeviceRegistry;
  let monitor: MonitorLoop;

  beforeEach(() => {
    vi.useFakeTimers();
    const fake = createFakeRadio();
    scanner = fake.scanner;
    registry = new DeviceRegistry({ now: () => Date.now(), logger: quietLogger });
    monitor = new MonitorLoop({
      radio: fake.radio,
      codec: new AdvertisementCodec(),
      registry,
      now: () => Date.now(),
      logger: quietLogger,
    });
  });

  afterEach(async () => {
    await monitor.stop();
    registry.dispose();
    vi.useRealTimers();
  });

  it('records decoded status from the scan', async () => {
    monitor.start();
    await vi.advanceTimersByTimeAsync(0);
    expect(scanner.starts).toBe(1);

    scanner.deliver(trainAdvertisement(21, -50));

    const hub = registry.get(21);
    expect(hub?.kind).toBe('train');
    const status = hub?.lastStatus ?? null;
    expect(isTrainStatus(status) && status.speedPercent).toBe(-50);
    expect(isTrainStatus(status) && status.direction).toBe('backward');
  });

  it('skips advertisements that fail to decode', async () => {
    monitor.start();
    await vi.advanceTimersByTimeAsync(0);

    scanner.deliver({
      address: 'aa:bb:cc:dd:ee:01',
      localName: 'Train 9',
      rssi: -80,
      manufacturerData: Buffer.from([0x97, 0x03, 0x0b]),
    });
    scanner.deliver(trainAdvertisement(21, 10));

    expect(registry.channels()).toEqual([21]);
    expect(quietLogger.debug).toHaveBeenCalledWith(
      'Skipped advertisement from aa:bb:cc:dd:ee:01: Status frame too short: 3 bytes (min: 9)',
    );
  });

  it('ignores foreign advertisements', async () => {
    monitor.start();
    await vi.advanceTimersByTimeAsync(0);

    scanner.deliver({ address: 'aa:01', localName: 'Headphones', rssi: -40, manufacturerData: undefined });

    expect(registry.list()).toEqual([]);
  });

  it('restarts the scan one second after a failure', async () => {
    const restarting = vi.fn();
    monitor.on('scanRestarting', restarting);
    monitor.start();
    await vi.advanceTimersByTimeAsync(0);

    scanner.fail(new Error('adapter state changed to poweredOff'));
    await vi.advanceTimersByTimeAsync(0);

    expect(scanner.stops).toBe(1);
    expect(restarting).toHaveBeenCalledWith('adapter state changed to poweredOff');

    await vi.advanceTimersByTimeAsync(999);
    expect(scanner.starts).toBe(1);
    await vi.advanceTimersByTimeAsync(1);
    expect(scanner.starts).toBe(2);
    expect(monitor.getRestartCount()).toBe(1);
  });

  it('keeps retrying when the scan cannot start', async () => {
    scanner.startError = new Error('No adapter');
    const restarting = vi.fn();
    monitor.on('scanRestarting', restarting);
    monitor.start();

    await vi.advanceTimersByTimeAsync(2000);
    expect(scanner.starts).toBe(0);
    expect(restarting).toHaveBeenCalledWith('Failed to start scan: No adapter');
    expect(monitor.getRestartCount()).toBe(3);

    scanner.startError = null;
    await vi.advanceTimersByTimeAsync(1000);
    expect(scanner.starts).toBe(1);
  });

  it('stops scanning on stop', async () => {
    monitor.start();
    await vi.advanceTimersByTimeAsync(0);

    await monitor.stop();
    await vi.advanceTimersByTimeAsync(5000);

    expect(monitor.isRunning()).toBe(false);
    expect(scanner.isScanning()).toBe(false);
    expect(scanner.starts).toBe(1);
  });

  it('refuses to start twice', () => {
    monitor.start();
    expect(() => monitor.start()).toThrow('MonitorLoop already running');
  });
});
