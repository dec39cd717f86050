import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { isHubControlError } from '@hubcast/types';
import { AdvertisementCodec } from '@hubcast/protocol';
import type { RadioAccessLayer } from '@hubcast/radio';
import {
  DeviceRegistry,
  ReliabilityTracker,
  SwitchPipeline,
  TrainPipeline,
  waitForSwitchPosition,
} from '../index.js';
import type { CommandStateChange } from '../index.js';
import { FakeHci, createFakeRadio, decodedSwitch, quietLogger } from './fakes.js';

const codec = new AdvertisementCodec();

function recordStates(pipeline: TrainPipeline | SwitchPipeline): CommandStateChange[] {
  const changes: CommandStateChange[] = [];
  pipeline.on('commandStateChanged', (change) => changes.push(change));
  return changes;
}

describe('@hubcast/control - command pipelines', () => {
  let radio: RadioAccessLayer;
  let hci: FakeHci;
  let registry: DeviceRegistry;

  beforeEach(() => {
    vi.useFakeTimers();
    ({ radio, hci } = createFakeRadio());
    registry = new DeviceRegistry({ now: () => Date.now(), logger: quietLogger });
  });

  afterEach(() => {
    registry.dispose();
    vi.useRealTimers();
  });

  // ─────────────────────────────────────────────────────────────────────
  // TRAINS
  // ─────────────────────────────────────────────────────────────────────

  describe('TrainPipeline', () => {
    let pipeline: TrainPipeline;

    beforeEach(() => {
      pipeline = new TrainPipeline({ radio, codec, registry, logger: quietLogger });
      pipeline.start();
    });

    afterEach(async () => {
      await pipeline.stop();
    });

    it('transmits a command once at the train advertising interval', async () => {
      const states = recordStates(pipeline);
      const { outcome } = await pipeline.enqueue({ type: 'setPower', channel: 21, power: 50 });

      await vi.advanceTimersByTimeAsync(200);

      await expect(outcome).resolves.toBe(true);
      expect(hci.calls).toEqual(['enable:false', 'params:48', 'data:07ff970315006132', 'enable:true']);
      expect(states.map((change) => `${change.state}:${change.attempt}`)).toEqual([
        'queued:0',
        'sending:1',
        'succeeded:1',
      ]);
    });

    it('pulses twice on channels that need an extra pulse', async () => {
      const { outcome } = await pipeline.enqueue({ type: 'setPower', channel: 22, power: 10 });

      await vi.advanceTimersByTimeAsync(400);

      await expect(outcome).resolves.toBe(true);
      expect(hci.dataLoads()).toEqual(['07ff97031600610a', '07ff97031600610a']);
    });

    it('encodes self-drive with its sentinel', async () => {
      const { outcome } = await pipeline.enqueue({ type: 'setSelfDrive', channel: 21, enabled: true });

      await vi.advanceTimersByTimeAsync(200);

      await expect(outcome).resolves.toBe(true);
      expect(hci.dataLoads()).toEqual(['07ff970315006165']);
    });

    it('sends queued commands in order', async () => {
      const outcomes: Promise<boolean>[] = [];
      for (let power = 1; power <= 6; power++) {
        outcomes.push((await pipeline.enqueue({ type: 'setPower', channel: 21, power })).outcome);
      }

      await vi.advanceTimersByTimeAsync(2000);

      expect(await Promise.all(outcomes)).toEqual([true, true, true, true, true, true]);
      expect(hci.dataLoads().map((hex) => hex.slice(-2))).toEqual(['01', '02', '03', '04', '05', '06']);
    });

    it('reports a transmit failure without retrying', async () => {
      hci.failData = true;
      const states = recordStates(pipeline);
      const { outcome } = await pipeline.enqueue({ type: 'setPower', channel: 21, power: 50 });

      await vi.advanceTimersByTimeAsync(200);

      await expect(outcome).resolves.toBe(false);
      expect(states.at(-1)).toMatchObject({
        state: 'exhausted',
        attempt: 1,
        error: 'Transmit failed: bus error',
        errorCode: 'TRANSMIT_FAILURE',
      });
      expect(hci.calls.filter((call) => call === 'params:48')).toHaveLength(1);
    });

    it('refuses to start twice', () => {
      expect(() => pipeline.start()).toThrow('TrainPipeline already running');
    });
  });

  describe('pipeline lifecycle', () => {
    it('rejects commands before start and after stop', async () => {
      const pipeline = new TrainPipeline({ radio, codec, registry, logger: quietLogger });
      const before = await pipeline.enqueue({ type: 'setPower', channel: 21, power: 1 }).catch((err: unknown) => err);
      expect(isHubControlError(before, 'NOT_RUNNING')).toBe(true);

      pipeline.start();
      expect(pipeline.isRunning()).toBe(true);
      await pipeline.stop();

      const after = await pipeline.enqueue({ type: 'setPower', channel: 21, power: 1 }).catch((err: unknown) => err);
      expect(isHubControlError(after, 'NOT_RUNNING')).toBe(true);
      expect(pipeline.isRunning()).toBe(false);
    });
  });

  // ─────────────────────────────────────────────────────────────────────
  // SWITCHES
  // ─────────────────────────────────────────────────────────────────────

  describe('SwitchPipeline', () => {
    let reliability: ReliabilityTracker;
    let pipeline: SwitchPipeline;

    beforeEach(() => {
      reliability = new ReliabilityTracker();
      registry.register(1, 'switch');
      pipeline = new SwitchPipeline({ radio, codec, registry, reliability, logger: quietLogger });
      pipeline.start();
    });

    afterEach(async () => {
      await pipeline.stop();
    });

    it('gives up after three unconfirmed attempts with linear backoff', async () => {
      const states = recordStates(pipeline);
      const { outcome } = await pipeline.enqueue({ type: 'setSwitch', channel: 1, port: 'A', position: 1 });

      // transmit 900ms + verify 2000ms, then 500ms backoff
      await vi.advanceTimersByTimeAsync(3399);
      expect(reliability.get(1, 'SWITCH_A').attempts).toBe(1);
      await vi.advanceTimersByTimeAsync(1);
      expect(reliability.get(1, 'SWITCH_A').attempts).toBe(2);

      // second attempt ends at 6300ms, then 1000ms backoff
      await vi.advanceTimersByTimeAsync(3899);
      expect(reliability.get(1, 'SWITCH_A').attempts).toBe(2);
      await vi.advanceTimersByTimeAsync(1);
      expect(reliability.get(1, 'SWITCH_A').attempts).toBe(3);

      await vi.advanceTimersByTimeAsync(3000);

      await expect(outcome).resolves.toBe(false);
      expect(reliability.get(1, 'SWITCH_A')).toEqual({ attempts: 3, successes: 0 });
      expect(hci.dataLoads()).toHaveLength(6);
      expect(hci.dataLoads()[0]).toBe('08ff9703010062e903');
      expect(states.map((change) => `${change.state}:${change.attempt}`)).toEqual([
        'queued:0',
        'sending:1',
        'verifying:1',
        'sending:2',
        'verifying:2',
        'sending:3',
        'verifying:3',
        'exhausted:3',
      ]);
      expect(states.at(-1)).toMatchObject({
        errorCode: 'VERIFICATION_TIMEOUT',
        error: 'Switch A not confirmed within 2000ms',
      });
    });

    it('succeeds when the hub reports the requested position', async () => {
      const { outcome } = await pipeline.enqueue({ type: 'setSwitch', channel: 1, port: 'A', position: 1 });

      await vi.advanceTimersByTimeAsync(1000);
      registry.recordStatus(decodedSwitch(1, { A: 0, B: 0, C: 0, D: 0 }));
      await vi.advanceTimersByTimeAsync(500);
      registry.recordStatus(decodedSwitch(1, { A: 1, B: 0, C: 0, D: 0 }));

      await expect(outcome).resolves.toBe(true);
      expect(reliability.get(1, 'SWITCH_A')).toEqual({ attempts: 1, successes: 1 });
    });

    it('confirms at once when the position is already reported', async () => {
      registry.recordStatus(decodedSwitch(1, { A: 0, B: 0, C: 1, D: 0 }));
      const states = recordStates(pipeline);
      const { outcome } = await pipeline.enqueue({ type: 'setSwitch', channel: 1, port: 'C', position: 1 });

      await vi.advanceTimersByTimeAsync(900);

      await expect(outcome).resolves.toBe(true);
      expect(states.at(-1)).toMatchObject({ state: 'succeeded', attempt: 1 });
    });

    it('absorbs transmit failures per attempt', async () => {
      hci.failData = true;
      const { outcome } = await pipeline.enqueue({ type: 'setSwitch', channel: 1, port: 'B', position: 0 });

      await vi.advanceTimersByTimeAsync(2100);

      await expect(outcome).resolves.toBe(false);
      expect(reliability.get(1, 'SWITCH_B')).toEqual({ attempts: 3, successes: 0 });
    });

    it('gives up queued commands on stop', async () => {
      const states = recordStates(pipeline);
      const first = await pipeline.enqueue({ type: 'setSwitch', channel: 1, port: 'A', position: 1 });
      const second = await pipeline.enqueue({ type: 'setSwitch', channel: 1, port: 'B', position: 1 });

      await vi.advanceTimersByTimeAsync(1000);
      await pipeline.stop();

      await expect(first.outcome).resolves.toBe(false);
      await expect(second.outcome).resolves.toBe(false);
      expect(states.filter((change) => change.id === second.id).map((change) => change.state)).toEqual([
        'queued',
        'exhausted',
      ]);
      expect(states.at(-1)).toMatchObject({ id: second.id, error: 'Pipeline stopped' });
      expect(reliability.get(1, 'SWITCH_B').attempts).toBe(0);
    });
  });

  describe('waitForSwitchPosition', () => {
    it('times out without a matching status', async () => {
      registry.register(2, 'switch');
      const waiting = waitForSwitchPosition(registry, 2, 'D', 1, 2000);

      await vi.advanceTimersByTimeAsync(2000);

      await expect(waiting).resolves.toBe(false);
      expect(registry.listenerCount('statusUpdated')).toBe(0);
    });

    it('ignores other channels', async () => {
      const waiting = waitForSwitchPosition(registry, 2, 'D', 1, 2000);

      registry.recordStatus(decodedSwitch(3, { A: 0, B: 0, C: 0, D: 1 }));
      await vi.advanceTimersByTimeAsync(2000);

      await expect(waiting).resolves.toBe(false);
    });

    it('resolves false on abort', async () => {
      const controller = new AbortController();
      const waiting = waitForSwitchPosition(registry, 2, 'D', 1, 2000, controller.signal);

      controller.abort();

      await expect(waiting).resolves.toBe(false);
    });
  });
});
