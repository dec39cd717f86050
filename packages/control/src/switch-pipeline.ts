/**
 * SwitchPipeline - Verified, retried switch commands
 *
 * One command at a time. Each attempt transmits and then waits for the
 * switch hub to broadcast the requested position. Attempts back off
 * linearly; every attempt and success is counted per port.
 */

import {
  VerificationTimeoutError,
  delay,
  describeCommand,
  isHubControlError,
  isSwitchStatus,
} from '@hubcast/types';
import type { Port, SetSwitchCommand, SwitchPosition } from '@hubcast/types';
import { CommandPipeline } from './command-pipeline.js';
import type { CommandEntry, CommandPipelineConfig } from './command-pipeline.js';
import type { DeviceRegistry } from './device-registry.js';
import { switchTarget } from './reliability.js';
import type { ReliabilityTracker } from './reliability.js';

// ═══════════════════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════

export const SWITCH_BATCH_SIZE = 1;
export const SWITCH_PAUSE_MS = 200;
const SWITCH_STEP_MS = 100;
const SWITCH_DWELL_MS = 200;

const DEFAULT_MAX_RETRIES = 3;
const DEFAULT_RETRY_DELAY_MS = 500;
const DEFAULT_VERIFY_TIMEOUT_MS = 2000;
const DEFAULT_TRANSMIT_REPEAT = 2;
const DEFAULT_ADVERTISING_INTERVAL_MS = 100;

// ═══════════════════════════════════════════════════════════════════════════
// VERIFICATION
// ═══════════════════════════════════════════════════════════════════════════

function reportsPosition(registry: DeviceRegistry, channel: number, port: Port, position: SwitchPosition): boolean {
  const status = registry.get(channel)?.lastStatus ?? null;
  return isSwitchStatus(status) && status.positions[port] === position;
}

/**
 * Resolve true as soon as the registry shows `port` at `position` on
 * `channel`, false after `timeoutMs` or on abort.
 */
export function waitForSwitchPosition(
  registry: DeviceRegistry,
  channel: number,
  port: Port,
  position: SwitchPosition,
  timeoutMs: number,
  signal?: AbortSignal,
): Promise<boolean> {
  if (reportsPosition(registry, channel, port, position)) return Promise.resolve(true);
  if (signal?.aborted) return Promise.resolve(false);

  return new Promise((resolve) => {
    const finish = (confirmed: boolean) => {
      clearTimeout(timer);
      registry.off('statusUpdated', onStatus);
      signal?.removeEventListener('abort', onAbort);
      resolve(confirmed);
    };
    const onStatus = (hub: { channel: number }) => {
      if (hub.channel === channel && reportsPosition(registry, channel, port, position)) {
        finish(true);
      }
    };
    const onAbort = () => finish(false);
    const timer = setTimeout(() => finish(false), timeoutMs);

    registry.on('statusUpdated', onStatus);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// IMPLEMENTATION
// ═══════════════════════════════════════════════════════════════════════════

export interface SwitchPipelineConfig extends CommandPipelineConfig {
  reliability: ReliabilityTracker;
  maxRetries?: number;
  /** Attempt i (0-based, i > 0) waits retryDelayMs × i */
  retryDelayMs?: number;
  verifyTimeoutMs?: number;
  transmitRepeat?: number;
  advertisingIntervalMs?: number;
}

export class SwitchPipeline extends CommandPipeline<SetSwitchCommand> {
  private readonly reliability: ReliabilityTracker;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly verifyTimeoutMs: number;
  private readonly transmitRepeat: number;
  private readonly advertisingIntervalMs: number;

  constructor(config: SwitchPipelineConfig) {
    super('SwitchPipeline', config, { batchSize: SWITCH_BATCH_SIZE, pauseMs: SWITCH_PAUSE_MS });
    this.reliability = config.reliability;
    this.maxRetries = config.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.retryDelayMs = config.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.verifyTimeoutMs = config.verifyTimeoutMs ?? DEFAULT_VERIFY_TIMEOUT_MS;
    this.transmitRepeat = config.transmitRepeat ?? DEFAULT_TRANSMIT_REPEAT;
    this.advertisingIntervalMs = config.advertisingIntervalMs ?? DEFAULT_ADVERTISING_INTERVAL_MS;
  }

  protected async execute(entry: CommandEntry<SetSwitchCommand>, signal: AbortSignal): Promise<boolean> {
    const { command } = entry;
    const { channel, port, position } = command;
    const target = switchTarget(port);
    const payload = this.codec.encode(command);

    for (let attempt = 0; attempt < this.maxRetries; attempt++) {
      if (attempt > 0) {
        await delay(this.retryDelayMs * attempt, signal);
      }
      if (signal.aborted) {
        entry.error = 'Pipeline stopped';
        return false;
      }

      entry.attempt = attempt + 1;
      this.reliability.recordAttempt(channel, target);
      this.setState(entry, 'sending');

      try {
        await this.radio.transmit(payload, {
          intervalMs: this.advertisingIntervalMs,
          repeat: this.transmitRepeat,
          stepMs: SWITCH_STEP_MS,
          dwellMs: SWITCH_DWELL_MS,
        });
      } catch (error) {
        if (!isHubControlError(error, 'TRANSMIT_FAILURE')) throw error;
        this.recordFailure(entry, error);
        this.log.warn(`Attempt ${entry.attempt}/${this.maxRetries} for ${describeCommand(command)}: ${entry.error}`);
        continue;
      }

      this.setState(entry, 'verifying');
      const confirmed = await waitForSwitchPosition(
        this.registry,
        channel,
        port,
        position,
        this.verifyTimeoutMs,
        signal,
      );
      if (confirmed) {
        this.reliability.recordSuccess(channel, target);
        this.log.info(`Confirmed ${describeCommand(command)} after ${entry.attempt} attempt(s)`);
        return true;
      }

      this.recordFailure(
        entry,
        new VerificationTimeoutError(`Switch ${port} not confirmed within ${this.verifyTimeoutMs}ms`),
      );
      this.log.warn(`Attempt ${entry.attempt}/${this.maxRetries} for ${describeCommand(command)}: ${entry.error}`);
    }

    this.log.error(`Giving up on ${describeCommand(command)} after ${this.maxRetries} attempts`);
    return false;
  }
}
