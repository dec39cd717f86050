/**
 * TrainPipeline - Fire-and-forget power and self-drive commands
 *
 * Trains confirm nothing, so each command is transmitted once and counted
 * as done. A transmit failure is logged and reported, never retried.
 */

import { isHubControlError } from '@hubcast/types';
import type { TrainCommand } from '@hubcast/types';
import { CommandPipeline } from './command-pipeline.js';
import type { CommandEntry, CommandPipelineConfig } from './command-pipeline.js';

// ═══════════════════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════

export const TRAIN_BATCH_SIZE = 5;
export const TRAIN_PAUSE_MS = 20;
const TRAIN_STEP_MS = 20;
/** Gap before the extra pulse on channels that need one */
const TRAIN_PULSE_GAP_MS = 100;

const DEFAULT_ADVERTISING_INTERVAL_MS = 30;
const DEFAULT_EXTRA_PULSE_CHANNELS = [22];

// ═══════════════════════════════════════════════════════════════════════════
// IMPLEMENTATION
// ═══════════════════════════════════════════════════════════════════════════

export interface TrainPipelineConfig extends CommandPipelineConfig {
  advertisingIntervalMs?: number;
  /** Channels whose hubs need the payload pulsed twice */
  extraPulseChannels?: number[];
}

export class TrainPipeline extends CommandPipeline<TrainCommand> {
  private readonly advertisingIntervalMs: number;
  private readonly extraPulseChannels: ReadonlySet<number>;

  constructor(config: TrainPipelineConfig) {
    super('TrainPipeline', config, { batchSize: TRAIN_BATCH_SIZE, pauseMs: TRAIN_PAUSE_MS });
    this.advertisingIntervalMs = config.advertisingIntervalMs ?? DEFAULT_ADVERTISING_INTERVAL_MS;
    this.extraPulseChannels = new Set(config.extraPulseChannels ?? DEFAULT_EXTRA_PULSE_CHANNELS);
  }

  protected async execute(entry: CommandEntry<TrainCommand>): Promise<boolean> {
    const { command } = entry;
    entry.attempt = 1;
    this.setState(entry, 'sending');

    try {
      await this.radio.transmit(this.codec.encode(command), {
        intervalMs: this.advertisingIntervalMs,
        repeat: this.extraPulseChannels.has(command.channel) ? 2 : 1,
        stepMs: TRAIN_STEP_MS,
        dwellMs: TRAIN_PULSE_GAP_MS,
      });
      return true;
    } catch (error) {
      if (!isHubControlError(error, 'TRANSMIT_FAILURE')) throw error;
      this.recordFailure(entry, error);
      this.log.warn(`Train command on channel ${command.channel} not sent: ${entry.error}`);
      return false;
    }
  }
}
