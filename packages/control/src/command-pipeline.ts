/**
 * CommandPipeline - Queue plus a single drain loop feeding the radio
 *
 * Subclasses decide how one command is executed; the base class owns the
 * queue, the batch/pause cadence, state events and caller outcomes. A
 * command that throws is reported and the loop carries on.
 */

import {
  NotRunningError,
  TypedEventEmitter,
  createLogger,
  delay,
  describeCommand,
  errorMessage,
  isHubControlError,
} from '@hubcast/types';
import type { Command, CommandState, HubControlErrorCode, Logger } from '@hubcast/types';
import type { AdvertisementCodec } from '@hubcast/protocol';
import type { RadioAccessLayer } from '@hubcast/radio';
import { CommandQueue } from './command-queue.js';
import type { DeviceRegistry } from './device-registry.js';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface CommandStateChange {
  id: number;
  command: Command;
  state: CommandState;
  /** 1-based attempt number; 0 while queued */
  attempt: number;
  error?: string;
  /** Kind of the last failure, when it was a HubControlError */
  errorCode?: HubControlErrorCode;
}

export interface CommandPipelineEvents {
  commandStateChanged: (change: CommandStateChange) => void;
}

export interface PendingCommand<C extends Command> {
  id: number;
  command: C;
  /** Resolves true on success, false once the command is given up; never rejects */
  outcome: Promise<boolean>;
}

export interface CommandEntry<C extends Command> {
  readonly id: number;
  readonly command: C;
  attempt: number;
  error?: string;
  errorCode?: HubControlErrorCode;
  settle: (ok: boolean) => void;
}

export interface CommandPipelineConfig {
  radio: RadioAccessLayer;
  codec: AdvertisementCodec;
  registry: DeviceRegistry;
  queueCapacity?: number;
  logger?: Logger;
}

export interface DrainCadence {
  /** Commands taken per cycle */
  batchSize: number;
  /** Pause after each cycle */
  pauseMs: number;
}

// ═══════════════════════════════════════════════════════════════════════════
// BASE CLASS
// ═══════════════════════════════════════════════════════════════════════════

export abstract class CommandPipeline<C extends Command> extends TypedEventEmitter<CommandPipelineEvents> {
  protected readonly radio: RadioAccessLayer;
  protected readonly codec: AdvertisementCodec;
  protected readonly registry: DeviceRegistry;
  protected readonly log: Logger;
  private readonly cadence: DrainCadence;
  private readonly queueCapacity: number | undefined;
  private readonly label: string;

  private queue: CommandQueue<CommandEntry<C>> | null = null;
  private abortController: AbortController | null = null;
  private drainer: Promise<void> | null = null;
  private nextId = 1;

  protected constructor(label: string, config: CommandPipelineConfig, cadence: DrainCadence) {
    super();
    this.label = label;
    this.radio = config.radio;
    this.codec = config.codec;
    this.registry = config.registry;
    this.queueCapacity = config.queueCapacity;
    this.log = config.logger ?? createLogger(label);
    this.cadence = cadence;
  }

  /** Execute one command; true on success. */
  protected abstract execute(entry: CommandEntry<C>, signal: AbortSignal): Promise<boolean>;

  // ─────────────────────────────────────────────────────────────────────────
  // LIFECYCLE
  // ─────────────────────────────────────────────────────────────────────────

  start(): void {
    if (this.drainer) {
      throw new Error(`${this.label} already running`);
    }
    const queue = new CommandQueue<CommandEntry<C>>(this.queueCapacity);
    const abortController = new AbortController();
    this.queue = queue;
    this.abortController = abortController;
    this.drainer = this.drain(queue, abortController.signal);
    this.log.debug('Drainer started');
  }

  /**
   * Stop draining. A command already on the radio finishes first; queued
   * commands are given up.
   */
  async stop(): Promise<void> {
    const drainer = this.drainer;
    if (!drainer) return;

    this.abortController?.abort();
    this.queue?.close();
    await drainer;

    this.drainer = null;
    this.queue = null;
    this.abortController = null;
    this.log.debug('Drainer stopped');
  }

  isRunning(): boolean {
    return this.drainer !== null;
  }

  pendingCount(): number {
    return this.queue?.size ?? 0;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // ENQUEUE
  // ─────────────────────────────────────────────────────────────────────────

  /** Queue `command`. Resolves once it is queued; `outcome` tracks the result. */
  async enqueue(command: C): Promise<PendingCommand<C>> {
    const queue = this.queue;
    if (!queue || queue.isClosed()) {
      throw new NotRunningError(`${this.label} is not running`);
    }

    const frozen = { ...command };
    Object.freeze(frozen);
    let settle: (ok: boolean) => void = () => {};
    const outcome = new Promise<boolean>((resolve) => {
      settle = resolve;
    });
    const entry: CommandEntry<C> = { id: this.nextId++, command: frozen, attempt: 0, settle };

    this.setState(entry, 'queued');
    try {
      await queue.put(entry);
    } catch (error) {
      this.finish(entry, false, errorMessage(error));
      throw error;
    }

    return { id: entry.id, command: frozen, outcome };
  }

  // ─────────────────────────────────────────────────────────────────────────
  // STATE
  // ─────────────────────────────────────────────────────────────────────────

  protected setState(entry: CommandEntry<C>, state: CommandState): void {
    this.log.debug(`#${entry.id} ${describeCommand(entry.command)}: ${state} (attempt ${entry.attempt})`);
    const change: CommandStateChange = { id: entry.id, command: entry.command, state, attempt: entry.attempt };
    if (entry.error !== undefined) change.error = entry.error;
    if (entry.errorCode !== undefined) change.errorCode = entry.errorCode;
    this.emit('commandStateChanged', change);
  }

  /** Remember `error` as the entry's last failure. */
  protected recordFailure(entry: CommandEntry<C>, error: unknown): void {
    entry.error = errorMessage(error);
    entry.errorCode = isHubControlError(error) ? error.code : undefined;
  }

  private finish(entry: CommandEntry<C>, ok: boolean, error?: string): void {
    if (error !== undefined) entry.error = error;
    this.setState(entry, ok ? 'succeeded' : 'exhausted');
    entry.settle(ok);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // DRAIN LOOP
  // ─────────────────────────────────────────────────────────────────────────

  private async drain(queue: CommandQueue<CommandEntry<C>>, signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      const batch = await queue.take(this.cadence.batchSize);
      if (batch.length === 0) break;

      for (const entry of batch) {
        if (signal.aborted) {
          this.finish(entry, false, 'Pipeline stopped');
          continue;
        }
        await this.run(entry, signal);
      }

      await delay(this.cadence.pauseMs, signal);
    }

    for (const entry of queue.drain()) {
      this.finish(entry, false, 'Pipeline stopped');
    }
  }

  private async run(entry: CommandEntry<C>, signal: AbortSignal): Promise<void> {
    try {
      this.finish(entry, await this.execute(entry, signal));
    } catch (error) {
      this.log.error(`${describeCommand(entry.command)} failed: ${errorMessage(error)}`);
      this.recordFailure(entry, error);
      this.finish(entry, false);
    }
  }
}
