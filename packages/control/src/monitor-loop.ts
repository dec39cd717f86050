/**
 * MonitorLoop - Keeps a scan running and feeds hub status into the registry
 *
 * Any scan failure is logged, the scan is stopped and, after a pause, started
 * again. There is no restart limit. A single advertisement that fails to
 * decode is skipped.
 */

import { TypedEventEmitter, createLogger, delay, errorMessage, monotonicNow } from '@hubcast/types';
import type { Advertisement, Logger } from '@hubcast/types';
import type { AdvertisementCodec } from '@hubcast/protocol';
import type { RadioAccessLayer } from '@hubcast/radio';
import type { DeviceRegistry } from './device-registry.js';

const DEFAULT_RESTART_DELAY_MS = 1000;

export interface MonitorLoopEvents {
  scanRestarting: (reason: string) => void;
}

export interface MonitorLoopConfig {
  radio: RadioAccessLayer;
  codec: AdvertisementCodec;
  registry: DeviceRegistry;
  restartDelayMs?: number;
  now?: () => number;
  logger?: Logger;
}

export class MonitorLoop extends TypedEventEmitter<MonitorLoopEvents> {
  private readonly radio: RadioAccessLayer;
  private readonly codec: AdvertisementCodec;
  private readonly registry: DeviceRegistry;
  private readonly restartDelayMs: number;
  private readonly now: () => number;
  private readonly log: Logger;

  private abortController: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private restarts = 0;

  constructor(config: MonitorLoopConfig) {
    super();
    this.radio = config.radio;
    this.codec = config.codec;
    this.registry = config.registry;
    this.restartDelayMs = config.restartDelayMs ?? DEFAULT_RESTART_DELAY_MS;
    this.now = config.now ?? monotonicNow;
    this.log = config.logger ?? createLogger('MonitorLoop');
  }

  start(): void {
    if (this.loop) {
      throw new Error('MonitorLoop already running');
    }
    const abortController = new AbortController();
    this.abortController = abortController;
    this.loop = this.run(abortController.signal);
  }

  async stop(): Promise<void> {
    const loop = this.loop;
    if (!loop) return;

    this.abortController?.abort();
    await this.radio.stopScan();
    await loop;

    this.loop = null;
    this.abortController = null;
  }

  isRunning(): boolean {
    return this.loop !== null;
  }

  /** Number of times the scan has been restarted after ending. */
  getRestartCount(): number {
    return this.restarts;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // PRIVATE
  // ─────────────────────────────────────────────────────────────────────────

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      let reason: string;
      try {
        const session = await this.radio.startScan((advertisement) => this.handleAdvertisement(advertisement));
        if (signal.aborted) break;

        const end = await session.ended;
        if (signal.aborted) break;

        reason = end.reason === 'failed' ? errorMessage(end.error) : 'scan stopped';
        this.log.warn(`Scan ended (${reason}), restarting in ${this.restartDelayMs}ms`);
        await this.radio.stopScan();
      } catch (error) {
        reason = errorMessage(error);
        this.log.error(`Scan failed to start: ${reason}`);
      }

      this.restarts++;
      this.emit('scanRestarting', reason);
      await delay(this.restartDelayMs, signal);
    }
  }

  private handleAdvertisement(advertisement: Advertisement): void {
    try {
      const now = this.now();
      const decoded = this.codec.decodeAdvertisement(advertisement, now);
      if (decoded) {
        this.registry.recordStatus(decoded, now);
      }
    } catch (error) {
      this.log.debug(`Skipped advertisement from ${advertisement.address}: ${errorMessage(error)}`);
    }
  }
}
