/**
 * RadioAccessLayer - Exclusive access to the single physical adapter
 *
 * Scan start/stop, adapter resets and transmit bursts are serialized through
 * one lock so their HCI sequences never interleave. Transmission is
 * best-effort: each call repeats the payload a few times because any single
 * broadcast may be missed by the hub.
 */

import {
  ScanFailureError,
  TransmitFailureError,
  TypedEventEmitter,
  createLogger,
  delay,
  errorMessage,
  isHubControlError,
} from '@hubcast/types';
import type { AdvertisementHandler, Logger } from '@hubcast/types';
import { advertisingIntervalUnits, type IHciClient } from './hci-client.js';
import type { AdvertisementScanner } from './noble-scanner.js';

// ═══════════════════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════

const DEFAULT_SETTLE_MS = 1000;
const DEFAULT_RESET_STEP_MS = 500;
const DEFAULT_STEP_MS = 100;
const DEFAULT_DWELL_MS = 200;
const DEFAULT_INTERVAL_MS = 100;
const DEFAULT_TRANSMIT_REPEAT = 2;

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface RadioTimingConfig {
  /** Wait after stopping a scan or resetting before scanning again */
  settleMs?: number;
  /** Wait after each power off/on step of a reset */
  resetStepMs?: number;
}

export interface RadioAccessLayerConfig {
  scanner: AdvertisementScanner;
  hci: IHciClient;
  /** Power-cycle the adapter before every scan start */
  resetOnScanStart?: boolean;
  /** Default payload/enable cycles per transmit */
  transmitRepeat?: number;
  logger?: Logger;
  timing?: RadioTimingConfig;
}

export interface TransmitOptions {
  /** Advertising interval hint */
  intervalMs?: number;
  /** Payload/enable cycles for this call */
  repeat?: number;
  /** Pause between HCI commands */
  stepMs?: number;
  /** Time each cycle stays on air */
  dwellMs?: number;
}

export type ScanEnd = { reason: 'stopped' } | { reason: 'failed'; error: Error };

export interface ScanSession {
  /** Settles when the scan is stopped or fails; never rejects */
  readonly ended: Promise<ScanEnd>;
}

export interface RadioEvents {
  scanStarted: () => void;
  scanEnded: (end: ScanEnd) => void;
  adapterReset: () => void;
}

// ═══════════════════════════════════════════════════════════════════════════
// LOCK
// ═══════════════════════════════════════════════════════════════════════════

/**
 * FIFO async mutex. `run` executes `task` after every previously queued task
 * has settled.
 */
export class AsyncLock {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  run<T>(task: () => Promise<T>): Promise<T> {
    this.pending++;
    const result = this.tail.then(task);
    this.tail = result.then(
      () => {
        this.pending--;
      },
      () => {
        this.pending--;
      },
    );
    return result;
  }

  isLocked(): boolean {
    return this.pending > 0;
  }
}

class ActiveScanSession implements ScanSession {
  readonly ended: Promise<ScanEnd>;
  private resolveEnded: (end: ScanEnd) => void = () => {};
  private finished = false;

  constructor() {
    this.ended = new Promise((resolve) => {
      this.resolveEnded = resolve;
    });
  }

  finish(end: ScanEnd): boolean {
    if (this.finished) return false;
    this.finished = true;
    this.resolveEnded(end);
    return true;
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// IMPLEMENTATION
// ═══════════════════════════════════════════════════════════════════════════

export class RadioAccessLayer extends TypedEventEmitter<RadioEvents> {
  private readonly scanner: AdvertisementScanner;
  private readonly hci: IHciClient;
  private readonly lock = new AsyncLock();
  private readonly log: Logger;
  private readonly resetOnScanStart: boolean;
  private readonly transmitRepeat: number;
  private readonly settleMs: number;
  private readonly resetStepMs: number;
  private session: ActiveScanSession | null = null;

  constructor(config: RadioAccessLayerConfig) {
    super();
    this.scanner = config.scanner;
    this.hci = config.hci;
    this.log = config.logger ?? createLogger('Radio');
    this.resetOnScanStart = config.resetOnScanStart ?? true;
    this.transmitRepeat = config.transmitRepeat ?? DEFAULT_TRANSMIT_REPEAT;
    this.settleMs = config.timing?.settleMs ?? DEFAULT_SETTLE_MS;
    this.resetStepMs = config.timing?.resetStepMs ?? DEFAULT_RESET_STEP_MS;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // SCANNING
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Start a passive scan. A scan already running is stopped first and the
   * adapter given time to settle.
   */
  startScan(onAdvertisement: AdvertisementHandler): Promise<ScanSession> {
    return this.lock.run(async () => {
      if (this.session || this.scanner.isScanning()) {
        this.log.info('Scanner already running, stopping first');
        await this.stopScanUnlocked();
        await delay(this.settleMs);
      }

      if (this.resetOnScanStart) {
        await this.resetUnlocked();
        await delay(this.settleMs);
      }

      const session = new ActiveScanSession();
      try {
        await this.scanner.start(onAdvertisement, (error) => {
          if (session.finish({ reason: 'failed', error })) {
            this.emit('scanEnded', { reason: 'failed', error });
          }
        });
      } catch (error) {
        throw isHubControlError(error, 'SCAN_FAILURE')
          ? error
          : new ScanFailureError(`Failed to start scan: ${errorMessage(error)}`, error);
      }

      this.session = session;
      this.emit('scanStarted');
      return session;
    });
  }

  /** Stop the current scan. Errors while stopping are logged, not thrown. */
  stopScan(): Promise<void> {
    return this.lock.run(() => this.stopScanUnlocked());
  }

  isScanning(): boolean {
    return this.scanner.isScanning();
  }

  // ─────────────────────────────────────────────────────────────────────────
  // ADAPTER
  // ─────────────────────────────────────────────────────────────────────────

  /** Power-cycle the adapter. Failing steps are logged and skipped. */
  resetAdapter(): Promise<void> {
    return this.lock.run(() => this.resetUnlocked());
  }

  // ─────────────────────────────────────────────────────────────────────────
  // TRANSMIT
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Broadcast `payload` as the advertising data. Runs `repeat` cycles of
   * disable, load, enable, dwell; the last cycle stays on air so the hub
   * keeps observing the most recent command.
   */
  transmit(payload: Buffer, options?: TransmitOptions): Promise<void> {
    const repeat = options?.repeat ?? this.transmitRepeat;
    const stepMs = options?.stepMs ?? DEFAULT_STEP_MS;
    const dwellMs = options?.dwellMs ?? DEFAULT_DWELL_MS;
    const intervalUnits = advertisingIntervalUnits(options?.intervalMs ?? DEFAULT_INTERVAL_MS);

    return this.lock.run(async () => {
      try {
        await this.hci.setAdvertisingEnabled(false);
        await delay(stepMs);
        await this.hci.setAdvertisingParameters(intervalUnits);
        await delay(stepMs);

        for (let cycle = 0; cycle < repeat; cycle++) {
          if (cycle > 0) {
            await this.hci.setAdvertisingEnabled(false);
            await delay(stepMs);
          }
          await this.hci.setAdvertisingData(payload);
          await delay(stepMs);
          await this.hci.setAdvertisingEnabled(true);
          await delay(dwellMs);
        }
      } catch (error) {
        if (isHubControlError(error, 'TRANSMIT_FAILURE')) throw error;
        throw new TransmitFailureError(`Transmit failed: ${errorMessage(error)}`, error);
      }
    });
  }

  // ─────────────────────────────────────────────────────────────────────────
  // PRIVATE
  // ─────────────────────────────────────────────────────────────────────────

  private async stopScanUnlocked(): Promise<void> {
    const session = this.session;
    this.session = null;

    if (this.scanner.isScanning()) {
      try {
        await this.scanner.stop();
      } catch (error) {
        this.log.warn(`Error stopping scanner: ${errorMessage(error)}`);
      }
    }

    if (session?.finish({ reason: 'stopped' })) {
      this.emit('scanEnded', { reason: 'stopped' });
    }
  }

  private async resetUnlocked(): Promise<void> {
    this.log.info('Resetting Bluetooth adapter...');
    for (const on of [false, true]) {
      try {
        await this.hci.setPower(on);
      } catch (error) {
        this.log.warn(`Adapter power ${on ? 'on' : 'off'} failed: ${errorMessage(error)}`);
      }
      await delay(this.resetStepMs);
    }
    this.log.info('Bluetooth reset complete');
    this.emit('adapterReset');
  }
}
