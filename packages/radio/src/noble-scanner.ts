/**
 * NobleScanner - Passive advertisement scanning on @abandonware/noble
 *
 * Scans with duplicates allowed so every status broadcast from a hub is
 * delivered, not only the first one. Losing the powered-on state or an
 * unexpected scan stop is reported through the failure callback.
 */

import type { Peripheral } from '@abandonware/noble';
import { ScanFailureError, createLogger, errorMessage } from '@hubcast/types';
import type { Advertisement, AdvertisementHandler, Logger } from '@hubcast/types';

// ═══════════════════════════════════════════════════════════════════════════
// INTERFACE
// ═══════════════════════════════════════════════════════════════════════════

const DEFAULT_POWER_ON_TIMEOUT_MS = 10_000;

// Loaded on first scan; importing noble binds the HCI socket.
async function importNoble() {
  const module = await import('@abandonware/noble');
  return module.default;
}

type Noble = Awaited<ReturnType<typeof importNoble>>;

let nobleModule: Promise<Noble> | null = null;

function loadNoble(): Promise<Noble> {
  nobleModule ??= importNoble();
  return nobleModule;
}

export type ScanFailureHandler = (error: Error) => void;

export interface AdvertisementScanner {
  start(onAdvertisement: AdvertisementHandler, onFailure: ScanFailureHandler): Promise<void>;
  stop(): Promise<void>;
  isScanning(): boolean;
}

export function toAdvertisement(peripheral: Peripheral): Advertisement {
  return {
    address: peripheral.address,
    localName: peripheral.advertisement.localName || undefined,
    rssi: peripheral.rssi,
    manufacturerData: peripheral.advertisement.manufacturerData ?? undefined,
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// IMPLEMENTATION
// ═══════════════════════════════════════════════════════════════════════════

export class NobleScanner implements AdvertisementScanner {
  private scanning = false;
  private stopping = false;
  private readonly log: Logger;

  private handlers: {
    discover?: (peripheral: Peripheral) => void;
    stateChange?: (state: string) => void;
    scanStop?: () => void;
  } = {};

  private readonly powerOnTimeoutMs: number;

  constructor(options?: { logger?: Logger; powerOnTimeoutMs?: number }) {
    this.log = options?.logger ?? createLogger('NobleScanner');
    this.powerOnTimeoutMs = options?.powerOnTimeoutMs ?? DEFAULT_POWER_ON_TIMEOUT_MS;
  }

  async start(onAdvertisement: AdvertisementHandler, onFailure: ScanFailureHandler): Promise<void> {
    if (this.scanning) {
      throw new Error('Scanner already running');
    }

    const noble = await loadNoble();
    await this.waitForPoweredOn(noble);

    const fail = (reason: string) => {
      if (!this.scanning || this.stopping) return;
      this.log.warn(`Scan interrupted: ${reason}`);
      onFailure(new ScanFailureError(reason));
    };

    this.handlers.discover = (peripheral: Peripheral) => {
      onAdvertisement(toAdvertisement(peripheral));
    };
    this.handlers.stateChange = (state: string) => {
      if (state !== 'poweredOn') {
        fail(`adapter state changed to ${state}`);
      }
    };
    this.handlers.scanStop = () => {
      fail('scan stopped by the adapter');
    };

    noble.on('discover', this.handlers.discover);
    noble.on('stateChange', this.handlers.stateChange);
    noble.on('scanStop', this.handlers.scanStop);

    try {
      await noble.startScanningAsync([], true);
    } catch (error) {
      this.removeListeners(noble);
      throw new ScanFailureError(`Failed to start scanning: ${errorMessage(error)}`, error);
    }

    this.scanning = true;
    this.log.info('Scanning for hub advertisements');
  }

  async stop(): Promise<void> {
    if (!this.scanning) return;

    const noble = await loadNoble();
    this.stopping = true;
    this.removeListeners(noble);
    try {
      await noble.stopScanningAsync();
      this.log.info('Scanning stopped');
    } finally {
      this.scanning = false;
      this.stopping = false;
    }
  }

  isScanning(): boolean {
    return this.scanning;
  }

  /** Resolve once the adapter reports poweredOn, or fail after the timeout. */
  private waitForPoweredOn(noble: Noble): Promise<void> {
    if (noble._state === 'poweredOn') return Promise.resolve();

    this.log.info(`Waiting for adapter (state: ${noble._state})`);
    return new Promise((resolve, reject) => {
      const onStateChange = (state: string) => {
        if (state !== 'poweredOn') return;
        clearTimeout(timer);
        noble.removeListener('stateChange', onStateChange);
        resolve();
      };
      const timer = setTimeout(() => {
        noble.removeListener('stateChange', onStateChange);
        reject(new ScanFailureError(`Adapter not powered on after ${this.powerOnTimeoutMs}ms (state: ${noble._state})`));
      }, this.powerOnTimeoutMs);
      noble.on('stateChange', onStateChange);
    });
  }

  private removeListeners(noble: Noble): void {
    if (this.handlers.discover) noble.removeListener('discover', this.handlers.discover);
    if (this.handlers.stateChange) noble.removeListener('stateChange', this.handlers.stateChange);
    if (this.handlers.scanStop) noble.removeListener('scanStop', this.handlers.scanStop);
    this.handlers = {};
  }
}
