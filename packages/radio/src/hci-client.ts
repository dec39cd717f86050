/**
 * HciClient - Drives the adapter's advertising through BlueZ command line tools
 *
 * Each operation spawns `hcitool cmd` (raw HCI LE commands) or
 * `bluetoothctl power`, optionally through sudo. A non-zero exit rejects
 * with TransmitFailureError carrying stderr.
 */

import { spawn } from 'child_process';
import { TransmitFailureError, createLogger } from '@hubcast/types';
import type { Logger } from '@hubcast/types';

// ═══════════════════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════

/** LE controller commands */
export const OGF_LE_CONTROLLER = 0x08;
export const OCF_LE_SET_ADVERTISING_PARAMETERS = 0x0006;
export const OCF_LE_SET_ADVERTISING_DATA = 0x0008;
export const OCF_LE_SET_ADVERTISE_ENABLE = 0x000a;

/** ADV_NONCONN_IND */
const ADV_TYPE_NONCONNECTABLE = 0x03;
/** Channels 37, 38 and 39 */
const ADV_CHANNEL_MAP_ALL = 0x07;
const ADV_DATA_MAX = 31;

/** Advertising interval limits, in 0.625 ms units */
export const MIN_ADVERTISING_INTERVAL_UNITS = 0x0020;
export const MAX_ADVERTISING_INTERVAL_UNITS = 0x4000;

const COMMAND_TIMEOUT_MS = 5000;

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface HciClientOptions {
  /** Prefix every invocation with sudo */
  sudo?: boolean;
  /** Adapter name passed to hcitool -i */
  hciDevice?: string;
  logger?: Logger;
}

export interface IHciClient {
  sendCommand(ogf: number, ocf: number, params: number[]): Promise<void>;
  setAdvertisingEnabled(enabled: boolean): Promise<void>;
  setAdvertisingParameters(intervalUnits: number): Promise<void>;
  setAdvertisingData(data: Buffer): Promise<void>;
  setPower(on: boolean): Promise<void>;
}

// ═══════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════

export function toHexByte(value: number): string {
  return (value & 0xff).toString(16).padStart(2, '0');
}

/** Milliseconds to 0.625 ms advertising units, clamped to the HCI range. */
export function advertisingIntervalUnits(intervalMs: number): number {
  const units = Math.round(intervalMs / 0.625);
  return Math.min(MAX_ADVERTISING_INTERVAL_UNITS, Math.max(MIN_ADVERTISING_INTERVAL_UNITS, units));
}

// ═══════════════════════════════════════════════════════════════════════════
// IMPLEMENTATION
// ═══════════════════════════════════════════════════════════════════════════

export class HciClient implements IHciClient {
  private readonly sudo: boolean;
  private readonly hciDevice: string;
  private readonly log: Logger;

  constructor(options?: HciClientOptions) {
    this.sudo = options?.sudo ?? true;
    this.hciDevice = options?.hciDevice ?? 'hci0';
    this.log = options?.logger ?? createLogger('HciClient');
  }

  // ─────────────────────────────────────────────────────────────────────────
  // ADVERTISING
  // ─────────────────────────────────────────────────────────────────────────

  async sendCommand(ogf: number, ocf: number, params: number[]): Promise<void> {
    await this.run('hcitool', [
      '-i',
      this.hciDevice,
      'cmd',
      `0x${toHexByte(ogf)}`,
      `0x${ocf.toString(16).padStart(4, '0')}`,
      ...params.map(toHexByte),
    ]);
  }

  async setAdvertisingEnabled(enabled: boolean): Promise<void> {
    await this.sendCommand(OGF_LE_CONTROLLER, OCF_LE_SET_ADVERTISE_ENABLE, [enabled ? 0x01 : 0x00]);
  }

  async setAdvertisingParameters(intervalUnits: number): Promise<void> {
    const lo = intervalUnits & 0xff;
    const hi = (intervalUnits >> 8) & 0xff;
    await this.sendCommand(OGF_LE_CONTROLLER, OCF_LE_SET_ADVERTISING_PARAMETERS, [
      lo, hi, // min interval
      lo, hi, // max interval
      ADV_TYPE_NONCONNECTABLE,
      0x00, // own address type: public
      0x00, // peer address type
      0x00, 0x00, 0x00, 0x00, 0x00, 0x00, // peer address
      ADV_CHANNEL_MAP_ALL,
      0x00, // filter policy
    ]);
  }

  /** Load `data` (AD structures) as the advertising payload, zero padded. */
  async setAdvertisingData(data: Buffer): Promise<void> {
    if (data.length > ADV_DATA_MAX) {
      throw new TransmitFailureError(`Advertising data too long: ${data.length} bytes (max: ${ADV_DATA_MAX})`);
    }
    const padded = Buffer.alloc(ADV_DATA_MAX);
    data.copy(padded);
    await this.sendCommand(OGF_LE_CONTROLLER, OCF_LE_SET_ADVERTISING_DATA, [data.length, ...padded]);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // ADAPTER
  // ─────────────────────────────────────────────────────────────────────────

  async setPower(on: boolean): Promise<void> {
    await this.run('bluetoothctl', ['power', on ? 'on' : 'off']);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // PRIVATE - PROCESS
  // ─────────────────────────────────────────────────────────────────────────

  private run(program: string, args: string[]): Promise<void> {
    const command = this.sudo ? 'sudo' : program;
    const argv = this.sudo ? [program, ...args] : args;
    const line = `${command} ${argv.join(' ')}`;
    this.log.debug(`exec: ${line}`);

    return new Promise((resolve, reject) => {
      const child = spawn(command, argv, { stdio: ['ignore', 'pipe', 'pipe'] });
      let stderr = '';
      let settled = false;

      const finish = (error?: Error) => {
        if (settled) return;
        settled = true;
        clearTimeout(timeout);
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      };

      const timeout = setTimeout(() => {
        child.kill('SIGKILL');
        finish(new TransmitFailureError(`Command timed out: ${line}`));
      }, COMMAND_TIMEOUT_MS);

      child.stderr?.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      child.on('error', (error) => {
        finish(new TransmitFailureError(`Failed to run ${command}: ${error.message}`, error));
      });

      child.on('close', (code) => {
        if (code === 0) {
          finish();
        } else {
          const detail = stderr.trim();
          finish(new TransmitFailureError(`Command failed (exit ${code}): ${line}${detail ? ` - ${detail}` : ''}`));
        }
      });
    });
  }
}
