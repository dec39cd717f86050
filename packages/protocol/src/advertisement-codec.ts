/**
 * AdvertisementCodec - Command and status frames carried in BLE advertisements
 *
 * Commands are injected as manufacturer-specific AD structures that the hub
 * firmware observes on its channel. Status is read back from the hub's own
 * broadcast.
 *
 * Command frame:
 * ┌────────┬──────┬──────────────┬─────────┬──────┬──────┬──────────────┐
 * │ Length │ 0xFF │ Company id   │ Channel │ 0x00 │ Type │ Value        │
 * │        │      │ (0x0397, LE) │  1..30  │      │      │ (1 or 2 LE)  │
 * └────────┴──────┴──────────────┴─────────┴──────┴──────┴──────────────┘
 *
 * Type 0x61 (int8):  train power -100..100, 101 = self-drive on, 102 = off
 * Type 0x62 (int16): switch, switchNumber * 1000 + position (A=1 .. D=4)
 *
 * Status (manufacturer data, company id included):
 *   [id lo][id hi][..][..][channel][ ... ][statusByte][value]
 *   train:  value = signed power
 *   switch: statusByte = position nibble, value = port connection nibble,
 *           port P at bit (1 << (3 - index(P)))
 */

import {
  InvalidCommandError,
  InvalidFrameError,
  MAX_CHANNEL,
  MAX_POWER,
  MIN_CHANNEL,
  MIN_POWER,
  PORTS,
  SWITCH_POSITION,
} from '@hubcast/types';
import type {
  Advertisement,
  Command,
  HubKind,
  Port,
  SwitchPosition,
  SwitchStatus,
  TrainStatus,
} from '@hubcast/types';

// ═══════════════════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════

/** LEGO System A/S company identifier (919) */
export const MANUFACTURER_ID = 0x0397;
export const AD_TYPE_MANUFACTURER_SPECIFIC = 0xff;

export const COMMAND_TYPE_TRAIN = 0x61;
export const COMMAND_TYPE_SWITCH = 0x62;

/** Self-drive sentinels, outside the legal power range */
export const SELF_DRIVE_ENABLE = 101;
export const SELF_DRIVE_DISABLE = 102;

/** [length][0xFF][id lo][id hi][channel][0x00][type] */
export const COMMAND_HEADER_SIZE = 7;

/** Shortest status manufacturer data, company id included */
export const MIN_STATUS_FRAME = 9;
/** Offset of the hub's command channel in status manufacturer data */
export const STATUS_CHANNEL_OFFSET = 4;

const SWITCH_NUMBER_BASE = 1000;

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface DecodedTrainAdvertisement {
  kind: 'train';
  channel: number;
  name: string;
  address: string;
  rssi: number;
  status: TrainStatus;
}

export interface DecodedSwitchAdvertisement {
  kind: 'switch';
  channel: number;
  name: string;
  address: string;
  rssi: number;
  status: SwitchStatus;
}

export type DecodedAdvertisement = DecodedTrainAdvertisement | DecodedSwitchAdvertisement;

export type TrainCommandValue =
  | { type: 'power'; power: number }
  | { type: 'selfDrive'; enabled: boolean };

export interface AdvertisementCodecOptions {
  manufacturerId?: number;
  trainNameMarker?: string;
  switchNameMarker?: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// VALUE ENCODING
// ═══════════════════════════════════════════════════════════════════════════

export function portIndex(port: Port): number {
  return PORTS.indexOf(port);
}

/** Bit for `port` in a position or connection nibble. */
export function portBit(port: Port): number {
  return 1 << (3 - portIndex(port));
}

export function decodePortNibble(byte: number): Record<Port, boolean> {
  return {
    A: (byte & portBit('A')) !== 0,
    B: (byte & portBit('B')) !== 0,
    C: (byte & portBit('C')) !== 0,
    D: (byte & portBit('D')) !== 0,
  };
}

export function decodePositionNibble(byte: number): Record<Port, SwitchPosition> {
  const bits = decodePortNibble(byte);
  const toPosition = (set: boolean): SwitchPosition =>
    set ? SWITCH_POSITION.DIVERGING : SWITCH_POSITION.STRAIGHT;
  return {
    A: toPosition(bits.A),
    B: toPosition(bits.B),
    C: toPosition(bits.C),
    D: toPosition(bits.D),
  };
}

export function assertChannel(channel: number): void {
  if (!Number.isInteger(channel) || channel < MIN_CHANNEL || channel > MAX_CHANNEL) {
    throw new InvalidCommandError(`Invalid channel: ${channel}. Must be ${MIN_CHANNEL}-${MAX_CHANNEL}`);
  }
}

export function trainPowerValue(power: number): number {
  if (!Number.isInteger(power) || power < MIN_POWER || power > MAX_POWER) {
    throw new InvalidCommandError(`Invalid power: ${power}. Must be an integer ${MIN_POWER}..${MAX_POWER}`);
  }
  return power;
}

export function selfDriveValue(enabled: boolean): number {
  return enabled ? SELF_DRIVE_ENABLE : SELF_DRIVE_DISABLE;
}

export function decodeTrainCommandValue(value: number): TrainCommandValue {
  if (value === SELF_DRIVE_ENABLE) return { type: 'selfDrive', enabled: true };
  if (value === SELF_DRIVE_DISABLE) return { type: 'selfDrive', enabled: false };
  if (Number.isInteger(value) && value >= MIN_POWER && value <= MAX_POWER) {
    return { type: 'power', power: value };
  }
  throw new InvalidFrameError(`Train command value out of range: ${value}`);
}

export function switchCommandValue(port: Port, position: SwitchPosition): number {
  if (!PORTS.includes(port)) {
    throw new InvalidCommandError(`Invalid switch port: ${String(port)}. Must be one of ${PORTS.join(', ')}`);
  }
  if (position !== SWITCH_POSITION.STRAIGHT && position !== SWITCH_POSITION.DIVERGING) {
    throw new InvalidCommandError(`Invalid position: ${String(position)}. Must be 0 or 1`);
  }
  return (portIndex(port) + 1) * SWITCH_NUMBER_BASE + position;
}

export function decodeSwitchCommandValue(value: number): { port: Port; position: SwitchPosition } {
  const switchNumber = Math.floor(value / SWITCH_NUMBER_BASE);
  const rawPosition = value % SWITCH_NUMBER_BASE;
  const port = PORTS[switchNumber - 1];
  if (port === undefined || switchNumber < 1) {
    throw new InvalidFrameError(`Switch number out of range in value ${value}`);
  }
  if (rawPosition === SWITCH_POSITION.STRAIGHT) return { port, position: SWITCH_POSITION.STRAIGHT };
  if (rawPosition === SWITCH_POSITION.DIVERGING) return { port, position: SWITCH_POSITION.DIVERGING };
  throw new InvalidFrameError(`Switch position out of range in value ${value}`);
}

// ═══════════════════════════════════════════════════════════════════════════
// ADVERTISEMENT CODEC CLASS
// ═══════════════════════════════════════════════════════════════════════════

export class AdvertisementCodec {
  private readonly manufacturerId: number;
  private readonly trainNameMarker: string;
  private readonly switchNameMarker: string;

  constructor(options?: AdvertisementCodecOptions) {
    this.manufacturerId = options?.manufacturerId ?? MANUFACTURER_ID;
    this.trainNameMarker = options?.trainNameMarker ?? 'Train';
    this.switchNameMarker = options?.switchNameMarker ?? 'Technic Hub';
  }

  // ─────────────────────────────────────────────────────────────────────────
  // ENCODING
  // ─────────────────────────────────────────────────────────────────────────

  encodeTrainPower(channel: number, power: number): Buffer {
    const value = Buffer.alloc(1);
    value.writeInt8(trainPowerValue(power), 0);
    return this.createFrame(channel, COMMAND_TYPE_TRAIN, value);
  }

  encodeSelfDrive(channel: number, enabled: boolean): Buffer {
    const value = Buffer.alloc(1);
    value.writeInt8(selfDriveValue(enabled), 0);
    return this.createFrame(channel, COMMAND_TYPE_TRAIN, value);
  }

  encodeSwitchCommand(channel: number, port: Port, position: SwitchPosition): Buffer {
    const value = Buffer.alloc(2);
    value.writeInt16LE(switchCommandValue(port, position), 0);
    return this.createFrame(channel, COMMAND_TYPE_SWITCH, value);
  }

  encode(command: Command): Buffer {
    switch (command.type) {
      case 'setPower':
        return this.encodeTrainPower(command.channel, command.power);
      case 'setSelfDrive':
        return this.encodeSelfDrive(command.channel, command.enabled);
      case 'setSwitch':
        return this.encodeSwitchCommand(command.channel, command.port, command.position);
    }
  }

  private createFrame(channel: number, type: number, value: Buffer): Buffer {
    assertChannel(channel);
    const frame = Buffer.alloc(COMMAND_HEADER_SIZE + value.length);
    frame.writeUInt8(frame.length - 1, 0);
    frame.writeUInt8(AD_TYPE_MANUFACTURER_SPECIFIC, 1);
    frame.writeUInt16LE(this.manufacturerId, 2);
    frame.writeUInt8(channel, 4);
    frame.writeUInt8(0x00, 5);
    frame.writeUInt8(type, 6);
    value.copy(frame, COMMAND_HEADER_SIZE);
    return frame;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // COMMAND DECODING
  // ─────────────────────────────────────────────────────────────────────────

  decodeCommand(frame: Buffer): Command {
    if (frame.length < COMMAND_HEADER_SIZE + 1) {
      throw new InvalidFrameError(`Command frame too short: ${frame.length} bytes`);
    }
    if (frame.readUInt8(0) !== frame.length - 1) {
      throw new InvalidFrameError(`Length byte ${frame.readUInt8(0)} does not match frame size ${frame.length}`);
    }
    if (frame.readUInt8(1) !== AD_TYPE_MANUFACTURER_SPECIFIC) {
      throw new InvalidFrameError(`Not a manufacturer specific AD structure: 0x${frame.readUInt8(1).toString(16)}`);
    }
    if (frame.readUInt16LE(2) !== this.manufacturerId) {
      throw new InvalidFrameError(`Unexpected manufacturer id 0x${frame.readUInt16LE(2).toString(16)}`);
    }

    const channel = frame.readUInt8(4);
    const type = frame.readUInt8(6);

    if (type === COMMAND_TYPE_TRAIN) {
      const decoded = decodeTrainCommandValue(frame.readInt8(COMMAND_HEADER_SIZE));
      return decoded.type === 'power'
        ? { type: 'setPower', channel, power: decoded.power }
        : { type: 'setSelfDrive', channel, enabled: decoded.enabled };
    }

    if (type === COMMAND_TYPE_SWITCH) {
      if (frame.length < COMMAND_HEADER_SIZE + 2) {
        throw new InvalidFrameError(`Switch command frame too short: ${frame.length} bytes`);
      }
      const { port, position } = decodeSwitchCommandValue(frame.readInt16LE(COMMAND_HEADER_SIZE));
      return { type: 'setSwitch', channel, port, position };
    }

    throw new InvalidFrameError(`Unknown command type 0x${type.toString(16)}`);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // STATUS DECODING
  // ─────────────────────────────────────────────────────────────────────────

  /** True when `data` starts with the configured company id. */
  carriesManufacturerId(data: Buffer | undefined): data is Buffer {
    return data !== undefined && data.length >= 2 && data.readUInt16LE(0) === this.manufacturerId;
  }

  classify(localName: string | undefined): HubKind | null {
    if (!localName) return null;
    if (localName.includes(this.trainNameMarker)) return 'train';
    if (localName.includes(this.switchNameMarker)) return 'switch';
    return null;
  }

  decodeTrainStatus(data: Buffer, timestamp: number): { channel: number; status: TrainStatus } {
    const channel = this.readStatusHeader(data);
    const statusByte = data.readUInt8(data.length - 2);
    const power = data.readInt8(data.length - 1);
    if (power < MIN_POWER || power > MAX_POWER) {
      throw new InvalidFrameError(`Train status power out of range: ${power}`);
    }
    return {
      channel,
      status: {
        running: statusByte > 0,
        speedPercent: power,
        direction: power >= 0 ? 'forward' : 'backward',
        selfDrive: false,
        rawStatusByte: statusByte,
        timestamp,
      },
    };
  }

  decodeSwitchStatus(data: Buffer, timestamp: number): { channel: number; status: SwitchStatus } {
    const channel = this.readStatusHeader(data);
    const statusByte = data.readUInt8(data.length - 2);
    const connections = data.readUInt8(data.length - 1);
    return {
      channel,
      status: {
        positions: decodePositionNibble(statusByte & 0x0f),
        portConnected: decodePortNibble(connections & 0x0f),
        rawStatusByte: statusByte,
        timestamp,
      },
    };
  }

  /**
   * Decode a hub status broadcast. Returns null for advertisements that are
   * not ours: foreign company id, or a name without a hub marker.
   * Throws InvalidFrameError for ours that are malformed.
   */
  decodeAdvertisement(advertisement: Advertisement, timestamp: number): DecodedAdvertisement | null {
    const data = advertisement.manufacturerData;
    if (!this.carriesManufacturerId(data)) return null;

    const kind = this.classify(advertisement.localName);
    if (kind === null) return null;

    const name = advertisement.localName ?? '';
    if (kind === 'train') {
      const { channel, status } = this.decodeTrainStatus(data, timestamp);
      return { kind, channel, name, address: advertisement.address, rssi: advertisement.rssi, status };
    }
    const { channel, status } = this.decodeSwitchStatus(data, timestamp);
    return { kind, channel, name, address: advertisement.address, rssi: advertisement.rssi, status };
  }

  private readStatusHeader(data: Buffer): number {
    if (data.length < MIN_STATUS_FRAME) {
      throw new InvalidFrameError(`Status frame too short: ${data.length} bytes (min: ${MIN_STATUS_FRAME})`);
    }
    if (data.readUInt16LE(0) !== this.manufacturerId) {
      throw new InvalidFrameError(`Unexpected manufacturer id 0x${data.readUInt16LE(0).toString(16)}`);
    }
    const channel = data.readUInt8(STATUS_CHANNEL_OFFSET);
    if (channel < MIN_CHANNEL || channel > MAX_CHANNEL) {
      throw new InvalidFrameError(`Status channel out of range: ${channel}`);
    }
    return channel;
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// FACTORY
// ═══════════════════════════════════════════════════════════════════════════

export function createAdvertisementCodec(options?: AdvertisementCodecOptions): AdvertisementCodec {
  return new AdvertisementCodec(options);
}
