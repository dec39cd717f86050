import { z } from 'zod';
import { EventEmitter } from 'events';

// ═══════════════════════════════════════════════════════════════════════════
// HUB MODEL
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Class of hub behind a channel.
 * - train: City/Technic hub driving a train motor
 * - switch: Technic hub driving up to four track switch motors
 */
export type HubKind = 'train' | 'switch';

/** Switch motor ports, in bit order (A is the high bit of the nibble). */
export const PORTS = ['A', 'B', 'C', 'D'] as const;
export type Port = (typeof PORTS)[number];

export const SWITCH_POSITION = {
  STRAIGHT: 0,
  DIVERGING: 1,
} as const;
export type SwitchPosition = (typeof SWITCH_POSITION)[keyof typeof SWITCH_POSITION];

export const MIN_CHANNEL = 1;
export const MAX_CHANNEL = 30;
export const MIN_POWER = -100;
export const MAX_POWER = 100;

export const ChannelSchema = z.number().int().min(MIN_CHANNEL).max(MAX_CHANNEL);
export const PortSchema = z.enum(PORTS);
export const SwitchPositionSchema = z.union([z.literal(0), z.literal(1)]);
export const PowerSchema = z.number().int().min(MIN_POWER).max(MAX_POWER);

export function isPort(value: string): value is Port {
  return PortSchema.safeParse(value).success;
}

export function positionName(position: SwitchPosition): 'STRAIGHT' | 'DIVERGING' {
  return position === SWITCH_POSITION.DIVERGING ? 'DIVERGING' : 'STRAIGHT';
}

/**
 * Train state as broadcast by the hub.
 * `selfDrive` is not part of the broadcast; it is tracked locally.
 */
export interface TrainStatus {
  running: boolean;
  /** Signed motor power, -100..100 */
  speedPercent: number;
  direction: 'forward' | 'backward';
  selfDrive: boolean;
  rawStatusByte: number;
  timestamp: number;
}

export interface SwitchStatus {
  positions: Record<Port, SwitchPosition>;
  portConnected: Record<Port, boolean>;
  rawStatusByte: number;
  timestamp: number;
}

export type HubStatus = TrainStatus | SwitchStatus;

export function isSwitchStatus(status: HubStatus | null): status is SwitchStatus {
  return status !== null && 'positions' in status;
}

export function isTrainStatus(status: HubStatus | null): status is TrainStatus {
  return status !== null && 'speedPercent' in status;
}

/**
 * A hub known to the registry. Created on first sighting or explicit
 * registration and never removed.
 */
export interface Hub {
  /** 1..30; both the BLE observe channel and the hub id */
  channel: number;
  kind: HubKind;
  name: string;
  /** Monotonic ms of the last decoded advertisement */
  lastSeen: number | null;
  lastStatus: HubStatus | null;
  rssi: number | null;
  active: boolean;
  selfDrive: boolean;
}

// ═══════════════════════════════════════════════════════════════════════════
// COMMANDS
// ═══════════════════════════════════════════════════════════════════════════

export interface SetPowerCommand {
  readonly type: 'setPower';
  readonly channel: number;
  readonly power: number;
}

export interface SetSelfDriveCommand {
  readonly type: 'setSelfDrive';
  readonly channel: number;
  readonly enabled: boolean;
}

export interface SetSwitchCommand {
  readonly type: 'setSwitch';
  readonly channel: number;
  readonly port: Port;
  readonly position: SwitchPosition;
}

export type TrainCommand = SetPowerCommand | SetSelfDriveCommand;
export type Command = TrainCommand | SetSwitchCommand;

export type CommandState = 'queued' | 'sending' | 'verifying' | 'succeeded' | 'exhausted';

export function describeCommand(command: Command): string {
  switch (command.type) {
    case 'setPower':
      return `power ${command.power}% on channel ${command.channel}`;
    case 'setSelfDrive':
      return `self-drive ${command.enabled ? 'on' : 'off'} on channel ${command.channel}`;
    case 'setSwitch':
      return `switch ${command.port} ${positionName(command.position)} on channel ${command.channel}`;
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// ADVERTISEMENTS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * One observed BLE advertisement, reduced to what the protocol needs.
 */
export interface Advertisement {
  address: string;
  localName: string | undefined;
  rssi: number;
  /** Manufacturer specific data, company id included (little-endian) */
  manufacturerData: Buffer | undefined;
}

export type AdvertisementHandler = (advertisement: Advertisement) => void;

// ═══════════════════════════════════════════════════════════════════════════
// ERRORS
// ═══════════════════════════════════════════════════════════════════════════

export type HubControlErrorCode =
  | 'INVALID_COMMAND'
  | 'INVALID_FRAME'
  | 'UNKNOWN_DEVICE'
  | 'TRANSMIT_FAILURE'
  | 'VERIFICATION_TIMEOUT'
  | 'SCAN_FAILURE'
  | 'NOT_RUNNING';

export class HubControlError extends Error {
  readonly code: HubControlErrorCode;

  constructor(code: HubControlErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HubControlError';
    this.code = code;
  }
}

/** Value outside the protocol range; rejected before transmission. */
export class InvalidCommandError extends HubControlError {
  constructor(message: string) {
    super('INVALID_COMMAND', message);
    this.name = 'InvalidCommandError';
  }
}

export class InvalidFrameError extends HubControlError {
  constructor(message: string) {
    super('INVALID_FRAME', message);
    this.name = 'InvalidFrameError';
  }
}

export class UnknownDeviceError extends HubControlError {
  readonly channel: number;

  constructor(channel: number, known: number[]) {
    super('UNKNOWN_DEVICE', `Hub on channel ${channel} not registered. Known channels: [${known.join(', ')}]`);
    this.name = 'UnknownDeviceError';
    this.channel = channel;
  }
}

export class TransmitFailureError extends HubControlError {
  constructor(message: string, cause?: unknown) {
    super('TRANSMIT_FAILURE', message, { cause });
    this.name = 'TransmitFailureError';
  }
}

export class VerificationTimeoutError extends HubControlError {
  constructor(message: string) {
    super('VERIFICATION_TIMEOUT', message);
    this.name = 'VerificationTimeoutError';
  }
}

export class ScanFailureError extends HubControlError {
  constructor(message: string, cause?: unknown) {
    super('SCAN_FAILURE', message, { cause });
    this.name = 'ScanFailureError';
  }
}

export class NotRunningError extends HubControlError {
  constructor(message: string) {
    super('NOT_RUNNING', message);
    this.name = 'NotRunningError';
  }
}

export function isHubControlError(error: unknown, code?: HubControlErrorCode): error is HubControlError {
  return error instanceof HubControlError && (code === undefined || error.code === code);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIG
// ═══════════════════════════════════════════════════════════════════════════

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export const HubcastConfigSchema = z.object({
  logLevel: LogLevelSchema.default('info'),

  /** Prefix hcitool / bluetoothctl invocations with sudo */
  sudo: z.boolean().default(true),
  /** HCI device passed to hcitool -i */
  hciDevice: z.string().default('hci0'),
  /** Power-cycle the adapter when the controller starts */
  resetOnStartup: z.boolean().default(true),
  /** Power-cycle the adapter before every scan (re)start */
  resetOnScanStart: z.boolean().default(true),

  /** LEGO company id in advertisements */
  manufacturerId: z.number().int().min(0).max(0xffff).default(0x0397),
  trainNameMarker: z.string().min(1).default('Train'),
  switchNameMarker: z.string().min(1).default('Technic Hub'),

  /** Hubs unseen for this long drop out of the connected views */
  livenessWindowMs: z.number().positive().default(5000),
  /** How long a hub stays active after a command */
  activeHoldMs: z.number().positive().default(5000),

  /** Base backoff between switch attempts; attempt i waits base × i */
  retryDelayMs: z.number().nonnegative().default(500),
  maxRetries: z.number().int().positive().default(3),
  verifyTimeoutMs: z.number().positive().default(2000),

  /** Payload/enable cycles per transmit call */
  transmitRepeat: z.number().int().positive().default(2),
  trainAdvertisingIntervalMs: z.number().min(20).max(10240).default(30),
  switchAdvertisingIntervalMs: z.number().min(20).max(10240).default(100),
  /** Channels that get an extra pulse per train command */
  extraPulseChannels: z.array(ChannelSchema).default([22]),

  powerMin: PowerSchema.default(MIN_POWER),
  powerMax: PowerSchema.default(MAX_POWER),

  queueCapacity: z.number().int().positive().default(64),
});
export type HubcastConfig = z.infer<typeof HubcastConfigSchema>;
export type HubcastConfigInput = z.input<typeof HubcastConfigSchema>;

const ENV_PREFIX = 'HUBCAST_';

const booleanFromEnv = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');
const numberFromEnv = z.coerce.number();
const channelsFromEnv = z
  .string()
  .transform((value) => value.split(',').map((part) => part.trim()).filter((part) => part.length > 0))
  .pipe(z.array(z.coerce.number()));

const ENV_FIELDS: Record<keyof HubcastConfig, z.ZodType<unknown>> = {
  logLevel: z.string().toLowerCase(),
  sudo: booleanFromEnv,
  hciDevice: z.string(),
  resetOnStartup: booleanFromEnv,
  resetOnScanStart: booleanFromEnv,
  manufacturerId: numberFromEnv,
  trainNameMarker: z.string(),
  switchNameMarker: z.string(),
  livenessWindowMs: numberFromEnv,
  activeHoldMs: numberFromEnv,
  retryDelayMs: numberFromEnv,
  maxRetries: numberFromEnv,
  verifyTimeoutMs: numberFromEnv,
  transmitRepeat: numberFromEnv,
  trainAdvertisingIntervalMs: numberFromEnv,
  switchAdvertisingIntervalMs: numberFromEnv,
  extraPulseChannels: channelsFromEnv,
  powerMin: numberFromEnv,
  powerMax: numberFromEnv,
  queueCapacity: numberFromEnv,
};

/** `retryDelayMs` -> `HUBCAST_RETRY_DELAY_MS` */
export function envVarName(key: string): string {
  return ENV_PREFIX + key.replace(/([a-z0-9])([A-Z])/g, '$1_$2').toUpperCase();
}

/**
 * Build the config from `HUBCAST_*` environment variables, falling back to
 * defaults. Throws a ZodError naming the offending keys.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  overrides: HubcastConfigInput = {},
): HubcastConfig {
  const raw: Record<string, unknown> = {};
  for (const [key, field] of Object.entries(ENV_FIELDS)) {
    const value = env[envVarName(key)];
    if (value === undefined || value === '') continue;
    raw[key] = field.parse(value);
  }
  return parseConfig({ ...raw, ...overrides });
}

/** Validate a config object and fill in defaults. */
export function parseConfig(input: unknown = {}): HubcastConfig {
  const config = HubcastConfigSchema.parse(input);
  if (config.powerMin > config.powerMax) {
    throw new Error(`powerMin (${config.powerMin}) exceeds powerMax (${config.powerMax})`);
  }
  return config;
}

// ═══════════════════════════════════════════════════════════════════════════
// LOGGER INTERFACE
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Simple logger interface. Consumers can provide their own logger.
 */
export interface Logger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

/**
 * Create a logger with a prefix tag. Messages below `level` are dropped.
 */
export function createLogger(prefix: string, level: LogLevel = 'debug'): Logger {
  const enabled = (candidate: LogLevel) => LEVEL_ORDER[candidate] >= LEVEL_ORDER[level];
  return {
    info: (msg, ...args) => {
      if (enabled('info')) console.log(`[${prefix}] ${msg}`, ...args);
    },
    warn: (msg, ...args) => {
      if (enabled('warn')) console.warn(`[${prefix}] ${msg}`, ...args);
    },
    error: (msg, ...args) => {
      if (enabled('error')) console.error(`[${prefix}] ${msg}`, ...args);
    },
    debug: (msg, ...args) => {
      if (enabled('debug')) console.log(`[${prefix}] ${msg}`, ...args);
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// TYPED EVENT EMITTER
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Type-safe EventEmitter. Extend with an event map to get typed on/off/emit.
 *
 * Usage: `class Foo extends TypedEventEmitter<{ myEvent: (x: number) => void }>`
 */
export class TypedEventEmitter<
  Events extends {} = {},
> extends EventEmitter {
  override on<K extends string & keyof Events>(
    event: K,
    listener: Events[K] & ((...args: any[]) => void),
  ): this {
    return super.on(event, listener);
  }

  override once<K extends string & keyof Events>(
    event: K,
    listener: Events[K] & ((...args: any[]) => void),
  ): this {
    return super.once(event, listener);
  }

  override off<K extends string & keyof Events>(
    event: K,
    listener: Events[K] & ((...args: any[]) => void),
  ): this {
    return super.off(event, listener);
  }

  override emit<K extends string & keyof Events>(
    event: K,
    ...args: Events[K] extends (...args: infer A) => any ? A : never
  ): boolean {
    return super.emit(event, ...args);
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// TIMING
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Sleep for `ms`. Resolves early (never rejects) when `signal` aborts.
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/** Monotonic milliseconds. */
export function monotonicNow(): number {
  return performance.now();
}
