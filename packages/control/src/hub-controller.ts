/**
 * HubController - The inbound API for trains and switches
 *
 * Wires the registry, the monitor loop and both command pipelines onto one
 * radio. Construct it explicitly, then `start()`; enqueue calls are rejected
 * before start and after stop.
 */

import {
  InvalidCommandError,
  NotRunningError,
  PORTS,
  SwitchPositionSchema,
  TypedEventEmitter,
  createLogger,
  errorMessage,
  isPort,
  isSwitchStatus,
  isTrainStatus,
  monotonicNow,
  parseConfig,
} from '@hubcast/types';
import type {
  Hub,
  HubKind,
  HubcastConfig,
  HubcastConfigInput,
  Logger,
  SwitchStatus,
  TrainStatus,
} from '@hubcast/types';
import { AdvertisementCodec } from '@hubcast/protocol';
import { HciClient, NobleScanner, RadioAccessLayer } from '@hubcast/radio';
import { DeviceRegistry } from './device-registry.js';
import { MonitorLoop } from './monitor-loop.js';
import { ReliabilityTracker } from './reliability.js';
import type { ReliabilityStats } from './reliability.js';
import { SwitchPipeline } from './switch-pipeline.js';
import { TrainPipeline } from './train-pipeline.js';
import type { CommandStateChange } from './command-pipeline.js';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

interface ConnectedHub {
  channel: number;
  name: string;
  rssi: number | null;
  /** Two decimals */
  lastUpdateSecondsAgo: number;
  active: boolean;
  expectedUpdateIntervalMs: number;
}

export interface ConnectedTrain extends ConnectedHub {
  status: TrainStatus | null;
  selfDrive: boolean;
}

export interface ConnectedSwitch extends ConnectedHub {
  status: SwitchStatus | null;
  reliability: Record<string, ReliabilityStats>;
}

export interface HubControllerEvents {
  started: () => void;
  stopped: () => void;
  hubRegistered: (hub: Hub) => void;
  statusUpdated: (hub: Hub) => void;
  activeChanged: (channel: number, active: boolean) => void;
  commandStateChanged: (change: CommandStateChange) => void;
  scanRestarting: (reason: string) => void;
}

export interface HubControllerOptions {
  config?: HubcastConfigInput;
  /** Defaults to a radio on noble and the BlueZ tools */
  radio?: RadioAccessLayer;
  codec?: AdvertisementCodec;
  /** Monotonic clock in ms */
  now?: () => number;
  logger?: Logger;
}

// ═══════════════════════════════════════════════════════════════════════════
// IMPLEMENTATION
// ═══════════════════════════════════════════════════════════════════════════

export class HubController extends TypedEventEmitter<HubControllerEvents> {
  readonly config: HubcastConfig;
  private readonly radio: RadioAccessLayer;
  private readonly registry: DeviceRegistry;
  private readonly reliability = new ReliabilityTracker();
  private readonly trains: TrainPipeline;
  private readonly switches: SwitchPipeline;
  private readonly monitor: MonitorLoop;
  private readonly now: () => number;
  private readonly log: Logger;
  private running = false;
  private startup: AbortController | null = null;
  private starting: Promise<void> | null = null;

  constructor(options?: HubControllerOptions) {
    super();
    const config = parseConfig(options?.config);
    this.config = config;
    this.now = options?.now ?? monotonicNow;

    const logger = (tag: string) => options?.logger ?? createLogger(tag, config.logLevel);
    this.log = logger('HubController');

    const codec =
      options?.codec ??
      new AdvertisementCodec({
        manufacturerId: config.manufacturerId,
        trainNameMarker: config.trainNameMarker,
        switchNameMarker: config.switchNameMarker,
      });

    this.radio =
      options?.radio ??
      new RadioAccessLayer({
        scanner: new NobleScanner({ logger: logger('NobleScanner') }),
        hci: new HciClient({ sudo: config.sudo, hciDevice: config.hciDevice, logger: logger('HciClient') }),
        resetOnScanStart: config.resetOnScanStart,
        transmitRepeat: config.transmitRepeat,
        logger: logger('Radio'),
      });

    this.registry = new DeviceRegistry({
      livenessWindowMs: config.livenessWindowMs,
      activeHoldMs: config.activeHoldMs,
      now: this.now,
      logger: logger('DeviceRegistry'),
    });

    const pipelineBase = {
      radio: this.radio,
      codec,
      registry: this.registry,
      queueCapacity: config.queueCapacity,
    };
    this.trains = new TrainPipeline({
      ...pipelineBase,
      advertisingIntervalMs: config.trainAdvertisingIntervalMs,
      extraPulseChannels: config.extraPulseChannels,
      logger: logger('TrainPipeline'),
    });
    this.switches = new SwitchPipeline({
      ...pipelineBase,
      reliability: this.reliability,
      maxRetries: config.maxRetries,
      retryDelayMs: config.retryDelayMs,
      verifyTimeoutMs: config.verifyTimeoutMs,
      transmitRepeat: config.transmitRepeat,
      advertisingIntervalMs: config.switchAdvertisingIntervalMs,
      logger: logger('SwitchPipeline'),
    });

    this.monitor = new MonitorLoop({
      radio: this.radio,
      codec,
      registry: this.registry,
      now: this.now,
      logger: logger('MonitorLoop'),
    });

    this.registry.on('hubRegistered', (hub) => this.emit('hubRegistered', hub));
    this.registry.on('statusUpdated', (hub) => this.emit('statusUpdated', hub));
    this.registry.on('activeChanged', (channel, active) => this.emit('activeChanged', channel, active));
    this.trains.on('commandStateChanged', (change) => this.emit('commandStateChanged', change));
    this.switches.on('commandStateChanged', (change) => this.emit('commandStateChanged', change));
    this.monitor.on('scanRestarting', (reason) => this.emit('scanRestarting', reason));
  }

  // ─────────────────────────────────────────────────────────────────────────
  // LIFECYCLE
  // ─────────────────────────────────────────────────────────────────────────

  async start(): Promise<void> {
    if (this.running) {
      throw new Error('HubController already running');
    }
    this.running = true;

    const abortController = new AbortController();
    this.startup = abortController;
    const starting = this.startSubsystems(abortController.signal);
    this.starting = starting;
    try {
      await starting;
      if (this.startup === abortController) this.startup = null;
    } catch (error) {
      this.running = false;
      throw error;
    } finally {
      if (this.starting === starting) this.starting = null;
    }
  }

  /**
   * Stop monitoring and both drainers; an in-flight transmit completes first.
   * A stop during startup waits for the adapter reset, and nothing is started.
   */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;

    this.startup?.abort();
    this.startup = null;
    if (this.starting) {
      await this.starting.catch((error: unknown) => {
        this.log.warn(`Startup failed while stopping: ${errorMessage(error)}`);
      });
    }

    await this.monitor.stop();
    await Promise.all([this.trains.stop(), this.switches.stop()]);
    this.registry.dispose();

    this.log.info('Hub controller stopped');
    this.emit('stopped');
  }

  isRunning(): boolean {
    return this.running;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // COMMANDS
  // ─────────────────────────────────────────────────────────────────────────

  /** Queue a power change. Power is clamped to the configured range. */
  async enqueuePower(channel: number, power: number): Promise<void> {
    this.requireRunning();
    if (!Number.isInteger(power)) {
      throw new InvalidCommandError(`Invalid power: ${power}. Must be an integer`);
    }
    this.registry.requireKind(channel, 'train');

    const clamped = Math.min(this.config.powerMax, Math.max(this.config.powerMin, power));
    if (clamped !== power) {
      this.log.debug(`Clamped power ${power} to ${clamped} on channel ${channel}`);
    }

    await this.trains.enqueue({ type: 'setPower', channel, power: clamped });
    this.markActiveWhileRunning(channel);
  }

  async enqueueSelfDrive(channel: number, enabled: boolean): Promise<void> {
    this.requireRunning();
    this.registry.requireKind(channel, 'train');

    await this.trains.enqueue({ type: 'setSelfDrive', channel, enabled });
    this.registry.setSelfDrive(channel, enabled);
    this.markActiveWhileRunning(channel);
  }

  /**
   * Queue a switch change and resolve with its final outcome: true once the
   * switch reports the position, false when every attempt went unconfirmed.
   */
  async enqueueSwitch(channel: number, port: string, position: number): Promise<boolean> {
    this.requireRunning();
    if (!isPort(port)) {
      throw new InvalidCommandError(`Invalid switch port: ${port}. Must be one of ${PORTS.join(', ')}`);
    }
    const parsedPosition = SwitchPositionSchema.safeParse(position);
    if (!parsedPosition.success) {
      throw new InvalidCommandError(`Invalid position: ${position}. Must be 0 or 1`);
    }
    this.registry.requireKind(channel, 'switch');

    const pending = await this.switches.enqueue({
      type: 'setSwitch',
      channel,
      port,
      position: parsedPosition.data,
    });
    this.markActiveWhileRunning(channel);
    return pending.outcome;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // HUBS
  // ─────────────────────────────────────────────────────────────────────────

  registerHub(channel: number, kind: HubKind, name?: string): Hub {
    return this.registry.register(channel, kind, name);
  }

  getHub(channel: number): Hub | undefined {
    return this.registry.get(channel);
  }

  listHubs(kind?: HubKind): Hub[] {
    return this.registry.list(kind);
  }

  getReliability(channel: number): Record<string, ReliabilityStats> {
    return this.reliability.snapshot(channel);
  }

  /** Trains seen within the liveness window, keyed by channel. */
  listConnectedTrains(): Map<number, ConnectedTrain> {
    const now = this.now();
    const connected = new Map<number, ConnectedTrain>();
    for (const hub of this.liveHubs('train', now)) {
      connected.set(hub.channel, {
        ...this.describeConnected(hub, now),
        status: isTrainStatus(hub.lastStatus) ? hub.lastStatus : null,
        selfDrive: hub.selfDrive,
      });
    }
    return connected;
  }

  /** Switches seen within the liveness window, keyed by channel. */
  listConnectedSwitches(): Map<number, ConnectedSwitch> {
    const now = this.now();
    const connected = new Map<number, ConnectedSwitch>();
    for (const hub of this.liveHubs('switch', now)) {
      connected.set(hub.channel, {
        ...this.describeConnected(hub, now),
        status: isSwitchStatus(hub.lastStatus) ? hub.lastStatus : null,
        reliability: this.reliability.snapshot(hub.channel),
      });
    }
    return connected;
  }

  /** Power-cycle the adapter. A running scan fails and the monitor restarts it. */
  async resetAdapter(): Promise<void> {
    await this.radio.resetAdapter();
  }

  // ─────────────────────────────────────────────────────────────────────────
  // PRIVATE
  // ─────────────────────────────────────────────────────────────────────────

  private async startSubsystems(signal: AbortSignal): Promise<void> {
    if (this.config.resetOnStartup) {
      await this.radio.resetAdapter();
    }
    if (signal.aborted) {
      this.log.info('Startup cancelled');
      return;
    }

    this.trains.start();
    this.switches.start();
    this.monitor.start();

    this.log.info('Hub controller started');
    this.emit('started');
  }

  private requireRunning(): void {
    if (!this.running) {
      throw new NotRunningError('HubController is not running');
    }
  }

  // A stop between enqueue and here has already disposed the registry timers.
  private markActiveWhileRunning(channel: number): void {
    if (this.running) this.registry.markActive(channel);
  }

  private liveHubs(kind: HubKind, now: number): Hub[] {
    return this.registry
      .list(kind)
      .filter((hub) => this.registry.isLive(hub.channel, this.config.livenessWindowMs, now));
  }

  private describeConnected(hub: Hub, now: number): ConnectedHub {
    const seconds = this.registry.secondsSinceSeen(hub.channel, now) ?? 0;
    return {
      channel: hub.channel,
      name: hub.name,
      rssi: hub.rssi,
      lastUpdateSecondsAgo: Math.round(seconds * 100) / 100,
      active: hub.active,
      expectedUpdateIntervalMs: this.registry.expectedUpdateIntervalMs(hub.channel),
    };
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// FACTORY
// ═══════════════════════════════════════════════════════════════════════════

export function createHubController(options?: HubControllerOptions): HubController {
  return new HubController(options);
}
