/**
 * DeviceRegistry - Hubs known on the shared radio, keyed by channel
 *
 * Hubs are registered on their first decoded advertisement or explicitly by
 * the caller, and are never removed. Liveness is derived from `lastSeen`;
 * hubs that stop broadcasting simply age out of the connected views.
 */

import {
  ChannelSchema,
  InvalidCommandError,
  TypedEventEmitter,
  UnknownDeviceError,
  createLogger,
  isTrainStatus,
  monotonicNow,
} from '@hubcast/types';
import type { Hub, HubKind, Logger } from '@hubcast/types';
import type { DecodedAdvertisement } from '@hubcast/protocol';

// ═══════════════════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════

const DEFAULT_LIVENESS_WINDOW_MS = 5000;
const DEFAULT_ACTIVE_HOLD_MS = 5000;

/** Status update cadence assumed while a hub is being commanded */
export const ACTIVE_UPDATE_INTERVAL_MS = 100;
export const IDLE_UPDATE_INTERVAL_MS = 500;

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface DeviceRegistryEvents {
  hubRegistered: (hub: Hub) => void;
  statusUpdated: (hub: Hub) => void;
  activeChanged: (channel: number, active: boolean) => void;
}

export interface DeviceRegistryConfig {
  livenessWindowMs?: number;
  activeHoldMs?: number;
  /** Monotonic clock in ms */
  now?: () => number;
  logger?: Logger;
}

// ═══════════════════════════════════════════════════════════════════════════
// IMPLEMENTATION
// ═══════════════════════════════════════════════════════════════════════════

export class DeviceRegistry extends TypedEventEmitter<DeviceRegistryEvents> {
  private hubs = new Map<number, Hub>();
  private activeTimers = new Map<number, ReturnType<typeof setTimeout>>();
  private readonly livenessWindowMs: number;
  private readonly activeHoldMs: number;
  private readonly now: () => number;
  private readonly log: Logger;

  constructor(config?: DeviceRegistryConfig) {
    super();
    this.livenessWindowMs = config?.livenessWindowMs ?? DEFAULT_LIVENESS_WINDOW_MS;
    this.activeHoldMs = config?.activeHoldMs ?? DEFAULT_ACTIVE_HOLD_MS;
    this.now = config?.now ?? monotonicNow;
    this.log = config?.logger ?? createLogger('DeviceRegistry');
  }

  // ─────────────────────────────────────────────────────────────────────────
  // REGISTRATION
  // ─────────────────────────────────────────────────────────────────────────

  /** Return the hub on `channel`, creating it on first sighting. */
  getOrCreate(channel: number, kind: HubKind, name: string): Hub {
    return { ...(this.hubs.get(channel) ?? this.create(channel, kind, name)) };
  }

  /**
   * Register a hub explicitly. Re-registering with the same kind only
   * updates the name; a different kind is rejected.
   */
  register(channel: number, kind: HubKind, name?: string): Hub {
    if (!ChannelSchema.safeParse(channel).success) {
      throw new InvalidCommandError(`Invalid channel: ${channel}. Must be 1-30`);
    }

    const existing = this.hubs.get(channel);
    if (existing) {
      if (existing.kind !== kind) {
        throw new InvalidCommandError(`Channel ${channel} is already registered as a ${existing.kind} hub`);
      }
      if (name) existing.name = name;
      return { ...existing };
    }

    return { ...this.create(channel, kind, name ?? defaultName(kind, channel)) };
  }

  // ─────────────────────────────────────────────────────────────────────────
  // STATUS
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Record a decoded status advertisement. Returns false when it was dropped
   * because the channel is registered as the other kind of hub.
   */
  recordStatus(decoded: DecodedAdvertisement, now: number = this.now()): boolean {
    this.getOrCreate(decoded.channel, decoded.kind, decoded.name);
    const hub = this.require(decoded.channel);
    if (hub.kind !== decoded.kind) {
      this.log.warn(`Dropped ${decoded.kind} status on channel ${decoded.channel}: registered as ${hub.kind}`);
      return false;
    }

    hub.lastStatus = isTrainStatus(decoded.status)
      ? { ...decoded.status, selfDrive: hub.selfDrive }
      : decoded.status;
    hub.lastSeen = now;
    hub.rssi = decoded.rssi;
    if (decoded.name) hub.name = decoded.name;

    this.emit('statusUpdated', { ...hub });
    return true;
  }

  /** True when the hub was seen less than `windowMs` ago. */
  isLive(channel: number, windowMs: number = this.livenessWindowMs, now: number = this.now()): boolean {
    const lastSeen = this.hubs.get(channel)?.lastSeen ?? null;
    if (lastSeen === null) return false;
    return now - lastSeen < windowMs;
  }

  /** Seconds since the last advertisement, or null when never seen. */
  secondsSinceSeen(channel: number, now: number = this.now()): number | null {
    const lastSeen = this.hubs.get(channel)?.lastSeen ?? null;
    return lastSeen === null ? null : (now - lastSeen) / 1000;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // ACTIVITY
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Flag the hub as being commanded. The flag clears `clearAfterMs` after
   * the most recent mark.
   */
  markActive(channel: number, clearAfterMs: number = this.activeHoldMs): void {
    const hub = this.require(channel);

    const pending = this.activeTimers.get(channel);
    if (pending) clearTimeout(pending);

    this.activeTimers.set(
      channel,
      setTimeout(() => {
        this.activeTimers.delete(channel);
        this.setActive(hub, false);
      }, clearAfterMs),
    );
    this.setActive(hub, true);
  }

  isActive(channel: number): boolean {
    return this.hubs.get(channel)?.active ?? false;
  }

  expectedUpdateIntervalMs(channel: number): number {
    return this.isActive(channel) ? ACTIVE_UPDATE_INTERVAL_MS : IDLE_UPDATE_INTERVAL_MS;
  }

  setSelfDrive(channel: number, enabled: boolean): void {
    const hub = this.require(channel);
    hub.selfDrive = enabled;
    if (isTrainStatus(hub.lastStatus)) {
      hub.lastStatus = { ...hub.lastStatus, selfDrive: enabled };
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // QUERIES
  // ─────────────────────────────────────────────────────────────────────────

  get(channel: number): Hub | undefined {
    const hub = this.hubs.get(channel);
    return hub ? { ...hub } : undefined;
  }

  has(channel: number, kind?: HubKind): boolean {
    const hub = this.hubs.get(channel);
    return hub !== undefined && (kind === undefined || hub.kind === kind);
  }

  /** Hubs ordered by channel, optionally of one kind. */
  list(kind?: HubKind): Hub[] {
    return Array.from(this.hubs.values())
      .filter((hub) => kind === undefined || hub.kind === kind)
      .sort((a, b) => a.channel - b.channel)
      .map((hub) => ({ ...hub }));
  }

  channels(kind?: HubKind): number[] {
    return this.list(kind).map((hub) => hub.channel);
  }

  /** Throws UnknownDeviceError unless a hub of `kind` is on `channel`. */
  requireKind(channel: number, kind: HubKind): Hub {
    const hub = this.hubs.get(channel);
    if (!hub || hub.kind !== kind) {
      throw new UnknownDeviceError(channel, this.channels(kind));
    }
    return { ...hub };
  }

  // ─────────────────────────────────────────────────────────────────────────
  // LIFECYCLE
  // ─────────────────────────────────────────────────────────────────────────

  dispose(): void {
    for (const timer of this.activeTimers.values()) {
      clearTimeout(timer);
    }
    this.activeTimers.clear();
  }

  // ─────────────────────────────────────────────────────────────────────────
  // PRIVATE
  // ─────────────────────────────────────────────────────────────────────────

  private create(channel: number, kind: HubKind, name: string): Hub {
    const hub: Hub = {
      channel,
      kind,
      name,
      lastSeen: null,
      lastStatus: null,
      rssi: null,
      active: false,
      selfDrive: false,
    };
    this.hubs.set(channel, hub);
    this.log.info(`Registered ${kind} hub "${name}" on channel ${channel}`);
    this.emit('hubRegistered', { ...hub });
    return hub;
  }

  private require(channel: number): Hub {
    const hub = this.hubs.get(channel);
    if (!hub) {
      throw new UnknownDeviceError(channel, this.channels());
    }
    return hub;
  }

  private setActive(hub: Hub, active: boolean): void {
    if (hub.active === active) return;
    hub.active = active;
    this.emit('activeChanged', hub.channel, active);
  }
}

function defaultName(kind: HubKind, channel: number): string {
  return kind === 'train' ? `Train ${channel}` : `Switch ${channel}`;
}
