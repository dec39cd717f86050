// ═══════════════════════════════════════════════════════════════════════════
// hubcast — Unified entry point for advertisement-based hub control
// ═══════════════════════════════════════════════════════════════════════════

// Controller (primary API)
export { HubController, createHubController } from '@hubcast/control';
export type {
  ConnectedSwitch,
  ConnectedTrain,
  HubControllerEvents,
  HubControllerOptions,
  CommandStateChange,
  PendingCommand,
  ReliabilityStats,
} from '@hubcast/control';
export { DeviceRegistry, MonitorLoop, ReliabilityTracker, TrainPipeline, SwitchPipeline } from '@hubcast/control';
export type { DeviceRegistryEvents, MonitorLoopEvents } from '@hubcast/control';

// Radio
export { RadioAccessLayer, HciClient, NobleScanner } from '@hubcast/radio';
export type { AdvertisementScanner, IHciClient, RadioAccessLayerConfig, ScanSession } from '@hubcast/radio';

// Protocol
export { AdvertisementCodec, createAdvertisementCodec, MANUFACTURER_ID } from '@hubcast/protocol';
export type { AdvertisementCodecOptions, DecodedAdvertisement } from '@hubcast/protocol';

// Types & utilities
export {
  createLogger,
  delay,
  loadConfig,
  parseConfig,
  isHubControlError,
  HubControlError,
  InvalidCommandError,
  InvalidFrameError,
  NotRunningError,
  ScanFailureError,
  TransmitFailureError,
  UnknownDeviceError,
  VerificationTimeoutError,
  HubcastConfigSchema,
  TypedEventEmitter,
  PORTS,
  SWITCH_POSITION,
} from '@hubcast/types';
export type {
  Advertisement,
  Command,
  CommandState,
  Hub,
  HubKind,
  HubcastConfig,
  HubcastConfigInput,
  Logger,
  LogLevel,
  Port,
  SetPowerCommand,
  SetSelfDriveCommand,
  SetSwitchCommand,
  SwitchPosition,
  SwitchStatus,
  TrainStatus,
} from '@hubcast/types';
