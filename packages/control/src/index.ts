export { HubController, createHubController } from './hub-controller.js';
export type {
  ConnectedSwitch,
  ConnectedTrain,
  HubControllerEvents,
  HubControllerOptions,
} from './hub-controller.js';
export {
  DeviceRegistry,
  ACTIVE_UPDATE_INTERVAL_MS,
  IDLE_UPDATE_INTERVAL_MS,
} from './device-registry.js';
export type { DeviceRegistryConfig, DeviceRegistryEvents } from './device-registry.js';
export { ReliabilityTracker, successRate, switchTarget } from './reliability.js';
export type { ReliabilityCounter, ReliabilityStats, SwitchTarget } from './reliability.js';
export { CommandQueue } from './command-queue.js';
export { CommandPipeline } from './command-pipeline.js';
export type {
  CommandEntry,
  CommandPipelineConfig,
  CommandPipelineEvents,
  CommandStateChange,
  DrainCadence,
  PendingCommand,
} from './command-pipeline.js';
export { TrainPipeline, TRAIN_BATCH_SIZE, TRAIN_PAUSE_MS } from './train-pipeline.js';
export type { TrainPipelineConfig } from './train-pipeline.js';
export {
  SwitchPipeline,
  SWITCH_BATCH_SIZE,
  SWITCH_PAUSE_MS,
  waitForSwitchPosition,
} from './switch-pipeline.js';
export type { SwitchPipelineConfig } from './switch-pipeline.js';
export { MonitorLoop } from './monitor-loop.js';
export type { MonitorLoopConfig, MonitorLoopEvents } from './monitor-loop.js';
