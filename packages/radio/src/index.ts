export { HciClient, advertisingIntervalUnits, toHexByte } from './hci-client.js';
export type { HciClientOptions, IHciClient } from './hci-client.js';
export {
  OGF_LE_CONTROLLER,
  OCF_LE_SET_ADVERTISING_PARAMETERS,
  OCF_LE_SET_ADVERTISING_DATA,
  OCF_LE_SET_ADVERTISE_ENABLE,
  MIN_ADVERTISING_INTERVAL_UNITS,
  MAX_ADVERTISING_INTERVAL_UNITS,
} from './hci-client.js';
export { NobleScanner, toAdvertisement } from './noble-scanner.js';
export type { AdvertisementScanner, ScanFailureHandler } from './noble-scanner.js';
export { RadioAccessLayer, AsyncLock } from './radio-access-layer.js';
export type {
  RadioAccessLayerConfig,
  RadioEvents,
  RadioTimingConfig,
  ScanEnd,
  ScanSession,
  TransmitOptions,
} from './radio-access-layer.js';
