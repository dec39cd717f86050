export { AdvertisementCodec, createAdvertisementCodec } from './advertisement-codec.js';
export type {
  AdvertisementCodecOptions,
  DecodedAdvertisement,
  DecodedTrainAdvertisement,
  DecodedSwitchAdvertisement,
  TrainCommandValue,
} from './advertisement-codec.js';
export {
  MANUFACTURER_ID,
  AD_TYPE_MANUFACTURER_SPECIFIC,
  COMMAND_TYPE_TRAIN,
  COMMAND_TYPE_SWITCH,
  SELF_DRIVE_ENABLE,
  SELF_DRIVE_DISABLE,
  COMMAND_HEADER_SIZE,
  MIN_STATUS_FRAME,
  STATUS_CHANNEL_OFFSET,
  assertChannel,
  portIndex,
  portBit,
  decodePortNibble,
  decodePositionNibble,
  trainPowerValue,
  selfDriveValue,
  decodeTrainCommandValue,
  switchCommandValue,
  decodeSwitchCommandValue,
} from './advertisement-codec.js';
