/**
 * SLC protocol module - command validation, formatting and response parsing.
 */

export type { CommandTransport, DeviceInfo, ModeName, NormalParams, TriggerParams } from "./types.js";
export {
  ACK,
  FOLLOWER_DURATION_US,
  MAX_CHANNEL,
  MAX_CURRENT_NORMAL_MA,
  MAX_CURRENT_PULSED_MA,
  MAX_DURATION_US,
  MAX_STEP,
  MIN_CHANNEL,
  MODE_DISABLE,
  MODE_NORMAL,
  MODE_STROBE,
  MODE_TRIGGER,
  Mode,
  TriggerPolarity,
  UNKNOWN,
  isMode,
  isTriggerPolarity,
  modeName,
} from "./types.js";
export {
  checkAck,
  expectAck,
  matchTriggerParams,
  parseDeviceInfo,
  parseIntStrict,
  parseLoadVoltage,
  parseMode,
  parseNormalParams,
  parseTriggerParams,
} from "./responses.js";
export { SlcProtocol } from "./protocol.js";
export * from "./validation.js";
