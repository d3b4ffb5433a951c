/**
 * SLC LED controller driver - public API.
 */

export * from "./protocol/index.js";
export { ConnectionError, TimeoutError, CommandError, ValidationError, SlcError, isSlcError } from "./errors.js";
export type { SlcErrorKind } from "./errors.js";
export { SerialTransport, listPorts } from "./connection.js";
export type { SerialLink, LinkOptions, TransportOptions } from "./connection.js";
export { SlcController, withController } from "./controller.js";
export type { ControllerOptions } from "./controller.js";
export { channelLabel, loadConfig, loadConfigFile, polarityName, withStore } from "./config.js";
export type { ChannelConfig, TriggerConfig } from "./config.js";
export { ProgramReport, programAll, programChannel, runSession, verifyAll, verifyChannel } from "./programmer.js";
export type { ChannelResult, SessionOptions, SessionOutcome } from "./programmer.js";
export { getErrorMessage } from "./lib.js";
