/**
 * Protocol types and limits for SLC controller communication.
 */

// =============================================================================
// Limits
// =============================================================================

export const MIN_CHANNEL = 1;
export const MAX_CHANNEL = 4;
export const MAX_STEP = 127;
export const MAX_DURATION_US = 99_999_999;
export const MAX_CURRENT_NORMAL_MA = 1000;
export const MAX_CURRENT_PULSED_MA = 3500;

/** Step duration telling the driver to follow the trigger input level instead of timing a pulse. */
export const FOLLOWER_DURATION_US = 9999;

/** Success marker somewhere in a response. */
export const ACK = "##";

/** Placeholder for device info fields missing from the response. */
export const UNKNOWN = "Unknown";

// =============================================================================
// Modes
// =============================================================================

/** Channel operating modes, as the integers the device uses on the wire. */
export const Mode = {
  DISABLE: 0,
  NORMAL: 1,
  STROBE: 2,
  TRIGGER: 3,
} as const;

export type Mode = (typeof Mode)[keyof typeof Mode];
export type ModeName = keyof typeof Mode;

export const MODE_DISABLE = Mode.DISABLE;
export const MODE_NORMAL = Mode.NORMAL;
export const MODE_STROBE = Mode.STROBE;
export const MODE_TRIGGER = Mode.TRIGGER;

const MODE_NAMES: Record<Mode, ModeName> = {
  0: "DISABLE",
  1: "NORMAL",
  2: "STROBE",
  3: "TRIGGER",
};

export function isMode(value: number): value is Mode {
  return Object.values(Mode).some((mode) => mode === value);
}

export function modeName(mode: Mode): ModeName {
  return MODE_NAMES[mode];
}

/** Trigger edge that activates output in TRIGGER mode. */
export const TriggerPolarity = {
  RISING: 0,
  FALLING: 1,
} as const;

export type TriggerPolarity = (typeof TriggerPolarity)[keyof typeof TriggerPolarity];

export function isTriggerPolarity(value: number): value is TriggerPolarity {
  return value === TriggerPolarity.RISING || value === TriggerPolarity.FALLING;
}

// =============================================================================
// Responses
// =============================================================================

/** Parsed DEVICEINFO response. */
export interface DeviceInfo {
  readonly firmwareVersion: string;
  readonly moduleNumber: string;
  readonly serialNumber: string;
}

/** Result of a `?CURRENT` query. */
export interface NormalParams {
  maxCurrentMa: number;
  setCurrentMa: number;
}

/** Result of a `?TRIGGER` query. */
export interface TriggerParams {
  maxCurrentMa: number;
  polarity: number;
}

// =============================================================================
// Transport contract
// =============================================================================

/** Line-oriented command/response exchange the protocol layer talks through. */
export interface CommandTransport {
  readonly isOpen: boolean;
  open(): Promise<void>;
  close(): Promise<void>;
  /** Send one command and resolve with its trimmed response. */
  send(command: string): Promise<string>;
}
