/**
 * SLC response checking and parsing.
 */

import { CommandError } from "../errors.js";
import {
  ACK,
  UNKNOWN,
  isMode,
  type DeviceInfo,
  type Mode,
  type NormalParams,
  type TriggerParams,
} from "./types.js";

const CONTROLLER_ERROR_PREFIX = "#!";
const BAD_ARGUMENT_PREFIX = "#?";
const UNKNOWN_COMMAND_MARKER = "is not defined";

const DEVICE_INFO_MARKERS = {
  firmwareVersion: "Driver:",
  moduleNumber: "Module No.:",
  serialNumber: "Serial No.:",
} as const;

// =============================================================================
// Acknowledgement
// =============================================================================

/**
 * Throw if the response carries one of the controller's error markers.
 * Returns the response unchanged otherwise.
 */
export function checkAck(response: string, command: string): string {
  if (response.startsWith(CONTROLLER_ERROR_PREFIX)) {
    throw new CommandError(`Controller error for '${command}': ${response}`, command, response);
  }
  if (response.startsWith(BAD_ARGUMENT_PREFIX)) {
    throw new CommandError(`Invalid argument for '${command}': ${response}`, command, response);
  }
  if (response.includes(UNKNOWN_COMMAND_MARKER)) {
    throw new CommandError(`Unknown command '${command}': ${response}`, command, response);
  }
  return response;
}

/**
 * Like {@link checkAck}, but also require the `##` success marker.
 */
export function expectAck(response: string, command: string): void {
  checkAck(response, command);
  if (!response.includes(ACK)) {
    throw new CommandError(
      `Expected '${ACK}' acknowledgement for '${command}', got: ${JSON.stringify(response)}`,
      command,
      response
    );
  }
}

// =============================================================================
// Parsing
// =============================================================================

/**
 * Parse a whole decimal integer, rejecting anything `parseInt` would silently truncate.
 */
export function parseIntStrict(text: string): number | null {
  const trimmed = text.trim();
  return /^[+-]?\d+$/.test(trimmed) ? Number(trimmed) : null;
}

/** Strip `#` markers and split into whitespace-delimited fields. */
function dataFields(response: string): string[] {
  return response.replaceAll("#", "").trim().split(/\s+/).filter(Boolean);
}

function tokenAfter(response: string, marker: string): string {
  const index = response.indexOf(marker);
  if (index === -1) return UNKNOWN;
  const [token] = response.slice(index + marker.length).trim().split(/\s+/);
  return token || UNKNOWN;
}

/**
 * Parse a DEVICEINFO line. Never throws: missing fields become "Unknown".
 *
 * Expected format: `Mightex LED Driver:<fw> Device Module No.:<model> Device Serial No.:<sn>`
 */
export function parseDeviceInfo(response: string): DeviceInfo {
  return {
    firmwareVersion: tokenAfter(response, DEVICE_INFO_MARKERS.firmwareVersion),
    moduleNumber: tokenAfter(response, DEVICE_INFO_MARKERS.moduleNumber),
    serialNumber: tokenAfter(response, DEVICE_INFO_MARKERS.serialNumber),
  };
}

export function parseMode(response: string, channel: number, command: string): Mode {
  const value = parseIntStrict(response.replaceAll("#", ""));
  if (value === null || !isMode(value)) {
    throw new CommandError(
      `Unexpected mode response for channel ${channel}: ${JSON.stringify(response)}`,
      command,
      response
    );
  }
  return value;
}

/**
 * Parse a `?CURRENT` response. Leading fields are calibration data; the last
 * two are Imax and Iset.
 */
export function parseNormalParams(response: string, command: string): NormalParams {
  const fields = dataFields(response);
  const maxCurrentMa = fields.length >= 2 ? parseIntStrict(fields[fields.length - 2]) : null;
  const setCurrentMa = fields.length >= 2 ? parseIntStrict(fields[fields.length - 1]) : null;
  if (maxCurrentMa === null || setCurrentMa === null) {
    throw new CommandError(`Cannot parse normal params from ${JSON.stringify(response)}`, command, response);
  }
  return { maxCurrentMa, setCurrentMa };
}

/** Parse a `LoadVoltage` response of the form `#<channel>:<millivolts>`. */
export function parseLoadVoltage(response: string, command: string): number {
  const segments = response.split(":");
  const millivolts = segments.length >= 2 ? parseIntStrict(segments[1]) : null;
  if (millivolts === null) {
    throw new CommandError(`Cannot parse load voltage from ${JSON.stringify(response)}`, command, response);
  }
  return millivolts;
}

/**
 * Read Imax and polarity from a `?TRIGGER` response of the form
 * `#<imax> <polarity>`, or null when it has another shape.
 */
export function matchTriggerParams(response: string): TriggerParams | null {
  const fields = dataFields(response);
  if (fields.length < 2) return null;
  const maxCurrentMa = parseIntStrict(fields[0]);
  const polarity = parseIntStrict(fields[1]);
  return maxCurrentMa === null || polarity === null ? null : { maxCurrentMa, polarity };
}

export function parseTriggerParams(response: string, command: string): TriggerParams {
  const params = matchTriggerParams(response);
  if (!params) {
    throw new CommandError(`Cannot parse trigger params from ${JSON.stringify(response)}`, command, response);
  }
  return params;
}
