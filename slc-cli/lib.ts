import { ValidationError } from "./errors.js";
import { parseIntStrict } from "./protocol/index.js";

// =============================================================================
// Constants
// =============================================================================

export const DEFAULT_PORT = "/dev/ttyUSB0";
export const DEFAULT_BAUD_RATE = 9600;
export const DEFAULT_TIMEOUT_MS = 1000;

/** Extra listening time after the CR terminator, for a trailing LF. */
export const DRAIN_WINDOW_MS = 20;

/** Outgoing commands end in LF CR. */
export const COMMAND_TERMINATOR = "\n\r";

/** Responses end in CR. */
export const RESPONSE_TERMINATOR = 0x0d;

// =============================================================================
// Error Helpers
// =============================================================================

/**
 * Extract error message from unknown error type.
 */
export function getErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// =============================================================================
// Argument Helpers
// =============================================================================

/**
 * Parse an integer given on the command line.
 */
export function parseIntegerArg(value: string, name: string): number {
  const parsed = parseIntStrict(value);
  if (parsed === null) {
    throw new ValidationError(`Invalid ${name}: ${value}`);
  }
  return parsed;
}

/**
 * Parse a comma-separated channel list, defaulting to every channel.
 */
export function parseChannelList(value: string | undefined): number[] {
  if (value === undefined) return [1, 2, 3, 4];
  const channels = value.split(",").map((part) => parseIntegerArg(part, "channel"));
  return [...new Set(channels)].sort((a, b) => a - b);
}

// =============================================================================
// Byte Helpers
// =============================================================================

/**
 * Decode bytes as 7-bit ASCII. Bytes above 0x7f become U+FFFD.
 */
export function decodeAscii(bytes: Uint8Array): string {
  let text = "";
  for (const byte of bytes) {
    text += byte < 0x80 ? String.fromCharCode(byte) : "\uFFFD";
  }
  return text;
}
