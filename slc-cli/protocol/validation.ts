/**
 * Parameter checks run before a command is formatted.
 *
 * Every check throws a ValidationError, so a rejected value never reaches the wire.
 */

import { ValidationError } from "../errors.js";
import {
  MAX_CHANNEL,
  MAX_DURATION_US,
  MAX_STEP,
  MIN_CHANNEL,
  Mode,
  isMode,
  isTriggerPolarity,
  type TriggerPolarity,
} from "./types.js";

function inRange(value: number, min: number, max: number): boolean {
  return Number.isInteger(value) && value >= min && value <= max;
}

export function validateChannel(channel: number): void {
  if (!inRange(channel, MIN_CHANNEL, MAX_CHANNEL)) {
    throw new ValidationError(`Channel must be ${MIN_CHANNEL}-${MAX_CHANNEL}, got ${channel}`);
  }
}

/**
 * Check `currentMa` against `0..ceilingMa`.
 * @param label - Parameter name used in the error message
 */
export function validateCurrent(currentMa: number, ceilingMa: number, label = "current"): void {
  if (!inRange(currentMa, 0, ceilingMa)) {
    throw new ValidationError(`${label} must be 0-${ceilingMa} mA, got ${currentMa}`);
  }
}

export function validateSetNotAboveMax(setCurrentMa: number, maxCurrentMa: number): void {
  if (setCurrentMa > maxCurrentMa) {
    throw new ValidationError(
      `set current (${setCurrentMa} mA) cannot exceed max current (${maxCurrentMa} mA)`
    );
  }
}

export function validateMode(mode: number): asserts mode is Mode {
  if (!isMode(mode)) {
    const expected = Object.entries(Mode)
      .map(([name, value]) => `${name}=${value}`)
      .join(", ");
    throw new ValidationError(`Invalid mode ${mode}; expected one of ${expected}`);
  }
}

export function validatePolarity(polarity: number): asserts polarity is TriggerPolarity {
  if (!isTriggerPolarity(polarity)) {
    throw new ValidationError(`Invalid trigger polarity ${polarity}; expected 0 (rising) or 1 (falling)`);
  }
}

export function validateStep(step: number): void {
  if (!inRange(step, 0, MAX_STEP)) {
    throw new ValidationError(`Step must be 0-${MAX_STEP}, got ${step}`);
  }
}

export function validateDuration(durationUs: number): void {
  if (!inRange(durationUs, 0, MAX_DURATION_US)) {
    throw new ValidationError(`Duration must be 0-${MAX_DURATION_US} us, got ${durationUs}`);
  }
}

export function validateRepeat(repeat: number): void {
  if (!Number.isInteger(repeat) || repeat < 0) {
    throw new ValidationError(`Repeat must be >= 0, got ${repeat}`);
  }
}
