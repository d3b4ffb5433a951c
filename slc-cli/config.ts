/**
 * Trigger configuration: the declarative description of which channels to
 * program and how.
 *
 * Document shape (YAML or JSON):
 *
 *   port: /dev/ttyUSB0
 *   store: true
 *   channels:
 *     1: { name: M850L3, wavelength_nm: 850, band: NIR-I, current_ma: 1200, max_current_ma: 1200, polarity: rising }
 */

import * as fs from "fs";
import * as path from "path";
import { parse as parseYaml } from "yaml";
import { ValidationError } from "./errors.js";
import { getErrorMessage } from "./lib.js";
import { MAX_CHANNEL, MAX_CURRENT_PULSED_MA, MIN_CHANNEL, TriggerPolarity, parseIntStrict } from "./protocol/index.js";

// =============================================================================
// Types
// =============================================================================

export interface ChannelConfig {
  readonly channel: number;
  readonly name: string;
  readonly wavelengthNm: number;
  readonly band: string;
  readonly currentMa: number;
  readonly maxCurrentMa: number;
  readonly polarity: TriggerPolarity;
}

export interface TriggerConfig {
  readonly port: string;
  readonly store: boolean;
  /** Sorted by channel number. */
  readonly channels: readonly ChannelConfig[];
}

const POLARITIES = new Map<string, TriggerPolarity>([
  ["rising", TriggerPolarity.RISING],
  ["falling", TriggerPolarity.FALLING],
]);

// =============================================================================
// Helpers
// =============================================================================

/** e.g. `CH1 M850L3 (850 nm)` */
export function channelLabel(ch: ChannelConfig): string {
  return `CH${ch.channel} ${ch.name} (${ch.wavelengthNm} nm)`;
}

export function polarityName(polarity: number): string {
  return polarity === TriggerPolarity.RISING ? "rising" : "falling";
}

export function withStore(config: TriggerConfig, store: boolean): TriggerConfig {
  return { ...config, store };
}

type Mapping = Record<string, unknown>;

function isMapping(value: unknown): value is Mapping {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function typeName(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

function formatValue(value: unknown): string {
  return value === undefined ? "undefined" : JSON.stringify(value);
}

// =============================================================================
// Validation
// =============================================================================

/**
 * Validate a parsed configuration document.
 */
export function loadConfig(source: unknown): TriggerConfig {
  if (!isMapping(source)) {
    throw new ValidationError(`Config must be a mapping, got ${typeName(source)}`);
  }

  const port = source.port;
  if (typeof port !== "string" || !port) {
    throw new ValidationError("Config must specify a non-empty 'port' string");
  }

  const store = source.store ?? true;
  if (typeof store !== "boolean") {
    throw new ValidationError(`'store' must be a boolean, got ${typeName(store)}`);
  }

  const rawChannels = source.channels;
  if (!isMapping(rawChannels) || Object.keys(rawChannels).length === 0) {
    throw new ValidationError("Config must contain a non-empty 'channels' mapping");
  }

  const channels = new Map<number, ChannelConfig>();
  for (const [key, data] of Object.entries(rawChannels)) {
    const ch = parseChannel(key, data);
    if (channels.has(ch.channel)) {
      throw new ValidationError(`Channel ${ch.channel} is defined more than once`);
    }
    channels.set(ch.channel, ch);
  }

  return {
    port,
    store,
    channels: [...channels.values()].sort((a, b) => a.channel - b.channel),
  };
}

function parseChannel(key: string, data: unknown): ChannelConfig {
  const channel = parseIntStrict(key);
  if (channel === null) {
    throw new ValidationError(`Channel key must be an integer, got ${JSON.stringify(key)}`);
  }
  if (channel < MIN_CHANNEL || channel > MAX_CHANNEL) {
    throw new ValidationError(`Channel must be ${MIN_CHANNEL}-${MAX_CHANNEL}, got ${channel}`);
  }
  if (!isMapping(data)) {
    throw new ValidationError(`Channel ${channel} config must be a mapping`);
  }

  const name = data.name;
  if (typeof name !== "string" || !name) {
    throw new ValidationError(`Channel ${channel}: 'name' must be a non-empty string`);
  }

  const band = data.band ?? "";
  if (typeof band !== "string") {
    throw new ValidationError(`Channel ${channel}: 'band' must be a string`);
  }

  const wavelengthNm = requireInteger(data, "wavelength_nm", channel, 1);
  const currentMa = requireInteger(data, "current_ma", channel, 0);
  const maxCurrentMa = requireInteger(data, "max_current_ma", channel, 0);

  if (currentMa > maxCurrentMa) {
    throw new ValidationError(
      `Channel ${channel}: current_ma (${currentMa}) exceeds max_current_ma (${maxCurrentMa})`
    );
  }
  if (maxCurrentMa > MAX_CURRENT_PULSED_MA) {
    throw new ValidationError(
      `Channel ${channel}: max_current_ma (${maxCurrentMa}) exceeds pulsed-mode limit (${MAX_CURRENT_PULSED_MA} mA)`
    );
  }

  const polarityValue = data.polarity ?? "rising";
  const polarity = typeof polarityValue === "string" ? POLARITIES.get(polarityValue) : undefined;
  if (polarity === undefined) {
    throw new ValidationError(
      `Channel ${channel}: polarity must be one of ${[...POLARITIES.keys()].join(", ")}, got ${formatValue(polarityValue)}`
    );
  }

  return { channel, name, wavelengthNm, band, currentMa, maxCurrentMa, polarity };
}

function requireInteger(data: Mapping, key: string, channel: number, min: 0 | 1): number {
  const value = data[key];
  if (typeof value !== "number" || !Number.isInteger(value) || value < min) {
    const kind = min === 1 ? "positive" : "non-negative";
    throw new ValidationError(`Channel ${channel}: '${key}' must be a ${kind} integer, got ${formatValue(value)}`);
  }
  return value;
}

// =============================================================================
// Config Loading
// =============================================================================

/**
 * Load a config file from disk (YAML or JSON format).
 */
export async function loadConfigFile(configPath: string): Promise<TriggerConfig> {
  const fullPath = path.resolve(configPath);

  if (!fs.existsSync(fullPath)) {
    throw new Error(`Config file not found: ${fullPath}`);
  }

  const raw = await fs.promises.readFile(fullPath, "utf-8");
  const ext = path.extname(fullPath).toLowerCase();

  let document: unknown;
  try {
    if (ext === ".yaml" || ext === ".yml") {
      document = parseYaml(raw);
    } else if (ext === ".json") {
      document = JSON.parse(raw);
    } else {
      throw new Error(`unsupported extension '${ext}' (expected .yaml, .yml or .json)`);
    }
  } catch (err) {
    throw new ValidationError(`Cannot parse ${path.basename(fullPath)}: ${getErrorMessage(err)}`);
  }

  return loadConfig(document);
}
