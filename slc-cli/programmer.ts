/**
 * Batch programming and verification of trigger-follower channels.
 *
 * Device errors for one channel become a failed ChannelResult, so a batch
 * always visits every channel in the config.
 */

import { channelLabel, polarityName, type ChannelConfig, type TriggerConfig } from "./config.js";
import type { SlcController } from "./controller.js";
import { isSlcError } from "./errors.js";
import { Mode, matchTriggerParams, modeName } from "./protocol/index.js";

// =============================================================================
// Results
// =============================================================================

export interface ChannelResult {
  readonly channelConfig: ChannelConfig;
  readonly success: boolean;
  readonly message: string;
}

/** Aggregate outcome of a programAll or verifyAll pass. */
export class ProgramReport {
  constructor(readonly results: readonly ChannelResult[] = []) {}

  get allOk(): boolean {
    return this.results.every((r) => r.success);
  }

  get passed(): number {
    return this.results.filter((r) => r.success).length;
  }

  /** e.g. `1/2 channels FAILED` */
  get summary(): string {
    return `${this.passed}/${this.results.length} channels ${this.allOk ? "OK" : "FAILED"}`;
  }
}

/**
 * Convert a device-level error into its message; anything else is rethrown.
 */
function deviceErrorMessage(err: unknown): string {
  if (!isSlcError(err)) throw err;
  return err.message;
}

// =============================================================================
// Programming
// =============================================================================

/**
 * Program one channel into trigger-follower mode.
 */
export async function programChannel(controller: SlcController, ch: ChannelConfig): Promise<ChannelResult> {
  const label = channelLabel(ch);
  try {
    await controller.setTriggerFollower(ch.channel, ch.currentMa, ch.maxCurrentMa, ch.polarity);
    return { channelConfig: ch, success: true, message: `${label} → TRIGGER follower, ${ch.currentMa} mA` };
  } catch (err) {
    return { channelConfig: ch, success: false, message: `${label} → FAILED: ${deviceErrorMessage(err)}` };
  }
}

export async function programAll(controller: SlcController, config: TriggerConfig): Promise<ProgramReport> {
  const results: ChannelResult[] = [];
  for (const ch of config.channels) {
    results.push(await programChannel(controller, ch));
  }
  return new ProgramReport(results);
}

// =============================================================================
// Verification
// =============================================================================

/**
 * Compare a channel's mode, trigger envelope and trigger profile against the
 * config. Every mismatch is collected; a failing query is reported as one
 * more mismatch and the remaining checks still run.
 */
export async function verifyChannel(controller: SlcController, ch: ChannelConfig): Promise<ChannelResult> {
  const errors: string[] = [];

  const query = async (check: () => Promise<void>): Promise<void> => {
    try {
      await check();
    } catch (err) {
      errors.push(`query failed: ${deviceErrorMessage(err)}`);
    }
  };

  await query(async () => {
    const mode = await controller.getMode(ch.channel);
    if (mode !== Mode.TRIGGER) {
      errors.push(`mode is ${modeName(mode)}, expected TRIGGER`);
    }
  });

  await query(async () => {
    const response = await controller.rawQuery(`?TRIGGER ${ch.channel}`);
    const params = matchTriggerParams(response);
    if (!params) {
      errors.push(`could not parse ?TRIGGER response: ${JSON.stringify(response)}`);
      return;
    }
    if (params.maxCurrentMa !== ch.maxCurrentMa) {
      errors.push(`Imax is ${params.maxCurrentMa} mA, expected ${ch.maxCurrentMa} mA`);
    }
    if (params.polarity !== ch.polarity) {
      errors.push(`polarity is ${params.polarity}, expected ${ch.polarity} (${polarityName(ch.polarity)})`);
    }
  });

  await query(async () => {
    const response = await controller.rawQuery(`?TRIGP ${ch.channel}`);
    const numbers: string[] = response.match(/\d+/g) ?? [];
    if (!numbers.includes(String(ch.currentMa))) {
      errors.push(
        `trigger profile does not contain expected current (${ch.currentMa} mA): ${JSON.stringify(response)}`
      );
    }
  });

  const label = channelLabel(ch);
  if (errors.length > 0) {
    return { channelConfig: ch, success: false, message: `${label} → VERIFY FAILED: ${errors.join("; ")}` };
  }
  return { channelConfig: ch, success: true, message: `${label} → verified OK` };
}

export async function verifyAll(controller: SlcController, config: TriggerConfig): Promise<ProgramReport> {
  const results: ChannelResult[] = [];
  for (const ch of config.channels) {
    results.push(await verifyChannel(controller, ch));
  }
  return new ProgramReport(results);
}

// =============================================================================
// Session
// =============================================================================

export interface SessionOptions {
  /** Only verify; send no programming commands. */
  verifyOnly?: boolean;
  /** Skip the final store even when the config asks for it. */
  noStore?: boolean;
}

export interface SessionOutcome {
  program?: ProgramReport;
  verify?: ProgramReport;
  stored: boolean;
  storeError?: string;
  ok: boolean;
}

/**
 * Program every channel, verify, then store to non-volatile memory.
 *
 * Verification runs only after a fully successful programming pass, and the
 * store only after a fully successful verification.
 */
export async function runSession(
  controller: SlcController,
  config: TriggerConfig,
  options: SessionOptions = {}
): Promise<SessionOutcome> {
  if (options.verifyOnly) {
    const verify = await verifyAll(controller, config);
    return { verify, stored: false, ok: verify.allOk };
  }

  const program = await programAll(controller, config);
  if (!program.allOk) {
    return { program, stored: false, ok: false };
  }

  const verify = await verifyAll(controller, config);
  if (!verify.allOk || !config.store || options.noStore) {
    return { program, verify, stored: false, ok: verify.allOk };
  }

  try {
    await controller.storeSettings();
  } catch (err) {
    return { program, verify, stored: false, storeError: deviceErrorMessage(err), ok: false };
  }
  return { program, verify, stored: true, ok: true };
}
