#!/usr/bin/env node
import { program } from "commander";
import * as path from "path";
import { polarityName, loadConfigFile, withStore, type TriggerConfig } from "./config.js";
import { listPorts } from "./connection.js";
import { withController, type SlcController } from "./controller.js";
import { isSlcError } from "./errors.js";
import { DEFAULT_PORT, getErrorMessage, parseChannelList, parseIntegerArg } from "./lib.js";
import { runSession, type ProgramReport, type SessionOutcome } from "./programmer.js";
import { modeName } from "./protocol/index.js";

// =============================================================================
// Option Types
// =============================================================================

interface DeviceOptions {
  port?: string;
  verbose?: boolean;
}

interface ProgramOptions extends DeviceOptions {
  store: boolean;
  verifyOnly?: boolean;
  dryRun?: boolean;
}

interface StatusOptions extends DeviceOptions {
  channels?: string;
}

interface EnableOptions extends DeviceOptions {
  max?: string;
}

// =============================================================================
// Output Helpers
// =============================================================================

function banner(title: string): void {
  console.log(title);
  console.log("=".repeat(title.length));
}

function printConfigSummary(configPath: string, config: TriggerConfig): void {
  console.log(`Config:  ${path.basename(configPath)}`);
  console.log(`Port:    ${config.port}`);
  console.log(`Store:   ${config.store ? "yes" : "no"}`);
  console.log("Channels:");
  for (const ch of config.channels) {
    console.log(
      `  CH${ch.channel}: ${ch.name.padEnd(8)} (${ch.wavelengthNm} nm, ${ch.band || "-"}) ` +
        `${ch.currentMa} mA (Imax=${ch.maxCurrentMa} mA, ${polarityName(ch.polarity)})`
    );
  }
}

function printReport(report: ProgramReport, heading: string): void {
  console.log(`\n${heading}:`);
  for (const result of report.results) {
    console.log(`  ${result.success ? "OK  " : "FAIL"} ${result.message}`);
  }
  console.log(`  ${report.summary}`);
}

function describeStore(outcome: SessionOutcome): string {
  if (outcome.program && !outcome.program.allOk) return "Programming incomplete; skipped verification and store.";
  if (outcome.verify && !outcome.verify.allOk) return "Verification failed; settings NOT stored.";
  if (outcome.storeError) return `Store failed: ${outcome.storeError}`;
  if (outcome.stored) return "Settings stored to non-volatile memory.";
  return "Store skipped; settings are volatile.";
}

async function printDeviceInfo(controller: SlcController): Promise<void> {
  try {
    const info = await controller.getDeviceInfo();
    console.log(`Device:   ${info.moduleNumber} (FW ${info.firmwareVersion}, SN ${info.serialNumber})`);
  } catch (err) {
    if (!isSlcError(err)) throw err;
    console.log(`Could not read device info: ${err.message}`);
  }
}

// =============================================================================
// Command Helpers
// =============================================================================

async function loadConfigOrExit(configPath: string): Promise<TriggerConfig> {
  try {
    return await loadConfigFile(configPath);
  } catch (err) {
    console.error(`Config error: ${getErrorMessage(err)}`);
    process.exit(1);
  }
}

/**
 * Connect, run `fn`, disconnect. Failures set a non-zero exit code.
 */
async function withDevice(
  port: string,
  options: DeviceOptions,
  fn: (controller: SlcController) => Promise<boolean | void>
): Promise<void> {
  console.log(`\nConnecting to ${port}...`);
  try {
    const ok = await withController({ port, debug: options.verbose ?? false }, async (controller) => {
      console.log("Connected.\n");
      return fn(controller);
    });
    if (ok === false) process.exitCode = 1;
  } catch (err) {
    console.error(`Error: ${getErrorMessage(err)}`);
    process.exitCode = 1;
  }
}

function argOrExit<T>(parse: () => T): T {
  try {
    return parse();
  } catch (err) {
    console.error(getErrorMessage(err));
    process.exit(1);
  }
}

// =============================================================================
// CLI Commands
// =============================================================================

program.name("slc-cli").description("SLC LED controller programming CLI").version("1.0.0");

program
  .command("program")
  .description("Program channels into trigger-follower mode, verify, and store")
  .argument("<config>", "Path to config file (.yaml, .yml or .json)")
  .option("-p, --port <path>", "Serial port path (overrides the config)")
  .option("--no-store", "Skip saving to non-volatile memory")
  .option("--verify-only", "Verify current programming without making changes")
  .option("-v, --verbose", "Print serial traffic")
  .option("-d, --dry-run", "Validate config without connecting")
  .action(async (configPath: string, options: ProgramOptions) => {
    let config = await loadConfigOrExit(configPath);
    if (!options.store) config = withStore(config, false);

    banner(options.verifyOnly ? "SLC CLI - Verify" : "SLC CLI - Program");
    printConfigSummary(configPath, config);

    if (options.dryRun) {
      console.log("\nDry run - validation passed!");
      return;
    }

    await withDevice(options.port ?? config.port, options, async (controller) => {
      await printDeviceInfo(controller);

      const outcome = await runSession(controller, config, { verifyOnly: options.verifyOnly });
      if (outcome.program) printReport(outcome.program, "Programming");
      if (outcome.verify) printReport(outcome.verify, "Verification");

      if (!options.verifyOnly) console.log(`\n${describeStore(outcome)}`);
      return outcome.ok;
    });
  });

program
  .command("verify")
  .description("Check that the device matches a config file")
  .argument("<config>", "Path to config file (.yaml, .yml or .json)")
  .option("-p, --port <path>", "Serial port path (overrides the config)")
  .option("-v, --verbose", "Print serial traffic")
  .action(async (configPath: string, options: DeviceOptions) => {
    const config = await loadConfigOrExit(configPath);

    banner("SLC CLI - Verify");
    printConfigSummary(configPath, config);

    await withDevice(options.port ?? config.port, options, async (controller) => {
      const outcome = await runSession(controller, config, { verifyOnly: true });
      if (outcome.verify) printReport(outcome.verify, "Verification");
      return outcome.ok;
    });
  });

program
  .command("status")
  .description("Show device info, mode and load voltage per channel")
  .option("-p, --port <path>", "Serial port path", DEFAULT_PORT)
  .option("-c, --channels <list>", "Comma-separated channels (default: 1,2,3,4)")
  .option("-v, --verbose", "Print serial traffic")
  .action(async (options: StatusOptions) => {
    const channels = argOrExit(() => parseChannelList(options.channels));

    banner("SLC CLI - Status");
    await withDevice(options.port ?? DEFAULT_PORT, options, async (controller) => {
      await printDeviceInfo(controller);
      let ok = true;
      for (const channel of channels) {
        try {
          const mode = await controller.getMode(channel);
          const millivolts = await controller.getLoadVoltage(channel);
          console.log(`  CH${channel}: mode = ${modeName(mode).padEnd(7)} load = ${millivolts} mV`);
        } catch (err) {
          if (!isSlcError(err)) throw err;
          console.log(`  CH${channel}: query failed: ${err.message}`);
          ok = false;
        }
      }
      return ok;
    });
  });

program
  .command("enable")
  .description("Enable a channel in NORMAL mode")
  .argument("<channel>", "Channel number (1-4)")
  .argument("<current>", "Working current in mA")
  .option("--max <mA>", "Maximum current in mA (default: 1000)")
  .option("-p, --port <path>", "Serial port path", DEFAULT_PORT)
  .option("-v, --verbose", "Print serial traffic")
  .action(async (channelArg: string, currentArg: string, options: EnableOptions) => {
    const channel = argOrExit(() => parseIntegerArg(channelArg, "channel"));
    const current = argOrExit(() => parseIntegerArg(currentArg, "current"));
    const maxArg = options.max;
    const max = maxArg === undefined ? undefined : argOrExit(() => parseIntegerArg(maxArg, "max current"));

    await withDevice(options.port ?? DEFAULT_PORT, options, async (controller) => {
      await controller.enableChannel(channel, current, max);
      console.log(`CH${channel} enabled at ${current} mA`);
    });
  });

program
  .command("disable")
  .description("Disable a channel")
  .argument("<channel>", "Channel number (1-4)")
  .option("-p, --port <path>", "Serial port path", DEFAULT_PORT)
  .option("-v, --verbose", "Print serial traffic")
  .action(async (channelArg: string, options: DeviceOptions) => {
    const channel = argOrExit(() => parseIntegerArg(channelArg, "channel"));

    await withDevice(options.port ?? DEFAULT_PORT, options, async (controller) => {
      await controller.disableChannel(channel);
      console.log(`CH${channel} disabled`);
    });
  });

const SYSTEM_COMMANDS = [
  { name: "store", description: "Save settings to non-volatile memory", run: (c: SlcController) => c.storeSettings() },
  { name: "reset", description: "Soft-reset the controller", run: (c: SlcController) => c.reset() },
  { name: "restore-defaults", description: "Restore factory defaults", run: (c: SlcController) => c.restoreDefaults() },
];

for (const { name, description, run } of SYSTEM_COMMANDS) {
  program
    .command(name)
    .description(description)
    .option("-p, --port <path>", "Serial port path", DEFAULT_PORT)
    .option("-v, --verbose", "Print serial traffic")
    .action(async (options: DeviceOptions) => {
      await withDevice(options.port ?? DEFAULT_PORT, options, async (controller) => {
        await run(controller);
        console.log("Done.");
      });
    });
}

program
  .command("ports")
  .description("List available serial ports")
  .action(async () => {
    const ports = await listPorts();
    if (ports.length === 0) {
      console.log("No serial ports found.");
      return;
    }
    for (const port of ports) {
      console.log(`  ${port.path} - ${port.manufacturer ?? "Unknown"} (VID: ${port.vendorId}, PID: ${port.productId})`);
    }
  });

await program.parseAsync();
