import { beforeEach, describe, it, expect } from "vitest";
import { CommandError, ValidationError } from "../errors.js";
import { FakeTransport } from "../testing/fake-transport.js";
import { SlcProtocol } from "./protocol.js";
import { Mode, TriggerPolarity } from "./types.js";

let transport: FakeTransport;
let protocol: SlcProtocol;

beforeEach(async () => {
  transport = new FakeTransport();
  await transport.open();
  protocol = new SlcProtocol(transport);
});

describe("channel validation", () => {
  it("rejects channels outside 1-4 without sending", async () => {
    await expect(protocol.setMode(0, Mode.NORMAL)).rejects.toThrow("Channel must be 1-4, got 0");
    await expect(protocol.getMode(5)).rejects.toThrow("Channel must be 1-4, got 5");
    await expect(protocol.setCurrent(1.5, 100)).rejects.toThrow(ValidationError);
    expect(transport.sent).toEqual([]);
  });
});

describe("current limits", () => {
  it("accepts the NORMAL-mode ceiling", async () => {
    await protocol.setNormalParams(1, 1000, 1000);
    expect(transport.sent).toEqual(["NORMAL 1 1000 1000"]);
  });

  it("rejects NORMAL-mode currents above 1000 mA", async () => {
    await expect(protocol.setNormalParams(1, 1001, 500)).rejects.toThrow("max current must be 0-1000 mA, got 1001");
    await expect(protocol.setCurrent(1, 1001)).rejects.toThrow("current must be 0-1000 mA, got 1001");
    expect(transport.sent).toEqual([]);
  });

  it("rejects Iset above Imax", async () => {
    await expect(protocol.setNormalParams(1, 500, 600)).rejects.toThrow(
      "set current (600 mA) cannot exceed max current (500 mA)"
    );
  });

  it("accepts the pulsed-mode ceiling and rejects above it", async () => {
    await protocol.setTriggerParams(1, 3500);
    await expect(protocol.setTriggerParams(1, 3501)).rejects.toThrow("max current must be 0-3500 mA, got 3501");
    await expect(protocol.setStrobeParams(1, 3501, 0)).rejects.toThrow("max current must be 0-3500 mA");
    expect(transport.sent).toEqual(["TRIGGER 1 3500 0"]);
  });

  it("rejects negative and fractional currents", async () => {
    await expect(protocol.setCurrent(1, -1)).rejects.toThrow("current must be 0-1000 mA, got -1");
    await expect(protocol.setCurrent(1, 2.5)).rejects.toThrow("current must be 0-1000 mA, got 2.5");
  });
});

describe("profile validation", () => {
  it("checks step, duration and repeat", async () => {
    await expect(protocol.setTriggerStep(1, 128, 0, 0)).rejects.toThrow("Step must be 0-127, got 128");
    await expect(protocol.setStrobeStep(1, 0, 0, 100_000_000)).rejects.toThrow(
      "Duration must be 0-99999999 us, got 100000000"
    );
    await expect(protocol.setStrobeParams(1, 500, -1)).rejects.toThrow("Repeat must be >= 0, got -1");
    expect(transport.sent).toEqual([]);
  });

  it("checks mode and polarity values", async () => {
    await expect(protocol.setMode(1, 4)).rejects.toThrow(
      "Invalid mode 4; expected one of DISABLE=0, NORMAL=1, STROBE=2, TRIGGER=3"
    );
    await expect(protocol.setTriggerParams(1, 100, 2)).rejects.toThrow("Invalid trigger polarity 2");
  });
});

describe("command formatting", () => {
  it("formats setters", async () => {
    await protocol.setMode(2, Mode.TRIGGER);
    await protocol.setCurrent(4, 250);
    await protocol.setStrobeParams(3, 2000, 0);
    await protocol.setStrobeStep(2, 3, 750, 5000);
    await protocol.setTriggerParams(1, 1200, TriggerPolarity.FALLING);
    await protocol.setTriggerStep(1, 0, 1200, 9999);

    expect(transport.sent).toEqual([
      "MODE 2 3",
      "CURRENT 4 250",
      "STROBE 3 2000 0",
      "STRP 2 3 750 5000",
      "TRIGGER 1 1200 1",
      "TRIGP 1 0 1200 9999",
    ]);
  });

  it("formats system commands", async () => {
    await protocol.storeSettings();
    await protocol.reset();
    await protocol.restoreDefaults();
    expect(transport.sent).toEqual(["STORE", "RESET", "RESTOREDEF"]);
  });
});

describe("acknowledgements", () => {
  it("surfaces controller errors", async () => {
    transport.reply("#!");
    await expect(protocol.storeSettings()).rejects.toThrow("Controller error for 'STORE': #!");
  });

  it("surfaces invalid arguments", async () => {
    transport.reply("#?");
    await expect(protocol.setMode(1, Mode.NORMAL)).rejects.toThrow("Invalid argument for 'MODE 1 1': #?");
  });

  it("surfaces unknown commands", async () => {
    transport.reply("RESET is not defined");
    await expect(protocol.reset()).rejects.toThrow("Unknown command 'RESET'");
  });

  it("requires ## on setters", async () => {
    transport.reply("#1");
    await expect(protocol.setCurrent(1, 100)).rejects.toThrow(CommandError);
  });

  it("does not check ECHOOFF", async () => {
    transport.reply("ECHOOFF");
    await protocol.echoOff();
    expect(transport.sent).toEqual(["ECHOOFF"]);
  });
});

describe("queries", () => {
  it("parses the mode", async () => {
    transport.on("?MODE", "#2");
    expect(await protocol.getMode(1)).toBe(Mode.STROBE);
    expect(transport.sent).toEqual(["?MODE 1"]);
  });

  it("parses normal params", async () => {
    transport.reply("#0 0 0 800 400");
    expect(await protocol.getNormalParams(2)).toEqual({ maxCurrentMa: 800, setCurrentMa: 400 });
    expect(transport.sent).toEqual(["?CURRENT 2"]);
  });

  it("parses the load voltage", async () => {
    transport.reply("#3:3100");
    expect(await protocol.getLoadVoltage(3)).toBe(3100);
    expect(transport.sent).toEqual(["LoadVoltage 3"]);
  });

  it("parses trigger params", async () => {
    transport.reply("#1500 1");
    expect(await protocol.getTriggerParams(4)).toEqual({ maxCurrentMa: 1500, polarity: 1 });
  });

  it("parses device info", async () => {
    transport.reply("Mightex LED Driver:1.0 Device Module No.:SLC-SA04 Device Serial No.:TEST-1");
    expect(await protocol.deviceInfo()).toEqual({
      firmwareVersion: "1.0",
      moduleNumber: "SLC-SA04",
      serialNumber: "TEST-1",
    });
    expect(transport.sent).toEqual(["DEVICEINFO"]);
  });

  it("returns raw responses after the error check", async () => {
    transport.reply("#0 1000 9999", "#?");
    expect(await protocol.rawQuery("?TRIGP 1")).toBe("#0 1000 9999");
    await expect(protocol.rawQuery("?TRIGP 9")).rejects.toThrow("Invalid argument");
  });
});
