import { beforeEach, describe, it, expect } from "vitest";
import type { TransportOptions } from "./connection.js";
import { SlcController, withController } from "./controller.js";
import { ConnectionError, TimeoutError } from "./errors.js";
import { Mode, TriggerPolarity } from "./protocol/index.js";
import { FakeTransport, connectedController } from "./testing/fake-transport.js";

let transport: FakeTransport;

beforeEach(() => {
  transport = new FakeTransport();
});

describe("connection lifecycle", () => {
  it("passes port settings to the transport", async () => {
    let received: TransportOptions | undefined;
    const controller = new SlcController({
      port: "/dev/ttyS1",
      createTransport: (options) => {
        received = options;
        return transport;
      },
    });
    expect(controller.port).toBe("/dev/ttyS1");
    await controller.connect();
    expect(received).toEqual({ path: "/dev/ttyS1", baudRate: 9600, timeoutMs: 1000, debug: false });
  });

  it("disables echo on connect", async () => {
    const controller = new SlcController({ createTransport: () => transport });
    await controller.connect();
    expect(controller.isConnected).toBe(true);
    expect(transport.sent).toEqual(["ECHOOFF"]);
  });

  it("does nothing when already connected", async () => {
    const controller = await connectedController(transport);
    await controller.connect();
    expect(transport.openCount).toBe(1);
    expect(transport.sent).toEqual([]);
  });

  it("reports open failures", async () => {
    transport.openError = new ConnectionError("Cannot open /dev/ttyUSB0: denied");
    const controller = new SlcController({ createTransport: () => transport });
    await expect(controller.connect()).rejects.toThrow("Cannot open /dev/ttyUSB0: denied");
    expect(controller.isConnected).toBe(false);
  });

  it("closes the port when ECHOOFF fails", async () => {
    transport.reply(() => {
      throw new TimeoutError("No response from controller for 'ECHOOFF'", "ECHOOFF");
    });
    const controller = new SlcController({ createTransport: () => transport });
    await expect(controller.connect()).rejects.toThrow(TimeoutError);
    expect(transport.closeCount).toBe(1);
    expect(controller.isConnected).toBe(false);
  });

  it("rethrows the ECHOOFF error when closing also fails", async () => {
    transport.reply(() => {
      throw new TimeoutError("No response from controller for 'ECHOOFF'", "ECHOOFF");
    });
    transport.closeError = new ConnectionError("Cannot close /dev/ttyUSB0: gone");
    const controller = new SlcController({ createTransport: () => transport });

    await expect(controller.connect()).rejects.toThrow("No response from controller for 'ECHOOFF'");
    expect(transport.closeCount).toBe(1);
    expect(controller.isConnected).toBe(false);
  });

  it("rejects commands while disconnected", async () => {
    const controller = new SlcController({ createTransport: () => transport });
    await expect(controller.getMode(1)).rejects.toThrow(ConnectionError);
    await expect(controller.storeSettings()).rejects.toThrow("Not connected; call connect() first");
  });

  it("can disconnect more than once", async () => {
    const controller = await connectedController(transport);
    await controller.disconnect();
    await controller.disconnect();
    expect(transport.closeCount).toBe(1);
    expect(controller.isConnected).toBe(false);
  });
});

describe("mode constants", () => {
  it("exposes mode aliases on the class", () => {
    expect(SlcController.MODE_DISABLE).toBe(0);
    expect(SlcController.MODE_NORMAL).toBe(1);
    expect(SlcController.MODE_STROBE).toBe(2);
    expect(SlcController.MODE_TRIGGER).toBe(3);
  });
});

describe("enableChannel", () => {
  it("sets currents with the default Imax, then switches to NORMAL", async () => {
    const controller = await connectedController(transport);
    await controller.enableChannel(1, 50);
    expect(transport.sent).toEqual(["NORMAL 1 1000 50", "MODE 1 1"]);
  });

  it("leaves the mode alone when setting currents fails", async () => {
    const controller = await connectedController(transport);
    transport.reply("#?");
    await expect(controller.enableChannel(1, 50, 200)).rejects.toThrow("Invalid argument for 'NORMAL 1 200 50'");
    expect(transport.sent).toEqual(["NORMAL 1 200 50"]);
  });

  it("disables a channel", async () => {
    const controller = await connectedController(transport);
    await controller.disableChannel(4);
    expect(transport.sent).toEqual(["MODE 4 0"]);
  });
});

describe("setTriggerFollower", () => {
  it("sends the follower sequence", async () => {
    const controller = await connectedController(transport);
    await controller.setTriggerFollower(2, 1000);
    expect(transport.sent).toEqual(["MODE 2 0", "TRIGGER 2 1000 0", "TRIGP 2 0 1000 9999", "TRIGP 2 1 0 0", "MODE 2 3"]);
  });

  it("uses the given Imax and polarity", async () => {
    const controller = await connectedController(transport);
    await controller.setTriggerFollower(3, 800, 1200, TriggerPolarity.FALLING);
    expect(transport.sent).toEqual(["MODE 3 0", "TRIGGER 3 1200 1", "TRIGP 3 0 800 9999", "TRIGP 3 1 0 0", "MODE 3 3"]);
  });

  it("stops at the first failing step", async () => {
    const controller = await connectedController(transport);
    transport.on("TRIGP 2 0", "#!");
    await expect(controller.setTriggerFollower(2, 1000)).rejects.toThrow(
      "Controller error for 'TRIGP 2 0 1000 9999': #!"
    );
    expect(transport.sent).toEqual(["MODE 2 0", "TRIGGER 2 1000 0", "TRIGP 2 0 1000 9999"]);
  });

  it("validates every argument before sending", async () => {
    const controller = await connectedController(transport);
    await expect(controller.setTriggerFollower(5, 100)).rejects.toThrow("Channel must be 1-4, got 5");
    await expect(controller.setTriggerFollower(2, 100, 3600)).rejects.toThrow("max current must be 0-3500 mA, got 3600");
    await expect(controller.setTriggerFollower(2, 1200, 1000)).rejects.toThrow(
      "set current (1200 mA) cannot exceed max current (1000 mA)"
    );
    await expect(controller.setTriggerFollower(2, 100, 100, 3)).rejects.toThrow("Invalid trigger polarity 3");
    expect(transport.sent).toEqual([]);
  });
});

describe("mode round-trip", () => {
  it("reads back the mode that was set", async () => {
    const modes = new Map<string, string>();
    transport.on(/^MODE /, (command) => {
      const [, channel, mode] = command.split(" ");
      modes.set(channel, mode);
      return "##";
    });
    transport.on("?MODE", (command) => `#${modes.get(command.split(" ")[1]) ?? "0"}`);

    const controller = await connectedController(transport);
    await controller.setMode(1, Mode.NORMAL);
    expect(await controller.getMode(1)).toBe(Mode.NORMAL);
    await controller.setMode(1, Mode.STROBE);
    expect(await controller.getMode(1)).toBe(Mode.STROBE);
    await controller.disableChannel(1);
    expect(await controller.getMode(1)).toBe(Mode.DISABLE);
    expect(await controller.getMode(2)).toBe(Mode.DISABLE);
  });
});

describe("withController", () => {
  it("returns the callback result and disconnects", async () => {
    const result = await withController({ createTransport: () => transport }, async (controller) => {
      expect(controller.isConnected).toBe(true);
      return "done";
    });
    expect(result).toBe("done");
    expect(transport.isOpen).toBe(false);
  });

  it("disconnects when the callback throws", async () => {
    await expect(
      withController({ createTransport: () => transport }, async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");
    expect(transport.closeCount).toBe(1);
    expect(transport.isOpen).toBe(false);
  });
});
