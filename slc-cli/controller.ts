/**
 * High-level SLC controller API.
 *
 * Owns the transport and protocol pair for one serial port and composes
 * protocol commands into the sequences the device expects.
 */

import { SerialTransport, type TransportOptions } from "./connection.js";
import { ConnectionError } from "./errors.js";
import { DEFAULT_BAUD_RATE, DEFAULT_PORT, DEFAULT_TIMEOUT_MS, getErrorMessage } from "./lib.js";
import {
  FOLLOWER_DURATION_US,
  MAX_CURRENT_NORMAL_MA,
  MAX_CURRENT_PULSED_MA,
  Mode,
  SlcProtocol,
  TriggerPolarity,
  validateChannel,
  validateCurrent,
  validatePolarity,
  validateSetNotAboveMax,
  type CommandTransport,
  type DeviceInfo,
  type NormalParams,
  type TriggerParams,
} from "./protocol/index.js";

export interface ControllerOptions {
  port?: string;
  baudRate?: number;
  timeoutMs?: number;
  /** Print TX/RX traces. */
  debug?: boolean;
  createTransport?: (options: TransportOptions) => CommandTransport;
}

interface Session {
  transport: CommandTransport;
  protocol: SlcProtocol;
}

export class SlcController {
  static readonly MODE_DISABLE = Mode.DISABLE;
  static readonly MODE_NORMAL = Mode.NORMAL;
  static readonly MODE_STROBE = Mode.STROBE;
  static readonly MODE_TRIGGER = Mode.TRIGGER;

  readonly port: string;
  private readonly transportOptions: TransportOptions;
  private readonly createTransport: (options: TransportOptions) => CommandTransport;
  private session: Session | null = null;

  constructor(options: ControllerOptions = {}) {
    this.port = options.port ?? DEFAULT_PORT;
    this.transportOptions = {
      path: this.port,
      baudRate: options.baudRate ?? DEFAULT_BAUD_RATE,
      timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      debug: options.debug ?? false,
    };
    this.createTransport = options.createTransport ?? ((opts) => new SerialTransport(opts));
  }

  get isConnected(): boolean {
    return this.session?.transport.isOpen ?? false;
  }

  // ---------------------------------------------------------------------------
  // Connection
  // ---------------------------------------------------------------------------

  /**
   * Open the port and disable command echo. Does nothing if already connected.
   */
  async connect(): Promise<void> {
    if (this.session) return;

    const transport = this.createTransport(this.transportOptions);
    await transport.open();
    const protocol = new SlcProtocol(transport);

    try {
      await protocol.echoOff();
    } catch (err) {
      try {
        await transport.close();
      } catch (closeErr) {
        if (this.transportOptions.debug) {
          console.log(`  [DEBUG] Close after failed ECHOOFF: ${getErrorMessage(closeErr)}`);
        }
      }
      throw err;
    }

    this.session = { transport, protocol };
  }

  /**
   * Close the port (safe to call multiple times).
   */
  async disconnect(): Promise<void> {
    const session = this.session;
    this.session = null;
    await session?.transport.close();
  }

  private get protocol(): SlcProtocol {
    if (!this.session) {
      throw new ConnectionError("Not connected; call connect() first");
    }
    return this.session.protocol;
  }

  /**
   * Send an arbitrary command and return the response after checking for error markers.
   */
  async rawQuery(command: string): Promise<string> {
    return this.protocol.rawQuery(command);
  }

  // ---------------------------------------------------------------------------
  // Information
  // ---------------------------------------------------------------------------

  async getDeviceInfo(): Promise<DeviceInfo> {
    return this.protocol.deviceInfo();
  }

  async getMode(channel: number): Promise<Mode> {
    return this.protocol.getMode(channel);
  }

  async getNormalParams(channel: number): Promise<NormalParams> {
    return this.protocol.getNormalParams(channel);
  }

  async getLoadVoltage(channel: number): Promise<number> {
    return this.protocol.getLoadVoltage(channel);
  }

  async getTriggerParams(channel: number): Promise<TriggerParams> {
    return this.protocol.getTriggerParams(channel);
  }

  // ---------------------------------------------------------------------------
  // Mode and normal-mode control
  // ---------------------------------------------------------------------------

  async setMode(channel: number, mode: number): Promise<void> {
    await this.protocol.setMode(channel, mode);
  }

  async setNormalMode(channel: number, maxCurrentMa: number, setCurrentMa: number): Promise<void> {
    await this.protocol.setNormalParams(channel, maxCurrentMa, setCurrentMa);
  }

  async setCurrent(channel: number, currentMa: number): Promise<void> {
    await this.protocol.setCurrent(channel, currentMa);
  }

  /**
   * Set NORMAL-mode currents, then switch the channel to NORMAL.
   * The mode is left alone if the first command fails.
   */
  async enableChannel(channel: number, currentMa: number, maxCurrentMa = MAX_CURRENT_NORMAL_MA): Promise<void> {
    const protocol = this.protocol;
    await protocol.setNormalParams(channel, maxCurrentMa, currentMa);
    await protocol.setMode(channel, Mode.NORMAL);
  }

  async disableChannel(channel: number): Promise<void> {
    await this.protocol.setMode(channel, Mode.DISABLE);
  }

  // ---------------------------------------------------------------------------
  // Strobe and trigger
  // ---------------------------------------------------------------------------

  async setStrobeParams(channel: number, maxCurrentMa: number, repeat: number): Promise<void> {
    await this.protocol.setStrobeParams(channel, maxCurrentMa, repeat);
  }

  async setStrobeStep(channel: number, step: number, currentMa: number, durationUs: number): Promise<void> {
    await this.protocol.setStrobeStep(channel, step, currentMa, durationUs);
  }

  async setTriggerParams(channel: number, maxCurrentMa: number, polarity: number = TriggerPolarity.RISING): Promise<void> {
    await this.protocol.setTriggerParams(channel, maxCurrentMa, polarity);
  }

  async setTriggerStep(channel: number, step: number, currentMa: number, durationUs: number): Promise<void> {
    await this.protocol.setTriggerStep(channel, step, currentMa, durationUs);
  }

  /**
   * Program a channel so its output follows the trigger input level.
   *
   * Sequence: disable, trigger envelope, follower step, end-of-profile step,
   * then arm TRIGGER mode. Arming last keeps the device from firing a partial
   * profile. Any failing step aborts the rest.
   */
  async setTriggerFollower(
    channel: number,
    currentMa: number,
    maxCurrentMa = currentMa,
    polarity: number = TriggerPolarity.RISING
  ): Promise<void> {
    validateChannel(channel);
    validateCurrent(maxCurrentMa, MAX_CURRENT_PULSED_MA, "max current");
    validateCurrent(currentMa, MAX_CURRENT_PULSED_MA);
    validateSetNotAboveMax(currentMa, maxCurrentMa);
    validatePolarity(polarity);

    const protocol = this.protocol;
    await protocol.setMode(channel, Mode.DISABLE);
    await protocol.setTriggerParams(channel, maxCurrentMa, polarity);
    await protocol.setTriggerStep(channel, 0, currentMa, FOLLOWER_DURATION_US);
    await protocol.setTriggerStep(channel, 1, 0, 0);
    await protocol.setMode(channel, Mode.TRIGGER);
  }

  // ---------------------------------------------------------------------------
  // System
  // ---------------------------------------------------------------------------

  async storeSettings(): Promise<void> {
    await this.protocol.storeSettings();
  }

  async reset(): Promise<void> {
    await this.protocol.reset();
  }

  async restoreDefaults(): Promise<void> {
    await this.protocol.restoreDefaults();
  }
}

/**
 * Connect, run `fn`, and always disconnect afterwards.
 */
export async function withController<T>(
  options: ControllerOptions,
  fn: (controller: SlcController) => Promise<T>
): Promise<T> {
  const controller = new SlcController(options);
  await controller.connect();
  try {
    return await fn(controller);
  } finally {
    await controller.disconnect();
  }
}
