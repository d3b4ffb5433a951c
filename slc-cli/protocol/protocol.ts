/**
 * SLC command layer: validates parameters, formats command lines, checks
 * acknowledgements and parses typed values out of responses.
 *
 * Does not own the connection; the transport is borrowed from the controller.
 */

import { checkAck, expectAck, parseDeviceInfo, parseLoadVoltage, parseMode, parseNormalParams, parseTriggerParams } from "./responses.js";
import {
  MAX_CURRENT_NORMAL_MA,
  MAX_CURRENT_PULSED_MA,
  TriggerPolarity,
  type CommandTransport,
  type DeviceInfo,
  type Mode,
  type NormalParams,
  type TriggerParams,
} from "./types.js";
import {
  validateChannel,
  validateCurrent,
  validateDuration,
  validateMode,
  validatePolarity,
  validateRepeat,
  validateSetNotAboveMax,
  validateStep,
} from "./validation.js";

export class SlcProtocol {
  constructor(private readonly transport: CommandTransport) {}

  /**
   * Send a command and return its response after checking for error markers.
   * Does not require `##`, so it suits data queries the typed API doesn't cover.
   */
  async rawQuery(command: string): Promise<string> {
    const response = await this.transport.send(command);
    return checkAck(response, command);
  }

  private async sendAck(command: string): Promise<void> {
    const response = await this.transport.send(command);
    expectAck(response, command);
  }

  // ---------------------------------------------------------------------------
  // Information
  // ---------------------------------------------------------------------------

  async deviceInfo(): Promise<DeviceInfo> {
    return parseDeviceInfo(await this.rawQuery("DEVICEINFO"));
  }

  async getMode(channel: number): Promise<Mode> {
    validateChannel(channel);
    const command = `?MODE ${channel}`;
    return parseMode(await this.rawQuery(command), channel, command);
  }

  async getNormalParams(channel: number): Promise<NormalParams> {
    validateChannel(channel);
    const command = `?CURRENT ${channel}`;
    return parseNormalParams(await this.rawQuery(command), command);
  }

  /** LED load voltage in millivolts. */
  async getLoadVoltage(channel: number): Promise<number> {
    validateChannel(channel);
    const command = `LoadVoltage ${channel}`;
    return parseLoadVoltage(await this.rawQuery(command), command);
  }

  async getTriggerParams(channel: number): Promise<TriggerParams> {
    validateChannel(channel);
    const command = `?TRIGGER ${channel}`;
    return parseTriggerParams(await this.rawQuery(command), command);
  }

  // ---------------------------------------------------------------------------
  // Mode control
  // ---------------------------------------------------------------------------

  async setMode(channel: number, mode: number): Promise<void> {
    validateChannel(channel);
    validateMode(mode);
    await this.sendAck(`MODE ${channel} ${mode}`);
  }

  // ---------------------------------------------------------------------------
  // Normal mode
  // ---------------------------------------------------------------------------

  /**
   * Configure NORMAL-mode Imax and Iset. Both are capped at
   * {@link MAX_CURRENT_NORMAL_MA}, and Iset may not exceed Imax.
   */
  async setNormalParams(channel: number, maxCurrentMa: number, setCurrentMa: number): Promise<void> {
    validateChannel(channel);
    validateCurrent(maxCurrentMa, MAX_CURRENT_NORMAL_MA, "max current");
    validateCurrent(setCurrentMa, MAX_CURRENT_NORMAL_MA, "set current");
    validateSetNotAboveMax(setCurrentMa, maxCurrentMa);
    await this.sendAck(`NORMAL ${channel} ${maxCurrentMa} ${setCurrentMa}`);
  }

  /** Quick-set the working current of a channel already in NORMAL mode. */
  async setCurrent(channel: number, currentMa: number): Promise<void> {
    validateChannel(channel);
    validateCurrent(currentMa, MAX_CURRENT_NORMAL_MA);
    await this.sendAck(`CURRENT ${channel} ${currentMa}`);
  }

  // ---------------------------------------------------------------------------
  // Strobe mode
  // ---------------------------------------------------------------------------

  /** @param repeat - Number of profile repetitions, 0 for continuous */
  async setStrobeParams(channel: number, maxCurrentMa: number, repeat: number): Promise<void> {
    validateChannel(channel);
    validateCurrent(maxCurrentMa, MAX_CURRENT_PULSED_MA, "max current");
    validateRepeat(repeat);
    await this.sendAck(`STROBE ${channel} ${maxCurrentMa} ${repeat}`);
  }

  /** A step of `(0, 0)` marks the end of the profile. */
  async setStrobeStep(channel: number, step: number, currentMa: number, durationUs: number): Promise<void> {
    this.validateProfileStep(channel, step, currentMa, durationUs);
    await this.sendAck(`STRP ${channel} ${step} ${currentMa} ${durationUs}`);
  }

  // ---------------------------------------------------------------------------
  // Trigger mode
  // ---------------------------------------------------------------------------

  async setTriggerParams(
    channel: number,
    maxCurrentMa: number,
    polarity: number = TriggerPolarity.RISING
  ): Promise<void> {
    validateChannel(channel);
    validateCurrent(maxCurrentMa, MAX_CURRENT_PULSED_MA, "max current");
    validatePolarity(polarity);
    await this.sendAck(`TRIGGER ${channel} ${maxCurrentMa} ${polarity}`);
  }

  async setTriggerStep(channel: number, step: number, currentMa: number, durationUs: number): Promise<void> {
    this.validateProfileStep(channel, step, currentMa, durationUs);
    await this.sendAck(`TRIGP ${channel} ${step} ${currentMa} ${durationUs}`);
  }

  private validateProfileStep(channel: number, step: number, currentMa: number, durationUs: number): void {
    validateChannel(channel);
    validateStep(step);
    validateCurrent(currentMa, MAX_CURRENT_PULSED_MA);
    validateDuration(durationUs);
  }

  // ---------------------------------------------------------------------------
  // System
  // ---------------------------------------------------------------------------

  /** Save current settings to non-volatile memory. */
  async storeSettings(): Promise<void> {
    await this.sendAck("STORE");
  }

  async reset(): Promise<void> {
    await this.sendAck("RESET");
  }

  async restoreDefaults(): Promise<void> {
    await this.sendAck("RESTOREDEF");
  }

  /** Disable command echo. The controller sends no `##` for this one. */
  async echoOff(): Promise<void> {
    await this.transport.send("ECHOOFF");
  }
}
