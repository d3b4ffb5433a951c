/**
 * SLC serial connection: line framing, buffer hygiene and timeout-bounded reads.
 */

import { SerialPort } from "serialport";
import { ConnectionError, TimeoutError } from "./errors.js";
import {
  COMMAND_TERMINATOR,
  DEFAULT_BAUD_RATE,
  DEFAULT_PORT,
  DEFAULT_TIMEOUT_MS,
  DRAIN_WINDOW_MS,
  RESPONSE_TERMINATOR,
  decodeAscii,
  getErrorMessage,
} from "./lib.js";
import type { CommandTransport } from "./protocol/index.js";

type ErrorCallback = (err: Error | null) => void;

/**
 * The part of a serialport stream the transport relies on.
 */
export interface SerialLink {
  readonly isOpen: boolean;
  open(callback: ErrorCallback): void;
  close(callback: ErrorCallback): void;
  write(data: Buffer): boolean;
  /** Wait until written bytes have left the OS buffer. */
  drain(callback: ErrorCallback): void;
  /** Discard unread input. */
  flush(callback: ErrorCallback): void;
  on(event: "data", listener: (data: Buffer) => void): unknown;
  on(event: "error", listener: (err: Error) => void): unknown;
  removeListener(event: "data", listener: (data: Buffer) => void): unknown;
  removeListener(event: "error", listener: (err: Error) => void): unknown;
}

export interface LinkOptions {
  path: string;
  baudRate: number;
}

export interface TransportOptions {
  path?: string;
  baudRate?: number;
  /** Upper bound on the wait for a response terminator. */
  timeoutMs?: number;
  drainWindowMs?: number;
  debug?: boolean;
  createLink?: (options: LinkOptions) => SerialLink;
}

/**
 * Open-on-demand serial port at 8N1, the framing the SLC uses.
 */
function createSerialPort({ path, baudRate }: LinkOptions): SerialLink {
  return new SerialPort({
    path,
    baudRate,
    dataBits: 8,
    parity: "none",
    stopBits: 1,
    autoOpen: false,
  });
}

function invoke(action: (callback: ErrorCallback) => void): Promise<void> {
  return new Promise((resolve, reject) => {
    action((err) => (err ? reject(err) : resolve()));
  });
}

/**
 * List the serial ports visible to this machine.
 */
export function listPorts() {
  return SerialPort.list();
}

/**
 * Encapsulates the serial exchange with an SLC controller.
 *
 * Sends are queued, so at most one command is ever waiting for a response.
 */
export class SerialTransport implements CommandTransport {
  readonly path: string;
  readonly baudRate: number;
  readonly timeoutMs: number;
  private readonly drainWindowMs: number;
  private readonly debug: boolean;
  private readonly createLink: (options: LinkOptions) => SerialLink;

  private link: SerialLink | null = null;
  private received: Buffer[] = [];
  private onReceive: ((chunk: Buffer) => void) | null = null;
  private onFault: ((err: Error) => void) | null = null;
  /** Link error raised while no exchange was running; fails the next send. */
  private pendingError: Error | null = null;
  private queue: Promise<void> = Promise.resolve();

  constructor(options: TransportOptions = {}) {
    this.path = options.path ?? DEFAULT_PORT;
    this.baudRate = options.baudRate ?? DEFAULT_BAUD_RATE;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.drainWindowMs = options.drainWindowMs ?? DRAIN_WINDOW_MS;
    this.debug = options.debug ?? false;
    this.createLink = options.createLink ?? createSerialPort;
  }

  get isOpen(): boolean {
    return this.link?.isOpen ?? false;
  }

  /**
   * Open the port. Does nothing if it is already open.
   */
  async open(): Promise<void> {
    if (this.isOpen) return;

    try {
      const link = this.createLink({ path: this.path, baudRate: this.baudRate });
      await invoke((cb) => link.open(cb));
      link.on("data", this.handleData);
      link.on("error", this.handleError);
      this.pendingError = null;
      this.link = link;
    } catch (err) {
      throw new ConnectionError(`Cannot open ${this.path}: ${getErrorMessage(err)}`);
    }

    this.log(`Opened ${this.path} at ${this.baudRate} baud`);
  }

  /**
   * Close the port (safe to call multiple times).
   */
  async close(): Promise<void> {
    const link = this.link;
    this.link = null;
    if (!link) return;

    link.removeListener("data", this.handleData);
    link.removeListener("error", this.handleError);
    if (!link.isOpen) return;

    try {
      await invoke((cb) => link.close(cb));
    } catch (err) {
      throw new ConnectionError(`Cannot close ${this.path}: ${getErrorMessage(err)}`);
    }
    this.log(`Closed ${this.path}`);
  }

  /**
   * Send a command and resolve with the controller's trimmed response.
   */
  send(command: string): Promise<string> {
    const result = this.queue.then(() => this.exchange(command));
    this.queue = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  private readonly handleData = (data: Buffer): void => {
    this.received.push(data);
    this.onReceive?.(data);
  };

  private readonly handleError = (err: Error): void => {
    this.log(`Link error: ${err.message}`);
    if (this.onFault) {
      this.onFault(err);
    } else {
      this.pendingError = err;
    }
  };

  private async exchange(command: string): Promise<string> {
    const link = this.link;
    if (!link?.isOpen) {
      throw new ConnectionError("Serial port not open; call open() first");
    }

    const pending = this.pendingError;
    if (pending) {
      this.pendingError = null;
      throw new ConnectionError(`Serial I/O failed before '${command}': ${pending.message}`);
    }

    this.log(`TX: ${command}`);

    try {
      await invoke((cb) => link.flush(cb));
    } catch (err) {
      throw new ConnectionError(`Cannot flush ${this.path}: ${getErrorMessage(err)}`);
    }
    this.received = [];

    const raw = await this.writeAndRead(link, command);
    const response = decodeAscii(raw).trim();
    this.log(`RX: ${response}`);

    if (!response) {
      throw new TimeoutError(`No response from controller for '${command}'`, command);
    }
    return response;
  }

  /**
   * Write the framed command, then collect input until CR or timeout,
   * followed by a short drain window.
   */
  private writeAndRead(link: SerialLink, command: string): Promise<Buffer> {
    return new Promise((resolve, reject) => {
      let timeoutId: NodeJS.Timeout | undefined;
      let drainId: NodeJS.Timeout | undefined;

      const cleanup = () => {
        clearTimeout(timeoutId);
        clearTimeout(drainId);
        this.onReceive = null;
        this.onFault = null;
      };

      const startDrain = () => {
        if (drainId !== undefined) return;
        clearTimeout(timeoutId);
        drainId = setTimeout(() => {
          cleanup();
          resolve(Buffer.concat(this.received));
        }, this.drainWindowMs);
      };

      const onError = (err: Error) => {
        cleanup();
        reject(new ConnectionError(`Serial I/O failed for '${command}': ${err.message}`));
      };

      this.onReceive = (chunk) => {
        if (chunk.includes(RESPONSE_TERMINATOR)) startDrain();
      };
      this.onFault = onError;
      timeoutId = setTimeout(startDrain, this.timeoutMs);

      link.write(Buffer.from(command + COMMAND_TERMINATOR, "ascii"));
      link.drain((err) => {
        if (err) onError(err);
      });
    });
  }

  private log(line: string): void {
    if (this.debug) {
      console.log(`  [DEBUG] ${line}`);
    }
  }
}
