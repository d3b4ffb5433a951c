/**
 * Error types raised by the SLC driver.
 *
 * Every error carries a `kind` so callers can switch on it instead of
 * chaining `instanceof` checks.
 */

export type SlcErrorKind = "connection" | "timeout" | "command" | "validation";

export abstract class SlcError extends Error {
  abstract readonly kind: SlcErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Port cannot be opened, or an operation ran while disconnected. */
export class ConnectionError extends SlcError {
  readonly kind = "connection";
}

/** No response arrived within the configured window. */
export class TimeoutError extends SlcError {
  readonly kind = "timeout";

  constructor(
    message: string,
    readonly command?: string
  ) {
    super(message);
  }
}

/** The controller rejected a command, or its response could not be parsed. */
export class CommandError extends SlcError {
  readonly kind = "command";

  constructor(
    message: string,
    readonly command?: string,
    readonly response?: string
  ) {
    super(message);
  }
}

/** A parameter or configuration document failed validation before anything was sent. */
export class ValidationError extends SlcError {
  readonly kind = "validation";
}

export function isSlcError(err: unknown): err is SlcError {
  return err instanceof SlcError;
}

