/**
 * Custom error types for Tether
 */

export class TetherError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "TetherError";
    Object.setPrototypeOf(this, TetherError.prototype);
  }
}

/**
 * Raised before any remote call when a fit request or a config file is rejected.
 */
export class InvalidConfigurationError extends TetherError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(
      `Invalid configuration: ${message}`,
      "INVALID_CONFIGURATION",
      { issues }
    );
    this.name = "InvalidConfigurationError";
    Object.setPrototypeOf(this, InvalidConfigurationError.prototype);
  }
}

/**
 * Failure reported by the remote engine. Code and message are the engine's own.
 */
export class RemoteCallError extends TetherError {
  constructor(
    message: string,
    code: string,
    public readonly data?: unknown
  ) {
    super(message, code, data === undefined ? undefined : { data });
    this.name = "RemoteCallError";
    Object.setPrototypeOf(this, RemoteCallError.prototype);
  }
}

export class AlreadyExistsError extends TetherError {
  constructor(public readonly path: string, public readonly remote?: RemoteCallError) {
    super(
      `Output path ${path} already exists; pass overwrite to replace it`,
      "ALREADY_EXISTS",
      { path }
    );
    this.name = "AlreadyExistsError";
    Object.setPrototypeOf(this, AlreadyExistsError.prototype);
  }
}

export class UnsupportedOperationError extends TetherError {
  constructor(operation: string, reason: string) {
    super(
      `Unsupported operation ${operation}: ${reason}`,
      "UNSUPPORTED_OPERATION",
      { operation }
    );
    this.name = "UnsupportedOperationError";
    Object.setPrototypeOf(this, UnsupportedOperationError.prototype);
  }
}

export class MalformedResponseError extends TetherError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Malformed engine response: ${message}`, "MALFORMED_RESPONSE", details);
    this.name = "MalformedResponseError";
    Object.setPrototypeOf(this, MalformedResponseError.prototype);
  }
}

/**
 * Normalize anything thrown into an Error for logging.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
