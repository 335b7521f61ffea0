/**
 * Error taxonomy shared by the codec, session, poller and device facade.
 *
 * Request errors carry a `soft` flag: soft failures (busy, timeout,
 * protocol) may be retried by the poller, hard failures (transport) close
 * the connection.
 */

// ---------- Connection ----------

export class ConnectError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConnectError";
  }
}

// ---------- Requests ----------

export abstract class RequestError extends Error {
  abstract readonly soft: boolean;
}

/** A request was issued while another one was still pending. */
export class BusyError extends RequestError {
  readonly soft = true;
  constructor(message = "Another request is already in flight") {
    super(message);
    this.name = "BusyError";
  }
}

export class TimeoutError extends RequestError {
  readonly soft = true;
  public readonly deadline: number;
  constructor(deadline: number) {
    super(`Request timed out after ${deadline} ms`);
    this.name = "TimeoutError";
    this.deadline = deadline;
  }
}

/**
 * Malformed response or Modbus exception. `code` holds the exception code
 * reported by the device; it is undefined when the frame itself was bad.
 */
export class ProtocolError extends RequestError {
  readonly soft = true;
  public readonly code: number | undefined;
  constructor(message: string, code?: number, options?: ErrorOptions) {
    super(message, options);
    this.name = "ProtocolError";
    this.code = code;
  }
}

export class TransportError extends RequestError {
  readonly soft = false;
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "TransportError";
  }
}

// ---------- Data integrity ----------

export class DecodeError extends Error {
  public readonly field: string;
  constructor(field: string, message: string) {
    super(`Cannot decode ${field}: ${message}`);
    this.name = "DecodeError";
    this.field = field;
  }
}

export type EncodeFailure =
  | "out-of-range"
  | "unknown-tag"
  | "type-mismatch"
  | "read-only";

export class EncodeError extends Error {
  public readonly field: string;
  public readonly reason: EncodeFailure;
  constructor(field: string, reason: EncodeFailure, message: string) {
    super(`Cannot encode ${field}: ${message}`);
    this.name = "EncodeError";
    this.field = field;
    this.reason = reason;
  }
}

export class RegisterMapError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RegisterMapError";
  }
}

export class UnknownDeviceModelError extends Error {
  public readonly serialNumber: string;
  constructor(serialNumber: string) {
    super(`Unknown device model for serial number "${serialNumber}"`);
    this.name = "UnknownDeviceModelError";
    this.serialNumber = serialNumber;
  }
}

// ---------- Polling ----------

/** A poll cycle failed; `cause` is the first unrecovered failure. */
export class PollError extends Error {
  public readonly attempts: number;
  declare readonly cause: Error;
  constructor(cause: Error, attempts: number) {
    super(`Poll cycle failed after ${attempts} attempt(s): ${cause.message}`, {
      cause,
    });
    this.name = "PollError";
    this.attempts = attempts;
  }
}

// ---------- Facade ----------

export type FacadeFailure = "no-snapshot" | "stale" | "unavailable" | "type";

export class FacadeError extends Error {
  public readonly reason: FacadeFailure;
  constructor(reason: FacadeFailure, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "FacadeError";
    this.reason = reason;
  }
}
