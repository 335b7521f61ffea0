/**
 * Session: one logical connection to a device.
 *
 * Sequences requests with at most one in flight, puts a deadline on each
 * of them, classifies failures and drives the connection state machine:
 *
 *   disconnected --connect--> connecting --ok--> connected
 *   connecting --failure--> disconnected
 *   connected --N soft failures--> degraded --success--> connected
 *   degraded --soft failure--> disconnected
 *   any --hard failure--> disconnected
 */

import { EventEmitter } from "node:events";
import {
  DEFAULT_DEGRADED_THRESHOLD,
  DEFAULT_TIMEOUT,
  type SessionOptions,
} from "./config.js";
import {
  BusyError,
  ConnectError,
  EncodeError,
  ProtocolError,
  RequestError,
  TimeoutError,
  TransportError,
} from "./errors.js";
import { resolveLogger, type Logger } from "./logger.js";
import { FrameError, ModbusError } from "./modbus.js";
import type { ReadSpan, RegisterField } from "./registers.js";
import type { Transport } from "./transport.js";

export type ConnectionState =
  | "disconnected"
  | "connecting"
  | "connected"
  | "degraded";

export type StateChangeListener = (
  state: ConnectionState,
  previous: ConnectionState
) => void;

export interface SpanWords {
  span: ReadSpan;
  words: number[];
}

interface PendingRequest {
  description: string;
  deadline: number;
}

export class Session extends EventEmitter {
  public readonly transport: Transport;
  public readonly timeout: number;
  public readonly degradedThreshold: number;

  private log: Logger;
  private _state: ConnectionState = "disconnected";
  private failures = 0;
  private busy = false;
  private pending: PendingRequest | null = null;

  constructor(transport: Transport, options: SessionOptions = {}) {
    super();
    this.transport = transport;
    this.timeout = options.timeout ?? DEFAULT_TIMEOUT;
    this.degradedThreshold =
      options.degradedThreshold ?? DEFAULT_DEGRADED_THRESHOLD;
    this.log = resolveLogger(options);
  }

  get state(): ConnectionState {
    return this._state;
  }

  /** Consecutive soft failures since the last success. */
  get failureCount(): number {
    return this.failures;
  }

  /** The request currently awaiting a response, if any. */
  get pendingRequest(): Readonly<PendingRequest> | null {
    return this.pending;
  }

  // ---------- Connection ----------

  async connect(): Promise<void> {
    if (this._state === "connecting") {
      throw new ConnectError("A connection attempt is already in progress");
    }
    if (this._state !== "disconnected") return;

    this.setState("connecting");
    try {
      await this.transport.connect();
    } catch (err) {
      this.setState("disconnected");
      const message = err instanceof Error ? err.message : String(err);
      throw new ConnectError(`Cannot connect: ${message}`, { cause: err });
    }
    this.failures = 0;
    this.setState("connected");
  }

  async close(): Promise<void> {
    this.failures = 0;
    try {
      await this.transport.close();
    } finally {
      this.setState("disconnected");
    }
  }

  // ---------- Requests ----------

  /**
   * Read each span in order, one request at a time.
   *
   * Fails with the first request error; no partial result is returned.
   * The whole read counts as one success or one failure.
   */
  async read(spans: readonly ReadSpan[]): Promise<SpanWords[]> {
    return this.exclusive(async () => {
      const results: SpanWords[] = [];
      for (const span of spans) {
        const words = await this.request(
          `read ${span.address}+${span.count}`,
          () => this.transport.readRegisters(span.address, span.count),
          (words) => {
            if (words.length !== span.count) {
              throw new ProtocolError(
                `Expected ${span.count} registers from ${span.address}, got ${words.length}`
              );
            }
          }
        );
        results.push({ span, words });
      }
      return results;
    });
  }

  async write(field: RegisterField, words: readonly number[]): Promise<void> {
    if (words.length !== field.wordCount) {
      throw new EncodeError(
        field.name,
        "type-mismatch",
        `expected ${field.wordCount} word(s), got ${words.length}`
      );
    }
    await this.exclusive(() =>
      this.request(`write ${field.name}`, () =>
        this.transport.writeRegisters(field.address, words)
      )
    );
  }

  /**
   * Hold the single request slot for the duration of `fn` and record its
   * outcome in the state machine.
   */
  private async exclusive<T>(fn: () => Promise<T>): Promise<T> {
    if (this.busy) {
      throw new BusyError();
    }
    if (this._state !== "connected" && this._state !== "degraded") {
      throw new TransportError(`Session is ${this._state}`);
    }
    this.busy = true;
    try {
      let result: T;
      try {
        result = await fn();
      } catch (err) {
        const failure = classify(err);
        await this.recordFailure(failure);
        throw failure;
      }
      this.recordSuccess();
      return result;
    } finally {
      this.busy = false;
    }
  }

  private async request<T>(
    description: string,
    operation: () => Promise<T>,
    validate?: (result: T) => void
  ): Promise<T> {
    if (this._state !== "connected" && this._state !== "degraded") {
      throw new TransportError(`Session is ${this._state}`);
    }
    const pending: PendingRequest = {
      description,
      deadline: Date.now() + this.timeout,
    };
    this.pending = pending;
    try {
      const result = await this.withDeadline(pending, operation());
      validate?.(result);
      return result;
    } catch (err) {
      const failure = classify(err);
      this.log.debug(`${description} failed: ${failure.message}`);
      throw failure;
    } finally {
      if (this.pending === pending) this.pending = null;
    }
  }

  /**
   * Settle with `operation` or reject with `TimeoutError` at the deadline,
   * whichever comes first. A late outcome is discarded.
   */
  private withDeadline<T>(pending: PendingRequest, operation: Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      let settled = false;
      const timer = setTimeout(() => {
        settled = true;
        reject(new TimeoutError(this.timeout));
      }, Math.max(0, pending.deadline - Date.now()));

      operation.then(
        (result) => {
          if (settled) {
            this.log.debug(`Discarded late response to ${pending.description}`);
            return;
          }
          settled = true;
          clearTimeout(timer);
          resolve(result);
        },
        (err: unknown) => {
          if (settled) {
            this.log.debug(`Discarded late failure of ${pending.description}`);
            return;
          }
          settled = true;
          clearTimeout(timer);
          reject(err);
        }
      );
    });
  }

  // ---------- State machine ----------

  private recordSuccess(): void {
    this.failures = 0;
    if (this._state === "degraded") {
      this.setState("connected");
    }
  }

  private async recordFailure(failure: RequestError): Promise<void> {
    if (!failure.soft) {
      await this.drop(failure);
      return;
    }
    this.failures++;
    if (this._state === "degraded") {
      await this.drop(failure);
    } else if (
      this._state === "connected" &&
      this.failures >= this.degradedThreshold
    ) {
      this.log.warn(`${this.failures} consecutive failures, connection degraded`);
      this.setState("degraded");
    }
  }

  /** Close the transport after a failure; the caller must reconnect. */
  private async drop(failure: RequestError): Promise<void> {
    this.log.warn(`Closing connection: ${failure.message}`);
    this.failures = 0;
    try {
      await this.transport.close();
    } catch (err) {
      this.log.debug(`Error while closing transport: ${String(err)}`);
    }
    this.setState("disconnected");
  }

  private setState(next: ConnectionState): void {
    const previous = this._state;
    if (next === previous) return;
    this._state = next;
    this.log.debug(`Connection state: ${previous} -> ${next}`);
    try {
      this.emit("stateChange", next, previous);
    } catch (err) {
      // A throwing listener must not abort the transition.
      this.log.warn(`stateChange listener failed: ${err instanceof Error ? err.message : String(err)}`);
    }
  }
}

/** Map anything a transport throws onto the request error taxonomy. */
export function classify(err: unknown): RequestError {
  if (err instanceof RequestError) return err;
  if (err instanceof ModbusError) {
    return new ProtocolError(err.message, err.exceptionCode, { cause: err });
  }
  if (err instanceof FrameError) {
    return new ProtocolError(err.message, undefined, { cause: err });
  }
  const message = err instanceof Error ? err.message : String(err);
  return new TransportError(message, { cause: err });
}
