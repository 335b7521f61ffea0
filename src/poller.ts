/**
 * Poller: turns session reads into immutable device snapshots, retries
 * soft failures with exponential backoff and runs the continuous polling
 * loop.
 */

import { setTimeout as sleep } from "node:timers/promises";
import { Mutex } from "async-mutex";
import { decode, type DomainValue } from "./codec.js";
import {
  DEFAULT_INTERVAL,
  backoffDelay,
  resolveRetryPolicy,
  type LoggingOptions,
  type PollerOptions,
  type RetryPolicy,
} from "./config.js";
import { PollError, RequestError } from "./errors.js";
import { resolveLogger, type Logger } from "./logger.js";
import { spanCovers, type RegisterMap } from "./registers.js";
import type {
  ConnectionState,
  Session,
  SpanWords,
  StateChangeListener,
} from "./session.js";

// ---------- Snapshots ----------

export interface FieldReading {
  /** Decoded value; null when no read span covered the field */
  readonly value: DomainValue | null;
  /** False for fields this device variant does not provide */
  readonly valid: boolean;
}

/** Immutable, timestamped decode of every field from one poll cycle. */
export class DeviceSnapshot<N extends string = string> {
  /** Milliseconds since the epoch */
  public readonly timestamp: number;
  public readonly model: string;
  private readonly readings: ReadonlyMap<N, FieldReading>;

  constructor(model: string, timestamp: number, readings: ReadonlyMap<N, FieldReading>) {
    this.model = model;
    this.timestamp = timestamp;
    this.readings = new Map(readings);
    Object.freeze(this);
  }

  get(name: N): FieldReading {
    return this.readings.get(name) ?? MISSING;
  }

  names(): N[] {
    return [...this.readings.keys()];
  }

  /** Age in milliseconds at `now` */
  age(now = Date.now()): number {
    return now - this.timestamp;
  }

  toJSON(): { timestamp: string; model: string; fields: Record<string, FieldReading> } {
    return {
      timestamp: new Date(this.timestamp).toISOString(),
      model: this.model,
      fields: Object.fromEntries(this.readings),
    };
  }
}

const MISSING: FieldReading = Object.freeze({ value: null, valid: false });

/**
 * Decode every field of `map` from the words of a complete read cycle.
 * Throws `DecodeError` if a field does not decode.
 */
export function buildSnapshot<N extends string>(
  map: RegisterMap<N>,
  results: readonly SpanWords[],
  timestamp = Date.now()
): DeviceSnapshot<N> {
  const readings = new Map<N, FieldReading>();
  for (const field of map.fields()) {
    const valid = map.isAvailable(field.name);
    const hit = results.find((r) => spanCovers(r.span, field));
    if (!hit) {
      readings.set(field.name, Object.freeze({ value: null, valid }));
      continue;
    }
    const offset = field.address - hit.span.address;
    const words = hit.words.slice(offset, offset + field.wordCount);
    const value = decode(field, words, map.wordOrder);
    readings.set(field.name, Object.freeze({ value, valid }));
  }
  return new DeviceSnapshot(map.model, timestamp, readings);
}

// ---------- Single cycle ----------

export interface PollOnceOptions extends LoggingOptions {
  retry?: Partial<RetryPolicy>;
  maxSpan?: number;
  /** Aborts the backoff wait between attempts */
  signal?: AbortSignal;
}

/**
 * Read every available field of `map` and decode a snapshot.
 *
 * Soft request failures are retried with exponential backoff; hard
 * failures and decode errors end the cycle at once. Either a complete
 * snapshot is returned or a `PollError` thrown.
 */
export async function pollOnce<N extends string>(
  map: RegisterMap<N>,
  session: Session,
  options: PollOnceOptions = {}
): Promise<DeviceSnapshot<N>> {
  const log = resolveLogger(options);
  const policy = resolveRetryPolicy(options.retry);
  const spans = map.coalesceReads(undefined, { maxSpan: options.maxSpan });

  for (let attempt = 1; ; attempt++) {
    try {
      const results = await session.read(spans);
      return buildSnapshot(map, results);
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      const retryable =
        error instanceof RequestError &&
        error.soft &&
        attempt <= policy.retries &&
        session.state !== "disconnected";
      if (!retryable) {
        throw new PollError(error, attempt);
      }
      const delay = backoffDelay(policy, attempt);
      log.warn(`Poll attempt ${attempt} failed (${error.message}), retrying in ${delay} ms`);
      await sleep(delay, undefined, { signal: options.signal });
    }
  }
}

// ---------- Continuous mode ----------

export interface RunOptions<N extends string> {
  /** Milliseconds between cycle starts. Default: 5000 */
  interval?: number;
  onSnapshot?: (snapshot: DeviceSnapshot<N>) => void;
  /** Called only when the connection state actually changes */
  onStateChange?: (state: ConnectionState, previous: ConnectionState) => void;
  onError?: (error: Error) => void;
  signal?: AbortSignal;
}

export class Poller<N extends string = string> {
  public readonly map: RegisterMap<N>;
  public readonly session: Session;

  private log: Logger;
  private readonly options: PollerOptions;
  private readonly mutex = new Mutex();
  private _latest: DeviceSnapshot<N> | null = null;
  private controller: AbortController | null = null;

  constructor(map: RegisterMap<N>, session: Session, options: PollerOptions = {}) {
    this.map = map;
    this.session = session;
    this.options = options;
    this.log = resolveLogger(options);
  }

  /** Most recent successful snapshot, if any. */
  get latest(): DeviceSnapshot<N> | null {
    return this._latest;
  }

  get running(): boolean {
    return this.controller !== null;
  }

  /**
   * Run `fn` with exclusive use of the session. Poll cycles take the same
   * lock, so writes never meet a busy session.
   */
  exclusive<T>(fn: () => Promise<T>): Promise<T> {
    return this.mutex.runExclusive(fn);
  }

  /** Run a single poll cycle and keep its snapshot as the latest. */
  async pollOnce(signal?: AbortSignal): Promise<DeviceSnapshot<N>> {
    return this.exclusive(async () => {
      const snapshot = await pollOnce(this.map, this.session, {
        logger: this.log,
        retry: this.options.retry,
        maxSpan: this.options.maxSpan,
        signal,
      });
      this._latest = snapshot;
      return snapshot;
    });
  }

  /**
   * Poll until stopped or `options.signal` is aborted. Cycle failures are
   * reported through `onError` and never end the loop.
   */
  async run(options: RunOptions<N> = {}): Promise<void> {
    if (this.controller) {
      throw new Error("Poller is already running");
    }
    const interval = options.interval ?? DEFAULT_INTERVAL;
    const controller = new AbortController();
    const signal = controller.signal;
    const abort = () => controller.abort();
    this.controller = controller;

    options.signal?.addEventListener("abort", abort, { once: true });
    if (options.signal?.aborted) abort();

    const listener: StateChangeListener = (state, previous) =>
      options.onStateChange?.(state, previous);
    this.session.on("stateChange", listener);

    try {
      while (!signal.aborted) {
        const started = Date.now();
        await this.cycle(signal, options);
        if (signal.aborted) break;

        const wait = Math.max(0, started + interval - Date.now());
        try {
          await sleep(wait, undefined, { signal });
        } catch (err) {
          if (!signal.aborted) throw err;
        }
      }
    } finally {
      this.session.off("stateChange", listener);
      options.signal?.removeEventListener("abort", abort);
      this.controller = null;
      this.log.debug("Polling stopped");
    }
  }

  /** Stop a running loop after its current request. */
  stop(): void {
    this.controller?.abort();
  }

  private async cycle(signal: AbortSignal, options: RunOptions<N>): Promise<void> {
    if (this.session.state === "disconnected" && (this.options.reconnect ?? true)) {
      try {
        this.log.debug("Reconnecting");
        await this.exclusive(() => this.session.connect());
      } catch (err) {
        const error = err instanceof Error ? err : new Error(String(err));
        this.log.warn(`Reconnect failed: ${error.message}`);
        options.onError?.(error);
        return;
      }
    }

    let snapshot: DeviceSnapshot<N>;
    try {
      snapshot = await this.pollOnce(signal);
    } catch (err) {
      if (signal.aborted) return;
      const error = err instanceof Error ? err : new Error(String(err));
      this.log.warn(error.message);
      options.onError?.(error);
      return;
    }
    if (signal.aborted) return;
    options.onSnapshot?.(snapshot);
  }
}
