/**
 * Options and defaults for the transport, session, poller and device.
 */

import type { Logger } from "./logger.js";

export const DEFAULT_PORT = 502;
export const DEFAULT_UNIT_ID = 1;
/** Per-request deadline in milliseconds. */
export const DEFAULT_TIMEOUT = 5000;
export const DEFAULT_DEGRADED_THRESHOLD = 3;
/** Poll interval in milliseconds. */
export const DEFAULT_INTERVAL = 5000;
/** Largest number of registers read by one request. */
export const DEFAULT_MAX_SPAN = 64;

// ---------- Options ----------

export interface LoggingOptions {
  /** Enable verbose/debug logging to the console. Default: false */
  verbose?: boolean;
  /** Custom logger instance */
  logger?: Logger;
}

export interface TransportOptions extends LoggingOptions {
  /** TCP port of the device or gateway. Default: 502 */
  port?: number;
  /** Modbus unit (slave) id. Default: 1 */
  unitId?: number;
  /**
   * Frame format on the socket: "tcp" (MBAP header) or "rtu" (RTU frames
   * with CRC, for serial-to-TCP gateways). Default: "tcp"
   */
  framing?: "tcp" | "rtu";
  /** Connect timeout in milliseconds. Default: 5000 */
  connectTimeout?: number;
}

export interface SessionOptions extends LoggingOptions {
  /** Request deadline in milliseconds. Default: 5000 */
  timeout?: number;
  /** Consecutive soft failures before the session is degraded. Default: 3 */
  degradedThreshold?: number;
}

export interface RetryPolicy {
  /** Retries of a cycle after a soft failure. Default: 2 */
  retries: number;
  /** Delay before the first retry in milliseconds. Default: 250 */
  initialDelay: number;
  /** Backoff multiplier. Default: 2 */
  factor: number;
  /** Upper bound for a single delay in milliseconds. Default: 5000 */
  maxDelay: number;
}

export const DEFAULT_RETRY_POLICY: Readonly<RetryPolicy> = Object.freeze({
  retries: 2,
  initialDelay: 250,
  factor: 2,
  maxDelay: 5000,
});

export interface PollerOptions extends LoggingOptions {
  retry?: Partial<RetryPolicy>;
  /** Reconnect a disconnected session before a cycle in continuous mode. Default: true */
  reconnect?: boolean;
  /** Override the register map's maximum span. */
  maxSpan?: number;
}

export interface DeviceOptions
  extends TransportOptions,
    SessionOptions,
    PollerOptions {
  /**
   * Getters fail with a "stale" error when the latest snapshot is older
   * than this many milliseconds. Default: unlimited
   */
  staleAfter?: number;
}

export function resolveRetryPolicy(
  retry: Partial<RetryPolicy> = {}
): RetryPolicy {
  return { ...DEFAULT_RETRY_POLICY, ...retry };
}

/** Delay before retry number `attempt` (1-based). */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  const delay = policy.initialDelay * Math.pow(policy.factor, attempt - 1);
  return Math.min(delay, policy.maxDelay);
}

/** Split "host[:port]" into its parts. */
export function parseNetloc(
  netloc: string,
  defaultPort = DEFAULT_PORT
): { host: string; port: number } {
  const [host, port] = netloc.split(":");
  if (!host) {
    throw new Error("Host name or IP address is required");
  }
  if (port === undefined || port === "") {
    return { host, port: defaultPort };
  }
  const parsed = Number(port);
  if (!Number.isInteger(parsed) || parsed < 1 || parsed > 0xffff) {
    throw new Error(`Invalid port number: ${port}`);
  }
  return { host, port: parsed };
}
