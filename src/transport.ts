/**
 * Transport boundary and its Modbus TCP implementation.
 *
 * A transport moves register reads and writes to one device and reports
 * failures by throwing; it keeps no retry or deadline logic of its own.
 */

import net from "node:net";
import * as modbus from "./modbus.js";
import {
  DEFAULT_PORT,
  DEFAULT_TIMEOUT,
  DEFAULT_UNIT_ID,
  type TransportOptions,
} from "./config.js";
import { resolveLogger, type Logger } from "./logger.js";

export interface Transport {
  connect(): Promise<void>;
  close(): Promise<void>;
  readRegisters(address: number, count: number): Promise<number[]>;
  writeRegisters(address: number, words: readonly number[]): Promise<void>;
}

export class NoSocketAvailableError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "NoSocketAvailableError";
  }
}

interface PendingFrame {
  request: Buffer;
  transactionId: number;
  resolve: (values: number[]) => void;
  reject: (err: Error) => void;
}

/**
 * Modbus over a TCP socket, either with MBAP headers ("tcp") or as raw RTU
 * frames for serial-to-Ethernet gateways ("rtu").
 */
export class TcpTransport implements Transport {
  public readonly host: string;
  public readonly port: number;
  public readonly unitId: number;
  public readonly framing: "tcp" | "rtu";
  public readonly connectTimeout: number;

  private log: Logger;
  private socket: net.Socket | null = null;
  private rxBuffer: Buffer = Buffer.alloc(0);
  private pending: PendingFrame | null = null;
  private transactionId = Math.floor(Math.random() * 0xfffe) + 1;

  constructor(host: string, options: TransportOptions = {}) {
    this.host = host;
    this.port = options.port ?? DEFAULT_PORT;
    this.unitId = options.unitId ?? DEFAULT_UNIT_ID;
    this.framing = options.framing ?? "tcp";
    this.connectTimeout = options.connectTimeout ?? DEFAULT_TIMEOUT;
    this.log = resolveLogger(options);
  }

  // ---------- Connection management ----------

  get connected(): boolean {
    return this.socket !== null && !this.socket.destroyed;
  }

  /** Open the TCP connection */
  async connect(): Promise<void> {
    if (this.connected) return;

    return new Promise<void>((resolve, reject) => {
      const socket = new net.Socket();

      const onError = (err: Error) => {
        cleanup();
        socket.destroy();
        reject(
          new NoSocketAvailableError(
            `Cannot open connection to ${this.host}:${this.port}: ${err.message}`,
            { cause: err }
          )
        );
      };

      const onConnect = () => {
        cleanup();
        this.socket = socket;
        this.rxBuffer = Buffer.alloc(0);
        this.setupSocketListeners(socket);
        this.log.debug(`Connected to ${this.host}:${this.port}`);
        resolve();
      };

      const timer = setTimeout(() => {
        onError(new Error(`no answer within ${this.connectTimeout} ms`));
      }, this.connectTimeout);

      const cleanup = () => {
        clearTimeout(timer);
        socket.removeListener("error", onError);
        socket.removeListener("connect", onConnect);
      };

      socket.once("error", onError);
      socket.once("connect", onConnect);
      socket.connect(this.port, this.host);
    });
  }

  /** Set up event listeners on the connected socket */
  private setupSocketListeners(socket: net.Socket): void {
    socket.setNoDelay(true);

    socket.on("data", (data: Buffer) => {
      if (this.socket !== socket) return;
      this.log.debug(`RAW RECD: ${data.toString("hex")}`);
      this.rxBuffer = Buffer.concat([this.rxBuffer, data]);
      try {
        this.drainFrames();
      } catch (err) {
        this.rxBuffer = Buffer.alloc(0);
        this.rejectPending(err instanceof Error ? err : new Error(String(err)));
      }
    });

    socket.on("close", () => {
      this.log.debug("Socket closed");
      if (this.socket !== socket) return;
      this.socket = null;
      this.rejectPending(new NoSocketAvailableError("Connection closed on read"));
    });

    socket.on("error", (err: Error) => {
      this.log.debug(`Socket error: ${err.message}`);
      if (this.socket !== socket) return;
      this.rejectPending(
        new NoSocketAvailableError(`Socket error: ${err.message}`, { cause: err })
      );
    });
  }

  /** Close the connection */
  async close(): Promise<void> {
    const socket = this.socket;
    this.socket = null;
    this.rejectPending(new NoSocketAvailableError("Connection closed"));
    if (!socket) return;

    return new Promise<void>((resolve) => {
      // If end doesn't trigger close fast enough, force destroy
      const timer = setTimeout(() => socket.destroy(), 500);
      socket.once("close", () => {
        clearTimeout(timer);
        resolve();
      });
      socket.end();
    });
  }

  /** Replace the connection with a fresh one. */
  private async reopen(socket: net.Socket): Promise<net.Socket> {
    this.log.debug(`Reopening connection to ${this.host}:${this.port}`);
    this.detach(socket);
    await this.connect();
    const fresh = this.socket;
    if (!fresh) {
      throw new NoSocketAvailableError("Connection already closed.");
    }
    return fresh;
  }

  /** Drop a socket; its late events are ignored from here on. */
  private detach(socket: net.Socket): void {
    if (this.socket === socket) this.socket = null;
    socket.destroy();
  }

  // ---------- Frame send/receive ----------

  private nextTransactionId(): number {
    this.transactionId = (this.transactionId + 1) & 0xffff;
    return this.transactionId;
  }

  private rejectPending(err: Error): void {
    const pending = this.pending;
    this.pending = null;
    pending?.reject(err);
  }

  /** Split complete response frames off the receive buffer */
  private drainFrames(): void {
    for (;;) {
      if (this.framing === "tcp") {
        if (this.rxBuffer.length < modbus.MBAP_HEADER_LENGTH) return;
        const header = modbus.parseMbapHeader(this.rxBuffer);
        const total = 6 + header.length;
        if (this.rxBuffer.length < total) return;
        const frame = this.rxBuffer.subarray(0, total);
        this.rxBuffer = this.rxBuffer.subarray(total);

        const pending = this.pending;
        if (!pending || header.transactionId !== pending.transactionId) {
          this.log.debug(`[DISCARDED] RECD: ${frame.toString("hex")}`);
          continue;
        }
        this.pending = null;
        this.settle(pending, () =>
          modbus.parseResponsePdu(
            frame.subarray(modbus.MBAP_HEADER_LENGTH),
            pending.request
          )
        );
      } else {
        const length = modbus.rtuFrameLength(this.rxBuffer);
        if (length === undefined || this.rxBuffer.length < length) return;
        const frame = this.rxBuffer.subarray(0, length);
        this.rxBuffer = this.rxBuffer.subarray(length);

        const pending = this.pending;
        if (!pending) {
          this.log.debug(`[DISCARDED] RECD: ${frame.toString("hex")}`);
          continue;
        }
        this.pending = null;
        this.settle(pending, () =>
          modbus.parseRtuResponse(frame, pending.request, this.unitId)
        );
      }
    }
  }

  private settle(pending: PendingFrame, parse: () => number[]): void {
    try {
      pending.resolve(parse());
    } catch (err) {
      pending.reject(err instanceof Error ? err : new Error(String(err)));
    }
  }

  /** Send a request PDU and resolve with the parsed response values */
  private async sendReceive(pdu: Buffer): Promise<number[]> {
    const current = this.socket;
    if (!current || current.destroyed) {
      throw new NoSocketAvailableError("Connection already closed.");
    }
    let socket: net.Socket = current;

    // A request abandoned by its caller is superseded by the next one.
    if (this.pending) {
      this.rejectPending(new NoSocketAvailableError("Request superseded"));
      if (this.framing === "rtu") {
        // RTU frames carry no transaction id, so a reply still on its way
        // would be taken for the answer to this request.
        socket = await this.reopen(socket);
      }
    }
    if (this.framing === "rtu") this.rxBuffer = Buffer.alloc(0);

    const transactionId = this.nextTransactionId();
    const frame =
      this.framing === "tcp"
        ? modbus.buildTcpFrame(transactionId, this.unitId, pdu)
        : modbus.buildRtuFrame(this.unitId, pdu);

    return new Promise<number[]>((resolve, reject) => {
      this.pending = { request: pdu, transactionId, resolve, reject };
      this.log.debug(`SENT: ${frame.toString("hex")}`);
      socket.write(frame);
    });
  }

  // ---------- Public Modbus API ----------

  /**
   * Read holding registers (Modbus function code 3)
   *
   * @param address  Modbus register start address
   * @param count    Number of registers to query
   */
  async readRegisters(address: number, count: number): Promise<number[]> {
    return this.sendReceive(modbus.readHoldingRegisters(address, count));
  }

  /**
   * Write registers: function code 6 for a single word, 16 otherwise.
   */
  async writeRegisters(address: number, words: readonly number[]): Promise<void> {
    const pdu =
      words.length === 1
        ? modbus.writeSingleRegister(address, words[0])
        : modbus.writeMultipleRegisters(address, words);
    await this.sendReceive(pdu);
  }
}
