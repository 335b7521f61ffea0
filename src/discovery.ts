/**
 * my-PV device discovery via UDP broadcast.
 *
 * Sends a discovery request to port 16124 and collects the replies of
 * devices on the local network.
 */

import dgram from "node:dgram";
import { crc16 } from "./modbus.js";
import { resolveLogger } from "./logger.js";
import type { LoggingOptions } from "./config.js";

export const DISCOVERY_PORT = 16124;

export const DeviceIdentification = {
  AC_THOR_9S: 0x4f4c,
  AC_THOR: 0x4e84,
  MY_PV_METER: 0x4e8e,
  AC_ELWA_2: 0x3f16,
  AC_ELWA_E: 0x3efc,
} as const;

export const DEVICE_NAMES: Readonly<Record<number, string>> = {
  [DeviceIdentification.AC_THOR_9S]: "AC-THOR 9S",
  [DeviceIdentification.AC_THOR]: "AC-THOR",
  [DeviceIdentification.MY_PV_METER]: "my-PV Meter",
  [DeviceIdentification.AC_ELWA_2]: "AC ELWA 2",
  [DeviceIdentification.AC_ELWA_E]: "AC ELWA-E",
};

export class DiscoveryFrameError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DiscoveryFrameError";
  }
}

// ---------- Wire format ----------

export const REQUEST_LENGTH = 32;
export const REPLY_LENGTH = 64;

export interface DiscoveryRequest {
  deviceId: number;
}

export interface DiscoveryReply {
  deviceId: number;
  /** Dotted IPv4 address reported by the device */
  address: string;
  serialNumber: string;
  /** Two bytes, hex encoded, e.g. "000a" */
  firmwareVersion: string;
  elwaNumber: number;
}

// Unlike RTU frames, discovery datagrams carry the CRC high byte first.
function sealCrc(buf: Buffer): Buffer {
  buf.writeUInt16BE(crc16(buf.subarray(2)), 0);
  return buf;
}

function checkFrame(data: Buffer, length: number): void {
  if (data.length !== length) {
    throw new DiscoveryFrameError(
      `Invalid data length: ${data.length} != ${length} for data: ${data.toString("hex")}`
    );
  }
  const crc = data.readUInt16BE(0);
  const calculated = crc16(data.subarray(2));
  if (crc !== calculated) {
    throw new DiscoveryFrameError(
      `Invalid CRC: ${crc} != ${calculated} for data: ${data.toString("hex")}`
    );
  }
}

/**
 * Request layout: CRC (2, over the rest), device id (2),
 * device name (16), reserved (12).
 */
export function encodeRequest(request: DiscoveryRequest): Buffer {
  const buf = Buffer.alloc(REQUEST_LENGTH);
  buf.writeUInt16BE(request.deviceId, 2);
  buf.write(DEVICE_NAMES[request.deviceId] ?? "", 4, 16, "ascii");
  return sealCrc(buf);
}

export function decodeRequest(data: Buffer): DiscoveryRequest {
  checkFrame(data, REQUEST_LENGTH);
  return { deviceId: data.readUInt16BE(2) };
}

/**
 * Reply layout: CRC (2), device id (2), IPv4 address (4), serial number
 * (16, NUL padded), firmware version (2), ELWA number (1), reserved (37).
 */
export function encodeReply(reply: DiscoveryReply): Buffer {
  const buf = Buffer.alloc(REPLY_LENGTH);
  buf.writeUInt16BE(reply.deviceId, 2);
  const octets = reply.address.split(".").map(Number);
  if (octets.length !== 4 || octets.some((o) => !Number.isInteger(o) || o < 0 || o > 255)) {
    throw new DiscoveryFrameError(`Invalid IPv4 address: ${reply.address}`);
  }
  Buffer.from(octets).copy(buf, 4);
  buf.write(reply.serialNumber, 8, 16, "ascii");
  if (!/^[0-9a-fA-F]{4}$/.test(reply.firmwareVersion)) {
    throw new DiscoveryFrameError(`Invalid firmware version: ${reply.firmwareVersion}`);
  }
  Buffer.from(reply.firmwareVersion, "hex").copy(buf, 24);
  buf[26] = reply.elwaNumber;
  return sealCrc(buf);
}

export function decodeReply(data: Buffer): DiscoveryReply {
  checkFrame(data, REPLY_LENGTH);
  return {
    deviceId: data.readUInt16BE(2),
    address: [...data.subarray(4, 8)].join("."),
    serialNumber: data.subarray(8, 24).toString("ascii").replace(/\0+$/, ""),
    firmwareVersion: data.subarray(24, 26).toString("hex"),
    elwaNumber: data[26],
  };
}

// ---------- Discovery ----------

export interface DiscoverOptions extends LoggingOptions {
  /** Broadcast address. Default: "255.255.255.255" */
  address?: string;
  /** Time to collect replies in milliseconds. Default: 5000 */
  timeout?: number;
  /** Device type to scan for. Default: AC-THOR */
  deviceId?: number;
  /** Local port to listen on; devices answer to 16124. Default: 16124 */
  localPort?: number;
}

/**
 * Discover my-PV devices on the local network.
 *
 * @returns One reply per serial number, in order of arrival
 */
export async function discover(
  options: DiscoverOptions = {}
): Promise<DiscoveryReply[]> {
  const address = options.address ?? "255.255.255.255";
  const timeout = options.timeout ?? 5000;
  const log = resolveLogger(options);
  const request = encodeRequest({
    deviceId: options.deviceId ?? DeviceIdentification.AC_THOR,
  });

  return new Promise((resolve, reject) => {
    const results: DiscoveryReply[] = [];
    const seen = new Set<string>();

    const socket = dgram.createSocket({ type: "udp4", reuseAddr: true });

    const timer = setTimeout(() => {
      socket.close();
      resolve(results);
    }, timeout);

    socket.on("error", (err) => {
      clearTimeout(timer);
      socket.close();
      reject(err);
    });

    socket.on("message", (msg, rinfo) => {
      // Our own broadcast request
      if (msg.length === REQUEST_LENGTH) return;
      let reply: DiscoveryReply;
      try {
        reply = decodeReply(msg);
      } catch (err) {
        log.debug(
          `Ignoring datagram from ${rinfo.address}: ${err instanceof Error ? err.message : String(err)}`
        );
        return;
      }
      log.debug(`Discovery reply from ${rinfo.address}: ${reply.serialNumber}`);
      if (!seen.has(reply.serialNumber)) {
        seen.add(reply.serialNumber);
        results.push(reply);
      }
    });

    socket.bind(options.localPort ?? DISCOVERY_PORT, () => {
      socket.setBroadcast(true);
      log.debug(`Sending discovery request to ${address}:${DISCOVERY_PORT}`);
      socket.send(request, DISCOVERY_PORT, address);
    });
  });
}
