/**
 * Modbus frame construction and parsing.
 *
 * Implements the subset of Modbus needed to talk to a single device:
 *   - CRC-16/Modbus calculation
 *   - Request PDU builders for function codes 3, 6 and 16
 *   - RTU and TCP (MBAP) application data unit framing
 *   - Response parsing with exception and length checks
 */

// ---------- CRC-16/Modbus lookup table ----------

const CRC_TABLE = new Uint16Array(256);
for (let i = 0; i < 256; i++) {
  let crc = i;
  for (let j = 0; j < 8; j++) {
    crc = crc & 1 ? (crc >>> 1) ^ 0xa001 : crc >>> 1;
  }
  CRC_TABLE[i] = crc;
}

/** Calculate CRC-16/Modbus over the given bytes. */
export function crc16(data: Uint8Array): number {
  let crc = 0xffff;
  for (let i = 0; i < data.length; i++) {
    crc = (crc >>> 8) ^ CRC_TABLE[(crc ^ data[i]) & 0xff];
  }
  return crc;
}

/** Return a 2-byte little-endian Buffer containing the CRC. */
export function getCrc(data: Uint8Array): Buffer {
  const buf = Buffer.alloc(2);
  buf.writeUInt16LE(crc16(data), 0);
  return buf;
}

/** Append CRC-16 to the given data and return the new buffer. */
export function addCrc(data: Buffer): Buffer {
  return Buffer.concat([data, getCrc(data)]);
}

/** Verify CRC on a Modbus RTU frame. Returns true if valid. */
export function verifyCrc(frame: Buffer): boolean {
  if (frame.length < 4) return false;
  const payload = frame.subarray(0, frame.length - 2);
  const expected = frame.subarray(frame.length - 2);
  const computed = getCrc(payload);
  return computed[0] === expected[0] && computed[1] === expected[1];
}

// ---------- Errors ----------

export const MODBUS_EXCEPTION_NAMES: Record<number, string> = {
  1: "IllegalFunction",
  2: "IllegalDataAddress",
  3: "IllegalDataValue",
  4: "ServerDeviceFailure",
  5: "Acknowledge",
  6: "ServerDeviceBusy",
  10: "GatewayPathUnavailable",
  11: "GatewayTargetDeviceFailedToRespond",
};

/** Exception response reported by the device. */
export class ModbusError extends Error {
  public readonly exceptionCode: number;
  constructor(exceptionCode: number) {
    const name =
      MODBUS_EXCEPTION_NAMES[exceptionCode] ??
      `UnknownException(${exceptionCode})`;
    super(`Modbus exception: ${name}`);
    this.name = "ModbusError";
    this.exceptionCode = exceptionCode;
  }
}

/** Response that is not a well-formed answer to the request. */
export class FrameError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FrameError";
  }
}

// ---------- Request PDU builders ----------

export const FC_READ_HOLDING_REGISTERS = 0x03;
export const FC_WRITE_SINGLE_REGISTER = 0x06;
export const FC_WRITE_MULTIPLE_REGISTERS = 0x10;

/** FC 3 – Read Holding Registers */
export function readHoldingRegisters(startAddr: number, quantity: number): Buffer {
  const pdu = Buffer.alloc(5);
  pdu[0] = FC_READ_HOLDING_REGISTERS;
  pdu.writeUInt16BE(startAddr, 1);
  pdu.writeUInt16BE(quantity, 3);
  return pdu;
}

/** FC 6 – Write Single Register */
export function writeSingleRegister(addr: number, value: number): Buffer {
  const pdu = Buffer.alloc(5);
  pdu[0] = FC_WRITE_SINGLE_REGISTER;
  pdu.writeUInt16BE(addr, 1);
  pdu.writeUInt16BE(value, 3);
  return pdu;
}

/** FC 16 – Write Multiple Registers */
export function writeMultipleRegisters(startAddr: number, values: readonly number[]): Buffer {
  const quantity = values.length;
  const byteCount = quantity * 2;
  const pdu = Buffer.alloc(6 + byteCount);
  pdu[0] = FC_WRITE_MULTIPLE_REGISTERS;
  pdu.writeUInt16BE(startAddr, 1);
  pdu.writeUInt16BE(quantity, 3);
  pdu[5] = byteCount;
  for (let i = 0; i < quantity; i++) {
    pdu.writeUInt16BE(values[i], 6 + i * 2);
  }
  return pdu;
}

// ---------- ADU framing ----------

/** RTU frame: unit id, PDU, CRC. */
export function buildRtuFrame(unitId: number, pdu: Buffer): Buffer {
  return addCrc(Buffer.concat([Buffer.from([unitId]), pdu]));
}

export const MBAP_HEADER_LENGTH = 7;

/** TCP frame: MBAP header (transaction id, protocol 0, length, unit id) and PDU. */
export function buildTcpFrame(
  transactionId: number,
  unitId: number,
  pdu: Buffer
): Buffer {
  const header = Buffer.alloc(MBAP_HEADER_LENGTH);
  header.writeUInt16BE(transactionId, 0);
  header.writeUInt16BE(0, 2);
  header.writeUInt16BE(pdu.length + 1, 4);
  header[6] = unitId;
  return Buffer.concat([header, pdu]);
}

export interface MbapHeader {
  transactionId: number;
  protocolId: number;
  /** Byte count of unit id plus PDU */
  length: number;
  unitId: number;
}

export function parseMbapHeader(buffer: Buffer): MbapHeader {
  if (buffer.length < MBAP_HEADER_LENGTH) {
    throw new FrameError(`MBAP header too short: ${buffer.length} bytes`);
  }
  return {
    transactionId: buffer.readUInt16BE(0),
    protocolId: buffer.readUInt16BE(2),
    length: buffer.readUInt16BE(4),
    unitId: buffer[6],
  };
}

/**
 * Length of the RTU response frame at the start of `buffer`, or undefined
 * while too few bytes have arrived to tell.
 */
export function rtuFrameLength(buffer: Buffer): number | undefined {
  if (buffer.length < 2) return undefined;
  const fc = buffer[1];
  if (fc & 0x80) return 5;
  switch (fc) {
    case FC_READ_HOLDING_REGISTERS:
      return buffer.length < 3 ? undefined : 5 + buffer[2];
    case FC_WRITE_SINGLE_REGISTER:
    case FC_WRITE_MULTIPLE_REGISTERS:
      return 8;
    default:
      throw new FrameError(`Unsupported Modbus function code: 0x${fc.toString(16)}`);
  }
}

// ---------- Response parsing ----------

/**
 * Parse a response PDU against the request PDU it answers.
 *
 * Throws `ModbusError` for exception responses and `FrameError` when the
 * response does not match the request.
 *
 * @returns Register values for reads, an empty array for writes
 */
export function parseResponsePdu(response: Buffer, request: Buffer): number[] {
  const requestFc = request[0];
  const responseFc = response[0];

  if (response.length < 2) {
    throw new FrameError(`Response PDU too short: ${response.length} bytes`);
  }
  if (responseFc === (requestFc | 0x80)) {
    throw new ModbusError(response[1]);
  }
  if (responseFc !== requestFc) {
    throw new FrameError(
      `Function code mismatch: sent 0x${requestFc.toString(16)}, got 0x${responseFc.toString(16)}`
    );
  }

  switch (responseFc) {
    case FC_READ_HOLDING_REGISTERS: {
      const quantity = request.readUInt16BE(3);
      const byteCount = response[1];
      if (byteCount !== quantity * 2 || response.length !== 2 + byteCount) {
        throw new FrameError(
          `Expected ${quantity * 2} data bytes, got byte count ${byteCount} in ${response.length - 2}`
        );
      }
      const values: number[] = [];
      for (let i = 0; i < quantity; i++) {
        values.push(response.readUInt16BE(2 + i * 2));
      }
      return values;
    }
    case FC_WRITE_SINGLE_REGISTER:
    case FC_WRITE_MULTIPLE_REGISTERS: {
      // Both echo the address and the value (FC 6) or quantity (FC 16)
      if (response.length !== 5 || !response.subarray(1, 5).equals(request.subarray(1, 5))) {
        throw new FrameError("Write response does not echo the request");
      }
      return [];
    }
    default:
      throw new FrameError(`Unsupported Modbus function code: 0x${responseFc.toString(16)}`);
  }
}

/** Verify and unwrap an RTU response frame, then parse its PDU. */
export function parseRtuResponse(
  frame: Buffer,
  request: Buffer,
  unitId: number
): number[] {
  if (!verifyCrc(frame)) {
    throw new FrameError("Modbus response CRC verification failed");
  }
  if (frame[0] !== unitId) {
    throw new FrameError(`Response from unit ${frame[0]}, expected ${unitId}`);
  }
  return parseResponsePdu(frame.subarray(1, frame.length - 2), request);
}
