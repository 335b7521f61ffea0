/**
 * mypv-modbus – A TypeScript library for my-PV AC-THOR power diverters
 * and water heating controllers over Modbus.
 */

// Device facade
export { ActhorDevice, readIdentity } from "./device.js";
export type {
  Unit,
  TemperatureRange,
  RoomHeatingSettings,
  LegionellaSettings,
  PowerStage,
  DeviceClock,
} from "./device.js";

// Polling
export { Poller, DeviceSnapshot, pollOnce, buildSnapshot } from "./poller.js";
export type { FieldReading, PollOnceOptions, RunOptions } from "./poller.js";

// Session
export { Session, classify } from "./session.js";
export type {
  ConnectionState,
  SpanWords,
  StateChangeListener,
} from "./session.js";

// Transport
export { TcpTransport, NoSocketAvailableError } from "./transport.js";
export type { Transport } from "./transport.js";

// Register map and codec
export {
  RegisterMap,
  defineField,
  coalesceReads,
  spanCovers,
  MODBUS_MAX_READ,
  UNITY,
} from "./registers.js";
export type {
  Encoding,
  WordOrder,
  Scale,
  BitSpec,
  RegisterField,
  FieldOptions,
  ReadSpan,
  CoalesceOptions,
  RegisterMapOptions,
} from "./registers.js";
export {
  decode,
  encode,
  encodeWrite,
  isEnumValue,
  isBitfieldValue,
  twosComplement,
  BITFIELD_REST,
} from "./codec.js";
export type {
  EnumValue,
  BitfieldValue,
  DomainValue,
  EncodableValue,
} from "./codec.js";

// AC-THOR profile
export {
  createActhorProfile,
  createActhorRegisterMap,
  identifyModel,
  resolveFeatures,
  parseIdentity,
  formatFirmware,
  statusCategory,
  utcCorrection,
  IDENTITY_SPAN,
  BOOST_MODES,
  UPDATE_STATUSES,
  OPERATION_MODES,
  OPERATION_STATES,
  CONTROL_TYPES,
} from "./acthor.js";
export type {
  ActhorField,
  ActhorFeatures,
  ActhorModel,
  ActhorProfile,
  DeviceIdentity,
  FirmwareVersion,
  StatusCategory,
  UtcCorrection,
} from "./acthor.js";

// Errors
export {
  ConnectError,
  RequestError,
  BusyError,
  TimeoutError,
  ProtocolError,
  TransportError,
  DecodeError,
  EncodeError,
  RegisterMapError,
  UnknownDeviceModelError,
  PollError,
  FacadeError,
} from "./errors.js";
export type { EncodeFailure, FacadeFailure } from "./errors.js";

// Configuration and logging
export {
  DEFAULT_PORT,
  DEFAULT_UNIT_ID,
  DEFAULT_TIMEOUT,
  DEFAULT_DEGRADED_THRESHOLD,
  DEFAULT_INTERVAL,
  DEFAULT_MAX_SPAN,
  DEFAULT_RETRY_POLICY,
  parseNetloc,
} from "./config.js";
export type {
  TransportOptions,
  SessionOptions,
  PollerOptions,
  DeviceOptions,
  RetryPolicy,
} from "./config.js";
export { nullLogger, createConsoleLogger } from "./logger.js";
export type { Logger } from "./logger.js";

// Modbus framing
export {
  crc16,
  getCrc,
  addCrc,
  verifyCrc,
  readHoldingRegisters,
  writeSingleRegister,
  writeMultipleRegisters,
  buildRtuFrame,
  buildTcpFrame,
  parseResponsePdu,
  parseRtuResponse,
  ModbusError,
  FrameError,
} from "./modbus.js";

// Discovery
export {
  discover,
  encodeRequest,
  decodeRequest,
  encodeReply,
  decodeReply,
  DeviceIdentification,
  DiscoveryFrameError,
  DEVICE_NAMES,
  DISCOVERY_PORT,
  REQUEST_LENGTH,
  REPLY_LENGTH,
} from "./discovery.js";
export type {
  DiscoveryRequest,
  DiscoveryReply,
  DiscoverOptions,
} from "./discovery.js";
