/**
 * AC-THOR register profile: field table, enumerations, device
 * identification and the firmware feature gates that decide which fields
 * a given device provides.
 */

import { readFileSync } from "node:fs";
import { UnknownDeviceModelError } from "./errors.js";
import {
  defineField,
  RegisterMap,
  type ReadSpan,
  type Scale,
} from "./registers.js";

// ---------- Scales and tags ----------

const TENTH: Scale = { numerator: 1, denominator: 10 };
const THOUSANDTH: Scale = { numerator: 1, denominator: 1000 };

export const BOOST_MODES: Readonly<Record<number, string>> = {
  0: "off",
  1: "on",
  3: "relayBoostOn",
};

export const UPDATE_STATUSES: Readonly<Record<number, string>> = {
  0: "upToDate",
  1: "updateAvailable",
  2: "downloadIni",
  3: "downloadBin",
  4: "downloadOtherFiles",
  5: "downloadInterrupt",
  10: "waitingForInstallation",
};

export const OPERATION_MODES: Readonly<Record<number, string>> = {
  1: "waterHeating3kW",
  2: "waterHeatingStratified",
  3: "waterHeating6kW",
  4: "waterHeatingHeatPump",
  5: "waterHeatingRoomHeating",
  6: "roomHeating1Circuit",
  7: "waterHeatingPwm",
  8: "frequencyMode",
};

export const OPERATION_STATES: Readonly<Record<number, string>> = {
  0: "standby",
  1: "heatingWithPvExcess",
  2: "boostBackupMode",
  3: "temperatureSetpointReached",
  4: "noControlSignal",
  5: "redCrossFlashes",
};

// ---------- Data file ----------

export interface ActhorModel {
  serialPrefix: string;
  name: string;
  /** Three-phase "9s" variant */
  nineS: boolean;
}

export interface UtcCorrection {
  zone: string;
  offsetMinutes: number;
}

interface ActhorData {
  models: ActhorModel[];
  controlTypes: Record<number, string>;
  utcCorrections: UtcCorrection[];
}

const DATA_FILE = new URL("../data/acthor.json", import.meta.url);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isModel(value: unknown): value is ActhorModel {
  return (
    isRecord(value) &&
    typeof value.serialPrefix === "string" &&
    typeof value.name === "string" &&
    typeof value.nineS === "boolean"
  );
}

function isUtcCorrection(value: unknown): value is UtcCorrection {
  return (
    isRecord(value) &&
    typeof value.zone === "string" &&
    typeof value.offsetMinutes === "number"
  );
}

function loadData(): ActhorData {
  const raw: unknown = JSON.parse(readFileSync(DATA_FILE, "utf8"));
  if (
    !isRecord(raw) ||
    !Array.isArray(raw.models) ||
    !raw.models.every(isModel) ||
    !isRecord(raw.controlTypes) ||
    !Array.isArray(raw.utcCorrections) ||
    !raw.utcCorrections.every(isUtcCorrection)
  ) {
    throw new Error(`Malformed device data in ${DATA_FILE.pathname}`);
  }

  const controlTypes: Record<number, string> = {};
  for (const [key, tag] of Object.entries(raw.controlTypes)) {
    if (typeof tag !== "string" || !/^\d+$/.test(key)) {
      throw new Error(`Malformed control type ${key} in ${DATA_FILE.pathname}`);
    }
    controlTypes[Number(key)] = tag;
  }

  return {
    models: raw.models,
    controlTypes,
    utcCorrections: raw.utcCorrections,
  };
}

const DATA = loadData();

export const CONTROL_TYPES: Readonly<Record<number, string>> = Object.freeze(
  DATA.controlTypes
);

/** Time zone selected by the device's UTC correction register. */
export function utcCorrection(index: number): UtcCorrection | undefined {
  return DATA.utcCorrections[index];
}

// ---------- Field table ----------

const TEMPERATURE = { unit: "°C", scale: TENTH } as const;
const SETPOINT = {
  unit: "°C",
  scale: TENTH,
  writable: true,
  range: { min: 5, max: 90 },
} as const;

const ACTHOR_FIELDS = [
  defineField("power", 1000, "u16", {
    unit: "W",
    writable: true,
    range: { min: 0, max: 0xffff },
  }),
  defineField("temperature1", 1001, "i16", TEMPERATURE),
  defineField("hotWater1Max", 1002, "u16", SETPOINT),
  defineField("status", 1003, "u16"),
  defineField("powerTimeout", 1004, "u16", { unit: "s", writable: true }),
  defineField("boostMode", 1005, "enum", { tags: BOOST_MODES, writable: true }),
  defineField("hotWater1Min", 1006, "u16", SETPOINT),
  defineField("boostTime1Start", 1007, "u16", { unit: "h" }),
  defineField("boostTime1Stop", 1008, "u16", { unit: "h" }),
  defineField("clockHour", 1009, "u16"),
  defineField("clockMinute", 1010, "u16"),
  defineField("clockSecond", 1011, "u16"),
  defineField("boostActive", 1012, "bool", { writable: true }),
  defineField("deviceNumber", 1013, "u16"),
  defineField("maxPower", 1014, "u16", { unit: "W" }),
  defineField("temperatureChip", 1015, "i16", TEMPERATURE),
  defineField("controlFirmwareVersion", 1016, "u16"),
  defineField("psFirmwareVersion", 1017, "u16"),
  // 1018-1025: serial number, read with the identity span
  defineField("boostTime2Start", 1026, "u16", { unit: "h" }),
  defineField("boostTime2Stop", 1027, "u16", { unit: "h" }),
  defineField("controlFirmwareSubVersion", 1028, "u16"),
  defineField("updateStatus", 1029, "enum", { tags: UPDATE_STATUSES }),
  defineField("temperature2", 1030, "i16", TEMPERATURE),
  defineField("temperature3", 1031, "i16", TEMPERATURE),
  defineField("temperature4", 1032, "i16", TEMPERATURE),
  defineField("temperature5", 1033, "i16", TEMPERATURE),
  defineField("temperature6", 1034, "i16", TEMPERATURE),
  defineField("temperature7", 1035, "i16", TEMPERATURE),
  defineField("temperature8", 1036, "i16", TEMPERATURE),
  defineField("hotWater2Max", 1037, "u16", SETPOINT),
  defineField("hotWater3Max", 1038, "u16", SETPOINT),
  defineField("hotWater2Min", 1039, "u16", SETPOINT),
  defineField("hotWater3Min", 1040, "u16", SETPOINT),
  defineField("roomHeating1Max", 1041, "u16", TEMPERATURE),
  defineField("roomHeating2Max", 1042, "u16", TEMPERATURE),
  defineField("roomHeating3Max", 1043, "u16", TEMPERATURE),
  defineField("roomHeating1MinDay", 1044, "u16", TEMPERATURE),
  defineField("roomHeating2MinDay", 1045, "u16", TEMPERATURE),
  defineField("roomHeating3MinDay", 1046, "u16", TEMPERATURE),
  defineField("roomHeating1MinNight", 1047, "u16", TEMPERATURE),
  defineField("roomHeating2MinNight", 1048, "u16", TEMPERATURE),
  defineField("roomHeating3MinNight", 1049, "u16", TEMPERATURE),
  defineField("night", 1050, "bool"),
  defineField("utcCorrection", 1051, "u16"),
  defineField("dstCorrection", 1052, "bool"),
  defineField("legionellaInterval", 1053, "u16", { unit: "d" }),
  defineField("legionellaStart", 1054, "u16", { unit: "h" }),
  defineField("legionellaTemperature", 1055, "u16", { unit: "°C" }),
  defineField("legionellaEnabled", 1056, "bool"),
  defineField("stratificationFlag", 1057, "bool"),
  defineField("relay1Status", 1058, "bool"),
  defineField("loadState", 1059, "bitfield", {
    bits: {
      output1: { shift: 0, width: 1 },
      output2: { shift: 1, width: 1 },
      output3: { shift: 2, width: 1 },
    },
  }),
  defineField("loadNominalPower", 1060, "u16", { unit: "W" }),
  defineField("voltageL1", 1061, "u16", { unit: "V" }),
  defineField("currentL1", 1062, "u16", { unit: "A", scale: TENTH }),
  defineField("outputVoltage", 1063, "u16", { unit: "V" }),
  defineField("frequency", 1064, "u16", { unit: "Hz", scale: THOUSANDTH }),
  defineField("operationMode", 1065, "enum", { tags: OPERATION_MODES }),
  defineField("voltageL2", 1067, "u16", { unit: "V" }),
  defineField("currentL2", 1068, "u16", { unit: "A", scale: TENTH }),
  defineField("meterPower", 1069, "i16", { unit: "W" }),
  defineField("controlType", 1070, "enum", { tags: CONTROL_TYPES }),
  defineField("maxPowerAbs", 1071, "u16", { unit: "W" }),
  defineField("voltageL3", 1072, "u16", { unit: "V" }),
  defineField("currentL3", 1073, "u16", { unit: "A", scale: TENTH }),
  defineField("outputPower1", 1074, "u16", { unit: "W" }),
  defineField("outputPower2", 1075, "u16", { unit: "W" }),
  defineField("outputPower3", 1076, "u16", { unit: "W" }),
  defineField("operationState", 1077, "enum", { tags: OPERATION_STATES }),
  defineField("power32", 1078, "u32", {
    unit: "W",
    writable: true,
    range: { min: 0, max: 0xffffffff },
  }),
  defineField("powerStage", 1080, "bitfield", {
    bits: {
      power: { shift: 0, width: 12 },
      output: { shift: 12, width: 2 },
      relayOut2: { shift: 14, width: 1 },
      relayOut3: { shift: 15, width: 1 },
    },
  }),
  defineField("deviceState", 1081, "bool"),
  defineField("devicePowerTotal", 1082, "u16", { unit: "W" }),
  defineField("devicePowerSolar", 1083, "u16", { unit: "W" }),
  defineField("devicePowerGrid", 1084, "u16", { unit: "W" }),
  defineField("pwmOut", 1085, "u16", { unit: "%" }),
  defineField("meterPower32", 1087, "i32", { unit: "W" }),
];

export type ActhorField = (typeof ACTHOR_FIELDS)[number]["name"];

export const REGISTER_BASE = 1000;
/** Registers 1000-1088 as documented. */
export const DOCUMENTED_REGISTERS = 89;

// ---------- Identity ----------

export interface FirmwareVersion {
  version: number;
  subVersion: number;
}

export interface DeviceIdentity {
  serialNumber: string;
  firmware: FirmwareVersion;
  psFirmwareVersion: number;
}

/** Control firmware, PS firmware, serial number and firmware sub-version. */
export const IDENTITY_SPAN: ReadSpan = { address: 1016, count: 13 };

export function parseIdentity(words: readonly number[]): DeviceIdentity {
  if (words.length !== IDENTITY_SPAN.count) {
    throw new Error(
      `Identity span has ${words.length} registers, expected ${IDENTITY_SPAN.count}`
    );
  }
  const serial = Buffer.alloc(16);
  for (let i = 0; i < 8; i++) {
    serial.writeUInt16BE(words[2 + i], i * 2);
  }
  return {
    serialNumber: serial.toString("ascii").replace(/\0+$/, ""),
    firmware: { version: words[0], subVersion: words[12] },
    psFirmwareVersion: words[1],
  };
}

/** e.g. "a0010103" */
export function formatFirmware(firmware: FirmwareVersion): string {
  const version = String(firmware.version).padStart(5, "0");
  const sub = String(firmware.subVersion).padStart(2, "0");
  return `a${version}${sub}`;
}

function firmwareAtLeast(
  firmware: FirmwareVersion,
  version: number,
  subVersion: number
): boolean {
  return (
    firmware.version > version ||
    (firmware.version === version && firmware.subVersion >= subVersion)
  );
}

export function identifyModel(serialNumber: string): ActhorModel {
  const model = DATA.models.find((m) => serialNumber.startsWith(m.serialPrefix));
  if (!model) {
    throw new UnknownDeviceModelError(serialNumber);
  }
  return model;
}

// ---------- Feature gates ----------

export interface ActhorFeatures {
  /** Registers readable from 1000 on. Firmware 101 stops at 1080. */
  readableRegisters: number;
  temperatureSensors: number;
  hotWaterUnits: number;
  loadStateOutputs: boolean;
  threePhases: boolean;
  powerOutputs: boolean;
  powerStage: boolean;
  maxPowerAbs: boolean;
  devicePowers: boolean;
  pwmOut: boolean;
  meterPower32: boolean;
}

export function resolveFeatures(
  model: ActhorModel,
  firmware: FirmwareVersion
): ActhorFeatures {
  return {
    readableRegisters: firmware.version === 101 ? 81 : DOCUMENTED_REGISTERS,
    // The manual lists sensors 5-8 and hot water units 2 and 3 as not available.
    temperatureSensors: 4,
    hotWaterUnits: 1,
    loadStateOutputs: firmwareAtLeast(firmware, 202, 1),
    threePhases: model.nineS,
    powerOutputs: model.nineS,
    powerStage: model.nineS,
    maxPowerAbs: firmwareAtLeast(firmware, 102, 5),
    devicePowers: firmwareAtLeast(firmware, 203, 3),
    pwmOut: firmwareAtLeast(firmware, 205, 0),
    meterPower32: firmwareAtLeast(firmware, 210, 2),
  };
}

function unavailableFields(features: ActhorFeatures): Set<ActhorField> {
  const names = new Set<ActhorField>();
  const gate = (enabled: boolean, ...fields: ActhorField[]) => {
    if (!enabled) fields.forEach((f) => names.add(f));
  };

  const temperatures: ActhorField[] = [
    "temperature1",
    "temperature2",
    "temperature3",
    "temperature4",
    "temperature5",
    "temperature6",
    "temperature7",
    "temperature8",
  ];
  temperatures
    .slice(features.temperatureSensors)
    .forEach((f) => names.add(f));
  gate(features.hotWaterUnits >= 2, "hotWater2Min", "hotWater2Max");
  gate(features.hotWaterUnits >= 3, "hotWater3Min", "hotWater3Max");
  gate(features.threePhases, "voltageL2", "currentL2", "voltageL3", "currentL3");
  gate(features.powerOutputs, "outputPower1", "outputPower2", "outputPower3");
  gate(features.powerStage, "powerStage");
  gate(features.maxPowerAbs, "maxPowerAbs");
  gate(features.readableRegisters >= 82, "deviceState");
  gate(
    features.devicePowers,
    "devicePowerTotal",
    "devicePowerSolar",
    "devicePowerGrid"
  );
  gate(features.pwmOut, "pwmOut");
  gate(features.meterPower32, "meterPower32");

  const limit = REGISTER_BASE + features.readableRegisters;
  for (const field of ACTHOR_FIELDS) {
    if (field.address + field.wordCount > limit) names.add(field.name);
  }
  return names;
}

// ---------- Register map ----------

export interface ActhorProfile {
  model: ActhorModel;
  identity: DeviceIdentity;
  features: ActhorFeatures;
  map: RegisterMap<ActhorField>;
}

/**
 * Select the register map for an identified device.
 *
 * Throws `UnknownDeviceModelError` when the serial number matches no known
 * model.
 */
export function createActhorProfile(identity: DeviceIdentity): ActhorProfile {
  const model = identifyModel(identity.serialNumber);
  const features = resolveFeatures(model, identity.firmware);
  const map = new RegisterMap<ActhorField>(ACTHOR_FIELDS, {
    model: `${model.name} ${formatFirmware(identity.firmware)}`,
    wordOrder: "big",
    // Bridges the serial number block and the reserved registers 1066 and 1086
    maxGap: 8,
    unavailable: unavailableFields(features),
  });
  return { model, identity, features, map };
}

export function createActhorRegisterMap(
  identity: DeviceIdentity
): RegisterMap<ActhorField> {
  return createActhorProfile(identity).map;
}

// ---------- Status ----------

export type StatusCategory = "off" | "startUp" | "operation" | "error";

export function statusCategory(code: number): StatusCategory {
  if (code >= 200) return "error";
  if (code >= 9) return "operation";
  if (code >= 1) return "startUp";
  return "off";
}
