/**
 * AC-THOR device facade: typed getters over the latest snapshot and
 * setters that encode before writing through the poller's lock.
 */

import {
  createActhorProfile,
  formatFirmware,
  IDENTITY_SPAN,
  parseIdentity,
  statusCategory,
  utcCorrection,
  type ActhorField,
  type ActhorProfile,
  type DeviceIdentity,
  type StatusCategory,
} from "./acthor.js";
import {
  encodeWrite,
  isBitfieldValue,
  isEnumValue,
  type BitfieldValue,
  type DomainValue,
  type EncodableValue,
  type EnumValue,
} from "./codec.js";
import type { DeviceOptions } from "./config.js";
import { EncodeError, FacadeError } from "./errors.js";
import { resolveLogger, type Logger } from "./logger.js";
import {
  Poller,
  type DeviceSnapshot,
  type RunOptions,
} from "./poller.js";
import type { RegisterField } from "./registers.js";
import { Session } from "./session.js";
import { TcpTransport } from "./transport.js";

export type Unit = 1 | 2 | 3;

export interface TemperatureRange {
  min: number;
  max: number;
}

export interface RoomHeatingSettings {
  max: number;
  minDay: number;
  minNight: number;
}

export interface LegionellaSettings {
  intervalDays: number;
  startHour: number;
  temperature: number;
  enabled: boolean;
}

export interface PowerStage {
  /** Output power of the power stage in W */
  power: number;
  /** Active output, 0 when off */
  output: number;
  relayOut2: boolean;
  relayOut3: boolean;
}

export interface DeviceClock {
  hour: number;
  minute: number;
  second: number;
  /** Configured time zone; undefined for an unknown correction index */
  zone: string | undefined;
  utcOffsetMinutes: number | undefined;
  dst: boolean;
}

const HOT_WATER_FIELDS: Record<Unit, { min: ActhorField; max: ActhorField }> = {
  1: { min: "hotWater1Min", max: "hotWater1Max" },
  2: { min: "hotWater2Min", max: "hotWater2Max" },
  3: { min: "hotWater3Min", max: "hotWater3Max" },
};

const ROOM_HEATING_FIELDS: Record<
  Unit,
  { max: ActhorField; minDay: ActhorField; minNight: ActhorField }
> = {
  1: { max: "roomHeating1Max", minDay: "roomHeating1MinDay", minNight: "roomHeating1MinNight" },
  2: { max: "roomHeating2Max", minDay: "roomHeating2MinDay", minNight: "roomHeating2MinNight" },
  3: { max: "roomHeating3Max", minDay: "roomHeating3MinDay", minNight: "roomHeating3MinNight" },
};

const TEMPERATURE_FIELDS: readonly ActhorField[] = [
  "temperature1",
  "temperature2",
  "temperature3",
  "temperature4",
  "temperature5",
  "temperature6",
  "temperature7",
  "temperature8",
];

/** Read the identity span of a connected session. */
export async function readIdentity(session: Session): Promise<DeviceIdentity> {
  const [result] = await session.read([IDENTITY_SPAN]);
  return parseIdentity(result.words);
}

export class ActhorDevice {
  public readonly session: Session;
  public readonly poller: Poller<ActhorField>;
  public readonly profile: ActhorProfile;
  public readonly staleAfter: number | undefined;

  private log: Logger;

  private constructor(session: Session, profile: ActhorProfile, options: DeviceOptions) {
    this.session = session;
    this.profile = profile;
    this.staleAfter = options.staleAfter;
    this.log = resolveLogger(options);
    this.poller = new Poller(profile.map, session, options);
  }

  /**
   * Connect to a device over Modbus TCP, identify it and take a first
   * snapshot.
   */
  static async connect(host: string, options: DeviceOptions = {}): Promise<ActhorDevice> {
    const transport = new TcpTransport(host, options);
    const session = new Session(transport, options);
    return ActhorDevice.fromSession(session, options);
  }

  /**
   * Identify the device behind `session` and take a first snapshot. The
   * device owns the session from here on and closes it on failure.
   */
  static async fromSession(
    session: Session,
    options: DeviceOptions = {}
  ): Promise<ActhorDevice> {
    const log = resolveLogger(options);
    try {
      await session.connect();
      const identity = await readIdentity(session);
      log.debug(
        `Identified ${identity.serialNumber} running ${formatFirmware(identity.firmware)}`
      );
      const device = new ActhorDevice(session, createActhorProfile(identity), options);
      await device.refresh();
      return device;
    } catch (err) {
      try {
        await session.close();
      } catch (closeErr) {
        log.debug(`Error while closing session: ${String(closeErr)}`);
      }
      throw err;
    }
  }

  get model(): string {
    return this.profile.map.model;
  }

  get serialNumber(): string {
    return this.profile.identity.serialNumber;
  }

  /** Latest snapshot; its timestamp tells how old the getters' data is. */
  get snapshot(): DeviceSnapshot<ActhorField> | null {
    return this.poller.latest;
  }

  // ---------- Polling ----------

  /** Poll once and return the new snapshot. */
  async refresh(): Promise<DeviceSnapshot<ActhorField>> {
    return this.poller.pollOnce();
  }

  run(options: RunOptions<ActhorField> = {}): Promise<void> {
    return this.poller.run(options);
  }

  async close(): Promise<void> {
    this.poller.stop();
    await this.session.close();
  }

  // ---------- Snapshot access ----------

  private value(name: ActhorField): DomainValue {
    const snapshot = this.poller.latest;
    if (!snapshot) {
      throw new FacadeError("no-snapshot", "No snapshot has been polled yet");
    }
    if (this.staleAfter !== undefined && snapshot.age() > this.staleAfter) {
      throw new FacadeError(
        "stale",
        `Snapshot is ${snapshot.age()} ms old, limit is ${this.staleAfter} ms`
      );
    }
    const reading = snapshot.get(name);
    if (!reading.valid || reading.value === null) {
      throw new FacadeError("unavailable", `${name} is not available on ${this.model}`);
    }
    return reading.value;
  }

  private number(name: ActhorField): number {
    const value = this.value(name);
    if (typeof value !== "number") {
      throw new FacadeError("type", `${name} is not numeric`);
    }
    return value;
  }

  private flag(name: ActhorField): boolean {
    const value = this.value(name);
    if (typeof value !== "boolean") {
      throw new FacadeError("type", `${name} is not a flag`);
    }
    return value;
  }

  private enumValue(name: ActhorField): EnumValue {
    const value = this.value(name);
    if (!isEnumValue(value)) {
      throw new FacadeError("type", `${name} is not an enumeration`);
    }
    return value;
  }

  private bits(name: ActhorField): BitfieldValue {
    const value = this.value(name);
    if (!isBitfieldValue(value)) {
      throw new FacadeError("type", `${name} is not a bitfield`);
    }
    return value;
  }

  private available(name: ActhorField): boolean {
    return this.profile.map.isAvailable(name);
  }

  // ---------- Getters ----------

  /** Power setpoint in W. In multi-mode the sum of all units. */
  get powerWatts(): number {
    return this.number("power");
  }

  /** 32-bit power setpoint in W, for systems above 65535 W. */
  get power32Watts(): number {
    return this.number("power32");
  }

  get maxPowerWatts(): number {
    return this.number("maxPower");
  }

  /** Largest power currently possible, including sub-devices. */
  get maxPowerAbsWatts(): number {
    return this.number("maxPowerAbs");
  }

  /** Temperatures of the sensors this device supports, in °C. */
  get temperatures(): number[] {
    return TEMPERATURE_FIELDS.filter((f) => this.available(f)).map((f) =>
      this.number(f)
    );
  }

  get chipTemperature(): number {
    return this.number("temperatureChip");
  }

  hotWaterRange(unit: Unit = 1): TemperatureRange {
    const fields = HOT_WATER_FIELDS[unit];
    return { min: this.number(fields.min), max: this.number(fields.max) };
  }

  roomHeating(circuit: Unit = 1): RoomHeatingSettings {
    const fields = ROOM_HEATING_FIELDS[circuit];
    return {
      max: this.number(fields.max),
      minDay: this.number(fields.minDay),
      minNight: this.number(fields.minNight),
    };
  }

  get status(): { code: number; category: StatusCategory } {
    const code = this.number("status");
    return { code, category: statusCategory(code) };
  }

  get powerTimeoutSeconds(): number {
    return this.number("powerTimeout");
  }

  get boostMode(): EnumValue {
    return this.enumValue("boostMode");
  }

  get boostActive(): boolean {
    return this.flag("boostActive");
  }

  get boostTimes(): { start: number; stop: number }[] {
    return [
      { start: this.number("boostTime1Start"), stop: this.number("boostTime1Stop") },
      { start: this.number("boostTime2Start"), stop: this.number("boostTime2Stop") },
    ];
  }

  get operationMode(): EnumValue {
    return this.enumValue("operationMode");
  }

  get operationState(): EnumValue {
    return this.enumValue("operationState");
  }

  get controlType(): EnumValue {
    return this.enumValue("controlType");
  }

  get updateStatus(): EnumValue {
    return this.enumValue("updateStatus");
  }

  get legionella(): LegionellaSettings {
    return {
      intervalDays: this.number("legionellaInterval"),
      startHour: this.number("legionellaStart"),
      temperature: this.number("legionellaTemperature"),
      enabled: this.flag("legionellaEnabled"),
    };
  }

  /** Load state of outputs 1 to 3; outputs 2 and 3 exist on 9s devices only. */
  get loadState(): [boolean, boolean, boolean] {
    const bits = this.bits("loadState");
    return [bits.output1 === true, bits.output2 === true, bits.output3 === true];
  }

  get night(): boolean {
    return this.flag("night");
  }

  get deviceState(): boolean {
    return this.flag("deviceState");
  }

  /** Voltages in V of the phases this device measures. */
  get phaseVoltages(): number[] {
    const fields: ActhorField[] = ["voltageL1", "voltageL2", "voltageL3"];
    return fields.filter((f) => this.available(f)).map((f) => this.number(f));
  }

  /** Currents in A of the phases this device measures. */
  get phaseCurrents(): number[] {
    const fields: ActhorField[] = ["currentL1", "currentL2", "currentL3"];
    return fields.filter((f) => this.available(f)).map((f) => this.number(f));
  }

  get outputVoltage(): number {
    return this.number("outputVoltage");
  }

  get outputPowers(): [number, number, number] {
    return [
      this.number("outputPower1"),
      this.number("outputPower2"),
      this.number("outputPower3"),
    ];
  }

  get frequencyHz(): number {
    return this.number("frequency");
  }

  /** Meter power in W; negative values are feed-in. */
  get meterPowerWatts(): number {
    return this.available("meterPower32")
      ? this.number("meterPower32")
      : this.number("meterPower");
  }

  get powerStage(): PowerStage {
    const bits = this.bits("powerStage");
    return {
      power: typeof bits.power === "number" ? bits.power : 0,
      output: typeof bits.output === "number" ? bits.output : 0,
      relayOut2: bits.relayOut2 === true,
      relayOut3: bits.relayOut3 === true,
    };
  }

  get devicePowers(): { total: number; solar: number; grid: number } {
    return {
      total: this.number("devicePowerTotal"),
      solar: this.number("devicePowerSolar"),
      grid: this.number("devicePowerGrid"),
    };
  }

  get pwmOutPercent(): number {
    return this.number("pwmOut");
  }

  get clock(): DeviceClock {
    const correction = utcCorrection(this.number("utcCorrection"));
    return {
      hour: this.number("clockHour"),
      minute: this.number("clockMinute"),
      second: this.number("clockSecond"),
      zone: correction?.zone,
      utcOffsetMinutes: correction?.offsetMinutes,
      dst: this.flag("dstCorrection"),
    };
  }

  /** Control firmware version as reported in the latest snapshot, e.g. "a0010103". */
  get firmwareVersion(): string {
    return formatFirmware({
      version: this.number("controlFirmwareVersion"),
      subVersion: this.number("controlFirmwareSubVersion"),
    });
  }

  // ---------- Setters ----------

  /** Field to write; fails before any I/O when the device lacks it. */
  private target(name: ActhorField): RegisterField<ActhorField> {
    if (!this.available(name)) {
      throw new FacadeError("unavailable", `${name} is not available on ${this.model}`);
    }
    return this.profile.map.require(name);
  }

  private async write(name: ActhorField, value: EncodableValue): Promise<void> {
    const field = this.target(name);
    const words = encodeWrite(field, value, this.profile.map.wordOrder);
    await this.poller.exclusive(() => this.session.write(field, words));
  }

  /**
   * Set the power in W. Values above 65535 go to the 32-bit register pair.
   */
  async setPower(watts: number): Promise<void> {
    if (!Number.isInteger(watts)) {
      throw new EncodeError("power", "type-mismatch", `${watts} is not a whole number of watts`);
    }
    if (watts > 0xffff) {
      await this.write("power32", watts);
    } else {
      await this.write("power", watts);
    }
  }

  /**
   * Set the hot water range of `unit` in °C (5.0 to 90.0, one decimal).
   * An undefined bound is left unchanged. Both bounds are validated before
   * either is written.
   *
   * Writes go to non-volatile memory; avoid calling this more than daily.
   */
  async setHotWaterRange(
    range: { min?: number; max?: number },
    unit: Unit = 1
  ): Promise<void> {
    const map = this.profile.map;
    const writes: { field: RegisterField<ActhorField>; words: number[] }[] = [];
    const fields = HOT_WATER_FIELDS[unit];
    for (const [name, value] of [
      [fields.max, range.max],
      [fields.min, range.min],
    ] as const) {
      if (value === undefined) continue;
      const field = this.target(name);
      writes.push({ field, words: encodeWrite(field, value, map.wordOrder) });
    }

    await this.poller.exclusive(async () => {
      for (const { field, words } of writes) {
        this.log.debug(`Writing ${field.name}: ${words.join(",")}`);
        await this.session.write(field, words);
      }
    });
  }

  /** Set the boost mode by tag ("off", "on", "relayBoostOn") or raw value. */
  async setBoostMode(mode: string | number): Promise<void> {
    await this.write("boostMode", mode);
  }

  async setBoostActive(active: boolean): Promise<void> {
    await this.write("boostActive", active);
  }

  async setPowerTimeout(seconds: number): Promise<void> {
    await this.write("powerTimeout", seconds);
  }
}
