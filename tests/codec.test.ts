import { describe, it, expect } from "vitest";
import {
  decode,
  encode,
  encodeWrite,
  isEnumValue,
  isBitfieldValue,
  twosComplement,
} from "../src/codec.js";
import { defineField, type RegisterField } from "../src/registers.js";
import { DecodeError, EncodeError } from "../src/errors.js";

const tenth = { numerator: 1, denominator: 10 };

const powerWatts = defineField("power_watts", 100, "u32", { scale: tenth, unit: "W" });
const temperature = defineField("temperature", 1001, "i16", { scale: tenth, unit: "°C" });
const counter = defineField("counter", 10, "u16");
const offset = defineField("offset", 20, "i32");
const enabled = defineField("enabled", 30, "bool", { writable: true });
const mode = defineField("mode", 31, "enum", {
  tags: { 0: "off", 1: "on", 2: "auto" },
  writable: true,
});
const flags = defineField("flags", 32, "bitfield", {
  bits: {
    ready: { shift: 0, width: 1 },
    stage: { shift: 1, width: 3 },
    level: { shift: 8, width: 8 },
  },
  writable: true,
});
const setpoint = defineField("setpoint", 40, "u16", {
  range: { min: 5, max: 90 },
  writable: true,
});

function expectEncodeError(fn: () => unknown, reason: EncodeError["reason"]): void {
  let caught: unknown;
  try {
    fn();
  } catch (err) {
    caught = err;
  }
  expect(caught).toBeInstanceOf(EncodeError);
  if (caught instanceof EncodeError) {
    expect(caught.reason).toBe(reason);
  }
}

describe("twosComplement", () => {
  it("converts between signed and unsigned", () => {
    expect(twosComplement(0xffff, 16)).toBe(-1);
    expect(twosComplement(0x7fff, 16)).toBe(0x7fff);
    expect(twosComplement(0x8000, 16)).toBe(-0x8000);
    expect(twosComplement(-1, 16)).toBe(0xffff);
    expect(twosComplement(0xfffffffe, 32)).toBe(-2);
  });
});

describe("decode", () => {
  it("decodes a scaled u32", () => {
    expect(decode(powerWatts, [0x0000, 0x03e8])).toBe(100);
  });

  it("decodes signed values", () => {
    expect(decode(temperature, [0xff9c])).toBe(-10);
    expect(decode(temperature, [0x01f4])).toBe(50);
    expect(decode(offset, [0xffff, 0xfffe])).toBe(-2);
  });

  it("honours the map word order", () => {
    expect(decode(powerWatts, [0x03e8, 0x0000], "little")).toBe(100);
  });

  it("lets a field override the map word order", () => {
    const swapped = defineField("swapped", 50, "u32", { wordOrder: "little" });
    expect(decode(swapped, [0x0001, 0x0000], "big")).toBe(1);
  });

  it("decodes booleans", () => {
    expect(decode(enabled, [0])).toBe(false);
    expect(decode(enabled, [2])).toBe(true);
  });

  it("decodes known and unknown enum values", () => {
    expect(decode(mode, [1])).toEqual({ kind: "known", tag: "on", raw: 1 });
    expect(decode(mode, [7])).toEqual({ kind: "unknown", raw: 7 });
  });

  it("decodes bitfields", () => {
    expect(decode(flags, [0x0a0b])).toEqual({ ready: true, stage: 5, level: 10 });
    expect(decode(flags, [0x0000])).toEqual({ ready: false, stage: 0, level: 0 });
  });

  it("keeps undeclared bits of a bitfield", () => {
    expect(decode(flags, [0x00f1])).toEqual({
      ready: true,
      stage: 0,
      level: 0,
      rest: 0xf0,
    });
  });

  it("rejects a wrong word count", () => {
    expect(() => decode(powerWatts, [0x03e8])).toThrow(DecodeError);
    expect(() => decode(powerWatts, [0x03e8])).toThrow(
      "Cannot decode power_watts: expected 2 word(s), got 1"
    );
  });

  it("rejects values that are not 16-bit words", () => {
    expect(() => decode(counter, [0x10000])).toThrow(
      "Cannot decode counter: 65536 is not a 16-bit register value"
    );
    expect(() => decode(counter, [-1])).toThrow(DecodeError);
  });
});

describe("encode", () => {
  it("encodes scaled and signed numbers", () => {
    expect(encode(powerWatts, 100)).toEqual([0x0000, 0x03e8]);
    expect(encode(temperature, -10)).toEqual([0xff9c]);
    expect(encode(temperature, 55.5)).toEqual([555]);
    expect(encode(offset, -2)).toEqual([0xffff, 0xfffe]);
  });

  it("splits 32-bit values in the requested word order", () => {
    expect(encode(offset, 70000)).toEqual([1, 4464]);
    expect(encode(offset, 70000, "little")).toEqual([4464, 1]);
  });

  it("rounds to the nearest raw value", () => {
    expect(encode(temperature, 21.04)).toEqual([210]);
    expect(encode(temperature, -0.04)).toEqual([0]);
  });

  it("rejects values outside the raw range", () => {
    expectEncodeError(() => encode(counter, 70000), "out-of-range");
    expectEncodeError(() => encode(counter, -1), "out-of-range");
    expectEncodeError(() => encode(temperature, 3276.8), "out-of-range");
    expect(() => encode(counter, 70000)).toThrow(
      "Cannot encode counter: 70000 does not fit in u16"
    );
  });

  it("rejects values outside the declared range", () => {
    expect(encode(setpoint, 60)).toEqual([60]);
    expect(() => encode(setpoint, 91)).toThrow(
      "Cannot encode setpoint: 91 is outside 5..90"
    );
    expectEncodeError(() => encode(setpoint, 4), "out-of-range");
  });

  it("rejects non-finite numbers", () => {
    expectEncodeError(() => encode(counter, Number.NaN), "out-of-range");
    expectEncodeError(() => encode(counter, Infinity), "out-of-range");
  });

  it("rejects values of the wrong type", () => {
    expectEncodeError(() => encode(counter, "12"), "type-mismatch");
    expectEncodeError(() => encode(enabled, 1), "type-mismatch");
    expectEncodeError(() => encode(flags, 3), "type-mismatch");
  });

  it("encodes booleans", () => {
    expect(encode(enabled, true)).toEqual([1]);
    expect(encode(enabled, false)).toEqual([0]);
  });

  it("encodes enums from tags, raw numbers and decoded values", () => {
    expect(encode(mode, "auto")).toEqual([2]);
    expect(encode(mode, 1)).toEqual([1]);
    expect(encode(mode, { kind: "unknown", raw: 7 })).toEqual([7]);
    expectEncodeError(() => encode(mode, "bogus"), "unknown-tag");
    expectEncodeError(() => encode(mode, 1.5), "out-of-range");
  });

  it("encodes bitfields", () => {
    expect(encode(flags, { ready: true, stage: 5, level: 10 })).toEqual([0x0a0b]);
    expect(encode(flags, { stage: 2 })).toEqual([4]);
  });

  it("encodes undeclared bits", () => {
    expect(encode(flags, { ready: true, rest: 0x30 })).toEqual([0x31]);
    expectEncodeError(() => encode(flags, { rest: 1 }), "out-of-range");
    expect(() => encode(flags, { rest: 0x10000 })).toThrow(
      "Cannot encode flags: rest=65536 is not a set of undeclared bits"
    );
  });

  it("rejects unknown bits and sub-values that do not fit", () => {
    expectEncodeError(() => encode(flags, { other: 1 }), "type-mismatch");
    expect(() => encode(flags, { stage: 8 })).toThrow(
      "Cannot encode flags: stage=8 does not fit in 3 bit(s)"
    );
  });

  it("inverts decode", () => {
    expect(decode(temperature, encode(temperature, -12.3))).toBe(-12.3);
    expect(decode(powerWatts, encode(powerWatts, 4294967.2))).toBe(4294967.2);
    expect(decode(flags, encode(flags, { ready: false, stage: 7, level: 255 }))).toEqual({
      ready: false,
      stage: 7,
      level: 255,
    });
  });
});

describe("encodeWrite", () => {
  it("rejects read-only fields", () => {
    expectEncodeError(() => encodeWrite(temperature, 20), "read-only");
  });

  it("encodes writable fields", () => {
    expect(encodeWrite(setpoint, 60)).toEqual([60]);
  });
});

describe("value guards", () => {
  it("tells enum values from bitfields", () => {
    const enumValue = decode(mode, [2]);
    const bitsValue = decode(flags, [1]);
    expect(isEnumValue(enumValue)).toBe(true);
    expect(isBitfieldValue(enumValue)).toBe(false);
    expect(isEnumValue(bitsValue)).toBe(false);
    expect(isBitfieldValue(bitsValue)).toBe(true);
    expect(isEnumValue(3)).toBe(false);
    expect(isBitfieldValue(null)).toBe(false);
  });
});

describe("round trip", () => {
  const frequency = defineField("frequency", 50, "u16", {
    scale: { numerator: 1, denominator: 1000 },
  });

  function wordsLost(field: RegisterField): number[] {
    const lost: number[] = [];
    for (let word = 0; word <= 0xffff; word++) {
      const back = encode(field, decode(field, [word]));
      if (back.length !== 1 || back[0] !== word) lost.push(word);
    }
    return lost;
  }

  it("restores every 16-bit register value", () => {
    for (const field of [counter, frequency, temperature, mode, flags]) {
      expect(wordsLost(field)).toEqual([]);
    }
    expect(encode(enabled, decode(enabled, [0]))).toEqual([0]);
    expect(encode(enabled, decode(enabled, [1]))).toEqual([1]);
  });

  it("restores 32-bit boundary values in both word orders", () => {
    const samples = [
      [0, 0],
      [0, 1],
      [0x7fff, 0xffff],
      [0x8000, 0],
      [0xffff, 0xffff],
      [0x1234, 0x5678],
    ];
    for (const field of [powerWatts, offset]) {
      for (const words of samples) {
        expect(encode(field, decode(field, words))).toEqual(words);
        expect(encode(field, decode(field, words, "little"), "little")).toEqual(words);
      }
    }
  });
});
