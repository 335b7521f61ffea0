/**
 * Register codec: conversion between raw 16-bit register words and typed
 * domain values. Pure functions, no I/O.
 */

import { DecodeError, EncodeError } from "./errors.js";
import type {
  BitSpec,
  Encoding,
  RegisterField,
  Scale,
  WordOrder,
} from "./registers.js";

// ---------- Domain values ----------

export type EnumValue =
  | { readonly kind: "known"; readonly tag: string; readonly raw: number }
  | { readonly kind: "unknown"; readonly raw: number };

/**
 * Sub-fields of a bitfield: 1-bit sub-fields are booleans. Set bits that no
 * sub-field declares are kept under `rest`, present only when non-zero.
 */
export type BitfieldValue = Readonly<Record<string, number | boolean>>;

/** Key of a bitfield value that carries its undeclared bits. */
export const BITFIELD_REST = "rest";

export type DomainValue = number | boolean | EnumValue | BitfieldValue;

/** Values accepted by `encode`; enums also take a tag or a raw number. */
export type EncodableValue = DomainValue | string;

export function isEnumValue(value: unknown): value is EnumValue {
  return (
    typeof value === "object" &&
    value !== null &&
    "kind" in value &&
    "raw" in value &&
    (value.kind === "known" || value.kind === "unknown") &&
    typeof value.raw === "number"
  );
}

export function isBitfieldValue(value: unknown): value is BitfieldValue {
  return (
    typeof value === "object" &&
    value !== null &&
    !isEnumValue(value) &&
    Object.values(value).every(
      (v) => typeof v === "number" || typeof v === "boolean"
    )
  );
}

// ---------- Raw limits ----------

const RAW_LIMITS: Readonly<Record<Encoding, { min: number; max: number }>> = {
  u16: { min: 0, max: 0xffff },
  i16: { min: -0x8000, max: 0x7fff },
  u32: { min: 0, max: 0xffffffff },
  i32: { min: -0x80000000, max: 0x7fffffff },
  enum: { min: 0, max: 0xffff },
  bitfield: { min: 0, max: 0xffff },
  bool: { min: 0, max: 1 },
};

// ---------- Helpers ----------

/** Calculate 2s complement */
export function twosComplement(val: number, numBits: number): number {
  const modulus = Math.pow(2, numBits);
  if (val < 0) {
    return modulus + val;
  }
  if (val >= modulus / 2) {
    return val - modulus;
  }
  return val;
}

/** Compose words into one unsigned value. */
function composeWords(words: readonly number[], order: WordOrder): number {
  if (words.length === 1) return words[0];
  const [high, low] = order === "big" ? words : [words[1], words[0]];
  return high * 0x10000 + low;
}

function splitWords(value: number, wordCount: 1 | 2, order: WordOrder): number[] {
  if (wordCount === 1) return [value];
  const high = Math.floor(value / 0x10000);
  const low = value % 0x10000;
  return order === "big" ? [high, low] : [low, high];
}

/**
 * The integer product is exact within the safe range, so the single
 * division yields the double nearest to the rational value.
 */
function applyScale(raw: number, scale: Scale): number {
  return (raw * scale.numerator) / scale.denominator;
}

function removeScale(value: number, scale: Scale): number {
  // `+ 0` turns a rounded -0 into 0
  return Math.round((value * scale.denominator) / scale.numerator) + 0;
}

function bitMask(spec: BitSpec): number {
  return Math.pow(2, spec.width) - 1;
}

/** Bits of the word covered by the declared sub-fields. */
function declaredMask(bits: Readonly<Record<string, BitSpec>>): number {
  let mask = 0;
  for (const spec of Object.values(bits)) {
    mask |= bitMask(spec) << spec.shift;
  }
  return mask & 0xffff;
}

function effectiveOrder(field: RegisterField, order: WordOrder): WordOrder {
  return field.wordOrder ?? order;
}

// ---------- Decode ----------

/**
 * Decode the raw words of `field`.
 *
 * Unknown enum values decode to `{ kind: "unknown", raw }`.
 */
export function decode(
  field: RegisterField,
  words: readonly number[],
  wordOrder: WordOrder = "big"
): DomainValue {
  if (words.length !== field.wordCount) {
    throw new DecodeError(
      field.name,
      `expected ${field.wordCount} word(s), got ${words.length}`
    );
  }
  for (const word of words) {
    if (!Number.isInteger(word) || word < 0 || word > 0xffff) {
      throw new DecodeError(field.name, `${word} is not a 16-bit register value`);
    }
  }

  const unsigned = composeWords(words, effectiveOrder(field, wordOrder));

  switch (field.encoding) {
    case "u16":
    case "u32":
      return applyScale(unsigned, field.scale);
    case "i16":
    case "i32":
      return applyScale(
        twosComplement(unsigned, field.wordCount * 16),
        field.scale
      );
    case "bool":
      return unsigned !== 0;
    case "enum": {
      const tag = field.tags?.[unsigned];
      return tag === undefined
        ? { kind: "unknown", raw: unsigned }
        : { kind: "known", tag, raw: unsigned };
    }
    case "bitfield": {
      const value: Record<string, number | boolean> = {};
      const declared = field.bits ?? {};
      for (const [name, spec] of Object.entries(declared)) {
        const bits = Math.floor(unsigned / Math.pow(2, spec.shift)) & bitMask(spec);
        value[name] = spec.width === 1 ? bits === 1 : bits;
      }
      const rest = unsigned & ~declaredMask(declared);
      if (rest !== 0) value[BITFIELD_REST] = rest;
      return Object.freeze(value);
    }
  }
}

// ---------- Encode ----------

/**
 * Encode `value` into the raw words of `field`.
 *
 * Throws `EncodeError` for values outside the field's declared range or
 * the encoding's raw range, and for values of the wrong type.
 */
export function encode(
  field: RegisterField,
  value: EncodableValue,
  wordOrder: WordOrder = "big"
): number[] {
  let unsigned: number;

  switch (field.encoding) {
    case "u16":
    case "i16":
    case "u32":
    case "i32":
      unsigned = encodeNumber(field, value);
      break;
    case "bool":
      if (typeof value !== "boolean") {
        throw new EncodeError(field.name, "type-mismatch", "expected a boolean");
      }
      unsigned = value ? 1 : 0;
      break;
    case "enum":
      unsigned = encodeEnum(field, value);
      break;
    case "bitfield":
      unsigned = encodeBits(field, value);
      break;
  }

  return splitWords(unsigned, field.wordCount, effectiveOrder(field, wordOrder));
}

/** `encode` for writes: also rejects read-only fields. */
export function encodeWrite(
  field: RegisterField,
  value: EncodableValue,
  wordOrder: WordOrder = "big"
): number[] {
  if (!field.writable) {
    throw new EncodeError(field.name, "read-only", "field is not writable");
  }
  return encode(field, value, wordOrder);
}

function encodeNumber(field: RegisterField, value: EncodableValue): number {
  if (typeof value !== "number") {
    throw new EncodeError(field.name, "type-mismatch", "expected a number");
  }
  if (!Number.isFinite(value)) {
    throw new EncodeError(field.name, "out-of-range", `${value} is not finite`);
  }
  if (field.range && (value < field.range.min || value > field.range.max)) {
    throw new EncodeError(
      field.name,
      "out-of-range",
      `${value} is outside ${field.range.min}..${field.range.max}`
    );
  }

  const raw = removeScale(value, field.scale);
  const limits = RAW_LIMITS[field.encoding];
  if (raw < limits.min || raw > limits.max) {
    throw new EncodeError(
      field.name,
      "out-of-range",
      `${value} does not fit in ${field.encoding}`
    );
  }
  return raw < 0 ? twosComplement(raw, field.wordCount * 16) : raw;
}

function encodeEnum(field: RegisterField, value: EncodableValue): number {
  if (isEnumValue(value)) {
    return encodeEnum(field, value.raw);
  }
  if (typeof value === "string") {
    const entry = Object.entries(field.tags ?? {}).find(([, tag]) => tag === value);
    if (!entry) {
      throw new EncodeError(field.name, "unknown-tag", `unknown tag "${value}"`);
    }
    return Number(entry[0]);
  }
  if (typeof value === "number") {
    if (!Number.isInteger(value) || value < 0 || value > 0xffff) {
      throw new EncodeError(field.name, "out-of-range", `${value} is not a register value`);
    }
    return value;
  }
  throw new EncodeError(field.name, "type-mismatch", "expected an enum tag");
}

function encodeBits(field: RegisterField, value: EncodableValue): number {
  if (!isBitfieldValue(value)) {
    throw new EncodeError(field.name, "type-mismatch", "expected a bitfield object");
  }
  const bits = field.bits ?? {};
  for (const name of Object.keys(value)) {
    if (name !== BITFIELD_REST && !(name in bits)) {
      throw new EncodeError(field.name, "type-mismatch", `unknown bit "${name}"`);
    }
  }

  let unsigned = 0;
  for (const [name, spec] of Object.entries(bits)) {
    const part = value[name] ?? 0;
    const n = typeof part === "boolean" ? Number(part) : part;
    if (!Number.isInteger(n) || n < 0 || n > bitMask(spec)) {
      throw new EncodeError(
        field.name,
        "out-of-range",
        `${name}=${part} does not fit in ${spec.width} bit(s)`
      );
    }
    unsigned += n * Math.pow(2, spec.shift);
  }

  const rest = value[BITFIELD_REST] ?? 0;
  if (
    typeof rest !== "number" ||
    !Number.isInteger(rest) ||
    rest < 0 ||
    rest > 0xffff ||
    (rest & declaredMask(bits)) !== 0
  ) {
    throw new EncodeError(
      field.name,
      "out-of-range",
      `${BITFIELD_REST}=${rest} is not a set of undeclared bits`
    );
  }
  return unsigned + rest;
}
