/**
 * Register map: static, validated descriptions of where each domain field
 * lives in a device's holding registers, and the read spans that cover
 * them.
 */

import { RegisterMapError } from "./errors.js";
import { DEFAULT_MAX_SPAN } from "./config.js";

// ---------- Field descriptors ----------

export type Encoding =
  | "u16"
  | "i16"
  | "u32"
  | "i32"
  | "enum"
  | "bitfield"
  | "bool";

export type WordOrder = "big" | "little";

/** Rational scale factor: value = raw * numerator / denominator */
export interface Scale {
  readonly numerator: number;
  readonly denominator: number;
}

/** A sub-field of a bitfield register. */
export interface BitSpec {
  readonly shift: number;
  readonly width: number;
}

export interface RegisterField<N extends string = string> {
  readonly name: N;
  readonly address: number;
  readonly wordCount: 1 | 2;
  readonly encoding: Encoding;
  readonly scale: Scale;
  readonly unit: string;
  /** Valid domain range, inclusive. Writes outside it are rejected. */
  readonly range?: { readonly min: number; readonly max: number };
  /** Enum tags by raw value */
  readonly tags?: Readonly<Record<number, string>>;
  readonly bits?: Readonly<Record<string, BitSpec>>;
  /** Overrides the map's word order for this field */
  readonly wordOrder?: WordOrder;
  /** Name of the field whose registers this one deliberately overlaps */
  readonly aliasOf?: string;
  readonly writable?: boolean;
}

export const ENCODING_WORDS: Readonly<Record<Encoding, 1 | 2>> = {
  u16: 1,
  i16: 1,
  u32: 2,
  i32: 2,
  enum: 1,
  bitfield: 1,
  bool: 1,
};

export const UNITY: Scale = Object.freeze({ numerator: 1, denominator: 1 });

export type FieldOptions = Omit<
  Partial<RegisterField>,
  "name" | "address" | "encoding" | "wordCount"
>;

/** Declare a field; word count follows from the encoding. */
export function defineField<N extends string>(
  name: N,
  address: number,
  encoding: Encoding,
  options: FieldOptions = {}
): RegisterField<N> {
  return Object.freeze({
    unit: "",
    scale: UNITY,
    ...options,
    name,
    address,
    encoding,
    wordCount: ENCODING_WORDS[encoding],
  });
}

// ---------- Read spans ----------

/** Contiguous registers read by one request. */
export interface ReadSpan {
  readonly address: number;
  readonly count: number;
}

export interface CoalesceOptions {
  /** Longest span in registers */
  maxSpan: number;
  /** Unused registers a span may bridge between two fields. Default: 0 */
  maxGap?: number;
}

/** Modbus limits a holding register read to 125 registers. */
export const MODBUS_MAX_READ = 125;

/**
 * Merge the address ranges of `fields` into the fewest contiguous spans
 * of at most `maxSpan` registers, in ascending address order.
 *
 * Overlapping fields (aliases) are grouped into one block first so that
 * no two spans overlap and no field is split between spans.
 */
export function coalesceReads(
  fields: readonly RegisterField[],
  options: CoalesceOptions
): ReadSpan[] {
  const { maxSpan, maxGap = 0 } = options;
  if (!Number.isInteger(maxSpan) || maxSpan < 1 || maxSpan > MODBUS_MAX_READ) {
    throw new RegisterMapError(`Invalid maximum span length: ${maxSpan}`);
  }
  if (!Number.isInteger(maxGap) || maxGap < 0) {
    throw new RegisterMapError(`Invalid maximum gap: ${maxGap}`);
  }

  const sorted = [...new Set(fields)].sort(
    (a, b) => a.address - b.address || b.wordCount - a.wordCount
  );

  const blocks: { start: number; end: number }[] = [];
  for (const field of sorted) {
    const end = field.address + field.wordCount;
    const last = blocks[blocks.length - 1];
    if (last && field.address < last.end) {
      last.end = Math.max(last.end, end);
    } else {
      blocks.push({ start: field.address, end });
    }
  }

  const spans: ReadSpan[] = [];
  let current: { start: number; end: number } | null = null;
  for (const block of blocks) {
    if (block.end - block.start > maxSpan) {
      throw new RegisterMapError(
        `Registers ${block.start}-${block.end - 1} do not fit in a span of ${maxSpan}`
      );
    }
    if (
      current &&
      block.start <= current.end + maxGap &&
      block.end - current.start <= maxSpan
    ) {
      current.end = block.end;
      continue;
    }
    if (current) {
      spans.push({ address: current.start, count: current.end - current.start });
    }
    current = { ...block };
  }
  if (current) {
    spans.push({ address: current.start, count: current.end - current.start });
  }
  return spans;
}

/** Whether `span` contains every register of `field`. */
export function spanCovers(span: ReadSpan, field: RegisterField): boolean {
  return (
    span.address <= field.address &&
    field.address + field.wordCount <= span.address + span.count
  );
}

// ---------- Register map ----------

export interface RegisterMapOptions<N extends string> {
  /** Device model / firmware generation this map describes */
  model: string;
  /** Word order of multi-register fields. Default: "big" */
  wordOrder?: WordOrder;
  /** Default: 64 */
  maxSpan?: number;
  /** Default: 0 */
  maxGap?: number;
  /** Fields that exist in the table but not on this device variant */
  unavailable?: Iterable<N>;
}

export class RegisterMap<N extends string = string> {
  public readonly model: string;
  public readonly wordOrder: WordOrder;
  public readonly maxSpan: number;
  public readonly maxGap: number;

  private readonly ordered: readonly RegisterField<N>[];
  private readonly byName: ReadonlyMap<string, RegisterField<N>>;
  private readonly unavailable: ReadonlySet<string>;

  constructor(fields: readonly RegisterField<N>[], options: RegisterMapOptions<N>) {
    this.model = options.model;
    this.wordOrder = options.wordOrder ?? "big";
    this.maxSpan = options.maxSpan ?? DEFAULT_MAX_SPAN;
    this.maxGap = options.maxGap ?? 0;

    validateFields(fields);
    this.ordered = Object.freeze([...fields]);
    this.byName = new Map(fields.map((f) => [f.name, f]));

    const unavailable = new Set<string>(options.unavailable ?? []);
    for (const name of unavailable) {
      if (!this.byName.has(name)) {
        throw new RegisterMapError(`Unknown field "${name}" marked unavailable`);
      }
    }
    this.unavailable = unavailable;

    // Fail at construction, not mid-poll, if the spans cannot be built.
    coalesceReads(this.ordered, { maxSpan: this.maxSpan, maxGap: this.maxGap });
    Object.freeze(this);
  }

  field(name: string): RegisterField<N> | undefined {
    return this.byName.get(name);
  }

  /** Like `field`, for names known to be in the table. */
  require(name: N): RegisterField<N> {
    const field = this.byName.get(name);
    if (!field) {
      throw new RegisterMapError(`Field "${name}" is not in the ${this.model} map`);
    }
    return field;
  }

  fields(): readonly RegisterField<N>[] {
    return this.ordered;
  }

  isAvailable(name: N): boolean {
    return this.byName.has(name) && !this.unavailable.has(name);
  }

  availableFields(): RegisterField<N>[] {
    return this.ordered.filter((f) => !this.unavailable.has(f.name));
  }

  /** Read spans for `fields`, by default every available field. */
  coalesceReads(
    fields: readonly RegisterField<N>[] = this.availableFields(),
    options: Partial<CoalesceOptions> = {}
  ): ReadSpan[] {
    return coalesceReads(fields, {
      maxSpan: options.maxSpan ?? this.maxSpan,
      maxGap: options.maxGap ?? this.maxGap,
    });
  }
}

// ---------- Validation ----------

function validateFields(fields: readonly RegisterField[]): void {
  const names = new Set<string>();
  for (const field of fields) {
    if (!field.name) {
      throw new RegisterMapError("Field without a name");
    }
    if (names.has(field.name)) {
      throw new RegisterMapError(`Duplicate field "${field.name}"`);
    }
    names.add(field.name);

    const end = field.address + field.wordCount - 1;
    if (!Number.isInteger(field.address) || field.address < 0 || end > 0xffff) {
      throw new RegisterMapError(
        `Field "${field.name}" has invalid address ${field.address}`
      );
    }
    if (field.wordCount !== ENCODING_WORDS[field.encoding]) {
      throw new RegisterMapError(
        `Field "${field.name}" is ${field.encoding} but spans ${field.wordCount} word(s)`
      );
    }
    const { numerator, denominator } = field.scale;
    if (
      !Number.isInteger(numerator) ||
      !Number.isInteger(denominator) ||
      numerator === 0 ||
      denominator <= 0
    ) {
      throw new RegisterMapError(
        `Field "${field.name}" has invalid scale ${numerator}/${denominator}`
      );
    }
    if (field.range && field.range.min > field.range.max) {
      throw new RegisterMapError(`Field "${field.name}" has an empty range`);
    }
    if (field.encoding === "enum" && !field.tags) {
      throw new RegisterMapError(`Enum field "${field.name}" has no tags`);
    }
    if (field.encoding === "bitfield") {
      validateBits(field);
    }
  }

  for (const field of fields) {
    if (field.aliasOf !== undefined && !names.has(field.aliasOf)) {
      throw new RegisterMapError(
        `Field "${field.name}" aliases unknown field "${field.aliasOf}"`
      );
    }
  }

  const sorted = [...fields].sort((a, b) => a.address - b.address);
  for (let i = 0; i < sorted.length; i++) {
    const a = sorted[i];
    for (let j = i + 1; j < sorted.length; j++) {
      const b = sorted[j];
      if (b.address >= a.address + a.wordCount) break;
      if (b.aliasOf !== a.name && a.aliasOf !== b.name) {
        throw new RegisterMapError(
          `Fields "${a.name}" and "${b.name}" overlap at register ${b.address}`
        );
      }
    }
  }
}

function validateBits(field: RegisterField): void {
  const bits = Object.entries(field.bits ?? {});
  if (bits.length === 0) {
    throw new RegisterMapError(`Bitfield "${field.name}" declares no bits`);
  }
  const width = field.wordCount * 16;
  for (const [name, spec] of bits) {
    if (name === "kind" || name === "rest") {
      throw new RegisterMapError(`Bitfield "${field.name}" may not name a bit "${name}"`);
    }
    if (spec.width < 1 || spec.shift < 0 || spec.shift + spec.width > width) {
      throw new RegisterMapError(
        `Bit "${name}" of "${field.name}" does not fit in ${width} bits`
      );
    }
  }
}
