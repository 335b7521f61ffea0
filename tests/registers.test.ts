import { describe, it, expect } from "vitest";
import {
  RegisterMap,
  coalesceReads,
  defineField,
  spanCovers,
  UNITY,
} from "../src/registers.js";
import { RegisterMapError } from "../src/errors.js";

describe("defineField", () => {
  it("derives the word count from the encoding", () => {
    expect(defineField("a", 0, "u16").wordCount).toBe(1);
    expect(defineField("b", 0, "i32").wordCount).toBe(2);
    expect(defineField("c", 0, "bool").wordCount).toBe(1);
  });

  it("fills defaults", () => {
    const field = defineField("a", 7, "u16");
    expect(field.scale).toBe(UNITY);
    expect(field.unit).toBe("");
    expect(field.writable).toBeUndefined();
    expect(Object.isFrozen(field)).toBe(true);
  });
});

describe("coalesceReads", () => {
  const a = defineField("a", 0, "u16");
  const b = defineField("b", 1, "u32");
  const c = defineField("c", 10, "u16");

  it("merges adjacent fields into one span", () => {
    expect(coalesceReads([a, b, c], { maxSpan: 64 })).toEqual([
      { address: 0, count: 3 },
      { address: 10, count: 1 },
    ]);
  });

  it("bridges gaps up to maxGap", () => {
    expect(coalesceReads([a, b, c], { maxSpan: 64, maxGap: 8 })).toEqual([
      { address: 0, count: 11 },
    ]);
    expect(coalesceReads([a, b, c], { maxSpan: 64, maxGap: 6 })).toEqual([
      { address: 0, count: 3 },
      { address: 10, count: 1 },
    ]);
  });

  it("does not depend on input order or duplicates", () => {
    expect(coalesceReads([c, b, a, b], { maxSpan: 64 })).toEqual([
      { address: 0, count: 3 },
      { address: 10, count: 1 },
    ]);
  });

  it("splits spans at maxSpan without splitting a field", () => {
    expect(coalesceReads([a, b, c], { maxSpan: 2 })).toEqual([
      { address: 0, count: 1 },
      { address: 1, count: 2 },
      { address: 10, count: 1 },
    ]);
  });

  it("groups aliased fields into one block", () => {
    const wide = defineField("wide", 5, "u32");
    const low = defineField("low", 6, "u16", { aliasOf: "wide" });
    expect(coalesceReads([low, wide], { maxSpan: 64 })).toEqual([
      { address: 5, count: 2 },
    ]);
  });

  it("returns no spans for no fields", () => {
    expect(coalesceReads([], { maxSpan: 64 })).toEqual([]);
  });

  it("rejects invalid limits", () => {
    expect(() => coalesceReads([a], { maxSpan: 126 })).toThrow(
      "Invalid maximum span length: 126"
    );
    expect(() => coalesceReads([a], { maxSpan: 0 })).toThrow(RegisterMapError);
    expect(() => coalesceReads([a], { maxSpan: 64, maxGap: -1 })).toThrow(
      "Invalid maximum gap: -1"
    );
  });

  it("rejects a field wider than maxSpan", () => {
    expect(() => coalesceReads([b], { maxSpan: 1 })).toThrow(
      "Registers 1-2 do not fit in a span of 1"
    );
  });
});

describe("spanCovers", () => {
  it("requires every register of the field", () => {
    const field = defineField("x", 10, "u32");
    expect(spanCovers({ address: 10, count: 2 }, field)).toBe(true);
    expect(spanCovers({ address: 8, count: 5 }, field)).toBe(true);
    expect(spanCovers({ address: 10, count: 1 }, field)).toBe(false);
    expect(spanCovers({ address: 11, count: 4 }, field)).toBe(false);
  });
});

describe("RegisterMap", () => {
  const fields = [
    defineField("power", 1000, "u16"),
    defineField("temp1", 1001, "i16"),
    defineField("status", 1003, "u16"),
    defineField("counter", 1040, "u32"),
  ];

  it("looks fields up by name", () => {
    const map = new RegisterMap(fields, { model: "test" });
    expect(map.field("temp1")?.address).toBe(1001);
    expect(map.field("nope")).toBeUndefined();
    expect(map.require("status").address).toBe(1003);
    expect(map.fields()).toHaveLength(4);
  });

  it("applies defaults", () => {
    const map = new RegisterMap(fields, { model: "test" });
    expect(map.wordOrder).toBe("big");
    expect(map.maxSpan).toBe(64);
    expect(map.maxGap).toBe(0);
  });

  it("excludes unavailable fields from reads", () => {
    const map = new RegisterMap(fields, {
      model: "test",
      maxGap: 1,
      unavailable: ["counter"],
    });
    expect(map.isAvailable("counter")).toBe(false);
    expect(map.isAvailable("power")).toBe(true);
    expect(map.availableFields().map((f) => f.name)).toEqual([
      "power",
      "temp1",
      "status",
    ]);
    expect(map.coalesceReads()).toEqual([{ address: 1000, count: 4 }]);
  });

  it("accepts coalescing overrides", () => {
    const map = new RegisterMap(fields, { model: "test" });
    expect(map.coalesceReads(undefined, { maxGap: 40 })).toEqual([
      { address: 1000, count: 42 },
    ]);
  });

  it("rejects unavailable names that are not in the table", () => {
    expect(
      () => new RegisterMap(fields, { model: "test", unavailable: ["bogus"] })
    ).toThrow('Unknown field "bogus" marked unavailable');
  });

  it("rejects requiring a missing field", () => {
    const map = new RegisterMap<string>(fields, { model: "test" });
    expect(() => map.require("bogus")).toThrow('Field "bogus" is not in the test map');
  });

  it("rejects spans the limit cannot hold", () => {
    expect(
      () => new RegisterMap([defineField("wide", 0, "u32")], { model: "m", maxSpan: 1 })
    ).toThrow(RegisterMapError);
  });
});

describe("RegisterMap validation", () => {
  function build(...fields: ReturnType<typeof defineField>[]): RegisterMap {
    return new RegisterMap(fields, { model: "test" });
  }

  it("rejects duplicate names", () => {
    expect(() => build(defineField("a", 0, "u16"), defineField("a", 1, "u16"))).toThrow(
      'Duplicate field "a"'
    );
  });

  it("rejects overlapping fields that are not aliases", () => {
    expect(() => build(defineField("p", 0, "u32"), defineField("q", 1, "u16"))).toThrow(
      'Fields "p" and "q" overlap at register 1'
    );
  });

  it("accepts declared aliases", () => {
    const map = build(
      defineField("p", 0, "u32"),
      defineField("q", 1, "u16", { aliasOf: "p" })
    );
    expect(map.coalesceReads()).toEqual([{ address: 0, count: 2 }]);
  });

  it("rejects aliases of unknown fields", () => {
    expect(() => build(defineField("q", 1, "u16", { aliasOf: "p" }))).toThrow(
      'Field "q" aliases unknown field "p"'
    );
  });

  it("rejects addresses past the register space", () => {
    expect(() => build(defineField("a", 0xffff, "u32"))).toThrow(
      'Field "a" has invalid address 65535'
    );
    expect(() => build(defineField("b", -1, "u16"))).toThrow(RegisterMapError);
  });

  it("rejects invalid scales and ranges", () => {
    expect(() =>
      build(defineField("a", 0, "u16", { scale: { numerator: 0, denominator: 1 } }))
    ).toThrow('Field "a" has invalid scale 0/1');
    expect(() =>
      build(defineField("a", 0, "u16", { range: { min: 10, max: 5 } }))
    ).toThrow('Field "a" has an empty range');
  });

  it("rejects enums without tags", () => {
    expect(() => build(defineField("mode", 0, "enum"))).toThrow(
      'Enum field "mode" has no tags'
    );
  });

  it("rejects malformed bitfields", () => {
    expect(() => build(defineField("bits", 0, "bitfield"))).toThrow(
      'Bitfield "bits" declares no bits'
    );
    expect(() =>
      build(defineField("bits", 0, "bitfield", { bits: { top: { shift: 12, width: 8 } } }))
    ).toThrow('Bit "top" of "bits" does not fit in 16 bits');
    expect(() =>
      build(defineField("bits", 0, "bitfield", { bits: { kind: { shift: 0, width: 1 } } }))
    ).toThrow('Bitfield "bits" may not name a bit "kind"');
    expect(() =>
      build(defineField("bits", 0, "bitfield", { bits: { rest: { shift: 0, width: 1 } } }))
    ).toThrow('Bitfield "bits" may not name a bit "rest"');
  });
});
