import { describe, expect, it } from "vitest";
import { createHeapTypeNamer, formatHeapType, formatType } from "../format.js";
import { TypeBuilder } from "../type-builder.js";
import {
  abstractHeapType,
  field,
  f64,
  i32,
  i64,
  none,
  refType,
  rttType,
  tupleOf,
  type StructHeapType,
} from "../types.js";
import { signature } from "./fixtures.js";

describe("formatType", () => {
  it("prints value and reference types", () => {
    expect(formatType(i32)).toBe("i32");
    expect(formatType(refType(abstractHeapType("func"), true))).toBe("(ref null func)");
    expect(formatType(refType(abstractHeapType("eq"), false))).toBe("(ref eq)");
    expect(formatType(tupleOf([i32, f64]))).toBe("(i32 f64)");
  });

  it("prints rtts with and without depth", () => {
    const struct: StructHeapType = { kind: "struct", fields: [] };
    const namer = createHeapTypeNamer({ names: new Map([[struct, { name: "Point" }]]) });
    expect(formatType(rttType(struct), namer)).toBe("(rtt $Point)");
    expect(formatType(rttType(struct, 2), namer)).toBe("(rtt 2 $Point)");
  });
});

describe("createHeapTypeNamer", () => {
  it("prefers names, then collection indices, then anonymous numbering", () => {
    const named: StructHeapType = { kind: "struct", fields: [] };
    const indexed: StructHeapType = { kind: "struct", fields: [] };
    const loose: StructHeapType = { kind: "struct", fields: [] };
    const namer = createHeapTypeNamer({
      names: new Map([[named, { name: "Vtable" }]]),
      indices: new Map([
        [named, 0],
        [indexed, 1],
      ]),
    });
    expect(namer(named)).toBe("$Vtable");
    expect(namer(indexed)).toBe("$type1");
    expect(namer(loose)).toBe("$anon0");
    expect(namer(loose)).toBe("$anon0");
    expect(namer(abstractHeapType("any"))).toBe("any");
    expect(namer(new TypeBuilder(3).getTempHeapType(2))).toBe("$temp2");
  });
});

describe("formatHeapType", () => {
  it("prints signatures", () => {
    expect(formatHeapType(signature(tupleOf([i32, i64]), i32))).toBe(
      "(func (param i32 i64) (result i32))"
    );
    expect(formatHeapType(signature(none, none))).toBe("(func)");
  });

  it("prints structs with mutability, packing and supertype", () => {
    const parent: StructHeapType = { kind: "struct", fields: [field(i32)] };
    const child: StructHeapType = {
      kind: "struct",
      fields: [
        field(i32, { packedType: "i8" }),
        field(refType(parent, false), { mutable: true }),
      ],
      supertype: parent,
    };
    const namer = createHeapTypeNamer({ names: new Map([[parent, { name: "Base" }]]) });
    expect(formatHeapType(child, namer)).toBe(
      "(struct (field i8) (field (mut (ref $Base)))) (sub $Base)"
    );
  });

  it("prints arrays", () => {
    expect(formatHeapType({ kind: "array", element: field(f64, { mutable: true }) })).toBe(
      "(array (mut f64))"
    );
  });
});
