import binaryen from "binaryen";
import { describe, expect, it } from "vitest";
import { createVTableFixture, signature } from "../../ir/__tests__/fixtures.js";
import { collectHeapTypes } from "../../ir/module-utils.js";
import {
  field,
  i32,
  i64,
  none,
  refType,
  rttType,
  type Field,
  type StructHeapType,
} from "../../ir/types.js";
import { runVTableToIndexes } from "../../index.js";
import {
  binaryenTypeFromHeapType,
  binaryenTypeToHeapType,
  heapTypeSupertype,
  materializeHeapTypes,
  structFieldCount,
  structFieldType,
} from "../binaryen-gc/index.js";

const rewrittenFixture = () => {
  const { module } = createVTableFixture();
  runVTableToIndexes(module, { logger: () => {} });
  return { module, types: collectHeapTypes(module).types };
};

describe("materializeHeapTypes", () => {
  it("builds the rewritten vtable types", () => {
    const { types } = rewrittenFixture();
    const [, s2, s1] = materializeHeapTypes(types);

    expect(structFieldCount(s1)).toBe(1);
    expect(structFieldType(s1, 0)).toBe(binaryen.i32);
    expect(binaryenTypeToHeapType(structFieldType(s2, 0))).toBe(s1);
  });

  it("closes cycles and keeps supertypes", () => {
    const parent: StructHeapType = { kind: "struct", fields: [field(i32)] };
    const child: StructHeapType = {
      kind: "struct",
      fields: [field(i32), field(i64)],
      supertype: parent,
    };
    const nodeFields: Field[] = [];
    const node: StructHeapType = { kind: "struct", fields: nodeFields };
    nodeFields.push(field(refType(node, true), { mutable: true }));

    const [parentRef, childRef, nodeRef] = materializeHeapTypes([parent, child, node]);
    expect(heapTypeSupertype(childRef)).toBe(parentRef);
    expect(structFieldCount(childRef)).toBe(2);
    expect(binaryenTypeToHeapType(structFieldType(nodeRef, 0))).toBe(nodeRef);
  });

  it("names types and fields on the given module", () => {
    const { module, types } = rewrittenFixture();
    const mod = new binaryen.Module();
    mod.setFeatures(binaryen.Features.All);
    const [, s2] = materializeHeapTypes(types, { module: mod, typeNames: module.typeNames });
    const s2Type = binaryenTypeFromHeapType(s2, true);
    mod.addGlobal("vtables", s2Type, false, mod.ref.null(s2Type));

    const text = mod.emitText();
    mod.dispose();
    expect(text).toContain("(type $S1 ");
    expect(text).toContain("(type $S2 ");
    expect(text).toContain("(field $method i32)");
  });

  it("returns nothing for an empty group", () => {
    expect(materializeHeapTypes([])).toEqual([]);
  });

  it("rejects rtt types", () => {
    const holderFields: Field[] = [];
    const holder: StructHeapType = { kind: "struct", fields: holderFields };
    holderFields.push(field(rttType(holder, 0)));
    expect(() => materializeHeapTypes([holder])).toThrow("binaryen has no rtt types");
  });

  it("rejects heap types outside the group", () => {
    const method = signature(i32, none);
    const holder: StructHeapType = { kind: "struct", fields: [field(refType(method))] };
    expect(() => materializeHeapTypes([holder])).toThrow(
      "is not part of the materialized group"
    );
  });
});
