import { describe, expect, it } from "vitest";
import { TypeBuilder, TypeBuilderBuildError } from "../type-builder.js";
import { abstractHeapType, field, i32, i64, none, refType } from "../types.js";

describe("TypeBuilder", () => {
  it("builds self-referential structs without expanding them", () => {
    const builder = new TypeBuilder(1);
    const self = builder.getTempHeapType(0);
    builder.setStruct(0, [
      field(i32),
      field(builder.getTempRefType(self, true), { mutable: true }),
    ]);
    const [node] = builder.build();

    expect(node.kind).toBe("struct");
    if (node.kind !== "struct") return;
    const next = node.fields[1];
    expect(next.mutable).toBe(true);
    expect(next.type).toEqual({ kind: "ref", heapType: node, nullable: true });
    expect(next.type.kind === "ref" && next.type.heapType).toBe(node);
  });

  it("resolves mutually recursive definitions", () => {
    const builder = new TypeBuilder(2);
    const fn = builder.getTempHeapType(0);
    const vtable = builder.getTempHeapType(1);
    builder.setSignature(0, {
      params: builder.getTempRefType(vtable, false),
      results: i32,
    });
    builder.setStruct(1, [field(builder.getTempRefType(fn, false))]);
    const [sig, struct] = builder.build();

    if (sig.kind !== "signature" || struct.kind !== "struct") {
      throw new Error("unexpected heap type kinds");
    }
    expect(sig.signature.params).toEqual(refType(struct, false));
    expect(struct.fields[0].type).toEqual(refType(sig, false));
  });

  it("resolves temp handles nested in tuples", () => {
    const builder = new TypeBuilder(1);
    const self = builder.getTempHeapType(0);
    builder.setSignature(0, {
      params: builder.getTempTupleType([i64, builder.getTempRefType(self)]),
      results: none,
    });
    const [sig] = builder.build();
    expect(sig.kind === "signature" && sig.signature.params).toEqual({
      kind: "tuple",
      types: [i64, refType(sig, true)],
    });
  });

  it("keeps abstract heap types as they are", () => {
    const builder = new TypeBuilder(1);
    builder.setArray(0, field(refType(abstractHeapType("func"))));
    const [array] = builder.build();
    expect(array.kind === "array" && array.element.type).toEqual(
      refType(abstractHeapType("func"))
    );
  });

  it("records supertypes", () => {
    const builder = new TypeBuilder(2);
    builder.setStruct(0, [field(i32)]);
    builder.setStruct(1, [field(i32), field(i64)]);
    builder.setSubType(1, builder.getTempHeapType(0));
    const [parent, child] = builder.build();
    expect(child.supertype).toBe(parent);
    expect(parent.supertype).toBeUndefined();
  });

  it("rejects a supertype of a different kind", () => {
    const builder = new TypeBuilder(2);
    builder.setArray(0, field(i32));
    builder.setStruct(1, [field(i32)]);
    builder.setSubType(1, builder.getTempHeapType(0));
    expect(() => builder.build()).toThrow(
      "TypeBuilder.build failed: index 1, reason invalid-supertype"
    );
  });

  it("rejects supertype chains that loop", () => {
    const builder = new TypeBuilder(2);
    builder.setStruct(0, []);
    builder.setStruct(1, []);
    builder.setSubType(0, builder.getTempHeapType(1));
    builder.setSubType(1, builder.getTempHeapType(0));
    expect(() => builder.build()).toThrow(
      "TypeBuilder.build failed: index 0, reason supertype-cycle"
    );

    const self = new TypeBuilder(1);
    self.setStruct(0, []);
    self.setSubType(0, self.getTempHeapType(0));
    expect(() => self.build()).toThrow(
      "TypeBuilder.build failed: index 0, reason supertype-cycle"
    );
  });

  it("reports the first slot left undefined", () => {
    const builder = new TypeBuilder(3);
    builder.setStruct(0, []);
    builder.setStruct(2, []);
    try {
      builder.build();
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(TypeBuilderBuildError);
      if (!(error instanceof TypeBuilderBuildError)) return;
      expect(error.errorIndex).toBe(1);
      expect(error.errorReason).toBe("incomplete-definition");
    }
  });

  it("rejects temp heap types of another session", () => {
    const other = new TypeBuilder(1);
    const builder = new TypeBuilder(1);
    builder.setStruct(0, [field(refType(other.getTempHeapType(0)))]);
    expect(() => builder.build()).toThrow(
      "TypeBuilder.build failed: index 0, reason foreign-temp-heap-type"
    );
  });

  it("rejects out of bounds slots", () => {
    const builder = new TypeBuilder(1);
    expect(() => builder.getTempHeapType(1)).toThrow(RangeError);
    expect(() => builder.setStruct(4, [])).toThrow(
      "TypeBuilder slot 4 is out of bounds (size 1)"
    );
  });

  it("is single use", () => {
    const builder = new TypeBuilder(1);
    builder.setStruct(0, []);
    builder.build();
    expect(() => builder.build()).toThrow(
      "TypeBuilder.build called twice on the same session"
    );
    expect(() => builder.setStruct(0, [field(i32)])).toThrow(
      "TypeBuilder session has already been built"
    );
  });

  it("gives every session distinct temp handles", () => {
    const a = new TypeBuilder(1);
    const b = new TypeBuilder(1);
    expect(a.id).not.toBe(b.id);
    expect(a.getTempHeapType(0)).toBe(a.getTempHeapType(0));
    expect(a.getTempHeapType(0)).not.toBe(b.getTempHeapType(0));
  });
});
