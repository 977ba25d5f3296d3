import type { Expression, ExpressionOfKind } from "../expressions.js";
import { createModule, type Module } from "../module.js";
import {
  field,
  i32,
  none,
  refType,
  type SignatureHeapType,
  type StructHeapType,
  type Type,
} from "../types.js";

export const signature = (params: Type, results: Type): SignatureHeapType => ({
  kind: "signature",
  signature: { params, results },
});

export const localGet = (index: number, type: Type): Expression => ({
  kind: "local.get",
  type,
  index,
});

export const structGet = (
  ref: Expression,
  index: number,
  type: Type
): ExpressionOfKind<"struct.get"> => ({
  kind: "struct.get",
  type,
  index,
  ref,
  signed: false,
});

export const refFunc = (func: string, type: Type): Expression => ({
  kind: "ref.func",
  type,
  func,
});

export type VTableFixture = {
  module: Module;
  /** `(func (param i32) (result i32))` */
  f1: SignatureHeapType;
  /** `(func (result i32))`, the type of `main` */
  f0: SignatureHeapType;
  /** `(struct (field (ref $F1)))` */
  s1: StructHeapType;
  /** `(struct (field (ref null $S1)))` */
  s2: StructHeapType;
  /** Reads S1.field0 */
  readS1: ExpressionOfKind<"struct.get">;
  /** Reads S2.field0 */
  readS2: ExpressionOfKind<"struct.get">;
};

/**
 * A vtable struct S1 holding a function reference, and S2 holding a nullable
 * reference to S1. `main` builds both and calls through the vtable.
 */
export const createVTableFixture = (): VTableFixture => {
  const f1 = signature(i32, i32);
  const f0 = signature(none, i32);
  const s1: StructHeapType = { kind: "struct", fields: [field(refType(f1, false))] };
  const s2: StructHeapType = { kind: "struct", fields: [field(refType(s1, true))] };

  const readS2 = structGet(localGet(0, refType(s2, true)), 0, refType(s1, true));
  const readS1 = structGet(readS2, 0, refType(f1, false));

  const body: Expression = {
    kind: "block",
    type: i32,
    children: [
      {
        kind: "local.set",
        type: none,
        index: 0,
        isTee: false,
        value: {
          kind: "struct.new",
          type: refType(s2, false),
          operands: [
            {
              kind: "struct.new",
              type: refType(s1, false),
              operands: [refFunc("callee", refType(f1, false))],
            },
          ],
        },
      },
      {
        kind: "call_ref",
        type: i32,
        isReturn: false,
        operands: [{ kind: "const", type: i32, value: 7 }],
        target: readS1,
      },
    ],
  };

  const module = createModule({
    functions: [
      { name: "main", type: f0, vars: [refType(s2, true)], body },
      { name: "callee", type: f1, vars: [], body: localGet(0, i32) },
    ],
  });
  module.typeNames.set(s1, { name: "S1", fieldNames: { 0: "method" } });
  module.typeNames.set(s2, { name: "S2" });
  module.typeNames.set(f1, { name: "F1" });

  return { module, f0, f1, s1, s2, readS1, readS2 };
};
