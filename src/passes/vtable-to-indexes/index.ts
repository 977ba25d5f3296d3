/**
 * Converts vtables (structs of function references) to use indexes: every
 * struct field holding a function reference becomes an i32 field, e.g.
 *
 *   (struct (field (ref $functype1)) (field (ref $functype2)))
 * =>
 *   (struct (field i32) (field i32))
 *
 * and every type in the module is moved over to the rewritten type graph.
 * Filling per-field dispatch tables and turning the `ref.func` operands of
 * `struct.new` into table indexes is left to a later lowering step.
 *
 * Assumptions (see `check-vtable-assumptions` for a checker):
 *  - all function reference fields are to be transformed;
 *  - such fields are written only by `struct.new`, with a constant `ref.func`;
 *  - vtable subtypes never specialize the field types of their parent.
 */
import type { Module } from "../../ir/module.js";
import { isFunctionType } from "../../ir/types.js";
import type { Pass, PassRunner } from "../pass-runner.js";
import { mapOldTypesToNew, type HeapTypeMap } from "./map-types.js";
import { updateTypes } from "./update-types.js";

export { mapOldTypesToNew, rewriteTypeGraph, type HeapTypeMap } from "./map-types.js";
export { TypeUpdater, updateTypes } from "./update-types.js";

export class VTableToIndexes implements Pass {
  readonly name = "vtable-to-indexes";

  run(runner: PassRunner, module: Module): void {
    const oldToNewTypes = mapOldTypesToNew(module);
    runner.log(
      this.name,
      `rebuilt ${oldToNewTypes.size} heap types, ${countFunctionFields(oldToNewTypes)} function fields now hold indexes`
    );

    updateTypes(runner, module, oldToNewTypes);
  }
}

const countFunctionFields = (oldToNewTypes: HeapTypeMap): number => {
  let count = 0;
  oldToNewTypes.forEach((_, oldType) => {
    if (oldType.kind !== "struct") return;
    count += oldType.fields.filter((field) => isFunctionType(field.type)).length;
  });
  return count;
};

export const createVTableToIndexesPass = (): Pass => new VTableToIndexes();
