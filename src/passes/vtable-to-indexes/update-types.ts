import { updateTypeFields, walkExpression } from "../../ir/delegations.js";
import type { Expression } from "../../ir/expressions.js";
import { formatHeapType } from "../../ir/format.js";
import type { Func, Module } from "../../ir/module.js";
import {
  i32,
  isFunctionType,
  type HeapType,
  type Signature,
  type Type,
} from "../../ir/types.js";
import type { FunctionWorker, PassRunner } from "../pass-runner.js";
import type { HeapTypeMap } from "./map-types.js";

/** Substitutes new heap types for old ones in any type-carrying value */
export class TypeUpdater {
  constructor(private readonly oldToNewTypes: HeapTypeMap) {}

  updateType(type: Type): Type {
    switch (type.kind) {
      case "basic":
        return type;
      case "ref":
        return { ...type, heapType: this.updateHeapType(type.heapType) };
      case "rtt":
        return { ...type, heapType: this.updateHeapType(type.heapType) };
      case "tuple":
        return { kind: "tuple", types: type.types.map((t) => this.updateType(t)) };
    }
  }

  updateHeapType(heapType: HeapType): HeapType {
    switch (heapType.kind) {
      case "abstract":
        return heapType;
      case "signature":
      case "struct":
      case "array": {
        const updated = this.oldToNewTypes.get(heapType);
        if (!updated) {
          throw new Error(
            `heap type ${formatHeapType(heapType)} is missing from the old to new type map`
          );
        }
        return updated;
      }
      case "temp":
        throw new Error(
          `temp heap type ${heapType.index} escaped its TypeBuilder session`
        );
    }
  }

  updateSignature(signature: Signature): Signature {
    return {
      params: this.updateType(signature.params),
      results: this.updateType(signature.results),
    };
  }

  visitExpression(expr: Expression): void {
    expr.type = this.updateType(expr.type);

    // The one place where the new graph diverges on the instruction side:
    // reads of what used to be a function reference field now produce i32.
    if (expr.kind === "struct.get" && isFunctionType(expr.type)) {
      expr.type = i32;
    }

    updateTypeFields(expr, {
      type: (type) => this.updateType(type),
      heapType: (heapType) => this.updateHeapType(heapType),
      signature: (signature) => this.updateSignature(signature),
    });
  }
}

class CodeUpdater implements FunctionWorker {
  constructor(private readonly updater: TypeUpdater) {}

  visitFunction(func: Func): void {
    if (!func.body) return;
    walkExpression(func.body, (expr) => this.updater.visitExpression(expr));
  }
}

/**
 * Points every type in `module` at the new graph. Function bodies are handled
 * by per-function workers; module-wide declarations are updated once they
 * have all finished.
 */
export const updateTypes = (
  runner: PassRunner,
  module: Module,
  oldToNewTypes: HeapTypeMap
): void => {
  const updater = new TypeUpdater(oldToNewTypes);

  runner.runOnFunctions(module, () => new CodeUpdater(updater));
  runner.walkModuleCode(module, (expr) => updater.visitExpression(expr));

  module.tables.forEach((table) => {
    table.type = updater.updateType(table.type);
  });
  module.elementSegments.forEach((segment) => {
    segment.type = updater.updateType(segment.type);
  });
  module.globals.forEach((global) => {
    global.type = updater.updateType(global.type);
  });
  module.functions.forEach((func) => {
    func.type = updater.updateHeapType(func.type);
    func.vars = func.vars.map((type) => updater.updateType(type));
  });

  oldToNewTypes.forEach((newType, oldType) => {
    const names = module.typeNames.get(oldType);
    if (names) {
      module.typeNames.set(newType, { ...names });
    }
  });
};
