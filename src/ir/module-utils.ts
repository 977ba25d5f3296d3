import { updateTypeFields, walkExpression } from "./delegations.js";
import type { Expression } from "./expressions.js";
import type { Module } from "./module.js";
import type { DefinedHeapType, HeapType, Signature, Type } from "./types.js";

export interface HeapTypeCollection {
  /** Every defined heap type reachable from the module, in index order */
  types: DefinedHeapType[];
  indices: Map<HeapType, number>;
}

/** Expressions that live outside function bodies */
export const walkModuleCode = (
  module: Module,
  visit: (expr: Expression) => void
): void => {
  module.globals.forEach((global) => {
    if (global.init) walkExpression(global.init, visit);
  });
  module.elementSegments.forEach((segment) => {
    if (segment.offset) walkExpression(segment.offset, visit);
    segment.data.forEach((item) => walkExpression(item, visit));
  });
};

/**
 * Enumerates the defined heap types a module refers to, transitively through
 * type definitions. Indices follow first sight, except that a type's
 * supertype chain is always indexed before the type itself.
 */
export const collectHeapTypes = (module: Module): HeapTypeCollection => {
  const types: DefinedHeapType[] = [];
  const indices = new Map<HeapType, number>();
  const pending: DefinedHeapType[] = [];

  const noteHeapType = (heapType: HeapType): HeapType => {
    switch (heapType.kind) {
      case "abstract":
        return heapType;
      case "temp":
        throw new Error(
          `temp heap type ${heapType.index} escaped its TypeBuilder session`
        );
      case "signature":
      case "struct":
      case "array":
        if (indices.has(heapType)) return heapType;
        if (heapType.supertype) noteHeapType(heapType.supertype);
        if (indices.has(heapType)) return heapType;
        indices.set(heapType, types.length);
        types.push(heapType);
        pending.push(heapType);
        return heapType;
    }
  };

  const noteType = (type: Type): Type => {
    switch (type.kind) {
      case "basic":
        return type;
      case "ref":
      case "rtt":
        noteHeapType(type.heapType);
        return type;
      case "tuple":
        type.types.forEach(noteType);
        return type;
    }
  };

  const noteSignature = (signature: Signature): Signature => {
    noteType(signature.params);
    noteType(signature.results);
    return signature;
  };

  const noteExpression = (expr: Expression): void => {
    noteType(expr.type);
    updateTypeFields(expr, {
      type: noteType,
      heapType: noteHeapType,
      signature: noteSignature,
    });
  };

  const drain = () => {
    for (let next = pending.pop(); next; next = pending.pop()) {
      switch (next.kind) {
        case "signature":
          noteSignature(next.signature);
          break;
        case "struct":
          next.fields.forEach((field) => noteType(field.type));
          break;
        case "array":
          noteType(next.element.type);
          break;
      }
    }
  };

  module.functions.forEach((func) => {
    noteHeapType(func.type);
    func.vars.forEach(noteType);
    drain();
    if (func.body) walkExpression(func.body, noteExpression);
    drain();
  });
  module.globals.forEach((global) => noteType(global.type));
  module.tables.forEach((table) => noteType(table.type));
  module.elementSegments.forEach((segment) => noteType(segment.type));
  walkModuleCode(module, noteExpression);
  drain();

  return { types, indices };
};
