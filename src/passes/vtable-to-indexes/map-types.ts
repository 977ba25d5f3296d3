import { createHeapTypeNamer, formatType } from "../../ir/format.js";
import { collectHeapTypes, type HeapTypeCollection } from "../../ir/module-utils.js";
import type { Module } from "../../ir/module.js";
import { TypeBuilder } from "../../ir/type-builder.js";
import {
  i32,
  isFunctionType,
  type HeapType,
  type Type,
} from "../../ir/types.js";

export type HeapTypeMap = ReadonlyMap<HeapType, HeapType>;

/** Builds the rewritten type graph for every heap type `module` refers to */
export const mapOldTypesToNew = (module: Module): HeapTypeMap =>
  rewriteTypeGraph(collectHeapTypes(module));

/**
 * Rebuilds `types` as a new, isomorphic graph in which struct fields holding
 * function references hold `i32` instead.
 */
export const rewriteTypeGraph = ({ types, indices }: HeapTypeCollection): HeapTypeMap => {
  const builder = new TypeBuilder(types.length);
  const describe = (type: Type) =>
    formatType(type, createHeapTypeNamer({ indices }));

  const getNewHeapType = (heapType: HeapType): HeapType => {
    if (heapType.kind === "abstract") return heapType;
    const index = indices.get(heapType);
    if (index === undefined) {
      throw new Error(
        `bad heap type: ${heapType.kind} heap type is not part of the collected type graph`
      );
    }
    return builder.getTempHeapType(index);
  };

  // Contents of the new definitions only ever point at other slots of the
  // same builder session.
  const mapType = (type: Type): Type => {
    switch (type.kind) {
      case "basic":
        return type;
      case "ref":
        return builder.getTempRefType(getNewHeapType(type.heapType), type.nullable);
      case "rtt":
        return builder.getTempRttType(getNewHeapType(type.heapType), type.depth);
      case "tuple":
        return builder.getTempTupleType(type.types.map(mapType));
      default: {
        const unreachable: never = type;
        throw new Error(`bad type ${describe(unreachable)}`);
      }
    }
  };

  const mapFieldType = (type: Type): Type =>
    isFunctionType(type) ? i32 : mapType(type);

  types.forEach((type, index) => {
    switch (type.kind) {
      case "signature":
        builder.setSignature(index, {
          params: mapType(type.signature.params),
          results: mapType(type.signature.results),
        });
        break;
      case "struct":
        builder.setStruct(
          index,
          type.fields.map((field) => ({
            ...field,
            type: mapFieldType(field.type),
          }))
        );
        break;
      case "array":
        builder.setArray(index, {
          ...type.element,
          type: mapType(type.element.type),
        });
        break;
      default: {
        const unreachable: never = type;
        throw new Error(`bad heap type ${JSON.stringify(unreachable)}`);
      }
    }

    if (type.supertype) {
      builder.setSubType(index, getNewHeapType(type.supertype));
    }
  });

  const newTypes = builder.build();

  const oldToNewTypes = new Map<HeapType, HeapType>();
  types.forEach((type, index) => {
    oldToNewTypes.set(type, newTypes[index]);
  });
  return oldToNewTypes;
};
