import binaryen from "binaryen";
import { formatHeapType } from "../../ir/format.js";
import type { TypeNames } from "../../ir/module.js";
import type {
  AbstractHeapTypeName,
  BasicTypeName,
  DefinedHeapType,
  Field,
  HeapType,
  PackedType as IrPackedType,
  Type,
} from "../../ir/types.js";
import { TypeBuilder } from "./type-builder.js";
import type { AugmentedBinaryen, HeapTypeRef, PackedType, TypeRef } from "./types.js";
export { TypeBuilder, TypeBuilderBuildError } from "./type-builder.js";
export type { HeapTypeRef, TypeRef } from "./types.js";

const bin = binaryen as unknown as AugmentedBinaryen;

const basicTypeRef = (name: BasicTypeName): TypeRef => {
  switch (name) {
    case "none":
      return bin.none;
    case "unreachable":
      return bin.unreachable;
    case "i32":
      return bin.i32;
    case "i64":
      return bin.i64;
    case "f32":
      return bin.f32;
    case "f64":
      return bin.f64;
    case "v128":
      return bin.v128;
  }
};

// Binaryen has no separate data type; struct is the closest top type.
const abstractHeapTypeRef = (name: AbstractHeapTypeName): HeapTypeRef => {
  switch (name) {
    case "func":
      return bin._BinaryenHeapTypeFunc();
    case "extern":
      return bin._BinaryenHeapTypeExt();
    case "any":
      return bin._BinaryenHeapTypeAny();
    case "eq":
      return bin._BinaryenHeapTypeEq();
    case "i31":
      return bin._BinaryenHeapTypeI31();
    case "data":
      return bin._BinaryenHeapTypeStruct();
  }
};

const packedTypeRef = (packedType: IrPackedType): PackedType => {
  switch (packedType) {
    case "not-packed":
      return bin._BinaryenPackedTypeNotPacked();
    case "i8":
      return bin._BinaryenPackedTypeInt8();
    case "i16":
      return bin._BinaryenPackedTypeInt16();
  }
};

export type MaterializeOptions = {
  /** Module to annotate with type and field names */
  module?: binaryen.Module;
  typeNames?: ReadonlyMap<HeapType, TypeNames>;
};

/**
 * Builds `types` as a single binaryen rec group and returns the resulting
 * heap types in the same order. Every defined heap type reachable from
 * `types` must itself be part of `types`.
 */
export const materializeHeapTypes = (
  types: readonly DefinedHeapType[],
  { module, typeNames }: MaterializeOptions = {}
): HeapTypeRef[] => {
  if (!types.length) return [];

  const indices = new Map<HeapType, number>();
  types.forEach((type, index) => indices.set(type, index));

  const builder = new TypeBuilder(types.length);
  try {
    const heapTypeRef = (heapType: HeapType): HeapTypeRef => {
      switch (heapType.kind) {
        case "abstract":
          return abstractHeapTypeRef(heapType.name);
        case "temp":
          throw new Error(
            `temp heap type ${heapType.index} escaped its TypeBuilder session`
          );
        default: {
          const index = indices.get(heapType);
          if (index === undefined) {
            throw new Error(
              `heap type ${formatHeapType(heapType)} is not part of the materialized group`
            );
          }
          return builder.getTempHeapType(index);
        }
      }
    };

    const typeRef = (type: Type): TypeRef => {
      switch (type.kind) {
        case "basic":
          return basicTypeRef(type.name);
        case "ref":
          return builder.getTempRefType(heapTypeRef(type.heapType), type.nullable);
        case "rtt":
          throw new Error("binaryen has no rtt types");
        case "tuple":
          return builder.getTempTupleType(type.types.map(typeRef));
      }
    };

    const fieldRef = (field: Field) => ({
      type: typeRef(field.type),
      packedType: packedTypeRef(field.packedType),
      mutable: field.mutable,
    });

    types.forEach((type, index) => {
      switch (type.kind) {
        case "signature":
          builder.setSignature(
            index,
            typeRef(type.signature.params),
            typeRef(type.signature.results)
          );
          break;
        case "struct":
          builder.setStruct(index, type.fields.map(fieldRef));
          break;
        case "array": {
          const element = fieldRef(type.element);
          builder.setArrayType(index, element.type, element.packedType, element.mutable);
          break;
        }
      }
      if (type.supertype) builder.setSubType(index, heapTypeRef(type.supertype));
      builder.setOpen(index);
    });

    const refs = builder.buildAll();
    if (module && typeNames) annotateNames(module, types, refs, typeNames);
    return refs;
  } finally {
    builder.dispose();
  }
};

const annotateNames = (
  mod: binaryen.Module,
  types: readonly DefinedHeapType[],
  refs: HeapTypeRef[],
  typeNames: ReadonlyMap<HeapType, TypeNames>
) => {
  types.forEach((type, index) => {
    const names = typeNames.get(type);
    if (!names) return;
    const ref = refs[index];
    bin._BinaryenModuleSetTypeName(mod.ptr, ref, bin.stringToUTF8OnStack(names.name));
    const fieldNames = names.fieldNames;
    if (!fieldNames) return;
    Object.keys(fieldNames).forEach((key) => {
      const fieldIndex = Number(key);
      bin._BinaryenModuleSetFieldName(
        mod.ptr,
        ref,
        fieldIndex,
        bin.stringToUTF8OnStack(fieldNames[fieldIndex])
      );
    });
  });
};

export const binaryenTypeFromHeapType = (
  heapType: HeapTypeRef,
  nullable = false
): TypeRef => bin._BinaryenTypeFromHeapType(heapType, nullable);

export const binaryenTypeToHeapType = (type: TypeRef): HeapTypeRef =>
  bin._BinaryenTypeGetHeapType(type);

export const structFieldType = (heapType: HeapTypeRef, index: number): TypeRef =>
  bin._BinaryenStructTypeGetFieldType(heapType, index);

export const structFieldCount = (heapType: HeapTypeRef): number =>
  bin._BinaryenStructTypeGetNumFields(heapType);

export const heapTypeSupertype = (heapType: HeapTypeRef): HeapTypeRef =>
  bin._BinaryenHeapTypeGetSupertype(heapType);
