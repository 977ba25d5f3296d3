/**
 * Value and heap types of the GC IR.
 *
 * Value types (`Type`) are plain values and compare structurally. Defined heap
 * types (signatures, structs and arrays) are identities: two defined heap
 * types are the same type only if they are the same object. A heap type graph
 * may be cyclic, so defined heap types are only ever created by a
 * `TypeBuilder` session.
 */

export type BasicTypeName =
  | "none"
  | "unreachable"
  | "i32"
  | "i64"
  | "f32"
  | "f64"
  | "v128";

export interface BasicType {
  readonly kind: "basic";
  readonly name: BasicTypeName;
}

export interface RefType {
  readonly kind: "ref";
  readonly heapType: HeapType;
  readonly nullable: boolean;
}

export interface RttType {
  readonly kind: "rtt";
  /** Omitted for rtts of unknown depth */
  readonly depth?: number;
  readonly heapType: HeapType;
}

export interface TupleType {
  readonly kind: "tuple";
  readonly types: readonly Type[];
}

export type Type = BasicType | RefType | RttType | TupleType;

export type AbstractHeapTypeName = "func" | "extern" | "any" | "eq" | "i31" | "data";

export interface AbstractHeapType {
  readonly kind: "abstract";
  readonly name: AbstractHeapTypeName;
}

export type PackedType = "not-packed" | "i8" | "i16";

export interface Field {
  readonly type: Type;
  readonly packedType: PackedType;
  readonly mutable: boolean;
}

export interface Signature {
  readonly params: Type;
  readonly results: Type;
}

export interface SignatureHeapType {
  readonly kind: "signature";
  readonly signature: Signature;
  readonly supertype?: HeapType;
}

export interface StructHeapType {
  readonly kind: "struct";
  readonly fields: readonly Field[];
  readonly supertype?: HeapType;
}

export interface ArrayHeapType {
  readonly kind: "array";
  readonly element: Field;
  readonly supertype?: HeapType;
}

/** Placeholder for a slot of an unfinished builder session */
export interface TempHeapType {
  readonly kind: "temp";
  readonly index: number;
  readonly builderId: number;
}

export type DefinedHeapType = SignatureHeapType | StructHeapType | ArrayHeapType;

export type HeapType = AbstractHeapType | DefinedHeapType | TempHeapType;

const basic = (name: BasicTypeName): BasicType => {
  const type: BasicType = { kind: "basic", name };
  return Object.freeze(type);
};

export const none = basic("none");
export const unreachable = basic("unreachable");
export const i32 = basic("i32");
export const i64 = basic("i64");
export const f32 = basic("f32");
export const f64 = basic("f64");
export const v128 = basic("v128");

const BASIC_TYPES: Record<BasicTypeName, BasicType> = {
  none,
  unreachable,
  i32,
  i64,
  f32,
  f64,
  v128,
};

export const basicType = (name: BasicTypeName): BasicType => BASIC_TYPES[name];

export const isBasicTypeName = (name: string): name is BasicTypeName =>
  Object.hasOwn(BASIC_TYPES, name);

const abstract = (name: AbstractHeapTypeName): AbstractHeapType => {
  const heapType: AbstractHeapType = { kind: "abstract", name };
  return Object.freeze(heapType);
};

const ABSTRACT_HEAP_TYPES: Record<AbstractHeapTypeName, AbstractHeapType> = {
  func: abstract("func"),
  extern: abstract("extern"),
  any: abstract("any"),
  eq: abstract("eq"),
  i31: abstract("i31"),
  data: abstract("data"),
};

export const abstractHeapType = (name: AbstractHeapTypeName): AbstractHeapType =>
  ABSTRACT_HEAP_TYPES[name];

export const isAbstractHeapTypeName = (
  name: string
): name is AbstractHeapTypeName => Object.hasOwn(ABSTRACT_HEAP_TYPES, name);

export const refType = (heapType: HeapType, nullable = true): RefType => ({
  kind: "ref",
  heapType,
  nullable,
});

export const rttType = (heapType: HeapType, depth?: number): RttType =>
  depth === undefined ? { kind: "rtt", heapType } : { kind: "rtt", depth, heapType };

/**
 * Packs a list of value types into a single multi-value type: `none` for no
 * values, the type itself for one, a tuple otherwise.
 */
export const tupleOf = (types: readonly Type[]): Type => {
  if (types.length === 0) return none;
  if (types.length === 1) return types[0];
  return { kind: "tuple", types: [...types] };
};

/** Inverse of `tupleOf` */
export const typesOf = (type: Type): readonly Type[] => {
  if (type.kind === "tuple") return type.types;
  if (type.kind === "basic" && type.name === "none") return [];
  return [type];
};

export const field = (
  type: Type,
  { mutable = false, packedType = "not-packed" }: Partial<Omit<Field, "type">> = {}
): Field => ({ type, mutable, packedType });

export const isDefinedHeapType = (heapType: HeapType): heapType is DefinedHeapType =>
  heapType.kind === "signature" ||
  heapType.kind === "struct" ||
  heapType.kind === "array";

export const isFunctionHeapType = (heapType: HeapType): boolean =>
  heapType.kind === "signature" ||
  (heapType.kind === "abstract" && heapType.name === "func");

export const isDataHeapType = (heapType: HeapType): boolean =>
  heapType.kind === "struct" ||
  heapType.kind === "array" ||
  (heapType.kind === "abstract" && heapType.name === "data");

/** True for references to `func` or to any signature */
export const isFunctionType = (type: Type): type is RefType =>
  type.kind === "ref" && isFunctionHeapType(type.heapType);

export const typesEqual = (a: Type, b: Type): boolean => {
  switch (a.kind) {
    case "basic":
      return b.kind === "basic" && a.name === b.name;
    case "ref":
      return (
        b.kind === "ref" &&
        a.nullable === b.nullable &&
        heapTypesEqual(a.heapType, b.heapType)
      );
    case "rtt":
      return (
        b.kind === "rtt" &&
        a.depth === b.depth &&
        heapTypesEqual(a.heapType, b.heapType)
      );
    case "tuple":
      return (
        b.kind === "tuple" &&
        a.types.length === b.types.length &&
        a.types.every((type, index) => typesEqual(type, b.types[index]))
      );
  }
};

/** Abstract heap types compare by name, everything else by identity */
export const heapTypesEqual = (a: HeapType, b: HeapType): boolean => {
  if (a.kind === "abstract") {
    return b.kind === "abstract" && a.name === b.name;
  }
  if (b.kind === "abstract") return false;
  if (a.kind === "temp" && b.kind === "temp") {
    return a.index === b.index && a.builderId === b.builderId;
  }
  return a === b;
};
