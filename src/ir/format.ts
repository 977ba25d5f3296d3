import type { TypeNames } from "./module.js";
import { typesOf, type Field, type HeapType, type Type } from "./types.js";

export type HeapTypeNamer = (heapType: HeapType) => string;

export interface FormatOptions {
  names?: ReadonlyMap<HeapType, TypeNames>;
  /** Collection indices, used for `$type<i>` when a heap type has no name */
  indices?: ReadonlyMap<HeapType, number>;
}

export const createHeapTypeNamer = ({
  names,
  indices,
}: FormatOptions = {}): HeapTypeNamer => {
  const anonymous = new Map<HeapType, number>();
  return (heapType) => {
    switch (heapType.kind) {
      case "abstract":
        return heapType.name;
      case "temp":
        return `$temp${heapType.index}`;
      default: {
        const name = names?.get(heapType)?.name;
        if (name) return `$${name}`;
        const index = indices?.get(heapType);
        if (index !== undefined) return `$type${index}`;
        const known = anonymous.get(heapType);
        if (known !== undefined) return `$anon${known}`;
        anonymous.set(heapType, anonymous.size);
        return `$anon${anonymous.size - 1}`;
      }
    }
  };
};

export const formatType = (
  type: Type,
  namer: HeapTypeNamer = createHeapTypeNamer()
): string => {
  switch (type.kind) {
    case "basic":
      return type.name;
    case "ref":
      return `(ref ${type.nullable ? "null " : ""}${namer(type.heapType)})`;
    case "rtt":
      return type.depth === undefined
        ? `(rtt ${namer(type.heapType)})`
        : `(rtt ${type.depth} ${namer(type.heapType)})`;
    case "tuple":
      return `(${type.types.map((t) => formatType(t, namer)).join(" ")})`;
  }
};

const formatField = (field: Field, namer: HeapTypeNamer): string => {
  const storage =
    field.packedType === "not-packed" ? formatType(field.type, namer) : field.packedType;
  return field.mutable ? `(mut ${storage})` : storage;
};

/** Definition of a heap type, e.g. `(struct (field (mut i32)))` */
export const formatHeapType = (
  heapType: HeapType,
  namer: HeapTypeNamer = createHeapTypeNamer()
): string => {
  switch (heapType.kind) {
    case "abstract":
    case "temp":
      return namer(heapType);
    case "signature": {
      const { params, results } = heapType.signature;
      const list = (label: string, type: Type) => {
        const types = typesOf(type);
        return types.length
          ? ` (${label} ${types.map((t) => formatType(t, namer)).join(" ")})`
          : "";
      };
      return `(func${list("param", params)}${list("result", results)})${formatSupertype(
        heapType.supertype,
        namer
      )}`;
    }
    case "struct": {
      const fields = heapType.fields
        .map((field) => ` (field ${formatField(field, namer)})`)
        .join("");
      return `(struct${fields})${formatSupertype(heapType.supertype, namer)}`;
    }
    case "array":
      return `(array ${formatField(heapType.element, namer)})${formatSupertype(
        heapType.supertype,
        namer
      )}`;
  }
};

const formatSupertype = (
  supertype: HeapType | undefined,
  namer: HeapTypeNamer
): string => (supertype ? ` (sub ${namer(supertype)})` : "");
