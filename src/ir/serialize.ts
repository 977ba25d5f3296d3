import type {
  BrOnOp,
  Expression,
  ExpressionKind,
  ExpressionOfKind,
} from "./expressions.js";
import { createModule, type Module, type TypeNames } from "./module.js";
import {
  TypeBuilder,
  TypeBuilderBuildError,
  type TypeBuilderErrorReason,
} from "./type-builder.js";
import {
  abstractHeapType,
  basicType,
  isAbstractHeapTypeName,
  isBasicTypeName,
  type AbstractHeapTypeName,
  type BasicTypeName,
  type DefinedHeapType,
  type Field,
  type HeapType,
  type PackedType,
  type Signature,
  type Type,
} from "./types.js";

export const MODULE_FORMAT = "wasm-vtable-indexes/module";
export const MODULE_FORMAT_VERSION = 1;

/** A heap type table index, or the name of an abstract heap type */
export type EncodedHeapTypeRef = number | AbstractHeapTypeName;

export type EncodedType =
  | { kind: "basic"; name: BasicTypeName }
  | { kind: "ref"; heapType: EncodedHeapTypeRef; nullable: boolean }
  | { kind: "rtt"; depth?: number; heapType: EncodedHeapTypeRef }
  | { kind: "tuple"; types: EncodedType[] };

export type EncodedField = {
  type: EncodedType;
  packedType: PackedType;
  mutable: boolean;
};

export type EncodedHeapType =
  | {
      kind: "signature";
      params: EncodedType;
      results: EncodedType;
      supertype?: EncodedHeapTypeRef;
    }
  | { kind: "struct"; fields: EncodedField[]; supertype?: EncodedHeapTypeRef }
  | { kind: "array"; element: EncodedField; supertype?: EncodedHeapTypeRef };

export type EncodedValue =
  | string
  | number
  | boolean
  | EncodedValue[]
  | { [key: string]: EncodedValue };

export type EncodedExpression = { [key: string]: EncodedValue };

export type EncodedModule = {
  format: typeof MODULE_FORMAT;
  version: typeof MODULE_FORMAT_VERSION;
  types: EncodedHeapType[];
  typeNames: { type: number; name: string; fieldNames?: Record<string, string> }[];
  functions: {
    name: string;
    type: EncodedHeapTypeRef;
    vars: EncodedType[];
    body?: EncodedExpression;
  }[];
  globals: {
    name: string;
    type: EncodedType;
    mutable: boolean;
    init?: EncodedExpression;
  }[];
  tables: { name: string; type: EncodedType; initial: number; max?: number }[];
  elementSegments: {
    name: string;
    table?: string;
    offset?: EncodedExpression;
    type: EncodedType;
    data: EncodedExpression[];
  }[];
};

export class ModuleDecodeError extends Error {
  path: string;

  constructor(path: string, message: string) {
    super(`${path}: ${message}`);
    this.path = path;
  }
}

type FieldCodec =
  | "expr"
  | "expr?"
  | "exprs"
  | "string"
  | "string?"
  | "strings"
  | "number"
  | "boolean"
  | "type"
  | "heapType"
  | "signature"
  | "brOnOp";

type ExpressionSchema<E> = {
  [K in Exclude<keyof E, "kind" | "type">]-?: FieldCodec;
};

/** Attribute codecs of every expression kind, besides `kind` and `type` */
const EXPRESSION_SCHEMAS: {
  [K in ExpressionKind]: ExpressionSchema<ExpressionOfKind<K>>;
} = {
  nop: {},
  unreachable: {},
  block: { name: "string?", children: "exprs" },
  if: { condition: "expr", ifTrue: "expr", ifFalse: "expr?" },
  loop: { name: "string", body: "expr" },
  break: { name: "string", condition: "expr?", value: "expr?" },
  switch: {
    names: "strings",
    defaultName: "string",
    condition: "expr",
    value: "expr?",
  },
  call: { target: "string", operands: "exprs", isReturn: "boolean" },
  call_indirect: {
    table: "string",
    target: "expr",
    operands: "exprs",
    signature: "signature",
    isReturn: "boolean",
  },
  "local.get": { index: "number" },
  "local.set": { index: "number", value: "expr", isTee: "boolean" },
  "global.get": { name: "string" },
  "global.set": { name: "string", value: "expr" },
  const: { value: "number" },
  unary: { op: "string", value: "expr" },
  binary: { op: "string", left: "expr", right: "expr" },
  select: { ifTrue: "expr", ifFalse: "expr", condition: "expr" },
  drop: { value: "expr" },
  return: { value: "expr?" },
  "ref.null": {},
  "ref.is_null": { value: "expr" },
  "ref.func": { func: "string" },
  "ref.eq": { left: "expr", right: "expr" },
  "table.get": { table: "string", index: "expr" },
  "table.set": { table: "string", index: "expr", value: "expr" },
  "tuple.make": { operands: "exprs" },
  "tuple.extract": { tuple: "expr", index: "number" },
  call_ref: { target: "expr", operands: "exprs", isReturn: "boolean" },
  "ref.test": { ref: "expr", castType: "heapType" },
  "ref.cast": { ref: "expr", castType: "heapType" },
  br_on: { op: "brOnOp", name: "string", ref: "expr", castType: "type" },
  "rtt.canon": {},
  "rtt.sub": { parent: "expr" },
  "struct.new": { operands: "exprs" },
  "struct.get": { index: "number", ref: "expr", signed: "boolean" },
  "struct.set": { index: "number", ref: "expr", value: "expr" },
  "array.new": { size: "expr", init: "expr?" },
  "array.new_fixed": { values: "exprs" },
  "array.get": { ref: "expr", index: "expr", signed: "boolean" },
  "array.set": { ref: "expr", index: "expr", value: "expr" },
  "array.len": { ref: "expr" },
  "array.copy": {
    destRef: "expr",
    destIndex: "expr",
    srcRef: "expr",
    srcIndex: "expr",
    length: "expr",
  },
};

const BR_ON_OPS: readonly string[] = [
  "br_on_null",
  "br_on_non_null",
  "br_on_cast",
  "br_on_cast_fail",
] satisfies BrOnOp[];

const isBrOnOp = (value: string): value is BrOnOp => BR_ON_OPS.includes(value);

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isExpressionKind = (kind: string): kind is ExpressionKind =>
  Object.hasOwn(EXPRESSION_SCHEMAS, kind);

const schemaEntries = (kind: ExpressionKind): [string, FieldCodec][] =>
  Object.entries<FieldCodec>(EXPRESSION_SCHEMAS[kind]);

/**
 * True when every attribute the schema of `value.kind` requires is present.
 * Values reaching this check were produced by the field codecs, so presence
 * is all that is left to establish.
 */
const hasExpressionShape = (
  value: Record<string, unknown>
): value is Record<string, unknown> & Expression => {
  const kind = value.kind;
  if (typeof kind !== "string" || !isExpressionKind(kind)) return false;
  if (value.type === undefined) return false;
  return schemaEntries(kind).every(
    ([key, codec]) => codec.endsWith("?") || value[key] !== undefined
  );
};

// ---------------------------------------------------------------------------
// Encoding

export const encodeModule = (module: Module): EncodedModule => {
  const indices = new Map<HeapType, number>();
  const order: DefinedHeapType[] = [];

  const heapRef = (heapType: HeapType): EncodedHeapTypeRef => {
    switch (heapType.kind) {
      case "abstract":
        return heapType.name;
      case "temp":
        throw new Error(
          `temp heap type ${heapType.index} escaped its TypeBuilder session`
        );
      default: {
        const known = indices.get(heapType);
        if (known !== undefined) return known;
        const index = order.length;
        indices.set(heapType, index);
        order.push(heapType);
        return index;
      }
    }
  };

  const encodeType = (type: Type): EncodedType => {
    switch (type.kind) {
      case "basic":
        return { kind: "basic", name: type.name };
      case "ref":
        return { kind: "ref", heapType: heapRef(type.heapType), nullable: type.nullable };
      case "rtt":
        return type.depth === undefined
          ? { kind: "rtt", heapType: heapRef(type.heapType) }
          : { kind: "rtt", depth: type.depth, heapType: heapRef(type.heapType) };
      case "tuple":
        return { kind: "tuple", types: type.types.map(encodeType) };
    }
  };

  const encodeField = ({ type, packedType, mutable }: Field): EncodedField => ({
    type: encodeType(type),
    packedType,
    mutable,
  });

  const encodeSignature = (signature: Signature): EncodedValue => ({
    params: encodeType(signature.params),
    results: encodeType(signature.results),
  });

  const encodeAttribute = (
    codec: FieldCodec,
    value: unknown,
    path: string
  ): EncodedValue | undefined => {
    if (value === undefined) return undefined;
    switch (codec) {
      case "expr":
      case "expr?":
        return encodeExpression(value, path);
      case "exprs":
        return expectArray(value, path).map((item, i) =>
          encodeExpression(item, `${path}[${i}]`)
        );
      case "string":
      case "string?":
      case "brOnOp":
        return expectString(value, path);
      case "strings":
        return expectArray(value, path).map((item, i) =>
          expectString(item, `${path}[${i}]`)
        );
      case "number":
        return expectNumber(value, path);
      case "boolean":
        return expectBoolean(value, path);
      case "type":
        return encodeType(expectType(value, path));
      case "heapType":
        return heapRef(expectHeapType(value, path));
      case "signature":
        return encodeSignature(expectSignature(value, path));
    }
  };

  const encodeExpression = (value: unknown, path: string): EncodedExpression => {
    const expr = expectExpression(value, path);
    const attributes = new Map<string, unknown>(Object.entries(expr));
    const encoded: EncodedExpression = {
      kind: expr.kind,
      type: encodeType(expr.type),
    };
    schemaEntries(expr.kind).forEach(([key, codec]) => {
      const attribute = encodeAttribute(codec, attributes.get(key), `${path}.${key}`);
      if (attribute !== undefined) encoded[key] = attribute;
    });
    return encoded;
  };

  const functions = module.functions.map((func, i) => ({
    name: func.name,
    type: heapRef(func.type),
    vars: func.vars.map(encodeType),
    ...(func.body && {
      body: encodeExpression(func.body, `functions[${i}].body`),
    }),
  }));

  const globals = module.globals.map((global, i) => ({
    name: global.name,
    type: encodeType(global.type),
    mutable: global.mutable,
    ...(global.init && { init: encodeExpression(global.init, `globals[${i}].init`) }),
  }));

  const tables = module.tables.map((table) => ({
    name: table.name,
    type: encodeType(table.type),
    initial: table.initial,
    ...(table.max !== undefined && { max: table.max }),
  }));

  const elementSegments = module.elementSegments.map((segment, i) => ({
    name: segment.name,
    ...(segment.table !== undefined && { table: segment.table }),
    ...(segment.offset && {
      offset: encodeExpression(segment.offset, `elementSegments[${i}].offset`),
    }),
    type: encodeType(segment.type),
    data: segment.data.map((item, j) =>
      encodeExpression(item, `elementSegments[${i}].data[${j}]`)
    ),
  }));

  // Definitions may discover further heap types, so walk until the table
  // stops growing.
  const types: EncodedHeapType[] = [];
  for (let i = 0; i < order.length; i++) {
    const heapType = order[i];
    const supertype = heapType.supertype ? heapRef(heapType.supertype) : undefined;
    const extra = supertype === undefined ? {} : { supertype };
    switch (heapType.kind) {
      case "signature":
        types.push({
          kind: "signature",
          params: encodeType(heapType.signature.params),
          results: encodeType(heapType.signature.results),
          ...extra,
        });
        break;
      case "struct":
        types.push({ kind: "struct", fields: heapType.fields.map(encodeField), ...extra });
        break;
      case "array":
        types.push({ kind: "array", element: encodeField(heapType.element), ...extra });
        break;
    }
  }

  // Names of heap types nothing in the module refers to any more, such as
  // the graph a rewrite replaced, are left out.
  const typeNames: EncodedModule["typeNames"] = [];
  module.typeNames.forEach((names, heapType) => {
    const index = indices.get(heapType);
    if (index === undefined) return;
    const entry: EncodedModule["typeNames"][number] = { type: index, name: names.name };
    const fieldNames = names.fieldNames;
    if (fieldNames) {
      const encodedNames: Record<string, string> = {};
      Object.keys(fieldNames).forEach((key) => {
        encodedNames[key] = fieldNames[Number(key)];
      });
      entry.fieldNames = encodedNames;
    }
    typeNames.push(entry);
  });

  return {
    format: MODULE_FORMAT,
    version: MODULE_FORMAT_VERSION,
    types,
    typeNames,
    functions,
    globals,
    tables,
    elementSegments,
  };
};

const buildHeapTypes = (builder: TypeBuilder): DefinedHeapType[] => {
  try {
    return builder.build();
  } catch (error) {
    if (!(error instanceof TypeBuilderBuildError)) throw error;
    throw new ModuleDecodeError(
      `$.types[${error.errorIndex}]`,
      describeBuildFailure(error.errorReason)
    );
  }
};

const describeBuildFailure = (reason: TypeBuilderErrorReason): string => {
  switch (reason) {
    case "invalid-supertype":
      return "supertype must be a defined heap type of the same kind";
    case "supertype-cycle":
      return "supertype chain loops back on itself";
    case "incomplete-definition":
      return "missing definition";
    case "foreign-temp-heap-type":
      return "refers to a heap type outside the types table";
  }
};

const expectExpression = (value: unknown, path: string): Expression => {
  if (!isRecord(value) || !hasExpressionShape(value)) {
    throw new ModuleDecodeError(path, "expected an expression");
  }
  return value;
};

const expectType = (value: unknown, path: string): Type => {
  if (
    isRecord(value) &&
    (value.kind === "basic" ||
      value.kind === "ref" ||
      value.kind === "rtt" ||
      value.kind === "tuple") &&
    isType(value)
  ) {
    return value;
  }
  throw new ModuleDecodeError(path, "expected a type");
};

const isType = (value: Record<string, unknown>): value is Record<string, unknown> & Type => {
  switch (value.kind) {
    case "basic":
      return typeof value.name === "string" && isBasicTypeName(value.name);
    case "ref":
      return typeof value.nullable === "boolean" && isHeapType(value.heapType);
    case "rtt":
      return isHeapType(value.heapType);
    case "tuple":
      return (
        Array.isArray(value.types) &&
        value.types.every((t) => isRecord(t) && isType(t))
      );
    default:
      return false;
  }
};

const isHeapType = (value: unknown): value is HeapType =>
  isRecord(value) &&
  (value.kind === "abstract" ||
    value.kind === "signature" ||
    value.kind === "struct" ||
    value.kind === "array" ||
    value.kind === "temp");

const expectHeapType = (value: unknown, path: string): HeapType => {
  if (!isHeapType(value)) throw new ModuleDecodeError(path, "expected a heap type");
  return value;
};

const expectSignature = (value: unknown, path: string): Signature => {
  if (!isRecord(value)) throw new ModuleDecodeError(path, "expected a signature");
  return {
    params: expectType(value.params, `${path}.params`),
    results: expectType(value.results, `${path}.results`),
  };
};

// ---------------------------------------------------------------------------
// Decoding

const expectRecord = (value: unknown, path: string): Record<string, unknown> => {
  if (!isRecord(value)) throw new ModuleDecodeError(path, "expected an object");
  return value;
};

const expectArray = (value: unknown, path: string): unknown[] => {
  if (!Array.isArray(value)) throw new ModuleDecodeError(path, "expected an array");
  return value;
};

const expectString = (value: unknown, path: string): string => {
  if (typeof value !== "string") throw new ModuleDecodeError(path, "expected a string");
  return value;
};

const expectNumber = (value: unknown, path: string): number => {
  if (typeof value !== "number" || Number.isNaN(value)) {
    throw new ModuleDecodeError(path, "expected a number");
  }
  return value;
};

const expectBoolean = (value: unknown, path: string): boolean => {
  if (typeof value !== "boolean") throw new ModuleDecodeError(path, "expected a boolean");
  return value;
};

/** msgpack turns absent optional values into nil */
const isAbsent = (value: unknown): value is null | undefined =>
  value === undefined || value === null;

const optional = <T>(
  value: unknown,
  path: string,
  read: (value: unknown, path: string) => T
): T | undefined => (isAbsent(value) ? undefined : read(value, path));

const expectPackedType = (value: unknown, path: string): PackedType => {
  if (value === "not-packed" || value === "i8" || value === "i16") return value;
  throw new ModuleDecodeError(path, "expected not-packed, i8 or i16");
};

export const decodeModule = (data: unknown): Module => {
  const root = expectRecord(data, "$");
  if (root.format !== MODULE_FORMAT) {
    throw new ModuleDecodeError("$.format", `expected ${MODULE_FORMAT}`);
  }
  if (root.version !== MODULE_FORMAT_VERSION) {
    throw new ModuleDecodeError(
      "$.version",
      `unsupported version ${String(root.version)}`
    );
  }

  const typeEntries = expectArray(root.types, "$.types");

  const readHeapRef = (
    value: unknown,
    path: string,
    lookup: (index: number) => HeapType
  ): HeapType => {
    if (typeof value === "string" && isAbstractHeapTypeName(value)) {
      return abstractHeapType(value);
    }
    if (
      typeof value === "number" &&
      Number.isInteger(value) &&
      value >= 0 &&
      value < typeEntries.length
    ) {
      return lookup(value);
    }
    throw new ModuleDecodeError(path, "expected a heap type index or abstract heap type");
  };

  const readType = (
    value: unknown,
    path: string,
    lookup: (index: number) => HeapType
  ): Type => {
    const json = expectRecord(value, path);
    switch (json.kind) {
      case "basic": {
        const name = expectString(json.name, `${path}.name`);
        if (!isBasicTypeName(name)) {
          throw new ModuleDecodeError(`${path}.name`, `unknown basic type ${name}`);
        }
        return basicType(name);
      }
      case "ref":
        return {
          kind: "ref",
          heapType: readHeapRef(json.heapType, `${path}.heapType`, lookup),
          nullable: expectBoolean(json.nullable, `${path}.nullable`),
        };
      case "rtt": {
        const heapType = readHeapRef(json.heapType, `${path}.heapType`, lookup);
        const depth = optional(json.depth, `${path}.depth`, expectNumber);
        return depth === undefined
          ? { kind: "rtt", heapType }
          : { kind: "rtt", depth, heapType };
      }
      case "tuple":
        return {
          kind: "tuple",
          types: expectArray(json.types, `${path}.types`).map((t, i) =>
            readType(t, `${path}.types[${i}]`, lookup)
          ),
        };
      default:
        throw new ModuleDecodeError(`${path}.kind`, "expected basic, ref, rtt or tuple");
    }
  };

  const readField = (
    value: unknown,
    path: string,
    lookup: (index: number) => HeapType
  ): Field => {
    const json = expectRecord(value, path);
    return {
      type: readType(json.type, `${path}.type`, lookup),
      packedType: expectPackedType(json.packedType, `${path}.packedType`),
      mutable: expectBoolean(json.mutable, `${path}.mutable`),
    };
  };

  // Heap type definitions refer to each other, possibly cyclically, so they
  // are rebuilt as one builder session.
  const builder = new TypeBuilder(typeEntries.length);
  const temp = (index: number) => builder.getTempHeapType(index);
  typeEntries.forEach((entry, index) => {
    const path = `$.types[${index}]`;
    const json = expectRecord(entry, path);
    switch (json.kind) {
      case "signature":
        builder.setSignature(index, {
          params: readType(json.params, `${path}.params`, temp),
          results: readType(json.results, `${path}.results`, temp),
        });
        break;
      case "struct":
        builder.setStruct(
          index,
          expectArray(json.fields, `${path}.fields`).map((f, i) =>
            readField(f, `${path}.fields[${i}]`, temp)
          )
        );
        break;
      case "array":
        builder.setArray(index, readField(json.element, `${path}.element`, temp));
        break;
      default:
        throw new ModuleDecodeError(`${path}.kind`, "expected signature, struct or array");
    }
    if (!isAbsent(json.supertype)) {
      builder.setSubType(index, readHeapRef(json.supertype, `${path}.supertype`, temp));
    }
  });
  const heapTypes = buildHeapTypes(builder);
  const lookup = (index: number): HeapType => heapTypes[index];

  const type = (value: unknown, path: string) => readType(value, path, lookup);

  const decodeAttribute = (codec: FieldCodec, value: unknown, path: string): unknown => {
    switch (codec) {
      case "expr":
        return expression(value, path);
      case "expr?":
        return optional(value, path, expression);
      case "exprs":
        return expectArray(value, path).map((item, i) => expression(item, `${path}[${i}]`));
      case "string":
        return expectString(value, path);
      case "string?":
        return optional(value, path, expectString);
      case "strings":
        return expectArray(value, path).map((item, i) => expectString(item, `${path}[${i}]`));
      case "number":
        return expectNumber(value, path);
      case "boolean":
        return expectBoolean(value, path);
      case "type":
        return type(value, path);
      case "heapType":
        return readHeapRef(value, path, lookup);
      case "signature": {
        const json = expectRecord(value, path);
        return {
          params: type(json.params, `${path}.params`),
          results: type(json.results, `${path}.results`),
        };
      }
      case "brOnOp": {
        const op = expectString(value, path);
        if (!isBrOnOp(op)) throw new ModuleDecodeError(path, `unknown br_on op ${op}`);
        return op;
      }
    }
  };

  const expression = (value: unknown, path: string): Expression => {
    const json = expectRecord(value, path);
    const kind = expectString(json.kind, `${path}.kind`);
    if (!isExpressionKind(kind)) {
      throw new ModuleDecodeError(`${path}.kind`, `unknown expression kind ${kind}`);
    }
    const decoded: Record<string, unknown> = {
      kind,
      type: type(json.type, `${path}.type`),
    };
    schemaEntries(kind).forEach(([key, codec]) => {
      const attribute = decodeAttribute(codec, json[key], `${path}.${key}`);
      if (attribute !== undefined) decoded[key] = attribute;
    });
    if (!hasExpressionShape(decoded)) {
      throw new ModuleDecodeError(path, `malformed ${kind} expression`);
    }
    return decoded;
  };

  const module = createModule();

  expectArray(root.typeNames, "$.typeNames").forEach((entry, i) => {
    const path = `$.typeNames[${i}]`;
    const json = expectRecord(entry, path);
    const heapType = readHeapRef(json.type, `${path}.type`, lookup);
    const names: TypeNames = { name: expectString(json.name, `${path}.name`) };
    if (!isAbsent(json.fieldNames)) {
      const fieldNames: Record<number, string> = {};
      Object.entries(expectRecord(json.fieldNames, `${path}.fieldNames`)).forEach(
        ([index, name]) => {
          fieldNames[Number(index)] = expectString(name, `${path}.fieldNames.${index}`);
        }
      );
      names.fieldNames = fieldNames;
    }
    module.typeNames.set(heapType, names);
  });

  module.functions = expectArray(root.functions, "$.functions").map((entry, i) => {
    const path = `$.functions[${i}]`;
    const json = expectRecord(entry, path);
    return {
      name: expectString(json.name, `${path}.name`),
      type: readHeapRef(json.type, `${path}.type`, lookup),
      vars: expectArray(json.vars, `${path}.vars`).map((v, j) =>
        type(v, `${path}.vars[${j}]`)
      ),
      body: optional(json.body, `${path}.body`, expression),
    };
  });

  module.globals = expectArray(root.globals, "$.globals").map((entry, i) => {
    const path = `$.globals[${i}]`;
    const json = expectRecord(entry, path);
    return {
      name: expectString(json.name, `${path}.name`),
      type: type(json.type, `${path}.type`),
      mutable: expectBoolean(json.mutable, `${path}.mutable`),
      init: optional(json.init, `${path}.init`, expression),
    };
  });

  module.tables = expectArray(root.tables, "$.tables").map((entry, i) => {
    const path = `$.tables[${i}]`;
    const json = expectRecord(entry, path);
    return {
      name: expectString(json.name, `${path}.name`),
      type: type(json.type, `${path}.type`),
      initial: expectNumber(json.initial, `${path}.initial`),
      max: optional(json.max, `${path}.max`, expectNumber),
    };
  });

  module.elementSegments = expectArray(root.elementSegments, "$.elementSegments").map(
    (entry, i) => {
      const path = `$.elementSegments[${i}]`;
      const json = expectRecord(entry, path);
      return {
        name: expectString(json.name, `${path}.name`),
        table: optional(json.table, `${path}.table`, expectString),
        offset: optional(json.offset, `${path}.offset`, expression),
        type: type(json.type, `${path}.type`),
        data: expectArray(json.data, `${path}.data`).map((item, j) =>
          expression(item, `${path}.data[${j}]`)
        ),
      };
    }
  );

  return module;
};
