import type { Expression } from "./expressions.js";
import type { HeapType, Type } from "./types.js";

export interface Func {
  name: string;
  /** Signature heap type */
  type: HeapType;
  /** Locals beyond the parameters */
  vars: Type[];
  /** Absent for imported functions */
  body?: Expression;
}

export interface Global {
  name: string;
  type: Type;
  mutable: boolean;
  init?: Expression;
}

export interface Table {
  name: string;
  type: Type;
  initial: number;
  max?: number;
}

export interface ElementSegment {
  name: string;
  table?: string;
  offset?: Expression;
  type: Type;
  data: Expression[];
}

export interface TypeNames {
  name: string;
  /** Field index to field name */
  fieldNames?: Readonly<Record<number, string>>;
}

export interface Module {
  functions: Func[];
  globals: Global[];
  tables: Table[];
  elementSegments: ElementSegment[];
  typeNames: Map<HeapType, TypeNames>;
}

export const createModule = (init: Partial<Module> = {}): Module => ({
  functions: init.functions ?? [],
  globals: init.globals ?? [],
  tables: init.tables ?? [],
  elementSegments: init.elementSegments ?? [],
  typeNames: init.typeNames ?? new Map(),
});

export const getFunction = (module: Module, name: string): Func => {
  const func = module.functions.find((candidate) => candidate.name === name);
  if (!func) {
    throw new Error(`module has no function named ${name}`);
  }
  return func;
};
