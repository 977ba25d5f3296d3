import {
  type ArrayHeapType,
  type DefinedHeapType,
  type Field,
  type HeapType,
  type RefType,
  type RttType,
  type Signature,
  type SignatureHeapType,
  type StructHeapType,
  type TempHeapType,
  type Type,
  type TupleType,
} from "./types.js";

export type TypeBuilderErrorReason =
  | "incomplete-definition"
  | "foreign-temp-heap-type"
  | "invalid-supertype"
  | "supertype-cycle";

export class TypeBuilderBuildError extends Error {
  errorIndex: number;
  errorReason: TypeBuilderErrorReason;

  constructor({
    errorIndex,
    errorReason,
  }: {
    errorIndex: number;
    errorReason: TypeBuilderErrorReason;
  }) {
    super(`TypeBuilder.build failed: index ${errorIndex}, reason ${errorReason}`);
    this.errorIndex = errorIndex;
    this.errorReason = errorReason;
  }
}

type Definition =
  | { kind: "signature"; signature: Signature }
  | { kind: "struct"; fields: readonly Field[] }
  | { kind: "array"; element: Field };

type Writable<T> = { -readonly [K in keyof T]: T[K] };

let nextBuilderId = 0;

/**
 * A single session for defining a group of heap types that may refer to each
 * other. Slots are addressed by index; `getTempHeapType` hands out a
 * placeholder for a slot before (or without) its definition, which is what
 * lets definitions form cycles. `build` swaps every placeholder for the final
 * heap type in one step.
 */
export class TypeBuilder {
  readonly id = nextBuilderId++;
  private readonly temps: TempHeapType[];
  private readonly definitions: (Definition | undefined)[];
  private readonly supertypes: (HeapType | undefined)[];
  private built = false;

  constructor(size: number) {
    this.temps = Array.from({ length: size }, (_, index) =>
      Object.freeze({ kind: "temp" as const, index, builderId: this.id })
    );
    this.definitions = new Array<Definition | undefined>(size).fill(undefined);
    this.supertypes = new Array<HeapType | undefined>(size).fill(undefined);
  }

  get size(): number {
    return this.temps.length;
  }

  getTempHeapType(index: number): TempHeapType {
    const temp = this.temps[index];
    if (!temp) {
      throw new RangeError(
        `TypeBuilder slot ${index} is out of bounds (size ${this.size})`
      );
    }
    return temp;
  }

  getTempRefType(heapType: HeapType, nullable = true): RefType {
    return { kind: "ref", heapType, nullable };
  }

  getTempRttType(heapType: HeapType, depth?: number): RttType {
    return depth === undefined
      ? { kind: "rtt", heapType }
      : { kind: "rtt", depth, heapType };
  }

  getTempTupleType(types: readonly Type[]): TupleType {
    return { kind: "tuple", types: [...types] };
  }

  setSignature(index: number, signature: Signature): void {
    this.define(index, { kind: "signature", signature });
  }

  setStruct(index: number, fields: readonly Field[]): void {
    this.define(index, { kind: "struct", fields: fields.map((f) => ({ ...f })) });
  }

  setArray(index: number, element: Field): void {
    this.define(index, { kind: "array", element: { ...element } });
  }

  setSubType(index: number, supertype: HeapType): void {
    this.assertOpenSlot(index);
    this.supertypes[index] = supertype;
  }

  /**
   * Resolves every slot to its final heap type. Nothing built here is visible
   * to the caller unless every slot resolves.
   */
  build(): DefinedHeapType[] {
    if (this.built) {
      throw new Error("TypeBuilder.build called twice on the same session");
    }

    const definitions = this.definitions.map((definition, errorIndex) => {
      if (!definition) {
        throw new TypeBuilderBuildError({
          errorIndex,
          errorReason: "incomplete-definition",
        });
      }
      return definition;
    });

    const fills: (() => void)[] = [];
    const results: DefinedHeapType[] = definitions.map((definition, index) => {
      switch (definition.kind) {
        case "signature": {
          const shell: Writable<SignatureHeapType> = {
            kind: "signature",
            signature: definition.signature,
          };
          fills.push(() => {
            shell.signature = {
              params: resolveType(definition.signature.params, index),
              results: resolveType(definition.signature.results, index),
            };
            shell.supertype = resolveSupertype(index, "signature");
          });
          return shell;
        }
        case "struct": {
          const shell: Writable<StructHeapType> = { kind: "struct", fields: [] };
          fills.push(() => {
            shell.fields = definition.fields.map((f) => resolveField(f, index));
            shell.supertype = resolveSupertype(index, "struct");
          });
          return shell;
        }
        case "array": {
          const shell: Writable<ArrayHeapType> = {
            kind: "array",
            element: definition.element,
          };
          fills.push(() => {
            shell.element = resolveField(definition.element, index);
            shell.supertype = resolveSupertype(index, "array");
          });
          return shell;
        }
      }
    });

    const resolveHeapType = (heapType: HeapType, slot: number): HeapType => {
      if (heapType.kind !== "temp") return heapType;
      const resolved = results[heapType.index];
      if (heapType.builderId !== this.id || !resolved) {
        throw new TypeBuilderBuildError({
          errorIndex: slot,
          errorReason: "foreign-temp-heap-type",
        });
      }
      return resolved;
    };

    const resolveType = (type: Type, slot: number): Type => {
      switch (type.kind) {
        case "basic":
          return type;
        case "ref":
          return { ...type, heapType: resolveHeapType(type.heapType, slot) };
        case "rtt":
          return { ...type, heapType: resolveHeapType(type.heapType, slot) };
        case "tuple":
          return {
            kind: "tuple",
            types: type.types.map((t) => resolveType(t, slot)),
          };
      }
    };

    const resolveField = (f: Field, slot: number): Field => ({
      ...f,
      type: resolveType(f.type, slot),
    });

    const resolveSupertype = (
      slot: number,
      kind: DefinedHeapType["kind"]
    ): HeapType | undefined => {
      const supertype = this.supertypes[slot];
      if (!supertype) return undefined;
      const resolved = resolveHeapType(supertype, slot);
      if (resolved.kind !== kind) {
        throw new TypeBuilderBuildError({
          errorIndex: slot,
          errorReason: "invalid-supertype",
        });
      }
      return resolved;
    };

    fills.forEach((fill) => fill());
    results.forEach((result, errorIndex) => {
      const seen = new Set<HeapType>([result]);
      for (let parent = result.supertype; parent; parent = parent.supertype) {
        if (seen.has(parent)) {
          throw new TypeBuilderBuildError({ errorIndex, errorReason: "supertype-cycle" });
        }
        seen.add(parent);
      }
    });
    this.built = true;
    return results;
  }

  private define(index: number, definition: Definition): void {
    this.assertOpenSlot(index);
    this.definitions[index] = definition;
  }

  private assertOpenSlot(index: number): void {
    this.getTempHeapType(index);
    if (this.built) {
      throw new Error("TypeBuilder session has already been built");
    }
  }
}
