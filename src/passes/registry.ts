import { createCheckVTableAssumptionsPass } from "./check-vtable-assumptions.js";
import type { Pass } from "./pass-runner.js";
import { createVTableToIndexesPass } from "./vtable-to-indexes/index.js";

const passRegistry: Record<string, () => Pass> = {
  "vtable-to-indexes": createVTableToIndexesPass,
  "check-vtable-assumptions": createCheckVTableAssumptionsPass,
};

export const passNames = (): string[] => Object.keys(passRegistry);

export const createPass = (name: string): Pass => {
  const create = Object.hasOwn(passRegistry, name) ? passRegistry[name] : undefined;
  if (!create) {
    throw new Error(
      `unknown pass ${name} (available: ${passNames().join(", ")})`
    );
  }
  return create();
};
