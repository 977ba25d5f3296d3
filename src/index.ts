import type { Module } from "./ir/module.js";
import { PassRunner, type PassRunnerOptions } from "./passes/pass-runner.js";

export * from "./ir/types.js";
export * from "./ir/expressions.js";
export * from "./ir/module.js";
export { TypeBuilder, TypeBuilderBuildError } from "./ir/type-builder.js";
export type { TypeBuilderErrorReason } from "./ir/type-builder.js";
export { childrenOf, updateTypeFields, walkExpression } from "./ir/delegations.js";
export type { TypeFieldUpdater } from "./ir/delegations.js";
export { collectHeapTypes, walkModuleCode } from "./ir/module-utils.js";
export type { HeapTypeCollection } from "./ir/module-utils.js";
export { createHeapTypeNamer, formatHeapType, formatType } from "./ir/format.js";
export type { FormatOptions, HeapTypeNamer } from "./ir/format.js";
export {
  decodeModule,
  encodeModule,
  ModuleDecodeError,
  MODULE_FORMAT,
  MODULE_FORMAT_VERSION,
} from "./ir/serialize.js";
export type { EncodedModule } from "./ir/serialize.js";
export {
  inferFormat,
  parseModule,
  readModuleFile,
  serializeModule,
  writeModuleFile,
} from "./lib/module-file.js";
export type { ModuleFileFormat } from "./lib/module-file.js";
export {
  materializeHeapTypes,
  TypeBuilderBuildError as BinaryenTypeBuilderBuildError,
} from "./lib/binaryen-gc/index.js";
export type { MaterializeOptions } from "./lib/binaryen-gc/index.js";
export * from "./diagnostics/index.js";
export { PassRunner } from "./passes/pass-runner.js";
export type { FunctionWorker, Pass, PassRunnerOptions } from "./passes/pass-runner.js";
export { createPass, passNames } from "./passes/registry.js";
export {
  createVTableToIndexesPass,
  mapOldTypesToNew,
  rewriteTypeGraph,
  TypeUpdater,
  updateTypes,
  VTableToIndexes,
} from "./passes/vtable-to-indexes/index.js";
export type { HeapTypeMap } from "./passes/vtable-to-indexes/index.js";
export {
  CheckVTableAssumptions,
  createCheckVTableAssumptionsPass,
  findVTableAssumptionViolations,
} from "./passes/check-vtable-assumptions.js";

/** Rewrites every function reference struct field of `module` to `i32`, in place */
export const runVTableToIndexes = (
  module: Module,
  options?: PassRunnerOptions
): void => {
  new PassRunner(options).add("vtable-to-indexes").run(module);
};
