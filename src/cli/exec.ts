import binaryen from "binaryen";
import { stdout } from "process";
import { DiagnosticError, formatDiagnostic } from "../diagnostics/index.js";
import { createHeapTypeNamer, formatHeapType } from "../ir/format.js";
import { collectHeapTypes } from "../ir/module-utils.js";
import type { Module } from "../ir/module.js";
import { materializeHeapTypes } from "../lib/binaryen-gc/index.js";
import { getConfig, type VTableIndexesConfig } from "../lib/config/index.js";
import {
  inferFormat,
  readModuleFile,
  serializeModule,
  writeModuleFile,
} from "../lib/module-file.js";
import { PassRunner } from "../passes/pass-runner.js";

export const exec = () => main().catch(errorHandler);

async function main() {
  return run(getConfig());
}

/** Reads, transforms and writes one module as `config` describes */
export async function run(config: VTableIndexesConfig) {
  const module = await readModuleFile(
    config.input,
    config.format ?? inferFormat(config.input)
  );

  const runner = new PassRunner();
  if (config.checkAssumptions) runner.add("check-vtable-assumptions");
  if (!config.skipTransform) runner.add("vtable-to-indexes");
  runner.run(module);

  if (config.checkBinaryen) {
    checkBinaryen(module);
  }

  if (config.emitTypes) {
    return console.log(describeHeapTypes(module).join("\n"));
  }

  if (config.out) {
    return writeModuleFile(
      config.out,
      module,
      config.outFormat ?? inferFormat(config.out)
    );
  }

  stdout.write(serializeModule(module, config.outFormat ?? "json"));
}

/** One `(type $Name <definition>)` line per heap type, in collection order */
export const describeHeapTypes = (module: Module): string[] => {
  const { types, indices } = collectHeapTypes(module);
  const namer = createHeapTypeNamer({ names: module.typeNames, indices });
  return types.map((type) => `(type ${namer(type)} ${formatHeapType(type, namer)})`);
};

// Reports on stderr; stdout stays a module document.
function checkBinaryen(module: Module) {
  const { types } = collectHeapTypes(module);
  const mod = new binaryen.Module();
  try {
    mod.setFeatures(binaryen.Features.All);
    const refs = materializeHeapTypes(types, { module: mod, typeNames: module.typeNames });
    console.error(`binaryen built ${refs.length} heap types`);
  } finally {
    mod.dispose();
  }
}

function errorHandler(error: unknown) {
  if (error instanceof DiagnosticError) {
    error.diagnostics.forEach((diagnostic) =>
      console.error(formatDiagnostic(diagnostic))
    );
  } else {
    console.error(error);
  }
  process.exit(1);
}
