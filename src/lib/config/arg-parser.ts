import { Command, Option } from "commander";
import { createRequire } from "node:module";
import { isModuleFileFormat, type ModuleFileFormat } from "../module-file.js";
import type { VTableIndexesConfig } from "./types.js";

const require = createRequire(import.meta.url);

const readVersion = (): string => {
  const pkg: unknown = require("../../../package.json");
  if (typeof pkg === "object" && pkg !== null && "version" in pkg) {
    return String(pkg.version);
  }
  return "0.0.0";
};

const formatOption = (flags: string, description: string) =>
  new Option(flags, description).choices(["json", "msgpack"]);

const toFormat = (value?: string): ModuleFileFormat | undefined =>
  value !== undefined && isModuleFileFormat(value) ? value : undefined;

type CliOptions = {
  out?: string;
  format?: string;
  outFormat?: string;
  checkAssumptions?: boolean;
  emitTypes?: boolean;
  checkBinaryen?: boolean;
  skipTransform?: boolean;
};

export const getConfigFromCli = (): VTableIndexesConfig => {
  const program = new Command();

  program
    .name("vtable-indexes")
    .description(
      "Rewrite function reference struct fields of a Wasm GC module to i32 table indexes"
    )
    .version(readVersion(), "-v, --version", "display the current version")
    .argument("<input>", "module file (.json, .msgpack or .mpk)")
    .option("-o, --out <path>", "output file (default: JSON on stdout)")
    .addOption(formatOption("--format <format>", "input format"))
    .addOption(formatOption("--out-format <format>", "output format"))
    .option(
      "--check-assumptions",
      "check the module against the pass's input contract first"
    )
    .option("--emit-types", "write the rewritten heap types to stdout")
    .option("--check-binaryen", "build the rewritten type graph with binaryen")
    .option("--skip-transform", "decode and re-encode the module only")
    .helpOption("-h, --help", "display help for command");

  program.parse();
  const opts = program.opts<CliOptions>();
  const [input] = program.args;

  return {
    input,
    out: opts.out,
    format: toFormat(opts.format),
    outFormat: toFormat(opts.outFormat),
    checkAssumptions: opts.checkAssumptions,
    emitTypes: opts.emitTypes,
    checkBinaryen: opts.checkBinaryen,
    skipTransform: opts.skipTransform,
  };
};
