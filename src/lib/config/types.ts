import type { ModuleFileFormat } from "../module-file.js";

export type VTableIndexesConfig = {
  /** Module file to transform */
  input: string;
  /** Output file, stdout when absent */
  out?: string;
  /** Input format, inferred from the input extension when absent */
  format?: ModuleFileFormat;
  /** Output format, inferred from the output extension when absent */
  outFormat?: ModuleFileFormat;
  /** Run the vtable assumption check before transforming */
  checkAssumptions?: boolean;
  /** Print the rewritten heap types instead of the module */
  emitTypes?: boolean;
  /** Build the rewritten type graph with binaryen */
  checkBinaryen?: boolean;
  /** Decode and re-encode without transforming */
  skipTransform?: boolean;
};
