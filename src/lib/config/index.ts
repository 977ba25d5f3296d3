import { getConfigFromCli } from "./arg-parser.js";
import type { VTableIndexesConfig } from "./types.js";

export type { VTableIndexesConfig } from "./types.js";

let config: VTableIndexesConfig | undefined = undefined;
export const getConfig = () => {
  if (config) return config;
  config = getConfigFromCli();
  return config;
};
