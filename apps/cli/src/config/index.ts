import { getConfigFromCli } from "./arg-parser.js";
import type { StagelensConfig } from "./types.js";

let config: StagelensConfig | undefined = undefined;

export const getConfig = () => {
  if (config) {
    return config;
  }
  config = getConfigFromCli();
  return config;
};
