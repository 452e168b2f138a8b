import { getConfigFromCli } from "./arg-parser.js";
import type { ServerConfig } from "./types.js";

export { parseServerConfig } from "./arg-parser.js";
export { DEFAULT_SCHEMA_EXTENSIONS, defaultServerConfig, type ServerConfig } from "./types.js";

let config: ServerConfig | undefined = undefined;

export const getConfig = () => {
  if (config) {
    return config;
  }
  config = getConfigFromCli();
  return config;
};
