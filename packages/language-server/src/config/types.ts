import type { LogLevel } from "../logger.js";

export type ServerConfig = {
  /** Schema file extensions without the leading dot */
  extensions: string[];
  logLevel: LogLevel;
};

export const DEFAULT_SCHEMA_EXTENSIONS: readonly string[] = ["x"];

export const defaultServerConfig: ServerConfig = {
  extensions: [...DEFAULT_SCHEMA_EXTENSIONS],
  logLevel: "info",
};
