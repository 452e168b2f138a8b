import type { RemoteConsole } from "vscode-languageserver/lib/node/main.js";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  debug(component: string, message: string): void;
  info(component: string, message: string): void;
  warn(component: string, message: string): void;
  error(component: string, message: string): void;
}

export const isLogLevel = (value: string): value is LogLevel =>
  LOG_LEVELS.some((level) => level === value);

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/**
 * Forwards log lines to the client through `window/logMessage`. Lines below
 * `level` are dropped.
 */
export const createConnectionLogger = (
  console: Pick<RemoteConsole, "log" | "info" | "warn" | "error">,
  level: LogLevel = "info",
): Logger => {
  const threshold = LOG_LEVELS.indexOf(level);
  const enabled = (candidate: LogLevel) => LOG_LEVELS.indexOf(candidate) >= threshold;
  const format = (component: string, message: string) => `${component}: ${message}`;

  return {
    debug(component, message) {
      if (enabled("debug")) console.log(format(component, message));
    },
    info(component, message) {
      if (enabled("info")) console.info(format(component, message));
    },
    warn(component, message) {
      if (enabled("warn")) console.warn(format(component, message));
    },
    error(component, message) {
      if (enabled("error")) console.error(format(component, message));
    },
  };
};
