import { Command, InvalidArgumentError } from "commander";
import { createRequire } from "node:module";
import { LOG_LEVELS, isLogLevel, type LogLevel } from "../logger.js";
import { DEFAULT_SCHEMA_EXTENSIONS, type ServerConfig } from "./types.js";

const require = createRequire(import.meta.url);
const { version } = require("../../package.json") as { version: string };

const appendOptionValue = (value: string, previous: string[]): string[] => [
  ...previous,
  value,
];

const parseLogLevel = (value: string): LogLevel => {
  const normalized = value.toLowerCase();
  if (isLogLevel(normalized)) {
    return normalized;
  }
  throw new InvalidArgumentError(
    `invalid log level "${value}" (allowed: ${LOG_LEVELS.join(", ")})`,
  );
};

const normalizeExtension = (extension: string): string => extension.replace(/^\.+/, "");

const createCommand = (): Command =>
  new Command()
    .name("xdr-language-server")
    .description("Language server for XDR schema files")
    .version(version, "-v, --version", "display the current version")
    .helpOption("-h, --help", "display help for command")
    .option(
      "--extension <ext>",
      `schema file extension (repeatable, default: ${DEFAULT_SCHEMA_EXTENSIONS.join(", ")})`,
      appendOptionValue,
      [],
    )
    .option(
      "--log-level <level>",
      `minimum log level (${LOG_LEVELS.join("|")})`,
      parseLogLevel,
      "info",
    )
    // Transport flags are read by vscode-languageserver itself.
    .option("--stdio", "communicate over stdin/stdout")
    .option("--node-ipc", "communicate over node IPC")
    .option("--socket <port>", "communicate over a socket")
    .option("--clientProcessId <pid>", "process id of the client")
    .allowUnknownOption()
    .allowExcessArguments()
    .exitOverride();

export const parseServerConfig = (argv: readonly string[]): ServerConfig => {
  const program = createCommand();
  program.parse(["node", "xdr-language-server", ...argv]);
  const opts = program.opts<{ extension: string[]; logLevel: LogLevel }>();
  const extensions = opts.extension.map(normalizeExtension).filter((ext) => ext.length > 0);

  return {
    extensions: extensions.length > 0 ? extensions : [...DEFAULT_SCHEMA_EXTENSIONS],
    logLevel: opts.logLevel,
  };
};

export const getConfigFromCli = (): ServerConfig => parseServerConfig(process.argv.slice(2));
