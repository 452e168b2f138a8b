import { CommanderError } from "commander";
import { getConfig } from "./config/index.js";
import { startServer } from "./server.js";

try {
  startServer({ config: getConfig() });
} catch (error) {
  if (error instanceof CommanderError) {
    process.exit(error.exitCode);
  }
  throw error;
}
