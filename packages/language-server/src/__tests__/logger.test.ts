import { describe, expect, it } from "vitest";
import { createConnectionLogger, isLogLevel } from "../logger.js";

const createConsole = () => {
  const messages: string[] = [];
  const record = (kind: string) => (message: string) => {
    messages.push(`${kind} ${message}`);
  };
  return {
    messages,
    console: {
      log: record("log"),
      info: record("info"),
      warn: record("warn"),
      error: record("error"),
    },
  };
};

describe("connection logger", () => {
  it("prefixes messages with their component", () => {
    const { console, messages } = createConsole();
    const logger = createConnectionLogger(console, "debug");

    logger.debug("workspace", "skipping a.x");
    logger.info("server", "server initialized");

    expect(messages).toEqual(["log workspace: skipping a.x", "info server: server initialized"]);
  });

  it("drops messages below the configured level", () => {
    const { console, messages } = createConsole();
    const logger = createConnectionLogger(console, "warn");

    logger.debug("index", "one");
    logger.info("index", "two");
    logger.warn("index", "three");
    logger.error("index", "four");

    expect(messages).toEqual(["warn index: three", "error index: four"]);
  });

  it("recognizes log level names", () => {
    expect(isLogLevel("warn")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
  });
});
