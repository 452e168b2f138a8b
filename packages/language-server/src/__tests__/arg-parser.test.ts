import { CommanderError } from "commander";
import { describe, expect, it } from "vitest";
import { parseServerConfig } from "../config/arg-parser.js";

describe("parseServerConfig", () => {
  it("defaults to .x files at info level", () => {
    expect(parseServerConfig([])).toEqual({ extensions: ["x"], logLevel: "info" });
  });

  it("accepts the transport flags passed by language clients", () => {
    expect(
      parseServerConfig(["--stdio", "--clientProcessId=4242"]),
    ).toEqual({ extensions: ["x"], logLevel: "info" });
    expect(parseServerConfig(["--socket=5007"]).logLevel).toBe("info");
  });

  it("collects repeatable --extension options without leading dots", () => {
    const config = parseServerConfig(["--extension", ".xdr", "--extension", "x"]);
    expect(config.extensions).toEqual(["xdr", "x"]);
  });

  it("normalizes the log level", () => {
    expect(parseServerConfig(["--log-level", "DEBUG"]).logLevel).toBe("debug");
  });

  it("rejects unknown log levels", () => {
    expect(() => parseServerConfig(["--log-level", "loud"])).toThrow(CommanderError);
  });
});
