import type { Location } from "vscode-languageserver/lib/node/main.js";

/** A name on one line, used to resolve the identifier under the cursor. */
export type Token = {
  start: number;
  end: number;
  name: string;
};

/** Everything one schema file contributes to the index. */
export type FileIndex = {
  uri: string;
  version: number;
  /** Tokens per zero-based line, sorted by start column */
  tokensByLine: ReadonlyMap<number, readonly Token[]>;
  definitions: ReadonlyMap<string, Location>;
  references: ReadonlyMap<string, readonly Location[]>;
};
