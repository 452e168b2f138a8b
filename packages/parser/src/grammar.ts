import type { BuiltinTypeName } from "./syntax.js";

export const KEYWORDS = new Set([
  "bool",
  "case",
  "const",
  "default",
  "double",
  "quadruple",
  "enum",
  "float",
  "hyper",
  "int",
  "opaque",
  "string",
  "struct",
  "switch",
  "typedef",
  "union",
  "unsigned",
  "void",
]);

/** Single-word builtins; `unsigned` is handled separately since it can prefix `int`/`hyper`. */
export const SIMPLE_BUILTIN_TYPES: ReadonlySet<string> = new Set<BuiltinTypeName>([
  "int",
  "hyper",
  "float",
  "double",
  "quadruple",
  "bool",
]);

export const PUNCTUATORS = new Set([
  "{",
  "}",
  "(",
  ")",
  "[",
  "]",
  "<",
  ">",
  ";",
  ",",
  "=",
  ":",
  "*",
]);

export const isKeyword = (word: string): boolean => KEYWORDS.has(word);

export const isWhitespace = (char: string | undefined): boolean =>
  char !== undefined && /\s/.test(char);

export const isDigit = (char: string | undefined): boolean =>
  char !== undefined && /^[0-9]$/.test(char);

export const isHexDigit = (char: string | undefined): boolean =>
  char !== undefined && /^[0-9a-fA-F]$/.test(char);

export const isIdentifierStart = (char: string | undefined): boolean =>
  char !== undefined && /^[A-Za-z]$/.test(char);

export const isIdentifierChar = (char: string | undefined): boolean =>
  char !== undefined && /^[A-Za-z0-9_]$/.test(char);

export const isPunctuator = (char: string | undefined): boolean =>
  char !== undefined && PUNCTUATORS.has(char);
