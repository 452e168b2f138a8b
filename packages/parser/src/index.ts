export * from "./syntax.js";
export { XdrSyntaxError } from "./errors.js";
export { Lexer, lex } from "./lexer.js";
export { Token, type TokenKind } from "./token.js";
export { CharStream } from "./char-stream.js";
export { parse, tryParse, type ParseResult } from "./parser.js";
