import { CharStream } from "./char-stream.js";
import { XdrSyntaxError } from "./errors.js";
import {
  isDigit,
  isHexDigit,
  isIdentifierChar,
  isIdentifierStart,
  isKeyword,
  isPunctuator,
  isWhitespace,
} from "./grammar.js";
import { Token } from "./token.js";

/**
 * Lexer for XDR schema text. Skips whitespace, C-style comments and rpcgen
 * `%` pass-through lines (a `%` that is the first non-blank character on its
 * line), and produces one token per call.
 */
export class Lexer {
  private lineHasContent = false;

  tokenize(chars: CharStream): Token {
    this.skipTrivia(chars);

    const start = chars.position;
    const char = chars.next;
    if (char === undefined) {
      return new Token({ kind: "eof", start });
    }

    this.lineHasContent = true;

    if (isDigit(char) || (char === "-" && isDigit(chars.at(1)))) {
      return this.consumeNumber(chars);
    }

    if (isIdentifierStart(char)) {
      return this.consumeWord(chars);
    }

    if (isPunctuator(char)) {
      return new Token({ kind: "punctuator", start, value: chars.consumeChar() });
    }

    throw new XdrSyntaxError(`Unexpected character "${char}"`, start);
  }

  private skipTrivia(chars: CharStream) {
    while (chars.hasCharacters) {
      const char = chars.next;

      if (char === "\n") {
        chars.consumeChar();
        this.lineHasContent = false;
        continue;
      }

      if (isWhitespace(char)) {
        chars.consumeChar();
        continue;
      }

      if (char === "/" && chars.at(1) === "*") {
        this.skipBlockComment(chars);
        continue;
      }

      if ((char === "/" && chars.at(1) === "/") || (char === "%" && !this.lineHasContent)) {
        this.skipToEndOfLine(chars);
        continue;
      }

      return;
    }
  }

  private skipBlockComment(chars: CharStream) {
    const start = chars.position;
    chars.consumeChar();
    chars.consumeChar();

    while (chars.hasCharacters) {
      if (chars.next === "*" && chars.at(1) === "/") {
        chars.consumeChar();
        chars.consumeChar();
        this.lineHasContent = true;
        return;
      }

      if (chars.consumeChar() === "\n") {
        this.lineHasContent = false;
      }
    }

    throw new XdrSyntaxError("Unterminated comment", start);
  }

  private skipToEndOfLine(chars: CharStream) {
    while (chars.hasCharacters && chars.next !== "\n") {
      chars.consumeChar();
    }
  }

  private consumeNumber(chars: CharStream): Token {
    const token = new Token({ kind: "number", start: chars.position });

    if (chars.next === "-") {
      token.addChar(chars.consumeChar());
    }

    if (chars.next === "0" && (chars.at(1) === "x" || chars.at(1) === "X")) {
      token.addChar(chars.consumeChar());
      token.addChar(chars.consumeChar());
      if (!isHexDigit(chars.next)) {
        throw new XdrSyntaxError(`Malformed constant "${token.value}"`, token.start);
      }
      while (isHexDigit(chars.next)) {
        token.addChar(chars.consumeChar());
      }
    } else {
      while (isDigit(chars.next)) {
        token.addChar(chars.consumeChar());
      }
    }

    if (isIdentifierChar(chars.next)) {
      throw new XdrSyntaxError(
        `Malformed constant "${token.value}${chars.next ?? ""}"`,
        token.start,
      );
    }

    return token;
  }

  private consumeWord(chars: CharStream): Token {
    const start = chars.position;
    let word = "";
    while (isIdentifierChar(chars.next)) {
      word += chars.consumeChar();
    }

    return new Token({
      kind: isKeyword(word) ? "keyword" : "identifier",
      start,
      value: word,
    });
  }
}

/** Tokenizes a whole file. The returned list always ends with an `eof` token. */
export const lex = (text: string): Token[] => {
  const chars = new CharStream(text);
  const lexer = new Lexer();
  const tokens: Token[] = [];

  while (true) {
    const token = lexer.tokenize(chars);
    tokens.push(token);
    if (token.isEof) {
      return tokens;
    }
  }
};
