import { XdrSyntaxError } from "./errors.js";
import { SIMPLE_BUILTIN_TYPES } from "./grammar.js";
import { lex } from "./lexer.js";
import type {
  BuiltinTypeName,
  Declaration,
  Definition,
  EnumBody,
  EnumMember,
  Identifier,
  Specification,
  StructBody,
  TypeSpecifier,
  UnionBody,
  UnionCase,
  Value,
} from "./syntax.js";
import type { Token } from "./token.js";

export type ParseResult =
  | { ok: true; specification: Specification }
  | { ok: false; error: XdrSyntaxError };

const isSimpleBuiltin = (value: string): value is BuiltinTypeName =>
  SIMPLE_BUILTIN_TYPES.has(value);

/** Recursive-descent parser over the RFC 4506 grammar. */
class Parser {
  readonly #tokens: Token[];
  #index = 0;

  constructor(tokens: Token[]) {
    this.#tokens = tokens;
  }

  parseSpecification(): Specification {
    const definitions: Definition[] = [];
    while (!this.#peek().isEof) {
      definitions.push(this.#definition());
    }
    return { definitions };
  }

  #peek(): Token {
    const token = this.#tokens[this.#index];
    if (!token) {
      throw new XdrSyntaxError("Unexpected end of token stream", 0);
    }
    return token;
  }

  #advance(): Token {
    const token = this.#peek();
    if (!token.isEof) {
      this.#index += 1;
    }
    return token;
  }

  #check(value: string): boolean {
    return this.#peek().is(value);
  }

  #accept(value: string): boolean {
    if (!this.#check(value)) {
      return false;
    }
    this.#advance();
    return true;
  }

  #expect(value: string): Token {
    const token = this.#peek();
    if (!token.is(value)) {
      throw this.#unexpected(`"${value}"`);
    }
    return this.#advance();
  }

  #unexpected(expected: string): XdrSyntaxError {
    const token = this.#peek();
    return new XdrSyntaxError(
      `Expected ${expected} but found ${token.describe()}`,
      token.start,
    );
  }

  #identifier(): Identifier {
    const token = this.#peek();
    if (token.kind !== "identifier") {
      throw this.#unexpected("an identifier");
    }
    this.#advance();
    return { name: token.value, start: token.start, end: token.end };
  }

  #definition(): Definition {
    const token = this.#peek();
    if (token.kind !== "keyword") {
      throw this.#unexpected("a definition");
    }

    switch (token.value) {
      case "const": {
        this.#advance();
        const id = this.#identifier();
        this.#expect("=");
        const constant = this.#peek();
        if (constant.kind !== "number") {
          throw this.#unexpected("a constant");
        }
        this.#advance();
        this.#expect(";");
        return { kind: "constant", id, value: constant.value };
      }
      case "typedef": {
        this.#advance();
        const declaration = this.#declaration();
        this.#expect(";");
        return { kind: "typedef", declaration };
      }
      case "enum": {
        this.#advance();
        const id = this.#identifier();
        const body = this.#enumBody();
        this.#expect(";");
        return { kind: "enum", id, body };
      }
      case "struct": {
        this.#advance();
        const id = this.#identifier();
        const body = this.#structBody();
        this.#expect(";");
        return { kind: "struct", id, body };
      }
      case "union": {
        this.#advance();
        const id = this.#identifier();
        const body = this.#unionBody();
        this.#expect(";");
        return { kind: "union", id, body };
      }
      default:
        throw this.#unexpected("a definition");
    }
  }

  #declaration(): Declaration {
    if (this.#accept("void")) {
      return { kind: "void" };
    }

    if (this.#accept("opaque")) {
      const id = this.#identifier();
      if (this.#accept("[")) {
        const size = this.#value();
        this.#expect("]");
        return { kind: "fixed-opaque", id, size };
      }
      if (this.#check("<")) {
        return { kind: "variable-opaque", id, size: this.#boundedSize() };
      }
      throw this.#unexpected(`"[" or "<"`);
    }

    if (this.#accept("string")) {
      const id = this.#identifier();
      if (!this.#check("<")) {
        throw this.#unexpected(`"<"`);
      }
      return { kind: "string", id, size: this.#boundedSize() };
    }

    const type = this.#typeSpecifier();

    if (this.#accept("*")) {
      return { kind: "optional", type, id: this.#identifier() };
    }

    const id = this.#identifier();
    if (this.#accept("[")) {
      const size = this.#value();
      this.#expect("]");
      return { kind: "fixed-array", type, id, size };
    }
    if (this.#check("<")) {
      return { kind: "variable-array", type, id, size: this.#boundedSize() };
    }
    return { kind: "plain", type, id };
  }

  /** Parses `< [value] >`; an empty bound means no maximum. */
  #boundedSize(): Value | undefined {
    this.#expect("<");
    if (this.#accept(">")) {
      return undefined;
    }
    const size = this.#value();
    this.#expect(">");
    return size;
  }

  #value(): Value {
    const token = this.#peek();
    if (token.kind === "number") {
      this.#advance();
      return { kind: "constant", text: token.value };
    }
    if (token.kind === "identifier") {
      return { kind: "identifier", id: this.#identifier() };
    }
    throw this.#unexpected("a constant or identifier");
  }

  #typeSpecifier(): TypeSpecifier {
    const token = this.#peek();

    if (token.kind === "identifier") {
      return { kind: "named", id: this.#identifier() };
    }

    if (token.kind !== "keyword") {
      throw this.#unexpected("a type");
    }

    if (token.value === "unsigned") {
      this.#advance();
      if (this.#accept("int")) {
        return { kind: "builtin", name: "unsigned int" };
      }
      if (this.#accept("hyper")) {
        return { kind: "builtin", name: "unsigned hyper" };
      }
      return { kind: "builtin", name: "unsigned" };
    }

    if (isSimpleBuiltin(token.value)) {
      this.#advance();
      return { kind: "builtin", name: token.value };
    }

    switch (token.value) {
      case "enum":
        this.#advance();
        return { kind: "enum", body: this.#enumBody() };
      case "struct":
        this.#advance();
        return { kind: "struct", body: this.#structBody() };
      case "union":
        this.#advance();
        return { kind: "union", body: this.#unionBody() };
      default:
        throw this.#unexpected("a type");
    }
  }

  #enumBody(): EnumBody {
    this.#expect("{");
    const members: EnumMember[] = [];
    do {
      const id = this.#identifier();
      this.#expect("=");
      members.push({ id, value: this.#value() });
    } while (this.#accept(","));
    this.#expect("}");
    return { members };
  }

  #structBody(): StructBody {
    this.#expect("{");
    const declarations: Declaration[] = [];
    do {
      declarations.push(this.#declaration());
      this.#expect(";");
    } while (!this.#accept("}"));
    return { declarations };
  }

  #unionBody(): UnionBody {
    this.#expect("switch");
    this.#expect("(");
    const discriminant = this.#declaration();
    this.#expect(")");
    this.#expect("{");

    const cases: UnionCase[] = [];
    if (!this.#check("case")) {
      throw this.#unexpected(`"case"`);
    }
    while (this.#check("case")) {
      cases.push(this.#caseSpec());
    }

    let defaultCase: Declaration | undefined;
    if (this.#accept("default")) {
      this.#expect(":");
      defaultCase = this.#declaration();
      this.#expect(";");
    }

    this.#expect("}");
    return defaultCase ? { discriminant, cases, defaultCase } : { discriminant, cases };
  }

  #caseSpec(): UnionCase {
    const values: Value[] = [];
    while (this.#accept("case")) {
      values.push(this.#value());
      this.#expect(":");
    }
    const declaration = this.#declaration();
    this.#expect(";");
    return { values, declaration };
  }
}

/** Parses a whole schema file. Throws {@link XdrSyntaxError} on malformed input. */
export const parse = (text: string): Specification =>
  new Parser(lex(text)).parseSpecification();

export const tryParse = (text: string): ParseResult => {
  try {
    return { ok: true, specification: parse(text) };
  } catch (error) {
    if (error instanceof XdrSyntaxError) {
      return { ok: false, error };
    }
    throw error;
  }
};
