export type TokenKind = "identifier" | "keyword" | "number" | "punctuator" | "eof";

export class Token {
  readonly kind: TokenKind;
  readonly start: number;
  end: number;
  value = "";

  constructor(opts: { kind: TokenKind; start: number; value?: string }) {
    const { kind, start, value } = opts;
    this.kind = kind;
    this.start = start;
    this.value = value ?? "";
    this.end = start + this.value.length;
  }

  get isEof() {
    return this.kind === "eof";
  }

  addChar(char: string) {
    this.value += char;
    this.end += char.length;
  }

  is(value: string) {
    return this.kind !== "eof" && this.kind !== "number" && this.value === value;
  }

  describe(): string {
    return this.isEof ? "end of file" : `"${this.value}"`;
  }
}
