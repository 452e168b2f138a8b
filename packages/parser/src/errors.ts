export class XdrSyntaxError extends Error {
  /** Offset into the source text where parsing stopped */
  readonly offset: number;

  constructor(message: string, offset: number) {
    super(message);
    this.name = "XdrSyntaxError";
    this.offset = offset;
  }
}

