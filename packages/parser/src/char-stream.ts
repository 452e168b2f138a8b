export class CharStream {
  readonly contents: string;
  #index = 0;

  constructor(contents: string) {
    this.contents = contents;
  }

  /** Current offset into the source text */
  get position() {
    return this.#index;
  }

  get hasCharacters() {
    return this.#index < this.contents.length;
  }

  get next(): string | undefined {
    return this.contents[this.#index];
  }

  at(index: number): string | undefined {
    return this.contents[this.#index + index];
  }

  /** Returns the next character and advances past it */
  consumeChar(): string {
    const char = this.contents[this.#index];
    if (char === undefined) {
      throw new Error("Out of characters");
    }

    this.#index += 1;
    return char;
  }
}
