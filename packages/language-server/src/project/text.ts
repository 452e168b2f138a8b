import type { Position, Range } from "vscode-languageserver/lib/node/main.js";

/**
 * Number of leading items for which `predicate` holds. `items` must be
 * partitioned: every match precedes every non-match.
 */
export const partitionPoint = <T>(
  items: readonly T[],
  predicate: (item: T) => boolean,
): number => {
  let low = 0;
  let high = items.length;

  while (low < high) {
    const mid = Math.floor((low + high) / 2);
    const item = items[mid];
    if (item !== undefined && predicate(item)) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }

  return low;
};

/**
 * Maps string offsets to zero-based line/character positions. Offsets count
 * UTF-16 code units, matching the protocol's default position encoding.
 */
export class LineIndex {
  readonly #starts: number[];

  constructor(private readonly text: string) {
    this.#starts = [0];
    for (let index = 0; index < text.length; index += 1) {
      if (text[index] === "\n") {
        this.#starts.push(index + 1);
      }
    }
  }

  get lineCount(): number {
    return this.#starts.length;
  }

  lineStart(line: number): number | undefined {
    return this.#starts[line];
  }

  positionAt(offset: number): Position {
    const clamped = Math.max(0, Math.min(offset, this.text.length));
    const line = partitionPoint(this.#starts, (start) => start <= clamped) - 1;
    return { line, character: clamped - (this.#starts[line] ?? 0) };
  }

  /** Both ends are measured from the start line, since identifiers never span lines. */
  spanRange(start: number, end: number): Range {
    const startPosition = this.positionAt(start);
    const lineStart = this.#starts[startPosition.line] ?? 0;

    return {
      start: startPosition,
      end: { line: startPosition.line, character: end - lineStart },
    };
  }
}
