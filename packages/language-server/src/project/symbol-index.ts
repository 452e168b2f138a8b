import { tryParse, type Specification } from "@xdr-lsp/parser";
import type { Location, Position } from "vscode-languageserver/lib/node/main.js";
import { occurrences } from "./occurrences.js";
import { LineIndex, partitionPoint } from "./text.js";
import type { FileIndex, Token } from "./types.js";

export const buildFileIndex = ({
  uri,
  source,
  specification,
  version,
}: {
  uri: string;
  source: string;
  specification: Specification;
  version: number;
}): FileIndex => {
  const lineIndex = new LineIndex(source);
  const tokensByLine = new Map<number, Token[]>();
  const definitions = new Map<string, Location>();
  const references = new Map<string, Location[]>();

  for (const { id, isDefinition } of occurrences(specification)) {
    const range = lineIndex.spanRange(id.start, id.end);
    const location: Location = { uri, range };

    const lineTokens = tokensByLine.get(range.start.line) ?? [];
    lineTokens.push({
      start: range.start.character,
      end: range.end.character,
      name: id.name,
    });
    tokensByLine.set(range.start.line, lineTokens);

    if (isDefinition) {
      definitions.set(id.name, location);
      continue;
    }

    const locations = references.get(id.name) ?? [];
    locations.push(location);
    references.set(id.name, locations);
  }

  for (const lineTokens of tokensByLine.values()) {
    lineTokens.sort((left, right) => left.start - right.start);
  }

  return { uri, version, tokensByLine, definitions, references };
};

/**
 * Definition and reference tables for every indexed file. State is kept per
 * file; the global name tables are views over the files in indexing order, so
 * when two files define the same name the most recently indexed one wins.
 */
export class SymbolIndex {
  readonly #files = new Map<string, FileIndex>();

  get fileCount(): number {
    return this.#files.size;
  }

  files(): string[] {
    return Array.from(this.#files.keys());
  }

  versionOf(uri: string): number | undefined {
    return this.#files.get(uri)?.version;
  }

  /** Adds or replaces the entries for `uri`, moving it to the end of the indexing order. */
  addFile({
    uri,
    source,
    specification,
  }: {
    uri: string;
    source: string;
    specification: Specification;
  }): FileIndex {
    const version = (this.#files.get(uri)?.version ?? 0) + 1;
    const fileIndex = buildFileIndex({ uri, source, specification, version });
    this.#files.delete(uri);
    this.#files.set(uri, fileIndex);
    return fileIndex;
  }

  /**
   * Replaces one file's entries from new text. A file that no longer parses
   * loses its entries. Returns whether the text parsed.
   */
  reindex(uri: string, source: string): boolean {
    const result = tryParse(source);
    if (!result.ok) {
      this.#files.delete(uri);
      return false;
    }
    this.addFile({ uri, source, specification: result.specification });
    return true;
  }

  removeFile(uri: string): boolean {
    return this.#files.delete(uri);
  }

  tokensOnLine(uri: string, line: number): readonly Token[] | undefined {
    return this.#files.get(uri)?.tokensByLine.get(line);
  }

  /** Name of the token on `position.line` whose `[start, end]` columns contain the position. */
  identifierAt(uri: string, position: Position): string | undefined {
    const tokens = this.tokensOnLine(uri, position.line);
    if (!tokens) {
      return undefined;
    }

    const index = partitionPoint(tokens, (token) => token.start <= position.character);
    const token = index === 0 ? undefined : tokens[index - 1];
    if (!token || position.character > token.end) {
      return undefined;
    }
    return token.name;
  }

  definitionOf(name: string): Location | undefined {
    let found: Location | undefined;
    for (const file of this.#files.values()) {
      found = file.definitions.get(name) ?? found;
    }
    return found;
  }

  /**
   * `undefined` means no file references `name`; an array (possibly empty)
   * means the name is known. The definition, when requested and present, is
   * appended last.
   */
  referencesOf(name: string, includeDeclaration = false): Location[] | undefined {
    let locations: Location[] | undefined;
    for (const file of this.#files.values()) {
      const fileLocations = file.references.get(name);
      if (fileLocations) {
        locations ??= [];
        locations.push(...fileLocations);
      }
    }

    if (!locations) {
      return undefined;
    }

    if (includeDeclaration) {
      const definition = this.definitionOf(name);
      if (definition) {
        locations.push(definition);
      }
    }
    return locations;
  }
}
