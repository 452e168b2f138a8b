import type { Location, Position } from "vscode-languageserver/lib/node/main.js";
import { DEFAULT_SCHEMA_EXTENSIONS } from "../config/types.js";
import { silentLogger, type Logger } from "../logger.js";
import { normalizeFileUri } from "../project/files.js";
import { SymbolIndex } from "../project/symbol-index.js";
import { discoverAndIndex } from "../project/workspace.js";

/**
 * Owns the workspace index for the life of the server. Initialization runs
 * once; queries issued while it is in flight wait for it to finish and never
 * see a partially built index.
 */
export class WorkspaceIndexService {
  readonly #logger: Logger;
  readonly #extensions: readonly string[];
  #index = new SymbolIndex();
  #ready: Promise<void> | undefined;

  constructor({
    logger = silentLogger,
    extensions = DEFAULT_SCHEMA_EXTENSIONS,
  }: {
    logger?: Logger;
    extensions?: readonly string[];
  } = {}) {
    this.#logger = logger;
    this.#extensions = extensions;
  }

  initialize(rootDirectory: string): Promise<void> {
    const task = (async () => {
      this.#logger.info("index", `indexing ${rootDirectory}`);
      this.#index = await discoverAndIndex(rootDirectory, {
        extensions: this.#extensions,
        logger: this.#logger,
      });
    })();
    // Callers of `initialize` see the failure; queries keep answering from the empty index.
    this.#ready = task.catch(() => undefined);
    return task;
  }

  async #readyIndex(): Promise<SymbolIndex> {
    await this.#ready;
    return this.#index;
  }

  async identifierAt(uri: string, position: Position): Promise<string | undefined> {
    const index = await this.#readyIndex();
    return index.identifierAt(normalizeFileUri(uri), position);
  }

  async definitionOf(name: string): Promise<Location | undefined> {
    const index = await this.#readyIndex();
    return index.definitionOf(name);
  }

  async referencesOf(
    name: string,
    includeDeclaration: boolean,
  ): Promise<Location[] | undefined> {
    const index = await this.#readyIndex();
    return index.referencesOf(name, includeDeclaration);
  }

  async definitionAt(uri: string, position: Position): Promise<Location | undefined> {
    const name = await this.identifierAt(uri, position);
    return name === undefined ? undefined : this.definitionOf(name);
  }

  async referencesAt(
    uri: string,
    position: Position,
    includeDeclaration: boolean,
  ): Promise<Location[] | undefined> {
    const name = await this.identifierAt(uri, position);
    return name === undefined ? undefined : this.referencesOf(name, includeDeclaration);
  }

  async reindex(uri: string, source: string): Promise<boolean> {
    const index = await this.#readyIndex();
    const parsed = index.reindex(normalizeFileUri(uri), source);
    if (!parsed) {
      this.#logger.debug("index", `dropped entries for ${uri}: text no longer parses`);
    }
    return parsed;
  }
}
