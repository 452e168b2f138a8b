import { readFile, stat } from "node:fs/promises";
import { tryParse } from "@xdr-lsp/parser";
import { DEFAULT_SCHEMA_EXTENSIONS } from "../config/types.js";
import { silentLogger, type Logger } from "../logger.js";
import { collectSchemaFiles, normalizeFilePath, toFileUri } from "./files.js";
import { SymbolIndex } from "./symbol-index.js";

export class WorkspaceRootError extends Error {
  readonly rootDirectory: string;

  constructor(message: string, rootDirectory: string) {
    super(message);
    this.name = "WorkspaceRootError";
    this.rootDirectory = rootDirectory;
  }
}

const isDirectory = async (targetPath: string): Promise<boolean> =>
  stat(targetPath)
    .then((stats) => stats.isDirectory())
    .catch(() => false);

const readSource = async (filePath: string): Promise<string | Error> =>
  readFile(filePath, "utf8").catch((error: unknown) =>
    error instanceof Error ? error : new Error(String(error)),
  );

/**
 * Builds a fresh index from every schema file under `rootDirectory`. Files
 * that cannot be read or parsed contribute nothing. A missing root is fatal.
 */
export const discoverAndIndex = async (
  rootDirectory: string,
  {
    extensions = DEFAULT_SCHEMA_EXTENSIONS,
    logger = silentLogger,
  }: {
    extensions?: readonly string[];
    logger?: Logger;
  } = {},
): Promise<SymbolIndex> => {
  const root = normalizeFilePath(rootDirectory);
  if (!(await isDirectory(root))) {
    throw new WorkspaceRootError(`${root} is not a directory`, root);
  }

  const filePaths = await collectSchemaFiles({ root, extensions, logger });
  const sources = await Promise.all(filePaths.map(readSource));
  const index = new SymbolIndex();

  filePaths.forEach((filePath, position) => {
    const source = sources[position];
    if (source === undefined || source instanceof Error) {
      logger.debug("workspace", `skipping unreadable ${filePath}: ${source?.message ?? ""}`);
      return;
    }

    const result = tryParse(source);
    if (!result.ok) {
      logger.debug(
        "workspace",
        `skipping ${filePath}: ${result.error.message} at offset ${result.error.offset}`,
      );
      return;
    }

    index.addFile({
      uri: toFileUri(filePath),
      source,
      specification: result.specification,
    });
  });

  logger.info("workspace", `indexed ${index.fileCount} of ${filePaths.length} schema files`);
  return index;
};
