import path from "node:path";
import type { Dirent } from "node:fs";
import { readdir, realpath, stat } from "node:fs/promises";
import { URI } from "vscode-uri";
import { silentLogger, type Logger } from "../logger.js";

export const normalizeFilePath = (filePath: string): string => path.resolve(filePath);

export const toFileUri = (filePath: string): string =>
  URI.file(path.resolve(filePath)).toString();

export const toFilePath = (uri: string): string => URI.parse(uri).fsPath;

export const isFileUri = (uri: string): boolean => URI.parse(uri).scheme === "file";

/** Canonical form of a `file:` URI, so differently escaped spellings compare equal. */
export const normalizeFileUri = (uri: string): string => toFileUri(toFilePath(uri));

export const hasSchemaExtension = (
  filePath: string,
  extensions: readonly string[],
): boolean => {
  const extension = path.extname(filePath);
  return extension.length > 1 && extensions.includes(extension.slice(1));
};

type EntryKind = "file" | "directory";

/** Symbolic links are resolved to what they point at; anything else is skipped. */
const entryKind = async (entry: Dirent, fullPath: string): Promise<EntryKind | undefined> => {
  if (entry.isDirectory()) {
    return "directory";
  }
  if (entry.isFile()) {
    return "file";
  }
  if (!entry.isSymbolicLink()) {
    return undefined;
  }
  const target = await stat(fullPath);
  return target.isDirectory() ? "directory" : target.isFile() ? "file" : undefined;
};

const walkDirectory = async (
  directory: string,
  options: { extensions: readonly string[]; logger: Logger; visited: Set<string> },
): Promise<string[]> => {
  const { extensions, logger, visited } = options;
  const realDirectory = await realpath(directory);
  if (visited.has(realDirectory)) {
    return [];
  }
  visited.add(realDirectory);

  const entries = await readdir(directory, { withFileTypes: true });
  entries.sort((left, right) => (left.name < right.name ? -1 : left.name > right.name ? 1 : 0));

  // Sequential so a directory reachable through several links is claimed by the first in name order.
  const files: string[] = [];
  for (const entry of entries) {
    const fullPath = path.join(directory, entry.name);
    try {
      const kind = await entryKind(entry, fullPath);
      if (kind === "directory") {
        files.push(...(await walkDirectory(fullPath, options)));
      } else if (kind === "file" && hasSchemaExtension(fullPath, extensions)) {
        files.push(fullPath);
      }
    } catch (error) {
      logger.debug("files", `skipping ${fullPath}: ${String(error)}`);
    }
  }
  return files;
};

/**
 * Recursively lists schema files under `root`, following symbolic links.
 * Entries are visited in name order so the result is stable across runs.
 * Unreadable entries and dangling links are skipped, and each real directory
 * is walked at most once.
 */
export const collectSchemaFiles = async ({
  root,
  extensions,
  logger = silentLogger,
}: {
  root: string;
  extensions: readonly string[];
  logger?: Logger;
}): Promise<string[]> => walkDirectory(root, { extensions, logger, visited: new Set() });
