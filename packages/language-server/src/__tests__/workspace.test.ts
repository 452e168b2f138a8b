import os from "node:os";
import path from "node:path";
import { mkdtemp, mkdir, rm, symlink, writeFile } from "node:fs/promises";
import { describe, expect, it } from "vitest";
import type { Logger } from "../logger.js";
import { collectSchemaFiles, toFileUri } from "../project/files.js";
import type { SymbolIndex } from "../project/symbol-index.js";
import { discoverAndIndex, WorkspaceRootError } from "../project/workspace.js";

const createProject = async (
  files: Record<string, string>,
): Promise<{ rootDir: string; filePathFor: (relativePath: string) => string }> => {
  const rootDir = await mkdtemp(path.join(os.tmpdir(), "xdr-ls-workspace-"));

  await Promise.all(
    Object.entries(files).map(async ([relativePath, contents]) => {
      const fullPath = path.join(rootDir, relativePath);
      await mkdir(path.dirname(fullPath), { recursive: true });
      await writeFile(fullPath, contents, "utf8");
    }),
  );

  return {
    rootDir,
    filePathFor: (relativePath: string) => path.join(rootDir, relativePath),
  };
};

const createRecordingLogger = () => {
  const lines: Array<{ level: string; line: string }> = [];
  const record =
    (level: string) =>
    (component: string, message: string): void => {
      lines.push({ level, line: `${component}: ${message}` });
    };
  const logger: Logger = {
    debug: record("debug"),
    info: record("info"),
    warn: record("warn"),
    error: record("error"),
  };
  return { logger, lines };
};

const snapshotIndex = (index: SymbolIndex, names: readonly string[]) => ({
  files: index.files(),
  definitions: names.map((name) => index.definitionOf(name)),
  references: names.map((name) => index.referencesOf(name, true)),
  tokens: index.files().map((uri) => [0, 1, 2].map((line) => index.tokensOnLine(uri, line))),
});

const PROJECT_FILES = {
  "a/types.x": "struct Foo { int x; };",
  "b/types.x": "struct Foo {\n  hyper y;\n};",
  "broken.x": "struct {",
  "notes.txt": "struct Ignored { int z; };",
};

describe("workspace indexing", () => {
  it("indexes schema files in sorted discovery order", async () => {
    const project = await createProject(PROJECT_FILES);

    try {
      const files = await collectSchemaFiles({ root: project.rootDir, extensions: ["x"] });
      expect(files).toEqual([
        project.filePathFor("a/types.x"),
        project.filePathFor("b/types.x"),
        project.filePathFor("broken.x"),
      ]);

      const index = await discoverAndIndex(project.rootDir);
      expect(index.fileCount).toBe(2);
      expect(index.definitionOf("Foo")).toEqual({
        uri: toFileUri(project.filePathFor("b/types.x")),
        range: { start: { line: 0, character: 7 }, end: { line: 0, character: 10 } },
      });
      expect(index.referencesOf("y")?.[0]?.range.start).toEqual({ line: 1, character: 8 });
      expect(index.definitionOf("Ignored")).toBeUndefined();
    } finally {
      await rm(project.rootDir, { recursive: true, force: true });
    }
  });

  it("skips files that fail to parse and logs the reason", async () => {
    const project = await createProject(PROJECT_FILES);
    const { logger, lines } = createRecordingLogger();

    try {
      const index = await discoverAndIndex(project.rootDir, { logger });
      const brokenPath = project.filePathFor("broken.x");

      expect(index.files()).not.toContain(toFileUri(brokenPath));
      expect(lines).toContainEqual({
        level: "debug",
        line: `workspace: skipping ${brokenPath}: Expected an identifier but found "{" at offset 7`,
      });
      expect(lines).toContainEqual({
        level: "info",
        line: "workspace: indexed 2 of 3 schema files",
      });
    } finally {
      await rm(project.rootDir, { recursive: true, force: true });
    }
  });

  it("reproduces identical tables on an unchanged directory", async () => {
    const project = await createProject(PROJECT_FILES);

    try {
      const names = ["Foo", "x", "y", "Ignored"];
      const first = await discoverAndIndex(project.rootDir);
      const second = await discoverAndIndex(project.rootDir);
      expect(snapshotIndex(second, names)).toEqual(snapshotIndex(first, names));
    } finally {
      await rm(project.rootDir, { recursive: true, force: true });
    }
  });

  it("follows linked files and directories without looping", async () => {
    const outside = await createProject({
      "linked.x": "const LINKED = 1;",
      "shared/inner.x": "const INNER = 2;",
    });
    const project = await createProject({});
    const { logger, lines } = createRecordingLogger();

    try {
      await symlink(outside.filePathFor("linked.x"), project.filePathFor("link.x"));
      await symlink(outside.filePathFor("shared"), project.filePathFor("linkdir"), "dir");
      await symlink(project.rootDir, project.filePathFor("loop"), "dir");
      await symlink(outside.filePathFor("missing.x"), project.filePathFor("dangling.x"));

      const files = await collectSchemaFiles({ root: project.rootDir, extensions: ["x"], logger });
      expect(files).toEqual([
        project.filePathFor("link.x"),
        project.filePathFor("linkdir/inner.x"),
      ]);
      expect(
        lines.some(({ line }) =>
          line.startsWith(`files: skipping ${project.filePathFor("dangling.x")}: `),
        ),
      ).toBe(true);

      const index = await discoverAndIndex(project.rootDir);
      expect(index.fileCount).toBe(2);
      expect(index.definitionOf("LINKED")?.uri).toBe(toFileUri(project.filePathFor("link.x")));
      expect(index.definitionOf("INNER")?.uri).toBe(
        toFileUri(project.filePathFor("linkdir/inner.x")),
      );
    } finally {
      await rm(project.rootDir, { recursive: true, force: true });
      await rm(outside.rootDir, { recursive: true, force: true });
    }
  });

  it("honours configured extensions", async () => {
    const project = await createProject({
      "one.x": "const ONE = 1;",
      "two.xdr": "const TWO = 2;",
    });

    try {
      const index = await discoverAndIndex(project.rootDir, { extensions: ["xdr"] });
      expect(index.definitionOf("ONE")).toBeUndefined();
      expect(index.definitionOf("TWO")?.uri).toBe(toFileUri(project.filePathFor("two.xdr")));
    } finally {
      await rm(project.rootDir, { recursive: true, force: true });
    }
  });

  it("fails when the root is missing or not a directory", async () => {
    const project = await createProject({ "one.x": "const ONE = 1;" });

    try {
      await expect(
        discoverAndIndex(project.filePathFor("missing")),
      ).rejects.toBeInstanceOf(WorkspaceRootError);
      await expect(discoverAndIndex(project.filePathFor("one.x"))).rejects.toThrow(
        `${project.filePathFor("one.x")} is not a directory`,
      );
    } finally {
      await rm(project.rootDir, { recursive: true, force: true });
    }
  });
});
