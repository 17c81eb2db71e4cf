/**
 * Local tree reader.
 *
 * Walks the source directory and builds the LocalNode tree the synchronizer
 * mirrors:
 * - Every directory becomes a LocalDirectory (even without an index document)
 * - Every `.md` file other than the index document becomes a LocalDocument
 * - The index document becomes the directory's own content
 * - Hidden entries (`.git`, `.github`, ...) and non-markdown files are skipped
 *
 * Reading happens up front, so an unreadable source fails the run before any
 * remote call is made.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { ConfigError } from "../errors.js";
import type { LocalDirectory, LocalDocument, LocalNode } from "../types.js";

export const DEFAULT_INDEX_FILE_NAME = "index.md";

const MARKDOWN_EXTENSION = ".md";

export interface TreeReaderOptions {
  /** Name of the document holding a directory's own content (default: index.md) */
  indexFileName?: string;
}

/**
 * Reads the markdown tree rooted at `rootDir`.
 *
 * @param rootDir - The directory to mirror
 * @returns The root LocalDirectory, titled after the directory's name
 * @throws ConfigError if `rootDir` is missing, not a directory, or unreadable
 *
 * @example
 * ```ts
 * const root = await readLocalTree("./wiki");
 * // root.title === "wiki"
 * // root.index?.relativePath === "index.md"
 * // root.children.map((child) => child.title) === ["dir1", "dir2"]
 * ```
 */
export async function readLocalTree(
  rootDir: string,
  options: TreeReaderOptions = {}
): Promise<LocalDirectory> {
  const indexFileName = options.indexFileName ?? DEFAULT_INDEX_FILE_NAME;
  const absoluteRoot = path.resolve(rootDir);

  const stats = await fs.stat(absoluteRoot).catch((error: unknown) => {
    throw new ConfigError(`Source directory ${rootDir} does not exist`, { cause: error });
  });
  if (!stats.isDirectory()) {
    throw new ConfigError(`Source path ${rootDir} is not a directory`);
  }

  return readDirectory(absoluteRoot, absoluteRoot, indexFileName);
}

/**
 * Title of a page for a local file name: the name without its .md extension.
 */
export function titleFromFileName(fileName: string): string {
  return fileName.endsWith(MARKDOWN_EXTENSION)
    ? fileName.slice(0, -MARKDOWN_EXTENSION.length)
    : fileName;
}

/**
 * Iterates a tree in pre-order (directory before its children).
 */
export function* walkLocalTree(node: LocalNode): Generator<LocalNode> {
  yield node;
  if (node.kind === "directory") {
    for (const child of node.children) {
      yield* walkLocalTree(child);
    }
  }
}

async function readDirectory(
  dirPath: string,
  rootPath: string,
  indexFileName: string
): Promise<LocalDirectory> {
  const entries = await fs.readdir(dirPath, { withFileTypes: true }).catch((error: unknown) => {
    throw new ConfigError(`Cannot read directory ${dirPath}`, { cause: error });
  });

  // Code-unit order keeps the remote order stable across platforms and locales
  const visible = entries
    .filter((entry) => !entry.name.startsWith("."))
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  let index: LocalDocument | null = null;
  const children: LocalNode[] = [];

  for (const entry of visible) {
    const entryPath = path.join(dirPath, entry.name);

    if (entry.isDirectory()) {
      children.push(await readDirectory(entryPath, rootPath, indexFileName));
    } else if (entry.isFile() && entry.name.endsWith(MARKDOWN_EXTENSION)) {
      const document = await readDocument(entryPath, rootPath);
      if (entry.name === indexFileName) {
        index = document;
      } else {
        children.push(document);
      }
    }
  }

  return {
    kind: "directory",
    path: dirPath,
    relativePath: toRelativePath(rootPath, dirPath),
    title: path.basename(dirPath),
    index,
    children,
  };
}

async function readDocument(filePath: string, rootPath: string): Promise<LocalDocument> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    throw new ConfigError(`Cannot read document ${filePath}`, { cause: error });
  }

  return {
    kind: "document",
    path: filePath,
    relativePath: toRelativePath(rootPath, filePath),
    title: titleFromFileName(path.basename(filePath)),
    content,
  };
}

function toRelativePath(rootPath: string, target: string): string {
  return path.relative(rootPath, target).split(path.sep).join("/");
}
