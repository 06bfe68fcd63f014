import fs from "node:fs";
import path from "node:path";
import { Logger } from "../observability";
import { ConfigurationError, errorMessage } from "../types/errors";
import { DeferredSource, DocumentFailure, SourceOrigin } from "../types/models";

export interface SourceTreeOptions {
  root: string;
  origin: SourceOrigin;
  declaredTopics?: readonly string[];
  includeExtensions: readonly string[];
  excludeDirs: readonly string[];
  logger?: Logger;
}

export interface LoadedSourceTree {
  documents: DeferredSource[];
  failures: DocumentFailure[];
  /** Posix paths of directories that could not be listed; "" is the root. */
  unreadableDirs: string[];
}

function toPosix(relativePath: string): string {
  return relativePath.split(path.sep).join("/");
}

async function collectFiles(
  root: string,
  current: string,
  options: SourceTreeOptions,
  tree: LoadedSourceTree,
): Promise<string[]> {
  let entries: fs.Dirent[];
  try {
    entries = await fs.promises.readdir(current, { withFileTypes: true });
  } catch (error) {
    const relativeDir = toPosix(path.relative(root, current));
    options.logger?.error("source_dir_unreadable", { path: relativeDir || ".", error: errorMessage(error) });
    tree.failures.push({ path: relativeDir || ".", message: errorMessage(error) });
    tree.unreadableDirs.push(relativeDir);
    return [];
  }

  const extensions = new Set(options.includeExtensions.map((extension) => extension.toLowerCase()));
  const excluded = new Set(options.excludeDirs);
  const files: string[] = [];

  for (const entry of entries) {
    const fullPath = path.join(current, entry.name);
    if (entry.isDirectory()) {
      if (!excluded.has(entry.name)) {
        files.push(...(await collectFiles(root, fullPath, options, tree)));
      }
      continue;
    }
    if (entry.isFile() && extensions.has(path.extname(entry.name).toLowerCase())) {
      files.push(toPosix(path.relative(root, fullPath)));
    }
  }
  return files;
}

export async function loadSourceTree(options: SourceTreeOptions): Promise<LoadedSourceTree> {
  const root = path.resolve(options.root);
  let stat: fs.Stats;
  try {
    stat = await fs.promises.stat(root);
  } catch (error) {
    throw new ConfigurationError(`Source directory does not exist: ${root}`, { cause: error });
  }
  if (!stat.isDirectory()) {
    throw new ConfigurationError(`Source path is not a directory: ${root}`);
  }

  const tree: LoadedSourceTree = { documents: [], failures: [], unreadableDirs: [] };
  const relativePaths = (await collectFiles(root, root, options, tree)).sort();

  for (const relativePath of relativePaths) {
    const fullPath = path.join(root, relativePath);
    tree.documents.push({
      origin: options.origin,
      path: relativePath,
      declaredTopics: options.declaredTopics ?? [],
      read: () => fs.promises.readFile(fullPath, "utf-8"),
    });
  }

  options.logger?.info("source_tree_loaded", {
    root,
    documents: tree.documents.length,
    failures: tree.failures.length,
  });
  return tree;
}
