import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ConfigurationError } from "../types/errors";
import { loadSourceTree } from "./sourceLoader";

function write(root: string, relativePath: string, content: string): void {
  const target = path.join(root, relativePath);
  fs.mkdirSync(path.dirname(target), { recursive: true });
  fs.writeFileSync(target, content);
}

describe("loadSourceTree", () => {
  let root: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), "docforge-src-"));
    write(root, "intro.md", "# Intro\n");
    write(root, "guide/setup.MDX", "# Setup\n");
    write(root, "node_modules/pkg/readme.md", "# Vendored\n");
    write(root, "notes.txt", "not docs");
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("loads matching files sorted by posix path", async () => {
    const tree = await loadSourceTree({
      root,
      origin: { repo: "acme/widgets", ref: "main" },
      declaredTopics: ["docs"],
      includeExtensions: [".md", ".mdx"],
      excludeDirs: ["node_modules"],
    });

    expect(tree.failures).toEqual([]);
    expect(tree.unreadableDirs).toEqual([]);
    expect(tree.documents.map((document) => document.path)).toEqual(["guide/setup.MDX", "intro.md"]);
    expect(tree.documents[1]).toMatchObject({
      origin: { repo: "acme/widgets", ref: "main" },
      path: "intro.md",
      declaredTopics: ["docs"],
    });
    await expect(tree.documents[1].read()).resolves.toBe("# Intro\n");
  });

  it("defers reading until a document is requested", async () => {
    const tree = await loadSourceTree({
      root,
      origin: { repo: "acme/widgets", ref: "main" },
      includeExtensions: [".md"],
      excludeDirs: ["node_modules"],
    });
    fs.rmSync(path.join(root, "intro.md"));

    await expect(tree.documents[0].read()).rejects.toThrow(/ENOENT/);
  });

  it("records a directory it cannot list", async () => {
    vi.spyOn(fs.promises, "readdir").mockRejectedValueOnce(new Error("EACCES: permission denied"));

    const tree = await loadSourceTree({
      root,
      origin: { repo: "acme/widgets", ref: "main" },
      includeExtensions: [".md"],
      excludeDirs: [],
    });

    expect(tree.documents).toEqual([]);
    expect(tree.failures).toEqual([{ path: ".", message: "EACCES: permission denied" }]);
    expect(tree.unreadableDirs).toEqual([""]);
  });

  it("rejects a missing source directory", async () => {
    await expect(
      loadSourceTree({
        root: path.join(root, "missing"),
        origin: { repo: "acme/widgets", ref: "main" },
        includeExtensions: [".md"],
        excludeDirs: [],
      }),
    ).rejects.toBeInstanceOf(ConfigurationError);
  });
});
