import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { parseArtifact } from "../artifact/artifactFile";
import { DEFAULT_CONFIG, mergeConfig } from "../config";
import { AppConfig } from "../config/types";
import { Logger, MetricsRegistry } from "../observability";
import { ArtifactPublisher } from "../publish";
import { ConfigurationError } from "../types/errors";
import { Artifact, PublishOutcome, SourceDocument } from "../types/models";
import { runBuild } from "./coordinator";

function doc(filePath: string, rawText: string): SourceDocument {
  return { origin: { repo: "acme/widgets", ref: "main" }, path: filePath, rawText, declaredTopics: [] };
}

class FailingPublisher extends ArtifactPublisher {
  constructor(
    outputDir: string,
    private readonly failing: string,
  ) {
    super(outputDir, Logger.silent());
  }

  override async publish(artifact: Artifact): Promise<PublishOutcome> {
    if (artifact.slug === this.failing) {
      return { status: "errored", slug: artifact.slug, path: artifact.frontMatter.source.path, message: "EACCES" };
    }
    return super.publish(artifact);
  }
}

function readManifest(outputDir: string): string {
  return fs.readFileSync(path.join(outputDir, "index.jsonl"), "utf-8");
}

const DOCS = [
  doc("intro.md", "# Intro\n\nWelcome.\n"),
  doc("guide/setup.md", "Setup\n=====\n\nSee [intro](../intro.md).\n"),
  doc("guide/usage.mdx", "# Usage\n\n<Callout>Run it.</Callout>\n"),
];

describe("runBuild", () => {
  let outputDir: string;
  let config: AppConfig;

  beforeEach(() => {
    outputDir = fs.mkdtempSync(path.join(os.tmpdir(), "docforge-run-"));
    config = mergeConfig(DEFAULT_CONFIG, { outputDir, concurrency: 2 });
  });

  afterEach(() => {
    fs.rmSync(outputDir, { recursive: true, force: true });
  });

  function deps(overrides: Partial<AppConfig> = {}) {
    return {
      config: { ...config, ...overrides },
      logger: Logger.silent(),
      metrics: new MetricsRegistry(),
      now: () => new Date("2024-01-02T03:04:05.000Z"),
    };
  }

  it("publishes every document and a sorted manifest", async () => {
    const runDeps = deps();
    const { report, finalized } = await runBuild(DOCS, runDeps);

    expect(report).toEqual({ processed: 3, written: 3, skipped: 0, warnings: 0, aborted: false, errors: [] });
    expect(finalized?.entries).toBe(3);
    const slugs = fs
      .readFileSync(path.join(outputDir, "index.jsonl"), "utf-8")
      .trimEnd()
      .split("\n")
      .map((line) => JSON.parse(line).slug);
    expect(slugs).toEqual(["acme-widgets__guide__setup", "acme-widgets__guide__usage", "acme-widgets__intro"]);
    const stored = parseArtifact(fs.readFileSync(path.join(outputDir, "acme-widgets__intro.mdc"), "utf-8"));
    expect(stored?.frontMatter.fetchedAt).toBe("2024-01-02T03:04:05.000Z");
    expect(runDeps.metrics.getCounters().artifacts_written).toBe(3);
  });

  it("is idempotent across runs", async () => {
    await runBuild(DOCS, deps());
    const manifestBefore = fs.readFileSync(path.join(outputDir, "index.jsonl"), "utf-8");

    const { report } = await runBuild(DOCS, { ...deps(), now: () => new Date("2030-01-01T00:00:00.000Z") });

    expect(report.written).toBe(0);
    expect(report.skipped).toBe(3);
    expect(fs.readFileSync(path.join(outputDir, "index.jsonl"), "utf-8")).toBe(manifestBefore);
  });

  it("rewrites only the edited document", async () => {
    await runBuild(DOCS, deps());
    const edited = [DOCS[0], doc("guide/setup.md", "# Setup\n\nChanged.\n"), DOCS[2]];

    const { report } = await runBuild(edited, deps());

    expect(report.written).toBe(1);
    expect(report.skipped).toBe(2);
  });

  it("publishes the smallest path when two paths share a slug, whatever the input order", async () => {
    const md = doc("a.md", "# From md\n");
    const mdx = doc("a.mdx", "# From mdx\n");
    const otherDir = fs.mkdtempSync(path.join(os.tmpdir(), "docforge-run-"));

    try {
      const forward = await runBuild([md, mdx], deps({ concurrency: 2 }));
      const reversed = await runBuild([mdx, md], deps({ concurrency: 2, outputDir: otherDir }));

      const expected = [{ path: "a.mdx", message: "slug acme-widgets__a already produced by acme/widgets:a.md in this run" }];
      expect(forward.report.errors).toEqual(expected);
      expect(reversed.report.errors).toEqual(expected);
      expect(readManifest(otherDir)).toBe(readManifest(outputDir));
      expect(JSON.parse(readManifest(outputDir))).toMatchObject({ path: "a.md", title: "From md" });
    } finally {
      fs.rmSync(otherDir, { recursive: true, force: true });
    }
  });

  it("writes the same manifest for any input order and concurrency", async () => {
    const batch = [
      ...DOCS,
      doc("reference/api.md", "# API\n\nCalls.\n"),
      doc("reference/cli.md", "# CLI\n\nFlags.\n"),
      doc("faq.md", "# FAQ\n\nAnswers.\n"),
    ];
    const shuffled = [batch[4], batch[1], batch[5], batch[0], batch[3], batch[2]];
    const otherDir = fs.mkdtempSync(path.join(os.tmpdir(), "docforge-run-"));

    try {
      await runBuild(batch, deps({ concurrency: 1 }));
      await runBuild(shuffled, deps({ concurrency: 4, outputDir: otherDir }));

      expect(readManifest(otherDir)).toBe(readManifest(outputDir));
      expect(fs.readdirSync(otherDir).sort()).toEqual(fs.readdirSync(outputDir).sort());
    } finally {
      fs.rmSync(otherDir, { recursive: true, force: true });
    }
  });

  it("gives identical bodies at different paths their own artifacts", async () => {
    const body = "# Readme\n\nSame words.\n";
    const { report } = await runBuild([doc("one/readme.md", body), doc("two/readme.md", body)], deps());

    expect(report.written).toBe(2);
    expect(readManifest(outputDir).trimEnd().split("\n").map((line) => JSON.parse(line).slug)).toEqual([
      "acme-widgets__one__readme",
      "acme-widgets__two__readme",
    ]);
    expect(fs.existsSync(path.join(outputDir, "acme-widgets__one__readme.mdc"))).toBe(true);
    expect(fs.existsSync(path.join(outputDir, "acme-widgets__two__readme.mdc"))).toBe(true);
  });

  it("keeps the published artifact of a document that fails in a pruning run", async () => {
    await runBuild([doc("a.md", "# A\n"), doc("b.md", "# B\n")], deps());
    const before = readManifest(outputDir);

    const { report, finalized } = await runBuild([doc("a.md", "# A\n"), doc("b.md", "# B\n\nEdited.\n")], {
      ...deps({ pruneStale: true }),
      publisher: new FailingPublisher(outputDir, "acme-widgets__b"),
    });

    expect(report.errors).toEqual([{ path: "b.md", message: "EACCES" }]);
    expect(finalized).toMatchObject({ entries: 2, carried: 1, pruned: [] });
    expect(fs.existsSync(path.join(outputDir, "acme-widgets__b.mdc"))).toBe(true);
    expect(readManifest(outputDir)).toBe(before);
  });

  it("reads deferred sources in the worker and records read failures", async () => {
    await runBuild([doc("a.md", "# A\n"), doc("b.md", "# B\n")], deps());
    const location = { origin: { repo: "acme/widgets", ref: "main" }, declaredTopics: [] };

    const { report } = await runBuild(
      [
        { ...location, path: "a.md", read: async () => "# A\n" },
        { ...location, path: "b.md", read: async () => Promise.reject(new Error("EIO: i/o error")) },
      ],
      deps({ pruneStale: true }),
    );

    expect(report).toMatchObject({ processed: 2, skipped: 1, errors: [{ path: "b.md", message: "EIO: i/o error" }] });
    expect(fs.existsSync(path.join(outputDir, "acme-widgets__b.mdc"))).toBe(true);
    expect(readManifest(outputDir).trimEnd().split("\n")).toHaveLength(2);
  });

  it("counts transform warnings", async () => {
    const { report } = await runBuild([doc("x.mdx", "<Sparkle>Text</Sparkle>\n")], deps());
    expect(report.warnings).toBe(1);
  });

  it("does not finalize an aborted run", async () => {
    const controller = new AbortController();
    controller.abort();

    const { report, finalized } = await runBuild(DOCS, { ...deps(), signal: controller.signal });

    expect(report.aborted).toBe(true);
    expect(report.processed).toBe(0);
    expect(finalized).toBeUndefined();
    expect(fs.existsSync(path.join(outputDir, "index.jsonl"))).toBe(false);
  });

  it("raises a configuration error before any document when the output root is unusable", async () => {
    const blocker = path.join(outputDir, "file");
    fs.writeFileSync(blocker, "x");

    await expect(runBuild(DOCS, deps({ outputDir: path.join(blocker, "out") }))).rejects.toBeInstanceOf(ConfigurationError);
  });
});
