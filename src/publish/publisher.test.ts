import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { buildArtifact } from "../artifact/builder";
import { Logger } from "../observability";
import { Artifact } from "../types/models";
import { ManifestAccumulator } from "./manifest";
import { ArtifactPublisher } from "./publisher";

function artifactFor(filePath: string, body: string, fetchedAt = "2024-01-01T00:00:00.000Z"): Artifact {
  return buildArtifact(
    { origin: { repo: "acme/widgets", ref: "main" }, path: filePath, rawText: body, declaredTopics: [] },
    { body, title: filePath, topics: [], warnings: [] },
    fetchedAt,
  );
}

describe("ArtifactPublisher", () => {
  let outputDir: string;
  let publisher: ArtifactPublisher;

  beforeEach(() => {
    outputDir = fs.mkdtempSync(path.join(os.tmpdir(), "docforge-publish-"));
    publisher = new ArtifactPublisher(outputDir, Logger.silent());
  });

  afterEach(() => {
    fs.rmSync(outputDir, { recursive: true, force: true });
  });

  it("writes a new artifact and records its size", async () => {
    const outcome = await publisher.publish(artifactFor("intro.md", "# Intro\n"));
    const filePath = publisher.artifactPath("acme-widgets__intro");

    expect(outcome.status).toBe("written");
    expect(fs.existsSync(filePath)).toBe(true);
    if (outcome.status === "written") {
      expect(outcome.entry.size).toBe(fs.statSync(filePath).size);
      expect(outcome.entry.file).toBe("acme-widgets__intro.mdc");
    }
  });

  it("skips an unchanged artifact even when fetchedAt differs", async () => {
    await publisher.publish(artifactFor("intro.md", "# Intro\n"));
    const filePath = publisher.artifactPath("acme-widgets__intro");
    const before = fs.readFileSync(filePath, "utf-8");
    const mtimeBefore = fs.statSync(filePath).mtimeMs;

    const outcome = await publisher.publish(artifactFor("intro.md", "# Intro\n", "2030-01-01T00:00:00.000Z"));

    expect(outcome.status).toBe("skipped");
    expect(fs.readFileSync(filePath, "utf-8")).toBe(before);
    expect(fs.statSync(filePath).mtimeMs).toBe(mtimeBefore);
  });

  it("rewrites only the artifact whose content changed", async () => {
    await publisher.publish(artifactFor("a.md", "# A\n"));
    await publisher.publish(artifactFor("b.md", "# B\n"));

    const changed = await publisher.publish(artifactFor("a.md", "# A\n\nEdited.\n"));
    const unchanged = await publisher.publish(artifactFor("b.md", "# B\n"));

    expect(changed.status).toBe("written");
    expect(unchanged.status).toBe("skipped");
  });

  it("rewrites an existing file it cannot parse", async () => {
    fs.writeFileSync(path.join(outputDir, "acme-widgets__intro.mdc"), "garbage");
    const outcome = await publisher.publish(artifactFor("intro.md", "# Intro\n"));
    expect(outcome.status).toBe("written");
  });

  it("reports filesystem failures as errored outcomes", async () => {
    const blocker = path.join(outputDir, "not-a-dir");
    fs.writeFileSync(blocker, "x");
    const broken = new ArtifactPublisher(blocker, Logger.silent());

    const outcome = await broken.publish(artifactFor("intro.md", "# Intro\n"));

    expect(outcome.status).toBe("errored");
    if (outcome.status === "errored") {
      expect(outcome.path).toBe("intro.md");
      expect(outcome.slug).toBe("acme-widgets__intro");
    }
  });

  it("writes a sorted manifest that is byte-identical across runs", async () => {
    const first = new ManifestAccumulator();
    const second = new ManifestAccumulator();
    for (const name of ["zeta.md", "alpha.md", "Mid.md"]) {
      const outcome = await publisher.publish(artifactFor(name, `# ${name}\n`));
      if (outcome.status !== "errored") {
        first.add(outcome.entry);
      }
    }
    for (const name of ["alpha.md", "Mid.md", "zeta.md"]) {
      const outcome = await publisher.publish(artifactFor(name, `# ${name}\n`));
      if (outcome.status !== "errored") {
        second.add(outcome.entry);
      }
    }

    const summary = await publisher.finalize(first);
    const firstBytes = fs.readFileSync(summary.manifestPath, "utf-8");
    await publisher.finalize(second);

    expect(fs.readFileSync(summary.manifestPath, "utf-8")).toBe(firstBytes);
    expect(firstBytes.trimEnd().split("\n").map((line) => JSON.parse(line).slug)).toEqual([
      "acme-widgets__Mid",
      "acme-widgets__alpha",
      "acme-widgets__zeta",
    ]);
  });

  it("prunes artifacts missing from the manifest only when asked", async () => {
    const manifest = new ManifestAccumulator();
    const outcome = await publisher.publish(artifactFor("keep.md", "# Keep\n"));
    if (outcome.status !== "errored") {
      manifest.add(outcome.entry);
    }
    fs.writeFileSync(path.join(outputDir, "stale.mdc"), "old");
    fs.writeFileSync(path.join(outputDir, "notes.txt"), "unrelated");

    expect((await publisher.finalize(manifest)).pruned).toEqual([]);
    expect(fs.existsSync(path.join(outputDir, "stale.mdc"))).toBe(true);

    const summary = await publisher.finalize(manifest, { prune: true });

    expect(summary.pruned).toEqual(["stale.mdc"]);
    expect(fs.existsSync(path.join(outputDir, "stale.mdc"))).toBe(false);
    expect(fs.existsSync(path.join(outputDir, "notes.txt"))).toBe(true);
    expect(fs.existsSync(path.join(outputDir, "acme-widgets__keep.mdc"))).toBe(true);
  });

  it("keeps the published entry and file of a retained slug when pruning", async () => {
    const initial = new ManifestAccumulator();
    for (const name of ["a.md", "b.md"]) {
      const outcome = await publisher.publish(artifactFor(name, `# ${name}\n`));
      if (outcome.status !== "errored") {
        initial.add(outcome.entry);
      }
    }
    await publisher.finalize(initial);

    const rerun = new ManifestAccumulator();
    const outcome = await publisher.publish(artifactFor("a.md", "# a.md\n"));
    if (outcome.status !== "errored") {
      rerun.add(outcome.entry);
    }
    rerun.retain("acme-widgets__b");
    const summary = await publisher.finalize(rerun, { prune: true });

    expect(summary).toMatchObject({ entries: 2, carried: 1, pruned: [] });
    expect(fs.existsSync(path.join(outputDir, "acme-widgets__b.mdc"))).toBe(true);
    const manifestSlugs = fs
      .readFileSync(summary.manifestPath, "utf-8")
      .trimEnd()
      .split("\n")
      .map((line) => JSON.parse(line).slug);
    expect(manifestSlugs).toEqual(["acme-widgets__a", "acme-widgets__b"]);
  });

  it("keeps entries under a retained directory prefix", async () => {
    const initial = new ManifestAccumulator();
    for (const name of ["guide/setup.md", "intro.md"]) {
      const outcome = await publisher.publish(artifactFor(name, `# ${name}\n`));
      if (outcome.status !== "errored") {
        initial.add(outcome.entry);
      }
    }
    await publisher.finalize(initial);

    const rerun = new ManifestAccumulator();
    rerun.retainPrefix({ origin: "acme/widgets", prefix: "guide" });
    const summary = await publisher.finalize(rerun, { prune: true });

    expect(summary.pruned).toEqual(["acme-widgets__intro.mdc"]);
    expect(summary.entries).toBe(1);
    expect(fs.existsSync(path.join(outputDir, "acme-widgets__guide__setup.mdc"))).toBe(true);
  });
});
