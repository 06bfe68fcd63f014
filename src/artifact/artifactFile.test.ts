import { describe, expect, it } from "vitest";
import { parseArtifact, readRecordedHash, renderArtifact } from "./artifactFile";
import { buildArtifact } from "./builder";

const artifact = buildArtifact(
  { origin: { repo: "acme/widgets", ref: "main" }, path: "guide/intro.md", rawText: "", declaredTopics: [] },
  { body: "# Intro\n\n---\n\nAfter a rule.\n", title: "Intro: the basics", topics: ["docs"], warnings: [] },
  "2024-01-01T00:00:00.000Z",
);

describe("artifact files", () => {
  it("renders front matter followed by the body", () => {
    const rendered = renderArtifact(artifact);

    expect(rendered.startsWith("---\n")).toBe(true);
    expect(rendered.endsWith(`\n---\n\n${artifact.body}`)).toBe(true);
  });

  it("reads back the recorded hash, metadata and body", () => {
    const parsed = parseArtifact(renderArtifact(artifact));

    expect(parsed?.body).toBe(artifact.body);
    expect(parsed?.frontMatter.title).toBe("Intro: the basics");
    expect(parsed?.frontMatter.source?.url).toBe("https://github.com/acme/widgets/blob/main/guide/intro.md");
    expect(readRecordedHash(renderArtifact(artifact))).toBe(artifact.contentHash);
  });

  it("returns undefined for text without front matter", () => {
    expect(parseArtifact("# Just a body\n")).toBeUndefined();
    expect(readRecordedHash("---\ntitle: [unclosed\n---\n\nbody")).toBeUndefined();
  });
});
