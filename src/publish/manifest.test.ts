import { describe, expect, it } from "vitest";
import { ManifestEntry } from "../types/models";
import { ManifestAccumulator, parseManifest, serializeManifest, serializeManifestEntry } from "./manifest";

function entry(slug: string): ManifestEntry {
  return {
    title: slug,
    slug,
    origin: "acme/widgets",
    ref: "main",
    path: `${slug}.md`,
    file: `${slug}.mdc`,
    contentHash: "abc",
    topics: [],
    size: 10,
  };
}

describe("manifest", () => {
  it("serializes keys in a fixed order", () => {
    expect(serializeManifestEntry(entry("a"))).toBe(
      '{"slug":"a","origin":"acme/widgets","ref":"main","path":"a.md","file":"a.mdc",' +
        '"contentHash":"abc","topics":[],"size":10,"title":"a"}',
    );
  });

  it("sorts by slug in code-unit order", () => {
    const accumulator = new ManifestAccumulator();
    accumulator.add(entry("b"));
    accumulator.add(entry("B"));
    accumulator.add(entry("a"));

    expect(accumulator.sorted().map((item) => item.slug)).toEqual(["B", "a", "b"]);
    expect(accumulator.size).toBe(3);
  });

  it("parses valid lines and reports invalid ones by line number", () => {
    const text = `${serializeManifest([entry("a")])}not json\n{"slug":"x"}\n`;
    const parsed = parseManifest(text);

    expect(parsed.entries).toEqual([entry("a")]);
    expect(parsed.invalidLines).toEqual([2, 3]);
  });

  it("carries forward only retained entries that this run did not produce", () => {
    const accumulator = new ManifestAccumulator();
    accumulator.add(entry("a"));
    accumulator.retain("a");
    accumulator.retain("b");
    accumulator.retainPrefix({ origin: "acme/widgets", prefix: "guide" });
    const nested = { ...entry("guide__c"), path: "guide/c.md" };

    const carried = accumulator.carryForward([{ ...entry("a"), size: 99 }, entry("b"), nested, entry("d")]);

    expect(carried.map((item) => item.slug)).toEqual(["b", "guide__c"]);
    expect(accumulator.sorted().map((item) => [item.slug, item.size])).toEqual([
      ["a", 10],
      ["b", 10],
      ["guide__c", 10],
    ]);
    expect(accumulator.retained()).toEqual([]);
  });
});
