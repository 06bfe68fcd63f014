import yaml from "js-yaml";
import { z } from "zod";
import { Artifact } from "../types/models";

export const ARTIFACT_SCHEMA_VERSION = "docforge-artifact/1.0";
export const ARTIFACT_EXTENSION = ".mdc";

const ARTIFACT_HEADER = /^---\n([\s\S]*?)\n---\n\n?/;

const storedFrontMatterSchema = z
  .object({
    schema: z.string(),
    slug: z.string(),
    title: z.string(),
    contentHash: z.string(),
    fetchedAt: z.string(),
    topics: z.array(z.string()),
    source: z
      .object({
        repo: z.string(),
        ref: z.string(),
        path: z.string(),
        url: z.string(),
      })
      .partial(),
  })
  .partial()
  .passthrough();

export type StoredFrontMatter = z.infer<typeof storedFrontMatterSchema>;

export interface ParsedArtifactFile {
  frontMatter: StoredFrontMatter;
  body: string;
}

export function artifactFileName(slug: string): string {
  return `${slug}${ARTIFACT_EXTENSION}`;
}

export function renderArtifact(artifact: Artifact): string {
  const header = yaml.dump(artifact.frontMatter, {
    schema: yaml.JSON_SCHEMA,
    lineWidth: -1,
    noRefs: true,
    sortKeys: false,
  });
  return `---\n${header}---\n\n${artifact.body}`;
}

/**
 * Splits an artifact file into front matter and body. Returns undefined when the
 * text does not start with a readable front matter block.
 */
export function parseArtifact(text: string): ParsedArtifactFile | undefined {
  const match = ARTIFACT_HEADER.exec(text);
  if (!match) {
    return undefined;
  }

  let loaded: unknown;
  try {
    loaded = yaml.load(match[1], { schema: yaml.JSON_SCHEMA });
  } catch (error) {
    if (error instanceof yaml.YAMLException) {
      return undefined;
    }
    throw error;
  }

  const result = storedFrontMatterSchema.safeParse(loaded ?? {});
  if (!result.success) {
    return undefined;
  }
  return { frontMatter: result.data, body: text.slice(match[0].length) };
}

export function readRecordedHash(text: string): string | undefined {
  return parseArtifact(text)?.frontMatter.contentHash;
}
