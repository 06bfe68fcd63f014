import { canonicalUrl } from "../normalize/links";
import { Artifact, NormalizedDocument, SourceDocument } from "../types/models";
import { ARTIFACT_SCHEMA_VERSION } from "./artifactFile";
import { contentHash, HashedFrontMatter } from "./hash";
import { slug } from "./slug";
import { computeContentStats } from "./stats";

export function buildArtifact(source: SourceDocument, normalized: NormalizedDocument, fetchedAt: string): Artifact {
  const artifactSlug = slug(source.origin, source.path);
  const stable: HashedFrontMatter = {
    schema: ARTIFACT_SCHEMA_VERSION,
    slug: artifactSlug,
    title: normalized.title,
    source: {
      repo: source.origin.repo,
      ref: source.origin.ref,
      path: source.path,
      url: canonicalUrl(source.origin, source.path),
    },
    topics: [...normalized.topics],
    stats: computeContentStats(normalized.body),
  };
  const hash = contentHash(normalized.body, stable);

  return {
    slug: artifactSlug,
    contentHash: hash,
    body: normalized.body,
    frontMatter: {
      schema: stable.schema,
      slug: stable.slug,
      title: stable.title,
      source: stable.source,
      topics: stable.topics,
      contentHash: hash,
      fetchedAt,
      stats: stable.stats,
    },
  };
}
