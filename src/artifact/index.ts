export {
  ARTIFACT_EXTENSION,
  ARTIFACT_SCHEMA_VERSION,
  artifactFileName,
  parseArtifact,
  readRecordedHash,
  renderArtifact,
} from "./artifactFile";
export type { ParsedArtifactFile, StoredFrontMatter } from "./artifactFile";
export { buildArtifact } from "./builder";
export { canonicalJson, contentHash } from "./hash";
export type { HashedFrontMatter } from "./hash";
export { slug, slugifyOrigin, slugifyPath, SLUG_SEPARATOR } from "./slug";
export { computeContentStats } from "./stats";
