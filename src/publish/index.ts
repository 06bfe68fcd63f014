export { writeFileAtomic } from "./atomicWrite";
export {
  compareSlugs,
  MANIFEST_FILE,
  ManifestAccumulator,
  parseManifest,
  serializeManifest,
  serializeManifestEntry,
} from "./manifest";
export type { ParsedManifest } from "./manifest";
export { ArtifactPublisher } from "./publisher";
export type { FinalizeOptions, FinalizeSummary } from "./publisher";
