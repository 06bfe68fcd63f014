export { splitSourceFrontMatter } from "./frontMatter";
export { canonicalUrl, resolveTarget, rewriteLinks } from "./links";
export { unwrapMarkup } from "./markup";
export {
  fenceLanguages,
  firstHeading,
  mergeTopics,
  normalizeDocument,
  PASSES,
  runPasses,
  titleFromPath,
} from "./pipeline";
export { elideLargeBlocks, elisionMarker } from "./size";
export { normalizeStructure } from "./structure";
export * from "./types";
