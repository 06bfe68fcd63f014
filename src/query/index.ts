export { indexManifest, ManifestReader } from "./manifestReader";
export type { ManifestSnapshot } from "./manifestReader";
export {
  getFileParamsSchema,
  listSourcesParamsSchema,
  searchParamsSchema,
  statsParamsSchema,
} from "./params";
export type { GetFileParams, ListSourcesParams, SearchParams, StatsParams } from "./params";
export { QueryService, summarizeOrigins } from "./queryService";
export type { QueryServiceOptions } from "./queryService";
export { buildPreview, countOccurrences, scoreText } from "./search";
export type {
  FileContent,
  OriginStats,
  QueryErrorCode,
  QueryResult,
  SearchHit,
  SourceListing,
  StoreStats,
} from "./types";
