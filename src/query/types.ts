export type QueryErrorCode = "not_found" | "invalid_argument" | "unavailable";

export type QueryResult<T> =
  | { status: "ok"; value: T }
  | { status: QueryErrorCode; message: string };

export interface OriginStats {
  origin: string;
  documents: number;
  bytes: number;
  refs: string[];
}

export interface SourceListing {
  sources: string[];
  stats?: OriginStats[];
}

export interface FileContent {
  slug: string;
  origin: string;
  ref: string;
  path: string;
  file: string;
  title: string;
  topics: string[];
  contentHash: string;
  content: string;
}

export interface SearchHit {
  slug: string;
  title: string;
  origin: string;
  path: string;
  score: number;
  preview: string;
}

export interface StoreStats {
  documents: number;
  bytes: number;
  sources: number;
  perOrigin?: OriginStats[];
}
