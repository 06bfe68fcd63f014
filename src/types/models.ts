export type Profile = "lossless" | "balanced" | "compact";

export interface SourceOrigin {
  repo: string;
  ref: string;
}

export interface SourceLocation {
  origin: SourceOrigin;
  path: string;
  declaredTopics: readonly string[];
}

export interface SourceDocument extends SourceLocation {
  rawText: string;
}

/** A source whose text is read only when a worker picks it up. */
export interface DeferredSource extends SourceLocation {
  read(): Promise<string>;
}

export type SourceInput = SourceDocument | DeferredSource;

/** Published state kept as-is when a subtree could not be read this run. */
export interface RetainedPrefix {
  origin: string;
  prefix: string;
}

export type PassName = "front_matter" | "markup" | "structure" | "links" | "size";

export interface TransformWarning {
  pass: PassName;
  message: string;
}

export interface NormalizedDocument {
  body: string;
  title: string;
  topics: string[];
  warnings: TransformWarning[];
}

export interface ContentStats {
  lines: number;
  words: number;
  characters: number;
  estimatedTokens: number;
  codeBlocks: number;
  inlineCode: number;
  links: number;
  headings: number;
}

export interface ArtifactSource {
  repo: string;
  ref: string;
  path: string;
  url: string;
}

export interface ArtifactFrontMatter {
  schema: string;
  slug: string;
  title: string;
  source: ArtifactSource;
  topics: string[];
  contentHash: string;
  fetchedAt: string;
  stats: ContentStats;
}

export interface Artifact {
  slug: string;
  contentHash: string;
  frontMatter: ArtifactFrontMatter;
  body: string;
}

export interface ManifestEntry {
  slug: string;
  origin: string;
  ref: string;
  path: string;
  file: string;
  contentHash: string;
  topics: string[];
  size: number;
  title: string;
}

export interface DocumentFailure {
  path: string;
  message: string;
}

export type PublishOutcome =
  | { status: "written"; entry: ManifestEntry }
  | { status: "skipped"; entry: ManifestEntry }
  | { status: "errored"; slug: string; path: string; message: string };

export interface RunReport {
  processed: number;
  written: number;
  skipped: number;
  warnings: number;
  aborted: boolean;
  errors: DocumentFailure[];
}
