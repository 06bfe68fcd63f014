export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogThreshold = LogLevel | "silent";

export type LogStream = "stdout" | "stderr";

export interface LogFields {
  slug?: string;
  path?: string;
  origin?: string;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "docs_processed"
  | "artifacts_written"
  | "artifacts_skipped"
  | "docs_failed"
  | "transform_warnings";

export type MetricTimerName = "normalize_ms" | "publish_ms";
