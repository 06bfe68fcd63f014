export { Logger } from "./logger";
export type { LoggerContext } from "./logger";
export { MetricsRegistry } from "./metrics";
export type { MetricsSnapshot, TimerSummary } from "./metrics";
export { createRunId } from "./runId";
export * from "./types";
