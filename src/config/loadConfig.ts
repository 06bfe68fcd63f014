import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { ConfigurationError } from "../types/errors";
import { AppConfig, ConfigOverrides } from "./types";

const DEFAULT_CONFIG: AppConfig = {
  outputDir: "sourcedocs",
  profile: "balanced",
  concurrency: 4,
  includeExtensions: [".md", ".mdx"],
  excludeDirs: ["node_modules", ".git", "dist", "build"],
  recognizedWrappers: [
    "Accordion",
    "AccordionGroup",
    "Callout",
    "Card",
    "CardGroup",
    "Details",
    "Info",
    "Note",
    "Step",
    "Steps",
    "Tab",
    "Tabs",
    "Tip",
    "Warning",
  ],
  boilerplateDenylist: [
    "Edit this page",
    "Edit on GitHub",
    "Improve this page",
    "Back to top",
    "Share on Twitter",
    "Share on Facebook",
  ],
  sizeControl: {
    balanced: { maxBlockLines: 25, keepLines: 8 },
    compact: { maxBlockLines: 15, keepLines: 5 },
  },
  search: {
    titleWeight: 5,
    previewRadius: 80,
    defaultLimit: 10,
    maxLimit: 100,
  },
  queryTimeoutMs: 5_000,
  pruneStale: false,
  logLevel: "info",
};

const profileSchema = z.enum(["lossless", "balanced", "compact"]);
const logLevelSchema = z.enum(["debug", "info", "warn", "error", "silent"]);

const sizeControlSchema = z
  .object({
    maxBlockLines: z.number().int().positive(),
    keepLines: z.number().int().nonnegative(),
  })
  .refine((value) => value.keepLines * 2 + 1 <= value.maxBlockLines, {
    message: "keepLines * 2 + 1 must not exceed maxBlockLines",
  });

const appConfigSchema: z.ZodType<AppConfig> = z.object({
  outputDir: z.string().min(1),
  profile: profileSchema,
  concurrency: z.number().int().min(1).max(256),
  includeExtensions: z.array(z.string().startsWith(".")).min(1),
  excludeDirs: z.array(z.string()),
  recognizedWrappers: z.array(z.string().regex(/^[A-Z][\w.]*$/)),
  boilerplateDenylist: z.array(z.string().min(1)),
  sizeControl: z.object({
    balanced: sizeControlSchema,
    compact: sizeControlSchema,
  }),
  search: z.object({
    titleWeight: z.number().nonnegative(),
    previewRadius: z.number().int().positive(),
    defaultLimit: z.number().int().positive(),
    maxLimit: z.number().int().positive(),
  }),
  queryTimeoutMs: z.number().int().positive(),
  pruneStale: z.boolean(),
  logLevel: logLevelSchema,
});

const configOverridesSchema: z.ZodType<ConfigOverrides> = z
  .object({
    outputDir: z.string(),
    profile: profileSchema,
    concurrency: z.number(),
    includeExtensions: z.array(z.string()),
    excludeDirs: z.array(z.string()),
    recognizedWrappers: z.array(z.string()),
    boilerplateDenylist: z.array(z.string()),
    sizeControl: z
      .object({
        balanced: z.object({ maxBlockLines: z.number(), keepLines: z.number() }).partial(),
        compact: z.object({ maxBlockLines: z.number(), keepLines: z.number() }).partial(),
      })
      .partial(),
    search: z
      .object({
        titleWeight: z.number(),
        previewRadius: z.number(),
        defaultLimit: z.number(),
        maxLimit: z.number(),
      })
      .partial(),
    queryTimeoutMs: z.number(),
    pruneStale: z.boolean(),
    logLevel: logLevelSchema,
  })
  .partial()
  .strict();

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
}

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new ConfigurationError(`Config file not found: ${absolutePath}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(absolutePath, "utf-8"));
  } catch (error) {
    throw new ConfigurationError(`Config file is not valid JSON: ${absolutePath}`, { cause: error });
  }

  const result = configOverridesSchema.safeParse(parsed ?? {});
  if (!result.success) {
    throw new ConfigurationError(`Invalid config file ${absolutePath}: ${formatIssues(result.error)}`);
  }
  return result.data;
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

function mergeConfig(base: AppConfig, overrides: ConfigOverrides): AppConfig {
  return {
    ...base,
    ...overrides,
    sizeControl: {
      balanced: { ...base.sizeControl.balanced, ...(overrides.sizeControl?.balanced ?? {}) },
      compact: { ...base.sizeControl.compact, ...(overrides.sizeControl?.compact ?? {}) },
    },
    search: {
      ...base.search,
      ...(overrides.search ?? {}),
    },
  };
}

function applyEnv(merged: AppConfig, env: NodeJS.ProcessEnv): ConfigOverrides {
  const profile = profileSchema.safeParse(env.DOCFORGE_PROFILE);
  const logLevel = logLevelSchema.safeParse(env.DOCFORGE_LOG_LEVEL);

  return {
    outputDir: env.DOCFORGE_OUTPUT_DIR ?? merged.outputDir,
    profile: profile.success ? profile.data : merged.profile,
    concurrency: toInt(env.DOCFORGE_CONCURRENCY, merged.concurrency),
    queryTimeoutMs: toInt(env.DOCFORGE_QUERY_TIMEOUT_MS, merged.queryTimeoutMs),
    pruneStale: toBool(env.DOCFORGE_PRUNE_STALE, merged.pruneStale),
    logLevel: logLevel.success ? logLevel.data : merged.logLevel,
  };
}

export function validateConfig(candidate: AppConfig): AppConfig {
  const result = appConfigSchema.safeParse(candidate);
  if (!result.success) {
    throw new ConfigurationError(`Invalid configuration: ${formatIssues(result.error)}`);
  }
  return result.data;
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const merged = mergeConfig(DEFAULT_CONFIG, readConfigFile(configPath));
  return validateConfig(mergeConfig(merged, applyEnv(merged, env)));
}

export { DEFAULT_CONFIG, mergeConfig };
