import yaml from "js-yaml";
import { z } from "zod";
import { TransformWarning } from "../types/models";

const LEADING_FRONT_MATTER = /^\uFEFF?---[ \t]*\r?\n([\s\S]*?)\r?\n---[ \t]*(?:\r?\n|$)/;

const sourceFrontMatterSchema = z
  .object({
    title: z.unknown(),
    tags: z.unknown(),
    topics: z.unknown(),
    keywords: z.unknown(),
  })
  .partial()
  .passthrough();

export interface SourceFrontMatter {
  title?: string;
  topics: string[];
}

export interface FrontMatterSplit {
  data: SourceFrontMatter;
  body: string;
  warnings: TransformWarning[];
}

function asStringList(value: unknown): string[] {
  if (typeof value === "string") {
    return value
      .split(",")
      .map((item) => item.trim())
      .filter(Boolean);
  }
  if (Array.isArray(value)) {
    return value.filter((item): item is string => typeof item === "string").map((item) => item.trim());
  }
  return [];
}

export function splitSourceFrontMatter(rawText: string): FrontMatterSplit {
  const match = LEADING_FRONT_MATTER.exec(rawText);
  if (!match) {
    return { data: { topics: [] }, body: rawText, warnings: [] };
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(match[1]);
  } catch (error) {
    const reason = error instanceof yaml.YAMLException ? error.reason : String(error);
    return {
      data: { topics: [] },
      body: rawText,
      warnings: [{ pass: "front_matter", message: `front matter could not be parsed (${reason}); kept in body` }],
    };
  }

  const body = rawText.slice(match[0].length);
  if (parsed === null || parsed === undefined) {
    return { data: { topics: [] }, body, warnings: [] };
  }
  const record = sourceFrontMatterSchema.safeParse(parsed);
  if (!record.success || Array.isArray(parsed)) {
    return {
      data: { topics: [] },
      body: rawText,
      warnings: [{ pass: "front_matter", message: "front matter is not a mapping; kept in body" }],
    };
  }

  const { title: rawTitle, tags, topics, keywords } = record.data;
  const title = typeof rawTitle === "string" && rawTitle.trim() !== "" ? rawTitle.trim() : undefined;
  return {
    data: {
      title,
      topics: [...asStringList(tags), ...asStringList(topics), ...asStringList(keywords)],
    },
    body,
    warnings: [],
  };
}
