import { z } from "zod";
import { QueryResult, QueryService } from "../query";

export const TOOLS = [
  {
    name: "list_sources",
    description: "List the source origins present in the published documentation store.",
    inputSchema: {
      type: "object" as const,
      properties: {
        filter: { type: "string", description: "Case-insensitive substring to match against origin names" },
        include_stats: { type: "boolean", description: "Include document count, bytes and refs per origin" },
      },
    },
  },
  {
    name: "get_file",
    description: "Return the current content of one artifact, looked up by slug or by path.",
    inputSchema: {
      type: "object" as const,
      properties: {
        slug: { type: "string", description: "Artifact slug" },
        path: { type: "string", description: "Source path, artifact file name or slug" },
      },
    },
  },
  {
    name: "search",
    description: "Case-insensitive text search over artifact titles and bodies, ranked by match count.",
    inputSchema: {
      type: "object" as const,
      properties: {
        query: { type: "string", description: "Text to search for" },
        source: { type: "string", description: "Only search origins containing this substring" },
        limit: { type: "number", description: "Max results (default: 10)" },
      },
      required: ["query"],
    },
  },
  {
    name: "stats",
    description: "Document and byte totals for the store, optionally broken down per origin.",
    inputSchema: {
      type: "object" as const,
      properties: {
        detailed: { type: "boolean", description: "Include the per-origin breakdown" },
      },
    },
  },
];

export interface ToolResponse {
  text: string;
  isError: boolean;
}

const listSourcesArgs = z.object({ filter: z.string().optional(), include_stats: z.boolean().optional() }).strict();
const getFileArgs = z.object({ slug: z.string().optional(), path: z.string().optional() }).strict();
const searchArgs = z
  .object({ query: z.string(), source: z.string().optional(), limit: z.number().optional() })
  .strict();
const statsArgs = z.object({ detailed: z.boolean().optional() }).strict();

function toResponse<T>(result: QueryResult<T>, render: (value: T) => string): ToolResponse {
  if (result.status === "ok") {
    return { text: render(result.value), isError: false };
  }
  return { text: `${result.status}: ${result.message}`, isError: true };
}

function asJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

function invalidArgs(name: string, error: z.ZodError): ToolResponse {
  const detail = error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
  return { text: `invalid_argument: ${name}: ${detail}`, isError: true };
}

export async function handleToolCall(service: QueryService, name: string, args: unknown): Promise<ToolResponse> {
  switch (name) {
    case "list_sources": {
      const parsed = listSourcesArgs.safeParse(args ?? {});
      if (!parsed.success) {
        return invalidArgs(name, parsed.error);
      }
      const result = await service.listSources({ filter: parsed.data.filter, includeStats: parsed.data.include_stats });
      return toResponse(result, asJson);
    }
    case "get_file": {
      const parsed = getFileArgs.safeParse(args ?? {});
      if (!parsed.success) {
        return invalidArgs(name, parsed.error);
      }
      const result = await service.getFile(parsed.data);
      return toResponse(result, (file) => file.content);
    }
    case "search": {
      const parsed = searchArgs.safeParse(args ?? {});
      if (!parsed.success) {
        return invalidArgs(name, parsed.error);
      }
      return toResponse(await service.search(parsed.data), asJson);
    }
    case "stats": {
      const parsed = statsArgs.safeParse(args ?? {});
      if (!parsed.success) {
        return invalidArgs(name, parsed.error);
      }
      return toResponse(await service.stats(parsed.data), asJson);
    }
    default:
      return { text: `invalid_argument: unknown tool ${name}`, isError: true };
  }
}
