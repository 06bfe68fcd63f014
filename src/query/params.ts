import { z } from "zod";

export const listSourcesParamsSchema = z
  .object({
    filter: z.string().optional(),
    includeStats: z.boolean().optional(),
  })
  .strict();

export const getFileParamsSchema = z
  .object({
    path: z.string().min(1).optional(),
    slug: z.string().min(1).optional(),
  })
  .strict()
  .refine((value) => value.path !== undefined || value.slug !== undefined, {
    message: "either path or slug is required",
  });

export const searchParamsSchema = z
  .object({
    query: z.string().trim().min(1, "query must not be empty"),
    source: z.string().optional(),
    limit: z.number().int().positive().optional(),
  })
  .strict();

export const statsParamsSchema = z
  .object({
    detailed: z.boolean().optional(),
  })
  .strict();

export type ListSourcesParams = z.input<typeof listSourcesParamsSchema>;
export type GetFileParams = z.input<typeof getFileParamsSchema>;
export type SearchParams = z.input<typeof searchParamsSchema>;
export type StatsParams = z.input<typeof statsParamsSchema>;

export function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
}
