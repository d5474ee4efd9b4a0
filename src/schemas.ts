import { z, ZodError } from "zod";
import { ValidationError } from "./errors";
import type { ResearchParameters } from "./types/job";

const DEFAULT_PARAMETERS: ResearchParameters = {
  max_depth: 3,
  time_limit: 180,
  max_urls: 10,
  enhance_report: false,
};

/** Core invariants on job parameters, independent of the HTTP limits. */
export const researchParametersSchema = z.object({
  max_depth: z.number().int().positive(),
  time_limit: z.number().positive().finite(),
  max_urls: z.number().int().positive(),
  enhance_report: z.boolean(),
});

export const topicSchema = z.string().trim().min(1, "topic must not be empty");

export const researchRequestSchema = z.object({
  topic: topicSchema,
  max_depth: z.number().int().min(1).max(5).default(DEFAULT_PARAMETERS.max_depth),
  time_limit: z.number().int().min(1).max(600).default(DEFAULT_PARAMETERS.time_limit),
  max_urls: z.number().int().min(1).max(50).default(DEFAULT_PARAMETERS.max_urls),
  enhance_report: z.boolean().default(DEFAULT_PARAMETERS.enhance_report),
});

export const credentialsSchema = z.object({
  gemini_api_key: z.string().trim().min(1, "gemini_api_key is required"),
  firecrawl_api_key: z.string().trim().min(1, "firecrawl_api_key is required"),
});

export type ProviderCredentials = z.infer<typeof credentialsSchema>;

export function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const location = issue.path.join(".");
    return location ? `${location}: ${issue.message}` : issue.message;
  });
}

/** Parses with `schema`, rethrowing zod failures as a {@link ValidationError}. */
export function parseOrThrow<S extends z.ZodTypeAny>(schema: S, value: unknown, label: string): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = formatZodIssues(result.error);
    throw new ValidationError(`Invalid ${label}: ${issues.join("; ")}`, issues);
  }
  return result.data;
}
