import { setTimeout as sleep } from "node:timers/promises";
import { z } from "zod";
import { ProviderError } from "../errors";
import type { Logger } from "../logger";
import { recordProviderError, startProviderTimer } from "../metrics";
import type { SourceDescriptor } from "../types/job";
import { FetchLike, requestJson } from "./httpJson";

const startResponseSchema = z.object({
  success: z.boolean(),
  id: z.string().optional(),
  error: z.string().optional(),
});

const activitySchema = z.object({
  type: z.string(),
  status: z.string().optional(),
  message: z.string(),
  timestamp: z.string().optional(),
  depth: z.number().optional(),
});

const statusResponseSchema = z.object({
  success: z.boolean(),
  status: z.string().optional(),
  error: z.string().optional(),
  data: z
    .object({
      finalAnalysis: z.string().optional(),
      sources: z
        .array(
          z.object({
            url: z.string(),
            title: z.string().nullish(),
            description: z.string().nullish(),
          }),
        )
        .optional(),
      activities: z.array(activitySchema).optional(),
    })
    .optional(),
});

export type DeepResearchActivity = z.infer<typeof activitySchema>;

export interface DeepResearchParams {
  maxDepth: number;
  /** Seconds. */
  timeLimit: number;
  maxUrls: number;
}

export interface DeepResearchResult {
  finalAnalysis: string;
  sources: SourceDescriptor[];
  activities: DeepResearchActivity[];
}

export interface FirecrawlClientOptions {
  apiKey: string;
  baseUrl: string;
  pollIntervalMs: number;
  logger: Logger;
  fetchImpl?: FetchLike;
}

function resultError(message: string) {
  recordProviderError("firecrawl", "result");
  return new ProviderError("firecrawl", message);
}

export class FirecrawlClient {
  constructor(private readonly options: FirecrawlClientOptions) {}

  /**
   * Starts a deep-research crawl and polls it to completion. `onActivity` sees each activity
   * once, in the order Firecrawl reports them.
   */
  async deepResearch(
    query: string,
    params: DeepResearchParams,
    signal?: AbortSignal,
    onActivity?: (activity: DeepResearchActivity) => void,
  ): Promise<DeepResearchResult> {
    const stopTimer = startProviderTimer("firecrawl");
    try {
      const started = await this.call("start", "POST", "/v1/deep-research", startResponseSchema, signal, {
        query,
        maxDepth: params.maxDepth,
        timeLimit: params.timeLimit,
        maxUrls: params.maxUrls,
      });
      if (!started.success || !started.id) {
        throw resultError(started.error ?? "Firecrawl did not start the deep research job");
      }
      const jobId = started.id;
      this.options.logger.info({ firecrawlJobId: jobId, query }, "Firecrawl deep research started");

      let seen = 0;
      for (;;) {
        const status = await this.call(
          "status",
          "GET",
          `/v1/deep-research/${encodeURIComponent(jobId)}`,
          statusResponseSchema,
          signal,
        );
        const activities = status.data?.activities ?? [];
        for (const activity of activities.slice(seen)) {
          onActivity?.(activity);
        }
        seen = Math.max(seen, activities.length);

        if (!status.success || status.status === "failed") {
          throw resultError(status.error ?? "Firecrawl deep research failed");
        }
        if (status.status === "completed") {
          const finalAnalysis = status.data?.finalAnalysis?.trim();
          if (!finalAnalysis) {
            throw resultError("Firecrawl returned no final analysis");
          }
          return {
            finalAnalysis,
            sources: (status.data?.sources ?? []).map((source) => ({
              url: source.url,
              title: source.title ?? null,
              description: source.description ?? null,
            })),
            activities,
          };
        }
        await sleep(this.options.pollIntervalMs, undefined, { signal });
      }
    } finally {
      stopTimer();
    }
  }

  private call<S extends z.ZodTypeAny>(
    stage: string,
    method: "GET" | "POST",
    path: string,
    schema: S,
    signal?: AbortSignal,
    body?: unknown,
  ) {
    return requestJson({
      provider: "firecrawl",
      stage,
      url: `${this.options.baseUrl}${path}`,
      method,
      headers: { authorization: `Bearer ${this.options.apiKey}` },
      body,
      schema,
      signal,
      fetchImpl: this.options.fetchImpl,
      logger: this.options.logger,
    });
  }
}
