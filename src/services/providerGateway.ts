import { NotConfiguredError } from "../errors";
import type { Logger } from "../logger";
import { prompts } from "../prompts";
import { credentialsSchema, parseOrThrow, ProviderCredentials } from "../schemas";
import type { SourceDescriptor } from "../types/job";
import { numberedSources, truncateForPrompt } from "../utils/text";
import { DeepResearchActivity, FirecrawlClient } from "./firecrawlClient";
import { GeminiClient } from "./geminiClient";
import type { FetchLike } from "./httpJson";

export interface ResearchInput {
  topic: string;
  max_depth: number;
  /** Seconds. */
  time_limit: number;
  max_urls: number;
}

export interface ResearchOutcome {
  report: string;
  sources: SourceDescriptor[];
  activities: string[];
}

export interface EnhanceInput {
  topic: string;
  report: string;
}

/**
 * Uniform contract over the research provider and the report enhancer. Both calls may take a
 * long time; callers own timeouts and signal them through `signal`.
 */
export interface ProviderGateway {
  isConfigured(): boolean;
  configure(credentials: unknown): void;
  research(input: ResearchInput, signal?: AbortSignal): Promise<ResearchOutcome>;
  enhance(input: EnhanceInput, signal?: AbortSignal): Promise<string>;
}

export interface ExternalProviderGatewayOptions {
  logger: Logger;
  gemini: { baseUrl: string; model: string; maxOutputTokens: number };
  firecrawl: { baseUrl: string; pollIntervalMs: number };
  maxReportChars: number;
  fetchImpl?: FetchLike;
}

interface Clients {
  firecrawl: FirecrawlClient;
  gemini: GeminiClient;
}

function formatActivity(activity: DeepResearchActivity) {
  return `[${activity.type}] ${activity.message}`;
}

/** Firecrawl deep research for crawling, Gemini for writing and enhancing the report. */
export class ExternalProviderGateway implements ProviderGateway {
  private clients: Clients | null = null;

  constructor(private readonly options: ExternalProviderGatewayOptions) {}

  isConfigured() {
    return this.clients !== null;
  }

  configure(credentials: unknown) {
    const keys: ProviderCredentials = parseOrThrow(credentialsSchema, credentials, "credentials");
    const { logger, fetchImpl } = this.options;
    this.clients = {
      firecrawl: new FirecrawlClient({
        apiKey: keys.firecrawl_api_key,
        baseUrl: this.options.firecrawl.baseUrl,
        pollIntervalMs: this.options.firecrawl.pollIntervalMs,
        logger,
        fetchImpl,
      }),
      gemini: new GeminiClient({
        apiKey: keys.gemini_api_key,
        baseUrl: this.options.gemini.baseUrl,
        model: this.options.gemini.model,
        maxOutputTokens: this.options.gemini.maxOutputTokens,
        logger,
        fetchImpl,
      }),
    };
    logger.info("Provider credentials configured");
  }

  async research(input: ResearchInput, signal?: AbortSignal): Promise<ResearchOutcome> {
    // captured once so a concurrent /configure does not switch keys mid-job
    const clients = this.requireClients();
    const activities: string[] = [];
    const crawl = await clients.firecrawl.deepResearch(
      input.topic,
      { maxDepth: input.max_depth, timeLimit: input.time_limit, maxUrls: input.max_urls },
      signal,
      (activity) => {
        const line = formatActivity(activity);
        activities.push(line);
        this.options.logger.debug({ topic: input.topic, activity: line }, "Research activity");
      },
    );

    const prompt = [
      `RESEARCH TOPIC: ${input.topic}`,
      "",
      "DEEP RESEARCH SYNTHESIS:",
      truncateForPrompt(crawl.finalAnalysis, this.options.maxReportChars),
      "",
      "SOURCES:",
      crawl.sources.length ? numberedSources(crawl.sources) : "(none)",
    ].join("\n");
    const report = await clients.gemini.generate(prompts.researcher, prompt, signal);

    return { report, sources: crawl.sources, activities };
  }

  async enhance(input: EnhanceInput, signal?: AbortSignal): Promise<string> {
    const clients = this.requireClients();
    const prompt = [
      `RESEARCH TOPIC: ${input.topic}`,
      "",
      "INITIAL RESEARCH REPORT:",
      truncateForPrompt(input.report, this.options.maxReportChars),
      "",
      "Please enhance this research report with additional information, examples, case studies,",
      "and deeper insights while maintaining its academic rigor and factual accuracy.",
    ].join("\n");
    return clients.gemini.generate(prompts.enhancer, prompt, signal);
  }

  private requireClients(): Clients {
    if (!this.clients) {
      throw new NotConfiguredError();
    }
    return this.clients;
  }
}
