import { z } from "zod";

const envSchema = z.object({
  NODE_ENV: z.string().optional().default("development"),
  PORT: z.coerce.number().int().positive().optional().default(8000),
  HOST: z.string().optional().default("0.0.0.0"),
  LOG_LEVEL: z.string().optional().default("info"),
  GEMINI_API_KEY: z.string().optional(),
  GEMINI_API_URL: z.string().url().optional().default("https://generativelanguage.googleapis.com"),
  GEMINI_MODEL: z.string().optional().default("gemini-2.0-flash"),
  GEMINI_MAX_OUTPUT_TOKENS: z.coerce.number().int().positive().optional().default(8192),
  FIRECRAWL_API_KEY: z.string().optional(),
  FIRECRAWL_API_URL: z.string().url().optional().default("https://api.firecrawl.dev"),
  FIRECRAWL_POLL_INTERVAL_MS: z.coerce.number().int().positive().optional().default(2000),
  MAX_CONCURRENT_JOBS: z.coerce.number().int().min(0).optional().default(0),
  JOB_TIMEOUT_SLACK_SECONDS: z.coerce.number().min(0).optional().default(30),
  SHUTDOWN_GRACE_SECONDS: z.coerce.number().min(0).optional().default(10),
  MAX_REPORT_CHARS: z.coerce.number().int().positive().optional().default(100_000),
});

type EnvInput = Record<string, string | undefined>;

export function loadConfig(source: EnvInput) {
  const env = envSchema.parse(source);
  const geminiApiKey = env.GEMINI_API_KEY?.trim() || undefined;
  const firecrawlApiKey = env.FIRECRAWL_API_KEY?.trim() || undefined;

  return {
    env: env.NODE_ENV,
    port: env.PORT,
    host: env.HOST,
    logLevel: env.LOG_LEVEL,
    credentials:
      geminiApiKey && firecrawlApiKey
        ? { gemini_api_key: geminiApiKey, firecrawl_api_key: firecrawlApiKey }
        : null,
    gemini: {
      baseUrl: env.GEMINI_API_URL.replace(/\/$/, ""),
      model: env.GEMINI_MODEL,
      maxOutputTokens: env.GEMINI_MAX_OUTPUT_TOKENS,
    },
    firecrawl: {
      baseUrl: env.FIRECRAWL_API_URL.replace(/\/$/, ""),
      pollIntervalMs: env.FIRECRAWL_POLL_INTERVAL_MS,
    },
    orchestrator: {
      // 0 disables the cap
      maxConcurrent: env.MAX_CONCURRENT_JOBS === 0 ? Infinity : env.MAX_CONCURRENT_JOBS,
      timeoutSlackMs: env.JOB_TIMEOUT_SLACK_SECONDS * 1000,
      shutdownGraceMs: env.SHUTDOWN_GRACE_SECONDS * 1000,
    },
    report: {
      maxChars: env.MAX_REPORT_CHARS,
    },
  };
}

export const config = loadConfig(process.env);
