import pino, { Logger, LoggerOptions } from "pino";
import { config } from "./config";

const options: LoggerOptions = {
  level: config.logLevel,
  base: { service: "deep-research-orchestrator" },
  // provider keys can appear in logged request bodies and client options
  redact: ["*.gemini_api_key", "*.firecrawl_api_key", "*.apiKey", "*.headers.authorization", '*.headers["x-goog-api-key"]'],
};

if (config.env === "development") {
  options.transport = { target: "pino-pretty" };
}

export const logger = pino(options);
export type { Logger };
