import type { JobStatus } from "./types/job";

export class NotConfiguredError extends Error {
  constructor(message = "API keys not configured. Please call /configure endpoint first.") {
    super(message);
    this.name = "NotConfiguredError";
  }
}

export class InvalidTransitionError extends Error {
  readonly jobId: string;
  readonly from: JobStatus;
  readonly to: JobStatus;

  constructor(jobId: string, from: JobStatus, to: JobStatus, detail?: string) {
    super(`Invalid transition for job ${jobId}: ${from} -> ${to}${detail ? ` (${detail})` : ""}`);
    this.name = "InvalidTransitionError";
    this.jobId = jobId;
    this.from = from;
    this.to = to;
  }
}

export type ProviderName = "firecrawl" | "gemini";

export class ProviderError extends Error {
  readonly provider: ProviderName;
  readonly status?: number;

  constructor(provider: ProviderName, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "ProviderError";
    this.provider = provider;
    this.status = options.status;
  }
}

export class JobTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number, message = `Operation timed out after ${timeoutMs}ms`) {
    super(message);
    this.name = "JobTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class JobNotFoundError extends Error {
  readonly jobId: string;

  constructor(jobId: string) {
    super("Research ID not found");
    this.name = "JobNotFoundError";
    this.jobId = jobId;
  }
}

export class ValidationError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = "ValidationError";
    this.issues = issues;
  }
}

export class ShuttingDownError extends Error {
  constructor() {
    super("Service is shutting down and not accepting new research jobs");
    this.name = "ShuttingDownError";
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  if (typeof error === "string") {
    return error;
  }
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}
