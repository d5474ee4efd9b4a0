import { Counter, Gauge, Histogram, Registry, collectDefaultMetrics } from "prom-client";
import type { ProviderName } from "./errors";

export const metricsRegistry = new Registry();
collectDefaultMetrics({ register: metricsRegistry });

export const jobStatusCounter = new Counter({
  name: "deep_research_jobs_total",
  help: "Total deep research jobs processed, by status",
  labelNames: ["status"],
  registers: [metricsRegistry],
});

export const jobDurationHistogram = new Histogram({
  name: "deep_research_job_duration_seconds",
  help: "Job duration from start of research to terminal state, in seconds",
  buckets: [5, 15, 30, 60, 120, 300, 600],
  labelNames: ["status"],
  registers: [metricsRegistry],
});

export const jobsInFlightGauge = new Gauge({
  name: "deep_research_jobs_in_flight",
  help: "Research workflows scheduled but not yet settled",
  registers: [metricsRegistry],
});

export const providerLatencyHistogram = new Histogram({
  name: "deep_research_provider_latency_seconds",
  help: "Latency for external provider calls",
  buckets: [0.5, 1, 2, 5, 10, 30, 60, 180],
  labelNames: ["provider"],
  registers: [metricsRegistry],
});

export const providerErrorsCounter = new Counter({
  name: "deep_research_provider_errors_total",
  help: "External provider failures by provider and stage",
  labelNames: ["provider", "stage"],
  registers: [metricsRegistry],
});

export const enhancementWarningsCounter = new Counter({
  name: "deep_research_enhancement_warnings_total",
  help: "Jobs that completed without an enhanced report because enhancement failed or ran out of time",
  registers: [metricsRegistry],
});

export function startProviderTimer(provider: ProviderName) {
  return providerLatencyHistogram.startTimer({ provider });
}

export function recordProviderError(provider: ProviderName, stage: string) {
  providerErrorsCounter.labels(provider, stage).inc();
}
