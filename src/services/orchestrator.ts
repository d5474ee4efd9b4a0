import {
  describeError,
  InvalidTransitionError,
  JobTimeoutError,
  NotConfiguredError,
  ProviderError,
  ShuttingDownError,
} from "../errors";
import type { Logger } from "../logger";
import {
  enhancementWarningsCounter,
  jobDurationHistogram,
  jobsInFlightGauge,
  jobStatusCounter,
} from "../metrics";
import type { JobStore } from "../repositories/jobRegistry";
import { parseOrThrow, researchParametersSchema, topicSchema } from "../schemas";
import {
  CompletedJob,
  FailedJob,
  FailureKind,
  isTerminal,
  PendingJob,
  ResearchJob,
  ResearchParameters,
  RunningJob,
  RunningStage,
  TerminalJob,
} from "../types/job";
import { withDeadline } from "../utils/deadline";
import type { ProviderGateway, ResearchOutcome } from "./providerGateway";

export interface OrchestratorOptions {
  logger: Logger;
  /** Workflows allowed to run at once; the rest wait in `pending`. Defaults to unlimited. */
  maxConcurrent?: number;
  /** Extra time granted past `time_limit` for report writing and enhancement. */
  timeoutSlackMs?: number;
}

export interface ShutdownReport {
  drained: string[];
  abandoned: string[];
}

type StopTimer = (labels?: { status: string }) => number;

function baseFields(job: ResearchJob) {
  const { id, topic, parameters, created_at, updated_at } = job;
  return { id, topic, parameters, created_at, updated_at };
}

function classifyFailure(error: unknown): FailureKind {
  if (error instanceof JobTimeoutError) {
    return "timeout";
  }
  if (error instanceof ProviderError) {
    return "provider";
  }
  return "internal";
}

function yieldToEventLoop() {
  return new Promise<void>((resolve) => setImmediate(resolve));
}

/**
 * Drives research jobs from `pending` to a terminal state. Every job runs as a retained task;
 * `submit` leaves it in the background while `runSync` awaits the same task.
 */
export class ResearchOrchestrator {
  private readonly tasks = new Map<string, Promise<TerminalJob>>();
  private readonly waiting: (() => void)[] = [];
  private readonly maxConcurrent: number;
  private readonly timeoutSlackMs: number;
  private running = 0;
  private accepting = true;

  constructor(
    private readonly registry: JobStore,
    private readonly gateway: ProviderGateway,
    private readonly options: OrchestratorOptions,
  ) {
    this.maxConcurrent = options.maxConcurrent ?? Infinity;
    this.timeoutSlackMs = options.timeoutSlackMs ?? 0;
    if (!(this.maxConcurrent >= 1)) {
      throw new RangeError("maxConcurrent must be at least 1");
    }
  }

  get inFlight() {
    return this.tasks.size;
  }

  get isAccepting() {
    return this.accepting;
  }

  submit(topic: string, parameters: ResearchParameters): string {
    const job = this.createJob(topic, parameters);
    this.launch(job.id).catch((error) => {
      this.options.logger.error({ err: error, jobId: job.id }, "Research task rejected");
    });
    return job.id;
  }

  async runSync(topic: string, parameters: ResearchParameters): Promise<TerminalJob> {
    const job = this.createJob(topic, parameters);
    return this.launch(job.id);
  }

  /** Stops accepting work and waits up to `graceMs` for in-flight jobs. */
  async shutdown(graceMs: number): Promise<ShutdownReport> {
    this.accepting = false;
    const pending = Array.from(this.tasks.entries());
    const drained: string[] = [];
    if (!pending.length) {
      return { drained, abandoned: [] };
    }
    const settled = Promise.all(
      pending.map(([id, task]) =>
        task.then(
          () => {
            drained.push(id);
          },
          () => {
            drained.push(id);
          },
        ),
      ),
    );
    let timer: NodeJS.Timeout | undefined;
    const grace = new Promise<void>((resolve) => {
      timer = setTimeout(resolve, graceMs);
    });
    try {
      await Promise.race([settled, grace]);
    } finally {
      clearTimeout(timer);
    }
    const abandoned = pending.map(([id]) => id).filter((id) => !drained.includes(id));
    if (abandoned.length) {
      this.options.logger.warn({ abandoned }, "Abandoning in-flight research jobs at shutdown");
    }
    return { drained: [...drained], abandoned };
  }

  private createJob(topic: string, parameters: ResearchParameters): PendingJob {
    if (!this.accepting) {
      throw new ShuttingDownError();
    }
    const cleanTopic = parseOrThrow(topicSchema, topic, "topic");
    const cleanParameters = parseOrThrow(researchParametersSchema, parameters, "research parameters");
    if (!this.gateway.isConfigured()) {
      throw new NotConfiguredError();
    }
    const job = this.registry.create(cleanTopic, cleanParameters);
    this.options.logger.info({ jobId: job.id, topic: job.topic, parameters: job.parameters }, "Research job created");
    return job;
  }

  private launch(jobId: string): Promise<TerminalJob> {
    const job = this.registry.require(jobId);
    if (job.status !== "pending" || this.tasks.has(jobId)) {
      throw new InvalidTransitionError(jobId, job.status, "running", "workflow already launched");
    }
    jobsInFlightGauge.inc();
    const task = this.execute(job)
      .catch((error) => this.recoverFromFault(jobId, error))
      .finally(() => {
        this.tasks.delete(jobId);
        jobsInFlightGauge.dec();
      });
    this.tasks.set(jobId, task);
    return task;
  }

  private async execute(job: PendingJob): Promise<TerminalJob> {
    // leaves the record observable as pending until the next turn of the loop
    await yieldToEventLoop();
    await this.acquireSlot();
    try {
      return await this.runWorkflow(job);
    } finally {
      this.releaseSlot();
    }
  }

  private async runWorkflow(job: PendingJob): Promise<TerminalJob> {
    const { id, topic, parameters } = job;
    const stopTimer = jobDurationHistogram.startTimer();
    const startedAt = new Date();
    const started_at = startedAt.toISOString();
    const budgetMs = parameters.time_limit * 1000 + this.timeoutSlackMs;
    const deadline = startedAt.getTime() + budgetMs;
    const budgetSeconds = budgetMs / 1000;

    this.registry.update(id, (current) => this.toRunning(current, started_at, "researching"));
    jobStatusCounter.labels("started").inc();
    this.options.logger.info({ jobId: id }, "Starting research job");

    let outcome: ResearchOutcome;
    try {
      outcome = await withDeadline(
        (signal) =>
          this.gateway.research(
            {
              topic,
              max_depth: parameters.max_depth,
              time_limit: parameters.time_limit,
              max_urls: parameters.max_urls,
            },
            signal,
          ),
        deadline - Date.now(),
        `Research timed out after ${budgetSeconds}s`,
      );
    } catch (error) {
      return this.fail(id, started_at, error, stopTimer);
    }

    const warnings: string[] = [];
    let enhancedReport: string | null = null;
    if (parameters.enhance_report) {
      this.registry.update(id, (current) => this.toRunning(current, started_at, "enhancing"));
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        warnings.push("Enhancement skipped: time limit reached before enhancement could start");
      } else {
        try {
          enhancedReport = await withDeadline(
            (signal) => this.gateway.enhance({ topic, report: outcome.report }, signal),
            remaining,
            `Enhancement timed out within the ${budgetSeconds}s time budget`,
          );
        } catch (error) {
          warnings.push(`Enhancement failed: ${describeError(error)}`);
        }
      }
      if (warnings.length) {
        enhancementWarningsCounter.inc();
        this.options.logger.warn({ jobId: id, warnings }, "Completing research job without enhanced report");
      }
    }

    const completed = this.registry.update(
      id,
      (current): CompletedJob => ({
        ...baseFields(current),
        status: "completed",
        started_at,
        completed_at: new Date().toISOString(),
        initial_report: outcome.report,
        enhanced_report: enhancedReport,
        sources: outcome.sources.map((source) => ({ ...source })),
        warnings,
      }),
    );
    jobStatusCounter.labels("completed").inc();
    stopTimer({ status: "completed" });
    this.options.logger.info(
      { jobId: id, sources: completed.sources.length, enhanced: enhancedReport !== null },
      "Research job completed",
    );
    return completed;
  }

  private toRunning(current: ResearchJob, started_at: string, stage: RunningStage): RunningJob {
    return { ...baseFields(current), status: "running", stage, started_at };
  }

  private fail(jobId: string, started_at: string, error: unknown, stopTimer?: StopTimer): FailedJob {
    const message = describeError(error);
    const kind = classifyFailure(error);
    const failed = this.registry.update(
      jobId,
      (current): FailedJob => ({
        ...baseFields(current),
        status: "failed",
        started_at,
        completed_at: new Date().toISOString(),
        error: message,
        error_kind: kind,
      }),
    );
    jobStatusCounter.labels("failed").inc();
    stopTimer?.({ status: "failed" });
    this.options.logger.error({ jobId, kind, error: message }, "Research job failed");
    return failed;
  }

  /** Last resort for faults outside the provider calls; the job still ends up terminal. */
  private recoverFromFault(jobId: string, error: unknown): TerminalJob {
    this.options.logger.error({ err: error, jobId }, "Research workflow crashed");
    const current = this.registry.require(jobId);
    if (isTerminal(current)) {
      return current;
    }
    let started_at: string;
    if (current.status === "running") {
      started_at = current.started_at;
    } else {
      started_at = new Date().toISOString();
      this.registry.update(jobId, (latest) => this.toRunning(latest, started_at, "researching"));
    }
    return this.fail(jobId, started_at, error);
  }

  private acquireSlot(): Promise<void> {
    if (this.running < this.maxConcurrent) {
      this.running += 1;
      return Promise.resolve();
    }
    return new Promise((resolve) => this.waiting.push(resolve));
  }

  private releaseSlot() {
    const next = this.waiting.shift();
    if (next) {
      next();
    } else {
      this.running -= 1;
    }
  }
}
