import { randomUUID } from "node:crypto";
import { InvalidTransitionError, JobNotFoundError } from "../errors";
import {
  JobSummary,
  PendingJob,
  ResearchJob,
  ResearchParameters,
  RunningStage,
} from "../types/job";

/**
 * Storage seam for research jobs. All mutation goes through {@link JobStore.update}, which
 * enforces the forward-only lifecycle `pending -> running -> completed | failed`.
 *
 * Records live for the lifetime of the process. Eviction (e.g. sweeping terminal jobs whose
 * `completed_at` is older than a cutoff) belongs in an implementation of this interface.
 */
export interface JobStore {
  create(topic: string, parameters: ResearchParameters): PendingJob;
  get(id: string): ResearchJob | null;
  require(id: string): ResearchJob;
  update<T extends ResearchJob>(id: string, mutator: (current: ResearchJob) => T): T;
  list(limit?: number): JobSummary[];
  readonly size: number;
}

const STATUS_RANK: Record<ResearchJob["status"], number> = {
  pending: 0,
  running: 1,
  completed: 2,
  failed: 2,
};

const STAGE_RANK: Record<RunningStage, number> = {
  researching: 0,
  enhancing: 1,
};

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

function assertTransition(current: ResearchJob, next: ResearchJob) {
  const fail = (detail: string) => {
    throw new InvalidTransitionError(current.id, current.status, next.status, detail);
  };
  if (next.id !== current.id || next.topic !== current.topic || next.created_at !== current.created_at) {
    fail("immutable fields changed");
  }
  if (next.parameters !== current.parameters) {
    fail("parameters are immutable");
  }
  if (current.status === "completed" || current.status === "failed") {
    fail("job already reached a terminal state");
  }
  if (current.status === "running" && next.status === "running") {
    if (STAGE_RANK[next.stage] <= STAGE_RANK[current.stage]) {
      fail(`stage ${current.stage} -> ${next.stage}`);
    }
    return;
  }
  if (STATUS_RANK[next.status] !== STATUS_RANK[current.status] + 1) {
    fail("status may only move forward one step");
  }
  if (next.status === "completed" && next.enhanced_report !== null && !next.parameters.enhance_report) {
    fail("enhanced report on a job that did not request enhancement");
  }
}

export function toSummary(job: ResearchJob): JobSummary {
  return {
    research_id: job.id,
    topic: job.topic,
    status: job.status,
    created_at: job.created_at,
    completed_at: job.status === "completed" || job.status === "failed" ? job.completed_at : null,
    has_report: job.status === "completed",
  };
}

/**
 * Process-scoped job registry. Operations are synchronous, so on the event loop every `update`
 * runs to completion before any other read or write observes the record.
 */
export class InMemoryJobRegistry implements JobStore {
  private readonly jobs = new Map<string, ResearchJob>();

  constructor(
    private readonly now: () => Date = () => new Date(),
    private readonly generateId: () => string = randomUUID,
  ) {}

  get size() {
    return this.jobs.size;
  }

  create(topic: string, parameters: ResearchParameters): PendingJob {
    let id = this.generateId();
    while (this.jobs.has(id)) {
      id = this.generateId();
    }
    const timestamp = this.now().toISOString();
    const job: PendingJob = {
      id,
      topic,
      parameters: { ...parameters },
      status: "pending",
      created_at: timestamp,
      updated_at: timestamp,
    };
    deepFreeze(job);
    this.jobs.set(id, job);
    return job;
  }

  get(id: string): ResearchJob | null {
    return this.jobs.get(id) ?? null;
  }

  require(id: string): ResearchJob {
    const job = this.jobs.get(id);
    if (!job) {
      throw new JobNotFoundError(id);
    }
    return job;
  }

  update<T extends ResearchJob>(id: string, mutator: (current: ResearchJob) => T): T {
    const current = this.require(id);
    const next = mutator(current);
    assertTransition(current, next);
    const committed: T = { ...next, updated_at: this.now().toISOString() };
    deepFreeze(committed);
    this.jobs.set(id, committed);
    return committed;
  }

  list(limit?: number): JobSummary[] {
    const summaries = Array.from(this.jobs.values(), toSummary).reverse();
    return limit === undefined ? summaries : summaries.slice(0, limit);
  }
}
