export type JobStatus = "pending" | "running" | "completed" | "failed";

export type RunningStage = "researching" | "enhancing";

export type FailureKind = "provider" | "timeout" | "internal";

export interface ResearchParameters {
  max_depth: number;
  /** Seconds. */
  time_limit: number;
  max_urls: number;
  enhance_report: boolean;
}

export interface SourceDescriptor {
  url: string;
  title?: string | null;
  description?: string | null;
}

interface JobBase {
  readonly id: string;
  readonly topic: string;
  readonly parameters: Readonly<ResearchParameters>;
  readonly created_at: string;
  readonly updated_at: string;
}

export interface PendingJob extends JobBase {
  readonly status: "pending";
}

export interface RunningJob extends JobBase {
  readonly status: "running";
  readonly stage: RunningStage;
  readonly started_at: string;
}

export interface CompletedJob extends JobBase {
  readonly status: "completed";
  readonly started_at: string;
  readonly completed_at: string;
  readonly initial_report: string;
  readonly enhanced_report: string | null;
  readonly sources: readonly SourceDescriptor[];
  readonly warnings: readonly string[];
}

export interface FailedJob extends JobBase {
  readonly status: "failed";
  readonly started_at: string;
  readonly completed_at: string;
  readonly error: string;
  readonly error_kind: FailureKind;
}

export type ResearchJob = PendingJob | RunningJob | CompletedJob | FailedJob;

export type TerminalJob = CompletedJob | FailedJob;

export interface JobSummary {
  research_id: string;
  topic: string;
  status: JobStatus;
  created_at: string;
  completed_at: string | null;
  has_report: boolean;
}

export function isTerminal(job: ResearchJob): job is TerminalJob {
  return job.status === "completed" || job.status === "failed";
}
