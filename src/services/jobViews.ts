import type { ResearchJob, ResearchParameters, SourceDescriptor } from "../types/job";

const CURRENT_STEP = {
  pending: "Research queued",
  researching: "Conducting initial research",
  enhancing: "Enhancing report with additional information",
  completed: "Research completed successfully",
} as const;

export interface StatusView {
  research_id: string;
  status: ResearchJob["status"];
  stage: string | null;
  current_step: string;
  created_at: string;
  started_at: string | null;
  completed_at: string | null;
}

export interface ResultView {
  success: boolean;
  research_id: string;
  topic: string;
  status: ResearchJob["status"];
  parameters: ResearchParameters;
  initial_report: string | null;
  enhanced_report: string | null;
  sources: SourceDescriptor[] | null;
  sources_count: number | null;
  warnings: string[];
  error: string | null;
  created_at: string;
  started_at: string | null;
  completed_at: string | null;
}

function currentStep(job: ResearchJob): string {
  switch (job.status) {
    case "pending":
      return CURRENT_STEP.pending;
    case "running":
      return CURRENT_STEP[job.stage];
    case "completed":
      return CURRENT_STEP.completed;
    case "failed":
      return `Error: ${job.error}`;
  }
}

export function toStatusView(job: ResearchJob): StatusView {
  return {
    research_id: job.id,
    status: job.status,
    stage: job.status === "running" ? job.stage : null,
    current_step: currentStep(job),
    created_at: job.created_at,
    started_at: job.status === "pending" ? null : job.started_at,
    completed_at: job.status === "completed" || job.status === "failed" ? job.completed_at : null,
  };
}

export function toResultView(job: ResearchJob): ResultView {
  const view: ResultView = {
    success: job.status === "completed",
    research_id: job.id,
    topic: job.topic,
    status: job.status,
    parameters: { ...job.parameters },
    initial_report: null,
    enhanced_report: null,
    sources: null,
    sources_count: null,
    warnings: [],
    error: null,
    created_at: job.created_at,
    started_at: job.status === "pending" ? null : job.started_at,
    completed_at: null,
  };
  if (job.status === "completed") {
    view.initial_report = job.initial_report;
    view.enhanced_report = job.enhanced_report;
    view.sources = job.sources.map((source) => ({ ...source }));
    view.sources_count = job.sources.length;
    view.warnings = [...job.warnings];
    view.completed_at = job.completed_at;
  } else if (job.status === "failed") {
    view.error = job.error;
    view.completed_at = job.completed_at;
  }
  return view;
}
