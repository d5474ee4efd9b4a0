import type { CompletedJob, SourceDescriptor } from "../types/job";

export type ReportFormat = "markdown";

export const REPORT_FORMATS: Record<ReportFormat, { contentType: string; extension: string }> = {
  markdown: {
    contentType: "text/markdown; charset=utf-8",
    extension: "md",
  },
};

export interface ReportDocument {
  filename: string;
  contentType: string;
  body: string;
}

function renderSource(source: SourceDescriptor, index: number) {
  const title = source.title?.trim();
  return title ? `${index + 1}. [${title}](${source.url})` : `${index + 1}. <${source.url}>`;
}

function appendSources(report: string, sources: readonly SourceDescriptor[]) {
  if (!sources.length) {
    return report;
  }
  const lines = sources.map(renderSource);
  return `${report.trimEnd()}\n\n## Sources\n\n${lines.join("\n")}\n`;
}

/** `quantum computing` -> `quantum_computing_report.md`; unsafe header characters are dropped. */
export function reportFilename(topic: string, format: ReportFormat = "markdown") {
  const stem = topic
    .trim()
    .replace(/\s+/g, "_")
    .replace(/[^A-Za-z0-9_.-]/g, "")
    .slice(0, 100);
  return `${stem || "research"}_report.${REPORT_FORMATS[format].extension}`;
}

/** The enhanced report when there is one, otherwise the initial report, with the sources appended. */
export function buildReportDocument(job: CompletedJob, format: ReportFormat = "markdown"): ReportDocument {
  const report = job.enhanced_report ?? job.initial_report;
  return {
    filename: reportFilename(job.topic, format),
    contentType: REPORT_FORMATS[format].contentType,
    body: appendSources(report, job.sources),
  };
}
