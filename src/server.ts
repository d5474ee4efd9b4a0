import { STATUS_CODES } from "node:http";
import Fastify from "fastify";
import sensible from "@fastify/sensible";
import { z, ZodError } from "zod";
import { config } from "./config";
import {
  JobNotFoundError,
  NotConfiguredError,
  ShuttingDownError,
  ValidationError,
} from "./errors";
import { metricsRegistry } from "./metrics";
import type { JobStore } from "./repositories/jobRegistry";
import { formatZodIssues, researchRequestSchema } from "./schemas";
import { toResultView, toStatusView } from "./services/jobViews";
import type { ResearchOrchestrator } from "./services/orchestrator";
import type { ProviderGateway } from "./services/providerGateway";
import { buildReportDocument, REPORT_FORMATS, ReportFormat } from "./services/reportExport";

export const SERVICE_NAME = "Deep Research Orchestrator";

export interface ServerDependencies {
  registry: JobStore;
  orchestrator: ResearchOrchestrator;
  gateway: ProviderGateway;
  logLevel?: string;
}

const idParamSchema = z.object({ id: z.string().min(1) });

const listQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(1000).optional(),
});

const downloadQuerySchema = z.object({
  format: z.string().trim().toLowerCase().default("markdown"),
});

interface HttpFailure {
  statusCode: number;
  message: string;
  issues?: string[];
}

function isReportFormat(format: string): format is ReportFormat {
  return Object.prototype.hasOwnProperty.call(REPORT_FORMATS, format);
}

function clientStatusCode(error: unknown): number | null {
  if (error instanceof Error && "statusCode" in error && typeof error.statusCode === "number") {
    return error.statusCode >= 400 && error.statusCode < 500 ? error.statusCode : null;
  }
  return null;
}

export function toHttpFailure(error: unknown): HttpFailure {
  if (error instanceof ZodError) {
    const issues = formatZodIssues(error);
    return { statusCode: 400, message: `Invalid request: ${issues.join("; ")}`, issues };
  }
  if (error instanceof ValidationError) {
    return { statusCode: 400, message: error.message, issues: error.issues };
  }
  if (error instanceof NotConfiguredError) {
    return { statusCode: 400, message: error.message };
  }
  if (error instanceof JobNotFoundError) {
    return { statusCode: 404, message: error.message };
  }
  if (error instanceof ShuttingDownError) {
    return { statusCode: 503, message: error.message };
  }
  const statusCode = clientStatusCode(error);
  if (statusCode !== null && error instanceof Error) {
    return { statusCode, message: error.message };
  }
  return { statusCode: 500, message: "Internal server error" };
}

export async function buildServer(deps: ServerDependencies) {
  const { registry, orchestrator, gateway } = deps;
  const app = Fastify({
    logger: {
      level: deps.logLevel ?? config.logLevel,
    },
  });
  await app.register(sensible);

  app.setErrorHandler((error, request, reply) => {
    const failure = toHttpFailure(error);
    if (failure.statusCode >= 500) {
      request.log.error({ err: error }, "Unhandled request error");
    }
    return reply.status(failure.statusCode).send({
      statusCode: failure.statusCode,
      error: STATUS_CODES[failure.statusCode] ?? "Error",
      message: failure.message,
      ...(failure.issues ? { issues: failure.issues } : {}),
    });
  });

  app.get("/health", async () => ({
    status: "healthy",
    service: SERVICE_NAME,
    configured: gateway.isConfigured(),
    jobs_in_flight: orchestrator.inFlight,
  }));

  app.get("/metrics", async (_, reply) => {
    reply.header("content-type", metricsRegistry.contentType);
    return metricsRegistry.metrics();
  });

  app.post("/configure", async (request) => {
    gateway.configure(request.body ?? {});
    return { success: true, message: "API keys configured successfully" };
  });

  app.post("/research", async (request, reply) => {
    const { topic, ...parameters } = researchRequestSchema.parse(request.body ?? {});
    const researchId = orchestrator.submit(topic, parameters);
    reply.code(202);
    return {
      research_id: researchId,
      message: "Research process started",
      status: registry.require(researchId).status,
    };
  });

  app.post("/research/sync", async (request) => {
    const { topic, ...parameters } = researchRequestSchema.parse(request.body ?? {});
    const job = await orchestrator.runSync(topic, parameters);
    return toResultView(job);
  });

  app.get("/research", async (request) => {
    const query = listQuerySchema.parse(request.query ?? {});
    return { jobs: registry.list(query.limit) };
  });

  app.get("/research/:id/status", async (request) => {
    const params = idParamSchema.parse(request.params);
    return toStatusView(registry.require(params.id));
  });

  app.get("/research/:id/results", async (request) => {
    const params = idParamSchema.parse(request.params);
    return toResultView(registry.require(params.id));
  });

  app.get("/research/:id/download", async (request, reply) => {
    const params = idParamSchema.parse(request.params);
    const { format } = downloadQuerySchema.parse(request.query ?? {});
    const job = registry.require(params.id);
    if (!isReportFormat(format)) {
      throw app.httpErrors.badRequest("Unsupported format. Only 'markdown' is supported.");
    }
    if (job.status === "failed") {
      throw app.httpErrors.badRequest("Research was not successful");
    }
    if (job.status !== "completed") {
      throw app.httpErrors.notFound("Research report not ready");
    }
    const document = buildReportDocument(job, format);
    reply.header("Content-Type", document.contentType);
    reply.header("Content-Disposition", `attachment; filename=${document.filename}`);
    return document.body;
  });

  return app;
}
