import { config } from "./config";
import { logger } from "./logger";
import { InMemoryJobRegistry } from "./repositories/jobRegistry";
import { ResearchOrchestrator } from "./services/orchestrator";
import { ExternalProviderGateway } from "./services/providerGateway";
import { buildServer } from "./server";

async function main() {
  const registry = new InMemoryJobRegistry();
  const gateway = new ExternalProviderGateway({
    logger: logger.child({ component: "providers" }),
    gemini: config.gemini,
    firecrawl: config.firecrawl,
    maxReportChars: config.report.maxChars,
  });
  if (config.credentials) {
    gateway.configure(config.credentials);
  } else {
    logger.warn("Provider API keys not set in the environment; call POST /configure before submitting research");
  }
  const orchestrator = new ResearchOrchestrator(registry, gateway, {
    logger: logger.child({ component: "orchestrator" }),
    maxConcurrent: config.orchestrator.maxConcurrent,
    timeoutSlackMs: config.orchestrator.timeoutSlackMs,
  });

  const app = await buildServer({ registry, orchestrator, gateway });
  const address = await app.listen({ port: config.port, host: config.host });
  app.log.info(`Server listening on ${address}`);

  let closing = false;
  const close = async (signal: NodeJS.Signals) => {
    if (closing) {
      return;
    }
    closing = true;
    logger.info({ signal }, "Shutting down");
    const report = await orchestrator.shutdown(config.orchestrator.shutdownGraceMs);
    await app.close();
    logger.info({ drained: report.drained.length, abandoned: report.abandoned.length }, "Shutdown complete");
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      close(signal)
        .then(() => process.exit(0))
        .catch((err) => {
          logger.error({ err }, "Shutdown failed");
          process.exit(1);
        });
    });
  }
}

main().catch((err) => {
  logger.error({ err }, "Failed to start server");
  process.exit(1);
});
