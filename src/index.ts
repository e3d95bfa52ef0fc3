import { AppConfig, config } from "./config";
import { logger } from "./logger";
import { runMigrations } from "./migrate";
import { createMemoryRepositories } from "./repositories/memory";
import { createPostgresRepositories } from "./repositories/postgres";
import type { Repositories } from "./repositories/types";
import { buildServer } from "./server";
import { AntiDetectionContext } from "./services/antiDetection";
import {
  CitationCollaborator,
  HttpCitationCollaborator,
  LedgerCitationCollaborator,
} from "./services/citationCollaborator";
import { ContentValidator } from "./services/contentValidator";
import { DeliveryService } from "./services/deliveryService";
import { EscalationController } from "./services/escalationController";
import { FailureClassifier } from "./services/failureClassifier";
import { FetchExecutor } from "./services/fetchExecutor";
import { InferenceClient, InferenceCollaborator } from "./services/inferenceClient";
import { MinioPayloadArchive } from "./services/payloadArchive";
import { DomainRateLimiter } from "./services/rateLimiter";
import { Scheduler } from "./services/scheduler";
import { StatusWebhook } from "./services/statusWebhook";
import { StrategyRegistry, buildStrategyRegistry } from "./services/strategies";

export async function openRepositories(cfg: AppConfig): Promise<{ repositories: Repositories; close: () => Promise<void> }> {
  if (cfg.store.driver === "memory") {
    logger.warn("Using the in-memory store; tasks will not survive a restart");
    return { repositories: createMemoryRepositories(), close: async () => undefined };
  }
  const { pool } = await import("./db");
  await runMigrations(pool);
  return { repositories: createPostgresRepositories(pool), close: () => pool.end() };
}

export function buildScheduler(
  cfg: AppConfig,
  repositories: Repositories,
  inference: InferenceCollaborator,
  registry: StrategyRegistry,
) {
  const available = registry.strategies().map((strategy) => strategy.kind);
  const citations: CitationCollaborator = cfg.citations.serviceUrl
    ? new HttpCitationCollaborator({ serviceUrl: cfg.citations.serviceUrl, apiKey: cfg.citations.apiKey })
    : new LedgerCitationCollaborator(repositories.ledger);
  const webhook = cfg.statusWebhook.url
    ? new StatusWebhook({ url: cfg.statusWebhook.url, apiKey: cfg.statusWebhook.apiKey })
    : null;

  return new Scheduler({
    repository: repositories.research,
    limiter: new DomainRateLimiter(cfg.rateLimit),
    registry,
    executor: new FetchExecutor({
      context: new AntiDetectionContext({ jitter: cfg.fetch.jitter, proxies: cfg.fetch.proxies }),
      maxBodyBytes: cfg.fetch.maxBodyBytes,
    }),
    classifier: new FailureClassifier(cfg.classifier),
    controller: new EscalationController({
      registry,
      options: cfg.escalation,
      hints: cfg.scheduler.useStrategyHints
        ? (domain, pastFailures) => inference.suggestStrategy(domain, pastFailures, available)
        : undefined,
    }),
    validator: new ContentValidator(inference, cfg.validation),
    delivery: new DeliveryService({
      repository: repositories.deliveries,
      collaborator: citations,
      options: { ownerId: cfg.workerId, ...cfg.delivery },
    }),
    archive: cfg.minio ? new MinioPayloadArchive(cfg.minio) : null,
    options: {
      maxWorkers: cfg.scheduler.maxWorkers,
      taskTimeoutMs: cfg.scheduler.taskTimeoutMs,
      attemptTimeoutMs: cfg.scheduler.attemptTimeoutMs,
      maxCrossReferences: cfg.validation.maxCrossReferences,
    },
    onTaskUpdate: webhook ? (task) => webhook.notify(task) : undefined,
  });
}

async function main() {
  const { repositories, close } = await openRepositories(config);
  const inference = new InferenceClient(config.inference);
  const registry = buildStrategyRegistry({ renderer: config.renderer, proxies: config.fetch.proxies });
  const scheduler = buildScheduler(config, repositories, inference, registry);
  const app = await buildServer({ scheduler, inference, apiKey: config.apiKey });

  await scheduler.start();
  const address = await app.listen({ port: config.port, host: "0.0.0.0" });
  app.log.info(`Server listening on ${address}`);

  const shutdown = async (signal: string) => {
    logger.info({ signal }, "Shutting down");
    await app.close();
    await scheduler.stop();
    await registry.close();
    await close();
  };
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal)
        .catch((error: unknown) => {
          logger.error({ error }, "Shutdown failed");
          process.exitCode = 1;
        })
        .finally(() => process.exit());
    });
  }
}

if (require.main === module) {
  main().catch((err) => {
    logger.error({ err }, "Failed to start server");
    process.exit(1);
  });
}
