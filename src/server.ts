import { STATUS_CODES } from "node:http";
import Fastify, { FastifyInstance } from "fastify";
import sensible from "@fastify/sensible";
import { ZodError, z } from "zod";
import { InferenceError, InvalidTaskError } from "./errors";
import { metricsRegistry } from "./metrics";
import type { InferenceCollaborator } from "./services/inferenceClient";
import type { Scheduler } from "./services/scheduler";
import type { FetchJob, ResearchTask } from "./types/research";

export interface ServerDeps {
  scheduler: Scheduler;
  inference: InferenceCollaborator;
  apiKey: string;
  logLevel?: string;
}

const createSchema = z.object({
  query: z.string().trim().min(1),
  target_urls: z.array(z.string()).min(1).max(200),
  options: z
    .object({
      task_timeout_seconds: z.number().positive().max(86400).optional(),
    })
    .optional(),
});
const updateSchema = z
  .object({
    cancel: z.boolean().optional(),
    note: z.string().trim().min(1).max(2000).optional(),
  })
  .refine((body) => body.cancel !== undefined || body.note !== undefined, { message: "nothing to update" });
const idParamSchema = z.object({ id: z.string().uuid() });
const domainParamSchema = z.object({ domain: z.string().min(1).max(253) });
const attemptsParamSchema = idParamSchema.extend({ jobId: z.string().uuid() });
const listQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).optional(),
});
const analyzeSchema = z.object({
  content: z.string().trim().min(1).max(100_000),
});

const OPEN_ROUTES = ["/healthz", "/metrics"];

function describeTask(task: ResearchTask) {
  return {
    task_id: task.id,
    query: task.query,
    status: task.status,
    cancel_requested: task.cancel_requested,
    summary: task.summary,
    warnings: task.warnings,
    notes: task.notes,
    created_at: task.created_at,
    updated_at: task.updated_at,
    completed_at: task.completed_at,
  };
}

function describeJob(job: FetchJob) {
  return {
    job_id: job.id,
    target_url: job.target_url,
    domain: job.domain,
    state: job.state,
    strategy_index: job.strategy_index,
    total_attempts: job.total_attempts,
    last_failure: job.last_failure,
    abandon_reason: job.abandon_reason,
    delivery_status: job.delivery_status,
    citation_id: job.citation_id,
    updated_at: job.updated_at,
  };
}

export async function buildServer(deps: ServerDeps): Promise<FastifyInstance> {
  const { scheduler, inference } = deps;
  const app = Fastify({
    logger: {
      level: deps.logLevel ?? process.env.LOG_LEVEL ?? "info",
    },
  });
  await app.register(sensible);

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof ZodError) {
      return reply.code(400).send({
        statusCode: 400,
        error: "Bad Request",
        message: "invalid request",
        issues: error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message })),
      });
    }
    if (error instanceof InvalidTaskError) {
      return reply.code(400).send({ statusCode: 400, error: "Bad Request", message: error.message });
    }
    const statusCode = error.statusCode && error.statusCode >= 400 ? error.statusCode : 500;
    if (statusCode >= 500) {
      request.log.error({ err: error }, "Request failed");
    }
    return reply.code(statusCode).send({
      statusCode,
      error: STATUS_CODES[statusCode] ?? "Error",
      message: statusCode >= 500 && !error.statusCode ? "Internal Server Error" : error.message,
    });
  });

  app.addHook("onRequest", async (request) => {
    if (OPEN_ROUTES.some((route) => request.url.startsWith(route))) {
      return;
    }
    if (request.headers["x-api-key"] !== deps.apiKey) {
      throw app.httpErrors.unauthorized("invalid api key");
    }
  });

  app.get("/healthz", async () => ({
    status: "ok",
    workers: scheduler.activeWorkers,
    strategies: scheduler.strategies().map((strategy) => strategy.kind),
  }));
  app.get("/metrics", async (_, reply) => {
    reply.header("content-type", metricsRegistry.contentType);
    return metricsRegistry.metrics();
  });

  app.post("/research", async (request, reply) => {
    const body = createSchema.parse(request.body ?? {});
    const seconds = body.options?.task_timeout_seconds;
    const task = await scheduler.submit(body.query, body.target_urls, {
      taskTimeoutMs: seconds !== undefined ? seconds * 1000 : undefined,
    });
    reply.code(201);
    return { task_id: task.id, status: task.status, warnings: task.warnings };
  });

  app.get("/research", async (request) => {
    const query = listQuerySchema.parse(request.query ?? {});
    const tasks = await scheduler.listRecent(query.limit ?? 20);
    return { tasks: tasks.map(describeTask) };
  });

  app.get("/research/:id", async (request) => {
    const params = idParamSchema.parse(request.params);
    const snapshot = await scheduler.getStatus(params.id);
    if (!snapshot) {
      throw app.httpErrors.notFound("task not found");
    }
    return { ...describeTask(snapshot.task), jobs: snapshot.jobs.map(describeJob) };
  });

  app.patch("/research/:id", async (request) => {
    const params = idParamSchema.parse(request.params);
    const body = updateSchema.parse(request.body ?? {});
    const task = await scheduler.update(params.id, body);
    if (!task) {
      throw app.httpErrors.notFound("task not found");
    }
    return describeTask(task);
  });

  app.get("/research/:id/jobs/:jobId/attempts", async (request) => {
    const params = attemptsParamSchema.parse(request.params);
    const snapshot = await scheduler.getStatus(params.id);
    if (!snapshot || !snapshot.jobs.some((job) => job.id === params.jobId)) {
      throw app.httpErrors.notFound("job not found");
    }
    const attempts = await scheduler.listAttempts(params.jobId);
    return { job_id: params.jobId, attempts };
  });

  app.post("/research/:id/cancel", async (request) => {
    const params = idParamSchema.parse(request.params);
    const task = await scheduler.cancel(params.id);
    if (!task) {
      throw app.httpErrors.notFound("task not found");
    }
    if (!task.cancel_requested) {
      throw app.httpErrors.badRequest(`Task already ${task.status}`);
    }
    return { task_id: task.id, status: task.status, cancel_requested: true };
  });

  app.get("/domains/:domain/budget", async (request) => {
    const params = domainParamSchema.parse(request.params);
    const budget = scheduler.domainBudget(params.domain);
    if (!budget) {
      throw app.httpErrors.notFound("no requests made to this domain yet");
    }
    return budget;
  });

  app.post("/analyze", async (request) => {
    const body = analyzeSchema.parse(request.body ?? {});
    try {
      return { analysis: await inference.analyze(body.content) };
    } catch (error) {
      if (error instanceof InferenceError) {
        request.log.warn({ err: error }, "Content analysis unavailable");
        throw app.httpErrors.badGateway("inference collaborator unavailable");
      }
      throw error;
    }
  });

  return app;
}
