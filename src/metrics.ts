import { Counter, Histogram, Registry, collectDefaultMetrics } from "prom-client";

export const metricsRegistry = new Registry();
collectDefaultMetrics({ register: metricsRegistry });

export const taskStatusCounter = new Counter({
  name: "research_fetch_tasks_total",
  help: "Research tasks by lifecycle event",
  labelNames: ["status"],
  registers: [metricsRegistry],
});

export const taskDurationHistogram = new Histogram({
  name: "research_fetch_task_duration_seconds",
  help: "Wall-clock time from task submission to its final status",
  buckets: [5, 15, 30, 60, 120, 300, 600, 1200],
  labelNames: ["status"],
  registers: [metricsRegistry],
});

export const fetchAttemptCounter = new Counter({
  name: "research_fetch_attempts_total",
  help: "Fetch attempts by strategy and classifier verdict",
  labelNames: ["strategy", "verdict"],
  registers: [metricsRegistry],
});

export const fetchLatencyHistogram = new Histogram({
  name: "research_fetch_attempt_duration_seconds",
  help: "Duration of a single fetch attempt",
  buckets: [0.25, 0.5, 1, 2, 5, 10, 20, 40],
  labelNames: ["strategy"],
  registers: [metricsRegistry],
});

export const escalationCounter = new Counter({
  name: "research_fetch_escalations_total",
  help: "Strategy escalations by source and destination strategy",
  labelNames: ["from", "to"],
  registers: [metricsRegistry],
});

export const jobAbandonCounter = new Counter({
  name: "research_fetch_jobs_abandoned_total",
  help: "Fetch jobs abandoned, by reason",
  labelNames: ["reason"],
  registers: [metricsRegistry],
});

export const rateLimitDeferralCounter = new Counter({
  name: "research_fetch_rate_limit_deferrals_total",
  help: "Attempts deferred because the domain budget was exhausted",
  registers: [metricsRegistry],
});

export const validationCounter = new Counter({
  name: "research_fetch_validations_total",
  help: "Content validation decisions",
  labelNames: ["decision"],
  registers: [metricsRegistry],
});

export const deliveryCounter = new Counter({
  name: "research_fetch_deliveries_total",
  help: "Delivery outcomes towards the citation collaborator",
  labelNames: ["status"],
  registers: [metricsRegistry],
});

export const collaboratorLatencyHistogram = new Histogram({
  name: "research_fetch_collaborator_latency_seconds",
  help: "Latency for calls to external collaborators",
  buckets: [0.1, 0.5, 1, 2, 5, 10, 30, 60],
  labelNames: ["collaborator"],
  registers: [metricsRegistry],
});

export const collaboratorErrorCounter = new Counter({
  name: "research_fetch_collaborator_errors_total",
  help: "External collaborator failures by collaborator and stage",
  labelNames: ["collaborator", "stage"],
  registers: [metricsRegistry],
});

export function startCollaboratorTimer(collaborator: string) {
  return collaboratorLatencyHistogram.startTimer({ collaborator });
}

export function recordCollaboratorError(collaborator: string, stage: string) {
  collaboratorErrorCounter.labels(collaborator, stage).inc();
}
