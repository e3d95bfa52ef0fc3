import { InvalidTaskError, describeError } from "../errors";
import { jobLogger, logger } from "../logger";
import { fetchAttemptCounter, rateLimitDeferralCounter, taskDurationHistogram, taskStatusCounter } from "../metrics";
import type { ResearchRepository, TaskPatch } from "../repositories/types";
import {
  AttemptOutcome,
  AttemptOutcomeSummary,
  FetchAttemptRecord,
  FetchJob,
  JobState,
  ResearchTask,
  ResponseOutcome,
  StrategyKind,
  TERMINAL_TASK_STATUSES,
  TaskStatus,
  TaskSummary,
  ValidatedContent,
  isTerminalJob,
} from "../types/research";
import { extractTitle, looksLikeHtml } from "../utils/html";
import { Clock, systemClock, toIso } from "../utils/time";
import { domainOf, normalizeTargetUrl } from "../utils/url";
import type { ContentValidator } from "./contentValidator";
import type { DeliveryService } from "./deliveryService";
import type { EscalationController } from "./escalationController";
import type { FailureClassifier } from "./failureClassifier";
import type { FetchExecutor } from "./fetchExecutor";
import { isRecoverable } from "./jobStateMachine";
import { PayloadArchive, archiveKey } from "./payloadArchive";
import type { DomainRateLimiter } from "./rateLimiter";
import type { StrategyRegistry } from "./strategies";

export interface SchedulerOptions {
  maxWorkers: number;
  taskTimeoutMs: number;
  attemptTimeoutMs: number;
  maxCrossReferences: number;
}

export interface SchedulerDeps {
  repository: ResearchRepository;
  limiter: DomainRateLimiter;
  registry: StrategyRegistry;
  executor: FetchExecutor;
  classifier: FailureClassifier;
  controller: EscalationController;
  validator: ContentValidator;
  delivery: DeliveryService;
  archive?: PayloadArchive | null;
  options: SchedulerOptions;
  onTaskUpdate?: (task: ResearchTask) => unknown;
  now?: Clock;
}

export interface SubmitOptions {
  taskTimeoutMs?: number;
}

export interface TaskUpdate {
  cancel?: boolean;
  note?: string;
}

export interface TaskSnapshot {
  task: ResearchTask;
  jobs: FetchJob[];
}

type StopReason = "cancelled" | "task_timeout";

const CROSS_REFERENCE_CHARS = 500;
const MAX_TIMER_MS = 2_147_483_647;

/** States in which a job still needs fetch attempts. */
const FETCH_PHASE: ReadonlySet<JobState> = new Set<JobState>(["pending", "in_flight", "failed", "escalated"]);

class Deferred<T> {
  readonly promise: Promise<T>;
  private settle: (value: T) => void = () => undefined;

  constructor() {
    this.promise = new Promise<T>((resolve) => {
      this.settle = resolve;
    });
  }

  resolve(value: T) {
    this.settle(value);
  }
}

interface TaskRuntime {
  taskId: string;
  status: TaskStatus;
  stopReason: StopReason | null;
  deadlineTimer: NodeJS.Timeout | null;
  settled: Deferred<ResearchTask>;
  finalizing: boolean;
  createdAt: number;
}

interface QueuedJob {
  jobId: string;
  taskId: string;
  eligibleAt: number;
  seq: number;
}

function summarizeOutcome(outcome: AttemptOutcome): AttemptOutcomeSummary {
  if (outcome.type !== "response") {
    return outcome;
  }
  return {
    type: "response",
    status: outcome.status,
    final_url: outcome.final_url,
    content_type: outcome.content_type,
    body_length: outcome.body.length,
  };
}

/**
 * Task intake and the bounded worker pool. A worker runs one attempt step for
 * one job and is released; rate-limit deferrals and backoff waits are timers,
 * and validation and delivery run outside the pool. Each task has a join
 * barrier that resolves once every job is terminal and no delivery is pending.
 */
export class Scheduler {
  private readonly now: Clock;
  private readonly tasks = new Map<string, TaskRuntime>();
  private readonly queue = new Map<string, QueuedJob>();
  private readonly busy = new Set<string>();
  private readonly inflight = new Set<Promise<void>>();
  private readonly redeliveryTimers = new Set<NodeJS.Timeout>();
  private running = 0;
  private seq = 0;
  private wakeTimer: NodeJS.Timeout | null = null;
  private wakeAt = Number.POSITIVE_INFINITY;
  private stopped = false;

  constructor(private readonly deps: SchedulerDeps) {
    this.now = deps.now ?? systemClock;
  }

  get activeWorkers() {
    return this.running;
  }

  strategies() {
    return this.deps.registry.describe();
  }

  domainBudget(domain: string) {
    return this.deps.limiter.snapshot(domain);
  }

  async submit(query: string, targetUrls: string[], options: SubmitOptions = {}): Promise<ResearchTask> {
    const trimmed = query.trim();
    if (!trimmed) {
      throw new InvalidTaskError("query must not be empty");
    }
    const urls: string[] = [];
    const invalid: string[] = [];
    for (const raw of targetUrls) {
      const url = normalizeTargetUrl(raw);
      if (!url) {
        invalid.push(raw);
      } else if (!urls.includes(url)) {
        urls.push(url);
      }
    }
    if (!urls.length) {
      throw new InvalidTaskError("no valid target URLs", { invalid });
    }

    const timeoutMs = options.taskTimeoutMs ?? this.deps.options.taskTimeoutMs;
    const task = await this.deps.repository.createTask({
      query: trimmed,
      targetUrls: urls,
      deadlineAt: toIso(this.now() + timeoutMs),
    });
    taskStatusCounter.labels(task.status).inc();
    const runtime = this.ensureRuntime(task);
    logger.info({ taskId: task.id, targets: urls.length, invalid: invalid.length }, "Research task accepted");

    const warnings = invalid.length ? [`${invalid.length} target URL(s) ignored as invalid`] : [];
    return this.plan(runtime, warnings);
  }

  async getStatus(taskId: string): Promise<TaskSnapshot | null> {
    const task = await this.deps.repository.getTask(taskId);
    if (!task) {
      return null;
    }
    const jobs = await this.deps.repository.listJobs(taskId);
    return { task, jobs };
  }

  async listRecent(limit = 20) {
    return this.deps.repository.listRecentTasks(limit);
  }

  async listAttempts(jobId: string): Promise<FetchAttemptRecord[]> {
    return this.deps.repository.listAttempts(jobId);
  }

  /** Stops admitting attempts for the task. In-flight attempts are left to resolve. */
  async cancel(taskId: string): Promise<ResearchTask | null> {
    const task = await this.deps.repository.getTask(taskId);
    if (!task) {
      return null;
    }
    if (TERMINAL_TASK_STATUSES.has(task.status)) {
      return task;
    }
    const updated = await this.deps.repository.updateTask(taskId, { cancel_requested: true });
    this.ensureRuntime(updated);
    logger.info({ taskId }, "Task cancellation requested");
    this.stopTask(taskId, "cancelled");
    return updated;
  }

  async update(taskId: string, change: TaskUpdate): Promise<ResearchTask | null> {
    let task = await this.deps.repository.getTask(taskId);
    if (!task) {
      return null;
    }
    if (change.cancel && !task.cancel_requested) {
      if (TERMINAL_TASK_STATUSES.has(task.status)) {
        throw new InvalidTaskError(`Task already ${task.status}`);
      }
      task = (await this.cancel(taskId)) ?? task;
    }
    const note = change.note?.trim();
    if (note) {
      task = await this.deps.repository.updateTask(taskId, { notes: [...task.notes, note] });
      logger.info({ taskId, notes: task.notes.length }, "Task annotated");
      this.notify(task);
    }
    return task;
  }

  /** Join barrier: resolves with the final task once it completes or fails. */
  async whenSettled(taskId: string): Promise<ResearchTask | null> {
    const runtime = this.tasks.get(taskId);
    if (runtime) {
      return runtime.settled.promise;
    }
    const task = await this.deps.repository.getTask(taskId);
    if (!task || TERMINAL_TASK_STATUSES.has(task.status)) {
      return task;
    }
    return this.ensureRuntime(task).settled.promise;
  }

  /** Resumes tasks left unfinished by a previous process. */
  async start() {
    this.stopped = false;
    await this.deps.delivery.releaseOwnLeases();
    const tasks = await this.deps.repository.listActiveTasks();
    for (const task of tasks) {
      const runtime = this.ensureRuntime(task);
      if (task.cancel_requested) {
        runtime.stopReason = "cancelled";
      }
      let jobs = await this.deps.repository.listJobs(task.id);
      if (!jobs.length) {
        await this.plan(runtime, task.warnings);
        continue;
      }
      jobs = await Promise.all(jobs.map((job) => this.recover(job)));
      for (const job of jobs) {
        if (job.state === "pending") {
          this.enqueue(job, job.next_eligible_at ? Date.parse(job.next_eligible_at) : this.now());
        } else if (job.state === "validated" && job.delivery_status === "pending") {
          this.spawn(this.redeliver(job.id));
        }
      }
      const deadline = task.deadline_at ? Date.parse(task.deadline_at) : null;
      if (runtime.stopReason) {
        this.stopTask(task.id, runtime.stopReason);
      } else if (deadline !== null && deadline <= this.now()) {
        this.stopTask(task.id, "task_timeout");
      }
      this.spawn(this.checkTask(task.id));
      logger.info({ taskId: task.id, jobs: jobs.length }, "Resumed research task");
    }
    this.pump();
  }

  async stop() {
    this.stopped = true;
    if (this.wakeTimer) {
      clearTimeout(this.wakeTimer);
      this.wakeTimer = null;
    }
    for (const timer of this.redeliveryTimers) {
      clearTimeout(timer);
    }
    this.redeliveryTimers.clear();
    for (const runtime of this.tasks.values()) {
      if (runtime.deadlineTimer) {
        clearTimeout(runtime.deadlineTimer);
        runtime.deadlineTimer = null;
      }
    }
    while (this.inflight.size) {
      await Promise.allSettled([...this.inflight]);
    }
  }

  private async plan(runtime: TaskRuntime, warnings: string[]): Promise<ResearchTask> {
    const { repository } = this.deps;
    await this.setStatus(runtime, "planning");
    const task = await repository.getTask(runtime.taskId);
    if (!task) {
      throw new Error(`Task ${runtime.taskId} disappeared during planning`);
    }
    const jobs = await repository.createJobs(
      task.id,
      task.target_urls.map((url) => ({ url, domain: domainOf(url) })),
      null,
    );
    const updated = await this.setStatus(runtime, "fetching", { warnings });
    const now = this.now();
    for (const job of jobs) {
      this.enqueue(job, now);
    }
    this.pump();
    return updated;
  }

  private async recover(job: FetchJob): Promise<FetchJob> {
    if (!isRecoverable(job.state)) {
      return job;
    }
    const { repository, controller } = this.deps;
    if (job.state === "succeeded" || job.state === "validating") {
      // A stored decision is final; only the job row missed it.
      const stored = await repository.getValidatedContent(job.id);
      if (stored) {
        const validating = job.state === "validating" ? job : controller.startValidation(job);
        const finished = controller.finishValidation(validating, stored.decision === "accepted");
        await repository.saveJob(finished);
        jobLogger(job).info({ decision: stored.decision }, "Recovered stored validation decision");
        return finished;
      }
    }
    const recovered = controller.recover(job);
    await repository.saveJob(recovered);
    jobLogger(job).info({ from: job.state, strategyIndex: job.strategy_index }, "Recovered job to pending");
    return recovered;
  }

  private ensureRuntime(task: ResearchTask): TaskRuntime {
    const existing = this.tasks.get(task.id);
    if (existing) {
      return existing;
    }
    const runtime: TaskRuntime = {
      taskId: task.id,
      status: task.status,
      stopReason: null,
      deadlineTimer: null,
      settled: new Deferred<ResearchTask>(),
      finalizing: false,
      createdAt: Date.parse(task.created_at),
    };
    this.tasks.set(task.id, runtime);
    if (task.deadline_at) {
      const delay = Math.min(MAX_TIMER_MS, Math.max(0, Date.parse(task.deadline_at) - this.now()));
      runtime.deadlineTimer = setTimeout(() => {
        runtime.deadlineTimer = null;
        this.stopTask(task.id, "task_timeout");
      }, delay);
      runtime.deadlineTimer.unref();
    }
    return runtime;
  }

  private async setStatus(runtime: TaskRuntime, status: TaskStatus, patch: TaskPatch = {}) {
    runtime.status = status;
    const task = await this.deps.repository.updateTask(runtime.taskId, { ...patch, status });
    taskStatusCounter.labels(status).inc();
    this.notify(task);
    return task;
  }

  private notify(task: ResearchTask) {
    const { onTaskUpdate } = this.deps;
    if (!onTaskUpdate) {
      return;
    }
    Promise.resolve()
      .then(() => onTaskUpdate(task))
      .catch((error: unknown) => {
        logger.warn({ error, taskId: task.id }, "Task update listener failed");
      });
  }

  private stopTask(taskId: string, reason: StopReason) {
    const runtime = this.tasks.get(taskId);
    if (!runtime) {
      return;
    }
    if (!runtime.stopReason) {
      runtime.stopReason = reason;
      logger.info({ taskId, reason }, "Stopping task; remaining pending jobs abandoned");
    }
    if (runtime.deadlineTimer) {
      clearTimeout(runtime.deadlineTimer);
      runtime.deadlineTimer = null;
    }
    for (const entry of [...this.queue.values()]) {
      if (entry.taskId === taskId) {
        this.queue.delete(entry.jobId);
        this.spawn(this.abandonQueued(entry, runtime.stopReason));
      }
    }
  }

  private async abandonQueued(entry: QueuedJob, reason: StopReason) {
    this.busy.add(entry.jobId);
    try {
      const job = await this.deps.repository.getJob(entry.jobId);
      if (job?.state === "pending") {
        await this.deps.repository.saveJob(this.deps.controller.abandon(job, reason));
      }
    } catch (error) {
      await this.failSafely(entry.jobId, error);
    } finally {
      this.busy.delete(entry.jobId);
      await this.checkTask(entry.taskId);
    }
  }

  private enqueue(job: FetchJob, eligibleAt: number) {
    const runtime = this.tasks.get(job.task_id);
    if (runtime?.stopReason) {
      this.spawn(this.abandonQueued({ jobId: job.id, taskId: job.task_id, eligibleAt, seq: 0 }, runtime.stopReason));
      return;
    }
    this.queue.set(job.id, { jobId: job.id, taskId: job.task_id, eligibleAt, seq: this.seq++ });
  }

  private spawn(work: Promise<void>) {
    const tracked = work.catch((error: unknown) => {
      logger.error({ error }, "Scheduler task failed");
    });
    this.inflight.add(tracked);
    void tracked.finally(() => this.inflight.delete(tracked));
  }

  private pump() {
    if (this.stopped) {
      return;
    }
    const now = this.now();
    const ready = [...this.queue.values()]
      .filter((entry) => entry.eligibleAt <= now && !this.busy.has(entry.jobId))
      .sort((a, b) => a.eligibleAt - b.eligibleAt || a.seq - b.seq);
    for (const entry of ready) {
      if (this.running >= this.deps.options.maxWorkers) {
        break;
      }
      this.queue.delete(entry.jobId);
      this.running += 1;
      this.busy.add(entry.jobId);
      this.spawn(this.runJobStep(entry));
    }
    this.armWake(now);
  }

  private armWake(now: number) {
    let next = Number.POSITIVE_INFINITY;
    for (const entry of this.queue.values()) {
      if (entry.eligibleAt > now && entry.eligibleAt < next) {
        next = entry.eligibleAt;
      }
    }
    if (next === this.wakeAt && this.wakeTimer) {
      return;
    }
    if (this.wakeTimer) {
      clearTimeout(this.wakeTimer);
      this.wakeTimer = null;
    }
    this.wakeAt = next;
    if (next === Number.POSITIVE_INFINITY) {
      return;
    }
    this.wakeTimer = setTimeout(() => {
      this.wakeTimer = null;
      this.wakeAt = Number.POSITIVE_INFINITY;
      this.pump();
    }, Math.min(MAX_TIMER_MS, next - now));
    this.wakeTimer.unref();
  }

  /** One rate-limit acquisition and at most one fetch attempt for one job. */
  private async runJobStep(entry: QueuedJob) {
    const { repository, controller, limiter, registry, executor, classifier } = this.deps;
    let validation: (() => Promise<void>) | null = null;
    try {
      let job = await repository.getJob(entry.jobId);
      if (!job || job.state !== "pending") {
        return;
      }
      const runtime = this.tasks.get(job.task_id);
      if (runtime?.stopReason) {
        await repository.saveJob(controller.abandon(job, runtime.stopReason));
        return;
      }

      const decision = limiter.acquire(job.domain);
      if (!decision.granted) {
        rateLimitDeferralCounter.inc();
        job = controller.defer(job, decision.waitUntil);
        await repository.saveJob(job);
        this.enqueue(job, decision.waitUntil);
        return;
      }

      const strategy = registry.at(job.strategy_index);
      job = controller.begin(job);
      await repository.saveJob(job);
      const log = jobLogger(job).child({ strategy: strategy.kind });

      const attempt = await executor.fetch({
        jobId: job.id,
        url: job.target_url,
        strategy,
        strategyIndex: job.strategy_index,
        grant: decision.grant,
        timeoutMs: job.attempt_timeout_ms ?? this.deps.options.attemptTimeoutMs,
      });
      const classification = classifier.classify(attempt);
      fetchAttemptCounter.labels(strategy.kind, classification.verdict).inc();

      const response = attempt.outcome.type === "response" ? attempt.outcome : null;
      await repository.insertAttempt({
        job_id: job.id,
        attempt_number: job.total_attempts,
        strategy: attempt.strategy,
        strategy_index: attempt.strategy_index,
        started_at: attempt.started_at,
        ended_at: attempt.ended_at,
        outcome: summarizeOutcome(attempt.outcome),
        verdict: classification.verdict,
        rule: classification.rule,
        raw_storage_url: response ? await this.archive(job, response) : null,
      });
      log.info(
        { attempt: job.total_attempts, verdict: classification.verdict, rule: classification.rule },
        "Fetch attempt classified",
      );

      const stopReason = this.tasks.get(job.task_id)?.stopReason ?? null;
      if (classification.verdict === "success" && response) {
        job = controller.succeed(job);
        if (stopReason) {
          await repository.saveJob(controller.abandon(job, stopReason));
          return;
        }
        await repository.saveJob(job);
        const succeeded = job;
        validation = () => this.validateJob(succeeded, response, attempt.ended_at, attempt.strategy);
        return;
      }

      const history = await repository.listAttempts(job.id);
      const result = await controller.fail(job, classification, history, this.deps.options.attemptTimeoutMs);
      job = result.job;
      if (job.state === "pending" && stopReason) {
        job = controller.abandon(job, stopReason);
      }
      await repository.saveJob(job);
      log.info({ decision: result.decision }, "Failure handled");
      if (job.state === "pending") {
        this.enqueue(job, job.next_eligible_at ? Date.parse(job.next_eligible_at) : this.now());
      }
    } catch (error) {
      await this.failSafely(entry.jobId, error);
    } finally {
      this.running -= 1;
      if (validation) {
        this.spawn(validation());
      } else {
        this.busy.delete(entry.jobId);
        this.spawn(this.checkTask(entry.taskId));
      }
      this.pump();
    }
  }

  private async archive(job: FetchJob, response: ResponseOutcome): Promise<string | null> {
    const { archive } = this.deps;
    if (!archive) {
      return null;
    }
    try {
      return await archive.put(archiveKey(job.task_id, job.id, job.total_attempts), response.body, response.content_type);
    } catch (error) {
      jobLogger(job).warn({ error: describeError(error) }, "Raw payload archive failed");
      return null;
    }
  }

  private async validateJob(job: FetchJob, response: ResponseOutcome, fetchedAt: string, strategy: StrategyKind) {
    const { repository, controller, validator } = this.deps;
    try {
      let current = controller.startValidation(job);
      await repository.saveJob(current);

      const accepted = await repository.listAcceptedContents(job.task_id);
      const crossReferences = accepted
        .filter((content) => content.job_id !== job.id)
        .slice(-this.deps.options.maxCrossReferences)
        .map((content) => content.text.slice(0, CROSS_REFERENCE_CHARS));

      const validated = await validator.validate(
        { contentType: response.content_type, body: response.body },
        {
          url: job.target_url,
          final_url: response.final_url,
          title: looksLikeHtml(response.content_type, response.body) ? extractTitle(response.body) : null,
          fetched_at: fetchedAt,
          strategy,
        },
        { jobId: job.id, taskId: job.task_id, crossReferences },
      );
      const content = await repository.saveValidatedContent(validated);
      current = controller.finishValidation(current, content.decision === "accepted");
      await repository.saveJob(current);
      jobLogger(job).info(
        { decision: content.decision, confidence: content.confidence, reason: content.rejection_reason },
        "Content validated",
      );

      if (content.decision === "accepted") {
        await this.deliverJob(current, content);
      }
    } catch (error) {
      await this.failSafely(job.id, error);
    } finally {
      this.busy.delete(job.id);
      await this.checkTask(job.task_id);
    }
  }

  private async deliverJob(job: FetchJob, content: ValidatedContent) {
    const { repository, controller, delivery } = this.deps;
    try {
      const ack = await delivery.deliver(job.id, content);
      if (ack.status === "in_flight") {
        this.scheduleRedelivery(job, Date.parse(ack.retry_at));
        return;
      }
      await repository.saveJob(controller.recordDelivery(job, "delivered", ack.citation_id));
    } catch (error) {
      jobLogger(job).error({ error: describeError(error) }, "Delivery failed; result kept but not cited");
      await repository.saveJob(controller.recordDelivery(job, "failed"));
    }
  }

  private scheduleRedelivery(job: FetchJob, retryAt: number) {
    if (this.stopped) {
      return;
    }
    const timer = setTimeout(
      () => {
        this.redeliveryTimers.delete(timer);
        this.spawn(this.redeliver(job.id));
      },
      Math.min(MAX_TIMER_MS, Math.max(0, retryAt - this.now())),
    );
    timer.unref();
    this.redeliveryTimers.add(timer);
  }

  private async redeliver(jobId: string) {
    const { repository } = this.deps;
    this.busy.add(jobId);
    let taskId: string | null = null;
    try {
      const job = await repository.getJob(jobId);
      if (!job) {
        return;
      }
      taskId = job.task_id;
      const content = await repository.getValidatedContent(jobId);
      if (job.state !== "validated" || job.delivery_status !== "pending" || !content) {
        return;
      }
      await this.deliverJob(job, content);
    } finally {
      this.busy.delete(jobId);
      if (taskId) {
        await this.checkTask(taskId);
      }
    }
  }

  private async failSafely(jobId: string, error: unknown) {
    logger.error({ error, jobId }, "Job step failed unexpectedly");
    try {
      const job = await this.deps.repository.getJob(jobId);
      if (job && !isTerminalJob(job)) {
        await this.deps.repository.saveJob(this.deps.controller.abort(job, "internal_error"));
      }
    } catch (inner) {
      logger.error({ error: inner, jobId }, "Could not abandon job after failure");
    }
  }

  private async checkTask(taskId: string) {
    const runtime = this.tasks.get(taskId);
    if (!runtime || runtime.finalizing) {
      return;
    }
    const jobs = await this.deps.repository.listJobs(taskId);
    if (runtime.finalizing) {
      return;
    }
    const open = jobs.some(
      (job) => !isTerminalJob(job) || job.delivery_status === "pending" || this.busy.has(job.id),
    );
    if (open) {
      if (runtime.status === "fetching" && jobs.every((job) => !FETCH_PHASE.has(job.state))) {
        await this.setStatus(runtime, "validating");
      }
      return;
    }
    runtime.finalizing = true;
    await this.finalize(runtime, jobs);
  }

  private async finalize(runtime: TaskRuntime, jobs: FetchJob[]) {
    const { repository } = this.deps;
    const task = await repository.getTask(runtime.taskId);
    if (!task) {
      this.tasks.delete(runtime.taskId);
      return;
    }
    const total = jobs.length;
    const usable = jobs.filter((job) => job.state === "validated").length;
    const rejected = jobs.filter((job) => job.state === "rejected").length;
    const unreachable = jobs.filter((job) => job.state === "abandoned").length;
    const undelivered = jobs.filter((job) => job.state === "validated" && job.delivery_status === "failed").length;

    const summary: TaskSummary = {
      total_targets: total,
      usable,
      unreachable,
      rejected,
      undelivered,
      message: `${usable} of ${total} targets usable`,
    };
    const warnings = [...task.warnings];
    if (usable < total) {
      warnings.push(summary.message);
    }
    if (unreachable) {
      warnings.push(`${unreachable} target(s) unreachable`);
    }
    if (rejected) {
      warnings.push(`${rejected} target(s) rejected by validation`);
    }
    if (undelivered) {
      warnings.push(`partial delivery: ${undelivered} validated result(s) not delivered`);
    }
    if (runtime.stopReason === "cancelled") {
      warnings.push("task cancelled before all targets were fetched");
    } else if (runtime.stopReason === "task_timeout") {
      warnings.push("task deadline reached before all targets were fetched");
    }

    const status: TaskStatus = usable > 0 ? "complete" : "failed";
    const final = await this.setStatus(runtime, status, {
      summary,
      warnings,
      completed_at: toIso(this.now()),
    });
    taskDurationHistogram.labels(status).observe(Math.max(0, this.now() - runtime.createdAt) / 1000);
    if (runtime.deadlineTimer) {
      clearTimeout(runtime.deadlineTimer);
      runtime.deadlineTimer = null;
    }
    this.tasks.delete(runtime.taskId);
    logger.info({ taskId: runtime.taskId, status, summary }, "Research task settled");
    runtime.settled.resolve(final);
  }
}
