import { randomUUID } from "node:crypto";
import type {
  CitationLedgerRecord,
  DeliveryRecord,
  FetchAttemptRecord,
  FetchJob,
  ResearchTask,
  ValidatedContent,
} from "../../types/research";
import { TERMINAL_TASK_STATUSES } from "../../types/research";
import { Clock, systemClock, toIso } from "../../utils/time";
import type {
  ClaimInput,
  ClaimResult,
  CitationLedgerRepository,
  CreateTaskInput,
  DeliveryRepository,
  JobTarget,
  LedgerEntryInput,
  Repositories,
  ResearchRepository,
  TaskPatch,
} from "../types";

const copy = <T>(value: T): T => structuredClone(value);

/** Process-local store for tests and `STORE_DRIVER=memory`. */
export class MemoryResearchRepository implements ResearchRepository {
  private readonly tasks = new Map<string, ResearchTask>();
  private readonly jobs = new Map<string, FetchJob>();
  private readonly attempts = new Map<string, FetchAttemptRecord[]>();
  private readonly contents = new Map<string, ValidatedContent>();

  constructor(private readonly now: Clock = systemClock) {}

  async createTask(input: CreateTaskInput): Promise<ResearchTask> {
    const now = toIso(this.now());
    const task: ResearchTask = {
      id: randomUUID(),
      query: input.query,
      status: "pending",
      target_urls: [...input.targetUrls],
      cancel_requested: false,
      deadline_at: input.deadlineAt,
      summary: null,
      warnings: [],
      notes: [],
      created_at: now,
      updated_at: now,
      completed_at: null,
    };
    this.tasks.set(task.id, task);
    return copy(task);
  }

  async getTask(taskId: string) {
    const task = this.tasks.get(taskId);
    return task ? copy(task) : null;
  }

  async updateTask(taskId: string, patch: TaskPatch): Promise<ResearchTask> {
    const task = this.tasks.get(taskId);
    if (!task) {
      throw new Error(`Task ${taskId} not found`);
    }
    const updated: ResearchTask = { ...task, ...copy(patch), updated_at: toIso(this.now()) };
    this.tasks.set(taskId, updated);
    return copy(updated);
  }

  async listRecentTasks(limit: number) {
    return [...this.tasks.values()]
      .sort((a, b) => b.created_at.localeCompare(a.created_at))
      .slice(0, limit)
      .map(copy);
  }

  async listActiveTasks() {
    return [...this.tasks.values()]
      .filter((task) => !TERMINAL_TASK_STATUSES.has(task.status))
      .sort((a, b) => a.created_at.localeCompare(b.created_at))
      .map(copy);
  }

  async createJobs(taskId: string, targets: JobTarget[], attemptTimeoutMs: number | null): Promise<FetchJob[]> {
    const now = toIso(this.now());
    return targets.map((target) => {
      const job: FetchJob = {
        id: randomUUID(),
        task_id: taskId,
        target_url: target.url,
        domain: target.domain,
        strategy_index: 0,
        attempt_count: 0,
        total_attempts: 0,
        state: "pending",
        last_failure: null,
        next_eligible_at: null,
        attempt_timeout_ms: attemptTimeoutMs,
        abandon_reason: null,
        delivery_status: "not_applicable",
        citation_id: null,
        created_at: now,
        updated_at: now,
      };
      this.jobs.set(job.id, job);
      return copy(job);
    });
  }

  async getJob(jobId: string) {
    const job = this.jobs.get(jobId);
    return job ? copy(job) : null;
  }

  async listJobs(taskId: string) {
    return [...this.jobs.values()].filter((job) => job.task_id === taskId).map(copy);
  }

  async saveJob(job: FetchJob) {
    if (!this.jobs.has(job.id)) {
      throw new Error(`Job ${job.id} not found`);
    }
    this.jobs.set(job.id, copy(job));
  }

  async insertAttempt(attempt: Omit<FetchAttemptRecord, "id">): Promise<FetchAttemptRecord> {
    const record: FetchAttemptRecord = { id: randomUUID(), ...copy(attempt) };
    const list = this.attempts.get(attempt.job_id) ?? [];
    list.push(record);
    this.attempts.set(attempt.job_id, list);
    return copy(record);
  }

  async listAttempts(jobId: string) {
    return (this.attempts.get(jobId) ?? [])
      .slice()
      .sort((a, b) => a.attempt_number - b.attempt_number)
      .map(copy);
  }

  async saveValidatedContent(content: ValidatedContent) {
    const stored = this.contents.get(content.job_id) ?? copy(content);
    this.contents.set(content.job_id, stored);
    return copy(stored);
  }

  async getValidatedContent(jobId: string) {
    const content = this.contents.get(jobId);
    return content ? copy(content) : null;
  }

  async listAcceptedContents(taskId: string) {
    return [...this.contents.values()]
      .filter((content) => content.task_id === taskId && content.decision === "accepted")
      .sort((a, b) => a.created_at.localeCompare(b.created_at))
      .map(copy);
  }
}

export class MemoryDeliveryRepository implements DeliveryRepository {
  private readonly records = new Map<string, DeliveryRecord>();

  constructor(private readonly now: Clock = systemClock) {}

  async claim(input: ClaimInput): Promise<ClaimResult> {
    const existing = this.records.get(input.jobId);
    if (existing?.status === "delivered") {
      return { outcome: "delivered", record: copy(existing) };
    }
    if (existing && existing.status !== "failed" && existing.lease_expires_at > input.now) {
      return { outcome: "held", record: copy(existing) };
    }
    const record: DeliveryRecord = {
      job_id: input.jobId,
      status: "pending",
      owner_id: input.ownerId,
      lease_token: input.leaseToken,
      lease_expires_at: input.leaseExpiresAt,
      citation_id: existing?.citation_id ?? null,
      attempts: existing?.attempts ?? 0,
      last_error: existing?.last_error ?? null,
      created_at: existing?.created_at ?? input.now,
      updated_at: input.now,
    };
    this.records.set(input.jobId, record);
    return { outcome: "claimed", record: copy(record) };
  }

  async releaseLeases(ownerId: string, now: string) {
    let released = 0;
    for (const record of this.records.values()) {
      if (record.owner_id === ownerId && record.status === "pending" && record.lease_expires_at > now) {
        this.records.set(record.job_id, { ...record, lease_expires_at: now, updated_at: now });
        released += 1;
      }
    }
    return released;
  }

  async recordFailure(jobId: string, leaseToken: string, error: string) {
    return this.update(jobId, leaseToken, (record) => ({ ...record, attempts: record.attempts + 1, last_error: error }));
  }

  async markDelivered(jobId: string, leaseToken: string, citationId: string) {
    return this.update(jobId, leaseToken, (record) => ({
      ...record,
      status: "delivered",
      attempts: record.attempts + 1,
      citation_id: citationId,
      last_error: null,
    }));
  }

  async markFailed(jobId: string, leaseToken: string, error: string) {
    return this.update(jobId, leaseToken, (record) => ({ ...record, status: "failed", last_error: error }));
  }

  async get(jobId: string) {
    const record = this.records.get(jobId);
    return record ? copy(record) : null;
  }

  private update(jobId: string, leaseToken: string, change: (record: DeliveryRecord) => DeliveryRecord) {
    const record = this.records.get(jobId);
    if (!record || record.lease_token !== leaseToken) {
      throw new Error(`Delivery record ${jobId} is not held by lease ${leaseToken}`);
    }
    const updated = { ...change(record), updated_at: toIso(this.now()) };
    this.records.set(jobId, updated);
    return copy(updated);
  }
}

export class MemoryCitationLedgerRepository implements CitationLedgerRepository {
  private readonly entries: CitationLedgerRecord[] = [];

  constructor(private readonly now: Clock = systemClock) {}

  async ensureEntry(input: LedgerEntryInput) {
    const existing = this.entries.find(
      (entry) => entry.task_id === input.taskId && entry.source_hash === input.sourceHash,
    );
    if (existing) {
      return { record: copy(existing), created: false };
    }
    const numbers = this.entries.filter((entry) => entry.task_id === input.taskId).map((entry) => entry.citation_number);
    const record: CitationLedgerRecord = {
      id: randomUUID(),
      task_id: input.taskId,
      job_id: input.jobId,
      source_hash: input.sourceHash,
      citation_number: Math.max(0, ...numbers) + 1,
      title: input.title,
      url: input.url,
      accessed_at: input.accessedAt,
      created_at: toIso(this.now()),
    };
    this.entries.push(record);
    return { record: copy(record), created: true };
  }

  async listForTask(taskId: string) {
    return this.entries
      .filter((entry) => entry.task_id === taskId)
      .sort((a, b) => a.citation_number - b.citation_number)
      .map(copy);
  }
}

export function createMemoryRepositories(now: Clock = systemClock): Repositories {
  return {
    research: new MemoryResearchRepository(now),
    deliveries: new MemoryDeliveryRepository(now),
    ledger: new MemoryCitationLedgerRepository(now),
  };
}
