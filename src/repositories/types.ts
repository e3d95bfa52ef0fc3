import type {
  CitationLedgerRecord,
  DeliveryRecord,
  FetchAttemptRecord,
  FetchJob,
  ResearchTask,
  ValidatedContent,
} from "../types/research";

export interface CreateTaskInput {
  query: string;
  targetUrls: string[];
  deadlineAt: string | null;
}

export interface JobTarget {
  url: string;
  domain: string;
}

export type TaskPatch = Partial<
  Pick<ResearchTask, "status" | "cancel_requested" | "deadline_at" | "summary" | "warnings" | "notes" | "completed_at">
>;

export interface ResearchRepository {
  createTask(input: CreateTaskInput): Promise<ResearchTask>;
  getTask(taskId: string): Promise<ResearchTask | null>;
  updateTask(taskId: string, patch: TaskPatch): Promise<ResearchTask>;
  listRecentTasks(limit: number): Promise<ResearchTask[]>;
  /** Tasks without a final status, oldest first. */
  listActiveTasks(): Promise<ResearchTask[]>;

  createJobs(taskId: string, targets: JobTarget[], attemptTimeoutMs: number | null): Promise<FetchJob[]>;
  getJob(jobId: string): Promise<FetchJob | null>;
  listJobs(taskId: string): Promise<FetchJob[]>;
  /** Persists every mutable column of the job. */
  saveJob(job: FetchJob): Promise<void>;

  insertAttempt(attempt: Omit<FetchAttemptRecord, "id">): Promise<FetchAttemptRecord>;
  /** Ordered by attempt number. */
  listAttempts(jobId: string): Promise<FetchAttemptRecord[]>;

  /** Keeps the first decision stored for a job and returns it. */
  saveValidatedContent(content: ValidatedContent): Promise<ValidatedContent>;
  getValidatedContent(jobId: string): Promise<ValidatedContent | null>;
  listAcceptedContents(taskId: string): Promise<ValidatedContent[]>;
}

export type ClaimResult =
  | { outcome: "claimed"; record: DeliveryRecord }
  | { outcome: "delivered"; record: DeliveryRecord }
  | { outcome: "held"; record: DeliveryRecord };

export interface ClaimInput {
  jobId: string;
  ownerId: string;
  leaseToken: string;
  leaseExpiresAt: string;
  now: string;
}

export interface DeliveryRepository {
  /**
   * Atomic check-and-set: creates the record, or takes it over when it failed
   * or its lease expired. A live lease is never shared, not even with the same
   * owner; delivered records are never claimed again.
   */
  claim(input: ClaimInput): Promise<ClaimResult>;
  /** Expires the live leases of `ownerId`; run once when a worker restarts. */
  releaseLeases(ownerId: string, now: string): Promise<number>;
  recordFailure(jobId: string, leaseToken: string, error: string): Promise<DeliveryRecord>;
  markDelivered(jobId: string, leaseToken: string, citationId: string): Promise<DeliveryRecord>;
  markFailed(jobId: string, leaseToken: string, error: string): Promise<DeliveryRecord>;
  get(jobId: string): Promise<DeliveryRecord | null>;
}

export interface LedgerEntryInput {
  taskId: string;
  jobId: string;
  sourceHash: string;
  title: string | null;
  url: string;
  accessedAt: string;
}

export interface CitationLedgerRepository {
  /**
   * Returns the existing entry for the same task and source, or inserts one
   * with the next citation number of the task.
   */
  ensureEntry(input: LedgerEntryInput): Promise<{ record: CitationLedgerRecord; created: boolean }>;
  listForTask(taskId: string): Promise<CitationLedgerRecord[]>;
}

export interface Repositories {
  research: ResearchRepository;
  deliveries: DeliveryRepository;
  ledger: CitationLedgerRepository;
}
