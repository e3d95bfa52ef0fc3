export type TaskStatus = "pending" | "planning" | "fetching" | "validating" | "complete" | "failed";

export type JobState =
  | "pending"
  | "in_flight"
  | "succeeded"
  | "failed"
  | "escalated"
  | "validating"
  | "validated"
  | "rejected"
  | "abandoned";

export type FailureKind = "blocked" | "rate_limited" | "timeout" | "parse_error" | "transient_network";

export type AttemptVerdict = FailureKind | "success";

export type StrategyKind = "plain" | "rendered" | "proxy_rotated";

export type AbandonReason =
  | "exhausted"
  | "parse_error"
  | "cancelled"
  | "task_timeout"
  | "internal_error";

export type DeliveryStatus = "not_applicable" | "pending" | "delivered" | "failed";

export type RejectionReason = "low_confidence" | "contradiction";

export interface TaskSummary {
  total_targets: number;
  usable: number;
  unreachable: number;
  rejected: number;
  undelivered: number;
  message: string;
}

export interface ResearchTask {
  id: string;
  query: string;
  status: TaskStatus;
  target_urls: string[];
  cancel_requested: boolean;
  deadline_at: string | null;
  summary: TaskSummary | null;
  warnings: string[];
  /** Operator annotations, oldest first. */
  notes: string[];
  created_at: string;
  updated_at: string;
  completed_at: string | null;
}

export interface FetchJob {
  id: string;
  task_id: string;
  target_url: string;
  domain: string;
  strategy_index: number;
  /** Attempts made on the current strategy; reset on escalation. */
  attempt_count: number;
  total_attempts: number;
  state: JobState;
  last_failure: FailureKind | null;
  next_eligible_at: string | null;
  /** Extended per-attempt timeout after a timeout failure, cleared on escalation. */
  attempt_timeout_ms: number | null;
  abandon_reason: AbandonReason | null;
  delivery_status: DeliveryStatus;
  citation_id: string | null;
  created_at: string;
  updated_at: string;
}

export interface ResponseOutcome {
  type: "response";
  status: number;
  final_url: string;
  content_type: string;
  headers: Record<string, string>;
  body: string;
}

export interface TimeoutOutcome {
  type: "timeout";
  timeout_ms: number;
}

export interface NetworkErrorOutcome {
  type: "network_error";
  message: string;
  code: string | null;
}

export type AttemptOutcome = ResponseOutcome | TimeoutOutcome | NetworkErrorOutcome;

/** Persisted form of an outcome: bodies and headers stay out of the audit trail. */
export type AttemptOutcomeSummary =
  | { type: "response"; status: number; final_url: string; content_type: string; body_length: number }
  | TimeoutOutcome
  | NetworkErrorOutcome;

export interface ExecutedAttempt {
  job_id: string;
  url: string;
  strategy: StrategyKind;
  strategy_index: number;
  started_at: string;
  ended_at: string;
  outcome: AttemptOutcome;
}

export interface FetchAttemptRecord {
  id: string;
  job_id: string;
  attempt_number: number;
  strategy: StrategyKind;
  strategy_index: number;
  started_at: string;
  ended_at: string;
  outcome: AttemptOutcomeSummary;
  verdict: AttemptVerdict;
  rule: string;
  raw_storage_url: string | null;
}

export interface Provenance {
  url: string;
  final_url: string;
  title: string | null;
  fetched_at: string;
  strategy: StrategyKind;
}

export interface ValidatedContent {
  job_id: string;
  task_id: string;
  text: string;
  provenance: Provenance;
  confidence: number;
  contradiction: boolean;
  decision: "accepted" | "rejected";
  rejection_reason: RejectionReason | null;
  created_at: string;
}

export interface DomainBudget {
  domain: string;
  capacity: number;
  refill_interval_ms: number;
  tokens: number;
  last_refill_at: number;
}

export interface DeliveryRecord {
  job_id: string;
  status: "pending" | "delivered" | "failed";
  owner_id: string;
  lease_token: string;
  lease_expires_at: string;
  citation_id: string | null;
  attempts: number;
  last_error: string | null;
  created_at: string;
  updated_at: string;
}

export interface CitationLedgerRecord {
  id: string;
  task_id: string;
  job_id: string;
  source_hash: string;
  citation_number: number;
  title: string | null;
  url: string;
  accessed_at: string;
  created_at: string;
}

export const TERMINAL_JOB_STATES: ReadonlySet<JobState> = new Set<JobState>([
  "validated",
  "rejected",
  "abandoned",
]);

export const TERMINAL_TASK_STATUSES: ReadonlySet<TaskStatus> = new Set<TaskStatus>(["complete", "failed"]);

export function isTerminalJob(job: Pick<FetchJob, "state">) {
  return TERMINAL_JOB_STATES.has(job.state);
}
