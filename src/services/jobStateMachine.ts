import { InvalidTransitionError } from "../errors";
import type { FetchJob, JobState } from "../types/research";

const TRANSITIONS: Record<JobState, readonly JobState[]> = {
  pending: ["in_flight", "abandoned"],
  in_flight: ["succeeded", "failed"],
  succeeded: ["validating", "abandoned"],
  failed: ["pending", "escalated", "abandoned"],
  escalated: ["pending"],
  validating: ["validated", "rejected"],
  validated: [],
  rejected: [],
  abandoned: [],
};

/** States a job may be left in by a crash; restart puts them back to pending. */
const RECOVERABLE: ReadonlySet<JobState> = new Set<JobState>([
  "in_flight",
  "failed",
  "escalated",
  "succeeded",
  "validating",
]);

export function canTransition(from: JobState, to: JobState) {
  return TRANSITIONS[from].includes(to);
}

export function transition(
  job: FetchJob,
  to: JobState,
  now: string,
  patch: Partial<Omit<FetchJob, "id" | "task_id" | "state">> = {},
): FetchJob {
  if (!canTransition(job.state, to)) {
    throw new InvalidTransitionError(job.id, job.state, to);
  }
  if (patch.strategy_index !== undefined && patch.strategy_index < job.strategy_index) {
    throw new InvalidTransitionError(job.id, `strategy ${job.strategy_index}`, `strategy ${patch.strategy_index}`);
  }
  return { ...job, ...patch, state: to, updated_at: now };
}

export function isRecoverable(state: JobState) {
  return RECOVERABLE.has(state);
}

export function recoverJob(job: FetchJob, now: string): FetchJob {
  if (!RECOVERABLE.has(job.state)) {
    throw new InvalidTransitionError(job.id, job.state, "pending");
  }
  return { ...job, state: "pending", next_eligible_at: null, updated_at: now };
}
