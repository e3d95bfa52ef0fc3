import { logger } from "../logger";
import { escalationCounter, jobAbandonCounter } from "../metrics";
import type {
  AbandonReason,
  DeliveryStatus,
  FailureKind,
  FetchAttemptRecord,
  FetchJob,
  StrategyKind,
} from "../types/research";
import { Clock, systemClock, toIso } from "../utils/time";
import type { Classification } from "./failureClassifier";
import { recoverJob, transition } from "./jobStateMachine";
import type { StrategyRegistry } from "./strategies";

export interface EscalationOptions {
  backoffBaseMs: number;
  backoffCapMs: number;
  jitterMaxMs: number;
  maxRetriesPerStrategy: number;
  consecutiveFailureLimit: number;
  timeoutExtensionFactor: number;
  maxAttemptTimeoutMs: number;
}

export type EscalationDecision =
  | { action: "retry"; delayMs: number; timeoutMs: number; reason: string }
  | { action: "escalate"; toIndex: number; reason: string }
  | { action: "abandon"; reason: AbandonReason; detail: string };

export interface FailureInput {
  job: FetchJob;
  verdict: FailureKind;
  retryAfterMs?: number;
  history: FetchAttemptRecord[];
  defaultTimeoutMs: number;
  hint?: StrategyKind | null;
}

export type StrategyHintSource = (domain: string, pastFailures: FailureKind[]) => Promise<StrategyKind | null>;

export interface EscalationControllerDeps {
  registry: StrategyRegistry;
  options: EscalationOptions;
  hints?: StrategyHintSource;
  random?: () => number;
  now?: Clock;
}

/**
 * Owns every FetchJob transition and the retry/escalate/abandon policy
 * applied after a failed attempt.
 */
export class EscalationController {
  private readonly random: () => number;
  private readonly now: Clock;

  constructor(private readonly deps: EscalationControllerDeps) {
    this.random = deps.random ?? Math.random;
    this.now = deps.now ?? systemClock;
  }

  /** base × 2^(n-1), capped, plus up to `jitterMaxMs` of jitter. */
  computeBackoff(attempt: number): number {
    const { backoffBaseMs, backoffCapMs, jitterMaxMs } = this.deps.options;
    const exponential = Math.min(backoffBaseMs * 2 ** Math.max(0, attempt - 1), backoffCapMs);
    return exponential + this.random() * jitterMaxMs;
  }

  decide(input: FailureInput): EscalationDecision {
    const { job, verdict } = input;
    const { options } = this.deps;
    const onStrategy = input.history.filter((attempt) => attempt.strategy_index === job.strategy_index);

    switch (verdict) {
      case "parse_error":
        return { action: "abandon", reason: "parse_error", detail: "content fetched but could not be parsed" };
      case "blocked":
        return this.escalate(job, input.hint, "blocked");
      case "timeout": {
        const timeouts = onStrategy.filter((attempt) => attempt.verdict === "timeout").length;
        if (timeouts >= 2 || this.repeated(onStrategy, verdict)) {
          return this.escalate(job, input.hint, "repeated_timeout");
        }
        if (job.attempt_count > options.maxRetriesPerStrategy) {
          return this.escalate(job, input.hint, "retries_exhausted");
        }
        const current = job.attempt_timeout_ms ?? input.defaultTimeoutMs;
        return {
          action: "retry",
          delayMs: 0,
          timeoutMs: Math.min(options.maxAttemptTimeoutMs, Math.round(current * options.timeoutExtensionFactor)),
          reason: "timeout_extended",
        };
      }
      case "transient_network":
      case "rate_limited": {
        if (this.repeated(onStrategy, verdict)) {
          return this.escalate(job, input.hint, `repeated_${verdict}`);
        }
        if (job.attempt_count > options.maxRetriesPerStrategy) {
          return this.escalate(job, input.hint, "retries_exhausted");
        }
        let delayMs = this.computeBackoff(job.attempt_count);
        if (verdict === "rate_limited" && input.retryAfterMs !== undefined) {
          delayMs = Math.max(delayMs, input.retryAfterMs);
        }
        return {
          action: "retry",
          delayMs,
          timeoutMs: job.attempt_timeout_ms ?? input.defaultTimeoutMs,
          reason: `backoff_${verdict}`,
        };
      }
      default: {
        const exhaustive: never = verdict;
        return exhaustive;
      }
    }
  }

  begin(job: FetchJob): FetchJob {
    return transition(job, "in_flight", toIso(this.now()), {
      attempt_count: job.attempt_count + 1,
      total_attempts: job.total_attempts + 1,
      next_eligible_at: null,
    });
  }

  defer(job: FetchJob, waitUntil: number): FetchJob {
    return { ...job, next_eligible_at: toIso(waitUntil), updated_at: toIso(this.now()) };
  }

  succeed(job: FetchJob): FetchJob {
    return transition(job, "succeeded", toIso(this.now()));
  }

  async fail(
    job: FetchJob,
    classification: Classification,
    history: FetchAttemptRecord[],
    defaultTimeoutMs: number,
  ): Promise<{ job: FetchJob; decision: EscalationDecision }> {
    if (classification.verdict === "success") {
      throw new Error("fail() called with a successful classification");
    }
    const input: FailureInput = {
      job,
      verdict: classification.verdict,
      retryAfterMs: classification.retryAfterMs,
      history,
      defaultTimeoutMs,
    };
    let decision = this.decide(input);
    if (decision.action === "escalate" && this.deps.hints) {
      const hint = await this.fetchHint(job, history);
      if (hint) {
        decision = this.decide({ ...input, hint });
      }
    }
    return { job: this.apply(job, classification.verdict, decision), decision };
  }

  abandon(job: FetchJob, reason: AbandonReason): FetchJob {
    jobAbandonCounter.labels(reason).inc();
    return transition(job, "abandoned", toIso(this.now()), { abandon_reason: reason, next_eligible_at: null });
  }

  abort(job: FetchJob, reason: AbandonReason): FetchJob {
    const now = toIso(this.now());
    switch (job.state) {
      case "validated":
      case "rejected":
      case "abandoned":
        return job;
      case "validating":
        return this.finishValidation(job, false);
      case "in_flight":
        return this.abandon(transition(job, "failed", now), reason);
      case "escalated":
        return this.abandon(transition(job, "pending", now), reason);
      default:
        return this.abandon(job, reason);
    }
  }

  startValidation(job: FetchJob): FetchJob {
    return transition(job, "validating", toIso(this.now()));
  }

  finishValidation(job: FetchJob, accepted: boolean): FetchJob {
    return transition(job, accepted ? "validated" : "rejected", toIso(this.now()), {
      delivery_status: accepted ? "pending" : "not_applicable",
    });
  }

  recordDelivery(job: FetchJob, status: DeliveryStatus, citationId: string | null = job.citation_id): FetchJob {
    return { ...job, delivery_status: status, citation_id: citationId, updated_at: toIso(this.now()) };
  }

  recover(job: FetchJob): FetchJob {
    return recoverJob(job, toIso(this.now()));
  }

  private apply(job: FetchJob, verdict: FailureKind, decision: EscalationDecision): FetchJob {
    const now = this.now();
    const failed = transition(job, "failed", toIso(now), { last_failure: verdict });
    switch (decision.action) {
      case "retry":
        return transition(failed, "pending", toIso(now), {
          next_eligible_at: toIso(now + decision.delayMs),
          attempt_timeout_ms: decision.timeoutMs,
        });
      case "escalate": {
        const from = this.deps.registry.at(job.strategy_index).kind;
        const to = this.deps.registry.at(decision.toIndex).kind;
        escalationCounter.labels(from, to).inc();
        const escalated = transition(failed, "escalated", toIso(now), {
          strategy_index: decision.toIndex,
          attempt_count: 0,
          attempt_timeout_ms: null,
        });
        return transition(escalated, "pending", toIso(now), { next_eligible_at: null });
      }
      case "abandon":
        return this.abandon(failed, decision.reason);
      default: {
        const exhaustive: never = decision;
        return exhaustive;
      }
    }
  }

  private repeated(onStrategy: FetchAttemptRecord[], verdict: FailureKind) {
    const limit = this.deps.options.consecutiveFailureLimit;
    if (onStrategy.length < limit) {
      return false;
    }
    return onStrategy.slice(-limit).every((attempt) => attempt.verdict === verdict);
  }

  private escalate(job: FetchJob, hint: StrategyKind | null | undefined, reason: string): EscalationDecision {
    const next = this.deps.registry.next(job.strategy_index);
    if (!next) {
      return { action: "abandon", reason: "exhausted", detail: `${reason}; no stronger strategy remains` };
    }
    let toIndex = next.index;
    if (hint) {
      const hinted = this.deps.registry.indexOf(hint);
      if (hinted > toIndex) {
        toIndex = hinted;
      }
    }
    return { action: "escalate", toIndex, reason };
  }

  private async fetchHint(job: FetchJob, history: FetchAttemptRecord[]): Promise<StrategyKind | null> {
    const hints = this.deps.hints;
    if (!hints) {
      return null;
    }
    const pastFailures = history
      .map((attempt) => attempt.verdict)
      .filter((verdict): verdict is FailureKind => verdict !== "success");
    try {
      return await hints(job.domain, pastFailures);
    } catch (error) {
      logger.warn({ error, jobId: job.id, domain: job.domain }, "Strategy hint unavailable, using policy default");
      return null;
    }
  }
}
