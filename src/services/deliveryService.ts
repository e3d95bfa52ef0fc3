import { randomUUID } from "node:crypto";
import { DeliveryError, ResearchError, describeError } from "../errors";
import { logger } from "../logger";
import { deliveryCounter } from "../metrics";
import type { DeliveryRepository } from "../repositories/types";
import type { ValidatedContent } from "../types/research";
import { Clock, sleep as defaultSleep, systemClock, toIso } from "../utils/time";
import type { CitationCollaborator } from "./citationCollaborator";

export interface DeliveryOptions {
  /** Written on claimed records; a restarted process releases the leases it left behind. */
  ownerId: string;
  leaseMs: number;
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export type DeliveryAck =
  | { status: "delivered"; citation_id: string }
  | { status: "duplicate"; citation_id: string | null }
  | { status: "in_flight"; citation_id: null; retry_at: string };

export interface DeliveryServiceDeps {
  repository: DeliveryRepository;
  collaborator: CitationCollaborator;
  options: DeliveryOptions;
  sleep?: (ms: number) => Promise<void>;
  now?: Clock;
  newLeaseToken?: () => string;
}

const isRetryable = (error: unknown) => error instanceof ResearchError && error.retryable;

/**
 * Forwards validated content to the citation collaborator at most once per
 * job id. The durable delivery record is claimed before forwarding, so a
 * crash or a second worker never produces a second citation.
 */
export class DeliveryService {
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: Clock;
  private readonly newLeaseToken: () => string;

  constructor(private readonly deps: DeliveryServiceDeps) {
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? systemClock;
    this.newLeaseToken = deps.newLeaseToken ?? randomUUID;
  }

  async releaseOwnLeases() {
    const { repository, options } = this.deps;
    const released = await repository.releaseLeases(options.ownerId, toIso(this.now()));
    if (released) {
      logger.info({ ownerId: options.ownerId, released }, "Released delivery leases left by a previous run");
    }
    return released;
  }

  retryDelay(attempt: number) {
    const { baseDelayMs, maxDelayMs } = this.deps.options;
    return Math.min(baseDelayMs * 2 ** Math.max(0, attempt - 1), maxDelayMs);
  }

  async deliver(jobId: string, content: ValidatedContent): Promise<DeliveryAck> {
    const { repository, collaborator, options } = this.deps;
    const now = this.now();
    const leaseToken = this.newLeaseToken();
    const claim = await repository.claim({
      jobId,
      ownerId: options.ownerId,
      leaseToken,
      leaseExpiresAt: toIso(now + options.leaseMs),
      now: toIso(now),
    });

    if (claim.outcome === "delivered") {
      deliveryCounter.labels("duplicate").inc();
      logger.info({ jobId, citationId: claim.record.citation_id }, "Delivery already recorded, skipping");
      return { status: "duplicate", citation_id: claim.record.citation_id };
    }
    if (claim.outcome === "held") {
      deliveryCounter.labels("in_flight").inc();
      return { status: "in_flight", citation_id: null, retry_at: claim.record.lease_expires_at };
    }

    for (let attempt = 1; ; attempt++) {
      try {
        const ack = await collaborator.submit({ idempotencyKey: jobId, content });
        await repository.markDelivered(jobId, leaseToken, ack.citationId);
        deliveryCounter.labels("delivered").inc();
        logger.info(
          { jobId, taskId: content.task_id, citationId: ack.citationId, duplicate: ack.duplicate },
          "Content delivered",
        );
        return { status: "delivered", citation_id: ack.citationId };
      } catch (error) {
        const message = describeError(error);
        await repository.recordFailure(jobId, leaseToken, message);
        if (!isRetryable(error) || attempt > options.maxRetries) {
          await repository.markFailed(jobId, leaseToken, message);
          deliveryCounter.labels("failed").inc();
          throw new DeliveryError(jobId, `Delivery failed after ${attempt} attempt(s): ${message}`, {
            cause: error,
            attempts: attempt,
          });
        }
        const delay = this.retryDelay(attempt);
        logger.warn({ jobId, attempt, delay, error: message }, "Citation collaborator unavailable, retrying");
        await this.sleep(delay);
      }
    }
  }
}
