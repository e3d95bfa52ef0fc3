import { describe, expect, it } from "vitest";
import { CitationRejectedError, CollaboratorUnavailableError, DeliveryError } from "../src/errors";
import { MemoryDeliveryRepository } from "../src/repositories/memory";
import type { CitationAck, CitationCollaborator, CitationSubmission } from "../src/services/citationCollaborator";
import { DeliveryOptions, DeliveryService } from "../src/services/deliveryService";
import { makeContent } from "./fixtures";

const NOW = Date.parse("2026-01-01T00:00:00Z");

class ScriptedCollaborator implements CitationCollaborator {
  readonly submissions: CitationSubmission[] = [];

  constructor(private readonly script: Array<CitationAck | Error>) {}

  async submit(submission: CitationSubmission) {
    this.submissions.push(submission);
    const next = this.script.shift() ?? { citationId: "fallback", duplicate: false };
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }
}

const options: DeliveryOptions = {
  ownerId: "worker-a",
  leaseMs: 60_000,
  maxRetries: 2,
  baseDelayMs: 100,
  maxDelayMs: 250,
};

function setup(script: Array<CitationAck | Error>, ownerId = "worker-a") {
  const repository = new MemoryDeliveryRepository(() => NOW);
  const collaborator = new ScriptedCollaborator(script);
  const delays: number[] = [];
  const service = new DeliveryService({
    repository,
    collaborator,
    options: { ...options, ownerId },
    sleep: async (ms) => {
      delays.push(ms);
    },
    now: () => NOW,
  });
  return { repository, collaborator, delays, service };
}

const unavailable = () => new CollaboratorUnavailableError("Citation service returned 503", { status: 503 });

describe("DeliveryService", () => {
  it("delivers once and reports later calls as duplicates", async () => {
    const { service, collaborator, repository } = setup([{ citationId: "c-1", duplicate: false }]);

    await expect(service.deliver("job-1", makeContent())).resolves.toEqual({ status: "delivered", citation_id: "c-1" });
    await expect(service.deliver("job-1", makeContent())).resolves.toEqual({ status: "duplicate", citation_id: "c-1" });

    expect(collaborator.submissions).toHaveLength(1);
    expect(collaborator.submissions[0].idempotencyKey).toBe("job-1");
    expect(await repository.get("job-1")).toMatchObject({ status: "delivered", attempts: 1, citation_id: "c-1" });
  });

  it("leaves a record leased by another worker alone", async () => {
    const { service, collaborator, repository } = setup([]);
    await repository.claim({
      jobId: "job-1",
      ownerId: "worker-b",
      leaseToken: "lease-b",
      leaseExpiresAt: "2026-01-01T00:05:00.000Z",
      now: "2026-01-01T00:00:00.000Z",
    });

    await expect(service.deliver("job-1", makeContent())).resolves.toEqual({
      status: "in_flight",
      citation_id: null,
      retry_at: "2026-01-01T00:05:00.000Z",
    });
    expect(collaborator.submissions).toHaveLength(0);
  });

  it("takes over an expired lease", async () => {
    const { service, repository } = setup([{ citationId: "c-9", duplicate: true }]);
    await repository.claim({
      jobId: "job-1",
      ownerId: "worker-b",
      leaseToken: "lease-b",
      leaseExpiresAt: "2025-12-31T23:59:00.000Z",
      now: "2025-12-31T23:58:00.000Z",
    });

    await expect(service.deliver("job-1", makeContent())).resolves.toEqual({ status: "delivered", citation_id: "c-9" });
    expect(await repository.get("job-1")).toMatchObject({ owner_id: "worker-a", status: "delivered" });
  });

  it("forwards concurrent deliveries of one job only once", async () => {
    const { service, collaborator } = setup([{ citationId: "c-1", duplicate: false }]);

    const acks = await Promise.all([
      service.deliver("job-1", makeContent()),
      service.deliver("job-1", makeContent()),
    ]);

    expect(acks).toEqual([
      { status: "delivered", citation_id: "c-1" },
      { status: "in_flight", citation_id: null, retry_at: "2026-01-01T00:01:00.000Z" },
    ]);
    expect(collaborator.submissions).toHaveLength(1);
  });

  it("does not reclaim its own live lease until the lease is released", async () => {
    const { service, collaborator, repository } = setup([{ citationId: "c-4", duplicate: false }]);
    await repository.claim({
      jobId: "job-1",
      ownerId: "worker-a",
      leaseToken: "lease-before-restart",
      leaseExpiresAt: "2026-01-01T00:05:00.000Z",
      now: "2025-12-31T23:59:00.000Z",
    });

    await expect(service.deliver("job-1", makeContent())).resolves.toMatchObject({ status: "in_flight" });
    expect(collaborator.submissions).toHaveLength(0);

    await expect(service.releaseOwnLeases()).resolves.toBe(1);
    await expect(service.deliver("job-1", makeContent())).resolves.toEqual({ status: "delivered", citation_id: "c-4" });
    expect(collaborator.submissions).toHaveLength(1);
  });

  it("retries an unavailable collaborator with capped exponential delays", async () => {
    const { service, delays, repository } = setup([unavailable(), unavailable(), { citationId: "c-2", duplicate: false }]);

    await expect(service.deliver("job-1", makeContent())).resolves.toEqual({ status: "delivered", citation_id: "c-2" });
    expect(delays).toEqual([100, 200]);
    expect(await repository.get("job-1")).toMatchObject({ attempts: 3, last_error: null });
  });

  it("marks the record failed once retries are exhausted", async () => {
    const { service, delays, repository } = setup([unavailable(), unavailable(), unavailable()]);

    const failure = service.deliver("job-1", makeContent());
    await expect(failure).rejects.toBeInstanceOf(DeliveryError);
    await expect(failure).rejects.toThrow("Delivery failed after 3 attempt(s): Citation service returned 503");
    expect(delays).toEqual([100, 200]);
    expect(await repository.get("job-1")).toMatchObject({
      status: "failed",
      attempts: 3,
      last_error: "Citation service returned 503",
    });
  });

  it("does not retry a rejected submission", async () => {
    const { service, delays, collaborator } = setup([new CitationRejectedError("Citation service rejected submission (422)", 422)]);

    await expect(service.deliver("job-1", makeContent())).rejects.toThrow(
      "Delivery failed after 1 attempt(s): Citation service rejected submission (422)",
    );
    expect(delays).toEqual([]);
    expect(collaborator.submissions).toHaveLength(1);
  });

  it("can deliver again after a failed delivery", async () => {
    const { service } = setup([new CitationRejectedError("rejected", 422), { citationId: "c-3", duplicate: false }]);

    await expect(service.deliver("job-1", makeContent())).rejects.toBeInstanceOf(DeliveryError);
    await expect(service.deliver("job-1", makeContent())).resolves.toEqual({ status: "delivered", citation_id: "c-3" });
  });

  it("caps the retry delay", () => {
    const { service } = setup([]);
    expect(service.retryDelay(1)).toBe(100);
    expect(service.retryDelay(2)).toBe(200);
    expect(service.retryDelay(5)).toBe(250);
  });
});
