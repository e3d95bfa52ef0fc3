import { createHash } from "node:crypto";
import { Dispatcher, fetch } from "undici";
import { z } from "zod";
import { CitationRejectedError, CollaboratorUnavailableError, describeError } from "../errors";
import { logger } from "../logger";
import { recordCollaboratorError, startCollaboratorTimer } from "../metrics";
import type { CitationLedgerRepository } from "../repositories/types";
import type { ValidatedContent } from "../types/research";
import { normalizeTargetUrl } from "../utils/url";

export interface CitationSubmission {
  /** Stable per fetch job; repeated submissions with the same key must not create new citations. */
  idempotencyKey: string;
  content: ValidatedContent;
}

export interface CitationAck {
  citationId: string;
  duplicate: boolean;
}

export interface CitationCollaborator {
  submit(submission: CitationSubmission): Promise<CitationAck>;
}

const EXCERPT_CHARS = 1200;

const citationResponseSchema = z.object({
  citation_id: z.union([z.string(), z.number()]).transform(String),
  duplicate: z.boolean().optional().default(false),
});

export interface HttpCitationOptions {
  serviceUrl: string;
  apiKey?: string;
  timeoutMs?: number;
  dispatcher?: Dispatcher;
}

/** Forwards accepted content to an external citation service. */
export class HttpCitationCollaborator implements CitationCollaborator {
  constructor(private readonly options: HttpCitationOptions) {}

  async submit({ idempotencyKey, content }: CitationSubmission): Promise<CitationAck> {
    const stopTimer = startCollaboratorTimer("citation");
    try {
      const response = await fetch(`${this.options.serviceUrl}/citations`, {
        method: "POST",
        headers: {
          "content-type": "application/json",
          "idempotency-key": idempotencyKey,
          ...(this.options.apiKey ? { "x-api-key": this.options.apiKey } : {}),
        },
        body: JSON.stringify({
          task_id: content.task_id,
          job_id: content.job_id,
          url: content.provenance.url,
          final_url: content.provenance.final_url,
          title: content.provenance.title,
          accessed_at: content.provenance.fetched_at,
          confidence: content.confidence,
          excerpt: content.text.slice(0, EXCERPT_CHARS),
        }),
        signal: AbortSignal.timeout(this.options.timeoutMs ?? 15000),
        dispatcher: this.options.dispatcher,
      }).catch((error: unknown) => {
        recordCollaboratorError("citation", "transport");
        throw new CollaboratorUnavailableError(`Citation service unreachable: ${describeError(error)}`, {
          cause: error,
        });
      });

      if (response.status >= 500 || response.status === 408 || response.status === 429) {
        recordCollaboratorError("citation", "status");
        await response.body?.cancel();
        throw new CollaboratorUnavailableError(`Citation service returned ${response.status}`, {
          status: response.status,
        });
      }
      if (!response.ok) {
        const text = await response.text();
        logger.error({ status: response.status, text, jobId: content.job_id }, "Citation service rejected submission");
        recordCollaboratorError("citation", "rejected");
        throw new CitationRejectedError(`Citation service rejected submission (${response.status})`, response.status);
      }

      const parsed = citationResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        recordCollaboratorError("citation", "payload");
        throw new CollaboratorUnavailableError("Citation service returned an unexpected payload", {
          cause: parsed.error,
        });
      }
      return { citationId: parsed.data.citation_id, duplicate: parsed.data.duplicate };
    } finally {
      stopTimer();
    }
  }
}

export function sourceHash(content: Pick<ValidatedContent, "provenance">) {
  const url = normalizeTargetUrl(content.provenance.final_url) ?? content.provenance.final_url;
  return createHash("sha1").update(url).digest("hex");
}

/**
 * Numbers citations per task in the local ledger. Used when no external
 * citation service is configured. Two jobs resolving to the same source share
 * one citation.
 */
export class LedgerCitationCollaborator implements CitationCollaborator {
  constructor(private readonly ledger: CitationLedgerRepository) {}

  async submit({ content }: CitationSubmission): Promise<CitationAck> {
    const { record, created } = await this.ledger.ensureEntry({
      taskId: content.task_id,
      jobId: content.job_id,
      sourceHash: sourceHash(content),
      title: content.provenance.title ?? content.provenance.final_url,
      url: content.provenance.final_url,
      accessedAt: content.provenance.fetched_at,
    });
    return { citationId: `${content.task_id}#${record.citation_number}`, duplicate: !created };
  }
}
