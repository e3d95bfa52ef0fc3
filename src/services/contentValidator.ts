import { logger } from "../logger";
import { validationCounter } from "../metrics";
import type { Provenance, ValidatedContent } from "../types/research";
import { payloadText } from "../utils/html";
import { Clock, clamp, systemClock, toIso } from "../utils/time";
import type { InferenceCollaborator } from "./inferenceClient";

export interface ValidatorOptions {
  confidenceThreshold: number;
  /** Text sent to the model is cut at this many characters. */
  maxInferenceChars: number;
}

export interface ValidationPayload {
  contentType: string;
  body: string;
}

export interface ValidationContext {
  jobId: string;
  taskId: string;
  /** Excerpts of content already accepted for the same task. */
  crossReferences: string[];
}

export class ContentValidator {
  constructor(
    private readonly inference: InferenceCollaborator,
    private readonly options: ValidatorOptions,
    private readonly now: Clock = systemClock,
  ) {}

  normalize(payload: ValidationPayload) {
    return payloadText(payload.contentType, payload.body);
  }

  async validate(payload: ValidationPayload, provenance: Provenance, context: ValidationContext): Promise<ValidatedContent> {
    const text = this.normalize(payload);
    let confidence = 0;
    let contradiction = false;
    try {
      const assessment = await this.inference.assessConfidence(
        text.slice(0, this.options.maxInferenceChars),
        context.crossReferences,
      );
      confidence = clamp(assessment.score, 0, 1);
      contradiction = assessment.contradiction;
    } catch (error) {
      // Unscored content is never accepted.
      logger.warn({ error, jobId: context.jobId, taskId: context.taskId }, "Confidence scoring failed; rejecting");
    }

    const accepted = confidence >= this.options.confidenceThreshold && !contradiction;
    const decision = accepted ? "accepted" : "rejected";
    validationCounter.labels(decision).inc();
    return {
      job_id: context.jobId,
      task_id: context.taskId,
      text,
      provenance,
      confidence,
      contradiction,
      decision,
      rejection_reason: accepted ? null : contradiction ? "contradiction" : "low_confidence",
      created_at: toIso(this.now()),
    };
  }
}
