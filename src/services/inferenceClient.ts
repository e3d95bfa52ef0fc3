import { Dispatcher, fetch } from "undici";
import { z } from "zod";
import { InferenceError, describeError } from "../errors";
import { logger } from "../logger";
import { recordCollaboratorError, startCollaboratorTimer } from "../metrics";
import { prompts, renderPrompt } from "../prompts";
import type { FailureKind, StrategyKind } from "../types/research";

export interface ConfidenceAssessment {
  score: number;
  contradiction: boolean;
  reason: string | null;
}

/** Everything the pipeline asks of the local model. */
export interface InferenceCollaborator {
  assessConfidence(text: string, crossReferences: string[]): Promise<ConfidenceAssessment>;
  suggestStrategy(domain: string, pastFailures: FailureKind[], available: StrategyKind[]): Promise<StrategyKind | null>;
  analyze(content: string): Promise<string>;
}

export interface InferenceClientOptions {
  baseUrl: string;
  model: string;
  maxTokens: number;
  timeoutMs: number;
  dispatcher?: Dispatcher;
}

const generateResponseSchema = z.object({
  response: z.string(),
  done: z.boolean().optional(),
});

const confidenceSchema = z.object({
  confidence: z.coerce.number(),
  contradiction: z.boolean().optional().default(false),
  reason: z.string().optional(),
});

const strategyHintSchema = z.object({
  strategy: z.string().nullable().optional(),
});

/** Pulls the first JSON object out of a completion that may wrap it in prose or fences. */
export function extractJsonObject(text: string): unknown {
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start === -1 || end <= start) {
    throw new InferenceError("Model response did not contain a JSON object");
  }
  try {
    const parsed: unknown = JSON.parse(text.slice(start, end + 1));
    return parsed;
  } catch (error) {
    throw new InferenceError("Model response was not valid JSON", { cause: error });
  }
}

/**
 * Client for a local model server speaking the Ollama generate protocol.
 * Non-streaming; structured prompts ask for JSON output.
 */
export class InferenceClient implements InferenceCollaborator {
  constructor(private readonly options: InferenceClientOptions) {}

  async assessConfidence(text: string, crossReferences: string[]): Promise<ConfidenceAssessment> {
    const references = crossReferences.length
      ? crossReferences.map((snippet, index) => `[${index + 1}] ${snippet}`).join("\n")
      : "(none)";
    const completion = await this.generate(renderPrompt(prompts.confidence, { references, content: text }), {
      json: true,
      temperature: 0,
    });
    const parsed = confidenceSchema.safeParse(extractJsonObject(completion));
    if (!parsed.success) {
      throw new InferenceError("Confidence response had an unexpected shape", { cause: parsed.error });
    }
    return {
      score: parsed.data.confidence,
      contradiction: parsed.data.contradiction,
      reason: parsed.data.reason ?? null,
    };
  }

  async suggestStrategy(
    domain: string,
    pastFailures: FailureKind[],
    available: StrategyKind[],
  ): Promise<StrategyKind | null> {
    const completion = await this.generate(
      renderPrompt(prompts.strategyHint, {
        domain,
        failures: pastFailures.join(", ") || "none",
        strategies: available.join(", "),
      }),
      { json: true, temperature: 0 },
    );
    const parsed = strategyHintSchema.safeParse(extractJsonObject(completion));
    if (!parsed.success || !parsed.data.strategy) {
      return null;
    }
    const suggested = parsed.data.strategy;
    return available.find((kind) => kind === suggested) ?? null;
  }

  async analyze(content: string): Promise<string> {
    const completion = await this.generate(renderPrompt(prompts.analyze, { content }), { temperature: 0.2 });
    return completion.trim();
  }

  private async generate(prompt: string, opts: { json?: boolean; temperature: number }): Promise<string> {
    const stopTimer = startCollaboratorTimer("inference");
    try {
      const response = await fetch(`${this.options.baseUrl}/api/generate`, {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify({
          model: this.options.model,
          prompt,
          stream: false,
          ...(opts.json ? { format: "json" } : {}),
          options: { temperature: opts.temperature, num_predict: this.options.maxTokens },
        }),
        signal: AbortSignal.timeout(this.options.timeoutMs),
        dispatcher: this.options.dispatcher,
      }).catch((error: unknown) => {
        recordCollaboratorError("inference", "transport");
        throw new InferenceError(`Inference request failed: ${describeError(error)}`, { cause: error });
      });

      if (!response.ok) {
        const text = await response.text();
        logger.error({ status: response.status, text }, "Inference request failed");
        recordCollaboratorError("inference", "status");
        throw new InferenceError(`Inference request failed (${response.status})`, { status: response.status });
      }

      const parsed = generateResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        recordCollaboratorError("inference", "payload");
        throw new InferenceError("Inference response had an unexpected shape", { cause: parsed.error });
      }
      return parsed.data.response;
    } finally {
      stopTimer();
    }
  }
}
