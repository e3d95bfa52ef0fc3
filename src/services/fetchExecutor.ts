import { describeError } from "../errors";
import { fetchLatencyHistogram } from "../metrics";
import type { AttemptOutcome, ExecutedAttempt } from "../types/research";
import { Clock, sleep as defaultSleep, systemClock, toIso } from "../utils/time";
import { AntiDetectionContext } from "./antiDetection";
import type { RateLimitGrant } from "./rateLimiter";
import type { FetchStrategy, StrategyResponse } from "./strategies";

export interface FetchRequest {
  jobId: string;
  url: string;
  strategy: FetchStrategy;
  strategyIndex: number;
  grant: RateLimitGrant;
  timeoutMs: number;
}

export interface FetchExecutorDeps {
  context: AntiDetectionContext;
  maxBodyBytes: number;
  sleep?: (ms: number) => Promise<void>;
  now?: Clock;
}

type Settled = { kind: "response"; response: StrategyResponse } | { kind: "error"; error: unknown } | { kind: "timeout" };

function errorCode(error: unknown): string | null {
  const candidates: unknown[] = [error];
  if (error instanceof Error && error.cause !== undefined) {
    candidates.unshift(error.cause);
  }
  for (const candidate of candidates) {
    if (typeof candidate === "object" && candidate !== null && "code" in candidate && typeof candidate.code === "string") {
      return candidate.code;
    }
  }
  return null;
}

function errorMessage(error: unknown) {
  const message = describeError(error);
  if (error instanceof Error && error.cause !== undefined) {
    return `${message}: ${describeError(error.cause)}`;
  }
  return message;
}

/**
 * Runs exactly one attempt against one strategy. Every failure comes back as
 * a typed outcome; `fetch` never rejects.
 */
export class FetchExecutor {
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: Clock;

  constructor(private readonly deps: FetchExecutorDeps) {
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? systemClock;
  }

  async fetch(request: FetchRequest): Promise<ExecutedAttempt> {
    const startedAt = this.now();
    if (!request.grant.consume()) {
      return this.finish(request, startedAt, {
        type: "network_error",
        message: "rate limit grant already consumed",
        code: "GRANT_REUSED",
      });
    }

    const stopTimer = fetchLatencyHistogram.startTimer({ strategy: request.strategy.kind });
    try {
      await this.sleep(this.deps.context.interActionDelayMs());
      const outcome = await this.runWithDeadline(request);
      return this.finish(request, startedAt, outcome);
    } catch (error) {
      return this.finish(request, startedAt, {
        type: "network_error",
        message: errorMessage(error),
        code: errorCode(error),
      });
    } finally {
      stopTimer();
    }
  }

  private async runWithDeadline(request: FetchRequest): Promise<AttemptOutcome> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<Settled>((resolve) => {
      timer = setTimeout(() => {
        controller.abort();
        resolve({ kind: "timeout" });
      }, request.timeoutMs);
    });

    // The strategy may ignore the abort signal; the race still ends the attempt on time.
    const pending: Promise<Settled> = request.strategy
      .attempt({
        url: request.url,
        headers: this.deps.context.requestHeaders(),
        signal: controller.signal,
        timeoutMs: request.timeoutMs,
        maxBodyBytes: this.deps.maxBodyBytes,
        proxyUrl: this.deps.context.proxyFor(request.strategy),
      })
      .then(
        (response): Settled => ({ kind: "response", response }),
        (error: unknown): Settled => ({ kind: "error", error }),
      );

    try {
      const settled = await Promise.race([pending, deadline]);
      if (settled.kind === "timeout" || (settled.kind === "error" && controller.signal.aborted)) {
        return { type: "timeout", timeout_ms: request.timeoutMs };
      }
      if (settled.kind === "error") {
        return { type: "network_error", message: errorMessage(settled.error), code: errorCode(settled.error) };
      }
      const { response } = settled;
      return {
        type: "response",
        status: response.status,
        final_url: response.finalUrl,
        content_type: response.contentType,
        headers: response.headers,
        body: response.body,
      };
    } finally {
      clearTimeout(timer);
    }
  }

  private finish(request: FetchRequest, startedAt: number, outcome: AttemptOutcome): ExecutedAttempt {
    return {
      job_id: request.jobId,
      url: request.url,
      strategy: request.strategy.kind,
      strategy_index: request.strategyIndex,
      started_at: toIso(startedAt),
      ended_at: toIso(this.now()),
      outcome,
    };
  }
}
