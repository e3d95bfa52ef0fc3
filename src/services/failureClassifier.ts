import type { AttemptVerdict, ExecutedAttempt, ResponseOutcome } from "../types/research";
import { payloadText } from "../utils/html";
import { Clock, systemClock } from "../utils/time";

export interface ClassifierOptions {
  blockedStatusCodes: number[];
  rateLimitedStatusCodes: number[];
  /** Extracted text shorter than this is a structural parse failure. */
  minTextLength: number;
}

export interface Classification {
  verdict: AttemptVerdict;
  /** Id of the rule that matched. */
  rule: string;
  retryAfterMs?: number;
  /** Extracted text, present when the document was parsed. */
  text?: string;
}

interface RuleContext {
  attempt: ExecutedAttempt;
  response: ResponseOutcome | null;
  blocked: ReadonlySet<number>;
  rateLimited: ReadonlySet<number>;
  minTextLength: number;
  text(): string;
}

interface ClassificationRule {
  id: string;
  verdict: AttemptVerdict;
  matches(ctx: RuleContext): boolean;
}

const MARKER_SCAN_BYTES = 64 * 1024;

export const CHALLENGE_MARKERS: ReadonlyArray<{ id: string; regex: RegExp }> = [
  { id: "cloudflare_challenge", regex: /cf-chl|cf_chl_opt|challenge-platform|cf-browser-verification/i },
  { id: "captcha_widget", regex: /g-recaptcha|h-captcha|hcaptcha\.com\/1\/api|px-captcha|captcha-delivery\.com/i },
  {
    id: "challenge_title",
    regex: /<title[^>]*>\s*(just a moment|attention required|access denied|are you a robot|security check)/i,
  },
  {
    id: "human_verification",
    regex: /verify (that )?you are (a )?human|prove your humanity|checking your browser before accessing/i,
  },
];

const UNSUPPORTED_CONTENT_RE = /pdf|octet-stream|^image\/|^audio\/|^video\/|zip/;

const isSuccess = (response: ResponseOutcome | null): response is ResponseOutcome =>
  response !== null && response.status >= 200 && response.status < 300;

export function findChallengeMarker(body: string): string | null {
  const head = body.slice(0, MARKER_SCAN_BYTES);
  const marker = CHALLENGE_MARKERS.find((candidate) => candidate.regex.test(head));
  return marker?.id ?? null;
}

/** Ordered; the first matching rule decides. Blocking signals precede generic status mapping. */
export const CLASSIFICATION_RULES: readonly ClassificationRule[] = [
  { id: "attempt_timeout", verdict: "timeout", matches: (ctx) => ctx.attempt.outcome.type === "timeout" },
  { id: "network_error", verdict: "transient_network", matches: (ctx) => ctx.attempt.outcome.type === "network_error" },
  {
    id: "blocked_status",
    verdict: "blocked",
    matches: (ctx) => ctx.response !== null && ctx.blocked.has(ctx.response.status),
  },
  {
    id: "challenge_marker",
    verdict: "blocked",
    matches: (ctx) => ctx.response !== null && findChallengeMarker(ctx.response.body) !== null,
  },
  {
    id: "rate_limited_status",
    verdict: "rate_limited",
    matches: (ctx) => ctx.response !== null && ctx.rateLimited.has(ctx.response.status),
  },
  {
    id: "gateway_timeout",
    verdict: "timeout",
    matches: (ctx) => ctx.response !== null && (ctx.response.status === 408 || ctx.response.status === 504),
  },
  {
    id: "server_error",
    verdict: "transient_network",
    matches: (ctx) => ctx.response !== null && ctx.response.status >= 500,
  },
  {
    id: "unsupported_content",
    verdict: "parse_error",
    matches: (ctx) => isSuccess(ctx.response) && UNSUPPORTED_CONTENT_RE.test(ctx.response.content_type),
  },
  {
    id: "empty_document",
    verdict: "parse_error",
    matches: (ctx) => isSuccess(ctx.response) && ctx.text().length < ctx.minTextLength,
  },
  { id: "ok", verdict: "success", matches: (ctx) => isSuccess(ctx.response) },
  { id: "fallback", verdict: "transient_network", matches: () => true },
];

export function parseRetryAfter(value: string | undefined, now: number): number | undefined {
  if (!value) {
    return undefined;
  }
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) {
    return Number(trimmed) * 1000;
  }
  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) {
    return undefined;
  }
  return Math.max(0, date - now);
}

export class FailureClassifier {
  private readonly blocked: ReadonlySet<number>;
  private readonly rateLimited: ReadonlySet<number>;

  constructor(
    private readonly options: ClassifierOptions,
    private readonly now: Clock = systemClock,
  ) {
    this.blocked = new Set(options.blockedStatusCodes);
    this.rateLimited = new Set(options.rateLimitedStatusCodes);
  }

  classify(attempt: ExecutedAttempt): Classification {
    const response = attempt.outcome.type === "response" ? attempt.outcome : null;
    let text: string | undefined;
    const ctx: RuleContext = {
      attempt,
      response,
      blocked: this.blocked,
      rateLimited: this.rateLimited,
      minTextLength: this.options.minTextLength,
      text: () => {
        if (text === undefined) {
          text = response ? payloadText(response.content_type, response.body) : "";
        }
        return text;
      },
    };

    const rule = CLASSIFICATION_RULES.find((candidate) => candidate.matches(ctx));
    if (!rule) {
      return { verdict: "transient_network", rule: "fallback" };
    }
    const classification: Classification = { verdict: rule.verdict, rule: rule.id };
    if (rule.verdict === "rate_limited" && response) {
      classification.retryAfterMs = parseRetryAfter(response.headers["retry-after"], this.now());
    }
    if (rule.verdict === "success") {
      classification.text = ctx.text();
    }
    return classification;
  }
}
