import type { FetchAttemptRecord, FetchJob, ValidatedContent } from "../src/types/research";

export const EPOCH_ISO = "2026-01-01T00:00:00.000Z";

export function makeJob(overrides: Partial<FetchJob> = {}): FetchJob {
  return {
    id: "job-1",
    task_id: "task-1",
    target_url: "https://news.test/article",
    domain: "news.test",
    strategy_index: 0,
    attempt_count: 0,
    total_attempts: 0,
    state: "pending",
    last_failure: null,
    next_eligible_at: null,
    attempt_timeout_ms: null,
    abandon_reason: null,
    delivery_status: "not_applicable",
    citation_id: null,
    created_at: EPOCH_ISO,
    updated_at: EPOCH_ISO,
    ...overrides,
  };
}

let attemptSeq = 0;

export function makeAttempt(overrides: Partial<FetchAttemptRecord> = {}): FetchAttemptRecord {
  attemptSeq += 1;
  return {
    id: `attempt-${attemptSeq}`,
    job_id: "job-1",
    attempt_number: attemptSeq,
    strategy: "plain",
    strategy_index: 0,
    started_at: EPOCH_ISO,
    ended_at: EPOCH_ISO,
    outcome: { type: "timeout", timeout_ms: 1000 },
    verdict: "timeout",
    rule: "attempt_timeout",
    raw_storage_url: null,
    ...overrides,
  };
}

export const ARTICLE_HTML = [
  "<html><head><title>Tidal Patterns</title></head><body>",
  "<nav>Home | About</nav>",
  "<article><h1>Tidal Patterns</h1><p>Ocean tides follow the moon and the sun.</p>",
  "<p>Most coastlines see two high tides every lunar day.</p></article>",
  "<footer>Contact</footer></body></html>",
].join("");

export function makeContent(overrides: Partial<ValidatedContent> = {}): ValidatedContent {
  return {
    job_id: "job-1",
    task_id: "task-1",
    text: "Ocean tides follow the moon and the sun.",
    provenance: {
      url: "https://news.test/article",
      final_url: "https://news.test/article",
      title: "Tidal Patterns",
      fetched_at: EPOCH_ISO,
      strategy: "plain",
    },
    confidence: 0.9,
    contradiction: false,
    decision: "accepted",
    rejection_reason: null,
    created_at: EPOCH_ISO,
    ...overrides,
  };
}
