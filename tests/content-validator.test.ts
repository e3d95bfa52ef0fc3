import { describe, expect, it } from "vitest";
import { ContentValidator } from "../src/services/contentValidator";
import type { ConfidenceAssessment, InferenceCollaborator } from "../src/services/inferenceClient";
import type { Provenance } from "../src/types/research";
import { ARTICLE_HTML } from "./fixtures";

class FakeInference implements InferenceCollaborator {
  readonly calls: Array<{ text: string; crossReferences: string[] }> = [];

  constructor(private readonly answer: ConfidenceAssessment | Error) {}

  async assessConfidence(text: string, crossReferences: string[]) {
    this.calls.push({ text, crossReferences });
    if (this.answer instanceof Error) {
      throw this.answer;
    }
    return this.answer;
  }

  async suggestStrategy() {
    return null;
  }

  async analyze(content: string) {
    return content;
  }
}

const provenance: Provenance = {
  url: "https://news.test/article",
  final_url: "https://news.test/article",
  title: "Tidal Patterns",
  fetched_at: "2026-01-01T00:00:00.000Z",
  strategy: "plain",
};

const context = { jobId: "job-1", taskId: "task-1", crossReferences: ["Tides are driven by the moon."] };
const payload = { contentType: "text/html", body: ARTICLE_HTML };

function validator(answer: ConfidenceAssessment | Error, maxInferenceChars = 1000) {
  const inference = new FakeInference(answer);
  const subject = new ContentValidator(
    inference,
    { confidenceThreshold: 0.7, maxInferenceChars },
    () => Date.parse("2026-01-01T00:01:00Z"),
  );
  return { inference, subject };
}

describe("ContentValidator", () => {
  it("accepts content at or above the threshold", async () => {
    const { subject, inference } = validator({ score: 0.7, contradiction: false, reason: null });
    const result = await subject.validate(payload, provenance, context);

    expect(result).toEqual({
      job_id: "job-1",
      task_id: "task-1",
      text: "Tidal Patterns\nOcean tides follow the moon and the sun.\nMost coastlines see two high tides every lunar day.",
      provenance,
      confidence: 0.7,
      contradiction: false,
      decision: "accepted",
      rejection_reason: null,
      created_at: "2026-01-01T00:01:00.000Z",
    });
    expect(inference.calls[0].crossReferences).toEqual(["Tides are driven by the moon."]);
  });

  it("rejects low confidence content", async () => {
    const { subject } = validator({ score: 0.4, contradiction: false, reason: "thin" });
    const result = await subject.validate(payload, provenance, context);
    expect(result).toMatchObject({ decision: "rejected", rejection_reason: "low_confidence", confidence: 0.4 });
  });

  it("rejects contradicting content regardless of confidence", async () => {
    const { subject } = validator({ score: 0.95, contradiction: true, reason: "conflicts with [1]" });
    const result = await subject.validate(payload, provenance, context);
    expect(result).toMatchObject({ decision: "rejected", rejection_reason: "contradiction", contradiction: true });
  });

  it("scores zero when inference is unavailable", async () => {
    const { subject } = validator(new Error("connection refused"));
    const result = await subject.validate(payload, provenance, context);
    expect(result).toMatchObject({ decision: "rejected", rejection_reason: "low_confidence", confidence: 0 });
  });

  it("clamps out of range scores", async () => {
    const { subject } = validator({ score: 1.4, contradiction: false, reason: null });
    expect((await subject.validate(payload, provenance, context)).confidence).toBe(1);
  });

  it("sends at most maxInferenceChars of text to the model", async () => {
    const { subject, inference } = validator({ score: 0.9, contradiction: false, reason: null }, 14);
    await subject.validate(payload, provenance, context);
    expect(inference.calls[0].text).toBe("Tidal Patterns");
  });

  it("normalizes plain text payloads", () => {
    const { subject } = validator({ score: 0.9, contradiction: false, reason: null });
    expect(subject.normalize({ contentType: "text/plain", body: "  first   line \n\n second\tline  " })).toBe(
      "first line\nsecond line",
    );
  });
});
