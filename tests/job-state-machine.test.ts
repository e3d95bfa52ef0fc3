import { describe, expect, it } from "vitest";
import { InvalidTransitionError } from "../src/errors";
import { canTransition, isRecoverable, recoverJob, transition } from "../src/services/jobStateMachine";
import { makeJob } from "./fixtures";

const LATER = "2026-01-01T00:05:00.000Z";

describe("job state machine", () => {
  it("allows the fetch, escalate and validate paths", () => {
    expect(canTransition("pending", "in_flight")).toBe(true);
    expect(canTransition("in_flight", "failed")).toBe(true);
    expect(canTransition("failed", "escalated")).toBe(true);
    expect(canTransition("escalated", "pending")).toBe(true);
    expect(canTransition("succeeded", "validating")).toBe(true);
    expect(canTransition("validating", "validated")).toBe(true);
  });

  it("keeps terminal states terminal", () => {
    for (const state of ["validated", "rejected", "abandoned"] as const) {
      expect(canTransition(state, "pending")).toBe(false);
      expect(isRecoverable(state)).toBe(false);
    }
    expect(canTransition("in_flight", "validated")).toBe(false);
  });

  it("stamps the transition time and applies the patch", () => {
    const job = transition(makeJob(), "in_flight", LATER, { attempt_count: 1 });
    expect(job).toMatchObject({ state: "in_flight", attempt_count: 1, updated_at: LATER });
  });

  it("rejects illegal transitions", () => {
    expect(() => transition(makeJob(), "validated", LATER)).toThrow(InvalidTransitionError);
    expect(() => transition(makeJob(), "validated", LATER)).toThrow("Illegal job transition pending -> validated");
  });

  it("never lowers the strategy index", () => {
    const job = makeJob({ state: "failed", strategy_index: 2 });
    expect(() => transition(job, "escalated", LATER, { strategy_index: 1 })).toThrow(
      "Illegal job transition strategy 2 -> strategy 1",
    );
  });

  it("recovers interrupted jobs to pending", () => {
    const job = recoverJob(makeJob({ state: "in_flight", next_eligible_at: LATER }), LATER);
    expect(job).toMatchObject({ state: "pending", next_eligible_at: null, updated_at: LATER });
    expect(() => recoverJob(makeJob({ state: "rejected" }), LATER)).toThrow(InvalidTransitionError);
  });
});
