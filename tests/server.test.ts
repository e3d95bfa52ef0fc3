import { randomUUID } from "node:crypto";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { FastifyInstance } from "fastify";
import { MockAgent } from "undici";
import { InferenceError } from "../src/errors";
import { buildServer } from "../src/server";
import type { Scheduler } from "../src/services/scheduler";
import { FakeInference, HTML, article, harness } from "./harness";

const auth = { "x-api-key": "test-key" };

class OfflineInference extends FakeInference {
  async analyze(): Promise<string> {
    throw new InferenceError("Inference request failed (503)", { status: 503 });
  }
}

describe("HTTP API", () => {
  let agent: MockAgent;
  let scheduler: Scheduler;
  let app: FastifyInstance;

  beforeEach(async () => {
    agent = new MockAgent();
    agent.disableNetConnect();
    scheduler = harness(agent).scheduler;
    app = await buildServer({ scheduler, inference: new FakeInference(0.9), apiKey: "test-key", logLevel: "silent" });
  });

  afterEach(async () => {
    await app.close();
    await scheduler.stop();
    await agent.close();
  });

  it("serves health checks without a key", async () => {
    const response = await app.inject({ method: "GET", url: "/healthz" });
    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ status: "ok", workers: 0, strategies: ["plain", "rendered", "proxy_rotated"] });
  });

  it("exposes prometheus metrics", async () => {
    const response = await app.inject({ method: "GET", url: "/metrics" });
    expect(response.statusCode).toBe(200);
    expect(response.body).toContain("research_fetch_tasks_total");
  });

  it("requires the api key elsewhere", async () => {
    const response = await app.inject({ method: "GET", url: "/research", headers: { "x-api-key": "wrong" } });
    expect(response.statusCode).toBe(401);
    expect(response.json()).toEqual({ statusCode: 401, error: "Unauthorized", message: "invalid api key" });
  });

  it("validates the task body", async () => {
    const response = await app.inject({ method: "POST", url: "/research", headers: auth, payload: {} });
    expect(response.statusCode).toBe(400);
    const body = response.json();
    expect(body.message).toBe("invalid request");
    expect(body.issues[0]).toEqual({ path: "query", message: "Required" });
  });

  it("reports tasks without a usable URL as bad requests", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/research",
      headers: auth,
      payload: { query: "tides", target_urls: ["not a url"] },
    });
    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({ statusCode: 400, error: "Bad Request", message: "no valid target URLs" });
  });

  it("accepts a task and reports its progress", async () => {
    agent.get("https://api-news.test").intercept({ path: "/tides", method: "GET" }).reply(200, article("Tides"), HTML);

    const created = await app.inject({
      method: "POST",
      url: "/research",
      headers: auth,
      payload: { query: "tides", target_urls: ["https://api-news.test/tides"] },
    });
    expect(created.statusCode).toBe(201);
    const { task_id: taskId, status, warnings } = created.json();
    expect(status).toBe("fetching");
    expect(warnings).toEqual([]);

    await scheduler.whenSettled(taskId);

    const detail = await app.inject({ method: "GET", url: `/research/${taskId}`, headers: auth });
    expect(detail.statusCode).toBe(200);
    const task = detail.json();
    expect(task).toMatchObject({
      task_id: taskId,
      query: "tides",
      status: "complete",
      cancel_requested: false,
      summary: { total_targets: 1, usable: 1, message: "1 of 1 targets usable" },
      warnings: [],
    });
    expect(task.jobs).toHaveLength(1);
    expect(task.jobs[0]).toMatchObject({
      target_url: "https://api-news.test/tides",
      state: "validated",
      delivery_status: "delivered",
      citation_id: `${taskId}#1`,
    });

    const attempts = await app.inject({
      method: "GET",
      url: `/research/${taskId}/jobs/${task.jobs[0].job_id}/attempts`,
      headers: auth,
    });
    expect(attempts.json().attempts).toHaveLength(1);
    expect(attempts.json().attempts[0]).toMatchObject({ attempt_number: 1, verdict: "success", strategy: "plain" });

    const list = await app.inject({ method: "GET", url: "/research?limit=5", headers: auth });
    expect(list.json().tasks.map((entry: { task_id: string }) => entry.task_id)).toEqual([taskId]);

    const cancel = await app.inject({ method: "POST", url: `/research/${taskId}/cancel`, headers: auth });
    expect(cancel.statusCode).toBe(400);
    expect(cancel.json().message).toBe("Task already complete");

    const budget = await app.inject({ method: "GET", url: "/domains/api-news.test/budget", headers: auth });
    expect(budget.json()).toMatchObject({ domain: "api-news.test", capacity: 100, refill_interval_ms: 1000 });
  });

  it("returns 404 for unknown tasks and jobs", async () => {
    const id = randomUUID();
    const task = await app.inject({ method: "GET", url: `/research/${id}`, headers: auth });
    expect(task.statusCode).toBe(404);
    expect(task.json()).toEqual({ statusCode: 404, error: "Not Found", message: "task not found" });

    const attempts = await app.inject({ method: "GET", url: `/research/${id}/jobs/${randomUUID()}/attempts`, headers: auth });
    expect(attempts.json().message).toBe("job not found");

    const cancel = await app.inject({ method: "POST", url: `/research/${id}/cancel`, headers: auth });
    expect(cancel.statusCode).toBe(404);
  });

  it("has no budget for domains never contacted", async () => {
    const response = await app.inject({ method: "GET", url: "/domains/quiet.test/budget", headers: auth });
    expect(response.statusCode).toBe(404);
    expect(response.json().message).toBe("no requests made to this domain yet");
  });

  it("rejects malformed task ids", async () => {
    const response = await app.inject({ method: "GET", url: "/research/not-a-uuid", headers: auth });
    expect(response.statusCode).toBe(400);
  });

  it("analyzes ad-hoc content", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/analyze",
      headers: auth,
      payload: { content: "Tides follow the moon." },
    });
    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ analysis: "Tides follow the moon." });
  });

  it("reports an unavailable model as a bad gateway", async () => {
    const offline = await buildServer({
      scheduler,
      inference: new OfflineInference(0.9),
      apiKey: "test-key",
      logLevel: "silent",
    });
    const response = await offline.inject({ method: "POST", url: "/analyze", headers: auth, payload: { content: "x" } });
    expect(response.statusCode).toBe(502);
    expect(response.json()).toEqual({
      statusCode: 502,
      error: "Bad Gateway",
      message: "inference collaborator unavailable",
    });
    await offline.close();
  });

  it("annotates a task and refuses to cancel one that already finished", async () => {
    agent.get("https://api-news.test").intercept({ path: "/moon", method: "GET" }).reply(200, article("Moon"), HTML);
    const submitted = await scheduler.submit("moon", ["https://api-news.test/moon"]);
    await scheduler.whenSettled(submitted.id);

    const annotated = await app.inject({
      method: "PATCH",
      url: `/research/${submitted.id}`,
      headers: auth,
      payload: { note: "  checked against the almanac  " },
    });
    expect(annotated.statusCode).toBe(200);
    expect(annotated.json()).toMatchObject({ task_id: submitted.id, status: "complete", notes: ["checked against the almanac"] });

    const cancel = await app.inject({
      method: "PATCH",
      url: `/research/${submitted.id}`,
      headers: auth,
      payload: { cancel: true },
    });
    expect(cancel.statusCode).toBe(400);
    expect(cancel.json()).toEqual({ statusCode: 400, error: "Bad Request", message: "Task already complete" });
  });

  it("rejects an empty update and unknown tasks", async () => {
    const id = randomUUID();
    const empty = await app.inject({ method: "PATCH", url: `/research/${id}`, headers: auth, payload: {} });
    expect(empty.statusCode).toBe(400);
    expect(empty.json().issues).toEqual([{ path: "", message: "nothing to update" }]);

    const missing = await app.inject({ method: "PATCH", url: `/research/${id}`, headers: auth, payload: { note: "hello" } });
    expect(missing.statusCode).toBe(404);
    expect(missing.json()).toEqual({ statusCode: 404, error: "Not Found", message: "task not found" });
  });
});
