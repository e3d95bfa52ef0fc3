import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { MockAgent } from "undici";
import { PayloadArchive, archiveKey } from "../src/services/payloadArchive";
import type { Scheduler } from "../src/services/scheduler";
import { StatusWebhook } from "../src/services/statusWebhook";
import type { ResearchTask } from "../src/types/research";
import { HTML, article, harness } from "./harness";

const task: ResearchTask = {
  id: "task-1",
  query: "tides",
  status: "complete",
  target_urls: ["https://news.test/article"],
  cancel_requested: false,
  deadline_at: null,
  summary: null,
  warnings: [],
  notes: [],
  created_at: "2026-01-01T00:00:00.000Z",
  updated_at: "2026-01-01T00:00:05.000Z",
  completed_at: "2026-01-01T00:00:05.000Z",
};

class RecordingArchive implements PayloadArchive {
  readonly keys: string[] = [];

  constructor(private readonly failing = false) {}

  async put(key: string) {
    if (this.failing) {
      throw new Error("bucket missing");
    }
    this.keys.push(key);
    return `memory://${key}`;
  }
}

describe("StatusWebhook", () => {
  let agent: MockAgent;
  let webhook: StatusWebhook;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
    webhook = new StatusWebhook({ url: "http://hooks.test/research", apiKey: "test-secret", dispatcher: agent });
  });

  afterEach(async () => {
    await agent.close();
  });

  it("reports delivery of a notification", async () => {
    agent.get("http://hooks.test").intercept({ path: "/research", method: "POST" }).reply(204, "");
    await expect(webhook.notify(task)).resolves.toBe(true);
  });

  it("swallows rejected and failed notifications", async () => {
    agent.get("http://hooks.test").intercept({ path: "/research", method: "POST" }).reply(500, "boom");
    await expect(webhook.notify(task)).resolves.toBe(false);

    agent.get("http://hooks.test").intercept({ path: "/research", method: "POST" }).replyWithError(new Error("refused"));
    await expect(webhook.notify(task)).resolves.toBe(false);
  });
});

describe("payload archive", () => {
  let agent: MockAgent;
  let scheduler: Scheduler | null;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
    scheduler = null;
  });

  afterEach(async () => {
    await scheduler?.stop();
    await agent.close();
  });

  it("builds zero-padded keys per attempt", () => {
    expect(archiveKey("task-1", "job-1", 7)).toBe("raw/task-1/job-1/007.html");
  });

  it("keeps the archived location on the attempt record", async () => {
    agent.get("https://archive.test").intercept({ path: "/", method: "GET" }).reply(200, article("Kept"), HTML);
    const archive = new RecordingArchive();
    const built = harness(agent, { archive });
    scheduler = built.scheduler;

    const submitted = await built.scheduler.submit("archive", ["https://archive.test/"]);
    await built.scheduler.whenSettled(submitted.id);
    const [job] = (await built.scheduler.getStatus(submitted.id))?.jobs ?? [];
    const [attempt] = await built.scheduler.listAttempts(job.id);

    expect(archive.keys).toEqual([`raw/${submitted.id}/${job.id}/001.html`]);
    expect(attempt.raw_storage_url).toBe(`memory://raw/${submitted.id}/${job.id}/001.html`);
  });

  it("still validates content when archiving fails", async () => {
    agent.get("https://archive.test").intercept({ path: "/", method: "GET" }).reply(200, article("Kept"), HTML);
    const built = harness(agent, { archive: new RecordingArchive(true) });
    scheduler = built.scheduler;

    const submitted = await built.scheduler.submit("archive", ["https://archive.test/"]);
    const settled = await built.scheduler.whenSettled(submitted.id);
    const [job] = (await built.scheduler.getStatus(submitted.id))?.jobs ?? [];

    expect(settled?.status).toBe("complete");
    expect((await built.scheduler.listAttempts(job.id))[0].raw_storage_url).toBeNull();
  });
});
