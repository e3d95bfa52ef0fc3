import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ReadableStream } from "node:stream/web";
import { MockAgent, Response } from "undici";
import { AntiDetectionContext } from "../src/services/antiDetection";
import { FetchExecutor } from "../src/services/fetchExecutor";
import { RateLimitGrant } from "../src/services/rateLimiter";
import {
  FetchStrategy,
  PlainFetchStrategy,
  ProxyRotatedFetchStrategy,
  RenderedFetchStrategy,
} from "../src/services/strategies";
import { readCappedBody, truncateBody } from "../src/services/strategies/http";

const ARTICLE = "<html><head><title>Tides</title></head><body><article>Ocean tides follow the moon.</article></body></html>";

describe("AntiDetectionContext", () => {
  it("draws headers from the configured pools", () => {
    const context = new AntiDetectionContext({
      jitter: { minMs: 0, maxMs: 0 },
      proxies: [],
      userAgents: ["agent-a", "agent-b"],
      acceptLanguages: ["en-US", "de-DE"],
      random: () => 0.75,
    });
    expect(context.requestHeaders()).toEqual({
      "user-agent": "agent-b",
      "accept-language": "de-DE",
      accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
      "upgrade-insecure-requests": "1",
      "cache-control": "max-age=0",
    });
  });

  it("keeps inter-action delays inside the jitter range", () => {
    const low = new AntiDetectionContext({ jitter: { minMs: 100, maxMs: 300 }, proxies: [], random: () => 0 });
    const high = new AntiDetectionContext({ jitter: { minMs: 100, maxMs: 300 }, proxies: [], random: () => 0.999 });
    expect(low.interActionDelayMs()).toBe(100);
    expect(high.interActionDelayMs()).toBe(299);
  });

  it("rotates proxies only for identity-rotating strategies", () => {
    const context = new AntiDetectionContext({
      jitter: { minMs: 0, maxMs: 0 },
      proxies: ["http://proxy-a.test:8080", "http://proxy-b.test:8080"],
    });
    const proxied = new ProxyRotatedFetchStrategy();
    expect(context.proxyFor(new PlainFetchStrategy())).toBeUndefined();
    expect(context.proxyFor(proxied)).toBe("http://proxy-a.test:8080");
    expect(context.proxyFor(proxied)).toBe("http://proxy-b.test:8080");
    expect(context.proxyFor(proxied)).toBe("http://proxy-a.test:8080");
  });
});

describe("FetchExecutor", () => {
  let agent: MockAgent;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
  });

  afterEach(async () => {
    await agent.close();
  });

  function executor(proxies: string[] = []) {
    return new FetchExecutor({
      context: new AntiDetectionContext({ jitter: { minMs: 0, maxMs: 0 }, proxies, random: () => 0 }),
      maxBodyBytes: 1024,
      sleep: async () => undefined,
    });
  }

  function request(strategy: FetchStrategy, overrides: { timeoutMs?: number; grant?: RateLimitGrant } = {}) {
    return {
      jobId: "job-1",
      url: "https://news.test/article",
      strategy,
      strategyIndex: 0,
      grant: overrides.grant ?? new RateLimitGrant("news.test", 0),
      timeoutMs: overrides.timeoutMs ?? 1000,
    };
  }

  it("returns the response with randomized headers sent", async () => {
    agent
      .get("https://news.test")
      .intercept({ path: "/article", method: "GET", headers: { "accept-language": "en-US,en;q=0.9" } })
      .reply(200, ARTICLE, { headers: { "content-type": "text/html; charset=utf-8" } });

    const attempt = await executor().fetch(request(new PlainFetchStrategy({ dispatcher: agent })));

    expect(attempt.job_id).toBe("job-1");
    expect(attempt.strategy).toBe("plain");
    expect(attempt.outcome).toMatchObject({
      type: "response",
      status: 200,
      final_url: "https://news.test/article",
      content_type: "text/html; charset=utf-8",
      body: ARTICLE,
    });
  });

  it("truncates bodies to the configured size", async () => {
    agent
      .get("https://news.test")
      .intercept({ path: "/article", method: "GET" })
      .reply(200, "x".repeat(4096), { headers: { "content-type": "text/plain" } });

    const attempt = await executor().fetch(request(new PlainFetchStrategy({ dispatcher: agent })));
    expect(attempt.outcome.type === "response" && attempt.outcome.body.length).toBe(1024);
  });

  it("cuts an oversized body at a character boundary", async () => {
    agent
      .get("https://news.test")
      .intercept({ path: "/article", method: "GET" })
      .reply(200, `a${"é".repeat(2000)}`, { headers: { "content-type": "text/plain; charset=utf-8" } });

    const attempt = await executor().fetch(request(new PlainFetchStrategy({ dispatcher: agent })));
    expect(attempt.outcome.type === "response" && attempt.outcome.body).toBe(`a${"é".repeat(511)}`);
  });

  it("caps rendered content the same way", async () => {
    agent
      .get("http://renderer.test")
      .intercept({ path: "/render", method: "POST" })
      .reply(200, { statusCode: 200, contentType: "text/html", content: "y".repeat(3000) }, {
        headers: { "content-type": "application/json" },
      });

    const attempt = await executor().fetch(
      request(new RenderedFetchStrategy({ endpoint: "http://renderer.test/render", dispatcher: agent })),
    );
    expect(attempt.outcome.type === "response" && attempt.outcome.body).toBe("y".repeat(1024));
  });

  it("reports a timeout when the strategy does not answer in time", async () => {
    agent
      .get("https://news.test")
      .intercept({ path: "/article", method: "GET" })
      .reply(200, ARTICLE)
      .delay(300);

    const attempt = await executor().fetch(
      request(new PlainFetchStrategy({ dispatcher: agent }), { timeoutMs: 40 }),
    );
    expect(attempt.outcome).toEqual({ type: "timeout", timeout_ms: 40 });
  });

  it("turns transport failures into network errors", async () => {
    agent
      .get("https://news.test")
      .intercept({ path: "/article", method: "GET" })
      .replyWithError(new Error("socket hang up"));

    const attempt = await executor().fetch(request(new PlainFetchStrategy({ dispatcher: agent })));
    expect(attempt.outcome).toEqual({ type: "network_error", message: "fetch failed: socket hang up", code: null });
  });

  it("refuses to spend a grant twice", async () => {
    const grant = new RateLimitGrant("news.test", 0);
    grant.consume();

    const attempt = await executor().fetch(request(new PlainFetchStrategy({ dispatcher: agent }), { grant }));
    expect(attempt.outcome).toEqual({
      type: "network_error",
      message: "rate limit grant already consumed",
      code: "GRANT_REUSED",
    });
  });

  it("routes proxy-rotated attempts through the assigned proxy", async () => {
    const used: string[] = [];
    agent
      .get("https://news.test")
      .intercept({ path: "/article", method: "GET" })
      .reply(200, ARTICLE, { headers: { "content-type": "text/html" } });
    const strategy = new ProxyRotatedFetchStrategy({
      createDispatcher: (proxyUrl) => {
        used.push(proxyUrl);
        return agent;
      },
    });

    const attempt = await executor(["http://proxy-a.test:8080"]).fetch(request(strategy));
    expect(attempt.outcome.type).toBe("response");
    expect(used).toEqual(["http://proxy-a.test:8080"]);
  });

  it("fails a proxy-rotated attempt when no proxy is configured", async () => {
    const attempt = await executor().fetch(request(new ProxyRotatedFetchStrategy({ createDispatcher: () => agent })));
    expect(attempt.outcome).toEqual({
      type: "network_error",
      message: "proxy-rotated strategy requires a proxy assignment",
      code: null,
    });
  });

  it("maps the rendering service response onto the outcome", async () => {
    agent
      .get("http://renderer.test")
      .intercept({ path: "/render", method: "POST" })
      .reply(
        200,
        { url: "https://news.test/article?rendered=1", statusCode: 200, contentType: "Text/HTML", content: ARTICLE },
        { headers: { "content-type": "application/json" } },
      );
    const strategy = new RenderedFetchStrategy({ endpoint: "http://renderer.test/render", dispatcher: agent });

    const attempt = await executor().fetch(request(strategy));
    expect(attempt.outcome).toEqual({
      type: "response",
      status: 200,
      final_url: "https://news.test/article?rendered=1",
      content_type: "text/html",
      headers: {},
      body: ARTICLE,
    });
  });
});

describe("readCappedBody", () => {
  it("stops reading an endless body once the cap is reached", async () => {
    let pulls = 0;
    let cancelled = false;
    const endless = new ReadableStream<Uint8Array>({
      pull(controller) {
        pulls += 1;
        controller.enqueue(new Uint8Array(256).fill(0x78));
      },
      cancel() {
        cancelled = true;
      },
    });

    const body = await readCappedBody(new Response(endless), 1000);

    expect(body).toEqual({ text: "x".repeat(1000), truncated: true });
    expect(cancelled).toBe(true);
    expect(pulls).toBeLessThan(10);
  });

  it("returns short bodies whole", async () => {
    await expect(readCappedBody(new Response("short"), 1000)).resolves.toEqual({ text: "short", truncated: false });
  });

  it("never leaves half a character at the cut", () => {
    expect(truncateBody("€€", 4)).toBe("€");
    expect(truncateBody("€€", 6)).toBe("€€");
    expect(truncateBody("€", 2)).toBe("");
  });
});
