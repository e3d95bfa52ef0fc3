import { describe, expect, it, vi } from "vitest";
import { MockAgent } from "undici";
import {
  PlainFetchStrategy,
  ProxyRotatedFetchStrategy,
  RenderedFetchStrategy,
  StrategyRegistry,
  buildStrategyRegistry,
} from "../src/services/strategies";

describe("StrategyRegistry", () => {
  it("orders strategies by cost regardless of registration order", () => {
    const registry = new StrategyRegistry([
      new ProxyRotatedFetchStrategy(),
      new PlainFetchStrategy(),
      new RenderedFetchStrategy({ endpoint: "http://renderer.test/render" }),
    ]);
    expect(registry.strategies().map((strategy) => strategy.kind)).toEqual(["plain", "rendered", "proxy_rotated"]);
    expect(registry.indexOf("rendered")).toBe(1);
  });

  it("only escalates forward and stops at the strongest strategy", () => {
    const registry = buildStrategyRegistry({
      renderer: { url: "http://renderer.test/render" },
      proxies: ["http://proxy-a.test:8080"],
    });
    expect(registry.next(0)?.index).toBe(1);
    expect(registry.next(1)?.strategy.kind).toBe("proxy_rotated");
    expect(registry.next(2)).toBeNull();
    expect(() => registry.at(3)).toThrow(RangeError);
  });

  it("registers only the strategies whose collaborators are configured", () => {
    expect(buildStrategyRegistry({ proxies: [] }).describe()).toEqual([
      {
        kind: "plain",
        name: "plain-request",
        cost: 1,
        capabilities: { rendersContent: false, rotatesIdentity: false },
      },
    ]);
    const withProxies = buildStrategyRegistry({ proxies: ["http://proxy-a.test:8080"] });
    expect(withProxies.strategies().map((strategy) => strategy.kind)).toEqual(["plain", "proxy_rotated"]);
    expect(withProxies.indexOf("rendered")).toBe(-1);
  });

  it("rejects duplicate kinds and empty catalogs", () => {
    expect(() => new StrategyRegistry([])).toThrow("Strategy registry needs at least one strategy");
    expect(() => new StrategyRegistry([new PlainFetchStrategy(), new PlainFetchStrategy()])).toThrow(
      "Duplicate strategy kind plain",
    );
  });

  it("closes the proxy connection pools it opened", async () => {
    const agent = new MockAgent();
    agent.disableNetConnect();
    agent.get("https://news.test").intercept({ path: "/article", method: "GET" }).reply(200, "ok");
    const close = vi.spyOn(agent, "close");
    const registry = new StrategyRegistry([new PlainFetchStrategy(), new ProxyRotatedFetchStrategy({ createDispatcher: () => agent })]);

    await registry.at(1).attempt({
      url: "https://news.test/article",
      headers: {},
      signal: new AbortController().signal,
      timeoutMs: 1000,
      maxBodyBytes: 1024,
      proxyUrl: "http://proxy-a.test:8080",
    });
    await registry.close();
    await registry.close();

    expect(close).toHaveBeenCalledTimes(1);
  });
});
