import { Dispatcher, ProxyAgent, fetch } from "undici";
import type { DispatcherFactory, StrategyCapabilities, StrategyRequest, StrategyResponse } from "./types";
import { toStrategyResponse } from "./http";

export interface ProxyRotatedFetchOptions {
  createDispatcher?: DispatcherFactory;
}

/**
 * Plain request routed through the proxy the executor picked from the
 * anti-detection context. One dispatcher is kept per proxy URL.
 */
export class ProxyRotatedFetchStrategy {
  readonly kind = "proxy_rotated" as const;
  readonly name = "proxy-rotated-request";
  readonly cost = 5;
  readonly capabilities: StrategyCapabilities = { rendersContent: false, rotatesIdentity: true };

  private readonly dispatchers = new Map<string, Dispatcher>();
  private readonly createDispatcher: DispatcherFactory;

  constructor(options: ProxyRotatedFetchOptions = {}) {
    this.createDispatcher = options.createDispatcher ?? ((proxyUrl) => new ProxyAgent(proxyUrl));
  }

  async attempt(request: StrategyRequest): Promise<StrategyResponse> {
    if (!request.proxyUrl) {
      throw new Error("proxy-rotated strategy requires a proxy assignment");
    }
    const response = await fetch(request.url, {
      method: "GET",
      redirect: "follow",
      headers: request.headers,
      signal: request.signal,
      dispatcher: this.dispatcherFor(request.proxyUrl),
    });
    return toStrategyResponse(response, request);
  }

  async close() {
    const dispatchers = [...this.dispatchers.values()];
    this.dispatchers.clear();
    await Promise.all(dispatchers.map((dispatcher) => dispatcher.close()));
  }

  private dispatcherFor(proxyUrl: string) {
    let dispatcher = this.dispatchers.get(proxyUrl);
    if (!dispatcher) {
      dispatcher = this.createDispatcher(proxyUrl);
      this.dispatchers.set(proxyUrl, dispatcher);
    }
    return dispatcher;
  }
}
