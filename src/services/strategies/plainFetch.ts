import { Dispatcher, fetch } from "undici";
import type { StrategyCapabilities, StrategyRequest, StrategyResponse } from "./types";
import { toStrategyResponse } from "./http";

export interface PlainFetchOptions {
  dispatcher?: Dispatcher;
}

/** Direct HTTP request with the executor's randomized headers. */
export class PlainFetchStrategy {
  readonly kind = "plain" as const;
  readonly name = "plain-request";
  readonly cost = 1;
  readonly capabilities: StrategyCapabilities = { rendersContent: false, rotatesIdentity: false };

  constructor(private readonly options: PlainFetchOptions = {}) {}

  async attempt(request: StrategyRequest): Promise<StrategyResponse> {
    const response = await fetch(request.url, {
      method: "GET",
      redirect: "follow",
      headers: request.headers,
      signal: request.signal,
      dispatcher: this.options.dispatcher,
    });
    return toStrategyResponse(response, request);
  }
}
