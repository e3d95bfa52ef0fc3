import type { FetchStrategy } from "./strategies";

const USER_AGENTS = [
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/126.0.0.0 Safari/537.36",
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/126.0.0.0 Safari/537.36",
  "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/126.0.0.0 Safari/537.36",
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:127.0) Gecko/20100101 Firefox/127.0",
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.5 Safari/605.1.15",
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/126.0.0.0 Safari/537.36 Edg/126.0.0.0",
];

const ACCEPT_LANGUAGES = ["en-US,en;q=0.9", "en-GB,en;q=0.8", "en-US,en;q=0.8,de;q=0.5", "en;q=0.9"];

const ACCEPT_HTML = "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8";

export interface AntiDetectionOptions {
  jitter: { minMs: number; maxMs: number };
  proxies: string[];
  userAgents?: string[];
  acceptLanguages?: string[];
  random?: () => number;
}

/**
 * Process-lifetime anti-detection state: header pools, proxy rotation cursor
 * and the inter-action delay range. Owned by whoever builds the executor so
 * tests can swap in a fresh, seeded instance.
 */
export class AntiDetectionContext {
  private proxyCursor = 0;
  private readonly random: () => number;
  private readonly userAgents: string[];
  private readonly acceptLanguages: string[];

  constructor(private readonly options: AntiDetectionOptions) {
    this.random = options.random ?? Math.random;
    this.userAgents = options.userAgents?.length ? options.userAgents : USER_AGENTS;
    this.acceptLanguages = options.acceptLanguages?.length ? options.acceptLanguages : ACCEPT_LANGUAGES;
  }

  requestHeaders(): Record<string, string> {
    return {
      "user-agent": this.pick(this.userAgents),
      "accept-language": this.pick(this.acceptLanguages),
      accept: ACCEPT_HTML,
      "upgrade-insecure-requests": "1",
      "cache-control": this.random() < 0.5 ? "no-cache" : "max-age=0",
    };
  }

  interActionDelayMs(): number {
    const { minMs, maxMs } = this.options.jitter;
    return Math.floor(minMs + this.random() * Math.max(0, maxMs - minMs));
  }

  /** Round-robin over the pool; undefined when the strategy keeps its identity. */
  proxyFor(strategy: FetchStrategy): string | undefined {
    if (!strategy.capabilities.rotatesIdentity || !this.options.proxies.length) {
      return undefined;
    }
    const proxy = this.options.proxies[this.proxyCursor % this.options.proxies.length];
    this.proxyCursor += 1;
    return proxy;
  }

  private pick(values: string[]) {
    return values[Math.floor(this.random() * values.length) % values.length];
  }
}
