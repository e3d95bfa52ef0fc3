import { Dispatcher, fetch } from "undici";
import { z } from "zod";
import type { StrategyCapabilities, StrategyRequest, StrategyResponse } from "./types";
import { headersToRecord, readCappedBody, truncateBody } from "./http";

export interface RenderedFetchOptions {
  /** Rendering service endpoint that loads the page in a headless browser. */
  endpoint: string;
  apiKey?: string;
  dispatcher?: Dispatcher;
}

// JSON escaping can double the page size; the rest is the envelope.
const ENVELOPE_ALLOWANCE_BYTES = 64 * 1024;

const renderResponseSchema = z.object({
  url: z.string().optional(),
  statusCode: z.number().int().optional(),
  contentType: z.string().optional(),
  headers: z.record(z.string()).optional(),
  content: z.string().optional(),
  error: z.string().optional(),
});

/**
 * Delegates the page load to a browser rendering service, so script-built
 * documents arrive fully rendered.
 */
export class RenderedFetchStrategy {
  readonly kind = "rendered" as const;
  readonly name = "rendered-browser";
  readonly cost = 3;
  readonly capabilities: StrategyCapabilities = { rendersContent: true, rotatesIdentity: false };

  constructor(private readonly options: RenderedFetchOptions) {}

  async attempt(request: StrategyRequest): Promise<StrategyResponse> {
    const response = await fetch(this.options.endpoint, {
      method: "POST",
      headers: {
        "content-type": "application/json",
        ...(this.options.apiKey ? { "x-api-key": this.options.apiKey } : {}),
      },
      body: JSON.stringify({
        url: request.url,
        headers: request.headers,
        timeout_ms: request.timeoutMs,
        wait_until: "networkidle",
      }),
      signal: request.signal,
      dispatcher: this.options.dispatcher,
    });

    if (!response.ok) {
      throw new Error(`Renderer returned ${response.status}`);
    }

    const limit = request.maxBodyBytes * 2 + ENVELOPE_ALLOWANCE_BYTES;
    const envelope = await readCappedBody(response, limit);
    if (envelope.truncated) {
      throw new Error(`Renderer response exceeded ${limit} bytes`);
    }
    const data = renderResponseSchema.parse(JSON.parse(envelope.text));
    if (data.error) {
      throw new Error(`Renderer error: ${data.error}`);
    }
    const headers = headersToRecord(Object.entries(data.headers ?? {}));
    return {
      status: data.statusCode ?? 200,
      finalUrl: data.url ?? request.url,
      contentType: (data.contentType ?? headers["content-type"] ?? "text/html").toLowerCase(),
      headers,
      body: truncateBody(data.content ?? "", request.maxBodyBytes),
    };
  }
}
