import type { Response } from "undici";
import type { StrategyRequest, StrategyResponse } from "./types";

export interface CappedBody {
  text: string;
  truncated: boolean;
}

export function headersToRecord(headers: Iterable<[string, string]>): Record<string, string> {
  const record: Record<string, string> = {};
  for (const [key, value] of headers) {
    record[key.toLowerCase()] = value;
  }
  return record;
}

/** Decodes at most `maxBytes`, never splitting a multi-byte character. */
export function utf8Prefix(bytes: Buffer, maxBytes: number): string {
  if (bytes.length <= maxBytes) {
    return bytes.toString("utf8");
  }
  let end = maxBytes;
  while (end > 0 && (bytes[end] & 0xc0) === 0x80) {
    end -= 1;
  }
  return bytes.subarray(0, end).toString("utf8");
}

export function truncateBody(body: string, maxBytes: number) {
  return utf8Prefix(Buffer.from(body, "utf8"), maxBytes);
}

/** Reads the body chunk by chunk and cancels the stream once `maxBytes` arrived. */
export async function readCappedBody(response: Response, maxBytes: number): Promise<CappedBody> {
  if (!response.body) {
    return { text: "", truncated: false };
  }
  const reader = response.body.getReader();
  const chunks: Buffer[] = [];
  let received = 0;
  let truncated = false;
  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) {
        break;
      }
      if (!(value instanceof Uint8Array)) {
        continue;
      }
      chunks.push(Buffer.from(value.buffer, value.byteOffset, value.byteLength));
      received += value.byteLength;
      if (received > maxBytes) {
        truncated = true;
        await reader.cancel();
        break;
      }
    }
  } finally {
    reader.releaseLock();
  }
  return { text: utf8Prefix(Buffer.concat(chunks, received), maxBytes), truncated };
}

export async function toStrategyResponse(response: Response, request: StrategyRequest): Promise<StrategyResponse> {
  const body = await readCappedBody(response, request.maxBodyBytes);
  return {
    status: response.status,
    finalUrl: response.url || request.url,
    contentType: (response.headers.get("content-type") ?? "").toLowerCase(),
    headers: headersToRecord(response.headers.entries()),
    body: body.text,
  };
}
