const ALLOWED_PROTOCOLS = new Set(["http:", "https:"]);

export function normalizeTargetUrl(raw: string): string | null {
  let parsed: URL;
  try {
    parsed = new URL(raw.trim());
  } catch {
    return null;
  }
  if (!ALLOWED_PROTOCOLS.has(parsed.protocol) || !parsed.hostname) {
    return null;
  }
  parsed.hash = "";
  return parsed.toString();
}

export function normalizeDomain(host: string): string {
  return host.trim().toLowerCase().replace(/\.$/, "").replace(/^www\./, "");
}

export function domainOf(url: string): string {
  return normalizeDomain(new URL(url).hostname);
}
