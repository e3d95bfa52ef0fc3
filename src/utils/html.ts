const DROP_BLOCKS_RE = /<(script|style|noscript|template|svg|iframe|canvas)\b[^>]*>[\s\S]*?<\/\1>/gi;
const BOILERPLATE_RE = /<(nav|header|footer|aside|form|menu)\b[^>]*>[\s\S]*?<\/\1>/gi;
const COMMENT_RE = /<!--[\s\S]*?-->/g;
const BLOCK_BREAK_RE = /<\/?(p|div|br|li|h[1-6]|tr|section|article|blockquote|pre)\b[^>]*>/gi;
const TAG_RE = /<[^>]+>/g;
const TITLE_RE = /<title[^>]*>([\s\S]*?)<\/title>/i;
const MAIN_RE = /<(article|main)\b[^>]*>([\s\S]*?)<\/\1>/gi;

const NAMED_ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
  nbsp: " ",
  ndash: "-",
  mdash: "-",
  hellip: "...",
  rsquo: "'",
  lsquo: "'",
  rdquo: '"',
  ldquo: '"',
};

export function decodeEntities(text: string) {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, entity: string) => {
    if (entity[0] === "#") {
      const code = entity[1] === "x" || entity[1] === "X" ? parseInt(entity.slice(2), 16) : parseInt(entity.slice(1), 10);
      return Number.isFinite(code) && code > 0 && code <= 0x10ffff ? String.fromCodePoint(code) : match;
    }
    return NAMED_ENTITIES[entity.toLowerCase()] ?? match;
  });
}

export function collapseWhitespace(text: string) {
  return text
    .split("\n")
    .map((line) => line.replace(/[ \t\f\v\r]+/g, " ").trim())
    .filter(Boolean)
    .join("\n");
}

export function extractTitle(html: string): string | null {
  const match = html.match(TITLE_RE);
  if (!match) {
    return null;
  }
  const title = decodeEntities(match[1]).replace(/\s+/g, " ").trim();
  return title || null;
}

function toText(fragment: string) {
  return collapseWhitespace(decodeEntities(fragment.replace(BLOCK_BREAK_RE, "\n").replace(TAG_RE, " ")));
}

/**
 * Main readable text of an HTML document: boilerplate regions dropped, the
 * longest <article>/<main> region preferred when present.
 */
export function extractMainText(html: string): string {
  const cleaned = html.replace(COMMENT_RE, " ").replace(DROP_BLOCKS_RE, " ");
  let best = "";
  for (const match of cleaned.matchAll(MAIN_RE)) {
    const candidate = toText(match[2].replace(BOILERPLATE_RE, " "));
    if (candidate.length > best.length) {
      best = candidate;
    }
  }
  if (best) {
    return best;
  }
  return toText(cleaned.replace(BOILERPLATE_RE, " "));
}

export function looksLikeHtml(contentType: string, body: string) {
  if (contentType.includes("html") || contentType.includes("xml")) {
    return true;
  }
  return /^\s*(<!doctype html|<html|<head|<body)/i.test(body);
}

/** Plain-text view of a payload regardless of its media type. */
export function payloadText(contentType: string, body: string) {
  if (looksLikeHtml(contentType, body)) {
    return extractMainText(body);
  }
  return collapseWhitespace(body);
}
