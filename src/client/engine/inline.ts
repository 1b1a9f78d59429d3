import type { InlineKind, InlineSpan } from "../../shared/types";

/**
 * One inline syntax. `re` is sticky so it only matches at the probed offset;
 * `build` turns a match at `at` into a span, or rejects it.
 */
interface InlinePattern {
  kind: InlineKind;
  lead: string;
  re: RegExp;
  build(match: RegExpExecArray, at: number, text: string): InlineSpan | null;
}

function delimited(kind: InlineKind, width: number) {
  return (match: RegExpExecArray, at: number): InlineSpan => {
    const to = at + match[0].length;
    return {
      kind,
      range: { from: at, to },
      content: { from: at + width, to: to - width },
    };
  };
}

/** `[text](url)` shape shared by links and images; `open` is `[` or `![`. */
function bracketed(kind: InlineKind, open: number) {
  return (match: RegExpExecArray, at: number): InlineSpan => {
    const to = at + match[0].length;
    const labelEnd = at + open + match[1].length;
    return {
      kind,
      range: { from: at, to },
      content: { from: at + open, to: labelEnd },
      url: { from: labelEnd + 2, to: to - 1 },
    };
  };
}

/**
 * Single-character emphasis is only valid when neither delimiter touches a
 * second copy of itself, so `*` inside `**bold**` is never emphasis.
 */
function emphasis(delimiter: string) {
  const build = delimited("emphasis", 1);
  return (match: RegExpExecArray, at: number, text: string): InlineSpan | null => {
    const end = at + match[0].length;
    if (at > 0 && text[at - 1] === delimiter) return null;
    if (text[end] === delimiter) return null;
    return build(match, at);
  };
}

/** Listed in priority order; an earlier pattern wins a tie on start and length. */
const PATTERNS: InlinePattern[] = [
  { kind: "code", lead: "`", re: /`([^`]+)`/y, build: delimited("code", 1) },
  { kind: "image", lead: "!", re: /!\[([^\]]*)\]\(([^)]+)\)/y, build: bracketed("image", 2) },
  { kind: "link", lead: "[", re: /\[([^\]]+)\]\(([^)]+)\)/y, build: bracketed("link", 1) },
  { kind: "strong", lead: "*", re: /\*\*([^\s*](?:.*?[^\s*])?)\*\*/y, build: delimited("strong", 2) },
  { kind: "strong", lead: "_", re: /__([^\s_](?:.*?[^\s_])?)__/y, build: delimited("strong", 2) },
  { kind: "emphasis", lead: "*", re: /\*([^\s*](?:[^*]*[^\s*])?)\*/y, build: emphasis("*") },
  { kind: "emphasis", lead: "_", re: /_([^\s_](?:[^_]*[^\s_])?)_/y, build: emphasis("_") },
  { kind: "strikethrough", lead: "~", re: /~~(.+?)~~/y, build: delimited("strikethrough", 2) },
];

function matchAt(pattern: InlinePattern, text: string, at: number): InlineSpan | null {
  pattern.re.lastIndex = at;
  const match = pattern.re.exec(text);
  return match ? pattern.build(match, at, text) : null;
}

/**
 * Scan one line's inline content left to right. At each unclaimed offset the
 * longest candidate wins (pattern order breaks ties) and scanning resumes after
 * it, so spans never overlap and a consumed delimiter is never reused.
 */
export function scanInline(text: string): InlineSpan[] {
  const spans: InlineSpan[] = [];
  let at = 0;
  while (at < text.length) {
    const ch = text[at];
    let best: InlineSpan | null = null;
    for (const pattern of PATTERNS) {
      if (pattern.lead !== ch) continue;
      const span = matchAt(pattern, text, at);
      if (span && (best === null || span.range.to > best.range.to)) best = span;
    }
    if (best) {
      spans.push(best);
      at = best.range.to;
    } else {
      at++;
    }
  }
  return spans;
}

/** Shift spans found in a line's content to document offsets. */
export function offsetSpans(spans: InlineSpan[], by: number): InlineSpan[] {
  return spans.map((span) => ({
    kind: span.kind,
    range: { from: span.range.from + by, to: span.range.to + by },
    content: { from: span.content.from + by, to: span.content.to + by },
    ...(span.url ? { url: { from: span.url.from + by, to: span.url.to + by } } : {}),
  }));
}
