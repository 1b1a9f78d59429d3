import type { BlockKind, HeadingLevel, TextRange } from "../../shared/types";
import { INDENT_WIDTH } from "../../shared/constants";

/**
 * Result of classifying one line on its own. All ranges are relative to the
 * start of the line.
 */
export interface LineClassification {
  kind: BlockKind;
  indent: number;
  /** Block syntax to hide or dim, excluding list indentation. */
  marker: TextRange | null;
  /** Where inline content starts; equals the line length when there is none. */
  contentStart: number;
  /** The `[ ]` / `[x]` box of a checklist item. */
  checkbox: TextRange | null;
}

const HEADING_RE = /^(#{1,6})(?= |$)/;
const BLOCKQUOTE_RE = /^\s*(?:>\s*)+/;
const RULE_RE = /^(?:\*{3,}|-{3,}|_{3,})$/;
const CHECKLIST_RE = /^(\s*)([-*+]\s+)\[([ xX])\]\s/;
const UNORDERED_RE = /^(\s*)[-*+]\s+/;
const ORDERED_RE = /^(\s*)(\d+)[.)]\s+/;
const FENCE_RE = /^```/;
const TABLE_SEPARATOR_RE = /^\|?(\s*:?-+:?\s*\|)+\s*:?-+:?\s*\|?$/;

/** Leading whitespace characters; tabs are not expanded. */
export function leadingWhitespace(text: string): number {
  let n = 0;
  while (n < text.length && (text[n] === " " || text[n] === "\t")) n++;
  return n;
}

export function indentLevel(text: string): number {
  return Math.floor(leadingWhitespace(text) / INDENT_WIDTH);
}

export function isFenceLine(text: string): boolean {
  return FENCE_RE.test(text);
}

export function isPipeLine(text: string): boolean {
  const t = text.trim();
  return t.length >= 2 && t.startsWith("|") && t.endsWith("|");
}

export function isTableSeparatorLine(text: string): boolean {
  return TABLE_SEPARATOR_RE.test(text.trim());
}

const HEADING_LEVELS: readonly HeadingLevel[] = [1, 2, 3, 4, 5, 6];

function headingLevel(hashes: number): HeadingLevel | null {
  return HEADING_LEVELS.find((level) => level === hashes) ?? null;
}

function result(
  kind: BlockKind,
  indent: number,
  marker: TextRange | null,
  contentStart: number,
  checkbox: TextRange | null = null
): LineClassification {
  return { kind, indent, marker, contentStart, checkbox };
}

/**
 * Classify a single line by its text alone. Fences and tables need the whole
 * document and are resolved by `classifyDocument`.
 */
export function classifyLine(text: string): LineClassification {
  const indent = indentLevel(text);

  const heading = HEADING_RE.exec(text.trimEnd());
  if (heading) {
    const level = headingLevel(heading[1].length);
    if (level !== null) {
      const hashes = heading[1].length;
      const end = text[hashes] === " " ? hashes + 1 : hashes;
      return result({ type: "heading", level }, indent, { from: 0, to: end }, end);
    }
  }

  const quote = BLOCKQUOTE_RE.exec(text);
  if (quote) {
    const depth = quote[0].split(">").length - 1;
    const end = quote[0].length;
    return result({ type: "blockquote", depth }, indent, { from: 0, to: end }, end);
  }

  if (RULE_RE.test(text.trim())) {
    return result({ type: "horizontalRule" }, indent, { from: 0, to: text.length }, text.length);
  }

  const check = CHECKLIST_RE.exec(text);
  if (check) {
    const start = check[1].length;
    const boxFrom = start + check[2].length;
    const end = check[0].length;
    return result(
      { type: "checklistItem", checked: check[3] !== " ", indent },
      indent,
      { from: start, to: end },
      end,
      { from: boxFrom, to: boxFrom + 3 }
    );
  }

  const bullet = UNORDERED_RE.exec(text);
  if (bullet) {
    const end = bullet[0].length;
    return result(
      { type: "unorderedItem", indent },
      indent,
      { from: bullet[1].length, to: end },
      end
    );
  }

  const ordered = ORDERED_RE.exec(text);
  if (ordered) {
    const end = ordered[0].length;
    return result(
      { type: "orderedItem", number: Number.parseInt(ordered[2], 10), indent },
      indent,
      { from: ordered[1].length, to: end },
      end
    );
  }

  return result({ type: "paragraph" }, indent, null, 0);
}

export function isListKind(kind: BlockKind): boolean {
  return (
    kind.type === "unorderedItem" ||
    kind.type === "orderedItem" ||
    kind.type === "checklistItem"
  );
}
