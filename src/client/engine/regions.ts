import type { BlockKind, Line } from "../../shared/types";
import {
  classifyLine,
  indentLevel,
  isFenceLine,
  isPipeLine,
  isTableSeparatorLine,
  type LineClassification,
} from "./classify";

export type RegionRole =
  | "fenceBoundary"
  | "fenceBody"
  | "tableHeader"
  | "tableSeparator"
  | "tableRow";

/** Table role while scanning; `pending` lines are demoted unless a separator follows. */
type TableRole = "pending" | "header" | "separator" | "row";

export interface ClassifiedLine extends LineClassification {
  line: Line;
}

export function splitLines(text: string): Line[] {
  const lines: Line[] = [];
  let from = 0;
  let number = 1;
  for (;;) {
    const nl = text.indexOf("\n", from);
    const to = nl === -1 ? text.length : nl;
    lines.push({ number, from, to, text: text.slice(from, to) });
    if (nl === -1) return lines;
    from = nl + 1;
    number++;
  }
}

/** The line containing `offset`, clamped into the document. */
export function lineAt(lines: Line[], offset: number): Line {
  let lo = 0;
  let hi = lines.length - 1;
  while (lo < hi) {
    const mid = (lo + hi + 1) >>> 1;
    if (lines[mid].from <= offset) lo = mid;
    else hi = mid - 1;
  }
  return lines[lo];
}

function detectFences(lines: Line[], roles: Map<number, RegionRole>): void {
  let open: number | null = null;
  for (const line of lines) {
    if (isFenceLine(line.text)) {
      roles.set(line.number, "fenceBoundary");
      open = open === null ? line.number : null;
    } else if (open !== null) {
      roles.set(line.number, "fenceBody");
    }
  }
}

function detectTables(lines: Line[], roles: Map<number, RegionRole>): void {
  const table = new Map<number, TableRole>();
  for (const line of lines) {
    if (roles.has(line.number)) continue;
    const prev = table.get(line.number - 1);
    const separator = isTableSeparatorLine(line.text);
    if (separator && prev === "pending") {
      table.set(line.number - 1, "header");
      table.set(line.number, "separator");
    } else if (separator || isPipeLine(line.text)) {
      table.set(line.number, prev === "separator" || prev === "row" ? "row" : "pending");
    }
  }
  for (const [number, role] of table) {
    if (role === "header") roles.set(number, "tableHeader");
    else if (role === "separator") roles.set(number, "tableSeparator");
    else if (role === "row") roles.set(number, "tableRow");
  }
}

/**
 * Whole-document pass for multi-line structures. Fences are resolved first and
 * their lines never take part in tables. An unclosed fence runs to the end.
 */
export function detectRegions(lines: Line[]): Map<number, RegionRole> {
  const roles = new Map<number, RegionRole>();
  detectFences(lines, roles);
  detectTables(lines, roles);
  return roles;
}

function regionKind(role: RegionRole): BlockKind {
  switch (role) {
    case "fenceBoundary":
      return { type: "codeFenceBoundary" };
    case "fenceBody":
      return { type: "codeFenceBody" };
    case "tableHeader":
      return { type: "tableHeader" };
    case "tableSeparator":
      return { type: "tableSeparator" };
    case "tableRow":
      return { type: "tableRow" };
  }
}

/** Final block kind of every line: region roles override the per-line classifier. */
export function classifyDocument(text: string): ClassifiedLine[] {
  const lines = splitLines(text);
  const roles = detectRegions(lines);
  return lines.map((line) => {
    const role = roles.get(line.number);
    if (role === undefined) return { line, ...classifyLine(line.text) };
    return {
      line,
      kind: regionKind(role),
      indent: indentLevel(line.text),
      marker: null,
      contentStart: line.text.length,
      checkbox: null,
    };
  });
}
