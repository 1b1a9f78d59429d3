import type {
  ActiveRegion,
  Decoration,
  DecorationAction,
  InlineSpan,
  LineStyleTag,
  MarkStyleTag,
  TextRange,
  WidgetState,
} from "../../shared/types";
import { offsetSpans, scanInline } from "./inline";
import { classifyDocument, lineAt, splitLines, type ClassifiedLine } from "./regions";

/**
 * Collects decorations for one pass. Zero-length hides, marks and widgets are
 * dropped here; a line style may be empty since it addresses a whole line.
 */
class DecorationBuffer {
  readonly items: Decoration[] = [];

  private add(from: number, to: number, action: DecorationAction): void {
    if (to > from) this.items.push({ from, to, action });
  }

  hide(from: number, to: number): void {
    this.add(from, to, { type: "hide" });
  }

  mark(from: number, to: number, style: MarkStyleTag): void {
    this.add(from, to, { type: "mark", style });
  }

  widget(from: number, to: number, widget: WidgetState): void {
    this.add(from, to, { type: "widget", widget });
  }

  line(range: TextRange, style: LineStyleTag, indent = 0): void {
    this.items.push({ from: range.from, to: range.to, action: { type: "line", style, indent } });
  }
}

export function activeRegionFor(text: string, selection: TextRange): ActiveRegion {
  const lines = splitLines(text);
  const clamp = (n: number): number => Math.min(Math.max(n, 0), text.length);
  const start = lineAt(lines, clamp(Math.min(selection.from, selection.to)));
  const end = lineAt(lines, clamp(Math.max(selection.from, selection.to)));
  return { fromLine: start.number, toLine: end.number };
}

function isActive(region: ActiveRegion | null, lineNumber: number): boolean {
  return region !== null && lineNumber >= region.fromLine && lineNumber <= region.toLine;
}

/** Hide or dim a block marker depending on whether the line is being edited. */
function syntax(out: DecorationBuffer, from: number, to: number, active: boolean): void {
  if (active) out.mark(from, to, "syntax");
  else out.hide(from, to);
}

function pipes(out: DecorationBuffer, cl: ClassifiedLine): void {
  const { text, from } = cl.line;
  for (let i = text.indexOf("|"); i !== -1; i = text.indexOf("|", i + 1)) {
    out.mark(from + i, from + i + 1, "table-pipe");
  }
}

function blockDecorations(out: DecorationBuffer, cl: ClassifiedLine, active: boolean): void {
  const { kind, line } = cl;
  const marker = cl.marker
    ? { from: line.from + cl.marker.from, to: line.from + cl.marker.to }
    : null;

  switch (kind.type) {
    case "paragraph":
      out.line(line, "paragraph");
      return;
    case "heading":
      out.line(line, `heading-${kind.level}`);
      if (marker) syntax(out, marker.from, marker.to, active);
      return;
    case "blockquote":
      out.line(line, "blockquote");
      if (marker) syntax(out, marker.from, marker.to, active);
      return;
    case "horizontalRule":
      out.line(line, "horizontal-rule");
      if (active) out.mark(line.from, line.to, "syntax");
      else out.widget(line.from, line.to, { kind: "rule" });
      return;
    case "unorderedItem":
    case "orderedItem":
    case "checklistItem": {
      if (!marker) return;
      const style: LineStyleTag =
        kind.type !== "checklistItem"
          ? "list-item"
          : kind.checked
            ? "checklist-item-checked"
            : "checklist-item";
      out.line(line, style, kind.indent);
      if (!active) out.hide(line.from, marker.from);
      if (active || kind.type === "orderedItem") {
        out.mark(marker.from, marker.to, "list-marker");
      } else if (kind.type === "checklistItem") {
        out.widget(marker.from, marker.to, { kind: "checkbox", checked: kind.checked, indent: kind.indent });
      } else {
        out.widget(marker.from, marker.to, { kind: "bullet", indent: kind.indent });
      }
      return;
    }
    case "codeFenceBoundary":
      out.line(line, "code-fence");
      out.mark(line.from, line.to, "code-fence-text");
      return;
    case "codeFenceBody":
      out.line(line, "code-block");
      return;
    case "tableHeader":
      out.line(line, "table-header");
      pipes(out, cl);
      return;
    case "tableRow":
      out.line(line, "table-row");
      pipes(out, cl);
      return;
    case "tableSeparator":
      out.line(line, "table-separator");
      if (active) out.mark(line.from, line.to, "syntax");
      return;
  }
}

function hasInlineContent(cl: ClassifiedLine): boolean {
  switch (cl.kind.type) {
    case "paragraph":
    case "heading":
    case "blockquote":
    case "unorderedItem":
    case "orderedItem":
    case "checklistItem":
      return true;
    default:
      return false;
  }
}

function spanDecorations(out: DecorationBuffer, span: InlineSpan, active: boolean): void {
  const { range, content, url } = span;
  syntax(out, range.from, content.from, active);
  out.mark(content.from, content.to, span.kind);
  if (active && url) {
    out.mark(content.to, url.from, "syntax");
    out.mark(url.from, url.to, "url");
    out.mark(url.to, range.to, "syntax");
  } else {
    syntax(out, content.to, range.to, active);
  }
}

function compareDecorations(a: Decoration, b: Decoration): number {
  if (a.from !== b.from) return a.from - b.from;
  const aLine = a.action.type === "line";
  const bLine = b.action.type === "line";
  if (aLine !== bLine) return aLine ? -1 : 1;
  return a.to - b.to;
}

/**
 * Sort, then keep each non-line decoration only if it starts at or after the
 * end of the last one kept. Line styles always survive.
 */
export function resolveConflicts(decorations: Decoration[]): Decoration[] {
  const kept: Decoration[] = [];
  let end = -1;
  for (const d of [...decorations].sort(compareDecorations)) {
    if (d.action.type === "line") {
      kept.push(d);
    } else if (d.from >= end) {
      kept.push(d);
      end = d.to;
    }
  }
  return kept;
}

/**
 * Derive the full decoration set for a document snapshot. `region` is the
 * selection's line range, or null when nothing is being edited.
 */
export function buildDecorations(text: string, region: ActiveRegion | null): Decoration[] {
  const out = new DecorationBuffer();
  for (const cl of classifyDocument(text)) {
    const active = isActive(region, cl.line.number);
    blockDecorations(out, cl, active);
    if (!hasInlineContent(cl)) continue;
    const start = cl.line.from + cl.contentStart;
    for (const span of offsetSpans(scanInline(cl.line.text.slice(cl.contentStart)), start)) {
      spanDecorations(out, span, active);
    }
  }
  return resolveConflicts(out.items);
}

/** The checkbox widget range under `offset`, if any. */
export function hitTestWidget(decorations: Decoration[], offset: number): TextRange | null {
  for (const d of decorations) {
    if (d.from > offset) break;
    if (d.action.type === "widget" && d.action.widget.kind === "checkbox" && offset < d.to) {
      return { from: d.from, to: d.to };
    }
  }
  return null;
}
