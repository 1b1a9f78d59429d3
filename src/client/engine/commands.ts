import type {
  CommandResult,
  CursorContext,
  EditCommand,
  TextChange,
  TextRange,
} from "../../shared/types";
import { INDENT_WIDTH } from "../../shared/constants";
import { isListKind, leadingWhitespace } from "./classify";
import { classifyDocument, lineAt, type ClassifiedLine } from "./regions";

const NOT_HANDLED: CommandResult = { type: "notHandled" };
const INDENT = " ".repeat(INDENT_WIDTH);

function applyChange(ctx: CursorContext, change: TextChange, selection: TextRange): CommandResult {
  const text = ctx.text.slice(0, change.from) + change.insert + ctx.text.slice(change.to);
  return { type: "handled", text, selection, change };
}

function inDocument(ctx: CursorContext, range: TextRange): boolean {
  return range.from >= 0 && range.to >= range.from && range.to <= ctx.text.length;
}

function lineAtCursor(ctx: CursorContext, offset: number): ClassifiedLine {
  const lines = classifyDocument(ctx.text);
  const { number } = lineAt(
    lines.map((cl) => cl.line),
    offset
  );
  return lines[number - 1];
}

/** Marker for the item after `cl`: same indent and bullet, next number, unchecked box. */
function continuedMarker(cl: ClassifiedLine): string | null {
  const { kind, line, marker, checkbox } = cl;
  if (!marker) return null;
  switch (kind.type) {
    case "unorderedItem":
      return line.text.slice(0, marker.to);
    case "checklistItem":
      return checkbox ? line.text.slice(0, checkbox.from) + "[ ] " : null;
    case "orderedItem": {
      const digits = /^\d+/.exec(line.text.slice(marker.from));
      if (!digits) return null;
      return (
        line.text.slice(0, marker.from) +
        String(kind.number + 1) +
        line.text.slice(marker.from + digits[0].length, marker.to)
      );
    }
    default:
      return null;
  }
}

function enter(ctx: CursorContext): CommandResult {
  const { from, to } = ctx.selection;
  if (from !== to) return NOT_HANDLED;
  const cl = lineAtCursor(ctx, from);
  if (!isListKind(cl.kind)) return NOT_HANDLED;
  const { line } = cl;

  if (line.text.slice(cl.contentStart).trim() === "") {
    // Leaving the list: the empty item goes away together with its line break.
    const end = line.to < ctx.text.length ? line.to + 1 : line.to;
    return applyChange(
      ctx,
      { from: line.from, to: end, insert: "" },
      { from: line.from, to: line.from }
    );
  }

  const marker = continuedMarker(cl);
  if (marker === null) return NOT_HANDLED;
  const insert = "\n" + marker;
  const cursor = from + insert.length;
  return applyChange(ctx, { from, to: from, insert }, { from: cursor, to: cursor });
}

function shift(offset: number, lineFrom: number, delta: number): number {
  if (offset < lineFrom) return offset;
  return Math.max(lineFrom, offset + delta);
}

function indent(ctx: CursorContext, direction: 1 | -1): CommandResult {
  const cl = lineAtCursor(ctx, ctx.selection.from);
  if (!isListKind(cl.kind)) return NOT_HANDLED;
  const { line } = cl;

  const removable = Math.min(INDENT_WIDTH, leadingWhitespace(line.text));
  const change: TextChange =
    direction === 1
      ? { from: line.from, to: line.from, insert: INDENT }
      : { from: line.from, to: line.from + removable, insert: "" };
  const delta = direction === 1 ? INDENT_WIDTH : -removable;
  return applyChange(ctx, change, {
    from: shift(ctx.selection.from, line.from, delta),
    to: shift(ctx.selection.to, line.from, delta),
  });
}

/**
 * Structural key handling for list lines. Anything else is left to the
 * editor's default behaviour.
 */
export function handleCommand(command: EditCommand, ctx: CursorContext): CommandResult {
  if (!inDocument(ctx, ctx.selection)) return NOT_HANDLED;
  switch (command) {
    case "enter":
      return enter(ctx);
    case "tab":
      return indent(ctx, 1);
    case "shiftTab":
      return indent(ctx, -1);
  }
}

/**
 * Flip the checklist box inside a widget range reported by `hitTestWidget`.
 * A range that no longer lines up with a checklist marker is ignored.
 */
export function toggleCheckbox(ctx: CursorContext, range: TextRange): CommandResult {
  if (!inDocument(ctx, range)) return NOT_HANDLED;
  const cl = lineAtCursor(ctx, range.from);
  if (cl.kind.type !== "checklistItem" || !cl.checkbox) return NOT_HANDLED;

  const box = cl.line.from + cl.checkbox.from;
  if (range.from > box || range.to < box + 3) return NOT_HANDLED;
  return applyChange(
    ctx,
    { from: box + 1, to: box + 2, insert: cl.kind.checked ? " " : "x" },
    ctx.selection
  );
}
