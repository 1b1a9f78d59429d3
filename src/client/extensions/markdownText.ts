import type { JSONContent } from "@tiptap/core";
import { Fragment, Slice, type Node as ProseMirrorNode, type Schema } from "@tiptap/pm/model";
import {
  TextSelection,
  type EditorState,
  type Selection,
  type Transaction,
} from "@tiptap/pm/state";
import type { TextChange, TextRange } from "../../shared/types";

/** The part of an EditorView that edit commands need. */
export interface DispatchTarget {
  readonly state: EditorState;
  dispatch(tr: Transaction): void;
}

/**
 * The editor document is a flat list of paragraphs, one per Markdown line, so
 * line `i` (0-based) starting at text offset `s` begins at ProseMirror
 * position `s + i + 1`.
 */
interface LineSlot {
  /** Position before the paragraph node. */
  nodePos: number;
  /** Text offset of the line start. */
  lineStart: number;
  text: string;
}

function lineSlots(doc: ProseMirrorNode): LineSlot[] {
  const slots: LineSlot[] = [];
  let lineStart = 0;
  doc.forEach((node, nodePos) => {
    const text = node.textContent;
    slots.push({ nodePos, lineStart, text });
    lineStart += text.length + 1;
  });
  return slots;
}

function slotAt(slots: LineSlot[], offset: number): LineSlot {
  let lo = 0;
  let hi = slots.length - 1;
  while (lo < hi) {
    const mid = (lo + hi) >> 1;
    if (offset <= slots[mid].lineStart + slots[mid].text.length) hi = mid;
    else lo = mid + 1;
  }
  return slots[lo];
}

function slotAtPos(slots: LineSlot[], pos: number): LineSlot {
  let lo = 0;
  let hi = slots.length - 1;
  while (lo < hi) {
    const mid = (lo + hi) >> 1;
    if (pos < slots[mid].nodePos + slots[mid].text.length + 2) hi = mid;
    else lo = mid + 1;
  }
  return slots[lo];
}

function clamp(n: number, min: number, max: number): number {
  return Math.min(Math.max(n, min), max);
}

/**
 * Offset/position conversion for one document. Build it once per pass; each
 * lookup is a binary search over the line slots.
 */
export interface PositionMap {
  toPos(offset: number): number;
  toOffset(pos: number): number;
}

export function createPositionMap(doc: ProseMirrorNode): PositionMap {
  const slots = lineSlots(doc);
  return {
    toPos(offset) {
      const slot = slotAt(slots, offset);
      return slot.nodePos + 1 + clamp(offset - slot.lineStart, 0, slot.text.length);
    },
    toOffset(pos) {
      const slot = slotAtPos(slots, pos);
      return slot.lineStart + clamp(pos - slot.nodePos - 1, 0, slot.text.length);
    },
  };
}

export function docToMarkdown(doc: ProseMirrorNode): string {
  return lineSlots(doc)
    .map((slot) => slot.text)
    .join("\n");
}

export function markdownToContent(text: string): JSONContent {
  return {
    type: "doc",
    content: text
      .split("\n")
      .map((line) =>
        line ? { type: "paragraph", content: [{ type: "text", text: line }] } : { type: "paragraph" }
      ),
  };
}

export function offsetToPos(doc: ProseMirrorNode, offset: number): number {
  return createPositionMap(doc).toPos(offset);
}

export function posToOffset(doc: ProseMirrorNode, pos: number): number {
  return createPositionMap(doc).toOffset(pos);
}

export function selectionToRange(doc: ProseMirrorNode, selection: Selection): TextRange {
  const map = createPositionMap(doc);
  return { from: map.toOffset(selection.from), to: map.toOffset(selection.to) };
}

export function rangeToSelection(doc: ProseMirrorNode, range: TextRange): TextSelection {
  const map = createPositionMap(doc);
  return TextSelection.create(doc, map.toPos(range.from), map.toPos(range.to));
}

/**
 * Apply a text-level change by rebuilding the paragraphs it touches. Line
 * breaks in the inserted text become paragraph boundaries.
 */
export function applyTextChange(tr: Transaction, change: TextChange): Transaction {
  const { doc } = tr;
  const slots = lineSlots(doc);
  const first = slotAt(slots, change.from);
  const last = slotAt(slots, change.to);
  const lastNode = doc.nodeAt(last.nodePos);
  if (!lastNode) return tr;

  const text =
    first.text.slice(0, change.from - first.lineStart) +
    change.insert +
    last.text.slice(change.to - last.lineStart);
  const { schema } = doc.type;
  const paragraphs = text
    .split("\n")
    .map((line) => schema.nodes.paragraph.create(null, line ? schema.text(line) : null));
  return tr.replaceWith(first.nodePos, last.nodePos + lastNode.nodeSize, paragraphs);
}

/**
 * Plain text from the clipboard becomes one paragraph per line, blank lines
 * included. The slice is open on both sides so the first and last lines join
 * the paragraphs around the cursor.
 */
export function parseClipboardText(text: string, schema: Schema): Slice {
  const paragraphs = text
    .split(/\r\n?|\n/)
    .map((line) => schema.nodes.paragraph.create(null, line ? schema.text(line) : null));
  return new Slice(Fragment.from(paragraphs), 1, 1);
}

/** Copied content as Markdown text: one line per paragraph. */
export function serializeClipboardText(slice: Slice): string {
  return slice.content.textBetween(0, slice.content.size, "\n");
}
