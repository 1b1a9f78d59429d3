import { describe, expect, it } from "vitest";
import { EditorState, TextSelection } from "@tiptap/pm/state";
import {
  applyTextChange,
  createPositionMap,
  docToMarkdown,
  offsetToPos,
  parseClipboardText,
  posToOffset,
  rangeToSelection,
  serializeClipboardText,
} from "./markdownText";
import { buildDecorationSet, lineClass } from "./markdownDecorations";
import { buildDecorations } from "../engine/decorations";
import { docOf, schema } from "./testEditor";

describe("document text", () => {
  it("joins paragraphs with line breaks, keeping empty lines", () => {
    const doc = docOf("a\n\nb");
    expect(doc.childCount).toBe(3);
    expect(docToMarkdown(doc)).toBe("a\n\nb");
  });

  it("maps text offsets to positions inside each paragraph", () => {
    const doc = docOf("a\nbc");
    expect(offsetToPos(doc, 0)).toBe(1);
    expect(offsetToPos(doc, 1)).toBe(2);
    expect(offsetToPos(doc, 2)).toBe(4);
    expect(offsetToPos(doc, 4)).toBe(6);
  });

  it("maps positions back to text offsets", () => {
    const doc = docOf("a\nbc");
    expect(posToOffset(doc, 1)).toBe(0);
    expect(posToOffset(doc, 2)).toBe(1);
    expect(posToOffset(doc, 4)).toBe(2);
    expect(posToOffset(doc, 6)).toBe(4);
  });

  it("converts both ways through a position map, across empty lines", () => {
    const map = createPositionMap(docOf("a\n\nbc"));
    expect(map.toPos(2)).toBe(4);
    expect(map.toPos(3)).toBe(6);
    expect(map.toOffset(4)).toBe(2);
    expect(map.toOffset(6)).toBe(3);
  });

  it("builds a text selection from offsets", () => {
    const selection = rangeToSelection(docOf("a\nbc"), { from: 1, to: 3 });
    expect(selection.from).toBe(2);
    expect(selection.to).toBe(5);
  });
});

describe("applyTextChange", () => {
  it("splits inserted line breaks into new paragraphs", () => {
    const state = EditorState.create({ doc: docOf("- a") });
    const tr = applyTextChange(state.tr, { from: 3, to: 3, insert: "\n- " });
    expect(tr.doc.childCount).toBe(2);
    expect(docToMarkdown(tr.doc)).toBe("- a\n- ");
  });

  it("joins paragraphs when a line break is removed", () => {
    const state = EditorState.create({ doc: docOf("a\nbc") });
    const tr = applyTextChange(state.tr, { from: 1, to: 3, insert: "" });
    expect(tr.doc.childCount).toBe(1);
    expect(docToMarkdown(tr.doc)).toBe("ac");
  });

  it("replaces characters within a line", () => {
    const state = EditorState.create({ doc: docOf("x\n- [ ] task") });
    const tr = applyTextChange(state.tr, { from: 5, to: 6, insert: "x" });
    expect(docToMarkdown(tr.doc)).toBe("x\n- [x] task");
  });
});

describe("buildDecorationSet", () => {
  const ranges = (text: string) =>
    buildDecorationSet(docOf(text), buildDecorations(text, null))
      .find()
      .map((d) => [d.from, d.to])
      .sort((a, b) => a[0] - b[0] || a[1] - b[1]);

  it("places line and inline decorations at document positions", () => {
    expect(ranges("**bold**")).toEqual([
      [0, 10],
      [1, 3],
      [3, 7],
      [7, 9],
    ]);
  });

  it("adds a widget at the start of a hidden checklist marker", () => {
    expect(ranges("- [ ] a")).toEqual([
      [0, 9],
      [1, 1],
      [1, 7],
    ]);
  });

  it("offsets later lines by their paragraph boundaries", () => {
    expect(ranges("a\n# b")).toEqual([
      [0, 3],
      [3, 8],
      [4, 6],
    ]);
  });
});

describe("buildDecorationSet on long notes", () => {
  it("maps a pass over thousands of lines in linear time", () => {
    const lines: string[] = [];
    for (let i = 0; i < 3000; i++) {
      lines.push(i % 2 === 0 ? `- [ ] task ${i} with **bold** and \`code\`` : `line ${i} [link](u) *it*`);
    }
    const text = lines.join("\n");
    const doc = docOf(text);
    const decorations = buildDecorations(text, { fromLine: 1, toLine: 1 });

    const started = performance.now();
    const set = buildDecorationSet(doc, decorations);
    const elapsed = performance.now() - started;

    expect(elapsed).toBeLessThan(1000);
    const lastNodePos = doc.content.size - (lines[lines.length - 1].length + 2);
    expect(set.find(lastNodePos, doc.content.size).map((d) => [d.from, d.to])).toContainEqual([
      lastNodePos,
      doc.content.size,
    ]);
  });
});

describe("clipboard text", () => {
  it("turns every pasted line into a paragraph, blank lines included", () => {
    const slice = parseClipboardText("a\n\nb", schema);
    expect(slice.content.childCount).toBe(3);
    expect(slice.openStart).toBe(1);
    expect(slice.openEnd).toBe(1);
    expect(parseClipboardText("a\r\nb", schema).content.childCount).toBe(2);
  });

  it("pastes into the middle of a line without losing blank lines", () => {
    const doc = docOf("xy");
    const state = EditorState.create({ doc, selection: TextSelection.create(doc, 2) });
    const tr = state.tr.replaceSelection(parseClipboardText("a\n\nb", schema));
    expect(docToMarkdown(tr.doc)).toBe("xa\n\nby");
  });

  it("copies paragraphs as single-spaced Markdown lines", () => {
    const doc = docOf("a\n\nb");
    expect(serializeClipboardText(doc.slice(0, doc.content.size))).toBe("a\n\nb");
    expect(serializeClipboardText(docOf("hello\nworld").slice(3, 10))).toBe("llo\nwo");
  });
});

describe("lineClass", () => {
  it("adds an indent class capped at the deepest level", () => {
    expect(lineClass("paragraph", 0)).toBe("md-line-paragraph");
    expect(lineClass("list-item", 2)).toBe("md-line-list-item md-indent-2");
    expect(lineClass("checklist-item", 9)).toBe("md-line-checklist-item md-indent-4");
  });
});
