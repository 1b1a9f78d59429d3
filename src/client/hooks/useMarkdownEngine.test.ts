import { describe, expect, it, vi } from "vitest";
import { EditorState, TextSelection } from "@tiptap/pm/state";
import { routeTransaction } from "./useMarkdownEngine";
import { CHECKBOX_TOGGLE_META, DECORATIONS_META } from "../extensions/markdownDecorations";
import { docOf } from "../extensions/testEditor";

function fakeScheduler() {
  return { flush: vi.fn(), textChanged: vi.fn(), selectionChanged: vi.fn() };
}

function stateAtEnd(text: string): EditorState {
  const doc = docOf(text);
  return EditorState.create({ doc, selection: TextSelection.atEnd(doc) });
}

describe("routeTransaction", () => {
  it("sends document changes to textChanged with the new text and cursor", () => {
    const state = stateAtEnd("hello");
    const tr = state.tr.insertText("!");
    const scheduler = fakeScheduler();
    routeTransaction(tr, state.apply(tr), scheduler);
    expect(scheduler.textChanged).toHaveBeenCalledWith("hello!", 6);
    expect(scheduler.selectionChanged).not.toHaveBeenCalled();
    expect(scheduler.flush).not.toHaveBeenCalled();
  });

  it("sends selection-only transactions to selectionChanged", () => {
    const state = stateAtEnd("hello");
    const tr = state.tr.setSelection(TextSelection.create(state.doc, 2));
    const scheduler = fakeScheduler();
    routeTransaction(tr, state.apply(tr), scheduler);
    expect(scheduler.selectionChanged).toHaveBeenCalledTimes(1);
    expect(scheduler.textChanged).not.toHaveBeenCalled();
  });

  it("flushes at once after a checkbox toggle", () => {
    const state = stateAtEnd("- [ ] a");
    const tr = state.tr.insertText("x", 4, 5).setMeta(CHECKBOX_TOGGLE_META, true);
    const scheduler = fakeScheduler();
    routeTransaction(tr, state.apply(tr), scheduler);
    expect(scheduler.flush).toHaveBeenCalledTimes(1);
    expect(scheduler.textChanged).not.toHaveBeenCalled();
  });

  it("ignores its own decoration passes", () => {
    const state = stateAtEnd("hello");
    const tr = state.tr.setMeta(DECORATIONS_META, []).setSelection(TextSelection.create(state.doc, 1));
    const scheduler = fakeScheduler();
    routeTransaction(tr, state.apply(tr), scheduler);
    expect(scheduler.flush).not.toHaveBeenCalled();
    expect(scheduler.textChanged).not.toHaveBeenCalled();
    expect(scheduler.selectionChanged).not.toHaveBeenCalled();
  });
});
