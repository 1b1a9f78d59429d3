import { Extension } from "@tiptap/core";
import type { EditCommand } from "../../shared/types";
import { handleCommand } from "../engine/commands";
import {
  applyTextChange,
  docToMarkdown,
  rangeToSelection,
  selectionToRange,
  type DispatchTarget,
} from "./markdownText";

/**
 * Run a structural edit against the current document. Returns false when the
 * engine declines, so TipTap falls through to its default handler.
 */
export function runEditCommand(view: DispatchTarget, command: EditCommand): boolean {
  const { state } = view;
  const result = handleCommand(command, {
    text: docToMarkdown(state.doc),
    selection: selectionToRange(state.doc, state.selection),
  });
  if (result.type === "notHandled") return false;

  const tr = applyTextChange(state.tr, result.change);
  tr.setSelection(rangeToSelection(tr.doc, result.selection));
  view.dispatch(tr.scrollIntoView());
  return true;
}

export const MarkdownKeymap = Extension.create({
  name: "markdownKeymap",
  // Ahead of the core keymap, whose Enter would split the paragraph.
  priority: 1000,

  addKeyboardShortcuts() {
    return {
      Enter: ({ editor }) => runEditCommand(editor.view, "enter"),
      Tab: ({ editor }) => runEditCommand(editor.view, "tab"),
      "Shift-Tab": ({ editor }) => runEditCommand(editor.view, "shiftTab"),
    };
  },
});
