import { useEffect } from "react";
import type { Editor, EditorEvents } from "@tiptap/core";
import type { EditorState, Transaction } from "@tiptap/pm/state";
import { activeRegionFor, buildDecorations } from "../engine/decorations";
import { RecomputeScheduler } from "../engine/scheduler";
import { CHECKBOX_TOGGLE_META, DECORATIONS_META } from "../extensions/markdownDecorations";
import { docToMarkdown, posToOffset, selectionToRange } from "../extensions/markdownText";
import { DEBUG_DECORATIONS } from "../../shared/constants";

export type PassScheduler = Pick<RecomputeScheduler, "flush" | "textChanged" | "selectionChanged">;

/**
 * Hand one editor transaction to the scheduler. `state` is the state after the
 * transaction. Decoration passes themselves are ignored.
 */
export function routeTransaction(
  transaction: Transaction,
  state: EditorState,
  scheduler: PassScheduler
): void {
  if (transaction.getMeta(DECORATIONS_META) !== undefined) return;
  if (transaction.getMeta(CHECKBOX_TOGGLE_META) === true) {
    scheduler.flush();
  } else if (transaction.docChanged) {
    scheduler.textChanged(docToMarkdown(state.doc), posToOffset(state.doc, state.selection.head));
  } else if (transaction.selectionSet) {
    scheduler.selectionChanged();
  }
}

/**
 * Drives decoration passes for one editor. Text edits go through the
 * scheduler (immediate or debounced); selection moves and checkbox toggles
 * recompute at once. Each pass is dispatched as a single transaction so the
 * view never paints a partial set. Passes are queued as microtasks so they never
 * dispatch from inside another dispatch.
 */
export function useMarkdownEngine(editor: Editor | null): void {
  useEffect(() => {
    if (!editor) return;

    const runPass = (): void => {
      if (editor.isDestroyed) return;
      const started = performance.now();
      const { state } = editor;
      const text = docToMarkdown(state.doc);
      const region = activeRegionFor(text, selectionToRange(state.doc, state.selection));
      const decorations = buildDecorations(text, region);
      editor.view.dispatch(
        state.tr.setMeta(DECORATIONS_META, decorations).setMeta("addToHistory", false)
      );
      if (DEBUG_DECORATIONS) {
        console.debug("[decorations] pass", {
          length: text.length,
          decorations: decorations.length,
          ms: performance.now() - started,
        });
      }
    };

    const scheduler = new RecomputeScheduler(() => queueMicrotask(runPass));

    const onTransaction = ({ transaction }: EditorEvents["transaction"]): void => {
      routeTransaction(transaction, editor.state, scheduler);
    };

    editor.on("transaction", onTransaction);
    scheduler.flush();

    return () => {
      editor.off("transaction", onTransaction);
      scheduler.dispose();
    };
  }, [editor]);
}
