import { Schema } from "@tiptap/pm/model";
import type { EditorState, Transaction } from "@tiptap/pm/state";
import { markdownToContent, type DispatchTarget } from "./markdownText";

/** The editor's document shape without the TipTap editor around it; for tests. */
export const schema = new Schema({
  nodes: {
    doc: { content: "paragraph+" },
    paragraph: { content: "text*", toDOM: () => ["p", 0] },
    text: {},
  },
});

export const docOf = (text: string) => schema.nodeFromJSON(markdownToContent(text));

/** Records every dispatched transaction and applies it. */
export class TestView implements DispatchTarget {
  readonly dispatched: Transaction[] = [];

  constructor(public state: EditorState) {}

  dispatch(tr: Transaction): void {
    this.dispatched.push(tr);
    this.state = this.state.apply(tr);
  }
}
