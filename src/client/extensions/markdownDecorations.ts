import { Extension } from "@tiptap/core";
import { Plugin, PluginKey } from "@tiptap/pm/state";
import { Decoration, DecorationSet, type EditorView } from "@tiptap/pm/view";
import type { Node as ProseMirrorNode } from "@tiptap/pm/model";
import type {
  Decoration as MarkdownDecoration,
  LineStyleTag,
  TextRange,
  WidgetState,
} from "../../shared/types";
import { MAX_INDENT_CLASS } from "../../shared/constants";
import { hitTestWidget } from "../engine/decorations";
import { toggleCheckbox } from "../engine/commands";
import {
  applyTextChange,
  createPositionMap,
  docToMarkdown,
  rangeToSelection,
  selectionToRange,
  type DispatchTarget,
} from "./markdownText";

function isMarkdownDecoration(v: unknown): v is MarkdownDecoration {
  return (
    typeof v === "object" &&
    v !== null &&
    "from" in v &&
    "to" in v &&
    "action" in v &&
    typeof v.from === "number" &&
    typeof v.to === "number" &&
    typeof v.action === "object" &&
    v.action !== null &&
    "type" in v.action &&
    typeof v.action.type === "string"
  );
}

function isDecorationList(meta: unknown): meta is MarkdownDecoration[] {
  return Array.isArray(meta) && meta.every(isMarkdownDecoration);
}

/**
 * Plugin state: the engine's last decoration list (for widget hit-testing) and
 * the DecorationSet built from it, mapped across edits until the next pass.
 */
export interface MarkdownDecorationsState {
  source: MarkdownDecoration[];
  decorations: DecorationSet;
}

/** Meta key carrying a freshly built `Decoration[]` into the plugin. */
export const DECORATIONS_META = "markdownDecorations";
/** Set on checkbox toggles so the next pass runs without debouncing. */
export const CHECKBOX_TOGGLE_META = "markdownCheckboxToggle";

export const markdownDecorationsKey = new PluginKey<MarkdownDecorationsState>("markdownDecorations");

export function lineClass(style: LineStyleTag, indent: number): string {
  const classes = [`md-line-${style}`];
  if (indent > 0) classes.push(`md-indent-${Math.min(indent, MAX_INDENT_CLASS)}`);
  return classes.join(" ");
}

/**
 * Toggle the checkbox whose widget covers `range`, provided the range is still
 * one the last pass emitted.
 */
export function toggleCheckboxInView(view: DispatchTarget, range: TextRange): boolean {
  const { state } = view;
  const pluginState = markdownDecorationsKey.getState(state);
  const hit = pluginState ? hitTestWidget(pluginState.source, range.from) : null;
  if (!hit || hit.from !== range.from || hit.to !== range.to) return false;

  const result = toggleCheckbox(
    { text: docToMarkdown(state.doc), selection: selectionToRange(state.doc, state.selection) },
    hit
  );
  if (result.type === "notHandled") return false;
  const tr = applyTextChange(state.tr, result.change);
  tr.setSelection(rangeToSelection(tr.doc, result.selection));
  view.dispatch(tr.setMeta(CHECKBOX_TOGGLE_META, true));
  return true;
}

function renderWidget(widget: WidgetState, range: TextRange) {
  return (view: EditorView): HTMLElement => {
    switch (widget.kind) {
      case "checkbox": {
        const input = document.createElement("input");
        input.type = "checkbox";
        input.className = "md-checkbox";
        input.checked = widget.checked;
        input.addEventListener("mousedown", (event) => {
          event.preventDefault();
          toggleCheckboxInView(view, range);
        });
        return input;
      }
      case "bullet": {
        const span = document.createElement("span");
        span.className = "md-bullet";
        span.textContent = "•";
        return span;
      }
      case "rule": {
        const span = document.createElement("span");
        span.className = "md-rule";
        return span;
      }
    }
  };
}

function widgetKey(widget: WidgetState, from: number): string {
  switch (widget.kind) {
    case "checkbox":
      return `checkbox-${from}-${widget.checked ? "x" : "o"}`;
    case "bullet":
      return `bullet-${from}`;
    case "rule":
      return `rule-${from}`;
  }
}

/** Translate engine decorations (text offsets) into ProseMirror decorations. */
export function buildDecorationSet(
  doc: ProseMirrorNode,
  decorations: MarkdownDecoration[]
): DecorationSet {
  const out: Decoration[] = [];
  const map = createPositionMap(doc);

  for (const d of decorations) {
    const from = map.toPos(d.from);
    const to = map.toPos(d.to);
    const { action } = d;
    switch (action.type) {
      case "line":
        out.push(Decoration.node(from - 1, to + 1, { class: lineClass(action.style, action.indent) }));
        break;
      case "hide":
        out.push(Decoration.inline(from, to, { class: "md-hidden" }));
        break;
      case "mark":
        out.push(Decoration.inline(from, to, { class: `md-${action.style}` }));
        break;
      case "widget":
        out.push(Decoration.inline(from, to, { class: "md-hidden" }));
        out.push(
          Decoration.widget(from, renderWidget(action.widget, { from: d.from, to: d.to }), {
            side: -1,
            key: widgetKey(action.widget, d.from),
          })
        );
        break;
    }
  }

  return DecorationSet.create(doc, out);
}

export function markdownDecorationsPlugin(): Plugin<MarkdownDecorationsState> {
  return new Plugin<MarkdownDecorationsState>({
    key: markdownDecorationsKey,
    state: {
      init(): MarkdownDecorationsState {
        return { source: [], decorations: DecorationSet.empty };
      },
      apply(tr, value, _oldState, newState): MarkdownDecorationsState {
        const meta: unknown = tr.getMeta(DECORATIONS_META);
        if (meta !== undefined) {
          if (!isDecorationList(meta)) return value;
          return { source: meta, decorations: buildDecorationSet(newState.doc, meta) };
        }
        if (tr.docChanged && value.decorations !== DecorationSet.empty) {
          return {
            source: value.source,
            decorations: value.decorations.map(tr.mapping, newState.doc),
          };
        }
        return value;
      },
    },
    props: {
      decorations(state) {
        const pluginState = markdownDecorationsKey.getState(state);
        if (!pluginState || pluginState.decorations === DecorationSet.empty) return null;
        return pluginState.decorations;
      },
    },
  });
}

export const MarkdownDecorations = Extension.create({
  name: "markdownDecorations",

  addProseMirrorPlugins() {
    return [markdownDecorationsPlugin()];
  },
});
