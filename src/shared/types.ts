export interface Note {
  id: string;
  title: string;
  /** Markdown source; the only stored form of a note. */
  content: string;
  created_at: string;
  updated_at: string;
}

export interface NoteSummary {
  id: string;
  title: string;
  preview: string;
  updated_at: string;
}

/** Half-open `[from, to)` range of UTF-16 offsets. */
export interface TextRange {
  from: number;
  to: number;
}

export interface Line extends TextRange {
  /** 1-based. */
  number: number;
  text: string;
}

export type HeadingLevel = 1 | 2 | 3 | 4 | 5 | 6;

export type BlockKind =
  | { type: "paragraph" }
  | { type: "heading"; level: HeadingLevel }
  | { type: "blockquote"; depth: number }
  | { type: "horizontalRule" }
  | { type: "unorderedItem"; indent: number }
  | { type: "orderedItem"; number: number; indent: number }
  | { type: "checklistItem"; checked: boolean; indent: number }
  | { type: "codeFenceBoundary" }
  | { type: "codeFenceBody" }
  | { type: "tableHeader" }
  | { type: "tableSeparator" }
  | { type: "tableRow" };

export type ListKind = Extract<
  BlockKind,
  { type: "unorderedItem" | "orderedItem" | "checklistItem" }
>;

export type InlineKind =
  | "code"
  | "strong"
  | "emphasis"
  | "strikethrough"
  | "link"
  | "image";

export interface InlineSpan {
  kind: InlineKind;
  /** Includes delimiters. */
  range: TextRange;
  /** Excludes delimiters. */
  content: TextRange;
  /** Target of a link or image. */
  url?: TextRange;
}

export type LineStyleTag =
  | "paragraph"
  | `heading-${HeadingLevel}`
  | "blockquote"
  | "horizontal-rule"
  | "list-item"
  | "checklist-item"
  | "checklist-item-checked"
  | "code-fence"
  | "code-block"
  | "table-header"
  | "table-separator"
  | "table-row";

export type MarkStyleTag =
  | "syntax"
  | "list-marker"
  | "code-fence-text"
  | "table-pipe"
  | "url"
  | InlineKind;

export type WidgetState =
  | { kind: "checkbox"; checked: boolean; indent: number }
  | { kind: "bullet"; indent: number }
  | { kind: "rule" };

export type DecorationAction =
  | { type: "hide" }
  | { type: "mark"; style: MarkStyleTag }
  | { type: "widget"; widget: WidgetState }
  | { type: "line"; style: LineStyleTag; indent: number };

export interface Decoration extends TextRange {
  action: DecorationAction;
}

/** Inclusive range of 1-based line numbers touched by the selection. */
export interface ActiveRegion {
  fromLine: number;
  toLine: number;
}

export interface TextChange extends TextRange {
  insert: string;
}

export type EditCommand = "enter" | "tab" | "shiftTab";

export interface CursorContext {
  text: string;
  selection: TextRange;
}

export type CommandResult =
  | { type: "handled"; text: string; selection: TextRange; change: TextChange }
  | { type: "notHandled" };
