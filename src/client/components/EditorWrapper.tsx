import { useMemo } from "react";
import {
  EditorContext,
  EditorContent,
  useEditor,
  useCurrentEditor,
} from "@tiptap/react";
import StarterKit from "@tiptap/starter-kit";
import { MarkdownLine } from "../extensions/markdownLine";
import { MarkdownDecorations } from "../extensions/markdownDecorations";
import { MarkdownKeymap } from "../extensions/markdownKeymap";
import { MarkdownClipboard } from "../extensions/markdownClipboard";
import { markdownToContent } from "../extensions/markdownText";
import { Toolbar } from "./Toolbar";
import { useMarkdownEngine } from "../hooks/useMarkdownEngine";

// Only document, text, history and cursor helpers survive from StarterKit:
// every Markdown construct stays plain text in the document.
const extensions = [
  StarterKit.configure({
    paragraph: false,
    blockquote: false,
    bold: false,
    bulletList: false,
    code: false,
    codeBlock: false,
    hardBreak: false,
    heading: false,
    horizontalRule: false,
    italic: false,
    listItem: false,
    orderedList: false,
    strike: false,
  }),
  MarkdownLine,
  MarkdownDecorations,
  MarkdownKeymap,
  MarkdownClipboard,
];
const initialContent = markdownToContent("# Start typing…\n\n- [ ] first task");

/**
 * Runs the decoration engine for the editor in context. Renders nothing; it
 * only has to live inside EditorContext.
 */
function MarkdownEngine() {
  const { editor } = useCurrentEditor();
  useMarkdownEngine(editor ?? null);
  return null;
}

/**
 * Sets up the editor with EditorContext (EditorProvider pattern) and renders
 * Toolbar above the live-preview editor.
 */
export function EditorWrapper() {
  const editor = useEditor({
    extensions,
    content: initialContent,
  });

  const contextValue = useMemo(() => ({ editor }), [editor]);

  if (!editor) return null;

  return (
    <EditorContext.Provider value={contextValue}>
      <Toolbar />
      <div className="editor-container">
        <EditorContent editor={editor} className="editor" />
        <MarkdownEngine />
      </div>
    </EditorContext.Provider>
  );
}
