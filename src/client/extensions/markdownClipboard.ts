import { Extension } from "@tiptap/core";
import { Plugin, PluginKey } from "@tiptap/pm/state";
import { parseClipboardText, serializeClipboardText } from "./markdownText";

export const markdownClipboardKey = new PluginKey("markdownClipboard");

/**
 * Keeps plain-text copy and paste line-for-line with the Markdown source.
 * ProseMirror's defaults collapse blank lines on paste and double-space blocks
 * on copy.
 */
export function markdownClipboardPlugin(): Plugin {
  return new Plugin({
    key: markdownClipboardKey,
    props: {
      clipboardTextParser: (text, $context) => parseClipboardText(text, $context.doc.type.schema),
      clipboardTextSerializer: (slice) => serializeClipboardText(slice),
    },
  });
}

export const MarkdownClipboard = Extension.create({
  name: "markdownClipboard",

  addProseMirrorPlugins() {
    return [markdownClipboardPlugin()];
  },
});
