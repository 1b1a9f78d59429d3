import Paragraph from "@tiptap/extension-paragraph";

/**
 * One Markdown source line. Formatting lives in the text itself, so the node
 * accepts no marks and styling comes only from decorations.
 */
export const MarkdownLine = Paragraph.extend({
  marks: "",
});
