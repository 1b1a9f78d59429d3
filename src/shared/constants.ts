/** Delay before a pass runs for edits that did not complete a block pattern. */
export const DEBOUNCE_MS = 50;

/** Leading whitespace characters per list nesting level. */
export const INDENT_WIDTH = 2;
/** Deepest indent that gets its own CSS class; deeper lines share it. */
export const MAX_INDENT_CLASS = 4;

export const HEADING_SCALES = [1.8, 1.5, 1.3, 1.2, 1.1, 1.0] as const;
export const LIST_INDENT_PX = 16;
export const BASE_FONT_SIZE = 15;

export const DEFAULT_SERVER_PORT = 3001;
export const API_BASE = "http://localhost:3001";
export const RECENT_NOTES_LIMIT = 20;
export const PREVIEW_LENGTH = 80;

/** Logs per-pass timing to the console when true. */
export const DEBUG_DECORATIONS = false;
