import { DEBOUNCE_MS } from "../../shared/constants";
import { classifyLine, isListKind } from "./classify";
import { lineAt, splitLines } from "./regions";

const HEADING_PREFIX_RE = /^#{1,6} /;
const LIST_PREFIX_RE = /^(?:[-*+]\s|\d+[.)]\s)/;

/**
 * True when the line under the cursor has just become, or already is, a
 * heading or list item, so its formatting should follow every keystroke.
 */
export function shouldRecomputeImmediately(text: string, cursor: number): boolean {
  const offset = Math.min(Math.max(cursor, 0), text.length);
  const line = lineAt(splitLines(text), offset);
  const trimmed = line.text.trimStart();
  if (HEADING_PREFIX_RE.test(trimmed) || LIST_PREFIX_RE.test(trimmed)) return true;
  const { kind } = classifyLine(line.text);
  return kind.type === "heading" || isListKind(kind);
}

export type RecomputeTiming = "immediate" | "debounced";

export interface RecomputeSchedulerOptions {
  debounceMs?: number;
}

/**
 * Decides when a decoration pass runs. Holds at most one pending timer: a new
 * edit replaces it, and an immediate pass clears it.
 */
export class RecomputeScheduler {
  private timer: ReturnType<typeof setTimeout> | null = null;
  private readonly debounceMs: number;

  constructor(
    private readonly recompute: () => void,
    options: RecomputeSchedulerOptions = {}
  ) {
    this.debounceMs = options.debounceMs ?? DEBOUNCE_MS;
  }

  get pending(): boolean {
    return this.timer !== null;
  }

  textChanged(text: string, cursor: number): RecomputeTiming {
    if (shouldRecomputeImmediately(text, cursor)) {
      this.flush();
      return "immediate";
    }
    this.cancel();
    this.timer = setTimeout(() => {
      this.timer = null;
      this.recompute();
    }, this.debounceMs);
    return "debounced";
  }

  /** Only the active region moved; always cheap enough to run now. */
  selectionChanged(): void {
    this.flush();
  }

  flush(): void {
    this.cancel();
    this.recompute();
  }

  cancel(): void {
    if (this.timer === null) return;
    clearTimeout(this.timer);
    this.timer = null;
  }

  dispose(): void {
    this.cancel();
  }
}
