import { randomUUID } from "crypto";
import type { Note, NoteSummary } from "../shared/types";
import { PREVIEW_LENGTH, RECENT_NOTES_LIMIT } from "../shared/constants";

export interface NotePayload {
  id?: string;
  title: string;
  content: string;
}

export type PayloadResult =
  | { ok: true; payload: NotePayload }
  | { ok: false; error: string };

/** Validate a POST /notes body. */
export function parseNotePayload(body: unknown): PayloadResult {
  if (typeof body !== "object" || body === null || Array.isArray(body)) {
    return { ok: false, error: "Invalid body: must be an object" };
  }
  const title = "title" in body ? body.title : undefined;
  const content = "content" in body ? body.content : undefined;
  const id = "id" in body ? body.id : undefined;
  if (title === undefined || content === undefined) {
    return { ok: false, error: "Missing or invalid title or content" };
  }
  if (typeof content !== "string") {
    return { ok: false, error: "Invalid content: must be Markdown text" };
  }
  if (id !== undefined && id !== null && typeof id !== "string") {
    return { ok: false, error: "Invalid id: must be a string" };
  }
  return {
    ok: true,
    payload: { id: typeof id === "string" ? id : undefined, title: String(title), content },
  };
}

/** First non-empty line of the note with Markdown block markers stripped. */
export function previewOf(content: string): string {
  const line = content
    .split("\n")
    .map((l) => l.replace(/^\s*(?:#{1,6}\s+|>\s*|[-*+]\s+(?:\[[ xX]\]\s+)?|\d+[.)]\s+)/, "").trim())
    .find((l) => l.length > 0);
  return (line ?? "").slice(0, PREVIEW_LENGTH);
}

export class NoteStore {
  private readonly notes = new Map<string, Note>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  /** Update the note with `payload.id` if it exists, otherwise create one. */
  save(payload: NotePayload): { id: string; created: boolean } {
    const timestamp = this.now().toISOString();
    const existing = payload.id !== undefined ? this.notes.get(payload.id) : undefined;
    if (existing) {
      this.notes.set(existing.id, {
        ...existing,
        title: payload.title,
        content: payload.content,
        updated_at: timestamp,
      });
      return { id: existing.id, created: false };
    }

    const id = randomUUID();
    this.notes.set(id, {
      id,
      title: payload.title,
      content: payload.content,
      created_at: timestamp,
      updated_at: timestamp,
    });
    return { id, created: true };
  }

  get(id: string): Note | undefined {
    return this.notes.get(id);
  }

  /** Most recently updated first. */
  recent(limit = RECENT_NOTES_LIMIT): NoteSummary[] {
    return [...this.notes.values()]
      .sort((a, b) => b.updated_at.localeCompare(a.updated_at))
      .slice(0, limit)
      .map((note) => ({
        id: note.id,
        title: note.title,
        preview: previewOf(note.content),
        updated_at: note.updated_at,
      }));
  }
}
