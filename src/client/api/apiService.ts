import type { Note, NoteSummary } from "../../shared/types";
import { API_BASE } from "../../shared/constants";

export interface SaveNoteResponse {
  id: string;
}

async function readJson<T>(res: Response): Promise<T & { error?: string }> {
  const data = (await res.json()) as T & { error?: string };
  if (!res.ok) throw new Error(String(data.error ?? res.statusText));
  return data;
}

export async function saveNote(params: {
  id?: string;
  title?: string;
  content: string;
}): Promise<SaveNoteResponse> {
  const { id, title, content } = params;
  const res = await fetch(`${API_BASE}/notes`, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify({ id, title, content }),
  });
  const data = await readJson<{ id?: string }>(res);
  if (typeof data.id !== "string") throw new Error("Invalid save response");
  return { id: data.id };
}

export async function loadNote(id: string): Promise<Note> {
  const res = await fetch(`${API_BASE}/notes/${encodeURIComponent(id)}`);
  const data = await readJson<Partial<Note>>(res);
  if (typeof data.title !== "string") throw new Error("Invalid note: missing title");
  if (typeof data.content !== "string") throw new Error("Invalid note: missing content");
  return {
    id: data.id ?? id,
    title: data.title,
    content: data.content,
    created_at: data.created_at ?? "",
    updated_at: data.updated_at ?? "",
  };
}

export async function listNotes(): Promise<NoteSummary[]> {
  const res = await fetch(`${API_BASE}/notes`);
  const data = await readJson<{ notes?: NoteSummary[] }>(res);
  if (!Array.isArray(data.notes)) throw new Error("Invalid note list");
  return data.notes;
}
