import { useEffect, useState } from "react";
import { useCurrentEditor } from "@tiptap/react";
import { listNotes, loadNote, saveNote } from "../api/apiService";
import { docToMarkdown, markdownToContent } from "../extensions/markdownText";
import type { NoteSummary } from "../../shared/types";

export function Toolbar() {
  const { editor } = useCurrentEditor();
  const [noteId, setNoteId] = useState<string>("");
  const [loadId, setLoadId] = useState<string>("");
  const [title, setTitle] = useState<string>("");
  const [recent, setRecent] = useState<NoteSummary[]>([]);
  const [error, setError] = useState<string | null>(null);

  async function refreshRecent() {
    try {
      setRecent(await listNotes());
    } catch (e) {
      setError(e instanceof Error ? e.message : "Could not list notes");
    }
  }

  useEffect(() => {
    void refreshRecent();
  }, []);

  async function handleSave() {
    if (!editor) return;
    setError(null);
    try {
      const res = await saveNote({
        id: noteId || undefined,
        title: title || "Untitled",
        content: docToMarkdown(editor.state.doc),
      });
      setNoteId(res.id);
      await refreshRecent();
    } catch (e) {
      setError(e instanceof Error ? e.message : "Save failed");
    }
  }

  async function handleLoad(id: string) {
    if (!editor || !id.trim()) return;
    setError(null);
    try {
      const note = await loadNote(id.trim());
      setTitle(note.title);
      editor.commands.setContent(markdownToContent(note.content));
      setNoteId(note.id);
    } catch (e) {
      setError(e instanceof Error ? e.message : "Load failed");
    }
  }

  return (
    <div className="toolbar">
      <button onClick={handleSave} disabled={!editor}>
        Save
      </button>
      <span className="toolbar-divider" />
      <input
        type="text"
        placeholder="Note Title"
        value={title}
        onChange={(e) => setTitle(e.target.value)}
      />
      <input
        type="text"
        placeholder="Load by ID"
        value={loadId}
        onChange={(e) => setLoadId(e.target.value)}
      />
      <button onClick={() => handleLoad(loadId)} disabled={!editor || !loadId.trim()}>
        Load
      </button>
      <select
        value=""
        onChange={(e) => handleLoad(e.target.value)}
        disabled={!editor || recent.length === 0}
      >
        <option value="">Recent notes…</option>
        {recent.map((note) => (
          <option key={note.id} value={note.id}>
            {note.title}
          </option>
        ))}
      </select>
      {noteId && <span className="toolbar-id">ID: {noteId}</span>}
      {error && <span className="toolbar-error">{error}</span>}
    </div>
  );
}
