import express, { type NextFunction, type Request, type Response } from "express";
import cors from "cors";
import { NoteStore, parseNotePayload } from "./noteStore";

export function createApp(store: NoteStore = new NoteStore()) {
  const app = express();

  app.use(cors());
  app.use(express.json());

  app.get("/notes", (_req, res) => {
    res.json({ notes: store.recent() });
  });

  app.post("/notes", (req, res) => {
    const parsed = parseNotePayload(req.body);
    if (!parsed.ok) {
      res.status(400).json({ error: parsed.error });
      return;
    }
    const { id, created } = store.save(parsed.payload);
    res.status(created ? 201 : 200).json({ id });
  });

  app.get("/notes/:id", (req, res) => {
    const note = store.get(req.params.id);
    if (!note) {
      res.status(404).json({ error: "Note not found" });
      return;
    }
    res.json(note);
  });

  // Body-parser failures carry their own 4xx status.
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status =
      typeof err === "object" && err !== null && "status" in err && typeof err.status === "number"
        ? err.status
        : 500;
    if (status >= 500) console.error("[notes] request failed:", err);
    res.status(status).json({ error: status >= 500 ? "Internal server error" : "Invalid request body" });
  });

  return app;
}
