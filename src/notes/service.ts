// ---------------------------------------------------------------------------
// NoteService – note CRUD; every mutation stamps lastModifiedAt
// ---------------------------------------------------------------------------

import type { EntityStore } from "../store/entity-store.js";
import { NotFoundError } from "../store/errors.js";
import { requireId, requireText } from "../store/validate.js";
import { BaseService, type ServiceDeps } from "../tracker/deps.js";
import type { Note, NoteCreateInput } from "./types.js";

export class NoteService extends BaseService {
  constructor(
    deps: ServiceDeps,
    private readonly notes: EntityStore<Note>,
  ) {
    super(deps);
  }

  create(input: NoteCreateInput): Note {
    const title = requireText(input.title, "note title");
    const now = this.nowIso();

    const note: Note = {
      id: this.deps.ids.next(),
      title,
      content: input.content ?? "",
      createdAt: now,
      lastModifiedAt: now,
      labelIds: [],
    };
    this.notes.save(note);

    this.emit("note.created", note);
    this.deps.log.info(`note created: ${note.id} — ${note.title}`);
    return note;
  }

  get(noteId: string): Note | undefined {
    return this.notes.findById(requireId(noteId, "Note"));
  }

  list(): Note[] {
    return this.notes.findAll();
  }

  updateTitle(noteId: string, title: string): Note {
    requireText(title, "note title");
    const note = this.require(noteId);
    note.title = title;
    return this.commit(note);
  }

  updateContent(noteId: string, content: string | null): Note {
    const note = this.require(noteId);
    note.content = content ?? "";
    return this.commit(note);
  }

  /**
   * Replaces the label list wholesale. Label existence is not checked here;
   * use the tracker's attachLabel for that.
   */
  setLabels(noteId: string, labelIds: readonly string[]): Note {
    const note = this.require(noteId);
    note.labelIds = [...new Set(labelIds)];
    return this.commit(note);
  }

  delete(noteId: string): boolean {
    const removed = this.notes.deleteById(requireId(noteId, "Note"));
    if (removed) {
      this.emit("note.deleted", { id: noteId });
      this.deps.log.info(`note deleted: ${noteId}`);
    }
    return removed;
  }

  private require(noteId: string): Note {
    const note = this.get(noteId);
    if (!note) {
      throw new NotFoundError("Note", noteId);
    }
    return note;
  }

  private commit(note: Note): Note {
    note.lastModifiedAt = this.nowIso();
    this.notes.save(note);
    this.emit("note.updated", note);
    return note;
  }
}
