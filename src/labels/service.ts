// ---------------------------------------------------------------------------
// LabelService – labels and their attachment to tasks and notes
// ---------------------------------------------------------------------------
// Tasks and notes hold label ids; labels hold nothing. "Which entities carry
// this label" is answered by scanning both stores.
// ---------------------------------------------------------------------------

import type { Note } from "../notes/types.js";
import type { EntityStore } from "../store/entity-store.js";
import { AssociationError, NotFoundError } from "../store/errors.js";
import { requireId, requireOneOf, requireText } from "../store/validate.js";
import type { Task } from "../tasks/types.js";
import { BaseService, type ServiceDeps } from "../tracker/deps.js";
import { LABELLED_KINDS, type Label, type LabelledKind } from "./types.js";

export type AttachResult<T> = {
  entity: T;
  /** False when the label was already on the entity. */
  attached: boolean;
};

export type LabelledEntity = Task | Note;

export class LabelService extends BaseService {
  constructor(
    deps: ServiceDeps,
    private readonly labels: EntityStore<Label>,
    private readonly tasks: EntityStore<Task>,
    private readonly notes: EntityStore<Note>,
  ) {
    super(deps);
  }

  // -------------------------------------------------------------------------
  // CRUD
  // -------------------------------------------------------------------------

  create(name: string): Label {
    requireText(name, "label name");
    const label: Label = { id: this.deps.ids.next(), name };
    this.labels.save(label);

    this.emit("label.created", label);
    this.deps.log.info(`label created: ${label.id} — ${label.name}`);
    return label;
  }

  get(labelId: string): Label | undefined {
    return this.labels.findById(requireId(labelId, "Label"));
  }

  /** Case-insensitive; first match wins when names collide. */
  getByName(name: string): Label | undefined {
    requireText(name, "label name");
    const wanted = name.toLowerCase();
    return this.labels.findAll().find((l) => l.name.toLowerCase() === wanted);
  }

  list(): Label[] {
    return this.labels.findAll();
  }

  rename(labelId: string, name: string): Label {
    requireText(name, "label name");
    const label = this.get(labelId);
    if (!label) {
      throw new NotFoundError("Label", labelId);
    }
    label.name = name;
    this.labels.save(label);
    this.emit("label.updated", label);
    return label;
  }

  /**
   * Strips the label from every task and note, then removes the label.
   * All updated copies are built before the first write, so a failure while
   * scanning leaves every store untouched. The scan runs even when the label
   * record is already gone, clearing stale ids.
   */
  delete(labelId: string): boolean {
    requireId(labelId, "Label");

    const tasks = this.tasks
      .findAll()
      .filter((t) => t.labelIds.includes(labelId))
      .map((t) => ({ ...t, labelIds: t.labelIds.filter((id) => id !== labelId) }));
    const now = this.nowIso();
    const notes = this.notes
      .findAll()
      .filter((n) => n.labelIds.includes(labelId))
      .map((n) => ({
        ...n,
        labelIds: n.labelIds.filter((id) => id !== labelId),
        lastModifiedAt: now,
      }));

    for (const task of tasks) {
      this.tasks.save(task);
    }
    for (const note of notes) {
      this.notes.save(note);
    }
    const removed = this.labels.deleteById(labelId);

    if (removed) {
      this.emit("label.deleted", { id: labelId });
    }
    this.deps.log.info(
      `label deleted: ${labelId} (removed=${removed}, tasks=${tasks.length}, notes=${notes.length})`,
    );
    return removed;
  }

  // -------------------------------------------------------------------------
  // Attachment
  // -------------------------------------------------------------------------

  attach(labelId: string, targetId: string, kind: "Task"): AttachResult<Task>;
  attach(labelId: string, targetId: string, kind: "Note"): AttachResult<Note>;
  attach(labelId: string, targetId: string, kind: LabelledKind): AttachResult<LabelledEntity>;
  attach(labelId: string, targetId: string, kind: LabelledKind): AttachResult<LabelledEntity> {
    requireOneOf(kind, LABELLED_KINDS, "kind");
    requireId(targetId, kind);
    if (!this.labels.has(requireId(labelId, "Label"))) {
      throw new NotFoundError("Label", labelId);
    }
    const entity = this.requireTarget(targetId, kind);
    if (entity.labelIds.includes(labelId)) {
      return { entity, attached: false };
    }

    entity.labelIds.push(labelId);
    this.commitTarget(entity, kind);
    this.emit("label.attached", { labelId, targetId, kind });
    return { entity, attached: true };
  }

  detach(labelId: string, targetId: string, kind: "Task"): Task;
  detach(labelId: string, targetId: string, kind: "Note"): Note;
  detach(labelId: string, targetId: string, kind: LabelledKind): LabelledEntity;
  detach(labelId: string, targetId: string, kind: LabelledKind): LabelledEntity {
    requireOneOf(kind, LABELLED_KINDS, "kind");
    requireId(labelId, "Label");
    requireId(targetId, kind);
    const entity = this.requireTarget(targetId, kind);
    const idx = entity.labelIds.indexOf(labelId);
    if (idx === -1) {
      throw new AssociationError(`label ${labelId} is not attached to ${kind} ${targetId}`);
    }

    entity.labelIds.splice(idx, 1);
    this.commitTarget(entity, kind);
    this.emit("label.detached", { labelId, targetId, kind });
    return entity;
  }

  // -------------------------------------------------------------------------
  // Reverse lookups (linear scan)
  // -------------------------------------------------------------------------

  getTasks(labelId: string): Task[] {
    requireId(labelId, "Label");
    return this.tasks.findAll().filter((t) => t.labelIds.includes(labelId));
  }

  getNotes(labelId: string): Note[] {
    requireId(labelId, "Label");
    return this.notes.findAll().filter((n) => n.labelIds.includes(labelId));
  }

  private requireTarget(targetId: string, kind: LabelledKind): LabelledEntity {
    const entity = kind === "Task" ? this.tasks.findById(targetId) : this.notes.findById(targetId);
    if (!entity) {
      throw new NotFoundError(kind, targetId);
    }
    return entity;
  }

  private commitTarget(entity: LabelledEntity, kind: LabelledKind): void {
    if ("title" in entity) {
      entity.lastModifiedAt = this.nowIso();
      this.notes.save(entity);
      this.emit("note.updated", entity);
    } else {
      this.tasks.save(entity);
      this.emit("task.updated", entity);
    }
    this.deps.log.info(`${kind} ${entity.id} labels: [${entity.labelIds.join(", ")}]`);
  }
}
