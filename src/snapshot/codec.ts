// ---------------------------------------------------------------------------
// Snapshot Codec – stores <-> snapshot document
// ---------------------------------------------------------------------------
// Decoding is all-or-nothing: one malformed section rejects the document.
// A missing (or null) section decodes as empty.
// ---------------------------------------------------------------------------

import type { TObject, Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { Label } from "../labels/types.js";
import type { Note } from "../notes/types.js";
import type { Project } from "../projects/types.js";
import type { Reminder } from "../reminders/types.js";
import type { Task } from "../tasks/types.js";
import { idRecord } from "../store/entity-store.js";
import type { TrackerStores } from "../tracker/stores.js";
import type { User } from "../users/types.js";
import {
  LabelSchema,
  NoteSchema,
  ProjectSchema,
  ReminderRecordSchema,
  TaskSchema,
  UserSchema,
  type ReminderRecord,
  type SnapshotSection,
} from "./schema.js";

export type SnapshotDocument = {
  users: Record<string, User>;
  tasks: Record<string, Task>;
  notes: Record<string, Note>;
  projects: Record<string, Project>;
  reminders: Record<string, ReminderRecord>;
  labels: Record<string, Label>;
};

export type DecodedSnapshot = {
  users: Record<string, User>;
  tasks: Record<string, Task>;
  notes: Record<string, Note>;
  projects: Record<string, Project>;
  reminders: Record<string, Reminder>;
  labels: Record<string, Label>;
};

export type DecodeResult =
  | { ok: true; data: DecodedSnapshot }
  | { ok: false; reason: string };

class MalformedSectionError extends Error {}

// ---------------------------------------------------------------------------
// Reminder target flattening
// ---------------------------------------------------------------------------

export function toReminderRecord(reminder: Reminder): ReminderRecord {
  return {
    id: reminder.id,
    message: reminder.message,
    reminderTime: reminder.reminderTime,
    associatedEntityId: reminder.target.id,
    associatedEntityType: reminder.target.kind,
    dismissed: reminder.dismissed,
  };
}

export function fromReminderRecord(record: ReminderRecord): Reminder {
  return {
    id: record.id,
    message: record.message,
    reminderTime: record.reminderTime,
    target: { kind: record.associatedEntityType, id: record.associatedEntityId },
    dismissed: record.dismissed,
  };
}

// ---------------------------------------------------------------------------
// Encode
// ---------------------------------------------------------------------------

export function encodeSnapshot(stores: TrackerStores): SnapshotDocument {
  const reminders = idRecord<ReminderRecord>();
  for (const [id, reminder] of Object.entries(stores.reminders.exportAll())) {
    reminders[id] = toReminderRecord(reminder);
  }
  return {
    users: { ...stores.users.exportAll() },
    tasks: { ...stores.tasks.exportAll() },
    notes: { ...stores.notes.exportAll() },
    projects: { ...stores.projects.exportAll() },
    reminders,
    labels: { ...stores.labels.exportAll() },
  };
}

// ---------------------------------------------------------------------------
// Decode
// ---------------------------------------------------------------------------

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readSection<T extends TObject>(
  doc: Record<string, unknown>,
  section: SnapshotSection,
  schema: T,
): Record<string, Static<T>> {
  const raw = doc[section];
  if (raw === undefined || raw === null) {
    return {};
  }
  if (!isPlainObject(raw)) {
    throw new MalformedSectionError(`section "${section}" is not an object`);
  }
  const out = idRecord<Static<T>>();
  for (const [key, value] of Object.entries(raw)) {
    if (!Value.Check(schema, value)) {
      const first = Value.Errors(schema, value).First();
      const detail = first ? `${first.path || "/"} ${first.message}` : "invalid";
      throw new MalformedSectionError(`${section}.${key}: ${detail}`);
    }
    out[key] = value;
  }
  return out;
}

function checkKeys(section: SnapshotSection, records: Record<string, { id: string }>): void {
  for (const [key, record] of Object.entries(records)) {
    if (key !== record.id) {
      throw new MalformedSectionError(`${section}.${key}: key does not match id "${record.id}"`);
    }
  }
}

function checkTaskConsistency(tasks: Record<string, Task>): void {
  for (const [key, task] of Object.entries(tasks)) {
    if (task.completed !== (task.status === "COMPLETED")) {
      throw new MalformedSectionError(
        `tasks.${key}: completed=${task.completed} contradicts status ${task.status}`,
      );
    }
  }
}

function checkTimestamps<T>(
  section: SnapshotSection,
  records: Record<string, T>,
  fields: readonly (keyof T & string)[],
): void {
  for (const [key, record] of Object.entries(records)) {
    for (const field of fields) {
      const value = record[field];
      if (typeof value !== "string" || Number.isNaN(Date.parse(value))) {
        throw new MalformedSectionError(`${section}.${key}.${field}: not a date-time`);
      }
    }
  }
}

export function decodeSnapshot(raw: unknown): DecodeResult {
  if (!isPlainObject(raw)) {
    return { ok: false, reason: "document is not an object" };
  }
  try {
    const users = readSection(raw, "users", UserSchema);
    const tasks = readSection(raw, "tasks", TaskSchema);
    const notes = readSection(raw, "notes", NoteSchema);
    const projects = readSection(raw, "projects", ProjectSchema);
    const reminderRecords = readSection(raw, "reminders", ReminderRecordSchema);
    const labels = readSection(raw, "labels", LabelSchema);

    checkKeys("users", users);
    checkKeys("tasks", tasks);
    checkKeys("notes", notes);
    checkKeys("projects", projects);
    checkKeys("reminders", reminderRecords);
    checkKeys("labels", labels);
    checkTaskConsistency(tasks);
    checkTimestamps("notes", notes, ["createdAt", "lastModifiedAt"]);
    checkTimestamps("projects", projects, ["createdAt", "lastModifiedAt"]);
    checkTimestamps("reminders", reminderRecords, ["reminderTime"]);

    const reminders = idRecord<Reminder>();
    for (const [id, record] of Object.entries(reminderRecords)) {
      reminders[id] = fromReminderRecord(record);
    }
    return { ok: true, data: { users, tasks, notes, projects, reminders, labels } };
  } catch (err) {
    if (err instanceof MalformedSectionError) {
      return { ok: false, reason: err.message };
    }
    throw err;
  }
}
