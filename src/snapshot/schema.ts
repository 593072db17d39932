// ---------------------------------------------------------------------------
// Snapshot Schema – wire shape of the data file
// ---------------------------------------------------------------------------
// {
//   users:     { [id]: User },
//   tasks:     { [id]: Task },
//   notes:     { [id]: Note },
//   projects:  { [id]: Project },
//   reminders: { [id]: ReminderRecord },
//   labels:    { [id]: Label }
// }
// Reminders flatten their target to associatedEntityId/associatedEntityType.
// ---------------------------------------------------------------------------

import { Type, type Static } from "@sinclair/typebox";

export const SNAPSHOT_SECTIONS = [
  "users",
  "tasks",
  "notes",
  "projects",
  "reminders",
  "labels",
] as const;
export type SnapshotSection = (typeof SNAPSHOT_SECTIONS)[number];

const PrioritySchema = Type.Union([
  Type.Literal("HIGH"),
  Type.Literal("MEDIUM"),
  Type.Literal("LOW"),
  Type.Literal("NONE"),
]);

const StatusSchema = Type.Union([
  Type.Literal("PENDING"),
  Type.Literal("IN_PROGRESS"),
  Type.Literal("COMPLETED"),
  Type.Literal("CANCELLED"),
]);

const IdListSchema = Type.Array(Type.String(), { uniqueItems: true });

export const UserSchema = Type.Object({
  id: Type.String({ minLength: 1 }),
  username: Type.String({ minLength: 1 }),
  email: Type.String({ minLength: 1 }),
});

export const TaskSchema = Type.Object({
  id: Type.String({ minLength: 1 }),
  description: Type.String({ minLength: 1 }),
  completed: Type.Boolean(),
  priority: PrioritySchema,
  status: StatusSchema,
  labelIds: IdListSchema,
});

export const NoteSchema = Type.Object({
  id: Type.String({ minLength: 1 }),
  title: Type.String({ minLength: 1 }),
  content: Type.String(),
  createdAt: Type.String(),
  lastModifiedAt: Type.String(),
  labelIds: IdListSchema,
});

export const ProjectSchema = Type.Object({
  id: Type.String({ minLength: 1 }),
  name: Type.String({ minLength: 1 }),
  description: Type.String(),
  status: StatusSchema,
  createdAt: Type.String(),
  lastModifiedAt: Type.String(),
  taskIds: IdListSchema,
});

export const LabelSchema = Type.Object({
  id: Type.String({ minLength: 1 }),
  name: Type.String({ minLength: 1 }),
});

export const ReminderRecordSchema = Type.Object({
  id: Type.String({ minLength: 1 }),
  message: Type.String({ minLength: 1 }),
  reminderTime: Type.String(),
  associatedEntityId: Type.String({ minLength: 1 }),
  associatedEntityType: Type.Union([Type.Literal("Task"), Type.Literal("Note")]),
  dismissed: Type.Boolean(),
});
export type ReminderRecord = Static<typeof ReminderRecordSchema>;
