export { Tracker, openTracker, type TrackerOptions } from "./tracker/tracker.js";
export { createStores, type TrackerStores } from "./tracker/stores.js";
export type { ServiceDeps } from "./tracker/deps.js";

export { EntityStore, type Entity, type EntitySnapshot } from "./store/entity-store.js";
export {
  TrackerError,
  ValidationError,
  NotFoundError,
  AssociationError,
  PersistenceError,
} from "./store/errors.js";
export { uuidGenerator, sequentialIds, type IdGenerator } from "./store/ids.js";
export { createSubsystemLogger, type SubsystemLogger } from "./logging/subsystem.js";

export { UserService } from "./users/service.js";
export type { User } from "./users/types.js";
export { TaskService, applyCompleted, applyStatus } from "./tasks/service.js";
export {
  TASK_PRIORITIES,
  WORK_STATUSES,
  type Task,
  type TaskCreateInput,
  type TaskPriority,
  type WorkStatus,
} from "./tasks/types.js";
export { NoteService } from "./notes/service.js";
export type { Note, NoteCreateInput } from "./notes/types.js";
export { ProjectService, type AddTaskResult } from "./projects/service.js";
export type { Project, ProjectCreateInput } from "./projects/types.js";
export { LabelService, type AttachResult, type LabelledEntity } from "./labels/service.js";
export { LABELLED_KINDS, type Label, type LabelledKind } from "./labels/types.js";
export { ReminderService, parseReminderTarget } from "./reminders/service.js";
export {
  REMINDER_TARGET_KINDS,
  type Reminder,
  type ReminderCreateInput,
  type ReminderTarget,
  type ReminderTargetKind,
} from "./reminders/types.js";

export {
  SnapshotPersistence,
  type LoadOutcome,
  type SnapshotCounts,
} from "./snapshot/persistence.js";
export { resolveSnapshotPath, DATA_FILE_ENV } from "./snapshot/store.js";
export { encodeSnapshot, decodeSnapshot, type SnapshotDocument } from "./snapshot/codec.js";
