// ---------------------------------------------------------------------------
// Tracker – owns the six stores and the services over them
// ---------------------------------------------------------------------------
// This is the surface a command layer calls. Cross-entity operations are
// exposed here by name; single-entity operations live on the services.
// Lifecycle: openTracker() loads the data file once; close() saves it once.
// ---------------------------------------------------------------------------

import { LabelService, type AttachResult, type LabelledEntity } from "../labels/service.js";
import type { Label, LabelledKind } from "../labels/types.js";
import { createSubsystemLogger, type SubsystemLogger } from "../logging/subsystem.js";
import { NoteService } from "../notes/service.js";
import type { Note } from "../notes/types.js";
import { ProjectService, type AddTaskResult } from "../projects/service.js";
import type { Project } from "../projects/types.js";
import { parseReminderTarget, ReminderService } from "../reminders/service.js";
import type { Reminder } from "../reminders/types.js";
import {
  SnapshotPersistence,
  type LoadOutcome,
  type SnapshotCounts,
} from "../snapshot/persistence.js";
import { resolveSnapshotPath } from "../snapshot/store.js";
import { uuidGenerator, type IdGenerator } from "../store/ids.js";
import { TaskService } from "../tasks/service.js";
import type { Task } from "../tasks/types.js";
import { UserService } from "../users/service.js";
import type { ServiceDeps } from "./deps.js";
import { createStores, type TrackerStores } from "./stores.js";

export type TrackerOptions = {
  /** Data file; falls back to $TRACKLET_DATA_FILE, then ~/.tracklet/data.json. */
  dataPath?: string;
  ids?: IdGenerator;
  log?: SubsystemLogger;
  persistenceLog?: SubsystemLogger;
  broadcast?: (event: string, payload: unknown) => void;
  nowMs?: () => number;
};

export class Tracker {
  readonly stores: TrackerStores;
  readonly users: UserService;
  readonly tasks: TaskService;
  readonly notes: NoteService;
  readonly projects: ProjectService;
  readonly labels: LabelService;
  readonly reminders: ReminderService;
  readonly persistence: SnapshotPersistence;

  constructor(opts: TrackerOptions = {}) {
    const deps: ServiceDeps = {
      ids: opts.ids ?? uuidGenerator,
      log: opts.log ?? createSubsystemLogger("tracker"),
      broadcast: opts.broadcast,
      nowMs: opts.nowMs,
    };
    const stores = createStores();
    this.stores = stores;
    this.users = new UserService(deps, stores.users);
    this.tasks = new TaskService(deps, stores.tasks);
    this.notes = new NoteService(deps, stores.notes);
    this.projects = new ProjectService(deps, stores.projects, stores.tasks);
    this.labels = new LabelService(deps, stores.labels, stores.tasks, stores.notes);
    this.reminders = new ReminderService(deps, stores.reminders, stores.tasks, stores.notes);
    this.persistence = new SnapshotPersistence({
      filePath: resolveSnapshotPath(opts.dataPath),
      stores,
      log: opts.persistenceLog ?? createSubsystemLogger("snapshot"),
    });
  }

  // -------------------------------------------------------------------------
  // Labels <-> tasks / notes
  // -------------------------------------------------------------------------

  attachLabel(labelId: string, targetId: string, kind: LabelledKind): AttachResult<LabelledEntity> {
    return this.labels.attach(labelId, targetId, kind);
  }

  detachLabel(labelId: string, targetId: string, kind: LabelledKind): LabelledEntity {
    return this.labels.detach(labelId, targetId, kind);
  }

  deleteLabel(labelId: string): boolean {
    return this.labels.delete(labelId);
  }

  getTasksByLabel(labelId: string): Task[] {
    return this.labels.getTasks(labelId);
  }

  getNotesByLabel(labelId: string): Note[] {
    return this.labels.getNotes(labelId);
  }

  createLabel(name: string): Label {
    return this.labels.create(name);
  }

  // -------------------------------------------------------------------------
  // Projects <-> tasks
  // -------------------------------------------------------------------------

  addTaskToProject(projectId: string, taskId: string): AddTaskResult {
    return this.projects.addTask(projectId, taskId);
  }

  removeTaskFromProject(projectId: string, taskId: string): Project {
    return this.projects.removeTask(projectId, taskId);
  }

  getTasksInProject(projectId: string): Task[] {
    return this.projects.getTasks(projectId);
  }

  // -------------------------------------------------------------------------
  // Reminders
  // -------------------------------------------------------------------------

  /** `targetKind` is "Task" or "Note"; anything else is a ValidationError. */
  createReminder(
    message: string,
    reminderTime: Date | string,
    targetId: string,
    targetKind: string,
  ): Reminder {
    return this.reminders.create({
      message,
      reminderTime,
      target: parseReminderTarget(targetKind, targetId),
    });
  }

  getDueReminders(asOf: Date | string): Reminder[] {
    return this.reminders.getDue(asOf);
  }

  // -------------------------------------------------------------------------
  // Persistence
  // -------------------------------------------------------------------------

  async load(): Promise<LoadOutcome> {
    return this.persistence.load();
  }

  async close(): Promise<SnapshotCounts> {
    return this.persistence.save();
  }
}

export async function openTracker(
  opts: TrackerOptions = {},
): Promise<{ tracker: Tracker; outcome: LoadOutcome }> {
  const tracker = new Tracker(opts);
  const outcome = await tracker.load();
  return { tracker, outcome };
}
