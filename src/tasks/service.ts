// ---------------------------------------------------------------------------
// TaskService – task CRUD, priority/status updates
// ---------------------------------------------------------------------------
// `completed` and `status` are two views of one fact. Every write goes
// through applyStatus / applyCompleted so they never disagree.
// ---------------------------------------------------------------------------

import type { EntityStore } from "../store/entity-store.js";
import { NotFoundError } from "../store/errors.js";
import { requireId, requireOneOf, requireText } from "../store/validate.js";
import { BaseService, type ServiceDeps } from "../tracker/deps.js";
import {
  TASK_PRIORITIES,
  WORK_STATUSES,
  type Task,
  type TaskCreateInput,
  type TaskPriority,
  type WorkStatus,
} from "./types.js";

export function applyStatus(task: Task, status: WorkStatus): void {
  task.status = status;
  task.completed = status === "COMPLETED";
}

export function applyCompleted(task: Task, completed: boolean): void {
  task.completed = completed;
  if (completed) {
    task.status = "COMPLETED";
  } else if (task.status === "COMPLETED") {
    task.status = "PENDING";
  }
}

export class TaskService extends BaseService {
  constructor(
    deps: ServiceDeps,
    private readonly tasks: EntityStore<Task>,
  ) {
    super(deps);
  }

  // -------------------------------------------------------------------------
  // create
  // -------------------------------------------------------------------------

  create(input: TaskCreateInput): Task {
    const description = requireText(input.description, "task description");
    const priority = requireOneOf(input.priority ?? "NONE", TASK_PRIORITIES, "priority");

    const task: Task = {
      id: this.deps.ids.next(),
      description,
      completed: false,
      priority,
      status: "PENDING",
      labelIds: [],
    };
    this.tasks.save(task);

    this.emit("task.created", task);
    this.deps.log.info(`task created: ${task.id} — ${task.description}`);
    return task;
  }

  // -------------------------------------------------------------------------
  // queries
  // -------------------------------------------------------------------------

  get(taskId: string): Task | undefined {
    return this.tasks.findById(requireId(taskId, "Task"));
  }

  list(): Task[] {
    return this.tasks.findAll();
  }

  listByPriority(priority: TaskPriority): Task[] {
    requireOneOf(priority, TASK_PRIORITIES, "priority");
    return this.tasks.findAll().filter((t) => t.priority === priority);
  }

  listByStatus(status: WorkStatus): Task[] {
    requireOneOf(status, WORK_STATUSES, "status");
    return this.tasks.findAll().filter((t) => t.status === status);
  }

  // -------------------------------------------------------------------------
  // updates
  // -------------------------------------------------------------------------

  updateDescription(taskId: string, description: string): Task {
    requireText(description, "task description");
    const task = this.require(taskId);
    task.description = description;
    return this.commit(task);
  }

  updatePriority(taskId: string, priority: TaskPriority): Task {
    requireOneOf(priority, TASK_PRIORITIES, "priority");
    const task = this.require(taskId);
    task.priority = priority;
    return this.commit(task);
  }

  updateStatus(taskId: string, status: WorkStatus): Task {
    requireOneOf(status, WORK_STATUSES, "status");
    const task = this.require(taskId);
    const prev = task.status;
    applyStatus(task, status);
    this.commit(task);
    if (prev !== status && status === "COMPLETED") {
      this.emit("task.completed", task);
    }
    return task;
  }

  setCompleted(taskId: string, completed: boolean): Task {
    const task = this.require(taskId);
    const wasCompleted = task.completed;
    applyCompleted(task, completed);
    this.commit(task);
    if (!wasCompleted && completed) {
      this.emit("task.completed", task);
    }
    return task;
  }

  /** Does not touch projects or reminders that still reference the task. */
  delete(taskId: string): boolean {
    const removed = this.tasks.deleteById(requireId(taskId, "Task"));
    if (removed) {
      this.emit("task.deleted", { id: taskId });
      this.deps.log.info(`task deleted: ${taskId}`);
    }
    return removed;
  }

  private require(taskId: string): Task {
    const task = this.get(taskId);
    if (!task) {
      throw new NotFoundError("Task", taskId);
    }
    return task;
  }

  private commit(task: Task): Task {
    this.tasks.save(task);
    this.emit("task.updated", task);
    return task;
  }
}
