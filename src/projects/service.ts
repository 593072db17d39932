// ---------------------------------------------------------------------------
// ProjectService – project CRUD and task membership
// ---------------------------------------------------------------------------
// Membership policy: adding a task that is already a member succeeds without
// change (`added: false`); removing a task that is not a member throws
// AssociationError. Deleting a task does not update projects that list it;
// getTasksInProject drops ids that no longer resolve.
// ---------------------------------------------------------------------------

import type { EntityStore } from "../store/entity-store.js";
import { AssociationError, NotFoundError } from "../store/errors.js";
import { requireId, requireOneOf, requireText } from "../store/validate.js";
import type { Task, WorkStatus } from "../tasks/types.js";
import { WORK_STATUSES } from "../tasks/types.js";
import { BaseService, type ServiceDeps } from "../tracker/deps.js";
import type { Project, ProjectCreateInput } from "./types.js";

export type AddTaskResult = {
  project: Project;
  /** False when the task was already a member. */
  added: boolean;
};

export class ProjectService extends BaseService {
  constructor(
    deps: ServiceDeps,
    private readonly projects: EntityStore<Project>,
    private readonly tasks: EntityStore<Task>,
  ) {
    super(deps);
  }

  // =========================================================================
  // CRUD
  // =========================================================================

  create(input: ProjectCreateInput): Project {
    const name = requireText(input.name, "project name");
    const now = this.nowIso();

    const project: Project = {
      id: this.deps.ids.next(),
      name,
      description: input.description ?? "",
      status: "PENDING",
      createdAt: now,
      lastModifiedAt: now,
      taskIds: [],
    };
    this.projects.save(project);

    this.emit("project.created", project);
    this.deps.log.info(`project created: ${project.id} — ${project.name}`);
    return project;
  }

  get(projectId: string): Project | undefined {
    return this.projects.findById(requireId(projectId, "Project"));
  }

  list(): Project[] {
    return this.projects.findAll();
  }

  updateName(projectId: string, name: string): Project {
    requireText(name, "project name");
    const project = this.require(projectId);
    project.name = name;
    return this.commit(project, "project.updated");
  }

  updateDescription(projectId: string, description: string | null): Project {
    const project = this.require(projectId);
    project.description = description ?? "";
    return this.commit(project, "project.updated");
  }

  updateStatus(projectId: string, status: WorkStatus): Project {
    requireOneOf(status, WORK_STATUSES, "status");
    const project = this.require(projectId);
    project.status = status;
    return this.commit(project, "project.updated");
  }

  delete(projectId: string): boolean {
    const removed = this.projects.deleteById(requireId(projectId, "Project"));
    if (removed) {
      this.emit("project.deleted", { id: projectId });
      this.deps.log.info(`project deleted: ${projectId}`);
    }
    return removed;
  }

  // =========================================================================
  // Task membership
  // =========================================================================

  addTask(projectId: string, taskId: string): AddTaskResult {
    requireId(taskId, "Task");
    const project = this.require(projectId);
    if (!this.tasks.has(taskId)) {
      throw new NotFoundError("Task", taskId);
    }
    if (project.taskIds.includes(taskId)) {
      return { project, added: false };
    }

    project.taskIds.push(taskId);
    this.commit(project, "project.task_added");
    this.deps.log.info(`task ${taskId} added to project ${project.id}`);
    return { project, added: true };
  }

  removeTask(projectId: string, taskId: string): Project {
    requireId(taskId, "Task");
    const project = this.require(projectId);
    const idx = project.taskIds.indexOf(taskId);
    if (idx === -1) {
      throw new AssociationError(`task ${taskId} is not in project ${project.id}`);
    }

    project.taskIds.splice(idx, 1);
    this.commit(project, "project.task_removed");
    this.deps.log.info(`task ${taskId} removed from project ${project.id}`);
    return project;
  }

  getTasks(projectId: string): Task[] {
    const project = this.require(projectId);
    const out: Task[] = [];
    for (const taskId of project.taskIds) {
      const task = this.tasks.findById(taskId);
      if (task) {
        out.push(task);
      }
    }
    return out;
  }

  private require(projectId: string): Project {
    const project = this.get(projectId);
    if (!project) {
      throw new NotFoundError("Project", projectId);
    }
    return project;
  }

  private commit(project: Project, event: string): Project {
    project.lastModifiedAt = this.nowIso();
    this.projects.save(project);
    this.emit(event, project);
    return project;
  }
}
