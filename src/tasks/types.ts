// ---------------------------------------------------------------------------
// Task Types
// ---------------------------------------------------------------------------

export const TASK_PRIORITIES = ["HIGH", "MEDIUM", "LOW", "NONE"] as const;
export type TaskPriority = (typeof TASK_PRIORITIES)[number];

// Shared by tasks and projects. Flat enum: any status may follow any other.
export const WORK_STATUSES = ["PENDING", "IN_PROGRESS", "COMPLETED", "CANCELLED"] as const;
export type WorkStatus = (typeof WORK_STATUSES)[number];

export type Task = {
  id: string;
  description: string;
  /** Always equal to `status === "COMPLETED"`. */
  completed: boolean;
  priority: TaskPriority;
  status: WorkStatus;
  labelIds: string[];
};

export type TaskCreateInput = {
  description: string;
  priority?: TaskPriority;
};
