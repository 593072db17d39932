// ---------------------------------------------------------------------------
// Project Types – groups tasks by id
// ---------------------------------------------------------------------------

import type { WorkStatus } from "../tasks/types.js";

export type Project = {
  id: string;
  name: string;
  description: string;
  status: WorkStatus;
  createdAt: string;
  lastModifiedAt: string;
  taskIds: string[];
};

export type ProjectCreateInput = {
  name: string;
  description?: string;
};
