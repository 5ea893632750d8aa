import type { Trigger } from "./trigger";

/**
 * scheduled -> firing -> scheduled (recurring, next run advanced)
 *                     -> done      (one-shot, consumed)
 */
export type TaskStatus = "scheduled" | "firing" | "done";

export interface Task {
  id: string;
  workspace: string;
  /** Schedule expression as the user typed it */
  schedule: string;
  trigger: Trigger;
  prompt: string;
  nextRunAt: number | null;
  lastRunAt: number | null;
  lastResult: string | null;
  status: TaskStatus;
  createdAt: number;
}

export interface NewTaskInput {
  workspace: string;
  schedule: string;
  prompt: string;
}

export const TASK_RESULT_MAX_CHARS = 500;
