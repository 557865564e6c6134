import type { ErrorCategory } from "../errors.js";
import type { Task } from "../planner/types.js";

export type TaskStatus = "pending" | "running" | "succeeded" | "failed" | "skipped";

/** A failed task plus what it needs to be retried later on its own. */
export type FailureRecord = {
  index: number;
  task: Task;
  error: string;
  category: ErrorCategory;
  /** Previous outputs as they stood when the task failed. Frozen. */
  previousOutputs: readonly string[];
};

export type TaskOutcome = {
  index: number;
  task: Task;
  status: TaskStatus;
  artifact?: string;
  error?: string;
  category?: ErrorCategory;
  durationMs?: number;
};

export type AssembledPrompt = {
  prompt: string;
  context: string;
  truncated: boolean;
};
