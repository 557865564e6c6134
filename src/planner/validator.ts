import { InputValidationError, errorMessage } from "../errors.js";
import { OUTPUT_FORMATS, PlanJsonSchema, type PlanJson } from "../schemas.js";
import type { Task, WorkflowPlan } from "./types.js";

export const MAX_TASKS = 15;

const REQUIRED_FIELDS = ["workflow_name", "tasks"] as const;
const REQUIRED_TASK_FIELDS = ["task_id", "name", "prompt", "output_format"] as const;

export type ValidationResult = { ok: true; plan: WorkflowPlan } | { ok: false; reason: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isOutputFormat(value: unknown): boolean {
  return OUTPUT_FORMATS.some((f) => f === value);
}

/**
 * Check a model-produced workflow. Returns the first violation only, in this
 * order: top-level fields, `tasks` shape and size, per-task fields, formats.
 */
export function validateWorkflow(candidate: unknown): ValidationResult {
  if (!isRecord(candidate)) {
    return { ok: false, reason: "Workflow must be a JSON object" };
  }
  for (const field of REQUIRED_FIELDS) {
    if (!(field in candidate)) {
      return { ok: false, reason: `Missing required field: ${field}` };
    }
  }

  const tasks = candidate.tasks;
  if (!Array.isArray(tasks)) {
    return { ok: false, reason: "'tasks' must be a list" };
  }
  if (tasks.length === 0) {
    return { ok: false, reason: "Workflow must have at least one task" };
  }
  if (tasks.length > MAX_TASKS) {
    return { ok: false, reason: `Too many tasks (maximum ${MAX_TASKS})` };
  }

  for (const [i, task] of tasks.entries()) {
    if (!isRecord(task)) {
      return { ok: false, reason: `Task ${i + 1} must be an object` };
    }
    for (const field of REQUIRED_TASK_FIELDS) {
      if (!(field in task)) {
        return { ok: false, reason: `Task ${i + 1} missing required field: ${field}` };
      }
    }
    if (!isOutputFormat(task.output_format)) {
      return {
        ok: false,
        reason: `Task ${i + 1} has invalid output_format (must be 'markdown' or 'csv')`,
      };
    }
  }

  const typed = PlanJsonSchema.safeParse(candidate);
  if (!typed.success) {
    const issue = typed.error.issues[0];
    const where = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    return { ok: false, reason: `${where}${issue.message}` };
  }

  return { ok: true, plan: toWorkflowPlan(typed.data) };
}

/** Lowercase slug of `[a-z0-9_-]`, falling back to `task_{id}`. */
export function sanitizeTaskName(name: string, id: string): string {
  const slug = name
    .toLowerCase()
    .replace(/[^a-z0-9_-]+/g, "_")
    .replace(/_+/g, "_")
    .replace(/^[_-]+|[_-]+$/g, "")
    .slice(0, 80);
  return slug || `task_${id.replace(/[^a-zA-Z0-9]+/g, "") || "unnamed"}`;
}

export function toWorkflowPlan(json: PlanJson): WorkflowPlan {
  const tasks: Task[] = json.tasks.map((t) => ({
    id: t.task_id,
    name: sanitizeTaskName(t.name, t.task_id),
    prompt: t.prompt,
    outputFormat: t.output_format,
  }));
  return Object.freeze({ name: json.workflow_name, tasks: Object.freeze(tasks) });
}

/** Wire form of a plan: `{ workflow_name, tasks: [{ task_id, name, prompt, output_format }] }`. */
export function toPlanJson(plan: WorkflowPlan): PlanJson {
  return {
    workflow_name: plan.name,
    tasks: plan.tasks.map((t) => ({
      task_id: t.id,
      name: t.name,
      prompt: t.prompt,
      output_format: t.outputFormat,
    })),
  };
}

/** Parse plan JSON text (e.g. a saved plan file). Throws with the validation reason. */
export function parsePlan(text: string): WorkflowPlan {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    throw new InputValidationError(`Plan is not valid JSON: ${errorMessage(err)}`);
  }
  const result = validateWorkflow(data);
  if (!result.ok) {
    throw new InputValidationError(`Invalid workflow structure: ${result.reason}`);
  }
  return result.plan;
}
