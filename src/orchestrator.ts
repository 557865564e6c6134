import { randomUUID } from "node:crypto";
import { InputValidationError, errorMessage } from "./errors.js";
import type { TaskRunner } from "./executor/executor.js";
import type { FailureRecord, TaskOutcome } from "./executor/types.js";
import type { HistoryStore } from "./persistence/history.js";
import type { OutputWriter } from "./persistence/outputs.js";
import type { Task, WorkflowPlan } from "./planner/types.js";
import { log } from "./utils/logger.js";
import { failure, success, type Result } from "./utils/result.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type RunSummary = {
  readonly runId: string;
  readonly plan: WorkflowPlan;
  readonly outcomes: readonly TaskOutcome[];
  readonly artifacts: readonly string[];
  readonly failures: readonly FailureRecord[];
  /** Cumulative outputs of every successful task, in plan order. */
  readonly previousOutputs: readonly string[];
  readonly succeeded: number;
  readonly failed: number;
  readonly notAttempted: number;
  readonly historyPath?: string;
  readonly stopped: boolean;
  readonly startedAt: number;
  readonly finishedAt: number;
};

export type RunCallbacks = {
  onTaskStart?: (index: number, task: Task, total: number) => void;
  onTaskEnd?: (outcome: TaskOutcome) => void;
  onRunEnd?: (summary: RunSummary) => void;
};

export type RunOptions = {
  /** Checked before each task after the first; returning false stops the pass. */
  shouldContinue?: () => boolean;
};

export type RunControllerOptions = {
  executor: TaskRunner;
  outputs: OutputWriter;
  history?: HistoryStore;
};

/** Mutable accumulator for one pass. Never escapes `run`. */
type RunState = {
  previousOutputs: string[];
  artifacts: string[];
  failures: Map<number, FailureRecord>;
  outcomes: TaskOutcome[];
};

export function formatPreviousOutput(task: Task, output: string): string {
  return `[Task ${task.id}]\n${output}`;
}

function countStatus(outcomes: readonly TaskOutcome[], status: TaskOutcome["status"]): number {
  return outcomes.filter((o) => o.status === status).length;
}

// ---------------------------------------------------------------------------
// Controller
// ---------------------------------------------------------------------------

/**
 * Runs a plan's tasks one at a time, in order. A failed task is recorded and
 * the pass moves on; every task is attempted exactly once.
 */
export class RunController {
  private executor: TaskRunner;
  private outputs: OutputWriter;
  private history?: HistoryStore;

  constructor(opts: RunControllerOptions) {
    this.executor = opts.executor;
    this.outputs = opts.outputs;
    this.history = opts.history;
  }

  async run(plan: WorkflowPlan, callbacks?: RunCallbacks, opts?: RunOptions): Promise<RunSummary> {
    const runId = randomUUID();
    const startedAt = Date.now();
    const total = plan.tasks.length;
    const state: RunState = { previousOutputs: [], artifacts: [], failures: new Map(), outcomes: [] };
    let stopped = false;

    log.info(`Run ${runId.slice(0, 8)} started`, { plan: plan.name, tasks: total });

    for (const [index, task] of plan.tasks.entries()) {
      if (index > 0 && opts?.shouldContinue && !opts.shouldContinue()) {
        stopped = true;
        for (const rest of plan.tasks.slice(index)) {
          state.outcomes.push({ index: state.outcomes.length, task: rest, status: "skipped" });
        }
        log.warn("Run stopped before completion", { remaining: total - index });
        break;
      }

      callbacks?.onTaskStart?.(index, task, total);
      log.info(`Task ${index + 1}/${total}: ${task.name}`);
      const start = Date.now();

      const snapshot = Object.freeze([...state.previousOutputs]);
      const result = await this.attempt(task, snapshot);
      const durationMs = Date.now() - start;
      let outcome: TaskOutcome;

      if (result.ok) {
        state.artifacts.push(result.value.artifact);
        state.previousOutputs.push(formatPreviousOutput(task, result.value.output));
        state.failures.delete(index);
        outcome = { index, task, status: "succeeded", artifact: result.value.artifact, durationMs };
      } else {
        state.failures.set(index, {
          index,
          task,
          error: result.message,
          category: result.kind,
          previousOutputs: snapshot,
        });
        outcome = { index, task, status: "failed", error: result.message, category: result.kind, durationMs };
      }

      state.outcomes.push(outcome);
      callbacks?.onTaskEnd?.(outcome);
    }

    const historyPath = await this.saveHistory(plan, state.artifacts);
    const summary: RunSummary = Object.freeze({
      runId,
      plan,
      outcomes: Object.freeze(state.outcomes),
      artifacts: Object.freeze(state.artifacts),
      failures: Object.freeze([...state.failures.values()]),
      previousOutputs: Object.freeze(state.previousOutputs),
      succeeded: countStatus(state.outcomes, "succeeded"),
      failed: countStatus(state.outcomes, "failed"),
      notAttempted: countStatus(state.outcomes, "skipped"),
      historyPath,
      stopped,
      startedAt,
      finishedAt: Date.now(),
    });

    log.info(`Run ${runId.slice(0, 8)} finished`, {
      succeeded: summary.succeeded,
      failed: summary.failed,
      notAttempted: summary.notAttempted,
    });
    callbacks?.onRunEnd?.(summary);
    return summary;
  }

  /**
   * Re-run one failed task against the previous outputs captured when it
   * failed. Returns a new summary; the given one is left untouched.
   */
  async retry(summary: RunSummary, index: number): Promise<RunSummary> {
    const record = summary.failures.find((f) => f.index === index);
    if (!record) {
      throw new InputValidationError(`No failed task at index ${index}`);
    }

    log.info(`Retrying task ${index + 1}: ${record.task.name}`, { category: record.category });
    const start = Date.now();
    const result = await this.attempt(record.task, record.previousOutputs);
    const durationMs = Date.now() - start;

    if (!result.ok) {
      const updated: FailureRecord = { ...record, error: result.message, category: result.kind };
      return Object.freeze({
        ...summary,
        failures: Object.freeze(summary.failures.map((f) => (f.index === index ? updated : f))),
        outcomes: Object.freeze(
          summary.outcomes.map((o) =>
            o.index === index ? { ...o, error: result.message, category: result.kind, durationMs } : o,
          ),
        ),
        finishedAt: Date.now(),
      });
    }

    const { artifact } = result.value;
    const outcomes = summary.outcomes.map(
      (o): TaskOutcome =>
        o.index === index ? { index, task: record.task, status: "succeeded", artifact, durationMs } : o,
    );
    return Object.freeze({
      ...summary,
      outcomes: Object.freeze(outcomes),
      artifacts: Object.freeze([...summary.artifacts, artifact]),
      failures: Object.freeze(summary.failures.filter((f) => f.index !== index)),
      succeeded: countStatus(outcomes, "succeeded"),
      failed: countStatus(outcomes, "failed"),
      finishedAt: Date.now(),
    });
  }

  private async attempt(
    task: Task,
    previousOutputs: readonly string[],
  ): Promise<Result<{ output: string; artifact: string }>> {
    const result = await this.executor.executeOne(task, previousOutputs);
    if (!result.ok) return result;

    try {
      const artifact = await this.outputs.save(result.value, task.name, task.outputFormat);
      return success({ output: result.value, artifact });
    } catch (err) {
      log.error(`Could not save output of "${task.name}"`, { error: errorMessage(err) });
      return failure("UNKNOWN_ERROR", `Failed to save output: ${errorMessage(err)}`);
    }
  }

  private async saveHistory(plan: WorkflowPlan, artifacts: readonly string[]): Promise<string | undefined> {
    if (!this.history) return undefined;
    try {
      const path = await this.history.save(plan, artifacts);
      log.info("History saved", { path });
      return path;
    } catch (err) {
      log.error("Could not save run history", { error: errorMessage(err) });
      return undefined;
    }
  }
}
