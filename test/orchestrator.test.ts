import { mkdtemp, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { TaskRunner } from "../src/executor/executor.js";
import { RunController, formatPreviousOutput } from "../src/orchestrator.js";
import { HistoryStore } from "../src/persistence/history.js";
import { OutputWriter } from "../src/persistence/outputs.js";
import type { Task, WorkflowPlan } from "../src/planner/types.js";
import { setLogLevel } from "../src/utils/logger.js";
import { failure, success, type Result } from "../src/utils/result.js";

setLogLevel("silent");

/** Replays queued results per task id and records what each call saw. */
class ScriptedRunner implements TaskRunner {
  calls: Array<{ taskId: string; previousOutputs: readonly string[] }> = [];

  constructor(private queues: Record<string, Array<Result<string>>>) {}

  async executeOne(task: Task, previousOutputs: readonly string[]): Promise<Result<string>> {
    this.calls.push({ taskId: task.id, previousOutputs });
    const next = this.queues[task.id]?.shift();
    return next ?? failure("UNKNOWN_ERROR", `no scripted result for task ${task.id}`);
  }
}

const plan: WorkflowPlan = {
  name: "Launch plan",
  tasks: [
    { id: "1", name: "analysis", prompt: "Analyse", outputFormat: "markdown" },
    { id: "2", name: "budget", prompt: "Budget", outputFormat: "csv" },
    { id: "3", name: "summary", prompt: "Summarise", outputFormat: "markdown" },
  ],
};

describe("RunController", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "taskweave-run-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  const controllerFor = (runner: TaskRunner, outputsDir = join(dir, "outputs")) =>
    new RunController({
      executor: runner,
      outputs: new OutputWriter(outputsDir),
      history: new HistoryStore(join(dir, "history")),
    });

  it("attempts every task once and carries only successful outputs forward", async () => {
    const runner = new ScriptedRunner({
      "1": [success("scope notes")],
      "2": [failure("AI_ERROR", "AI call failed: HTTP 503")],
      "3": [success("final summary")],
    });

    const summary = await controllerFor(runner).run(plan);

    expect(runner.calls.map((c) => c.taskId)).toEqual(["1", "2", "3"]);
    expect(runner.calls[1].previousOutputs).toEqual(["[Task 1]\nscope notes"]);
    expect(runner.calls[2].previousOutputs).toEqual(["[Task 1]\nscope notes"]);
    expect(summary.outcomes.map((o) => o.status)).toEqual(["succeeded", "failed", "succeeded"]);
    expect([summary.succeeded, summary.failed, summary.notAttempted]).toEqual([2, 1, 0]);
    expect(summary.previousOutputs).toEqual(["[Task 1]\nscope notes", "[Task 3]\nfinal summary"]);
    expect(summary.failures).toEqual([
      {
        index: 1,
        task: plan.tasks[1],
        error: "AI call failed: HTTP 503",
        category: "AI_ERROR",
        previousOutputs: ["[Task 1]\nscope notes"],
      },
    ]);
    expect(summary.stopped).toBe(false);
  });

  it("writes one artifact per successful task", async () => {
    const runner = new ScriptedRunner({
      "1": [success("scope notes")],
      "2": [failure("AI_ERROR", "boom")],
      "3": [success("final summary")],
    });

    const summary = await controllerFor(runner).run(plan);

    expect(summary.artifacts).toHaveLength(2);
    expect(summary.artifacts[0]).toMatch(/-analysis-rev0\.md$/);
    expect(summary.artifacts[1]).toMatch(/-summary-rev0\.md$/);
    expect(await readFile(summary.artifacts[0], "utf-8")).toBe("scope notes");
  });

  it("records the run in history", async () => {
    const runner = new ScriptedRunner({ "1": [success("a")], "2": [success("b")], "3": [success("c")] });

    const summary = await controllerFor(runner).run(plan);

    expect(summary.historyPath).toBeDefined();
    const record = JSON.parse(await readFile(String(summary.historyPath), "utf-8"));
    expect(record.workflow_name).toBe("Launch plan");
    expect(record.num_tasks).toBe(3);
    expect(record.output_files).toEqual(summary.artifacts);
  });

  it("hands each task a frozen snapshot", async () => {
    const runner = new ScriptedRunner({ "1": [success("a")], "2": [success("b")], "3": [success("c")] });
    await controllerFor(runner).run(plan);

    expect(runner.calls[0].previousOutputs).toEqual([]);
    expect(runner.calls[1].previousOutputs).toEqual(["[Task 1]\na"]);
    expect(runner.calls.every((c) => Object.isFrozen(c.previousOutputs))).toBe(true);
  });

  it("reports run progress through callbacks", async () => {
    const runner = new ScriptedRunner({ "1": [success("a")], "2": [failure("VECTOR_ERROR", "x")], "3": [success("c")] });
    const events: string[] = [];

    await controllerFor(runner).run(plan, {
      onTaskStart: (index, task, total) => events.push(`start ${index} ${task.name} ${total}`),
      onTaskEnd: (outcome) => events.push(`end ${outcome.index} ${outcome.status}`),
      onRunEnd: (summary) => events.push(`done ${summary.succeeded}/${summary.failed}`),
    });

    expect(events).toEqual([
      "start 0 analysis 3",
      "end 0 succeeded",
      "start 1 budget 3",
      "end 1 failed",
      "start 2 summary 3",
      "end 2 succeeded",
      "done 2/1",
    ]);
  });

  it("marks remaining tasks as not attempted when told to stop", async () => {
    const runner = new ScriptedRunner({ "1": [success("a")] });

    const summary = await controllerFor(runner).run(plan, undefined, { shouldContinue: () => false });

    expect(runner.calls).toHaveLength(1);
    expect(summary.outcomes.map((o) => o.status)).toEqual(["succeeded", "skipped", "skipped"]);
    expect(summary.notAttempted).toBe(2);
    expect(summary.stopped).toBe(true);
  });

  it("turns an output write failure into a task failure", async () => {
    const blocker = join(dir, "blocker");
    await writeFile(blocker, "not a directory");
    const runner = new ScriptedRunner({ "1": [success("a")], "2": [success("b")], "3": [success("c")] });

    const summary = await controllerFor(runner, blocker).run(plan);

    expect(summary.failed).toBe(3);
    expect(summary.previousOutputs).toEqual([]);
    expect(summary.failures[0].category).toBe("UNKNOWN_ERROR");
    expect(summary.failures[0].error).toMatch(/^Failed to save output: /);
  });

  describe("retry", () => {
    it("re-runs a failed task with the outputs it saw and returns a new summary", async () => {
      const runner = new ScriptedRunner({
        "1": [success("scope notes")],
        "2": [failure("AI_ERROR", "AI call failed: HTTP 503"), success("budget table")],
        "3": [success("final summary")],
      });
      const controller = controllerFor(runner);
      const first = await controller.run(plan);

      const second = await controller.retry(first, 1);

      expect(runner.calls[3]).toEqual({ taskId: "2", previousOutputs: ["[Task 1]\nscope notes"] });
      expect(second.failures).toEqual([]);
      expect([second.succeeded, second.failed]).toEqual([3, 0]);
      expect(second.outcomes[1].status).toBe("succeeded");
      expect(second.artifacts).toHaveLength(3);
      expect(second.artifacts[2]).toMatch(/-budget-rev0\.csv$/);

      expect(first.failed).toBe(1);
      expect(first.artifacts).toHaveLength(2);
      expect(Object.isFrozen(second)).toBe(true);
    });

    it("keeps the failure with the newest error when the retry fails", async () => {
      const runner = new ScriptedRunner({
        "1": [success("a")],
        "2": [failure("AI_ERROR", "first"), failure("VECTOR_ERROR", "second")],
        "3": [success("c")],
      });
      const controller = controllerFor(runner);

      const retried = await controller.retry(await controller.run(plan), 1);

      expect(retried.failures).toHaveLength(1);
      expect(retried.failures[0]).toMatchObject({ index: 1, error: "second", category: "VECTOR_ERROR" });
      expect(retried.outcomes[1]).toMatchObject({ status: "failed", error: "second" });
      expect(retried.failed).toBe(1);
    });

    it("rejects indexes without a recorded failure", async () => {
      const runner = new ScriptedRunner({ "1": [success("a")], "2": [success("b")], "3": [success("c")] });
      const controller = controllerFor(runner);
      const summary = await controller.run(plan);

      await expect(controller.retry(summary, 0)).rejects.toThrow("No failed task at index 0");
    });
  });

  it("runs without a history store", async () => {
    const controller = new RunController({
      executor: new ScriptedRunner({ "1": [success("a")], "2": [success("b")], "3": [success("c")] }),
      outputs: new OutputWriter(join(dir, "outputs")),
    });

    const summary = await controller.run(plan);
    expect(summary.historyPath).toBeUndefined();
    expect(await readdir(dir)).toEqual(["outputs"]);
  });
});

describe("formatPreviousOutput", () => {
  it("labels output with the task id", () => {
    expect(formatPreviousOutput(plan.tasks[2], "done")).toBe("[Task 3]\ndone");
  });
});
