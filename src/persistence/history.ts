import { mkdir, readFile, readdir } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import { errorMessage } from "../errors.js";
import type { WorkflowPlan } from "../planner/types.js";
import { toPlanJson } from "../planner/validator.js";
import type { PlanJson } from "../schemas.js";
import { log } from "../utils/logger.js";
import { formatTimestamp, writeExclusive } from "./files.js";

export type HistoryRecord = {
  workflow_name: string;
  timestamp: string;
  num_tasks: number;
  output_files: string[];
  workflow: PlanJson;
};

export type HistoryEntry = {
  filename: string;
  workflowName: string;
  timestamp: string;
  taskCount: number;
  outputFiles: string[];
};

const HistoryHeaderSchema = z.object({
  workflow_name: z.string(),
  timestamp: z.string(),
  num_tasks: z.number(),
  output_files: z.array(z.string()).default([]),
});

/** One JSON file per run under `{dir}/workflow_{YYYY-MM-DD_HH-mm-ss}.json`. */
export class HistoryStore {
  readonly dir: string;

  constructor(dir: string) {
    this.dir = dir;
  }

  async save(plan: WorkflowPlan, outputFiles: readonly string[], date = new Date()): Promise<string> {
    await mkdir(this.dir, { recursive: true });
    const timestamp = formatTimestamp(date);
    const record: HistoryRecord = {
      workflow_name: plan.name,
      timestamp,
      num_tasks: plan.tasks.length,
      output_files: [...outputFiles],
      workflow: toPlanJson(plan),
    };
    return writeExclusive(
      (n) => join(this.dir, n === 0 ? `workflow_${timestamp}.json` : `workflow_${timestamp}-${n}.json`),
      JSON.stringify(record, null, 2),
    );
  }

  /** Newest first. Files that cannot be read or parsed are skipped. */
  async list(): Promise<HistoryEntry[]> {
    let files: string[];
    try {
      files = await readdir(this.dir);
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") return [];
      throw err;
    }

    const entries: HistoryEntry[] = [];
    for (const filename of files.filter((f) => f.endsWith(".json")).sort().reverse()) {
      try {
        const data = HistoryHeaderSchema.parse(JSON.parse(await readFile(join(this.dir, filename), "utf-8")));
        entries.push({
          filename,
          workflowName: data.workflow_name,
          timestamp: data.timestamp,
          taskCount: data.num_tasks,
          outputFiles: data.output_files,
        });
      } catch (err) {
        log.warn(`Skipping unreadable history file "${filename}"`, { error: errorMessage(err) });
      }
    }
    return entries;
  }
}
