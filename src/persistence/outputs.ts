import { mkdir } from "node:fs/promises";
import { join } from "node:path";
import type { OutputFormat } from "../planner/types.js";
import { log } from "../utils/logger.js";
import { formatDate, writeExclusive } from "./files.js";

const EXTENSIONS: Record<OutputFormat, string> = {
  markdown: "md",
  csv: "csv",
};

/** Writes task results as `{dir}/{YYYY-MM-DD}-{taskName}-rev{N}.{ext}`, taking the lowest free N. */
export class OutputWriter {
  readonly dir: string;

  constructor(dir: string) {
    this.dir = dir;
  }

  async save(content: string, taskName: string, format: OutputFormat, date = new Date()): Promise<string> {
    await mkdir(this.dir, { recursive: true });
    const prefix = `${formatDate(date)}-${taskName}`;
    const path = await writeExclusive(
      (n) => join(this.dir, `${prefix}-rev${n}.${EXTENSIONS[format]}`),
      content,
    );
    log.debug("Saved output", { path, chars: content.length });
    return path;
  }
}
