import { getConfig } from "../config.js";
import { categorize, errorMessage } from "../errors.js";
import type { VectorCollection } from "../indexing/collection.js";
import { joinContext, queryCollection, type RetrievedContext } from "../indexing/vector-index.js";
import type { CompletionProvider } from "../model/client.js";
import type { Task } from "../planner/types.js";
import { log } from "../utils/logger.js";
import { failure, success, type Result } from "../utils/result.js";
import { truncateCodePoints } from "../utils/text.js";
import type { AssembledPrompt } from "./types.js";

export const TRUNCATION_MARKER = "\n\n[Context truncated]";
export const OUTPUT_SEPARATOR = "\n\n---\n\n";
const BLOCK_SEPARATOR = `\n\n${"=".repeat(50)}\n\n`;

/**
 * Assemble the prompt for one task. Only the context (retrieved chunks and
 * previous outputs) is cut to `contextLimit` code points; the task's own instruction is
 * always kept whole.
 */
export function buildTaskPrompt(
  task: Task,
  items: RetrievedContext[],
  previousOutputs: readonly string[],
  contextLimit: number,
): AssembledPrompt {
  const blocks = [`PROJECT SPECIFICATION:\n${joinContext(items)}`];
  if (previousOutputs.length > 0) {
    blocks.push(`PREVIOUS OUTPUTS:\n${previousOutputs.join(OUTPUT_SEPARATOR)}`);
  }

  let context = blocks.join(BLOCK_SEPARATOR);
  const kept = truncateCodePoints(context, contextLimit);
  const truncated = kept !== context;
  if (truncated) {
    context = kept + TRUNCATION_MARKER;
  }

  const prompt = `${task.prompt}

${context}

Provide detailed output in ${task.outputFormat} format.`;

  return { prompt, context, truncated };
}

export type TaskExecutorOptions = {
  collection: VectorCollection;
  model: CompletionProvider;
  /** Let the model query the collection while answering (default true). */
  toolCalling?: boolean;
  topK?: number;
  contextLimit?: number;
};

export interface TaskRunner {
  executeOne(task: Task, previousOutputs: readonly string[]): Promise<Result<string>>;
}

/** Runs a single task. Never throws: every failure comes back as a classified Result. */
export class TaskExecutor implements TaskRunner {
  private collection: VectorCollection;
  private model: CompletionProvider;
  private toolCalling: boolean;
  private topK: number;
  private contextLimit: number;

  constructor(opts: TaskExecutorOptions) {
    const { limits } = getConfig();
    this.collection = opts.collection;
    this.model = opts.model;
    this.toolCalling = opts.toolCalling ?? true;
    this.topK = opts.topK ?? limits.taskTopK;
    this.contextLimit = opts.contextLimit ?? limits.contextChars;
  }

  async executeOne(task: Task, previousOutputs: readonly string[]): Promise<Result<string>> {
    try {
      const items = queryCollection(this.collection, task.prompt, this.topK);
      const assembled = buildTaskPrompt(task, items, previousOutputs, this.contextLimit);
      if (assembled.truncated) {
        log.warn(`Context for task "${task.name}" truncated`, { limit: this.contextLimit });
      }

      const output = await this.model.complete(assembled.prompt, {
        toolCollection: this.toolCalling ? this.collection : undefined,
      });
      return success(output);
    } catch (err) {
      const category = categorize(err);
      log.error(`Task "${task.name}" failed`, { category, error: errorMessage(err) });
      return failure(category, errorMessage(err));
    }
  }
}
