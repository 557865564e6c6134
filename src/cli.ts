#!/usr/bin/env node

import "dotenv/config";
import { readFile, writeFile } from "node:fs/promises";
import { basename } from "node:path";
import { Command } from "commander";
import { configure, getConfig, loadEnvConfig, type PipelineConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { TaskExecutor } from "./executor/executor.js";
import type { TaskOutcome } from "./executor/types.js";
import { openCollection, type VectorCollection } from "./indexing/collection.js";
import { ModelClient } from "./model/client.js";
import { RunController, type RunSummary } from "./orchestrator.js";
import { HistoryStore } from "./persistence/history.js";
import { OutputWriter } from "./persistence/outputs.js";
import { PlanGenerator } from "./planner/planner.js";
import { listTemplates } from "./planner/templates.js";
import type { WorkflowPlan } from "./planner/types.js";
import { parsePlan, toPlanJson } from "./planner/validator.js";
import { indexFiles, sessionFromCollection, type SourceFile } from "./session.js";
import { setLogLevel } from "./utils/logger.js";

process.on("unhandledRejection", (reason) => {
  console.error("Unhandled rejection:", errorMessage(reason));
  process.exitCode = 1;
});

type GlobalOptions = {
  debug?: boolean;
  db?: string;
  outputs?: string;
  history?: string;
};

const program = new Command();

program
  .name("taskweave")
  .description("Plan and run document-grounded AI task workflows")
  .version("0.1.0")
  .option("--debug", "Enable debug logging")
  .option("--db <path>", "Document store path (default: $TASKWEAVE_DB or taskweave.db)")
  .option("--outputs <dir>", "Directory for task outputs", "outputs")
  .option("--history <dir>", "Directory for run history", "history");

program.hook("preAction", (_cmd, actionCmd) => {
  const opts = actionCmd.optsWithGlobals<GlobalOptions>();
  if (opts.debug) setLogLevel("debug");
});

/** Merge environment and command-line settings into the global config. */
function loadSettings(globals: GlobalOptions, requireApiKey: boolean): Readonly<PipelineConfig> {
  const env = loadEnvConfig(process.env, { requireApiKey });
  configure({
    ...env,
    paths: {
      dbPath: globals.db ?? env.paths?.dbPath,
      outputsDir: globals.outputs,
      historyDir: globals.history,
    },
  });
  return getConfig();
}

async function withCollection<T>(dbPath: string, fn: (collection: VectorCollection) => Promise<T>): Promise<T> {
  const collection = openCollection(dbPath);
  try {
    return await fn(collection);
  } finally {
    collection.close();
  }
}

function fail(prefix: string, err: unknown): void {
  console.error(`${prefix}:`, errorMessage(err));
  process.exitCode = 1;
}

function buildModel(config: Readonly<PipelineConfig>): ModelClient {
  return new ModelClient({ apiKey: config.model.apiKey, modelId: config.model.modelId });
}

function printOutcome(outcome: TaskOutcome, total: number): void {
  const label = `[${outcome.index + 1}/${total}] ${outcome.task.name}`;
  if (outcome.status === "succeeded") {
    console.log(`  + ${label} -> ${outcome.artifact ?? ""} (${outcome.durationMs ?? 0}ms)`);
  } else {
    console.log(`  x ${label}: ${outcome.category ?? "UNKNOWN_ERROR"} ${outcome.error ?? ""}`);
  }
}

function printSummary(summary: RunSummary): void {
  console.log(`\n--- ${summary.plan.name} ---`);
  console.log(
    `Succeeded: ${summary.succeeded}  Failed: ${summary.failed}  Not attempted: ${summary.notAttempted}`,
  );
  for (const failure of summary.failures) {
    console.log(`  Task ${failure.index + 1} (${failure.task.name}): ${failure.error}`);
  }
  if (summary.historyPath) console.log(`History: ${summary.historyPath}`);
}

// --- index ---
program
  .command("index")
  .description("Index text documents for retrieval")
  .argument("<files...>", "Text files to index")
  .option("--skip-existing", "Leave documents that are already indexed untouched")
  .action(async (files: string[], opts: { skipExisting?: boolean }, cmd: Command) => {
    try {
      const config = loadSettings(cmd.optsWithGlobals<GlobalOptions>(), false);
      const sources: SourceFile[] = [];
      for (const file of files) {
        try {
          sources.push({ name: basename(file), content: await readFile(file, "utf-8") });
        } catch (err) {
          console.error(`  x ${file}: ${errorMessage(err)}`);
          process.exitCode = 1;
        }
      }

      await withCollection(config.paths.dbPath, async (collection) => {
        const { session, outcomes } = indexFiles(sessionFromCollection(collection), collection, sources, {
          chunking: config.chunking,
          reindex: !opts.skipExisting,
        });
        for (const o of outcomes) {
          if (o.status === "indexed") console.log(`  + ${o.name}: ${o.chunkCount} chunks`);
          else if (o.status === "skipped") console.log(`  - ${o.name}: already indexed`);
          else {
            console.log(`  x ${o.name}: ${o.error}`);
            process.exitCode = 1;
          }
        }
        console.log(`\n${session.indexedDocuments.length} document(s), ${session.totalChunks} chunk(s) indexed`);
        if (session.suggestedTemplate) console.log(`Suggested template: ${session.suggestedTemplate}`);
      });
    } catch (err) {
      fail("Indexing failed", err);
    }
  });

// --- documents ---
program
  .command("documents")
  .description("List indexed documents")
  .action(async (_opts: unknown, cmd: Command) => {
    try {
      const config = loadSettings(cmd.optsWithGlobals<GlobalOptions>(), false);
      await withCollection(config.paths.dbPath, async (collection) => {
        const docs = collection.listDocuments();
        if (docs.length === 0) {
          console.log("No documents indexed. Use `taskweave index <files...>` to add some.");
          return;
        }
        for (const doc of docs) {
          console.log(`${doc.documentId}  ${doc.chunkCount} chunks  (${doc.indexedAt})`);
        }
      });
    } catch (err) {
      fail("Error", err);
    }
  });

// --- templates ---
program
  .command("templates")
  .description("List the built-in workflow templates")
  .action(() => {
    for (const t of listTemplates()) {
      console.log(`${t.id}  ${t.name} (${t.taskCount} tasks)\n    ${t.description}`);
    }
  });

// --- plan ---
program
  .command("plan")
  .description("Generate a workflow plan from the indexed documents")
  .option("-g, --goal <text>", "Generate a plan aimed at this goal")
  .option("-t, --template <id>", "Build the plan from a template instead of the model")
  .option("--no-tools", "Do not let the model query documents while planning")
  .option("-o, --output <file>", "Write the plan JSON to a file")
  .action(
    async (opts: { goal?: string; template?: string; tools: boolean; output?: string }, cmd: Command) => {
      try {
        const config = loadSettings(cmd.optsWithGlobals<GlobalOptions>(), !opts.template);
        const plan = await withCollection(config.paths.dbPath, async (collection): Promise<WorkflowPlan> => {
          if (collection.listDocuments().length === 0) {
            throw new Error("No documents indexed. Run `taskweave index <files...>` first.");
          }
          const planner = new PlanGenerator({
            collection,
            model: opts.template ? undefined : buildModel(config),
            capabilities: { toolCalling: opts.tools },
          });
          if (opts.template) return planner.fromTemplate(opts.template);
          if (opts.goal) return planner.generateForGoal(opts.goal);
          return planner.generate();
        });

        const json = JSON.stringify(toPlanJson(plan), null, 2);
        if (opts.output) {
          await writeFile(opts.output, json + "\n", "utf-8");
          console.log(`Plan "${plan.name}" (${plan.tasks.length} tasks) written to ${opts.output}`);
        } else {
          console.log(json);
        }
      } catch (err) {
        fail("Plan generation failed", err);
      }
    },
  );

// --- run ---
program
  .command("run")
  .description("Run every task of a plan file in order")
  .argument("<plan>", "Plan JSON file")
  .option("--retry-failed", "Retry each failed task once after the pass")
  .option("--no-tools", "Do not let the model query documents while executing")
  .action(async (planFile: string, opts: { retryFailed?: boolean; tools: boolean }, cmd: Command) => {
    try {
      const config = loadSettings(cmd.optsWithGlobals<GlobalOptions>(), true);
      const plan = parsePlan(await readFile(planFile, "utf-8"));

      await withCollection(config.paths.dbPath, async (collection) => {
        const controller = new RunController({
          executor: new TaskExecutor({ collection, model: buildModel(config), toolCalling: opts.tools }),
          outputs: new OutputWriter(config.paths.outputsDir),
          history: new HistoryStore(config.paths.historyDir),
        });

        let interrupted = false;
        const onSigint = () => {
          if (interrupted) process.exit(130);
          interrupted = true;
          console.error("\nStopping after the current task (Ctrl+C again to abort)...");
        };
        process.on("SIGINT", onSigint);

        try {
          const total = plan.tasks.length;
          console.log(`Running "${plan.name}" (${total} tasks)`);
          let summary = await controller.run(
            plan,
            { onTaskEnd: (outcome) => printOutcome(outcome, total) },
            { shouldContinue: () => !interrupted },
          );

          if (opts.retryFailed && !interrupted) {
            for (const failure of summary.failures) {
              console.log(`Retrying task ${failure.index + 1}: ${failure.task.name}`);
              summary = await controller.retry(summary, failure.index);
            }
          }

          printSummary(summary);
          if (summary.failed > 0 || summary.stopped) process.exitCode = 1;
        } finally {
          process.off("SIGINT", onSigint);
        }
      });
    } catch (err) {
      fail("Run failed", err);
    }
  });

// --- history ---
program
  .command("history")
  .description("List past runs, newest first")
  .action(async (_opts: unknown, cmd: Command) => {
    try {
      const config = loadSettings(cmd.optsWithGlobals<GlobalOptions>(), false);
      const entries = await new HistoryStore(config.paths.historyDir).list();
      if (entries.length === 0) {
        console.log("No runs recorded yet.");
        return;
      }
      for (const e of entries) {
        console.log(`${e.timestamp}  ${e.workflowName}  ${e.taskCount} tasks, ${e.outputFiles.length} outputs`);
      }
    } catch (err) {
      fail("Error", err);
    }
  });

void (async () => {
  try {
    await program.parseAsync();
  } catch (err) {
    console.error(errorMessage(err));
    process.exitCode = 1;
  }
})();
