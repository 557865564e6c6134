// Config
export { getConfig, configure, resetConfig, resolveConfig, loadEnvConfig, defaults } from "./config.js";
export type { PipelineConfig, DeepPartial, LoadEnvOptions } from "./config.js";

// Errors
export {
  PipelineError,
  ConfigError,
  InputValidationError,
  StorageError,
  AiError,
  categorize,
  errorMessage,
} from "./errors.js";
export type { ErrorCode, ErrorCategory, AiErrorKind } from "./errors.js";

// Schemas
export {
  parseOrThrow,
  PlanJsonSchema,
  PlanTaskSchema,
  GoalSchema,
  EnvSchema,
  OUTPUT_FORMATS,
  MIN_GOAL_LENGTH,
} from "./schemas.js";
export type { PlanJson, PlanTaskJson } from "./schemas.js";

// Indexing
export { chunkText, estimateChunkCount, MIN_CHUNK_SIZE } from "./indexing/chunker.js";
export type { TextChunk } from "./indexing/chunker.js";
export { SqliteCollection, openCollection, chunkId } from "./indexing/collection.js";
export type { VectorCollection, CollectionQueryResult, StoredDocument, ChunkMetadata } from "./indexing/collection.js";
export { indexDocument, queryCollection, validateTextInput, joinContext } from "./indexing/vector-index.js";
export type { ChunkingOptions, IndexResult, RetrievedContext } from "./indexing/vector-index.js";

// Model
export { ModelClient } from "./model/client.js";
export type { CompletionProvider, CompleteOptions, ModelClientOptions, ChatMessage, FetchFn } from "./model/client.js";
export { extractJson, withJsonInstructions } from "./model/json.js";
export { QUERY_TOOL, QUERY_TOOL_NAME, executeToolCall } from "./model/tools.js";

// Planning
export { PlanGenerator } from "./planner/planner.js";
export type { PlanGeneratorOptions, PlannerCapabilities } from "./planner/planner.js";
export { validateWorkflow, parsePlan, toPlanJson, toWorkflowPlan, sanitizeTaskName, MAX_TASKS } from "./planner/validator.js";
export type { ValidationResult } from "./planner/validator.js";
export { getTemplate, listTemplates, suggestTemplate, applyTemplateToContext } from "./planner/templates.js";
export type { WorkflowTemplate, TemplateSummary } from "./planner/templates.js";
export type { Task, WorkflowPlan, OutputFormat } from "./planner/types.js";

// Execution
export { TaskExecutor, buildTaskPrompt, TRUNCATION_MARKER } from "./executor/executor.js";
export type { TaskExecutorOptions, TaskRunner } from "./executor/executor.js";
export type { TaskOutcome, TaskStatus, FailureRecord, AssembledPrompt } from "./executor/types.js";
export { RunController, formatPreviousOutput } from "./orchestrator.js";
export type { RunSummary, RunCallbacks, RunOptions, RunControllerOptions } from "./orchestrator.js";

// Persistence
export { OutputWriter } from "./persistence/outputs.js";
export { HistoryStore } from "./persistence/history.js";
export type { HistoryEntry, HistoryRecord } from "./persistence/history.js";

// Session
export { createSession, sessionFromCollection, indexFiles } from "./session.js";
export type { Session, IndexedDocument, SourceFile, FileIndexOutcome, IndexFilesOptions } from "./session.js";

// Utils
export { log, setLogLevel } from "./utils/logger.js";
export type { LogLevel } from "./utils/logger.js";
export { withRetry, backoffDelay } from "./utils/retry.js";
export { success, failure } from "./utils/result.js";
export type { Result, Success, Failure } from "./utils/result.js";
