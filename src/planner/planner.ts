import { getConfig } from "../config.js";
import { AiError, ConfigError, InputValidationError, errorMessage } from "../errors.js";
import type { VectorCollection } from "../indexing/collection.js";
import { joinContext, queryCollection } from "../indexing/vector-index.js";
import type { CompletionProvider } from "../model/client.js";
import { GoalSchema, parseOrThrow } from "../schemas.js";
import { log } from "../utils/logger.js";
import { applyTemplateToContext, getTemplate } from "./templates.js";
import type { WorkflowPlan } from "./types.js";
import { toWorkflowPlan, validateWorkflow } from "./validator.js";

export const GENERIC_CONTEXT_QUERY = "project specification requirements objectives";
const TEMPLATE_CONTEXT_QUERY = "project specification";

const PLAN_JSON_EXAMPLE = `{
  "workflow_name": "Descriptive workflow name",
  "tasks": [
    {
      "task_id": "1",
      "name": "task_identifier_lowercase",
      "prompt": "Detailed task instructions...",
      "output_format": "markdown"
    }
  ]
}`;

const PLAN_RULES = `IMPORTANT:
- output_format must be either "markdown" or "csv"
- Each task prompt should clearly reference project context
- Each task prompt must be self-contained: it will run with retrieved context and the outputs of earlier tasks only
- Start your response with { and end with }
- Do NOT wrap in markdown code blocks`;

function explorationPrompt(context: string): string {
  return `Based on the following project specification, generate a workflow JSON that breaks down project planning into discrete AI tasks.

PROJECT SPECIFICATION:
${context}

Generate a JSON workflow with 4 to 15 tasks covering:
- Requirements analysis or WBS
- Task breakdown and dependencies
- Resource planning
- Risk assessment or timeline planning

CRITICAL: Return ONLY valid JSON, no other text. Use this exact structure:
${PLAN_JSON_EXAMPLE}

${PLAN_RULES}`;
}

function goalPrompt(goal: string, context: string): string {
  return `Based on the following project specification, generate a workflow JSON that breaks down into discrete AI tasks.

**WORKFLOW GOAL:**
${goal}

**PROJECT SPECIFICATION:**
${context}

Create a JSON workflow with 4-7 tasks that will accomplish the stated goal. The tasks should:
1. Be specific to the project specification
2. Build logically toward the workflow goal
3. Include appropriate analysis, planning, and documentation tasks
4. Produce actionable deliverables

CRITICAL: Return ONLY valid JSON, no other text. Use this exact structure:
${PLAN_JSON_EXAMPLE}

${PLAN_RULES}`;
}

export type PlannerCapabilities = {
  /** Let the model query the collection while planning. */
  toolCalling: boolean;
  /** Allow `generateForGoal`. */
  goalDirected: boolean;
};

export type PlanGeneratorOptions = {
  collection: VectorCollection;
  /** Needed for AI generation only; templates work without a model. */
  model?: CompletionProvider;
  capabilities?: Partial<PlannerCapabilities>;
  /** Context items retrieved for generation (default 10). */
  topK?: number;
};

/**
 * Produces validated workflow plans from indexed documents. Errors are not
 * caught here: a failed generation has no partial plan worth keeping.
 */
export class PlanGenerator {
  readonly capabilities: PlannerCapabilities;
  private collection: VectorCollection;
  private model?: CompletionProvider;
  private topK: number;

  constructor(opts: PlanGeneratorOptions) {
    this.collection = opts.collection;
    this.model = opts.model;
    this.capabilities = {
      toolCalling: opts.capabilities?.toolCalling ?? true,
      goalDirected: opts.capabilities?.goalDirected ?? true,
    };
    this.topK = opts.topK ?? getConfig().limits.generationTopK;
  }

  /** Open-ended plan of 4–15 tasks covering requirements, WBS, resourcing and risk. */
  async generate(): Promise<WorkflowPlan> {
    const context = this.genericContext(GENERIC_CONTEXT_QUERY, "\n\n---\n\n");
    return this.generateFromPrompt(explorationPrompt(context));
  }

  /** Plan of 4–7 tasks aimed at `goal`. Goals shorter than 20 characters are rejected up front. */
  async generateForGoal(goal: string): Promise<WorkflowPlan> {
    if (!this.capabilities.goalDirected) {
      throw new InputValidationError("Goal-directed generation is disabled");
    }
    const trimmed = parseOrThrow(GoalSchema, goal);
    const context = this.genericContext(GENERIC_CONTEXT_QUERY, "\n\n---\n\n");
    return this.generateFromPrompt(goalPrompt(trimmed, context));
  }

  /** Static template with the project context appended to each prompt. No model call. */
  fromTemplate(templateId: string): WorkflowPlan {
    const template = getTemplate(templateId);
    if (!template) {
      throw new InputValidationError(`Template not found: ${templateId}`);
    }
    const context = this.genericContext(TEMPLATE_CONTEXT_QUERY, "\n\n");
    const enriched = applyTemplateToContext(template, context);
    log.info(`Built plan from template "${templateId}"`, { tasks: enriched.tasks.length });
    return toWorkflowPlan({ workflow_name: enriched.workflow_name, tasks: enriched.tasks });
  }

  private genericContext(query: string, separator: string): string {
    return joinContext(queryCollection(this.collection, query, this.topK), separator);
  }

  private async generateFromPrompt(prompt: string): Promise<WorkflowPlan> {
    if (!this.model) {
      throw new ConfigError("AI plan generation needs a model client");
    }

    log.info("Generating workflow plan", { toolCalling: this.capabilities.toolCalling });
    const raw = await this.model.complete(prompt, {
      responseFormat: "json",
      toolCollection: this.capabilities.toolCalling ? this.collection : undefined,
    });

    let candidate: unknown;
    try {
      candidate = JSON.parse(raw);
    } catch (err) {
      log.error("Failed to parse plan response", { raw: raw.slice(0, 500) });
      throw new AiError("parse", `AI returned invalid JSON: ${errorMessage(err)}`);
    }

    const result = validateWorkflow(candidate);
    if (!result.ok) {
      throw new AiError("validation", `Invalid workflow structure: ${result.reason}`);
    }

    log.info(`Generated plan "${result.plan.name}"`, { tasks: result.plan.tasks.length });
    return result.plan;
  }
}
