import { z } from "zod";
import { InputValidationError } from "./errors.js";

export const OUTPUT_FORMATS = ["markdown", "csv"] as const;

export const PlanTaskSchema = z.object({
  task_id: z.union([z.string(), z.number()]).transform(String),
  name: z.string().min(1),
  prompt: z.string().min(1),
  output_format: z.enum(OUTPUT_FORMATS),
});

export const PlanJsonSchema = z.object({
  workflow_name: z.string(),
  tasks: z.array(PlanTaskSchema).min(1).max(15),
});

export type PlanTaskJson = z.infer<typeof PlanTaskSchema>;
export type PlanJson = z.infer<typeof PlanJsonSchema>;

export const QueryToolArgsSchema = z.object({
  query: z.string().min(1),
  top_k: z.number().int().optional(),
});

export const ToolCallSchema = z.object({
  id: z.string(),
  type: z.literal("function").optional(),
  function: z.object({
    name: z.string(),
    arguments: z.string(),
  }),
});

export const AssistantMessageSchema = z.object({
  role: z.literal("assistant").default("assistant"),
  content: z.string().nullish(),
  tool_calls: z.array(ToolCallSchema).nullish(),
});

export const ChatCompletionSchema = z.object({
  choices: z
    .array(z.object({ message: AssistantMessageSchema }))
    .min(1),
});

export type ToolCall = z.infer<typeof ToolCallSchema>;
export type AssistantMessage = z.infer<typeof AssistantMessageSchema>;

export const MIN_GOAL_LENGTH = 20;

export const GoalSchema = z
  .string()
  .trim()
  .min(MIN_GOAL_LENGTH, `Workflow goal must be at least ${MIN_GOAL_LENGTH} characters`);

const intString = (name: string) =>
  z
    .string()
    .regex(/^\d+$/, `${name} must be a non-negative integer`)
    .transform(Number)
    .optional();

export const EnvSchema = z.object({
  OPENROUTER_API_KEY: z.string().optional(),
  OPENROUTER_MODEL: z.string().min(1).optional(),
  OPENROUTER_BASE_URL: z.string().url().optional(),
  MAX_RETRIES: intString("MAX_RETRIES"),
  API_TIMEOUT: intString("API_TIMEOUT"),
  CHUNK_SIZE: intString("CHUNK_SIZE"),
  CHUNK_OVERLAP: intString("CHUNK_OVERLAP"),
  TASKWEAVE_DB: z.string().min(1).optional(),
});

export function parseOrThrow<S extends z.ZodTypeAny>(schema: S, data: unknown): z.output<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const msg = result.error.issues
      .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
      .join("; ");
    throw new InputValidationError(msg);
  }
  return result.data;
}
