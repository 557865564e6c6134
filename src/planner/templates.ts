import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { PlanTaskSchema } from "../schemas.js";

const TEMPLATES_FILE = fileURLToPath(new URL("../../data/templates.json", import.meta.url));

const TemplateSchema = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string(),
  workflow_name: z.string(),
  tasks: z.array(PlanTaskSchema).min(1),
});

const TemplateFileSchema = z.object({ templates: z.array(TemplateSchema) });

export type WorkflowTemplate = z.infer<typeof TemplateSchema>;

export type TemplateSummary = {
  id: string;
  name: string;
  description: string;
  taskCount: number;
};

let registry: Map<string, WorkflowTemplate> | undefined;

function loadRegistry(): Map<string, WorkflowTemplate> {
  if (!registry) {
    const data = TemplateFileSchema.parse(JSON.parse(readFileSync(TEMPLATES_FILE, "utf-8")));
    registry = new Map(data.templates.map((t) => [t.id, t]));
  }
  return registry;
}

export function getTemplate(id: string): WorkflowTemplate | undefined {
  return loadRegistry().get(id);
}

export function listTemplates(): TemplateSummary[] {
  return [...loadRegistry().values()].map((t) => ({
    id: t.id,
    name: t.name,
    description: t.description,
    taskCount: t.tasks.length,
  }));
}

/** Checked in order; the first template with a matching keyword wins. */
const KEYWORDS: Array<[string, string[]]> = [
  ["software_development", ["software", "application", "system", "development", "api", "database"]],
  ["marketing_campaign", ["marketing", "campaign", "advertising", "promotion", "brand"]],
  ["research_project", ["research", "study", "analysis", "hypothesis", "methodology"]],
  ["event_planning", ["event", "conference", "meeting", "venue", "attendee"]],
  ["business_strategy", ["strategy", "business", "growth", "market", "competitive"]],
];

const DEFAULT_TEMPLATE = "software_development";

/** Keyword-based guess at the best template for a document. Substring match, case-insensitive. */
export function suggestTemplate(text: string): string {
  const lower = text.toLowerCase();
  for (const [id, words] of KEYWORDS) {
    if (words.some((w) => lower.includes(w))) return id;
  }
  return DEFAULT_TEMPLATE;
}

/** Copy of the template with the project context appended to every task prompt. */
export function applyTemplateToContext(template: WorkflowTemplate, projectContext: string): WorkflowTemplate {
  return {
    ...template,
    tasks: template.tasks.map((task) => ({
      ...task,
      prompt: `${task.prompt}

PROJECT CONTEXT:
${projectContext}

Base your analysis and recommendations specifically on the project context provided above.`,
    })),
  };
}
