import type { VectorCollection } from "../indexing/collection.js";
import { queryCollection } from "../indexing/vector-index.js";
import { QueryToolArgsSchema, type ToolCall } from "../schemas.js";
import { log } from "../utils/logger.js";

export type ToolDefinition = {
  type: "function";
  function: {
    name: string;
    description: string;
    parameters: Record<string, unknown>;
  };
};

export const QUERY_TOOL_NAME = "query_project_documents";

export const QUERY_TOOL: ToolDefinition = {
  type: "function",
  function: {
    name: QUERY_TOOL_NAME,
    description:
      "Search the indexed project documents to retrieve relevant context. Use this to find specific information from the project specification, requirements, or any uploaded documents.",
    parameters: {
      type: "object",
      properties: {
        query: {
          type: "string",
          description:
            "The search query. Be specific about what you are looking for (e.g. 'project timeline and deadlines', 'team structure and roles').",
        },
        top_k: {
          type: "integer",
          description: "Number of relevant chunks to retrieve (1-10).",
          default: 5,
        },
      },
      required: ["query"],
    },
  },
};

/**
 * Run one tool call requested by the model and render the result as the
 * content of a `tool` turn. Bad arguments and unknown tools are reported back
 * to the model as text; storage failures propagate.
 */
export function executeToolCall(call: ToolCall, collection: VectorCollection): string {
  const name = call.function.name;
  if (name !== QUERY_TOOL_NAME) {
    log.warn("Model requested unknown tool", { tool: name });
    return `Error: Unknown tool '${name}'`;
  }

  let rawArgs: unknown;
  try {
    rawArgs = JSON.parse(call.function.arguments || "{}");
  } catch {
    return `Error: arguments for '${name}' are not valid JSON`;
  }
  const args = QueryToolArgsSchema.safeParse(rawArgs);
  if (!args.success) {
    return `Error: invalid arguments for '${name}': ${args.error.issues.map((i) => i.message).join("; ")}`;
  }

  log.debug("Running tool call", { tool: name, query: args.data.query, topK: args.data.top_k });
  const results = queryCollection(collection, args.data.query, args.data.top_k ?? 5);
  if (results.length === 0) {
    return "No matching documents found.";
  }

  return results
    .map((r, i) => `[Result ${i + 1}] (Relevance: ${r.relevance.toFixed(2)})\n${r.text}`)
    .join("\n\n---\n\n");
}
