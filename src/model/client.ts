import { getConfig } from "../config.js";
import { AiError, errorMessage } from "../errors.js";
import type { VectorCollection } from "../indexing/collection.js";
import { ChatCompletionSchema, type AssistantMessage, type ToolCall } from "../schemas.js";
import { log } from "../utils/logger.js";
import { backoffDelay, sleep as realSleep, withRetry, type Sleep } from "../utils/retry.js";
import { extractJson, withJsonInstructions } from "./json.js";
import { QUERY_TOOL, executeToolCall } from "./tools.js";

export type ChatMessage =
  | { role: "system" | "user"; content: string }
  | { role: "assistant"; content: string | null; tool_calls?: ToolCall[] }
  | { role: "tool"; tool_call_id: string; name: string; content: string };

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export type ModelClientOptions = {
  apiKey: string;
  modelId: string;
  baseUrl?: string;
  temperature?: number;
  maxTokens?: number;
  /** Total attempts per request, including the first. */
  maxRetries?: number;
  /** Per-attempt HTTP timeout. */
  timeoutMs?: number;
  baseDelayMs?: number;
  rateLimitMultiplier?: number;
  /** Tool-call rounds allowed before the model is asked to answer without tools. */
  maxToolIterations?: number;
  fetch?: FetchFn;
  sleep?: Sleep;
};

export type CompleteOptions = {
  responseFormat?: "json";
  /** Enables the document query tool against this collection. */
  toolCollection?: VectorCollection;
};

/** Anything that can turn a prompt into text. The executor and planner depend on this, not the class. */
export interface CompletionProvider {
  complete(prompt: string, opts?: CompleteOptions): Promise<string>;
}

class HttpStatusError extends Error {
  constructor(
    readonly status: number,
    readonly body: string,
  ) {
    super(`HTTP ${status}`);
    this.name = "HttpStatusError";
  }
}

class RequestTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`);
    this.name = "RequestTimeoutError";
  }
}

class ResponseFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ResponseFormatError";
  }
}

/**
 * Chat-completion client for OpenAI-compatible endpoints (OpenRouter by default).
 *
 * Each request is retried on timeouts, network errors and 5xx responses
 * (`2^attempt` units of backoff) and on 429 (`5 × 2^attempt`). 400 and 401
 * fail at once. Transport and response failures surface as `AiError`; a
 * storage failure inside a tool call propagates as `StorageError`.
 */
export class ModelClient implements CompletionProvider {
  readonly modelId: string;
  private apiKey: string;
  private baseUrl: string;
  private temperature: number;
  private maxTokens: number;
  private maxRetries: number;
  private timeoutMs: number;
  private baseDelayMs: number;
  private rateLimitMultiplier: number;
  private maxToolIterations: number;
  private fetchFn: FetchFn;
  private sleep: Sleep;

  constructor(opts: ModelClientOptions) {
    const config = getConfig();
    this.apiKey = opts.apiKey;
    this.modelId = opts.modelId;
    this.baseUrl = (opts.baseUrl ?? config.model.baseUrl).replace(/\/$/, "");
    this.temperature = opts.temperature ?? config.model.temperature;
    this.maxTokens = opts.maxTokens ?? config.model.maxTokens;
    this.maxRetries = opts.maxRetries ?? config.retry.maxRetries;
    this.timeoutMs = opts.timeoutMs ?? config.retry.timeoutMs;
    this.baseDelayMs = opts.baseDelayMs ?? config.retry.baseDelayMs;
    this.rateLimitMultiplier = opts.rateLimitMultiplier ?? config.retry.rateLimitMultiplier;
    this.maxToolIterations = opts.maxToolIterations ?? config.limits.maxToolIterations;
    this.fetchFn = opts.fetch ?? ((url, init) => fetch(url, init));
    this.sleep = opts.sleep ?? realSleep;
  }

  async complete(prompt: string, opts?: CompleteOptions): Promise<string> {
    const json = opts?.responseFormat === "json";
    const collection = opts?.toolCollection;
    const messages: ChatMessage[] = [
      { role: "user", content: json ? withJsonInstructions(prompt) : prompt },
    ];

    for (let round = 0; ; round++) {
      const offerTools = collection !== undefined && round < this.maxToolIterations;
      const message = await this.requestWithRetry(messages, offerTools);
      const toolCalls = message.tool_calls ?? [];

      if (toolCalls.length > 0 && collection && offerTools) {
        messages.push({ role: "assistant", content: message.content ?? null, tool_calls: toolCalls });
        for (const call of toolCalls) {
          messages.push({
            role: "tool",
            tool_call_id: call.id,
            name: call.function.name,
            content: executeToolCall(call, collection),
          });
        }
        log.debug("Tool round complete", { round: round + 1, calls: toolCalls.length });
        continue;
      }

      const content = message.content ?? "";
      if (!content.trim()) {
        throw new AiError("transport", "AI call failed: AI returned empty response");
      }
      return json ? extractJson(content) : content;
    }
  }

  private async requestWithRetry(messages: ChatMessage[], offerTools: boolean): Promise<AssistantMessage> {
    try {
      return await withRetry((attempt) => this.request(messages, offerTools, attempt), {
        maxAttempts: this.maxRetries,
        sleep: this.sleep,
        classify: (err, attempt) => this.retryDelay(err, attempt),
        onRetry: (err, attempt, delayMs) =>
          log.warn("Model request failed, retrying", {
            attempt: attempt + 1,
            delayMs,
            error: errorMessage(err),
          }),
      });
    } catch (err) {
      throw this.toAiError(err);
    }
  }

  private async request(
    messages: ChatMessage[],
    offerTools: boolean,
    attempt: number,
  ): Promise<AssistantMessage> {
    const payload: Record<string, unknown> = {
      model: this.modelId,
      messages,
      temperature: this.temperature,
      max_tokens: this.maxTokens,
    };
    if (offerTools) payload.tools = [QUERY_TOOL];

    log.debug("Calling model", { model: this.modelId, attempt: attempt + 1, messages: messages.length });
    const { res, body } = await this.post(payload);

    if (!res.ok) {
      throw new HttpStatusError(res.status, body);
    }

    let data: unknown;
    try {
      data = JSON.parse(body);
    } catch {
      throw new ResponseFormatError("response body is not JSON");
    }
    const parsed = ChatCompletionSchema.safeParse(data);
    if (!parsed.success) {
      throw new ResponseFormatError(parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; "));
    }
    return parsed.data.choices[0].message;
  }

  private async post(payload: Record<string, unknown>): Promise<{ res: Response; body: string }> {
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);

    try {
      const res = await this.fetchFn(`${this.baseUrl}/chat/completions`, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          "Content-Type": "application/json",
          "X-Title": "taskweave",
        },
        body: JSON.stringify(payload),
        signal: controller.signal,
      });
      return { res, body: await res.text() };
    } catch (err) {
      if (timedOut) throw new RequestTimeoutError(this.timeoutMs);
      throw err;
    } finally {
      clearTimeout(timer);
    }
  }

  private retryDelay(err: unknown, attempt: number): number | null {
    if (err instanceof HttpStatusError) {
      if (err.status === 400 || err.status === 401) return null;
      if (err.status === 429) return backoffDelay(attempt, this.baseDelayMs, this.rateLimitMultiplier);
      return backoffDelay(attempt, this.baseDelayMs);
    }
    if (err instanceof ResponseFormatError) return null;
    // Timeouts and network failures.
    return backoffDelay(attempt, this.baseDelayMs);
  }

  private toAiError(err: unknown): AiError {
    if (err instanceof AiError) return err;
    if (err instanceof RequestTimeoutError) {
      return new AiError("transport", `AI call failed: request timed out after ${this.maxRetries} attempts`);
    }
    if (err instanceof HttpStatusError) {
      switch (err.status) {
        case 400:
          return new AiError("transport", `AI call failed: bad request (HTTP 400): ${err.body.slice(0, 200)}`);
        case 401:
          return new AiError("transport", "AI call failed: invalid API key (HTTP 401). Check your OPENROUTER_API_KEY.");
        case 429:
          return new AiError("transport", "AI call failed: rate limited (HTTP 429). Please wait and try again.");
        default:
          return new AiError("transport", `AI call failed: HTTP ${err.status}`);
      }
    }
    if (err instanceof ResponseFormatError) {
      return new AiError("transport", `AI call failed: unexpected API response format: ${err.message}`);
    }
    return new AiError("transport", `AI call failed: ${errorMessage(err)}`);
  }
}
