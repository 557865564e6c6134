import { ConfigError } from "./errors.js";
import { EnvSchema } from "./schemas.js";

export type PipelineConfig = {
  model: {
    apiKey: string;
    modelId: string;
    baseUrl: string;
    temperature: number;
    maxTokens: number;
  };
  retry: {
    maxRetries: number;
    timeoutMs: number;
    /** Unit for `2^attempt` backoff. */
    baseDelayMs: number;
    /** Extra factor applied to the backoff after HTTP 429. */
    rateLimitMultiplier: number;
  };
  chunking: {
    size: number;
    overlap: number;
  };
  limits: {
    contextChars: number;
    maxToolIterations: number;
    generationTopK: number;
    taskTopK: number;
  };
  paths: {
    dbPath: string;
    outputsDir: string;
    historyDir: string;
  };
};

export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends object ? DeepPartial<T[P]> : T[P];
};

const DEFAULTS: PipelineConfig = {
  model: {
    apiKey: "",
    modelId: "anthropic/claude-3.5-sonnet",
    baseUrl: "https://openrouter.ai/api/v1",
    temperature: 0.7,
    maxTokens: 4_000,
  },
  retry: {
    maxRetries: 3,
    timeoutMs: 60_000,
    baseDelayMs: 1_000,
    rateLimitMultiplier: 5,
  },
  chunking: {
    size: 800,
    overlap: 200,
  },
  limits: {
    contextChars: 20_000,
    maxToolIterations: 5,
    generationTopK: 10,
    taskTopK: 5,
  },
  paths: {
    dbPath: "taskweave.db",
    outputsDir: "outputs",
    historyDir: "history",
  },
};

let current: PipelineConfig = structuredClone(DEFAULTS);

function isPlainObject(val: unknown): val is Record<string, unknown> {
  return typeof val === "object" && val !== null && !Array.isArray(val);
}

function deepMerge<T extends Record<string, unknown>>(base: T, overrides: DeepPartial<T>): T {
  const result: Record<string, unknown> = structuredClone(base);
  for (const [key, val] of Object.entries(overrides)) {
    const existing = result[key];
    if (isPlainObject(val) && isPlainObject(existing)) {
      result[key] = deepMerge(existing, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result as T;
}

/** Build a config from defaults plus overrides without touching the global one. */
export function resolveConfig(overrides: DeepPartial<PipelineConfig> = {}): PipelineConfig {
  return deepMerge(DEFAULTS, overrides);
}

/** Override config values. Merges deeply with defaults. */
export function configure(overrides: DeepPartial<PipelineConfig>): void {
  current = resolveConfig(overrides);
}

/** Reset config to defaults. */
export function resetConfig(): void {
  current = structuredClone(DEFAULTS);
}

/** Get the current config (read-only). */
export function getConfig(): Readonly<PipelineConfig> {
  return current;
}

/** The default config values (frozen). */
export const defaults: Readonly<PipelineConfig> = Object.freeze(structuredClone(DEFAULTS));

export type LoadEnvOptions = {
  /** Commands that never call the model can run without a key (default true). */
  requireApiKey?: boolean;
};

/**
 * Read the configuration surface from environment variables.
 * Throws ConfigError when the credential is missing or malformed.
 */
export function loadEnvConfig(
  env: NodeJS.ProcessEnv = process.env,
  opts: LoadEnvOptions = {},
): DeepPartial<PipelineConfig> {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; "));
  }
  const parsed = result.data;

  const apiKey = parsed.OPENROUTER_API_KEY ?? "";
  if (opts.requireApiKey ?? true) {
    if (!apiKey) {
      throw new ConfigError("OPENROUTER_API_KEY is not set. Add it to your environment or .env file.");
    }
    if (!apiKey.startsWith("sk-")) {
      throw new ConfigError("OPENROUTER_API_KEY appears invalid (should start with 'sk-')");
    }
  }

  const overrides: DeepPartial<PipelineConfig> = {
    model: {
      apiKey: apiKey || undefined,
      modelId: parsed.OPENROUTER_MODEL,
      baseUrl: parsed.OPENROUTER_BASE_URL,
    },
    retry: {
      maxRetries: parsed.MAX_RETRIES,
      timeoutMs: parsed.API_TIMEOUT !== undefined ? parsed.API_TIMEOUT * 1000 : undefined,
    },
    chunking: {
      size: parsed.CHUNK_SIZE,
      overlap: parsed.CHUNK_OVERLAP,
    },
    paths: {
      dbPath: parsed.TASKWEAVE_DB,
    },
  };

  const chunkSize = parsed.CHUNK_SIZE ?? DEFAULTS.chunking.size;
  const chunkOverlap = parsed.CHUNK_OVERLAP ?? DEFAULTS.chunking.overlap;
  if (chunkSize <= chunkOverlap) {
    throw new ConfigError("CHUNK_SIZE must be greater than CHUNK_OVERLAP");
  }
  if (parsed.MAX_RETRIES === 0) {
    throw new ConfigError("MAX_RETRIES must be at least 1");
  }

  return overrides;
}
