import { z } from "zod";
import { ConfigurationError } from "./errors.js";

const PLACEHOLDER = /<your-[^>]*>/i;

const optionalString = z
  .string()
  .trim()
  .transform((value) => (value.length > 0 ? value : undefined))
  .optional();

const intFromEnv = (fallback: number, min: number, max: number) =>
  z.coerce.number().int().min(min).max(max).default(fallback);

const EnvSchema = z.object({
  OPENAI_API_KEY: optionalString,
  OPENAI_BASE_URL: optionalString,
  OPENAI_MODEL: z.string().trim().min(1).default("gpt-4o"),
  OPENAI_TIMEOUT_MS: intFromEnv(60_000, 1, 600_000),
  OPENAI_MAX_TOKENS: intFromEnv(1024, 1, 128_000),
  OPENAI_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
  CONDUCTOR_STEP_TIMEOUT_MS: intFromEnv(120_000, 1, 3_600_000),
  CONDUCTOR_MAX_RETRIES: intFromEnv(1, 0, 1),
  CONDUCTOR_DEFAULT_ROUNDS: intFromEnv(3, 1, 20),
  CONDUCTOR_DB_PATH: z.string().trim().min(1).default(".conductor/runs.db"),
  CONDUCTOR_PORT: intFromEnv(8765, 1, 65_535)
});

export type LlmSettings = {
  apiKey?: string;
  baseUrl?: string;
  model: string;
  timeoutMs: number;
  maxTokens: number;
  temperature: number;
};

/**
 * Values handed to the runner at construction. The core never reads the
 * environment itself.
 */
export type RunDefaults = {
  /** Per agent call */
  stepTimeoutMs: number;
  /** Retries of a transient agent failure (0 or 1) */
  maxRetries: number;
  roundCount: number;
};

export type AppConfig = {
  llm: LlmSettings;
  runs: RunDefaults;
  dbPath: string;
  port: number;
};

export const DEFAULT_RUN_DEFAULTS: RunDefaults = {
  stepTimeoutMs: 120_000,
  maxRetries: 1,
  roundCount: 3
};

/**
 * Load configuration from environment variables.
 * @throws ConfigurationError on any invalid value or an unreplaced `<your-...>` placeholder
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError("Invalid environment configuration", {
      issues: parsed.error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message }))
    });
  }
  const vars = parsed.data;

  for (const [name, value] of Object.entries({
    OPENAI_API_KEY: vars.OPENAI_API_KEY,
    OPENAI_BASE_URL: vars.OPENAI_BASE_URL,
    OPENAI_MODEL: vars.OPENAI_MODEL
  })) {
    if (value !== undefined && PLACEHOLDER.test(value)) {
      throw new ConfigurationError(`${name} still contains a placeholder value`, { name });
    }
  }

  if (vars.OPENAI_BASE_URL !== undefined && !z.string().url().safeParse(vars.OPENAI_BASE_URL).success) {
    throw new ConfigurationError("OPENAI_BASE_URL must be an absolute URL", { name: "OPENAI_BASE_URL" });
  }

  const llm: LlmSettings = {
    model: vars.OPENAI_MODEL,
    timeoutMs: vars.OPENAI_TIMEOUT_MS,
    maxTokens: vars.OPENAI_MAX_TOKENS,
    temperature: vars.OPENAI_TEMPERATURE
  };
  if (vars.OPENAI_API_KEY !== undefined) {
    llm.apiKey = vars.OPENAI_API_KEY;
  }
  if (vars.OPENAI_BASE_URL !== undefined) {
    llm.baseUrl = vars.OPENAI_BASE_URL;
  }

  return {
    llm,
    runs: {
      stepTimeoutMs: vars.CONDUCTOR_STEP_TIMEOUT_MS,
      maxRetries: vars.CONDUCTOR_MAX_RETRIES,
      roundCount: vars.CONDUCTOR_DEFAULT_ROUNDS
    },
    dbPath: vars.CONDUCTOR_DB_PATH,
    port: vars.CONDUCTOR_PORT
  };
}
