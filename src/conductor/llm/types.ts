/**
 * Agent-invocation client types.
 *
 * Every agent in every topology is driven through the single `generate`
 * capability below; agents differ only by their instructions.
 * Provider errors are normalized to LlmError so the executor can classify them.
 */

import type { Message } from "../conversation.js";

/**
 * Error types from LLM providers, normalized for orchestrator handling.
 */
export type LlmErrorType =
  | "rate_limited"      // Provider rate limit hit
  | "timeout"           // Request timed out
  | "auth_error"        // Invalid API key or auth failure
  | "invalid_request"   // Malformed request (terminal error)
  | "provider_error"    // Provider-side issue (5xx)
  | "model_error"       // Model refused or failed to generate
  | "context_length"    // Input too long for model
  | "content_filter"    // Content filtered by safety system
  | "unknown";          // Unclassified error

/**
 * Normalized LLM error.
 */
export class LlmError extends Error {
  readonly type: LlmErrorType;
  readonly retryable: boolean;
  readonly retryAfterMs?: number;
  readonly provider?: string;
  readonly statusCode?: number;

  constructor(
    type: LlmErrorType,
    message: string,
    options?: {
      retryable?: boolean;
      retryAfterMs?: number;
      provider?: string;
      statusCode?: number;
      cause?: Error;
    }
  ) {
    super(message, { cause: options?.cause });
    this.name = "LlmError";
    this.type = type;
    this.retryable = options?.retryable ?? LlmError.isDefaultRetryable(type);
    if (options?.retryAfterMs !== undefined) {
      this.retryAfterMs = options.retryAfterMs;
    }
    if (options?.provider !== undefined) {
      this.provider = options.provider;
    }
    if (options?.statusCode !== undefined) {
      this.statusCode = options.statusCode;
    }
  }

  private static isDefaultRetryable(type: LlmErrorType): boolean {
    switch (type) {
      case "rate_limited":
      case "timeout":
      case "provider_error":
        return true;
      default:
        return false;
    }
  }
}

export type TokenUsage = {
  inputTokens: number;
  outputTokens: number;
  totalTokens?: number;
};

/**
 * Input to one agent turn.
 */
export type LlmInput = {
  /** The agent's instruction text (system prompt) */
  instructions: string;
  /** Transcript accumulated so far, oldest first */
  transcript: readonly Message[];
  /** Maximum tokens to generate */
  maxTokens?: number;
  /** Temperature (0-2, lower = more deterministic) */
  temperature?: number;
  /** Abort signal for cancellation and timeouts */
  abortSignal?: AbortSignal;
  /** Request timeout in ms */
  timeoutMs?: number;
};

export type LlmOutput = {
  /** Generated text */
  text: string;
  usage?: TokenUsage;
  /** Model identifier used */
  model?: string;
  finishReason?: "stop" | "length" | "content_filter" | "tool_calls" | "error";
};

export type LlmClientConfig = {
  /** API key (required for cloud providers) */
  apiKey?: string;
  /** Base URL for API (for Azure, self-hosted or proxy endpoints) */
  baseUrl?: string;
  model: string;
  defaultTimeoutMs?: number;
  defaultMaxTokens?: number;
  defaultTemperature?: number;
};

/**
 * The agent-invocation collaborator.
 */
export interface LlmClient {
  generate(input: LlmInput): Promise<LlmOutput>;

  /**
   * Check if the client is backed by a real provider.
   */
  isConfigured(): boolean;

  readonly provider: string;
  readonly model: string;
}

/**
 * Offline client used when no provider key is configured.
 * Answers deterministically so every topology can be exercised end to end.
 */
export class StubLlmClient implements LlmClient {
  readonly provider = "stub";
  readonly model = "none";

  generate(input: LlmInput): Promise<LlmOutput> {
    const last = input.transcript[input.transcript.length - 1];
    const firstLine = input.instructions.split("\n")[0] ?? "";
    return Promise.resolve({
      text: `[stub reply to message #${last?.index ?? 0} | ${firstLine.slice(0, 60)}]`,
      finishReason: "stop"
    });
  }

  isConfigured(): boolean {
    return false;
  }
}
