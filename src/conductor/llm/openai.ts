/**
 * OpenAI-compatible LLM client.
 *
 * Works with:
 * - OpenAI API
 * - Azure OpenAI / Azure AI Foundry deployments exposing the chat completions route
 * - OpenAI-compatible APIs (Ollama, LM Studio, vLLM, etc.)
 */

import { z } from "zod";
import type { Message } from "../conversation.js";
import type { LlmClient, LlmInput, LlmOutput, LlmClientConfig, LlmErrorType } from "./types.js";
import { LlmError } from "./types.js";

type OpenAIMessage = {
  role: "system" | "user" | "assistant";
  content: string;
};

const OpenAIResponseSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({ content: z.string().nullable() }),
      finish_reason: z.string().nullable().optional()
    })
  ),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
      total_tokens: z.number()
    })
    .optional(),
  model: z.string().optional()
});

const OpenAIErrorSchema = z.object({
  error: z.object({ message: z.string().optional() }).optional()
});

/**
 * Map a transcript onto chat roles. Agent turns are replayed as assistant
 * messages prefixed with the speaking agent, so later agents can tell who said what.
 */
export function toChatMessages(instructions: string, transcript: readonly Message[]): OpenAIMessage[] {
  const messages: OpenAIMessage[] = [];
  if (instructions) {
    messages.push({ role: "system", content: instructions });
  }
  for (const entry of transcript) {
    if (entry.role === "agent") {
      messages.push({ role: "assistant", content: `[${entry.author}]: ${entry.content}` });
    } else {
      messages.push({ role: "user", content: entry.content });
    }
  }
  return messages;
}

export class OpenAIClient implements LlmClient {
  readonly provider = "openai";
  readonly model: string;

  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly defaultTimeoutMs: number;
  private readonly defaultMaxTokens: number;
  private readonly defaultTemperature: number;

  constructor(config: LlmClientConfig) {
    if (!config.apiKey) {
      throw new Error("OpenAI client requires apiKey");
    }
    this.apiKey = config.apiKey;
    this.model = config.model;
    this.baseUrl = (config.baseUrl ?? "https://api.openai.com/v1").replace(/\/+$/, "");
    this.defaultTimeoutMs = config.defaultTimeoutMs ?? 60_000;
    this.defaultMaxTokens = config.defaultMaxTokens ?? 1024;
    this.defaultTemperature = config.defaultTemperature ?? 0.7;
  }

  isConfigured(): boolean {
    return Boolean(this.apiKey);
  }

  async generate(input: LlmInput): Promise<LlmOutput> {
    const messages = toChatMessages(input.instructions, input.transcript);

    const timeoutMs = input.timeoutMs ?? this.defaultTimeoutMs;
    const controller = new AbortController();
    const onAbort = (): void => controller.abort();
    input.abortSignal?.addEventListener("abort", onAbort, { once: true });
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await fetch(`${this.baseUrl}/chat/completions`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          "Authorization": `Bearer ${this.apiKey}`,
          "api-key": this.apiKey
        },
        body: JSON.stringify({
          model: this.model,
          messages,
          max_tokens: input.maxTokens ?? this.defaultMaxTokens,
          temperature: input.temperature ?? this.defaultTemperature
        }),
        signal: controller.signal
      });

      if (!response.ok) {
        throw await this.handleErrorResponse(response);
      }

      const parsed = OpenAIResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new LlmError("model_error", "Unexpected response shape from chat completions", {
          provider: this.provider,
          statusCode: response.status
        });
      }
      const data = parsed.data;
      const choice = data.choices[0];

      const result: LlmOutput = {
        text: choice?.message.content ?? ""
      };

      const finishReason = this.normalizeFinishReason(choice?.finish_reason);
      if (finishReason !== undefined) {
        result.finishReason = finishReason;
      }
      if (data.model) {
        result.model = data.model;
      }
      if (data.usage) {
        result.usage = {
          inputTokens: data.usage.prompt_tokens,
          outputTokens: data.usage.completion_tokens,
          totalTokens: data.usage.total_tokens
        };
      }

      return result;
    } catch (err) {
      if (err instanceof LlmError) {
        throw err;
      }

      if (err instanceof Error) {
        if (err.name === "AbortError") {
          const cancelled = input.abortSignal?.aborted === true;
          throw new LlmError("timeout", cancelled ? "Request aborted" : `Request timed out after ${timeoutMs}ms`, {
            provider: this.provider,
            retryable: !cancelled
          });
        }
        throw new LlmError("unknown", err.message, {
          provider: this.provider,
          retryable: true,
          cause: err
        });
      }

      throw new LlmError("unknown", "Unknown error during LLM call", {
        provider: this.provider
      });
    } finally {
      clearTimeout(timeoutId);
      input.abortSignal?.removeEventListener("abort", onAbort);
    }
  }

  private async handleErrorResponse(response: Response): Promise<LlmError> {
    const status = response.status;
    let message = `HTTP ${status}`;
    let errorType: LlmErrorType = "unknown";
    let retryAfterMs: number | undefined;

    // A body that is not JSON keeps the status line
    const body: unknown = await response.json().catch(() => undefined);
    const errorData = OpenAIErrorSchema.safeParse(body);
    if (errorData.success) {
      message = errorData.data.error?.message ?? message;
    }

    const retryAfter = response.headers.get("Retry-After");
    if (retryAfter) {
      const seconds = parseInt(retryAfter, 10);
      if (!isNaN(seconds)) {
        retryAfterMs = seconds * 1000;
      }
    }

    switch (status) {
      case 401:
      case 403:
        errorType = "auth_error";
        break;
      case 429:
        errorType = "rate_limited";
        retryAfterMs = retryAfterMs ?? 5000;
        break;
      case 400:
        if (message.toLowerCase().includes("context length") ||
            message.toLowerCase().includes("maximum context")) {
          errorType = "context_length";
        } else {
          errorType = "invalid_request";
        }
        break;
      default:
        errorType = status >= 500 ? "provider_error" : "unknown";
    }

    const errorOptions: {
      provider: string;
      statusCode: number;
      retryAfterMs?: number;
    } = {
      provider: this.provider,
      statusCode: status
    };

    if (retryAfterMs !== undefined) {
      errorOptions.retryAfterMs = retryAfterMs;
    }

    return new LlmError(errorType, message, errorOptions);
  }

  private normalizeFinishReason(reason: string | null | undefined): LlmOutput["finishReason"] {
    switch (reason) {
      case "stop":
        return "stop";
      case "length":
        return "length";
      case "content_filter":
        return "content_filter";
      case "tool_calls":
      case "function_call":
        return "tool_calls";
      default:
        return undefined;
    }
  }
}
