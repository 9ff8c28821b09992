/**
 * LLM client module.
 *
 * Exports:
 * - Types and interfaces
 * - OpenAI-compatible client
 * - Factory turning loaded settings into a client
 */

export type {
  LlmErrorType,
  TokenUsage,
  LlmInput,
  LlmOutput,
  LlmClientConfig,
  LlmClient
} from "./types.js";

export { LlmError, StubLlmClient } from "./types.js";

export { OpenAIClient, toChatMessages } from "./openai.js";

import { StubLlmClient } from "./types.js";
import { OpenAIClient } from "./openai.js";
import type { LlmClient, LlmClientConfig } from "./types.js";
import type { LlmSettings } from "../config.js";

/**
 * Create an LLM client from loaded settings.
 * Returns StubLlmClient if no provider key is configured.
 */
export function createLlmClient(settings: LlmSettings): LlmClient {
  if (!settings.apiKey) {
    return new StubLlmClient();
  }

  const config: LlmClientConfig = {
    apiKey: settings.apiKey,
    model: settings.model,
    defaultTimeoutMs: settings.timeoutMs,
    defaultMaxTokens: settings.maxTokens,
    defaultTemperature: settings.temperature
  };
  if (settings.baseUrl !== undefined) {
    config.baseUrl = settings.baseUrl;
  }

  return new OpenAIClient(config);
}
