import { z } from "zod";
import type { Message } from "../conversation.js";
import { AgentInvocationError } from "../errors.js";
import { LlmError, type LlmClient, type LlmInput, type TokenUsage } from "../llm/types.js";
import { createLogger, type Logger } from "../logger.js";
import type { AgentSpec } from "../orchestrator/types.js";

export type AgentReply = {
  author: string;
  content: string;
  usage?: TokenUsage;
};

export type InvokeOptions = {
  /** Upper bound for the call in ms; 0 or absent = no bound */
  timeoutMs?: number;
  /** Cancels the call */
  signal?: AbortSignal;
  /** Extra instruction text appended for this call only */
  extraInstructions?: string;
};

const LlmOutputSchema = z.object({
  text: z.string(),
  usage: z
    .object({ inputTokens: z.number(), outputTokens: z.number(), totalTokens: z.number().optional() })
    .optional(),
  model: z.string().optional(),
  finishReason: z.string().optional()
});

function toUsage(raw: { inputTokens: number; outputTokens: number; totalTokens?: number | undefined }): TokenUsage {
  return {
    inputTokens: raw.inputTokens,
    outputTokens: raw.outputTokens,
    ...(raw.totalTokens !== undefined && { totalTokens: raw.totalTokens })
  };
}

/**
 * Runs one agent against a transcript snapshot. Exactly one collaborator call
 * per invocation; the result is returned, never appended.
 */
export class AgentExecutor {
  private readonly client: LlmClient;
  private readonly log: Logger;

  constructor(client: LlmClient, log: Logger = createLogger("executor")) {
    this.client = client;
    this.log = log;
  }

  async invoke(agent: AgentSpec, transcript: readonly Message[], options: InvokeOptions = {}): Promise<AgentReply> {
    const outer = options.signal;
    if (outer?.aborted) {
      throw new AgentInvocationError(agent.name, "cancelled", `Invocation of ${agent.name} cancelled`);
    }

    const controller = new AbortController();
    const cleanups: Array<() => void> = [];
    const stopped = new Promise<never>((_resolve, reject) => {
      if (outer) {
        const onAbort = (): void => {
          controller.abort();
          reject(new AgentInvocationError(agent.name, "cancelled", `Invocation of ${agent.name} cancelled`));
        };
        outer.addEventListener("abort", onAbort, { once: true });
        cleanups.push(() => outer.removeEventListener("abort", onAbort));
      }
      const timeoutMs = options.timeoutMs ?? 0;
      if (timeoutMs > 0) {
        const timer = setTimeout(() => {
          controller.abort();
          reject(new AgentInvocationError(agent.name, "timeout", `${agent.name} did not answer within ${timeoutMs}ms`));
        }, timeoutMs);
        cleanups.push(() => clearTimeout(timer));
      }
    });

    const input: LlmInput = {
      instructions: options.extraInstructions
        ? `${agent.instructions}\n\n${options.extraInstructions}`
        : agent.instructions,
      transcript,
      abortSignal: controller.signal
    };
    if (options.timeoutMs !== undefined && options.timeoutMs > 0) {
      input.timeoutMs = options.timeoutMs;
    }

    const started = Date.now();
    try {
      const output: unknown = await Promise.race([this.client.generate(input), stopped]);
      const parsed = LlmOutputSchema.safeParse(output);
      if (!parsed.success) {
        throw new AgentInvocationError(agent.name, "malformed_response", `${agent.name} returned a malformed response`, {
          cause: parsed.error
        });
      }
      const { text, usage, model, finishReason } = parsed.data;
      this.log.debug(
        { agent: agent.name, transcriptLength: transcript.length, durationMs: Date.now() - started, model, finishReason, usage },
        "agent call completed"
      );
      return { author: agent.name, content: text, ...(usage !== undefined && { usage: toUsage(usage) }) };
    } catch (err) {
      throw this.classify(agent, err, outer);
    } finally {
      for (const cleanup of cleanups) cleanup();
    }
  }

  private classify(agent: AgentSpec, err: unknown, outer: AbortSignal | undefined): AgentInvocationError {
    if (err instanceof AgentInvocationError) {
      return err;
    }
    if (outer?.aborted) {
      return new AgentInvocationError(agent.name, "cancelled", `Invocation of ${agent.name} cancelled`, { cause: err });
    }
    if (err instanceof LlmError) {
      const reason = err.type === "timeout" ? "timeout" : "transport";
      return new AgentInvocationError(agent.name, reason, `${agent.name}: ${err.message}`, {
        transient: err.retryable,
        cause: err
      });
    }
    const message = err instanceof Error ? err.message : String(err);
    return new AgentInvocationError(agent.name, "transport", `${agent.name}: ${message}`, { cause: err });
  }
}
