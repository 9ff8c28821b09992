import { vi, type Mock } from "vitest";
import type { LlmClient, LlmInput, LlmOutput } from "../src/conductor/llm/types.js";
import type { AgentSpec } from "../src/conductor/orchestrator/types.js";

/**
 * Agent whose instructions are its own name, so a fake client can tell who is speaking.
 */
export function agent(name: string): AgentSpec {
  return { name, role: `${name} role`, instructions: name };
}

export type Reply = (input: LlmInput, call: number) => string | Error | Promise<string>;

/**
 * Default reply: "<first instruction line>#<transcript length>", e.g. "A#1".
 */
export const echoReply: Reply = (input) =>
  `${input.instructions.split("\n")[0] ?? ""}#${input.transcript.length}`;

export type FakeClient = LlmClient & {
  generate: Mock<(input: LlmInput) => Promise<LlmOutput>>;
  /** First instruction line of every call, in call order */
  speakers(): string[];
};

export function fakeClient(reply: Reply = echoReply): FakeClient {
  let calls = 0;
  const generate = vi.fn(async (input: LlmInput): Promise<LlmOutput> => {
    calls++;
    const result = await reply(input, calls);
    if (result instanceof Error) throw result;
    return { text: result };
  });
  return {
    provider: "fake",
    model: "fake-model",
    isConfigured: () => true,
    generate,
    speakers: () => generate.mock.calls.map(([input]) => input.instructions.split("\n")[0] ?? "")
  };
}

/**
 * Rejects once `signal` aborts; never settles otherwise.
 */
export function waitForAbort(signal: AbortSignal | undefined): Promise<string> {
  return new Promise<string>((_resolve, reject) => {
    signal?.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
  });
}

/** Let queued microtasks (event delivery) run. */
export function flushMicrotasks(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}
