/**
 * Shared turn machinery for the three topologies: one agent call plus its
 * append, bounded retries, cancellation between turns, failure capture and
 * event emission.
 */

import type { AgentExecutor } from "../agents/executor.js";
import type { Message } from "../conversation.js";
import { AgentInvocationError, WorkflowError, toWorkflowError } from "../errors.js";
import { LlmError } from "../llm/types.js";
import { createLogger, type Logger } from "../logger.js";
import type { WorkflowRun } from "./run.js";
import type { AgentSpec, RunErrorDetail, RunEvent, RunEventHandler, WorkflowRunSnapshot } from "./types.js";

function isoNow(): string {
  return new Date().toISOString();
}

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;
export type RunEventPayload = DistributiveOmit<RunEvent, "timestamp" | "runId" | "topology">;

export type OrchestratorDeps = {
  executor: AgentExecutor;
  /** Fired by the runner to cancel between turns */
  signal?: AbortSignal;
  onEvent?: RunEventHandler;
  /** Persists the run after every observable change */
  checkpoint?: (run: WorkflowRun) => Promise<void>;
  logger?: Logger;
};

export type TurnOptions = {
  round?: number;
  extraInstructions?: string;
};

/**
 * Event emitter helper - fire-and-forget with microtask isolation, so a
 * handler can neither throw into the run nor reenter it.
 */
function emitEvent(handler: RunEventHandler | undefined, event: RunEvent, log: Logger): void {
  if (!handler) return;
  queueMicrotask(() => {
    try {
      const result = handler(event);
      if (result instanceof Promise) {
        result.catch((err: unknown) => {
          log.warn({ err, event: event.type }, "run event handler rejected");
        });
      }
    } catch (err) {
      log.warn({ err, event: event.type }, "run event handler threw");
    }
  });
}

export abstract class BaseOrchestrator {
  protected readonly run: WorkflowRun;
  protected readonly executor: AgentExecutor;
  protected readonly log: Logger;
  private readonly signal: AbortSignal | undefined;
  private readonly onEvent: RunEventHandler | undefined;
  private readonly checkpoint: (run: WorkflowRun) => Promise<void>;

  protected constructor(run: WorkflowRun, deps: OrchestratorDeps) {
    this.run = run;
    this.executor = deps.executor;
    this.signal = deps.signal;
    this.onEvent = deps.onEvent;
    this.checkpoint = deps.checkpoint ?? (() => Promise.resolve());
    this.log = (deps.logger ?? createLogger("orchestrator")).child({ runId: run.id, topology: run.topology });
  }

  protected emit(payload: RunEventPayload): void {
    emitEvent(this.onEvent, { ...payload, timestamp: isoNow(), runId: this.run.id, topology: this.run.topology }, this.log);
  }

  protected async save(): Promise<void> {
    await this.checkpoint(this.run);
  }

  /**
   * One turn: invoke the agent on the full transcript and append its reply.
   * A transient failure is retried up to the run's maxRetries; a failed turn
   * appends nothing.
   */
  protected async turn(agent: AgentSpec, options: TurnOptions = {}): Promise<Message> {
    this.throwIfCancelled(agent.name);
    this.emit({
      type: "turn_started",
      agent: agent.name,
      ...(options.round !== undefined && { round: options.round })
    });

    const started = Date.now();
    const maxAttempts = 1 + Math.min(Math.max(this.run.policy.maxRetries, 0), 1);
    let attempts = 0;
    for (;;) {
      attempts++;
      try {
        const reply = await this.executor.invoke(agent, this.run.conversation.snapshot(), {
          timeoutMs: this.run.policy.stepTimeoutMs,
          ...(this.signal !== undefined && { signal: this.signal }),
          ...(options.extraInstructions !== undefined && { extraInstructions: options.extraInstructions })
        });
        const message = this.run.conversation.append({
          author: reply.author,
          role: "agent",
          content: reply.content,
          ...(options.round !== undefined && { round: options.round })
        });
        this.run.touch();
        this.emit({
          type: "turn_completed",
          agent: agent.name,
          message,
          durationMs: Date.now() - started,
          attempts,
          ...(reply.usage !== undefined && { usage: reply.usage })
        });
        await this.save();
        return message;
      } catch (err) {
        if (!(err instanceof AgentInvocationError) || !err.transient || attempts >= maxAttempts || this.signal?.aborted) {
          throw err;
        }
        const waitMs = this.retryDelay(err);
        this.log.warn({ agent: agent.name, attempt: attempts, waitMs, err }, "agent call failed, retrying");
        await this.backoff(agent.name, waitMs);
      }
    }
  }

  /**
   * Run a segment of the topology. Any failure is captured into the run's
   * FAILED state instead of being thrown at the caller.
   */
  protected async execute(segment: () => Promise<void>): Promise<WorkflowRunSnapshot> {
    try {
      await segment();
    } catch (err) {
      await this.failWith(err);
    }
    return this.run.toSnapshot();
  }

  protected async finish(): Promise<void> {
    this.throwIfCancelled("completion");
    this.run.complete();
    this.emit({ type: "run_completed", messages: this.run.conversation.length });
    this.log.info({ messages: this.run.conversation.length }, "run completed");
    await this.save();
  }

  private async failWith(err: unknown): Promise<void> {
    if (this.run.isTerminal) {
      throw err;
    }
    const workflowErr = toWorkflowError(err);
    const detail: RunErrorDetail = { code: workflowErr.code, message: workflowErr.message };
    this.run.fail(detail);
    this.emit({ type: "run_failed", error: detail });
    this.log.warn({ code: detail.code, reason: detail.message }, "run failed");
    await this.save();
  }

  /**
   * Provider-requested wait before the retry, capped at the step timeout.
   */
  private retryDelay(err: AgentInvocationError): number {
    const cause = err.cause;
    if (!(cause instanceof LlmError) || cause.retryAfterMs === undefined) return 0;
    return Math.min(cause.retryAfterMs, this.run.policy.stepTimeoutMs);
  }

  private async backoff(agentName: string, ms: number): Promise<void> {
    if (ms <= 0) return;
    const signal = this.signal;
    await new Promise<void>((resolve) => {
      const done = (): void => {
        clearTimeout(timer);
        signal?.removeEventListener("abort", done);
        resolve();
      };
      const timer = setTimeout(done, ms);
      signal?.addEventListener("abort", done, { once: true });
    });
    this.throwIfCancelled(agentName);
  }

  protected throwIfCancelled(before: string): void {
    if (this.signal?.aborted) {
      throw new WorkflowError("CANCELLED", `Run ${this.run.id} cancelled before ${before}`, { runId: this.run.id });
    }
  }
}
