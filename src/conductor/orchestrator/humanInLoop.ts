import crypto from "node:crypto";
import { InvalidConfigurationError } from "../errors.js";
import { BaseOrchestrator, type OrchestratorDeps } from "./base.js";
import type { WorkflowRun } from "./run.js";
import {
  VERDICTS,
  type AgentSpec,
  type HumanDecision,
  type HumanInLoopConfig,
  type PendingRequest,
  type WorkflowRunSnapshot
} from "./types.js";

export const DEFAULT_GATE_PROMPT = "Please review the analysis above and provide your decision.";
export const DEFAULT_GATE_STEP = "human-gate";

export type HumanInLoopOptions = {
  preGate: readonly AgentSpec[];
  postGate: readonly AgentSpec[];
  gatePrompt?: string;
  gateStep?: string;
};

/**
 * Build a human-in-the-loop configuration.
 * @throws InvalidConfigurationError when either segment is empty
 */
export function humanInLoopConfig(options: HumanInLoopOptions): HumanInLoopConfig {
  if (options.preGate.length === 0) {
    throw new InvalidConfigurationError("Human-in-the-loop topology needs at least one pre-gate agent");
  }
  if (options.postGate.length === 0) {
    throw new InvalidConfigurationError("Human-in-the-loop topology needs at least one post-gate agent");
  }
  return {
    topology: "human-in-the-loop",
    preGate: [...options.preGate],
    postGate: [...options.postGate],
    gatePrompt: options.gatePrompt?.trim() || DEFAULT_GATE_PROMPT,
    gateStep: options.gateStep?.trim() || DEFAULT_GATE_STEP
  };
}

export function formatDecision(decision: Pick<HumanDecision, "verdict" | "note">): string {
  const note = decision.note?.trim();
  return note ? `Human decision: ${decision.verdict}\nNote: ${note}` : `Human decision: ${decision.verdict}`;
}

/**
 * Pipeline with one gate. `start` runs the pre-gate agents and parks the run
 * in PAUSED_AWAITING_INPUT; `resume` accepts the decision for the matching
 * request exactly once and runs the post-gate agents.
 */
export class HumanInLoopOrchestrator extends BaseOrchestrator {
  private readonly config: HumanInLoopConfig;

  constructor(run: WorkflowRun, deps: OrchestratorDeps) {
    super(run, deps);
    if (run.config.topology !== "human-in-the-loop") {
      throw new InvalidConfigurationError(`Run ${run.id} is not a human-in-the-loop run`);
    }
    this.config = run.config;
  }

  start(): Promise<WorkflowRunSnapshot> {
    return this.execute(async () => {
      const seed = this.run.conversation.last();
      this.emit({ type: "run_started", input: seed?.content ?? "" });
      for (const agent of this.config.preGate) {
        await this.turn(agent);
      }
      await this.openGate();
    });
  }

  /**
   * @throws InvalidTransitionError when the run is not paused or the request id is stale;
   *   the run is left untouched in that case
   */
  async resume(requestId: string, decision: Omit<HumanDecision, "requestId">): Promise<WorkflowRunSnapshot> {
    this.run.resume(requestId);
    const accepted: HumanDecision = { requestId, verdict: decision.verdict };
    if (decision.note !== undefined) {
      accepted.note = decision.note;
    }

    return this.execute(async () => {
      this.run.conversation.append({ author: "human", role: "human", content: formatDecision(accepted) });
      this.run.touch();
      this.emit({ type: "run_resumed", decision: accepted });
      this.log.info({ requestId, verdict: accepted.verdict }, "run resumed");
      await this.save();
      for (const agent of this.config.postGate) {
        await this.turn(agent);
      }
      await this.finish();
    });
  }

  private async openGate(): Promise<void> {
    this.throwIfCancelled("the approval gate");
    const request: PendingRequest = {
      id: crypto.randomUUID(),
      step: this.config.gateStep,
      prompt: this.config.gatePrompt,
      options: VERDICTS,
      createdAt: new Date().toISOString()
    };
    const summary = this.run.conversation.last();
    if (summary && summary.role === "agent") {
      request.summary = summary.content;
    }
    this.run.pause(request);
    this.emit({ type: "run_paused", request });
    this.log.info({ requestId: request.id }, "run paused awaiting input");
    await this.save();
  }
}
