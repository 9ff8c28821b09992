import { InvalidConfigurationError } from "../errors.js";
import { BaseOrchestrator, type OrchestratorDeps } from "./base.js";
import type { WorkflowRun } from "./run.js";
import type { AgentSpec, RoundRobinConfig, WorkflowRunSnapshot } from "./types.js";

export const DEFAULT_SYNTHESIS_INSTRUCTIONS =
  "The discussion rounds are complete. Synthesize all the inputs into a concise final plan with " +
  "key messages, highlights, timeline and action items.";

/**
 * Meeting framing added to every discussion turn; the synthesis turn gets its own instructions.
 */
export function groupFraming(agentNames: readonly string[]): string {
  return (
    `You are in a group brainstorming meeting. Participants: ${agentNames.join(", ")}. ` +
    "Please contribute your perspective concisely (under 100 words). Build on what others have said."
  );
}

export type RoundRobinOptions = {
  agents: readonly AgentSpec[];
  roundCount: number;
  /** Defaults to the last agent of the list */
  synthesizer?: AgentSpec;
  synthesisInstructions?: string;
};

/**
 * Build a round-robin configuration. Validation happens here, before any run
 * exists, so a bad round count never reaches an agent.
 * @throws InvalidConfigurationError on an empty agent list or a round count below 1
 */
export function roundRobinConfig(options: RoundRobinOptions): RoundRobinConfig {
  if (options.agents.length === 0) {
    throw new InvalidConfigurationError("Round-robin topology needs at least one agent");
  }
  if (!Number.isInteger(options.roundCount) || options.roundCount < 1) {
    throw new InvalidConfigurationError(`roundCount must be an integer >= 1, got ${options.roundCount}`, {
      roundCount: options.roundCount
    });
  }

  const instructions = options.synthesisInstructions?.trim() || DEFAULT_SYNTHESIS_INSTRUCTIONS;
  const base = options.synthesizer ?? options.agents[options.agents.length - 1];
  if (!base) {
    throw new InvalidConfigurationError("Round-robin topology has no synthesizer");
  }

  return {
    topology: "round-robin",
    agents: [...options.agents],
    roundCount: options.roundCount,
    synthesizer: {
      name: base.name,
      role: base.role,
      instructions: `${base.instructions}\n\n${instructions}`
    }
  };
}

/**
 * Bounded discussion: roundCount passes over the agent list, every turn on the
 * full transcript, then one synthesis turn producing the final artifact.
 */
export class RoundRobinOrchestrator extends BaseOrchestrator {
  private readonly config: RoundRobinConfig;

  constructor(run: WorkflowRun, deps: OrchestratorDeps) {
    super(run, deps);
    if (run.config.topology !== "round-robin") {
      throw new InvalidConfigurationError(`Run ${run.id} is not a round-robin run`);
    }
    this.config = run.config;
  }

  start(): Promise<WorkflowRunSnapshot> {
    return this.execute(async () => {
      const seed = this.run.conversation.last();
      this.emit({ type: "run_started", input: seed?.content ?? "" });
      const framing = groupFraming(this.config.agents.map((agent) => agent.name));
      for (let round = 1; round <= this.config.roundCount; round++) {
        for (const agent of this.config.agents) {
          await this.turn(agent, { round, extraInstructions: framing });
        }
      }
      await this.turn(this.config.synthesizer);
      await this.finish();
    });
  }
}
