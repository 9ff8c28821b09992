import { InvalidConfigurationError } from "../errors.js";
import { BaseOrchestrator, type OrchestratorDeps } from "./base.js";
import type { WorkflowRun } from "./run.js";
import type { AgentSpec, SequentialConfig, WorkflowRunSnapshot } from "./types.js";

/**
 * Build a sequential configuration.
 * @throws InvalidConfigurationError when the agent list is empty
 */
export function sequentialConfig(agents: readonly AgentSpec[]): SequentialConfig {
  if (agents.length === 0) {
    throw new InvalidConfigurationError("Sequential topology needs at least one agent");
  }
  return { topology: "sequential", agents: [...agents] };
}

/**
 * Strict pipeline: every agent speaks once, in list order, on the full
 * transcript. The first unrecovered failure ends the run.
 */
export class SequentialOrchestrator extends BaseOrchestrator {
  private readonly config: SequentialConfig;

  constructor(run: WorkflowRun, deps: OrchestratorDeps) {
    super(run, deps);
    if (run.config.topology !== "sequential") {
      throw new InvalidConfigurationError(`Run ${run.id} is not a sequential run`);
    }
    this.config = run.config;
  }

  start(): Promise<WorkflowRunSnapshot> {
    return this.execute(async () => {
      const seed = this.run.conversation.last();
      this.emit({ type: "run_started", input: seed?.content ?? "" });
      for (const agent of this.config.agents) {
        await this.turn(agent);
      }
      await this.finish();
    });
  }
}
