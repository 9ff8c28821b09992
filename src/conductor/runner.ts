/**
 * WorkflowRunner - the façade every surface drives.
 *
 * Picks the orchestrator for a topology, persists the run after each
 * observable change and serializes start/decide/cancel per run id.
 */

import { AgentExecutor } from "./agents/executor.js";
import { DEFAULT_RUN_DEFAULTS, type RunDefaults } from "./config.js";
import {
  InvalidConfigurationError,
  InvalidTransitionError,
  WorkflowError
} from "./errors.js";
import type { LlmClient } from "./llm/types.js";
import { logger as rootLogger, type Logger } from "./logger.js";
import type { OrchestratorDeps } from "./orchestrator/base.js";
import { HumanInLoopOrchestrator, humanInLoopConfig, type HumanInLoopOptions } from "./orchestrator/humanInLoop.js";
import { RoundRobinOrchestrator, roundRobinConfig, type RoundRobinOptions } from "./orchestrator/roundRobin.js";
import { WorkflowRun } from "./orchestrator/run.js";
import { RunRegistry } from "./orchestrator/runRegistry.js";
import { SequentialOrchestrator, sequentialConfig } from "./orchestrator/sequential.js";
import {
  TOPOLOGIES,
  VERDICTS,
  type AgentSpec,
  type ExecutionPolicy,
  type RunEventHandler,
  type RunStatus,
  type Topology,
  type TopologyConfig,
  type Verdict,
  type WorkflowRunSnapshot
} from "./orchestrator/types.js";
import {
  BRAINSTORM_AGENTS,
  EXPENSE_GATE_PROMPT,
  EXPENSE_POST_GATE_AGENTS,
  EXPENSE_PRE_GATE_AGENTS,
  TICKET_TRIAGE_AGENTS
} from "./presets.js";
import { fromRecord } from "./store/record.js";
import { InMemoryRunStore } from "./store/memoryStore.js";
import type { RunStore } from "./store/types.js";

export type StartOptions = {
  /** sequential and round-robin */
  agents?: readonly AgentSpec[];
  /** human-in-the-loop */
  preGate?: readonly AgentSpec[];
  postGate?: readonly AgentSpec[];
  gatePrompt?: string;
  /** round-robin */
  roundCount?: number;
  synthesizer?: AgentSpec;
  synthesisInstructions?: string;
  /** Per agent call, overrides the runner default */
  timeoutMs?: number;
  /** 0 or 1, overrides the runner default */
  maxRetries?: number;
  /** Return once the run is persisted and drive it in the background */
  detach?: boolean;
};

export type WorkflowRunnerOptions = {
  client: LlmClient;
  store?: RunStore;
  defaults?: Partial<RunDefaults>;
  onEvent?: RunEventHandler;
  logger?: Logger;
};

export type RunnerStats = {
  total: number;
  byStatus: Record<RunStatus, number>;
  /** Runs currently driven by this process */
  active: number;
};

export type LlmInfo = {
  provider: string;
  model: string;
  /** False when agents answer with the offline stub */
  configured: boolean;
};

export function isTopology(value: string): value is Topology {
  return TOPOLOGIES.some((topology) => topology === value);
}

export function isVerdict(value: string): value is Verdict {
  return VERDICTS.some((verdict) => verdict === value);
}

function assertAgents(label: string, agents: readonly AgentSpec[] | undefined): void {
  for (const agent of agents ?? []) {
    if (agent.name.trim() === "") {
      throw new InvalidConfigurationError(`${label} contains an agent without a name`);
    }
  }
}

export class WorkflowRunner {
  readonly store: RunStore;
  private readonly client: LlmClient;
  private readonly executor: AgentExecutor;
  private readonly defaults: RunDefaults;
  private readonly registry = new RunRegistry();
  private readonly onEvent: RunEventHandler | undefined;
  private readonly baseLogger: Logger;
  private readonly log: Logger;

  constructor(options: WorkflowRunnerOptions) {
    this.baseLogger = options.logger ?? rootLogger;
    this.log = this.baseLogger.child({ module: "runner" });
    this.client = options.client;
    this.executor = new AgentExecutor(options.client, this.baseLogger.child({ module: "executor" }));
    this.store = options.store ?? new InMemoryRunStore();
    this.defaults = { ...DEFAULT_RUN_DEFAULTS, ...options.defaults };
    this.onEvent = options.onEvent;
    if (!this.client.isConfigured()) {
      this.log.warn({ provider: this.client.provider }, "no LLM provider configured, agents answer with the offline stub");
    }
  }

  llmInfo(): LlmInfo {
    return { provider: this.client.provider, model: this.client.model, configured: this.client.isConfigured() };
  }

  /**
   * Validate, persist and drive a new run until it pauses or ends.
   * @returns the run id
   * @throws WorkflowError BAD_REQUEST for an unknown topology or empty input
   * @throws InvalidConfigurationError for a malformed configuration; nothing is persisted
   */
  async start(topology: string, initialInput: string, options: StartOptions = {}): Promise<string> {
    if (!isTopology(topology)) {
      throw new WorkflowError("BAD_REQUEST", `Unknown topology "${topology}"`, { topologies: TOPOLOGIES });
    }
    if (initialInput.trim() === "") {
      throw new WorkflowError("BAD_REQUEST", "Initial input must not be empty");
    }
    const config = this.buildConfig(topology, options);
    const policy = this.buildPolicy(options);

    const run = WorkflowRun.create(config, policy, initialInput);
    await this.store.save(run);
    this.log.info({ runId: run.id, topology }, "run created");

    const driving = this.drive(run.id, (deps) => this.orchestratorFor(run, deps).start());
    if (options.detach) {
      driving.catch((err: unknown) => {
        this.log.error({ runId: run.id, err }, "background run crashed");
      });
    } else {
      await driving;
    }
    return run.id;
  }

  /**
   * Last persisted state of a run. Does not wait for an in-flight turn.
   * @throws WorkflowError RUN_NOT_FOUND
   */
  async getStatus(runId: string): Promise<WorkflowRunSnapshot> {
    const run = await this.mustLoad(runId);
    return run.toSnapshot();
  }

  /**
   * Deliver the human decision for the pending request and drive the rest of the run.
   * @throws InvalidTransitionError when the run is not paused, the request id is stale,
   *   or the run is not a human-in-the-loop run
   */
  async submitDecision(runId: string, requestId: string, verdict: string, note?: string): Promise<WorkflowRunSnapshot> {
    if (!isVerdict(verdict)) {
      throw new WorkflowError("BAD_REQUEST", `Unknown verdict "${verdict}"`, { verdicts: VERDICTS });
    }
    const decision = note !== undefined ? { verdict, note } : { verdict };
    return this.drive(runId, async (deps) => {
      const run = await this.mustLoad(runId);
      if (run.config.topology !== "human-in-the-loop") {
        throw new InvalidTransitionError(`Run ${runId} is a ${run.topology} run and takes no decisions`, {
          runId,
          topology: run.topology
        });
      }
      const orchestrator = new HumanInLoopOrchestrator(run, deps);
      return orchestrator.resume(requestId, decision);
    });
  }

  /**
   * Cancel a run. A paused run fails at once; a running one is aborted and
   * fails at its next turn boundary. Either way the returned run is FAILED
   * with CANCELLED unless it had already finished.
   * @throws InvalidTransitionError when the run is already terminal
   */
  async cancel(runId: string): Promise<WorkflowRunSnapshot> {
    if (this.registry.abort(runId)) {
      this.log.info({ runId }, "abort signalled");
      return this.registry.withLock(runId, async () => {
        try {
          // The driver may have paused or been followed by a queued decision
          return await this.failCancelled(runId);
        } finally {
          this.registry.clearCancel(runId);
        }
      });
    }

    return this.registry.withLock(runId, async () => {
      const run = await this.mustLoad(runId);
      if (run.isTerminal) {
        throw new InvalidTransitionError(`Run ${runId} is already ${run.status}`, { runId, status: run.status });
      }
      return this.failCancelled(runId, run);
    });
  }

  async list(status?: RunStatus): Promise<WorkflowRunSnapshot[]> {
    const records = await this.store.list(status);
    return records.map((record) => fromRecord(record).toSnapshot());
  }

  async stats(): Promise<RunnerStats> {
    const records = await this.store.list();
    const byStatus: Record<RunStatus, number> = {
      RUNNING: 0,
      PAUSED_AWAITING_INPUT: 0,
      COMPLETED: 0,
      FAILED: 0
    };
    for (const record of records) {
      byStatus[record.status]++;
    }
    return { total: records.length, byStatus, active: this.registry.stats().active };
  }

  async close(): Promise<void> {
    await this.store.close();
  }

  /**
   * Run `segment` under the run's lock with a fresh abort handle.
   */
  private drive(
    runId: string,
    segment: (deps: OrchestratorDeps) => Promise<WorkflowRunSnapshot>
  ): Promise<WorkflowRunSnapshot> {
    return this.registry.withLock(runId, async () => {
      const controller = this.registry.attach(runId);
      try {
        if (controller.signal.aborted) {
          await this.failCancelled(runId);
          throw new InvalidTransitionError(`Run ${runId} was cancelled`, { runId });
        }
        return await segment({
          executor: this.executor,
          signal: controller.signal,
          checkpoint: (run) => this.store.save(run),
          logger: this.baseLogger.child({ module: "orchestrator" }),
          ...(this.onEvent !== undefined && { onEvent: this.onEvent })
        });
      } finally {
        this.registry.detach(runId, controller);
      }
    });
  }

  /**
   * Fail a run that is not terminal yet with CANCELLED; caller holds the lock.
   */
  private async failCancelled(runId: string, loaded?: WorkflowRun): Promise<WorkflowRunSnapshot> {
    const run = loaded ?? (await this.mustLoad(runId));
    if (!run.isTerminal) {
      run.fail({ code: "CANCELLED", message: `Run ${runId} was cancelled while ${run.status}` });
      await this.store.save(run);
      this.log.info({ runId }, "run cancelled");
    }
    return run.toSnapshot();
  }

  private orchestratorFor(
    run: WorkflowRun,
    deps: OrchestratorDeps
  ): SequentialOrchestrator | HumanInLoopOrchestrator | RoundRobinOrchestrator {
    switch (run.config.topology) {
      case "sequential":
        return new SequentialOrchestrator(run, deps);
      case "human-in-the-loop":
        return new HumanInLoopOrchestrator(run, deps);
      case "round-robin":
        return new RoundRobinOrchestrator(run, deps);
    }
  }

  private async mustLoad(runId: string): Promise<WorkflowRun> {
    const run = await this.store.load(runId);
    if (!run) {
      throw new WorkflowError("RUN_NOT_FOUND", `Run ${runId} not found`, { runId });
    }
    return run;
  }

  private buildConfig(topology: Topology, options: StartOptions): TopologyConfig {
    assertAgents("agents", options.agents);
    assertAgents("preGate", options.preGate);
    assertAgents("postGate", options.postGate);

    switch (topology) {
      case "sequential":
        return sequentialConfig(options.agents ?? TICKET_TRIAGE_AGENTS);
      case "human-in-the-loop": {
        const hitl: HumanInLoopOptions = {
          preGate: options.preGate ?? EXPENSE_PRE_GATE_AGENTS,
          postGate: options.postGate ?? EXPENSE_POST_GATE_AGENTS
        };
        const gatePrompt = options.gatePrompt ?? (options.preGate ? undefined : EXPENSE_GATE_PROMPT);
        if (gatePrompt !== undefined) {
          hitl.gatePrompt = gatePrompt;
        }
        return humanInLoopConfig(hitl);
      }
      case "round-robin": {
        const rr: RoundRobinOptions = {
          agents: options.agents ?? BRAINSTORM_AGENTS,
          roundCount: options.roundCount ?? this.defaults.roundCount
        };
        if (options.synthesizer !== undefined) {
          assertAgents("synthesizer", [options.synthesizer]);
          rr.synthesizer = options.synthesizer;
        }
        if (options.synthesisInstructions !== undefined) {
          rr.synthesisInstructions = options.synthesisInstructions;
        }
        return roundRobinConfig(rr);
      }
    }
  }

  private buildPolicy(options: StartOptions): ExecutionPolicy {
    const stepTimeoutMs = options.timeoutMs ?? this.defaults.stepTimeoutMs;
    const maxRetries = options.maxRetries ?? this.defaults.maxRetries;
    if (!Number.isInteger(stepTimeoutMs) || stepTimeoutMs < 1) {
      throw new InvalidConfigurationError(`timeoutMs must be a positive integer, got ${stepTimeoutMs}`);
    }
    if (maxRetries !== 0 && maxRetries !== 1) {
      throw new InvalidConfigurationError(`maxRetries must be 0 or 1, got ${maxRetries}`);
    }
    return { stepTimeoutMs, maxRetries };
  }
}
