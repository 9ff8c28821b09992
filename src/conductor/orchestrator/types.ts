/**
 * Orchestrator types shared by the three topologies and the runner.
 */

import type { Message } from "../conversation.js";
import type { WorkflowErrorCode } from "../errors.js";
import type { TokenUsage } from "../llm/types.js";

export const TOPOLOGIES = ["sequential", "human-in-the-loop", "round-robin"] as const;
export type Topology = (typeof TOPOLOGIES)[number];

export const RUN_STATUSES = ["RUNNING", "PAUSED_AWAITING_INPUT", "COMPLETED", "FAILED"] as const;
export type RunStatus = (typeof RUN_STATUSES)[number];

export const VERDICTS = ["APPROVE", "REJECT", "MORE_INFO"] as const;
export type Verdict = (typeof VERDICTS)[number];

/**
 * An agent is data: a name, a short role description and its instructions.
 */
export type AgentSpec = {
  readonly name: string;
  readonly role: string;
  readonly instructions: string;
};

export type PendingRequest = {
  id: string;
  /** Step that opened the gate */
  step: string;
  /** Text shown to the human */
  prompt: string;
  options: readonly Verdict[];
  /** Last pre-gate agent output */
  summary?: string;
  createdAt: string;
};

export type HumanDecision = {
  requestId: string;
  verdict: Verdict;
  note?: string;
};

export type RunErrorDetail = {
  code: WorkflowErrorCode;
  message: string;
};

export type SequentialConfig = {
  topology: "sequential";
  agents: readonly AgentSpec[];
};

export type HumanInLoopConfig = {
  topology: "human-in-the-loop";
  preGate: readonly AgentSpec[];
  postGate: readonly AgentSpec[];
  gatePrompt: string;
  gateStep: string;
};

export type RoundRobinConfig = {
  topology: "round-robin";
  agents: readonly AgentSpec[];
  roundCount: number;
  synthesizer: AgentSpec;
};

export type TopologyConfig = SequentialConfig | HumanInLoopConfig | RoundRobinConfig;

/**
 * Per-run execution policy.
 */
export type ExecutionPolicy = {
  /** Timeout for each agent call in ms */
  stepTimeoutMs: number;
  /** Retries of a transient agent failure; 0 or 1 */
  maxRetries: number;
};

export type WorkflowRunSnapshot = {
  id: string;
  topology: Topology;
  status: RunStatus;
  transcript: readonly Message[];
  pendingRequest?: PendingRequest;
  error?: RunErrorDetail;
  createdAt: string;
  updatedAt: string;
};

// ============================================================================
// Run events
// ============================================================================

export type RunEventBase = {
  timestamp: string;
  runId: string;
  topology: Topology;
};

export type RunStartedEvent = RunEventBase & { type: "run_started"; input: string };

export type TurnStartedEvent = RunEventBase & {
  type: "turn_started";
  agent: string;
  round?: number;
};

export type TurnCompletedEvent = RunEventBase & {
  type: "turn_completed";
  agent: string;
  message: Message;
  durationMs: number;
  attempts: number;
  usage?: TokenUsage;
};

export type RunPausedEvent = RunEventBase & { type: "run_paused"; request: PendingRequest };

export type RunResumedEvent = RunEventBase & { type: "run_resumed"; decision: HumanDecision };

export type RunCompletedEvent = RunEventBase & { type: "run_completed"; messages: number };

export type RunFailedEvent = RunEventBase & { type: "run_failed"; error: RunErrorDetail };

export type RunEvent =
  | RunStartedEvent
  | TurnStartedEvent
  | TurnCompletedEvent
  | RunPausedEvent
  | RunResumedEvent
  | RunCompletedEvent
  | RunFailedEvent;

export type RunEventHandler = (event: RunEvent) => void | Promise<void>;
