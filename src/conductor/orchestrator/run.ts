import crypto from "node:crypto";
import { ConversationState } from "../conversation.js";
import { InvalidConfigurationError, InvalidTransitionError } from "../errors.js";
import type {
  ExecutionPolicy,
  PendingRequest,
  RunErrorDetail,
  RunStatus,
  Topology,
  TopologyConfig,
  WorkflowRunSnapshot
} from "./types.js";

function isoNow(): string {
  return new Date().toISOString();
}

const TRANSITIONS: Record<RunStatus, readonly RunStatus[]> = {
  RUNNING: ["PAUSED_AWAITING_INPUT", "COMPLETED", "FAILED"],
  PAUSED_AWAITING_INPUT: ["RUNNING", "FAILED"],
  COMPLETED: [],
  FAILED: []
};

export function isTerminalStatus(status: RunStatus): boolean {
  return status === "COMPLETED" || status === "FAILED";
}

export type WorkflowRunInit = {
  id: string;
  config: TopologyConfig;
  policy: ExecutionPolicy;
  status: RunStatus;
  conversation: ConversationState;
  pendingRequest?: PendingRequest;
  error?: RunErrorDetail;
  createdAt: string;
  updatedAt: string;
};

/**
 * Mutable state of one run. Only the owning orchestrator (and the runner's
 * cancellation path) call the transition methods; every transition is checked
 * against the status table above and rejected without side effects.
 */
export class WorkflowRun {
  readonly id: string;
  readonly config: TopologyConfig;
  readonly policy: ExecutionPolicy;
  readonly conversation: ConversationState;
  readonly createdAt: string;

  private _status: RunStatus;
  private _pendingRequest: PendingRequest | undefined;
  private _error: RunErrorDetail | undefined;
  private _updatedAt: string;

  constructor(init: WorkflowRunInit) {
    this.id = init.id;
    this.config = init.config;
    this.policy = init.policy;
    this.conversation = init.conversation;
    this.createdAt = init.createdAt;
    this._status = init.status;
    this._pendingRequest = init.pendingRequest;
    this._error = init.error;
    this._updatedAt = init.updatedAt;
    if (isTerminalStatus(init.status)) {
      this.conversation.close();
    }
  }

  /**
   * Create a RUNNING run seeded with the caller's input.
   */
  static create(config: TopologyConfig, policy: ExecutionPolicy, input: string): WorkflowRun {
    const now = isoNow();
    const conversation = new ConversationState();
    conversation.append({ author: "user", role: "user", content: input });
    return new WorkflowRun({
      id: crypto.randomUUID(),
      config,
      policy,
      status: "RUNNING",
      conversation,
      createdAt: now,
      updatedAt: now
    });
  }

  get topology(): Topology {
    return this.config.topology;
  }

  get status(): RunStatus {
    return this._status;
  }

  get pendingRequest(): PendingRequest | undefined {
    return this._pendingRequest;
  }

  get error(): RunErrorDetail | undefined {
    return this._error;
  }

  get updatedAt(): string {
    return this._updatedAt;
  }

  get isTerminal(): boolean {
    return isTerminalStatus(this._status);
  }

  /**
   * Open the gate. A run holds at most one outstanding request.
   */
  pause(request: PendingRequest): void {
    if (this._pendingRequest) {
      throw new InvalidConfigurationError(
        `Run ${this.id} already has pending request ${this._pendingRequest.id}`
      );
    }
    this.transition("PAUSED_AWAITING_INPUT");
    this._pendingRequest = request;
  }

  /**
   * Close the gate for the matching request and return it.
   * Throws without mutating anything when the run is not paused or the id is stale.
   */
  resume(requestId: string): PendingRequest {
    const pending = this._pendingRequest;
    if (this._status !== "PAUSED_AWAITING_INPUT" || !pending) {
      throw new InvalidTransitionError(`Run ${this.id} is ${this._status}, not awaiting input`, {
        runId: this.id,
        status: this._status
      });
    }
    if (pending.id !== requestId) {
      throw new InvalidTransitionError(`Request ${requestId} does not match the pending request of run ${this.id}`, {
        runId: this.id,
        requestId
      });
    }
    this.transition("RUNNING");
    this._pendingRequest = undefined;
    return pending;
  }

  complete(): void {
    this.transition("COMPLETED");
  }

  fail(error: RunErrorDetail): void {
    this.transition("FAILED");
    this._pendingRequest = undefined;
    this._error = error;
  }

  /** Record that the transcript changed without a status change. */
  touch(): void {
    this._updatedAt = isoNow();
  }

  toSnapshot(): WorkflowRunSnapshot {
    const snapshot: WorkflowRunSnapshot = {
      id: this.id,
      topology: this.topology,
      status: this._status,
      transcript: this.conversation.snapshot(),
      createdAt: this.createdAt,
      updatedAt: this._updatedAt
    };
    if (this._pendingRequest) {
      snapshot.pendingRequest = { ...this._pendingRequest };
    }
    if (this._error) {
      snapshot.error = { ...this._error };
    }
    return snapshot;
  }

  private transition(to: RunStatus): void {
    if (!TRANSITIONS[this._status].includes(to)) {
      throw new InvalidTransitionError(`Run ${this.id} cannot move from ${this._status} to ${to}`, {
        runId: this.id,
        from: this._status,
        to
      });
    }
    this._status = to;
    this._updatedAt = isoNow();
    if (isTerminalStatus(to)) {
      this.conversation.close();
    }
  }
}
