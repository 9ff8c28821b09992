export const WORKFLOW_ERROR_CODES = [
  "AGENT_INVOCATION_FAILED",
  "INVALID_TRANSITION",
  "INVALID_CONFIGURATION",
  "CONFIGURATION_ERROR",
  "RUN_NOT_FOUND",
  "CANCELLED",
  "BAD_REQUEST",
  "STORE_FAILED",
  "INTERNAL"
] as const;

export type WorkflowErrorCode = (typeof WORKFLOW_ERROR_CODES)[number];

export class WorkflowError extends Error {
  readonly code: WorkflowErrorCode;
  readonly details?: unknown;

  constructor(code: WorkflowErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = "WorkflowError";
    this.code = code;
    if (details !== undefined) {
      this.details = details;
    }
  }

  toJSON(): { code: WorkflowErrorCode; message: string; details?: unknown } {
    return {
      code: this.code,
      message: this.message,
      ...(this.details !== undefined && { details: this.details })
    };
  }
}

export type AgentInvocationReason = "timeout" | "transport" | "malformed_response" | "cancelled";

/**
 * Raised by the AgentExecutor when the invocation collaborator fails.
 * Everything except cancellation is transient.
 */
export class AgentInvocationError extends WorkflowError {
  readonly agent: string;
  readonly reason: AgentInvocationReason;
  readonly transient: boolean;

  constructor(
    agent: string,
    reason: AgentInvocationReason,
    message: string,
    options?: { transient?: boolean; cause?: unknown }
  ) {
    super(
      reason === "cancelled" ? "CANCELLED" : "AGENT_INVOCATION_FAILED",
      message,
      { agent, reason }
    );
    this.name = "AgentInvocationError";
    this.agent = agent;
    this.reason = reason;
    this.transient = options?.transient ?? reason !== "cancelled";
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * A caller tried to move a run somewhere its state machine does not allow.
 * Never accompanied by a state change.
 */
export class InvalidTransitionError extends WorkflowError {
  constructor(message: string, details?: unknown) {
    super("INVALID_TRANSITION", message, details);
    this.name = "InvalidTransitionError";
  }
}

export class InvalidConfigurationError extends WorkflowError {
  constructor(message: string, details?: unknown) {
    super("INVALID_CONFIGURATION", message, details);
    this.name = "InvalidConfigurationError";
  }
}

/** Raised while loading configuration; fatal. */
export class ConfigurationError extends WorkflowError {
  constructor(message: string, details?: unknown) {
    super("CONFIGURATION_ERROR", message, details);
    this.name = "ConfigurationError";
  }
}

export function toWorkflowError(err: unknown): WorkflowError {
  if (err instanceof WorkflowError) return err;
  if (err instanceof Error) {
    if (err.name === "ZodError" && "issues" in err) {
      return new WorkflowError("BAD_REQUEST", "Validation error", { issues: err.issues });
    }
    return new WorkflowError("INTERNAL", err.message, { name: err.name, stack: err.stack });
  }
  return new WorkflowError("INTERNAL", "Unknown error", { err });
}
