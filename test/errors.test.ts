import { describe, expect, it } from "vitest";
import { z } from "zod";
import {
  AgentInvocationError,
  ConfigurationError,
  InvalidConfigurationError,
  InvalidTransitionError,
  WorkflowError,
  toWorkflowError
} from "../src/conductor/errors.js";

describe("WorkflowError", () => {
  it("creates error with code and message", () => {
    const err = new WorkflowError("RUN_NOT_FOUND", "Run r1 not found");
    expect(err.code).toBe("RUN_NOT_FOUND");
    expect(err.message).toBe("Run r1 not found");
    expect(err.name).toBe("WorkflowError");
  });

  it("toJSON includes details when provided", () => {
    const err = new WorkflowError("BAD_REQUEST", "Invalid input", { field: "topology" });
    expect(err.toJSON()).toEqual({ code: "BAD_REQUEST", message: "Invalid input", details: { field: "topology" } });
  });

  it("toJSON excludes details when undefined", () => {
    const json = new WorkflowError("INTERNAL", "Something went wrong").toJSON();
    expect("details" in json).toBe(false);
  });

  it("gives each subclass its code", () => {
    expect(new InvalidTransitionError("x").code).toBe("INVALID_TRANSITION");
    expect(new InvalidConfigurationError("x").code).toBe("INVALID_CONFIGURATION");
    expect(new ConfigurationError("x").code).toBe("CONFIGURATION_ERROR");
  });
});

describe("AgentInvocationError", () => {
  it("is a transient AGENT_INVOCATION_FAILED by default", () => {
    const err = new AgentInvocationError("Analyst", "timeout", "Analyst did not answer within 10ms");

    expect(err.code).toBe("AGENT_INVOCATION_FAILED");
    expect(err.transient).toBe(true);
    expect(err.details).toEqual({ agent: "Analyst", reason: "timeout" });
  });

  it("maps cancellation to CANCELLED and never retries it", () => {
    const err = new AgentInvocationError("Analyst", "cancelled", "cancelled");

    expect(err.code).toBe("CANCELLED");
    expect(err.transient).toBe(false);
  });

  it("honours an explicit transient flag and cause", () => {
    const cause = new Error("401");
    const err = new AgentInvocationError("Analyst", "transport", "Analyst: bad key", { transient: false, cause });

    expect(err.transient).toBe(false);
    expect(err.cause).toBe(cause);
  });
});

describe("toWorkflowError", () => {
  it("returns WorkflowError unchanged", () => {
    const original = new InvalidTransitionError("Run r1 is already COMPLETED");
    expect(toWorkflowError(original)).toBe(original);
  });

  it("converts regular Error to INTERNAL", () => {
    const result = toWorkflowError(new Error("Something failed"));

    expect(result.code).toBe("INTERNAL");
    expect(result.message).toBe("Something failed");
    expect(result.details).toHaveProperty("name", "Error");
  });

  it("converts ZodError to BAD_REQUEST", () => {
    const parsed = z.object({ input: z.string() }).safeParse({});
    expect(parsed.success).toBe(false);

    const result = toWorkflowError(parsed.error);

    expect(result.code).toBe("BAD_REQUEST");
    expect(result.message).toBe("Validation error");
    expect(result.details).toHaveProperty("issues");
  });

  it("wraps non-Error values", () => {
    const result = toWorkflowError("boom");

    expect(result.code).toBe("INTERNAL");
    expect(result.details).toEqual({ err: "boom" });
  });
});
