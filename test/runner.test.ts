import { describe, expect, it } from "vitest";
import { InvalidConfigurationError, InvalidTransitionError, WorkflowError } from "../src/conductor/errors.js";
import { DEFAULT_GATE_PROMPT } from "../src/conductor/orchestrator/humanInLoop.js";
import type { WorkflowRun } from "../src/conductor/orchestrator/run.js";
import type { RunEvent, WorkflowRunSnapshot } from "../src/conductor/orchestrator/types.js";
import { EXPENSE_GATE_PROMPT } from "../src/conductor/presets.js";
import { WorkflowRunner } from "../src/conductor/runner.js";
import { InMemoryRunStore } from "../src/conductor/store/memoryStore.js";
import { StubLlmClient } from "../src/conductor/llm/types.js";
import { agent, echoReply, fakeClient, flushMicrotasks, waitForAbort } from "./helpers.js";

async function rejection(promise: Promise<unknown>): Promise<unknown> {
  return promise.then(
    () => undefined,
    (err: unknown) => err
  );
}

/** Store whose saves take a while, widening the window between a turn and the next state change. */
class SlowStore extends InMemoryRunStore {
  override async save(run: WorkflowRun): Promise<void> {
    await new Promise((resolve) => setTimeout(resolve, 20));
    await super.save(run);
  }
}

describe("WorkflowRunner", () => {
  describe("ticket triage (sequential)", () => {
    it("runs classifier, researcher and responder in order", async () => {
      const runner = new WorkflowRunner({ client: fakeClient() });

      const runId = await runner.start("sequential", "I was charged twice this month.");
      const snapshot = await runner.getStatus(runId);

      expect(snapshot.status).toBe("COMPLETED");
      expect(snapshot.transcript.map((m) => m.author)).toEqual([
        "user",
        "TicketClassifier",
        "KnowledgeResearcher",
        "SupportResponder"
      ]);
      expect(snapshot.transcript[0]?.content).toBe("I was charged twice this month.");
    });
  });

  describe("expense approval (human-in-the-loop)", () => {
    it("pauses for the manager and completes after APPROVE", async () => {
      const runner = new WorkflowRunner({ client: fakeClient() });

      const runId = await runner.start("human-in-the-loop", "Dinner with client, $180");
      const paused = await runner.getStatus(runId);

      expect(paused.status).toBe("PAUSED_AWAITING_INPUT");
      expect(paused.pendingRequest?.prompt).toBe(EXPENSE_GATE_PROMPT);
      expect(paused.transcript.map((m) => m.author)).toEqual(["user", "ExpenseAnalyst"]);

      const done = await runner.submitDecision(runId, paused.pendingRequest?.id ?? "", "APPROVE");

      expect(done.status).toBe("COMPLETED");
      expect(done.transcript.map((m) => m.author)).toEqual(["user", "ExpenseAnalyst", "human", "ExpenseProcessor"]);
      expect(done.transcript[2]?.content).toBe("Human decision: APPROVE");
      expect(await runner.getStatus(runId)).toEqual(done);
    });

    it("uses the generic gate prompt for custom pre-gate agents", async () => {
      const runner = new WorkflowRunner({ client: fakeClient() });

      const runId = await runner.start("human-in-the-loop", "input", { preGate: [agent("A")], postGate: [agent("B")] });

      expect((await runner.getStatus(runId)).pendingRequest?.prompt).toBe(DEFAULT_GATE_PROMPT);
    });

    it("accepts one of two identical concurrent decisions", async () => {
      const client = fakeClient();
      const runner = new WorkflowRunner({ client });
      const runId = await runner.start("human-in-the-loop", "input", { preGate: [agent("A")], postGate: [agent("B")] });
      const requestId = (await runner.getStatus(runId)).pendingRequest?.id ?? "";

      const results = await Promise.allSettled([
        runner.submitDecision(runId, requestId, "APPROVE"),
        runner.submitDecision(runId, requestId, "APPROVE")
      ]);

      expect(results.map((r) => r.status).sort()).toEqual(["fulfilled", "rejected"]);
      const rejected = results.find((r) => r.status === "rejected");
      expect(rejected?.status === "rejected" && rejected.reason).toBeInstanceOf(InvalidTransitionError);
      expect(client.speakers()).toEqual(["A", "B"]);
      expect((await runner.getStatus(runId)).transcript).toHaveLength(4);
    });

    it("rejects a stale request id without changing the run", async () => {
      const runner = new WorkflowRunner({ client: fakeClient() });
      const runId = await runner.start("human-in-the-loop", "input");

      const err = await rejection(runner.submitDecision(runId, "stale", "APPROVE"));

      expect(err).toBeInstanceOf(InvalidTransitionError);
      expect((await runner.getStatus(runId)).status).toBe("PAUSED_AWAITING_INPUT");
    });

    it("rejects an unknown verdict", async () => {
      const runner = new WorkflowRunner({ client: fakeClient() });
      const runId = await runner.start("human-in-the-loop", "input");

      const err = await rejection(runner.submitDecision(runId, "any", "MAYBE"));

      expect(err).toBeInstanceOf(WorkflowError);
      expect(err instanceof WorkflowError && err.code).toBe("BAD_REQUEST");
    });

    it("takes no decisions for other topologies", async () => {
      const runner = new WorkflowRunner({ client: fakeClient() });
      const runId = await runner.start("sequential", "input", { agents: [agent("A")] });

      expect(await rejection(runner.submitDecision(runId, "any", "APPROVE"))).toBeInstanceOf(InvalidTransitionError);
    });
  });

  describe("launch brainstorm (round-robin)", () => {
    it("runs three agents for two rounds plus synthesis", async () => {
      const runner = new WorkflowRunner({ client: fakeClient() });

      const runId = await runner.start("round-robin", "Launch of the new tablet", { roundCount: 2 });
      const snapshot = await runner.getStatus(runId);

      expect(snapshot.status).toBe("COMPLETED");
      expect(snapshot.transcript).toHaveLength(8);
      expect(snapshot.transcript.map((m) => m.author)).toEqual([
        "user",
        "MarketingLead",
        "EngineeringLead",
        "ProductManager",
        "MarketingLead",
        "EngineeringLead",
        "ProductManager",
        "ProductManager"
      ]);
    });

    it("takes the round count from the runner defaults", async () => {
      const runner = new WorkflowRunner({ client: fakeClient(), defaults: { roundCount: 1 } });

      const runId = await runner.start("round-robin", "brief");

      expect((await runner.getStatus(runId)).transcript).toHaveLength(5);
    });

    it("rejects roundCount 0 before any agent call or persistence", async () => {
      const client = fakeClient();
      const runner = new WorkflowRunner({ client });

      const err = await rejection(runner.start("round-robin", "brief", { roundCount: 0 }));

      expect(err).toBeInstanceOf(InvalidConfigurationError);
      expect(client.generate).not.toHaveBeenCalled();
      expect(await runner.list()).toEqual([]);
    });
  });

  describe("start validation", () => {
    it("rejects an unknown topology", async () => {
      const runner = new WorkflowRunner({ client: fakeClient() });
      const err = await rejection(runner.start("star", "input"));

      expect(err instanceof WorkflowError && err.code).toBe("BAD_REQUEST");
    });

    it("rejects an empty input", async () => {
      const runner = new WorkflowRunner({ client: fakeClient() });
      const err = await rejection(runner.start("sequential", "   "));

      expect(err instanceof WorkflowError && err.code).toBe("BAD_REQUEST");
    });

    it("rejects an empty agent list and a bad retry count", async () => {
      const runner = new WorkflowRunner({ client: fakeClient() });

      expect(await rejection(runner.start("sequential", "x", { agents: [] }))).toBeInstanceOf(InvalidConfigurationError);
      expect(await rejection(runner.start("sequential", "x", { maxRetries: 2 }))).toBeInstanceOf(
        InvalidConfigurationError
      );
      expect(await rejection(runner.start("sequential", "x", { agents: [agent(" ")] }))).toBeInstanceOf(
        InvalidConfigurationError
      );
    });

    it("reports RUN_NOT_FOUND for an unknown id", async () => {
      const runner = new WorkflowRunner({ client: fakeClient() });
      const err = await rejection(runner.getStatus("missing"));

      expect(err instanceof WorkflowError && err.code).toBe("RUN_NOT_FOUND");
    });
  });

  describe("timeouts and retries", () => {
    it("fails the run when an agent times out and retries are off", async () => {
      const client = fakeClient((input) => waitForAbort(input.abortSignal));
      const runner = new WorkflowRunner({ client });

      const runId = await runner.start("sequential", "x", { agents: [agent("A")], timeoutMs: 20, maxRetries: 0 });
      const snapshot = await runner.getStatus(runId);

      expect(snapshot.status).toBe("FAILED");
      expect(snapshot.error).toEqual({ code: "AGENT_INVOCATION_FAILED", message: "A did not answer within 20ms" });
      expect(snapshot.transcript).toHaveLength(1);
    });

    it("recovers from a single timeout with one retry", async () => {
      const client = fakeClient((input, call) => (call === 1 ? waitForAbort(input.abortSignal) : echoReply(input, call)));
      const runner = new WorkflowRunner({ client });

      const runId = await runner.start("sequential", "x", { agents: [agent("A")], timeoutMs: 20, maxRetries: 1 });
      const snapshot = await runner.getStatus(runId);

      expect(snapshot.status).toBe("COMPLETED");
      expect(snapshot.transcript.map((m) => m.content)).toEqual(["x", "A#1"]);
      expect(client.generate).toHaveBeenCalledTimes(2);
    });
  });

  describe("cancel", () => {
    it("fails a paused run with CANCELLED and refuses later decisions", async () => {
      const runner = new WorkflowRunner({ client: fakeClient() });
      const runId = await runner.start("human-in-the-loop", "input");
      const requestId = (await runner.getStatus(runId)).pendingRequest?.id ?? "";

      const cancelled = await runner.cancel(runId);

      expect(cancelled.status).toBe("FAILED");
      expect(cancelled.error?.code).toBe("CANCELLED");
      expect(cancelled.pendingRequest).toBeUndefined();
      expect(await rejection(runner.submitDecision(runId, requestId, "APPROVE"))).toBeInstanceOf(
        InvalidTransitionError
      );
    });

    it("aborts a running run at the in-flight call", async () => {
      const client = fakeClient((input) => waitForAbort(input.abortSignal));
      const runner = new WorkflowRunner({ client });

      const runId = await runner.start("sequential", "x", { agents: [agent("A"), agent("B")], detach: true });
      const cancelled = await runner.cancel(runId);

      expect(cancelled.status).toBe("FAILED");
      expect(cancelled.error?.code).toBe("CANCELLED");
      expect(cancelled.transcript).toHaveLength(1);
      expect(client.speakers()).toEqual(["A"]);
    });

    it("does not pause a run cancelled after its last pre-gate turn", async () => {
      const client = fakeClient();
      const cancels: Promise<WorkflowRunSnapshot>[] = [];
      const runner: WorkflowRunner = new WorkflowRunner({
        client,
        store: new SlowStore(),
        onEvent: (event) => {
          if (event.type === "turn_completed") cancels.push(runner.cancel(event.runId));
        }
      });

      const runId = await runner.start("human-in-the-loop", "Expense: $40", {
        preGate: [agent("A")],
        postGate: [agent("B")]
      });
      const result = await cancels[0];
      const status = await runner.getStatus(runId);

      expect(result?.status).toBe("FAILED");
      expect(result?.error?.code).toBe("CANCELLED");
      expect(status.status).toBe("FAILED");
      expect(status.pendingRequest).toBeUndefined();
      expect(client.speakers()).toEqual(["A"]);
    });

    it("refuses a decision queued behind a cancel", async () => {
      const client = fakeClient((input) => waitForAbort(input.abortSignal));
      const runner = new WorkflowRunner({ client });
      const runId = await runner.start("human-in-the-loop", "Expense: $40", {
        preGate: [agent("A")],
        postGate: [agent("B")],
        detach: true
      });

      const decision = runner.submitDecision(runId, "queued", "APPROVE");
      const cancel = runner.cancel(runId);
      const [decided, cancelled] = await Promise.allSettled([decision, cancel]);

      expect(decided.status).toBe("rejected");
      expect(decided.status === "rejected" && decided.reason).toBeInstanceOf(InvalidTransitionError);
      expect(cancelled.status === "fulfilled" && cancelled.value.error?.code).toBe("CANCELLED");
      expect(client.speakers()).toEqual(["A"]);
      expect((await runner.stats()).active).toBe(0);
    });

    it("refuses to cancel a finished run", async () => {
      const runner = new WorkflowRunner({ client: fakeClient() });
      const runId = await runner.start("sequential", "x", { agents: [agent("A")] });

      expect(await rejection(runner.cancel(runId))).toBeInstanceOf(InvalidTransitionError);
      expect((await runner.getStatus(runId)).status).toBe("COMPLETED");
    });
  });

  describe("list and stats", () => {
    it("filters by status and counts runs", async () => {
      const runner = new WorkflowRunner({ client: fakeClient() });
      const completed = await runner.start("sequential", "x", { agents: [agent("A")] });
      const paused = await runner.start("human-in-the-loop", "y");

      const pausedRuns = await runner.list("PAUSED_AWAITING_INPUT");
      const stats = await runner.stats();

      expect(pausedRuns.map((r) => r.id)).toEqual([paused]);
      expect((await runner.list("COMPLETED")).map((r) => r.id)).toEqual([completed]);
      expect(stats).toEqual({
        total: 2,
        byStatus: { RUNNING: 0, PAUSED_AWAITING_INPUT: 1, COMPLETED: 1, FAILED: 0 },
        active: 0
      });
    });
  });

  it("reports the LLM provider it drives", () => {
    expect(new WorkflowRunner({ client: fakeClient() }).llmInfo()).toEqual({
      provider: "fake",
      model: "fake-model",
      configured: true
    });
    expect(new WorkflowRunner({ client: new StubLlmClient() }).llmInfo()).toEqual({
      provider: "stub",
      model: "none",
      configured: false
    });
  });

  it("forwards run events to the observer", async () => {
    const events: RunEvent[] = [];
    const runner = new WorkflowRunner({ client: fakeClient(), onEvent: (event) => void events.push(event) });

    const runId = await runner.start("sequential", "x", { agents: [agent("A")] });
    await flushMicrotasks();

    expect(events.map((e) => e.type)).toEqual(["run_started", "turn_started", "turn_completed", "run_completed"]);
    expect(events.every((e) => e.runId === runId)).toBe(true);
  });
});
