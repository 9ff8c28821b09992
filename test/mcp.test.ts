import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { z } from "zod";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { WorkflowRunner } from "../src/conductor/runner.js";
import { RunSnapshotWireSchema } from "../src/conductor/store/record.js";
import { createMcpServer } from "../src/mcp/server.js";
import { fakeClient } from "./helpers.js";

const ToolResultSchema = z.object({
  isError: z.boolean().optional(),
  content: z.array(z.object({ type: z.literal("text"), text: z.string() })).min(1)
});

const ErrorBodySchema = z.object({ code: z.string(), message: z.string() });

describe("MCP server", () => {
  let client: Client;

  beforeEach(async () => {
    const server = createMcpServer(new WorkflowRunner({ client: fakeClient() }));
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    client = new Client({ name: "test-client", version: "0.0.1" }, { capabilities: {} });
    await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
  });

  afterEach(async () => {
    await client.close();
  });

  async function call(name: string, args: Record<string, unknown>) {
    const result = ToolResultSchema.parse(await client.callTool({ name, arguments: args }));
    const text = result.content[0]?.text ?? "";
    const body: unknown = result.isError && !text.startsWith("{") ? text : JSON.parse(text);
    return { isError: result.isError === true, body };
  }

  it("lists available tools", async () => {
    const tools = await client.listTools();

    expect(tools.tools.map((t) => t.name)).toEqual([
      "workflow.start",
      "workflow.status",
      "workflow.decide",
      "workflow.cancel",
      "workflow.list"
    ]);
  });

  it("starts, inspects and resumes a human-in-the-loop run", async () => {
    const started = await call("workflow.start", { topology: "human-in-the-loop", input: "Expense: flight $420" });
    const paused = RunSnapshotWireSchema.parse(started.body);
    expect(paused.status).toBe("PAUSED_AWAITING_INPUT");

    const status = RunSnapshotWireSchema.parse((await call("workflow.status", { runId: paused.run_id })).body);
    expect(status).toEqual(paused);

    const decided = await call("workflow.decide", {
      runId: paused.run_id,
      requestId: paused.pending_request?.id,
      verdict: "MORE_INFO"
    });
    const done = RunSnapshotWireSchema.parse(decided.body);
    expect(done.status).toBe("COMPLETED");
    expect(done.transcript[2]?.content).toBe("Human decision: MORE_INFO");
  });

  it("runs a round-robin brainstorm with the requested round count", async () => {
    const started = await call("workflow.start", { topology: "round-robin", input: "Launch brief", roundCount: 1 });
    const snapshot = RunSnapshotWireSchema.parse(started.body);

    expect(snapshot.status).toBe("COMPLETED");
    expect(snapshot.transcript.map((m) => m.round)).toEqual([undefined, 1, 1, 1, undefined]);
  });

  it("lists runs by status", async () => {
    await call("workflow.start", { topology: "sequential", input: "ticket" });

    const listed = z.object({ runs: z.array(RunSnapshotWireSchema) }).parse((await call("workflow.list", {})).body);

    expect(listed.runs).toHaveLength(1);
    expect(listed.runs[0]?.status).toBe("COMPLETED");
  });

  it("cancels a paused run", async () => {
    const paused = RunSnapshotWireSchema.parse(
      (await call("workflow.start", { topology: "human-in-the-loop", input: "Expense: $12" })).body
    );

    const cancelled = RunSnapshotWireSchema.parse((await call("workflow.cancel", { runId: paused.run_id })).body);

    expect(cancelled.error?.code).toBe("CANCELLED");
  });

  it("returns an error result for an unknown run", async () => {
    const result = await call("workflow.status", { runId: "missing" });

    expect(result.isError).toBe(true);
    expect(ErrorBodySchema.parse(result.body)).toEqual({ code: "RUN_NOT_FOUND", message: "Run missing not found" });
  });

  it("returns an error result for invalid arguments", async () => {
    const result = await call("workflow.decide", { runId: "r1", requestId: "q1", verdict: "MAYBE" });

    expect(result.isError).toBe(true);
    expect(ErrorBodySchema.parse(result.body).code).toBe("BAD_REQUEST");
  });

  it("returns an error result for an unknown tool", async () => {
    const result = await call("workflow.delete", {});

    expect(result).toEqual({ isError: true, body: "Unknown tool: workflow.delete" });
  });
});
