import { z } from "zod";
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { CallToolRequestSchema, ListToolsRequestSchema, type Tool } from "@modelcontextprotocol/sdk/types.js";
import { toWorkflowError, type WorkflowError } from "../conductor/errors.js";
import { createLogger } from "../conductor/logger.js";
import { RUN_STATUSES, TOPOLOGIES, VERDICTS } from "../conductor/orchestrator/types.js";
import type { StartOptions, WorkflowRunner } from "../conductor/runner.js";
import { toWireSnapshot } from "../conductor/store/record.js";

const log = createLogger("mcp");

type ToolResult = { isError?: true; content: Array<{ type: "text"; text: string }> };

const StartSchema = z.object({
  topology: z.enum(TOPOLOGIES),
  input: z.string().trim().min(1),
  roundCount: z.number().int().optional(),
  detach: z.boolean().optional()
});

const RunIdSchema = z.object({
  runId: z.string().min(1)
});

const DecideSchema = z.object({
  runId: z.string().min(1),
  requestId: z.string().min(1),
  verdict: z.enum(VERDICTS),
  note: z.string().optional()
});

const ListSchema = z.object({
  status: z.enum(RUN_STATUSES).optional()
});

function toErrorResponse(err: WorkflowError): ToolResult {
  return {
    isError: true,
    content: [{ type: "text", text: JSON.stringify(err.toJSON(), null, 2) }]
  };
}

function toTextResponse(value: unknown): ToolResult {
  return { content: [{ type: "text", text: JSON.stringify(value, null, 2) }] };
}

export const TOOLS: Tool[] = [
  {
    name: "workflow.start",
    description: "Start a workflow run (sequential, human-in-the-loop or round-robin) on the built-in agents",
    inputSchema: {
      type: "object",
      properties: {
        topology: { type: "string", enum: [...TOPOLOGIES] },
        input: { type: "string" },
        roundCount: { type: "number" },
        detach: { type: "boolean" }
      },
      required: ["topology", "input"],
      additionalProperties: false
    }
  },
  {
    name: "workflow.status",
    description: "Get the status, transcript and pending request of a run",
    inputSchema: {
      type: "object",
      properties: { runId: { type: "string" } },
      required: ["runId"],
      additionalProperties: false
    }
  },
  {
    name: "workflow.decide",
    description: "Submit the human decision for a paused run and resume it",
    inputSchema: {
      type: "object",
      properties: {
        runId: { type: "string" },
        requestId: { type: "string" },
        verdict: { type: "string", enum: [...VERDICTS] },
        note: { type: "string" }
      },
      required: ["runId", "requestId", "verdict"],
      additionalProperties: false
    }
  },
  {
    name: "workflow.cancel",
    description: "Cancel a run that has not finished",
    inputSchema: {
      type: "object",
      properties: { runId: { type: "string" } },
      required: ["runId"],
      additionalProperties: false
    }
  },
  {
    name: "workflow.list",
    description: "List runs, newest first",
    inputSchema: {
      type: "object",
      properties: { status: { type: "string", enum: [...RUN_STATUSES] } },
      additionalProperties: false
    }
  }
];

async function callTool(runner: WorkflowRunner, name: string, args: unknown): Promise<ToolResult> {
  switch (name) {
    case "workflow.start": {
      const input = StartSchema.parse(args);
      const options: StartOptions = {};
      if (input.roundCount !== undefined) options.roundCount = input.roundCount;
      if (input.detach !== undefined) options.detach = input.detach;
      const runId = await runner.start(input.topology, input.input, options);
      return toTextResponse(toWireSnapshot(await runner.getStatus(runId)));
    }
    case "workflow.status": {
      const input = RunIdSchema.parse(args);
      return toTextResponse(toWireSnapshot(await runner.getStatus(input.runId)));
    }
    case "workflow.decide": {
      const input = DecideSchema.parse(args);
      const snapshot = await runner.submitDecision(input.runId, input.requestId, input.verdict, input.note);
      return toTextResponse(toWireSnapshot(snapshot));
    }
    case "workflow.cancel": {
      const input = RunIdSchema.parse(args);
      return toTextResponse(toWireSnapshot(await runner.cancel(input.runId)));
    }
    case "workflow.list": {
      const input = ListSchema.parse(args);
      const runs = await runner.list(input.status);
      return toTextResponse({ runs: runs.map(toWireSnapshot) });
    }
    default:
      return { isError: true, content: [{ type: "text", text: `Unknown tool: ${name}` }] };
  }
}

/**
 * MCP server exposing the runner as tools. Transport-agnostic; the stdio
 * entry point and the tests connect their own transport.
 */
export function createMcpServer(runner: WorkflowRunner): Server {
  const server = new Server(
    { name: "agent-conductor", version: "0.1.0" },
    { capabilities: { tools: {} } }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOLS }));

  server.setRequestHandler(CallToolRequestSchema, async (req) => {
    const { name, arguments: args } = req.params;
    try {
      return await callTool(runner, name, args ?? {});
    } catch (err) {
      const workflowErr = toWorkflowError(err);
      log.warn({ tool: name, code: workflowErr.code, reason: workflowErr.message }, "tool call failed");
      return toErrorResponse(workflowErr);
    }
  });

  return server;
}
