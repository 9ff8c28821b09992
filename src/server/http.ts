import { Hono, type Context } from "hono";
import { serve } from "@hono/node-server";
import { z } from "zod";
import { toWorkflowError, WorkflowError, type WorkflowErrorCode } from "../conductor/errors.js";
import { createLogger } from "../conductor/logger.js";
import { RUN_STATUSES, TOPOLOGIES, VERDICTS, type AgentSpec } from "../conductor/orchestrator/types.js";
import type { StartOptions, WorkflowRunner } from "../conductor/runner.js";
import { toWireSnapshot } from "../conductor/store/record.js";

const log = createLogger("http");

const AgentSchema = z.object({
  name: z.string().trim().min(1),
  role: z.string().default(""),
  instructions: z.string()
});

const StartRunSchema = z.object({
  topology: z.enum(TOPOLOGIES),
  input: z.string().trim().min(1),
  agents: z.array(AgentSchema).optional(),
  preGate: z.array(AgentSchema).optional(),
  postGate: z.array(AgentSchema).optional(),
  gatePrompt: z.string().optional(),
  roundCount: z.number().int().optional(),
  synthesizer: AgentSchema.optional(),
  synthesisInstructions: z.string().optional(),
  timeoutMs: z.number().int().positive().optional(),
  maxRetries: z.number().int().min(0).max(1).optional(),
  detach: z.boolean().optional()
});

const DecisionSchema = z.object({
  requestId: z.string().min(1),
  verdict: z.enum(VERDICTS),
  note: z.string().optional()
});

const ListQuerySchema = z.object({
  status: z.enum(RUN_STATUSES).optional()
});

type ErrorStatus = 400 | 404 | 409 | 500;

export function httpStatusFor(code: WorkflowErrorCode): ErrorStatus {
  switch (code) {
    case "BAD_REQUEST":
    case "INVALID_CONFIGURATION":
      return 400;
    case "RUN_NOT_FOUND":
      return 404;
    case "INVALID_TRANSITION":
      return 409;
    default:
      return 500;
  }
}

function toStartOptions(input: z.infer<typeof StartRunSchema>): StartOptions {
  const options: StartOptions = {};
  const agents = (list: Array<z.infer<typeof AgentSchema>>): AgentSpec[] =>
    list.map((agent) => ({ name: agent.name, role: agent.role, instructions: agent.instructions }));

  if (input.agents !== undefined) options.agents = agents(input.agents);
  if (input.preGate !== undefined) options.preGate = agents(input.preGate);
  if (input.postGate !== undefined) options.postGate = agents(input.postGate);
  if (input.gatePrompt !== undefined) options.gatePrompt = input.gatePrompt;
  if (input.roundCount !== undefined) options.roundCount = input.roundCount;
  if (input.synthesizer !== undefined) options.synthesizer = input.synthesizer;
  if (input.synthesisInstructions !== undefined) options.synthesisInstructions = input.synthesisInstructions;
  if (input.timeoutMs !== undefined) options.timeoutMs = input.timeoutMs;
  if (input.maxRetries !== undefined) options.maxRetries = input.maxRetries;
  if (input.detach !== undefined) options.detach = input.detach;
  return options;
}

async function readJson(c: Context): Promise<unknown> {
  try {
    return await c.req.json();
  } catch {
    throw new WorkflowError("BAD_REQUEST", "Invalid JSON body");
  }
}

/**
 * Build the HTTP app around a runner. Kept separate from `startHttpServer`
 * so it can be exercised through `app.request`.
 */
export function createHttpApp(runner: WorkflowRunner): Hono {
  const app = new Hono();

  app.onError((err, c) => {
    const workflowErr = toWorkflowError(err);
    const status = httpStatusFor(workflowErr.code);
    if (status === 500) {
      log.error({ err, path: c.req.path }, "request failed");
    }
    return c.json(workflowErr.toJSON(), status);
  });

  app.get("/health", async (c) => {
    const stats = await runner.stats();
    return c.json({ ok: true, llm: runner.llmInfo(), runs: stats });
  });

  app.post("/runs", async (c) => {
    const input = StartRunSchema.parse(await readJson(c));
    const runId = await runner.start(input.topology, input.input, toStartOptions(input));
    const snapshot = await runner.getStatus(runId);
    return c.json(toWireSnapshot(snapshot), 201);
  });

  app.get("/runs", async (c) => {
    const query = ListQuerySchema.parse({ status: c.req.query("status") });
    const runs = await runner.list(query.status);
    return c.json({ runs: runs.map(toWireSnapshot) });
  });

  app.get("/runs/:id", async (c) => {
    const snapshot = await runner.getStatus(c.req.param("id"));
    return c.json(toWireSnapshot(snapshot));
  });

  app.post("/runs/:id/decision", async (c) => {
    const input = DecisionSchema.parse(await readJson(c));
    const snapshot = await runner.submitDecision(c.req.param("id"), input.requestId, input.verdict, input.note);
    return c.json(toWireSnapshot(snapshot));
  });

  app.post("/runs/:id/cancel", async (c) => {
    const snapshot = await runner.cancel(c.req.param("id"));
    return c.json(toWireSnapshot(snapshot));
  });

  return app;
}

export type HttpServerConfig = {
  runner: WorkflowRunner;
  port: number;
};

export function startHttpServer(options: HttpServerConfig): ReturnType<typeof serve> {
  const app = createHttpApp(options.runner);
  const server = serve({ fetch: app.fetch, port: options.port });
  log.info({ port: options.port }, `HTTP server listening on http://localhost:${options.port}`);
  return server;
}
