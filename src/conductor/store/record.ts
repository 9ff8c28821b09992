/**
 * Persisted (and wire) shape of a run. snake_case, JSON-safe, validated with
 * zod on the way back in.
 */

import { z } from "zod";
import { ConversationState, type Message } from "../conversation.js";
import { WORKFLOW_ERROR_CODES, WorkflowError } from "../errors.js";
import { WorkflowRun } from "../orchestrator/run.js";
import {
  RUN_STATUSES,
  TOPOLOGIES,
  VERDICTS,
  type AgentSpec,
  type PendingRequest,
  type TopologyConfig,
  type WorkflowRunSnapshot
} from "../orchestrator/types.js";

const AgentRecordSchema = z.object({
  name: z.string().min(1),
  role: z.string(),
  instructions: z.string()
});

const MessageRecordSchema = z.object({
  author: z.string(),
  role: z.enum(["user", "agent", "human"]),
  content: z.string(),
  index: z.number().int().min(0),
  round: z.number().int().min(1).optional()
});

const PendingRequestRecordSchema = z.object({
  id: z.string().min(1),
  step: z.string(),
  prompt: z.string(),
  options: z.array(z.enum(VERDICTS)),
  summary: z.string().optional(),
  created_at: z.string()
});

const ConfigRecordSchema = z.discriminatedUnion("topology", [
  z.object({
    topology: z.literal("sequential"),
    agents: z.array(AgentRecordSchema).min(1)
  }),
  z.object({
    topology: z.literal("human-in-the-loop"),
    pre_gate: z.array(AgentRecordSchema).min(1),
    post_gate: z.array(AgentRecordSchema).min(1),
    gate_prompt: z.string(),
    gate_step: z.string()
  }),
  z.object({
    topology: z.literal("round-robin"),
    agents: z.array(AgentRecordSchema).min(1),
    round_count: z.number().int().min(1),
    synthesizer: AgentRecordSchema
  })
]);

const PolicyRecordSchema = z.object({
  step_timeout_ms: z.number().int().min(0),
  max_retries: z.number().int().min(0).max(1)
});

export const RunSnapshotWireSchema = z.object({
  run_id: z.string().min(1),
  topology: z.enum(TOPOLOGIES),
  status: z.enum(RUN_STATUSES),
  transcript: z.array(MessageRecordSchema),
  pending_request: PendingRequestRecordSchema.optional(),
  error: z.object({ code: z.enum(WORKFLOW_ERROR_CODES), message: z.string() }).optional(),
  created_at: z.string(),
  updated_at: z.string()
});

export const RunRecordSchema = RunSnapshotWireSchema.extend({
  config: ConfigRecordSchema,
  policy: PolicyRecordSchema
});

export type RunSnapshotWire = z.infer<typeof RunSnapshotWireSchema>;
export type RunRecord = z.infer<typeof RunRecordSchema>;
type MessageRecord = z.infer<typeof MessageRecordSchema>;
type PendingRequestRecord = z.infer<typeof PendingRequestRecordSchema>;
type ConfigRecord = z.infer<typeof ConfigRecordSchema>;
type AgentRecord = z.infer<typeof AgentRecordSchema>;

function agentToRecord(agent: AgentSpec): AgentRecord {
  return { name: agent.name, role: agent.role, instructions: agent.instructions };
}

function configToRecord(config: TopologyConfig): ConfigRecord {
  switch (config.topology) {
    case "sequential":
      return { topology: "sequential", agents: config.agents.map(agentToRecord) };
    case "human-in-the-loop":
      return {
        topology: "human-in-the-loop",
        pre_gate: config.preGate.map(agentToRecord),
        post_gate: config.postGate.map(agentToRecord),
        gate_prompt: config.gatePrompt,
        gate_step: config.gateStep
      };
    case "round-robin":
      return {
        topology: "round-robin",
        agents: config.agents.map(agentToRecord),
        round_count: config.roundCount,
        synthesizer: agentToRecord(config.synthesizer)
      };
  }
}

function configFromRecord(record: ConfigRecord): TopologyConfig {
  switch (record.topology) {
    case "sequential":
      return { topology: "sequential", agents: record.agents };
    case "human-in-the-loop":
      return {
        topology: "human-in-the-loop",
        preGate: record.pre_gate,
        postGate: record.post_gate,
        gatePrompt: record.gate_prompt,
        gateStep: record.gate_step
      };
    case "round-robin":
      return {
        topology: "round-robin",
        agents: record.agents,
        roundCount: record.round_count,
        synthesizer: record.synthesizer
      };
  }
}

function messageToRecord(message: Message): MessageRecord {
  return {
    author: message.author,
    role: message.role,
    content: message.content,
    index: message.index,
    ...(message.round !== undefined && { round: message.round })
  };
}

function messageFromRecord(record: MessageRecord): Message {
  return {
    index: record.index,
    author: record.author,
    role: record.role,
    content: record.content,
    ...(record.round !== undefined && { round: record.round })
  };
}

function pendingFromRecord(record: PendingRequestRecord): PendingRequest {
  const request: PendingRequest = {
    id: record.id,
    step: record.step,
    prompt: record.prompt,
    options: record.options,
    createdAt: record.created_at
  };
  if (record.summary !== undefined) {
    request.summary = record.summary;
  }
  return request;
}

/**
 * Wire shape of a snapshot, as returned by the HTTP and MCP surfaces.
 */
export function toWireSnapshot(snapshot: WorkflowRunSnapshot): RunSnapshotWire {
  const wire: RunSnapshotWire = {
    run_id: snapshot.id,
    topology: snapshot.topology,
    status: snapshot.status,
    transcript: snapshot.transcript.map(messageToRecord),
    created_at: snapshot.createdAt,
    updated_at: snapshot.updatedAt
  };
  const pending = snapshot.pendingRequest;
  if (pending) {
    wire.pending_request = {
      id: pending.id,
      step: pending.step,
      prompt: pending.prompt,
      options: [...pending.options],
      ...(pending.summary !== undefined && { summary: pending.summary }),
      created_at: pending.createdAt
    };
  }
  if (snapshot.error) {
    wire.error = { code: snapshot.error.code, message: snapshot.error.message };
  }
  return wire;
}

export function toRecord(run: WorkflowRun): RunRecord {
  return {
    ...toWireSnapshot(run.toSnapshot()),
    config: configToRecord(run.config),
    policy: { step_timeout_ms: run.policy.stepTimeoutMs, max_retries: run.policy.maxRetries }
  };
}

/**
 * Rebuild a live run from its record.
 * @throws WorkflowError STORE_FAILED when the record is inconsistent
 */
export function fromRecord(record: RunRecord): WorkflowRun {
  if (record.config.topology !== record.topology) {
    throw new WorkflowError("STORE_FAILED", `Run ${record.run_id} has a ${record.config.topology} config`, {
      runId: record.run_id
    });
  }
  return new WorkflowRun({
    id: record.run_id,
    config: configFromRecord(record.config),
    policy: { stepTimeoutMs: record.policy.step_timeout_ms, maxRetries: record.policy.max_retries },
    status: record.status,
    conversation: ConversationState.from(record.transcript.map(messageFromRecord)),
    ...(record.pending_request && { pendingRequest: pendingFromRecord(record.pending_request) }),
    ...(record.error && { error: { code: record.error.code, message: record.error.message } }),
    createdAt: record.created_at,
    updatedAt: record.updated_at
  });
}

/**
 * Parse a stored JSON document.
 * @throws WorkflowError STORE_FAILED on malformed JSON or a record that fails validation
 */
export function parseRecord(json: string): RunRecord {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err) {
    throw new WorkflowError("STORE_FAILED", "Stored run record is not valid JSON", {
      reason: err instanceof Error ? err.message : String(err)
    });
  }
  const parsed = RunRecordSchema.safeParse(raw);
  if (!parsed.success) {
    throw new WorkflowError("STORE_FAILED", "Stored run record failed validation", {
      issues: parsed.error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message }))
    });
  }
  return parsed.data;
}
