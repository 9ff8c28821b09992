import type { WorkflowRun } from "../orchestrator/run.js";
import type { RunStatus } from "../orchestrator/types.js";
import type { RunRecord } from "./record.js";

/**
 * Durable home of runs. Records are written whole; a store shared between
 * processes may refuse a save that would overwrite another writer's version.
 */
export interface RunStore {
  save(run: WorkflowRun): Promise<void>;
  /** Undefined for an unknown id */
  load(runId: string): Promise<WorkflowRun | undefined>;
  /** Newest first */
  list(status?: RunStatus): Promise<RunRecord[]>;
  close(): Promise<void>;
}
