import type { WorkflowRun } from "../orchestrator/run.js";
import type { RunStatus } from "../orchestrator/types.js";
import { fromRecord, toRecord, type RunRecord } from "./record.js";
import type { RunStore } from "./types.js";

/**
 * Keeps records (not live objects) so a load never aliases the run being driven.
 */
export class InMemoryRunStore implements RunStore {
  private readonly records = new Map<string, RunRecord>();

  async save(run: WorkflowRun): Promise<void> {
    this.records.set(run.id, toRecord(run));
  }

  async load(runId: string): Promise<WorkflowRun | undefined> {
    const record = this.records.get(runId);
    return record ? fromRecord(record) : undefined;
  }

  async list(status?: RunStatus): Promise<RunRecord[]> {
    const all = Array.from(this.records.values());
    const filtered = status ? all.filter((record) => record.status === status) : all;
    return filtered.sort((a, b) => b.created_at.localeCompare(a.created_at));
  }

  async close(): Promise<void> {
    this.records.clear();
  }
}
