export type { RunStore } from "./types.js";
export type { RunRecord, RunSnapshotWire } from "./record.js";
export { RunRecordSchema, RunSnapshotWireSchema, toRecord, fromRecord, parseRecord, toWireSnapshot } from "./record.js";
export { InMemoryRunStore } from "./memoryStore.js";
export { SqliteRunStore, IN_MEMORY_DB } from "./sqliteStore.js";
