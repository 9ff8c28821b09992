import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { createRequire } from "node:module";
import * as sqlJs from "sql.js";
import type { Database, SqlJsStatic } from "sql.js";
import { InvalidTransitionError, WorkflowError } from "../errors.js";
import { createLogger } from "../logger.js";
import type { WorkflowRun } from "../orchestrator/run.js";
import type { RunStatus } from "../orchestrator/types.js";
import { fromRecord, parseRecord, toRecord, type RunRecord } from "./record.js";
import type { RunStore } from "./types.js";

const log = createLogger("store");

export const IN_MEMORY_DB = ":memory:";

let sqlPromise: Promise<SqlJsStatic> | undefined;

/**
 * Finds sql-wasm.wasm: next to the running file (bundled dist/), under
 * node_modules of the cwd, then through module resolution.
 */
function locateSqlWasm(filename: string): string {
  const here = path.dirname(fileURLToPath(import.meta.url));
  const candidates = [
    path.join(here, filename),
    path.resolve(process.cwd(), "node_modules", "sql.js", "dist", filename)
  ];
  for (const candidate of candidates) {
    if (fs.existsSync(candidate)) return candidate;
  }

  for (const base of [import.meta.url, path.join(process.cwd(), "package.json")]) {
    try {
      const resolved = createRequire(base).resolve(`sql.js/dist/${filename}`);
      if (fs.existsSync(resolved)) return resolved;
    } catch (err) {
      log.debug({ base, err }, "sql.js wasm not resolvable");
    }
  }

  // sql.js reports the missing file itself
  return candidates[1] ?? filename;
}

function loadSqlJs(): Promise<SqlJsStatic> {
  sqlPromise ??= sqlJs.default({ locateFile: (filename: string) => locateSqlWasm(filename) }).catch((err: unknown) => {
    sqlPromise = undefined;
    throw new WorkflowError("STORE_FAILED", "Failed to initialize sql.js (missing or invalid wasm?)", {
      reason: err instanceof Error ? err.message : String(err)
    });
  });
  return sqlPromise;
}

function migrate(db: Database): void {
  db.run(`
    CREATE TABLE IF NOT EXISTS runs (
      run_id TEXT PRIMARY KEY,
      topology TEXT NOT NULL,
      status TEXT NOT NULL,
      record_json TEXT NOT NULL,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );
  `);
  db.run(`CREATE INDEX IF NOT EXISTS idx_runs_status ON runs(status);`);
  db.run(`CREATE INDEX IF NOT EXISTS idx_runs_created ON runs(created_at);`);
}

/**
 * sql.js (WASM SQLite) run store. The whole database lives in memory and is
 * written back to its file after every save; reads pick up a file another
 * process wrote since the last sync.
 *
 * Saves are optimistic: a run this store has read or written is only
 * overwritten while its row is still the version this store last saw, so a
 * second process resuming the same paused run loses instead of running the
 * post-gate agents again.
 */
export class SqliteRunStore implements RunStore {
  private readonly dbPath: string;
  private SQL: SqlJsStatic | undefined;
  private db: Database | undefined;
  private syncedMtimeMs = 0;
  /** record_json last read or written, per run id */
  private readonly versions = new Map<string, string>();

  constructor(dbPath: string) {
    this.dbPath = dbPath;
  }

  private get persistent(): boolean {
    return this.dbPath !== IN_MEMORY_DB;
  }

  async init(): Promise<void> {
    if (this.db) return;
    this.SQL = await loadSqlJs();
    const fresh = this.persistent && !fs.existsSync(this.dbPath);
    if (this.persistent) {
      fs.mkdirSync(path.dirname(this.dbPath), { recursive: true });
    }
    this.db = this.openFromDisk(this.SQL);
    migrate(this.db);
    if (fresh) {
      this.flush(this.db);
    }
    log.debug({ dbPath: this.dbPath }, "run store ready");
  }

  /**
   * @throws InvalidTransitionError when another process changed the run since this store last saw it
   */
  async save(run: WorkflowRun): Promise<void> {
    const db = await this.ready(true);
    const record = toRecord(run);
    const seen = this.versions.get(record.run_id);
    const current = this.readJson(db, record.run_id);
    if (seen !== undefined && current !== undefined && current !== seen) {
      throw new InvalidTransitionError(`Run ${record.run_id} was changed by another process`, { runId: record.run_id });
    }
    const json = JSON.stringify(record);
    db.run(
      `INSERT OR REPLACE INTO runs (run_id, topology, status, record_json, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?)`,
      [record.run_id, record.topology, record.status, json, record.created_at, record.updated_at]
    );
    this.flush(db);
    this.versions.set(record.run_id, json);
  }

  async load(runId: string): Promise<WorkflowRun | undefined> {
    const db = await this.ready();
    const json = this.readJson(db, runId);
    if (json === undefined) return undefined;
    const run = fromRecord(parseRecord(json));
    this.versions.set(runId, json);
    return run;
  }

  async list(status?: RunStatus): Promise<RunRecord[]> {
    const db = await this.ready();
    const stmt = status
      ? db.prepare(`SELECT record_json FROM runs WHERE status = ? ORDER BY created_at DESC`)
      : db.prepare(`SELECT record_json FROM runs ORDER BY created_at DESC`);
    const records: RunRecord[] = [];
    try {
      if (status) stmt.bind([status]);
      while (stmt.step()) {
        const json = stmt.getAsObject()["record_json"];
        if (typeof json === "string") {
          records.push(parseRecord(json));
        }
      }
    } finally {
      stmt.free();
    }
    return records;
  }

  async close(): Promise<void> {
    if (!this.db) return;
    // Every save already flushed
    this.db.close();
    this.db = undefined;
  }

  private readJson(db: Database, runId: string): string | undefined {
    const stmt = db.prepare(`SELECT record_json FROM runs WHERE run_id = ?`);
    try {
      stmt.bind([runId]);
      if (!stmt.step()) return undefined;
      const json = stmt.getAsObject()["record_json"];
      if (typeof json !== "string") {
        throw new WorkflowError("STORE_FAILED", `Run ${runId} has no record`, { runId });
      }
      return json;
    } finally {
      stmt.free();
    }
  }

  /**
   * The open database, reopened from the file when another process wrote it.
   * `reload` reopens regardless: file mtimes are too coarse to order two
   * writes that land close together.
   */
  private async ready(reload = false): Promise<Database> {
    await this.init();
    const { SQL, db } = this;
    if (!SQL || !db) {
      throw new WorkflowError("STORE_FAILED", "Run store is not initialized");
    }
    if (this.persistent && (reload || this.fileMtime() > this.syncedMtimeMs)) {
      db.close();
      const fresh = this.openFromDisk(SQL);
      migrate(fresh);
      this.db = fresh;
      return fresh;
    }
    return db;
  }

  private openFromDisk(SQL: SqlJsStatic): Database {
    if (this.persistent && fs.existsSync(this.dbPath)) {
      const db = new SQL.Database(fs.readFileSync(this.dbPath));
      this.syncedMtimeMs = this.fileMtime();
      return db;
    }
    return new SQL.Database();
  }

  private flush(db: Database): void {
    if (!this.persistent) return;
    try {
      fs.writeFileSync(this.dbPath, Buffer.from(db.export()));
    } catch (err) {
      throw new WorkflowError("STORE_FAILED", `Failed to write ${this.dbPath}`, {
        reason: err instanceof Error ? err.message : String(err)
      });
    }
    this.syncedMtimeMs = this.fileMtime();
  }

  private fileMtime(): number {
    try {
      return fs.statSync(this.dbPath).mtimeMs;
    } catch {
      return 0;
    }
  }
}
