#!/usr/bin/env node
import "dotenv/config";
import path from "node:path";
import process from "node:process";
import { Command, CommanderError, Option } from "commander";
import chalk from "chalk";
import { loadConfig } from "./conductor/config.js";
import { toWorkflowError, type WorkflowErrorCode } from "./conductor/errors.js";
import { createLlmClient } from "./conductor/llm/index.js";
import { logger } from "./conductor/logger.js";
import { RUN_STATUSES, TOPOLOGIES, type RunEvent, type RunStatus, type WorkflowRunSnapshot } from "./conductor/orchestrator/types.js";
import { PRESETS } from "./conductor/presets.js";
import { WorkflowRunner, isTopology, type StartOptions } from "./conductor/runner.js";
import { SqliteRunStore } from "./conductor/store/sqliteStore.js";
import { toWireSnapshot } from "./conductor/store/record.js";
import { startHttpServer } from "./server/http.js";

/**
 * Exit codes for CLI commands.
 */
const EXIT_CODES = {
  OK: 0,            // Run completed
  USAGE: 2,         // Bad arguments or a request the run cannot take
  PAUSED: 10,       // Run is waiting for a human decision
  ERROR: 30,        // Run failed
  CANCELLED: 40     // Run cancelled
} as const;

const USAGE_CODES: readonly WorkflowErrorCode[] = [
  "BAD_REQUEST",
  "INVALID_CONFIGURATION",
  "INVALID_TRANSITION",
  "RUN_NOT_FOUND"
];

type RunnerHandle = {
  runner: WorkflowRunner;
  port: number;
};

async function openRunner(onEvent?: (event: RunEvent) => void): Promise<RunnerHandle> {
  const config = loadConfig();
  const store = new SqliteRunStore(path.resolve(config.dbPath));
  await store.init();
  const runner = new WorkflowRunner({
    client: createLlmClient(config.llm),
    store,
    defaults: config.runs,
    ...(onEvent !== undefined && { onEvent })
  });
  return { runner, port: config.port };
}

function exitCodeFor(snapshot: WorkflowRunSnapshot): number {
  switch (snapshot.status) {
    case "COMPLETED":
    case "RUNNING":
      return EXIT_CODES.OK;
    case "PAUSED_AWAITING_INPUT":
      return EXIT_CODES.PAUSED;
    case "FAILED":
      return snapshot.error?.code === "CANCELLED" ? EXIT_CODES.CANCELLED : EXIT_CODES.ERROR;
  }
}

const STATUS_COLORS: Record<RunStatus, (text: string) => string> = {
  RUNNING: chalk.blue,
  PAUSED_AWAITING_INPUT: chalk.magenta,
  COMPLETED: chalk.green,
  FAILED: chalk.red
};

function writeSnapshot(snapshot: WorkflowRunSnapshot, json: boolean): void {
  if (json) {
    process.stdout.write(JSON.stringify(toWireSnapshot(snapshot), null, 2) + "\n");
    return;
  }
  const color = STATUS_COLORS[snapshot.status];
  process.stderr.write(color(`${snapshot.status}`) + chalk.dim(`  ${snapshot.topology}  ${snapshot.id}\n`));
  for (const message of snapshot.transcript) {
    const round = message.round !== undefined ? chalk.dim(` (round ${message.round})`) : "";
    process.stdout.write(chalk.bold(`[${message.index}] ${message.author}`) + round + "\n");
    process.stdout.write(`${message.content}\n\n`);
  }
  if (snapshot.pendingRequest) {
    const request = snapshot.pendingRequest;
    process.stderr.write(chalk.magenta(`⏸ ${request.prompt}\n`));
    process.stderr.write(chalk.dim(`  Request: ${request.id}\n`));
    process.stderr.write(chalk.dim(`  Options: ${request.options.join(", ")}\n`));
    process.stderr.write(chalk.dim(`  Decide:  conductor decide ${snapshot.id} ${request.id} <verdict>\n`));
  }
  if (snapshot.error) {
    process.stderr.write(chalk.red(`✗ [${snapshot.error.code}] ${snapshot.error.message}\n`));
  }
}

function writeProgress(event: RunEvent): void {
  switch (event.type) {
    case "turn_started":
      process.stderr.write(
        chalk.dim(`→ ${event.agent}${event.round !== undefined ? ` (round ${event.round})` : ""}\n`)
      );
      break;
    case "turn_completed":
      process.stderr.write(chalk.green(`✓ ${event.agent}`) + chalk.dim(` ${event.durationMs}ms\n`));
      break;
    default:
      break;
  }
}

function fail(err: unknown): never {
  const workflowErr = toWorkflowError(err);
  process.stderr.write(chalk.red(`Error: [${workflowErr.code}] ${workflowErr.message}\n`));
  logger.debug({ err }, "command failed");
  process.exit(USAGE_CODES.includes(workflowErr.code) ? EXIT_CODES.USAGE : EXIT_CODES.ERROR);
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new CommanderError(EXIT_CODES.USAGE, "conductor.invalidNumber", `Not an integer: ${value}`);
  }
  return parsed;
}

const program = new Command();

program
  .name("conductor")
  .description("Run multi-agent workflows: sequential, human-in-the-loop and round-robin")
  .version("0.1.0")
  .exitOverride((err) => {
    process.exit(err.exitCode === 0 ? EXIT_CODES.OK : EXIT_CODES.USAGE);
  });

program
  .command("run")
  .description("Start a workflow run and drive it until it completes or pauses")
  .addArgument(program.createArgument("<topology>", "Topology").choices(TOPOLOGIES))
  .argument("<input>", "Initial input (ticket, expense report, launch brief)")
  .option("--rounds <n>", "Discussion rounds (round-robin)", parseInteger)
  .option("--timeout <ms>", "Per agent call timeout in ms", parseInteger)
  .addOption(new Option("--retries <n>", "Retries of a transient agent failure").choices(["0", "1"]))
  .option("--json", "Print the run as JSON", false)
  .action(async (topology: string, input: string, opts: { rounds?: number; timeout?: number; retries?: string; json: boolean }) => {
    if (!isTopology(topology)) {
      fail(new CommanderError(EXIT_CODES.USAGE, "conductor.topology", `Unknown topology ${topology}`));
    }
    let activeRunId: string | undefined;
    let cancelling = false;
    try {
      const { runner } = await openRunner((event) => {
        if (event.type === "run_started") activeRunId = event.runId;
        if (!opts.json) writeProgress(event);
      });

      const handleSignal = (signal: string): void => {
        if (cancelling) {
          process.stderr.write(chalk.red(`\nForced exit on second ${signal}\n`));
          process.exit(EXIT_CODES.CANCELLED);
        }
        cancelling = true;
        process.stderr.write(chalk.yellow(`\nReceived ${signal}, cancelling...\n`));
        if (activeRunId) {
          runner.cancel(activeRunId).catch((err: unknown) => {
            logger.warn({ err }, "cancel failed");
          });
        }
      };
      process.on("SIGINT", () => handleSignal("SIGINT"));
      process.on("SIGTERM", () => handleSignal("SIGTERM"));

      const options: StartOptions = {};
      if (opts.rounds !== undefined) options.roundCount = opts.rounds;
      if (opts.timeout !== undefined) options.timeoutMs = opts.timeout;
      if (opts.retries !== undefined) options.maxRetries = Number(opts.retries);

      const runId = await runner.start(topology, input, options);
      const snapshot = await runner.getStatus(runId);
      await runner.close();
      writeSnapshot(snapshot, opts.json);
      process.exit(exitCodeFor(snapshot));
    } catch (err) {
      fail(err);
    }
  });

program
  .command("status")
  .description("Show a run and its transcript")
  .argument("<runId>", "Run id")
  .option("--json", "Print the run as JSON", false)
  .action(async (runId: string, opts: { json: boolean }) => {
    try {
      const { runner } = await openRunner();
      const snapshot = await runner.getStatus(runId);
      writeSnapshot(snapshot, opts.json);
      process.exit(exitCodeFor(snapshot));
    } catch (err) {
      fail(err);
    }
  });

program
  .command("decide")
  .description("Answer the pending request of a paused run and resume it")
  .argument("<runId>", "Run id")
  .argument("<requestId>", "Pending request id")
  .argument("<verdict>", "APPROVE, REJECT or MORE_INFO")
  .option("--note <text>", "Note attached to the decision")
  .option("--json", "Print the run as JSON", false)
  .action(async (runId: string, requestId: string, verdict: string, opts: { note?: string; json: boolean }) => {
    try {
      const { runner } = await openRunner((event) => {
        if (!opts.json) writeProgress(event);
      });
      const snapshot = await runner.submitDecision(runId, requestId, verdict.toUpperCase(), opts.note);
      await runner.close();
      writeSnapshot(snapshot, opts.json);
      process.exit(exitCodeFor(snapshot));
    } catch (err) {
      fail(err);
    }
  });

program
  .command("cancel")
  .description("Cancel a paused run")
  .argument("<runId>", "Run id")
  .option("--json", "Print the run as JSON", false)
  .action(async (runId: string, opts: { json: boolean }) => {
    try {
      const { runner } = await openRunner();
      const snapshot = await runner.cancel(runId);
      await runner.close();
      writeSnapshot(snapshot, opts.json);
      process.exit(exitCodeFor(snapshot));
    } catch (err) {
      fail(err);
    }
  });

program
  .command("list")
  .description("List runs, newest first")
  .addOption(new Option("--status <status>", "Only runs in this status").choices(RUN_STATUSES))
  .option("--json", "Print the runs as JSON", false)
  .action(async (opts: { status?: RunStatus; json: boolean }) => {
    try {
      const { runner } = await openRunner();
      const runs = await runner.list(opts.status);
      if (opts.json) {
        process.stdout.write(JSON.stringify(runs.map(toWireSnapshot), null, 2) + "\n");
        return;
      }
      if (runs.length === 0) {
        process.stderr.write(chalk.dim("No runs\n"));
        return;
      }
      for (const run of runs) {
        const color = STATUS_COLORS[run.status];
        process.stdout.write(`${run.id}  ${color(run.status.padEnd(22))} ${run.topology.padEnd(18)} ${run.updatedAt}\n`);
      }
    } catch (err) {
      fail(err);
    }
  });

program
  .command("presets")
  .description("Show the built-in agent rosters")
  .action(() => {
    for (const preset of PRESETS) {
      process.stdout.write(`${chalk.bold(preset.name.padEnd(18))} ${preset.topology.padEnd(18)} ${preset.description}\n`);
    }
  });

program
  .command("serve")
  .description("Run the HTTP API")
  .option("--port <port>", "Port (defaults to CONDUCTOR_PORT or 8765)", parseInteger)
  .action(async (opts: { port?: number }) => {
    try {
      const { runner, port } = await openRunner();
      startHttpServer({ runner, port: opts.port ?? port });
    } catch (err) {
      fail(err);
    }
  });

await program.parseAsync(process.argv);
