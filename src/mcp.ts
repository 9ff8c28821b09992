#!/usr/bin/env node
import "dotenv/config";
import path from "node:path";
import process from "node:process";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig } from "./conductor/config.js";
import { createLlmClient } from "./conductor/llm/index.js";
import { createLogger } from "./conductor/logger.js";
import { WorkflowRunner } from "./conductor/runner.js";
import { SqliteRunStore } from "./conductor/store/sqliteStore.js";
import { createMcpServer } from "./mcp/server.js";

// stdout carries JSON-RPC framing; the logger writes to stderr
const log = createLogger("mcp");

process.on("uncaughtException", (err) => {
  log.error({ err }, "uncaught exception (server continues)");
});

process.on("unhandledRejection", (reason) => {
  log.error({ err: reason }, "unhandled rejection (server continues)");
});

async function main(): Promise<void> {
  const config = loadConfig();
  const store = new SqliteRunStore(path.resolve(config.dbPath));
  await store.init();
  const runner = new WorkflowRunner({
    client: createLlmClient(config.llm),
    store,
    defaults: config.runs
  });
  log.info({ dbPath: config.dbPath }, "starting MCP server");

  const server = createMcpServer(runner);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  log.info("transport connected, server running");

  await new Promise<void>((resolve) => {
    process.stdin.on("close", resolve);
    process.stdin.on("end", resolve);
  });
  await runner.close();
  log.info("stdin closed, shutting down");
}

main().catch((err: unknown) => {
  log.fatal({ err }, "fatal startup error");
  process.exit(1);
});
