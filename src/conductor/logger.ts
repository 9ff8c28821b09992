import { destination, pino, type Logger, type LoggerOptions } from "pino";

const defaultLevel = process.env["NODE_ENV"] === "test" ? "silent" : "info";

const options: LoggerOptions = {
  level: process.env["CONDUCTOR_LOG_LEVEL"] ?? defaultLevel,
  base: {
    pid: undefined,
    hostname: undefined
  }
};

// stderr only: stdout carries CLI results and MCP framing
export const logger: Logger = pino(options, destination(2));

export function createLogger(module: string): Logger {
  return logger.child({ module });
}

export type { Logger };
