import pino, { type Logger } from "pino";
import { LogLevel } from "../../config/env.js";

export type { Logger };

/**
 * Logs go to stderr: stdout carries the MCP stdio transport frames.
 */
export function createLogger(level: LogLevel, name = "hierarchical-doc-index"): Logger {
  return pino(
    {
      name,
      level,
      base: { pid: process.pid },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination(2),
  );
}

export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
