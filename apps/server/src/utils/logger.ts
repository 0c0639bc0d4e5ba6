import pino, { type Logger } from "pino";

export type { Logger } from "pino";

// stderr: stdout carries extracted records.
export function createLogger(level: string): Logger {
  return pino({ level, base: { service: "takeout-threads" } }, pino.destination(2));
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
