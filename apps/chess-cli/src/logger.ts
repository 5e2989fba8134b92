import { LogLevel } from "./config";

export type Logger = {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
};

type Sink = (line: string, ...details: unknown[]) => void;

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

// stdout carries the board transcript, so every level goes to stderr.
const consoleSink: Sink = (line, ...details) => console.error(line, ...details);

export function createLogger(tag: string, level: LogLevel, sink: Sink = consoleSink): Logger {
  const emit =
    (messageLevel: Exclude<LogLevel, "silent">) =>
    (message: string, ...details: unknown[]) => {
      if (SEVERITY[messageLevel] < SEVERITY[level]) {
        return;
      }
      sink(`[${tag}] ${message}`, ...details);
    };

  return {
    debug: emit("debug"),
    info: emit("info"),
    warn: emit("warn"),
    error: emit("error")
  };
}
