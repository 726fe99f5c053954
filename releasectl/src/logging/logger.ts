import type { Writable } from "node:stream";

export type LogLevel = "info" | "warn" | "error";

export type LogFields = {
  code?: string;
  details?: Record<string, unknown>;
};

/** Diagnostic line, as emitted with `--format jsonl`. */
export type Diagnostic = {
  level: LogLevel;
  code: string;
  message: string;
  details?: Record<string, unknown>;
};

/**
 * Leveled logger used by the pipelines. How lines are presented is decided
 * by whoever constructs it.
 */
export interface Logger {
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

export type OutputFormat = "human" | "jsonl";

const LEVEL_LABEL: Record<LogLevel, string> = {
  info: "INFO ",
  warn: "WARN ",
  error: "ERROR",
};

/** `YYYY-MM-DD HH:MM:SS` in local time. */
export function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function createHumanLogger(stream: Writable, clock: () => Date = () => new Date()): Logger {
  const write = (level: LogLevel, message: string) => {
    stream.write(`[${formatTimestamp(clock())}] ${LEVEL_LABEL[level]} ${message}\n`);
  };
  return {
    info: (message) => write("info", message),
    warn: (message) => write("warn", message),
    error: (message) => write("error", message),
  };
}

export function createJsonlLogger(stream: Writable): Logger {
  const write = (level: LogLevel, message: string, fields?: LogFields) => {
    const line: Diagnostic = { level, code: fields?.code ?? level.toUpperCase(), message };
    if (fields?.details) line.details = fields.details;
    stream.write(JSON.stringify(line) + "\n");
  };
  return {
    info: (message, fields) => write("info", message, fields),
    warn: (message, fields) => write("warn", message, fields),
    error: (message, fields) => write("error", message, fields),
  };
}

export function createLogger(format: OutputFormat, stream: Writable): Logger {
  return format === "jsonl" ? createJsonlLogger(stream) : createHumanLogger(stream);
}
