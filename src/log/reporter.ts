import fs from "node:fs";
import path from "node:path";
import type { OutputFormat } from "../types/config.js";

export type LogLevel = "info" | "warn" | "error";

/** `code` is a short upper-case tag, e.g. STATUS, NOTE, ENVIRONMENT. */
export type LogEvent = {
  level: LogLevel;
  code: string;
  message: string;
  data?: Record<string, unknown>;
};

export type Reporter = (event: LogEvent) => void;

type Sink = { write(chunk: string): unknown };

export type ReporterOptions = {
  format: OutputFormat;
  /** Appended to once its directory exists. */
  logFile?: string;
  stdout?: Sink;
  stderr?: Sink;
};

export function formatHuman(event: LogEvent): string {
  return `[${event.code}] ${event.message}`;
}

export function formatJsonl(event: LogEvent): string {
  return JSON.stringify({ level: event.level, code: event.code, message: event.message, ...event.data });
}

export function createReporter(opts: ReporterOptions): Reporter {
  const stdout = opts.stdout ?? process.stdout;
  const stderr = opts.stderr ?? process.stderr;

  return (event) => {
    if (opts.format === "jsonl") {
      stdout.write(formatJsonl(event) + "\n");
    } else {
      (event.level === "info" ? stdout : stderr).write(formatHuman(event) + "\n");
    }

    if (opts.logFile && fs.existsSync(path.dirname(opts.logFile))) {
      const line = `${new Date().toISOString()} ${event.level.toUpperCase()} ${event.code} ${event.message}\n`;
      fs.appendFileSync(opts.logFile, line, "utf8");
    }
  };
}
