import fs from "node:fs";
import path from "node:path";
import { redactSensitiveInfo, sanitizeLogMessage } from "./sanitize.js";

export type LogLevel = "info" | "warn" | "error";

export type OutputFormat = "human" | "jsonl";

export interface Logger {
  info(message: string, project?: string): void;
  warn(message: string, project?: string): void;
  error(message: string, project?: string): void;
}

export type ConsoleSink = {
  out: (line: string) => void;
  err: (line: string) => void;
};

const PROCESS_SINK: ConsoleSink = {
  out: (line) => process.stdout.write(line + "\n"),
  err: (line) => process.stderr.write(line + "\n"),
};

/**
 * Run logger: every message goes to the log file as a timestamped line and
 * to the terminal, so each outcome is reported twice with the same text.
 */
export class RunLogger implements Logger {
  private readonly logFile: string | null;
  private readonly format: OutputFormat;
  private readonly sink: ConsoleSink;

  constructor(opts: { logFile: string | null; format?: OutputFormat; sink?: ConsoleSink }) {
    this.logFile = opts.logFile;
    this.format = opts.format ?? "human";
    this.sink = opts.sink ?? PROCESS_SINK;
    if (this.logFile) fs.mkdirSync(path.dirname(this.logFile), { recursive: true });
  }

  info(message: string, project?: string): void {
    this.write("info", message, project);
  }

  warn(message: string, project?: string): void {
    this.write("warn", message, project);
  }

  error(message: string, project?: string): void {
    this.write("error", message, project);
  }

  private write(level: LogLevel, message: string, project?: string): void {
    const msg = sanitizeLogMessage(redactSensitiveInfo(message));
    const ts = new Date().toISOString();

    if (this.logFile) {
      const scope = project ? ` project=${sanitizeLogMessage(project)}` : "";
      fs.appendFileSync(this.logFile, `[${ts}] ${level.toUpperCase()}${scope} ${msg}\n`, "utf8");
    }

    const line =
      this.format === "jsonl"
        ? JSON.stringify(project ? { level, project, message: msg, ts } : { level, message: msg, ts })
        : msg;
    if (level === "info") this.sink.out(line);
    else this.sink.err(line);
  }
}
