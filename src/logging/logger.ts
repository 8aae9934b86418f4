import { appendFileSync, mkdirSync } from "fs";
import path from "path";

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string, err?: unknown): void;
  debug(message: string): void;
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) {
    const cause = err.cause instanceof Error ? ` (${err.cause.message})` : "";
    return `${err.message}${cause}`;
  }
  return String(err);
}

function debugEnabled(): boolean {
  const raw = process.env.RUNBOARD_DEBUG?.trim().toLowerCase();
  return raw !== undefined && raw !== "" && raw !== "0" && raw !== "false";
}

/** Writes prefixed lines to stderr, the same channel the launcher's own banner uses. */
export class StderrLogger implements Logger {
  private readonly debugOn: boolean;

  constructor(
    private readonly prefix: string,
    opts: { debug?: boolean } = {}
  ) {
    this.debugOn = opts.debug ?? debugEnabled();
  }

  info(message: string): void {
    console.error(`[${this.prefix}] ${message}`);
  }

  warn(message: string): void {
    console.error(`[${this.prefix}] warning: ${message}`);
  }

  error(message: string, err?: unknown): void {
    console.error(`[${this.prefix}] ${message}${err === undefined ? "" : `: ${errorMessage(err)}`}`);
  }

  debug(message: string): void {
    if (this.debugOn) console.error(`[${this.prefix}] debug: ${message}`);
  }
}

/**
 * Appends timestamped lines to a file. The dashboard logs here while it owns
 * the terminal, since stderr output would tear the rendered frame.
 */
export class FileLogger implements Logger {
  private readonly debugOn: boolean;
  private dirReady = false;
  private reportedFailure = false;

  constructor(
    private readonly filePath: string,
    opts: { debug?: boolean } = {}
  ) {
    this.debugOn = opts.debug ?? debugEnabled();
  }

  info(message: string): void {
    this.write("info", message);
  }

  warn(message: string): void {
    this.write("warn", message);
  }

  error(message: string, err?: unknown): void {
    this.write("error", err === undefined ? message : `${message}: ${errorMessage(err)}`);
  }

  debug(message: string): void {
    if (this.debugOn) this.write("debug", message);
  }

  private write(level: string, message: string): void {
    try {
      if (!this.dirReady) {
        mkdirSync(path.dirname(this.filePath), { recursive: true });
        this.dirReady = true;
      }
      appendFileSync(this.filePath, `[${new Date().toISOString()}] ${level} ${message}\n`);
    } catch (err) {
      if (!this.reportedFailure) {
        this.reportedFailure = true;
        console.error(`[runboard] cannot write log ${this.filePath}: ${errorMessage(err)}`);
      }
    }
  }
}

/** Collects lines in memory; used where a Logger is required but output is not wanted. */
export class MemoryLogger implements Logger {
  readonly lines: string[] = [];

  info(message: string): void {
    this.lines.push(`info ${message}`);
  }

  warn(message: string): void {
    this.lines.push(`warn ${message}`);
  }

  error(message: string, err?: unknown): void {
    this.lines.push(`error ${err === undefined ? message : `${message}: ${errorMessage(err)}`}`);
  }

  debug(message: string): void {
    this.lines.push(`debug ${message}`);
  }
}
