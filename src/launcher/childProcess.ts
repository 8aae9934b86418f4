import { spawn, type ChildProcess } from "child_process";
import os from "os";
import type { Logger } from "../logging/logger.js";
import { errorMessage } from "../logging/logger.js";
import { shellJoin, shellQuote } from "./shellQuote.js";

export interface SupervisedProcess {
  readonly pid: number | undefined;
  /** Exit code once the process has exited, null while it runs. */
  poll(): number | null;
  wait(): Promise<number>;
  /** Sends a signal to the process's whole group. */
  signalGroup(signal: NodeJS.Signals): void;
}

export type Spawner = (argv: string[], outputFile: string) => SupervisedProcess;

/** Exit code convention for a child that died from a signal. */
export function signalExitCode(signal: NodeJS.Signals): number {
  const entry = Object.entries(os.constants.signals).find(([name]) => name === signal);
  return 128 + (entry ? entry[1] : 0);
}

export function teeScript(argv: readonly string[], outputFile: string): string {
  return `set -o pipefail; ${shellJoin(argv)} 2>&1 | tee ${shellQuote(outputFile)}`;
}

class ChildSupervisor implements SupervisedProcess {
  private exitCode: number | null = null;
  private readonly exited: Promise<number>;

  constructor(
    private readonly child: ChildProcess,
    logger: Logger
  ) {
    this.exited = new Promise<number>((resolve) => {
      child.on("error", (err) => {
        logger.error("failed to start command", err);
        this.exitCode ??= 127;
        resolve(this.exitCode);
      });
      child.on("exit", (code: number | null, signal: NodeJS.Signals | null) => {
        this.exitCode = code ?? (signal ? signalExitCode(signal) : 1);
        resolve(this.exitCode);
      });
    });
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  poll(): number | null {
    return this.exitCode;
  }

  wait(): Promise<number> {
    return this.exited;
  }

  signalGroup(signal: NodeJS.Signals): void {
    const pid = this.child.pid;
    if (pid === undefined || this.exitCode !== null) return;
    try {
      process.kill(-pid, signal);
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code !== "ESRCH") throw new Error(`cannot signal process group ${pid}: ${errorMessage(err)}`);
    }
  }
}

/**
 * Runs argv under bash with stdout and stderr merged and teed to
 * `outputFile`, in a new session and process group so it can be signalled as
 * a unit. Output still reaches the launcher's terminal.
 */
export function spawnTeed(logger: Logger): Spawner {
  return (argv, outputFile) => {
    if (!argv.length) throw new Error("command argv must be non-empty");
    const child = spawn("bash", ["-c", teeScript(argv, outputFile)], {
      stdio: "inherit",
      detached: true
    });
    return new ChildSupervisor(child, logger);
  };
}
