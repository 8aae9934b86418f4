import { promises as fs } from "fs";
import type { FeedConfig, LauncherConfig } from "../config/config.js";
import type { EventPublisher } from "../feed/publisher.js";
import { realSleep, type Sleep } from "../feed/retryPolicy.js";
import type { Logger } from "../logging/logger.js";
import type { Spawner, SupervisedProcess } from "./childProcess.js";
import { FileTail, readTailLines } from "./outputTail.js";

export const INTERRUPTED_EXIT_CODE = 130;

const FILE_WAIT_STEP_MS = 100;

export type MonitorOptions = Pick<
  LauncherConfig,
  "triggers" | "urlPattern" | "outputWaitMs" | "pollIntervalMs" | "triggerContextLines" | "crashContextLines" | "killGraceMs"
>;

export interface LaunchRequest {
  runId: string;
  argv: string[];
  machine: string;
  tmux: string | null;
  cwd: string;
  outputFile: string;
}

export interface LaunchMonitorDeps {
  publisher: EventPublisher;
  topics: FeedConfig["topics"];
  logger: Logger;
  spawn: Spawner;
  sleep?: Sleep;
  now?: () => Date;
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Supervises one wrapped command: brackets it with start and complete events,
 * tails its teed output for trigger phrases and the side-channel URL, and
 * reports a crash when it exits non-zero.
 */
export class LaunchMonitor {
  private readonly sleep: Sleep;
  private readonly now: () => Date;
  private readonly firedTriggers = new Set<string>();
  private detectedUrl: string | null = null;

  constructor(
    private readonly deps: LaunchMonitorDeps,
    private readonly opts: MonitorOptions
  ) {
    this.sleep = deps.sleep ?? realSleep;
    this.now = deps.now ?? (() => new Date());
  }

  get triggersFired(): string[] {
    return [...this.firedTriggers];
  }

  get urlDetected(): string | null {
    return this.detectedUrl;
  }

  async run(req: LaunchRequest, signal?: AbortSignal): Promise<number> {
    const { publisher, topics, logger } = this.deps;
    const command = req.argv.join(" ");

    await publisher.publish(
      topics.start,
      {
        event: "start",
        run_id: req.runId,
        command,
        machine: req.machine,
        tmux: req.tmux,
        cwd: req.cwd,
        timestamp: this.stamp()
      },
      `Started: ${command.slice(0, 50)}`
    );

    let exitCode: number;
    try {
      const proc = this.deps.spawn(req.argv, req.outputFile);
      exitCode = await this.supervise(req, proc, signal);
    } catch (err) {
      logger.error("monitoring failed", err);
      exitCode = 1;
    }

    logger.info(`finished with exit code ${exitCode}`);
    await publisher.publish(
      topics.main,
      { event: "complete", run_id: req.runId, exit_code: exitCode, timestamp: this.stamp() },
      `Completed (exit ${exitCode}): ${command.slice(0, 40)}`
    );
    return exitCode;
  }

  /** Tails the process's output until it exits or the signal aborts; returns the exit code. */
  async supervise(req: LaunchRequest, proc: SupervisedProcess, signal?: AbortSignal): Promise<number> {
    const appeared = await this.waitForOutput(req.outputFile, proc, signal);
    if (signal?.aborted) return this.interrupt(proc);
    if (!appeared) return this.waitOrInterrupt(proc, signal);

    const tail = new FileTail(req.outputFile);
    await tail.open();
    try {
      for (;;) {
        if (signal?.aborted) return await this.interrupt(proc);

        const exitCode = proc.poll();
        const chunk = await tail.read();
        if (chunk.bytesRead > 0) {
          for (const line of chunk.lines) await this.inspectLine(req, line);
          continue;
        }

        if (exitCode !== null) {
          const last = tail.flush();
          if (last !== null) await this.inspectLine(req, last);
          if (exitCode !== 0) await this.reportCrash(req, exitCode);
          return exitCode;
        }

        await this.sleep(this.opts.pollIntervalMs, signal);
      }
    } finally {
      await tail.close();
    }
  }

  private async waitForOutput(outputFile: string, proc: SupervisedProcess, signal?: AbortSignal): Promise<boolean> {
    let waited = 0;
    while (!(await fileExists(outputFile)) && proc.poll() === null) {
      if (signal?.aborted) return false;
      if (waited >= this.opts.outputWaitMs) {
        this.deps.logger.warn(`output file not created after ${this.opts.outputWaitMs}ms`);
        break;
      }
      await this.sleep(FILE_WAIT_STEP_MS, signal);
      waited += FILE_WAIT_STEP_MS;
    }
    return fileExists(outputFile);
  }

  private async waitOrInterrupt(proc: SupervisedProcess, signal?: AbortSignal): Promise<number> {
    if (!signal) return proc.wait();
    const aborted = new Promise<"aborted">((resolve) => {
      if (signal.aborted) resolve("aborted");
      else signal.addEventListener("abort", () => resolve("aborted"), { once: true });
    });
    const outcome = await Promise.race([proc.wait(), aborted]);
    return outcome === "aborted" ? this.interrupt(proc) : outcome;
  }

  /** SIGTERM to the group, a grace period, then SIGKILL if anything is left. */
  private async interrupt(proc: SupervisedProcess): Promise<number> {
    const { logger } = this.deps;
    logger.warn("interrupted by user");
    try {
      proc.signalGroup("SIGTERM");
      await Promise.race([proc.wait(), this.sleep(this.opts.killGraceMs)]);
      if (proc.poll() === null) proc.signalGroup("SIGKILL");
    } catch (err) {
      logger.error("failed to stop the command", err);
    }
    return INTERRUPTED_EXIT_CODE;
  }

  private async inspectLine(req: LaunchRequest, line: string): Promise<void> {
    const { publisher, topics, logger } = this.deps;

    for (const trigger of this.opts.triggers) {
      if (!line.includes(trigger) || this.firedTriggers.has(trigger)) continue;
      this.firedTriggers.add(trigger);

      const context = await readTailLines(req.outputFile, this.opts.triggerContextLines);
      await publisher.publish(
        topics.main,
        {
          event: "trigger",
          run_id: req.runId,
          trigger,
          context,
          command: req.argv.join(" "),
          machine: req.machine,
          tmux: req.tmux,
          cwd: req.cwd,
          timestamp: this.stamp()
        },
        `Trigger: ${trigger}`
      );
      logger.info(`detected trigger: ${trigger}`);
    }

    if (this.detectedUrl === null) {
      const m = this.opts.urlPattern.exec(line);
      if (m) {
        const url = m[1] ?? m[0];
        this.detectedUrl = url;
        logger.debug(`matched url in line: ${line.trim()}`);
        await publisher.publish(
          topics.url,
          { event: "url", run_id: req.runId, url, timestamp: this.stamp() },
          `Run URL: ${req.runId.slice(0, 20)}`
        );
        logger.info(`detected run URL: ${url}`);
      }
    }
  }

  private async reportCrash(req: LaunchRequest, exitCode: number): Promise<void> {
    const context = await readTailLines(req.outputFile, this.opts.crashContextLines);

    const location = [`Machine: ${req.machine}`];
    if (req.tmux) location.push(`Tmux: ${req.tmux}`);
    location.push(`Dir: ${req.cwd}`);

    await this.deps.publisher.notify(this.deps.topics.main, {
      title: `Script crashed (exit ${exitCode})`,
      body: `${location.join("\n")}\nCommand: ${req.argv.join(" ")}\n\nLast output:\n${context}`,
      tags: ["skull", "warning"],
      headers: { "X-Run-ID": req.runId, "X-Event-Type": "failed" }
    });
    this.deps.logger.warn(`command crashed with exit code ${exitCode}`);
  }

  private stamp(): string {
    return this.now().toISOString();
  }
}
