#!/usr/bin/env node
import { promises as fs } from "fs";
import path from "path";
import { loadConfig } from "../config/config.js";
import { newRunId } from "../core/ids.js";
import { HttpEventPublisher } from "../feed/publisher.js";
import { spawnTeed } from "../launcher/childProcess.js";
import { machineName, tmuxSession } from "../launcher/hostInfo.js";
import { LaunchMonitor } from "../launcher/launchMonitor.js";
import { StderrLogger } from "../logging/logger.js";
import { UsageError, launcherUsage, parseLauncherArgs } from "./args.js";

function compactStamp(d: Date): string {
  const pad = (n: number): string => String(n).padStart(2, "0");
  return `${d.getFullYear()}${pad(d.getMonth() + 1)}${pad(d.getDate())}_${pad(d.getHours())}${pad(d.getMinutes())}${pad(d.getSeconds())}`;
}

async function main(): Promise<number> {
  const args = parseLauncherArgs(process.argv.slice(2));
  if (args.help) {
    process.stdout.write(launcherUsage());
    return 0;
  }

  const config = await loadConfig({ explicitPath: args.configPath });
  const logger = new StderrLogger("notify");

  const runId = newRunId();
  const machine = machineName();
  const tmux = tmuxSession();
  const cwd = process.cwd();
  const triggers = [...new Set([...config.launcher.triggers, ...args.triggers])];

  await fs.mkdir(config.launcher.logsDir, { recursive: true });
  const outputFile = path.join(config.launcher.logsDir, `notify_${compactStamp(new Date())}_${process.pid}.log`);

  logger.info(`starting: ${args.command.join(" ")}`);
  logger.info(`run id: ${runId}`);
  logger.info(`log: ${outputFile}`);
  logger.info(`working dir: ${cwd}`);
  logger.info(`monitoring for: ${triggers.join(", ")}`);
  if (tmux) logger.info(`tmux session: ${tmux}`);
  logger.info(`machine: ${machine}`);
  console.error("");

  const publisher = new HttpEventPublisher({
    baseUrl: config.feed.baseUrl,
    timeoutMs: config.feed.publishTimeoutMs,
    logger
  });
  const monitor = new LaunchMonitor(
    { publisher, topics: config.feed.topics, logger, spawn: spawnTeed(logger) },
    { ...config.launcher, triggers }
  );

  const interrupt = new AbortController();
  const onSignal = (): void => interrupt.abort();
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
  try {
    const exitCode = await monitor.run({ runId, argv: args.command, machine, tmux, cwd, outputFile }, interrupt.signal);
    logger.info(`full log: ${outputFile}`);
    return exitCode;
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
  }
}

main()
  .then((code) => process.exit(code))
  .catch((err) => {
    if (err instanceof UsageError) {
      console.error(`error: ${err.message}\n\n${launcherUsage()}`);
      process.exit(2);
    }
    console.error(err instanceof Error ? err.message : err);
    process.exit(1);
  });
