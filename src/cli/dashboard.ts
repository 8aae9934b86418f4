#!/usr/bin/env node
import { loadConfig } from "../config/config.js";
import { DashboardController } from "../dashboard/controller.js";
import { runTerminalLoop } from "../dashboard/terminal.js";
import { AnsiDashboardView } from "../dashboard/view.js";
import { FeedListener } from "../feed/feedListener.js";
import { fixedIntervalRetry } from "../feed/retryPolicy.js";
import { feedRoutes } from "../feed/topics.js";
import { FileLogger, StderrLogger } from "../logging/logger.js";
import { RunRegistry } from "../registry/runRegistry.js";
import { JsonFileSnapshotStore } from "../registry/snapshotStore.js";
import { UsageError, dashboardUsage, parseDashboardArgs } from "./args.js";

async function main(): Promise<void> {
  const args = parseDashboardArgs(process.argv.slice(2));
  if (args.help) {
    process.stdout.write(dashboardUsage());
    return;
  }

  const config = await loadConfig({ explicitPath: args.configPath });
  const stderr = new StderrLogger("dashboard");
  const logger = new FileLogger(config.dashboard.logPath);

  const registry = await RunRegistry.open({
    store: new JsonFileSnapshotStore(config.dashboard.statePath, logger),
    logger
  });
  stderr.info(`tracking ${registry.size} runs from ${config.dashboard.statePath}`);
  stderr.info(`connecting to ${config.feed.baseUrl}...`);

  // Listeners are never joined: they live until the process exits.
  const shutdown = new AbortController();
  const retry = fixedIntervalRetry(config.feed.reconnectIntervalMs);
  const listeners = feedRoutes(config.feed.topics).map(
    (route) =>
      new FeedListener({
        baseUrl: config.feed.baseUrl,
        route,
        sink: registry,
        logger,
        retry,
        idleTimeoutMs: config.feed.idleTimeoutMs
      })
  );
  for (const listener of listeners) {
    listener.run(shutdown.signal).catch((err: unknown) => logger.error("listener stopped unexpectedly", err));
  }

  const view = new AnsiDashboardView(process.stdout);
  const controller = new DashboardController({
    registry,
    view,
    logger,
    maxPerCategory: config.dashboard.maxPerCategory,
    listenerStats: () => listeners.map((l) => l.stats())
  });

  const onSignal = (): void => shutdown.abort();
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
  try {
    await runTerminalLoop({
      controller,
      input: process.stdin,
      logger,
      refreshIntervalMs: config.dashboard.refreshIntervalMs,
      signal: shutdown.signal
    });
  } finally {
    view.close();
    shutdown.abort();
    await registry.settled();
  }
  stderr.info("exiting...");
}

main()
  .then(() => process.exit(0))
  .catch((err) => {
    if (err instanceof UsageError) {
      console.error(`error: ${err.message}\n\n${dashboardUsage()}`);
      process.exit(2);
    }
    console.error(err instanceof Error ? err.message : err);
    process.exit(1);
  });
