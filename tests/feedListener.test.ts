import { describe, it, expect } from "vitest";
import type { RunMessage } from "../src/core/events.js";
import { FeedListener, type RunEventSink } from "../src/feed/feedListener.js";
import { fixedIntervalRetry, realSleep } from "../src/feed/retryPolicy.js";
import { feedRoutes, feedUrl, topicFor } from "../src/feed/topics.js";
import { MemoryLogger } from "../src/logging/logger.js";
import { RunRegistry } from "../src/registry/runRegistry.js";
import { MemorySnapshotStore } from "../src/registry/snapshotStore.js";
import { envelopeLine, feedLine, scriptedFetch, streamResponse } from "./helpers.js";

const TOPICS = { start: "runboard-start", main: "runboard-runs", url: "runboard-urls" };
function routeFor(role: "start" | "main" | "url") {
  const route = feedRoutes(TOPICS).find((r) => r.role === role);
  if (!route) throw new Error(`no route for ${role}`);
  return route;
}

const START_ROUTE = routeFor("start");
const MAIN_ROUTE = routeFor("main");

class RecordingSink implements RunEventSink {
  readonly received: RunMessage[] = [];
  failOn: string | null = null;

  async dispatch(message: RunMessage): Promise<boolean> {
    if (message.run_id === this.failOn) throw new Error("boom");
    this.received.push(message);
    return true;
  }
}

/** Retry policy whose pause stops the listener after `afterSleeps` pauses. */
function stopAfter(controller: AbortController, afterSleeps: number) {
  let sleeps = 0;
  return fixedIntervalRetry(5000, {
    sleep: async () => {
      sleeps += 1;
      if (sleeps >= afterSleeps) controller.abort();
    }
  });
}

describe("topics", () => {
  it("routes each message kind to one topic", () => {
    expect(feedRoutes(TOPICS).map((r) => [r.topic, [...r.accepts]])).toEqual([
      ["runboard-start", ["start"]],
      ["runboard-runs", ["trigger", "complete"]],
      ["runboard-urls", ["url"]]
    ]);
    expect(topicFor("complete", TOPICS)).toBe("runboard-runs");
    expect(topicFor("url", TOPICS)).toBe("runboard-urls");
    expect(feedUrl("http://feed.test", "lab runs")).toBe("http://feed.test/lab%20runs/json");
  });
});

describe("FeedListener", () => {
  it("decodes lines across chunk boundaries and counts what it skips", async () => {
    const controller = new AbortController();
    const sink = new RecordingSink();
    const logger = new MemoryLogger();
    const startLine = feedLine({ event: "start", run_id: "run_a", command: "python train.py" });
    const { fetch, calls } = scriptedFetch([
      (init) =>
        streamResponse(
          [
            envelopeLine("open"),
            startLine.slice(0, 20),
            startLine.slice(20),
            feedLine({ event: "complete", run_id: "run_a", exit_code: 0 }),
            "garbage\n",
            envelopeLine("keepalive")
          ],
          init
        )
    ]);

    const listener = new FeedListener({
      baseUrl: "http://feed.test",
      route: START_ROUTE,
      sink,
      logger,
      retry: stopAfter(controller, 1),
      fetch
    });
    await listener.run(controller.signal);

    expect(calls).toHaveLength(1);
    expect(calls[0]?.url).toBe("http://feed.test/runboard-start/json");
    expect(calls[0]?.init.headers).toEqual({ Accept: "application/x-ndjson" });
    expect(sink.received).toEqual([{ event: "start", run_id: "run_a", command: "python train.py", machine: "", tmux: null, cwd: "" }]);
    expect(listener.stats()).toEqual({
      topic: "runboard-start",
      state: "stopped",
      lines: 5,
      dispatched: 1,
      ignored: 1,
      dropped: 1,
      reconnects: 1,
      lastError: "feed runboard-start closed by server"
    });
    expect(logger.lines).toContain("warn connection error on runboard-start: feed runboard-start closed by server");
  });

  it("reconnects after an HTTP error and keeps applying events to the registry", async () => {
    const controller = new AbortController();
    const logger = new MemoryLogger();
    const registry = await RunRegistry.open({ store: new MemorySnapshotStore(), logger });
    await registry.dispatch({ event: "start", run_id: "run_a", command: "make", machine: "", tmux: null, cwd: "" });
    const unavailable = new Response("unavailable", { status: 503 });
    const { fetch, calls } = scriptedFetch([
      () => unavailable,
      (init) => streamResponse([feedLine({ event: "trigger", run_id: "run_a", trigger: "CUDA out of memory" }, "runboard-runs")], init)
    ]);

    const listener = new FeedListener({
      baseUrl: "http://feed.test",
      route: MAIN_ROUTE,
      sink: registry,
      logger,
      retry: stopAfter(controller, 2),
      fetch
    });
    await listener.run(controller.signal);

    expect(calls).toHaveLength(2);
    expect(unavailable.bodyUsed).toBe(true);
    expect(registry.get("run_a")?.status).toBe("hanging");
    expect(listener.stats().reconnects).toBe(2);
    expect(logger.lines).toContain("warn connection error on runboard-runs: feed runboard-runs returned HTTP 503");
  });

  it("gives up after the configured number of attempts", async () => {
    const logger = new MemoryLogger();
    const { fetch, calls } = scriptedFetch([
      () => {
        throw new Error("connect ECONNREFUSED");
      }
    ]);

    const listener = new FeedListener({
      baseUrl: "http://feed.test",
      route: START_ROUTE,
      sink: new RecordingSink(),
      logger,
      retry: fixedIntervalRetry(5000, { maxAttempts: 3, sleep: async () => {} }),
      fetch
    });
    await listener.run(new AbortController().signal);

    expect(calls).toHaveLength(3);
    expect(listener.stats()).toMatchObject({ state: "stopped", reconnects: 2, lastError: "connect ECONNREFUSED" });
    expect(logger.lines).toContain("error giving up on runboard-start after 3 attempts");
  });

  it("counts only consecutive failed attempts toward the limit", async () => {
    const controller = new AbortController();
    const logger = new MemoryLogger();
    const { fetch, calls } = scriptedFetch([(init) => streamResponse([envelopeLine("keepalive")], init)]);
    let sleeps = 0;

    const listener = new FeedListener({
      baseUrl: "http://feed.test",
      route: START_ROUTE,
      sink: new RecordingSink(),
      logger,
      retry: fixedIntervalRetry(5000, {
        maxAttempts: 2,
        sleep: async () => {
          sleeps += 1;
          if (sleeps >= 4) controller.abort();
        }
      }),
      fetch
    });
    await listener.run(controller.signal);

    expect(calls).toHaveLength(4);
    expect(listener.stats()).toMatchObject({ state: "stopped", reconnects: 4, lines: 4 });
    expect(logger.lines.filter((l) => l.startsWith("error giving up"))).toEqual([]);
  });

  it("logs a sink failure and moves on to the next line", async () => {
    const controller = new AbortController();
    const sink = new RecordingSink();
    sink.failOn = "run_a";
    const logger = new MemoryLogger();
    const { fetch } = scriptedFetch([
      (init) =>
        streamResponse(
          [feedLine({ event: "start", run_id: "run_a" }), feedLine({ event: "start", run_id: "run_b" })],
          init
        )
    ]);

    const listener = new FeedListener({
      baseUrl: "http://feed.test",
      route: START_ROUTE,
      sink,
      logger,
      retry: stopAfter(controller, 1),
      fetch
    });
    await listener.run(controller.signal);

    expect(sink.received.map((m) => m.run_id)).toEqual(["run_b"]);
    expect(listener.stats().dispatched).toBe(1);
    expect(logger.lines).toContain("error failed to apply start for run_a: boom");
  });

  it("reconnects when the stream stays silent past the idle timeout", async () => {
    const controller = new AbortController();
    const logger = new MemoryLogger();
    const { fetch } = scriptedFetch([(init) => streamResponse([], init, { hold: true })]);

    const listener = new FeedListener({
      baseUrl: "http://feed.test",
      route: MAIN_ROUTE,
      sink: new RecordingSink(),
      logger,
      retry: stopAfter(controller, 1),
      idleTimeoutMs: 50,
      fetch
    });
    await listener.run(controller.signal);

    expect(listener.stats().lastError).toBe("feed runboard-runs idle for 50ms");
  });

  it("stops promptly when aborted while connected", async () => {
    const controller = new AbortController();
    const { fetch } = scriptedFetch([(init) => streamResponse([envelopeLine("open")], init, { hold: true })]);
    const listener = new FeedListener({
      baseUrl: "http://feed.test",
      route: START_ROUTE,
      sink: new RecordingSink(),
      logger: new MemoryLogger(),
      retry: fixedIntervalRetry(5000),
      fetch
    });

    const running = listener.run(controller.signal);
    setTimeout(() => controller.abort(), 20);
    await running;

    expect(listener.stats()).toMatchObject({ state: "stopped", reconnects: 0, lastError: null, lines: 1 });
  });
});

describe("realSleep", () => {
  it("resolves early when its signal aborts", async () => {
    const controller = new AbortController();
    const startedAt = Date.now();
    setTimeout(() => controller.abort(), 10);
    await realSleep(60_000, controller.signal);
    expect(Date.now() - startedAt).toBeLessThan(5_000);
  });
});
