import { decodeFeedLine, type RunMessage } from "../core/events.js";
import type { Logger } from "../logging/logger.js";
import { errorMessage } from "../logging/logger.js";
import { shouldRetry, type RetryPolicy } from "./retryPolicy.js";
import { feedUrl, type FeedRoute } from "./topics.js";

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface RunEventSink {
  dispatch(message: RunMessage): Promise<unknown>;
}

export type ListenerState = "idle" | "connecting" | "connected" | "retrying" | "stopped";

export interface ListenerStats {
  topic: string;
  state: ListenerState;
  lines: number;
  dispatched: number;
  ignored: number;
  dropped: number;
  reconnects: number;
  lastError: string | null;
}

export class FeedHttpError extends Error {
  constructor(
    readonly status: number,
    message: string
  ) {
    super(message);
    this.name = "FeedHttpError";
  }
}

class FeedClosedError extends Error {
  constructor(topic: string) {
    super(`feed ${topic} closed by server`);
    this.name = "FeedClosedError";
  }
}

class FeedIdleError extends Error {
  constructor(topic: string, idleMs: number) {
    super(`feed ${topic} idle for ${idleMs}ms`);
    this.name = "FeedIdleError";
  }
}

export interface FeedListenerDeps {
  baseUrl: string;
  route: FeedRoute;
  sink: RunEventSink;
  logger: Logger;
  retry: RetryPolicy;
  /** Reconnect when nothing (not even a keepalive) arrives for this long; 0 disables. */
  idleTimeoutMs?: number;
  fetch?: FetchLike;
}

/**
 * Long-lived subscriber for one topic. Lines are applied to the sink in feed
 * order; any connection failure is followed by the retry policy's pause and a
 * fresh connection, until the abort signal passed to run() fires.
 */
export class FeedListener {
  private readonly fetchImpl: FetchLike;
  private readonly state: ListenerStats;

  constructor(private readonly deps: FeedListenerDeps) {
    this.fetchImpl = deps.fetch ?? ((url, init) => fetch(url, init));
    this.state = {
      topic: deps.route.topic,
      state: "idle",
      lines: 0,
      dispatched: 0,
      ignored: 0,
      dropped: 0,
      reconnects: 0,
      lastError: null
    };
  }

  stats(): ListenerStats {
    return { ...this.state };
  }

  async run(signal: AbortSignal): Promise<void> {
    const { retry, logger, route } = this.deps;
    let failures = 0;

    while (!signal.aborted) {
      try {
        await this.connectOnce(signal);
      } catch (err) {
        if (signal.aborted) break;
        this.state.lastError = errorMessage(err);
        logger.warn(`connection error on ${route.topic}: ${this.state.lastError}`);
      }
      if (signal.aborted) break;

      // Only consecutive failed connection attempts count toward the limit.
      if (this.state.state === "connected") failures = 0;
      failures += 1;
      if (!shouldRetry(retry, failures)) {
        logger.error(`giving up on ${route.topic} after ${failures} attempts`);
        break;
      }
      this.state.state = "retrying";
      this.state.reconnects += 1;
      await retry.sleep(retry.intervalMs, signal);
    }

    this.state.state = "stopped";
  }

  private async connectOnce(signal: AbortSignal): Promise<void> {
    const { route, logger } = this.deps;
    const idleMs = this.deps.idleTimeoutMs ?? 0;
    const conn = new AbortController();
    const onAbort = (): void => conn.abort(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });

    let idleTimer: NodeJS.Timeout | null = null;
    const armIdle = (): void => {
      if (idleMs <= 0) return;
      if (idleTimer) clearTimeout(idleTimer);
      idleTimer = setTimeout(() => conn.abort(new FeedIdleError(route.topic, idleMs)), idleMs);
    };

    try {
      this.state.state = "connecting";
      armIdle();
      const res = await this.fetchImpl(feedUrl(this.deps.baseUrl, route.topic), {
        headers: { Accept: "application/x-ndjson" },
        signal: conn.signal
      });
      if (!res.ok) {
        await res.body?.cancel();
        throw new FeedHttpError(res.status, `feed ${route.topic} returned HTTP ${res.status}`);
      }
      if (!res.body) {
        throw new FeedClosedError(route.topic);
      }

      this.state.state = "connected";
      logger.debug(`connected to ${route.topic}`);

      const reader = res.body.getReader();
      const decoder = new TextDecoder();
      let pending = "";
      for (;;) {
        const { done, value } = await reader.read();
        if (done) break;
        armIdle();
        pending += decoder.decode(value, { stream: true });
        let newline = pending.indexOf("\n");
        while (newline >= 0) {
          const line = pending.slice(0, newline);
          pending = pending.slice(newline + 1);
          await this.handleLine(line);
          newline = pending.indexOf("\n");
        }
      }
      pending += decoder.decode();
      if (pending.trim()) await this.handleLine(pending);
      throw new FeedClosedError(route.topic);
    } catch (err) {
      if (conn.signal.reason instanceof FeedIdleError) throw conn.signal.reason;
      throw err;
    } finally {
      if (idleTimer) clearTimeout(idleTimer);
      signal.removeEventListener("abort", onAbort);
    }
  }

  private async handleLine(line: string): Promise<void> {
    const { route, sink, logger } = this.deps;
    if (!line.trim()) return;
    this.state.lines += 1;

    const decoded = decodeFeedLine(line);
    if (decoded.kind === "skipped") return;
    if (decoded.kind === "malformed") {
      this.state.dropped += 1;
      logger.debug(`dropped line on ${route.topic}: ${decoded.reason}`);
      return;
    }
    if (!route.accepts.has(decoded.message.event)) {
      this.state.ignored += 1;
      return;
    }

    try {
      await sink.dispatch(decoded.message);
      this.state.dispatched += 1;
      logger.debug(`${decoded.message.event} ${decoded.message.run_id} via ${route.topic}`);
    } catch (err) {
      logger.error(`failed to apply ${decoded.message.event} for ${decoded.message.run_id}`, err);
    }
  }
}
