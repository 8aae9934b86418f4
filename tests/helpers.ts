import { zRunMessage, type RunMessage, type RunMessageInput } from "../src/core/events.js";
import type { RunRecord } from "../src/core/run.js";
import type { FetchLike } from "../src/feed/feedListener.js";
import type { EventPublisher, TextNotification } from "../src/feed/publisher.js";

export function msg(input: RunMessageInput): RunMessage {
  return zRunMessage.parse(input);
}

export function record(overrides: Partial<RunRecord> & { run_id: string }): RunRecord {
  return {
    command: "python train.py",
    machine: "gpu01.lab",
    tmux: null,
    cwd: "/work",
    start_time: "2026-03-01T10:00:00.000Z",
    status: "ongoing",
    triggers: [],
    exit_code: null,
    url: null,
    ...overrides
  };
}

/** One line of the subscribe stream carrying `message` as its JSON body. */
export function feedLine(message: object, topic = "runboard-start"): string {
  return JSON.stringify({ id: "m1", time: 1767225600, event: "message", topic, message: JSON.stringify(message) }) + "\n";
}

export function envelopeLine(event: string, topic = "runboard-start"): string {
  return JSON.stringify({ id: "k1", time: 1767225600, event, topic }) + "\n";
}

/**
 * A streaming response that emits `chunks` and then either closes or, with
 * `hold`, stays open until the request signal aborts.
 */
export function streamResponse(chunks: string[], init: RequestInit, opts: { hold?: boolean } = {}): Response {
  const encoder = new TextEncoder();
  const body = new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) controller.enqueue(encoder.encode(chunk));
      if (!opts.hold) {
        controller.close();
        return;
      }
      const signal = init.signal;
      if (!signal) return;
      signal.addEventListener("abort", () => controller.error(signal.reason), { once: true });
    }
  });
  return new Response(body, { status: 200, headers: { "Content-Type": "application/x-ndjson" } });
}

export interface FetchCall {
  url: string;
  init: RequestInit;
}

/** Fake fetch answering each call with the next responder; the last one repeats. */
export function scriptedFetch(responders: Array<(init: RequestInit) => Response | Promise<Response>>): {
  fetch: FetchLike;
  calls: FetchCall[];
} {
  const calls: FetchCall[] = [];
  const fetch: FetchLike = async (url, init) => {
    calls.push({ url, init });
    const responder = responders[Math.min(calls.length, responders.length) - 1];
    if (!responder) throw new Error("no responder configured");
    return responder(init);
  };
  return { fetch, calls };
}

export class RecordingPublisher implements EventPublisher {
  readonly published: Array<{ topic: string; message: RunMessageInput; title?: string }> = [];
  readonly notes: Array<{ topic: string; note: TextNotification }> = [];

  async publish(topic: string, message: RunMessageInput, title?: string): Promise<boolean> {
    this.published.push({ topic, message, title });
    return true;
  }

  async notify(topic: string, note: TextNotification): Promise<boolean> {
    this.notes.push({ topic, note });
    return true;
  }
}
