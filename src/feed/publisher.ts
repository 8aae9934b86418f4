import type { RunMessageInput } from "../core/events.js";
import type { Logger } from "../logging/logger.js";
import { errorMessage } from "../logging/logger.js";
import type { FetchLike } from "./feedListener.js";
import { publishUrl } from "./topics.js";

export interface TextNotification {
  title: string;
  body: string;
  tags?: string[];
  headers?: Record<string, string>;
}

export interface EventPublisher {
  /** Publishes a JSON run event; resolves false (after logging) when delivery failed. */
  publish(topic: string, message: RunMessageInput, title?: string): Promise<boolean>;
  /** Publishes a human-readable notification that dashboards do not decode. */
  notify(topic: string, note: TextNotification): Promise<boolean>;
}

/** Header values must be Latin-1; anything else is replaced. */
export function headerSafe(value: string, maxLength = 120): string {
  const flat = value.replace(/[\r\n]+/g, " ").replace(/[^\x20-\x7e\xa0-\xff]/g, "?");
  return flat.length > maxLength ? `${flat.slice(0, maxLength - 3)}...` : flat;
}

export class HttpEventPublisher implements EventPublisher {
  private readonly fetchImpl: FetchLike;

  constructor(
    private readonly deps: {
      baseUrl: string;
      timeoutMs: number;
      logger: Logger;
      fetch?: FetchLike;
    }
  ) {
    this.fetchImpl = deps.fetch ?? ((url, init) => fetch(url, init));
  }

  async publish(topic: string, message: RunMessageInput, title?: string): Promise<boolean> {
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (title) headers["Title"] = headerSafe(title);
    return this.post(topic, JSON.stringify(message), headers, `${message.event} event`);
  }

  async notify(topic: string, note: TextNotification): Promise<boolean> {
    const headers: Record<string, string> = { Title: headerSafe(note.title) };
    if (note.tags?.length) headers["Tags"] = headerSafe(note.tags.join(","));
    for (const [k, v] of Object.entries(note.headers ?? {})) headers[k] = headerSafe(v);
    return this.post(topic, note.body, headers, "notification");
  }

  private async post(topic: string, body: string, headers: Record<string, string>, what: string): Promise<boolean> {
    try {
      const res = await this.fetchImpl(publishUrl(this.deps.baseUrl, topic), {
        method: "POST",
        headers,
        body,
        signal: AbortSignal.timeout(this.deps.timeoutMs)
      });
      if (!res.ok) {
        this.deps.logger.warn(`failed to send ${what} to ${topic}: HTTP ${res.status}`);
        return false;
      }
      await res.arrayBuffer();
      return true;
    } catch (err) {
      this.deps.logger.warn(`failed to send ${what} to ${topic}: ${errorMessage(err)}`);
      return false;
    }
  }
}
