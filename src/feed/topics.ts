import type { RunMessageKind } from "../core/events.js";
import type { FeedConfig } from "../config/config.js";

export type TopicRole = "start" | "main" | "url";

export interface FeedRoute {
  role: TopicRole;
  topic: string;
  accepts: ReadonlySet<RunMessageKind>;
}

const ROLE_KINDS: Record<TopicRole, readonly RunMessageKind[]> = {
  start: ["start"],
  main: ["trigger", "complete"],
  url: ["url"]
};

export function feedRoutes(topics: FeedConfig["topics"]): FeedRoute[] {
  return (["start", "main", "url"] as const).map((role) => ({
    role,
    topic: topics[role],
    accepts: new Set(ROLE_KINDS[role])
  }));
}

/** The topic a message of the given kind is published on. */
export function topicFor(kind: RunMessageKind, topics: FeedConfig["topics"]): string {
  if (kind === "start") return topics.start;
  if (kind === "url") return topics.url;
  return topics.main;
}

export function feedUrl(baseUrl: string, topic: string): string {
  return `${baseUrl}/${encodeURIComponent(topic)}/json`;
}

export function publishUrl(baseUrl: string, topic: string): string {
  return `${baseUrl}/${encodeURIComponent(topic)}`;
}
