import { randomUUID } from "crypto";
import { promises as fs } from "fs";
import path from "path";
import * as z from "zod/v4";
import { RUN_STATUSES, type RunRecord } from "../core/run.js";
import type { Logger } from "../logging/logger.js";
import { errorMessage } from "../logging/logger.js";

export interface RunSnapshot {
  runs: Record<string, RunRecord>;
  /** Top-level document fields other than `runs`, written back as they were read. */
  extra: Record<string, unknown>;
}

export interface SnapshotStore {
  load(): Promise<RunSnapshot>;
  save(snapshot: RunSnapshot): Promise<void>;
}

export function emptySnapshot(): RunSnapshot {
  return { runs: {}, extra: {} };
}

const zPersistedRun = z.looseObject({
  run_id: z.string().optional(),
  command: z.string().default(""),
  machine: z.string().default(""),
  tmux: z
    .string()
    .nullish()
    .transform((v) => v ?? null),
  cwd: z.string().default(""),
  start_time: z.string().default(""),
  status: z.enum(RUN_STATUSES).default("ongoing"),
  triggers: z.array(z.string()).default([]),
  exit_code: z
    .number()
    .int()
    .nullish()
    .transform((v) => v ?? null),
  end_time: z.string().nullish(),
  status_change_time: z.string().nullish(),
  url: z.string().nullish()
});

const zDocument = z.looseObject({
  runs: z.record(z.string(), z.unknown()).default({})
});

/** Parses a snapshot document; malformed run entries are skipped and reported. */
export function parseSnapshot(value: unknown, onSkip?: (runId: string, reason: string) => void): RunSnapshot | null {
  const doc = zDocument.safeParse(value);
  if (!doc.success) return null;

  const { runs: rawRuns, ...extra } = doc.data;
  const runs: Record<string, RunRecord> = {};
  for (const [key, entry] of Object.entries(rawRuns)) {
    const parsed = zPersistedRun.safeParse(entry);
    if (!parsed.success) {
      onSkip?.(key, parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; "));
      continue;
    }
    const runId = parsed.data.run_id || key;
    if (!runId) continue;
    runs[runId] = { ...parsed.data, run_id: runId };
  }
  return { runs, extra };
}

export class JsonFileSnapshotStore implements SnapshotStore {
  constructor(
    private readonly filePath: string,
    private readonly logger: Logger
  ) {}

  async load(): Promise<RunSnapshot> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, "utf8");
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code !== "ENOENT") {
        this.logger.warn(`cannot read state ${this.filePath}, starting empty: ${errorMessage(err)}`);
      }
      return emptySnapshot();
    }

    let value: unknown;
    try {
      value = JSON.parse(text);
    } catch (err) {
      this.logger.warn(`state ${this.filePath} is not valid JSON, starting empty: ${errorMessage(err)}`);
      return emptySnapshot();
    }

    const snapshot = parseSnapshot(value, (runId, reason) => this.logger.warn(`skipping malformed run ${runId}: ${reason}`));
    if (!snapshot) {
      this.logger.warn(`state ${this.filePath} has an unexpected shape, starting empty`);
      return emptySnapshot();
    }
    this.logger.info(`loaded ${Object.keys(snapshot.runs).length} runs from ${this.filePath}`);
    return snapshot;
  }

  async save(snapshot: RunSnapshot): Promise<void> {
    const doc = { ...snapshot.extra, runs: snapshot.runs };
    const text = JSON.stringify(doc, null, 2) + "\n";
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const tempPath = `${this.filePath}.tmp-${process.pid}-${randomUUID()}`;
    try {
      await fs.writeFile(tempPath, text, "utf8");
      await fs.rename(tempPath, this.filePath);
    } catch (err) {
      await fs.rm(tempPath, { force: true });
      throw err;
    }
  }
}

/** Keeps the last saved document in memory, as a serialized copy. */
export class MemorySnapshotStore implements SnapshotStore {
  saves = 0;
  failNextSave: Error | null = null;
  private stored: string | null;

  constructor(initial: RunSnapshot | null = null) {
    this.stored = initial ? JSON.stringify({ ...initial.extra, runs: initial.runs }) : null;
  }

  async load(): Promise<RunSnapshot> {
    if (this.stored === null) return emptySnapshot();
    const value: unknown = JSON.parse(this.stored);
    return parseSnapshot(value) ?? emptySnapshot();
  }

  async save(snapshot: RunSnapshot): Promise<void> {
    if (this.failNextSave) {
      const err = this.failNextSave;
      this.failNextSave = null;
      throw err;
    }
    this.saves += 1;
    this.stored = JSON.stringify({ ...snapshot.extra, runs: snapshot.runs });
  }

  document(): unknown {
    if (this.stored === null) return null;
    const value: unknown = JSON.parse(this.stored);
    return value;
  }
}
