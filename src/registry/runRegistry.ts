import type { CompleteMessage, RunMessage, StartMessage, TriggerMessage, UrlMessage } from "../core/events.js";
import { RUN_STATUSES, cloneRun, compareByStartDesc, isTerminal, type RunRecord, type RunStatus } from "../core/run.js";
import type { Logger } from "../logging/logger.js";
import { emptySnapshot, type RunSnapshot, type SnapshotStore } from "./snapshotStore.js";

export interface CategoryView {
  /** The most recently started runs, capped; row i is index i + 1 for deletion. */
  runs: RunRecord[];
  /** Uncapped number of runs in the category. */
  total: number;
}

export type Categorized = Record<RunStatus, CategoryView>;

export interface RunRegistryDeps {
  store: SnapshotStore;
  logger: Logger;
  now?: () => Date;
}

/**
 * Owner of every run record. Each mutation runs to completion without
 * yielding, so concurrent listeners and the dashboard never observe or write
 * a half-applied change; the resulting snapshot is then persisted through a
 * single write chain, in mutation order, before the call resolves.
 */
export class RunRegistry {
  private readonly runs = new Map<string, RunRecord>();
  private extra: Record<string, unknown> = {};
  private writeChain: Promise<void> = Promise.resolve();
  private readonly now: () => Date;

  private constructor(private readonly deps: RunRegistryDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  static async open(deps: RunRegistryDeps): Promise<RunRegistry> {
    const registry = new RunRegistry(deps);
    let snapshot: RunSnapshot;
    try {
      snapshot = await deps.store.load();
    } catch (err) {
      deps.logger.error("failed to load state, starting empty", err);
      snapshot = emptySnapshot();
    }
    for (const [runId, run] of Object.entries(snapshot.runs)) {
      registry.runs.set(runId, cloneRun(run));
    }
    registry.extra = { ...snapshot.extra };
    return registry;
  }

  get size(): number {
    return this.runs.size;
  }

  get(runId: string): RunRecord | null {
    const run = this.runs.get(runId);
    return run ? cloneRun(run) : null;
  }

  list(): RunRecord[] {
    return [...this.runs.values()].sort(compareByStartDesc).map(cloneRun);
  }

  async dispatch(message: RunMessage): Promise<boolean> {
    switch (message.event) {
      case "start":
        return this.applyStart(message);
      case "trigger":
        return this.applyTrigger(message);
      case "url":
        return this.applyUrl(message);
      case "complete":
        return this.applyCompletion(message);
    }
  }

  /** Inserts the run as ongoing; a repeated start for a known id resets it. */
  async applyStart(message: StartMessage): Promise<boolean> {
    if (!message.run_id) return false;
    this.runs.set(message.run_id, {
      run_id: message.run_id,
      command: message.command,
      machine: message.machine,
      tmux: message.tmux,
      cwd: message.cwd,
      start_time: message.timestamp ?? this.stamp(),
      status: "ongoing",
      triggers: [],
      exit_code: null,
      url: null
    });
    await this.commit();
    return true;
  }

  async applyTrigger(message: TriggerMessage): Promise<boolean> {
    const run = this.runs.get(message.run_id);
    if (!run || isTerminal(run.status)) return false;

    const newPhrase = !run.triggers.includes(message.trigger);
    const transition = run.status !== "hanging";
    if (!newPhrase && !transition) return false;

    if (newPhrase) run.triggers.push(message.trigger);
    if (transition) {
      run.status = "hanging";
      run.status_change_time = message.timestamp ?? this.stamp();
    }
    await this.commit();
    return true;
  }

  async applyUrl(message: UrlMessage): Promise<boolean> {
    const run = this.runs.get(message.run_id);
    if (!run || run.url === message.url) return false;
    run.url = message.url;
    await this.commit();
    return true;
  }

  /** Exit code 0 completes the run and anything else fails it, from ongoing and hanging alike. */
  async applyCompletion(message: CompleteMessage): Promise<boolean> {
    const run = this.runs.get(message.run_id);
    if (!run || isTerminal(run.status)) return false;

    const at = message.timestamp ?? this.stamp();
    run.exit_code = message.exit_code;
    run.end_time = at;
    run.status_change_time = at;
    run.status = message.exit_code === 0 ? "completed" : "failed";
    await this.commit();
    return true;
  }

  categorize(maxPerCategory: number): Categorized {
    const ranked = this.rankAll();
    const cap = Math.max(0, maxPerCategory);
    const view = (status: RunStatus): CategoryView => ({
      runs: ranked[status].slice(0, cap).map(cloneRun),
      total: ranked[status].length
    });
    return { ongoing: view("ongoing"), hanging: view("hanging"), failed: view("failed"), completed: view("completed") };
  }

  /**
   * Removes the run at a 1-based position of the category's current ranking,
   * recomputed now rather than taken from the last rendered frame. Returns the
   * removed run id, or null when the position is empty.
   */
  async deleteByCategoryIndex(status: RunStatus, oneBasedIndex: number): Promise<string | null> {
    if (!Number.isInteger(oneBasedIndex) || oneBasedIndex < 1) return null;
    const target = this.rank(status)[oneBasedIndex - 1];
    if (!target) return null;
    this.runs.delete(target.run_id);
    await this.commit();
    return target.run_id;
  }

  async flushCategory(status: RunStatus): Promise<number> {
    return this.removeWhere((run) => run.status === status);
  }

  async flushTerminal(): Promise<number> {
    return this.removeWhere((run) => isTerminal(run.status));
  }

  /** Resolves once every write queued so far has settled. */
  async settled(): Promise<void> {
    await this.writeChain;
  }

  private async removeWhere(predicate: (run: RunRecord) => boolean): Promise<number> {
    const doomed = [...this.runs.values()].filter(predicate).map((r) => r.run_id);
    if (!doomed.length) return 0;
    for (const runId of doomed) this.runs.delete(runId);
    await this.commit();
    return doomed.length;
  }

  private rank(status: RunStatus): RunRecord[] {
    return [...this.runs.values()].filter((r) => r.status === status).sort(compareByStartDesc);
  }

  private rankAll(): Record<RunStatus, RunRecord[]> {
    const out: Record<RunStatus, RunRecord[]> = { ongoing: [], hanging: [], failed: [], completed: [] };
    for (const run of this.runs.values()) out[run.status].push(run);
    for (const status of RUN_STATUSES) out[status].sort(compareByStartDesc);
    return out;
  }

  private stamp(): string {
    return this.now().toISOString();
  }

  private toSnapshot(): RunSnapshot {
    const runs: Record<string, RunRecord> = {};
    for (const [runId, run] of this.runs) runs[runId] = cloneRun(run);
    return { runs, extra: structuredClone(this.extra) };
  }

  private commit(): Promise<void> {
    const snapshot = this.toSnapshot();
    const write = this.writeChain.then(() => this.deps.store.save(snapshot));
    this.writeChain = write.catch((err: unknown) => {
      this.deps.logger.error("failed to persist state", err);
    });
    return this.writeChain;
  }
}
