import type { RunStatus } from "../core/run.js";
import type { ListenerStats } from "../feed/feedListener.js";
import type { Logger } from "../logging/logger.js";
import type { RunRegistry } from "../registry/runRegistry.js";
import type { DashboardFrame, DashboardView } from "./view.js";

export const DELETE_KEYS: ReadonlyMap<string, RunStatus> = new Map<string, RunStatus>([
  ["o", "ongoing"],
  ["h", "hanging"],
  ["f", "failed"],
  ["c", "completed"]
]);

export const FLUSH_KEYS: ReadonlyMap<string, RunStatus | "terminal"> = new Map<string, RunStatus | "terminal">([
  ["F", "failed"],
  ["C", "completed"],
  ["H", "hanging"],
  ["A", "terminal"]
]);

const QUIT_KEYS = new Set(["q", "\u0003"]);

export type KeyOutcome = "ignored" | "selected" | "command" | "quit";

export interface DashboardControllerDeps {
  registry: RunRegistry;
  view: DashboardView;
  logger: Logger;
  maxPerCategory: number;
  listenerStats?: () => ListenerStats[];
  now?: () => Date;
}

/**
 * Interactive loop state: a pending row index and a status message that is
 * shown on exactly one render. Indices always refer to the registry's
 * current ranking, which is the one every frame is drawn from.
 */
export class DashboardController {
  private pendingIndex: number | null = null;
  private statusMessage: string | null = null;
  private readonly now: () => Date;

  constructor(private readonly deps: DashboardControllerDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  get pending(): number | null {
    return this.pendingIndex;
  }

  frame(): DashboardFrame {
    return {
      categories: this.deps.registry.categorize(this.deps.maxPerCategory),
      statusMessage: this.statusMessage ?? this.selectionPrompt(),
      pendingIndex: this.pendingIndex,
      listeners: this.deps.listenerStats?.() ?? [],
      maxPerCategory: this.deps.maxPerCategory,
      renderedAt: this.now()
    };
  }

  refresh(): void {
    this.deps.view.render(this.frame());
    this.statusMessage = null;
  }

  async handleKey(key: string): Promise<KeyOutcome> {
    if (QUIT_KEYS.has(key)) return "quit";

    const digit = /^[1-9]$/.test(key) ? Number(key) : null;
    if (digit !== null && digit <= this.deps.maxPerCategory) {
      this.pendingIndex = digit;
      this.statusMessage = null;
      return "selected";
    }

    const category = DELETE_KEYS.get(key);
    if (category && this.pendingIndex !== null) {
      const index = this.pendingIndex;
      this.pendingIndex = null;
      const label = category.toUpperCase();
      const removed = await this.deps.registry.deleteByCategoryIndex(category, index);
      if (removed) {
        this.deps.logger.info(`deleted ${removed} (${label} [${index}])`);
        this.statusMessage = `✓ Deleted item [${index}] from ${label}`;
      } else {
        this.deps.logger.debug(`delete missed: ${label} [${index}]`);
        this.statusMessage = `✗ Item [${index}] not found in ${label}`;
      }
      return "command";
    }

    const flush = FLUSH_KEYS.get(key);
    if (flush) {
      this.pendingIndex = null;
      if (flush === "terminal") {
        const count = await this.deps.registry.flushTerminal();
        this.statusMessage = `✓ Flushed ${count} finished run(s)`;
      } else {
        const count = await this.deps.registry.flushCategory(flush);
        this.statusMessage = `✓ Flushed ${count} ${flush.toUpperCase()} run(s)`;
      }
      this.deps.logger.info(this.statusMessage);
      return "command";
    }

    return "ignored";
  }

  private selectionPrompt(): string | null {
    if (this.pendingIndex === null) return null;
    return `Selected [${this.pendingIndex}]. Now press: [o]=ONGOING  [h]=HANGING  [f]=FAILED  [c]=COMPLETED`;
  }
}
