import { RUN_STATUSES, type RunRecord, type RunStatus } from "../core/run.js";
import type { ListenerStats } from "../feed/feedListener.js";
import type { Categorized } from "../registry/runRegistry.js";

export interface DashboardFrame {
  categories: Categorized;
  /** One-shot command feedback, or the selection prompt while an index is pending. */
  statusMessage: string | null;
  pendingIndex: number | null;
  listeners: ListenerStats[];
  maxPerCategory: number;
  renderedAt: Date;
}

export interface DashboardView {
  render(frame: DashboardFrame): void;
  close(): void;
}

const ANSI = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  green: "\x1b[92m",
  red: "\x1b[91m",
  cyan: "\x1b[96m",
  yellow: "\x1b[93m",
  orange: "\x1b[38;5;208m",
  gray: "\x1b[90m"
} as const;

type Tone = keyof typeof ANSI;

const CATEGORY_TONE: Record<RunStatus, Tone> = {
  ongoing: "cyan",
  hanging: "orange",
  failed: "red",
  completed: "green"
};

export function formatTimeAgo(iso: string | null | undefined, now: Date): string {
  if (!iso) return "unknown";
  const at = Date.parse(iso);
  if (Number.isNaN(at)) return "unknown";
  const seconds = Math.max(0, Math.floor((now.getTime() - at) / 1000));
  if (seconds < 60) return `${seconds}s ago`;
  if (seconds < 3600) return `${Math.floor(seconds / 60)}m ago`;
  if (seconds < 86400) return `${Math.floor(seconds / 3600)}h ago`;
  return `${Math.floor(seconds / 86400)}d ago`;
}

/** Basename of the first word of a command line. */
export function commandName(command: string): string {
  const first = command.trim().split(/\s+/)[0] ?? "";
  if (!first) return command.slice(0, 50);
  return first.split("/").pop() || first;
}

export function shortenPath(dir: string, max = 80): string {
  return dir.length < max ? dir : `...${dir.slice(-(max - 3))}`;
}

function center(text: string, width: number): string {
  if (text.length >= width) return text;
  const left = Math.floor((width - text.length) / 2);
  return " ".repeat(left) + text + " ".repeat(width - text.length - left);
}

function timestampLabel(d: Date): string {
  const pad = (n: number): string => String(n).padStart(2, "0");
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
}

export interface RenderOptions {
  width?: number;
  color?: boolean;
}

/** Renders one frame as text lines; pure, so any sink can display it. */
export function renderFrame(frame: DashboardFrame, opts: RenderOptions = {}): string {
  const width = opts.width ?? 110;
  const color = opts.color ?? true;
  const paint = (tones: Tone[], text: string): string =>
    color && tones.length ? tones.map((t) => ANSI[t]).join("") + text + ANSI.reset : text;

  const now = frame.renderedAt;
  const rule = "=".repeat(width);
  const out: string[] = [
    paint(["bold", "cyan"], rule),
    paint(["bold", "cyan"], center("RUNBOARD", width)),
    paint(["gray"], center(`Updated: ${timestampLabel(now)}`, width)),
    paint(["bold", "cyan"], rule)
  ];

  for (const status of RUN_STATUSES) {
    const { runs, total } = frame.categories[status];
    const tone = CATEGORY_TONE[status];
    out.push("");
    out.push(paint(["bold", tone], `${status.toUpperCase()} (${total}):`));
    out.push(paint(["gray"], "-".repeat(width)));
    if (!runs.length) {
      out.push(paint(["gray"], "  (none)"));
      continue;
    }
    runs.forEach((run, i) => out.push(...renderRun(run, i + 1, status, now, paint)));
  }

  out.push("");
  if (frame.listeners.length) {
    const health = frame.listeners.map((l) => `${l.topic}: ${l.state}${l.reconnects ? ` (${l.reconnects} retries)` : ""}`).join("  |  ");
    out.push(paint(["gray"], `Feeds: ${health}`));
  }
  out.push(paint(["cyan"], rule));
  if (frame.statusMessage) {
    out.push(paint(["bold", "yellow"], frame.statusMessage));
  } else {
    const max = frame.maxPerCategory;
    out.push(
      paint(["gray"], "Delete item: ") +
        paint(["cyan"], `[1-${max}]`) +
        " then " +
        paint(["cyan"], "[o/h/f/c]") +
        " (ongoing/hanging/failed/completed)  |  " +
        paint(["gray"], "Flush: ") +
        paint(["cyan"], "[Shift+F/C/H/A]") +
        "  |  " +
        paint(["gray"], "Exit: ") +
        "q or Ctrl+C"
    );
  }
  out.push(paint(["cyan"], rule));
  return out.join("\n");
}

function renderRun(
  run: RunRecord,
  index: number,
  status: RunStatus,
  now: Date,
  paint: (tones: Tone[], text: string) => string
): string[] {
  const started = formatTimeAgo(run.start_time, now);
  let when = started.padStart(8);
  if (status !== "ongoing") {
    const changedAt = run.status_change_time ?? run.end_time ?? run.start_time;
    when = `${started.padStart(8)}→${formatTimeAgo(changedAt, now).padStart(8)}`;
  }

  const lines = [`${paint(["cyan"], `[${index}]`)} ${paint(["gray"], `[${when}]`)} ${paint(["bold"], commandName(run.command))}`];
  const detail = (tone: Tone, text: string): void => {
    lines.push(`    ${paint([tone], `└─ ${text}`)}`);
  };

  if (run.url) detail("cyan", `URL: ${run.url}`);
  if (run.tmux) detail("gray", `Tmux: ${run.tmux}`);
  detail("gray", `Machine: ${(run.machine || "unknown").split(".")[0]}`);
  if (run.cwd) detail("gray", `Dir: ${shortenPath(run.cwd)}`);
  if (status === "hanging") {
    for (const trigger of run.triggers) detail("orange", `Trigger: ${trigger}`);
  }
  if (status === "failed") detail("red", `Exit code: ${run.exit_code ?? "unknown"}`);
  return lines;
}

/** Full-screen view on the alternate buffer; each frame redraws from the top and clears leftovers. */
export class AnsiDashboardView implements DashboardView {
  private opened = false;

  constructor(
    private readonly out: NodeJS.WritableStream,
    private readonly opts: RenderOptions = {}
  ) {}

  render(frame: DashboardFrame): void {
    if (!this.opened) {
      this.out.write("\x1b[?1049h\x1b[?25l");
      this.opened = true;
    }
    this.out.write(`\x1b[H${renderFrame(frame, this.opts).split("\n").join("\x1b[K\n")}\x1b[K\n\x1b[0J`);
  }

  close(): void {
    if (!this.opened) return;
    this.opened = false;
    this.out.write("\x1b[?25h\x1b[?1049l");
  }
}
