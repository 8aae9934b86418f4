export const RUN_STATUSES = ["ongoing", "hanging", "failed", "completed"] as const;

export type RunStatus = (typeof RUN_STATUSES)[number];

export const TERMINAL_STATUSES: readonly RunStatus[] = ["failed", "completed"];

export function isTerminal(status: RunStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}


/**
 * One tracked execution of a wrapped command, in its persisted shape.
 * Fields the registry does not know about are carried through untouched.
 */
export interface RunRecord {
  run_id: string;
  command: string;
  machine: string;
  tmux: string | null;
  cwd: string;
  start_time: string;
  status: RunStatus;
  triggers: string[];
  exit_code: number | null;
  end_time?: string | null;
  status_change_time?: string | null;
  url?: string | null;
  [field: string]: unknown;
}

export function cloneRun(run: RunRecord): RunRecord {
  return structuredClone(run);
}

/** Most recently started first; ties fall back to run id so the order is total. */
export function compareByStartDesc(a: RunRecord, b: RunRecord): number {
  if (a.start_time !== b.start_time) return a.start_time < b.start_time ? 1 : -1;
  if (a.run_id === b.run_id) return 0;
  return a.run_id < b.run_id ? 1 : -1;
}
