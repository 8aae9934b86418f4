import { ulid } from "ulid";

export type RunId = `run_${string}`;

export function newRunId(): RunId {
  return `run_${ulid()}` as const;
}
