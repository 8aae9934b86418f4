import { spawnSync } from "child_process";
import os from "os";

export function machineName(): string {
  return os.hostname();
}

/** Name of the tmux session this process runs in, or null outside tmux. */
export function tmuxSession(env: Record<string, string | undefined> = process.env): string | null {
  if (!env.TMUX) return null;

  const res = spawnSync("tmux", ["display-message", "-p", "#S"], {
    stdio: ["ignore", "pipe", "ignore"],
    timeout: 2000
  });
  if (res.error || res.status !== 0) return null;

  const name = res.stdout ? res.stdout.toString("utf8").trim() : "";
  return name ? name : null;
}
