import { promises as fs } from "fs";
import os from "os";
import path from "path";
import YAML from "yaml";
import * as z from "zod/v4";
import { errorMessage } from "../logging/logger.js";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const zTopics = z.object({
  start: z.string().min(1).default("runboard-start"),
  main: z.string().min(1).default("runboard-runs"),
  url: z.string().min(1).default("runboard-urls")
});

const zConfigFile = z.object({
  version: z.literal(1).default(1),
  feed: z
    .object({
      base_url: z.string().min(1).default("https://ntfy.sh"),
      topics: zTopics.prefault({}),
      reconnect_interval_ms: z.number().int().min(0).default(5000),
      idle_timeout_ms: z.number().int().min(0).default(0),
      publish_timeout_ms: z.number().int().min(1).default(10_000)
    })
    .prefault({}),
  launcher: z
    .object({
      triggers: z.array(z.string().min(1)).default(["Ray debugger is listening", "CUDA out of memory"]),
      logs_dir: z.string().min(1).default("~/.runboard/logs"),
      url_pattern: z.string().min(1).default("wandb:.*?(https://wandb\\.ai/\\S+)"),
      output_wait_ms: z.number().int().min(0).default(10_000),
      poll_interval_ms: z.number().int().min(1).default(100),
      trigger_context_lines: z.number().int().min(0).default(5),
      crash_context_lines: z.number().int().min(0).default(10),
      kill_grace_ms: z.number().int().min(0).default(1000)
    })
    .prefault({}),
  dashboard: z
    .object({
      state_path: z.string().min(1).default("~/.runboard/state.json"),
      log_path: z.string().min(1).default("~/.runboard/dashboard.log"),
      refresh_interval_ms: z.number().int().min(100).default(3000),
      max_per_category: z.number().int().min(1).max(9).default(6)
    })
    .prefault({})
});


export interface FeedConfig {
  baseUrl: string;
  topics: { start: string; main: string; url: string };
  reconnectIntervalMs: number;
  idleTimeoutMs: number;
  publishTimeoutMs: number;
}

export interface LauncherConfig {
  triggers: string[];
  logsDir: string;
  urlPattern: RegExp;
  outputWaitMs: number;
  pollIntervalMs: number;
  triggerContextLines: number;
  crashContextLines: number;
  killGraceMs: number;
}

export interface DashboardConfig {
  statePath: string;
  logPath: string;
  refreshIntervalMs: number;
  maxPerCategory: number;
}

export interface RunboardConfig {
  source: string | null;
  feed: FeedConfig;
  launcher: LauncherConfig;
  dashboard: DashboardConfig;
}

type Env = Record<string, string | undefined>;

function expandEnvToken(value: string, env: Env): string {
  const trimmed = value.trim();

  const m = /^\$\{([A-Z0-9_]+)\}$/.exec(trimmed) ?? /^\$([A-Z0-9_]+)$/.exec(trimmed);
  if (m) {
    const varName = m[1];
    const v = varName ? env[varName]?.trim() : undefined;
    if (!v) throw new ConfigError(`environment variable referenced by config is not set: ${trimmed}`);
    return v;
  }

  return value;
}

function expandPath(value: string, env: Env): string {
  const expanded = expandEnvToken(value, env);
  if (expanded === "~") return os.homedir();
  if (expanded.startsWith("~/")) return path.join(os.homedir(), expanded.slice(2));
  return path.resolve(expanded);
}

function compilePattern(source: string): RegExp {
  try {
    return new RegExp(source);
  } catch (err) {
    throw new ConfigError(`invalid launcher.url_pattern ${JSON.stringify(source)}: ${errorMessage(err)}`);
  }
}

/** Validates raw (already parsed) config content and resolves paths and patterns. */
export function resolveConfig(raw: unknown, opts: { source?: string | null; env?: Env } = {}): RunboardConfig {
  const env = opts.env ?? process.env;
  const source = opts.source ?? null;
  const parsed = zConfigFile.safeParse(raw ?? {});
  if (!parsed.success) {
    const where = source ? ` at ${source}` : "";
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`).join("; ");
    throw new ConfigError(`invalid config${where}: ${issues}`);
  }
  const cfg = parsed.data;

  const baseUrlOverride = env.RUNBOARD_FEED_URL?.trim();
  const baseUrl = (baseUrlOverride || expandEnvToken(cfg.feed.base_url, env)).replace(/\/+$/, "");

  return {
    source,
    feed: {
      baseUrl,
      topics: { ...cfg.feed.topics },
      reconnectIntervalMs: cfg.feed.reconnect_interval_ms,
      idleTimeoutMs: cfg.feed.idle_timeout_ms,
      publishTimeoutMs: cfg.feed.publish_timeout_ms
    },
    launcher: {
      triggers: [...cfg.launcher.triggers],
      logsDir: expandPath(cfg.launcher.logs_dir, env),
      urlPattern: compilePattern(cfg.launcher.url_pattern),
      outputWaitMs: cfg.launcher.output_wait_ms,
      pollIntervalMs: cfg.launcher.poll_interval_ms,
      triggerContextLines: cfg.launcher.trigger_context_lines,
      crashContextLines: cfg.launcher.crash_context_lines,
      killGraceMs: cfg.launcher.kill_grace_ms
    },
    dashboard: {
      statePath: expandPath(cfg.dashboard.state_path, env),
      logPath: expandPath(cfg.dashboard.log_path, env),
      refreshIntervalMs: cfg.dashboard.refresh_interval_ms,
      maxPerCategory: cfg.dashboard.max_per_category
    }
  };
}

export async function loadConfigFile(filePath: string, env: Env = process.env): Promise<RunboardConfig> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (err) {
    throw new ConfigError(`cannot read config ${filePath}: ${errorMessage(err)}`);
  }
  let parsed: unknown;
  try {
    parsed = YAML.parse(raw);
  } catch (err) {
    throw new ConfigError(`invalid YAML in ${filePath}: ${errorMessage(err)}`);
  }
  return resolveConfig(parsed, { source: filePath, env });
}

/**
 * Lookup order: explicit path, RUNBOARD_CONFIG, ~/.runboard/config.yaml, then
 * built-in defaults. An explicitly named file must exist.
 */
export async function loadConfig(opts: { explicitPath?: string | null; env?: Env } = {}): Promise<RunboardConfig> {
  const env = opts.env ?? process.env;
  const named = opts.explicitPath ?? env.RUNBOARD_CONFIG?.trim() ?? "";
  if (named) return loadConfigFile(path.resolve(named), env);

  const fallback = path.join(os.homedir(), ".runboard", "config.yaml");
  try {
    await fs.access(fallback);
  } catch {
    return resolveConfig({}, { env });
  }
  return loadConfigFile(fallback, env);
}
