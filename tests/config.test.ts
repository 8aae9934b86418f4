import { describe, it, expect } from "vitest";
import { mkdtemp, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { ConfigError, loadConfig, loadConfigFile, resolveConfig } from "../src/config/config.js";

async function writeConfig(text: string): Promise<string> {
  const dir = await mkdtemp(path.join(os.tmpdir(), "runboard-config-"));
  const file = path.join(dir, "config.yaml");
  await writeFile(file, text, "utf8");
  return file;
}

describe("resolveConfig", () => {
  it("fills every section with defaults", () => {
    const cfg = resolveConfig({}, { env: {} });

    expect(cfg.source).toBeNull();
    expect(cfg.feed).toEqual({
      baseUrl: "https://ntfy.sh",
      topics: { start: "runboard-start", main: "runboard-runs", url: "runboard-urls" },
      reconnectIntervalMs: 5000,
      idleTimeoutMs: 0,
      publishTimeoutMs: 10_000
    });
    expect(cfg.launcher.triggers).toEqual(["Ray debugger is listening", "CUDA out of memory"]);
    expect(cfg.launcher.logsDir).toBe(path.join(os.homedir(), ".runboard", "logs"));
    expect(cfg.launcher.urlPattern.source).toBe("wandb:.*?(https:\\/\\/wandb\\.ai\\/\\S+)");
    expect(cfg.dashboard).toEqual({
      statePath: path.join(os.homedir(), ".runboard", "state.json"),
      logPath: path.join(os.homedir(), ".runboard", "dashboard.log"),
      refreshIntervalMs: 3000,
      maxPerCategory: 6
    });
  });

  it("keeps defaults for keys a partial section leaves out", () => {
    const cfg = resolveConfig({ feed: { topics: { main: "lab-runs" } }, dashboard: { max_per_category: 9 } }, { env: {} });
    expect(cfg.feed.topics).toEqual({ start: "runboard-start", main: "lab-runs", url: "runboard-urls" });
    expect(cfg.feed.reconnectIntervalMs).toBe(5000);
    expect(cfg.dashboard.maxPerCategory).toBe(9);
    expect(cfg.dashboard.refreshIntervalMs).toBe(3000);
  });

  it("lets RUNBOARD_FEED_URL override the base url and strips trailing slashes", () => {
    const cfg = resolveConfig({ feed: { base_url: "https://feed.example/" } }, { env: { RUNBOARD_FEED_URL: "http://localhost:8080/" } });
    expect(cfg.feed.baseUrl).toBe("http://localhost:8080");
    expect(resolveConfig({ feed: { base_url: "https://feed.example//" } }, { env: {} }).feed.baseUrl).toBe("https://feed.example");
  });

  it("expands environment references in urls and paths", () => {
    const cfg = resolveConfig(
      { feed: { base_url: "${FEED_URL}" }, dashboard: { state_path: "$STATE_FILE" } },
      { env: { FEED_URL: "http://feed.local", STATE_FILE: "/srv/runboard/state.json" } }
    );
    expect(cfg.feed.baseUrl).toBe("http://feed.local");
    expect(cfg.dashboard.statePath).toBe("/srv/runboard/state.json");
  });

  it("fails on an unset environment reference", () => {
    expect(() => resolveConfig({ dashboard: { state_path: "${MISSING_VAR}" } }, { env: {} })).toThrow(
      "environment variable referenced by config is not set: ${MISSING_VAR}"
    );
  });

  it("reports schema violations with their path", () => {
    expect(() => resolveConfig({ dashboard: { max_per_category: 12 } }, { env: {}, source: "/etc/rb.yaml" })).toThrow(
      /^invalid config at \/etc\/rb\.yaml: dashboard\.max_per_category: /
    );
    expect(() => resolveConfig({ version: 2 }, { env: {} })).toThrow(ConfigError);
  });

  it("rejects an invalid url pattern", () => {
    expect(() => resolveConfig({ launcher: { url_pattern: "(" } }, { env: {} })).toThrow(/^invalid launcher\.url_pattern "\("/);
  });
});

describe("loadConfig", () => {
  it("reads a YAML file", async () => {
    const file = await writeConfig("feed:\n  topics:\n    start: lab-start\nlauncher:\n  triggers: [NaN loss]\n");
    const cfg = await loadConfigFile(file, {});
    expect(cfg.source).toBe(file);
    expect(cfg.feed.topics.start).toBe("lab-start");
    expect(cfg.launcher.triggers).toEqual(["NaN loss"]);
  });

  it("treats an empty file as all defaults", async () => {
    const cfg = await loadConfigFile(await writeConfig(""), {});
    expect(cfg.dashboard.maxPerCategory).toBe(6);
  });

  it("reports invalid YAML", async () => {
    const file = await writeConfig("feed: [unclosed\n");
    await expect(loadConfigFile(file, {})).rejects.toThrow(`invalid YAML in ${file}`);
  });

  it("prefers an explicit path, then RUNBOARD_CONFIG", async () => {
    const explicit = await writeConfig("dashboard:\n  max_per_category: 3\n");
    const fromEnv = await writeConfig("dashboard:\n  max_per_category: 4\n");

    expect((await loadConfig({ explicitPath: explicit, env: { RUNBOARD_CONFIG: fromEnv } })).dashboard.maxPerCategory).toBe(3);
    expect((await loadConfig({ env: { RUNBOARD_CONFIG: fromEnv } })).dashboard.maxPerCategory).toBe(4);
  });

  it("fails when a named file is missing", async () => {
    await expect(loadConfig({ explicitPath: "/nonexistent/runboard.yaml", env: {} })).rejects.toThrow(
      /^cannot read config \/nonexistent\/runboard\.yaml: /
    );
  });

  it("accepts the example config shipped with the project", async () => {
    const cfg = await loadConfigFile(path.resolve("config/runboard.example.yaml"), {});
    expect(cfg.feed.baseUrl).toBe("https://ntfy.sh");
    expect(cfg.launcher.urlPattern.exec("wandb: 🚀 View run at https://wandb.ai/a/b/runs/c1")?.[1]).toBe("https://wandb.ai/a/b/runs/c1");
  });
});
