export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export interface LauncherArgs {
  help: boolean;
  configPath: string | null;
  triggers: string[];
  command: string[];
}

export function launcherUsage(): string {
  return [
    "usage:",
    "  runboard-notify [--config <path>] [--trigger <phrase>]... [--] <command> [args...]",
    "  runboard-notify --triggers <phrase>... -- <command> [args...]",
    "",
    "Runs <command>, watching its output for trigger phrases, and reports",
    "start, trigger, crash and completion events to the dashboard feed.",
    ""
  ].join("\n");
}

/**
 * Options are read until the first non-option argument (or `--`); that
 * argument and everything after it is the wrapped command, verbatim.
 */
export function parseLauncherArgs(argv: string[]): LauncherArgs {
  const out: LauncherArgs = { help: false, configPath: null, triggers: [], command: [] };

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (a === undefined) continue;

    if (a === "--") {
      out.command = argv.slice(i + 1);
      break;
    }
    if (a === "--help" || a === "-h") {
      out.help = true;
      return out;
    }
    if (a === "--config" || a === "--trigger" || a === "-t") {
      const next = argv[i + 1];
      if (next === undefined || next === "--") throw new UsageError(`missing value for ${a}`);
      if (a === "--config") out.configPath = next;
      else out.triggers.push(next);
      i++;
      continue;
    }
    if (a === "--triggers") {
      const end = argv.indexOf("--", i + 1);
      if (end < 0) throw new UsageError("--triggers takes phrases up to a closing `--` before the command");
      const phrases = argv.slice(i + 1, end);
      if (!phrases.length) throw new UsageError("--triggers needs at least one phrase");
      out.triggers.push(...phrases);
      out.command = argv.slice(end + 1);
      break;
    }
    if (a.startsWith("-") && a.length > 1) {
      throw new UsageError(`unknown option: ${a} (put the command after \`--\` if it starts with a dash)`);
    }

    out.command = argv.slice(i);
    break;
  }

  if (!out.help && !out.command.length) throw new UsageError("no command specified");
  return out;
}

export interface DashboardArgs {
  help: boolean;
  configPath: string | null;
}

export function dashboardUsage(): string {
  return ["usage:", "  runboard-dashboard [--config <path>]", ""].join("\n");
}

export function parseDashboardArgs(argv: string[]): DashboardArgs {
  const out: DashboardArgs = { help: false, configPath: null };
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (a === "--help" || a === "-h") {
      out.help = true;
      continue;
    }
    if (a === "--config") {
      const next = argv[i + 1];
      if (next === undefined) throw new UsageError("missing value for --config");
      out.configPath = next;
      i++;
      continue;
    }
    throw new UsageError(`unexpected arg: ${a ?? ""}`);
  }
  return out;
}
