import path from "node:path";
import {
  AutoStageEngine,
  ConfigError,
  createLogger,
  findConfigFile,
  loadConfigFile,
  parseLogLevel,
  RepoLocator,
  resolveConfig,
  type ConfigSnapshot,
  type IStagingGit,
  type Logger
} from "@autostage/sdk";
import { parseArgs, UsageError, type ParsedArgs } from "./args.js";
import type { CommandArgs, CommandIO } from "./commands/types.js";
import { printHelp } from "./commands/help.js";
import { handleAdd } from "./commands/add.js";
import { handleStatus } from "./commands/status.js";
import { handleWatch } from "./commands/watch.js";
import { handleSweep } from "./commands/sweep.js";
import { handleConfig } from "./commands/config.js";
import { createNotifier } from "./notify.js";
import { ChokidarWatchSource } from "./watch/chokidarWatchSource.js";
import type { WatchSource } from "./watch/watchSource.js";

export type RunOptions = {
  cwd?: string;
  stdout?: (s: string) => void;
  stderr?: (s: string) => void;
  git?: IStagingGit;
  createWatchSource?: () => WatchSource;
  signal?: AbortSignal;
  now?: () => Date;
};

function writeLine(write: (s: string) => void, s = "") {
  write(s + "\n");
}

function defaultNow(): Date {
  // Test hook for deterministic output: set AUTOSTAGE_NOW_ISO=...
  const iso = process.env.AUTOSTAGE_NOW_ISO;
  if (iso) {
    const ms = Date.parse(iso);
    if (Number.isFinite(ms)) return new Date(ms);
  }
  return new Date();
}

export async function loadCliConfig(repoDir: string, cwd: string, flags: ParsedArgs["flags"]): Promise<ConfigSnapshot> {
  const overrides: Record<string, unknown> = {};
  if (flags.delay !== undefined) overrides.delayMs = flags.delay;
  if (flags.mode !== undefined) overrides.triggerMode = flags.mode;

  let file = flags.config !== undefined ? path.resolve(cwd, flags.config) : await findConfigFile(repoDir);
  if (file === undefined) {
    const root = new RepoLocator().findRoot(repoDir);
    if (root !== undefined && root !== repoDir) file = await findConfigFile(root);
  }
  return file !== undefined ? await loadConfigFile(file, overrides) : resolveConfig(overrides);
}

export async function runCli(argv: string[], opts: RunOptions = {}): Promise<number> {
  const cwd = opts.cwd ?? process.cwd();
  const out = opts.stdout ?? ((s) => process.stdout.write(s));
  const err = opts.stderr ?? ((s) => process.stderr.write(s));
  const io: CommandIO = { out, err, writeLine };
  const now = opts.now ?? defaultNow;
  const log: Logger = createLogger({
    base: { component: "cli" },
    level: parseLogLevel(process.env.AUTOSTAGE_LOG_LEVEL ?? "silent"),
    sink: (_lvl, line) => writeLine(err, line),
    now
  });

  let parsed: ParsedArgs;
  try {
    parsed = parseArgs(argv);
  } catch (e) {
    if (e instanceof UsageError) {
      writeLine(err, e.message);
      return 2;
    }
    throw e;
  }
  const { flags, positionals } = parsed;
  const cmd = positionals[0] ?? "help";
  if (cmd === "help" || cmd === "--help" || cmd === "-h") return printHelp(io);

  const repoDir = flags.repo !== undefined ? path.resolve(cwd, flags.repo) : cwd;
  let config: ConfigSnapshot;
  try {
    config = await loadCliConfig(repoDir, cwd, flags);
  } catch (e) {
    if (e instanceof ConfigError) {
      writeLine(err, e.message);
      return 2;
    }
    throw e;
  }

  const results: CommandArgs["results"] = [];
  const engine = new AutoStageEngine({ config, git: opts.git, cwd: repoDir, logger: log });
  const notify = createNotifier({ config, quiet: flags.quiet ?? false, out, err, now, relativePath: (p) => engine.relativePath(p) });
  engine.setResultHandler((p, success, message) => {
    results.push({ path: p, success, message });
    notify(p, success, message);
  });

  const args: CommandArgs = {
    repoDir,
    flags,
    positionals,
    engine,
    config,
    log,
    io,
    results,
    createWatchSource: opts.createWatchSource ?? (() => new ChokidarWatchSource()),
    signal: opts.signal
  };

  log.debug("start", { cmd, repoDir });
  const handlers: Array<() => number | undefined | Promise<number | undefined>> = [
    () => handleAdd(args),
    () => handleStatus(args),
    () => handleWatch(args),
    () => handleSweep(args),
    () => handleConfig(args)
  ];

  try {
    for (const h of handlers) {
      const r = await h();
      if (r !== undefined) {
        log.debug("done", { code: r });
        return r;
      }
    }
  } finally {
    engine.cleanup();
  }

  writeLine(err, `unknown command: ${cmd}`);
  log.warn("unknown_command", { cmd });
  return 2;
}
