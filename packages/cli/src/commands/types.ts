import type { AutoStageEngine, ConfigSnapshot, Logger } from "@autostage/sdk";
import type { ParsedArgs } from "../args.js";
import type { WatchSource } from "../watch/watchSource.js";

export type CommandIO = {
  out: (s: string) => void;
  err: (s: string) => void;
  writeLine: (write: (s: string) => void, s?: string) => void;
};

export type CommandArgs = {
  repoDir: string;
  flags: ParsedArgs["flags"];
  positionals: string[];
  engine: AutoStageEngine;
  config: ConfigSnapshot;
  log: Logger;
  io: CommandIO;
  /** Collected `onResult` outcomes of this run. */
  results: Array<{ path: string; success: boolean; message: string }>;
  createWatchSource: () => WatchSource;
  /** Aborting it ends `watch`; defaults to SIGINT/SIGTERM. */
  signal?: AbortSignal;
};
