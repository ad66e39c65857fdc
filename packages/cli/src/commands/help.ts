import type { CommandIO } from "./types.js";

export function printHelp(io: CommandIO): number {
  const { writeLine, out } = io;
  writeLine(out, "git autostage <command> [--repo <dir>] [--config <file>] [--delay <ms>] [--json] [--quiet]");
  writeLine(out, "");
  writeLine(out, "Commands:");
  writeLine(out, "  add <path...>          stage new files now (after the configured delay)");
  writeLine(out, "  status [path]          show whether a file would be staged and why, or the repository summary");
  writeLine(out, "  watch [--mode <m>]     stage files as they appear (modes: created, all, created-then-saved)");
  writeLine(out, "  sweep [dir]            request staging for every file under dir");
  writeLine(out, "  config                 print the effective configuration");
  writeLine(out, "");
  writeLine(out, "Config is read from --config, or .autostage.yaml/.yml/.json in --repo or the repository root.");
  return 0;
}
