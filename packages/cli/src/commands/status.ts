import type { CommandArgs } from "./types.js";

export async function handleStatus(args: CommandArgs): Promise<number | undefined> {
  if (args.positionals[0] !== "status") return;
  const target = args.positionals[1];
  if (!target) return printSummary(args);

  const snap = args.engine.getStatus(target);
  const git = snap.inRepo && snap.relativePath !== undefined ? await args.engine.gitStatus(target) : undefined;

  if (args.flags.json) {
    args.io.writeLine(args.io.out, JSON.stringify({ ...snap, gitStatus: git?.code ?? null }, null, 2));
    return 0;
  }

  const { writeLine, out } = args.io;
  writeLine(out, `Enabled: ${snap.enabled}`);
  writeLine(out, `File: ${snap.path}`);
  writeLine(out, `In git repo: ${snap.inRepo}`);
  if (snap.inRepo) {
    writeLine(out, `Git root: ${snap.repoRoot ?? "unknown"}`);
    writeLine(out, `Relative path: ${snap.relativePath ?? "unknown"}`);
    writeLine(out, `Git status: ${git?.code ?? "clean or unknown"}`);
  }
  writeLine(out, `Would process file: ${snap.wouldProcess}`);
  if (!snap.wouldProcess) writeLine(out, `Reason: ${snap.reason}`);
  return 0;
}

function printSummary(args: CommandArgs): number {
  const { config, engine } = args;
  const repoRoot = engine.getStatus(args.repoDir).repoRoot;
  if (args.flags.json) {
    const body = { enabled: engine.isEnabled(), repoRoot: repoRoot ?? null, delayMs: config.delayMs, triggerMode: config.triggerMode };
    args.io.writeLine(args.io.out, JSON.stringify(body, null, 2));
    return 0;
  }
  const { writeLine, out } = args.io;
  writeLine(out, `Enabled: ${engine.isEnabled()}`);
  writeLine(out, `Git root: ${repoRoot ?? "none"}`);
  writeLine(out, `Delay: ${config.delayMs} ms`);
  writeLine(out, `Trigger mode: ${config.triggerMode}`);
  return 0;
}
