import path from "node:path";
import fg from "fast-glob";
import type { CommandArgs } from "./types.js";

export const SWEEP_IGNORE = ["**/.git/**", "**/node_modules/**"];

export async function listSweepFiles(dir: string): Promise<string[]> {
  const files = await fg(["**/*"], { cwd: dir, absolute: true, onlyFiles: true, dot: true, ignore: SWEEP_IGNORE });
  return files.sort();
}

export async function handleSweep(args: CommandArgs): Promise<number | undefined> {
  if (args.positionals[0] !== "sweep") return;
  const dir = path.resolve(args.repoDir, args.positionals[1] ?? ".");

  const files = await listSweepFiles(dir);
  args.log.debug("sweep", { dir, files: files.length });
  for (const f of files) args.engine.requestAdd(f);
  await args.engine.whenIdle();

  const added = args.results.filter((r) => r.success).length;
  const failed = args.results.length - added;
  if (args.flags.json) {
    args.io.writeLine(args.io.out, JSON.stringify({ scanned: files.length, added, failed }, null, 2));
  } else if (!args.flags.quiet) {
    args.io.writeLine(args.io.out, `scanned: ${files.length}, added: ${added}, failed: ${failed}`);
  }
  return failed > 0 ? 1 : 0;
}
