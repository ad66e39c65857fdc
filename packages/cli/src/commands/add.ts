import type { CommandArgs } from "./types.js";

export async function handleAdd(args: CommandArgs): Promise<number | undefined> {
  if (args.positionals[0] !== "add") return;
  const paths = args.positionals.slice(1);
  if (paths.length === 0) {
    args.io.writeLine(args.io.err, "usage: git autostage add <path...>");
    return 2;
  }

  for (const p of paths) args.engine.requestAdd(p);
  await args.engine.whenIdle();

  if (args.flags.json) {
    args.io.writeLine(args.io.out, JSON.stringify(args.results, null, 2));
  }
  return args.results.some((r) => !r.success) ? 1 : 0;
}
