export type ParsedArgs = {
  flags: {
    repo?: string;
    config?: string;
    delay?: number;
    json?: boolean;
    mode?: string;
    quiet?: boolean;
  };
  positionals: string[];
};

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

function takeValue(args: string[], flag: string): string {
  const v = args.shift();
  if (v === undefined || v.startsWith("--")) throw new UsageError(`${flag} needs a value`);
  return v;
}

function takeNumber(args: string[], flag: string): number {
  const raw = takeValue(args, flag);
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 0) throw new UsageError(`${flag} must be a non-negative integer, got '${raw}'`);
  return n;
}

export function parseArgs(argv: string[]): ParsedArgs {
  const args = [...argv];
  const flags: ParsedArgs["flags"] = {};
  const positionals: string[] = [];

  for (let a = args.shift(); a !== undefined; a = args.shift()) {
    if (a === "--repo") flags.repo = takeValue(args, a);
    else if (a === "--config" || a === "-c") flags.config = takeValue(args, a);
    else if (a === "--delay") flags.delay = takeNumber(args, a);
    else if (a === "--json") flags.json = true;
    else if (a === "--mode") flags.mode = takeValue(args, a);
    else if (a === "--quiet" || a === "-q") flags.quiet = true;
    else positionals.push(a);
  }

  return { flags, positionals };
}
