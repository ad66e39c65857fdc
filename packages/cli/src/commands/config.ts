import { stringify as yamlStringify } from "yaml";
import { toPlainConfig } from "@autostage/sdk";
import type { CommandArgs } from "./types.js";

export function handleConfig(args: CommandArgs): number | undefined {
  if (args.positionals[0] !== "config") return;
  const plain = toPlainConfig(args.config);
  if (args.flags.json) args.io.writeLine(args.io.out, JSON.stringify(plain, null, 2));
  else args.io.out(yamlStringify(plain));
  return 0;
}
