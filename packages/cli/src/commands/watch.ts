import type { TriggerMode } from "@autostage/sdk";
import { createRepoIgnore } from "../watch/chokidarWatchSource.js";
import { EventTranslator } from "../watch/eventTranslator.js";
import type { CommandArgs } from "./types.js";

function waitForStop(signal: AbortSignal | undefined): Promise<void> {
  return new Promise((resolve) => {
    if (signal) {
      if (signal.aborted) return resolve();
      signal.addEventListener("abort", () => resolve(), { once: true });
      return;
    }
    const onSignal = () => {
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
      resolve();
    };
    process.on("SIGINT", onSignal);
    process.on("SIGTERM", onSignal);
  });
}

export async function handleWatch(args: CommandArgs): Promise<number | undefined> {
  if (args.positionals[0] !== "watch") return;
  const mode: TriggerMode = args.config.triggerMode;
  const rootDir = args.engine.getStatus(args.repoDir).repoRoot ?? args.repoDir;

  const translator = new EventTranslator(mode, (p) => args.engine.requestAdd(p));
  const source = args.createWatchSource();
  source.onEvent((e) => {
    args.log.debug("event", { type: e.type, path: e.path });
    translator.handle(e);
  });
  source.onError((e) => {
    args.log.error("watch_error", { error: e.message });
    args.io.writeLine(args.io.err, `watch error: ${e.message}`);
  });

  await source.start({ rootDir, ignore: createRepoIgnore(rootDir) });
  if (!args.flags.quiet) args.io.writeLine(args.io.out, `watching ${rootDir} (mode: ${mode})`);

  await waitForStop(args.signal);
  await source.stop();
  args.engine.cleanup();
  return 0;
}
