import { createLogger, type ConfigSnapshot } from "@autostage/sdk";

export type NotifierOptions = {
  config: ConfigSnapshot;
  quiet: boolean;
  out: (s: string) => void;
  err: (s: string) => void;
  now: () => Date;
  relativePath: (p: string) => string | undefined;
};

/** Renders staging results as log lines: successes at the configured level, failures as errors. */
export function createNotifier(opts: NotifierOptions): (path: string, success: boolean, message: string) => void {
  const enabled = opts.config.showNotifications && !opts.quiet;
  const log = createLogger({
    level: enabled ? "debug" : "silent",
    json: false,
    base: { component: "autostage" },
    now: opts.now,
    sink: (lvl, line) => (lvl === "error" ? opts.err : opts.out)(line + "\n")
  });

  return (p, success, message) => {
    if (success) log.log(opts.config.notificationLevel, `Added to git: ${opts.relativePath(p) ?? p}`);
    else log.error(`Failed to add ${p}: ${message}`);
  };
}
