export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type ActiveLogLevel = Exclude<LogLevel, "silent">;

const ORDER: Record<ActiveLogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export type LogEvent = {
  time: string;
  level: ActiveLogLevel;
  msg: string;
  [k: string]: unknown;
};

export type LogSink = (level: ActiveLogLevel, line: string) => void;

export type Logger = {
  child(fields: Record<string, unknown>): Logger;
  log(level: ActiveLogLevel, msg: string, fields?: Record<string, unknown>): void;
  debug(msg: string, fields?: Record<string, unknown>): void;
  info(msg: string, fields?: Record<string, unknown>): void;
  warn(msg: string, fields?: Record<string, unknown>): void;
  error(msg: string, fields?: Record<string, unknown>): void;
};

export type LoggerOptions = {
  level?: LogLevel;
  base?: Record<string, unknown>;
  json?: boolean;
  sink?: LogSink;
  now?: () => Date;
};

export function parseLogLevel(s: string | undefined): LogLevel {
  const v = String(s ?? "").trim().toLowerCase();
  if (v === "debug" || v === "info" || v === "warn" || v === "error" || v === "silent") return v;
  return "info";
}

const consoleSink: LogSink = (lvl, line) => {
  if (lvl === "error") console.error(line);
  else console.log(line);
};

export function createLogger(opts?: LoggerOptions): Logger {
  const level: LogLevel = opts?.level ?? parseLogLevel(process.env.AUTOSTAGE_LOG_LEVEL);
  const base: Record<string, unknown> = { ...(opts?.base ?? {}) };
  const json = opts?.json ?? String(process.env.AUTOSTAGE_LOG_FORMAT ?? "").toLowerCase() === "json";
  const sink = opts?.sink ?? consoleSink;
  const now = opts?.now ?? (() => new Date());

  function shouldLog(lvl: ActiveLogLevel): boolean {
    if (level === "silent") return false;
    return ORDER[lvl] >= ORDER[level];
  }

  function emit(lvl: ActiveLogLevel, msg: string, fields?: Record<string, unknown>) {
    if (!shouldLog(lvl)) return;
    const ev: LogEvent = { time: now().toISOString(), level: lvl, msg, ...base, ...(fields ?? {}) };
    if (json) {
      sink(lvl, JSON.stringify(ev));
      return;
    }
    const parts: string[] = [];
    parts.push(ev.time);
    parts.push(lvl.toUpperCase());
    if (ev.component) parts.push(`[${String(ev.component)}]`);
    parts.push(msg);
    const { time: _time, level: _level, msg: _msg, component: _component, ...rest } = ev;
    const tail = Object.keys(rest).length ? ` ${JSON.stringify(rest)}` : "";
    sink(lvl, parts.join(" ") + tail);
  }

  function child(fields: Record<string, unknown>): Logger {
    return createLogger({ level, base: { ...base, ...fields }, json, sink, now });
  }

  return {
    child,
    log: emit,
    debug: (msg, fields) => emit("debug", msg, fields),
    info: (msg, fields) => emit("info", msg, fields),
    warn: (msg, fields) => emit("warn", msg, fields),
    error: (msg, fields) => emit("error", msg, fields)
  };
}

export function createSilentLogger(): Logger {
  return createLogger({ level: "silent" });
}
