import { minimatch } from "minimatch";
import { ConfigError } from "../errors.js";

export type PatternSyntax = "percent" | "glob" | "regex";

export type CompiledPattern = {
  source: string;
  syntax: PatternSyntax;
  /** `relativePath` is the repo-relative form when known; only globs look at it. */
  test(absolutePath: string, relativePath?: string): boolean;
};

const CLASS_MAP: Record<string, string> = {
  a: "A-Za-z",
  c: "\\x00-\\x1f\\x7f",
  d: "0-9",
  l: "a-z",
  p: "!-/:-@\\[-`{-~",
  s: "\\t-\\r ",
  u: "A-Z",
  w: "A-Za-z0-9",
  x: "0-9A-Fa-f"
};

const REGEX_SPECIAL = /[\\^$.*+?()[\]{}|/-]/;

function escapeChar(ch: string): string {
  return REGEX_SPECIAL.test(ch) ? `\\${ch}` : ch;
}

// Body of a `[...]` class for `%x`; upper-case letters are complements and only make sense standalone.
function classBody(letter: string): string | undefined {
  return CLASS_MAP[letter.toLowerCase()];
}

function translateClass(letter: string): string {
  const body = classBody(letter);
  if (body === undefined) return escapeChar(letter);
  return letter === letter.toLowerCase() ? `[${body}]` : `[^${body}]`;
}

/**
 * Translates a percent pattern (`%.txt$`, `^%.git/`, `[%w_]+%.md`) into a RegExp source.
 * `%` escapes or names a character class, `.` is any character, `^` and `$` anchor only at
 * the ends, `-` is a lazy `*`.
 */
export function percentToRegExpSource(pattern: string): string {
  let out = "";
  let i = 0;
  const n = pattern.length;

  if (pattern.startsWith("^")) {
    out += "^";
    i = 1;
  }

  while (i < n) {
    const ch = pattern[i] ?? "";
    if (ch === "%") {
      const next = pattern[i + 1];
      if (next === undefined) throw new ConfigError(`malformed pattern '${pattern}'`, ["pattern ends with '%'"]);
      if (next === "b" || next === "f") {
        throw new ConfigError(`unsupported pattern '${pattern}'`, [`'%${next}' is not supported`]);
      }
      out += /[A-Za-z]/.test(next) ? translateClass(next) : escapeChar(next);
      i += 2;
      continue;
    }
    if (ch === "[") {
      const [set, end] = readSet(pattern, i);
      out += set;
      i = end;
      continue;
    }
    if (ch === "$" && i === n - 1) {
      out += "$";
      i += 1;
      continue;
    }
    if (ch === ".") out += "[\\s\\S]";
    else if (ch === "-") out += "*?";
    else if (ch === "*" || ch === "+" || ch === "?") out += ch;
    else if (ch === "(" || ch === ")") out += ch;
    else out += escapeChar(ch);
    i += 1;
  }
  return out;
}

function readSet(pattern: string, start: number): [string, number] {
  let i = start + 1;
  let body = "";
  let negate = false;
  if (pattern[i] === "^") {
    negate = true;
    i += 1;
  }
  let first = true;
  while (i < pattern.length) {
    const ch = pattern[i] ?? "";
    if (ch === "]" && !first) {
      return [`[${negate ? "^" : ""}${body}]`, i + 1];
    }
    first = false;
    if (ch === "%") {
      const next = pattern[i + 1];
      if (next === undefined) break;
      const cls = /[a-z]/.test(next) ? classBody(next) : undefined;
      body += cls ?? `\\${next}`;
      i += 2;
      continue;
    }
    if (ch === "-" && body.length > 0 && pattern[i + 1] !== "]") {
      body += "-";
    } else {
      body += ch === "\\" || ch === "]" || ch === "[" || ch === "^" ? `\\${ch}` : ch;
    }
    i += 1;
  }
  throw new ConfigError(`malformed pattern '${pattern}'`, ["missing ']'"]);
}

function toRegExp(source: string, original: string): RegExp {
  try {
    return new RegExp(source);
  } catch (e) {
    throw new ConfigError(`invalid pattern '${original}'`, [e instanceof Error ? e.message : String(e)], e);
  }
}

export function compilePattern(raw: string): CompiledPattern {
  if (raw.startsWith("glob:")) {
    const glob = raw.slice("glob:".length);
    const matchBase = !glob.includes("/");
    return {
      source: raw,
      syntax: "glob",
      test: (absolutePath, relativePath) =>
        minimatch(absolutePath, glob, { dot: true, matchBase }) ||
        (relativePath !== undefined && minimatch(relativePath, glob, { dot: true, matchBase }))
    };
  }
  if (raw.startsWith("re:")) {
    const re = toRegExp(raw.slice("re:".length), raw);
    return { source: raw, syntax: "regex", test: (absolutePath) => re.test(absolutePath) };
  }
  const re = toRegExp(percentToRegExpSource(raw), raw);
  return { source: raw, syntax: "percent", test: (absolutePath) => re.test(absolutePath) };
}

export function compilePatterns(raw: readonly string[]): CompiledPattern[] {
  return raw.map(compilePattern);
}

export function matchesAny(patterns: readonly CompiledPattern[], absolutePath: string, relativePath?: string): boolean {
  return patterns.some((p) => p.test(absolutePath, relativePath));
}
