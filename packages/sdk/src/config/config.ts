import fs from "node:fs";
import { Ajv, type ErrorObject, type SchemaObject, type ValidateFunction } from "ajv";
import { ConfigError } from "../errors.js";
import { compilePatterns, type CompiledPattern } from "../policy/patterns.js";
import type { ActiveLogLevel } from "../logging/logger.js";

export type TriggerMode = "created" | "all" | "created-then-saved";

export type AutoStageConfig = {
  enabled: boolean;
  excludePatterns: string[];
  /** Empty means every non-excluded file is eligible. */
  includePatterns: string[];
  /** 0 disables the size check. */
  maxFileSizeBytes: number;
  /** Prefixes of repo-relative paths; empty means anywhere in the repository. */
  restrictToDirs: string[];
  delayMs: number;
  showNotifications: boolean;
  notificationLevel: ActiveLogLevel;
  triggerMode: TriggerMode;
  gitTimeoutMs: number;
};

export type AutoStageConfigInput = Partial<AutoStageConfig>;

export type ConfigSnapshot = Readonly<Omit<AutoStageConfig, "excludePatterns" | "includePatterns" | "restrictToDirs">> & {
  readonly excludePatterns: readonly string[];
  readonly includePatterns: readonly string[];
  readonly restrictToDirs: readonly string[];
  readonly compiled: {
    readonly exclude: readonly CompiledPattern[];
    readonly include: readonly CompiledPattern[];
  };
};

export const DEFAULT_CONFIG: Readonly<AutoStageConfig> = Object.freeze({
  enabled: true,
  excludePatterns: ["%.tmp$", "%.log$", "%.swp$", "%.swo$", "%.DS_Store$", "^%.git/", "node_modules/", "%.min%.js$", "%.min%.css$"],
  includePatterns: [],
  maxFileSizeBytes: 10 * 1024 * 1024,
  restrictToDirs: [],
  delayMs: 500,
  showNotifications: true,
  notificationLevel: "info",
  triggerMode: "created",
  gitTimeoutMs: 30_000
});

let validator: ValidateFunction<AutoStageConfigInput> | undefined;

function getValidator(): ValidateFunction<AutoStageConfigInput> {
  if (validator) return validator;
  const schemaUrl = new URL("../../schemas/config.schema.json", import.meta.url);
  const schema: SchemaObject = JSON.parse(fs.readFileSync(schemaUrl, "utf8"));
  const ajv = new Ajv({ allErrors: true, strict: false });
  validator = ajv.compile<AutoStageConfigInput>(schema);
  return validator;
}

function formatAjvError(e: ErrorObject): string {
  const where = e.instancePath || "/";
  if (e.keyword === "additionalProperties" && typeof e.params.additionalProperty === "string") {
    return `${where}: unknown option '${e.params.additionalProperty}'`;
  }
  return `${where}: ${e.message ?? e.keyword}`;
}

export function validateConfig(input: unknown): AutoStageConfigInput {
  const validate = getValidator();
  if (validate(input)) return input;
  throw new ConfigError("invalid configuration", (validate.errors ?? []).map(formatAjvError));
}

function definedEntries(input: AutoStageConfigInput): AutoStageConfigInput {
  return Object.fromEntries(Object.entries(input).filter(([, v]) => v !== undefined));
}

function freezeSnapshot(cfg: AutoStageConfig, compiled: ConfigSnapshot["compiled"]): ConfigSnapshot {
  return Object.freeze({
    ...cfg,
    excludePatterns: Object.freeze([...cfg.excludePatterns]),
    includePatterns: Object.freeze([...cfg.includePatterns]),
    restrictToDirs: Object.freeze([...cfg.restrictToDirs]),
    compiled: Object.freeze({ exclude: Object.freeze(compiled.exclude), include: Object.freeze(compiled.include) })
  });
}

/**
 * Merges `input` over the defaults (arrays replace, they are not concatenated), validates the
 * result and compiles the pattern lists once.
 */
export function resolveConfig(input: unknown = {}): ConfigSnapshot {
  const valid = validateConfig(input ?? {});
  const merged: AutoStageConfig = {
    ...DEFAULT_CONFIG,
    excludePatterns: [...DEFAULT_CONFIG.excludePatterns],
    includePatterns: [...DEFAULT_CONFIG.includePatterns],
    restrictToDirs: [...DEFAULT_CONFIG.restrictToDirs],
    ...definedEntries(valid)
  };
  return freezeSnapshot(merged, {
    exclude: compilePatterns(merged.excludePatterns),
    include: compilePatterns(merged.includePatterns)
  });
}

export function withEnabled(snapshot: ConfigSnapshot, enabled: boolean): ConfigSnapshot {
  if (snapshot.enabled === enabled) return snapshot;
  return Object.freeze({ ...snapshot, enabled });
}

/** Plain-data view of a snapshot, without the compiled patterns. */
export function toPlainConfig(snapshot: ConfigSnapshot): AutoStageConfig {
  const { compiled: _compiled, ...rest } = snapshot;
  return {
    ...rest,
    excludePatterns: [...rest.excludePatterns],
    includePatterns: [...rest.includePatterns],
    restrictToDirs: [...rest.restrictToDirs]
  };
}
