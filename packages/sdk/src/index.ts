export * from "./errors.js";
export * from "./logging/logger.js";
export * from "./config/config.js";
export * from "./config/loadConfig.js";
export * from "./repo/repoLocator.js";
export * from "./repo/pathResolver.js";
export * from "./git/IStagingGit.js";
export * from "./git/ShellGit.js";
export * from "./policy/patterns.js";
export * from "./policy/policy.js";
export * from "./scheduler/scheduler.js";
export * from "./engine/engine.js";
