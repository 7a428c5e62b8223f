import * as os from "node:os";
import * as path from "node:path";
import { isRecord } from "../package/package-paths.js";
import type { LogFormat, LogLevel, ToolcrateConfig } from "./types.js";

export const TOOLCRATE_HOME = path.join(os.homedir(), ".toolcrate");

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];
export const LOG_FORMATS: readonly LogFormat[] = ["json", "pretty"];

export const DEFAULT_CONFIG: ToolcrateConfig = {
  registry: {
    baseUrl: "http://127.0.0.1:8000",
    timeoutMs: 30_000,
  },
  cache: {
    dir: path.join(TOOLCRATE_HOME, "cache"),
    extension: "tool",
  },
  tools: {
    localDir: path.join(TOOLCRATE_HOME, "tools"),
  },
  dependencies: {
    manifest: "requirements.txt",
  },
  logging: {
    level: "info",
    format: "pretty",
  },
};

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function isLogFormat(value: unknown): value is LogFormat {
  return LOG_FORMATS.some((format) => format === value);
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> | undefined {
  const value = raw[key];
  return isRecord(value) ? value : undefined;
}

function nonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

export function validateConfig(raw: Record<string, unknown>): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  const registry = section(raw, "registry");
  if (registry) {
    if (registry.baseUrl !== undefined) {
      if (typeof registry.baseUrl !== "string" || !URL.canParse(registry.baseUrl)) {
        errors.push("registry.baseUrl must be an absolute URL");
      }
    }
    if (
      registry.timeoutMs !== undefined &&
      (typeof registry.timeoutMs !== "number" || !Number.isInteger(registry.timeoutMs) || registry.timeoutMs < 1)
    ) {
      errors.push("registry.timeoutMs must be a positive integer");
    }
  }

  const cache = section(raw, "cache");
  if (cache) {
    if (cache.dir !== undefined && !nonEmptyString(cache.dir)) {
      errors.push("cache.dir must be a non-empty string");
    }
    if (cache.extension !== undefined && (!nonEmptyString(cache.extension) || /[./\\]/.test(cache.extension))) {
      errors.push("cache.extension must be a non-empty string without dots or slashes");
    }
  }

  const tools = section(raw, "tools");
  if (tools && tools.localDir !== undefined && !nonEmptyString(tools.localDir)) {
    errors.push("tools.localDir must be a non-empty string");
  }

  const dependencies = section(raw, "dependencies");
  if (dependencies && dependencies.manifest !== undefined && !nonEmptyString(dependencies.manifest)) {
    errors.push("dependencies.manifest must be a non-empty string");
  }

  const logging = section(raw, "logging");
  if (logging) {
    if (logging.level !== undefined && !isLogLevel(logging.level)) {
      errors.push("logging.level must be debug, info, warn, error, or silent");
    }
    if (logging.format !== undefined && !isLogFormat(logging.format)) {
      errors.push("logging.format must be json or pretty");
    }
  }

  return { valid: errors.length === 0, errors };
}

/** Overlays a validated raw config onto `base`. Unknown keys are ignored. */
export function mergeConfig(base: ToolcrateConfig, override: Record<string, unknown>): ToolcrateConfig {
  const result = structuredClone(base);

  const registry = section(override, "registry");
  if (registry) {
    if (typeof registry.baseUrl === "string") result.registry.baseUrl = registry.baseUrl;
    if (typeof registry.timeoutMs === "number") result.registry.timeoutMs = registry.timeoutMs;
  }
  const cache = section(override, "cache");
  if (cache) {
    if (nonEmptyString(cache.dir)) result.cache.dir = cache.dir;
    if (nonEmptyString(cache.extension)) result.cache.extension = cache.extension;
  }
  const tools = section(override, "tools");
  if (tools && nonEmptyString(tools.localDir)) {
    result.tools.localDir = tools.localDir;
  }
  const dependencies = section(override, "dependencies");
  if (dependencies && nonEmptyString(dependencies.manifest)) {
    result.dependencies.manifest = dependencies.manifest;
  }
  const logging = section(override, "logging");
  if (logging) {
    if (isLogLevel(logging.level)) result.logging.level = logging.level;
    if (isLogFormat(logging.format)) result.logging.format = logging.format;
  }

  return result;
}
