import * as fs from "node:fs";
import * as path from "node:path";
import { envInt, envPath, envString } from "@toolcrate/shared";
import { ConfigError } from "../errors.js";
import { isRecord } from "../package/package-paths.js";
import { DEFAULT_CONFIG, TOOLCRATE_HOME, isLogLevel, mergeConfig, validateConfig } from "./schema.js";
import type { ToolcrateConfig, ConfigSource } from "./types.js";

const CONFIG_FILE = "config.json";
const PROJECT_CONFIG_DIR = ".toolcrate";

export type LoadResult = {
  config: ToolcrateConfig;
  sources: ConfigSource[];
  errors: string[];
};

export type LoadConfigOptions = {
  /** Directory holding the global config file. Defaults to `~/.toolcrate`. */
  globalDir?: string;
};

export function loadConfig(projectDir?: string, options: LoadConfigOptions = {}): LoadResult {
  const sources: ConfigSource[] = ["default"];
  const errors: string[] = [];
  let config = structuredClone(DEFAULT_CONFIG);

  const globalPath = path.join(options.globalDir ?? TOOLCRATE_HOME, CONFIG_FILE);
  const globalRaw = readJsonObject(globalPath, errors, "global");
  if (globalRaw) {
    const validation = validateConfig(globalRaw);
    if (validation.valid) {
      config = mergeConfig(config, globalRaw);
      sources.push("global");
    } else {
      errors.push(...validation.errors.map((e) => `[global] ${e}`));
    }
  }

  if (projectDir) {
    const projectPath = path.join(projectDir, PROJECT_CONFIG_DIR, CONFIG_FILE);
    const projectRaw = readJsonObject(projectPath, errors, "project");
    if (projectRaw) {
      const validation = validateConfig(projectRaw);
      if (validation.valid) {
        config = mergeConfig(config, projectRaw);
        sources.push("project");
      } else {
        errors.push(...validation.errors.map((e) => `[project] ${e}`));
      }
    }
  }

  if (hasEnvOverrides()) {
    config = applyEnvOverrides(config, errors);
    sources.push("env");
  }

  return { config, sources, errors };
}

export function getConfigValue(config: ToolcrateConfig, key: string): unknown {
  let current: unknown = config;
  for (const part of key.split(".")) {
    if (!isRecord(current)) return undefined;
    current = current[part];
  }
  return current;
}

export function setConfigValue(config: ToolcrateConfig, key: string, value: unknown): ToolcrateConfig {
  const existing = getConfigValue(DEFAULT_CONFIG, key);
  if (existing === undefined || (existing !== null && typeof existing === "object")) {
    throw new ConfigError(`Unknown config key: ${key}`);
  }
  const parts = key.split(".");
  const last = parts.pop();
  if (!last) return structuredClone(config);

  const result: Record<string, unknown> = structuredClone(config);
  let current = result;
  for (const part of parts) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }
  current[last] = value;

  const validation = validateConfig(result);
  if (!validation.valid) {
    throw new ConfigError(validation.errors.join("; "));
  }
  return mergeConfig(config, result);
}

function readJsonObject(filePath: string, errors: string[], label: string): Record<string, unknown> | null {
  if (!fs.existsSync(filePath)) return null;
  const content = fs.readFileSync(filePath, "utf-8").trim();
  if (!content) return null;
  try {
    const parsed: unknown = JSON.parse(content);
    if (isRecord(parsed)) return parsed;
    errors.push(`[${label}] ${filePath} must contain a JSON object`);
  } catch (err) {
    errors.push(`[${label}] ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return null;
}

function applyEnvOverrides(config: ToolcrateConfig, errors: string[]): ToolcrateConfig {
  const result = structuredClone(config);

  const registryUrl = envString("TOOLCRATE_REGISTRY_URL");
  if (registryUrl) {
    if (URL.canParse(registryUrl)) {
      result.registry.baseUrl = registryUrl;
    } else {
      errors.push("[env] TOOLCRATE_REGISTRY_URL must be an absolute URL");
    }
  }
  const timeoutMs = envInt("TOOLCRATE_REGISTRY_TIMEOUT_MS", 0);
  if (timeoutMs > 0) result.registry.timeoutMs = timeoutMs;

  const cacheDir = envPath("TOOLCRATE_CACHE_DIR");
  if (cacheDir) result.cache.dir = cacheDir;

  const toolsDir = envPath("TOOLCRATE_TOOLS_DIR");
  if (toolsDir) result.tools.localDir = toolsDir;

  const level = envString("TOOLCRATE_LOG_LEVEL");
  if (level) {
    if (isLogLevel(level)) {
      result.logging.level = level;
    } else {
      errors.push("[env] TOOLCRATE_LOG_LEVEL must be debug, info, warn, error, or silent");
    }
  }

  return result;
}

function hasEnvOverrides(): boolean {
  return [
    "TOOLCRATE_REGISTRY_URL",
    "TOOLCRATE_REGISTRY_TIMEOUT_MS",
    "TOOLCRATE_CACHE_DIR",
    "TOOLCRATE_TOOLS_DIR",
    "TOOLCRATE_LOG_LEVEL",
  ].some((key) => envString(key) !== "");
}
