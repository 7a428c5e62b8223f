import * as fsp from "node:fs/promises";
import * as path from "node:path";
import { generateId } from "@toolcrate/shared";
import { ConfigError, LoadError, NotFoundError } from "../errors.js";
import { isMissing } from "../cache/cache-store.js";
import { parseToolConfig, readToolConfig } from "../package/package-builder.js";
import { isRecord, normalizePackagePath } from "../package/package-paths.js";
import { CONFIG_FILE } from "../package/types.js";
import type { ToolConfig, ToolPackage } from "../package/types.js";
import type { Logger } from "../logging/logger.js";
import { CommonJsModuleLoader } from "./module-loader.js";
import type { ModuleLoader } from "./module-loader.js";
import { moduleSearchScope } from "./search-scope.js";
import type { ModuleSearchScope } from "./search-scope.js";

export type LoadedTool = {
  /** The exported implementation symbol, usually a class. */
  implementation: unknown;
  config: ToolConfig;
};

export type ToolLoaderOptions = {
  /** Parent directory for materialized packages. */
  scratchRoot: string;
  scope?: ModuleSearchScope;
  moduleLoader?: ModuleLoader;
  logger?: Logger;
  cwd?: () => string;
};

async function pathKind(target: string): Promise<"file" | "directory" | "missing" | "other"> {
  try {
    const stat = await fsp.stat(target);
    if (stat.isFile()) return "file";
    return stat.isDirectory() ? "directory" : "other";
  } catch (err) {
    if (isMissing(err)) return "missing";
    throw err;
  }
}

function buildKeys(config: ToolConfig, toolName: string): { entry: string; module: string } {
  const entry = config.build?.entry;
  const module = config.build?.module;
  if (typeof entry !== "string" || entry === "" || typeof module !== "string" || module === "") {
    throw new ConfigError(`Config for tool ${toolName} must define build.entry and build.module`);
  }
  return { entry: safeEntry(entry, toolName), module };
}

function safeEntry(entry: string, toolName: string): string {
  const normalized = normalizePackagePath(entry);
  if (!normalized) {
    throw new ConfigError(`Entry "${entry}" of tool ${toolName} escapes the tool directory`);
  }
  return normalized;
}

/** The package's own config.json, or one rebuilt from its metadata. */
export function packageConfig(pkg: ToolPackage): ToolConfig {
  const { metadata } = pkg;
  const raw = pkg.files.get(CONFIG_FILE);
  if (!raw) {
    return {
      name: metadata.name,
      license: metadata.license,
      meta: { author: metadata.author, version: metadata.version },
      build: { entry: metadata.entry, module: metadata.module },
    };
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw.toString("utf-8"));
  } catch (err) {
    throw new ConfigError(`Invalid ${CONFIG_FILE} in package ${metadata.author}/${metadata.name}`, err);
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`${CONFIG_FILE} in package ${metadata.author}/${metadata.name} must be an object`);
  }
  return parseToolConfig(parsed);
}

/**
 * Loads a tool's implementation symbol. The scope push, the load and the pop
 * run without awaiting, so no other load can observe this one's scope entries.
 *
 * The scope only decides where the entry file resolves from. Modules the entry
 * requires itself follow Node's own lookup relative to the entry file, so a
 * packaged tool finds dependencies in the cache root's node_modules and never
 * sees the working directory that was pushed.
 */
export class ToolLoader {
  private readonly scratchRoot: string;
  private readonly scope: ModuleSearchScope;
  private readonly moduleLoader: ModuleLoader;
  private readonly logger?: Logger;
  private readonly cwd: () => string;

  constructor(options: ToolLoaderOptions) {
    this.scratchRoot = path.resolve(options.scratchRoot);
    this.scope = options.scope ?? moduleSearchScope;
    this.moduleLoader = options.moduleLoader ?? new CommonJsModuleLoader(this.scope);
    this.logger = options.logger;
    this.cwd = options.cwd ?? (() => process.cwd());
  }

  async loadFromLocalDir(rootDir: string, name: string): Promise<LoadedTool> {
    const toolDir = path.resolve(rootDir, name);
    if ((await pathKind(toolDir)) !== "directory") {
      throw new NotFoundError(`Local tool not found: ${name}`);
    }
    if ((await pathKind(path.join(toolDir, CONFIG_FILE))) !== "file") {
      throw new NotFoundError(`Config file not found for tool ${name}`);
    }

    const config = await readToolConfig(toolDir);
    const { entry, module } = buildKeys(config, name);
    if ((await pathKind(path.join(toolDir, entry))) !== "file") {
      throw new LoadError(`Entry "${entry}" not found in ${toolDir}`);
    }

    this.logger?.debug("Loading local tool", { name, entry, module });
    return { implementation: this.loadWithinScope(toolDir, entry, module), config };
  }

  async loadFromPackage(pkg: ToolPackage): Promise<LoadedTool> {
    const { metadata } = pkg;
    const label = `${metadata.author}/${metadata.name}@${metadata.version}`;
    const config = packageConfig(pkg);
    const entry = safeEntry(metadata.entry, label);
    if (!pkg.files.has(entry)) {
      throw new LoadError(`Entry "${entry}" is not part of package ${label}`);
    }

    const scratchDir = path.join(this.scratchRoot, generateId());
    try {
      await this.materialize(pkg, scratchDir);
      this.logger?.debug("Loading packaged tool", { tool: label, scratchDir });
      return { implementation: this.loadWithinScope(scratchDir, entry, metadata.module), config };
    } finally {
      await fsp.rm(scratchDir, { recursive: true, force: true });
    }
  }

  private async materialize(pkg: ToolPackage, targetDir: string): Promise<void> {
    for (const [filePath, content] of pkg.files) {
      const normalized = normalizePackagePath(filePath);
      if (!normalized) {
        throw new LoadError(`Package file path "${filePath}" escapes the package root`);
      }
      const target = path.join(targetDir, normalized);
      await fsp.mkdir(path.dirname(target), { recursive: true });
      await fsp.writeFile(target, content);
    }
  }

  private loadWithinScope(toolDir: string, entry: string, symbolName: string): unknown {
    const guard = this.scope.acquire();
    try {
      guard.pushIfAbsent(this.cwd());
      guard.push(toolDir);
      const result = this.moduleLoader.loadSymbol(entry, symbolName);
      if (!result.success) throw result.error;
      return result.symbol;
    } finally {
      guard.release();
    }
  }
}
