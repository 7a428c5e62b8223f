import * as fsp from "node:fs/promises";
import * as path from "node:path";
import { CacheStore, isMissing } from "../cache/cache-store.js";
import type { ToolcrateConfig } from "../config/types.js";
import { DependencyInstaller } from "../dependencies/dependency-installer.js";
import { NpmInstaller } from "../dependencies/npm-installer.js";
import { NotFoundError } from "../errors.js";
import { ToolLoader } from "../loader/tool-loader.js";
import type { LoadedTool } from "../loader/tool-loader.js";
import { createLogger, errorData } from "../logging/logger.js";
import type { Logger } from "../logging/logger.js";
import { buildPayload, readToolConfig } from "../package/package-builder.js";
import { loadPackage, savePackage } from "../package/package-codec.js";
import { CONFIG_FILE } from "../package/types.js";
import type { ToolConfig, ToolPayload } from "../package/types.js";
import { RegistryClient } from "../registry/registry-client.js";
import type { AvailableTool } from "../registry/registry-client.js";

export const SCRATCH_DIR = ".scratch";

export type ToolRef = {
  author: string;
  name: string;
  version: string;
};

export type LoadToolRequest =
  | { local: true; name: string }
  | { local?: false; author: string; name: string; version?: string | null };

export type ToolManagerDeps = {
  cache: CacheStore;
  registry: RegistryClient;
  loader: ToolLoader;
  dependencies: DependencyInstaller;
  localToolsDir: string;
  logger: Logger;
};

/**
 * Entry point for packaging, fetching, caching and loading tools.
 * Structural failures are logged once here with the tool they concern and rethrown.
 */
export class ToolManager {
  readonly cache: CacheStore;
  private readonly registry: RegistryClient;
  private readonly loader: ToolLoader;
  private readonly dependencies: DependencyInstaller;
  private readonly localToolsDir: string;
  private readonly logger: Logger;

  constructor(deps: ToolManagerDeps) {
    this.cache = deps.cache;
    this.registry = deps.registry;
    this.loader = deps.loader;
    this.dependencies = deps.dependencies;
    this.localToolsDir = path.resolve(deps.localToolsDir);
    this.logger = deps.logger;
  }

  packageTool(folder: string): Promise<ToolPayload> {
    return buildPayload(folder);
  }

  uploadTool(payload: ToolPayload): Promise<void> {
    return this.registry.upload(payload);
  }

  async downloadTool(author: string, name: string, version?: string | null): Promise<ToolRef> {
    const resolved = await this.cache.resolveVersion(author, name, version);
    if (resolved && (await this.cache.has(author, name, resolved))) {
      this.logger.info("Using cached tool", { author, name, version: resolved });
      return { author, name, version: resolved };
    }

    const pkg = await this.registry.download(author, name, resolved);
    const actual = pkg.metadata.version;
    await savePackage(pkg, this.cache.cachePath(author, name, actual));
    this.logger.info("Downloaded and cached tool", { author, name, version: actual });

    if (!(await this.dependencies.isSatisfied(pkg))) {
      await this.dependencies.install(pkg);
    }
    return { author, name, version: actual };
  }

  async loadTool(request: LoadToolRequest): Promise<LoadedTool> {
    let version = request.local ? null : (request.version ?? null);
    try {
      if (request.local) {
        return await this.loader.loadFromLocalDir(this.localToolsDir, request.name);
      }
      const ref = await this.downloadTool(request.author, request.name, request.version);
      version = ref.version;
      const pkg = await loadPackage(this.cache.cachePath(ref.author, ref.name, ref.version));
      return await this.loader.loadFromPackage(pkg);
    } catch (err) {
      const tool = request.local ? request.name : `${request.author}/${request.name}`;
      this.logger.error("Failed to load tool", { tool, version, local: Boolean(request.local), ...errorData(err) });
      throw err;
    }
  }

  listAvailableTools(): Promise<AvailableTool[]> {
    return this.registry.list();
  }

  checkToolUpdates(author: string, name: string, currentVersion: string): Promise<boolean> {
    return this.registry.checkUpdates(author, name, currentVersion);
  }

  /** Reads a local tool's config without loading its code. */
  async loadLocalToolConfig(name: string): Promise<ToolConfig> {
    const toolDir = path.join(this.localToolsDir, name);
    try {
      await fsp.access(toolDir);
    } catch (err) {
      if (isMissing(err)) throw new NotFoundError(`Tool ${name} not found in local directory`, err);
      throw err;
    }
    try {
      await fsp.access(path.join(toolDir, CONFIG_FILE));
    } catch (err) {
      if (isMissing(err)) throw new NotFoundError(`Config file not found for tool ${name}`, err);
      throw err;
    }
    return readToolConfig(toolDir);
  }

  listCachedVersions(author: string, name: string): Promise<string[]> {
    return this.cache.listCachedVersions(author, name);
  }
}

/** Wires a manager from resolved configuration. */
export function createToolManager(config: ToolcrateConfig, logger?: Logger): ToolManager {
  const log = logger ?? createLogger("toolcrate", config.logging);
  const cache = new CacheStore({ root: config.cache.dir, extension: config.cache.extension });
  const scratchRoot = path.join(cache.root, SCRATCH_DIR);

  return new ToolManager({
    cache,
    registry: new RegistryClient({
      baseUrl: config.registry.baseUrl,
      timeoutMs: config.registry.timeoutMs,
      logger: log.child("registry"),
    }),
    loader: new ToolLoader({ scratchRoot, logger: log.child("loader") }),
    dependencies: new DependencyInstaller({
      manifest: config.dependencies.manifest,
      scratchDir: scratchRoot,
      installer: new NpmInstaller({ prefix: cache.root }),
      logger: log.child("deps"),
    }),
    localToolsDir: config.tools.localDir,
    logger: log,
  });
}
