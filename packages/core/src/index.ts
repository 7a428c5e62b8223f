export {
  ToolcrateError,
  NotFoundError,
  ConfigError,
  CorruptPackageError,
  FormatError,
  LoadError,
  NetworkError,
  DependencyInstallError,
} from "./errors.js";

export type { ToolcrateConfig, LogLevel, LogFormat, ConfigSource } from "./config/types.js";
export { DEFAULT_CONFIG, TOOLCRATE_HOME, validateConfig, mergeConfig } from "./config/schema.js";
export { loadConfig, getConfigValue, setConfigValue } from "./config/loader.js";
export type { LoadResult, LoadConfigOptions } from "./config/loader.js";

export { Logger, createLogger, prettyOutput, jsonOutput, errorData } from "./logging/logger.js";
export type { LogEntry, LogOutput, LoggerOptions } from "./logging/logger.js";

export {
  LATEST_SEGMENT,
  encodeVersion,
  decodeVersion,
  parseVersion,
  compareVersions,
  newestVersion,
} from "./versioning/version-codec.js";

export { CacheStore } from "./cache/cache-store.js";
export type { CacheStoreOptions } from "./cache/cache-store.js";

export { DEFAULT_LICENSE, DEFAULT_ENTRY, DEFAULT_MODULE, CONFIG_FILE } from "./package/types.js";
export type { ToolMetadata, ToolPackage, ToolPayload, PayloadFile, ToolConfig } from "./package/types.js";
export { savePackage, loadPackage, packageFromPayload, payloadFromPackage } from "./package/package-codec.js";
export { buildPayload, readToolConfig, collectFiles } from "./package/package-builder.js";

export { ModuleSearchScope, ScopeGuard, moduleSearchScope } from "./loader/search-scope.js";
export { CommonJsModuleLoader } from "./loader/module-loader.js";
export type { ModuleLoader, LoadSymbolResult } from "./loader/module-loader.js";
export { ToolLoader, packageConfig } from "./loader/tool-loader.js";
export type { LoadedTool, ToolLoaderOptions } from "./loader/tool-loader.js";

export { DependencyInstaller } from "./dependencies/dependency-installer.js";
export type { DependencyInstallerOptions } from "./dependencies/dependency-installer.js";
export { NpmInstaller } from "./dependencies/npm-installer.js";
export type { InstallerProcess, InstallOutcome, NpmInstallerOptions } from "./dependencies/npm-installer.js";
export { parseManifest } from "./dependencies/manifest.js";
export type { Requirement } from "./dependencies/manifest.js";
export { runCommand } from "./dependencies/command-runner.js";
export type { CommandRunner, CommandResult } from "./dependencies/command-runner.js";

export { RegistryClient, normalizeBaseUrl } from "./registry/registry-client.js";
export type { AvailableTool, RegistryClientOptions } from "./registry/registry-client.js";

export { ToolManager, createToolManager } from "./manager/tool-manager.js";
export type { ToolRef, LoadToolRequest, ToolManagerDeps } from "./manager/tool-manager.js";
