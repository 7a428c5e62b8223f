import { createLogger, createToolManager, loadConfig } from "@toolcrate/core";
import type { Logger, ToolManager, ToolcrateConfig } from "@toolcrate/core";

export type CliContext = {
  config: ToolcrateConfig;
  logger: Logger;
  manager: ToolManager;
};

export type ContextOverrides = {
  /** Registry base URL given with `--registry`. */
  registry?: string;
};

export type ContextFactory = (overrides?: ContextOverrides) => CliContext;

export const createContext: ContextFactory = (overrides = {}) => {
  const { config, errors } = loadConfig(process.cwd());
  if (overrides.registry) {
    config.registry.baseUrl = overrides.registry;
  }
  const logger = createLogger("toolcrate", config.logging);
  for (const error of errors) {
    logger.warn("Ignoring invalid config", { error });
  }
  return { config, logger, manager: createToolManager(config, logger) };
};

export function reportFailure(err: unknown): void {
  console.error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
}
