import { Command } from "commander";
import { packageCommand } from "./commands/package.js";
import { uploadCommand } from "./commands/upload.js";
import { downloadCommand } from "./commands/download.js";
import { listCommand } from "./commands/list.js";
import { checkUpdatesCommand } from "./commands/check-updates.js";
import { cacheCommand } from "./commands/cache.js";
import { loadCommand } from "./commands/load.js";
import { configCommand } from "./commands/config.js";
import { createContext } from "./context.js";
import type { ContextFactory } from "./context.js";
import { registerCliPreActionHooks } from "./preaction.js";

export function buildProgram(resolveContext: ContextFactory = createContext): Command {
  const program = new Command();

  program
    .name("toolcrate")
    .description("Package, cache and load tools from a tool registry")
    .version("0.1.0")
    .enablePositionalOptions();

  registerCliPreActionHooks(program);

  program.addCommand(packageCommand(resolveContext));
  program.addCommand(uploadCommand(resolveContext));
  program.addCommand(downloadCommand(resolveContext));
  program.addCommand(listCommand(resolveContext));
  program.addCommand(checkUpdatesCommand(resolveContext));
  program.addCommand(cacheCommand(resolveContext));
  program.addCommand(loadCommand(resolveContext));
  program.addCommand(configCommand(resolveContext));

  return program;
}
