import { Command } from "commander";
import { ConfigError } from "@toolcrate/core";
import type { LoadToolRequest } from "@toolcrate/core";
import { reportFailure } from "../context.js";
import type { ContextFactory } from "../context.js";

type LoadOptions = {
  author?: string;
  version?: string;
  local?: boolean;
  registry?: string;
};

export function toLoadRequest(name: string, opts: LoadOptions): LoadToolRequest {
  if (opts.local) return { local: true, name };
  if (!opts.author) {
    throw new ConfigError(`Loading ${name} from the cache needs --author (or use --local)`);
  }
  return { author: opts.author, name, version: opts.version };
}

function symbolLabel(implementation: unknown): string {
  if (typeof implementation === "function" && implementation.name) return implementation.name;
  return typeof implementation;
}

export function loadCommand(resolveContext: ContextFactory): Command {
  return new Command("load")
    .description("Load a tool's implementation to check that it resolves")
    .argument("<name>", "Tool name")
    .option("--author <author>", "Tool author (cached tools)")
    .option("--version <version>", "Tool version (default: newest cached)")
    .option("--local", "Load from the local tools directory")
    .option("--registry <url>", "Registry base URL")
    .action(async (name: string, opts: LoadOptions) => {
      try {
        const request = toLoadRequest(name, opts);
        const { manager } = resolveContext({ registry: opts.registry });
        const loaded = await manager.loadTool(request);
        console.log(`Loaded ${symbolLabel(loaded.implementation)} from ${name}`);
        console.log(JSON.stringify(loaded.config, null, 2));
      } catch (err) {
        reportFailure(err);
      }
    });
}
