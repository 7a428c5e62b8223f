import { Command } from "commander";
import { reportFailure } from "../context.js";
import type { ContextFactory } from "../context.js";

export function downloadCommand(resolveContext: ContextFactory): Command {
  return new Command("download")
    .description("Download a tool into the local cache")
    .argument("<author>", "Tool author")
    .argument("<name>", "Tool name")
    .argument("[version]", "Version to fetch (default: newest cached, else the registry's latest)")
    .option("--registry <url>", "Registry base URL")
    .action(async (author: string, name: string, version: string | undefined, opts: { registry?: string }) => {
      try {
        const { manager } = resolveContext({ registry: opts.registry });
        const ref = await manager.downloadTool(author, name, version);
        const cachePath = manager.cache.cachePath(ref.author, ref.name, ref.version);
        console.log(`${ref.author}/${ref.name}@${ref.version} cached at ${cachePath}`);
      } catch (err) {
        reportFailure(err);
      }
    });
}
