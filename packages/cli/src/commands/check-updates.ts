import { Command } from "commander";
import { reportFailure } from "../context.js";
import type { ContextFactory } from "../context.js";

export function checkUpdatesCommand(resolveContext: ContextFactory): Command {
  return new Command("check-updates")
    .description("Ask the registry whether a newer version exists")
    .argument("<author>", "Tool author")
    .argument("<name>", "Tool name")
    .argument("<current>", "Version currently in use")
    .option("--registry <url>", "Registry base URL")
    .action(async (author: string, name: string, current: string, opts: { registry?: string }) => {
      try {
        const { manager } = resolveContext({ registry: opts.registry });
        const available = await manager.checkToolUpdates(author, name, current);
        console.log(available ? `Update available for ${author}/${name} (current ${current})` : `${author}/${name}@${current} is up to date`);
      } catch (err) {
        reportFailure(err);
      }
    });
}
