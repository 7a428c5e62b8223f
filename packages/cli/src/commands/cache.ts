import { Command } from "commander";
import { reportFailure } from "../context.js";
import type { ContextFactory } from "../context.js";

export function cacheCommand(resolveContext: ContextFactory): Command {
  return new Command("cache")
    .description("Show cached versions of a tool")
    .argument("<author>", "Tool author")
    .argument("<name>", "Tool name")
    .action(async (author: string, name: string) => {
      try {
        const { manager } = resolveContext();
        const versions = await manager.listCachedVersions(author, name);
        if (versions.length === 0) {
          console.log(`No cached versions of ${author}/${name}`);
          return;
        }
        const newest = manager.cache.newestVersion(versions);
        for (const version of versions) {
          console.log(version === newest ? `${version} (newest)` : version);
        }
      } catch (err) {
        reportFailure(err);
      }
    });
}
