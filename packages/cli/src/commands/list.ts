import { Command } from "commander";
import { reportFailure } from "../context.js";
import type { ContextFactory } from "../context.js";

export function listCommand(resolveContext: ContextFactory): Command {
  return new Command("list")
    .description("List tools available in the registry")
    .option("--json", "Print JSON")
    .option("--registry <url>", "Registry base URL")
    .action(async (opts: { json?: boolean; registry?: string }) => {
      try {
        const { manager } = resolveContext({ registry: opts.registry });
        const tools = await manager.listAvailableTools();
        if (opts.json) {
          console.log(JSON.stringify(tools, null, 2));
          return;
        }
        if (tools.length === 0) {
          console.log("No tools available.");
          return;
        }
        for (const tool of tools) {
          console.log(tool.description ? `${tool.tool}  [${tool.type}]  ${tool.description}` : `${tool.tool}  [${tool.type}]`);
        }
      } catch (err) {
        reportFailure(err);
      }
    });
}
