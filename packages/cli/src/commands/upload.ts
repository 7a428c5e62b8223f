import { Command } from "commander";
import { ConfigError } from "@toolcrate/core";
import { reportFailure } from "../context.js";
import type { ContextFactory } from "../context.js";
import { describePayload } from "./package.js";

export function uploadCommand(resolveContext: ContextFactory): Command {
  return new Command("upload")
    .description("Package a tool folder and upload it to the registry")
    .argument("<folder>", "Tool folder containing config.json")
    .option("--registry <url>", "Registry base URL")
    .action(async (folder: string, opts: { registry?: string }) => {
      try {
        const { manager } = resolveContext({ registry: opts.registry });
        const payload = await manager.packageTool(folder);
        const missing = (["author", "name", "version"] as const).filter((key) => !payload[key]);
        if (missing.length > 0) {
          throw new ConfigError(`Cannot upload ${folder}: config.json lacks ${missing.join(", ")}`);
        }
        await manager.uploadTool(payload);
        console.log(`Uploaded ${describePayload(payload)}`);
      } catch (err) {
        reportFailure(err);
      }
    });
}
