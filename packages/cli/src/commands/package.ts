import { Command } from "commander";
import fs from "node:fs";
import path from "node:path";
import type { ToolPayload } from "@toolcrate/core";
import { reportFailure } from "../context.js";
import type { ContextFactory } from "../context.js";

export function describePayload(payload: ToolPayload): string {
  const author = payload.author ?? "?";
  const name = payload.name ?? "?";
  const version = payload.version ?? "?";
  const count = payload.files.length;
  return `${author}/${name}@${version} (${count} ${count === 1 ? "file" : "files"})`;
}

export function packageCommand(resolveContext: ContextFactory): Command {
  return new Command("package")
    .description("Package a tool folder into a registry payload")
    .argument("<folder>", "Tool folder containing config.json")
    .option("--out <file>", "Write the payload to a file instead of stdout")
    .action(async (folder: string, opts: { out?: string }) => {
      try {
        const { manager } = resolveContext();
        const payload = await manager.packageTool(folder);
        if (!opts.out) {
          console.log(JSON.stringify(payload, null, 2));
          return;
        }
        const target = path.resolve(opts.out);
        fs.mkdirSync(path.dirname(target), { recursive: true });
        fs.writeFileSync(target, `${JSON.stringify(payload)}\n`, "utf-8");
        console.log(`Packaged ${describePayload(payload)} to ${target}`);
      } catch (err) {
        reportFailure(err);
      }
    });
}
