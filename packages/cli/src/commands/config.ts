import { Command } from "commander";
import { getConfigValue } from "@toolcrate/core";
import { reportFailure } from "../context.js";
import type { ContextFactory } from "../context.js";

function format(value: unknown): string {
  return typeof value === "object" ? JSON.stringify(value, null, 2) : String(value);
}

export function configCommand(resolveContext: ContextFactory): Command {
  const cmd = new Command("config").description("Inspect configuration");

  cmd
    .command("get <key>")
    .description("Get a config value by dot-path (e.g. registry.baseUrl)")
    .action((key: string) => {
      try {
        const { config } = resolveContext();
        const value = getConfigValue(config, key);
        if (value === undefined) {
          console.error(`Config key not found: ${key}`);
          process.exitCode = 1;
          return;
        }
        console.log(format(value));
      } catch (err) {
        reportFailure(err);
      }
    });

  cmd
    .command("list")
    .description("List all config values")
    .action(() => {
      try {
        const { config } = resolveContext();
        console.log(format(config));
      } catch (err) {
        reportFailure(err);
      }
    });

  return cmd;
}
