import { Command } from "commander";

function setProcessTitle(actionCommand: Command): void {
  const segments: string[] = [];
  let current: Command | null = actionCommand;
  while (current?.parent) {
    segments.unshift(current.name());
    current = current.parent;
  }
  if (segments.length === 0) return;
  process.title = `toolcrate-${segments.join("-")}`;
}

export function validateRegistryOverride(opts: Record<string, unknown>): void {
  const raw = typeof opts.registry === "string" ? opts.registry.trim() : "";
  if (!raw) return;
  let parsed: URL;
  try {
    parsed = new URL(raw);
  } catch {
    throw new Error(`Invalid registry URL: ${raw}`);
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new Error(`Registry URL must use http or https: ${raw}`);
  }
}

export function registerCliPreActionHooks(program: Command): void {
  program.hook("preAction", (_thisCommand, actionCommand) => {
    setProcessTitle(actionCommand);
    validateRegistryOverride(actionCommand.opts());
  });
}
