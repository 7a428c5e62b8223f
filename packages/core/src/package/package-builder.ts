import * as fsp from "node:fs/promises";
import * as path from "node:path";
import { encodeContent } from "@toolcrate/shared";
import { ConfigError } from "../errors.js";
import { isMissing } from "../cache/cache-store.js";
import { isRecord } from "./package-paths.js";
import { CONFIG_FILE, DEFAULT_ENTRY, DEFAULT_LICENSE, DEFAULT_MODULE } from "./types.js";
import type { PayloadFile, ToolConfig, ToolPayload } from "./types.js";

/** Reads `<folder>/config.json`. A missing file yields `{}`; unparseable JSON is a ConfigError. */
export async function readToolConfig(folder: string): Promise<ToolConfig> {
  const configPath = path.join(folder, CONFIG_FILE);
  let text: string;
  try {
    text = await fsp.readFile(configPath, "utf-8");
  } catch (err) {
    if (isMissing(err)) return {};
    throw err;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`Invalid JSON in ${configPath}`, err);
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`${configPath} must contain a JSON object`);
  }
  return parseToolConfig(parsed);
}

/** Keeps every key; the typed ones only when they have the expected shape. */
export function parseToolConfig(raw: Record<string, unknown>): ToolConfig {
  const config: ToolConfig = {};
  for (const [key, value] of Object.entries(raw)) {
    if (key === "name" || key === "license") {
      if (typeof value === "string") config[key] = value;
    } else if (key === "meta" || key === "build") {
      if (isRecord(value)) config[key] = value;
    } else {
      config[key] = value;
    }
  }
  return config;
}

/** Symlinked files are read through; symlinked directories are not followed. */
export async function collectFiles(folder: string): Promise<PayloadFile[]> {
  const files: PayloadFile[] = [];
  const pending = [folder];

  while (pending.length > 0) {
    const current = pending.pop();
    if (current === undefined) break;
    const entries = await fsp.readdir(current, { withFileTypes: true });
    for (const entry of entries) {
      const full = path.join(current, entry.name);
      if (entry.isDirectory()) {
        pending.push(full);
      } else if (entry.isFile() || (entry.isSymbolicLink() && (await fsp.stat(full)).isFile())) {
        const bytes = await fsp.readFile(full);
        files.push({
          path: path.relative(folder, full).split(path.sep).join("/"),
          content: encodeContent(bytes),
        });
      }
    }
  }

  return files.sort((a, b) => a.path.localeCompare(b.path));
}

function stringOrNull(value: unknown): string | null {
  return typeof value === "string" ? value : null;
}

function stringOr(value: unknown, fallback: string): string {
  return typeof value === "string" ? value : fallback;
}

/**
 * Packages a tool folder into the registry transport form. Identity fields are
 * copied as found; drafts without an author or version still build.
 */
export async function buildPayload(folder: string): Promise<ToolPayload> {
  const root = path.resolve(folder);
  const config = await readToolConfig(root);
  const files = await collectFiles(root);
  const meta = config.meta ?? {};
  const build = config.build ?? {};

  return {
    author: stringOrNull(meta.author),
    name: stringOrNull(config.name),
    version: stringOrNull(meta.version),
    license: stringOr(config.license, DEFAULT_LICENSE),
    files,
    entry: stringOr(build.entry, DEFAULT_ENTRY),
    module: stringOr(build.module, DEFAULT_MODULE),
  };
}
