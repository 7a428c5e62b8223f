import os from "node:os";
import path from "node:path";
import process from "node:process";

export function envString(key: string, fallback = ""): string {
  const raw = process.env[key]?.trim();
  return raw ? raw : fallback;
}

export function envInt(key: string, fallback: number): number {
  const raw = process.env[key]?.trim();
  if (!raw) return fallback;
  const parsed = Number.parseInt(raw, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

/** Reads a directory path, expanding a leading `~` to the home directory. */
export function envPath(key: string): string | undefined {
  const raw = process.env[key]?.trim();
  if (!raw) return undefined;
  if (raw === "~") return os.homedir();
  if (raw.startsWith("~/")) return path.join(os.homedir(), raw.slice(2));
  return path.resolve(raw);
}
