/**
 * Normalizes a package-relative path to `/` separators. Returns null for paths
 * that are absolute, empty, or that step outside the package root.
 */
export function normalizePackagePath(raw: string): string | null {
  const unified = raw.replace(/\\/g, "/");
  if (unified.startsWith("/") || /^[A-Za-z]:/.test(unified)) return null;

  const segments = unified.split("/").filter((segment) => segment !== "" && segment !== ".");
  if (segments.length === 0) return null;
  if (segments.some((segment) => segment === ".." || segment.includes("\0"))) return null;
  return segments.join("/");
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
