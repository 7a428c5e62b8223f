import { FormatError } from "../errors.js";

/** Path segment used when no version is pinned. */
export const LATEST_SEGMENT = "latest";

const VERSION_SEPARATOR = ".";
const SEGMENT_SEPARATOR = "-";

export function encodeVersion(version: string | null | undefined): string {
  if (version === null || version === undefined) return LATEST_SEGMENT;
  return version.split(VERSION_SEPARATOR).join(SEGMENT_SEPARATOR);
}

/** Inverse of {@link encodeVersion} for versions that contain no `-`. */
export function decodeVersion(segment: string): string {
  return segment.split(SEGMENT_SEPARATOR).join(VERSION_SEPARATOR);
}

export function parseVersion(version: string): bigint[] {
  return version.split(VERSION_SEPARATOR).map((component) => {
    if (!/^\d+$/.test(component)) {
      throw new FormatError(`Version "${version}" has a non-numeric component "${component}"`);
    }
    return BigInt(component);
  });
}

export function compareVersions(a: string, b: string): number {
  const left = parseVersion(a);
  const right = parseVersion(b);
  const shared = Math.min(left.length, right.length);
  for (let i = 0; i < shared; i++) {
    const l = left[i] ?? 0n;
    const r = right[i] ?? 0n;
    if (l !== r) return l > r ? 1 : -1;
  }
  return left.length - right.length;
}

/**
 * Picks the highest version by numeric component comparison. Among versions that
 * compare equal, the one listed last wins. No pre-release handling.
 */
export function newestVersion(versions: readonly string[]): string | null {
  let newest: string | null = null;
  for (const version of versions) {
    if (newest === null) {
      parseVersion(version);
      newest = version;
    } else if (compareVersions(version, newest) >= 0) {
      newest = version;
    }
  }
  return newest;
}
