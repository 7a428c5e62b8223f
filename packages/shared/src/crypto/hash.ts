import { createHash, timingSafeEqual } from "node:crypto";

export function sha256(data: string | Uint8Array): string {
  return createHash("sha256").update(data).digest("hex");
}

export function digestMatches(data: string | Uint8Array, expected: string): boolean {
  const actual = sha256(data);
  if (actual.length !== expected.length) return false;
  return timingSafeEqual(Buffer.from(actual), Buffer.from(expected));
}
