const BASE64_ALPHABET = /^[A-Za-z0-9+/]*={0,2}$/;

export function isBase64(value: string): boolean {
  return value.length % 4 === 0 && BASE64_ALPHABET.test(value);
}

export function encodeContent(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString("base64");
}

/** Decodes transport content. Throws on anything that is not canonical base64. */
export function decodeContent(value: string): Buffer {
  if (!isBase64(value)) {
    throw new Error("Content is not valid base64");
  }
  return Buffer.from(value, "base64");
}
