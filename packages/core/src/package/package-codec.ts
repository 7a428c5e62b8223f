import * as fsp from "node:fs/promises";
import * as path from "node:path";
import { decodeContent, digestMatches, encodeContent, sha256 } from "@toolcrate/shared";
import { CorruptPackageError, NotFoundError } from "../errors.js";
import { isMissing } from "../cache/cache-store.js";
import { isRecord, normalizePackagePath } from "./package-paths.js";
import { DEFAULT_LICENSE } from "./types.js";
import type { PayloadFile, ToolMetadata, ToolPackage, ToolPayload } from "./types.js";

const FORMAT = "toolcrate-package";
const FORMAT_VERSION = 1;

type PersistedFile = PayloadFile & { sha256: string };

type PersistedPackage = {
  format: typeof FORMAT;
  formatVersion: typeof FORMAT_VERSION;
  metadata: ToolMetadata;
  files: PersistedFile[];
};

const REQUIRED_METADATA = ["author", "name", "version", "entry", "module"] as const;

function parseMetadata(raw: Record<string, unknown>, source: string): ToolMetadata {
  const missing = REQUIRED_METADATA.filter((key) => typeof raw[key] !== "string" || raw[key] === "");
  if (missing.length > 0) {
    throw new CorruptPackageError(source, `missing metadata fields: ${missing.join(", ")}`);
  }
  const field = (key: (typeof REQUIRED_METADATA)[number]): string => String(raw[key]);
  return {
    author: field("author"),
    name: field("name"),
    version: field("version"),
    license: typeof raw.license === "string" ? raw.license : DEFAULT_LICENSE,
    entry: field("entry"),
    module: field("module"),
  };
}

function parseFiles(raw: unknown, source: string, requireDigest: boolean): Map<string, Buffer> {
  if (!Array.isArray(raw)) {
    throw new CorruptPackageError(source, "files must be a list");
  }
  const files = new Map<string, Buffer>();
  for (const item of raw) {
    if (!isRecord(item) || typeof item.path !== "string" || typeof item.content !== "string") {
      throw new CorruptPackageError(source, "every file needs a string path and content");
    }
    const filePath = normalizePackagePath(item.path);
    if (!filePath) {
      throw new CorruptPackageError(source, `unsafe file path "${item.path}"`);
    }
    if (files.has(filePath)) {
      throw new CorruptPackageError(source, `duplicate file path "${filePath}"`);
    }
    let content: Buffer;
    try {
      content = decodeContent(item.content);
    } catch (err) {
      throw new CorruptPackageError(source, `file "${filePath}" is not valid base64`, err);
    }
    if (requireDigest) {
      if (typeof item.sha256 !== "string" || !digestMatches(content, item.sha256)) {
        throw new CorruptPackageError(source, `digest mismatch for "${filePath}"`);
      }
    }
    files.set(filePath, content);
  }
  return files;
}

/** Writes `pkg` to `filePath` as one JSON document, replacing any existing entry. */
export async function savePackage(pkg: ToolPackage, filePath: string): Promise<void> {
  const document: PersistedPackage = {
    format: FORMAT,
    formatVersion: FORMAT_VERSION,
    metadata: { ...pkg.metadata },
    files: [...pkg.files.entries()]
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([filePathInPackage, content]) => ({
        path: filePathInPackage,
        sha256: sha256(content),
        content: encodeContent(content),
      })),
  };
  await fsp.mkdir(path.dirname(filePath), { recursive: true });
  await fsp.writeFile(filePath, JSON.stringify(document), "utf-8");
}

export async function loadPackage(filePath: string): Promise<ToolPackage> {
  let text: string;
  try {
    text = await fsp.readFile(filePath, "utf-8");
  } catch (err) {
    if (isMissing(err)) {
      throw new NotFoundError(`Cached package not found: ${filePath}`, err);
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new CorruptPackageError(filePath, "invalid JSON", err);
  }
  if (!isRecord(parsed) || parsed.format !== FORMAT) {
    throw new CorruptPackageError(filePath, "not a toolcrate package");
  }
  if (parsed.formatVersion !== FORMAT_VERSION) {
    throw new CorruptPackageError(filePath, `unsupported format version ${String(parsed.formatVersion)}`);
  }
  if (!isRecord(parsed.metadata)) {
    throw new CorruptPackageError(filePath, "metadata must be an object");
  }

  return {
    metadata: parseMetadata(parsed.metadata, filePath),
    files: parseFiles(parsed.files, filePath, true),
  };
}

/** Validates a registry payload and decodes its file contents. */
export function packageFromPayload(payload: unknown, source = "registry payload"): ToolPackage {
  if (!isRecord(payload)) {
    throw new CorruptPackageError(source, "payload must be an object");
  }
  return {
    metadata: parseMetadata(payload, source),
    files: parseFiles(payload.files, source, false),
  };
}

export function payloadFromPackage(pkg: ToolPackage): ToolPayload {
  return {
    ...pkg.metadata,
    files: [...pkg.files.entries()].map(([filePath, content]) => ({
      path: filePath,
      content: encodeContent(content),
    })),
  };
}
