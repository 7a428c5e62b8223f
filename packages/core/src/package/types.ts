export const DEFAULT_LICENSE = "Unknown";
export const DEFAULT_ENTRY = "tool.js";
export const DEFAULT_MODULE = "Tool";
export const CONFIG_FILE = "config.json";

export type ToolMetadata = {
  author: string;
  name: string;
  version: string;
  license: string;
  /** Entry file, relative to the package root. */
  entry: string;
  /** Name of the exported implementation symbol. */
  module: string;
};

export type ToolPackage = {
  metadata: ToolMetadata;
  files: Map<string, Buffer>;
};

export type PayloadFile = {
  path: string;
  /** Base64 encoded bytes. */
  content: string;
};

/** Transport form exchanged with the registry. Draft folders may leave identity fields null. */
export type ToolPayload = {
  author: string | null;
  name: string | null;
  version: string | null;
  license: string;
  files: PayloadFile[];
  entry: string;
  module: string;
};

/** A tool's `config.json`. Only the keys the manager reads are typed. */
export type ToolConfig = {
  name?: string;
  license?: string;
  /** Holds `author` and `version`. */
  meta?: Record<string, unknown>;
  /** Holds `entry` and `module`. */
  build?: Record<string, unknown>;
  [key: string]: unknown;
};
