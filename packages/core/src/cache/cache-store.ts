import * as fs from "node:fs";
import * as fsp from "node:fs/promises";
import * as path from "node:path";
import { decodeVersion, encodeVersion, newestVersion } from "../versioning/version-codec.js";

export type CacheStoreOptions = {
  root: string;
  /** Package file extension, without the dot. */
  extension: string;
};

/**
 * Maps (author, name, version) to `<root>/<author>/<name>/<segment>.<ext>`,
 * one file per cached version.
 */
export class CacheStore {
  readonly root: string;
  readonly extension: string;

  constructor(options: CacheStoreOptions) {
    this.root = path.resolve(options.root);
    this.extension = options.extension;
  }

  cachePath(author: string, name: string, version: string | null | undefined): string {
    return path.join(this.toolDir(author, name), `${encodeVersion(version)}.${this.extension}`);
  }

  toolDir(author: string, name: string): string {
    return path.join(this.root, author, name);
  }

  async listCachedVersions(author: string, name: string): Promise<string[]> {
    const dir = this.toolDir(author, name);
    let entries: fs.Dirent[];
    try {
      entries = await fsp.readdir(dir, { withFileTypes: true });
    } catch (err) {
      if (isMissing(err)) return [];
      throw err;
    }

    const suffix = `.${this.extension}`;
    return entries
      .filter((entry) => entry.isFile() && entry.name.endsWith(suffix) && entry.name.length > suffix.length)
      .map((entry) => decodeVersion(entry.name.slice(0, -suffix.length)))
      .sort((a, b) => a.localeCompare(b));
  }

  newestVersion(versions: readonly string[]): string | null {
    return newestVersion(versions);
  }

  /** Returns `version` when pinned, otherwise the newest cached version (or null). */
  async resolveVersion(author: string, name: string, version?: string | null): Promise<string | null> {
    if (version) return version;
    return newestVersion(await this.listCachedVersions(author, name));
  }

  async has(author: string, name: string, version: string): Promise<boolean> {
    try {
      const stat = await fsp.stat(this.cachePath(author, name, version));
      return stat.isFile();
    } catch (err) {
      if (isMissing(err)) return false;
      throw err;
    }
  }
}

export function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && (err.code === "ENOENT" || err.code === "ENOTDIR");
}
