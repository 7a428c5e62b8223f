import { createRequire } from "node:module";
import * as path from "node:path";
import { LoadError } from "../errors.js";
import type { ModuleSearchScope } from "./search-scope.js";

export type LoadSymbolResult =
  | { success: true; symbol: unknown; resolvedPath: string }
  | { success: false; error: LoadError };

/** Resolves a tool entry and returns one named export from it. */
export interface ModuleLoader {
  loadSymbol(entry: string, symbolName: string): LoadSymbolResult;
}

type RequireFn = ReturnType<typeof createRequire>;

function readExport(exports: unknown, name: string): { found: boolean; value: unknown } {
  if (typeof exports === "function" || (typeof exports === "object" && exports !== null)) {
    if (name in exports) return { found: true, value: Reflect.get(exports, name) };
  }
  return { found: false, value: undefined };
}

function toRequest(entry: string): string {
  if (path.isAbsolute(entry) || entry.startsWith("./") || entry.startsWith("../")) return entry;
  return `./${entry}`;
}

/**
 * Loads CommonJS entries through Node's own resolver, using the search scope as
 * the lookup roots. Every module registered in `require.cache` while the entry
 * loads is evicted again before returning, so repeated loads execute fresh code.
 */
export class CommonJsModuleLoader implements ModuleLoader {
  private readonly require: RequireFn;

  constructor(
    private readonly scope: ModuleSearchScope,
    requireFn: RequireFn = createRequire(import.meta.url),
  ) {
    this.require = requireFn;
  }

  loadSymbol(entry: string, symbolName: string): LoadSymbolResult {
    const request = toRequest(entry);

    let resolvedPath: string;
    try {
      resolvedPath = this.require.resolve(request, { paths: [...this.scope.entries()] });
    } catch (err) {
      return { success: false, error: new LoadError(`Entry "${entry}" not found in module search scope`, err) };
    }

    const cache = this.require.cache;
    delete cache[resolvedPath];
    const registered = new Set(Object.keys(cache));

    try {
      const exports: unknown = this.require(resolvedPath);
      const found = readExport(exports, symbolName);
      if (!found.found) {
        return { success: false, error: new LoadError(`symbol not found: "${symbolName}" in ${entry}`) };
      }
      return { success: true, symbol: found.value, resolvedPath };
    } catch (err) {
      return { success: false, error: new LoadError(`Entry "${entry}" failed to execute`, err) };
    } finally {
      for (const id of Object.keys(cache)) {
        if (!registered.has(id)) delete cache[id];
      }
    }
  }
}
