import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { createRequire } from "node:module";
import { ToolLoader, packageConfig } from "./tool-loader.js";
import { ModuleSearchScope } from "./search-scope.js";
import type { ModuleLoader, LoadSymbolResult } from "./module-loader.js";
import { ConfigError, LoadError, NotFoundError } from "../errors.js";
import type { ToolPackage } from "../package/types.js";

const nodeRequire = createRequire(import.meta.url);

let tmpDir: string;
let toolsRoot: string;
let scratchRoot: string;
let scope: ModuleSearchScope;
let loader: ToolLoader;

const CWD = "/work/host";

function writeTool(name: string, files: Record<string, string>): string {
  const dir = path.join(toolsRoot, name);
  for (const [relative, content] of Object.entries(files)) {
    const file = path.join(dir, relative);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, content);
  }
  return dir;
}

function config(entry: string, module: string): string {
  return JSON.stringify({
    name: "echo",
    meta: { author: "alice", version: "1.0.0" },
    build: { entry, module },
  });
}

const ECHO_SOURCE = "exports.Echo = class Echo { run(text) { return `echo:${text}`; } };\n";

function echoPackage(files: Record<string, string> = { "tool.cjs": ECHO_SOURCE }): ToolPackage {
  return {
    metadata: { author: "alice", name: "echo", version: "1.0.0", license: "MIT", entry: "tool.cjs", module: "Echo" },
    files: new Map(Object.entries(files).map(([p, c]) => [p, Buffer.from(c)])),
  };
}

function instantiate(implementation: unknown): { run(text: string): string } {
  if (typeof implementation !== "function") throw new Error("expected a class");
  return Reflect.construct(implementation, []);
}

beforeEach(() => {
  tmpDir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), "toolcrate-loader-test-")));
  toolsRoot = path.join(tmpDir, "tools");
  scratchRoot = path.join(tmpDir, "cache", ".scratch");
  scope = new ModuleSearchScope(["/opt/shared-modules"]);
  loader = new ToolLoader({ scratchRoot, scope, cwd: () => CWD });
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe("ToolLoader.loadFromLocalDir", () => {
  it("returns the implementation class and the parsed config", async () => {
    writeTool("echo", { "config.json": config("tool.cjs", "Echo"), "tool.cjs": ECHO_SOURCE });

    const loaded = await loader.loadFromLocalDir(toolsRoot, "echo");
    expect(instantiate(loaded.implementation).run("hi")).toBe("echo:hi");
    expect(loaded.config.meta).toEqual({ author: "alice", version: "1.0.0" });
  });

  it("restores the search scope after a successful load", async () => {
    writeTool("echo", { "config.json": config("tool.cjs", "Echo"), "tool.cjs": ECHO_SOURCE });
    const before = scope.entries();

    await loader.loadFromLocalDir(toolsRoot, "echo");
    expect(scope.entries()).toEqual(before);
    expect(nodeRequire.cache[path.join(toolsRoot, "echo", "tool.cjs")]).toBeUndefined();
  });

  it("restores the search scope when the symbol is missing", async () => {
    writeTool("echo", { "config.json": config("tool.cjs", "Missing"), "tool.cjs": ECHO_SOURCE });
    const before = scope.entries();

    await expect(loader.loadFromLocalDir(toolsRoot, "echo")).rejects.toThrow('symbol not found: "Missing" in tool.cjs');
    expect(scope.entries()).toEqual(before);
    expect(scope.size).toBe(1);
  });

  it("pushes the tool directory ahead of the working directory during the load", async () => {
    const dir = writeTool("echo", { "config.json": config("tool.cjs", "Echo"), "tool.cjs": "" });
    const seen: string[][] = [];
    const recording: ModuleLoader = {
      loadSymbol(entry: string, symbolName: string): LoadSymbolResult {
        seen.push([...scope.entries()]);
        return { success: true, symbol: `${entry}#${symbolName}`, resolvedPath: entry };
      },
    };
    const custom = new ToolLoader({ scratchRoot, scope, moduleLoader: recording, cwd: () => CWD });

    const loaded = await custom.loadFromLocalDir(toolsRoot, "echo");
    expect(loaded.implementation).toBe("tool.cjs#Echo");
    expect(seen).toEqual([[dir, CWD, "/opt/shared-modules"]]);
  });

  it("does not push the working directory twice", async () => {
    writeTool("echo", { "config.json": config("tool.cjs", "Echo"), "tool.cjs": ECHO_SOURCE });
    const withCwd = new ModuleSearchScope([CWD]);
    const custom = new ToolLoader({ scratchRoot, scope: withCwd, cwd: () => CWD });

    await custom.loadFromLocalDir(toolsRoot, "echo");
    expect(withCwd.entries()).toEqual([CWD]);
  });

  it("wraps a fault raised by the entry", async () => {
    writeTool("echo", {
      "config.json": config("tool.cjs", "Echo"),
      "tool.cjs": "throw new SyntaxError('broken tool');\n",
    });

    const failure = await loader.loadFromLocalDir(toolsRoot, "echo").catch((err: unknown) => err);
    expect(failure).toBeInstanceOf(LoadError);
    expect(failure instanceof LoadError && failure.cause).toBeInstanceOf(SyntaxError);
    expect(scope.entries()).toEqual(["/opt/shared-modules"]);
  });

  it("fails with NotFoundError for an unknown tool", async () => {
    await expect(loader.loadFromLocalDir(toolsRoot, "ghost")).rejects.toThrow(new NotFoundError("Local tool not found: ghost"));
  });

  it("fails with NotFoundError when config.json is missing", async () => {
    writeTool("echo", { "tool.cjs": ECHO_SOURCE });
    await expect(loader.loadFromLocalDir(toolsRoot, "echo")).rejects.toThrow("Config file not found for tool echo");
  });

  it("fails with ConfigError when build keys are missing", async () => {
    writeTool("echo", { "config.json": JSON.stringify({ name: "echo", build: { entry: "tool.cjs" } }) });
    await expect(loader.loadFromLocalDir(toolsRoot, "echo")).rejects.toBeInstanceOf(ConfigError);
  });

  it("fails with ConfigError when the entry escapes the tool directory", async () => {
    writeTool("echo", { "config.json": config("../other/tool.cjs", "Echo") });
    await expect(loader.loadFromLocalDir(toolsRoot, "echo")).rejects.toThrow(
      'Entry "../other/tool.cjs" of tool echo escapes the tool directory',
    );
  });

  it("fails with LoadError when the entry file is absent", async () => {
    const dir = writeTool("echo", { "config.json": config("tool.cjs", "Echo") });
    await expect(loader.loadFromLocalDir(toolsRoot, "echo")).rejects.toThrow(`Entry "tool.cjs" not found in ${dir}`);
  });
});

describe("ToolLoader.loadFromPackage", () => {
  it("loads from materialized files and removes the scratch directory", async () => {
    const loaded = await loader.loadFromPackage(
      echoPackage({
        "tool.cjs": "const { prefix } = require('./lib/prefix.cjs');\nexports.Echo = class { run(t) { return prefix + t; } };\n",
        "lib/prefix.cjs": "exports.prefix = 'pkg:';\n",
      }),
    );

    expect(instantiate(loaded.implementation).run("x")).toBe("pkg:x");
    expect(fs.readdirSync(scratchRoot)).toEqual([]);
    expect(scope.entries()).toEqual(["/opt/shared-modules"]);
  });

  it("synthesizes the config from metadata when the package has none", async () => {
    const loaded = await loader.loadFromPackage(echoPackage());
    expect(loaded.config).toEqual({
      name: "echo",
      license: "MIT",
      meta: { author: "alice", version: "1.0.0" },
      build: { entry: "tool.cjs", module: "Echo" },
    });
  });

  it("cleans up scope and scratch files when the symbol is missing", async () => {
    const pkg = echoPackage({ "tool.cjs": "exports.Other = class {};\n" });

    await expect(loader.loadFromPackage(pkg)).rejects.toBeInstanceOf(LoadError);
    expect(fs.readdirSync(scratchRoot)).toEqual([]);
    expect(scope.entries()).toEqual(["/opt/shared-modules"]);
  });

  it("rejects an entry that is not part of the package", async () => {
    const pkg = echoPackage({ "other.cjs": "" });
    await expect(loader.loadFromPackage(pkg)).rejects.toThrow('Entry "tool.cjs" is not part of package alice/echo@1.0.0');
  });

  it("resolves tool requires from the cache root, not the working directory", async () => {
    const hostDir = path.join(tmpDir, "host");
    fs.mkdirSync(path.join(hostDir, "node_modules", "host-only-dep"), { recursive: true });
    fs.writeFileSync(path.join(hostDir, "node_modules", "host-only-dep", "index.js"), "exports.tag = 'host';\n");
    fs.mkdirSync(path.join(tmpDir, "cache", "node_modules", "cached-dep"), { recursive: true });
    fs.writeFileSync(path.join(tmpDir, "cache", "node_modules", "cached-dep", "index.js"), "exports.tag = 'cache';\n");
    const fromHost = new ToolLoader({ scratchRoot, scope, cwd: () => hostDir });

    const loaded = await fromHost.loadFromPackage(
      echoPackage({
        "tool.cjs": [
          "let host = 'unresolved';",
          "try { host = require('host-only-dep').tag; } catch (err) { if (err.code !== 'MODULE_NOT_FOUND') throw err; }",
          "const { tag } = require('cached-dep');",
          "exports.Echo = class { run(t) { return `${tag}:${host}:${t}`; } };",
        ].join("\n"),
      }),
    );

    expect(instantiate(loaded.implementation).run("x")).toBe("cache:unresolved:x");
  });
});

describe("packageConfig", () => {
  it("prefers the packaged config.json", () => {
    const pkg = echoPackage({ "config.json": JSON.stringify({ name: "echo", tool_type: "text" }) });
    expect(packageConfig(pkg)).toEqual({ name: "echo", tool_type: "text" });
  });

  it("fails with ConfigError on an unparseable config.json", () => {
    const pkg = echoPackage({ "config.json": "{" });
    expect(() => packageConfig(pkg)).toThrow(ConfigError);
  });
});
