import { describe, it, expect, vi, afterEach } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { NpmInstaller } from "./npm-installer.js";
import type { CommandResult, CommandRunner } from "./command-runner.js";

const tempRoots: string[] = [];

function writeManifest(content: string): string {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), "toolcrate-npm-"));
  tempRoots.push(root);
  const file = path.join(root, "requirements.txt");
  fs.writeFileSync(file, content);
  return file;
}

function runner(result: CommandResult) {
  return vi.fn<CommandRunner>().mockResolvedValue(result);
}

afterEach(() => {
  for (const root of tempRoots.splice(0, tempRoots.length)) {
    fs.rmSync(root, { recursive: true, force: true });
  }
});

describe("NpmInstaller.listInstalled", () => {
  it("returns top-level dependency names", async () => {
    const run = runner({ exitCode: 0, stdout: JSON.stringify({ dependencies: { lodash: {}, chalk: {} } }), stderr: "" });
    const installer = new NpmInstaller({ prefix: "/cache", run });

    expect(await installer.listInstalled()).toEqual(["lodash", "chalk"]);
    expect(run).toHaveBeenCalledWith("npm", ["ls", "--json", "--depth=0", "--prefix", "/cache"], { timeout: undefined });
  });

  it("accepts the tree npm prints alongside a non-zero exit", async () => {
    const run = runner({ exitCode: 1, stdout: JSON.stringify({ dependencies: { lodash: {} } }), stderr: "extraneous", error: "extraneous" });
    expect(await new NpmInstaller({ prefix: "/cache", run }).listInstalled()).toEqual(["lodash"]);
  });

  it("returns no names for an empty prefix", async () => {
    const run = runner({ exitCode: 0, stdout: "{}", stderr: "" });
    expect(await new NpmInstaller({ prefix: "/cache", run }).listInstalled()).toEqual([]);
  });

  it("throws when npm prints nothing", async () => {
    const run = runner({ exitCode: null, stdout: "", stderr: "", error: "spawn npm ENOENT" });
    await expect(new NpmInstaller({ prefix: "/cache", run }).listInstalled()).rejects.toThrow(
      "npm ls failed: spawn npm ENOENT",
    );
  });
});

describe("NpmInstaller.install", () => {
  function tempPrefix(): string {
    const prefix = fs.mkdtempSync(path.join(os.tmpdir(), "toolcrate-prefix-"));
    tempRoots.push(prefix);
    return prefix;
  }

  it("installs every manifest entry and saves it at the prefix", async () => {
    const prefix = tempPrefix();
    const run = runner({ exitCode: 0, stdout: "", stderr: "" });
    const installer = new NpmInstaller({ prefix, command: "npm-test", timeoutMs: 5000, run });

    const outcome = await installer.install(writeManifest("lodash==4.17.21\nleft-pad\n"));
    expect(outcome).toEqual({ success: true });
    expect(run).toHaveBeenCalledWith(
      "npm-test",
      ["install", "--prefix", prefix, "lodash@4.17.21", "left-pad"],
      { timeout: 5000 },
    );
    expect(JSON.parse(fs.readFileSync(path.join(prefix, "package.json"), "utf-8"))).toEqual({
      name: "toolcrate-cache",
      private: true,
      dependencies: {},
    });
  });

  it("keeps the prefix package.json across successive installs", async () => {
    const prefix = tempPrefix();
    const run = runner({ exitCode: 0, stdout: "", stderr: "" });
    const installer = new NpmInstaller({ prefix, run });

    await installer.install(writeManifest("alpha==1.0.0\n"));
    // npm records alpha here; a second install must not replace the record.
    const recorded = { name: "toolcrate-cache", private: true, dependencies: { alpha: "^1.0.0" } };
    fs.writeFileSync(path.join(prefix, "package.json"), JSON.stringify(recorded));
    await installer.install(writeManifest("beta\n"));

    expect(run.mock.calls.map(([, args]) => args)).toEqual([
      ["install", "--prefix", prefix, "alpha@1.0.0"],
      ["install", "--prefix", prefix, "beta"],
    ]);
    expect(JSON.parse(fs.readFileSync(path.join(prefix, "package.json"), "utf-8"))).toEqual(recorded);
  });

  it("skips the process for an empty manifest", async () => {
    const run = runner({ exitCode: 0, stdout: "", stderr: "" });
    expect(await new NpmInstaller({ prefix: tempPrefix(), run }).install(writeManifest("# nothing\n"))).toEqual({
      success: true,
    });
    expect(run).not.toHaveBeenCalled();
  });

  it("reports a failing exit code", async () => {
    const run = runner({ exitCode: 1, stdout: "", stderr: "E404", error: "E404" });
    const outcome = await new NpmInstaller({ prefix: tempPrefix(), run }).install(writeManifest("no-such-pkg\n"));
    expect(outcome).toEqual({ success: false, exitCode: 1, error: "E404" });
  });
});
