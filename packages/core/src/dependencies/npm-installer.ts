import * as fsp from "node:fs/promises";
import * as path from "node:path";
import { isRecord } from "../package/package-paths.js";
import { runCommand } from "./command-runner.js";
import type { CommandRunner } from "./command-runner.js";
import { parseManifest, requirementSpec } from "./manifest.js";

const PREFIX_MANIFEST = { name: "toolcrate-cache", private: true, dependencies: {} };

export type InstallOutcome =
  | { success: true }
  | { success: false; exitCode: number | null; error: string };

/** The package manager process the dependency installer drives. */
export interface InstallerProcess {
  /** Names of the packages already installed. */
  listInstalled(): Promise<string[]>;
  /** Installs everything the manifest file at `manifestPath` declares. */
  install(manifestPath: string): Promise<InstallOutcome>;
}

export type NpmInstallerOptions = {
  /** Directory whose node_modules receives the packages. */
  prefix: string;
  command?: string;
  timeoutMs?: number;
  run?: CommandRunner;
};

export class NpmInstaller implements InstallerProcess {
  private readonly prefix: string;
  private readonly command: string;
  private readonly timeoutMs?: number;
  private readonly run: CommandRunner;

  constructor(options: NpmInstallerOptions) {
    this.prefix = options.prefix;
    this.command = options.command ?? "npm";
    this.timeoutMs = options.timeoutMs;
    this.run = options.run ?? runCommand;
  }

  async listInstalled(): Promise<string[]> {
    const result = await this.run(this.command, ["ls", "--json", "--depth=0", "--prefix", this.prefix], {
      timeout: this.timeoutMs,
    });
    // npm ls exits non-zero for extraneous packages but still prints the tree.
    if (!result.stdout.trim()) {
      throw new Error(`npm ls failed: ${result.error ?? `exit code ${result.exitCode}`}`);
    }
    const parsed: unknown = JSON.parse(result.stdout);
    if (!isRecord(parsed)) throw new Error("npm ls returned an unexpected document");
    const dependencies = parsed.dependencies;
    return isRecord(dependencies) ? Object.keys(dependencies) : [];
  }

  async install(manifestPath: string): Promise<InstallOutcome> {
    const specs = parseManifest(await fsp.readFile(manifestPath, "utf-8")).map(requirementSpec);
    if (specs.length === 0) return { success: true };

    await this.ensurePrefixManifest();
    const result = await this.run(this.command, ["install", "--prefix", this.prefix, ...specs], {
      timeout: this.timeoutMs,
    });
    if (result.exitCode === 0) return { success: true };
    return {
      success: false,
      exitCode: result.exitCode,
      error: result.error ?? `npm install exited with code ${result.exitCode}`,
    };
  }

  /**
   * npm prunes packages that no package.json records, so every install is
   * saved into one at the prefix.
   */
  private async ensurePrefixManifest(): Promise<void> {
    await fsp.mkdir(this.prefix, { recursive: true });
    try {
      await fsp.writeFile(path.join(this.prefix, "package.json"), `${JSON.stringify(PREFIX_MANIFEST, null, 2)}\n`, {
        flag: "wx",
      });
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "EEXIST") return;
      throw err;
    }
  }
}
