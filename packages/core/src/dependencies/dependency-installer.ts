import * as fsp from "node:fs/promises";
import * as path from "node:path";
import { generateId } from "@toolcrate/shared";
import { DependencyInstallError } from "../errors.js";
import { errorData } from "../logging/logger.js";
import type { Logger } from "../logging/logger.js";
import type { ToolPackage } from "../package/types.js";
import { parseManifest } from "./manifest.js";
import type { Requirement } from "./manifest.js";
import type { InstallerProcess } from "./npm-installer.js";

export type DependencyInstallerOptions = {
  /** Package file holding the dependency manifest. */
  manifest: string;
  /** Where the manifest is written for the installer process. */
  scratchDir: string;
  installer: InstallerProcess;
  logger: Logger;
};

function label(pkg: ToolPackage): string {
  return `${pkg.metadata.author}/${pkg.metadata.name}@${pkg.metadata.version}`;
}

/**
 * Checks and installs the third-party packages a tool declares. Install
 * failures are logged, never thrown: a tool with missing dependencies still
 * caches and may still load.
 */
export class DependencyInstaller {
  private readonly manifest: string;
  private readonly scratchDir: string;
  private readonly installer: InstallerProcess;
  private readonly logger: Logger;

  constructor(options: DependencyInstallerOptions) {
    this.manifest = options.manifest;
    this.scratchDir = options.scratchDir;
    this.installer = options.installer;
    this.logger = options.logger;
  }

  /** Declared requirements, or null when the package ships no manifest. */
  requirements(pkg: ToolPackage): Requirement[] | null {
    const raw = pkg.files.get(this.manifest);
    return raw ? parseManifest(raw.toString("utf-8")) : null;
  }

  async isSatisfied(pkg: ToolPackage): Promise<boolean> {
    const requirements = this.requirements(pkg);
    if (!requirements) return true;

    let installed: Set<string>;
    try {
      installed = new Set((await this.installer.listInstalled()).map((name) => name.toLowerCase()));
    } catch (err) {
      this.logger.warn("Could not list installed packages", { tool: label(pkg), ...errorData(err) });
      return false;
    }
    return requirements.every((requirement) => installed.has(requirement.name.toLowerCase()));
  }

  async install(pkg: ToolPackage): Promise<void> {
    const raw = pkg.files.get(this.manifest);
    if (!raw) {
      this.logger.info("No dependency manifest in package", { tool: label(pkg), manifest: this.manifest });
      return;
    }

    const manifestPath = path.join(this.scratchDir, `${generateId()}-${path.basename(this.manifest)}`);
    try {
      await fsp.mkdir(this.scratchDir, { recursive: true });
      await fsp.writeFile(manifestPath, raw);
      const outcome = await this.installer.install(manifestPath);
      if (outcome.success) {
        this.logger.info("Installed tool dependencies", { tool: label(pkg) });
        return;
      }
      this.report(pkg, new DependencyInstallError(`Dependency install failed: ${outcome.error}`, outcome.exitCode));
    } catch (err) {
      this.report(pkg, new DependencyInstallError("Dependency installer could not run", null, err));
    } finally {
      await fsp.rm(manifestPath, { force: true });
    }
  }

  private report(pkg: ToolPackage, err: DependencyInstallError): void {
    this.logger.error(err.message, { tool: label(pkg), exitCode: err.exitCode, ...errorData(err) });
  }
}
