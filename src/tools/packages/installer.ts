import type { CommandRunner, Result } from "../../types/tools.js";
import { err, ok, outputOf } from "../../types/tools.js";
import { InstallError } from "../../errors.js";
import { getLogger } from "../../log/index.js";

export interface Installed {
  packageName: string;
}

export interface PackageInstaller {
  readonly manager: string;
  isInstalled(packageName: string): Promise<boolean>;
  /** Runs the host package manager once; never retries. */
  install(packageName: string): Promise<Result<Installed, InstallError>>;
}

export interface AptInstallerOptions {
  upgrade?: boolean;
}

export class AptInstaller implements PackageInstaller {
  readonly manager = "apt";
  private indexRefreshed = false;

  constructor(private readonly runner: CommandRunner, private readonly opts: AptInstallerOptions = {}) {}

  async isInstalled(packageName: string): Promise<boolean> {
    const res = await this.runner.run("dpkg-query", ["-W", "-f=${Status}", packageName]);
    return res.ok && res.stdout.includes("install ok installed");
  }

  // apt-get update (and upgrade, when asked) once per run, before the first install
  private async refreshIndex(): Promise<void> {
    if (this.indexRefreshed) return;
    this.indexRefreshed = true;
    const log = getLogger();
    const update = await this.runner.run("apt-get", ["update"], { elevated: true });
    if (!update.ok) {
      log.warn({ output: outputOf(update) }, "apt-get update failed; installing from the existing index");
      return;
    }
    if (this.opts.upgrade) {
      const upgrade = await this.runner.run("apt-get", ["upgrade", "-y"], { elevated: true });
      if (!upgrade.ok) log.warn({ output: outputOf(upgrade) }, "apt-get upgrade failed");
    }
  }

  async install(packageName: string): Promise<Result<Installed, InstallError>> {
    await this.refreshIndex();
    const res = await this.runner.run("apt-get", ["install", "-y", packageName], {
      elevated: true,
      env: { DEBIAN_FRONTEND: "noninteractive" },
    });
    if (!res.ok) {
      return err(new InstallError(packageName, `apt-get install ${packageName} exited with ${res.exitCode}`, outputOf(res)));
    }
    return ok({ packageName });
  }
}

export class ChocolateyInstaller implements PackageInstaller {
  readonly manager = "choco";

  constructor(private readonly runner: CommandRunner) {}

  async isInstalled(packageName: string): Promise<boolean> {
    // --limit-output prints "name|version" per installed match
    const res = await this.runner.run("choco", ["list", "--exact", "--limit-output", packageName]);
    if (!res.ok) return false;
    const wanted = packageName.toLowerCase();
    return res.stdout.split(/\r?\n/).some(line => line.split("|")[0].trim().toLowerCase() === wanted);
  }

  async install(packageName: string): Promise<Result<Installed, InstallError>> {
    const res = await this.runner.run("choco", ["install", packageName, "-y", "--no-progress"], { elevated: true });
    if (!res.ok) {
      return err(new InstallError(packageName, `choco install ${packageName} exited with ${res.exitCode}`, outputOf(res)));
    }
    return ok({ packageName });
  }
}
