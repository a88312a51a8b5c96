import os from "node:os";
import path from "node:path";
import type { TargetFamily } from "../types/contracts.js";
import type { CommandRunner } from "../types/tools.js";
import type { HostFileSystem, StateQuery } from "../system/host.js";
import { NodeFileSystem } from "../system/host.js";
import { SpawnRunner } from "./cli/exec.js";
import { FetchDownloader, type Downloader } from "./http/request.js";
import { AptInstaller, ChocolateyInstaller, type PackageInstaller } from "./packages/installer.js";
import { SourceFetcher } from "./source/fetcher.js";
import { BuildExecutor } from "./build/executor.js";

export interface Toolkit {
  target: TargetFamily;
  runner: CommandRunner;
  installer: PackageInstaller;
  fetcher: SourceFetcher;
  builder: BuildExecutor;
  state: StateQuery;
}

export interface ToolkitOptions {
  target: TargetFamily;
  jobs: number;
  sudo: boolean;
  upgrade?: boolean;
  /** Where single-file downloads are staged before an elevated install. */
  stagingDir?: string;
  runner?: CommandRunner;
  fs?: HostFileSystem;
  downloader?: Downloader;
}

export function createStateQuery(fs: HostFileSystem, runner: CommandRunner, installer: PackageInstaller): StateQuery {
  return {
    pathExists: p => fs.pathExists(p),
    isFile: p => fs.isFile(p),
    isDirectory: p => fs.isDirectory(p),
    commandSucceeds: async (command, args) => (await runner.run(command, args)).ok,
    packageInstalled: name => installer.isInstalled(name),
  };
}

/** Adapters for one OS family. Real implementations unless overridden (tests pass fakes). */
export function buildToolkit(opts: ToolkitOptions): Toolkit {
  const runner = opts.runner ?? new SpawnRunner({ sudo: opts.sudo });
  const fs = opts.fs ?? new NodeFileSystem();
  const downloader = opts.downloader ?? new FetchDownloader();
  const installer: PackageInstaller = opts.target === "windows"
    ? new ChocolateyInstaller(runner)
    : new AptInstaller(runner, { upgrade: opts.upgrade });
  return {
    target: opts.target,
    runner,
    installer,
    fetcher: new SourceFetcher(fs, runner, downloader, {
      target: opts.target,
      stagingDir: opts.stagingDir ?? path.join(os.tmpdir(), "provision-pilot"),
    }),
    builder: new BuildExecutor(fs, runner, {
      target: opts.target,
      jobs: opts.jobs,
      refreshLinkerCache: opts.target === "posix",
    }),
    state: createStateQuery(fs, runner, installer),
  };
}
