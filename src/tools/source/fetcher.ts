import path from "node:path";
import type { CommandRunner, Result } from "../../types/tools.js";
import { err, ok, outputOf } from "../../types/tools.js";
import type { SourceArtifact, TargetFamily } from "../../types/contracts.js";
import type { HostFileSystem } from "../../system/host.js";
import type { Downloader } from "../http/request.js";
import { FetchError, errorMessage } from "../../errors.js";
import { getLogger } from "../../log/index.js";

export interface ArchiveOptions {
  /** Unpack into this directory; the download is skipped while it holds files. */
  extractTo?: string;
  forceClean?: boolean;
}

export interface RepositoryOptions {
  depth?: number;
  branch?: string;
  /** Update an existing checkout in place. */
  refresh?: boolean;
  /** Delete whatever sits at the destination and acquire it again. */
  forceClean?: boolean;
}

export interface SourceFetcherOptions {
  target: TargetFamily;
  /** User-owned directory where plain downloads land before being installed in place. */
  stagingDir: string;
}

export class SourceFetcher {
  constructor(
    private readonly fs: HostFileSystem,
    private readonly runner: CommandRunner,
    private readonly downloader: Downloader,
    private readonly opts: SourceFetcherOptions
  ) {}

  async fetchArchive(url: string, destPath: string, opts: ArchiveOptions = {}): Promise<Result<void, FetchError>> {
    if (opts.extractTo) return this.fetchAndExtract(url, destPath, opts.extractTo, opts.forceClean ?? false);
    return this.fetchFile(url, destPath, opts.forceClean ?? false);
  }

  private async download(url: string, destPath: string): Promise<Result<void, FetchError>> {
    getLogger().info({ url, destPath }, "downloading");
    try {
      const body = await this.downloader.download(url);
      await this.fs.writeFile(destPath, body);
    } catch (e) {
      return err(new FetchError(`download of ${url} failed: ${errorMessage(e)}`, url));
    }
    return ok(undefined);
  }

  /**
   * A single file, possibly under a root-owned prefix. On posix it is staged and
   * then put in place with an elevated `install`; an existing file is replaced.
   */
  private async fetchFile(url: string, destPath: string, forceClean: boolean): Promise<Result<void, FetchError>> {
    if (!forceClean && (await this.fs.pathExists(destPath))) {
      getLogger().debug({ destPath }, "file already present");
      return ok(undefined);
    }
    if (this.opts.target === "windows") return this.download(url, destPath);

    const staged = path.join(this.opts.stagingDir, path.basename(destPath));
    const fetched = await this.download(url, staged);
    if (!fetched.ok) return fetched;
    const res = await this.runner.run("install", ["-D", "-m", "644", staged, destPath], { elevated: true });
    await this.fs.remove(staged);
    if (!res.ok) return err(new FetchError(`installing ${destPath} failed (exit ${res.exitCode})`, url, outputOf(res)));
    return ok(undefined);
  }

  private async fetchAndExtract(url: string, archivePath: string, extractTo: string, forceClean: boolean): Promise<Result<void, FetchError>> {
    const log = getLogger();
    if (forceClean) {
      await this.fs.remove(archivePath);
      await this.fs.remove(extractTo);
    } else if (await this.fs.hasEntries(extractTo)) {
      log.debug({ extractTo }, "already extracted");
      return ok(undefined);
    }

    if (await this.fs.pathExists(archivePath)) {
      log.debug({ archivePath }, "archive already present");
    } else {
      const fetched = await this.download(url, archivePath);
      if (!fetched.ok) return fetched;
    }

    await this.fs.mkdirp(extractTo);
    const res = await this.runner.run("tar", ["-xf", archivePath, "-C", extractTo, "--strip-components=1"]);
    if (!res.ok) {
      // never leave a partial tree behind
      await this.fs.remove(extractTo);
      return err(new FetchError(`extracting ${archivePath} failed (exit ${res.exitCode})`, url, outputOf(res)));
    }
    return ok(undefined);
  }

  async fetchRepository(url: string, destPath: string, opts: RepositoryOptions = {}): Promise<Result<void, FetchError>> {
    const log = getLogger();
    let present = await this.fs.pathExists(destPath);
    if (present && opts.forceClean) {
      log.info({ destPath }, "removing existing checkout");
      await this.fs.remove(destPath);
      present = false;
    }

    if (present && !(await this.fs.pathExists(path.join(destPath, ".git")))) {
      if (await this.fs.hasEntries(destPath)) {
        return err(new FetchError(
          `${destPath} exists but is not a git checkout; rerun with --force-clean to replace it`,
          url
        ));
      }
      present = false;
    }

    if (!present) {
      const args = ["clone"];
      if (opts.depth) args.push("--depth", String(opts.depth));
      if (opts.branch) args.push("--branch", opts.branch);
      args.push(url, destPath);
      await this.fs.mkdirp(path.dirname(destPath));
      log.info({ url, destPath }, "cloning");
      const res = await this.runner.run("git", args);
      if (!res.ok) return err(new FetchError(`git clone ${url} failed (exit ${res.exitCode})`, url, outputOf(res)));
      return ok(undefined);
    }

    if (!opts.refresh) {
      log.debug({ destPath }, "checkout present, not refreshing");
      return ok(undefined);
    }

    log.info({ destPath }, "updating checkout");
    const res = await this.runner.run("git", ["-C", destPath, "pull", "--ff-only"]);
    if (!res.ok) return err(new FetchError(`git pull in ${destPath} failed (exit ${res.exitCode})`, url, outputOf(res)));
    return ok(undefined);
  }

  /** Acquire an artifact according to its origin. */
  fetch(artifact: SourceArtifact, forceClean = false): Promise<Result<void, FetchError>> {
    const { origin, localPath } = artifact;
    if (origin.type === "repository") {
      return this.fetchRepository(origin.url, localPath, {
        depth: origin.depth,
        branch: origin.branch,
        refresh: origin.refresh,
        forceClean,
      });
    }
    if (origin.extract) {
      return this.fetchArchive(origin.url, archivePathFor(artifact), { extractTo: localPath, forceClean });
    }
    return this.fetchArchive(origin.url, localPath, { forceClean });
  }
}

/** Where an archive that gets unpacked into localPath is kept: beside it, under its own file name. */
export function archivePathFor(artifact: SourceArtifact): string {
  const { origin, localPath } = artifact;
  const base = path.posix.basename(new URL(origin.url).pathname) || "archive";
  const name = origin.type === "archive" && origin.version && !base.includes(origin.version)
    ? `${origin.version}-${base}`
    : base;
  return path.join(path.dirname(localPath), name);
}
