import path from "node:path";
import type { BuildOptions, SourceArtifact, TargetFamily } from "../../types/contracts.js";
import type { CommandResult, CommandRunner, Result, RunOptions } from "../../types/tools.js";
import { err, ok, outputOf, describeCommand } from "../../types/tools.js";
import type { HostFileSystem } from "../../system/host.js";
import { BuildError, type BuildPhase } from "../../errors.js";
import { stepLogger } from "../../log/index.js";

export type BuildState = "Unconfigured" | "Configured" | "Built" | "Installed";

export interface Installed {
  state: "Installed";
  /** Index into artifact.candidates of the options that built. */
  candidate: number;
  buildDir?: string;
}

export interface BuildExecutorOptions {
  target: TargetFamily;
  jobs: number;
  /** Rebuild the dynamic linker cache after install (ldconfig). */
  refreshLinkerCache: boolean;
}

type Command = { command: string; args: string[]; opts?: RunOptions };

export function autotoolsFlags(options: BuildOptions): string[] {
  const out: string[] = [];
  for (const [key, value] of Object.entries(options)) {
    if (value === false) continue;
    const flag = key.startsWith("-") ? key : `--${key}`;
    out.push(value === true ? flag : `${flag}=${value}`);
  }
  return out;
}

export function cmakeDefines(options: BuildOptions): string[] {
  return Object.entries(options).map(([key, value]) => {
    const v = value === true ? "ON" : value === false ? "OFF" : value;
    return `-D${key}=${v}`;
  });
}

function isInside(parent: string, child: string): boolean {
  const rel = path.relative(path.resolve(parent), path.resolve(child));
  return rel === "" || (!rel.startsWith("..") && !path.isAbsolute(rel));
}

export class BuildExecutor {
  constructor(
    private readonly fs: HostFileSystem,
    private readonly runner: CommandRunner,
    private readonly opts: BuildExecutorOptions
  ) {}

  defaultBuildDir(stepName: string, artifact: SourceArtifact): string {
    return artifact.buildDir ?? path.join(path.dirname(artifact.localPath), "build", stepName);
  }

  async build(stepName: string, artifact: SourceArtifact): Promise<Result<Installed, BuildError>> {
    if (!artifact.buildSystem) {
      return err(new BuildError("configure", `no build system declared for ${stepName}`));
    }
    const sourceRoot = artifact.sourceSubdir ? path.join(artifact.localPath, artifact.sourceSubdir) : artifact.localPath;
    const candidates = artifact.candidates.length ? artifact.candidates : [{}];
    return artifact.buildSystem === "CMake"
      ? this.buildCMake(stepName, artifact, sourceRoot, candidates)
      : this.buildAutotools(stepName, sourceRoot, candidates);
  }

  private async exec(phase: BuildPhase, c: Command): Promise<Result<CommandResult, BuildError>> {
    const res = await this.runner.run(c.command, c.args, c.opts);
    if (res.ok) return ok(res);
    return err(new BuildError(phase, `${describeCommand(c.command, c.args)} exited with ${res.exitCode}`, outputOf(res)));
  }

  /** Configure+build each candidate in turn; stops at the first that builds. */
  private async tryCandidates(
    stepName: string,
    candidates: BuildOptions[],
    attempt: (options: BuildOptions, index: number) => Promise<Result<unknown, BuildError>>
  ): Promise<Result<number, BuildError>> {
    const log = stepLogger(stepName);
    const failures: BuildError[] = [];
    for (let i = 0; i < candidates.length; i++) {
      const res = await attempt(candidates[i], i);
      if (res.ok) return ok(i);
      log.warn({ candidate: i, phase: res.error.phase }, "build candidate failed");
      failures.push(res.error);
    }
    const last = failures[failures.length - 1];
    if (failures.length === 1) return err(last);
    const output = failures.map((f, i) => `--- candidate ${i + 1}: ${f.message}\n${f.output}`).join("\n");
    return err(new BuildError(last.phase, `all ${failures.length} configuration candidates failed`, output));
  }

  private async refreshLinker(): Promise<Result<void, BuildError>> {
    if (!this.opts.refreshLinkerCache || this.opts.target !== "posix") return ok(undefined);
    const res = await this.exec("refresh", { command: "ldconfig", args: [], opts: { elevated: true } });
    return res.ok ? ok(undefined) : res;
  }

  private async buildAutotools(stepName: string, src: string, candidates: BuildOptions[]): Promise<Result<Installed, BuildError>> {
    const log = stepLogger(stepName);
    if (this.opts.target === "windows") {
      return err(new BuildError("configure", "autotools builds are not supported on windows targets"));
    }
    let state: BuildState = "Unconfigured";

    if (await this.fs.pathExists(path.join(src, "autogen.sh"))) {
      const gen = await this.exec("generate", { command: "./autogen.sh", args: [], opts: { cwd: src } });
      if (!gen.ok) return gen;
    }

    const built = await this.tryCandidates(stepName, candidates, async options => {
      const conf = await this.exec("configure", { command: "./configure", args: autotoolsFlags(options), opts: { cwd: src } });
      if (!conf.ok) return conf;
      state = "Configured";
      log.debug({ state }, "transition");
      return this.exec("build", { command: "make", args: [`-j${this.opts.jobs}`], opts: { cwd: src } });
    });
    if (!built.ok) return built;
    state = "Built";
    log.debug({ state }, "transition");

    const inst = await this.exec("install", { command: "make", args: ["install"], opts: { cwd: src, elevated: true } });
    if (!inst.ok) return inst;
    state = "Installed";
    log.debug({ state }, "transition");

    const refreshed = await this.refreshLinker();
    if (!refreshed.ok) return refreshed;
    return ok({ state: "Installed", candidate: built.value });
  }

  private async buildCMake(
    stepName: string,
    artifact: SourceArtifact,
    src: string,
    candidates: BuildOptions[]
  ): Promise<Result<Installed, BuildError>> {
    const log = stepLogger(stepName);
    const buildDir = this.defaultBuildDir(stepName, artifact);
    const tree = [src, artifact.localPath].find(root => isInside(root, buildDir));
    if (tree !== undefined) {
      return err(new BuildError("configure", `build directory ${buildDir} lies inside the source tree ${tree}`));
    }
    let state: BuildState = "Unconfigured";
    // multi-config generators (Visual Studio) pick the configuration at build time
    const config = this.opts.target === "windows" ? ["--config", "Release"] : [];

    const built = await this.tryCandidates(stepName, candidates, async (options, i) => {
      if (i > 0) await this.fs.remove(path.join(buildDir, "CMakeCache.txt"));
      await this.fs.mkdirp(buildDir);
      const conf = await this.exec("configure", { command: "cmake", args: ["-S", src, "-B", buildDir, ...cmakeDefines(options)] });
      if (!conf.ok) return conf;
      state = "Configured";
      log.debug({ state }, "transition");
      return this.exec("build", { command: "cmake", args: ["--build", buildDir, "--parallel", String(this.opts.jobs), ...config] });
    });
    if (!built.ok) return built;
    state = "Built";
    log.debug({ state }, "transition");

    const inst = await this.exec("install", { command: "cmake", args: ["--install", buildDir, ...config], opts: { elevated: true } });
    if (!inst.ok) return inst;
    state = "Installed";
    log.debug({ state }, "transition");

    const refreshed = await this.refreshLinker();
    if (!refreshed.ok) return refreshed;
    return ok({ state: "Installed", candidate: built.value, buildDir });
  }
}
