// src/runner.ts
// CLI argument parsing and the `run` command: config -> manifest -> toolkit ->
// pipeline -> report. Returns the process exit code instead of exiting.
import os from "node:os";
import path from "node:path";
import type { ConfigOverrides, ProvisionConfig } from "./config/index.js";
import type { RunReport } from "./types/contracts.js";
import { builtinManifestPath, loadManifest, type CompiledManifest } from "./orchestrator/compiler.js";
import { runPipeline } from "./orchestrator/run.js";
import { EXIT_INVALID_GRAPH, exitCodeFor, printReport, COLOR } from "./orchestrator/report.js";
import { writeReport } from "./orchestrator/materialize.js";
import { buildToolkit, type Toolkit } from "./tools/registry.js";
import { GraphError, ManifestError, ProvisionError, errorMessage } from "./errors.js";
import { getLogger } from "./log/index.js";

export const USAGE = `Usage: provision-pilot run [options]

Options:
  --target <posix|windows>  step list variant (default: this host's family)
  --manifest <file>         use a custom step manifest instead of the built-in one
  --force-clean             delete and re-acquire existing checkouts and downloads
  --skip <step>             skip a step (repeatable, or comma-separated)
  --src-dir <dir>           where sources are checked out (default: ~/src)
  --prefix <dir>            installation prefix (default: /usr/local, C:\\local)
  --jobs <n>                compiler parallelism (default: CPU count)
  --report <file>           also write the run report as JSON
  -h, --help                show this help`;

export class UsageError extends ProvisionError {}

export interface ParsedArgs {
  command: "run" | "help";
  overrides: ConfigOverrides;
}

const VALUE_FLAGS = {
  "--target": "target",
  "--manifest": "manifestPath",
  "--src-dir": "srcDir",
  "--prefix": "prefix",
  "--jobs": "jobs",
  "--report": "reportPath",
} as const;

function isValueFlag(name: string): name is keyof typeof VALUE_FLAGS {
  return name in VALUE_FLAGS;
}

/** Parses argv without the node binary and script path. */
export function parseArgs(argv: string[]): ParsedArgs {
  const overrides: ConfigOverrides = {};
  const skip: string[] = [];
  let command: ParsedArgs["command"] | undefined;

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (a === "-h" || a === "--help") return { command: "help", overrides };
    if (!a.startsWith("-")) {
      if (command) throw new UsageError(`Unexpected argument "${a}"`);
      if (a !== "run") throw new UsageError(`Unknown command "${a}"`);
      command = "run";
      continue;
    }
    const eq = a.indexOf("=");
    const name = eq > 0 ? a.slice(0, eq) : a;
    const takeValue = (): string => {
      if (eq > 0) return a.slice(eq + 1);
      const next = argv[i + 1];
      if (next === undefined || next.startsWith("--")) throw new UsageError(`${name} needs a value`);
      i++;
      return next;
    };

    if (name === "--force-clean") {
      if (eq > 0) throw new UsageError("--force-clean takes no value");
      overrides.forceClean = true;
    } else if (name === "--skip") {
      skip.push(...takeValue().split(",").map(s => s.trim()).filter(Boolean));
    } else if (isValueFlag(name)) {
      overrides[VALUE_FLAGS[name]] = takeValue();
    } else {
      throw new UsageError(`Unknown option "${name}"`);
    }
  }

  if (!command) throw new UsageError("Missing command");
  if (skip.length) overrides.skip = skip;
  return { command, overrides };
}

export interface ProvisionOutcome {
  code: number;
  report?: RunReport;
}

export interface ProvisionDeps {
  /** Adapters to use instead of the real host ones. */
  toolkit?: Toolkit;
  quiet?: boolean;
}

export async function runProvision(config: ProvisionConfig, deps: ProvisionDeps = {}): Promise<ProvisionOutcome> {
  const log = getLogger();
  const manifestPath = config.manifestPath ?? builtinManifestPath(config.target);

  let manifest: CompiledManifest;
  try {
    manifest = loadManifest(manifestPath, { prefix: config.prefix, srcDir: config.srcDir, home: os.homedir() });
  } catch (e) {
    if (e instanceof ManifestError) {
      console.error(COLOR.red(`[error] ${e.message}`));
      return { code: EXIT_INVALID_GRAPH };
    }
    throw e;
  }
  if (manifest.target !== config.target) {
    console.error(COLOR.red(`[error] manifest ${manifest.name} targets ${manifest.target}, not ${config.target}`));
    return { code: EXIT_INVALID_GRAPH };
  }

  const known = new Set(manifest.steps.map(s => s.name));
  for (const name of config.skip) {
    if (!known.has(name)) log.warn({ step: name }, "--skip names a step that is not in the manifest");
  }

  const toolkit = deps.toolkit ?? buildToolkit({
    target: config.target,
    jobs: config.jobs,
    sudo: config.sudo,
    upgrade: config.upgrade,
    stagingDir: path.join(config.srcDir, ".downloads"),
  });

  let report: RunReport;
  try {
    report = await runPipeline(manifest.steps, toolkit, {
      skip: config.skip,
      forceClean: config.forceClean,
      probes: manifest.probes,
      quiet: deps.quiet,
    });
  } catch (e) {
    if (e instanceof GraphError) {
      console.error(COLOR.red(`[error] ${e.message}`));
      return { code: EXIT_INVALID_GRAPH };
    }
    throw e;
  }

  if (!deps.quiet) {
    console.log("");
    printReport(report);
  }
  if (config.reportPath) {
    // the run's outcome stands even when the report cannot be saved
    try {
      const written = writeReport(config.reportPath, report);
      log.info({ path: written }, "report written");
    } catch (e) {
      log.error({ path: config.reportPath, error: errorMessage(e) }, "could not write report");
      console.error(COLOR.red(`[error] could not write report to ${config.reportPath}: ${errorMessage(e)}`));
    }
  }
  return { code: exitCodeFor(report), report };
}
