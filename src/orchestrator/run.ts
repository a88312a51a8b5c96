// src/orchestrator/run.ts
// Sequential pipeline: one step at a time in dependency order. Each step runs at
// most once; failures are classified at the step boundary by its failureMode.

import type { RunReport, Step, StepName, StepOutcome, VersionProbe } from "../types/contracts.js";
import type { Toolkit } from "../tools/registry.js";
import { topoSort } from "./topo.js";
import { isSatisfied } from "./checks.js";
import { verifyInstallation } from "./verify.js";
import { COLOR, statusLabel } from "./report.js";
import { stepLogger } from "../log/index.js";
import { errorMessage } from "../errors.js";

export interface RunOptions {
  skip?: StepName[];
  forceClean?: boolean;
  probes?: VersionProbe[];
  /** Suppress progress lines on stdout. */
  quiet?: boolean;
}

const fmtMs = (ms: number) => (ms < 10_000 ? `${Math.round(ms)}ms` : `${(ms / 1000).toFixed(1)}s`);

export function isDone(outcome: StepOutcome | undefined): boolean {
  return outcome?.status === "Satisfied" || outcome?.status === "Succeeded";
}

export async function executeStep(step: Step, toolkit: Toolkit, forceClean: boolean): Promise<StepOutcome> {
  const log = stepLogger(step.name);
  switch (step.kind) {
    case "PackageInstall": {
      const failed: string[] = [];
      // every package is attempted; one failure does not stop the others
      for (const pkg of step.packages) {
        const res = await toolkit.installer.install(pkg);
        if (!res.ok) {
          log.error({ package: pkg, output: res.error.output }, res.error.message);
          failed.push(pkg);
        }
      }
      if (failed.length) return { status: "Failed", reason: `${toolkit.installer.manager} could not install: ${failed.join(", ")}` };
      return { status: "Succeeded" };
    }
    case "SourceFetch": {
      const res = await toolkit.fetcher.fetch(step.artifact, forceClean);
      if (!res.ok) {
        log.error({ url: res.error.url, output: res.error.output }, res.error.message);
        return { status: "Failed", reason: res.error.message };
      }
      return { status: "Succeeded" };
    }
    case "SourceBuild": {
      const fetched = await toolkit.fetcher.fetch(step.artifact, forceClean);
      if (!fetched.ok) {
        log.error({ url: fetched.error.url, output: fetched.error.output }, fetched.error.message);
        return { status: "Failed", reason: fetched.error.message };
      }
      const built = await toolkit.builder.build(step.name, step.artifact);
      if (!built.ok) {
        log.error({ phase: built.error.phase, output: built.error.output }, built.error.message);
        return { status: "Failed", reason: built.error.message };
      }
      log.info({ candidate: built.value.candidate }, "installed");
      return { status: "Succeeded" };
    }
  }
}

export async function runPipeline(steps: Step[], toolkit: Toolkit, opts: RunOptions = {}): Promise<RunReport> {
  // throws GraphError/CycleError before any step is touched
  const order = topoSort(steps);
  const byName = new Map(steps.map(s => [s.name, s] as const));
  const skip = new Set(opts.skip ?? []);
  const logSteps = !opts.quiet && process.env.QUIET !== "1" && (process.env.LOG_STEPS ?? "1") !== "0";
  const startedAt = new Date().toISOString();

  const stepResults: Record<StepName, StepOutcome> = {};
  let abortedBy: StepName | undefined;
  let idx = 0;

  for (const name of order) {
    const step = byName.get(name);
    if (!step) continue;
    idx++;

    if (abortedBy !== undefined) {
      stepResults[name] = { status: "Skipped", reason: `aborted after fatal failure of ${abortedBy}` };
      continue;
    }

    const t0 = Date.now();
    if (logSteps) {
      const desc = step.description ? COLOR.gray(" — " + step.description) : "";
      console.log(`\n${COLOR.cyan("▶ step")} ${idx}/${order.length} ${name}${desc}`);
    }

    let outcome: StepOutcome;
    if (skip.has(name)) {
      outcome = { status: "Skipped", reason: "skipped by request" };
    } else if (await isSatisfied(step, toolkit.state)) {
      outcome = { status: "Satisfied" };
    } else {
      const blocked = step.dependsOn.find(d => !isDone(stepResults[d]));
      if (blocked !== undefined) {
        outcome = { status: "Skipped", reason: `dependency failed: ${blocked}` };
      } else {
        try {
          outcome = await executeStep(step, toolkit, opts.forceClean ?? false);
        } catch (e) {
          outcome = { status: "Failed", reason: errorMessage(e) };
        }
      }
    }

    stepResults[name] = outcome;
    if (outcome.status === "Failed" && step.failureMode === "Fatal") abortedBy = name;

    if (logSteps) {
      const reason = "reason" in outcome ? COLOR.gray(" — " + outcome.reason) : "";
      console.log(`${statusLabel(outcome.status)} ${name}${reason} ${COLOR.gray("(" + fmtMs(Date.now() - t0) + ")")}`);
    }
  }

  // runs after aborts too, to report the partial state
  const verification = await verifyInstallation(opts.probes ?? [], toolkit.runner);

  return {
    target: toolkit.target,
    order,
    stepResults,
    aborted: abortedBy !== undefined,
    abortedBy,
    verification,
    startedAt,
    finishedAt: new Date().toISOString(),
  };
}
