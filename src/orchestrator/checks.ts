import type { SatisfiedCheck, Step } from "../types/contracts.js";
import type { StateQuery } from "../system/host.js";
import { getLogger } from "../log/index.js";
import { errorMessage } from "../errors.js";

async function evalCheck(check: SatisfiedCheck, step: Step, state: StateQuery): Promise<boolean> {
  switch (check.type) {
    case "path":
      if (check.kind === "file") return state.isFile(check.path);
      if (check.kind === "directory") return state.isDirectory(check.path);
      return state.pathExists(check.path);
    case "command":
      return state.commandSucceeds(check.command, check.args);
    case "packages": {
      if (step.kind !== "PackageInstall" || step.packages.length === 0) return false;
      for (const p of step.packages) {
        if (!(await state.packageInstalled(p))) return false;
      }
      return true;
    }
    case "all":
      for (const c of check.checks) {
        if (!(await evalCheck(c, step, state))) return false;
      }
      return check.checks.length > 0;
    case "any":
      for (const c of check.checks) {
        if (await evalCheck(c, step, state)) return true;
      }
      return false;
    case "never":
      return false;
  }
}

/**
 * Whether the step's effect already exists on the host. Evaluated against live
 * state every run; a probe that throws counts as not satisfied.
 */
export async function isSatisfied(step: Step, state: StateQuery): Promise<boolean> {
  try {
    return await evalCheck(step.check, step, state);
  } catch (e) {
    getLogger().warn({ step: step.name, error: errorMessage(e) }, "idempotency check failed; treating step as not satisfied");
    return false;
  }
}
