import type { StepName } from "./types/contracts.js";

export class ProvisionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Duplicate step names or a dependency on a step that does not exist. */
export class GraphError extends ProvisionError {}

export class CycleError extends GraphError {
  constructor(readonly cycle: StepName[]) {
    super(`Step graph has a cycle: ${cycle.join(" -> ")}`);
  }
}

export class FetchError extends ProvisionError {
  constructor(message: string, readonly url: string, readonly output = "") {
    super(message);
  }
}

export type BuildPhase = "generate" | "configure" | "build" | "install" | "refresh";

export class BuildError extends ProvisionError {
  constructor(readonly phase: BuildPhase, message: string, readonly output = "") {
    super(`${phase} failed: ${message}`);
  }
}

export class InstallError extends ProvisionError {
  constructor(readonly packageName: string, message: string, readonly output = "") {
    super(message);
  }
}

export class ManifestError extends ProvisionError {
  constructor(readonly source: string, readonly issues: string[]) {
    super(`Invalid manifest ${source}: ${issues.join("; ")}`);
  }
}

export class ConfigError extends ProvisionError {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
