export type StepName = string;

export type StepKind = "PackageInstall" | "SourceBuild" | "SourceFetch";

export type FailureMode = "Fatal" | "Recoverable";

export type TargetFamily = "posix" | "windows";

export type BuildSystem = "Autotools" | "CMake";

/** Flag name to value. A `true` value renders as a bare flag, `false` drops it. */
export type BuildOptions = Record<string, string | boolean>;

export type SatisfiedCheck =
  | { type: "path"; path: string; kind?: "file" | "directory" }
  | { type: "command"; command: string; args: string[] }
  | { type: "packages" }
  | { type: "all"; checks: SatisfiedCheck[] }
  | { type: "any"; checks: SatisfiedCheck[] }
  | { type: "never" };

export type SourceOrigin =
  | { type: "archive"; url: string; version?: string; extract?: boolean }
  | { type: "repository"; url: string; depth?: number; branch?: string; refresh?: boolean };

export interface SourceArtifact {
  origin: SourceOrigin;
  localPath: string;
  // build fields are only read for SourceBuild steps
  buildSystem?: BuildSystem;
  /** Subdirectory of localPath holding the project root (e.g. "src"). */
  sourceSubdir?: string;
  buildDir?: string;
  /** Tried in order; configure+build stop at the first candidate that succeeds. */
  candidates: BuildOptions[];
}

interface StepBase {
  name: StepName;
  description?: string;
  dependsOn: StepName[];
  check: SatisfiedCheck;
  failureMode: FailureMode;
}

export interface PackageInstallStep extends StepBase {
  kind: "PackageInstall";
  packages: string[];
}

export interface SourceBuildStep extends StepBase {
  kind: "SourceBuild";
  artifact: SourceArtifact;
}

export interface SourceFetchStep extends StepBase {
  kind: "SourceFetch";
  artifact: SourceArtifact;
}

export type Step = PackageInstallStep | SourceBuildStep | SourceFetchStep;

export type StepOutcome =
  | { status: "Satisfied" }
  | { status: "Succeeded" }
  | { status: "Skipped"; reason: string }
  | { status: "Failed"; reason: string };

export type StepStatus = StepOutcome["status"];

export interface VersionProbe {
  name: string;
  command: string;
  args: string[];
}

export const NOT_FOUND = "not found";

export interface RunReport {
  target: TargetFamily;
  order: StepName[];
  stepResults: Record<StepName, StepOutcome>;
  aborted: boolean;
  abortedBy?: StepName;
  verification: Record<string, string>;
  startedAt: string;
  finishedAt: string;
}
