import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import type {
  BuildOptions,
  FailureMode,
  SatisfiedCheck,
  SourceArtifact,
  Step,
  StepKind,
  TargetFamily,
  VersionProbe,
} from "../types/contracts.js";
import { ManifestError, errorMessage } from "../errors.js";

const CheckSchema: z.ZodType<SatisfiedCheck, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.discriminatedUnion("type", [
    z.object({ type: z.literal("path"), path: z.string().min(1), kind: z.enum(["file", "directory"]).optional() }),
    z.object({ type: z.literal("command"), command: z.string().min(1), args: z.array(z.string()).default([]) }),
    z.object({ type: z.literal("packages") }),
    z.object({ type: z.literal("all"), checks: z.array(CheckSchema).min(1) }),
    z.object({ type: z.literal("any"), checks: z.array(CheckSchema).min(1) }),
    z.object({ type: z.literal("never") }),
  ])
);

const BuildOptionsSchema = z.record(z.union([z.string(), z.boolean()]));

const OriginSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("archive"),
    url: z.string().url(),
    version: z.string().optional(),
    extract: z.boolean().optional(),
  }),
  z.object({
    type: z.literal("repository"),
    url: z.string().min(1),
    depth: z.number().int().positive().optional(),
    branch: z.string().optional(),
    refresh: z.boolean().optional(),
  }),
]);

const SourceSchema = z.object({
  origin: OriginSchema,
  localPath: z.string().min(1),
  buildSystem: z.enum(["Autotools", "CMake"]).optional(),
  sourceSubdir: z.string().optional(),
  buildDir: z.string().optional(),
  /** Shared by every candidate. */
  options: BuildOptionsSchema.default({}),
  /** Alternative option sets laid over `options`, tried in order. */
  candidates: z.array(BuildOptionsSchema).optional(),
});

const StepBaseSchema = {
  name: z.string().min(1),
  description: z.string().optional(),
  dependsOn: z.array(z.string()).default([]),
  failureMode: z.enum(["Fatal", "Recoverable"]).optional(),
  check: CheckSchema,
};

const StepSchema = z.discriminatedUnion("kind", [
  z.object({ ...StepBaseSchema, kind: z.literal("PackageInstall"), packages: z.array(z.string().min(1)).min(1) }),
  z.object({
    ...StepBaseSchema,
    kind: z.literal("SourceBuild"),
    source: SourceSchema.refine(s => s.buildSystem !== undefined, { message: "buildSystem is required", path: ["buildSystem"] }),
  }),
  z.object({ ...StepBaseSchema, kind: z.literal("SourceFetch"), source: SourceSchema }),
]);

export const ManifestSchema = z.object({
  name: z.string().min(1),
  target: z.enum(["posix", "windows"]),
  probes: z.array(z.object({ name: z.string().min(1), command: z.string().min(1), args: z.array(z.string()).default([]) })).default([]),
  steps: z.array(StepSchema),
});

export interface CompiledManifest {
  name: string;
  target: TargetFamily;
  probes: VersionProbe[];
  steps: Step[];
}

export type ManifestVars = Record<string, string>;

const DEFAULT_FAILURE_MODE: Record<StepKind, FailureMode> = {
  PackageInstall: "Recoverable",
  SourceBuild: "Fatal",
  SourceFetch: "Recoverable",
};

/** Replace ${name} placeholders in every string of a parsed JSON value. */
export function expandPlaceholders(value: unknown, vars: ManifestVars, source = "manifest"): unknown {
  const unknownNames = new Set<string>();
  const walk = (v: unknown): unknown => {
    if (typeof v === "string") {
      return v.replace(/\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g, (m, key: string) => {
        const hit = vars[key];
        if (hit === undefined) {
          unknownNames.add(key);
          return m;
        }
        return hit;
      });
    }
    if (Array.isArray(v)) return v.map(walk);
    if (v !== null && typeof v === "object") {
      return Object.fromEntries(Object.entries(v).map(([k, inner]) => [k, walk(inner)]));
    }
    return v;
  };
  const out = walk(value);
  if (unknownNames.size) {
    throw new ManifestError(source, [...unknownNames].map(n => `unknown placeholder \${${n}}`));
  }
  return out;
}

function toArtifact(source: z.infer<typeof SourceSchema>): SourceArtifact {
  const base: BuildOptions = source.options;
  const candidates = source.candidates?.length
    ? source.candidates.map(c => ({ ...base, ...c }))
    : [base];
  return {
    origin: source.origin,
    localPath: source.localPath,
    buildSystem: source.buildSystem,
    sourceSubdir: source.sourceSubdir,
    buildDir: source.buildDir,
    candidates,
  };
}

export function compileManifest(raw: unknown, vars: ManifestVars, source = "manifest"): CompiledManifest {
  const expanded = expandPlaceholders(raw, vars, source);
  const parsed = ManifestSchema.safeParse(expanded);
  if (!parsed.success) {
    throw new ManifestError(source, parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`));
  }
  const m = parsed.data;
  const steps: Step[] = m.steps.map((s): Step => {
    const common = {
      name: s.name,
      description: s.description,
      dependsOn: s.dependsOn,
      check: s.check,
      failureMode: s.failureMode ?? DEFAULT_FAILURE_MODE[s.kind],
    };
    switch (s.kind) {
      case "PackageInstall":
        return { ...common, kind: s.kind, packages: s.packages };
      case "SourceBuild":
        return { ...common, kind: s.kind, artifact: toArtifact(s.source) };
      case "SourceFetch":
        return { ...common, kind: s.kind, artifact: toArtifact(s.source) };
    }
  });
  return { name: m.name, target: m.target, probes: m.probes, steps };
}

export function builtinManifestPath(target: TargetFamily): string {
  return fileURLToPath(new URL(`../../manifests/${target}.json`, import.meta.url));
}

export function loadManifest(filePath: string, vars: ManifestVars): CompiledManifest {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (e) {
    throw new ManifestError(filePath, [errorMessage(e)]);
  }
  return compileManifest(raw, vars, filePath);
}
