import os from "node:os";
import path from "node:path";
import { z } from "zod";
import { ConfigError } from "../errors.js";
import type { TargetFamily } from "../types/contracts.js";

const boolFromEnv = z
  .enum(["1", "0", "true", "false", "yes", "no"])
  .transform(v => v === "1" || v === "true" || v === "yes");

export const ProvisionConfigSchema = z.object({
  target: z.enum(["posix", "windows"]),
  manifestPath: z.string().min(1).optional(),
  srcDir: z.string().min(1),
  prefix: z.string().min(1),
  jobs: z.coerce.number().int().min(1).max(512),
  sudo: z.boolean(),
  upgrade: z.boolean().default(false),
  forceClean: z.boolean().default(false),
  skip: z.array(z.string().min(1)).default([]),
  reportPath: z.string().min(1).optional(),
  logLevel: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("warn"),
});

export type ProvisionConfig = z.infer<typeof ProvisionConfigSchema>;

export type ConfigOverrides = Partial<{
  target: string;
  manifestPath: string;
  srcDir: string;
  prefix: string;
  jobs: string;
  forceClean: boolean;
  skip: string[];
  reportPath: string;
}>;

type Env = Record<string, string | undefined>;

export function hostFamily(platform: NodeJS.Platform = process.platform): TargetFamily {
  return platform === "win32" ? "windows" : "posix";
}

function defaultPrefix(target: TargetFamily): string {
  return target === "windows" ? "C:\\local" : "/usr/local";
}

function isRoot(): boolean {
  return typeof process.getuid === "function" && process.getuid() === 0;
}

/**
 * Merge environment and CLI overrides (CLI wins) into a validated config.
 * Throws ConfigError listing every invalid field.
 */
export function loadConfig(overrides: ConfigOverrides = {}, env: Env = process.env): ProvisionConfig {
  const target = overrides.target ?? env.PROVISION_TARGET ?? hostFamily();
  const family: TargetFamily = target === "windows" ? "windows" : "posix";

  const sudoRaw = env.PROVISION_SUDO !== undefined ? boolFromEnv.safeParse(env.PROVISION_SUDO) : undefined;
  const upgradeRaw = env.PROVISION_UPGRADE !== undefined ? boolFromEnv.safeParse(env.PROVISION_UPGRADE) : undefined;
  const issues: string[] = [];
  if (sudoRaw && !sudoRaw.success) issues.push(`PROVISION_SUDO: expected a boolean, got "${env.PROVISION_SUDO}"`);
  if (upgradeRaw && !upgradeRaw.success) issues.push(`PROVISION_UPGRADE: expected a boolean, got "${env.PROVISION_UPGRADE}"`);

  const candidate = {
    target,
    manifestPath: overrides.manifestPath ?? env.PROVISION_MANIFEST,
    srcDir: overrides.srcDir ?? env.PROVISION_SRC_DIR ?? path.join(os.homedir(), "src"),
    prefix: overrides.prefix ?? env.PROVISION_PREFIX ?? defaultPrefix(family),
    jobs: overrides.jobs ?? env.PROVISION_JOBS ?? os.availableParallelism(),
    sudo: sudoRaw?.success ? sudoRaw.data : family === "posix" && !isRoot(),
    upgrade: upgradeRaw?.success ? upgradeRaw.data : false,
    forceClean: overrides.forceClean ?? false,
    skip: overrides.skip ?? [],
    reportPath: overrides.reportPath ?? env.PROVISION_REPORT,
    logLevel: env.LOG_LEVEL,
  };

  const parsed = ProvisionConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    issues.push(...parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`));
  }
  if (issues.length || !parsed.success) throw new ConfigError(issues);
  return parsed.data;
}
