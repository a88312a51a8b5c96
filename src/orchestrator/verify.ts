import * as semver from "semver";
import type { VersionProbe } from "../types/contracts.js";
import { NOT_FOUND } from "../types/contracts.js";
import type { CommandRunner } from "../types/tools.js";
import { getLogger } from "../log/index.js";
import { errorMessage } from "../errors.js";

/**
 * Pulls a version out of tool output such as "tesseract 5.3.4-42-g1234",
 * "cmake version 3.28.3" or a bare "4.9.0". Falls back to the first line.
 */
export function parseVersion(output: string): string | null {
  const text = output.trim();
  if (!text) return null;
  const coerced = semver.coerce(text);
  if (coerced) return coerced.version;
  return text.split(/\r?\n/)[0].trim();
}

/** Observational only: never throws, never changes the run's outcome. */
export async function verifyInstallation(probes: VersionProbe[], runner: CommandRunner): Promise<Record<string, string>> {
  const log = getLogger();
  const found: Record<string, string> = {};
  for (const probe of probes) {
    try {
      const res = await runner.run(probe.command, probe.args, { timeoutMs: 30_000 });
      // some tools print --version on stderr
      const version = res.ok ? parseVersion(res.stdout) ?? parseVersion(res.stderr) : null;
      found[probe.name] = version ?? NOT_FOUND;
    } catch (e) {
      log.debug({ probe: probe.name, error: errorMessage(e) }, "probe failed");
      found[probe.name] = NOT_FOUND;
    }
  }
  return found;
}
