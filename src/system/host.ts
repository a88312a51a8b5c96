import { mkdir, readdir, rm, stat, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

export interface HostFileSystem {
  pathExists(p: string): Promise<boolean>;
  isFile(p: string): Promise<boolean>;
  isDirectory(p: string): Promise<boolean>;
  /** True when p is a directory with at least one entry. */
  hasEntries(p: string): Promise<boolean>;
  mkdirp(p: string): Promise<void>;
  remove(p: string): Promise<void>;
  writeFile(p: string, data: Uint8Array): Promise<void>;
}

/** Read-only view of host state that idempotency checks are evaluated against. */
export interface StateQuery {
  pathExists(p: string): Promise<boolean>;
  isFile(p: string): Promise<boolean>;
  isDirectory(p: string): Promise<boolean>;
  commandSucceeds(command: string, args: string[]): Promise<boolean>;
  packageInstalled(name: string): Promise<boolean>;
}

async function statOrNull(p: string) {
  try {
    return await stat(p);
  } catch (e: unknown) {
    if (e instanceof Error && "code" in e && (e.code === "ENOENT" || e.code === "ENOTDIR")) return null;
    throw e;
  }
}

export class NodeFileSystem implements HostFileSystem {
  async pathExists(p: string) { return (await statOrNull(p)) !== null; }
  async isFile(p: string) { return (await statOrNull(p))?.isFile() ?? false; }
  async isDirectory(p: string) { return (await statOrNull(p))?.isDirectory() ?? false; }

  async hasEntries(p: string) {
    if (!(await this.isDirectory(p))) return false;
    return (await readdir(p)).length > 0;
  }

  async mkdirp(p: string) { await mkdir(p, { recursive: true }); }
  async remove(p: string) { await rm(p, { recursive: true, force: true }); }

  async writeFile(p: string, data: Uint8Array) {
    await mkdir(dirname(p), { recursive: true });
    await writeFile(p, data);
  }
}
