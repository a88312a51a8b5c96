export interface RunOptions {
  cwd?: string;
  env?: Record<string, string>;
  /** Prefix with sudo on POSIX hosts when elevation is configured. */
  elevated?: boolean;
  timeoutMs?: number;
}

export interface CommandResult {
  ok: boolean;
  /** Exit code, or a spawn error code such as "ENOENT". */
  exitCode: number | string;
  stdout: string;
  stderr: string;
}

export interface CommandRunner {
  run(command: string, args: string[], opts?: RunOptions): Promise<CommandResult>;
}

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

export function describeCommand(command: string, args: string[]): string {
  return [command, ...args].map(a => (/\s/.test(a) ? JSON.stringify(a) : a)).join(" ");
}

export function outputOf(res: CommandResult): string {
  return [res.stdout, res.stderr].map(s => s.trim()).filter(Boolean).join("\n");
}
