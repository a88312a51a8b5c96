// src/tools/cli/exec.ts (cross-platform process runner)
import { spawn } from "node:child_process";
import type { CommandResult, CommandRunner, RunOptions } from "../../types/tools.js";
import { describeCommand } from "../../types/tools.js";
import { getLogger } from "../../log/index.js";

function isWin(): boolean { return process.platform === "win32"; }

// Keep the tail of long build logs; configure/make output runs to megabytes.
const MAX_CAPTURE = 64 * 1024;

function appendCapped(buf: string, chunk: string): string {
  const next = buf + chunk;
  return next.length > MAX_CAPTURE ? next.slice(next.length - MAX_CAPTURE) : next;
}

/**
 * Quote one argument for the cmd.exe line Node assembles when `shell` is set;
 * Node joins the argv with plain spaces there.
 */
export function quoteWindowsArg(arg: string): string {
  if (arg !== "" && !/[\s"&|<>^()]/.test(arg)) return arg;
  const escaped = arg.replace(/(\\*)"/g, '$1$1\\"').replace(/(\\+)$/, "$1$1");
  return `"${escaped}"`;
}

export interface SpawnRunnerOptions {
  /** Elevate `elevated` commands with sudo (POSIX only). */
  sudo: boolean;
}

export class SpawnRunner implements CommandRunner {
  constructor(private readonly opts: SpawnRunnerOptions = { sudo: false }) {}

  run(command: string, args: string[], opts: RunOptions = {}): Promise<CommandResult> {
    let cmd = command;
    let argv = args;
    if (opts.elevated && this.opts.sudo && !isWin()) {
      cmd = "sudo";
      argv = [command, ...args];
    }
    const log = getLogger();
    log.debug({ cmd: describeCommand(cmd, argv), cwd: opts.cwd }, "exec");
    if (isWin()) {
      cmd = quoteWindowsArg(cmd);
      argv = argv.map(quoteWindowsArg);
    }

    return new Promise(resolve => {
      let stdout = "";
      let stderr = "";
      let settled = false;
      const finish = (res: CommandResult) => {
        if (settled) return;
        settled = true;
        resolve(res);
      };

      const child = spawn(cmd, argv, {
        cwd: opts.cwd,
        env: opts.env ? { ...process.env, ...opts.env } : process.env,
        stdio: ["ignore", "pipe", "pipe"],
        // Windows needs the shell to resolve .cmd/.bat shims (choco, cmake wrappers).
        shell: isWin(),
        timeout: opts.timeoutMs,
      });

      child.stdout.on("data", (d: Buffer) => { stdout = appendCapped(stdout, d.toString()); });
      child.stderr.on("data", (d: Buffer) => { stderr = appendCapped(stderr, d.toString()); });

      child.on("error", (e: NodeJS.ErrnoException) => {
        log.debug({ cmd, code: e.code }, "spawn failed");
        finish({ ok: false, exitCode: e.code ?? "ERR", stdout, stderr: stderr || e.message });
      });

      child.on("close", (code, signal) => {
        const exitCode = code ?? signal ?? "ERR";
        finish({ ok: code === 0, exitCode, stdout, stderr });
      });
    });
  }
}
