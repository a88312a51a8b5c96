import type { RunReport, StepStatus } from "../types/contracts.js";
import { NOT_FOUND } from "../types/contracts.js";

/** ANSI colors only on a terminal, and never under NO_COLOR or QUIET=1. */
export function colorEnabled(env: Record<string, string | undefined>, isTTY: boolean): boolean {
  return isTTY && env.NO_COLOR === undefined && env.QUIET !== "1";
}

const useColor = colorEnabled(process.env, Boolean(process.stdout.isTTY));
const paint = (code: string) => (s: string) => (useColor ? `\x1b[${code}m${s}\x1b[0m` : s);

export const COLOR = {
  gray: paint("90"),
  cyan: paint("36"),
  green: paint("32"),
  yellow: paint("33"),
  red: paint("31"),
  magenta: paint("35"),
};

const STATUS_COLOR: Record<StepStatus, (s: string) => string> = {
  Satisfied: COLOR.green,
  Succeeded: COLOR.green,
  Skipped: COLOR.yellow,
  Failed: COLOR.red,
};

const STATUS_MARK: Record<StepStatus, string> = {
  Satisfied: "=",
  Succeeded: "✓",
  Skipped: "-",
  Failed: "✗",
};

export function statusLabel(status: StepStatus): string {
  return STATUS_COLOR[status](`${STATUS_MARK[status]} ${status.toLowerCase()}`);
}

export const EXIT_OK = 0;
export const EXIT_ABORTED = 1;
export const EXIT_INVALID_GRAPH = 2;

/** Recoverable failures and skips still exit 0; only an abort is a failed run. */
export function exitCodeFor(report: RunReport): number {
  return report.aborted ? EXIT_ABORTED : EXIT_OK;
}

export function countByStatus(report: RunReport): Record<StepStatus, number> {
  const counts: Record<StepStatus, number> = { Satisfied: 0, Succeeded: 0, Skipped: 0, Failed: 0 };
  for (const outcome of Object.values(report.stepResults)) counts[outcome.status]++;
  return counts;
}

/** Plain-text report, one line per step in execution order. */
export function formatReport(report: RunReport): string[] {
  const lines: string[] = ["Steps:"];
  const width = Math.max(0, ...report.order.map(n => n.length));
  for (const name of report.order) {
    const outcome = report.stepResults[name];
    if (!outcome) continue;
    const reason = "reason" in outcome ? `  ${outcome.reason}` : "";
    lines.push(`  ${name.padEnd(width)}  ${outcome.status}${reason}`);
  }

  const tools = Object.keys(report.verification);
  if (tools.length) {
    lines.push("Verification:");
    const w = Math.max(...tools.map(t => t.length));
    for (const t of tools) lines.push(`  ${t.padEnd(w)}  ${report.verification[t]}`);
  }

  const c = countByStatus(report);
  const tail = report.aborted ? ` (aborted by ${report.abortedBy})` : "";
  lines.push(`Summary: ${c.Satisfied} satisfied, ${c.Succeeded} succeeded, ${c.Skipped} skipped, ${c.Failed} failed${tail}`);
  return lines;
}

export function printReport(report: RunReport): void {
  for (const line of formatReport(report)) {
    if (line.startsWith("Summary:")) {
      console.log(report.aborted ? COLOR.red(line) : COLOR.green(line));
    } else if (line.endsWith(`  ${NOT_FOUND}`)) {
      console.log(COLOR.yellow(line));
    } else {
      console.log(line);
    }
  }
}
