import type { Step, StepName } from "../types/contracts.js";
import { CycleError, GraphError } from "../errors.js";

/** Rejects duplicate names, unknown dependencies and cycles before anything runs. */
export function validateGraph(steps: Step[]): void {
  const names = new Set<StepName>();
  for (const s of steps) {
    if (names.has(s.name)) throw new GraphError(`Duplicate step name "${s.name}"`);
    names.add(s.name);
  }
  for (const s of steps) {
    for (const d of s.dependsOn) {
      if (!names.has(d)) throw new GraphError(`Step "${s.name}" depends on unknown step "${d}"`);
      if (d === s.name) throw new CycleError([s.name, s.name]);
    }
  }
  const cycle = findCycle(steps);
  if (cycle) throw new CycleError(cycle);
}

function findCycle(steps: Step[]): StepName[] | null {
  const deps = new Map(steps.map(s => [s.name, s.dependsOn] as const));
  const color = new Map<StepName, "grey" | "black">();
  const stack: StepName[] = [];

  const visit = (n: StepName): StepName[] | null => {
    color.set(n, "grey");
    stack.push(n);
    for (const d of deps.get(n) ?? []) {
      const c = color.get(d);
      if (c === "grey") return [...stack.slice(stack.indexOf(d)), d];
      if (c === undefined) {
        const found = visit(d);
        if (found) return found;
      }
    }
    stack.pop();
    color.set(n, "black");
    return null;
  };

  for (const s of steps) {
    if (!color.has(s.name)) {
      const found = visit(s.name);
      if (found) return found;
    }
  }
  return null;
}

/**
 * Kahn's algorithm. Among ready steps the one declared first runs first, so
 * the order is deterministic and equals declaration order when that is
 * already valid.
 */
export function topoSort(steps: Step[]): StepName[] {
  validateGraph(steps);
  const indeg = new Map<StepName, number>();
  const adj = new Map<StepName, StepName[]>();
  const position = new Map<StepName, number>();
  steps.forEach((s, i) => {
    indeg.set(s.name, s.dependsOn.length);
    adj.set(s.name, []);
    position.set(s.name, i);
  });
  for (const s of steps) {
    for (const d of s.dependsOn) adj.get(d)?.push(s.name);
  }

  const byPosition = (a: StepName, b: StepName) => (position.get(a) ?? 0) - (position.get(b) ?? 0);
  const ready = steps.filter(s => s.dependsOn.length === 0).map(s => s.name);
  const out: StepName[] = [];
  while (ready.length) {
    ready.sort(byPosition);
    const u = ready.shift();
    if (u === undefined) break;
    out.push(u);
    for (const v of adj.get(u) ?? []) {
      const left = (indeg.get(v) ?? 0) - 1;
      indeg.set(v, left);
      if (left === 0) ready.push(v);
    }
  }
  if (out.length !== steps.length) {
    throw new GraphError("Step graph could not be ordered");
  }
  return out;
}
