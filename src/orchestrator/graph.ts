import type { Plan, StepState } from "../types/contracts.js";
import { shapeOf } from "../steps/registry.js";

const FILL: Record<StepState, string> = {
  PENDING: "gray",
  DONE: "green",
  FAILED: "red",
};

/**
 * Graphviz rendering of a plan. Steps without predecessors hang off "start", steps
 * nothing depends on lead to "end". Node fill shows the state, so graphing a
 * checkpoint shows how far a run got.
 */
export function renderGraph(plan: Plan): string {
  const ids = Array.from(plan.steps.keys()).sort();
  const isPrecondition = new Set<string>();
  const lines: string[] = [
    "digraph {",
    '  "start" [ shape=circle fillcolor=gray ]',
    '  "end" [ shape=octagon fillcolor=gray ]',
  ];

  const sorted = ids.flatMap(id => plan.steps.get(id) ?? []);
  for (const step of sorted) {
    lines.push(`  "${step.id}" [ shape=${shapeOf(step)} fillcolor=${FILL[step.state]} ]`);
    for (const pre of step.after) isPrecondition.add(pre);
  }
  for (const step of sorted) {
    for (const pre of step.after) lines.push(`  "${pre}" -> "${step.id}"`);
  }
  for (const step of sorted) {
    if (step.after.length === 0) lines.push(`  "start" -> "${step.id}"`);
    if (!isPrecondition.has(step.id)) lines.push(`  "${step.id}" -> "end"`);
  }
  lines.push("}");
  return lines.join("\n") + "\n";
}
