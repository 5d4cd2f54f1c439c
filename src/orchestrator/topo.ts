import type { Plan, StepId } from "../types/contracts.js";
import type { GraphProblem } from "../errors.js";

export type { GraphProblem };

/**
 * Walk each step's predecessor chain depth-first. A walk that comes back to its
 * starting step is a cycle; a walk that reaches an id the plan does not define is a
 * dangling reference. Every step on a cycle reports it.
 */
export function findGraphProblems(plan: Plan): GraphProblem[] {
  const problems: GraphProblem[] = [];
  for (const start of plan.steps.keys()) {
    const seen = new Set<StepId>();
    const stack: StepId[] = [...(plan.steps.get(start)?.after ?? [])];
    while (stack.length) {
      const id = stack.pop();
      if (id === undefined || seen.has(id)) continue;
      seen.add(id);
      if (id === start) {
        problems.push({ code: "CYCLE", step_id: start, message: `Step ${start} (transitively) depends on itself` });
        break;
      }
      const step = plan.steps.get(id);
      if (!step) {
        problems.push({ code: "DANGLING_REFERENCE", step_id: start, message: `Step ${start} depends on unknown step ${id}` });
        continue;
      }
      stack.push(...step.after);
    }
  }
  return problems;
}

export function wellFormed(plan: Plan): boolean {
  return findGraphProblems(plan).length === 0;
}
