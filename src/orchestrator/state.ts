import { z } from "zod";
import type { Plan, StateDoc } from "../types/contracts.js";
import { RestoreMismatchError } from "../errors.js";
import { exists, write } from "../blackboard/index.js";
import { OptionalText, parseFields } from "../steps/fields.js";

export const StateDocSchema = z.object({
  plan: z.string().min(1),
  actions: z.array(z.object({ name: z.union([z.string(), z.number()]).transform(String), state: z.string() }))
    .nullish().transform(v => v ?? []),
  variables: z.record(z.string(), OptionalText).nullish().transform(v => v ?? {}),
});

/** A document carrying a `plan` field is a checkpoint rather than a plan definition. */
export function isStateDoc(doc: unknown): boolean {
  return typeof doc === "object" && doc !== null && "plan" in doc;
}

export function parseStateDoc(doc: unknown): StateDoc {
  const parsed = parseFields(StateDocSchema, doc, "State document");
  return {
    plan: parsed.plan,
    // anything that is not DONE or FAILED restores as PENDING
    actions: parsed.actions.map((a): StateDoc["actions"][number] => ({
      name: a.name,
      state: a.state === "DONE" || a.state === "FAILED" ? a.state : "PENDING",
    })),
    variables: parsed.variables,
  };
}

export function snapshot(plan: Plan): StateDoc {
  return {
    plan: plan.source,
    actions: Array.from(plan.steps.values(), s => ({ name: s.id, state: s.state })),
    variables: Object.fromEntries(plan.variables),
  };
}

/**
 * Overlay a checkpoint on a freshly loaded plan. Only states and variable values change;
 * a name the plan does not define means the plan file changed under the checkpoint.
 */
export function applyState(plan: Plan, doc: StateDoc): Plan {
  const unknownSteps = doc.actions.map(a => a.name).filter(name => !plan.steps.has(name));
  const unknownVars = Object.keys(doc.variables).filter(name => !exists(plan.variables, name));
  if (unknownSteps.length || unknownVars.length) {
    const parts = [
      unknownSteps.length ? `unknown actions: ${unknownSteps.join(", ")}` : "",
      unknownVars.length ? `unknown variables: ${unknownVars.join(", ")}` : "",
    ].filter(Boolean);
    throw new RestoreMismatchError(`State does not match plan ${plan.source} (${parts.join("; ")})`);
  }

  for (const { name, state } of doc.actions) {
    const step = plan.steps.get(name);
    if (step && (state === "DONE" || state === "FAILED")) step.state = state;
  }
  for (const [name, value] of Object.entries(doc.variables)) {
    write(plan.variables, name, value);
  }
  return plan;
}
