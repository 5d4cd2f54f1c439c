import { z } from "zod";
import type { Plan, Step, StepId } from "../types/contracts.js";
import { ConfigurationError } from "../errors.js";
import { createVariableStore, define, exists } from "../blackboard/index.js";
import { OptionalText, RequiredText, parseFields } from "../steps/fields.js";
import { STEP_KINDS, inferKind } from "../steps/registry.js";

const StepRef = z.union([z.string(), z.number()]).transform(v => String(v));

const VariableSchema = z.object({
  name: RequiredText,
  value: OptionalText,
});

export const PlanDefinitionSchema = z.object({
  variables: z.array(VariableSchema).nullish().transform(v => v ?? []),
  actions: z.array(z.record(z.string(), z.unknown())).nullish().transform(v => v ?? []),
});

export type PlanDefinition = z.input<typeof PlanDefinitionSchema>;

const HeaderSchema = z.object({
  name: RequiredText.optional(),
  // a lone predecessor may be written without the list
  after: z.union([StepRef, z.array(StepRef)]).nullish(),
});

/** Build one step, inferring its kind from which keys the descriptor carries. */
export function buildStep(descriptor: Record<string, unknown>): Step {
  const header = parseFields(HeaderSchema, descriptor, "Action");
  if (header.name === undefined) throw new ConfigurationError("No name for action");
  const id: StepId = header.name;
  const after = header.after == null ? [] : Array.isArray(header.after) ? header.after : [header.after];

  const { name: _name, after: _after, ...fields } = descriptor;
  const kind = inferKind(id, fields);
  return STEP_KINDS[kind].build(id, Array.from(new Set(after)), fields);
}

export function compilePlan(definition: unknown, source: string): Plan {
  const def = parseFields(PlanDefinitionSchema, definition ?? {}, `Plan ${source}`);
  const plan: Plan = { source, steps: new Map(), variables: createVariableStore() };

  for (const v of def.variables) {
    if (exists(plan.variables, v.name)) throw new ConfigurationError(`Variable ${v.name} is declared twice`);
    define(plan.variables, v.name, v.value);
  }
  for (const descriptor of def.actions) {
    const step = buildStep(descriptor);
    if (plan.steps.has(step.id)) throw new ConfigurationError(`Action ${step.id} is declared twice`);
    plan.steps.set(step.id, step);
  }
  return plan;
}
