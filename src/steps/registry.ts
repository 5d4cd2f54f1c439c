import type { Step, StepKind } from "../types/contracts.js";
import type { StepContext, StepKindSpec } from "../types/tools.js";
import { ConfigurationError, DoubleRunError } from "../errors.js";
import { confirmKind } from "./confirm.js";
import { assignKind } from "./assign.js";
import { commandKind } from "./command.js";

type KindRegistry = { [K in StepKind]: StepKindSpec<Extract<Step, { kind: K }>> };

// Checked in this order; the first match is reported as the kind an ambiguous descriptor "seems to be".
export const STEP_KINDS: KindRegistry = {
  command: commandKind,
  assign: assignKind,
  confirm: confirmKind,
};

const KIND_ORDER: readonly StepKind[] = ["command", "assign", "confirm"];

const KIND_LABEL: Record<StepKind, string> = {
  command: "Command",
  assign: "Set",
  confirm: "Prompt",
};

export function inferKind(name: string, fields: Record<string, unknown>): StepKind {
  const present = new Set(Object.keys(fields));
  const matches = KIND_ORDER.filter(kind => STEP_KINDS[kind].keys.some(k => present.has(k)));
  if (matches.length === 0) {
    throw new ConfigurationError(`Unknown action ${name}, keys are ${[...present].join(", ") || "(none)"}`);
  }
  if (matches.length > 1) {
    throw new ConfigurationError(`Action ${name} seems to be a mix of ${matches.map(k => KIND_LABEL[k]).join(" and ")}`);
  }
  return matches[0];
}

export function shapeOf(step: Step): string {
  return STEP_KINDS[step.kind].shape;
}

function execute(step: Step, ctx: StepContext): Promise<boolean> {
  switch (step.kind) {
    case "confirm": return STEP_KINDS.confirm.execute(step, ctx);
    case "assign": return STEP_KINDS.assign.execute(step, ctx);
    case "command": return STEP_KINDS.command.execute(step, ctx);
  }
}

/**
 * Run a pending step and record its outcome. Each step runs at most once per plan
 * instance; asking again is a caller bug and throws DoubleRunError.
 * If the effect throws (an interrupt, a runaway expansion) the step stays PENDING.
 */
export async function runStep(step: Step, ctx: StepContext): Promise<void> {
  if (step.state !== "PENDING") throw new DoubleRunError(step.id);
  ctx.terminal.print(`---[ ${step.id} ] ---------------------`);
  const ok = await execute(step, ctx);
  step.state = ok ? "DONE" : "FAILED";
}
