import { z } from "zod";
import type { AssignStep } from "../types/contracts.js";
import type { StepKindSpec } from "../types/tools.js";
import { exists, write } from "../blackboard/index.js";
import { OptionalText, RequiredText, parseFields } from "./fields.js";

const AssignFields = z.object({ variable: RequiredText, default: OptionalText });

export const assignKind: StepKindSpec<AssignStep> = {
  kind: "assign",
  keys: ["variable", "default"],
  shape: "polygon",
  build(id, after, fields) {
    const parsed = parseFields(AssignFields, fields, `Action ${id}`);
    return { kind: "assign", id, after, state: "PENDING", variable: parsed.variable, default: parsed.default };
  },
  async execute(step, ctx) {
    ctx.terminal.print(`\tSetting the value of variable ${step.variable}`);
    const fallback = ctx.expand(step.default);
    const answer = await ctx.terminal.ask(
      `Provide a value for ${step.variable}\n (just pressing enter defaults it to ${fallback}) `,
      { signal: ctx.signal }
    );
    if (!exists(ctx.variables, step.variable)) {
      ctx.logger.warn(`step ${step.id}: variable ${step.variable} is not declared by the plan`);
      return false;
    }
    write(ctx.variables, step.variable, answer === "" ? fallback : answer);
    return true;
  }
};
