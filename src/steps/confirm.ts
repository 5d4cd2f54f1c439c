import { z } from "zod";
import type { ConfirmStep } from "../types/contracts.js";
import type { StepKindSpec } from "../types/tools.js";
import { parseAnswer, wrapText } from "../prompt/renderer.js";
import { OptionalText, parseFields } from "./fields.js";

export const DEFAULT_PROMPT = "Done?";

const ConfirmFields = z.object({ text: OptionalText, prompt: OptionalText });

/**
 * Shows some (expanded) text and asks a yes/no question.
 * Only an affirmative answer completes the step, so phrase prompts accordingly.
 */
export const confirmKind: StepKindSpec<ConfirmStep> = {
  kind: "confirm",
  keys: ["text", "prompt"],
  shape: "note",
  build(id, after, fields) {
    const { text, prompt } = parseFields(ConfirmFields, fields, `Action ${id}`);
    return { kind: "confirm", id, after, state: "PENDING", text, prompt: prompt || DEFAULT_PROMPT };
  },
  async execute(step, ctx) {
    ctx.terminal.print(wrapText(ctx.expand(step.text)));
    const answer = await ctx.terminal.ask(`${step.prompt} `, { signal: ctx.signal });
    return parseAnswer(answer);
  }
};
