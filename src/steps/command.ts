import { z } from "zod";
import type { CommandStep } from "../types/contracts.js";
import type { StepKindSpec } from "../types/tools.js";
import { OptionalText, parseFields } from "./fields.js";

const CommandFields = z.object({ command: OptionalText });

// No shell: the expanded command line is split on whitespace into argv.
export function splitCommand(cmd: string): string[] {
  return cmd.split(/\s+/).filter(part => part.length > 0);
}

export const commandKind: StepKindSpec<CommandStep> = {
  kind: "command",
  keys: ["command"],
  shape: "component",
  build(id, after, fields) {
    const { command } = parseFields(CommandFields, fields, `Action ${id}`);
    return { kind: "command", id, after, state: "PENDING", command };
  },
  async execute(step, ctx) {
    const cmd = ctx.expand(step.command);
    ctx.terminal.print("\tRunning the following command:\n\t\t" + cmd);
    if (ctx.dryRun) {
      ctx.terminal.print("\t\tAction not done, because this is a dry-run");
      return true;
    }
    const argv = splitCommand(cmd);
    if (argv.length === 0) {
      ctx.logger.warn(`step ${step.id}: command expanded to nothing`);
      return false;
    }
    const res = await ctx.commands.run(argv, { signal: ctx.signal });
    if (!res.ok) {
      const why = res.error ?? `exit status ${res.exit_code ?? "none (killed by signal)"}`;
      ctx.logger.warn(`step ${step.id}: ${argv[0]} failed (${why})`);
    }
    return res.ok;
  }
};
