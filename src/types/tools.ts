import type { Step, StepId, VariableStore } from "./contracts.js";
import type { Logger } from "../log.js";

export interface CommandResult {
  ok: boolean;
  exit_code: number | null;
  error?: string;
}

/** Runs an already-split argv without a shell. */
export interface CommandRunner {
  run(argv: string[], opts?: { signal?: AbortSignal }): Promise<CommandResult>;
}

/** The human side of a run: text out, answers in. */
export interface Terminal {
  print(text: string): void;
  ask(question: string, opts?: { signal?: AbortSignal }): Promise<string>;
  /** Release the input once the run is over. */
  close?(): void;
}

export interface StepContext {
  variables: VariableStore;
  expand(text: unknown): string;
  terminal: Terminal;
  commands: CommandRunner;
  dryRun: boolean;
  logger: Logger;
  signal?: AbortSignal;
}

/** One step kind: which descriptor keys select it, how it is built, run and drawn. */
export interface StepKindSpec<S extends Step = Step> {
  kind: S["kind"];
  keys: readonly string[];
  shape: string;
  build(id: StepId, after: StepId[], fields: Record<string, unknown>): S;
  // true = DONE, false = FAILED
  execute(step: S, ctx: StepContext): Promise<boolean>;
}
