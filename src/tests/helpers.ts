import type { Plan } from '../types/contracts.js';
import type { CommandResult, CommandRunner, StepContext, Terminal } from '../types/tools.js';
import { compilePlan } from '../orchestrator/compiler.js';
import { expandVariables } from '../prompt/renderer.js';
import { silentLogger } from '../log.js';

/** Answers questions from a fixed script; an exhausted script answers "". */
export class ScriptedTerminal implements Terminal {
  printed: string[] = [];
  asked: string[] = [];
  constructor(private answers: string[] = []) {}
  print(text: string): void {
    this.printed.push(text);
  }
  async ask(question: string): Promise<string> {
    this.asked.push(question);
    return this.answers.shift() ?? '';
  }
}

/** Exit codes keyed by argv[0]; a program not listed behaves like a missing binary. */
export class FakeCommands implements CommandRunner {
  calls: string[][] = [];
  constructor(private exitCodes: Record<string, number> = {}) {}
  async run(argv: string[]): Promise<CommandResult> {
    this.calls.push(argv);
    const code = this.exitCodes[argv[0]];
    if (code === undefined) return { ok: false, exit_code: null, error: 'ENOENT' };
    return { ok: code === 0, exit_code: code };
  }
}

export function planOf(actions: Record<string, unknown>[], variables: Array<{ name: string; value?: string }> = []): Plan {
  return compilePlan({ variables, actions }, 'test-plan');
}

export function stepContext(plan: Plan, overrides: Partial<StepContext> = {}): StepContext {
  return {
    variables: plan.variables,
    expand: (text) => expandVariables(text, plan.variables),
    terminal: new ScriptedTerminal(),
    commands: new FakeCommands(),
    dryRun: false,
    logger: silentLogger,
    ...overrides,
  };
}

export function states(plan: Plan): Record<string, string> {
  return Object.fromEntries(Array.from(plan.steps.values(), s => [s.id, s.state]));
}

/** A random source replaying the given values in a loop. */
export function replay(...values: number[]): () => number {
  let i = 0;
  return () => values[i++ % values.length];
}

export function stepOf(plan: Plan, id: string) {
  const step = plan.steps.get(id);
  if (!step) throw new Error(`no step ${id} in plan`);
  return step;
}
