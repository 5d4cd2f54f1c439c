// src/runner.ts
// The three things the CLI does with a file: run a plan, resume a checkpoint, graph either.
// Failed runs, and runs cut short by an error, leave a checkpoint behind and say how to pick up from it.

import type { Plan } from './types/contracts.js';
import type { CommandRunner, Terminal } from './types/tools.js';
import type { Logger } from './log.js';
import type { RandomSource } from './orchestrator/run.js';
import { runPlan } from './orchestrator/run.js';
import { PlanInconsistentError } from './errors.js';
import { checkpoint } from './orchestrator/materialize.js';
import { renderGraph } from './orchestrator/graph.js';
import { loadFile, loadPlanFile, restoreFile } from './blackboard/fsStore.js';

export interface RunnerOptions {
  terminal: Terminal;
  stateDir: string;
  logger: Logger;
  dryRun?: boolean;
  commands?: CommandRunner;
  random?: RandomSource;
  signal?: AbortSignal;
  maxExpansions?: number;
  /** How to invoke the CLI in the "resume by running" hint. */
  programName?: string;
}

export interface RunnerOutcome {
  ok: boolean;
  plan: Plan;
  statePath?: string;
}

export async function runLoadedPlan(plan: Plan, opts: RunnerOptions): Promise<RunnerOutcome> {
  let ok: boolean;
  try {
    ok = await runPlan({
      plan,
      terminal: opts.terminal,
      commands: opts.commands,
      dryRun: opts.dryRun,
      random: opts.random,
      signal: opts.signal,
      maxExpansions: opts.maxExpansions,
      logger: opts.logger,
    });
  } catch (err) {
    // nothing has run yet when the graph itself is broken
    if (!(err instanceof PlanInconsistentError)) leaveCheckpoint(plan, opts);
    throw err;
  }
  if (ok) {
    opts.logger.info(`plan ${plan.source} complete`);
    return { ok, plan };
  }
  return { ok, plan, statePath: leaveCheckpoint(plan, opts) };
}

function leaveCheckpoint(plan: Plan, opts: RunnerOptions): string {
  const statePath = checkpoint(plan, opts.stateDir);
  opts.terminal.print('');
  opts.terminal.print('');
  opts.terminal.print(`Execution failed, you can resume by running\n\t${opts.programName ?? 'plan-runner'} resume ${statePath}`);
  return statePath;
}

export function runPlanFile(path: string, opts: RunnerOptions): Promise<RunnerOutcome> {
  return runLoadedPlan(loadPlanFile(path), opts);
}

export function resumeStateFile(path: string, opts: RunnerOptions): Promise<RunnerOutcome> {
  return runLoadedPlan(restoreFile(path), opts);
}

// Accepts a plan definition or a checkpoint; the latter shows progress through node colours.
export function graphFile(path: string): string {
  return renderGraph(loadFile(path));
}
