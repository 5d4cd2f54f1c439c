// src/orchestrator/run.ts
// Execution loop: validate once, retry earlier failures, then run one randomly chosen
// eligible step at a time until nothing is eligible.

import type { Plan, Step } from "../types/contracts.js";
import type { CommandRunner, StepContext, Terminal } from "../types/tools.js";
import { PlanInconsistentError } from "../errors.js";
import { createLogger, fmtMs, type Logger } from "../log.js";
import { DEFAULT_MAX_EXPANSIONS, expandVariables } from "../prompt/renderer.js";
import { runStep } from "../steps/registry.js";
import { spawnRunner } from "../tools/cli/exec.js";
import { findGraphProblems } from "./topo.js";

export type RandomSource = () => number;

export interface RunOptions {
  plan: Plan;
  terminal: Terminal;
  commands?: CommandRunner;
  dryRun?: boolean;
  random?: RandomSource;
  signal?: AbortSignal;
  maxExpansions?: number;
  logger?: Logger;
}

/** PENDING steps whose predecessors are all DONE. A FAILED predecessor blocks for good. */
export function eligible(plan: Plan): Step[] {
  const out: Step[] = [];
  for (const step of plan.steps.values()) {
    if (step.state !== "PENDING") continue;
    if (step.after.every(id => plan.steps.get(id)?.state === "DONE")) out.push(step);
  }
  return out;
}

/**
 * Pick uniformly among eligible steps. The order is deliberately unpredictable so that
 * steps relying on an undeclared ordering eventually fail; inject `random` to pin it in tests.
 */
export function selectNext(plan: Plan, random: RandomSource = Math.random): Step | undefined {
  const candidates = eligible(plan);
  if (candidates.length === 0) return undefined;
  const ix = Math.min(Math.floor(random() * candidates.length), candidates.length - 1);
  return candidates[ix];
}

export function resetFailed(plan: Plan): void {
  for (const step of plan.steps.values()) {
    if (step.state === "FAILED") step.state = "PENDING";
  }
}

export function anyFailed(plan: Plan): boolean {
  for (const step of plan.steps.values()) {
    if (step.state === "FAILED") return true;
  }
  return false;
}

/**
 * Run the plan until no step is eligible. Resolves true when no step ended FAILED.
 * An abort through `signal` stops early and resolves false; the interrupted step stays PENDING.
 */
export async function runPlan(opts: RunOptions): Promise<boolean> {
  const { plan, signal } = opts;
  const logger = opts.logger ?? createLogger();
  const random = opts.random ?? Math.random;
  const maxExpansions = opts.maxExpansions ?? DEFAULT_MAX_EXPANSIONS;

  const problems = findGraphProblems(plan);
  if (problems.length > 0) {
    for (const p of problems) logger.error(p.message);
    throw new PlanInconsistentError("The plan is inconsistent.", problems);
  }
  resetFailed(plan);

  const ctx: StepContext = {
    variables: plan.variables,
    expand: (text) => expandVariables(text, plan.variables, maxExpansions),
    terminal: opts.terminal,
    commands: opts.commands ?? spawnRunner,
    dryRun: opts.dryRun ?? false,
    logger,
    signal,
  };

  const total = plan.steps.size;
  let position = countDone(plan);
  try {
    for (let next = selectNext(plan, random); next; next = selectNext(plan, random)) {
      if (signal?.aborted) break;
      const t0 = Date.now();
      logger.step(`▶ ${next.id} (${++position}/${total})`);
      await runStep(next, ctx);
      logger.step(`${next.state === "DONE" ? "✓" : "✗"} ${next.id} ${next.state} (${fmtMs(Date.now() - t0)})`);
    }
  } catch (err) {
    if (!signal?.aborted) throw err;
  }

  if (signal?.aborted) {
    logger.warn("interrupted; plan state left as last recorded");
    return false;
  }
  return !anyFailed(plan);
}

function countDone(plan: Plan): number {
  let n = 0;
  for (const step of plan.steps.values()) if (step.state === "DONE") n++;
  return n;
}
