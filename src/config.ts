import { tmpdir } from "node:os";
import { DEFAULT_MAX_EXPANSIONS } from "./prompt/renderer.js";

export interface RunnerConfig {
  quiet: boolean;
  logSteps: boolean;
  stateDir: string;
  dryRun: boolean;
  maxExpansions: number;
}

type Env = Record<string, string | undefined>;

const flag = (v: string | undefined, fallback: boolean) =>
  v === undefined || v === "" ? fallback : !["0", "false", "no", "off"].includes(v.toLowerCase());

export function loadConfig(env: Env = process.env): RunnerConfig {
  const max = Number(env.PLAN_MAX_EXPANSIONS || DEFAULT_MAX_EXPANSIONS);
  if (!Number.isInteger(max) || max < 1) {
    throw new Error(`PLAN_MAX_EXPANSIONS must be a positive integer, got "${env.PLAN_MAX_EXPANSIONS}"`);
  }
  return {
    quiet: flag(env.QUIET, false),
    logSteps: flag(env.LOG_STEPS, true),
    stateDir: env.PLAN_STATE_DIR || tmpdir(),
    dryRun: flag(env.PLAN_DRY_RUN, false),
    maxExpansions: max,
  };
}
