import type { StepId } from "./types/contracts.js";

export interface GraphProblem {
  code: "CYCLE" | "DANGLING_REFERENCE";
  message: string;
  step_id: StepId;
}

/** A step descriptor or plan document that cannot be turned into a plan. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class PlanInconsistentError extends Error {
  constructor(message: string, public readonly problems: GraphProblem[] = []) {
    super(message);
    this.name = "PlanInconsistentError";
  }
}

/** Raised when a step that already finished is asked to run again. */
export class DoubleRunError extends Error {
  constructor(public readonly stepId: StepId) {
    super(`Step ${stepId} executed twice`);
    this.name = "DoubleRunError";
  }
}

export class RestoreMismatchError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RestoreMismatchError";
  }
}

export class UnknownVariableError extends Error {
  constructor(public readonly variable: string) {
    super(`Unknown variable ${variable}.`);
    this.name = "UnknownVariableError";
  }
}

/** Input reached its end while a question was waiting for an answer. */
export class InputClosedError extends Error {
  constructor() {
    super("Input ended before an answer was given");
    this.name = "InputClosedError";
  }
}

export class ExpansionDepthError extends Error {
  constructor(limit: number, text: string) {
    const preview = text.length > 60 ? text.slice(0, 60) + "…" : text;
    super(`Variable expansion exceeded ${limit} substitutions (self-referential variable?) in "${preview}"`);
    this.name = "ExpansionDepthError";
  }
}
