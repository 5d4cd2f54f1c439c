export type StepId = string;

export type StepState = "PENDING" | "DONE" | "FAILED";

export type StepKind = "confirm" | "assign" | "command";

interface StepBase {
  id: StepId;
  state: StepState;
  after: StepId[];
}

export interface ConfirmStep extends StepBase {
  kind: "confirm";
  text: string;
  prompt: string;
}

export interface AssignStep extends StepBase {
  kind: "assign";
  variable: string;
  default: string;
}

export interface CommandStep extends StepBase {
  kind: "command";
  command: string;
}

export type Step = ConfirmStep | AssignStep | CommandStep;

export type VariableStore = Map<string, string>;

export interface Plan {
  source: string;
  steps: Map<StepId, Step>;
  variables: VariableStore;
}

/** Checkpoint document: everything needed to rebuild a plan's mutable state. */
export interface StateDoc {
  plan: string;
  actions: Array<{ name: StepId; state: StepState }>;
  variables: Record<string, string>;
}
