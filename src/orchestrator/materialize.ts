import type { Plan } from "../types/contracts.js";
import { saveArtifact, uniqueName } from "../blackboard/fsStore.js";
import { stringifyYaml } from "../utils/yaml.js";
import { snapshot } from "./state.js";

/** Write the plan's current state to a new file in `dir` and return its path. */
export function checkpoint(plan: Plan, dir: string): string {
  return saveArtifact(dir, uniqueName("plan-state", ".yaml"), stringifyYaml(snapshot(plan)));
}
