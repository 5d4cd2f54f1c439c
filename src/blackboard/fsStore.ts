import { mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { join, resolve } from "node:path";
import { randomBytes } from "node:crypto";
import type { Plan, StateDoc } from "../types/contracts.js";
import { compilePlan } from "../orchestrator/compiler.js";
import { applyState, isStateDoc, parseStateDoc } from "../orchestrator/state.js";
import { parseYaml } from "../utils/yaml.js";

export function readDocument(path: string): unknown {
  let raw: string;
  try {
    raw = readFileSync(path, "utf-8");
  } catch (e) {
    throw new Error(`Failed to read ${path}: ${e instanceof Error ? e.message : String(e)}`);
  }
  return parseYaml(raw);
}

/** Load a plan definition. The plan's source is the file's absolute path. */
export function loadPlanFile(path: string): Plan {
  const abs = resolve(path);
  return compilePlan(readDocument(abs), abs);
}

/** Reload the plan a checkpoint points at and lay the saved states over it. */
export function restore(doc: StateDoc): Plan {
  return applyState(loadPlanFile(doc.plan), doc);
}

export function restoreFile(path: string): Plan {
  return restore(parseStateDoc(readDocument(path)));
}

export function loadFile(path: string): Plan {
  return isStateDoc(readDocument(path)) ? restoreFile(path) : loadPlanFile(path);
}

// "wx" so an existing file is never overwritten.
export function saveArtifact(dir: string, fileName: string, content: string): string {
  mkdirSync(dir, { recursive: true });
  const path = join(dir, fileName);
  writeFileSync(path, content, { encoding: "utf-8", flag: "wx" });
  return path;
}

export function uniqueName(prefix: string, ext: string): string {
  const stamp = new Date().toISOString().replace(/[:.]/g, "-");
  return `${prefix}-${stamp}-${randomBytes(4).toString("hex")}${ext}`;
}
