import type { VariableStore } from "../types/contracts.js";
import { UnknownVariableError } from "../errors.js";

export type { VariableStore };

export interface VariableDef {
  name: string;
  value?: string;
}

export function createVariableStore(defs: VariableDef[] = []): VariableStore {
  const store: VariableStore = new Map();
  for (const def of defs) define(store, def.name, def.value);
  return store;
}

export function define(store: VariableStore, name: string, value: string = ""): void {
  store.set(name, value);
}

export function read(store: VariableStore, name: string): string | undefined {
  return store.get(name);
}

// Only existing variables can be assigned; a typo must not silently create a new one.
export function write(store: VariableStore, name: string, value: string): void {
  if (!store.has(name)) throw new UnknownVariableError(name);
  store.set(name, value);
}

export function exists(store: VariableStore, name: string): boolean {
  return store.has(name);
}

export function keys(store: VariableStore): string[] {
  return Array.from(store.keys());
}
