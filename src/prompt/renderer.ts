import type { VariableStore } from "../types/contracts.js";
import { read } from "../blackboard/index.js";
import { ExpansionDepthError } from "../errors.js";

export const DEFAULT_MAX_EXPANSIONS = 1000;

const OPEN = "${";
const CLOSE = "}";

/**
 * Expand `${name}` placeholders, leftmost first, until none remain.
 * Replacement text is scanned again, so a value may itself contain placeholders.
 * Unknown variables expand to the empty string; an unterminated `${` ends expansion.
 */
export function expandVariables(
  input: unknown,
  store: VariableStore,
  maxExpansions: number = DEFAULT_MAX_EXPANSIONS
): string {
  if (typeof input !== "string") return "";
  let text = input;
  for (let count = 0; ; count++) {
    const start = text.indexOf(OPEN);
    if (start === -1) return text;
    const end = text.indexOf(CLOSE, start);
    if (end === -1) return text;
    if (count >= maxExpansions) throw new ExpansionDepthError(maxExpansions, input);
    const name = text.slice(start + OPEN.length, end);
    text = text.slice(0, start) + (read(store, name) ?? "") + text.slice(end + CLOSE.length);
  }
}

const TAB_WIDTH = 8;
const WRAP_AT = 72;

// Tab-indented, wrapped short of an 80-column terminal.
export function wrapText(text: string): string {
  const out: string[] = ["\t"];
  let pos = TAB_WIDTH;
  let lastSpace = -1;
  for (const ch of text) {
    out.push(ch);
    pos++;
    if (ch === "\n") {
      out.push("\t");
      pos = TAB_WIDTH;
      lastSpace = -1;
    }
    if (ch === " ") lastSpace = out.length - 1;
    if (pos >= WRAP_AT) {
      if (lastSpace === -1) {
        out.push("\n\t");
      } else {
        out[lastSpace] = "\n\t";
        lastSpace = -1;
      }
      pos = TAB_WIDTH;
    }
  }
  return out.join("").trimEnd();
}

const AFFIRMATIVE = new Set(["t", "true", "y", "yes"]);

/** Only an explicit yes counts; anything else (including an empty answer) is a no. */
export function parseAnswer(answer: string): boolean {
  return AFFIRMATIVE.has(answer.trim().toLowerCase());
}
