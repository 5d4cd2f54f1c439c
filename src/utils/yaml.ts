import { dump as dumpYaml, load as loadYaml } from "js-yaml";

// JSON is valid YAML, so plan files may be written in either.
export function parseYaml(raw: string): unknown {
  return loadYaml(raw.replace(/\r\n/g, "\n"));
}

export function stringifyYaml(value: unknown): string {
  return dumpYaml(value, { lineWidth: 120, noRefs: true });
}
