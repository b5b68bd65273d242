import { readFileSync } from "node:fs";

interface GlobalAttributeList {
  readonly prefixes: readonly string[];
  readonly names: readonly string[];
}

function loadGlobals(): GlobalAttributeList {
  const text = readFileSync(new URL("./global-attributes.json", import.meta.url), "utf8");
  const parsed: unknown = JSON.parse(text);
  if (
    typeof parsed !== "object" ||
    parsed === null ||
    !("prefixes" in parsed) ||
    !("names" in parsed) ||
    !isStringArray(parsed.prefixes) ||
    !isStringArray(parsed.names)
  ) {
    throw new Error("global-attributes.json must hold string arrays `prefixes` and `names`");
  }
  return { prefixes: parsed.prefixes, names: parsed.names };
}

function isStringArray(value: unknown): value is readonly string[] {
  return Array.isArray(value) && value.every((entry) => typeof entry === "string");
}

const GLOBALS = loadGlobals();
const GLOBAL_NAMES: ReadonlySet<string> = new Set(GLOBALS.names);

/** HTML attributes a `global` attr collects from callers: `aria-*`, `data-*` and the standard list. */
export function isGlobalAttribute(name: string): boolean {
  return GLOBAL_NAMES.has(name) || GLOBALS.prefixes.some((prefix) => name.startsWith(prefix));
}
