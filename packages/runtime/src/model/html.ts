/* =============================================================================
 * HTML encoding
 * -----------------------------------------------------------------------------
 * Everything a template interpolates goes through here. Strings are escaped
 * unless wrapped in `SafeHtml` via `raw()`.
 * ============================================================================= */

const ESCAPES: Readonly<Record<string, string>> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

const ESCAPE_PATTERN = /[&<>"']/g;

export function escapeHtml(text: string): string {
  return text.replace(ESCAPE_PATTERN, (ch) => ESCAPES[ch] ?? ch);
}

/** Markup that is emitted verbatim. */
export class SafeHtml {
  constructor(public readonly html: string) {}

  toString(): string {
    return this.html;
  }
}

export function raw(value: unknown): SafeHtml {
  if (value instanceof SafeHtml) return value;
  return new SafeHtml(value == null ? "" : String(value));
}

/** Text form of a value placed between tags. `null`, `undefined` and `false` render nothing. */
export function encodeText(value: unknown): string {
  if (value instanceof SafeHtml) return value.html;
  if (value == null || value === false) return "";
  if (Array.isArray(value)) return value.map((entry) => encodeText(entry)).join("");
  return escapeHtml(String(value));
}

/**
 * A single dynamic attribute, including its leading space.
 * `true` renders the bare name; `false`, `null` and `undefined` drop the attribute.
 */
export function encodeAttribute(name: string, value: unknown): string {
  if (value === true) return ` ${name}`;
  if (value == null || value === false) return "";
  if (name === "class") return ` class="${encodeClass(value)}"`;
  return ` ${name}="${encodeAttributeValue(value)}"`;
}

export function encodeAttributeValue(value: unknown): string {
  if (value instanceof SafeHtml) return value.html;
  if (Array.isArray(value)) return value.map((entry) => encodeAttributeValue(entry)).join("");
  return escapeHtml(String(value));
}

/** Class lists drop falsy entries and are joined with single spaces. */
export function encodeClass(value: unknown): string {
  if (value == null || value === false || value === true) return "";
  if (Array.isArray(value)) {
    return value
      .flat(Infinity)
      .filter((entry) => entry != null && entry !== false && entry !== "" && entry !== true)
      .map((entry) => encodeAttributeValue(entry))
      .join(" ");
  }
  return encodeAttributeValue(value);
}

export function encodeStyle(value: unknown): string {
  if (value == null || value === false || value === true) return "";
  if (Array.isArray(value)) {
    return value
      .flat(Infinity)
      .filter((entry) => entry != null && entry !== false && entry !== "" && entry !== true)
      .map((entry) => encodeAttributeValue(entry))
      .join("; ");
  }
  return encodeAttributeValue(value);
}

/**
 * A spread of attributes. Nested records under `data` and `aria` expand to
 * prefixed names (`data={{ id: 1 }}` becomes `data-id="1"`).
 */
export function encodeAttributes(attributes: Readonly<Record<string, unknown>>): string {
  let out = "";
  for (const [name, value] of Object.entries(attributes)) {
    if ((name === "data" || name === "aria") && isPlainRecord(value)) {
      for (const [suffix, nested] of Object.entries(value)) {
        out += encodeAttribute(`${name}-${suffix}`, nested);
      }
      continue;
    }
    out += encodeAttribute(name, value);
  }
  return out;
}

export function isPlainRecord(value: unknown): value is Readonly<Record<string, unknown>> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}
