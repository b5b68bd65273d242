import { isPlainRecord } from "@tessera/runtime";

/* =============================================================================
 * Component specs
 * -----------------------------------------------------------------------------
 * The declared interface of a component: its attributes and slots. Specs are
 * frozen once the unit that defines them is finalized.
 * ============================================================================= */

/** Closed set of attribute types; compared structurally. */
export type AttrType =
  | "any"
  | "string"
  | "atom"
  | "boolean"
  | "integer"
  | "float"
  | "list"
  | "map"
  | "global"
  | { readonly struct: string };

export interface AttrSpec {
  readonly name: string;
  readonly type: AttrType;
  readonly required: boolean;
  /** `null` when no default is declared. */
  readonly default: { readonly value: unknown } | null;
  readonly doc: string | null;
}

export interface SlotSpec {
  readonly name: string;
  readonly required: boolean;
  readonly attrs: readonly AttrSpec[];
  readonly doc: string | null;
}

export interface ComponentSpec {
  readonly name: string;
  readonly attrs: readonly AttrSpec[];
  readonly slots: readonly SlotSpec[];
}

export function attrTypeEquals(a: AttrType, b: AttrType): boolean {
  if (typeof a === "string" || typeof b === "string") return a === b;
  return a.struct === b.struct;
}

/** `a string`, `an integer`, `a Date`. */
export function describeAttrType(type: AttrType): string {
  if (typeof type !== "string") return `a ${type.struct}`;
  return type === "atom" || type === "integer" || type === "any" ? `an ${type}` : `a ${type}`;
}

/** Whether a runtime value fits the declared type. `null` fits every type. */
export function valueMatchesType(type: AttrType, value: unknown): boolean {
  if (value === null) return true;
  if (typeof type !== "string") {
    return typeof value === "object" && value !== undefined && !Array.isArray(value) && !isPlainRecord(value);
  }
  switch (type) {
    case "any":
      return true;
    case "string":
      return typeof value === "string";
    case "atom":
      return typeof value === "string" || typeof value === "boolean";
    case "boolean":
      return typeof value === "boolean";
    case "integer":
      return typeof value === "number" && Number.isInteger(value);
    case "float":
      return typeof value === "number";
    case "list":
      return Array.isArray(value);
    case "map":
    case "global":
      return isPlainRecord(value);
  }
}

export function hasGlobalAttr(spec: { readonly attrs: readonly AttrSpec[] }): boolean {
  return spec.attrs.some((attr) => attr.type === "global");
}

/** A component declares nothing; calls to it are not verified. */
export function isEmptySpec(spec: ComponentSpec): boolean {
  return spec.attrs.length === 0 && spec.slots.length === 0;
}
