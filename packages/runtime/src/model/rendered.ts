import { DiffInvariantCode, DiffInvariantError } from "../errors.js";

/* =============================================================================
 * Rendered model
 * -----------------------------------------------------------------------------
 * A template evaluation produces a `Rendered`: the static text segments that
 * never change for a given template shape, interleaved with one `Dynamic` per
 * hole. `statics.length === dynamics.length + 1` always holds.
 *
 * Dynamics are compared by object identity during a diff: a slot that was
 * skipped during evaluation carries the very same object as before, which is
 * how the diff knows there is nothing to send for it.
 * ============================================================================= */

export interface Rendered {
  readonly kind: "rendered";
  readonly statics: readonly string[];
  readonly dynamics: readonly Dynamic[];
  /** Identity of the template shape (statics + plan kinds). */
  readonly fingerprint: string;
  /** True when the only top-level node of the template is an element. */
  readonly root: boolean;
}

export type Dynamic =
  | ValueDynamic
  | NestedDynamic
  | ListDynamic
  | ComprehensionDynamic
  | ComponentDynamic;

/** Already-escaped HTML text. */
export interface ValueDynamic {
  readonly kind: "value";
  readonly value: string;
}

export interface NestedDynamic {
  readonly kind: "nested";
  readonly rendered: Rendered;
}

/** Independent sub-trees with possibly different shapes (multi-entry slots). */
export interface ListDynamic {
  readonly kind: "list";
  readonly items: readonly Rendered[];
}

/** A loop: one shared set of statics, one row of dynamics per item. */
export interface ComprehensionDynamic {
  readonly kind: "comprehension";
  readonly fingerprint: string;
  readonly statics: readonly string[];
  readonly items: readonly (readonly Dynamic[])[];
}

export interface ComponentDynamic {
  readonly kind: "component";
  readonly cid: number;
}

export function createRendered(
  statics: readonly string[],
  dynamics: readonly Dynamic[],
  fingerprint: string,
  root = false,
): Rendered {
  if (statics.length !== dynamics.length + 1) {
    throw new DiffInvariantError(
      `rendered tree ${fingerprint} has ${statics.length} statics for ${dynamics.length} dynamics`,
      DiffInvariantCode.STATICS_LENGTH,
    );
  }
  return { kind: "rendered", statics, dynamics, fingerprint, root };
}

export function valueDynamic(value: string): ValueDynamic {
  return { kind: "value", value };
}

export function nestedDynamic(rendered: Rendered): NestedDynamic {
  return { kind: "nested", rendered };
}

export function listDynamic(items: readonly Rendered[]): ListDynamic {
  return { kind: "list", items };
}

export function componentDynamic(cid: number): ComponentDynamic {
  return { kind: "component", cid };
}

export function comprehensionDynamic(
  fingerprint: string,
  statics: readonly string[],
  items: readonly (readonly Dynamic[])[],
): ComprehensionDynamic {
  const expected = statics.length - 1;
  for (const item of items) {
    if (item.length !== expected) {
      throw new DiffInvariantError(
        `comprehension ${fingerprint} item has ${item.length} dynamics, expected ${expected}`,
        DiffInvariantCode.STATICS_LENGTH,
      );
    }
  }
  return { kind: "comprehension", fingerprint, statics, items };
}

export function isRendered(value: unknown): value is Rendered {
  return typeof value === "object" && value !== null && "kind" in value && value.kind === "rendered";
}

/**
 * The component id used to key a comprehension item: its first dynamic,
 * when that dynamic is a component reference.
 */
export function itemComponentKey(item: readonly Dynamic[]): number | null {
  const first = item[0];
  return first?.kind === "component" ? first.cid : null;
}

/** Visit every component id referenced from a dynamic, without following into components. */
export function forEachComponentRef(dynamic: Dynamic, visit: (cid: number) => void): void {
  switch (dynamic.kind) {
    case "value":
      return;
    case "component":
      visit(dynamic.cid);
      return;
    case "nested":
      forEachComponentRefIn(dynamic.rendered, visit);
      return;
    case "list":
      for (const item of dynamic.items) forEachComponentRefIn(item, visit);
      return;
    case "comprehension":
      for (const item of dynamic.items) {
        for (const entry of item) forEachComponentRef(entry, visit);
      }
      return;
  }
}

export function forEachComponentRefIn(rendered: Rendered, visit: (cid: number) => void): void {
  for (const dynamic of rendered.dynamics) forEachComponentRef(dynamic, visit);
}
