import { changeMarkFor, mergeChangeMarks, type ChangeMark, type ChangedSet } from "./changed.js";

/** Names templates reserve for themselves; they cannot be assigned. */
const RESERVED_KEYS: ReadonlySet<string> = new Set(["assigns"]);

/**
 * Bindings of a live view plus the record of which of them changed since the
 * last render. Values are replaced copy-on-write so a record handed to a
 * render is never mutated afterwards.
 */
export class Assigns {
  private values: Readonly<Record<string, unknown>>;
  private pending: Record<string, ChangeMark> = {};

  constructor(initial: Readonly<Record<string, unknown>> = {}) {
    for (const key of Object.keys(initial)) assertAssignable(key);
    this.values = { ...initial };
  }

  get(key: string): unknown {
    return this.values[key];
  }

  has(key: string): boolean {
    return Object.hasOwn(this.values, key);
  }

  /** The current bindings. Stable until the next assignment. */
  toRecord(): Readonly<Record<string, unknown>> {
    return this.values;
  }

  /**
   * Set one or more bindings. A value equal to the current one records no
   * change; a plain record records which of its keys differ.
   */
  assign(key: string, value: unknown): this;
  assign(values: Readonly<Record<string, unknown>>): this;
  assign(keyOrValues: string | Readonly<Record<string, unknown>>, value?: unknown): this {
    const entries: [string, unknown][] =
      typeof keyOrValues === "string" ? [[keyOrValues, value]] : Object.entries(keyOrValues);
    let next: Record<string, unknown> | null = null;
    for (const [key, entry] of entries) {
      assertAssignable(key);
      const mark = this.has(key) ? changeMarkFor(this.values[key], entry) : true;
      if (mark === null) continue;
      next ??= { ...this.values };
      next[key] = entry;
      const existing = this.pending[key];
      this.pending[key] = existing === undefined ? mark : mergeChangeMarks(existing, mark);
    }
    if (next) this.values = next;
    return this;
  }

  /**
   * Assign only when the key is not bound yet. `compute` receives the current
   * bindings, so it can build on keys assigned before it.
   */
  assignNew(key: string, compute: (assigns: Readonly<Record<string, unknown>>) => unknown): this {
    if (this.has(key)) return this;
    return this.assign(key, compute(this.values));
  }

  update(key: string, fn: (current: unknown, assigns: Readonly<Record<string, unknown>>) => unknown): this {
    if (!this.has(key)) {
      throw new Error(`cannot update "${key}": it has not been assigned`);
    }
    return this.assign(key, fn(this.values[key], this.values));
  }

  changed(key: string): boolean {
    return Object.hasOwn(this.pending, key);
  }

  get changes(): ChangedSet {
    return { ...this.pending };
  }

  resetChanges(): void {
    this.pending = {};
  }
}

/** Keys a component or slot entry carries that the caller did not pass as attributes. */
const NON_ATTRIBUTE_KEYS: readonly string[] = ["__slot__", "inner_block"];

/**
 * The attributes in a component's (or a slot entry's) assigns, ready to be
 * spread onto an element: everything except slot bookkeeping and `exclude`.
 */
export function assignsToAttributes(
  assigns: Readonly<Record<string, unknown>>,
  exclude: readonly string[] = [],
): Record<string, unknown> {
  const attributes: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(assigns)) {
    if (NON_ATTRIBUTE_KEYS.includes(key) || exclude.includes(key)) continue;
    attributes[key] = value;
  }
  return attributes;
}

function assertAssignable(key: string): void {
  if (RESERVED_KEYS.has(key)) {
    throw new Error(`"${key}" is reserved and cannot be assigned`);
  }
}
