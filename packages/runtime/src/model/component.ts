import type { Rendered } from "./rendered.js";

/**
 * One mounted component invocation. Nodes live in an arena keyed by cid;
 * parents refer to them only through `{ kind: "component", cid }` dynamics.
 */
export interface ComponentNode {
  readonly cid: number;
  /** Mount key: `Target#id` for explicit ids, otherwise the owner/position path. */
  readonly key: string;
  readonly fingerprint: string;
  readonly rendered: Rendered;
  /** Bindings the component rendered with, after defaults and slot entries. */
  readonly assigns: Readonly<Record<string, unknown>>;
  /** Components mounted from slot content passed to this component, per slot name. */
  readonly children: ReadonlyMap<string, readonly number[]>;
}

export interface RenderSnapshot {
  readonly root: Rendered;
  readonly components: ReadonlyMap<number, ComponentNode>;
}
