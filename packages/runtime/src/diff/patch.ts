/* =============================================================================
 * Patch model
 * -----------------------------------------------------------------------------
 * The structured result of a diff, before wire encoding. A `TreePatch` with
 * `statics` is a full tree; without them it only lists the slots that changed.
 * ============================================================================= */

export interface TreePatch {
  readonly kind: "tree";
  /** Present for a full tree. */
  readonly statics?: readonly string[];
  readonly root?: boolean;
  readonly slots: ReadonlyMap<number, SlotPatch>;
}

export type SlotPatch =
  | ValuePatch
  | ComponentRefPatch
  | TreePatch
  | ComprehensionPatch
  | ListPatch;

export interface ValuePatch {
  readonly kind: "value";
  readonly value: string;
}

export interface ComponentRefPatch {
  readonly kind: "component";
  readonly cid: number;
}

/** Full content of one comprehension item, one entry per dynamic. */
export type ItemContent = readonly SlotPatch[];

/** Changed dynamics of one comprehension item, by position. */
export type ItemPatch = ReadonlyMap<number, SlotPatch>;

/** `from` is the item's index before the move; `to` its index after removing it. */
export interface Move {
  readonly from: number;
  readonly to: number;
}

export interface Insert {
  readonly index: number;
  readonly item: ItemContent;
}

/**
 * Either a full replacement (`items`, with `statics` when the client does not
 * have them yet) or a set of edits. Edits apply in order: removes by previous
 * index, then moves, then inserts by final index, then updates by final index.
 */
export interface ComprehensionPatch {
  readonly kind: "comprehension";
  readonly statics?: readonly string[];
  readonly items?: readonly ItemContent[];
  readonly removes?: readonly number[];
  readonly moves?: readonly Move[];
  readonly inserts?: readonly Insert[];
  readonly updates?: ReadonlyMap<number, ItemPatch>;
}

export interface ListPatch {
  readonly kind: "list";
  readonly items?: readonly TreePatch[];
  readonly updates?: ReadonlyMap<number, TreePatch>;
}

/** A whole render: root changes plus per-component changes. `null` marks a removed component. */
export interface Patch {
  readonly root: TreePatch | null;
  readonly components: ReadonlyMap<number, TreePatch | null>;
}

export function isEmptyPatch(patch: Patch): boolean {
  return patch.root === null && patch.components.size === 0;
}
