import type {
  ComprehensionPatch,
  ItemContent,
  ItemPatch,
  ListPatch,
  Patch,
  SlotPatch,
  TreePatch,
} from "../diff/patch.js";

/* =============================================================================
 * Wire format
 * -----------------------------------------------------------------------------
 * JSON-ready encoding of a patch:
 *
 *   tree           { "s"?: statics, "r"?: 1, "0": slot, "1": slot, ... }
 *   slot           string (html) | number (component id) | object
 *   comprehension  full:   { "s"?: statics, "d": [[slot, ...], ...] }
 *                  edits:  { "x"?: [prevIndex], "m"?: [[from, to]],
 *                            "i"?: [[index, [slot, ...]]], "u"?: { index: { pos: slot } } }
 *   list           full:   { "l": [tree, ...] }   edits: { "u": { index: tree } }
 *   render         tree fields of the root plus "c": { cid: tree | null }
 *
 * A client holding the previous state always knows which kind of object a
 * slot holds, so the keys never need to be disambiguated across kinds.
 * ============================================================================= */

export type WireValue = string | number | null | WireObject | readonly WireValue[];

export interface WireObject {
  readonly [key: string]: WireValue;
}

export function encodePatch(patch: Patch): WireObject {
  const out: Record<string, WireValue> = patch.root ? { ...encodeTree(patch.root) } : {};
  if (patch.components.size > 0) {
    const components: Record<string, WireValue> = {};
    for (const [cid, tree] of patch.components) {
      components[String(cid)] = tree ? encodeTree(tree) : null;
    }
    out["c"] = components;
  }
  return out;
}

export function encodeTree(tree: TreePatch): WireObject {
  const out: Record<string, WireValue> = {};
  if (tree.statics) out["s"] = tree.statics;
  if (tree.root) out["r"] = 1;
  for (const [index, slot] of tree.slots) {
    out[String(index)] = encodeSlot(slot);
  }
  return out;
}

export function encodeSlot(slot: SlotPatch): WireValue {
  switch (slot.kind) {
    case "value":
      return slot.value;
    case "component":
      return slot.cid;
    case "tree":
      return encodeTree(slot);
    case "list":
      return encodeList(slot);
    case "comprehension":
      return encodeComprehension(slot);
  }
}

function encodeList(list: ListPatch): WireObject {
  const out: Record<string, WireValue> = {};
  if (list.items) out["l"] = list.items.map((item) => encodeTree(item));
  if (list.updates) {
    const updates: Record<string, WireValue> = {};
    for (const [index, tree] of list.updates) updates[String(index)] = encodeTree(tree);
    out["u"] = updates;
  }
  return out;
}

function encodeComprehension(patch: ComprehensionPatch): WireObject {
  const out: Record<string, WireValue> = {};
  if (patch.statics) out["s"] = patch.statics;
  if (patch.items) out["d"] = patch.items.map((item) => encodeItem(item));
  if (patch.removes) out["x"] = patch.removes;
  if (patch.moves) out["m"] = patch.moves.map(({ from, to }) => [from, to]);
  if (patch.inserts) out["i"] = patch.inserts.map(({ index, item }) => [index, encodeItem(item)]);
  if (patch.updates) {
    const updates: Record<string, WireValue> = {};
    for (const [index, item] of patch.updates) updates[String(index)] = encodeItemPatch(item);
    out["u"] = updates;
  }
  return out;
}

function encodeItem(item: ItemContent): WireValue[] {
  return item.map((slot) => encodeSlot(slot));
}

function encodeItemPatch(item: ItemPatch): WireObject {
  const out: Record<string, WireValue> = {};
  for (const [index, slot] of item) out[String(index)] = encodeSlot(slot);
  return out;
}
