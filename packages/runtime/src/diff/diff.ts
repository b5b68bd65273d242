import { DiffInvariantCode, DiffInvariantError } from "../errors.js";
import type { RenderSnapshot } from "../model/component.js";
import {
  forEachComponentRefIn,
  itemComponentKey,
  type ComprehensionDynamic,
  type Dynamic,
  type ListDynamic,
  type Rendered,
} from "../model/rendered.js";
import { debug } from "../shared/debug.js";
import { isEmptyChangedSet, type ChangedSet } from "../tracking/changed.js";
import { planMoves } from "./moves.js";
import type {
  ComprehensionPatch,
  Insert,
  ItemContent,
  ItemPatch,
  ListPatch,
  Patch,
  SlotPatch,
  TreePatch,
} from "./patch.js";

/**
 * Minimal patch taking a client holding `previous` to `current`.
 *
 * - No previous tree, or a different fingerprint: the full `current` tree.
 * - `changed` given and empty with matching fingerprints: nothing.
 * - Otherwise only the slots whose dynamics differ; a slot holding the very
 *   same dynamic object as before is skipped without inspection.
 */
export function diff(
  previous: Rendered | null,
  current: Rendered,
  changed?: ChangedSet | null,
): TreePatch | null {
  if (!previous || previous.fingerprint !== current.fingerprint) {
    return fullTree(current);
  }
  if (changed && isEmptyChangedSet(changed)) return null;
  return diffSameShape(previous, current);
}

/**
 * Patch for a whole render: the root tree plus every component. Components
 * present before but not now become tombstones (`null`).
 */
export function diffSnapshot(previous: RenderSnapshot | null, current: RenderSnapshot): Patch {
  assertComponentRefs(current);

  const root = diff(previous?.root ?? null, current.root);
  const components = new Map<number, TreePatch | null>();
  for (const [cid, node] of current.components) {
    const before = previous?.components.get(cid);
    const patch = before ? diff(before.rendered, node.rendered) : fullTree(node.rendered);
    if (patch) components.set(cid, patch);
  }
  if (previous) {
    for (const cid of previous.components.keys()) {
      if (!current.components.has(cid)) components.set(cid, null);
    }
  }
  debug.diff("snapshot", () => ({
    root: root !== null,
    components: components.size,
    removed: [...components.values()].filter((entry) => entry === null).length,
  }));
  return { root, components };
}

export function fullTree(rendered: Rendered): TreePatch {
  const slots = new Map<number, SlotPatch>();
  rendered.dynamics.forEach((dynamic, index) => slots.set(index, fullDynamic(dynamic)));
  return { kind: "tree", statics: rendered.statics, root: rendered.root, slots };
}

export function fullDynamic(dynamic: Dynamic): SlotPatch {
  switch (dynamic.kind) {
    case "value":
      return { kind: "value", value: dynamic.value };
    case "component":
      return { kind: "component", cid: dynamic.cid };
    case "nested":
      return fullTree(dynamic.rendered);
    case "list":
      return { kind: "list", items: dynamic.items.map((item) => fullTree(item)) };
    case "comprehension":
      return fullComprehension(dynamic);
  }
}

function fullComprehension(dynamic: ComprehensionDynamic): ComprehensionPatch {
  return {
    kind: "comprehension",
    statics: dynamic.statics,
    items: dynamic.items.map((item) => fullItem(item)),
  };
}

function fullItem(item: readonly Dynamic[]): ItemContent {
  return item.map((dynamic) => fullDynamic(dynamic));
}

function diffSameShape(previous: Rendered, current: Rendered): TreePatch | null {
  if (previous.dynamics.length !== current.dynamics.length) {
    throw new DiffInvariantError(
      `trees sharing fingerprint ${current.fingerprint} have ${previous.dynamics.length} and ${current.dynamics.length} dynamics`,
      DiffInvariantCode.SHAPE_MISMATCH,
    );
  }
  const slots = diffDynamics(previous.dynamics, current.dynamics);
  return slots.size > 0 ? { kind: "tree", slots } : null;
}

function diffDynamics(previous: readonly Dynamic[], current: readonly Dynamic[]): Map<number, SlotPatch> {
  const slots = new Map<number, SlotPatch>();
  current.forEach((dynamic, index) => {
    const before = previous[index];
    if (before === dynamic) return;
    const patch = before ? diffDynamic(before, dynamic) : fullDynamic(dynamic);
    if (patch) slots.set(index, patch);
  });
  return slots;
}

function diffDynamic(previous: Dynamic, current: Dynamic): SlotPatch | null {
  switch (current.kind) {
    case "value":
      if (previous.kind === "value" && previous.value === current.value) return null;
      return { kind: "value", value: current.value };
    case "component":
      if (previous.kind === "component" && previous.cid === current.cid) return null;
      return { kind: "component", cid: current.cid };
    case "nested":
      return previous.kind === "nested" ? diff(previous.rendered, current.rendered) : fullTree(current.rendered);
    case "list":
      return previous.kind === "list" ? diffList(previous, current) : fullDynamic(current);
    case "comprehension":
      return previous.kind === "comprehension" ? diffComprehension(previous, current) : fullDynamic(current);
  }
}

function diffList(previous: ListDynamic, current: ListDynamic): ListPatch | null {
  const sameShapes =
    previous.items.length === current.items.length &&
    current.items.every((item, index) => previous.items[index]?.fingerprint === item.fingerprint);
  if (!sameShapes) {
    return { kind: "list", items: current.items.map((item) => fullTree(item)) };
  }
  const updates = new Map<number, TreePatch>();
  current.items.forEach((item, index) => {
    const before = previous.items[index];
    if (!before || before === item) return;
    const patch = diffSameShape(before, item);
    if (patch) updates.set(index, patch);
  });
  return updates.size > 0 ? { kind: "list", updates } : null;
}

function diffComprehension(
  previous: ComprehensionDynamic,
  current: ComprehensionDynamic,
): ComprehensionPatch | null {
  if (previous.fingerprint !== current.fingerprint) {
    return fullComprehension(current);
  }
  if (isKeyed(previous, current)) {
    return diffKeyed(previous, current);
  }
  if (previous.items.length !== current.items.length) {
    return { kind: "comprehension", items: current.items.map((item) => fullItem(item)) };
  }
  const updates = new Map<number, ItemPatch>();
  current.items.forEach((item, index) => {
    const before = previous.items[index];
    if (!before || before === item) return;
    const patch = diffItem(before, item);
    if (patch.size > 0) updates.set(index, patch);
  });
  return updates.size > 0 ? { kind: "comprehension", updates } : null;
}

function isKeyed(previous: ComprehensionDynamic, current: ComprehensionDynamic): boolean {
  if (previous.items.length + current.items.length === 0) return false;
  return (
    previous.items.every((item) => itemComponentKey(item) !== null) &&
    current.items.every((item) => itemComponentKey(item) !== null)
  );
}

function diffItem(previous: readonly Dynamic[], current: readonly Dynamic[]): ItemPatch {
  if (previous.length !== current.length) {
    throw new DiffInvariantError(
      `comprehension items have ${previous.length} and ${current.length} dynamics`,
      DiffInvariantCode.SHAPE_MISMATCH,
    );
  }
  return diffDynamics(previous, current);
}

function diffKeyed(previous: ComprehensionDynamic, current: ComprehensionDynamic): ComprehensionPatch | null {
  const previousKeys = keysOf(previous);
  const currentKeys = keysOf(current);
  const previousIndex = indexByKey(previousKeys);
  const currentIndex = indexByKey(currentKeys);

  const removes: number[] = [];
  previousKeys.forEach((key, index) => {
    if (!currentIndex.has(key)) removes.push(index);
  });

  const kept = previousKeys.filter((key) => currentIndex.has(key));
  const targetOrder = currentKeys.filter((key) => previousIndex.has(key));
  const moves = planMoves(kept, targetOrder);

  const inserts: Insert[] = [];
  const updates = new Map<number, ItemPatch>();
  current.items.forEach((item, index) => {
    const key = currentKeys[index];
    const from = key === undefined ? undefined : previousIndex.get(key);
    if (from === undefined) {
      inserts.push({ index, item: fullItem(item) });
      return;
    }
    const before = previous.items[from];
    if (!before || before === item) return;
    const patch = diffItem(before, item);
    if (patch.size > 0) updates.set(index, patch);
  });

  if (removes.length + moves.length + inserts.length + updates.size === 0) return null;
  debug.diff("keyed", {
    removes: removes.length,
    moves: moves.length,
    inserts: inserts.length,
    updates: updates.size,
  });
  return {
    kind: "comprehension",
    ...(removes.length > 0 ? { removes } : {}),
    ...(moves.length > 0 ? { moves } : {}),
    ...(inserts.length > 0 ? { inserts } : {}),
    ...(updates.size > 0 ? { updates } : {}),
  };
}

function keysOf(comprehension: ComprehensionDynamic): number[] {
  return comprehension.items.map((item) => itemComponentKey(item) ?? -1);
}

function indexByKey(keys: readonly number[]): Map<number, number> {
  const index = new Map<number, number>();
  keys.forEach((key, position) => {
    if (index.has(key)) {
      throw new DiffInvariantError(
        `component ${key} keys more than one comprehension item`,
        DiffInvariantCode.DUPLICATE_KEY,
      );
    }
    index.set(key, position);
  });
  return index;
}

function assertComponentRefs(snapshot: RenderSnapshot): void {
  const check = (cid: number): void => {
    if (!snapshot.components.has(cid)) {
      throw new DiffInvariantError(
        `component ${cid} is referenced but not present in the component table`,
        DiffInvariantCode.MISSING_COMPONENT,
      );
    }
  };
  forEachComponentRefIn(snapshot.root, check);
  for (const node of snapshot.components.values()) {
    forEachComponentRefIn(node.rendered, check);
  }
}
