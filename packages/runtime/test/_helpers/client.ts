import type { WireObject, WireValue } from "../../src/index.js";

/**
 * Minimal in-memory client for tests: applies wire patches the way a browser
 * client would and renders the HTML it ends up holding.
 */

type Slot = string | number | ClientTree | ClientComprehension | ClientList;

interface ClientTree {
  readonly kind: "tree";
  readonly statics: readonly string[];
  readonly slots: readonly Slot[];
}

interface ClientComprehension {
  readonly kind: "comprehension";
  readonly statics: readonly string[];
  readonly items: readonly (readonly Slot[])[];
}

interface ClientList {
  readonly kind: "list";
  readonly items: readonly ClientTree[];
}

export class ClientView {
  private root: ClientTree | null = null;
  private readonly components = new Map<number, ClientTree>();

  apply(patch: WireObject): this {
    const rootFields: Record<string, WireValue> = {};
    for (const [key, value] of Object.entries(patch)) {
      if (key !== "c") rootFields[key] = value;
    }
    if (Object.keys(rootFields).length > 0) {
      this.root = mergeTree(this.root, rootFields);
    }
    const table = patch["c"];
    if (table !== undefined) {
      for (const [key, value] of Object.entries(asObject(table))) {
        const cid = Number(key);
        if (value === null) {
          this.components.delete(cid);
        } else {
          this.components.set(cid, mergeTree(this.components.get(cid) ?? null, asObject(value)));
        }
      }
    }
    return this;
  }

  get componentIds(): number[] {
    return [...this.components.keys()].sort((a, b) => a - b);
  }

  html(): string {
    if (!this.root) throw new Error("nothing applied yet");
    return this.treeHtml(this.root);
  }

  private treeHtml(tree: ClientTree): string {
    return this.interleave(tree.statics, tree.slots);
  }

  private interleave(statics: readonly string[], slots: readonly Slot[]): string {
    let out = statics[0] ?? "";
    for (let i = 0; i < slots.length; i++) {
      const slot = slots[i];
      if (slot !== undefined) out += this.slotHtml(slot);
      out += statics[i + 1] ?? "";
    }
    return out;
  }

  private slotHtml(slot: Slot): string {
    if (typeof slot === "string") return slot;
    if (typeof slot === "number") {
      const component = this.components.get(slot);
      if (!component) throw new Error(`unknown component ${slot}`);
      return this.treeHtml(component);
    }
    switch (slot.kind) {
      case "tree":
        return this.treeHtml(slot);
      case "list":
        return slot.items.map((item) => this.treeHtml(item)).join("");
      case "comprehension":
        return slot.items.map((item) => this.interleave(slot.statics, item)).join("");
    }
  }
}

function mergeTree(existing: ClientTree | null, patch: WireObject): ClientTree {
  const full = patch["s"] !== undefined;
  const statics = full ? asStrings(patch["s"]) : existing?.statics;
  if (!statics) throw new Error("sparse tree patch without a tree to apply it to");
  const slots: Slot[] = full || !existing ? [] : [...existing.slots];
  for (const [key, value] of Object.entries(patch)) {
    if (!/^\d+$/.test(key)) continue;
    const index = Number(key);
    slots[index] = mergeSlot(full ? undefined : slots[index], value);
  }
  return { kind: "tree", statics, slots };
}

function mergeSlot(existing: Slot | undefined, value: WireValue): Slot {
  if (typeof value === "string" || typeof value === "number") return value;
  const patch = asObject(value);
  if (patch["d"] !== undefined) {
    const statics =
      patch["s"] !== undefined
        ? asStrings(patch["s"])
        : existing !== undefined && typeof existing === "object" && existing.kind === "comprehension"
          ? existing.statics
          : null;
    if (!statics) throw new Error("comprehension without statics");
    return { kind: "comprehension", statics, items: asArray(patch["d"]).map((item) => newItem(item)) };
  }
  if (patch["l"] !== undefined) {
    return { kind: "list", items: asArray(patch["l"]).map((tree) => mergeTree(null, asObject(tree))) };
  }
  if (patch["s"] !== undefined) return mergeTree(null, patch);
  if (existing === undefined || typeof existing !== "object") {
    throw new Error("sparse patch for a slot that holds no structure");
  }
  switch (existing.kind) {
    case "tree":
      return mergeTree(existing, patch);
    case "list":
      return mergeList(existing, patch);
    case "comprehension":
      return mergeComprehension(existing, patch);
  }
}

function mergeList(existing: ClientList, patch: WireObject): ClientList {
  const items = [...existing.items];
  for (const [key, tree] of Object.entries(asObject(patch["u"] ?? {}))) {
    const index = Number(key);
    items[index] = mergeTree(items[index] ?? null, asObject(tree));
  }
  return { kind: "list", items };
}

function mergeComprehension(existing: ClientComprehension, patch: WireObject): ClientComprehension {
  const items: (readonly Slot[])[] = [...existing.items];
  const removes = asArray(patch["x"] ?? []).map((entry) => Number(entry));
  for (const index of [...removes].sort((a, b) => b - a)) items.splice(index, 1);
  for (const move of asArray(patch["m"] ?? [])) {
    const [from, to] = asArray(move).map((entry) => Number(entry));
    const [item] = items.splice(from ?? 0, 1);
    if (item) items.splice(to ?? 0, 0, item);
  }
  for (const insert of asArray(patch["i"] ?? [])) {
    const [index, item] = asArray(insert);
    items.splice(Number(index), 0, newItem(item ?? []));
  }
  for (const [key, update] of Object.entries(asObject(patch["u"] ?? {}))) {
    const index = Number(key);
    const slots = [...(items[index] ?? [])];
    for (const [position, slot] of Object.entries(asObject(update))) {
      const at = Number(position);
      slots[at] = mergeSlot(slots[at], slot);
    }
    items[index] = slots;
  }
  return { kind: "comprehension", statics: existing.statics, items };
}

function newItem(value: WireValue): Slot[] {
  return asArray(value).map((slot) => mergeSlot(undefined, slot));
}

function asObject(value: WireValue): WireObject {
  if (typeof value !== "object" || value === null || isWireArray(value)) {
    throw new Error(`expected an object, got ${JSON.stringify(value)}`);
  }
  return value;
}

function asArray(value: WireValue): readonly WireValue[] {
  if (!isWireArray(value)) throw new Error(`expected an array, got ${JSON.stringify(value)}`);
  return value;
}

function asStrings(value: WireValue | undefined): string[] {
  if (value === undefined) throw new Error("missing statics");
  return asArray(value).map((entry) => String(entry));
}

function isWireArray(value: WireValue): value is readonly WireValue[] {
  return Array.isArray(value);
}
