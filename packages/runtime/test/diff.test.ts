import { describe, test } from "vitest";
import assert from "node:assert/strict";

import {
  DiffInvariantError,
  componentDynamic,
  comprehensionDynamic,
  createRendered,
  diff,
  diffSnapshot,
  encodePatch,
  encodeTree,
  listDynamic,
  nestedDynamic,
  valueDynamic,
  type ComponentNode,
  type Dynamic,
  type Rendered,
  type RenderSnapshot,
} from "../src/index.js";

function greeting(name: Dynamic): Rendered {
  return createRendered(["<p>Hello ", "!</p>"], [name], "greeting", true);
}

function list(items: readonly (readonly Dynamic[])[]): Rendered {
  return createRendered(["<ul>", "</ul>"], [comprehensionDynamic("row", ["<li>", "</li>"], items)], "list", true);
}

function node(cid: number, rendered: Rendered): ComponentNode {
  return { cid, key: `k${cid}`, fingerprint: rendered.fingerprint, rendered, assigns: {}, children: new Map() };
}

function snapshot(root: Rendered, nodes: ComponentNode[]): RenderSnapshot {
  return { root, components: new Map(nodes.map((entry) => [entry.cid, entry])) };
}

describe("diff / trees", () => {
  test("no previous tree yields the full tree with statics", () => {
    const patch = diff(null, greeting(valueDynamic("Ada")));
    assert.ok(patch);
    assert.deepEqual(encodeTree(patch), { s: ["<p>Hello ", "!</p>"], r: 1, "0": "Ada" });
  });

  test("an empty changed set with equal fingerprints yields nothing", () => {
    const tree = greeting(valueDynamic("Ada"));
    assert.equal(diff(tree, tree, {}), null);
    assert.equal(diff(tree, greeting(valueDynamic("Ada")), {}), null);
  });

  test("a changed slot is sent without statics", () => {
    const patch = diff(greeting(valueDynamic("Ada")), greeting(valueDynamic("Grace")));
    assert.ok(patch);
    assert.deepEqual(encodeTree(patch), { "0": "Grace" });
  });

  test("an equal value in a fresh object is not sent", () => {
    assert.equal(diff(greeting(valueDynamic("Ada")), greeting(valueDynamic("Ada"))), null);
  });

  test("the same dynamic object is skipped", () => {
    const shared = valueDynamic("Ada");
    assert.equal(diff(greeting(shared), greeting(shared)), null);
  });

  test("a different fingerprint yields the full tree", () => {
    const other = createRendered(["<div>", "</div>"], [valueDynamic("x")], "other");
    const patch = diff(greeting(valueDynamic("Ada")), other);
    assert.ok(patch);
    assert.deepEqual(encodeTree(patch), { s: ["<div>", "</div>"], "0": "x" });
  });

  test("nested trees are diffed recursively", () => {
    const inner = (text: string) => createRendered(["<b>", "</b>"], [valueDynamic(text)], "inner");
    const outer = (text: string) => createRendered(["<p>", "</p>"], [nestedDynamic(inner(text))], "outer");
    const patch = diff(outer("a"), outer("b"));
    assert.ok(patch);
    assert.deepEqual(encodeTree(patch), { "0": { "0": "b" } });
  });

  test("a slot switching from value to nested tree sends the tree in full", () => {
    const inner = createRendered(["<b>", "</b>"], [valueDynamic("x")], "inner");
    const before = createRendered(["<p>", "</p>"], [valueDynamic("")], "outer");
    const after = createRendered(["<p>", "</p>"], [nestedDynamic(inner)], "outer");
    const patch = diff(before, after);
    assert.ok(patch);
    assert.deepEqual(encodeTree(patch), { "0": { s: ["<b>", "</b>"], "0": "x" } });
  });

  test("trees sharing a fingerprint must share their dynamic count", () => {
    const a = createRendered(["a", "b"], [valueDynamic("1")], "same");
    const b = createRendered(["a", "b", "c"], [valueDynamic("1"), valueDynamic("2")], "same");
    assert.throws(() => diff(a, b), DiffInvariantError);
  });

  test("statics must outnumber dynamics by one", () => {
    assert.throws(() => createRendered(["a"], [valueDynamic("1")], "bad"), DiffInvariantError);
  });
});

describe("diff / lists", () => {
  const entry = (text: string) => createRendered(["<i>", "</i>"], [valueDynamic(text)], "entry");

  test("same shapes send sparse updates", () => {
    const before = createRendered(["", ""], [listDynamic([entry("a"), entry("b")])], "holder");
    const after = createRendered(["", ""], [listDynamic([entry("a"), entry("c")])], "holder");
    const patch = diff(before, after);
    assert.ok(patch);
    assert.deepEqual(encodeTree(patch), { "0": { u: { "1": { "0": "c" } } } });
  });

  test("a length change resends every entry", () => {
    const before = createRendered(["", ""], [listDynamic([entry("a")])], "holder");
    const after = createRendered(["", ""], [listDynamic([entry("a"), entry("b")])], "holder");
    const patch = diff(before, after);
    assert.ok(patch);
    assert.deepEqual(encodeTree(patch), {
      "0": { l: [{ s: ["<i>", "</i>"], "0": "a" }, { s: ["<i>", "</i>"], "0": "b" }] },
    });
  });
});

describe("diff / comprehensions", () => {
  test("statics are sent once with the first full comprehension", () => {
    const patch = diff(null, list([[valueDynamic("a")], [valueDynamic("b")]]));
    assert.ok(patch);
    assert.deepEqual(encodeTree(patch), {
      s: ["<ul>", "</ul>"],
      r: 1,
      "0": { s: ["<li>", "</li>"], d: [["a"], ["b"]] },
    });
  });

  test("same length sends per-item updates", () => {
    const patch = diff(list([[valueDynamic("a")], [valueDynamic("b")]]), list([[valueDynamic("a")], [valueDynamic("z")]]));
    assert.ok(patch);
    assert.deepEqual(encodeTree(patch), { "0": { u: { "1": { "0": "z" } } } });
  });

  test("a length change without keys resends items but not statics", () => {
    const patch = diff(list([[valueDynamic("a")]]), list([[valueDynamic("a")], [valueDynamic("b")]]));
    assert.ok(patch);
    assert.deepEqual(encodeTree(patch), { "0": { d: [["a"], ["b"]] } });
  });

  test("component-keyed items reorder with moves only", () => {
    const before = list([[componentDynamic(1)], [componentDynamic(2)], [componentDynamic(3)]]);
    const after = list([[componentDynamic(2)], [componentDynamic(1)], [componentDynamic(3)]]);
    const patch = diff(before, after);
    assert.ok(patch);
    assert.deepEqual(encodeTree(patch), { "0": { m: [[1, 0]] } });
  });

  test("component-keyed items combine removes, moves and inserts", () => {
    const before = list([[componentDynamic(1)], [componentDynamic(2)], [componentDynamic(3)]]);
    const after = list([[componentDynamic(3)], [componentDynamic(4)], [componentDynamic(1)]]);
    const patch = diff(before, after);
    assert.ok(patch);
    assert.deepEqual(encodeTree(patch), { "0": { x: [1], m: [[1, 0]], i: [[1, [4]]] } });
  });

  test("a cid keying two items is an invariant violation", () => {
    const before = list([[componentDynamic(1)]]);
    const after = list([[componentDynamic(1)], [componentDynamic(1)]]);
    assert.throws(() => diff(before, after), DiffInvariantError);
  });
});

describe("diff / snapshots", () => {
  const card = (text: string) => createRendered(["<div>", "</div>"], [valueDynamic(text)], "card", true);
  const page = (cids: number[]) =>
    createRendered(["<main>", "</main>"], [comprehensionDynamic("slot", ["", ""], cids.map((cid) => [componentDynamic(cid)]))], "page", true);

  test("the first render carries every component in full", () => {
    const patch = diffSnapshot(null, snapshot(page([1]), [node(1, card("one"))]));
    assert.deepEqual(encodePatch(patch), {
      s: ["<main>", "</main>"],
      r: 1,
      "0": { s: ["", ""], d: [[1]] },
      c: { "1": { s: ["<div>", "</div>"], r: 1, "0": "one" } },
    });
  });

  test("unchanged components are left out and removed ones get tombstones", () => {
    const first = snapshot(page([1, 2]), [node(1, card("one")), node(2, card("two"))]);
    const second = snapshot(page([1]), [node(1, first.components.get(1)?.rendered ?? card("one"))]);
    const patch = diffSnapshot(first, second);
    assert.deepEqual(encodePatch(patch), { "0": { x: [1] }, c: { "2": null } });
  });

  test("a changed component sends only its changed slots", () => {
    const first = snapshot(page([1]), [node(1, card("one"))]);
    const second = snapshot(page([1]), [node(1, card("uno"))]);
    assert.deepEqual(encodePatch(diffSnapshot(first, second)), { c: { "1": { "0": "uno" } } });
  });

  test("references to unknown components are rejected", () => {
    assert.throws(() => diffSnapshot(null, snapshot(page([9]), [])), DiffInvariantError);
  });
});
