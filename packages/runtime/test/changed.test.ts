import { describe, test } from "vitest";
import assert from "node:assert/strict";

import {
  Assigns,
  assignsToAttributes,
  changeMarkFor,
  deepEqual,
  isPathChanged,
  mergeChangedSets,
} from "../src/index.js";

describe("changed sets", () => {
  test("a missing key is unchanged, a true mark covers every path below it", () => {
    const changed = { user: true as const };
    assert.equal(isPathChanged(changed, "user"), true);
    assert.equal(isPathChanged(changed, "user", ["name", "first"]), true);
    assert.equal(isPathChanged(changed, "title"), false);
  });

  test("nested marks narrow by path", () => {
    const changed = { user: { name: true as const } };
    assert.equal(isPathChanged(changed, "user", ["name"]), true);
    assert.equal(isPathChanged(changed, "user", ["email"]), false);
    assert.equal(isPathChanged(changed, "user"), true);
  });

  test("no tracking information means everything changed", () => {
    assert.equal(isPathChanged(null, "anything"), true);
  });

  test("change marks between plain records are nested", () => {
    assert.equal(changeMarkFor({ a: 1, b: 2 }, { a: 1, b: 2 }), null);
    assert.deepEqual(changeMarkFor({ a: 1, b: 2 }, { a: 1, b: 3 }), { b: true });
    assert.deepEqual(changeMarkFor({ a: { x: 1 } }, { a: { x: 2 }, c: 1 }), { a: { x: true }, c: true });
    assert.equal(changeMarkFor([1, 2], [1, 2]), null);
    assert.equal(changeMarkFor("a", "b"), true);
  });

  test("merging keeps the widest mark", () => {
    assert.deepEqual(mergeChangedSets({ a: { x: true } }, { a: { y: true }, b: true }), {
      a: { x: true, y: true },
      b: true,
    });
    assert.deepEqual(mergeChangedSets({ a: true }, { a: { y: true } }), { a: true });
  });

  test("deep equality over plain data", () => {
    assert.equal(deepEqual({ a: [1, { b: 2 }] }, { a: [1, { b: 2 }] }), true);
    assert.equal(deepEqual({ a: 1 }, { a: 1, b: undefined }), false);
    assert.equal(deepEqual(new Date(5), new Date(5)), true);
    assert.equal(deepEqual(NaN, NaN), true);
  });
});

describe("Assigns", () => {
  test("records changes and ignores equal values", () => {
    const assigns = new Assigns({ name: "Ada" });
    assigns.assign("name", "Ada");
    assert.deepEqual(assigns.changes, {});
    assigns.assign({ name: "Grace", count: 1 });
    assert.deepEqual(assigns.changes, { name: true, count: true });
    assert.equal(assigns.changed("name"), true);
  });

  test("records nested changes for plain records", () => {
    const assigns = new Assigns({ user: { name: "Ada", email: "a@example.test" } });
    assigns.assign("user", { name: "Ada", email: "b@example.test" });
    assert.deepEqual(assigns.changes, { user: { email: true } });
  });

  test("the record handed out is not mutated by later assignments", () => {
    const assigns = new Assigns({ n: 1 });
    const before = assigns.toRecord();
    assigns.assign("n", 2);
    assert.equal(before["n"], 1);
    assert.equal(assigns.get("n"), 2);
  });

  test("assignNew only binds missing keys; update requires an existing key", () => {
    const assigns = new Assigns({ a: 1 });
    assigns.assignNew("a", () => 5).assignNew("b", () => 2);
    assert.deepEqual(assigns.toRecord(), { a: 1, b: 2 });
    assigns.update("a", (value) => Number(value) + 1);
    assert.equal(assigns.get("a"), 2);
    assert.throws(() => assigns.update("missing", () => 0), /has not been assigned/);
  });

  test("assignNew sees keys assigned before it", () => {
    const assigns = new Assigns({ first: "Ada" });
    assigns
      .assignNew("last", () => "Lovelace")
      .assignNew("full", (current) => `${String(current["first"])} ${String(current["last"])}`);
    assert.equal(assigns.get("full"), "Ada Lovelace");
    assert.deepEqual(assigns.changes, { last: true, full: true });
  });

  test("update receives the current value and the other bindings", () => {
    const assigns = new Assigns({ count: 2, step: 3 });
    assigns.update("count", (count, current) => Number(count) + Number(current["step"]));
    assert.equal(assigns.get("count"), 5);
    assert.deepEqual(assigns.changes, { count: true });
  });

  test("assignsToAttributes drops slot bookkeeping and excluded keys", () => {
    const entry = { __slot__: "footer", inner_block: null, class: "end", label: "x" };
    assert.deepEqual(assignsToAttributes(entry), { class: "end", label: "x" });
    assert.deepEqual(assignsToAttributes(entry, ["label"]), { class: "end" });
  });

  test("resetChanges clears pending changes", () => {
    const assigns = new Assigns();
    assigns.assign("x", 1);
    assigns.resetChanges();
    assert.deepEqual(assigns.changes, {});
  });

  test("the assigns name is reserved", () => {
    assert.throws(() => new Assigns().assign("assigns", 1), /reserved/);
  });
});
