import { describe, test, expect } from "vitest";

import { collectDependencies, isAffected, mergeDependencies, parseExpression, type Dependencies } from "../../src/index.js";

function depsOf(code: string, options: { locals?: string[]; helpers?: string[] } = {}): Dependencies {
  return collectDependencies(parseExpression(code), {
    locals: new Set(options.locals ?? []),
    helpers: new Set(options.helpers ?? []),
  });
}

describe("collectDependencies", () => {
  test("member chains become key and path; method names are dropped", () => {
    expect(depsOf("user.name.trim() + assigns.count + raw(x)", { helpers: ["raw"] })).toEqual({
      keys: [
        { key: "user", path: ["name"] },
        { key: "count", path: [] },
        { key: "x", path: [] },
      ],
      readsAll: false,
      locals: [],
    });
  });

  test("computed keys stop the path", () => {
    expect(depsOf("rows[i].title").keys).toEqual([
      { key: "rows", path: [] },
      { key: "i", path: [] },
    ]);
    expect(depsOf('settings["theme"].color').keys).toEqual([{ key: "settings", path: ["theme", "color"] }]);
  });

  test("arrow parameters are neither keys nor locals", () => {
    expect(depsOf("items.filter(i => i.done)")).toEqual({
      keys: [{ key: "items", path: [] }],
      readsAll: false,
      locals: [],
    });
  });

  test("reading assigns itself reads everything", () => {
    expect(depsOf("assigns").readsAll).toBe(true);
  });

  test("locals are reported separately", () => {
    expect(depsOf("row.id + offset", { locals: ["row"] })).toEqual({
      keys: [{ key: "offset", path: [] }],
      readsAll: false,
      locals: ["row"],
    });
  });

  test("repeated reads are recorded once", () => {
    expect(depsOf("a.b + a.b + a").keys).toEqual([
      { key: "a", path: ["b"] },
      { key: "a", path: [] },
    ]);
  });
});

describe("mergeDependencies", () => {
  test("keys are deduplicated in order and flags combine", () => {
    const merged = mergeDependencies(depsOf("a + b"), depsOf("b + c", { locals: ["c"] }), depsOf("assigns"));
    expect(merged).toEqual({
      keys: [
        { key: "a", path: [] },
        { key: "b", path: [] },
      ],
      readsAll: true,
      locals: ["c"],
    });
  });
});

describe("isAffected", () => {
  const deps = depsOf("user.name");

  test("untracked renders affect everything", () => {
    expect(isAffected(deps, null)).toBe(true);
  });

  test("nested change sets are followed along the path", () => {
    expect(isAffected(deps, { user: { email: true } })).toBe(false);
    expect(isAffected(deps, { user: { name: true } })).toBe(true);
    expect(isAffected(deps, { user: true })).toBe(true);
    expect(isAffected(deps, { other: true })).toBe(false);
  });

  test("a read of the whole map is affected by any change", () => {
    expect(isAffected(depsOf("assigns"), {})).toBe(false);
    expect(isAffected(depsOf("assigns"), { x: true })).toBe(true);
  });

  test("a read of a local is always affected", () => {
    expect(isAffected(depsOf("row", { locals: ["row"] }), {})).toBe(true);
  });
});
