import { describe, test } from "vitest";
import assert from "node:assert/strict";

import { fingerprintOf } from "../src/index.js";

describe("fingerprintOf", () => {
  const statics = ["<p>", "</p>"];

  test("is 16 hex digits and stable for the same fragment", () => {
    const first = fingerprintOf(statics, [["body", "name"]]);
    assert.match(first, /^[0-9a-f]{16}$/);
    assert.equal(fingerprintOf(["<p>", "</p>"], [["body", "name"]]), first);
  });

  test("changes with the statics, the plan kind and the expression source", () => {
    const base = fingerprintOf(statics, [["body", "name"]]);
    assert.notEqual(fingerprintOf(["<div>", "</div>"], [["body", "name"]]), base);
    assert.notEqual(fingerprintOf(statics, [["attribute:value", "name"]]), base);
    assert.notEqual(fingerprintOf(statics, [["body", "title"]]), base);
  });

  test("moving text across a static boundary is a different shape", () => {
    assert.notEqual(fingerprintOf(["ab", "c"], [["body", "x"]]), fingerprintOf(["a", "bc"], [["body", "x"]]));
  });
});
