import { describe, test } from "vitest";
import assert from "node:assert/strict";

import { applyMoves, longestIncreasingSubsequence, planMoves } from "../src/index.js";

/** Small deterministic generator so permutations are reproducible. */
function seeded(seed: number): () => number {
  let state = seed;
  return () => {
    state = (state * 1103515245 + 12345) % 2147483648;
    return state / 2147483648;
  };
}

function shuffle<T>(items: readonly T[], random: () => number): T[] {
  const out = [...items];
  for (let i = out.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    const a = out[i];
    const b = out[j];
    if (a === undefined || b === undefined) continue;
    out[i] = b;
    out[j] = a;
  }
  return out;
}

describe("longest increasing subsequence", () => {
  test("returns indices of one longest run", () => {
    assert.deepEqual(longestIncreasingSubsequence([1, 0, 2]), [1, 2]);
    assert.deepEqual(longestIncreasingSubsequence([0, 1, 2, 3]), [0, 1, 2, 3]);
    assert.deepEqual(longestIncreasingSubsequence([3, 2, 1]), [2]);
    assert.deepEqual(longestIncreasingSubsequence([]), []);
  });

  test("finds the longest run in a mixed sequence", () => {
    const values = [5, 1, 6, 2, 7, 3, 8];
    const indices = longestIncreasingSubsequence(values);
    assert.equal(indices.length, 4);
    const picked = indices.map((index) => values[index]);
    assert.deepEqual(picked, [1, 2, 3, 8]);
  });
});

describe("move planning", () => {
  test("identical orders need no moves", () => {
    assert.deepEqual(planMoves(["a", "b", "c"], ["a", "b", "c"]), []);
  });

  test("a swap of neighbours is one move", () => {
    const moves = planMoves(["a", "b", "c"], ["b", "a", "c"]);
    assert.deepEqual(moves, [{ from: 1, to: 0 }]);
    assert.deepEqual(applyMoves(["a", "b", "c"], moves), ["b", "a", "c"]);
  });

  test("moving the last item to the front is one move", () => {
    const moves = planMoves([1, 2, 3, 4], [4, 1, 2, 3]);
    assert.deepEqual(moves, [{ from: 3, to: 0 }]);
  });

  test("a reversal keeps one item in place", () => {
    const moves = planMoves([1, 2, 3, 4], [4, 3, 2, 1]);
    assert.equal(moves.length, 3);
    assert.deepEqual(applyMoves([1, 2, 3, 4], moves), [4, 3, 2, 1]);
  });

  test("applying the planned moves always yields the target with a minimal count", () => {
    const random = seeded(7);
    for (let round = 0; round < 200; round++) {
      const size = 1 + Math.floor(random() * 12);
      const current = Array.from({ length: size }, (_, index) => index);
      const target = shuffle(current, random);
      const moves = planMoves(current, target);
      assert.deepEqual(applyMoves(current, moves), target);
      const stable = longestIncreasingSubsequence(target).length;
      assert.equal(moves.length, size - stable);
    }
  });
});
