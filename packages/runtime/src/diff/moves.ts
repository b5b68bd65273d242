import type { Move } from "./patch.js";

/**
 * Indices (into `values`) of one longest strictly increasing subsequence.
 * Patience sorting with predecessor links, O(n log n).
 */
export function longestIncreasingSubsequence(values: readonly number[]): number[] {
  const tails: number[] = [];
  const predecessors: number[] = new Array<number>(values.length).fill(-1);

  for (let i = 0; i < values.length; i++) {
    const value = values[i] ?? 0;
    let lo = 0;
    let hi = tails.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if ((values[tails[mid] ?? 0] ?? 0) < value) lo = mid + 1;
      else hi = mid;
    }
    if (lo > 0) predecessors[i] = tails[lo - 1] ?? -1;
    tails[lo] = i;
  }

  const result: number[] = [];
  let cursor = tails.length > 0 ? (tails[tails.length - 1] ?? -1) : -1;
  while (cursor !== -1) {
    result.push(cursor);
    cursor = predecessors[cursor] ?? -1;
  }
  return result.reverse();
}

/**
 * Moves that turn `current` into `target`. Both hold the same keys exactly once.
 * Keys on a longest common subsequence stay put; every other key is moved,
 * in ascending target order, right behind its target predecessor.
 */
export function planMoves<K>(current: readonly K[], target: readonly K[]): Move[] {
  const currentIndex = new Map<K, number>();
  current.forEach((key, index) => currentIndex.set(key, index));

  const positions = target.map((key) => currentIndex.get(key) ?? -1);
  const stable = new Set<K>();
  for (const index of longestIncreasingSubsequence(positions)) {
    const key = target[index];
    if (key !== undefined) stable.add(key);
  }
  if (stable.size === target.length) return [];

  const working = [...current];
  const moves: Move[] = [];
  for (let j = 0; j < target.length; j++) {
    const key = target[j];
    if (key === undefined || stable.has(key)) continue;
    const from = working.indexOf(key);
    working.splice(from, 1);
    const to = j === 0 ? 0 : working.indexOf(previousOf(target, j)) + 1;
    working.splice(to, 0, key);
    moves.push({ from, to });
  }
  return moves;
}

/** Apply moves the way a client does: splice out, then splice in. */
export function applyMoves<T>(items: readonly T[], moves: readonly Move[]): T[] {
  const out = [...items];
  for (const { from, to } of moves) {
    const [item] = out.splice(from, 1);
    if (item !== undefined) out.splice(to, 0, item);
  }
  return out;
}

function previousOf<K>(target: readonly K[], j: number): K {
  const key = target[j - 1];
  if (key === undefined) throw new Error(`no key before position ${j}`);
  return key;
}
