import { isPlainRecord } from "../model/html.js";

/* =============================================================================
 * Changed sets
 * -----------------------------------------------------------------------------
 * `{ user: true }` says the whole `user` binding changed; `{ user: { name: true } }`
 * says only `user.name` did. `null` where a ChangedSet is expected means "no
 * tracking information": everything is treated as changed.
 * ============================================================================= */

export type ChangeMark = true | ChangedSet;

export interface ChangedSet {
  readonly [key: string]: ChangeMark;
}

export const NOTHING_CHANGED: ChangedSet = Object.freeze({});

export function isEmptyChangedSet(changed: ChangedSet): boolean {
  return Object.keys(changed).length === 0;
}

/**
 * Whether a read of `key` followed by the property `path` may observe a change.
 * A path that walks past a `true` mark is changed; a path that stops at a
 * nested set is changed too, since the read covers everything below it.
 */
export function isPathChanged(changed: ChangedSet | null, key: string, path: readonly string[] = []): boolean {
  if (changed === null) return true;
  let mark: ChangeMark | undefined = Object.hasOwn(changed, key) ? changed[key] : undefined;
  for (const segment of path) {
    if (mark === undefined) return false;
    if (mark === true) return true;
    mark = Object.hasOwn(mark, segment) ? mark[segment] : undefined;
  }
  return mark !== undefined;
}

/**
 * How `next` differs from `previous`: `null` when they are equal, a nested
 * set when both are plain records, `true` otherwise.
 */
export function changeMarkFor(previous: unknown, next: unknown): ChangeMark | null {
  if (Object.is(previous, next)) return null;
  if (isPlainRecord(previous) && isPlainRecord(next)) {
    const nested: Record<string, ChangeMark> = {};
    let any = false;
    for (const key of unionKeys(previous, next)) {
      const inPrevious = Object.hasOwn(previous, key);
      const inNext = Object.hasOwn(next, key);
      if (inPrevious !== inNext) {
        nested[key] = true;
        any = true;
        continue;
      }
      const mark = changeMarkFor(previous[key], next[key]);
      if (mark !== null) {
        nested[key] = mark;
        any = true;
      }
    }
    return any ? nested : null;
  }
  return deepEqual(previous, next) ? null : true;
}

/** Merge two marks for the same key. `true` absorbs anything. */
export function mergeChangeMarks(a: ChangeMark, b: ChangeMark): ChangeMark {
  if (a === true || b === true) return true;
  return mergeChangedSets(a, b);
}

export function mergeChangedSets(a: ChangedSet, b: ChangedSet): ChangedSet {
  const out: Record<string, ChangeMark> = { ...a };
  for (const [key, mark] of Object.entries(b)) {
    const existing = out[key];
    out[key] = existing === undefined ? mark : mergeChangeMarks(existing, mark);
  }
  return out;
}

/** Structural equality over plain data: primitives, arrays, plain records, dates. */
export function deepEqual(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) return true;
  if (typeof a !== "object" || typeof b !== "object" || a === null || b === null) return false;
  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false;
    for (let i = 0; i < a.length; i++) {
      if (!deepEqual(a[i], b[i])) return false;
    }
    return true;
  }
  if (a instanceof Date && b instanceof Date) return a.getTime() === b.getTime();
  if (isPlainRecord(a) && isPlainRecord(b)) {
    const keys = Object.keys(a);
    if (keys.length !== Object.keys(b).length) return false;
    for (const key of keys) {
      if (!Object.hasOwn(b, key) || !deepEqual(a[key], b[key])) return false;
    }
    return true;
  }
  return false;
}

function unionKeys(a: object, b: object): Set<string> {
  const keys = new Set(Object.keys(a));
  for (const key of Object.keys(b)) keys.add(key);
  return keys;
}
