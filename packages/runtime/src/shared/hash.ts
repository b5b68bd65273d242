import { createHash } from "node:crypto";

/** One dynamic of a fragment as its fingerprint sees it: plan kind and expression source. */
export type FingerprintPart = readonly [kind: string, source: string];

/**
 * Structural identity of a compiled fragment: the first 16 hex digits of a
 * SHA-256 over its statics and dynamic parts.
 */
export function fingerprintOf(statics: readonly string[], parts: readonly FingerprintPart[]): string {
  return createHash("sha256").update(JSON.stringify([statics, parts])).digest("hex").slice(0, 16);
}
