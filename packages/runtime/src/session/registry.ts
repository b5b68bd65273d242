/**
 * Stable component ids across renders. A mount key keeps its cid for as
 * long as it is mounted in every render; once a render goes by without it,
 * the key is forgotten and a later mount gets a fresh cid. Ids are never reused.
 */
export class MountRegistry {
  private byKey = new Map<string, number>();
  private nextCid = 1;

  lookup(key: string): number | undefined {
    return this.byKey.get(key);
  }

  allocate(): number {
    return this.nextCid++;
  }

  /** Replace the live key table with the keys mounted by a completed render. */
  commit(mounted: ReadonlyMap<string, number>): void {
    this.byKey = new Map(mounted);
  }

  get size(): number {
    return this.byKey.size;
  }
}
