import { DiffInvariantCode, DiffInvariantError } from "../errors.js";
import type { ComponentNode, RenderSnapshot } from "../model/component.js";
import { forEachComponentRef, forEachComponentRefIn, type Dynamic, type Rendered } from "../model/rendered.js";
import { debug } from "../shared/debug.js";
import type { MountRegistry } from "./registry.js";

/** The component whose slot content is being rendered, and which slot. */
export interface SlotOwner {
  readonly cid: number;
  readonly slot: string;
}

export interface MountRequest {
  readonly key: string;
  /** Set when the component is mounted from slot content handed to another component. */
  readonly slotOwner: SlotOwner | null;
}

export interface ComponentRender {
  readonly fingerprint: string;
  readonly rendered: Rendered;
  readonly assigns: Readonly<Record<string, unknown>>;
}

const NO_CHILDREN: ReadonlyMap<string, readonly number[]> = new Map();

/**
 * Per-render bookkeeping for components: which keys got mounted, under
 * which cids, and the arena of nodes the render produced. Nothing is
 * committed to the registry until `commit`.
 */
export class RenderContext {
  private readonly nodes = new Map<number, ComponentNode>();
  private readonly mounted = new Map<string, number>();
  private readonly children = new Map<number, Map<string, number[]>>();
  private readonly retained = new Set<number>();

  constructor(
    private readonly previous: RenderSnapshot | null,
    private readonly registry: MountRegistry,
  ) {}

  /**
   * Mount (or re-mount) the component for `request.key`. `render` receives the
   * cid and the node from the previous render under that cid, if any.
   */
  mount(
    request: MountRequest,
    render: (cid: number, previous: ComponentNode | null) => ComponentRender,
  ): number {
    const { key } = request;
    if (this.mounted.has(key)) {
      throw new DiffInvariantError(
        `component key "${key}" is mounted more than once in a single render`,
        DiffInvariantCode.DUPLICATE_COMPONENT,
      );
    }
    const known = this.registry.lookup(key);
    const cid = known ?? this.registry.allocate();
    this.mounted.set(key, cid);

    const before = known === undefined ? null : (this.previous?.components.get(cid) ?? null);
    const result = render(cid, before);
    this.nodes.set(cid, {
      cid,
      key,
      fingerprint: result.fingerprint,
      rendered: result.rendered,
      assigns: result.assigns,
      children: this.childrenOf(cid, before),
    });
    if (request.slotOwner) this.recordChild(request.slotOwner, cid);
    debug.render("component.mount", { cid, key, fresh: before === null });
    return cid;
  }

  /**
   * Carry over every component referenced from a dynamic that was reused
   * without being evaluated, along with the components they render.
   */
  retain(dynamic: Dynamic): void {
    forEachComponentRef(dynamic, (cid) => this.retainComponent(cid));
  }

  get componentCount(): number {
    return this.nodes.size;
  }

  finish(root: Rendered): RenderSnapshot {
    return { root, components: this.nodes };
  }

  /** Make this render's mount keys the live ones. */
  commit(): void {
    this.registry.commit(this.mounted);
  }

  private retainComponent(cid: number): void {
    const node = this.previous?.components.get(cid);
    if (!node) {
      throw new DiffInvariantError(
        `reused content references component ${cid}, which was not mounted before`,
        DiffInvariantCode.MISSING_COMPONENT,
      );
    }
    if (this.nodes.has(cid) || this.mounted.has(node.key)) {
      throw new DiffInvariantError(
        `component key "${node.key}" is mounted more than once in a single render`,
        DiffInvariantCode.DUPLICATE_COMPONENT,
      );
    }
    this.mounted.set(node.key, cid);
    this.nodes.set(cid, node);
    this.retained.add(cid);
    forEachComponentRefIn(node.rendered, (child) => this.retainComponent(child));
  }

  /** Children mounted during this render plus previous children carried over untouched. */
  private childrenOf(cid: number, before: ComponentNode | null): ReadonlyMap<string, readonly number[]> {
    const fresh = this.children.get(cid);
    if (!before && !fresh) return NO_CHILDREN;
    const out = new Map<string, number[]>();
    for (const [slot, cids] of fresh ?? []) out.set(slot, [...cids]);
    for (const [slot, cids] of before?.children ?? []) {
      const kept = cids.filter((child) => this.retained.has(child));
      if (kept.length === 0) continue;
      const list = out.get(slot);
      if (list) list.push(...kept.filter((child) => !list.includes(child)));
      else out.set(slot, kept);
    }
    return out.size > 0 ? out : NO_CHILDREN;
  }

  private recordChild(owner: SlotOwner, cid: number): void {
    let slots = this.children.get(owner.cid);
    if (!slots) {
      slots = new Map();
      this.children.set(owner.cid, slots);
    }
    const list = slots.get(owner.slot);
    if (list) list.push(cid);
    else slots.set(owner.slot, [cid]);
  }
}
