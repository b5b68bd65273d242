import type { ChangedSet, RenderContext, SlotOwner } from "@tessera/runtime";

import type { SourceText } from "../model/text.js";
import type { ComponentTarget } from "../parsing/nodes.js";
import type { ComponentSpec } from "../declarative/types.js";
import type { CompiledFragment } from "../building/plans.js";
import type { Binding, EvaluationScope } from "../expression/evaluate.js";
import { ASSIGNS_NAME } from "../tracking/dependencies.js";

/** A component a template can call. */
export interface ComponentDefinition {
  /** Display and mount-key name, such as `Card.card` or `.badge`. */
  readonly name: string;
  readonly spec: ComponentSpec;
  readonly fragment: CompiledFragment;
  readonly environment: RenderEnvironment;
}

export type ComponentResolver = (target: ComponentTarget) => ComponentDefinition | null;

/** What a compiled template needs from the place it was compiled in. */
export interface RenderEnvironment {
  readonly source: SourceText;
  readonly helpers: ReadonlyMap<string, unknown>;
  readonly resolveComponent: ComponentResolver;
}

const NO_LOCALS: ReadonlyMap<string, unknown> = new Map();

export interface FrameInit {
  readonly context: RenderContext;
  readonly environment: RenderEnvironment;
  readonly assigns: Readonly<Record<string, unknown>>;
  readonly changed: ChangedSet | null;
  readonly position: string;
  readonly cid: number | null;
  readonly locals?: ReadonlyMap<string, unknown>;
  readonly slotOwner?: SlotOwner | null;
}

/**
 * Everything a plan is evaluated against. Frames are immutable; moving to a
 * child position or binding locals derives a new one.
 *
 * Names resolve to locals first, then `assigns` (the whole binding map),
 * then helpers, then bindings.
 */
export class RenderFrame implements EvaluationScope {
  readonly context: RenderContext;
  readonly environment: RenderEnvironment;
  readonly assigns: Readonly<Record<string, unknown>>;
  readonly changed: ChangedSet | null;
  /** `root` or `c<cid>`, followed by the plan path. */
  readonly position: string;
  /** The component whose template this frame evaluates; `null` at the root. */
  readonly cid: number | null;
  readonly locals: ReadonlyMap<string, unknown>;
  /** Set while rendering slot content handed to another component. */
  readonly slotOwner: SlotOwner | null;

  constructor(init: FrameInit) {
    this.context = init.context;
    this.environment = init.environment;
    this.assigns = init.assigns;
    this.changed = init.changed;
    this.position = init.position;
    this.cid = init.cid;
    this.locals = init.locals ?? NO_LOCALS;
    this.slotOwner = init.slotOwner ?? null;
  }

  lookup(name: string): Binding | undefined {
    if (this.locals.has(name)) return { value: this.locals.get(name) };
    if (name === ASSIGNS_NAME) return { value: this.assigns };
    if (this.environment.helpers.has(name)) return { value: this.environment.helpers.get(name) };
    if (Object.hasOwn(this.assigns, name)) return { value: this.assigns[name] };
    return undefined;
  }

  at(position: string): RenderFrame {
    return this.derive({ position });
  }

  derive(overrides: Partial<FrameInit>): RenderFrame {
    return new RenderFrame({
      context: this.context,
      environment: this.environment,
      assigns: this.assigns,
      changed: this.changed,
      position: this.position,
      cid: this.cid,
      locals: this.locals,
      slotOwner: this.slotOwner,
      ...overrides,
    });
  }
}
