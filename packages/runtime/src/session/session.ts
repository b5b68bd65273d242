import { diffSnapshot } from "../diff/diff.js";
import { isEmptyPatch } from "../diff/patch.js";
import type { RenderSnapshot } from "../model/component.js";
import type { Rendered } from "../model/rendered.js";
import { snapshotToString } from "../model/to-string.js";
import { debug } from "../shared/debug.js";
import { Assigns } from "../tracking/assigns.js";
import type { ChangedSet } from "../tracking/changed.js";
import { encodePatch, type WireObject } from "../wire/encode.js";
import { RenderContext } from "./context.js";
import { MountRegistry } from "./registry.js";

export interface TemplateRenderInput {
  readonly context: RenderContext;
  readonly assigns: Readonly<Record<string, unknown>>;
  /** `null` when nothing is known about changes: evaluate everything. */
  readonly changed: ChangedSet | null;
  readonly previous: Rendered | null;
}

/** Anything that can render itself into the live session's model. */
export interface SessionTemplate {
  readonly fingerprint: string;
  render(input: TemplateRenderInput): Rendered;
}

export interface SessionOptions {
  /** Shown in debug output. */
  readonly label?: string;
}

export interface MountResult {
  readonly html: string;
  readonly patch: WireObject;
}

/**
 * One connected view: holds the bindings, the last rendered snapshot and
 * the component registry, and turns assignment changes into wire patches.
 */
export class LiveSession {
  readonly assigns = new Assigns();
  private readonly registry = new MountRegistry();
  private current: RenderSnapshot | null = null;
  private readonly label: string;

  constructor(
    private readonly template: SessionTemplate,
    options: SessionOptions = {},
  ) {
    this.label = options.label ?? template.fingerprint;
  }

  get snapshot(): RenderSnapshot | null {
    return this.current;
  }

  get mounted(): boolean {
    return this.current !== null;
  }

  /** First render: the full HTML and the full patch a client starts from. */
  mount(bindings: Readonly<Record<string, unknown>> = {}): MountResult {
    if (this.current) {
      throw new Error(`session ${this.label} is already mounted`);
    }
    this.assigns.assign(bindings);
    const patch = this.render();
    return { html: this.toHtml(), patch: patch ?? {} };
  }

  assign(key: string, value: unknown): this;
  assign(values: Readonly<Record<string, unknown>>): this;
  assign(keyOrValues: string | Readonly<Record<string, unknown>>, value?: unknown): this {
    if (typeof keyOrValues === "string") this.assigns.assign(keyOrValues, value);
    else this.assigns.assign(keyOrValues);
    return this;
  }

  /**
   * Re-render against the pending changes. Returns `null` when the client
   * already holds everything. A failed render leaves the session untouched.
   */
  render(): WireObject | null {
    const previous = this.current;
    const changed = previous ? this.assigns.changes : null;
    const context = new RenderContext(previous, this.registry);
    const root = this.template.render({
      context,
      assigns: this.assigns.toRecord(),
      changed,
      previous: previous?.root ?? null,
    });
    const next = context.finish(root);
    const patch = diffSnapshot(previous, next);

    context.commit();
    this.current = next;
    this.assigns.resetChanges();
    debug.session("render", () => ({
      label: this.label,
      first: previous === null,
      changed: changed ? Object.keys(changed) : "*",
      components: next.components.size,
    }));
    return isEmptyPatch(patch) ? null : encodePatch(patch);
  }

  toHtml(): string {
    if (!this.current) {
      throw new Error(`session ${this.label} has not been mounted`);
    }
    return snapshotToString(this.current);
  }
}
