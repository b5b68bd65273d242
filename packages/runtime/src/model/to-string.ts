import { DiffInvariantCode, DiffInvariantError } from "../errors.js";
import type { ComponentNode, RenderSnapshot } from "./component.js";
import type { Dynamic, Rendered } from "./rendered.js";

type ComponentLookup = ReadonlyMap<number, ComponentNode>;

const NO_COMPONENTS: ComponentLookup = new Map();

/** Full HTML of a rendered tree; component references are resolved through `components`. */
export function renderToString(rendered: Rendered, components: ComponentLookup = NO_COMPONENTS): string {
  return interleave(rendered.statics, rendered.dynamics, components);
}

export function snapshotToString(snapshot: RenderSnapshot): string {
  return renderToString(snapshot.root, snapshot.components);
}

function interleave(
  statics: readonly string[],
  dynamics: readonly Dynamic[],
  components: ComponentLookup,
): string {
  let out = statics[0] ?? "";
  for (let i = 0; i < dynamics.length; i++) {
    const dynamic = dynamics[i];
    if (dynamic) out += dynamicToString(dynamic, components);
    out += statics[i + 1] ?? "";
  }
  return out;
}

function dynamicToString(dynamic: Dynamic, components: ComponentLookup): string {
  switch (dynamic.kind) {
    case "value":
      return dynamic.value;
    case "nested":
      return renderToString(dynamic.rendered, components);
    case "list":
      return dynamic.items.map((item) => renderToString(item, components)).join("");
    case "comprehension":
      return dynamic.items.map((item) => interleave(dynamic.statics, item, components)).join("");
    case "component": {
      const node = components.get(dynamic.cid);
      if (!node) {
        throw new DiffInvariantError(
          `component ${dynamic.cid} is referenced but not mounted`,
          DiffInvariantCode.MISSING_COMPONENT,
        );
      }
      return renderToString(node.rendered, components);
    }
  }
}
