import {
  changeMarkFor,
  componentDynamic,
  debug,
  isPlainRecord,
  type ChangeMark,
  type ChangedSet,
  type ComponentDynamic,
  type ComponentNode,
} from "@tessera/runtime";

import type { ComponentArgumentPlan, ComponentPlan } from "../building/plans.js";
import { EvaluationError, evaluate } from "../expression/evaluate.js";
import type { ComponentSpec } from "../declarative/types.js";
import { isAffected } from "../tracking/dependencies.js";
import { attributeRecord, renderFragment } from "./fragment.js";
import { RenderFrame, type ComponentDefinition } from "./frame.js";
import { InnerBlock, type SlotEntry } from "./slots.js";

/** Assign keys the runtime fills in itself. */
const RESERVED_KEYS: ReadonlySet<string> = new Set(["inner_block", "__slot__"]);

export function renderComponent(plan: ComponentPlan, frame: RenderFrame): ComponentDynamic {
  const definition = frame.environment.resolveComponent(plan.target);
  if (!definition) {
    throw new EvaluationError(`undefined component <${plan.tag}>`, "tessera/unknown-component", plan.span);
  }

  const key = mountKey(plan, frame, definition);
  const cid = frame.context.mount({ key, slotOwner: frame.slotOwner }, (cid, node) => {
    const { assigns, changed } = calleeAssigns(plan, frame, definition.spec, node);
    const callee = new RenderFrame({
      context: frame.context,
      environment: definition.environment,
      assigns,
      changed,
      position: `c${cid}`,
      cid,
    });
    debug.render("component", () => ({
      cid,
      key,
      changed: changed === null ? "*" : Object.keys(changed),
    }));
    const rendered = renderFragment(definition.fragment, callee, node?.rendered ?? null);
    return { fingerprint: rendered.fingerprint, rendered, assigns };
  });
  return componentDynamic(cid);
}

/**
 * `Name#type:id` for an explicit `id`, otherwise the position of the call.
 * The type keeps `id={1}` and `id="1"` apart.
 */
function mountKey(plan: ComponentPlan, frame: RenderFrame, definition: ComponentDefinition): string {
  const id = plan.attributes.find((arg) => arg.kind === "attribute" && arg.name === "id");
  if (id) {
    const value = evaluate(id.expression, frame);
    if (value != null && value !== false) return `${definition.name}#${typeof value}:${String(value)}`;
  }
  return `${frame.position}:${definition.name}`;
}

interface CalleeAssigns {
  readonly assigns: Readonly<Record<string, unknown>>;
  /** `null` on first mount or when the caller is untracked. */
  readonly changed: ChangedSet | null;
}

/**
 * The bindings a component renders with and which of them changed since the
 * assigns it last rendered with. Attributes whose caller-side dependencies are
 * untouched keep the value held from the last render.
 */
export function calleeAssigns(
  plan: ComponentPlan,
  frame: RenderFrame,
  spec: ComponentSpec,
  node: ComponentNode | null,
): CalleeAssigns {
  const held = node?.assigns ?? null;
  const tracked = held !== null && frame.changed !== null;
  const values: Record<string, unknown> = {};

  for (const arg of plan.attributes) {
    if (arg.kind === "attribute" && tracked && held && !isAffected(arg.dependencies, frame.changed) && Object.hasOwn(held, arg.name)) {
      values[arg.name] = held[arg.name];
      continue;
    }
    assignArgument(values, arg, frame);
  }

  const slots = new Map<string, SlotEntry[]>();
  const touched = new Set<string>();
  for (const entry of plan.slots) {
    const affected = !tracked || isAffected(entry.dependencies, frame.changed);
    if (affected) touched.add(entry.name);
    const attributes: Record<string, unknown> = {};
    for (const arg of entry.attributes) assignArgument(attributes, arg, frame);
    const block = entry.body ? new InnerBlock(entry.name, entry.let, entry.body, frame, affected) : null;
    const list = slots.get(entry.name) ?? [];
    list.push({ ...attributes, __slot__: entry.name, inner_block: block });
    slots.set(entry.name, list);
  }
  for (const [name, entries] of slots) values[name] = entries;

  const assigns = applySpec(spec, values);
  if (!tracked || !held) return { assigns, changed: null };

  const changed: Record<string, ChangeMark> = {};
  for (const key of new Set([...Object.keys(held), ...Object.keys(assigns)])) {
    if (!Object.hasOwn(assigns, key) || !Object.hasOwn(held, key)) {
      changed[key] = true;
      continue;
    }
    if (slots.has(key)) {
      if (touched.has(key)) changed[key] = true;
      continue;
    }
    const mark = changeMarkFor(held[key], assigns[key]);
    if (mark !== null) changed[key] = mark;
  }
  return { assigns, changed };
}

function assignArgument(into: Record<string, unknown>, arg: ComponentArgumentPlan, frame: RenderFrame): void {
  if (arg.kind === "attribute") {
    into[arg.name] = evaluate(arg.expression, frame);
    return;
  }
  Object.assign(into, attributeRecord(evaluate(arg.expression, frame), arg.span));
}

/**
 * Fill declared defaults, give optional slots an empty entry list, and
 * collect undeclared attributes into the `global` attr when there is one.
 */
export function applySpec(spec: ComponentSpec, values: Readonly<Record<string, unknown>>): Record<string, unknown> {
  const merged: Record<string, unknown> = {};
  for (const attr of spec.attrs) {
    if (!attr.required && attr.default !== null && attr.type !== "global") merged[attr.name] = attr.default.value;
  }
  for (const slot of spec.slots) {
    if (!slot.required) merged[slot.name] = [];
  }

  const global = spec.attrs.find((attr) => attr.type === "global");
  if (!global) return Object.assign(merged, values);

  const known = new Set<string>([...spec.attrs.map((a) => a.name), ...spec.slots.map((s) => s.name), ...RESERVED_KEYS]);
  const callerGlobals: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(values)) {
    if (known.has(key)) merged[key] = value;
    else callerGlobals[key] = value;
  }
  if (!Object.hasOwn(values, global.name)) {
    const base = global.default !== null && isPlainRecord(global.default.value) ? global.default.value : {};
    merged[global.name] = { ...base, ...callerGlobals };
  }
  return merged;
}
