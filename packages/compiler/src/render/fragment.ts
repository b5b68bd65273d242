import {
  comprehensionDynamic,
  createRendered,
  debug,
  encodeAttribute,
  encodeAttributeValue,
  encodeAttributes,
  encodeClass,
  encodeStyle,
  encodeText,
  isPlainRecord,
  listDynamic,
  nestedDynamic,
  valueDynamic,
  type Dynamic,
  type Rendered,
} from "@tessera/runtime";

import type {
  AttributePlan,
  CompiledFragment,
  ComprehensionPlan,
  ConditionalPlan,
  Plan,
  RenderSlotPlan,
} from "../building/plans.js";
import { EvaluationError, bindPattern, describe, evaluate, iterate } from "../expression/evaluate.js";
import { runtimeError } from "../errors.js";
import { isAffected } from "../tracking/dependencies.js";
import { renderComponent } from "./component.js";
import type { RenderFrame } from "./frame.js";
import { slotEntriesOf } from "./slots.js";

const EMPTY = "";

/** Evaluate a fragment into a Rendered, reusing dynamics of `previous` that nothing invalidated. */
export function renderFragment(fragment: CompiledFragment, frame: RenderFrame, previous: Rendered | null): Rendered {
  const before = previous && previous.fingerprint === fragment.fingerprint ? previous.dynamics : null;
  return createRendered(fragment.statics, renderDynamics(fragment, frame, before), fragment.fingerprint, fragment.root);
}

/**
 * One dynamic per plan. With a tracked changed-set, a plan whose dependencies
 * are untouched hands back the dynamic it produced last time.
 */
export function renderDynamics(
  fragment: CompiledFragment,
  frame: RenderFrame,
  before: readonly Dynamic[] | null,
): Dynamic[] {
  return fragment.plans.map((plan, index) => {
    const position = `${frame.position}/${index}`;
    const previous = before?.[index] ?? null;
    if (previous && frame.changed !== null && !isAffected(plan.dependencies, frame.changed)) {
      frame.context.retain(previous);
      debug.render("plan.skip", { position, kind: plan.kind });
      return previous;
    }
    return renderPlan(plan, frame.at(position), previous);
  });
}

function renderPlan(plan: Plan, frame: RenderFrame, previous: Dynamic | null): Dynamic {
  try {
    switch (plan.kind) {
      case "body":
        return valueDynamic(encodeText(evaluate(plan.expression, frame)));
      case "attribute":
        return valueDynamic(encodeAttributePlan(plan, evaluate(plan.expression, frame)));
      case "spread":
        return valueDynamic(encodeAttributes(attributeRecord(evaluate(plan.expression, frame), plan.span)));
      case "render-slot":
        return renderSlotPlan(plan, frame, previous);
      case "conditional":
        return renderConditional(plan, frame, previous);
      case "comprehension":
        return renderComprehension(plan, frame, previous);
      case "component":
        return renderComponent(plan, frame);
    }
  } catch (error) {
    if (error instanceof EvaluationError) {
      throw runtimeError(frame.environment.source, error.code, error.message, error.span);
    }
    throw error;
  }
}

function encodeAttributePlan(plan: AttributePlan, value: unknown): string {
  switch (plan.encoding) {
    case "attribute":
      return encodeAttribute(plan.name, value);
    case "value":
      return encodeAttributeValue(value);
    case "class":
      return encodeClass(value);
    case "style":
      return encodeStyle(value);
  }
}

/** A spread value: a record of attributes, or nothing. */
export function attributeRecord(value: unknown, span: Plan["span"]): Readonly<Record<string, unknown>> {
  if (value == null) return {};
  if (!isPlainRecord(value)) {
    throw new EvaluationError(`expected attributes to be an object, got: ${describe(value)}`, "tessera/invalid-attributes", span);
  }
  return value;
}

function renderConditional(plan: ConditionalPlan, frame: RenderFrame, previous: Dynamic | null): Dynamic {
  const index = plan.branches.findIndex((branch) => branch.condition === null || evaluate(branch.condition, frame));
  const branch = plan.branches[index];
  if (!branch) return valueDynamic(EMPTY);
  const before = previous?.kind === "nested" ? previous.rendered : null;
  return nestedDynamic(renderFragment(branch.fragment, frame.at(`${frame.position}?${index}`), before));
}

function renderComprehension(plan: ComprehensionPlan, frame: RenderFrame, previous: Dynamic | null): Dynamic {
  const { body, header } = plan;
  const items = iterate(evaluate(header.iterable, frame), header.iterable.span);
  const rows = previous?.kind === "comprehension" && previous.fingerprint === body.fingerprint ? previous.items : null;

  const dynamics = items.map((item, index) => {
    const locals = new Map(frame.locals);
    bindPattern(header.declaration, item, frame, locals);
    const itemFrame = frame.derive({ locals, position: `${frame.position}:${index}` });
    return renderDynamics(body, itemFrame, rows?.[index] ?? null);
  });
  debug.render("comprehension", { position: frame.position, items: dynamics.length, reused: rows !== null });
  return comprehensionDynamic(body.fingerprint, body.statics, dynamics);
}

function renderSlotPlan(plan: RenderSlotPlan, frame: RenderFrame, previous: Dynamic | null): Dynamic {
  const entries = slotEntriesOf(evaluate(plan.slot, frame), plan.slot.span);
  const argument = plan.argument ? evaluate(plan.argument, frame) : undefined;

  const renderEntry = (index: number, before: Rendered | null): Rendered => {
    const entry = entries[index];
    const block = entry?.inner_block;
    if (!entry || !block) {
      throw new EvaluationError(
        `attempted to render slot <:${entry?.__slot__ ?? "?"}> but the slot has no inner content`,
        "tessera/slot-without-content",
        plan.span,
      );
    }
    return block.render(argument, { position: `${frame.position}>${entry.__slot__}${index}`, cid: frame.cid }, before);
  };

  if (entries.length === 0) return valueDynamic(EMPTY);
  if (entries.length === 1) {
    return nestedDynamic(renderEntry(0, previous?.kind === "nested" ? previous.rendered : null));
  }
  const before = previous?.kind === "list" ? previous.items : null;
  return listDynamic(entries.map((_, index) => renderEntry(index, before?.[index] ?? null)));
}
