import type { SourceSpan } from "../model/span.js";
import type { BindingPattern, Expression, ForOfStatement } from "../expression/ast.js";
import type { ComponentCall, ComponentTarget } from "../parsing/nodes.js";
import type { Dependencies } from "../tracking/dependencies.js";

/* =============================================================================
 * Compiled fragments
 * -----------------------------------------------------------------------------
 * A fragment is the static text of a template region with one plan per hole.
 * `statics.length === plans.length + 1`. Evaluating a fragment yields a
 * Rendered with one Dynamic per plan.
 * ============================================================================= */

export interface CompiledFragment {
  readonly statics: readonly string[];
  readonly plans: readonly Plan[];
  readonly fingerprint: string;
  readonly root: boolean;
  /** Everything the fragment reads, merged over its plans. */
  readonly dependencies: Dependencies;
}

/** How an attribute plan turns its value into text. */
export type AttributeEncoding =
  /** ` name="value"`, ` name` for `true`, nothing for `false`/nullish. */
  | "attribute"
  /** The value only; statics hold ` name="` and `"`. */
  | "value"
  | "class"
  | "style";

interface PlanBase {
  readonly dependencies: Dependencies;
  readonly span: SourceSpan;
}

export interface BodyPlan extends PlanBase {
  readonly kind: "body";
  readonly expression: Expression;
}

export interface AttributePlan extends PlanBase {
  readonly kind: "attribute";
  readonly name: string;
  readonly encoding: AttributeEncoding;
  readonly expression: Expression;
}

export interface SpreadPlan extends PlanBase {
  readonly kind: "spread";
  readonly expression: Expression;
}

/** `renderSlot(slot, argument?)` at the top of an output expression. */
export interface RenderSlotPlan extends PlanBase {
  readonly kind: "render-slot";
  readonly slot: Expression;
  readonly argument: Expression | null;
}

export interface ConditionalBranchPlan {
  readonly condition: Expression | null;
  readonly fragment: CompiledFragment;
}

export interface ConditionalPlan extends PlanBase {
  readonly kind: "conditional";
  readonly branches: readonly ConditionalBranchPlan[];
}

export interface ComprehensionPlan extends PlanBase {
  readonly kind: "comprehension";
  readonly header: ForOfStatement;
  readonly body: CompiledFragment;
}

export type ComponentArgumentPlan =
  | {
      readonly kind: "attribute";
      readonly name: string;
      readonly expression: Expression;
      readonly dependencies: Dependencies;
      readonly span: SourceSpan;
    }
  | {
      readonly kind: "spread";
      readonly expression: Expression;
      readonly dependencies: Dependencies;
      readonly span: SourceSpan;
    };

export interface SlotEntryPlan {
  readonly name: string;
  readonly let: BindingPattern | null;
  readonly attributes: readonly ComponentArgumentPlan[];
  /** `null` for a self-closing entry. */
  readonly body: CompiledFragment | null;
  readonly dependencies: Dependencies;
  readonly span: SourceSpan;
}

export interface ComponentPlan extends PlanBase {
  readonly kind: "component";
  readonly tag: string;
  readonly target: ComponentTarget;
  readonly attributes: readonly ComponentArgumentPlan[];
  /** Entries in source order; the default slot is `inner_block`. */
  readonly slots: readonly SlotEntryPlan[];
  readonly call: ComponentCall;
}

export type Plan =
  | BodyPlan
  | AttributePlan
  | SpreadPlan
  | RenderSlotPlan
  | ConditionalPlan
  | ComprehensionPlan
  | ComponentPlan;

/** Assign key of the default slot. */
export const INNER_BLOCK = "inner_block";
