import type { SourceSpan } from "../model/span.js";
import type { BindingPattern, Expression, ForOfStatement } from "../expression/ast.js";

/* =============================================================================
 * Parse tree
 * ============================================================================= */

export interface TextNode {
  readonly kind: "text";
  readonly content: string;
  readonly span: SourceSpan;
}

/** `{expr}` in body text or `<%= expr %>`. */
export interface ExpressionNode {
  readonly kind: "expression";
  readonly expression: Expression;
  readonly span: SourceSpan;
}

export type ElementAttribute =
  | { readonly kind: "literal"; readonly name: string; readonly value: string; readonly quote: '"' | "'" | null; readonly span: SourceSpan }
  | { readonly kind: "boolean"; readonly name: string; readonly span: SourceSpan }
  | { readonly kind: "expression"; readonly name: string; readonly expression: Expression; readonly span: SourceSpan }
  | { readonly kind: "spread"; readonly expression: Expression; readonly span: SourceSpan };

export interface ElementNode {
  readonly kind: "element";
  readonly name: string;
  readonly void: boolean;
  readonly attributes: readonly ElementAttribute[];
  readonly children: readonly Node[];
  readonly span: SourceSpan;
}

/** `:for` on an element, or a `<%= for ... %>` block. */
export interface LoopNode {
  readonly kind: "loop";
  readonly header: ForOfStatement;
  readonly body: readonly Node[];
  readonly span: SourceSpan;
}

export interface ConditionalBranch {
  /** `null` for the trailing `else`. */
  readonly condition: Expression | null;
  readonly body: readonly Node[];
  readonly span: SourceSpan;
}

export interface ConditionalNode {
  readonly kind: "conditional";
  readonly branches: readonly ConditionalBranch[];
  readonly span: SourceSpan;
}

/** What can be told about an attribute value without evaluating it. */
export type LiteralShape =
  | "string"
  | "boolean"
  | "integer"
  | "float"
  | "nil"
  | "list"
  | "map"
  | "expression";

export type ComponentAttribute =
  | {
      readonly kind: "attribute";
      readonly name: string;
      readonly value: Expression;
      readonly shape: LiteralShape;
      /** The literal itself, when `shape` is not `expression`. */
      readonly literal: unknown;
      readonly span: SourceSpan;
    }
  | { readonly kind: "spread"; readonly expression: Expression; readonly span: SourceSpan };

export interface ComponentTarget {
  /** `null` for local components (`<.name>`). */
  readonly module: string | null;
  readonly name: string;
}

export interface SlotEntryNode {
  readonly kind: "slot";
  readonly name: string;
  readonly let: BindingPattern | null;
  readonly attributes: readonly ComponentAttribute[];
  /** `null` when the entry is self-closing and has no inner content. */
  readonly body: readonly Node[] | null;
  readonly span: SourceSpan;
}

export interface ComponentCallNode {
  readonly kind: "component";
  readonly tag: string;
  readonly target: ComponentTarget;
  readonly let: BindingPattern | null;
  readonly attributes: readonly ComponentAttribute[];
  readonly slots: readonly SlotEntryNode[];
  /** Default slot content; `null` for self-closing calls. */
  readonly body: readonly Node[] | null;
  readonly call: ComponentCall;
  readonly span: SourceSpan;
}

export type Node =
  | TextNode
  | ExpressionNode
  | ElementNode
  | LoopNode
  | ConditionalNode
  | ComponentCallNode;

export interface FragmentNode {
  readonly kind: "fragment";
  readonly children: readonly Node[];
  /** A single element at the top level, ignoring whitespace-only text. */
  readonly root: boolean;
  /** Every component invocation in source order, for verification. */
  readonly calls: readonly ComponentCall[];
}

/* ---- recorded component calls ---- */

export interface RecordedAttribute {
  readonly name: string;
  readonly shape: LiteralShape;
  readonly literal: unknown;
  readonly span: SourceSpan;
}

export interface RecordedSlot {
  readonly name: string;
  readonly attributes: readonly RecordedAttribute[];
  readonly hasSpread: boolean;
  readonly span: SourceSpan;
}

/** A component invocation with the literal shapes of what it passes. */
export interface ComponentCall {
  readonly target: ComponentTarget;
  readonly attributes: readonly RecordedAttribute[];
  readonly slots: readonly RecordedSlot[];
  readonly hasSpread: boolean;
  /** The default slot received content. */
  readonly hasInnerBlock: boolean;
  readonly file: string;
  readonly span: SourceSpan;
}
