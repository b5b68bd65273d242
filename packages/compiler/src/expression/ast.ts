import type { SourceSpan } from "../model/span.js";

/* =============================================================================
 * Expression AST
 * -----------------------------------------------------------------------------
 * Spans are absolute offsets in the template source.
 * ============================================================================= */

export type UnaryOperator = "!" | "-" | "+" | "typeof";

export type BinaryOperator =
  | "??"
  | "||"
  | "&&"
  | "==="
  | "!=="
  | "=="
  | "!="
  | "<"
  | "<="
  | ">"
  | ">="
  | "+"
  | "-"
  | "*"
  | "/"
  | "%";

export interface PrimitiveLiteralExpression {
  readonly $kind: "PrimitiveLiteral";
  readonly value: string | number | boolean | null | undefined;
  readonly span: SourceSpan;
}

export interface TemplateExpression {
  readonly $kind: "Template";
  /** Always one more cooked string than expressions. */
  readonly cooked: readonly string[];
  readonly expressions: readonly Expression[];
  readonly span: SourceSpan;
}

export interface AccessScopeExpression {
  readonly $kind: "AccessScope";
  readonly name: string;
  readonly span: SourceSpan;
}

export interface AccessMemberExpression {
  readonly $kind: "AccessMember";
  readonly object: Expression;
  readonly name: string;
  readonly optional: boolean;
  readonly span: SourceSpan;
}

export interface AccessKeyedExpression {
  readonly $kind: "AccessKeyed";
  readonly object: Expression;
  readonly key: Expression;
  readonly optional: boolean;
  readonly span: SourceSpan;
}

export interface CallExpression {
  readonly $kind: "Call";
  readonly callee: Expression;
  readonly args: readonly Expression[];
  readonly optional: boolean;
  readonly span: SourceSpan;
}

export interface UnaryExpression {
  readonly $kind: "Unary";
  readonly operation: UnaryOperator;
  readonly expression: Expression;
  readonly span: SourceSpan;
}

export interface BinaryExpression {
  readonly $kind: "Binary";
  readonly operation: BinaryOperator;
  readonly left: Expression;
  readonly right: Expression;
  readonly span: SourceSpan;
}

export interface ConditionalExpression {
  readonly $kind: "Conditional";
  readonly condition: Expression;
  readonly yes: Expression;
  readonly no: Expression;
  readonly span: SourceSpan;
}

export interface ArrayLiteralExpression {
  readonly $kind: "ArrayLiteral";
  readonly elements: readonly Expression[];
  readonly span: SourceSpan;
}

export interface ObjectLiteralExpression {
  readonly $kind: "ObjectLiteral";
  readonly keys: readonly string[];
  readonly values: readonly Expression[];
  readonly span: SourceSpan;
}

export interface ArrowFunctionExpression {
  readonly $kind: "ArrowFunction";
  readonly params: readonly BindingPattern[];
  readonly body: Expression;
  readonly span: SourceSpan;
}

export type Expression =
  | PrimitiveLiteralExpression
  | TemplateExpression
  | AccessScopeExpression
  | AccessMemberExpression
  | AccessKeyedExpression
  | CallExpression
  | UnaryExpression
  | BinaryExpression
  | ConditionalExpression
  | ArrayLiteralExpression
  | ObjectLiteralExpression
  | ArrowFunctionExpression;

/* ---- binding patterns (`:for`, `:let`, arrow params) ---- */

export interface BindingIdentifier {
  readonly $kind: "BindingIdentifier";
  readonly name: string;
  readonly span: SourceSpan;
}

export interface ArrayBindingPattern {
  readonly $kind: "ArrayBindingPattern";
  /** `null` marks a hole: `[, second]`. */
  readonly elements: readonly (BindingPattern | null)[];
  readonly span: SourceSpan;
}

export interface BindingProperty {
  readonly key: string;
  readonly value: BindingPattern;
}

export interface ObjectBindingPattern {
  readonly $kind: "ObjectBindingPattern";
  readonly properties: readonly BindingProperty[];
  readonly span: SourceSpan;
}

export interface BindingPatternDefault {
  readonly $kind: "BindingPatternDefault";
  readonly target: BindingPattern;
  readonly default: Expression;
  readonly span: SourceSpan;
}

export type BindingPattern =
  | BindingIdentifier
  | ArrayBindingPattern
  | ObjectBindingPattern
  | BindingPatternDefault;

/** `pattern of iterable`, the header of `for` blocks and `:for` attributes. */
export interface ForOfStatement {
  readonly $kind: "ForOfStatement";
  readonly declaration: BindingPattern;
  readonly iterable: Expression;
  readonly span: SourceSpan;
}

/** Every name a pattern binds, in source order. */
export function boundNames(pattern: BindingPattern): string[] {
  const names: string[] = [];
  const visit = (p: BindingPattern): void => {
    switch (p.$kind) {
      case "BindingIdentifier":
        names.push(p.name);
        return;
      case "ArrayBindingPattern":
        for (const el of p.elements) if (el) visit(el);
        return;
      case "ObjectBindingPattern":
        for (const prop of p.properties) visit(prop.value);
        return;
      case "BindingPatternDefault":
        visit(p.target);
        return;
    }
  };
  visit(pattern);
  return names;
}
