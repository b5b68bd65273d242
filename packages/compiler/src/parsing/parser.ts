import { debug } from "@tessera/runtime";

import type { SourceSpan } from "../model/span.js";
import type { SourceText } from "../model/text.js";
import { syntaxError, type TemplateSyntaxError } from "../errors.js";
import type { SyntaxDiagnosticCode } from "../diagnostics/catalog/index.js";
import type { ExpressionToken, TagAttribute, TagOpenToken, Token } from "../lexing/tokens.js";
import { CoreParser } from "../expression/parser.js";
import { ExpressionSyntaxError } from "../expression/scanner.js";
import type { BindingPattern, Expression, ForOfStatement } from "../expression/ast.js";
import type {
  ComponentAttribute,
  ComponentCall,
  ComponentCallNode,
  ComponentTarget,
  ConditionalBranch,
  ElementAttribute,
  FragmentNode,
  LiteralShape,
  Node,
  RecordedAttribute,
  SlotEntryNode,
} from "./nodes.js";

/* =============================================================================
 * Template parser
 * -----------------------------------------------------------------------------
 * Consumes the token stream with an explicit stack of frames: open tags and
 * `if`/`for` blocks. Every error is fatal.
 * ============================================================================= */

type TagFrame = {
  readonly kind: "tag";
  readonly token: TagOpenToken;
  readonly children: Node[];
  readonly attributes: readonly ElementAttribute[];
  /** Slot entries collected by a component frame. */
  readonly slots: SlotEntryNode[];
  /** `:for` header of an element, wrapping it in a loop when it closes. */
  readonly loop: ForHeader | null;
};

type IfFrame = {
  readonly kind: "if";
  readonly branches: { condition: Expression | null; children: Node[]; span: SourceSpan }[];
  readonly start: number;
};

type ForFrame = {
  readonly kind: "for";
  readonly header: ForHeader;
  readonly children: Node[];
  readonly start: number;
};

type Frame = TagFrame | IfFrame | ForFrame;

type ForHeader = ForOfStatement;

const IF_HEADER = /^if\b/;
const FOR_HEADER = /^for\b/;
const ELSE_IF = /^else\s+if\b/;

export function parseTemplate(tokens: readonly Token[], source: SourceText): FragmentNode {
  return new TemplateParser(source).parse(tokens);
}

class TemplateParser {
  private readonly stack: Frame[] = [];
  private readonly rootChildren: Node[] = [];
  private readonly calls: ComponentCall[] = [];

  constructor(private readonly source: SourceText) {}

  parse(tokens: readonly Token[]): FragmentNode {
    for (const token of tokens) {
      switch (token.kind) {
        case "text":
          this.children().push({ kind: "text", content: token.content, span: token.span });
          break;
        case "expression":
          this.handleExpression(token);
          break;
        case "tag-open":
          this.handleOpen(token);
          break;
        case "tag-close":
          this.handleClose(token.name, token.span);
          break;
      }
    }

    const open = this.stack[this.stack.length - 1];
    if (open) {
      if (open.kind === "tag") {
        throw this.unclosedTag(open.token, "template");
      }
      throw this.error("tessera/unclosed-block", `end of template reached without <% end %> for ${open.kind} block`, {
        start: open.start,
        end: this.source.text.length,
      });
    }

    const fragment: FragmentNode = {
      kind: "fragment",
      children: this.rootChildren,
      root: isRootFragment(this.rootChildren),
      calls: this.calls,
    };
    debug.parse("fragment", { file: this.source.file, nodes: fragment.children.length, root: fragment.root });
    return fragment;
  }

  // ------------------------------------------------------------------------------------------
  // Expressions and blocks
  // ------------------------------------------------------------------------------------------

  private handleExpression(token: ExpressionToken): void {
    const trimmed = token.code.trim();
    const codeStart = token.codeSpan.start + (token.code.length - token.code.trimStart().length);

    if (token.marker === "control") {
      this.handleControl(token, trimmed, codeStart);
      return;
    }

    if (token.marker === "output" && IF_HEADER.test(trimmed)) {
      const condition = this.parseExpression(trimmed.slice(2), codeStart + 2);
      this.stack.push({
        kind: "if",
        branches: [{ condition, children: [], span: token.span }],
        start: token.span.start,
      });
      return;
    }

    if (token.marker === "output" && FOR_HEADER.test(trimmed)) {
      const header = this.parseForHeader(trimmed.slice(3), codeStart + 3, "tessera/invalid-expression");
      this.stack.push({ kind: "for", header, children: [], start: token.span.start });
      return;
    }

    const expression = this.parseExpression(token.code, token.codeSpan.start);
    this.children().push({ kind: "expression", expression, span: token.span });
  }

  private handleControl(token: ExpressionToken, trimmed: string, codeStart: number): void {
    if (trimmed === "end") {
      const frame = this.expectBlock(token, "end");
      this.stack.pop();
      if (frame.kind === "if") {
        const branches: ConditionalBranch[] = frame.branches.map((b) => ({
          condition: b.condition,
          body: b.children,
          span: b.span,
        }));
        this.children().push({ kind: "conditional", branches, span: { start: frame.start, end: token.span.end } });
      } else {
        this.children().push({
          kind: "loop",
          header: frame.header,
          body: frame.children,
          span: { start: frame.start, end: token.span.end },
        });
      }
      return;
    }

    if (trimmed === "else" || ELSE_IF.test(trimmed)) {
      const frame = this.expectBlock(token, "else");
      if (frame.kind !== "if") {
        throw this.error("tessera/unexpected-block", "<% else %> is only allowed inside an if block", token.span);
      }
      const last = frame.branches[frame.branches.length - 1];
      if (last && last.condition === null) {
        throw this.error("tessera/unexpected-block", "<% else %> after the final else branch", token.span);
      }
      let condition: Expression | null = null;
      if (trimmed !== "else") {
        const at = trimmed.indexOf("if") + 2;
        condition = this.parseExpression(trimmed.slice(at), codeStart + at);
      }
      frame.branches.push({ condition, children: [], span: token.span });
      return;
    }

    throw this.error(
      "tessera/unsupported-marker",
      `unsupported code in <% %>: ${JSON.stringify(trimmed)}. Use <%= if %>, <%= for %>, <% else %> or <% end %>`,
      token.span,
    );
  }

  private expectBlock(token: ExpressionToken, what: string): IfFrame | ForFrame {
    const top = this.stack[this.stack.length - 1];
    if (!top) {
      throw this.error("tessera/unexpected-block", `unexpected <% ${what} %> without an open block`, token.span);
    }
    if (top.kind === "tag") {
      throw this.unclosedTag(top.token, "block");
    }
    return top;
  }

  // ------------------------------------------------------------------------------------------
  // Tags
  // ------------------------------------------------------------------------------------------

  private handleOpen(token: TagOpenToken): void {
    switch (token.tagKind) {
      case "slot":
        this.openSlot(token);
        return;
      case "local-component":
      case "remote-component":
        if (token.selfClose) {
          this.children().push(this.buildComponent(token, [], null));
        } else {
          this.stack.push({ kind: "tag", token, children: [], attributes: [], slots: [], loop: null });
        }
        return;
      case "element":
      case "void": {
        const { attributes, loop } = this.elementAttributes(token);
        if (token.selfClose || token.tagKind === "void") {
          this.children().push(this.wrapLoop(loop, {
            kind: "element",
            name: token.name,
            void: token.tagKind === "void",
            attributes,
            children: [],
            span: token.span,
          }));
        } else {
          this.stack.push({ kind: "tag", token, children: [], attributes, slots: [], loop });
        }
        return;
      }
    }
  }

  private openSlot(token: TagOpenToken): void {
    if (token.name === ":inner_block") {
      throw this.error("tessera/reserved-slot-name", "the slot name :inner_block is reserved", token.span);
    }
    const parent = this.stack[this.stack.length - 1];
    if (!parent || parent.kind !== "tag" || !isComponentTag(parent.token)) {
      throw this.error(
        "tessera/slot-outside-component",
        `invalid slot entry <${token.name}>. A slot entry must be a direct child of a component`,
        token.span,
      );
    }
    if (token.selfClose) {
      parent.slots.push(this.buildSlot(token, null));
    } else {
      this.stack.push({ kind: "tag", token, children: [], attributes: [], slots: [], loop: null });
    }
  }

  private handleClose(name: string, span: SourceSpan): void {
    const top = this.stack[this.stack.length - 1];
    if (!top || top.kind !== "tag") {
      throw this.error("tessera/unexpected-closing-tag", `missing opening tag for </${name}>`, span, { found: name });
    }
    if (top.token.name !== name) {
      const openLine = this.source.positionAt(top.token.span.start).line;
      throw this.error(
        "tessera/mismatched-closing-tag",
        `unmatched closing tag. Expected </${top.token.name}> for <${top.token.name}> at line ${openLine}, got: </${name}>`,
        span,
        { expected: top.token.name, found: name, openSpan: top.token.span, closeSpan: span },
      );
    }
    this.stack.pop();
    const token = top.token;
    const fullSpan = { start: token.span.start, end: span.end };

    switch (token.tagKind) {
      case "slot": {
        const parent = this.stack[this.stack.length - 1];
        // openSlot already checked the parent is a component frame
        if (parent && parent.kind === "tag") {
          parent.slots.push(this.buildSlot(token, top.children, fullSpan));
        }
        return;
      }
      case "local-component":
      case "remote-component":
        this.children().push(this.buildComponent(token, top.slots, top.children, fullSpan));
        return;
      case "element":
      case "void":
        this.children().push(this.wrapLoop(top.loop, {
          kind: "element",
          name: token.name,
          void: false,
          attributes: top.attributes,
          children: top.children,
          span: fullSpan,
        }));
        return;
    }
  }

  private wrapLoop(loop: ForHeader | null, node: Node): Node {
    if (!loop) return node;
    return { kind: "loop", header: loop, body: [node], span: node.span };
  }

  // ------------------------------------------------------------------------------------------
  // Attributes
  // ------------------------------------------------------------------------------------------

  private elementAttributes(token: TagOpenToken): { attributes: ElementAttribute[]; loop: ForHeader | null } {
    const attributes: ElementAttribute[] = [];
    let loop: ForHeader | null = null;
    let loopSpan: SourceSpan | null = null;

    for (const attr of token.attributes) {
      if (attr.kind === "spread") {
        attributes.push({ kind: "spread", expression: this.parseExpression(attr.code, attr.codeSpan.start), span: attr.span });
        continue;
      }
      if (attr.name === ":for") {
        if (loopSpan) {
          const line = this.source.positionAt(loopSpan.start).line;
          throw this.error(
            "tessera/duplicate-for",
            `cannot define multiple ":for" attributes. Another ":for" has already been defined at line ${line}`,
            attr.span,
          );
        }
        if (attr.value.kind !== "expression") {
          throw this.error("tessera/invalid-for", ":for must be a generator expression between {...}", attr.span);
        }
        loop = this.parseForHeader(attr.value.code, attr.value.codeSpan.start, "tessera/invalid-for");
        loopSpan = attr.span;
        continue;
      }
      if (attr.name.startsWith(":")) {
        throw this.error("tessera/unsupported-attribute", `unsupported attribute "${attr.name}" in tags`, attr.span);
      }
      switch (attr.value.kind) {
        case "literal":
          attributes.push({ kind: "literal", name: attr.name, value: attr.value.value, quote: attr.value.quote, span: attr.span });
          break;
        case "none":
          attributes.push({ kind: "boolean", name: attr.name, span: attr.span });
          break;
        case "expression":
          attributes.push({
            kind: "expression",
            name: attr.name,
            expression: this.parseExpression(attr.value.code, attr.value.codeSpan.start),
            span: attr.span,
          });
          break;
      }
    }
    return { attributes, loop };
  }

  /** Split `:let`, spreads and named attributes of a component or slot entry. */
  private componentAttributes(
    token: TagOpenToken,
    where: "component" | "slot",
  ): { let: BindingPattern | null; letSpan: SourceSpan | null; attributes: ComponentAttribute[] } {
    let pattern: BindingPattern | null = null;
    let letSpan: SourceSpan | null = null;
    const attributes: ComponentAttribute[] = [];

    for (const attr of token.attributes) {
      if (attr.kind === "spread") {
        attributes.push({ kind: "spread", expression: this.parseExpression(attr.code, attr.codeSpan.start), span: attr.span });
        continue;
      }
      if (attr.name === ":let") {
        if (letSpan) {
          const line = this.source.positionAt(letSpan.start).line;
          throw this.error(
            "tessera/duplicate-let",
            `cannot define multiple :let attributes. Another :let has already been defined at line ${line}`,
            attr.span,
          );
        }
        if (attr.value.kind !== "expression") {
          throw this.error("tessera/invalid-let", ":let must be a pattern between {...}", attr.span);
        }
        pattern = this.parseLetPattern(attr.value.code, attr.value.codeSpan.start);
        letSpan = attr.span;
        continue;
      }
      if (attr.name.startsWith(":")) {
        throw this.error(
          "tessera/unsupported-attribute",
          `unsupported attribute "${attr.name}" in ${where === "component" ? "component" : "slot"}`,
          attr.span,
        );
      }
      attributes.push(this.componentAttribute(attr));
    }
    return { let: pattern, letSpan, attributes };
  }

  private componentAttribute(attr: Extract<TagAttribute, { kind: "attribute" }>): ComponentAttribute {
    switch (attr.value.kind) {
      case "literal":
        return {
          kind: "attribute",
          name: attr.name,
          value: { $kind: "PrimitiveLiteral", value: attr.value.value, span: attr.span },
          shape: "string",
          literal: attr.value.value,
          span: attr.span,
        };
      case "none":
        return {
          kind: "attribute",
          name: attr.name,
          value: { $kind: "PrimitiveLiteral", value: true, span: attr.span },
          shape: "boolean",
          literal: true,
          span: attr.span,
        };
      case "expression": {
        const value = this.parseExpression(attr.value.code, attr.value.codeSpan.start);
        const { shape, literal } = literalShape(value);
        return { kind: "attribute", name: attr.name, value, shape, literal, span: attr.span };
      }
    }
  }

  // ------------------------------------------------------------------------------------------
  // Components and slots
  // ------------------------------------------------------------------------------------------

  private buildComponent(
    token: TagOpenToken,
    slots: readonly SlotEntryNode[],
    body: readonly Node[] | null,
    span: SourceSpan = token.span,
  ): ComponentCallNode {
    const target = this.componentTarget(token);
    const split = this.componentAttributes(token, "component");
    if (body === null && split.letSpan) {
      throw this.error("tessera/let-without-content", "cannot use :let on a component without inner content", split.letSpan);
    }

    const call: ComponentCall = {
      target,
      attributes: recordAttributes(split.attributes),
      slots: slots.map((slot) => ({
        name: slot.name,
        attributes: recordAttributes(slot.attributes),
        hasSpread: slot.attributes.some((a) => a.kind === "spread"),
        span: slot.span,
      })),
      hasSpread: split.attributes.some((a) => a.kind === "spread"),
      hasInnerBlock: body !== null && body.some((n) => !isBlankText(n)),
      file: this.source.file,
      span: token.span,
    };
    this.calls.push(call);

    return {
      kind: "component",
      tag: token.name,
      target,
      let: split.let,
      attributes: split.attributes,
      slots,
      body,
      call,
      span,
    };
  }

  private buildSlot(token: TagOpenToken, body: readonly Node[] | null, span: SourceSpan = token.span): SlotEntryNode {
    const split = this.componentAttributes(token, "slot");
    if (body === null && split.letSpan) {
      throw this.error("tessera/let-without-content", "cannot use :let on a slot without inner content", split.letSpan);
    }
    return {
      kind: "slot",
      name: token.name.slice(1),
      let: split.let,
      attributes: split.attributes,
      body,
      span,
    };
  }

  private componentTarget(token: TagOpenToken): ComponentTarget {
    if (token.tagKind === "local-component") {
      return { module: null, name: token.name.slice(1) };
    }
    // the tokenizer validated `Module.Path.fun`
    const dot = token.name.lastIndexOf(".");
    return { module: token.name.slice(0, dot), name: token.name.slice(dot + 1) };
  }

  // ------------------------------------------------------------------------------------------
  // Helpers
  // ------------------------------------------------------------------------------------------

  private children(): Node[] {
    const top = this.stack[this.stack.length - 1];
    if (!top) return this.rootChildren;
    if (top.kind === "if") {
      const branch = top.branches[top.branches.length - 1];
      // an if frame always holds at least its first branch
      return branch ? branch.children : [];
    }
    return top.children;
  }

  private parseExpression(code: string, offset: number): Expression {
    return this.withExpressionErrors("tessera/invalid-expression", () => new CoreParser(code, offset).parseExpression());
  }

  private parseForHeader(code: string, offset: number, diagnostic: SyntaxDiagnosticCode): ForHeader {
    return this.withExpressionErrors(diagnostic, () => new CoreParser(code, offset).parseForOf());
  }

  private parseLetPattern(code: string, offset: number): BindingPattern {
    return this.withExpressionErrors("tessera/invalid-let", () => new CoreParser(code, offset).parseBindingPattern());
  }

  private withExpressionErrors<T>(code: SyntaxDiagnosticCode, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (err instanceof ExpressionSyntaxError) {
        const prefix =
          code === "tessera/invalid-for" ? ":for must be a generator expression between {...}: "
          : code === "tessera/invalid-let" ? ":let must be a pattern between {...}: "
          : "invalid expression: ";
        throw this.error(code, prefix + err.message, { start: err.start, end: err.end });
      }
      throw err;
    }
  }

  private unclosedTag(token: TagOpenToken, context: string): TemplateSyntaxError {
    return this.error(
      "tessera/unclosed-tag",
      `end of ${context} reached without closing tag for <${token.name}>`,
      token.span,
      { name: token.name, openSpan: token.span },
    );
  }

  private error(
    code: SyntaxDiagnosticCode,
    message: string,
    span: SourceSpan,
    data?: Readonly<Record<string, unknown>>,
  ): TemplateSyntaxError {
    return syntaxError(this.source, code, { message, span, ...(data ? { data } : {}) });
  }
}

function isComponentTag(token: TagOpenToken): boolean {
  return token.tagKind === "local-component" || token.tagKind === "remote-component";
}

function isBlankText(node: Node): boolean {
  return node.kind === "text" && node.content.trim() === "";
}

/** Only one element at the top level; any other non-blank node clears the flag. */
export function isRootFragment(children: readonly Node[]): boolean {
  let elements = 0;
  for (const node of children) {
    if (isBlankText(node)) continue;
    if (node.kind !== "element") return false;
    elements++;
  }
  return elements === 1;
}

function recordAttributes(attributes: readonly ComponentAttribute[]): RecordedAttribute[] {
  const out: RecordedAttribute[] = [];
  for (const attr of attributes) {
    if (attr.kind === "attribute") {
      out.push({ name: attr.name, shape: attr.shape, literal: attr.literal, span: attr.span });
    }
  }
  return out;
}

/** The shape and value of a literal, or `expression` for anything computed. */
export function literalShape(expr: Expression): { shape: LiteralShape; literal: unknown } {
  switch (expr.$kind) {
    case "PrimitiveLiteral": {
      const value = expr.value;
      if (typeof value === "string") return { shape: "string", literal: value };
      if (typeof value === "boolean") return { shape: "boolean", literal: value };
      if (typeof value === "number") return { shape: Number.isInteger(value) ? "integer" : "float", literal: value };
      return { shape: "nil", literal: value };
    }
    case "Unary": {
      const inner = expr.expression;
      if (expr.operation === "-" && inner.$kind === "PrimitiveLiteral" && typeof inner.value === "number") {
        return { shape: Number.isInteger(inner.value) ? "integer" : "float", literal: -inner.value };
      }
      return { shape: "expression", literal: undefined };
    }
    case "Template":
      return expr.expressions.length === 0
        ? { shape: "string", literal: expr.cooked[0] ?? "" }
        : { shape: "expression", literal: undefined };
    case "ArrayLiteral":
      return { shape: "list", literal: undefined };
    case "ObjectLiteral":
      return { shape: "map", literal: undefined };
    default:
      return { shape: "expression", literal: undefined };
  }
}
