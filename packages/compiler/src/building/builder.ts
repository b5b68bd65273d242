import { debug, escapeHtml, fingerprintOf, type FingerprintPart } from "@tessera/runtime";

import type { SourceText } from "../model/text.js";
import { boundNames, type Expression } from "../expression/ast.js";
import type {
  ComponentAttribute,
  ComponentCallNode,
  ElementAttribute,
  ElementNode,
  FragmentNode,
  Node,
  SlotEntryNode,
} from "../parsing/nodes.js";
import { isRootFragment } from "../parsing/parser.js";
import {
  collectDependencies,
  collectPatternDependencies,
  mergeDependencies,
  withoutLocals,
  type Dependencies,
} from "../tracking/dependencies.js";
import {
  INNER_BLOCK,
  type ComponentArgumentPlan,
  type CompiledFragment,
  type Plan,
  type SlotEntryPlan,
} from "./plans.js";

export interface BuildOptions {
  readonly source: SourceText;
  /** Names resolved as helpers; never treated as bindings. */
  readonly helpers: ReadonlySet<string>;
  /** Strip leading and trailing whitespace of the template. Defaults to true. */
  readonly trim?: boolean;
}

const RENDER_SLOT = "renderSlot";

/** Turn a parsed template into statics and plans. */
export function buildTemplate(fragment: FragmentNode, options: BuildOptions): CompiledFragment {
  const builder = new TreeBuilder(options);
  const compiled = builder.fragment(fragment.children, new Set(), fragment.root, options.trim ?? true);
  debug.build("template", {
    file: options.source.file,
    fingerprint: compiled.fingerprint,
    statics: compiled.statics.length,
    plans: compiled.plans.length,
  });
  return compiled;
}

class TreeBuilder {
  constructor(private readonly options: BuildOptions) {}

  fragment(nodes: readonly Node[], locals: ReadonlySet<string>, root: boolean, trim = false): CompiledFragment {
    const out = new FragmentWriter();
    for (const node of nodes) this.node(node, locals, out);
    if (trim) out.trim();

    const statics = out.statics;
    const plans = out.plans;
    const fingerprint = fingerprintOf(
      statics,
      plans.map((plan): FingerprintPart => [plan.kind === "attribute" ? `attribute:${plan.encoding}` : plan.kind, this.options.source.slice(plan.span)]),
    );
    return {
      statics,
      plans,
      fingerprint,
      root,
      dependencies: mergeDependencies(...plans.map((plan) => plan.dependencies)),
    };
  }

  private node(node: Node, locals: ReadonlySet<string>, out: FragmentWriter): void {
    switch (node.kind) {
      case "text":
        out.text(node.content);
        return;

      case "expression": {
        const expr = node.expression;
        if (expr.$kind === "Call" && expr.callee.$kind === "AccessScope" && expr.callee.name === RENDER_SLOT && !locals.has(RENDER_SLOT)) {
          const [slot, argument] = expr.args;
          if (slot) {
            out.hole({
              kind: "render-slot",
              slot,
              argument: argument ?? null,
              dependencies: this.deps([slot, argument ?? null], locals),
              span: node.span,
            });
            return;
          }
        }
        out.hole({ kind: "body", expression: expr, dependencies: this.deps(expr, locals), span: node.span });
        return;
      }

      case "element":
        this.element(node, locals, out);
        return;

      case "loop": {
        const names = boundNames(node.header.declaration);
        const inner = new Set([...locals, ...names]);
        const body = this.fragment(node.body, inner, isRootFragment(node.body));
        out.hole({
          kind: "comprehension",
          header: node.header,
          body,
          dependencies: mergeDependencies(
            this.deps(node.header.iterable, locals),
            collectPatternDependencies(node.header.declaration, this.scope(locals)),
            withoutLocals(body.dependencies, names),
          ),
          span: node.span,
        });
        return;
      }

      case "conditional": {
        const branches = node.branches.map((branch) => ({
          condition: branch.condition,
          fragment: this.fragment(branch.body, locals, isRootFragment(branch.body)),
        }));
        out.hole({
          kind: "conditional",
          branches,
          dependencies: mergeDependencies(
            this.deps(node.branches.map((b) => b.condition), locals),
            ...branches.map((b) => b.fragment.dependencies),
          ),
          span: node.span,
        });
        return;
      }

      case "component":
        out.hole(this.component(node, locals));
        return;
    }
  }

  private element(node: ElementNode, locals: ReadonlySet<string>, out: FragmentWriter): void {
    out.text(`<${node.name}`);
    for (const attr of node.attributes) this.elementAttribute(attr, locals, out);
    out.text(">");
    if (node.void) return;
    for (const child of node.children) this.node(child, locals, out);
    out.text(`</${node.name}>`);
  }

  private elementAttribute(attr: ElementAttribute, locals: ReadonlySet<string>, out: FragmentWriter): void {
    switch (attr.kind) {
      case "literal":
        if (attr.quote === null) out.text(` ${attr.name}=${attr.value}`);
        else out.text(` ${attr.name}=${attr.quote}${attr.value}${attr.quote}`);
        return;
      case "boolean":
        out.text(` ${attr.name}`);
        return;
      case "spread":
        out.hole({ kind: "spread", expression: attr.expression, dependencies: this.deps(attr.expression, locals), span: attr.span });
        return;
      case "expression": {
        const expr = attr.expression;
        if (expr.$kind === "Template") {
          // `name={`a ${b}`}` keeps the literal parts static
          out.text(` ${attr.name}="`);
          expr.cooked.forEach((part, i) => {
            out.text(escapeHtml(part));
            const value = expr.expressions[i];
            if (value) {
              out.hole({
                kind: "attribute",
                name: attr.name,
                encoding: "value",
                expression: value,
                dependencies: this.deps(value, locals),
                span: value.span,
              });
            }
          });
          out.text(`"`);
          return;
        }
        if (attr.name === "class" || attr.name === "style") {
          out.text(` ${attr.name}="`);
          out.hole({
            kind: "attribute",
            name: attr.name,
            encoding: attr.name,
            expression: expr,
            dependencies: this.deps(expr, locals),
            span: attr.span,
          });
          out.text(`"`);
          return;
        }
        out.hole({
          kind: "attribute",
          name: attr.name,
          encoding: "attribute",
          expression: expr,
          dependencies: this.deps(expr, locals),
          span: attr.span,
        });
        return;
      }
    }
  }

  private component(node: ComponentCallNode, locals: ReadonlySet<string>): Plan {
    const attributes = node.attributes.map((attr) => this.argument(attr, locals));
    const slots: SlotEntryPlan[] = [];

    if (node.body !== null && node.body.some((n) => n.kind !== "text" || n.content.trim() !== "")) {
      slots.push(this.slotPlan(INNER_BLOCK, node.let, [], node.body, node.span, locals));
    }
    for (const entry of node.slots) {
      slots.push(this.slotEntry(entry, locals));
    }

    return {
      kind: "component",
      tag: node.tag,
      target: node.target,
      attributes,
      slots,
      call: node.call,
      dependencies: mergeDependencies(
        ...attributes.map((a) => a.dependencies),
        ...slots.map((s) => s.dependencies),
      ),
      span: node.span,
    };
  }

  private slotEntry(entry: SlotEntryNode, locals: ReadonlySet<string>): SlotEntryPlan {
    const attributes = entry.attributes.map((attr) => this.argument(attr, locals));
    return this.slotPlan(entry.name, entry.let, attributes, entry.body, entry.span, locals);
  }

  private slotPlan(
    name: string,
    pattern: SlotEntryPlan["let"],
    attributes: readonly ComponentArgumentPlan[],
    nodes: readonly Node[] | null,
    span: SlotEntryPlan["span"],
    locals: ReadonlySet<string>,
  ): SlotEntryPlan {
    const names = pattern ? boundNames(pattern) : [];
    const body = nodes === null ? null : this.fragment(nodes, new Set([...locals, ...names]), isRootFragment(nodes));
    const parts: Dependencies[] = attributes.map((a) => a.dependencies);
    if (body) parts.push(withoutLocals(body.dependencies, names));
    if (pattern) parts.push(collectPatternDependencies(pattern, this.scope(locals)));
    return {
      name,
      let: pattern,
      attributes,
      body,
      dependencies: mergeDependencies(...parts),
      span,
    };
  }

  private argument(attr: ComponentAttribute, locals: ReadonlySet<string>): ComponentArgumentPlan {
    if (attr.kind === "spread") {
      return { kind: "spread", expression: attr.expression, dependencies: this.deps(attr.expression, locals), span: attr.span };
    }
    return {
      kind: "attribute",
      name: attr.name,
      expression: attr.value,
      dependencies: this.deps(attr.value, locals),
      span: attr.span,
    };
  }

  private deps(expressions: Expression | readonly (Expression | null)[], locals: ReadonlySet<string>): Dependencies {
    return collectDependencies(expressions, this.scope(locals));
  }

  private scope(locals: ReadonlySet<string>): { locals: ReadonlySet<string>; helpers: ReadonlySet<string> } {
    return { locals, helpers: this.options.helpers };
  }
}

/** Accumulates statics and plans; every hole closes the current static. */
class FragmentWriter {
  readonly statics: string[] = [""];
  readonly plans: Plan[] = [];

  text(content: string): void {
    const last = this.statics.length - 1;
    this.statics[last] = (this.statics[last] ?? "") + content;
  }

  hole(plan: Plan): void {
    this.plans.push(plan);
    this.statics.push("");
  }

  trim(): void {
    const last = this.statics.length - 1;
    this.statics[0] = (this.statics[0] ?? "").trimStart();
    this.statics[last] = (this.statics[last] ?? "").trimEnd();
  }
}
