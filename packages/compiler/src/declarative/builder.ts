import { INNER_BLOCK } from "../building/plans.js";
import type { VerifyDiagnosticCode } from "../diagnostics/catalog/index.js";
import {
  describeAttrType,
  valueMatchesType,
  type AttrSpec,
  type AttrType,
  type ComponentSpec,
  type SlotSpec,
} from "./types.js";

export interface AttrOptions {
  readonly required?: boolean;
  /** Used when the caller does not pass the attribute. Not allowed together with `required`. */
  readonly default?: unknown;
  readonly doc?: string;
}

export interface SlotOptions {
  readonly required?: boolean;
  readonly doc?: string;
}

/** A declaration problem; reported as a warning and the declaration is corrected or dropped. */
export interface DefinitionIssue {
  readonly code: Extract<VerifyDiagnosticCode, `tessera/${string}-definition`>;
  readonly message: string;
  readonly data: Readonly<Record<string, unknown>>;
}

/** Collects the attrs of a component or of one of its slots. */
export class AttrCollector {
  readonly attrs: AttrSpec[] = [];

  constructor(
    private readonly issues: DefinitionIssue[],
    /** `null` for component attrs. */
    private readonly slot: string | null,
  ) {}

  add(name: string, type: AttrType, options: AttrOptions): void {
    const label = this.slot === null ? `"${name}"` : `"${name}" in slot "${this.slot}"`;
    const data = this.slot === null ? { attribute: name } : { attribute: name, slot: this.slot };

    if (name === INNER_BLOCK) {
      this.issue("tessera/invalid-attr-definition", `cannot define attribute called ${INNER_BLOCK}. Maybe you wanted to use a slot instead?`, data);
      return;
    }
    if (this.attrs.some((attr) => attr.name === name)) {
      this.issue("tessera/duplicate-attr-definition", `a duplicate attribute with name ${label} already exists`, data);
      return;
    }
    const existingGlobal = type === "global" ? this.attrs.find((attr) => attr.type === "global") : undefined;
    if (existingGlobal) {
      this.issue(
        "tessera/invalid-attr-definition",
        `cannot define global attribute "${name}" because one is already defined as "${existingGlobal.name}". Only a single global attribute may be defined`,
        data,
      );
      return;
    }

    let required = options.required ?? false;
    let fallback: AttrSpec["default"] = "default" in options ? { value: options.default } : null;

    if (type === "global" && options.required !== undefined) {
      this.issue("tessera/invalid-attr-definition", "global attributes do not support the required option", data);
      required = false;
    }
    if (required && fallback) {
      this.issue("tessera/invalid-attr-definition", "only one of required or default must be given", data);
      fallback = null;
    }
    if (fallback && this.slot !== null) {
      this.issue(
        "tessera/invalid-attr-definition",
        `invalid option default for attr ${label}. Slot attributes do not support default values`,
        data,
      );
      fallback = null;
    }
    if (fallback && !valueMatchesType(type, fallback.value)) {
      this.issue(
        "tessera/invalid-attr-definition",
        `expected the default value for attr ${label} to be ${describeAttrType(type)}, got: ${JSON.stringify(fallback.value)}`,
        data,
      );
      fallback = null;
    }

    this.attrs.push({ name, type, required, default: fallback, doc: options.doc ?? null });
  }

  private issue(code: DefinitionIssue["code"], message: string, data: Readonly<Record<string, unknown>>): void {
    this.issues.push({ code, message, data });
  }
}

/** Declares the attributes of one slot. */
export class SlotDefinitionBuilder {
  constructor(private readonly collector: AttrCollector) {}

  attr(name: string, type: AttrType, options: AttrOptions = {}): this {
    this.collector.add(name, type, options);
    return this;
  }
}

/**
 * Declares one component: its attributes, its slots and its template.
 *
 * ```ts
 * unit.component("card", (c) =>
 *   c.attr("title", "string", { required: true })
 *     .slot("footer", {}, (s) => s.attr("align", "atom"))
 *     .template(`<div>{title}{renderSlot(footer)}</div>`),
 * );
 * ```
 */
export class ComponentDefinitionBuilder {
  private readonly issues: DefinitionIssue[] = [];
  private readonly attrs: AttrCollector;
  private readonly slots: SlotSpec[] = [];
  private source: string | null = null;

  constructor(readonly name: string) {
    this.attrs = new AttrCollector(this.issues, null);
  }

  attr(name: string, type: AttrType, options: AttrOptions = {}): this {
    this.attrs.add(name, type, options);
    return this;
  }

  slot(name: string, options: SlotOptions = {}, defineAttrs?: (slot: SlotDefinitionBuilder) => void): this {
    if (this.slots.some((slot) => slot.name === name)) {
      this.issues.push({
        code: "tessera/duplicate-slot-definition",
        message: `a duplicate slot with name "${name}" already exists`,
        data: { slot: name },
      });
      return this;
    }
    const collector = new AttrCollector(this.issues, name);
    defineAttrs?.(new SlotDefinitionBuilder(collector));
    let attrs: readonly AttrSpec[] = collector.attrs;
    if (name === INNER_BLOCK && attrs.length > 0) {
      this.issues.push({
        code: "tessera/invalid-slot-definition",
        message: `cannot define attributes in a slot with name "${INNER_BLOCK}"`,
        data: { slot: name },
      });
      attrs = [];
    }
    this.slots.push({ name, required: options.required ?? false, attrs, doc: options.doc ?? null });
    return this;
  }

  template(source: string): this {
    this.source = source;
    return this;
  }

  /** @internal */
  build(): { spec: ComponentSpec; source: string | null; issues: readonly DefinitionIssue[] } {
    const spec: ComponentSpec = Object.freeze({
      name: this.name,
      attrs: Object.freeze([...this.attrs.attrs]),
      slots: Object.freeze([...this.slots]),
    });
    return { spec, source: this.source, issues: this.issues };
  }
}
