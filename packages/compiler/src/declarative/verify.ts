import { debug } from "@tessera/runtime";

import type { CompilerDiagnostic } from "../model/diagnostics.js";
import type { SourceText } from "../model/text.js";
import type { ComponentCall, LiteralShape, RecordedAttribute } from "../parsing/nodes.js";
import { INNER_BLOCK } from "../building/plans.js";
import { diagnosticsCatalog, type VerifyDiagnosticCode } from "../diagnostics/catalog/index.js";
import { createDiagnosticEmitter } from "../diagnostics/emitter.js";
import { isGlobalAttribute } from "./globals.js";
import { describeAttrType, hasGlobalAttr, type AttrSpec, type AttrType, type ComponentSpec } from "./types.js";

/* =============================================================================
 * Call verification
 * -----------------------------------------------------------------------------
 * Checks a recorded component call against the component's declared attrs
 * and slots. Only literal values are type-checked; anything computed passes.
 * Every finding is a warning at the caller's location.
 * ============================================================================= */

/** `.card` for local calls, `Ui.card` for remote ones. */
export function displayTarget(call: ComponentCall): string {
  return `${call.target.module ?? ""}.${call.target.name}`;
}

export function shapeMatchesType(type: AttrType, shape: LiteralShape): boolean {
  if (type === "any" || shape === "expression") return true;
  if (typeof type !== "string") return false;
  switch (type) {
    case "atom":
      return shape === "string" || shape === "boolean";
    case "global":
      return shape === "map";
    default:
      return shape === type;
  }
}

export function verifyCall(call: ComponentCall, spec: ComponentSpec, source: SourceText): CompilerDiagnostic[] {
  const emitter = createDiagnosticEmitter(diagnosticsCatalog, { stage: "verify", source });
  const out: CompilerDiagnostic[] = [];
  const component = displayTarget(call);
  const warn = (code: VerifyDiagnosticCode, message: string, span: RecordedAttribute["span"], data: Record<string, unknown>) => {
    out.push(emitter.emit(code, { message, span, data: { component, ...data } }));
  };

  const passed = new Map(call.attributes.map((attr) => [attr.name, attr]));
  const allowsGlobals = hasGlobalAttr(spec);

  for (const attr of spec.attrs) {
    const given = passed.get(attr.name);
    passed.delete(attr.name);
    if (!given) {
      if (attr.required && !call.hasSpread) {
        warn("tessera/missing-required-attr", `missing required attribute "${attr.name}" for component ${component}`, call.span, {
          attribute: attr.name,
        });
      }
      continue;
    }
    checkValue(attr, given, null);
  }

  for (const attr of passed.values()) {
    if (allowsGlobals && isGlobalAttribute(attr.name)) continue;
    warn("tessera/undefined-attr", `undefined attribute "${attr.name}" for component ${component}`, attr.span, {
      attribute: attr.name,
    });
  }

  const entriesBySlot = new Map<string, ComponentCall["slots"][number][]>();
  for (const entry of call.slots) {
    const list = entriesBySlot.get(entry.name) ?? [];
    list.push(entry);
    entriesBySlot.set(entry.name, list);
  }
  if (call.hasInnerBlock) {
    entriesBySlot.set(INNER_BLOCK, [{ name: INNER_BLOCK, attributes: [], hasSpread: false, span: call.span }]);
  }

  for (const slot of spec.slots) {
    const entries = entriesBySlot.get(slot.name);
    entriesBySlot.delete(slot.name);
    if (!entries) {
      if (slot.required) {
        warn("tessera/missing-required-slot", `missing required slot "${slot.name}" for component ${component}`, call.span, {
          slot: slot.name,
        });
      }
      continue;
    }

    const slotGlobals = hasGlobalAttr(slot);
    for (const entry of entries) {
      const given = new Map(entry.attributes.map((attr) => [attr.name, attr]));
      for (const attr of slot.attrs) {
        if (attr.required && !given.has(attr.name) && !entry.hasSpread) {
          warn(
            "tessera/missing-required-slot-attr",
            `missing required attribute "${attr.name}" in slot "${slot.name}" for component ${component}`,
            entry.span,
            { slot: slot.name, attribute: attr.name },
          );
        }
      }
      for (const value of entry.attributes) {
        const declared = slot.attrs.find((attr) => attr.name === value.name);
        if (declared) {
          checkValue(declared, value, slot.name);
          continue;
        }
        if (slotGlobals && isGlobalAttribute(value.name)) continue;
        warn(
          "tessera/undefined-slot-attr",
          `undefined attribute "${value.name}" in slot "${slot.name}" for component ${component}`,
          value.span,
          { slot: slot.name, attribute: value.name },
        );
      }
    }
  }

  for (const [name, entries] of entriesBySlot) {
    // the default slot is implicit once a component declares any slot
    if (name === INNER_BLOCK && spec.slots.length > 0) continue;
    for (const entry of entries) {
      warn("tessera/undefined-slot", `undefined slot "${name}" for component ${component}`, entry.span, { slot: name });
    }
  }

  debug.verify("call", { component, file: call.file, warnings: out.length });
  return out;

  function checkValue(attr: AttrSpec, given: RecordedAttribute, slot: string | null): void {
    const where = slot === null ? `in component ${component}` : `in slot "${slot}" for component ${component}`;
    const data = slot === null ? { attribute: attr.name } : { attribute: attr.name, slot };
    if (attr.type === "global") {
      warn("tessera/global-attr-provided", `global attribute "${attr.name}" ${where} may not be provided directly`, given.span, data);
      return;
    }
    if (!shapeMatchesType(attr.type, given.shape)) {
      warn(
        "tessera/attr-type-mismatch",
        `attribute "${attr.name}" ${where} must be ${describeAttrType(attr.type)}, got: ${valueText(given, source)}`,
        given.span,
        { ...data, type: attr.type },
      );
    }
  }
}

/** The value as written: `"3"` for `count="3"`, `[1, 2]` for `items={[1, 2]}`. */
function valueText(attr: RecordedAttribute, source: SourceText): string {
  const text = source.slice(attr.span);
  const eq = text.indexOf("=");
  if (eq === -1) return "true";
  const value = text.slice(eq + 1).trim();
  return value.startsWith("{") && value.endsWith("}") ? value.slice(1, -1).trim() : value;
}
