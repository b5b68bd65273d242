import { describe, test, expect } from "vitest";

import { ExpressionSyntaxError, parseBindingPattern, parseExpression, parseForOf } from "../../src/index.js";

describe("parseExpression", () => {
  test("member chains, calls and absolute spans", () => {
    const expr = parseExpression("user.name.trim()", 10);
    expect(expr.$kind).toBe("Call");
    if (expr.$kind !== "Call") return;
    expect(expr.span).toEqual({ start: 10, end: 26 });
    expect(expr.callee.$kind).toBe("AccessMember");
    if (expr.callee.$kind !== "AccessMember") return;
    expect(expr.callee.name).toBe("trim");
  });

  test("binary operators associate to the left and respect precedence", () => {
    const expr = parseExpression("a + b * c - d");
    expect(expr.$kind).toBe("Binary");
    if (expr.$kind !== "Binary") return;
    expect(expr.operation).toBe("-");
    const left = expr.left;
    expect(left.$kind === "Binary" && left.operation).toBe("+");
    if (left.$kind !== "Binary") return;
    expect(left.right.$kind === "Binary" && left.right.operation).toBe("*");
  });

  test("optional chaining", () => {
    const expr = parseExpression("a?.b?.[0]?.(1)");
    expect(expr.$kind).toBe("Call");
    if (expr.$kind !== "Call") return;
    expect(expr.optional).toBe(true);
    expect(expr.callee.$kind === "AccessKeyed" && expr.callee.optional).toBe(true);
  });

  test("literals: arrays, objects with shorthand, templates", () => {
    const expr = parseExpression("{ id, label: `#${id}`, tags: [1, 'x',] }");
    expect(expr.$kind).toBe("ObjectLiteral");
    if (expr.$kind !== "ObjectLiteral") return;
    expect(expr.keys).toEqual(["id", "label", "tags"]);
    expect(expr.values.map((v) => v.$kind)).toEqual(["AccessScope", "Template", "ArrayLiteral"]);
    const template = expr.values[1];
    if (template?.$kind !== "Template") return;
    expect(template.cooked).toEqual(["#", ""]);
  });

  test("arrow functions with destructured parameters", () => {
    const expr = parseExpression("({ done }) => !done");
    expect(expr.$kind).toBe("ArrowFunction");
    if (expr.$kind !== "ArrowFunction") return;
    expect(expr.params.map((p) => p.$kind)).toEqual(["ObjectBindingPattern"]);
    expect(expr.body.$kind).toBe("Unary");
  });

  test("errors carry absolute offsets", () => {
    let caught: unknown;
    try {
      parseExpression("a + )", 20);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ExpressionSyntaxError);
    if (!(caught instanceof ExpressionSyntaxError)) return;
    expect(caught.message).toBe('unexpected token ")"');
    expect(caught.start).toBe(24);
  });

  test("an empty expression is rejected", () => {
    expect(() => parseExpression("   ")).toThrow("empty expression");
  });
});

describe("binding patterns and iterator headers", () => {
  test("nested patterns with defaults", () => {
    const pattern = parseBindingPattern("{ id, meta: [first, , third = 3] }");
    expect(pattern.$kind).toBe("ObjectBindingPattern");
    if (pattern.$kind !== "ObjectBindingPattern") return;
    expect(pattern.properties.map((p) => p.key)).toEqual(["id", "meta"]);
    const meta = pattern.properties[1]?.value;
    expect(meta?.$kind).toBe("ArrayBindingPattern");
    if (meta?.$kind !== "ArrayBindingPattern") return;
    expect(meta.elements.map((el) => el?.$kind ?? null)).toEqual(["BindingIdentifier", null, "BindingPatternDefault"]);
  });

  test("for-of headers split the declaration from the iterable", () => {
    const header = parseForOf("[key, value] of Object.entries(map)");
    expect(header.declaration.$kind).toBe("ArrayBindingPattern");
    expect(header.iterable.$kind).toBe("Call");
  });

  test("a header without `of` is rejected", () => {
    expect(() => parseForOf("item in items")).toThrow("expected 'of' in iterator header");
  });
});
