import { describe, test, expect } from "vitest";

import { TemplateCompiler, formatDiagnostic, shapeMatchesType, isGlobalAttribute, type CompiledTemplate } from "../../src/index.js";

function createUnit(): TemplateCompiler {
  const forms = new TemplateCompiler("Forms").component("input", (c) => c.attr("name", "string").template("<input>")).finalize();
  return new TemplateCompiler("Ui")
    .use("Forms", forms)
    .component("badge", (c) => c.attr("label", "string", { required: true }).attr("count", "integer").template("<b>{label}</b>"))
    .component("panel", (c) =>
      c
        .slot("header", { required: true }, (s) => s.attr("level", "integer", { required: true }))
        .template("<section>{renderSlot(header)}{renderSlot(inner_block)}</section>"),
    )
    .component("button", (c) => c.attr("rest", "global").template("<button {rest}></button>"))
    .component("plain", (c) => c.template("<hr>"));
}

function warnings(source: string): string[] {
  const unit = createUnit();
  const template = unit.compile(source, { file: "page.tpl" });
  unit.finalize();
  return template.diagnostics.map(formatDiagnostic);
}

describe("call verification", () => {
  test("a missing required attribute", () => {
    expect(warnings("<.badge />")).toEqual(['page.tpl:1:1: missing required attribute "label" for component .badge']);
  });

  test("a spread may provide required attributes", () => {
    expect(warnings("<.badge {attrs} />")).toEqual([]);
  });

  test("literal values are checked against declared types", () => {
    expect(warnings('<.badge label={1} count="3" />')).toEqual([
      'page.tpl:1:9: attribute "label" in component .badge must be a string, got: 1',
      'page.tpl:1:19: attribute "count" in component .badge must be an integer, got: "3"',
    ]);
  });

  test("computed values are not checked", () => {
    expect(warnings("<.badge label={title} count={n + 1} />")).toEqual([]);
  });

  test("undeclared attributes", () => {
    expect(warnings('<.badge label="x" extra="y" />')).toEqual(['page.tpl:1:19: undefined attribute "extra" for component .badge']);
  });

  test("content for a component without slots", () => {
    expect(warnings('<.badge label="x">hi</.badge>')).toEqual(['page.tpl:1:1: undefined slot "inner_block" for component .badge']);
  });

  test("required slots and their attributes", () => {
    expect(warnings("<.panel>body</.panel>")).toEqual(['page.tpl:1:1: missing required slot "header" for component .panel']);
    expect(warnings("<.panel><:header>H</:header></.panel>")).toEqual([
      'page.tpl:1:9: missing required attribute "level" in slot "header" for component .panel',
    ]);
    expect(warnings('<.panel><:header level="2" tone="x">H</:header><:aside /></.panel>')).toEqual([
      'page.tpl:1:18: attribute "level" in slot "header" for component .panel must be an integer, got: "2"',
      'page.tpl:1:28: undefined attribute "tone" in slot "header" for component .panel',
      'page.tpl:1:48: undefined slot "aside" for component .panel',
    ]);
  });

  test("global attributes accept standard HTML attributes only", () => {
    expect(warnings('<.button class="x" aria-label="y" data-id="1" />')).toEqual([]);
    expect(warnings('<.button foo="x" rest={r} />')).toEqual([
      'page.tpl:1:18: global attribute "rest" in component .button may not be provided directly',
      'page.tpl:1:10: undefined attribute "foo" for component .button',
    ]);
  });

  test("components without declarations are not verified", () => {
    expect(warnings('<.plain anything="1">x</.plain>')).toEqual([]);
  });

  test("unknown components", () => {
    expect(warnings("<p><.nope /><Forms.nope /></p>")).toEqual([
      "page.tpl:1:4: undefined component .nope",
      "page.tpl:1:13: undefined component Forms.nope",
    ]);
  });

  test("warnings are collected on the unit in order", () => {
    const unit = createUnit();
    unit.compile("<.badge />", { file: "a.tpl" });
    unit.compile("<.nope />", { file: "b.tpl" });
    const { diagnostics } = unit.finalize();
    expect(diagnostics.map((d) => [d.file, d.code])).toEqual([
      ["a.tpl", "tessera/missing-required-attr"],
      ["b.tpl", "tessera/undefined-component"],
    ]);
  });

  test("templates compiled after finalize are verified at once", () => {
    const unit = createUnit();
    unit.finalize();
    const template: CompiledTemplate = unit.compile("<.badge />");
    expect(template.diagnostics.map((d) => d.code)).toEqual(["tessera/missing-required-attr"]);
    expect(template.diagnostics[0]?.file).toBe("Ui");
  });
});

describe("shapeMatchesType", () => {
  test("atoms take strings and booleans; any takes everything", () => {
    expect(shapeMatchesType("atom", "string")).toBe(true);
    expect(shapeMatchesType("atom", "boolean")).toBe(true);
    expect(shapeMatchesType("atom", "integer")).toBe(false);
    expect(shapeMatchesType("any", "list")).toBe(true);
  });

  test("struct types only accept computed values", () => {
    expect(shapeMatchesType({ struct: "Date" }, "map")).toBe(false);
    expect(shapeMatchesType({ struct: "Date" }, "expression")).toBe(true);
  });
});

describe("isGlobalAttribute", () => {
  test("standard names and prefixes", () => {
    expect(isGlobalAttribute("class")).toBe(true);
    expect(isGlobalAttribute("aria-hidden")).toBe(true);
    expect(isGlobalAttribute("data-anything")).toBe(true);
    expect(isGlobalAttribute("x-click")).toBe(false);
    expect(isGlobalAttribute("foo")).toBe(false);
  });
});
