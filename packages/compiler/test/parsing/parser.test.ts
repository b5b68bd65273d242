import { describe, test, expect } from "vitest";

import { SourceText, TemplateSyntaxError, parseTemplateSource, type FragmentNode } from "../../src/index.js";

function parse(text: string): FragmentNode {
  return parseTemplateSource(new SourceText(text, "view.tpl"));
}

function syntaxErrorOf(text: string): TemplateSyntaxError {
  try {
    parse(text);
  } catch (err) {
    if (err instanceof TemplateSyntaxError) return err;
    throw err;
  }
  throw new Error(`expected ${JSON.stringify(text)} to fail`);
}

describe("parseTemplate", () => {
  test("nests elements and marks a single top-level element as root", () => {
    const fragment = parse("\n<div><p>{a}</p><br></div>\n");
    expect(fragment.root).toBe(true);
    const div = fragment.children[1];
    expect(div?.kind).toBe("element");
    if (div?.kind !== "element") return;
    expect(div.children.map((n) => (n.kind === "element" ? `${n.name}${n.void ? "/" : ""}` : n.kind))).toEqual(["p", "br/"]);
  });

  test("text next to an element clears the root flag", () => {
    expect(parse("<p>a</p> tail").root).toBe(false);
    expect(parse("{x}").root).toBe(false);
  });

  test(":for on an element wraps it in a loop", () => {
    const fragment = parse("<li :for={item of items}>{item}</li>");
    const loop = fragment.children[0];
    expect(loop?.kind).toBe("loop");
    if (loop?.kind !== "loop") return;
    expect(loop.body.map((n) => n.kind)).toEqual(["element"]);
    expect(loop.header.declaration).toMatchObject({ $kind: "BindingIdentifier", name: "item" });
  });

  test("if / else if / else blocks become one conditional", () => {
    const fragment = parse("<%= if a %>A<% else if b %>B<% else %>C<% end %>");
    const node = fragment.children[0];
    expect(node?.kind).toBe("conditional");
    if (node?.kind !== "conditional") return;
    expect(node.branches.map((b) => b.condition?.$kind ?? null)).toEqual(["AccessScope", "AccessScope", null]);
    expect(node.branches.map((b) => b.body.map((n) => (n.kind === "text" ? n.content : n.kind)))).toEqual([["A"], ["B"], ["C"]]);
  });

  test("for blocks bind their pattern", () => {
    const fragment = parse("<%= for [k, v] of pairs %>{k}={v}<% end %>");
    const node = fragment.children[0];
    expect(node?.kind).toBe("loop");
    if (node?.kind !== "loop") return;
    expect(node.header.declaration.$kind).toBe("ArrayBindingPattern");
    expect(node.body).toHaveLength(3);
  });

  test("component calls collect attributes, slots and default content", () => {
    const fragment = parse('<.card title="Hi" count={3} {extra}>Body<:footer align="end">F</:footer></.card>');
    const node = fragment.children[0];
    expect(node?.kind).toBe("component");
    if (node?.kind !== "component") return;
    expect(node.target).toEqual({ module: null, name: "card" });
    expect(node.attributes.map((a) => (a.kind === "spread" ? "..." : `${a.name}:${a.shape}`))).toEqual([
      "title:string",
      "count:integer",
      "...",
    ]);
    expect(node.slots.map((s) => s.name)).toEqual(["footer"]);
    expect(node.body?.map((n) => n.kind)).toEqual(["text"]);

    expect(fragment.calls).toHaveLength(1);
    const call = fragment.calls[0];
    expect(call).toMatchObject({
      target: { module: null, name: "card" },
      hasSpread: true,
      hasInnerBlock: true,
      file: "view.tpl",
    });
    expect(call?.attributes.map((a) => [a.name, a.shape, a.literal])).toEqual([
      ["title", "string", "Hi"],
      ["count", "integer", 3],
    ]);
    expect(call?.slots).toMatchObject([{ name: "footer", hasSpread: false }]);
  });

  test("remote components split module and function", () => {
    const fragment = parse("<Ui.Forms.input />");
    expect(fragment.calls[0]?.target).toEqual({ module: "Ui.Forms", name: "input" });
  });

  test("literal shapes of component attributes", () => {
    const fragment = parse("<.x a={-1.5} b={[1]} c={{ k: 1 }} d={nil} e={null} f={`t`} g />");
    expect(fragment.calls[0]?.attributes.map((a) => [a.name, a.shape])).toEqual([
      ["a", "float"],
      ["b", "list"],
      ["c", "map"],
      ["d", "expression"],
      ["e", "nil"],
      ["f", "string"],
      ["g", "boolean"],
    ]);
  });
});

describe("parseTemplate errors", () => {
  test("mismatched closing tag names the open tag and its line", () => {
    const err = syntaxErrorOf("<div>\n<span></div>");
    expect(err.code).toBe("tessera/mismatched-closing-tag");
    expect(err.message).toBe("unmatched closing tag. Expected </span> for <span> at line 2, got: </div>");
    expect(err.line).toBe(2);
    expect(err.column).toBe(7);
  });

  test("an unclosed tag at the end of the template", () => {
    const err = syntaxErrorOf("<section><p>x</p>");
    expect(err.code).toBe("tessera/unclosed-tag");
    expect(err.message).toBe("end of template reached without closing tag for <section>");
  });

  test("a closing tag without an opening tag", () => {
    expect(syntaxErrorOf("x</p>").message).toBe("missing opening tag for </p>");
  });

  test("an unclosed block", () => {
    const err = syntaxErrorOf("<%= if x %>a");
    expect(err.code).toBe("tessera/unclosed-block");
    expect(err.message).toBe("end of template reached without <% end %> for if block");
  });

  test("end without a block", () => {
    expect(syntaxErrorOf("<% end %>").message).toBe("unexpected <% end %> without an open block");
  });

  test("unsupported control code", () => {
    expect(syntaxErrorOf("<% x = 1 %>").code).toBe("tessera/unsupported-marker");
  });

  test("slot entries must be direct children of a component", () => {
    const err = syntaxErrorOf("<div><:footer>x</:footer></div>");
    expect(err.code).toBe("tessera/slot-outside-component");
    expect(err.message).toBe("invalid slot entry <:footer>. A slot entry must be a direct child of a component");
  });

  test(":inner_block is reserved", () => {
    expect(syntaxErrorOf("<.c><:inner_block>x</:inner_block></.c>").code).toBe("tessera/reserved-slot-name");
  });

  test(":let requires inner content", () => {
    const err = syntaxErrorOf("<.c :let={x} />");
    expect(err.code).toBe("tessera/let-without-content");
  });

  test("duplicate :for", () => {
    const err = syntaxErrorOf("<p :for={a of b} :for={c of d}></p>");
    expect(err.message).toBe('cannot define multiple ":for" attributes. Another ":for" has already been defined at line 1');
  });

  test("unknown colon attributes on elements", () => {
    expect(syntaxErrorOf("<p :if={x}></p>").message).toBe('unsupported attribute ":if" in tags');
  });

  test("invalid expressions are reported with the parse error", () => {
    const err = syntaxErrorOf("<p>{a +}</p>");
    expect(err.code).toBe("tessera/invalid-expression");
    expect(err.message).toBe("invalid expression: unexpected end of expression");
  });
});
