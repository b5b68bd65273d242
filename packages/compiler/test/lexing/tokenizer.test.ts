import { describe, test, expect } from "vitest";

import {
  INITIAL_STATE,
  SourceText,
  TemplateSyntaxError,
  finalizeTokenizer,
  tokenize,
  tokenizeTemplate,
} from "../../src/index.js";

function syntaxErrorOf(text: string): TemplateSyntaxError {
  try {
    tokenizeTemplate(new SourceText(text));
  } catch (err) {
    if (err instanceof TemplateSyntaxError) return err;
    throw err;
  }
  throw new Error(`expected ${JSON.stringify(text)} to fail`);
}

describe("tokenize", () => {
  test("tags, attributes, text and body expressions", () => {
    const { tokens, state } = tokenize('<p class="a">Hi {name}</p>');
    expect(state).toEqual(INITIAL_STATE);
    expect(tokens).toEqual([
      {
        kind: "tag-open",
        name: "p",
        tagKind: "element",
        attributes: [
          { kind: "attribute", name: "class", value: { kind: "literal", value: "a", quote: '"' }, span: { start: 3, end: 12 } },
        ],
        selfClose: false,
        span: { start: 0, end: 13 },
      },
      { kind: "text", content: "Hi ", span: { start: 13, end: 16 } },
      { kind: "expression", marker: "body", code: "name", codeSpan: { start: 17, end: 21 }, span: { start: 16, end: 22 } },
      { kind: "tag-close", name: "p", tagKind: "element", span: { start: 22, end: 26 } },
    ]);
  });

  test("attribute forms: bare, unquoted, expression and spread", () => {
    const { tokens } = tokenize("<input disabled size=3 value={v} {rest}/>");
    const open = tokens[0];
    expect(open?.kind).toBe("tag-open");
    if (open?.kind !== "tag-open") return;
    expect(open.tagKind).toBe("void");
    expect(open.selfClose).toBe(true);
    expect(open.attributes.map((attr) => (attr.kind === "spread" ? `{${attr.code}}` : `${attr.name}:${attr.value.kind}`))).toEqual([
      "disabled:none",
      "size:literal",
      "value:expression",
      "{rest}",
    ]);
  });

  test("classifies component, remote component and slot tags", () => {
    const { tokens } = tokenize("<.card><:footer/><Ui.Forms.input/></.card>");
    expect(tokens.map((t) => (t.kind === "tag-open" || t.kind === "tag-close" ? `${t.kind}:${t.tagKind}` : t.kind))).toEqual([
      "tag-open:local-component",
      "tag-open:slot",
      "tag-open:remote-component",
      "tag-close:local-component",
    ]);
  });

  test("braces inside string literals do not end an expression", () => {
    const { tokens } = tokenize('{"}" + x}');
    expect(tokens).toEqual([
      { kind: "expression", marker: "body", code: '"}" + x', codeSpan: { start: 1, end: 8 }, span: { start: 0, end: 9 } },
    ]);
  });

  test("script content is raw text", () => {
    const { tokens } = tokenize("<script>if (a < b) { run() }</script>");
    expect(tokens.map((t) => t.kind)).toEqual(["tag-open", "text", "tag-close"]);
    expect(tokens[1]).toEqual({ kind: "text", content: "if (a < b) { run() }", span: { start: 8, end: 28 } });
  });

  test("a comment can span chunks", () => {
    const first = tokenize("a<!-- b");
    expect(first.state).toEqual({ kind: "comment", start: 1 });
    expect(first.tokens).toEqual([
      { kind: "text", content: "a", span: { start: 0, end: 1 } },
      { kind: "text", content: "<!-- b", span: { start: 1, end: 7 } },
    ]);

    const second = tokenize(" c -->d", first.state, { offset: 7 });
    expect(second.state).toEqual(INITIAL_STATE);
    expect(second.tokens).toEqual([
      { kind: "text", content: " c -->", span: { start: 7, end: 13 } },
      { kind: "text", content: "d", span: { start: 13, end: 14 } },
    ]);
  });

  test("finalizing inside a comment fails", () => {
    const source = new SourceText("x<!-- y");
    const { state } = tokenize(source.text, INITIAL_STATE, { source });
    expect(() => finalizeTokenizer(state, source)).toThrow("unexpected end of template inside an HTML comment");
  });
});

describe("tokenizeTemplate", () => {
  test("interleaves embedded code markers with HTML tokens", () => {
    const tokens = tokenizeTemplate(new SourceText("<b><%= if ok %>yes<% end %></b>"));
    expect(tokens.map((t) => (t.kind === "expression" ? `${t.marker}:${t.code.trim()}` : t.kind))).toEqual([
      "tag-open",
      "output:if ok",
      "text",
      "control:end",
      "tag-close",
    ]);
  });

  test("reports an invalid attribute value with its position", () => {
    const err = syntaxErrorOf("<div class=>");
    expect(err.code).toBe("tessera/invalid-character-in-name");
    expect(err.message).toBe('invalid character in attribute value: ">"');
    expect(err.line).toBe(1);
    expect(err.column).toBe(12);
  });

  test("reports a tag left open at the end of the template", () => {
    const err = syntaxErrorOf("<div");
    expect(err.code).toBe("tessera/unterminated-tag");
    expect(err.message).toBe("end of template reached inside <div: expected > or />");
  });

  test("rejects malformed component names", () => {
    const err = syntaxErrorOf("<.Card/>");
    expect(err.code).toBe("tessera/invalid-tag");
    expect(err.message).toBe("invalid tag <.Card>");
  });

  test("reports an unclosed expression", () => {
    const err = syntaxErrorOf("<p>{user.name</p>");
    expect(err.code).toBe("tessera/unterminated-expression");
    expect(err.column).toBe(4);
  });
});
