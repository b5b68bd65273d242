import { describe, test, expect } from "vitest";

import { SourceText, TemplateSyntaxError, splitMarkers } from "../../src/index.js";

describe("splitMarkers", () => {
  test("separates output markers, drops comments and unescapes <%%", () => {
    const segments = splitMarkers(new SourceText("a<%= x %>b<%# c %>d<%% e"));
    expect(segments).toEqual([
      { kind: "text", content: "a", start: 0 },
      { kind: "marker", marker: "output", code: " x ", codeStart: 4, start: 1, end: 9 },
      { kind: "text", content: "b", start: 9 },
      { kind: "text", content: "d<%", start: 18 },
      { kind: "text", content: " e", start: 22 },
    ]);
  });

  test("control markers keep their code", () => {
    const segments = splitMarkers(new SourceText("<% end %>"));
    expect(segments).toEqual([{ kind: "marker", marker: "control", code: " end ", codeStart: 2, start: 0, end: 9 }]);
  });

  test("text without markers is a single segment", () => {
    expect(splitMarkers(new SourceText("<p>hi</p>"))).toEqual([{ kind: "text", content: "<p>hi</p>", start: 0 }]);
  });

  test("an unterminated marker reports where it starts", () => {
    const source = new SourceText("ok\nx <%= y", "page.tpl");
    let caught: unknown;
    try {
      splitMarkers(source);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(TemplateSyntaxError);
    if (!(caught instanceof TemplateSyntaxError)) return;
    expect(caught.code).toBe("tessera/unterminated-marker");
    expect(caught.message).toBe("missing %> for embedded code starting here");
    expect(caught.file).toBe("page.tpl");
    expect(caught.line).toBe(2);
    expect(caught.column).toBe(3);
  });
});
