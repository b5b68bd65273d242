import { describe, test, expect } from "vitest";
import { LiveSession } from "@tessera/runtime";

import { TemplateCompiler, compileTemplate } from "../../src/index.js";

describe("live sessions over compiled templates", () => {
  test("mount sends statics once; later renders send changed slots only", () => {
    const session = new LiveSession(compileTemplate("<p>{greeting} {name}</p>"), { label: "greeting" });
    const mounted = session.mount({ greeting: "Hi", name: "Ada" });
    expect(mounted.html).toBe("<p>Hi Ada</p>");
    expect(mounted.patch).toEqual({ s: ["<p>", " ", "</p>"], r: 1, "0": "Hi", "1": "Ada" });

    expect(session.assign("name", "Bo").render()).toEqual({ "1": "Bo" });
    expect(session.toHtml()).toBe("<p>Hi Bo</p>");
  });

  test("nothing to send when nothing changed", () => {
    const session = new LiveSession(compileTemplate("<p>{name}</p>"));
    session.mount({ name: "Ada" });
    expect(session.render()).toBeNull();
    expect(session.assign("name", "Ada").render()).toBeNull();
  });

  test("plans whose bindings did not change are not evaluated again", () => {
    let calls = 0;
    const template = compileTemplate("<p>{stamp()} {name}</p>", { helpers: { stamp: () => ++calls } });
    const session = new LiveSession(template);
    session.mount({ name: "Ada" });
    session.assign("name", "Bo").render();
    expect(calls).toBe(1);
    expect(session.toHtml()).toBe("<p>1 Bo</p>");
  });

  test("nested record changes only touch the plans reading the changed path", () => {
    let calls = 0;
    const template = compileTemplate("<p>{count(user.name)}|{user.email}</p>", {
      helpers: {
        count: (value: unknown) => {
          calls += 1;
          return value;
        },
      },
    });
    const session = new LiveSession(template);
    session.mount({ user: { name: "Ada", email: "a@example.test" } });
    expect(session.assign("user", { name: "Ada", email: "b@example.test" }).render()).toEqual({ "1": "b@example.test" });
    expect(calls).toBe(1);
  });

  test("mounting twice is an error", () => {
    const session = new LiveSession(compileTemplate("<p></p>"), { label: "page" });
    session.mount();
    expect(() => session.mount()).toThrow("session page is already mounted");
  });
});

describe("keyed components in a loop", () => {
  function createSession(): LiveSession {
    const unit = new TemplateCompiler("Ui").component("item", (c) =>
      c.attr("id", "string", { required: true }).attr("label", "string").template("<li>{label}</li>"),
    );
    const page = unit.compile("<ul><%= for row of rows %><.item id={row.id} label={row.label} /><% end %></ul>");
    unit.finalize();
    return new LiveSession(page);
  }

  const a = { id: "a", label: "A" };
  const b = { id: "b", label: "B" };

  test("mount sends each component once, referenced by id", () => {
    const { html, patch } = createSession().mount({ rows: [a, b] });
    expect(html).toBe("<ul><li>A</li><li>B</li></ul>");
    expect(patch).toEqual({
      s: ["<ul>", "</ul>"],
      r: 1,
      "0": { s: ["", ""], d: [[1], [2]] },
      c: {
        "1": { s: ["<li>", "</li>"], r: 1, "0": "A" },
        "2": { s: ["<li>", "</li>"], r: 1, "0": "B" },
      },
    });
  });

  test("reordering sends moves; removing sends a removal and a tombstone", () => {
    const session = createSession();
    session.mount({ rows: [a, b] });

    expect(session.assign("rows", [b, a]).render()).toEqual({ "0": { m: [[1, 0]] } });
    expect(session.toHtml()).toBe("<ul><li>B</li><li>A</li></ul>");

    expect(session.assign("rows", [b]).render()).toEqual({ "0": { x: [1] }, c: { "1": null } });
    expect(session.toHtml()).toBe("<ul><li>B</li></ul>");
  });

  test("a changed label patches only its component", () => {
    const session = createSession();
    session.mount({ rows: [a, b] });
    expect(session.assign("rows", [a, { id: "b", label: "B2" }]).render()).toEqual({ c: { "2": { "0": "B2" } } });
  });

  test("a new row is inserted with its component", () => {
    const session = createSession();
    session.mount({ rows: [a] });
    expect(session.assign("rows", [a, b]).render()).toEqual({
      "0": { i: [[1, [2]]] },
      c: { "2": { s: ["<li>", "</li>"], r: 1, "0": "B" } },
    });
  });
});

describe("slots across renders", () => {
  function createSession(): LiveSession {
    const unit = new TemplateCompiler("Ui").component("card", (c) =>
      c
        .attr("title", "string", { required: true })
        .slot("footer")
        .template('<div class="card"><h2>{title}</h2>{renderSlot(inner_block)}<footer>{renderSlot(footer)}</footer></div>'),
    );
    const page = unit.compile("<.card title={title}>Hello {name}<:footer>by {author}</:footer></.card>");
    unit.finalize();
    return new LiveSession(page);
  }

  test("slot content is part of the component's tree", () => {
    const { html, patch } = createSession().mount({ title: "T", name: "Ada", author: "Bo" });
    expect(html).toBe('<div class="card"><h2>T</h2>Hello Ada<footer>by Bo</footer></div>');
    expect(patch).toEqual({
      s: ["", ""],
      "0": 1,
      c: {
        "1": {
          s: ['<div class="card"><h2>', "</h2>", "<footer>", "</footer></div>"],
          r: 1,
          "0": "T",
          "1": { s: ["Hello ", ""], "0": "Ada" },
          "2": { s: ["by ", ""], "0": "Bo" },
        },
      },
    });
  });

  test("a caller binding used in slot content patches inside the component", () => {
    const session = createSession();
    session.mount({ title: "T", name: "Ada", author: "Bo" });
    expect(session.assign("name", "Cy").render()).toEqual({ c: { "1": { "1": { "0": "Cy" } } } });
    expect(session.assign("title", "U").render()).toEqual({ c: { "1": { "0": "U" } } });
  });
});
