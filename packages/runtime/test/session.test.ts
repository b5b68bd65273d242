import { describe, test } from "vitest";
import assert from "node:assert/strict";

import {
  DiffInvariantError,
  LiveSession,
  componentDynamic,
  comprehensionDynamic,
  createRendered,
  escapeHtml,
  isPathChanged,
  valueDynamic,
  type Dynamic,
  type Rendered,
  type SessionTemplate,
  type TemplateRenderInput,
} from "../src/index.js";
import { ClientView } from "./_helpers/client.js";

/** `<p>Hello {name}</p>`, skipping the hole when `name` did not change. */
class GreetingTemplate implements SessionTemplate {
  readonly fingerprint = "greeting";
  evaluations = 0;

  render({ assigns, changed, previous }: TemplateRenderInput): Rendered {
    const prior = previous?.dynamics[0];
    let name: Dynamic;
    if (prior && !isPathChanged(changed, "name")) {
      name = prior;
    } else {
      this.evaluations++;
      name = valueDynamic(escapeHtml(String(assigns["name"])));
    }
    return createRendered(["<p>Hello ", "</p>"], [name], this.fingerprint, true);
  }
}

/** One `<li>` component per entry of `items`, keyed by the entry. */
class ItemsTemplate implements SessionTemplate {
  readonly fingerprint = "items";

  render({ context, assigns }: TemplateRenderInput): Rendered {
    const items = Array.isArray(assigns["items"]) ? assigns["items"].map(String) : [];
    const rows = items.map((item) => {
      const cid = context.mount({ key: `item#${item}`, slotOwner: null }, () => ({
        fingerprint: "item",
        rendered: createRendered(["<li>", "</li>"], [valueDynamic(escapeHtml(item))], "item", true),
        assigns: { item },
      }));
      return [componentDynamic(cid)];
    });
    return createRendered(["<ul>", "</ul>"], [comprehensionDynamic("rows", ["", ""], rows)], this.fingerprint, true);
  }
}

describe("LiveSession", () => {
  test("mount returns the html and the full patch", () => {
    const session = new LiveSession(new GreetingTemplate());
    const { html, patch } = session.mount({ name: "Ada" });
    assert.equal(html, "<p>Hello Ada</p>");
    assert.deepEqual(patch, { s: ["<p>Hello ", "</p>"], r: 1, "0": "Ada" });
  });

  test("a render with no changes produces no patch and evaluates nothing", () => {
    const template = new GreetingTemplate();
    const session = new LiveSession(template);
    session.mount({ name: "Ada" });
    assert.equal(session.render(), null);
    assert.equal(template.evaluations, 1);
  });

  test("assigning an equal value produces no patch", () => {
    const session = new LiveSession(new GreetingTemplate());
    session.mount({ name: "Ada" });
    assert.equal(session.assign("name", "Ada").render(), null);
  });

  test("a changed binding sends only its slot", () => {
    const session = new LiveSession(new GreetingTemplate());
    session.mount({ name: "Ada" });
    assert.deepEqual(session.assign({ name: "Grace" }).render(), { "0": "Grace" });
    assert.equal(session.toHtml(), "<p>Hello Grace</p>");
  });

  test("mounting twice is rejected", () => {
    const session = new LiveSession(new GreetingTemplate());
    session.mount({ name: "Ada" });
    assert.throws(() => session.mount({ name: "Ada" }), /already mounted/);
  });

  test("component ids stay stable and removed components get tombstones", () => {
    const session = new LiveSession(new ItemsTemplate());
    const client = new ClientView();
    client.apply(session.mount({ items: ["a", "b", "c"] }).patch);
    assert.equal(client.html(), "<ul><li>a</li><li>b</li><li>c</li></ul>");

    const patch = session.assign("items", ["c", "a"]).render();
    assert.deepEqual(patch, { "0": { x: [1], m: [[1, 0]] }, c: { "2": null } });
    assert.ok(patch);
    client.apply(patch);
    assert.equal(client.html(), session.toHtml());
    assert.equal(client.html(), "<ul><li>c</li><li>a</li></ul>");
    assert.deepEqual(client.componentIds, [1, 3]);
  });

  test("a key that comes back after being dropped gets a fresh id", () => {
    const session = new LiveSession(new ItemsTemplate());
    session.mount({ items: ["a"] });
    session.assign("items", []).render();
    const patch = session.assign("items", ["a"]).render();
    assert.deepEqual(patch, { "0": { i: [[0, [2]]] }, c: { "2": { s: ["<li>", "</li>"], r: 1, "0": "a" } } });
  });

  test("a duplicate key in one render fails and leaves the session as it was", () => {
    const session = new LiveSession(new ItemsTemplate());
    session.mount({ items: ["a"] });
    assert.throws(() => session.assign("items", ["a", "a"]).render(), DiffInvariantError);
    assert.equal(session.toHtml(), "<ul><li>a</li></ul>");
  });
});
