import { assert, describe, test } from "@cellplan/testkit";
import { computeLayout } from "../../layout/engine/layoutEngine.js";
import { widgetFromElement } from "../fromElement.js";
import type { ResolvedElement, WidgetNode } from "../types.js";

function mustConvert(element: ResolvedElement): WidgetNode {
  const res = widgetFromElement(element);
  if (!res.ok) assert.fail(`conversion failed: ${res.fatal.detail}`);
  return res.value;
}

describe("widgetFromElement", () => {
  test("lifts stacks, text and expand attributes", () => {
    const node = mustConvert({
      kind: "vstack",
      children: [
        { kind: "text", text: "hi" },
        { kind: "expand", attributes: { factor: 2, fill: "-" } },
      ],
    });
    assert.deepEqual(node, {
      kind: "stack",
      axis: "vertical",
      attributes: {},
      children: [
        { kind: "text", text: "hi", attributes: {}, children: [] },
        {
          kind: "expand",
          attributes: { factor: 2, fill: "-" },
          factor: 2,
          fill: "-",
          children: [],
        },
      ],
    });
  });

  test("expand and spacer factor defaults to 1", () => {
    const node = mustConvert({
      kind: "hstack",
      children: [{ kind: "expand" }, { kind: "spacer" }],
    });
    if (node.kind !== "stack") assert.fail(`expected a stack, got ${node.kind}`);
    const [expand, spacer] = node.children;
    assert.equal(expand?.kind === "expand" ? expand.factor : -1, 1);
    assert.equal(spacer?.kind === "spacer" ? spacer.factor : -1, 1);
  });

  test("axis accepts short aliases", () => {
    const node = mustConvert({ kind: "expand", attributes: { axis: "horz" } });
    assert.equal(node.kind === "expand" ? node.axis : undefined, "horizontal");
    const vert = mustConvert({ kind: "expand", attributes: { axis: "vert" } });
    assert.equal(vert.kind === "expand" ? vert.axis : undefined, "vertical");
  });

  test("padding shorthand is overridden per side", () => {
    const node = mustConvert({ kind: "padding", attributes: { padding: 2, left: 0 } });
    assert.equal(node.kind, "padding");
    if (node.kind !== "padding") return;
    assert.deepEqual(
      { left: node.left, right: node.right, top: node.top, bottom: node.bottom },
      { left: 0, right: 2, top: 2, bottom: 2 },
    );
  });

  test("sized kinds keep only the dimensions given", () => {
    const node = mustConvert({ kind: "container", attributes: { width: 4, height: null } });
    assert.deepEqual(node, {
      kind: "container",
      attributes: { width: 4, height: null },
      children: [],
      width: 4,
    });
    assert.equal(mustConvert({ kind: "canvas" }).kind, "canvas");
  });

  test("component elements become named slots", () => {
    const node = mustConvert({
      kind: "component",
      attributes: { name: "sidebar" },
      children: [{ kind: "text", text: "x" }],
    });
    assert.equal(node.kind, "componentSlot");
    assert.equal(node.kind === "componentSlot" ? node.name : undefined, "sidebar");
    assert.equal(node.children.length, 1);
  });

  test("text collects span children", () => {
    const node = mustConvert({
      kind: "text",
      text: "a",
      children: [{ kind: "span", text: "b" }],
    });
    assert.deepEqual(node.children, [{ kind: "span", text: "b", attributes: {}, children: [] }]);
  });

  test("converted trees lay out", () => {
    const node = mustConvert({
      kind: "border",
      children: [
        {
          kind: "vstack",
          children: [
            { kind: "text", text: "Hello" },
            { kind: "expand", attributes: { fill: "+-" } },
          ],
        },
      ],
    });
    const res = computeLayout(node, { w: 10, h: 6 }, { warnings: false });
    if (!res.ok) assert.fail(res.fatal.detail);
    assert.deepEqual(res.value.rects.get("0.0.1"), { x: 1, y: 2, w: 8, h: 3 });
  });
});

describe("widgetFromElement errors", () => {
  test("a bad factor is LAYOUT_INVALID_FACTOR", () => {
    const res = widgetFromElement({ kind: "spacer", attributes: { factor: "x" } });
    assert.deepEqual(res, {
      ok: false,
      fatal: {
        code: "LAYOUT_INVALID_FACTOR",
        detail: '0: invalid attribute "factor" on <spacer>: expected an integer >= 0, got x',
        path: "0",
      },
    });
  });

  test("a bad axis names the nested path", () => {
    const res = widgetFromElement({
      kind: "hstack",
      children: [{ kind: "text", text: "a" }, { kind: "expand", attributes: { axis: "diag" } }],
    });
    assert.equal(res.ok, false);
    if (res.ok) return;
    assert.equal(res.fatal.code, "LAYOUT_INVALID_TREE");
    assert.equal(
      res.fatal.detail,
      '0.1: invalid attribute "axis" on <expand>: expected "horizontal" or "vertical", got diag',
    );
  });

  test("negative sizes are rejected", () => {
    const res = widgetFromElement({ kind: "container", attributes: { height: -1 } });
    assert.equal(res.ok, false);
    if (res.ok) return;
    assert.equal(
      res.fatal.detail,
      '0: invalid attribute "height" on <container>: expected an integer >= 0, got -1',
    );
  });

  test("unknown kinds are rejected", () => {
    const res = widgetFromElement({ kind: "vstack", children: [{ kind: "marquee" }] });
    assert.deepEqual(res, {
      ok: false,
      fatal: {
        code: "LAYOUT_INVALID_TREE",
        detail: '0.0: unknown element kind "marquee"',
        path: "0.0",
      },
    });
  });

  test("text, span and spacer child rules", () => {
    const textRes = widgetFromElement({ kind: "text", children: [{ kind: "border" }] });
    assert.equal(textRes.ok ? "" : textRes.fatal.detail, "0: text accepts only span children");
    const spanRes = widgetFromElement({ kind: "span", children: [{ kind: "span" }] });
    assert.equal(spanRes.ok ? "" : spanRes.fatal.detail, "0: span accepts no children");
    const spacerRes = widgetFromElement({ kind: "spacer", children: [{ kind: "text" }] });
    assert.equal(spacerRes.ok ? "" : spacerRes.fatal.detail, "0: spacer accepts no children");
  });
});
