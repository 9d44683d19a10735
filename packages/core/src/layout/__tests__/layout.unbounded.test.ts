import { assert, describe, test } from "@cellplan/testkit";
import { ui } from "../../widgets/ui.js";
import type { WidgetNode } from "../../widgets/types.js";
import type { LayoutDiagnostic } from "../diagnostics.js";
import { computeLayout } from "../engine/layoutEngine.js";
import type { LayoutOutput } from "../engine/types.js";
import { type Extent, type Rect, UNBOUNDED } from "../types.js";
import { effectiveAxis, validateWidgetTree } from "../validateTree.js";

function mustLayout(node: WidgetNode, extent: Extent): LayoutOutput {
  const res = computeLayout(node, extent, { warnings: false });
  if (!res.ok) {
    assert.fail(`layout failed: ${res.fatal.code}: ${res.fatal.detail}`);
  }
  return res.value;
}

function rectAt(out: LayoutOutput, path: string): Rect {
  const rect = out.rects.get(path);
  if (!rect) assert.fail(`no rect for ${path}`);
  return rect;
}

describe("unbounded main axis", () => {
  test("expand takes its child's size and spacer collapses", () => {
    const tree = ui.vstack([ui.text("a"), ui.expand({}, ui.text("hello")), ui.spacer()]);
    const out = mustLayout(tree, { w: 10, h: UNBOUNDED });
    assert.deepEqual(rectAt(out, "0"), { x: 0, y: 0, w: 10, h: 2 });
    assert.deepEqual(rectAt(out, "0.1"), { x: 0, y: 1, w: 10, h: 1 });
    assert.deepEqual(rectAt(out, "0.1.0"), { x: 0, y: 1, w: 5, h: 1 });
    assert.deepEqual(rectAt(out, "0.2"), { x: 0, y: 2, w: 10, h: 0 });
    assert.deepEqual(out.diagnostics, [
      {
        kind: "unboundedExpand",
        path: "0.1",
        detail: "expand in a stack with unbounded vertical extent receives no extra space",
      },
      {
        kind: "unboundedExpand",
        path: "0.2",
        detail: "spacer in a stack with unbounded vertical extent receives no extra space",
      },
    ]);
  });

  test("factor 0 claims are not reported", () => {
    const out = mustLayout(ui.hstack([ui.spacer({ factor: 0 })]), { w: UNBOUNDED, h: 2 });
    assert.deepEqual(out.diagnostics, []);
    assert.deepEqual(rectAt(out, "0.0"), { x: 0, y: 0, w: 0, h: 2 });
  });

  test("diagnostics reach onDiagnostic in order", () => {
    const seen: LayoutDiagnostic[] = [];
    const res = computeLayout(
      ui.hstack([ui.expand(), ui.container({ height: 9 })]),
      { w: UNBOUNDED, h: 3 },
      { warnings: false, onDiagnostic: (d) => seen.push(d) },
    );
    assert.equal(res.ok, true);
    assert.deepEqual(
      seen.map((d) => `${d.kind}@${d.path}`),
      ["unboundedExpand@0.0", "overflow@0.1"],
    );
  });

  test("bounded cross axis still stretches an expand", () => {
    const out = mustLayout(ui.hstack([ui.expand({}, ui.text("ab"))]), { w: UNBOUNDED, h: 3 });
    assert.deepEqual(rectAt(out, "0.0"), { x: 0, y: 0, w: 2, h: 3 });
    assert.deepEqual(rectAt(out, "0.0.0"), { x: 0, y: 0, w: 2, h: 1 });
  });
});

describe("axis mismatch", () => {
  test("expand along the other axis gets no main space", () => {
    const tree = ui.vstack([ui.expand({ axis: "horizontal" }), ui.text("x")]);
    const out = mustLayout(tree, { w: 6, h: 4 });
    assert.deepEqual(rectAt(out, "0"), { x: 0, y: 0, w: 6, h: 1 });
    assert.deepEqual(rectAt(out, "0.0"), { x: 0, y: 0, w: 6, h: 0 });
    assert.deepEqual(rectAt(out, "0.1"), { x: 0, y: 0, w: 1, h: 1 });
    assert.deepEqual(out.diagnostics, [
      {
        kind: "axisMismatch",
        path: "0.0",
        detail: "expand along horizontal inside a vertical stack gets no vertical space",
      },
    ]);
  });

  test("a matching explicit axis distributes normally", () => {
    const out = mustLayout(ui.hstack([ui.expand({ axis: "horizontal" })]), { w: 6, h: 2 });
    assert.deepEqual(rectAt(out, "0.0"), { x: 0, y: 0, w: 6, h: 2 });
    assert.deepEqual(out.diagnostics, []);
  });

  test("effective axis comes from the node or the nearest stack", () => {
    const tree = ui.hstack([
      ui.expand({ axis: "vertical" }),
      ui.border(ui.expand()),
      ui.vstack([ui.spacer()]),
    ]);
    const res = validateWidgetTree(tree);
    if (!res.ok) assert.fail(res.fatal.detail);
    const axes = res.value.entries.map((e) => `${e.path}:${String(effectiveAxis(e))}`);
    assert.deepEqual(axes, [
      "0:null",
      "0.0:vertical",
      "0.1:horizontal",
      "0.1.0:horizontal",
      "0.2:horizontal",
      "0.2.0:vertical",
    ]);
  });
});

describe("standalone expand", () => {
  test("fills a bounded extent", () => {
    const out = mustLayout(ui.expand({}, ui.text("hi")), { w: 7, h: 3 });
    assert.deepEqual(rectAt(out, "0"), { x: 0, y: 0, w: 7, h: 3 });
    assert.deepEqual(rectAt(out, "0.0"), { x: 0, y: 0, w: 2, h: 1 });
  });

  test("takes the child's size when unbounded", () => {
    const out = mustLayout(ui.expand({}, ui.text("hi")), { w: UNBOUNDED, h: UNBOUNDED });
    assert.deepEqual(rectAt(out, "0"), { x: 0, y: 0, w: 2, h: 1 });
    const spacer = mustLayout(ui.spacer(), { w: UNBOUNDED, h: 4 });
    assert.deepEqual(rectAt(spacer, "0"), { x: 0, y: 0, w: 0, h: 4 });
  });
});
