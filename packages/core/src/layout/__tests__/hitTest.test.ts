import { assert, describe, test } from "@cellplan/testkit";
import { ui } from "../../widgets/ui.js";
import { computeLayout } from "../engine/layoutEngine.js";
import type { LayoutOutput } from "../engine/types.js";
import { contains, findLayoutNode, hitTest } from "../hitTest.js";

function overlay(): LayoutOutput {
  const res = computeLayout(
    ui.zstack([ui.text("abc"), ui.container({ width: 2, height: 2 })]),
    { w: 10, h: 4 },
    { warnings: false },
  );
  if (!res.ok) assert.fail(res.fatal.detail);
  return res.value;
}

describe("hitTest", () => {
  test("later nodes in pre-order win", () => {
    const out = overlay();
    assert.equal(hitTest(out, 1, 0), "0.1");
    assert.equal(hitTest(out, 0, 1), "0.1");
    assert.equal(hitTest(out, 2, 0), "0.0");
    assert.equal(hitTest(out, 5, 3), "0");
  });

  test("points outside the root miss", () => {
    const out = overlay();
    assert.equal(hitTest(out, 10, 0), null);
    assert.equal(hitTest(out, 0, 4), null);
    assert.equal(hitTest(out, -1, 0), null);
  });

  test("contains excludes the right and bottom edges", () => {
    const r = { x: 2, y: 3, w: 2, h: 1 };
    assert.equal(contains(r, 2, 3), true);
    assert.equal(contains(r, 3, 3), true);
    assert.equal(contains(r, 4, 3), false);
    assert.equal(contains(r, 2, 4), false);
    assert.equal(contains({ x: 0, y: 0, w: 0, h: 0 }, 0, 0), false);
  });
});

describe("findLayoutNode", () => {
  test("finds nodes by path", () => {
    const out = overlay();
    assert.equal(findLayoutNode(out.tree, "0"), out.tree);
    assert.deepEqual(findLayoutNode(out.tree, "0.1")?.rect, { x: 0, y: 0, w: 2, h: 2 });
    assert.equal(findLayoutNode(out.tree, "0.1")?.node.kind, "container");
  });

  test("returns null for unknown paths", () => {
    const out = overlay();
    assert.equal(findLayoutNode(out.tree, "0.5"), null);
    assert.equal(findLayoutNode(out.tree, "1"), null);
  });
});
