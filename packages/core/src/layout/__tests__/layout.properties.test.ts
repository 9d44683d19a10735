import { type Rng, assert, createRng, describe, test } from "@cellplan/testkit";
import type { WidgetNode } from "../../widgets/types.js";
import { ui } from "../../widgets/ui.js";
import { computeLayout } from "../engine/layoutEngine.js";
import type { LayoutOutput, LayoutTree } from "../engine/types.js";
import { type Extent, type Rect, UNBOUNDED } from "../types.js";

const WORDS = ["a", "ok", "cell", "plan", "layout", "terminal"] as const;

function randomText(rng: Rng): string {
  const n = rng.int(1, 4);
  const words: string[] = [];
  for (let i = 0; i < n; i++) words.push(rng.pick(WORDS));
  return words.join(" ");
}

function randomChildren(rng: Rng, depth: number): WidgetNode[] {
  const n = rng.int(0, 4);
  const out: WidgetNode[] = [];
  for (let i = 0; i < n; i++) out.push(randomNode(rng, depth + 1));
  return out;
}

function randomChild(rng: Rng, depth: number): WidgetNode | undefined {
  return rng.next() < 0.8 ? randomNode(rng, depth + 1) : undefined;
}

function randomNode(rng: Rng, depth: number): WidgetNode {
  if (depth >= 4) {
    return rng.next() < 0.7 ? ui.text(randomText(rng)) : ui.spacer({ factor: rng.int(0, 3) });
  }
  switch (rng.int(0, 9)) {
    case 0:
    case 1:
      return ui.vstack(randomChildren(rng, depth));
    case 2:
    case 3:
      return ui.hstack(randomChildren(rng, depth));
    case 4:
      return ui.zstack(randomChildren(rng, depth));
    case 5:
      return ui.border(randomChild(rng, depth));
    case 6:
      return ui.padding({ all: rng.int(0, 2), left: rng.int(0, 3) }, randomChild(rng, depth));
    case 7:
      return ui.container(
        rng.next() < 0.5
          ? { width: rng.int(0, 12) }
          : { width: rng.int(0, 12), height: rng.int(0, 6) },
        randomChild(rng, depth),
      );
    case 8:
      return ui.expand(
        {
          factor: rng.int(0, 3),
          ...(rng.next() < 0.2 ? { axis: rng.pick(["horizontal", "vertical"] as const) } : {}),
          ...(rng.next() < 0.3 ? { fill: "." } : {}),
        },
        randomChild(rng, depth),
      );
    default:
      return rng.next() < 0.5 ? ui.spacer({ factor: rng.int(0, 2) }) : ui.text(randomText(rng));
  }
}

function randomExtent(rng: Rng): Extent {
  return {
    w: rng.next() < 0.15 ? UNBOUNDED : rng.int(0, 40),
    h: rng.next() < 0.15 ? UNBOUNDED : rng.int(0, 20),
  };
}

function mustLayout(node: WidgetNode, extent: Extent): LayoutOutput {
  const res = computeLayout(node, extent, { warnings: false });
  if (!res.ok) {
    assert.fail(`layout failed: ${res.fatal.code}: ${res.fatal.detail}`);
  }
  return res.value;
}

function inside(inner: Rect, outer: Rect): boolean {
  return (
    inner.x >= outer.x &&
    inner.y >= outer.y &&
    inner.x + inner.w <= outer.x + outer.w &&
    inner.y + inner.h <= outer.y + outer.h
  );
}

function walk(
  tree: LayoutTree,
  visit: (node: LayoutTree, parent: LayoutTree | null) => void,
  parent: LayoutTree | null = null,
): void {
  visit(tree, parent);
  for (const child of tree.children) walk(child, visit, tree);
}

// Kinds that assign their child an interior rect instead of its own size.
const WRAPPERS: ReadonlySet<string> = new Set([
  "border",
  "padding",
  "container",
  "canvas",
  "componentSlot",
]);

const CASES = 200;

describe("layout properties over random trees", () => {
  test("rects are non-negative integers and children stay inside parents", () => {
    const rng = createRng(0x5eed);
    for (let i = 0; i < CASES; i++) {
      const extent = randomExtent(rng);
      const out = mustLayout(randomNode(rng, 0), extent);
      for (const [path, r] of out.rects) {
        for (const v of [r.x, r.y, r.w, r.h]) {
          assert.ok(Number.isInteger(v) && v >= 0, `case ${i}: ${path} has ${JSON.stringify(r)}`);
        }
      }
      assert.ok(out.tree.rect.w <= extent.w && out.tree.rect.h <= extent.h, `case ${i}: root`);
      walk(out.tree, (node) => {
        for (const child of node.children) {
          assert.ok(inside(child.rect, node.rect), `case ${i}: ${child.path} escapes ${node.path}`);
        }
      });
    }
  });

  test("stack children tile the stack along its axis", () => {
    const rng = createRng(42);
    for (let i = 0; i < CASES; i++) {
      const out = mustLayout(randomNode(rng, 0), randomExtent(rng));
      walk(out.tree, (node, parent) => {
        if (node.node.kind !== "stack") return;
        const horizontal = node.node.axis === "horizontal";
        let cursor = horizontal ? node.rect.x : node.rect.y;
        for (const child of node.children) {
          const start = horizontal ? child.rect.x : child.rect.y;
          assert.equal(start, cursor, `case ${i}: ${child.path}`);
          cursor += horizontal ? child.rect.w : child.rect.h;
        }
        const end = horizontal ? node.rect.x + node.rect.w : node.rect.y + node.rect.h;
        if (parent && WRAPPERS.has(parent.node.kind)) {
          assert.ok(cursor <= end, `case ${i}: ${node.path} overruns its rect`);
        } else {
          assert.equal(cursor, end, `case ${i}: ${node.path} does not conserve cells`);
        }
      });
    }
  });

  test("repeated passes over the same tree agree", () => {
    const rng = createRng(7);
    for (let i = 0; i < 50; i++) {
      const tree = randomNode(rng, 0);
      const extent = randomExtent(rng);
      const a = mustLayout(tree, extent);
      const b = mustLayout(tree, extent);
      assert.deepEqual([...a.rects.entries()], [...b.rects.entries()]);
      assert.deepEqual(a.fills, b.fills);
      assert.deepEqual(a.diagnostics, b.diagnostics);
    }
  });

  test("fill directives lie inside their expand and skip the child", () => {
    const rng = createRng(1234);
    for (let i = 0; i < CASES; i++) {
      const out = mustLayout(randomNode(rng, 0), randomExtent(rng));
      for (const fill of out.fills) {
        assert.deepEqual(fill.rect, out.rects.get(fill.path));
        assert.ok(fill.rect.w > 0 && fill.rect.h > 0);
        if (fill.childRect) assert.ok(inside(fill.childRect, fill.rect));
      }
    }
  });
});
