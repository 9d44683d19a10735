import { isBounded } from "../engine/bounds.js";
import { childEntries, setSize, sizeOf } from "../engine/pass.js";
import { type LayoutResult, fatal, ok } from "../engine/result.js";
import type {
  LayoutTree,
  MeasureNodeFn,
  PassContext,
  PlaceContext,
  PlaceNodeFn,
} from "../engine/types.js";
import type { Size } from "../types.js";
import type { ArenaEntry } from "../validateTree.js";

/**
 * ZStack: every child is measured against the same full extent. The stack
 * takes the extent in bounded dimensions and the largest child elsewhere.
 */
export function measureOverlayKind(
  ctx: PassContext,
  entry: ArenaEntry,
  maxW: number,
  maxH: number,
  measureNode: MeasureNodeFn,
): LayoutResult<Size> {
  if (entry.node.kind !== "zstack") {
    return fatal("LAYOUT_INVALID_TREE", "measureOverlayKind: unexpected node kind", entry.path);
  }
  let largestW = 0;
  let largestH = 0;
  for (const child of childEntries(ctx, entry)) {
    const res = measureNode(ctx, child, maxW, maxH);
    if (!res.ok) return res;
    largestW = Math.max(largestW, res.value.w);
    largestH = Math.max(largestH, res.value.h);
  }
  return ok(
    setSize(ctx, entry, {
      w: isBounded(maxW) ? maxW : largestW,
      h: isBounded(maxH) ? maxH : largestH,
    }),
  );
}

/** Children share the stack origin; later children sit on top. */
export function placeOverlayKind(
  ctx: PlaceContext,
  entry: ArenaEntry,
  x: number,
  y: number,
  placeNode: PlaceNodeFn,
): LayoutTree {
  const size = sizeOf(ctx.pass, entry);
  const rect = { x, y, w: size.w, h: size.h };
  ctx.rects.set(entry.path, rect);
  const children: LayoutTree[] = [];
  for (const child of childEntries(ctx.pass, entry)) {
    children.push(placeNode(ctx, child, x, y));
  }
  return { node: entry.node, path: entry.path, rect, children: Object.freeze(children) };
}
