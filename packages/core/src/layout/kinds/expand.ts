/**
 * packages/core/src/layout/kinds/expand.ts — Expand and spacer boxes.
 *
 * Once a box size is decided (by the parent stack's distribution, or by the
 * available extent when the node is not a stack child), the expand's single
 * child is sized inside it. A box dimension that is unbounded takes the
 * child's size; a spacer has no child and takes 0 there.
 */

import { isBounded } from "../engine/bounds.js";
import { firstChild, setSize, sizeOf } from "../engine/pass.js";
import { type LayoutResult, ok } from "../engine/result.js";
import type {
  LayoutTree,
  MeasureNodeFn,
  PassContext,
  PlaceContext,
  PlaceNodeFn,
} from "../engine/types.js";
import type { FillDirective } from "../fill.js";
import type { Size } from "../types.js";
import type { ArenaEntry } from "../validateTree.js";

export function sizeExpandBox(
  ctx: PassContext,
  entry: ArenaEntry,
  boxW: number,
  boxH: number,
  measureNode: MeasureNodeFn,
): LayoutResult<Size> {
  let childW = 0;
  let childH = 0;
  const child = entry.node.kind === "expand" ? firstChild(ctx, entry) : null;
  if (child) {
    const res = measureNode(ctx, child, boxW, boxH);
    if (!res.ok) return res;
    childW = res.value.w;
    childH = res.value.h;
  }
  return ok(
    setSize(ctx, entry, {
      w: isBounded(boxW) ? boxW : childW,
      h: isBounded(boxH) ? boxH : childH,
    }),
  );
}

function coversBox(box: Size, child: Size | null): boolean {
  return child !== null && child.w >= box.w && child.h >= box.h;
}

export function placeExpandKind(
  ctx: PlaceContext,
  entry: ArenaEntry,
  x: number,
  y: number,
  placeNode: PlaceNodeFn,
): LayoutTree {
  const size = sizeOf(ctx.pass, entry);
  const rect = { x, y, w: size.w, h: size.h };
  ctx.rects.set(entry.path, rect);

  const child = entry.node.kind === "expand" ? firstChild(ctx.pass, entry) : null;
  const childTree = child ? placeNode(ctx, child, x, y) : null;

  const node = entry.node;
  if (
    node.kind === "expand" &&
    node.fill !== undefined &&
    node.fill.length > 0 &&
    rect.w > 0 &&
    rect.h > 0 &&
    !coversBox(size, childTree ? childTree.rect : null)
  ) {
    const directive: FillDirective = {
      path: entry.path,
      rect,
      childRect: childTree ? childTree.rect : null,
      pattern: node.fill,
    };
    ctx.fills.push(Object.freeze(directive));
  }

  return {
    node: entry.node,
    path: entry.path,
    rect,
    children: Object.freeze(childTree ? [childTree] : []),
  };
}
