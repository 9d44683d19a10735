/**
 * packages/core/src/layout/kinds/box.ts — Single-child wrappers.
 *
 *   - border: fixed 1-cell inset on every side
 *   - padding: explicit left/right/top/bottom insets
 *   - container/canvas: optional explicit width/height, otherwise the
 *     child's size passes through
 *   - componentSlot: transparent pass-through
 *
 * Placement hands the child the wrapper's interior rect: the own rect for
 * container, canvas and componentSlot, the rect less its insets for border
 * and padding.
 */

import { clampNonNegative, clampToExtent, shrinkExtent } from "../engine/bounds.js";
import { clampReported, firstChild, setSize, sizeOf } from "../engine/pass.js";
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
import { measureWithCollaborator } from "./leaf.js";

type Insets = Readonly<{ left: number; right: number; top: number; bottom: number }>;

const NO_INSETS: Insets = Object.freeze({ left: 0, right: 0, top: 0, bottom: 0 });
const BORDER_INSETS: Insets = Object.freeze({ left: 1, right: 1, top: 1, bottom: 1 });

function insetsOf(entry: ArenaEntry): Insets {
  const node = entry.node;
  switch (node.kind) {
    case "border":
      return BORDER_INSETS;
    case "padding":
      return { left: node.left, right: node.right, top: node.top, bottom: node.bottom };
    default:
      return NO_INSETS;
  }
}

function measureInset(
  ctx: PassContext,
  entry: ArenaEntry,
  maxW: number,
  maxH: number,
  measureNode: MeasureNodeFn,
): LayoutResult<Size> {
  const insets = insetsOf(entry);
  const insetW = insets.left + insets.right;
  const insetH = insets.top + insets.bottom;
  let childW = 0;
  let childH = 0;
  const child = firstChild(ctx, entry);
  if (child) {
    const res = measureNode(ctx, child, shrinkExtent(maxW, insetW), shrinkExtent(maxH, insetH));
    if (!res.ok) return res;
    childW = res.value.w;
    childH = res.value.h;
  }
  const natural = { w: childW + insetW, h: childH + insetH };
  return ok(setSize(ctx, entry, clampReported(ctx, entry, natural, maxW, maxH)));
}

function measureSized(
  ctx: PassContext,
  entry: ArenaEntry,
  maxW: number,
  maxH: number,
  measureNode: MeasureNodeFn,
): LayoutResult<Size> {
  const node = entry.node;
  const sized = node.kind === "container" || node.kind === "canvas";
  const explicitW = sized ? node.width : undefined;
  const explicitH = sized ? node.height : undefined;
  const pinned = clampReported(ctx, entry, { w: explicitW ?? 0, h: explicitH ?? 0 }, maxW, maxH);
  const boxW = explicitW === undefined ? maxW : pinned.w;
  const boxH = explicitH === undefined ? maxH : pinned.h;

  let naturalW = 0;
  let naturalH = 0;
  const child = firstChild(ctx, entry);
  if (child) {
    const res = measureNode(ctx, child, boxW, boxH);
    if (!res.ok) return res;
    naturalW = res.value.w;
    naturalH = res.value.h;
  } else if (node.kind === "canvas" && (explicitW === undefined || explicitH === undefined)) {
    const res = measureWithCollaborator(ctx, entry, node, boxW);
    if (!res.ok) return res;
    const clamped = clampReported(ctx, entry, res.value, boxW, boxH);
    naturalW = clamped.w;
    naturalH = clamped.h;
  }

  return ok(
    setSize(ctx, entry, {
      w: explicitW === undefined ? clampToExtent(naturalW, maxW) : pinned.w,
      h: explicitH === undefined ? clampToExtent(naturalH, maxH) : pinned.h,
    }),
  );
}

export function measureBoxKinds(
  ctx: PassContext,
  entry: ArenaEntry,
  maxW: number,
  maxH: number,
  measureNode: MeasureNodeFn,
): LayoutResult<Size> {
  switch (entry.node.kind) {
    case "border":
    case "padding":
    case "componentSlot":
      return measureInset(ctx, entry, maxW, maxH, measureNode);
    case "container":
    case "canvas":
      return measureSized(ctx, entry, maxW, maxH, measureNode);
    default:
      return fatal("LAYOUT_INVALID_TREE", "measureBoxKinds: unexpected node kind", entry.path);
  }
}

export function placeBoxKinds(
  ctx: PlaceContext,
  entry: ArenaEntry,
  x: number,
  y: number,
  placeNode: PlaceNodeFn,
): LayoutTree {
  const size = sizeOf(ctx.pass, entry);
  const rect = { x, y, w: size.w, h: size.h };
  ctx.rects.set(entry.path, rect);

  const child = firstChild(ctx.pass, entry);
  if (!child) {
    return { node: entry.node, path: entry.path, rect, children: Object.freeze([]) };
  }
  // Insets larger than a clamped rect would push the origin outside it.
  const insets = insetsOf(entry);
  const dx = Math.min(insets.left, rect.w);
  const dy = Math.min(insets.top, rect.h);
  // The child is assigned the interior rect, whatever size it measured.
  setSize(ctx.pass, child, {
    w: clampNonNegative(rect.w - insets.left - insets.right),
    h: clampNonNegative(rect.h - insets.top - insets.bottom),
  });
  const childTree = placeNode(ctx, child, x + dx, y + dy);
  return { node: entry.node, path: entry.path, rect, children: Object.freeze([childTree]) };
}
