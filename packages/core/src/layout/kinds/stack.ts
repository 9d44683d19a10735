/**
 * packages/core/src/layout/kinds/stack.ts — Horizontal and vertical stacks.
 *
 * Measurement is sequential: each fixed child sees the full cross extent and
 * whatever is left of the main extent after the fixed children before it.
 * Expand and spacer children contribute nothing at that stage; once every
 * fixed child is measured, the leftover is split between them by
 * distributeStackSpace and each expand's child is sized inside its box.
 *
 * Invariants:
 *   - sum of child main sizes == stack main size (no cell created or lost)
 *   - stack main size never exceeds a bounded main extent
 *   - an expand whose own axis differs from the stack axis gets 0 main cells
 *   - an unbounded main extent leaves nothing to distribute: expands take
 *     their child's size, spacers take 0
 */

import { crossOf, isBounded, mainOf, shrinkExtent, sizeFromAxis } from "../engine/bounds.js";
import { type SpaceClaim, distributeStackSpace } from "../engine/distributeSpace.js";
import { childEntries, report, setSize, sizeOf } from "../engine/pass.js";
import { type LayoutResult, fatal, ok } from "../engine/result.js";
import type {
  LayoutTree,
  MeasureNodeFn,
  PassContext,
  PlaceContext,
  PlaceNodeFn,
} from "../engine/types.js";
import type { Axis, Size } from "../types.js";
import { type ArenaEntry, effectiveAxis } from "../validateTree.js";
import { sizeExpandBox } from "./expand.js";

type PendingClaim = Readonly<{ entry: ArenaEntry; claim: SpaceClaim }>;

function isDistributable(entry: ArenaEntry): boolean {
  return entry.node.kind === "expand" || entry.node.kind === "spacer";
}

function claimOf(entry: ArenaEntry): SpaceClaim | null {
  const node = entry.node;
  if (node.kind === "expand") return { role: "expand", factor: node.factor };
  if (node.kind === "spacer") return { role: "spacer", factor: node.factor };
  return null;
}

export function measureStackKind(
  ctx: PassContext,
  entry: ArenaEntry,
  maxW: number,
  maxH: number,
  measureNode: MeasureNodeFn,
): LayoutResult<Size> {
  const node = entry.node;
  if (node.kind !== "stack") {
    return fatal("LAYOUT_INVALID_TREE", "measureStackKind: unexpected node kind", entry.path);
  }
  const axis: Axis = node.axis;
  const mainExtent = axis === "horizontal" ? maxW : maxH;
  const crossExtent = axis === "horizontal" ? maxH : maxW;
  const boundedMain = isBounded(mainExtent);

  let consumed = 0;
  let crossUsed = 0;
  const pending: PendingClaim[] = [];

  for (const child of childEntries(ctx, entry)) {
    if (isDistributable(child)) {
      const claim = claimOf(child);
      if (!claim) continue;

      if (effectiveAxis(child) !== axis) {
        const along = String(effectiveAxis(child));
        report(
          ctx,
          "axisMismatch",
          child.path,
          `expand along ${along} inside a ${axis} stack gets no ${axis} space`,
        );
        const res = sizeExpandBox(ctx, child, ...boxArgs(axis, 0, crossExtent), measureNode);
        if (!res.ok) return res;
        crossUsed = Math.max(crossUsed, crossOf(res.value, axis));
        continue;
      }

      if (!boundedMain) {
        if (claim.factor > 0) {
          report(
            ctx,
            "unboundedExpand",
            child.path,
            `${claim.role} in a stack with unbounded ${axis} extent receives no extra space`,
          );
        }
        const box = boxArgs(axis, mainExtent, crossExtent);
        const res = sizeExpandBox(ctx, child, ...box, measureNode);
        if (!res.ok) return res;
        consumed += mainOf(res.value, axis);
        crossUsed = Math.max(crossUsed, crossOf(res.value, axis));
        continue;
      }

      pending.push({ entry: child, claim });
      continue;
    }

    const remaining = shrinkExtent(mainExtent, consumed);
    const res = measureNode(ctx, child, ...boxArgs(axis, remaining, crossExtent));
    if (!res.ok) return res;
    consumed += mainOf(res.value, axis);
    crossUsed = Math.max(crossUsed, crossOf(res.value, axis));
  }

  let distributed = 0;
  if (pending.length > 0) {
    const remaining = shrinkExtent(mainExtent, consumed);
    const split = distributeStackSpace(
      remaining,
      pending.map((p) => p.claim),
    );
    for (let i = 0; i < pending.length; i++) {
      const p = pending[i];
      if (!p) continue;
      const main = split.sizes[i] ?? 0;
      const res = sizeExpandBox(ctx, p.entry, ...boxArgs(axis, main, crossExtent), measureNode);
      if (!res.ok) return res;
      distributed += main;
      crossUsed = Math.max(crossUsed, crossOf(res.value, axis));
    }
  }

  return ok(setSize(ctx, entry, sizeFromAxis(axis, consumed + distributed, crossUsed)));
}

function boxArgs(axis: Axis, main: number, cross: number): [number, number] {
  return axis === "horizontal" ? [main, cross] : [cross, main];
}

export function placeStackKind(
  ctx: PlaceContext,
  entry: ArenaEntry,
  x: number,
  y: number,
  placeNode: PlaceNodeFn,
): LayoutTree {
  const node = entry.node;
  const size = sizeOf(ctx.pass, entry);
  const rect = { x, y, w: size.w, h: size.h };
  ctx.rects.set(entry.path, rect);

  const horizontal = node.kind === "stack" && node.axis === "horizontal";
  const children: LayoutTree[] = [];
  let offset = 0;
  for (const child of childEntries(ctx.pass, entry)) {
    const childSize = sizeOf(ctx.pass, child);
    const tree = horizontal
      ? placeNode(ctx, child, x + offset, y)
      : placeNode(ctx, child, x, y + offset);
    children.push(tree);
    offset += horizontal ? childSize.w : childSize.h;
  }

  return { node: entry.node, path: entry.path, rect, children: Object.freeze(children) };
}
