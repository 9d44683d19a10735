import { MeasurementError } from "../../errors.js";
import type { MeasurableNode } from "../../widgets/types.js";
import { childEntries, clampReported, setSize, sizeOf } from "../engine/pass.js";
import { type LayoutResult, fatal, ok } from "../engine/result.js";
import type { LayoutTree, PassContext, PlaceContext } from "../engine/types.js";
import type { Size } from "../types.js";
import type { ArenaEntry } from "../validateTree.js";

function isCellDimension(v: unknown): v is number {
  return typeof v === "number" && Number.isFinite(v) && v >= 0;
}

function isNaturalSize(v: unknown): v is Size {
  return (
    typeof v === "object" &&
    v !== null &&
    "w" in v &&
    isCellDimension(v.w) &&
    "h" in v &&
    isCellDimension(v.h)
  );
}

/**
 * Ask the collaborator for a leaf's natural size. Fractional answers round up
 * to whole cells; anything else malformed fails the pass.
 */
export function measureWithCollaborator(
  ctx: PassContext,
  entry: ArenaEntry,
  node: MeasurableNode,
  availableWidth: number,
): LayoutResult<Size> {
  let natural: unknown;
  try {
    natural = ctx.measure(node, availableWidth);
  } catch (err) {
    const detail =
      err instanceof MeasurementError
        ? err.message
        : `measure threw: ${err instanceof Error ? err.message : String(err)}`;
    return fatal("LAYOUT_MEASUREMENT_ERROR", `${entry.path}: ${detail}`, entry.path);
  }
  if (!isNaturalSize(natural)) {
    return fatal(
      "LAYOUT_MEASUREMENT_ERROR",
      `${entry.path}: measure returned an invalid size for <${node.kind}>`,
      entry.path,
    );
  }
  return ok({ w: Math.ceil(natural.w), h: Math.ceil(natural.h) });
}

/** Text and standalone spans. Spans nested in a text share its size. */
export function measureLeafKind(
  ctx: PassContext,
  entry: ArenaEntry,
  maxW: number,
  maxH: number,
): LayoutResult<Size> {
  const node = entry.node;
  if (node.kind !== "text" && node.kind !== "span") {
    return fatal("LAYOUT_INVALID_TREE", "measureLeafKind: unexpected node kind", entry.path);
  }
  const natural = measureWithCollaborator(ctx, entry, node, maxW);
  if (!natural.ok) return natural;
  const size = setSize(ctx, entry, clampReported(ctx, entry, natural.value, maxW, maxH));
  for (const span of childEntries(ctx, entry)) setSize(ctx, span, size);
  return ok(size);
}

export function placeLeafKind(
  ctx: PlaceContext,
  entry: ArenaEntry,
  x: number,
  y: number,
): LayoutTree {
  const size = sizeOf(ctx.pass, entry);
  const rect = { x, y, w: size.w, h: size.h };
  ctx.rects.set(entry.path, rect);
  const children: LayoutTree[] = [];
  for (const span of childEntries(ctx.pass, entry)) {
    ctx.rects.set(span.path, rect);
    children.push({ node: span.node, path: span.path, rect, children: Object.freeze([]) });
  }
  return { node: entry.node, path: entry.path, rect, children: Object.freeze(children) };
}
