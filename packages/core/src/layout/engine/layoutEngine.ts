/**
 * packages/core/src/layout/engine/layoutEngine.ts — Widget tree layout computation.
 *
 * Computes an absolute rect for every node of a resolved widget tree:
 *
 *   1. validate the tree and flatten it into an arena (pre-order ids)
 *   2. size every node bottom-up against the extent its parent offers;
 *      stacks split their leftover between expand/spacer children here
 *   3. assign origins top-down and collect fill directives
 *
 * Invariants:
 *   - A pass is pure: no module state is read or written
 *   - A pass is atomic: on failure no rects are returned
 *   - Sizes and origins are non-negative integers
 */

import { LayoutError } from "../../errors.js";
import type { WidgetNode } from "../../widgets/types.js";
import { type LayoutConfig, type ResolvedLayoutConfig, resolveLayoutConfig } from "../config.js";
import { formatDiagnostic, warnDev } from "../diagnostics.js";
import type { FillDirective } from "../fill.js";
import { measureBoxKinds, placeBoxKinds } from "../kinds/box.js";
import { placeExpandKind, sizeExpandBox } from "../kinds/expand.js";
import { measureLeafKind, placeLeafKind } from "../kinds/leaf.js";
import { measureOverlayKind, placeOverlayKind } from "../kinds/overlays.js";
import { measureStackKind, placeStackKind } from "../kinds/stack.js";
import { type Extent, type NodePath, type Rect, type Size, UNBOUNDED } from "../types.js";
import { type ArenaEntry, validateWidgetTree } from "../validateTree.js";
import { isCellCount } from "./bounds.js";
import { type LayoutResult, fatal, ok } from "./result.js";
import type { LayoutOutput, LayoutTree, PassContext, PlaceContext } from "./types.js";

function measureNode(
  ctx: PassContext,
  entry: ArenaEntry,
  maxW: number,
  maxH: number,
): LayoutResult<Size> {
  switch (entry.node.kind) {
    case "stack":
      return measureStackKind(ctx, entry, maxW, maxH, measureNode);
    case "zstack":
      return measureOverlayKind(ctx, entry, maxW, maxH, measureNode);
    case "border":
    case "padding":
    case "container":
    case "canvas":
    case "componentSlot":
      return measureBoxKinds(ctx, entry, maxW, maxH, measureNode);
    case "text":
    case "span":
      return measureLeafKind(ctx, entry, maxW, maxH);
    case "expand":
    case "spacer":
      // Not a stack child: the box is whatever the parent offers.
      return sizeExpandBox(ctx, entry, maxW, maxH, measureNode);
  }
}

function placeNode(ctx: PlaceContext, entry: ArenaEntry, x: number, y: number): LayoutTree {
  switch (entry.node.kind) {
    case "stack":
      return placeStackKind(ctx, entry, x, y, placeNode);
    case "zstack":
      return placeOverlayKind(ctx, entry, x, y, placeNode);
    case "border":
    case "padding":
    case "container":
    case "canvas":
    case "componentSlot":
      return placeBoxKinds(ctx, entry, x, y, placeNode);
    case "text":
    case "span":
      return placeLeafKind(ctx, entry, x, y);
    case "expand":
    case "spacer":
      return placeExpandKind(ctx, entry, x, y, placeNode);
  }
}

function isExtentDimension(n: unknown): boolean {
  return n === UNBOUNDED || isCellCount(n);
}

function resolveConfigResult(config: LayoutConfig | undefined): LayoutResult<ResolvedLayoutConfig> {
  try {
    return ok(resolveLayoutConfig(config));
  } catch (err) {
    if (err instanceof LayoutError) return fatal(err.code, err.message);
    throw err;
  }
}

/**
 * Lay out `root` inside `extent`.
 *
 * The root is placed at (0,0) with its computed size, which never exceeds a
 * bounded extent dimension; it is not stretched to the extent.
 *
 * @param extent - Outer budget; either dimension may be {@link UNBOUNDED}
 * @returns All rects, fill directives and diagnostics, or a single fatal error
 */
export function computeLayout(
  root: WidgetNode,
  extent: Extent,
  config?: LayoutConfig,
): LayoutResult<LayoutOutput> {
  const cfgRes = resolveConfigResult(config);
  if (!cfgRes.ok) return cfgRes;
  const cfg = cfgRes.value;

  if (!isExtentDimension(extent.w) || !isExtentDimension(extent.h)) {
    return fatal(
      "LAYOUT_INVALID_EXTENT",
      `extent must be integers >= 0 or UNBOUNDED, got ${String(extent.w)}x${String(extent.h)}`,
    );
  }

  const arenaRes = validateWidgetTree(root, cfg.maxDepth);
  if (!arenaRes.ok) return arenaRes;
  const arena = arenaRes.value;
  const rootEntry = arena.entries[0];
  if (!rootEntry) return fatal("LAYOUT_INVALID_TREE", "empty arena");

  const pass: PassContext = {
    arena,
    widths: new Array<number>(arena.entries.length).fill(0),
    heights: new Array<number>(arena.entries.length).fill(0),
    measure: cfg.measure,
    diagnostics: [],
  };

  const sized = measureNode(pass, rootEntry, extent.w, extent.h);
  if (!sized.ok) return sized;

  const rects = new Map<NodePath, Rect>();
  const fills: FillDirective[] = [];
  const tree = placeNode({ pass, rects, fills }, rootEntry, 0, 0);

  const diagnostics = Object.freeze(pass.diagnostics.slice());
  for (const d of diagnostics) {
    cfg.onDiagnostic?.(d);
    if (cfg.warnings) warnDev(formatDiagnostic(d));
  }

  return ok(
    Object.freeze({
      tree,
      rects,
      fills: Object.freeze(fills),
      diagnostics,
    }),
  );
}

/** Throwing variant of {@link computeLayout}. */
export function layoutOrThrow(
  root: WidgetNode,
  extent: Extent,
  config?: LayoutConfig,
): LayoutOutput {
  const res = computeLayout(root, extent, config);
  if (!res.ok) throw LayoutError.fromFatal(res.fatal);
  return res.value;
}
