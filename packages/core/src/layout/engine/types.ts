import type { WidgetNode } from "../../widgets/types.js";
import type { MeasureFn } from "../config.js";
import type { LayoutDiagnostic } from "../diagnostics.js";
import type { FillDirective } from "../fill.js";
import type { NodePath, Rect, Size } from "../types.js";
import type { ArenaEntry, LayoutArena } from "../validateTree.js";
import type { LayoutResult } from "./result.js";

/**
 * Tree of layout results mirroring the widget tree.
 * Each node contains its positioned rectangle and children.
 */
export type LayoutTree = Readonly<{
  node: WidgetNode;
  path: NodePath;
  rect: Rect;
  children: readonly LayoutTree[];
}>;

/** Everything one layout pass produces. */
export type LayoutOutput = Readonly<{
  tree: LayoutTree;
  /** Absolute rect per node path, in pre-order. */
  rects: ReadonlyMap<NodePath, Rect>;
  fills: readonly FillDirective[];
  diagnostics: readonly LayoutDiagnostic[];
}>;

/**
 * Per-pass scratch state. Sizes are indexed by arena id; nothing here
 * outlives the pass that created it.
 */
export type PassContext = Readonly<{
  arena: LayoutArena;
  widths: number[];
  heights: number[];
  measure: MeasureFn;
  diagnostics: LayoutDiagnostic[];
}>;

/** Size the node at `id` (and its subtree) against an available extent. */
export type MeasureNodeFn = (
  ctx: PassContext,
  entry: ArenaEntry,
  maxW: number,
  maxH: number,
) => LayoutResult<Size>;

/** Position the node at `id` (and its subtree) with its top-left at (x, y). */
export type PlaceNodeFn = (
  ctx: PlaceContext,
  entry: ArenaEntry,
  x: number,
  y: number,
) => LayoutTree;

export type PlaceContext = Readonly<{
  pass: PassContext;
  rects: Map<NodePath, Rect>;
  fills: FillDirective[];
}>;
