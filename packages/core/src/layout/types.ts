/**
 * packages/core/src/layout/types.ts — Layout primitive type definitions.
 *
 * All coordinates are in terminal cell units.
 */

/** Rectangle with position (x,y) and dimensions (w,h) in terminal cells. */
export type Rect = Readonly<{ x: number; y: number; w: number; h: number }>;

/** Size dimensions (width and height) in terminal cells. */
export type Size = Readonly<{ w: number; h: number }>;

/** Stacking axis. */
export type Axis = "horizontal" | "vertical";

/** Sentinel for a dimension with no upper bound (e.g. a scrolling context). */
export const UNBOUNDED = Number.POSITIVE_INFINITY;

/**
 * Outer budget for a layout pass. Each dimension is a non-negative integer
 * or {@link UNBOUNDED}.
 */
export type Extent = Readonly<{ w: number; h: number }>;

/** Tree-path identity of a node: "0" for the root, "0.2.1" for descendants. */
export type NodePath = string;
