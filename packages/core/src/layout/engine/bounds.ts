import type { Axis, Size } from "../types.js";

export function clampNonNegative(n: number): number {
  return n <= 0 ? 0 : n;
}

/** Clamp `n` into [0, max]; `max` may be unbounded. */
export function clampToExtent(n: number, max: number): number {
  return clampNonNegative(Math.min(n, max));
}

export function isBounded(n: number): boolean {
  return Number.isFinite(n);
}

/** Subtract an inset from an extent, keeping unbounded dimensions unbounded. */
export function shrinkExtent(extent: number, inset: number): number {
  if (!isBounded(extent)) return extent;
  return clampNonNegative(extent - inset);
}

export function mainOf(size: Size, axis: Axis): number {
  return axis === "horizontal" ? size.w : size.h;
}

export function crossOf(size: Size, axis: Axis): number {
  return axis === "horizontal" ? size.h : size.w;
}

export function sizeFromAxis(axis: Axis, main: number, cross: number): Size {
  return axis === "horizontal" ? { w: main, h: cross } : { w: cross, h: main };
}

export function isCellCount(n: unknown): n is number {
  return typeof n === "number" && Number.isInteger(n) && n >= 0;
}
