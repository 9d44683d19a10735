/**
 * packages/core/src/layout/fill.ts — Fill contract for expand leftovers.
 *
 * The engine only reports which cells an expand leaves uncovered. Painting
 * belongs to the renderer; the helpers below describe the tiling it must
 * follow: the pattern repeats left to right from the start of every row and
 * is truncated at the right edge. Cells under the child rect are skipped.
 */

import { contains } from "./hitTest.js";
import type { NodePath, Rect } from "./types.js";

export type FillDirective = Readonly<{
  path: NodePath;
  /** The expand's assigned rect. */
  rect: Rect;
  /** The child's rect, or null when the expand has no child. */
  childRect: Rect | null;
  pattern: string;
}>;

export type FillCellVisitor = (x: number, y: number, glyph: string) => void;

/** Visit every uncovered cell in row-major order with the glyph tiled there. */
export function forEachFillCell(directive: FillDirective, visit: FillCellVisitor): void {
  const glyphs = Array.from(directive.pattern);
  if (glyphs.length === 0) return;
  const { rect, childRect } = directive;
  for (let row = 0; row < rect.h; row++) {
    const y = rect.y + row;
    for (let col = 0; col < rect.w; col++) {
      const x = rect.x + col;
      if (childRect && contains(childRect, x, y)) continue;
      visit(x, y, glyphs[col % glyphs.length] ?? " ");
    }
  }
}

/**
 * One string per row of the expand rect, relative to its origin. Covered
 * cells are spaces.
 */
export function resolveFillRows(directive: FillDirective): readonly string[] {
  const { rect } = directive;
  const rows: string[][] = [];
  for (let row = 0; row < rect.h; row++) rows.push(new Array<string>(rect.w).fill(" "));
  forEachFillCell(directive, (x, y, glyph) => {
    const line = rows[y - rect.y];
    if (line) line[x - rect.x] = glyph;
  });
  return Object.freeze(rows.map((cells) => cells.join("")));
}

/** Number of cells the renderer must paint for a directive. */
export function countFillCells(directive: FillDirective): number {
  let n = 0;
  forEachFillCell(directive, () => {
    n++;
  });
  return n;
}
