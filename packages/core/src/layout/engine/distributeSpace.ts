/**
 * packages/core/src/layout/engine/distributeSpace.ts — Stack leftover distribution.
 *
 * Splits a stack's remaining main-axis cells between its expand and spacer
 * children. Expands are served first from the whole pool; spacers share
 * whatever the expands left, which is nothing whenever any expand carries a
 * positive factor.
 */

import { distributeInteger } from "./distributeInteger.js";

export type SpaceClaim = Readonly<{
  /** "expand" claims before "spacer". */
  role: "expand" | "spacer";
  factor: number;
}>;

export type SpaceDistribution = Readonly<{
  /** Main-axis size per claim, in input order. */
  sizes: readonly number[];
  /** Cells handed to expands. */
  expandTotal: number;
  /** Cells handed to spacers. */
  spacerTotal: number;
}>;

function sum(values: readonly number[]): number {
  let total = 0;
  for (let i = 0; i < values.length; i++) total += values[i] ?? 0;
  return total;
}

export function distributeStackSpace(
  remaining: number,
  claims: readonly SpaceClaim[],
): SpaceDistribution {
  const sizes = new Array<number>(claims.length).fill(0);
  const expandSlots: number[] = [];
  const expandFactors: number[] = [];
  const spacerSlots: number[] = [];
  const spacerFactors: number[] = [];

  for (let i = 0; i < claims.length; i++) {
    const claim = claims[i];
    if (!claim) continue;
    if (claim.role === "expand") {
      expandSlots.push(i);
      expandFactors.push(claim.factor);
    } else {
      spacerSlots.push(i);
      spacerFactors.push(claim.factor);
    }
  }

  const expandShares = distributeInteger(remaining, expandFactors);
  const expandTotal = sum(expandShares);
  const remainingAfterExpands = Math.max(0, remaining - expandTotal);
  const spacerShares = distributeInteger(remainingAfterExpands, spacerFactors);

  for (let i = 0; i < expandSlots.length; i++) {
    sizes[expandSlots[i] ?? 0] = expandShares[i] ?? 0;
  }
  for (let i = 0; i < spacerSlots.length; i++) {
    sizes[spacerSlots[i] ?? 0] = spacerShares[i] ?? 0;
  }

  return Object.freeze({
    sizes: Object.freeze(sizes),
    expandTotal,
    spacerTotal: sum(spacerShares),
  });
}
