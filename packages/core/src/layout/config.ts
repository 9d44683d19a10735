/**
 * packages/core/src/layout/config.ts — Layout pass configuration.
 */

import { LayoutError } from "../errors.js";
import type { MeasurableNode } from "../widgets/types.js";
import { DEV_MODE, type LayoutDiagnostic } from "./diagnostics.js";
import { createPlainTextMeasure } from "./textMeasure.js";
import type { Size } from "./types.js";
import { DEFAULT_MAX_DEPTH, MAX_DEPTH_LIMIT } from "./validateTree.js";

/**
 * Measurement collaborator for leaf content. Receives the leaf and the width
 * available to it (possibly unbounded) and returns its natural size. Throw a
 * `MeasurementError` when the leaf cannot be sized.
 */
export type MeasureFn = (node: MeasurableNode, availableWidth: number) => Size;

export type LayoutConfig = Readonly<{
  /** Leaf measurement. Default: one cell per code point with word wrap. */
  measure?: MeasureFn;
  /** Maximum nesting depth accepted by validation. Default 500, at most 1000. */
  maxDepth?: number;
  /** Print diagnostics with console.warn outside production. */
  warnings?: boolean;
  /** Called once per diagnostic, in the order they arise. */
  onDiagnostic?: ((diagnostic: LayoutDiagnostic) => void) | undefined;
}>;

export type ResolvedLayoutConfig = Readonly<{
  measure: MeasureFn;
  maxDepth: number;
  warnings: boolean;
  onDiagnostic: ((diagnostic: LayoutDiagnostic) => void) | undefined;
}>;

const DEFAULT_CONFIG: ResolvedLayoutConfig = Object.freeze({
  measure: createPlainTextMeasure(),
  maxDepth: DEFAULT_MAX_DEPTH,
  warnings: DEV_MODE,
  onDiagnostic: undefined,
});

function invalidConfig(detail: string): never {
  throw new LayoutError("LAYOUT_INVALID_CONFIG", detail);
}

function requirePositiveInt(name: string, v: number, max: number): number {
  if (!Number.isInteger(v) || v <= 0 || v > max) {
    invalidConfig(`${name} must be a positive integer <= ${max}`);
  }
  return v;
}

/** Apply defaults to user-provided config, validating all values. */
export function resolveLayoutConfig(config: LayoutConfig | undefined): ResolvedLayoutConfig {
  if (!config) return DEFAULT_CONFIG;
  if (config.measure !== undefined && typeof config.measure !== "function") {
    invalidConfig("measure must be a function");
  }
  if (config.warnings !== undefined && typeof config.warnings !== "boolean") {
    invalidConfig("warnings must be a boolean");
  }
  const measure = config.measure ?? DEFAULT_CONFIG.measure;
  const maxDepth =
    config.maxDepth === undefined
      ? DEFAULT_CONFIG.maxDepth
      : requirePositiveInt("maxDepth", config.maxDepth, MAX_DEPTH_LIMIT);
  const warnings = config.warnings ?? DEFAULT_CONFIG.warnings;
  const onDiagnostic =
    typeof config.onDiagnostic === "function" ? config.onDiagnostic : undefined;

  return Object.freeze({ measure, maxDepth, warnings, onDiagnostic });
}
