/**
 * packages/core/src/layout/diagnostics.ts — Non-fatal layout conditions.
 *
 * Overflow, axis mismatches and unbounded expands never abort a pass; they
 * degrade to a clamped size and are reported here instead.
 */

import type { NodePath } from "./types.js";

export type LayoutDiagnosticKind = "overflow" | "axisMismatch" | "unboundedExpand";

export type LayoutDiagnostic = Readonly<{
  kind: LayoutDiagnosticKind;
  path: NodePath;
  detail: string;
}>;

const NODE_ENV =
  (globalThis as { process?: { env?: { NODE_ENV?: string } } }).process?.env?.NODE_ENV ??
  "development";

export const DEV_MODE = NODE_ENV !== "production";

export function warnDev(message: string): void {
  if (!DEV_MODE) return;
  const c = (globalThis as { console?: { warn?: (msg: string) => void } }).console;
  c?.warn?.(message);
}

export function formatDiagnostic(d: LayoutDiagnostic): string {
  return `[cellplan] layout ${d.kind} at ${d.path}: ${d.detail}`;
}
