import type { LayoutDiagnosticKind } from "../diagnostics.js";
import type { NodePath, Size } from "../types.js";
import type { ArenaEntry } from "../validateTree.js";
import type { PassContext } from "./types.js";

export function childEntries(ctx: PassContext, entry: ArenaEntry): ArenaEntry[] {
  const out: ArenaEntry[] = [];
  for (const id of entry.children) {
    const child = ctx.arena.entries[id];
    if (child) out.push(child);
  }
  return out;
}

export function firstChild(ctx: PassContext, entry: ArenaEntry): ArenaEntry | null {
  const id = entry.children[0];
  return id === undefined ? null : (ctx.arena.entries[id] ?? null);
}

export function setSize(ctx: PassContext, entry: ArenaEntry, size: Size): Size {
  ctx.widths[entry.id] = size.w;
  ctx.heights[entry.id] = size.h;
  return size;
}

export function sizeOf(ctx: PassContext, entry: ArenaEntry): Size {
  return { w: ctx.widths[entry.id] ?? 0, h: ctx.heights[entry.id] ?? 0 };
}

export function report(
  ctx: PassContext,
  kind: LayoutDiagnosticKind,
  path: NodePath,
  detail: string,
): void {
  ctx.diagnostics.push(Object.freeze({ kind, path, detail }));
}

/** Clamp a natural size into the extent, reporting any loss as overflow. */
export function clampReported(
  ctx: PassContext,
  entry: ArenaEntry,
  natural: Size,
  maxW: number,
  maxH: number,
): Size {
  const w = Math.max(0, Math.min(natural.w, maxW));
  const h = Math.max(0, Math.min(natural.h, maxH));
  if (w < natural.w || h < natural.h) {
    report(
      ctx,
      "overflow",
      entry.path,
      `${entry.node.kind} wants ${natural.w}x${natural.h}, clamped to ${w}x${h}`,
    );
  }
  return { w, h };
}
