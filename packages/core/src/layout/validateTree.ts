/**
 * packages/core/src/layout/validateTree.ts — Tree-construction validation.
 *
 * Checks every node's typed fields and child arity, then flattens the tree
 * into a pre-order arena. Layout passes index per-pass arrays by arena id and
 * never write onto the input nodes.
 *
 * Validation rules:
 *   - factor must be an integer >= 0 (LAYOUT_INVALID_FACTOR)
 *   - sizes and insets must be integers >= 0
 *   - border/padding/container/canvas/expand/componentSlot take <= 1 child
 *   - spacer and span take no children; text takes only spans
 *   - nesting deeper than maxDepth is rejected
 */

import type { LayoutErrorCode } from "../errors.js";
import type { WidgetNode } from "../widgets/types.js";
import { isCellCount } from "./engine/bounds.js";
import { type LayoutResult, fatal, ok } from "./engine/result.js";
import type { Axis, NodePath } from "./types.js";

export const DEFAULT_MAX_DEPTH = 500;

/** Deepest nesting the recursive sizing and placement passes accept. */
export const MAX_DEPTH_LIMIT = 1000;

export type ArenaEntry = Readonly<{
  id: number;
  node: WidgetNode;
  path: NodePath;
  children: readonly number[];
  depth: number;
  /** Axis of the nearest ancestor stack, if any. */
  stackAxis: Axis | null;
}>;

/** Pre-order flattening of a validated tree; `entries[0]` is the root. */
export type LayoutArena = Readonly<{ entries: readonly ArenaEntry[] }>;

type MutableEntry = {
  id: number;
  node: WidgetNode;
  path: NodePath;
  children: number[];
  depth: number;
  stackAxis: Axis | null;
};

type Frame = Readonly<{
  node: unknown;
  path: NodePath;
  parent: number;
  depth: number;
  stackAxis: Axis | null;
}>;

const KNOWN_KINDS: ReadonlySet<string> = new Set([
  "stack",
  "zstack",
  "border",
  "padding",
  "container",
  "canvas",
  "text",
  "span",
  "expand",
  "spacer",
  "componentSlot",
]);

const SINGLE_CHILD_KINDS: ReadonlySet<string> = new Set([
  "border",
  "padding",
  "container",
  "canvas",
  "expand",
  "componentSlot",
]);

function describeReceived(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return `${typeof value} (${String(value)})`;
}

function invalid(
  path: NodePath,
  detail: string,
  code: LayoutErrorCode = "LAYOUT_INVALID_TREE",
): LayoutResult<never> {
  return fatal(code, `${path}: ${detail}`, path);
}

function isAxis(v: unknown): v is Axis {
  return v === "horizontal" || v === "vertical";
}

function isWidgetNode(v: unknown): v is WidgetNode {
  return (
    typeof v === "object" &&
    v !== null &&
    "kind" in v &&
    typeof v.kind === "string" &&
    "children" in v &&
    Array.isArray(v.children)
  );
}

function checkCells(path: NodePath, kind: string, name: string, v: unknown): LayoutResult<true> {
  if (!isCellCount(v)) {
    return invalid(path, `${kind}.${name} must be an integer >= 0, got ${describeReceived(v)}`);
  }
  return ok(true);
}

function checkOptionalCells(
  path: NodePath,
  kind: string,
  name: string,
  v: unknown,
): LayoutResult<true> {
  return v === undefined ? ok(true) : checkCells(path, kind, name, v);
}

function checkFactor(path: NodePath, kind: string, v: unknown): LayoutResult<true> {
  if (!isCellCount(v)) {
    return invalid(
      path,
      `${kind}.factor must be an integer >= 0, got ${describeReceived(v)}`,
      "LAYOUT_INVALID_FACTOR",
    );
  }
  return ok(true);
}

function checkNode(node: WidgetNode, path: NodePath): LayoutResult<true> {
  if (!KNOWN_KINDS.has(node.kind)) {
    return invalid(path, `unknown widget kind "${String(node.kind)}"`);
  }
  const childCount = node.children.length;
  if (SINGLE_CHILD_KINDS.has(node.kind) && childCount > 1) {
    return invalid(path, `${node.kind} accepts at most one child, got ${childCount}`);
  }

  switch (node.kind) {
    case "stack":
      if (!isAxis(node.axis)) {
        return invalid(path, `stack.axis must be "horizontal" or "vertical"`);
      }
      return ok(true);
    case "zstack":
    case "border":
    case "componentSlot":
      return ok(true);
    case "padding": {
      for (const side of ["left", "right", "top", "bottom"] as const) {
        const res = checkCells(path, "padding", side, node[side]);
        if (!res.ok) return res;
      }
      return ok(true);
    }
    case "container":
    case "canvas": {
      const w = checkOptionalCells(path, node.kind, "width", node.width);
      if (!w.ok) return w;
      return checkOptionalCells(path, node.kind, "height", node.height);
    }
    case "text": {
      if (typeof node.text !== "string") return invalid(path, "text.text must be a string");
      for (const child of node.children) {
        if (!isWidgetNode(child) || child.kind !== "span") {
          return invalid(path, "text accepts only span children");
        }
      }
      return ok(true);
    }
    case "span":
      if (typeof node.text !== "string") return invalid(path, "span.text must be a string");
      if (childCount > 0) return invalid(path, "span accepts no children");
      return ok(true);
    case "expand": {
      const factorRes = checkFactor(path, "expand", node.factor);
      if (!factorRes.ok) return factorRes;
      if (node.axis !== undefined && !isAxis(node.axis)) {
        return invalid(path, `expand.axis must be "horizontal" or "vertical"`);
      }
      if (node.fill !== undefined && typeof node.fill !== "string") {
        return invalid(path, "expand.fill must be a string");
      }
      return ok(true);
    }
    case "spacer": {
      const factorRes = checkFactor(path, "spacer", node.factor);
      if (!factorRes.ok) return factorRes;
      if (childCount > 0) return invalid(path, "spacer accepts no children");
      return ok(true);
    }
    default:
      return invalid(path, "unknown widget kind");
  }
}

/**
 * Validate `root` and flatten it into a pre-order arena.
 */
export function validateWidgetTree(
  root: WidgetNode,
  maxDepth: number = DEFAULT_MAX_DEPTH,
): LayoutResult<LayoutArena> {
  const entries: MutableEntry[] = [];
  const stack: Frame[] = [{ node: root, path: "0", parent: -1, depth: 0, stackAxis: null }];

  while (stack.length > 0) {
    const frame = stack.pop();
    if (!frame) continue;
    const { node, path, parent, depth, stackAxis } = frame;

    if (!isWidgetNode(node)) {
      return invalid(path, `expected a widget node, got ${describeReceived(node)}`);
    }
    if (depth > maxDepth) {
      return invalid(path, `nesting exceeds maxDepth ${maxDepth}`, "LAYOUT_DEPTH_EXCEEDED");
    }
    const checked = checkNode(node, path);
    if (!checked.ok) return checked;

    const id = entries.length;
    entries.push({ id, node, path, children: [], depth, stackAxis });
    if (parent >= 0) entries[parent]?.children.push(id);

    const childStackAxis = node.kind === "stack" ? node.axis : stackAxis;
    for (let i = node.children.length - 1; i >= 0; i--) {
      stack.push({
        node: node.children[i],
        path: `${path}.${String(i)}`,
        parent: id,
        depth: depth + 1,
        stackAxis: childStackAxis,
      });
    }
  }

  return ok(Object.freeze({ entries: Object.freeze(entries.map((e) => Object.freeze(e))) }));
}

/** Axis an expand/spacer distributes along: its own axis, else the nearest stack's. */
export function effectiveAxis(entry: ArenaEntry): Axis | null {
  const node = entry.node;
  if (node.kind === "expand" && node.axis !== undefined) return node.axis;
  return entry.stackAxis;
}
