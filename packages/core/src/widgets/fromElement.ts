/**
 * packages/core/src/widgets/fromElement.ts — Resolved element to typed node.
 *
 * The template layer hands over elements whose attributes are an untyped bag
 * of scalars. This is the one place those bags are read: each kind's fields
 * are lifted, defaulted and type-checked here, and layout only ever sees the
 * typed result.
 *
 * Attribute rules:
 *   - padding: `padding` sets every side, `left/right/top/bottom` override
 *   - container/canvas: `width`, `height`
 *   - expand: `factor` (default 1), `axis`, `fill`
 *   - spacer: `factor` (default 1)
 *   - axis accepts "horizontal"/"horz" and "vertical"/"vert"
 */

import { isCellCount } from "../layout/engine/bounds.js";
import { type LayoutResult, fatal, ok } from "../layout/engine/result.js";
import type { Axis } from "../layout/types.js";
import type { AttributeValue, Attributes, ResolvedElement, SpanNode, WidgetNode } from "./types.js";

const EMPTY_ATTRIBUTES: Attributes = Object.freeze({});

function invalidAttr(
  path: string,
  kind: string,
  name: string,
  expected: string,
  received: AttributeValue | undefined,
): LayoutResult<never> {
  const got = String(received);
  return fatal(
    name === "factor" ? "LAYOUT_INVALID_FACTOR" : "LAYOUT_INVALID_TREE",
    `${path}: invalid attribute "${name}" on <${kind}>: expected ${expected}, got ${got}`,
    path,
  );
}

function readCells(
  path: string,
  kind: string,
  attrs: Attributes,
  name: string,
): LayoutResult<number | undefined> {
  const v = attrs[name];
  if (v === undefined || v === null) return ok(undefined);
  if (!isCellCount(v)) return invalidAttr(path, kind, name, "an integer >= 0", v);
  return ok(v);
}

function readFactor(path: string, kind: string, attrs: Attributes): LayoutResult<number> {
  const res = readCells(path, kind, attrs, "factor");
  if (!res.ok) return res;
  return ok(res.value ?? 1);
}

function readAxis(path: string, kind: string, attrs: Attributes): LayoutResult<Axis | undefined> {
  const v = attrs.axis;
  if (v === undefined || v === null) return ok(undefined);
  if (v === "horizontal" || v === "horz") return ok("horizontal");
  if (v === "vertical" || v === "vert") return ok("vertical");
  return invalidAttr(path, kind, "axis", '"horizontal" or "vertical"', v);
}

function readString(
  path: string,
  kind: string,
  attrs: Attributes,
  name: string,
): LayoutResult<string | undefined> {
  const v = attrs[name];
  if (v === undefined || v === null) return ok(undefined);
  if (typeof v !== "string") return invalidAttr(path, kind, name, "a string", v);
  return ok(v);
}

function convertChildren(
  element: ResolvedElement,
  path: string,
): LayoutResult<readonly WidgetNode[]> {
  const out: WidgetNode[] = [];
  const children = element.children ?? [];
  for (let i = 0; i < children.length; i++) {
    const child = children[i];
    if (!child) continue;
    const res = convert(child, `${path}.${String(i)}`);
    if (!res.ok) return res;
    out.push(res.value);
  }
  return ok(Object.freeze(out));
}

function convertSized(
  kind: "container" | "canvas",
  attrs: Attributes,
  path: string,
  children: readonly WidgetNode[],
): LayoutResult<WidgetNode> {
  const width = readCells(path, kind, attrs, "width");
  if (!width.ok) return width;
  const height = readCells(path, kind, attrs, "height");
  if (!height.ok) return height;
  const dims = {
    ...(width.value === undefined ? {} : { width: width.value }),
    ...(height.value === undefined ? {} : { height: height.value }),
  };
  return ok<WidgetNode>(
    kind === "container"
      ? { kind: "container", attributes: attrs, children, ...dims }
      : { kind: "canvas", attributes: attrs, children, ...dims },
  );
}

function convertPadding(
  attrs: Attributes,
  path: string,
  children: readonly WidgetNode[],
): LayoutResult<WidgetNode> {
  const all = readCells(path, "padding", attrs, "padding");
  if (!all.ok) return all;
  const sides: Record<"left" | "right" | "top" | "bottom", number> = {
    left: 0,
    right: 0,
    top: 0,
    bottom: 0,
  };
  for (const side of ["left", "right", "top", "bottom"] as const) {
    const res = readCells(path, "padding", attrs, side);
    if (!res.ok) return res;
    sides[side] = res.value ?? all.value ?? 0;
  }
  return ok<WidgetNode>({ kind: "padding", attributes: attrs, children, ...sides });
}

function convertExpand(
  attrs: Attributes,
  path: string,
  children: readonly WidgetNode[],
): LayoutResult<WidgetNode> {
  const factor = readFactor(path, "expand", attrs);
  if (!factor.ok) return factor;
  const axis = readAxis(path, "expand", attrs);
  if (!axis.ok) return axis;
  const fill = readString(path, "expand", attrs, "fill");
  if (!fill.ok) return fill;
  return ok<WidgetNode>({
    kind: "expand",
    attributes: attrs,
    factor: factor.value,
    children,
    ...(axis.value === undefined ? {} : { axis: axis.value }),
    ...(fill.value === undefined ? {} : { fill: fill.value }),
  });
}

function convertText(
  element: ResolvedElement,
  attrs: Attributes,
  path: string,
  children: readonly WidgetNode[],
): LayoutResult<WidgetNode> {
  const spans: SpanNode[] = [];
  for (const child of children) {
    if (child.kind !== "span") {
      return fatal("LAYOUT_INVALID_TREE", `${path}: text accepts only span children`, path);
    }
    spans.push(child);
  }
  return ok<WidgetNode>({
    kind: "text",
    text: element.text ?? "",
    attributes: attrs,
    children: Object.freeze(spans),
  });
}

function convert(element: ResolvedElement, path: string): LayoutResult<WidgetNode> {
  const attrs = element.attributes ?? EMPTY_ATTRIBUTES;
  const childrenRes = convertChildren(element, path);
  if (!childrenRes.ok) return childrenRes;
  const children = childrenRes.value;

  switch (element.kind) {
    case "vstack":
      return ok<WidgetNode>({ kind: "stack", axis: "vertical", attributes: attrs, children });
    case "hstack":
      return ok<WidgetNode>({ kind: "stack", axis: "horizontal", attributes: attrs, children });
    case "zstack":
      return ok<WidgetNode>({ kind: "zstack", attributes: attrs, children });
    case "border":
      return ok<WidgetNode>({ kind: "border", attributes: attrs, children });
    case "padding":
      return convertPadding(attrs, path, children);
    case "container":
    case "canvas":
      return convertSized(element.kind, attrs, path, children);
    case "text":
      return convertText(element, attrs, path, children);
    case "span":
      if (children.length > 0) {
        return fatal("LAYOUT_INVALID_TREE", `${path}: span accepts no children`, path);
      }
      return ok<WidgetNode>({
        kind: "span",
        text: element.text ?? "",
        attributes: attrs,
        children: [],
      });
    case "expand":
      return convertExpand(attrs, path, children);
    case "spacer": {
      if (children.length > 0) {
        return fatal("LAYOUT_INVALID_TREE", `${path}: spacer accepts no children`, path);
      }
      const factor = readFactor(path, "spacer", attrs);
      if (!factor.ok) return factor;
      return ok<WidgetNode>({
        kind: "spacer",
        factor: factor.value,
        attributes: attrs,
        children: [],
      });
    }
    case "component": {
      const name = readString(path, "component", attrs, "name");
      if (!name.ok) return name;
      return ok<WidgetNode>({
        kind: "componentSlot",
        attributes: attrs,
        children,
        ...(name.value === undefined ? {} : { name: name.value }),
      });
    }
    default:
      return fatal("LAYOUT_INVALID_TREE", `${path}: unknown element kind "${element.kind}"`, path);
  }
}

/**
 * Lift a resolved template element into a typed widget tree. Paths in error
 * details use the same dotted form as layout output ("0", "0.1", ...).
 */
export function widgetFromElement(element: ResolvedElement): LayoutResult<WidgetNode> {
  return convert(element, "0");
}
