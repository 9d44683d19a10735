/**
 * packages/core/src/widgets/ui.ts — Widget factory functions.
 *
 * Builds typed WidgetNode trees without spelling out the discriminated union
 * by hand. Factories do not validate; computeLayout does that before sizing.
 */

import type { Axis } from "../layout/types.js";
import type {
  Attributes,
  BorderNode,
  CanvasNode,
  ComponentSlotNode,
  ContainerNode,
  ExpandNode,
  PaddingNode,
  SpacerNode,
  SpanNode,
  StackNode,
  TextNode,
  WidgetNode,
  ZStackNode,
} from "./types.js";

export type PaddingProps = Readonly<{
  /** Applied to every side not given explicitly. */
  all?: number;
  left?: number;
  right?: number;
  top?: number;
  bottom?: number;
}>;

export type SizedProps = Readonly<{ width?: number; height?: number }>;

export type ExpandProps = Readonly<{ factor?: number; axis?: Axis; fill?: string }>;

export type SpacerProps = Readonly<{ factor?: number }>;

function only(child: WidgetNode | undefined): readonly WidgetNode[] {
  return Object.freeze(child === undefined ? [] : [child]);
}

function stack(axis: Axis, children: readonly WidgetNode[]): StackNode {
  return { kind: "stack", axis, children: Object.freeze([...children]) };
}

export const ui = {
  vstack(children: readonly WidgetNode[] = []): StackNode {
    return stack("vertical", children);
  },

  hstack(children: readonly WidgetNode[] = []): StackNode {
    return stack("horizontal", children);
  },

  zstack(children: readonly WidgetNode[] = []): ZStackNode {
    return { kind: "zstack", children: Object.freeze([...children]) };
  },

  border(child?: WidgetNode): BorderNode {
    return { kind: "border", children: only(child) };
  },

  padding(props: PaddingProps, child?: WidgetNode): PaddingNode {
    const all = props.all ?? 0;
    return {
      kind: "padding",
      left: props.left ?? all,
      right: props.right ?? all,
      top: props.top ?? all,
      bottom: props.bottom ?? all,
      children: only(child),
    };
  },

  container(props: SizedProps = {}, child?: WidgetNode): ContainerNode {
    return { kind: "container", ...props, children: only(child) };
  },

  canvas(props: SizedProps = {}, child?: WidgetNode): CanvasNode {
    return { kind: "canvas", ...props, children: only(child) };
  },

  text(text: string, spans: readonly SpanNode[] = []): TextNode {
    return { kind: "text", text, children: Object.freeze([...spans]) };
  },

  span(text: string): SpanNode {
    return { kind: "span", text, children: [] };
  },

  /** Claims a share of the parent stack's leftover space. Default factor 1. */
  expand(props: ExpandProps = {}, child?: WidgetNode): ExpandNode {
    return { kind: "expand", ...props, factor: props.factor ?? 1, children: only(child) };
  },

  /** Like expand, but only gets what expands leave. Default factor 1. */
  spacer(props: SpacerProps = {}): SpacerNode {
    return { kind: "spacer", factor: props.factor ?? 1, children: [] };
  },

  slot(name?: string, child?: WidgetNode): ComponentSlotNode {
    return name === undefined
      ? { kind: "componentSlot", children: only(child) }
      : { kind: "componentSlot", name, children: only(child) };
  },

  /** Attach resolved attributes to a node. */
  withAttributes<T extends WidgetNode>(node: T, attributes: Attributes): T {
    return { ...node, attributes: Object.freeze({ ...attributes }) };
  },
} as const;
