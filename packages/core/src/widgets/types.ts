/**
 * packages/core/src/widgets/types.ts — Widget tree node types.
 *
 * Nodes arrive fully resolved: no bindings, expressions or theme tokens
 * remain. Each kind is a closed variant with typed fields; free-form
 * attributes are carried along for collaborators but never read by layout.
 */

import type { Axis } from "../layout/types.js";

/** Scalar attribute value after upstream evaluation. */
export type AttributeValue = string | number | boolean | null;

export type Attributes = Readonly<Record<string, AttributeValue>>;

type NodeBase = Readonly<{
  attributes?: Attributes;
}>;

export type StackNode = NodeBase &
  Readonly<{ kind: "stack"; axis: Axis; children: readonly WidgetNode[] }>;

export type ZStackNode = NodeBase & Readonly<{ kind: "zstack"; children: readonly WidgetNode[] }>;

export type BorderNode = NodeBase & Readonly<{ kind: "border"; children: readonly WidgetNode[] }>;

export type PaddingNode = NodeBase &
  Readonly<{
    kind: "padding";
    left: number;
    right: number;
    top: number;
    bottom: number;
    children: readonly WidgetNode[];
  }>;

export type ContainerNode = NodeBase &
  Readonly<{
    kind: "container";
    width?: number;
    height?: number;
    children: readonly WidgetNode[];
  }>;

export type CanvasNode = NodeBase &
  Readonly<{
    kind: "canvas";
    width?: number;
    height?: number;
    children: readonly WidgetNode[];
  }>;

export type SpanNode = NodeBase & Readonly<{ kind: "span"; text: string; children: readonly [] }>;

export type TextNode = NodeBase &
  Readonly<{ kind: "text"; text: string; children: readonly WidgetNode[] }>;

export type ExpandNode = NodeBase &
  Readonly<{
    kind: "expand";
    factor: number;
    axis?: Axis;
    fill?: string;
    children: readonly WidgetNode[];
  }>;

export type SpacerNode = NodeBase &
  Readonly<{ kind: "spacer"; factor: number; children: readonly [] }>;

/** Placeholder where a component's rendered root is mounted. */
export type ComponentSlotNode = NodeBase &
  Readonly<{ kind: "componentSlot"; name?: string; children: readonly WidgetNode[] }>;

export type WidgetNode =
  | StackNode
  | ZStackNode
  | BorderNode
  | PaddingNode
  | ContainerNode
  | CanvasNode
  | TextNode
  | SpanNode
  | ExpandNode
  | SpacerNode
  | ComponentSlotNode;

export type WidgetKind = WidgetNode["kind"];

/** Leaves handed to the measurement collaborator. */
export type MeasurableNode = TextNode | SpanNode | CanvasNode;

/**
 * A resolved element as produced by the template layer: an untyped bag that
 * {@link widgetFromElement} lifts into a {@link WidgetNode}.
 */
export type ResolvedElement = Readonly<{
  kind: string;
  text?: string;
  attributes?: Attributes;
  children?: readonly ResolvedElement[];
}>;
