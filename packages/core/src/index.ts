/**
 * @cellplan/core
 *
 * Layout engine for terminal widget trees: sizes every node, splits leftover
 * stack space between expand and spacer nodes, and assigns absolute cell
 * rects. Pure and synchronous; no terminal I/O.
 */

// =============================================================================
// Errors
// =============================================================================

export {
  LayoutError,
  MeasurementError,
  type LayoutErrorCode,
  type LayoutFatal,
} from "./errors.js";

// =============================================================================
// Widget tree model
// =============================================================================

export type {
  AttributeValue,
  Attributes,
  BorderNode,
  CanvasNode,
  ComponentSlotNode,
  ContainerNode,
  ExpandNode,
  MeasurableNode,
  PaddingNode,
  ResolvedElement,
  SpacerNode,
  SpanNode,
  StackNode,
  TextNode,
  WidgetKind,
  WidgetNode,
  ZStackNode,
} from "./widgets/types.js";
export {
  ui,
  type ExpandProps,
  type PaddingProps,
  type SizedProps,
  type SpacerProps,
} from "./widgets/ui.js";
export { widgetFromElement } from "./widgets/fromElement.js";

// =============================================================================
// Layout
// =============================================================================

export {
  UNBOUNDED,
  type Axis,
  type Extent,
  type NodePath,
  type Rect,
  type Size,
} from "./layout/types.js";
export { computeLayout, layoutOrThrow } from "./layout/engine/layoutEngine.js";
export type { LayoutOutput, LayoutTree } from "./layout/engine/types.js";
export type { LayoutResult } from "./layout/engine/result.js";
export {
  DEFAULT_MAX_DEPTH,
  MAX_DEPTH_LIMIT,
  effectiveAxis,
  validateWidgetTree,
  type ArenaEntry,
  type LayoutArena,
} from "./layout/validateTree.js";
export {
  resolveLayoutConfig,
  type LayoutConfig,
  type MeasureFn,
  type ResolvedLayoutConfig,
} from "./layout/config.js";
export type { LayoutDiagnostic, LayoutDiagnosticKind } from "./layout/diagnostics.js";
export { distributeInteger } from "./layout/engine/distributeInteger.js";
export {
  distributeStackSpace,
  type SpaceClaim,
  type SpaceDistribution,
} from "./layout/engine/distributeSpace.js";
export {
  countFillCells,
  forEachFillCell,
  resolveFillRows,
  type FillCellVisitor,
  type FillDirective,
} from "./layout/fill.js";
export { contains, findLayoutNode, hitTest } from "./layout/hitTest.js";
export {
  collectText,
  createPlainTextMeasure,
  measureTextCells,
  wrapTextToLines,
} from "./layout/textMeasure.js";
