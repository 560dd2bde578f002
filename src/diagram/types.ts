import type { SvgElement } from './svg';

// ---- Public options ----

/**
 * Styling and dimension parameters. Read-only during a render; share freely.
 */
export interface DiagramConfig {
  // Dimensions
  padding: number;
  horizontalGap: number;
  verticalGap: number;
  cornerRadius: number;

  // Typography
  fontFamily: string;
  fontSize: number;
  /** Approximate advance of one character, used for text measurement */
  charWidth: number;

  // Colors
  backgroundColor: string;
  textColor: string;
  lineColor: string;
  lineWidth: number;

  // Per node class
  literalFill: string;
  charsetFill: string;
  escapeFill: string;
  anchorFill: string;
  /** Fill of groups at depth 0 */
  subexpFill: string;
  subexpStroke: string;
  /** Cycled through for groups at depth 1 and deeper */
  subexpColors: readonly string[];
  anyCharFill: string;
  flagsFill: string;
  repeatLabelColor: string;
  recursiveRefFill: string;
  calloutFill: string;
  backtrackControlFill: string;
  conditionalFill: string;
}

// ---- Internal layout types ----

/**
 * Position and size of a rendered sub-diagram, plus where connectors attach.
 * Invariant: `y <= anchorY <= y + height`.
 */
export interface BoundingBox {
  x: number;
  y: number;
  width: number;
  height: number;
  /** X where the incoming connector attaches */
  anchorLeft: number;
  /** X where the outgoing connector attaches */
  anchorRight: number;
  /** Y of the horizontal connector line */
  anchorY: number;
}

export interface RenderedNode {
  element: SvgElement;
  bbox: BoundingBox;
}

/**
 * Passed by value down the recursion. `depth` counts the enclosing groups and
 * only picks the group fill color.
 */
export interface RenderContext {
  readonly config: DiagramConfig;
  readonly depth: number;
}
