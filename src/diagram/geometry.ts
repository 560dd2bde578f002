import type { BoundingBox, DiagramConfig, RenderedNode } from './types';
import { Group, type SvgElement } from './svg';
import { formatNumber, translate } from './format';

// ---- Connector constants ----

/** Radius of the curves on alternation connectors and quantifier loops */
export const CURVE_RADIUS = 10;
/** Horizontal margin reserved on each side of an alternation for its connectors */
export const CONNECTOR_WIDTH = 20;
/** Half-size of the direction arrow drawn on quantifier loops */
export const ARROW_SIZE = 5;

// ---- Bounding boxes ----

/** A box with default anchors: left and right edges, vertically centered */
export function boundingBox(x: number, y: number, width: number, height: number): BoundingBox {
  return {
    x,
    y,
    width,
    height,
    anchorLeft: x,
    anchorRight: x + width,
    anchorY: y + height / 2,
  };
}

export const EMPTY_BOX: BoundingBox = boundingBox(0, 0, 0, 0);

export function boxRight(box: BoundingBox): number {
  return box.x + box.width;
}

export function boxBottom(box: BoundingBox): number {
  return box.y + box.height;
}

export function translateBox(box: BoundingBox, dx: number, dy: number): BoundingBox {
  return {
    x: box.x + dx,
    y: box.y + dy,
    width: box.width,
    height: box.height,
    anchorLeft: box.anchorLeft + dx,
    anchorRight: box.anchorRight + dx,
    anchorY: box.anchorY + dy,
  };
}

/** Wraps `element` in a translated `<g>`, or returns it as is for a zero offset */
export function wrapWithTransform(element: SvgElement, dx: number, dy: number): SvgElement {
  const transform = translate(dx, dy);
  if (!transform) return element;
  return new Group({ transform, children: [element] });
}

// ---- Composition ----

export interface SpacedItems {
  items: RenderedNode[];
  bbox: BoundingBox;
}

/**
 * Lays items out left to right, `gap` apart, shifting each one down so every
 * item's connector lands on the same line (the lowest anchor among them).
 */
export function spaceHorizontally(items: readonly RenderedNode[], gap: number): SpacedItems {
  if (items.length === 0) {
    return { items: [], bbox: EMPTY_BOX };
  }

  let maxAnchorY = 0;
  for (const item of items) {
    maxAnchorY = Math.max(maxAnchorY, item.bbox.anchorY);
  }

  const placed: RenderedNode[] = [];
  let x = 0;
  let minY = Infinity;
  let maxY = -Infinity;

  for (const item of items) {
    const dx = x - item.bbox.x;
    const dy = maxAnchorY - item.bbox.anchorY;
    const bbox = translateBox(item.bbox, dx, dy);
    placed.push({ element: wrapWithTransform(item.element, dx, dy), bbox });

    minY = Math.min(minY, bbox.y);
    maxY = Math.max(maxY, boxBottom(bbox));
    x = boxRight(bbox) + gap;
  }

  const first = placed[0];
  const last = placed[placed.length - 1];
  return {
    items: placed,
    bbox: {
      x: 0,
      y: minY,
      width: boxRight(last.bbox),
      height: maxY - minY,
      anchorLeft: first.bbox.anchorLeft,
      anchorRight: last.bbox.anchorRight,
      anchorY: maxAnchorY,
    },
  };
}

/**
 * Stacks items top to bottom, `gap` apart, each centered within the widest.
 * The aggregate connector runs through the vertical middle.
 */
export function spaceVertically(items: readonly RenderedNode[], gap: number): SpacedItems {
  if (items.length === 0) {
    return { items: [], bbox: EMPTY_BOX };
  }

  let maxWidth = 0;
  for (const item of items) {
    maxWidth = Math.max(maxWidth, item.bbox.width);
  }

  const placed: RenderedNode[] = [];
  let y = 0;

  for (const item of items) {
    const dx = (maxWidth - item.bbox.width) / 2 - item.bbox.x;
    const dy = y - item.bbox.y;
    const bbox = translateBox(item.bbox, dx, dy);
    placed.push({ element: wrapWithTransform(item.element, dx, dy), bbox });
    y = boxBottom(bbox) + gap;
  }

  const totalHeight = boxBottom(placed[placed.length - 1].bbox);
  return {
    items: placed,
    bbox: {
      x: 0,
      y: 0,
      width: maxWidth,
      height: totalHeight,
      anchorLeft: 0,
      anchorRight: maxWidth,
      anchorY: totalHeight / 2,
    },
  };
}

// ---- Text metrics ----

/** Estimated rendered width of `text` in a monospace-like font */
export function measureText(text: string, config: Pick<DiagramConfig, 'charWidth'>): number {
  return text.length * config.charWidth;
}

// ---- Path data ----

/**
 * Accumulates SVG path commands.
 *
 * @example
 * ```typescript
 * new PathBuilder().moveTo(0, 10).horizontalTo(40).toString(); // "M 0 10 H 40"
 * ```
 */
export class PathBuilder {
  private readonly commands: string[] = [];

  private push(command: string, ...args: number[]): this {
    this.commands.push([command, ...args.map(formatNumber)].join(' '));
    return this;
  }

  moveTo(x: number, y: number): this {
    return this.push('M', x, y);
  }

  lineTo(x: number, y: number): this {
    return this.push('L', x, y);
  }

  horizontalTo(x: number): this {
    return this.push('H', x);
  }

  verticalTo(y: number): this {
    return this.push('V', y);
  }

  quadraticTo(cx: number, cy: number, x: number, y: number): this {
    return this.push('Q', cx, cy, x, y);
  }

  cubicTo(c1x: number, c1y: number, c2x: number, c2y: number, x: number, y: number): this {
    return this.push('C', c1x, c1y, c2x, c2y, x, y);
  }

  arcTo(rx: number, ry: number, rotation: number, largeArc: boolean, sweep: boolean, x: number, y: number): this {
    return this.push('A', rx, ry, rotation, largeArc ? 1 : 0, sweep ? 1 : 0, x, y);
  }

  toString(): string {
    return this.commands.join(' ');
  }
}
