/**
 * Minimal SVG element model.
 *
 * Every element writes its attributes in a fixed order and leaves out the
 * optional ones that are empty or zero, so two renders of the same structure
 * produce the same text. Elements append to a shared `parts` buffer which is
 * joined once at the end.
 */

import { escapeXml, formatNumber } from './format';

export const SVG_NAMESPACE = 'http://www.w3.org/2000/svg';

export abstract class SvgElement {
  /** Append this element's markup to `parts` */
  abstract write(parts: string[]): void;

  render(): string {
    const parts: string[] = [];
    this.write(parts);
    return parts.join('');
  }
}

// ---- Attribute helpers ----

function numAttr(attrs: string[], name: string, value: number): void {
  attrs.push(`${name}="${formatNumber(value)}"`);
}

function optNumAttr(attrs: string[], name: string, value: number | undefined): void {
  if (value !== undefined && value > 0) numAttr(attrs, name, value);
}

function optStrAttr(attrs: string[], name: string, value: string | undefined): void {
  if (value) attrs.push(`${name}="${escapeXml(value)}"`);
}

function joinAttrs(attrs: string[]): string {
  return attrs.length > 0 ? ` ${attrs.join(' ')}` : '';
}

// ---- Elements ----

export interface GroupProps {
  className?: string;
  transform?: string;
  children?: SvgElement[];
}

/** `<g>`; renders as bare `<g>…</g>` when it has no class and no transform */
export class Group extends SvgElement {
  className?: string;
  transform?: string;
  readonly children: SvgElement[];

  constructor(props: GroupProps = {}) {
    super();
    this.className = props.className;
    this.transform = props.transform;
    this.children = props.children ?? [];
  }

  write(parts: string[]): void {
    const attrs: string[] = [];
    optStrAttr(attrs, 'class', this.className);
    optStrAttr(attrs, 'transform', this.transform);
    parts.push(`<g${joinAttrs(attrs)}>`);
    for (const child of this.children) {
      child.write(parts);
    }
    parts.push('</g>');
  }
}

export interface RectProps {
  x: number;
  y: number;
  width: number;
  height: number;
  rx?: number;
  ry?: number;
  fill?: string;
  stroke?: string;
  strokeWidth?: number;
  className?: string;
}

export class Rect extends SvgElement {
  constructor(readonly props: RectProps) {
    super();
  }

  write(parts: string[]): void {
    const p = this.props;
    const attrs: string[] = [];
    numAttr(attrs, 'x', p.x);
    numAttr(attrs, 'y', p.y);
    numAttr(attrs, 'width', p.width);
    numAttr(attrs, 'height', p.height);
    optNumAttr(attrs, 'rx', p.rx);
    optNumAttr(attrs, 'ry', p.ry);
    optStrAttr(attrs, 'fill', p.fill);
    optStrAttr(attrs, 'stroke', p.stroke);
    optNumAttr(attrs, 'stroke-width', p.strokeWidth);
    optStrAttr(attrs, 'class', p.className);
    parts.push(`<rect${joinAttrs(attrs)}/>`);
  }
}

export interface TSpanProps {
  content: string;
  className?: string;
  fill?: string;
}

export class TSpan extends SvgElement {
  constructor(readonly props: TSpanProps) {
    super();
  }

  write(parts: string[]): void {
    const attrs: string[] = [];
    optStrAttr(attrs, 'class', this.props.className);
    optStrAttr(attrs, 'fill', this.props.fill);
    parts.push(`<tspan${joinAttrs(attrs)}>${escapeXml(this.props.content)}</tspan>`);
  }
}

export interface TextProps {
  x: number;
  y: number;
  /** Ignored when `spans` is non-empty */
  content?: string;
  fontFamily?: string;
  fontSize?: number;
  fill?: string;
  /** text-anchor: start, middle or end */
  anchor?: 'start' | 'middle' | 'end';
  className?: string;
  spans?: TSpan[];
}

export class Text extends SvgElement {
  constructor(readonly props: TextProps) {
    super();
  }

  write(parts: string[]): void {
    const p = this.props;
    const attrs: string[] = [];
    numAttr(attrs, 'x', p.x);
    numAttr(attrs, 'y', p.y);
    optStrAttr(attrs, 'font-family', p.fontFamily);
    optNumAttr(attrs, 'font-size', p.fontSize);
    optStrAttr(attrs, 'fill', p.fill);
    optStrAttr(attrs, 'text-anchor', p.anchor);
    optStrAttr(attrs, 'class', p.className);
    parts.push(`<text${joinAttrs(attrs)}>`);
    if (p.spans && p.spans.length > 0) {
      for (const span of p.spans) {
        span.write(parts);
      }
    } else {
      parts.push(escapeXml(p.content ?? ''));
    }
    parts.push('</text>');
  }
}

export interface PathProps {
  d: string;
  /** Defaults to "none" */
  fill?: string;
  stroke?: string;
  strokeWidth?: number;
  className?: string;
}

export class Path extends SvgElement {
  constructor(readonly props: PathProps) {
    super();
  }

  write(parts: string[]): void {
    const p = this.props;
    const attrs: string[] = [];
    attrs.push(`d="${escapeXml(p.d)}"`);
    attrs.push(`fill="${escapeXml(p.fill || 'none')}"`);
    optStrAttr(attrs, 'stroke', p.stroke);
    optNumAttr(attrs, 'stroke-width', p.strokeWidth);
    optStrAttr(attrs, 'class', p.className);
    parts.push(`<path${joinAttrs(attrs)}/>`);
  }
}

export interface LineProps {
  x1: number;
  y1: number;
  x2: number;
  y2: number;
  stroke?: string;
  strokeWidth?: number;
  className?: string;
}

export class Line extends SvgElement {
  constructor(readonly props: LineProps) {
    super();
  }

  write(parts: string[]): void {
    const p = this.props;
    const attrs: string[] = [];
    numAttr(attrs, 'x1', p.x1);
    numAttr(attrs, 'y1', p.y1);
    numAttr(attrs, 'x2', p.x2);
    numAttr(attrs, 'y2', p.y2);
    optStrAttr(attrs, 'stroke', p.stroke);
    optNumAttr(attrs, 'stroke-width', p.strokeWidth);
    optStrAttr(attrs, 'class', p.className);
    parts.push(`<line${joinAttrs(attrs)}/>`);
  }
}

export interface SvgProps {
  width: number;
  height: number;
  viewBox?: string;
  /** Raw CSS placed in a leading `<style>` element */
  style?: string;
  children?: SvgElement[];
}

export class Svg extends SvgElement {
  constructor(readonly props: SvgProps) {
    super();
  }

  write(parts: string[]): void {
    const p = this.props;
    const attrs: string[] = [`xmlns="${SVG_NAMESPACE}"`];
    optNumAttr(attrs, 'width', p.width);
    optNumAttr(attrs, 'height', p.height);
    optStrAttr(attrs, 'viewBox', p.viewBox);
    parts.push(`<svg${joinAttrs(attrs)}>`);
    if (p.style) {
      parts.push(`<style>${p.style}</style>`);
    }
    for (const child of p.children ?? []) {
      child.write(parts);
    }
    parts.push('</svg>');
  }
}
