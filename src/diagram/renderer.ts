import type {
  TCharsetAST,
  TConditionalAST,
  TContentAST,
  TInlineModifierAST,
  TMatchAST,
  TMatchFragmentAST,
  TRegexpAST,
  TRegexpNodeAST,
  TRepeatAST,
  TSubexpAST,
} from '../ast/types';
import type { DiagramConfig, RenderContext, RenderedNode } from './types';
import { Group, Line, Path, Rect, Text, TSpan, type SvgElement } from './svg';
import {
  ARROW_SIZE,
  CONNECTOR_WIDTH,
  CURVE_RADIUS,
  EMPTY_BOX,
  PathBuilder,
  boundingBox,
  measureText,
  spaceHorizontally,
  spaceVertically,
  wrapWithTransform,
} from './geometry';
import {
  anchorLabel,
  backReferenceLabel,
  backtrackControlLabel,
  balancedGroupLabel,
  calloutLabel,
  charsetHeading,
  charsetItemLabel,
  conditionLabel,
  groupLabel,
  inlineModifierLabel,
  recursiveRefLabel,
  repeatLabel,
  unicodePropertyLabel,
} from './labels';
import { groupFill } from './theme';

// ---- Dispatch ----

/**
 * Renders any AST node into an SVG element plus its bounding box.
 * Total over every node kind: kinds this build does not know become a
 * generic `<kind>` box.
 */
export function renderNode(node: TRegexpNodeAST, ctx: RenderContext): RenderedNode {
  switch (node.type) {
    case 'regexp':
      return renderRegexp(node, ctx);
    case 'match':
      return renderMatch(node, ctx);
    case 'match_fragment':
      return renderMatchFragment(node, ctx);
    default:
      return renderContent(node, ctx);
  }
}

function renderContent(node: TContentAST, ctx: RenderContext): RenderedNode {
  const { config } = ctx;
  switch (node.type) {
    case 'literal':
    case 'quoted_literal':
      return renderQuotedLabel(node.text, 'literal', config);
    case 'escape':
      return renderLabel(node.value, 'escape', config);
    case 'anchor':
      return renderLabel(anchorLabel(node.anchorType), 'anchor', config);
    case 'any_character':
      return renderLabel('any character', 'any-character', config);
    case 'back_reference':
      return renderLabel(backReferenceLabel(node), 'escape', config);
    case 'unicode_property_escape':
      return renderLabel(unicodePropertyLabel(node), 'escape', config);
    case 'comment':
      return renderComment(node.text, config);
    case 'recursive_ref':
      return renderLabel(recursiveRefLabel(node), 'recursive-ref', config);
    case 'backtrack_control':
      return renderLabel(backtrackControlLabel(node), 'backtrack-control', config);
    case 'callout':
      return renderLabel(calloutLabel(node), 'callout', config);
    case 'charset':
      return renderCharset(node, config);
    case 'subexp':
      return renderSubexp(node, ctx);
    case 'balanced_group':
      return renderGroupBox(balancedGroupLabel(node), node.regexp, ctx);
    case 'branch_reset':
      return renderGroupBox('branch reset', node.regexp, ctx);
    case 'inline_modifier':
      return renderInlineModifier(node, ctx);
    case 'conditional':
      return renderConditional(node, ctx);
    case 'unknown':
      return renderUnknown(node.kind, config);
    default:
      return renderUnknown(kindOf(node), config);
  }
}

/** Reads the `type` tag of a value the type system says cannot exist */
function kindOf(node: unknown): string {
  if (typeof node === 'object' && node !== null && 'type' in node && typeof node.type === 'string') {
    return node.type;
  }
  return 'unknown';
}

function renderUnknown(kind: string, config: DiagramConfig): RenderedNode {
  return renderLabel(`<${kind}>`, 'unknown', config);
}

// ---- Structural rules ----

export function renderRegexp(regexp: TRegexpAST, ctx: RenderContext): RenderedNode {
  if (regexp.matches.length === 0) {
    return emptyNode();
  }
  if (regexp.matches.length === 1) {
    return renderMatch(regexp.matches[0], ctx);
  }

  const { config } = ctx;
  const rendered = regexp.matches.map((m) => renderMatch(m, ctx));
  const { items, bbox } = spaceVertically(rendered, config.verticalGap * 2);

  const r = CURVE_RADIUS;
  const cw = CONNECTOR_WIDTH;
  const width = bbox.width + 2 * cw;
  const height = bbox.height;
  const anchorY = height / 2;

  const children: SvgElement[] = [];

  for (const item of items) {
    const itemY = item.bbox.anchorY;
    // Narrower branches are centered; run the connectors in to their edges
    const entryX = cw + item.bbox.anchorLeft;
    const exitX = cw + item.bbox.anchorRight;
    const centered = item.bbox.anchorLeft > 0 || item.bbox.anchorRight < bbox.width;

    const left = new PathBuilder().moveTo(0, anchorY);
    if (itemY < anchorY) {
      left.quadraticTo(r, anchorY, r, anchorY - r).verticalTo(itemY + r).quadraticTo(r, itemY, cw, itemY);
    } else if (itemY > anchorY) {
      left.quadraticTo(r, anchorY, r, anchorY + r).verticalTo(itemY - r).quadraticTo(r, itemY, cw, itemY);
    }
    if (itemY === anchorY || centered) {
      left.horizontalTo(entryX);
    }
    children.push(connector(left, config));

    const right = new PathBuilder().moveTo(exitX, itemY);
    if (centered && itemY !== anchorY) {
      right.horizontalTo(width - cw);
    }
    if (itemY < anchorY) {
      right
        .quadraticTo(width - r, itemY, width - r, itemY + r)
        .verticalTo(anchorY - r)
        .quadraticTo(width - r, anchorY, width, anchorY);
    } else if (itemY > anchorY) {
      right
        .quadraticTo(width - r, itemY, width - r, itemY - r)
        .verticalTo(anchorY + r)
        .quadraticTo(width - r, anchorY, width, anchorY);
    } else {
      right.horizontalTo(width);
    }
    children.push(connector(right, config));
  }

  for (const item of items) {
    children.push(wrapWithTransform(item.element, cw, 0));
  }

  return {
    element: new Group({ className: 'regexp', children }),
    bbox: { x: 0, y: 0, width, height, anchorLeft: 0, anchorRight: width, anchorY },
  };
}

export function renderMatch(match: TMatchAST, ctx: RenderContext): RenderedNode {
  if (match.fragments.length === 0) {
    return emptyNode();
  }

  const rendered = match.fragments.map((f) => renderMatchFragment(f, ctx));
  const { items, bbox } = spaceHorizontally(rendered, ctx.config.horizontalGap);

  const children: SvgElement[] = [];
  if (items.length > 1) {
    const path = new PathBuilder().moveTo(items[0].bbox.anchorRight, bbox.anchorY);
    for (let i = 1; i < items.length; i++) {
      path.lineTo(items[i].bbox.anchorLeft, bbox.anchorY);
      if (i < items.length - 1) {
        path.moveTo(items[i].bbox.anchorRight, bbox.anchorY);
      }
    }
    children.push(connector(path, ctx.config));
  }
  for (const item of items) {
    children.push(item.element);
  }

  return { element: new Group({ className: 'match', children }), bbox };
}

export function renderMatchFragment(fragment: TMatchFragmentAST, ctx: RenderContext): RenderedNode {
  const content = renderContent(fragment.content, ctx);
  return fragment.repeat ? renderRepeat(content, fragment.repeat, ctx.config) : content;
}

/**
 * Wraps `content` with a skip path above (iff `min == 0`) and a loop path
 * below (iff `max != 1`). The loop carries a direction arrow and, for
 * explicit counts, a caption. `{1}` needs neither and returns `content` as is.
 */
export function renderRepeat(content: RenderedNode, repeat: TRepeatAST, config: DiagramConfig): RenderedNode {
  const r = CURVE_RADIUS;
  const hasSkip = repeat.min === 0;
  const hasLoop = repeat.max !== 1;
  if (!hasSkip && !hasLoop) {
    return content;
  }

  const skipHeight = hasSkip ? 2 * r : 0;
  const loopHeight = hasLoop ? 2 * r : 0;
  const offsetX = r;
  const offsetY = skipHeight;

  const width = content.bbox.width + 2 * r;
  let height = content.bbox.height + skipHeight + loopHeight;
  const anchorY = offsetY + content.bbox.anchorY;

  const children: SvgElement[] = [];

  if (hasSkip) {
    const skip = new PathBuilder()
      .moveTo(0, anchorY)
      .quadraticTo(0, anchorY - r, r, anchorY - r)
      .horizontalTo(width - r)
      .quadraticTo(width, anchorY - r, width, anchorY);
    children.push(connector(skip, config, 'skip-path'));
  }

  if (hasLoop) {
    const loopY = offsetY + content.bbox.height + r;
    const loop = new PathBuilder()
      .moveTo(width, anchorY)
      .quadraticTo(width, loopY, width - r, loopY)
      .horizontalTo(r)
      .quadraticTo(0, loopY, 0, anchorY);
    children.push(connector(loop, config, 'loop-path'));

    // Greedy points back toward the start, lazy points forward
    const ax = width / 2;
    const tip = repeat.greedy ? ARROW_SIZE : -ARROW_SIZE;
    const arrow = new PathBuilder()
      .moveTo(ax + tip, loopY - ARROW_SIZE)
      .lineTo(ax, loopY)
      .lineTo(ax + tip, loopY + ARROW_SIZE);
    children.push(connector(arrow, config));

    const caption = repeatLabel(repeat);
    if (caption) {
      children.push(
        new Text({
          x: width / 2,
          y: loopY + config.fontSize,
          content: caption,
          fontFamily: config.fontFamily,
          fontSize: config.fontSize - 2,
          anchor: 'middle',
          className: 'repeat-label',
        }),
      );
      height += config.fontSize;
    }
  }

  children.push(
    wrapWithTransform(content.element, offsetX, offsetY),
    new Line({ x1: 0, y1: anchorY, x2: offsetX, y2: anchorY, stroke: config.lineColor, strokeWidth: config.lineWidth }),
    new Line({
      x1: offsetX + content.bbox.width,
      y1: anchorY,
      x2: width,
      y2: anchorY,
      stroke: config.lineColor,
      strokeWidth: config.lineWidth,
    }),
  );

  return {
    element: new Group({ className: 'repeat', children }),
    bbox: { x: 0, y: 0, width, height, anchorLeft: 0, anchorRight: width, anchorY },
  };
}

// ---- Groups ----

function renderSubexp(subexp: TSubexpAST, ctx: RenderContext): RenderedNode {
  return renderGroupBox(groupLabel(subexp), subexp.regexp, ctx);
}

/** Titled group box; its fill comes from the current depth, its body renders one level deeper */
function renderGroupBox(label: string, body: TRegexpAST, ctx: RenderContext): RenderedNode {
  const fill = groupFill(ctx.config, ctx.depth);
  const content = renderRegexp(body, { config: ctx.config, depth: ctx.depth + 1 });
  return renderSubexpBox(label, content, fill, ctx.config);
}

function renderInlineModifier(im: TInlineModifierAST, ctx: RenderContext): RenderedNode {
  const label = inlineModifierLabel(im);
  if (!im.regexp) {
    return renderLabel(label, 'flags', ctx.config);
  }
  return renderLabeledBoxWithContent(label, renderRegexp(im.regexp, ctx), 'flags', ctx.config);
}

function renderConditional(cond: TConditionalAST, ctx: RenderContext): RenderedNode {
  const { config } = ctx;

  const yes = renderBranch('then', 'condition-yes', cond.trueMatch, ctx);
  const children: SvgElement[] = [];
  let totalWidth = yes.bbox.width;
  let totalHeight = yes.bbox.height;

  if (cond.falseMatch) {
    const no = renderBranch('else', 'condition-no', cond.falseMatch, ctx);
    totalWidth = Math.max(yes.bbox.width, no.bbox.width);
    totalHeight = yes.bbox.height + config.verticalGap + no.bbox.height;
    children.push(
      wrapWithTransform(yes.element, (totalWidth - yes.bbox.width) / 2, 0),
      wrapWithTransform(no.element, (totalWidth - no.bbox.width) / 2, yes.bbox.height + config.verticalGap),
    );
  } else {
    children.push(yes.element);
  }

  const content: RenderedNode = {
    element: new Group({ children }),
    bbox: boundingBox(0, 0, totalWidth, totalHeight),
  };
  return renderLabeledBoxWithContent(conditionLabel(cond.condition), content, 'conditional', config);
}

function renderBranch(label: string, className: string, body: TRegexpAST, ctx: RenderContext): RenderedNode {
  const tag = renderLabel(label, 'condition-label', ctx.config);
  const { items, bbox } = spaceHorizontally([tag, renderRegexp(body, ctx)], ctx.config.horizontalGap);
  return {
    element: new Group({ className, children: items.map((item) => item.element) }),
    bbox,
  };
}

function renderCharset(charset: TCharsetAST, config: DiagramConfig): RenderedNode {
  return renderBoxedList(charsetHeading(charset), charset.items.map(charsetItemLabel), 'charset', config);
}

// ---- Box primitives ----

function emptyNode(): RenderedNode {
  return { element: new Group(), bbox: EMPTY_BOX };
}

function connector(path: PathBuilder, config: DiagramConfig, className?: string): Path {
  return new Path({ d: path.toString(), stroke: config.lineColor, strokeWidth: config.lineWidth, className });
}

/** Rounded box around a single centered line of text */
export function renderLabel(text: string, className: string, config: DiagramConfig): RenderedNode {
  const pad = config.padding / 2;
  const width = measureText(text, config) + 2 * pad;
  const height = config.fontSize + 2 * pad;

  const rect = new Rect({ x: 0, y: 0, width, height, rx: config.cornerRadius, ry: config.cornerRadius });
  const label = new Text({
    x: width / 2,
    y: height / 2 + config.fontSize / 3,
    content: text,
    fontFamily: config.fontFamily,
    fontSize: config.fontSize,
    anchor: 'middle',
  });

  return {
    element: new Group({ className, children: [rect, label] }),
    bbox: boundingBox(0, 0, width, height),
  };
}

/** Like {@link renderLabel}, with the text wrapped in separately styled quote glyphs */
export function renderQuotedLabel(text: string, className: string, config: DiagramConfig): RenderedNode {
  const pad = config.padding / 2;
  const width = measureText(`"${text}"`, config) + 2 * pad;
  const height = config.fontSize + 2 * pad;

  const rect = new Rect({ x: 0, y: 0, width, height, rx: config.cornerRadius, ry: config.cornerRadius });
  const label = new Text({
    x: width / 2,
    y: height / 2 + config.fontSize / 3,
    fontFamily: config.fontFamily,
    fontSize: config.fontSize,
    anchor: 'middle',
    spans: [
      new TSpan({ content: '"', className: 'quote' }),
      new TSpan({ content: text }),
      new TSpan({ content: '"', className: 'quote' }),
    ],
  });

  return {
    element: new Group({ className, children: [rect, label] }),
    bbox: boundingBox(0, 0, width, height),
  };
}

function renderComment(text: string, config: DiagramConfig): RenderedNode {
  const content = `# ${text}`;
  const pad = config.padding / 2;
  const width = measureText(content, config) + 2 * pad;
  const height = config.fontSize + 2 * pad;

  const rect = new Rect({ x: 0, y: 0, width, height, rx: config.cornerRadius, ry: config.cornerRadius });
  const label = new Text({
    x: width / 2,
    y: height / 2 + config.fontSize / 3,
    content,
    fontFamily: config.fontFamily,
    fontSize: config.fontSize - 2,
    anchor: 'middle',
    className: 'comment-text',
  });

  return {
    element: new Group({ className: 'comment', children: [rect, label] }),
    bbox: boundingBox(0, 0, width, height),
  };
}

/**
 * Heading line plus one centered line per item. Used for character classes
 * and the flags box.
 */
export function renderBoxedList(
  heading: string,
  items: readonly string[],
  className: string,
  config: DiagramConfig,
): RenderedNode {
  const pad = config.padding;
  const headingWidth = measureText(heading, config);
  let maxItemWidth = 0;
  for (const item of items) {
    maxItemWidth = Math.max(maxItemWidth, measureText(item, config));
  }

  const contentWidth = Math.max(maxItemWidth + 2 * pad, headingWidth);
  const headingHeight = config.fontSize + pad;
  const itemHeight = config.fontSize + pad / 2;

  const width = contentWidth + 2 * pad;
  const height = headingHeight + items.length * itemHeight + pad;

  const children: SvgElement[] = [
    new Rect({ x: 0, y: 0, width, height, rx: config.cornerRadius, ry: config.cornerRadius }),
    new Text({
      x: pad,
      y: config.fontSize,
      content: heading,
      fontFamily: config.fontFamily,
      fontSize: config.fontSize - 2,
      className: `${className}-label`,
    }),
  ];

  let y = headingHeight + config.fontSize;
  for (const item of items) {
    children.push(
      new Text({
        x: width / 2,
        y,
        content: item,
        fontFamily: config.fontFamily,
        fontSize: config.fontSize,
        anchor: 'middle',
      }),
    );
    y += itemHeight;
  }

  return {
    element: new Group({ className, children }),
    bbox: boundingBox(0, 0, width, height),
  };
}

interface TitledBoxStyle {
  className: string;
  labelClassName: string;
  fill?: string;
  stroke?: string;
  strokeWidth?: number;
}

function renderTitledBox(label: string, content: RenderedNode, style: TitledBoxStyle, config: DiagramConfig): RenderedNode {
  const pad = config.padding;
  const labelHeight = config.fontSize + pad;
  const width = Math.max(content.bbox.width, measureText(label, config)) + 2 * pad;
  const height = labelHeight + content.bbox.height + pad;

  const children: SvgElement[] = [
    new Rect({
      x: 0,
      y: 0,
      width,
      height,
      rx: config.cornerRadius,
      ry: config.cornerRadius,
      fill: style.fill,
      stroke: style.stroke,
      strokeWidth: style.strokeWidth,
    }),
    new Text({
      x: pad,
      y: config.fontSize,
      content: label,
      fontFamily: config.fontFamily,
      fontSize: config.fontSize - 2,
      className: style.labelClassName,
    }),
    wrapWithTransform(content.element, (width - content.bbox.width) / 2, labelHeight),
  ];

  return {
    element: new Group({ className: style.className, children }),
    bbox: { x: 0, y: 0, width, height, anchorLeft: 0, anchorRight: width, anchorY: labelHeight + content.bbox.anchorY },
  };
}

/** Titled box for groups, outlined and filled explicitly */
export function renderSubexpBox(label: string, content: RenderedNode, fill: string, config: DiagramConfig): RenderedNode {
  return renderTitledBox(
    label,
    content,
    {
      className: 'subexp',
      labelClassName: 'subexp-label',
      fill,
      stroke: config.subexpStroke,
      strokeWidth: config.lineWidth,
    },
    config,
  );
}

/** Titled box styled by class only */
export function renderLabeledBoxWithContent(
  label: string,
  content: RenderedNode,
  className: string,
  config: DiagramConfig,
): RenderedNode {
  return renderTitledBox(label, content, { className, labelClassName: `${className}-label` }, config);
}
