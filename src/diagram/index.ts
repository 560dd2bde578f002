import type { TPatternOptionAST, TRegexpAST } from '../ast/types';
import type { DiagramConfig, RenderedNode } from './types';
import { resolveConfig } from '../config';
import { Group, Line, Rect, Svg, Text, type SvgElement } from './svg';
import { boundingBox, measureText, wrapWithTransform } from './geometry';
import { flagLabels, patternOptionsLabel } from './labels';
import { renderBoxedList, renderRegexp } from './renderer';
import { buildStyles } from './theme';
import { formatNumber } from './format';

export type { DiagramConfig, BoundingBox, RenderedNode, RenderContext } from './types';
export { DEFAULT_CONFIG, buildStyles, groupFill } from './theme';
export { renderNode, renderRegexp, renderMatch, renderMatchFragment, renderRepeat } from './renderer';
export { spaceHorizontally, spaceVertically, measureText, boundingBox, translateBox, PathBuilder } from './geometry';
export { formatNumber, escapeXml, translate } from './format';
export { Svg, Group, Rect, Text, TSpan, Path, Line, SvgElement, SVG_NAMESPACE } from './svg';

/**
 * Render a regexp AST to a standalone SVG document.
 *
 * @example
 * ```typescript
 * import { renderDiagram, sequence, literal } from 'regex-railroad';
 * const svg = renderDiagram(sequence(literal('abc')), { fontSize: 16 });
 * ```
 */
export function renderDiagram(ast: TRegexpAST, overrides: Partial<DiagramConfig> = {}): string {
  return buildDiagram(ast, resolveConfig(overrides)).render();
}

/**
 * Lay out the whole diagram: padded content, entry and exit stubs, the
 * flags box on the right and the options banner on top.
 */
export function buildDiagram(ast: TRegexpAST, config: DiagramConfig): Svg {
  const p = config.padding;
  const content = renderRegexp(ast, { config, depth: 0 });

  let width = content.bbox.width + 2 * p;
  let height = content.bbox.height + 2 * p;

  let flags: RenderedNode | undefined;
  let flagsWidth = 0;
  if (ast.flags) {
    flags = renderFlags(ast.flags, config);
    flagsWidth = flags.bbox.width + p;
    width += flagsWidth;
    height = Math.max(height, flags.bbox.height + 2 * p);
  }

  let banner: RenderedNode | undefined;
  let bannerHeight = 0;
  if (ast.options && ast.options.length > 0) {
    banner = renderPatternOptions(ast.options, config);
    bannerHeight = banner.bbox.height + p / 2;
    width = Math.max(width, banner.bbox.width + 2 * p);
    height += bannerHeight;
  }

  const anchorY = bannerHeight + p + content.bbox.anchorY;
  const children: SvgElement[] = [
    new Line({ x1: p / 2, y1: anchorY, x2: p, y2: anchorY, stroke: config.lineColor, strokeWidth: config.lineWidth }),
    new Line({
      x1: width - p - flagsWidth,
      y1: anchorY,
      x2: width - p / 2 - flagsWidth,
      y2: anchorY,
      stroke: config.lineColor,
      strokeWidth: config.lineWidth,
    }),
    wrapWithTransform(content.element, p, bannerHeight + p),
  ];

  if (banner) {
    children.push(wrapWithTransform(banner.element, p, p / 2));
  }
  if (flags) {
    children.push(wrapWithTransform(flags.element, width - p - flagsWidth + p / 2, bannerHeight + p));
  }

  return new Svg({
    width,
    height,
    viewBox: `0 0 ${formatNumber(width)} ${formatNumber(height)}`,
    style: buildStyles(config),
    children,
  });
}

/** Boxed list of the trailing flag letters, described */
export function renderFlags(flags: string, config: DiagramConfig): RenderedNode {
  return renderBoxedList('Flags:', flagLabels(flags), 'flags', config);
}

/** Banner listing pattern start options such as `(*UTF)` */
export function renderPatternOptions(options: readonly TPatternOptionAST[], config: DiagramConfig): RenderedNode {
  const label = patternOptionsLabel(options);
  const pad = config.padding / 2;
  const width = measureText(label, config) + 2 * pad;
  const height = config.fontSize + 2 * pad;

  const rect = new Rect({
    x: 0,
    y: 0,
    width,
    height,
    rx: config.cornerRadius,
    ry: config.cornerRadius,
    fill: '#e8e8e8',
    stroke: '#999',
    strokeWidth: config.lineWidth,
  });
  const text = new Text({
    x: width / 2,
    y: height / 2 + config.fontSize / 3,
    content: label,
    fontFamily: config.fontFamily,
    fontSize: config.fontSize - 2,
    anchor: 'middle',
    className: 'pattern-options-label',
  });

  return {
    element: new Group({ className: 'pattern-options', children: [rect, text] }),
    bbox: boundingBox(0, 0, width, height),
  };
}
