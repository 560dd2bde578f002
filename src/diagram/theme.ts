import type { DiagramConfig } from './types';
import { formatNumber } from './format';

export const DEFAULT_CONFIG: Readonly<DiagramConfig> = Object.freeze({
  padding: 10,
  horizontalGap: 10,
  verticalGap: 5,
  cornerRadius: 3,

  fontFamily: 'monospace',
  fontSize: 14,
  charWidth: 8.4,

  backgroundColor: 'transparent',
  textColor: '#000',
  lineColor: '#000',
  lineWidth: 2,

  literalFill: '#ff6b6b',
  charsetFill: '#cbcbba',
  escapeFill: '#bada55',
  anchorFill: '#6b6659',
  subexpFill: 'none',
  subexpStroke: '#908c83',
  subexpColors: Object.freeze(['#cce5ff', '#d4edda', '#fff3cd', '#f8d7da', '#e2d5f0']),
  anyCharFill: '#dae9e5',
  flagsFill: '#c8e0f9',
  repeatLabelColor: '#666',
  recursiveRefFill: '#c9b3ff',
  calloutFill: '#ffd699',
  backtrackControlFill: '#ffb3a7',
  conditionalFill: '#b3e5fc',
});

/**
 * Fill of a group box nested `depth` groups deep. The outermost level uses
 * `subexpFill`; deeper levels cycle through `subexpColors`.
 */
export function groupFill(config: DiagramConfig, depth: number): string {
  if (depth <= 0 || config.subexpColors.length === 0) {
    return config.subexpFill;
  }
  return config.subexpColors[(depth - 1) % config.subexpColors.length];
}

/** CSS for the embedded `<style>` element, one rule per node class */
export function buildStyles(config: DiagramConfig): string {
  const fontSize = formatNumber(config.fontSize);
  const smallFontSize = formatNumber(config.fontSize - 2);

  const rules = [
    `.literal rect { fill: ${config.literalFill}; }`,
    `.escape rect { fill: ${config.escapeFill}; }`,
    `.charset rect { fill: ${config.charsetFill}; }`,
    `.anchor rect { fill: ${config.anchorFill}; }`,
    `.any-character rect { fill: ${config.anyCharFill}; }`,
    `.flags > rect { fill: ${config.flagsFill}; }`,
    `.recursive-ref rect { fill: ${config.recursiveRefFill}; }`,
    `.callout rect { fill: ${config.calloutFill}; }`,
    `.backtrack-control rect { fill: ${config.backtrackControlFill}; }`,
    `.conditional > rect { fill: ${config.conditionalFill}; }`,
    `.comment rect { fill: #e8e8e8; stroke: #999; stroke-dasharray: 4,2; }`,
    `.comment text { fill: #666; font-style: italic; }`,
    `text { font-family: ${config.fontFamily}; font-size: ${fontSize}px; fill: ${config.textColor}; }`,
    `.anchor text { fill: #fff; }`,
    `.quote { fill: #000; }`,
    `.subexp-label, .charset-label, .flags-label, .conditional-label { font-size: ${smallFontSize}px; font-style: italic; }`,
    `.repeat-label { fill: ${config.repeatLabelColor}; font-size: ${smallFontSize}px; }`,
  ];

  if (config.backgroundColor && config.backgroundColor !== 'transparent') {
    rules.unshift(`svg { background-color: ${config.backgroundColor}; }`);
  }

  return rules.join('\n');
}
