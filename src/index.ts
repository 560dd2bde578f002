/**
 * regex-railroad: lays out a regular expression syntax tree as an SVG
 * railroad diagram.
 *
 * @example
 * ```typescript
 * import { renderDiagram, sequence, literal, oneOrMore, fragment } from 'regex-railroad';
 *
 * const svg = renderDiagram(sequence(fragment(literal('ab'), oneOrMore())));
 * ```
 */

export * from './ast';
export * from './diagram';
export { resolveConfig, loadConfigFile, parseConfig, diagramConfigSchema, ConfigError, CHAR_WIDTH_RATIO } from './config';
export type { DiagramConfigOverrides } from './config';
export { getErrorMessage, wrapError } from './utils/error-utils';
