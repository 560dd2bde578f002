/**
 * Shared regexp ASTs and SVG assertions for diagram tests
 */

import type { TRegexpAST } from '../../src/ast/types';
import type { DiagramConfig } from '../../src/diagram/types';
import {
  sequence,
  alternation,
  literal,
  group,
  fragment,
  repeat,
  charset,
  charsetRange,
  charsetLiteral,
  escape,
  anchor,
  conditional,
  backReference,
  nonCapturing,
  regexp,
  match,
} from '../../src/ast/builder';
import { resolveConfig } from '../../src/config';

/** Defaults with a fresh palette array so tests may tweak it */
export function testConfig(overrides: Partial<DiagramConfig> = {}): DiagramConfig {
  return resolveConfig(overrides);
}

/** `a|b|c` */
export function threeWayAlternation(): TRegexpAST {
  return alternation(literal('a'), literal('b'), literal('c'));
}

/** `(abc)` */
export function capturedAbc(): TRegexpAST {
  return sequence(group(1, sequence(literal('abc'))));
}

/** `((a)(b))` */
export function nestedGroups(): TRegexpAST {
  return sequence(group(1, sequence(group(2, sequence(literal('a'))), group(3, sequence(literal('b'))))));
}

/**
 * Something of everything: `^(?:[a-z_]\d{2,4}|x+?)(?(1)y|z)$`, with flags.
 */
export function kitchenSink(): TRegexpAST {
  const ast = sequence(
    anchor('start'),
    nonCapturing(
      regexp(
        match(
          charset([charsetRange('a', 'z'), charsetLiteral('_')]),
          fragment(escape('digit', 'd', 'digit'), repeat(2, 4)),
        ),
        match(fragment(literal('x'), repeat(1, -1, { greedy: false }))),
      ),
    ),
    conditional(backReference(1), sequence(literal('y')), sequence(literal('z'))),
    anchor('end'),
  );
  ast.flags = 'gi';
  return ast;
}

export function countMatches(text: string, pattern: RegExp): number {
  return (text.match(pattern) ?? []).length;
}

/** Opening and closing `<g>` tags pair up, and never close more than opened */
export function hasBalancedGroups(svg: string): boolean {
  let open = 0;
  for (const tag of svg.match(/<g[ >]|<\/g>/g) ?? []) {
    open += tag === '</g>' ? -1 : 1;
    if (open < 0) return false;
  }
  return open === 0;
}
