import type {
  TAnchorAST,
  TAnyCharacterAST,
  TBacktrackControlAST,
  TBackReferenceAST,
  TBalancedGroupAST,
  TBranchResetAST,
  TCalloutAST,
  TCharsetAST,
  TCharsetItemAST,
  TCharsetLiteralAST,
  TCharsetRangeAST,
  TCommentAST,
  TConditionAST,
  TConditionalAST,
  TContentAST,
  TEscapeAST,
  TInlineModifierAST,
  TLiteralAST,
  TMatchAST,
  TMatchFragmentAST,
  TPatternOptionAST,
  TPosixClassAST,
  TQuotedLiteralAST,
  TRecursiveRefAST,
  TRegexpAST,
  TRepeatAST,
  TSetOperationAST,
  TSubexpAST,
  TUnicodePropertyEscapeAST,
  TUnknownAST,
} from './types';

/** Anything that can stand in a concatenation: bare content is wrapped in a fragment */
export type TMatchItem = TContentAST | TMatchFragmentAST;

/**
 * Fluent builder for constructing a root TRegexpAST programmatically
 *
 * @example
 * ```typescript
 * const ast = new RegexpBuilder()
 *   .branch(literal('cat'))
 *   .branch(literal('dog'), fragment(literal('s'), optional()))
 *   .flags('gi')
 *   .build();
 * ```
 */
export class RegexpBuilder {
  private ast: TRegexpAST;

  constructor() {
    this.ast = { type: 'regexp', matches: [] };
  }
  /** Add one alternation branch made of the given items */
  branch(...items: TMatchItem[]): this {
    this.ast.matches.push(match(...items));
    return this;
  }
  addMatch(m: TMatchAST): this {
    this.ast.matches.push(m);
    return this;
  }
  flags(flags: string): this {
    this.ast.flags = flags;
    return this;
  }
  option(name: string, value?: string): this {
    if (!this.ast.options) {
      this.ast.options = [];
    }
    const opt: TPatternOptionAST = value === undefined ? { name } : { name, value };
    this.ast.options.push(opt);
    return this;
  }
  /** Build and return the final TRegexpAST */
  build(): TRegexpAST {
    return this.ast;
  }
}

// ---- Structure ----

export function regexp(...matches: TMatchAST[]): TRegexpAST {
  return { type: 'regexp', matches };
}

/** A single-branch regexp; shorthand for `regexp(match(...items))` */
export function sequence(...items: TMatchItem[]): TRegexpAST {
  return regexp(match(...items));
}

/** An alternation where each branch is a single item */
export function alternation(...branches: TMatchItem[]): TRegexpAST {
  return regexp(...branches.map((b) => match(b)));
}

export function match(...items: TMatchItem[]): TMatchAST {
  return {
    type: 'match',
    fragments: items.map((item) => (item.type === 'match_fragment' ? item : fragment(item))),
  };
}

export function fragment(content: TContentAST, repeat?: TRepeatAST): TMatchFragmentAST {
  return repeat ? { type: 'match_fragment', content, repeat } : { type: 'match_fragment', content };
}

// ---- Quantifiers ----

type RepeatModifiers = { greedy?: boolean; possessive?: boolean };

/**
 * Helper function to create a Repeat
 * @param min - Minimum repetitions
 * @param max - Maximum repetitions, -1 for unbounded
 */
export function repeat(min: number, max: number, modifiers: RepeatModifiers = {}): TRepeatAST {
  return {
    min,
    max,
    greedy: modifiers.greedy ?? true,
    possessive: modifiers.possessive ?? false,
  };
}

/** `*` */
export function zeroOrMore(modifiers?: RepeatModifiers): TRepeatAST {
  return repeat(0, -1, modifiers);
}

/** `+` */
export function oneOrMore(modifiers?: RepeatModifiers): TRepeatAST {
  return repeat(1, -1, modifiers);
}

/** `?` */
export function optional(modifiers?: RepeatModifiers): TRepeatAST {
  return repeat(0, 1, modifiers);
}

// ---- Leaf content ----

export function literal(text: string): TLiteralAST {
  return { type: 'literal', text };
}

export function anyCharacter(): TAnyCharacterAST {
  return { type: 'any_character' };
}

export function anchor(anchorType: string): TAnchorAST {
  return { type: 'anchor', anchorType };
}

export function escape(escapeType: string, code: string, value: string): TEscapeAST {
  return { type: 'escape', escapeType, code, value };
}

export function backReference(ref: number | string): TBackReferenceAST {
  return typeof ref === 'number'
    ? { type: 'back_reference', number: ref }
    : { type: 'back_reference', number: 0, name: ref };
}

export function unicodeProperty(property: string, negated: boolean = false): TUnicodePropertyEscapeAST {
  return { type: 'unicode_property_escape', property, negated };
}

export function recursiveRef(target: string): TRecursiveRefAST {
  return { type: 'recursive_ref', target };
}

export function backtrackControl(verb: string, arg?: string): TBacktrackControlAST {
  return arg === undefined ? { type: 'backtrack_control', verb } : { type: 'backtrack_control', verb, arg };
}

export function callout(value: number | string): TCalloutAST {
  return typeof value === 'number'
    ? { type: 'callout', number: value }
    : { type: 'callout', number: -1, text: value };
}

export function comment(text: string): TCommentAST {
  return { type: 'comment', text };
}

export function quotedLiteral(text: string): TQuotedLiteralAST {
  return { type: 'quoted_literal', text };
}

export function unknownNode(kind: string): TUnknownAST {
  return { type: 'unknown', kind };
}

// ---- Character classes ----

export function charset(items: TCharsetItemAST[], inverted: boolean = false): TCharsetAST {
  return { type: 'charset', inverted, items };
}

export function charsetLiteral(text: string): TCharsetLiteralAST {
  return { type: 'charset_literal', text };
}

export function charsetRange(first: string, last: string): TCharsetRangeAST {
  return { type: 'charset_range', first, last };
}

export function posixClass(name: string, negated: boolean = false): TPosixClassAST {
  return { type: 'posix_class', name, negated };
}

export function setOperation(operator: TSetOperationAST['operator'], operand: TCharsetAST): TSetOperationAST {
  return { type: 'set_operation', operator, operand };
}

// ---- Groups ----

export function subexp(groupType: string, body: TRegexpAST, number: number = 0, name?: string): TSubexpAST {
  return name === undefined
    ? { type: 'subexp', groupType, number, regexp: body }
    : { type: 'subexp', groupType, number, name, regexp: body };
}

/** Numbered capture group */
export function group(number: number, body: TRegexpAST): TSubexpAST {
  return subexp('capture', body, number);
}

export function namedGroup(number: number, name: string, body: TRegexpAST): TSubexpAST {
  return subexp('named_capture', body, number, name);
}

export function nonCapturing(body: TRegexpAST): TSubexpAST {
  return subexp('non_capture', body);
}

export function branchReset(body: TRegexpAST): TBranchResetAST {
  return { type: 'branch_reset', regexp: body };
}

export function balancedGroup(otherName: string, body: TRegexpAST, name?: string): TBalancedGroupAST {
  return name === undefined
    ? { type: 'balanced_group', otherName, regexp: body }
    : { type: 'balanced_group', name, otherName, regexp: body };
}

export function inlineModifier(enable: string, disable: string = '', body?: TRegexpAST): TInlineModifierAST {
  return body === undefined
    ? { type: 'inline_modifier', enable, disable }
    : { type: 'inline_modifier', enable, disable, regexp: body };
}

export function conditional(condition: TConditionAST, trueMatch: TRegexpAST, falseMatch?: TRegexpAST): TConditionalAST {
  return falseMatch === undefined
    ? { type: 'conditional', condition, trueMatch }
    : { type: 'conditional', condition, trueMatch, falseMatch };
}
