/**
 * Regexp AST - the flavor-agnostic tree produced by the pattern parsers.
 *
 * Alternation, concatenation and quantification nest like this:
 *
 * ```
 * ┌──────────────────────────────────────────────────────┐
 * │ REGEXP   matches[]  (alternation branches, a|b|c)     │
 * │  └─ MATCH   fragments[]  (concatenation, abc)         │
 * │      └─ MATCH_FRAGMENT   content + repeat?  (a*)      │
 * │          └─ CONTENT  literal, charset, subexp, ...    │
 * │              └─ (groups own a nested REGEXP)          │
 * └──────────────────────────────────────────────────────┘
 * ```
 *
 * The tree is owned top-down: every nested regexp belongs to exactly one
 * group, conditional branch, branch reset, modifier scope or balanced group.
 * Capture numbers are assigned by the parser and never renumbered here.
 *
 * @example
 * ```typescript
 * const ast: TRegexpAST = {
 *   type: 'regexp',
 *   matches: [{ type: 'match', fragments: [{ type: 'match_fragment', content: { type: 'literal', text: 'abc' } }] }],
 * };
 * ```
 */
export type TRegexpAST = {
  type: 'regexp';
  /** Alternation branches, in rendering order */
  matches: TMatchAST[];
  /** Trailing flag letters (e.g. "gi" for JavaScript) */
  flags?: string;
  /** Pattern start options such as (*UTF) (PCRE only) */
  options?: TPatternOptionAST[];
};

export type TMatchAST = {
  type: 'match';
  fragments: TMatchFragmentAST[];
};

export type TMatchFragmentAST = {
  type: 'match_fragment';
  content: TContentAST;
  /** Absent when the content carries no quantifier */
  repeat?: TRepeatAST;
};

/**
 * Quantifier: *, +, ?, {n}, {n,}, {n,m} and their lazy/possessive forms.
 */
export type TRepeatAST = {
  min: number;
  /** -1 for unbounded */
  max: number;
  greedy: boolean;
  possessive: boolean;
};

export type TPatternOptionAST = {
  /** "UTF", "CR", "LIMIT_MATCH", ... */
  name: string;
  /** Numeric argument of LIMIT_* options */
  value?: string;
};

// ---- Content nodes ----

export type TLiteralAST = {
  type: 'literal';
  text: string;
};

export type TAnyCharacterAST = {
  type: 'any_character';
};

export type TAnchorType =
  | 'start'
  | 'end'
  | 'word_boundary'
  | 'non_word_boundary'
  | 'string_start'
  | 'string_end'
  | 'absolute_end'
  | 'word_start'
  | 'word_end'
  | 'end_of_previous_match'
  | 'grapheme_cluster_boundary';

export type TAnchorAST = {
  type: 'anchor';
  /** One of {@link TAnchorType}; other values are displayed verbatim */
  anchorType: string;
};

export type TEscapeAST = {
  type: 'escape';
  /** "digit", "word", "whitespace", "newline", ... */
  escapeType: string;
  /** Escape code as written, e.g. "d" */
  code: string;
  /** Display description */
  value: string;
};

export type TCharsetAST = {
  type: 'charset';
  inverted: boolean;
  items: TCharsetItemAST[];
};

export type TCharsetLiteralAST = {
  type: 'charset_literal';
  text: string;
};

export type TCharsetRangeAST = {
  type: 'charset_range';
  first: string;
  last: string;
};

export type TPosixClassName =
  | 'alnum'
  | 'alpha'
  | 'blank'
  | 'cntrl'
  | 'digit'
  | 'graph'
  | 'lower'
  | 'print'
  | 'punct'
  | 'space'
  | 'upper'
  | 'xdigit';

export type TPosixClassAST = {
  type: 'posix_class';
  /** One of {@link TPosixClassName}; other names are displayed verbatim */
  name: string;
  negated: boolean;
};

/**
 * Character class set operation, e.g. Java `[a-z&&[^aeiou]]` or .NET `[a-z-[aeiou]]`.
 */
export type TSetOperationAST = {
  type: 'set_operation';
  operator: 'subtraction' | 'intersection';
  operand: TCharsetAST;
};

export type TCharsetItemAST =
  | TCharsetLiteralAST
  | TCharsetRangeAST
  | TEscapeAST
  | TPosixClassAST
  | TSetOperationAST;

export type TGroupType =
  | 'capture'
  | 'named_capture'
  | 'non_capture'
  | 'positive_lookahead'
  | 'negative_lookahead'
  | 'positive_lookbehind'
  | 'negative_lookbehind'
  | 'atomic'
  | 'non_atomic_positive_lookahead'
  | 'non_atomic_positive_lookbehind'
  | 'script_run'
  | 'atomic_script_run';

export type TSubexpAST = {
  type: 'subexp';
  /** One of {@link TGroupType}; other values are displayed verbatim */
  groupType: string;
  /** Capture group number, 0 for non-capturing groups */
  number: number;
  name?: string;
  regexp: TRegexpAST;
};

export type TBackReferenceAST = {
  type: 'back_reference';
  /** Referenced group number, 0 for named references. Negative for relative references. */
  number: number;
  name?: string;
};

export type TUnicodePropertyEscapeAST = {
  type: 'unicode_property_escape';
  /** "Letter", "L", "Script=Greek", ... */
  property: string;
  negated: boolean;
};

/**
 * What a conditional tests: a group (by number or name), recursion, the
 * DEFINE pseudo-condition, or a lookaround assertion.
 */
export type TConditionAST =
  | TBackReferenceAST
  | TRecursiveRefAST
  | TLiteralAST
  | TSubexpAST
  | TUnknownAST;

export type TConditionalAST = {
  type: 'conditional';
  condition: TConditionAST;
  trueMatch: TRegexpAST;
  falseMatch?: TRegexpAST;
};

export type TRecursiveRefAST = {
  type: 'recursive_ref';
  /** "R" for the whole pattern, a (signed) number, or a group name */
  target: string;
};

export type TBranchResetAST = {
  type: 'branch_reset';
  regexp: TRegexpAST;
};

export type TBacktrackControlAST = {
  type: 'backtrack_control';
  /** "PRUNE", "SKIP", "FAIL", "ACCEPT", ... */
  verb: string;
  arg?: string;
};

export type TCalloutAST = {
  type: 'callout';
  /** 0-255 for numeric callouts, -1 for string callouts */
  number: number;
  text?: string;
};

export type TCommentAST = {
  type: 'comment';
  text: string;
};

export type TQuotedLiteralAST = {
  type: 'quoted_literal';
  text: string;
};

export type TInlineModifierAST = {
  type: 'inline_modifier';
  enable: string;
  disable: string;
  /** Present for the scoped form (?i:...) */
  regexp?: TRegexpAST;
};

export type TBalancedGroupAST = {
  type: 'balanced_group';
  /** Empty or absent for the non-capturing form (?<-other>...) */
  name?: string;
  otherName: string;
  regexp: TRegexpAST;
};

/**
 * A node whose kind this build does not know, e.g. one added by a newer
 * flavor parser. Rendered as a generic box labelled with its kind.
 */
export type TUnknownAST = {
  type: 'unknown';
  kind: string;
};

export type TContentAST =
  | TLiteralAST
  | TAnyCharacterAST
  | TAnchorAST
  | TEscapeAST
  | TCharsetAST
  | TSubexpAST
  | TBackReferenceAST
  | TUnicodePropertyEscapeAST
  | TConditionalAST
  | TRecursiveRefAST
  | TBranchResetAST
  | TBacktrackControlAST
  | TCalloutAST
  | TCommentAST
  | TQuotedLiteralAST
  | TInlineModifierAST
  | TBalancedGroupAST
  | TUnknownAST;

/** Every node kind the renderer dispatches on */
export type TRegexpNodeAST = TRegexpAST | TMatchAST | TMatchFragmentAST | TContentAST;

export type TContentType = TContentAST['type'];
