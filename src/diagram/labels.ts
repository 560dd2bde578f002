import type {
  TBacktrackControlAST,
  TBackReferenceAST,
  TBalancedGroupAST,
  TCalloutAST,
  TCharsetAST,
  TCharsetItemAST,
  TConditionAST,
  TInlineModifierAST,
  TPatternOptionAST,
  TPosixClassAST,
  TRecursiveRefAST,
  TRepeatAST,
  TSubexpAST,
  TUnicodePropertyEscapeAST,
} from '../ast/types';

/**
 * Human-readable descriptions of AST nodes. Pure string functions; the
 * renderer decides box shapes and classes.
 */

const ANCHOR_LABELS: Record<string, string> = {
  start: 'Start of line',
  end: 'End of line',
  word_boundary: 'Word boundary',
  non_word_boundary: 'Non-word boundary',
  word_start: 'Start of word',
  word_end: 'End of word',
  string_start: 'Start of input',
  string_end: 'End of input',
  absolute_end: 'Absolute end',
  end_of_previous_match: 'End of previous match',
  grapheme_cluster_boundary: 'Grapheme cluster boundary',
};

const POSIX_CLASS_LABELS: Record<string, string> = {
  alnum: 'alphanumeric',
  alpha: 'alphabetic',
  blank: 'blank (space/tab)',
  cntrl: 'control character',
  digit: 'digit',
  graph: 'visible character',
  lower: 'lowercase',
  print: 'printable',
  punct: 'punctuation',
  space: 'whitespace',
  upper: 'uppercase',
  xdigit: 'hex digit',
};

const GROUP_LABELS: Record<string, string> = {
  non_capture: 'non-capturing group',
  positive_lookahead: 'positive lookahead',
  negative_lookahead: 'negative lookahead',
  positive_lookbehind: 'positive lookbehind',
  negative_lookbehind: 'negative lookbehind',
  non_atomic_positive_lookahead: 'non-atomic lookahead',
  non_atomic_positive_lookbehind: 'non-atomic lookbehind',
  script_run: 'script run',
  atomic_script_run: 'atomic script run',
  atomic: 'atomic group',
};

/** Descriptions of trailing flag letters, across the supported flavors */
export const FLAG_DESCRIPTIONS: Record<string, string> = {
  d: 'hasIndices',
  g: 'global',
  i: 'ignore case',
  m: 'multiline',
  s: 'dotAll',
  u: 'unicode',
  v: 'unicodeSets',
  x: 'extended',
  y: 'sticky',
  n: 'explicit capture',
  U: 'ungreedy',
  J: 'duplicate names',
};

function lookup(table: Record<string, string>, key: string): string | undefined {
  return Object.prototype.hasOwnProperty.call(table, key) ? table[key] : undefined;
}

export function anchorLabel(anchorType: string): string {
  return lookup(ANCHOR_LABELS, anchorType) ?? anchorType;
}

export function posixClassLabel(pc: TPosixClassAST): string {
  const label = lookup(POSIX_CLASS_LABELS, pc.name) ?? pc.name;
  return pc.negated ? `NOT ${label}` : label;
}

export function groupLabel(subexp: Pick<TSubexpAST, 'groupType' | 'number' | 'name'>): string {
  switch (subexp.groupType) {
    case 'capture':
      return `group #${subexp.number}`;
    case 'named_capture':
      return `group #${subexp.number} '${subexp.name ?? ''}'`;
    default:
      return lookup(GROUP_LABELS, subexp.groupType) ?? subexp.groupType;
  }
}

export function balancedGroupLabel(bg: Pick<TBalancedGroupAST, 'name' | 'otherName'>): string {
  if (bg.name) {
    return `balanced group '${bg.name}' (pop '${bg.otherName}')`;
  }
  return `balance (pop '${bg.otherName}')`;
}

export function backReferenceLabel(br: TBackReferenceAST): string {
  if (br.name) return `back reference '${br.name}'`;
  return `back reference #${br.number}`;
}

export function unicodePropertyLabel(upe: TUnicodePropertyEscapeAST): string {
  return upe.negated ? `NOT Unicode ${upe.property}` : `Unicode ${upe.property}`;
}

export function recursiveRefLabel(ref: TRecursiveRefAST): string {
  const target = ref.target;
  if (target === 'R' || target === '0') return 'recurse whole pattern';
  if (target === '') return 'recurse';
  if (/^[+\-0-9]/.test(target)) return `recurse to group ${target}`;
  return `recurse to '${target}'`;
}

export function backtrackControlLabel(bc: TBacktrackControlAST): string {
  const arg = bc.arg ?? '';
  switch (bc.verb) {
    case 'ACCEPT':
      return 'accept match';
    case 'FAIL':
      return 'force fail';
    case 'COMMIT':
      return 'commit (no retry)';
    case 'MARK':
      return arg ? `mark '${arg}'` : 'mark';
    case 'PRUNE':
      return arg ? `prune '${arg}'` : 'prune';
    case 'SKIP':
      return arg ? `skip to '${arg}'` : 'skip';
    case 'THEN':
      return arg ? `then '${arg}'` : 'then (try next alt)';
    default:
      return arg ? `*${bc.verb}:${arg}` : `*${bc.verb}`;
  }
}

export function calloutLabel(callout: TCalloutAST): string {
  if (callout.number >= 0) return `callout (${callout.number})`;
  return `callout "${callout.text ?? ''}"`;
}

export function inlineModifierLabel(im: Pick<TInlineModifierAST, 'enable' | 'disable'>): string {
  if (im.enable && im.disable) return `flags: +${im.enable} -${im.disable}`;
  if (im.enable) return `flags: +${im.enable}`;
  if (im.disable) return `flags: -${im.disable}`;
  return 'flags';
}

export function conditionLabel(condition: TConditionAST): string {
  switch (condition.type) {
    case 'back_reference':
      if (condition.name) return `if '${condition.name}' matched`;
      return `if group ${Math.abs(condition.number)} matched`;
    case 'recursive_ref':
      if (condition.target === 'R') return 'if in recursion';
      if (condition.target === 'DEFINE' || condition.target === '') return 'DEFINE';
      return `if in recursion to '${condition.target}'`;
    case 'literal':
      return condition.text === 'DEFINE' ? 'DEFINE' : `if ${condition.text}`;
    case 'subexp':
      switch (condition.groupType) {
        case 'positive_lookahead':
          return 'if followed by...';
        case 'negative_lookahead':
          return 'if not followed by...';
        case 'positive_lookbehind':
          return 'if preceded by...';
        case 'negative_lookbehind':
          return 'if not preceded by...';
        default:
          return 'if assertion';
      }
    default:
      return 'if condition';
  }
}

/**
 * Quantifier caption drawn under the loop. `*`, `+` and `{1}` need none.
 */
export function repeatLabel(repeat: TRepeatAST): string {
  let label: string;
  if (repeat.min === repeat.max) {
    label = repeat.min === 1 ? '' : `${repeat.min} times`;
  } else if (repeat.max === -1) {
    label = repeat.min <= 1 ? '' : `${repeat.min}+ times`;
  } else {
    label = `${repeat.min} to ${repeat.max} times`;
  }

  if (repeat.possessive) {
    label = label ? `${label} (possessive)` : 'possessive';
  }
  return label;
}

export function flagLabel(letter: string): string {
  return lookup(FLAG_DESCRIPTIONS, letter) ?? `flag '${letter}'`;
}

/** One line per flag letter, in the order written */
export function flagLabels(flags: string): string[] {
  return Array.from(flags, flagLabel);
}

export function patternOptionsLabel(options: readonly TPatternOptionAST[]): string {
  const names = options.map((opt) => (opt.value ? `*${opt.name}=${opt.value}` : `*${opt.name}`));
  return `Options: ${names.join(', ')}`;
}

export function charsetHeading(charset: Pick<TCharsetAST, 'inverted'>): string {
  return charset.inverted ? 'None of:' : 'One of:';
}

export function charsetItemLabel(item: TCharsetItemAST): string {
  switch (item.type) {
    case 'charset_literal':
      return `"${item.text}"`;
    case 'charset_range':
      return `"${item.first}" - "${item.last}"`;
    case 'escape':
      return item.value;
    case 'posix_class':
      return posixClassLabel(item);
    case 'set_operation': {
      const operand = item.operand.items.map(charsetItemLabel).join(', ');
      const negation = item.operand.inverted ? 'NOT ' : '';
      const word = item.operator === 'subtraction' ? 'minus' : 'and';
      return `${word} ${negation}[${operand}]`;
    }
  }
}
