import { describe, it, expect } from 'vitest';
import {
  anchorLabel,
  posixClassLabel,
  groupLabel,
  balancedGroupLabel,
  backReferenceLabel,
  unicodePropertyLabel,
  recursiveRefLabel,
  backtrackControlLabel,
  calloutLabel,
  inlineModifierLabel,
  conditionLabel,
  repeatLabel,
  flagLabels,
  patternOptionsLabel,
  charsetHeading,
  charsetItemLabel,
} from '../../../src/diagram/labels';
import {
  backReference,
  recursiveRef,
  literal,
  subexp,
  sequence,
  unknownNode,
  repeat,
  posixClass,
  charsetLiteral,
  charsetRange,
  escape,
  setOperation,
  charset,
  unicodeProperty,
  backtrackControl,
  callout,
} from '../../../src/ast/builder';

describe('anchorLabel', () => {
  it('describes known anchors', () => {
    expect(anchorLabel('start')).toBe('Start of line');
    expect(anchorLabel('non_word_boundary')).toBe('Non-word boundary');
    expect(anchorLabel('end_of_previous_match')).toBe('End of previous match');
  });

  it('shows unknown anchor types verbatim', () => {
    expect(anchorLabel('line_break_opportunity')).toBe('line_break_opportunity');
  });

  it('does not pick up object prototype keys', () => {
    expect(anchorLabel('toString')).toBe('toString');
  });
});

describe('groupLabel', () => {
  it('numbers capture groups', () => {
    expect(groupLabel({ groupType: 'capture', number: 1 })).toBe('group #1');
    expect(groupLabel({ groupType: 'named_capture', number: 2, name: 'year' })).toBe("group #2 'year'");
  });

  it('names the other group kinds', () => {
    expect(groupLabel({ groupType: 'non_capture', number: 0 })).toBe('non-capturing group');
    expect(groupLabel({ groupType: 'negative_lookbehind', number: 0 })).toBe('negative lookbehind');
    expect(groupLabel({ groupType: 'non_atomic_positive_lookahead', number: 0 })).toBe('non-atomic lookahead');
    expect(groupLabel({ groupType: 'atomic', number: 0 })).toBe('atomic group');
    expect(groupLabel({ groupType: 'atomic_script_run', number: 0 })).toBe('atomic script run');
  });

  it('shows unknown group types verbatim', () => {
    expect(groupLabel({ groupType: 'absent', number: 0 })).toBe('absent');
  });
});

describe('balancedGroupLabel', () => {
  it('describes capturing and non-capturing forms', () => {
    expect(balancedGroupLabel({ name: 'close', otherName: 'open' })).toBe("balanced group 'close' (pop 'open')");
    expect(balancedGroupLabel({ otherName: 'open' })).toBe("balance (pop 'open')");
  });
});

describe('reference labels', () => {
  it('prefers the name of a back reference', () => {
    expect(backReferenceLabel(backReference(3))).toBe('back reference #3');
    expect(backReferenceLabel(backReference('word'))).toBe("back reference 'word'");
  });

  it('describes unicode properties', () => {
    expect(unicodePropertyLabel(unicodeProperty('Letter'))).toBe('Unicode Letter');
    expect(unicodePropertyLabel(unicodeProperty('Script=Greek', true))).toBe('NOT Unicode Script=Greek');
  });

  it('distinguishes recursion targets', () => {
    expect(recursiveRefLabel(recursiveRef('R'))).toBe('recurse whole pattern');
    expect(recursiveRefLabel(recursiveRef('0'))).toBe('recurse whole pattern');
    expect(recursiveRefLabel(recursiveRef('2'))).toBe('recurse to group 2');
    expect(recursiveRefLabel(recursiveRef('-1'))).toBe('recurse to group -1');
    expect(recursiveRefLabel(recursiveRef('+1'))).toBe('recurse to group +1');
    expect(recursiveRefLabel(recursiveRef('inner'))).toBe("recurse to 'inner'");
    expect(recursiveRefLabel(recursiveRef(''))).toBe('recurse');
  });
});

describe('backtrackControlLabel', () => {
  it('describes verbs with and without arguments', () => {
    expect(backtrackControlLabel(backtrackControl('ACCEPT'))).toBe('accept match');
    expect(backtrackControlLabel(backtrackControl('FAIL'))).toBe('force fail');
    expect(backtrackControlLabel(backtrackControl('COMMIT'))).toBe('commit (no retry)');
    expect(backtrackControlLabel(backtrackControl('MARK', 'm1'))).toBe("mark 'm1'");
    expect(backtrackControlLabel(backtrackControl('PRUNE'))).toBe('prune');
    expect(backtrackControlLabel(backtrackControl('SKIP', 'm1'))).toBe("skip to 'm1'");
    expect(backtrackControlLabel(backtrackControl('THEN'))).toBe('then (try next alt)');
    expect(backtrackControlLabel(backtrackControl('THEN', 'm2'))).toBe("then 'm2'");
  });

  it('falls back to the verb syntax', () => {
    expect(backtrackControlLabel(backtrackControl('UTF'))).toBe('*UTF');
    expect(backtrackControlLabel(backtrackControl('NEW', 'x'))).toBe('*NEW:x');
  });
});

describe('calloutLabel', () => {
  it('shows the number or the quoted text', () => {
    expect(calloutLabel(callout(0))).toBe('callout (0)');
    expect(calloutLabel(callout('tick'))).toBe('callout "tick"');
  });
});

describe('inlineModifierLabel', () => {
  it('lists enabled and disabled flags', () => {
    expect(inlineModifierLabel({ enable: 'i', disable: 'm' })).toBe('flags: +i -m');
    expect(inlineModifierLabel({ enable: 'is', disable: '' })).toBe('flags: +is');
    expect(inlineModifierLabel({ enable: '', disable: 'x' })).toBe('flags: -x');
    expect(inlineModifierLabel({ enable: '', disable: '' })).toBe('flags');
  });
});

describe('conditionLabel', () => {
  it('describes group conditions', () => {
    expect(conditionLabel(backReference(1))).toBe('if group 1 matched');
    expect(conditionLabel(backReference(-2))).toBe('if group 2 matched');
    expect(conditionLabel(backReference('tag'))).toBe("if 'tag' matched");
  });

  it('describes recursion and DEFINE conditions', () => {
    expect(conditionLabel(recursiveRef('R'))).toBe('if in recursion');
    expect(conditionLabel(recursiveRef('R1'))).toBe("if in recursion to 'R1'");
    expect(conditionLabel(recursiveRef('DEFINE'))).toBe('DEFINE');
    expect(conditionLabel(literal('DEFINE'))).toBe('DEFINE');
    expect(conditionLabel(literal('VERSION>=10'))).toBe('if VERSION>=10');
  });

  it('describes assertion conditions by polarity', () => {
    const body = sequence(literal('a'));
    expect(conditionLabel(subexp('positive_lookahead', body))).toBe('if followed by...');
    expect(conditionLabel(subexp('negative_lookahead', body))).toBe('if not followed by...');
    expect(conditionLabel(subexp('positive_lookbehind', body))).toBe('if preceded by...');
    expect(conditionLabel(subexp('negative_lookbehind', body))).toBe('if not preceded by...');
    expect(conditionLabel(subexp('atomic', body))).toBe('if assertion');
  });

  it('falls back for unknown condition kinds', () => {
    expect(conditionLabel(unknownNode('version_check'))).toBe('if condition');
  });
});

describe('repeatLabel', () => {
  it('has no caption for star, plus and {1}', () => {
    expect(repeatLabel(repeat(0, -1))).toBe('');
    expect(repeatLabel(repeat(1, -1))).toBe('');
    expect(repeatLabel(repeat(1, 1))).toBe('');
  });

  it('captions explicit counts', () => {
    expect(repeatLabel(repeat(3, 3))).toBe('3 times');
    expect(repeatLabel(repeat(0, 0))).toBe('0 times');
    expect(repeatLabel(repeat(2, -1))).toBe('2+ times');
    expect(repeatLabel(repeat(2, 4))).toBe('2 to 4 times');
  });

  it('marks possessive quantifiers', () => {
    expect(repeatLabel(repeat(2, 4, { possessive: true }))).toBe('2 to 4 times (possessive)');
    expect(repeatLabel(repeat(0, -1, { possessive: true }))).toBe('possessive');
  });
});

describe('flagLabels', () => {
  it('describes each letter in order', () => {
    expect(flagLabels('gimsuy')).toEqual(['global', 'ignore case', 'multiline', 'dotAll', 'unicode', 'sticky']);
    expect(flagLabels('dvxnUJ')).toEqual([
      'hasIndices',
      'unicodeSets',
      'extended',
      'explicit capture',
      'ungreedy',
      'duplicate names',
    ]);
  });

  it('lists unknown letters as-is', () => {
    expect(flagLabels('gq')).toEqual(['global', "flag 'q'"]);
  });

  it('returns nothing for no flags', () => {
    expect(flagLabels('')).toEqual([]);
  });
});

describe('patternOptionsLabel', () => {
  it('joins options with their values', () => {
    expect(patternOptionsLabel([{ name: 'UTF' }, { name: 'LIMIT_MATCH', value: '10' }])).toBe(
      'Options: *UTF, *LIMIT_MATCH=10',
    );
  });
});

describe('charset labels', () => {
  it('heads the list by polarity', () => {
    expect(charsetHeading({ inverted: false })).toBe('One of:');
    expect(charsetHeading({ inverted: true })).toBe('None of:');
  });

  it('quotes literals and ranges', () => {
    expect(charsetItemLabel(charsetLiteral('_'))).toBe('"_"');
    expect(charsetItemLabel(charsetRange('a', 'z'))).toBe('"a" - "z"');
  });

  it('uses escape values and POSIX descriptions', () => {
    expect(charsetItemLabel(escape('digit', 'd', 'digit'))).toBe('digit');
    expect(charsetItemLabel(posixClass('xdigit'))).toBe('hex digit');
    expect(posixClassLabel(posixClass('blank', true))).toBe('NOT blank (space/tab)');
    expect(posixClassLabel(posixClass('word'))).toBe('word');
  });

  it('summarises set operations inline', () => {
    const vowels = charset([charsetLiteral('a'), charsetLiteral('e')]);
    expect(charsetItemLabel(setOperation('subtraction', vowels))).toBe('minus ["a", "e"]');
    expect(charsetItemLabel(setOperation('intersection', charset([charsetRange('0', '9')], true)))).toBe(
      'and NOT ["0" - "9"]',
    );
  });
});
