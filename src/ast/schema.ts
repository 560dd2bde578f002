/**
 * Zod schemas for the serialized Regexp AST.
 *
 * Parsers written outside this package hand their trees over as JSON; these
 * schemas check the shape before anything reaches the renderer. Content nodes
 * of a kind this build does not know are kept as `{ type: 'unknown', kind }`
 * rather than rejected, so newer parsers still render.
 */

import { z } from 'zod';
import type { TCharsetItemAST, TRegexpAST } from './types';

// Lazy so the nested-regexp fields can point back at the root schema
const nestedRegexp = z.lazy(() => regexpSchema);

export const repeatSchema = z.object({
  min: z.number().int().min(0),
  max: z.number().int().min(-1),
  greedy: z.boolean().default(true),
  possessive: z.boolean().default(false),
});

export const patternOptionSchema = z.object({
  name: z.string().min(1),
  value: z.string().optional(),
});

const literalSchema = z.object({ type: z.literal('literal'), text: z.string() });
const anyCharacterSchema = z.object({ type: z.literal('any_character') });
const anchorSchema = z.object({ type: z.literal('anchor'), anchorType: z.string() });
const escapeSchema = z.object({
  type: z.literal('escape'),
  escapeType: z.string(),
  code: z.string(),
  value: z.string(),
});
const backReferenceSchema = z.object({
  type: z.literal('back_reference'),
  number: z.number().int().default(0),
  name: z.string().optional(),
});
const unicodePropertySchema = z.object({
  type: z.literal('unicode_property_escape'),
  property: z.string(),
  negated: z.boolean().default(false),
});
const recursiveRefSchema = z.object({ type: z.literal('recursive_ref'), target: z.string() });
const backtrackControlSchema = z.object({
  type: z.literal('backtrack_control'),
  verb: z.string(),
  arg: z.string().optional(),
});
const calloutSchema = z.object({
  type: z.literal('callout'),
  number: z.number().int().min(-1),
  text: z.string().optional(),
});
const commentSchema = z.object({ type: z.literal('comment'), text: z.string() });
const quotedLiteralSchema = z.object({ type: z.literal('quoted_literal'), text: z.string() });
const unknownSchema = z.object({ type: z.literal('unknown'), kind: z.string() });

// ---- Character classes ----

const charsetLiteralSchema = z.object({ type: z.literal('charset_literal'), text: z.string() });
const charsetRangeSchema = z.object({ type: z.literal('charset_range'), first: z.string(), last: z.string() });
const posixClassSchema = z.object({
  type: z.literal('posix_class'),
  name: z.string(),
  negated: z.boolean().default(false),
});

const charsetSchema = z.object({
  type: z.literal('charset'),
  inverted: z.boolean().default(false),
  items: z.array(z.lazy(() => charsetItemSchema)),
});

const setOperationSchema = z.object({
  type: z.literal('set_operation'),
  operator: z.enum(['subtraction', 'intersection']),
  operand: charsetSchema,
});

const charsetItemSchema: z.ZodType<TCharsetItemAST, z.ZodTypeDef, unknown> = z.discriminatedUnion('type', [
  charsetLiteralSchema,
  charsetRangeSchema,
  escapeSchema,
  posixClassSchema,
  setOperationSchema,
]);

// ---- Groups ----

const subexpSchema = z.object({
  type: z.literal('subexp'),
  groupType: z.string(),
  number: z.number().int().min(0).default(0),
  name: z.string().optional(),
  regexp: nestedRegexp,
});

const branchResetSchema = z.object({ type: z.literal('branch_reset'), regexp: nestedRegexp });

const balancedGroupSchema = z.object({
  type: z.literal('balanced_group'),
  name: z.string().optional(),
  otherName: z.string(),
  regexp: nestedRegexp,
});

const inlineModifierSchema = z.object({
  type: z.literal('inline_modifier'),
  enable: z.string().default(''),
  disable: z.string().default(''),
  regexp: nestedRegexp.optional(),
});

const CONDITION_TYPES = new Set(['back_reference', 'recursive_ref', 'literal', 'subexp', 'unknown']);

const conditionSchema = z.preprocess(
  (value) => markUnknownKind(value, CONDITION_TYPES),
  z.discriminatedUnion('type', [backReferenceSchema, recursiveRefSchema, literalSchema, subexpSchema, unknownSchema]),
);

const conditionalSchema = z.object({
  type: z.literal('conditional'),
  condition: conditionSchema,
  trueMatch: nestedRegexp,
  falseMatch: nestedRegexp.optional(),
});

// ---- Content dispatch ----

export const CONTENT_TYPES: ReadonlySet<string> = new Set([
  'literal',
  'any_character',
  'anchor',
  'escape',
  'charset',
  'subexp',
  'back_reference',
  'unicode_property_escape',
  'conditional',
  'recursive_ref',
  'branch_reset',
  'backtrack_control',
  'callout',
  'comment',
  'quoted_literal',
  'inline_modifier',
  'balanced_group',
  'unknown',
]);

/**
 * Rewrites `{ type: 'some_new_kind', ... }` to `{ type: 'unknown', kind: 'some_new_kind' }`
 * when the kind is not in `known`. Anything else passes through untouched.
 */
function markUnknownKind(value: unknown, known: ReadonlySet<string>): unknown {
  if (typeof value !== 'object' || value === null || !('type' in value)) return value;
  const kind = value.type;
  if (typeof kind !== 'string' || known.has(kind)) return value;
  return { type: 'unknown', kind };
}

export const contentSchema = z.preprocess(
  (value) => markUnknownKind(value, CONTENT_TYPES),
  z.discriminatedUnion('type', [
    literalSchema,
    anyCharacterSchema,
    anchorSchema,
    escapeSchema,
    charsetSchema,
    subexpSchema,
    backReferenceSchema,
    unicodePropertySchema,
    conditionalSchema,
    recursiveRefSchema,
    branchResetSchema,
    backtrackControlSchema,
    calloutSchema,
    commentSchema,
    quotedLiteralSchema,
    inlineModifierSchema,
    balancedGroupSchema,
    unknownSchema,
  ]),
);

export const matchFragmentSchema = z.object({
  type: z.literal('match_fragment'),
  content: contentSchema,
  repeat: repeatSchema.optional(),
});

export const matchSchema = z.object({
  type: z.literal('match'),
  fragments: z.array(matchFragmentSchema),
});

export const regexpSchema: z.ZodType<TRegexpAST, z.ZodTypeDef, unknown> = z.object({
  type: z.literal('regexp'),
  matches: z.array(matchSchema),
  flags: z.string().optional(),
  options: z.array(patternOptionSchema).optional(),
});
