import { parse as parseJsonc, type ParseError } from 'jsonc-parser';
import type { TRegexpAST } from './types';
import { regexpSchema } from './schema';
import { AstValidationError } from './AstValidationError';
import { getErrorMessage } from '../utils/error-utils';

/**
 * A failure reported by a parser: a message and, when known, a 1-based position.
 * Flavor parsers and {@link deserializeAST} both report errors in this shape.
 */
export type TParseFailure = {
  message: string;
  line?: number;
  column?: number;
};

/**
 * Serializes a regexp AST to a JSON string.
 *
 * @param pretty - If true, formats the JSON with 2-space indentation. Defaults to true.
 */
export function serializeAST(ast: TRegexpAST, pretty: boolean = true): string {
  return pretty ? JSON.stringify(ast, null, 2) : JSON.stringify(ast);
}

/**
 * Deserializes a JSON string into a regexp AST, validating every node.
 * Node kinds this build does not know become `{ type: 'unknown', kind }`.
 *
 * @throws {AstValidationError} If the text is not JSON or the tree has the wrong shape.
 */
export function deserializeAST(json: string): TRegexpAST {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    const message = getErrorMessage(error);
    const { line, column } = locateJsonError(message, json);
    throw new AstValidationError(`Invalid JSON: ${message}`, [], line, column);
  }

  const result = regexpSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`,
    );
    throw new AstValidationError(`Invalid regexp AST: ${issues.join('; ')}`, issues);
  }
  return result.data;
}

/**
 * Converts a 0-based character offset into a 1-based line and column.
 */
export function positionToLineColumn(text: string, offset: number): { line: number; column: number } {
  const clamped = Math.max(0, Math.min(offset, text.length));
  let line = 1;
  let lineStart = 0;
  for (let i = 0; i < clamped; i++) {
    if (text[i] === '\n') {
      line++;
      lineStart = i + 1;
    }
  }
  return { line, column: clamped - lineStart + 1 };
}

// V8 reports "... at position N", "... (line L column C)", or for an
// unexpected token no position at all; the last case is rescanned.
function locateJsonError(message: string, json: string): { line?: number; column?: number } {
  const lineColumn = /line (\d+) column (\d+)/.exec(message);
  if (lineColumn) {
    return { line: Number(lineColumn[1]), column: Number(lineColumn[2]) };
  }
  const position = /position (\d+)/.exec(message);
  if (position) {
    return positionToLineColumn(json, Number(position[1]));
  }
  const errors: ParseError[] = [];
  parseJsonc(json, errors, { disallowComments: true });
  if (errors.length > 0) {
    return positionToLineColumn(json, errors[0].offset);
  }
  return {};
}

/**
 * Formats a parse failure for the terminal: the offending line of input with a
 * caret under the failing column, followed by the message.
 */
export function formatParseFailure(input: string, failure: TParseFailure): string {
  const lines: string[] = ['Error parsing input:', ''];
  const sourceLines = input.split('\n');

  if (failure.line !== undefined && failure.line >= 1 && failure.line <= sourceLines.length) {
    const sourceLine = sourceLines[failure.line - 1];
    lines.push(`  ${sourceLine}`);
    if (failure.column !== undefined && failure.column >= 1 && failure.column <= sourceLine.length + 1) {
      lines.push(`  ${' '.repeat(failure.column - 1)}^`);
    }
    lines.push('');
  }

  lines.push(failure.message);
  return lines.join('\n');
}
