export type * from './types';
export * from './builder';
export { serializeAST, deserializeAST, formatParseFailure, positionToLineColumn } from './serialization';
export type { TParseFailure } from './serialization';
export { AstValidationError } from './AstValidationError';
export { regexpSchema, contentSchema, CONTENT_TYPES } from './schema';
