/**
 * Error thrown when a serialized AST cannot be turned into a TRegexpAST,
 * either because the JSON is malformed or because the tree has the wrong shape.
 */
export class AstValidationError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly string[] = [],
    /** 1-based line of a JSON syntax error, when known */
    public readonly line?: number,
    /** 1-based column of a JSON syntax error, when known */
    public readonly column?: number,
  ) {
    super(message);
    this.name = 'AstValidationError';
  }

  static isAstValidationError(error: unknown): error is AstValidationError {
    return (
      error instanceof AstValidationError ||
      (error instanceof Error && error.name === 'AstValidationError')
    );
  }
}
