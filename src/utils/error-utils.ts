/**
 * Normalizes thrown values for logging and re-throwing.
 */

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Prefixes an error's message with context, keeping the original as `cause`.
 */
export function wrapError(error: unknown, context: string): Error {
  const message = `${context}: ${getErrorMessage(error)}`;
  return error instanceof Error ? new Error(message, { cause: error }) : new Error(message);
}
