/**
 * Base class for every failure this connector raises on purpose.
 * Callers can catch `ExtractError` to separate structural failures
 * from programming errors.
 */
export class ExtractError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ExtractError';
  }
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
