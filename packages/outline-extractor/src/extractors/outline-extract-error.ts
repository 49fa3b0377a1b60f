/**
 * OutlineExtractError
 *
 * Base error class for outline extraction failures.
 */
export class OutlineExtractError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'OutlineExtractError';
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  /**
   * Create OutlineExtractError from unknown error with context
   */
  static fromError(context: string, error: unknown): OutlineExtractError {
    return new OutlineExtractError(
      `${context}: ${OutlineExtractError.getErrorMessage(error)}`,
      { cause: error },
    );
  }
}
