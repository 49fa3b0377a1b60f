/**
 * Error thrown when a PDF cannot be opened or its text layout cannot be read.
 */
export class PdfLayoutReadError extends Error {
  constructor(
    public readonly source: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super(`Failed to read layout of ${source}: ${message}`, options);
    this.name = 'PdfLayoutReadError';
  }

  static fromError(source: string, error: unknown): PdfLayoutReadError {
    const message = error instanceof Error ? error.message : String(error);
    return new PdfLayoutReadError(source, message, { cause: error });
  }
}
