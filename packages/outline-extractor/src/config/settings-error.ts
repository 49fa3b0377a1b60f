/**
 * Error thrown when the settings file is missing or invalid.
 *
 * Settings are loaded once at startup, so this error is fatal.
 */
export class SettingsError extends Error {
  /**
   * One line per problem, e.g. `headingKeywords.0: Too small`
   */
  readonly issues: string[];

  constructor(message: string, issues: string[] = [], options?: ErrorOptions) {
    super(message, options);
    this.name = 'SettingsError';
    this.issues = issues;
  }

  getSummary(): string {
    if (this.issues.length === 0) {
      return this.message;
    }
    return [this.message, ...this.issues.map((issue) => `  - ${issue}`)].join(
      '\n',
    );
  }
}
