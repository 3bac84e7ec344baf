/**
 * ConfigurationError
 *
 * Invalid settings, selectors or endpoint identity found before any work
 * starts. The pipeline refuses to run.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly string[] = [],
    options?: ErrorOptions,
  ) {
    super(
      issues.length > 0
        ? `${message}\n${issues.map((issue) => `  - ${issue}`).join('\n')}`
        : message,
      options,
    );
    this.name = 'ConfigurationError';
  }
}
