import type { ZodError } from 'zod';

/**
 * Raised when CDK context or Lambda environment input fails validation.
 * Carries every failing key so a single synth run reports all of them.
 */
export class ConfigurationError extends Error {
  public readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = []) {
    super(issues.length > 0 ? `${message}:\n  - ${issues.join('\n  - ')}` : message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }

  static fromZodError(error: ZodError, message = 'Invalid configuration'): ConfigurationError {
    return new ConfigurationError(
      message,
      error.issues.map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`),
    );
  }
}
