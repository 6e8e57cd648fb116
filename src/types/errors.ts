/**
 * Error classes for the reporting API.
 * Both query errors surface to callers as HTTP 500 with the message text.
 */

/**
 * Error thrown when a connection cannot be opened or a statement fails.
 * Carries the driver message; the SQL is kept for logging only.
 */
export class QueryExecutionError extends Error {
  public readonly sql?: string;

  constructor(message: string, options: { sql?: string; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'QueryExecutionError';
    this.sql = options.sql;
    Object.setPrototypeOf(this, QueryExecutionError.prototype);
  }
}

/**
 * Error thrown when a driver value has a shape the normalizer does not know.
 */
export class NormalizationError extends Error {
  public readonly column: string;

  constructor(column: string, detail: string) {
    super(`Cannot normalize value in column "${column}": ${detail}`);
    this.name = 'NormalizationError';
    this.column = column;
    Object.setPrototypeOf(this, NormalizationError.prototype);
  }
}

/**
 * Error thrown when environment configuration is invalid.
 */
export class ConfigurationError extends Error {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Configuration validation failed:\n${issues.map((i) => `  - ${i}`).join('\n')}`);
    this.name = 'ConfigurationError';
    this.issues = issues;
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * Extract a printable message from anything thrown by a driver.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
