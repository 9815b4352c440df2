// Error handling utilities for data-cleaning package

export function isError(error: unknown): error is Error {
  return error instanceof Error;
}

export function getErrorMessage(error: unknown): string {
  if (isError(error)) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return 'Unknown error occurred';
}

/**
 * Raised at startup when a pipeline configuration contradicts itself.
 * Carries every issue found, not just the first.
 */
export class ConfigurationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid pipeline configuration:\n - ${issues.join('\n - ')}`);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}
